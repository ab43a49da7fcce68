import type { ResourceType } from "./types";

export class RuntimeUnavailableError extends Error {
  readonly hint = "Is Docker running? Start Docker Desktop or the docker daemon and try again.";

  constructor(message: string) {
    super(message);
    this.name = "RuntimeUnavailableError";
  }
}

export class RuntimeQueryError extends Error {
  constructor(
    readonly type: ResourceType | "usage",
    message: string
  ) {
    super(message);
    this.name = "RuntimeQueryError";
  }
}

export class RemovalError extends Error {
  constructor(
    readonly resourceId: string,
    message: string
  ) {
    super(message);
    this.name = "RemovalError";
  }
}

export class UnsupportedEnvironmentError extends Error {
  readonly hint = "Run again with --front-end posix or --front-end windows.";

  constructor(message: string) {
    super(message);
    this.name = "UnsupportedEnvironmentError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
