import { DockerCliClient, createExecDocker } from "./docker";
import { UnsupportedEnvironmentError } from "./errors";
import type { RuntimeClient } from "./types";

export type FrontEndName = "posix" | "windows";

export const FRONT_END_NAMES: readonly FrontEndName[] = ["posix", "windows"];

export interface HostEnvironment {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
}

export interface FrontEnd {
  name: FrontEndName;
  binary: string;
  client: RuntimeClient;
}

export interface DispatchOptions {
  /** Skips detection. */
  frontEnd?: FrontEndName;
  timeoutMs?: number;
}

const POSIX_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set([
  "linux",
  "darwin",
  "freebsd",
  "openbsd",
  "netbsd",
  "sunos",
  "aix"
]);

const BINARIES: Record<FrontEndName, string> = {
  posix: "docker",
  windows: "docker.exe"
};

export function isFrontEndName(value: string): value is FrontEndName {
  return value === "posix" || value === "windows";
}

/** Returns undefined when the host looks like neither. */
export function detectFrontEnd(host: HostEnvironment): FrontEndName | undefined {
  const ostype = host.env.OSTYPE ?? "";
  if (host.platform === "win32" || ostype === "msys" || ostype === "cygwin" || host.env.WINDIR) {
    return "windows";
  }
  if (POSIX_PLATFORMS.has(host.platform) || host.env.SHELL) {
    return "posix";
  }
  return undefined;
}

export function dispatch(host: HostEnvironment, options: DispatchOptions = {}): FrontEnd {
  const name = options.frontEnd ?? detectFrontEnd(host);
  if (!name) {
    throw new UnsupportedEnvironmentError(
      `Could not tell which shell environment platform "${host.platform}" provides.`
    );
  }
  const binary = BINARIES[name];
  return {
    name,
    binary,
    client: new DockerCliClient(createExecDocker({ binary, timeoutMs: options.timeoutMs }))
  };
}
