import { vi } from "vitest";
import { RemovalError, RuntimeUnavailableError } from "../src/errors";
import type {
  ContainerHandle,
  ContainerStatus,
  ImageHandle,
  NetworkHandle,
  RemovalOutcome,
  ResourceFilter,
  ResourceHandle,
  ResourceType,
  RuntimeClient,
  UsageSnapshot,
  VolumeHandle
} from "../src/types";
import type { MenuOption, Prompter, Writer } from "../src/ui";

/**
 * Mock helper to set up docker command responses
 * Allows setting specific responses for different docker commands
 */
export function mockDockerExec() {
  const responses: Record<string, string> = {};
  const sequences: Record<string, string[]> = {};
  const failures: Record<string, Error> = {};
  const callLog: string[][] = [];

  const execDockerMock = vi.fn(async (args: string[]) => {
    callLog.push([...args]);
    const key = args.join(" ");

    if (key in failures) {
      throw failures[key];
    }
    const sequence = sequences[key];
    if (sequence && sequence.length > 0) {
      // The last output repeats once the earlier ones are used up.
      const stdout = sequence.length > 1 ? sequence.shift() ?? "" : sequence[0];
      return { stdout, stderr: "" };
    }
    if (key in responses) {
      return {
        stdout: responses[key],
        stderr: ""
      };
    }

    // Default error response for unmocked commands
    throw new Error(`Unmocked docker command: ${key}`);
  });

  return {
    execDockerMock,
    setResponse: (args: string[], output: string) => {
      responses[args.join(" ")] = output;
    },
    setResponses: (args: string[], outputs: string[]) => {
      sequences[args.join(" ")] = [...outputs];
    },
    setFailure: (args: string[], error: Error) => {
      failures[args.join(" ")] = error;
    },
    getCallLog: () => callLog
  };
}

/** Shaped like the rejection of a promisified execFile. */
export function dockerError(stderr: string, code: number | string = 1, killed = false): Error {
  return Object.assign(new Error(`Command failed: docker\n${stderr}`), { stderr, stdout: "", code, killed });
}

export function toJsonLines(items: Record<string, unknown>[]): string {
  return items.map((item) => JSON.stringify(item)).join("\n");
}

export function container(id: string, status: ContainerStatus, sizeBytes = 0): ContainerHandle {
  const handle: ContainerHandle = { type: "containers", id, name: `${id}-name`, status, sizeBytes };
  return Object.freeze(handle);
}

export function volume(name: string, dangling: boolean): VolumeHandle {
  const handle: VolumeHandle = { type: "volumes", id: name, name, status: dangling ? "dangling" : "attached" };
  return Object.freeze(handle);
}

export function network(id: string, name: string, endpoints = 0, builtIn = false): NetworkHandle {
  const handle: NetworkHandle = {
    type: "networks",
    id,
    name,
    endpoints,
    builtIn,
    status: endpoints === 0 ? "unused" : "in-use"
  };
  return Object.freeze(handle);
}

export function image(
  id: string,
  options: { referenced?: boolean; tagged?: boolean; sizeBytes?: number; references?: string[] } = {}
): ImageHandle {
  const references = options.references ?? (options.tagged ? [`${id}:latest`] : []);
  const handle: ImageHandle = {
    type: "images",
    id,
    name: references[0] ?? "",
    status: options.referenced ? "referenced" : "dangling",
    tagged: Boolean(options.tagged) || references.length > 0,
    references,
    sizeBytes: options.sizeBytes
  };
  return Object.freeze(handle);
}

export function usageSnapshot(sizes: Partial<Record<"images" | "containers" | "volumes" | "buildCache", number>> = {}): UsageSnapshot {
  return {
    takenAt: new Date("2026-01-01T00:00:00.000Z"),
    entries: {
      images: { sizeBytes: sizes.images },
      containers: { sizeBytes: sizes.containers },
      volumes: { sizeBytes: sizes.volumes },
      buildCache: { sizeBytes: sizes.buildCache }
    }
  };
}

/**
 * In-process runtime: holds handles in memory, removes them for real and
 * counts every call. Removal of a missing handle succeeds with zero bytes.
 */
export class FakeRuntimeClient implements RuntimeClient {
  readonly removeCalls: ResourceHandle[] = [];
  readonly listCalls: Array<{ type: ResourceType; filter?: ResourceFilter }> = [];
  usageCalls = 0;
  buildCacheCalls = 0;
  unavailable = false;
  buildCacheBytes = 0;
  readonly failingIds = new Set<string>();
  private handles: ResourceHandle[];

  constructor(handles: ResourceHandle[] = []) {
    this.handles = [...handles];
  }

  get remaining(): readonly ResourceHandle[] {
    return this.handles;
  }

  async list(type: ResourceType, filter?: ResourceFilter): Promise<ResourceHandle[]> {
    this.listCalls.push({ type, filter });
    this.ensureAvailable();
    return this.handles.filter((handle) => handle.type === type);
  }

  async remove(handle: ResourceHandle): Promise<RemovalOutcome> {
    this.removeCalls.push(handle);
    if (this.failingIds.has(handle.id)) {
      return { ok: false, error: new RemovalError(handle.id, `conflict: ${handle.id} is in use`) };
    }
    const index = this.handles.findIndex((item) => item.type === handle.type && item.id === handle.id);
    if (index === -1) {
      return { ok: true, reclaimedBytes: 0 };
    }
    this.handles.splice(index, 1);
    return { ok: true, reclaimedBytes: handle.sizeBytes ?? 0 };
  }

  async usage(): Promise<UsageSnapshot> {
    this.usageCalls += 1;
    this.ensureAvailable();
    const total = (type: ResourceType) =>
      this.handles
        .filter((handle) => handle.type === type)
        .reduce((sum, handle) => sum + (handle.sizeBytes ?? 0), 0);
    return usageSnapshot({ images: total("images"), containers: total("containers") });
  }

  async pruneBuildCache(): Promise<number> {
    this.buildCacheCalls += 1;
    this.ensureAvailable();
    return this.buildCacheBytes;
  }

  private ensureAvailable(): void {
    if (this.unavailable) {
      throw new RuntimeUnavailableError("Cannot connect to the Docker daemon at unix:///var/run/docker.sock.");
    }
  }
}

/** Answers prompts from queues; an exhausted queue behaves like a cancelled prompt. */
export class ScriptedPrompter implements Prompter {
  readonly messages: string[] = [];

  constructor(
    private readonly answers: {
      confirm?: boolean[];
      text?: string[];
      select?: string[];
    } = {}
  ) {}

  async confirm(message: string): Promise<boolean> {
    this.messages.push(message);
    return this.answers.confirm?.shift() ?? false;
  }

  async text(message: string): Promise<string> {
    this.messages.push(message);
    return this.answers.text?.shift() ?? "";
  }

  async select<T extends string>(message: string, options: MenuOption<T>[]): Promise<T | undefined> {
    this.messages.push(message);
    const next = this.answers.select?.shift();
    return options.find((option) => option.value === next)?.value;
  }

  async pause(message: string): Promise<void> {
    this.messages.push(message);
  }
}

export interface CollectingWriter extends Writer {
  lines: string[];
  errors: string[];
}

export function collectingWriter(): CollectingWriter {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    log: (line) => lines.push(line),
    error: (line) => errors.push(line)
  };
}
