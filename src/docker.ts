import { execFile } from "child_process";
import { promisify } from "util";
import { RemovalError, RuntimeQueryError, RuntimeUnavailableError, errorMessage } from "./errors";
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
  UsageCategory,
  UsageEntry,
  UsageSnapshot,
  VolumeHandle
} from "./types";

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type ExecDocker = (args: string[]) => Promise<ExecResult>;

export interface ExecOptions {
  binary?: string;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Reserved networks the daemon creates itself. The daemon refuses to create
 * user networks with these names, so matching by name cannot hit a custom one.
 * `nat` is the Windows-containers default; `ingress` and `docker_gwbridge`
 * belong to swarm mode.
 */
export const RESERVED_NETWORKS: ReadonlySet<string> = new Set([
  "bridge",
  "host",
  "none",
  "nat",
  "default",
  "ingress",
  "docker_gwbridge"
]);

const DEFAULT_BRIDGE_OPTION = "com.docker.network.bridge.default_bridge";

export async function execDocker(args: string[], options: ExecOptions = {}): Promise<ExecResult> {
  return execFileAsync(options.binary ?? "docker", args, {
    maxBuffer: 10 * 1024 * 1024,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    windowsHide: true
  });
}

export function createExecDocker(options: ExecOptions = {}): ExecDocker {
  return (args) => execDocker(args, options);
}

export type DockerRecord = Record<string, unknown>;

function isRecord(value: unknown): value is DockerRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseDockerJsonLines(output: string): DockerRecord[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const parsed: unknown = JSON.parse(line);
      if (!isRecord(parsed)) {
        throw new SyntaxError(`Expected a JSON object per line, got: ${line}`);
      }
      return parsed;
    });
}

export function parseDockerLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

function field(record: DockerRecord, key: string): string {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

const SIZE_PATTERN = /([0-9.]+)\s*(B|kB|KB|MB|GB|TB)/i;

export function parseOptionalSize(size?: string): number | undefined {
  if (!size) return undefined;
  const match = size.trim().match(SIZE_PATTERN);
  if (!match) return undefined;
  const value = Number(match[1]);
  if (Number.isNaN(value)) return undefined;
  const unit = match[2].toLowerCase();
  const multipliers: Record<string, number> = {
    b: 1,
    kb: 1000,
    mb: 1000 ** 2,
    gb: 1000 ** 3,
    tb: 1000 ** 4
  };
  return Math.round(value * (multipliers[unit] ?? 1));
}

export function parseDockerSize(size?: string): number {
  return parseOptionalSize(size) ?? 0;
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unitIndex = 0;
  while (value >= 1000 && unitIndex < units.length - 1) {
    value /= 1000;
    unitIndex += 1;
  }
  if (unitIndex > 0 && value < 10) {
    return `${value.toFixed(1)} ${units[unitIndex]}`;
  }
  return `${Math.round(value)} ${units[unitIndex]}`;
}

export function parseCount(value?: string): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function isReservedNetwork(name: string): boolean {
  return RESERVED_NETWORKS.has(name);
}

export function toContainerStatus(state: string): ContainerStatus {
  switch (state.toLowerCase()) {
    case "exited":
    case "dead":
      return "exited";
    case "created":
      return "created";
    default:
      // running, paused, restarting, removing and anything unknown stay protected
      return "running";
  }
}

export function filterArgs(filter?: ResourceFilter): string[] {
  if (!filter) return [];
  const args: string[] = [];
  for (const [key, value] of Object.entries(filter)) {
    const values = typeof value === "string" ? [value] : value;
    for (const item of values) {
      args.push("--filter", `${key}=${item}`);
    }
  }
  return args;
}

export interface ExecFailure {
  message: string;
  stderr: string;
  code?: string | number;
  killed: boolean;
}

export function toExecFailure(error: unknown): ExecFailure {
  if (!(error instanceof Error)) {
    return { message: String(error), stderr: "", killed: false };
  }
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  const code =
    "code" in error && (typeof error.code === "string" || typeof error.code === "number")
      ? error.code
      : undefined;
  const killed = "killed" in error && error.killed === true;
  return { message: error.message, stderr, code, killed };
}

const UNAVAILABLE_PATTERNS = [
  /Cannot connect to the Docker daemon/i,
  /error during connect/i,
  /Is the docker daemon running/i,
  /pipe\/docker_engine/i
];

const NOT_FOUND_PATTERN = /No such (container|volume|network|image|object)|network .+ not found/i;

export function isUnavailable(failure: ExecFailure): boolean {
  if (failure.code === "ENOENT" || failure.killed) return true;
  const text = `${failure.stderr}\n${failure.message}`;
  return UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(text));
}

export function isNotFound(failure: ExecFailure): boolean {
  return NOT_FOUND_PATTERN.test(`${failure.stderr}\n${failure.message}`);
}

function describeFailure(failure: ExecFailure): string {
  if (failure.code === "ENOENT") return "Docker CLI not found.";
  if (failure.killed) return "Docker did not respond before the timeout.";
  const detail = failure.stderr.trim() || failure.message;
  return detail.split("\n")[0] ?? detail;
}

const USAGE_TYPES: Record<string, UsageCategory> = {
  images: "images",
  containers: "containers",
  "local volumes": "volumes",
  "build cache": "buildCache"
};

export function emptyUsageSnapshot(takenAt = new Date()): UsageSnapshot {
  return {
    takenAt,
    entries: { images: {}, containers: {}, volumes: {}, buildCache: {} }
  };
}

export function parseSystemDf(rows: DockerRecord[], takenAt = new Date()): UsageSnapshot {
  const snapshot = emptyUsageSnapshot(takenAt);
  for (const row of rows) {
    const category = USAGE_TYPES[field(row, "Type").toLowerCase()];
    if (!category) continue;
    const entry: UsageEntry = {
      totalCount: parseCount(field(row, "TotalCount")),
      active: parseCount(field(row, "Active")),
      sizeBytes: parseOptionalSize(field(row, "Size")),
      reclaimableBytes: parseOptionalSize(field(row, "Reclaimable"))
    };
    snapshot.entries[category] = entry;
  }
  return snapshot;
}

export function parseReclaimedBytes(output: string): number {
  const match = output.match(/Total(?: reclaimed space)?:\s*([0-9.]+\s*[A-Za-z]+)/i);
  if (!match) return 0;
  return parseDockerSize(match[1]);
}

/**
 * Runtime client backed by the docker command line. Each call shells out once
 * (twice for listings that need a second query) and never retries.
 */
export class DockerCliClient implements RuntimeClient {
  constructor(private readonly exec: ExecDocker = createExecDocker()) {}

  async list(type: ResourceType, filter?: ResourceFilter): Promise<ResourceHandle[]> {
    switch (type) {
      case "containers":
        return this.listContainers(filter);
      case "volumes":
        return this.listVolumes(filter);
      case "networks":
        return this.listNetworks(filter);
      case "images":
        return this.listImages(filter);
    }
  }

  async remove(handle: ResourceHandle): Promise<RemovalOutcome> {
    const args = removalArgs(handle);
    try {
      await this.exec(args);
      return { ok: true, reclaimedBytes: handle.sizeBytes ?? 0 };
    } catch (error) {
      const failure = toExecFailure(error);
      if (isNotFound(failure)) {
        return { ok: true, reclaimedBytes: 0 };
      }
      return { ok: false, error: new RemovalError(handle.id, describeFailure(failure)) };
    }
  }

  async usage(): Promise<UsageSnapshot> {
    try {
      const { stdout } = await this.exec(["system", "df", "--format", "{{json .}}"]);
      return parseSystemDf(parseDockerJsonLines(stdout));
    } catch (error) {
      const failure = toExecFailure(error);
      if (isUnavailable(failure)) {
        throw new RuntimeUnavailableError(describeFailure(failure));
      }
      return emptyUsageSnapshot();
    }
  }

  async pruneBuildCache(): Promise<number> {
    try {
      const { stdout } = await this.exec(["builder", "prune", "-a", "-f"]);
      return parseReclaimedBytes(stdout);
    } catch (error) {
      const failure = toExecFailure(error);
      if (isUnavailable(failure)) {
        throw new RuntimeUnavailableError(describeFailure(failure));
      }
      throw new RemovalError("build-cache", describeFailure(failure));
    }
  }

  private async query(type: ResourceType, args: string[]): Promise<string> {
    try {
      const { stdout } = await this.exec(args);
      return stdout;
    } catch (error) {
      const failure = toExecFailure(error);
      if (isUnavailable(failure)) {
        throw new RuntimeUnavailableError(describeFailure(failure));
      }
      throw new RuntimeQueryError(type, describeFailure(failure));
    }
  }

  private parse(type: ResourceType, stdout: string): DockerRecord[] {
    try {
      return parseDockerJsonLines(stdout);
    } catch (error) {
      throw new RuntimeQueryError(type, `Unreadable ${type} listing: ${errorMessage(error)}`);
    }
  }

  private async listContainers(filter?: ResourceFilter): Promise<ContainerHandle[]> {
    const stdout = await this.query("containers", [
      "ps",
      "-a",
      "--no-trunc",
      "--size",
      ...filterArgs(filter),
      "--format",
      "{{json .}}"
    ]);
    return this.parse("containers", stdout).map((row) => {
      const handle: ContainerHandle = {
        type: "containers",
        id: field(row, "ID"),
        name: field(row, "Names"),
        sizeBytes: parseOptionalSize(field(row, "Size")),
        age: field(row, "RunningFor") || undefined,
        status: toContainerStatus(field(row, "State"))
      };
      return Object.freeze(handle);
    });
  }

  private async listVolumes(filter?: ResourceFilter): Promise<VolumeHandle[]> {
    const stdout = await this.query("volumes", [
      "volume",
      "ls",
      ...filterArgs(filter),
      "--format",
      "{{json .}}"
    ]);
    const rows = this.parse("volumes", stdout);
    if (rows.length === 0) return [];
    const dangling = new Set(
      parseDockerLines(
        await this.query("volumes", ["volume", "ls", "-q", "--filter", "dangling=true"])
      )
    );
    return rows.map((row) => {
      const name = field(row, "Name");
      const handle: VolumeHandle = {
        type: "volumes",
        id: name,
        name,
        status: dangling.has(name) ? "dangling" : "attached"
      };
      return Object.freeze(handle);
    });
  }

  private async listNetworks(filter?: ResourceFilter): Promise<NetworkHandle[]> {
    const ids = parseDockerLines(
      await this.query("networks", ["network", "ls", "-q", "--no-trunc", ...filterArgs(filter)])
    );
    if (ids.length === 0) return [];
    const stdout = await this.query("networks", [
      "network",
      "inspect",
      "--format",
      "{{json .}}",
      ...ids
    ]);
    return this.parse("networks", stdout).map((row) => {
      const name = field(row, "Name");
      const containers = row.Containers;
      const endpoints = isRecord(containers) ? Object.keys(containers).length : 0;
      const options = row.Options;
      const defaultBridge = isRecord(options) && options[DEFAULT_BRIDGE_OPTION] === "true";
      const handle: NetworkHandle = {
        type: "networks",
        id: field(row, "Id"),
        name,
        status: endpoints === 0 ? "unused" : "in-use",
        endpoints,
        builtIn: defaultBridge || isReservedNetwork(name)
      };
      return Object.freeze(handle);
    });
  }

  private async listImages(filter?: ResourceFilter): Promise<ImageHandle[]> {
    const stdout = await this.query("images", [
      "images",
      "--no-trunc",
      ...filterArgs(filter),
      "--format",
      "{{json .}}"
    ]);
    const rows = this.parse("images", stdout);
    if (rows.length === 0) return [];
    const referenced = await this.referencedImageIds();

    // One row per tag; fold them back into one handle per image id.
    const byId = new Map<string, ImageHandle>();
    for (const row of rows) {
      const id = field(row, "ID");
      const repository = field(row, "Repository");
      const tag = field(row, "Tag");
      // Pulled by digest: a repository but no tag. Still named, so not dangling.
      const tagged = repository !== "<none>" && repository !== "";
      const reference = tagged && tag !== "<none>" && tag !== "" ? `${repository}:${tag}` : undefined;
      const name = reference ?? (tagged ? repository : "");
      const existing = byId.get(id);
      if (existing) {
        const merged: ImageHandle = {
          ...existing,
          name: existing.references[0] ?? reference ?? (existing.name || name),
          tagged: existing.tagged || tagged,
          references: reference ? [...existing.references, reference] : existing.references
        };
        byId.set(id, Object.freeze(merged));
        continue;
      }
      const handle: ImageHandle = {
        type: "images",
        id,
        name,
        sizeBytes: parseOptionalSize(field(row, "Size")),
        age: field(row, "CreatedSince") || undefined,
        status: referenced.has(id) ? "referenced" : "dangling",
        tagged,
        references: reference ? [reference] : []
      };
      byId.set(id, Object.freeze(handle));
    }
    return [...byId.values()];
  }

  private async referencedImageIds(): Promise<Set<string>> {
    const containerIds = parseDockerLines(
      await this.query("images", ["ps", "-a", "-q", "--no-trunc"])
    );
    if (containerIds.length === 0) return new Set();
    const stdout = await this.query("images", [
      "container",
      "inspect",
      "--format",
      "{{.Image}}",
      ...containerIds
    ]);
    return new Set(parseDockerLines(stdout));
  }
}

export function removalArgs(handle: ResourceHandle): string[] {
  switch (handle.type) {
    case "containers":
      return ["container", "rm", handle.id];
    case "volumes":
      return ["volume", "rm", handle.id];
    case "networks":
      return ["network", "rm", handle.id];
    case "images":
      // Deleting by id fails while several tags point at the image; untagging the last one deletes it.
      return handle.references.length > 1 ? ["image", "rm", ...handle.references] : ["image", "rm", handle.id];
  }
}
