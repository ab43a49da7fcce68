import type { RemovalError } from "./errors";

export type ResourceType = "containers" | "volumes" | "networks" | "images";

export type CleanupCategory = ResourceType | "aggressive";

export type ExitCode = 0 | 1;

export type ContainerStatus = "running" | "exited" | "created";
export type VolumeStatus = "attached" | "dangling";
export type NetworkStatus = "in-use" | "unused";
export type ImageStatus = "referenced" | "dangling";

interface HandleBase {
  readonly id: string;
  readonly name: string;
  readonly sizeBytes?: number;
  readonly age?: string;
}

export interface ContainerHandle extends HandleBase {
  readonly type: "containers";
  readonly status: ContainerStatus;
}

export interface VolumeHandle extends HandleBase {
  readonly type: "volumes";
  readonly status: VolumeStatus;
}

export interface NetworkHandle extends HandleBase {
  readonly type: "networks";
  readonly status: NetworkStatus;
  readonly endpoints: number;
  readonly builtIn: boolean;
}

export interface ImageHandle extends HandleBase {
  readonly type: "images";
  readonly status: ImageStatus;
  /** Has a repository name. Images with none are the runtime's own dangling images. */
  readonly tagged: boolean;
  /** `repository:tag` names pointing at this image. */
  readonly references: readonly string[];
}

export type ResourceHandle = ContainerHandle | VolumeHandle | NetworkHandle | ImageHandle;

export type ResourceFilter = Readonly<Record<string, string | readonly string[]>>;

export interface CleanupCandidateSet {
  type: ResourceType;
  label: string;
  items: readonly ResourceHandle[];
}

export interface RemovalFailure {
  handle: ResourceHandle;
  error: RemovalError;
}

export interface CleanupResult {
  type: ResourceType;
  removed: number;
  failures: RemovalFailure[];
  reclaimedBytes: number;
}

export type RemovalOutcome =
  | { ok: true; reclaimedBytes: number }
  | { ok: false; error: RemovalError };

export type UsageCategory = "images" | "containers" | "volumes" | "buildCache";

export interface UsageEntry {
  totalCount?: number;
  active?: number;
  sizeBytes?: number;
  reclaimableBytes?: number;
}

export interface UsageSnapshot {
  takenAt: Date;
  entries: Record<UsageCategory, UsageEntry>;
}

export interface UsageDelta {
  freedBytes: Record<UsageCategory, number | undefined>;
  totalFreedBytes: number;
}

export interface RuntimeClient {
  list(type: ResourceType, filter?: ResourceFilter): Promise<ResourceHandle[]>;
  remove(handle: ResourceHandle): Promise<RemovalOutcome>;
  usage(): Promise<UsageSnapshot>;
  pruneBuildCache(): Promise<number>;
}

export const RESOURCE_TYPES: readonly ResourceType[] = ["containers", "volumes", "networks", "images"];

export const USAGE_CATEGORIES: readonly UsageCategory[] = ["images", "containers", "volumes", "buildCache"];
