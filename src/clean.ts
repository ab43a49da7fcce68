import ora from "ora";
import { classify } from "./classify";
import type { ConfirmationGate } from "./confirm";
import { formatBytes } from "./docker";
import { RemovalError, RuntimeQueryError } from "./errors";
import type {
  CleanupCandidateSet,
  CleanupResult,
  ResourceFilter,
  ResourceHandle,
  ResourceType,
  RuntimeClient
} from "./types";
import { RESOURCE_TYPES } from "./types";
import {
  type DisplayContext,
  type Writer,
  heading,
  renderResultSummary,
  shortId,
  statusDelete,
  statusInfo,
  statusSafe,
  statusWarn
} from "./ui";

export interface CleanupListener {
  onRemoved?(handle: ResourceHandle, reclaimedBytes: number): void;
  onFailed?(handle: ResourceHandle, error: RemovalError): void;
}

export class CleanupExecutor {
  constructor(
    private readonly client: RuntimeClient,
    private readonly listener: CleanupListener = {}
  ) {}

  /**
   * Removes every handle in the set one at a time. A failed removal is
   * recorded and the rest of the set is still attempted. The set is used as
   * given; nothing is listed again.
   */
  async execute(set: CleanupCandidateSet): Promise<CleanupResult> {
    const result: CleanupResult = {
      type: set.type,
      removed: 0,
      failures: [],
      reclaimedBytes: 0
    };

    for (const handle of set.items) {
      const outcome = await this.client.remove(handle);
      if (outcome.ok) {
        result.removed += 1;
        result.reclaimedBytes += outcome.reclaimedBytes;
        this.listener.onRemoved?.(handle, outcome.reclaimedBytes);
      } else {
        result.failures.push({ handle, error: outcome.error });
        this.listener.onFailed?.(handle, outcome.error);
      }
    }

    return result;
  }
}

export type CleanupPhase = "confirming" | "executing";

export interface CleanupSessionDeps {
  client: RuntimeClient;
  gate: ConfirmationGate;
  ctx: DisplayContext;
  out: Writer;
  onPhase?: (phase: CleanupPhase) => void;
}

/** Containers are narrowed at the source; the classifier still decides. */
export const LIST_FILTERS: Partial<Record<ResourceType, ResourceFilter>> = {
  containers: { status: ["exited", "created", "dead"] }
};

const EMPTY_MESSAGES: Record<ResourceType, string> = {
  containers: "No stopped containers found",
  volumes: "No dangling volumes found",
  networks: "No unused networks found",
  images: "No dangling images found"
};

function displayName(handle: ResourceHandle): string {
  return handle.name || shortId(handle.id);
}

/**
 * Runs whole categories: list, classify, confirm, remove, report. Every call
 * lists afresh, so a candidate set never outlives the category it was built for.
 */
export class CleanupSession {
  constructor(private readonly deps: CleanupSessionDeps) {}

  async cleanResource(type: ResourceType): Promise<CleanupResult | undefined> {
    const { ctx, out } = this.deps;
    const set = classify(type, await this.listOrWarn(type));
    out.log(heading(ctx, `Cleaning ${set.label.toLowerCase()}`));

    if (set.items.length === 0) {
      out.log(statusSafe(ctx, EMPTY_MESSAGES[type]));
      return undefined;
    }

    this.deps.onPhase?.("confirming");
    const approved = await this.deps.gate.confirm({ category: type, sets: [set] });
    if (!approved) {
      out.log(statusInfo(ctx, `Skipped ${set.label.toLowerCase()}`));
      return undefined;
    }

    const result = await this.execute(set);
    this.reportResult(set, result);
    return result;
  }

  async cleanMany(types: readonly ResourceType[]): Promise<CleanupResult[]> {
    const results: CleanupResult[] = [];
    for (const type of types) {
      const result = await this.cleanResource(type);
      if (result) results.push(result);
    }
    if (results.length > 1) {
      this.deps.out.log(renderResultSummary(this.deps.ctx, results));
    }
    return results;
  }

  async cleanAggressive(): Promise<CleanupResult[]> {
    const { ctx, out } = this.deps;
    out.log(heading(ctx, "Aggressive cleanup"));

    const sets: CleanupCandidateSet[] = [];
    for (const type of RESOURCE_TYPES) {
      sets.push(classify(type, await this.listOrWarn(type), { aggressive: true }));
    }

    this.deps.onPhase?.("confirming");
    const approved = await this.deps.gate.confirm({ category: "aggressive", sets });
    if (!approved) {
      out.log(statusInfo(ctx, "Cancelled aggressive cleanup"));
      return [];
    }

    const results: CleanupResult[] = [];
    let removedContainers = 0;
    for (const listed of sets) {
      // Images used only by containers removed above are unused now.
      const set =
        listed.type === "images" && removedContainers > 0
          ? classify("images", await this.listOrWarn("images"), { aggressive: true })
          : listed;
      if (set.items.length === 0) {
        out.log(statusSafe(ctx, EMPTY_MESSAGES[set.type]));
        continue;
      }
      const result = await this.execute(set);
      this.reportResult(set, result);
      results.push(result);
      if (set.type === "containers") removedContainers = result.removed;
    }

    try {
      const reclaimed = await this.deps.client.pruneBuildCache();
      out.log(statusSafe(ctx, `Pruned build cache (${formatBytes(reclaimed)} reclaimed)`));
    } catch (error) {
      if (!(error instanceof RemovalError)) throw error;
      out.error(statusWarn(ctx, `Failed to prune build cache: ${error.message}`));
    }

    if (results.length > 0) {
      out.log(renderResultSummary(ctx, results));
    }
    return results;
  }

  private async listOrWarn(type: ResourceType): Promise<ResourceHandle[]> {
    try {
      return await this.deps.client.list(type, LIST_FILTERS[type]);
    } catch (error) {
      if (!(error instanceof RuntimeQueryError)) throw error;
      this.deps.out.error(statusWarn(this.deps.ctx, `Could not list ${type}: ${error.message}`));
      return [];
    }
  }

  private async execute(set: CleanupCandidateSet): Promise<CleanupResult> {
    const { ctx, out } = this.deps;
    this.deps.onPhase?.("executing");
    const spinner = ctx.interactive ? ora(`Removing ${set.label.toLowerCase()}...`).start() : null;
    const failed: string[] = [];
    const executor = new CleanupExecutor(this.deps.client, {
      onRemoved: (handle) => {
        if (spinner) spinner.text = `Removed ${displayName(handle)}`;
      },
      onFailed: (handle, error) => {
        failed.push(`Failed to remove ${displayName(handle)}: ${error.message}`);
      }
    });
    const result = await executor.execute(set);
    spinner?.stop();
    failed.forEach((line) => out.error(statusWarn(ctx, line)));
    return result;
  }

  private reportResult(set: CleanupCandidateSet, result: CleanupResult): void {
    const { ctx, out } = this.deps;
    const label = set.label.toLowerCase();
    const reclaimed = result.reclaimedBytes > 0 ? ` (${formatBytes(result.reclaimedBytes)} reclaimed)` : "";
    if (result.removed > 0) {
      out.log(statusSafe(ctx, `Removed ${result.removed} ${label}${reclaimed}`));
    }
    if (result.failures.length > 0) {
      out.error(statusDelete(ctx, `${result.failures.length} of ${set.items.length} ${label} could not be removed`));
    }
  }
}
