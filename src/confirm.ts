import type { CleanupCandidateSet, CleanupCategory } from "./types";
import {
  type DisplayContext,
  type Prompter,
  type Writer,
  renderCandidateTable,
  statusDelete,
  statusInfo,
  statusWarn
} from "./ui";

/** Typed in full to approve aggressive cleanup; a plain y/yes is not enough. */
export const AGGRESSIVE_TOKEN = "YES";

export interface ConfirmationRequest {
  category: CleanupCategory;
  sets: readonly CleanupCandidateSet[];
}

export interface ConfirmationGate {
  confirm(request: ConfirmationRequest): Promise<boolean>;
}

export function describeRequest(request: ConfirmationRequest): string {
  const parts = request.sets
    .filter((set) => set.items.length > 0)
    .map((set) => `${set.items.length} ${set.label.toLowerCase()}`);
  if (request.category === "aggressive") {
    parts.push("all build cache");
  }
  return parts.length > 0 ? `${parts.join(", ")} will be removed` : "Nothing to remove";
}

function renderCandidates(ctx: DisplayContext, out: Writer, request: ConfirmationRequest): void {
  request.sets.forEach((set) => {
    if (set.items.length === 0) return;
    out.log(statusInfo(ctx, `${set.label} (${set.items.length}):`));
    out.log(renderCandidateTable(ctx, set));
  });
}

async function confirmAggressive(
  prompter: Prompter,
  ctx: DisplayContext,
  out: Writer,
  request: ConfirmationRequest
): Promise<boolean> {
  out.log(statusDelete(ctx, "AGGRESSIVE cleanup will remove:"));
  out.log("  - All stopped containers");
  out.log("  - All unused images, tagged or not");
  out.log("  - All dangling volumes");
  out.log("  - All unused networks");
  out.log("  - All build cache");
  out.log(statusWarn(ctx, describeRequest(request)));
  const answer = await prompter.text(`Are you ABSOLUTELY SURE? Type '${AGGRESSIVE_TOKEN}' to confirm`);
  return answer.trim() === AGGRESSIVE_TOKEN;
}

export class InteractiveGate implements ConfirmationGate {
  constructor(
    private readonly prompter: Prompter,
    private readonly ctx: DisplayContext,
    private readonly out: Writer
  ) {}

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    renderCandidates(this.ctx, this.out, request);
    if (request.category === "aggressive") {
      return confirmAggressive(this.prompter, this.ctx, this.out, request);
    }
    return this.prompter.confirm(`${describeRequest(request)}. Proceed?`);
  }
}

/**
 * Approves exactly the categories named on the command line without asking.
 * Aggressive cleanup still needs the typed token, so it only goes ahead at a
 * terminal.
 */
export class BatchGate implements ConfirmationGate {
  constructor(
    private readonly requested: ReadonlySet<CleanupCategory>,
    private readonly ctx: DisplayContext,
    private readonly out: Writer,
    private readonly prompter?: Prompter
  ) {}

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    if (!this.requested.has(request.category)) return false;
    renderCandidates(this.ctx, this.out, request);
    if (request.category !== "aggressive") return true;

    if (!this.prompter || !this.ctx.interactive) {
      this.out.error(
        statusWarn(this.ctx, `Aggressive cleanup needs '${AGGRESSIVE_TOKEN}' typed at a terminal. Nothing removed.`)
      );
      return false;
    }
    return confirmAggressive(this.prompter, this.ctx, this.out, request);
  }
}
