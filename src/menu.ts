import { FULL_RESOURCES, STANDARD_RESOURCES } from "./args";
import { type CleanupPhase, CleanupSession } from "./clean";
import type { ConfirmationGate } from "./confirm";
import type { ResourceType, RuntimeClient, UsageSnapshot } from "./types";
import {
  type DisplayContext,
  type MenuOption,
  type Prompter,
  type Writer,
  heading,
  renderUsageDelta,
  renderUsageTable,
  statusInfo
} from "./ui";
import type { UsageReporter } from "./usage";

export type MenuChoice = ResourceType | "standard" | "full" | "aggressive" | "usage" | "help" | "exit";

export type MenuState = "menu" | "selected" | CleanupPhase | "result" | "exited";

export const MENU_OPTIONS: MenuOption<MenuChoice>[] = [
  { value: "containers", label: "Clean stopped containers only" },
  { value: "volumes", label: "Clean dangling volumes only" },
  { value: "networks", label: "Clean unused networks only" },
  { value: "images", label: "Clean dangling images only" },
  { value: "standard", label: "Standard cleanup", hint: "containers + volumes + networks" },
  { value: "full", label: "Full cleanup", hint: "standard + dangling images" },
  { value: "aggressive", label: "AGGRESSIVE cleanup", hint: "everything unused, asks for 'YES'" },
  { value: "usage", label: "Show disk usage only" },
  { value: "help", label: "Help" },
  { value: "exit", label: "Exit" }
];

export const PAUSE_MESSAGE = "Press Enter to return to menu...";

export interface MenuDeps {
  client: RuntimeClient;
  gate: ConfirmationGate;
  reporter: UsageReporter;
  prompter: Prompter;
  ctx: DisplayContext;
  out: Writer;
  helpText: () => string;
}

/**
 * Interactive loop: menu -> selected -> confirming -> executing -> result ->
 * menu, until the operator picks Exit. Usage is shown again after every action.
 */
export class MenuController {
  private current: MenuState = "menu";
  private readonly visited: MenuState[] = [];
  private readonly session: CleanupSession;

  constructor(private readonly deps: MenuDeps) {
    this.session = new CleanupSession({
      client: deps.client,
      gate: deps.gate,
      ctx: deps.ctx,
      out: deps.out,
      onPhase: (phase) => this.enter(phase)
    });
  }

  get state(): MenuState {
    return this.current;
  }

  /** Every state entered so far, in order. */
  get history(): readonly MenuState[] {
    return this.visited;
  }

  async run(initial: UsageSnapshot): Promise<void> {
    const { ctx, out, prompter, reporter } = this.deps;
    let snapshot = initial;

    for (;;) {
      this.enter("menu");
      // A cancelled prompt (Ctrl-C) is taken as choosing Exit.
      const choice = (await prompter.select("Docker cleanup options", MENU_OPTIONS)) ?? "exit";
      if (choice === "exit") {
        this.enter("exited");
        out.log(statusInfo(ctx, "Goodbye!"));
        return;
      }

      this.enter("selected");
      const mutated = await this.perform(choice);
      this.enter("result");

      const after = await reporter.report();
      out.log(heading(ctx, "Current Docker disk usage"));
      out.log(renderUsageTable(ctx, after));
      if (mutated) {
        out.log(renderUsageDelta(ctx, reporter.diff(snapshot, after)));
      }
      snapshot = after;
      await prompter.pause(PAUSE_MESSAGE);
    }
  }

  /** Returns whether the action could have removed anything. */
  private async perform(choice: Exclude<MenuChoice, "exit">): Promise<boolean> {
    const { session } = this;
    switch (choice) {
      case "containers":
      case "volumes":
      case "networks":
      case "images":
        await session.cleanResource(choice);
        return true;
      case "standard":
        await session.cleanMany(STANDARD_RESOURCES);
        return true;
      case "full":
        await session.cleanMany(FULL_RESOURCES);
        return true;
      case "aggressive":
        await session.cleanAggressive();
        return true;
      case "usage":
        return false;
      case "help":
        this.deps.out.log(this.deps.helpText());
        return false;
    }
  }

  private enter(state: MenuState): void {
    this.current = state;
    this.visited.push(state);
  }
}
