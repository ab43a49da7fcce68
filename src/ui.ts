import { confirm, isCancel, select, text } from "@clack/prompts";
import { Chalk, type ChalkInstance } from "chalk";
import Table from "cli-table3";
import { formatBytes } from "./docker";
import type {
  CleanupCandidateSet,
  CleanupResult,
  UsageCategory,
  UsageDelta,
  UsageSnapshot
} from "./types";
import { USAGE_CATEGORIES } from "./types";

export interface DisplayContext {
  color: ChalkInstance;
  unicode: boolean;
  /** stdin and stdout are both terminals, so prompts and spinners work. */
  interactive: boolean;
}

export interface TerminalInfo {
  noColor?: boolean;
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
  stdinIsTTY: boolean;
  stdoutIsTTY: boolean;
}

export function supportsUnicode(platform: NodeJS.Platform, env: Record<string, string | undefined>): boolean {
  if (platform !== "win32") return env.TERM !== "linux";
  return Boolean(env.WT_SESSION || env.TERM_PROGRAM === "vscode" || env.ConEmuTask || env.CI);
}

export function createDisplayContext(terminal: TerminalInfo): DisplayContext {
  const colorEnabled = !terminal.noColor && terminal.env.NO_COLOR === undefined && terminal.stdoutIsTTY;
  return {
    color: new Chalk({ level: colorEnabled ? 3 : 0 }),
    unicode: supportsUnicode(terminal.platform, terminal.env),
    interactive: terminal.stdinIsTTY && terminal.stdoutIsTTY
  };
}

export function plainDisplayContext(): DisplayContext {
  return { color: new Chalk({ level: 0 }), unicode: false, interactive: false };
}

export interface Writer {
  log(line: string): void;
  error(line: string): void;
}

export const consoleWriter: Writer = {
  log: (line) => console.log(line),
  error: (line) => console.error(line)
};

function glyph(ctx: DisplayContext, fancy: string, plain: string): string {
  return ctx.unicode ? fancy : plain;
}

export function statusInfo(ctx: DisplayContext, message: string): string {
  return ctx.color.blue(`${glyph(ctx, "🔵", "[i]")} ${message}`);
}

export function statusWarn(ctx: DisplayContext, message: string): string {
  return ctx.color.yellow(`${glyph(ctx, "🟡", "[!]")} ${message}`);
}

export function statusDelete(ctx: DisplayContext, message: string): string {
  return ctx.color.red(`${glyph(ctx, "🔴", "[x]")} ${message}`);
}

export function statusSafe(ctx: DisplayContext, message: string): string {
  return ctx.color.green(`${glyph(ctx, "🟢", "[ok]")} ${message}`);
}

export function heading(ctx: DisplayContext, message: string): string {
  return ctx.color.bold.blue(`\n${message}`);
}

function headStyle(ctx: DisplayContext): string[] {
  return ctx.color.level > 0 ? ["cyan"] : [];
}

function sizeCell(bytes?: number): string {
  return bytes === undefined ? "-" : formatBytes(bytes);
}

export function shortId(id: string): string {
  const bare = id.replace(/^sha256:/, "");
  if (!bare) return "-";
  return /^[0-9a-f]{64}$/.test(bare) ? bare.slice(0, 12) : bare;
}

export function renderCandidateTable(ctx: DisplayContext, set: CleanupCandidateSet): string {
  const table = new Table({
    head: ["ID", "Name", "Size", "Age"],
    style: { head: headStyle(ctx), border: [] },
    colWidths: [16, 32, 12, 20],
    wordWrap: true
  });

  set.items.forEach((item) => {
    table.push([shortId(item.id), item.name || "-", sizeCell(item.sizeBytes), item.age || "-"]);
  });

  return table.toString();
}

const USAGE_LABELS: Record<UsageCategory, string> = {
  images: "Images",
  containers: "Containers",
  volumes: "Local Volumes",
  buildCache: "Build Cache"
};

function countCell(value?: number): string {
  return value === undefined ? "-" : String(value);
}

export function renderUsageTable(ctx: DisplayContext, snapshot: UsageSnapshot): string {
  const table = new Table({
    head: ["Type", "Total", "Active", "Size", "Reclaimable"],
    style: { head: headStyle(ctx), border: [] }
  });

  USAGE_CATEGORIES.forEach((category) => {
    const entry = snapshot.entries[category];
    table.push([
      USAGE_LABELS[category],
      countCell(entry.totalCount),
      countCell(entry.active),
      sizeCell(entry.sizeBytes),
      sizeCell(entry.reclaimableBytes)
    ]);
  });

  return table.toString();
}

export function renderUsageDelta(ctx: DisplayContext, delta: UsageDelta): string {
  const parts = USAGE_CATEGORIES.flatMap((category) => {
    const freed = delta.freedBytes[category];
    return freed && freed > 0 ? [`${USAGE_LABELS[category]} ${formatBytes(freed)}`] : [];
  });
  if (parts.length === 0) {
    return statusInfo(ctx, "Disk usage unchanged");
  }
  return statusSafe(ctx, `Freed ${formatBytes(delta.totalFreedBytes)} (${parts.join(", ")})`);
}

export function renderResultSummary(ctx: DisplayContext, results: readonly CleanupResult[]): string {
  const table = new Table({
    head: ["Type", "Removed", "Failed", "Reclaimed"],
    style: { head: headStyle(ctx), border: [] }
  });

  results.forEach((result) => {
    table.push([
      result.type,
      result.removed,
      result.failures.length,
      result.reclaimedBytes ? formatBytes(result.reclaimedBytes) : "-"
    ]);
  });

  return table.toString();
}

export interface MenuOption<T extends string> {
  value: T;
  label: string;
  hint?: string;
}

export interface Prompter {
  /** Resolves false on cancel. */
  confirm(message: string): Promise<boolean>;
  /** Resolves "" on cancel. */
  text(message: string): Promise<string>;
  /** Resolves undefined on cancel. */
  select<T extends string>(message: string, options: MenuOption<T>[]): Promise<T | undefined>;
  /** Waits for Enter; a cancel also continues. */
  pause(message: string): Promise<void>;
}

export const clackPrompter: Prompter = {
  async confirm(message) {
    const response = await confirm({ message, initialValue: false });
    if (isCancel(response)) return false;
    return response;
  },

  async text(message) {
    const response = await text({ message, placeholder: "" });
    if (isCancel(response)) return "";
    return response;
  },

  async select<T extends string>(message: string, options: MenuOption<T>[]) {
    const choices: { value: string; label: string; hint?: string }[] = options.map((option) => ({
      value: option.value,
      label: option.label,
      hint: option.hint
    }));
    const response = await select({ message, options: choices });
    if (isCancel(response)) return undefined;
    return options.find((option) => option.value === response)?.value;
  },

  async pause(message) {
    await text({ message, placeholder: "" });
  }
};
