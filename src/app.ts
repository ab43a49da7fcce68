import { CommanderError } from "commander";
import { type ParsedArgs, buildProgram, parseArgs } from "./args";
import { CleanupSession } from "./clean";
import { BatchGate, InteractiveGate } from "./confirm";
import { type DispatchOptions, type FrontEnd, type HostEnvironment, dispatch } from "./dispatch";
import { RuntimeUnavailableError, UnsupportedEnvironmentError, errorMessage } from "./errors";
import { MenuController } from "./menu";
import type { CleanupCategory, ExitCode } from "./types";
import {
  type DisplayContext,
  type Prompter,
  type Writer,
  clackPrompter,
  consoleWriter,
  createDisplayContext,
  heading,
  plainDisplayContext,
  renderUsageDelta,
  renderUsageTable,
  statusDelete,
  statusInfo,
  statusSafe,
  statusWarn
} from "./ui";
import { UsageReporter } from "./usage";

export interface AppOptions {
  argv: string[];
  host: HostEnvironment;
  stdinIsTTY: boolean;
  stdoutIsTTY: boolean;
  out?: Writer;
  prompter?: Prompter;
  /** Swapped in tests to hand back a front end over a fake runtime. */
  dispatch?: (host: HostEnvironment, options: DispatchOptions) => FrontEnd;
}

export async function run(options: AppOptions): Promise<ExitCode> {
  const out = options.out ?? consoleWriter;

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(options.argv, out);
  } catch (error) {
    // Commander has already printed help, version or its own error.
    if (error instanceof CommanderError) return error.exitCode === 0 ? 0 : 1;
    out.error(statusWarn(plainDisplayContext(), errorMessage(error)));
    return 1;
  }

  const ctx = createDisplayContext({
    noColor: parsed.options.noColor,
    platform: options.host.platform,
    env: options.host.env,
    stdinIsTTY: options.stdinIsTTY,
    stdoutIsTTY: options.stdoutIsTTY
  });

  try {
    const frontEnd = (options.dispatch ?? dispatch)(options.host, {
      frontEnd: parsed.options.frontEnd,
      timeoutMs: parsed.timeoutMs
    });
    return await runFrontEnd(frontEnd, parsed, ctx, out, options.prompter ?? clackPrompter);
  } catch (error) {
    if (error instanceof RuntimeUnavailableError || error instanceof UnsupportedEnvironmentError) {
      out.error(statusDelete(ctx, error.message));
      out.error(statusInfo(ctx, error.hint));
      return 1;
    }
    throw error;
  }
}

async function runFrontEnd(
  frontEnd: FrontEnd,
  parsed: ParsedArgs,
  ctx: DisplayContext,
  out: Writer,
  prompter: Prompter
): Promise<ExitCode> {
  const { client } = frontEnd;
  const { mode } = parsed;
  const reporter = new UsageReporter(client);

  const before = await reporter.report();
  out.log(heading(ctx, "Current Docker disk usage"));
  out.log(renderUsageTable(ctx, before));

  if (mode.kind === "usage") return 0;

  if (mode.kind === "interactive") {
    if (!ctx.interactive) {
      out.error(
        statusWarn(ctx, "No interactive terminal detected. Pass a flag such as --standard, or --help for options.")
      );
      return 1;
    }
    const menu = new MenuController({
      client,
      gate: new InteractiveGate(prompter, ctx, out),
      reporter,
      prompter,
      ctx,
      out,
      helpText: () => buildProgram().helpInformation()
    });
    await menu.run(before);
    return 0;
  }

  const requested: CleanupCategory[] = mode.kind === "aggressive" ? ["aggressive"] : [...mode.resources];
  const session = new CleanupSession({
    client,
    gate: new BatchGate(new Set(requested), ctx, out, prompter),
    ctx,
    out
  });

  if (mode.kind === "aggressive") {
    await session.cleanAggressive();
  } else {
    await session.cleanMany(mode.resources);
  }

  const after = await reporter.report();
  out.log(heading(ctx, "Final Docker disk usage"));
  out.log(renderUsageTable(ctx, after));
  out.log(renderUsageDelta(ctx, reporter.diff(before, after)));
  out.log(statusSafe(ctx, "Cleanup completed!"));
  return 0;
}
