import { Command, Option } from "commander";
import ms from "ms";
import { DEFAULT_TIMEOUT_MS } from "./docker";
import { FRONT_END_NAMES, type FrontEndName, isFrontEndName } from "./dispatch";
import type { ResourceType } from "./types";
import type { Writer } from "./ui";

export const VERSION = "1.0.0";

export interface CliOptions {
  containers: boolean;
  volumes: boolean;
  networks: boolean;
  images: boolean;
  standard: boolean;
  full: boolean;
  aggressive: boolean;
  usage: boolean;
  noColor: boolean;
  frontEnd?: FrontEndName;
  timeout?: string;
}

export type CliMode =
  | { kind: "interactive" }
  | { kind: "batch"; resources: ResourceType[] }
  | { kind: "aggressive" }
  | { kind: "usage" };

export interface ParsedArgs {
  options: CliOptions;
  mode: CliMode;
  timeoutMs: number;
}

interface RawOptions {
  containers?: boolean;
  volumes?: boolean;
  networks?: boolean;
  images?: boolean;
  standard?: boolean;
  full?: boolean;
  aggressive?: boolean;
  usage?: boolean;
  color?: boolean;
  frontEnd?: string;
  timeout?: string;
}

const resourceFlags = ["containers", "volumes", "networks", "images"] as const;

export const STANDARD_RESOURCES: readonly ResourceType[] = ["containers", "volumes", "networks"];
export const FULL_RESOURCES: readonly ResourceType[] = ["containers", "volumes", "networks", "images"];

const CATEGORY_FLAGS = ["containers", "volumes", "networks", "images", "standard", "full"];

export function buildProgram(out?: Writer): Command {
  const program = new Command();

  program
    .name("container-sweep")
    .description("Find and safely remove stale Docker containers, volumes, networks and images")
    .option("-c, --containers", "Clean stopped containers only")
    .option("-v, --volumes", "Clean dangling volumes only")
    .option("-n, --networks", "Clean unused networks only")
    .option("-I, --images", "Clean dangling images only")
    .option("-s, --standard", "Standard cleanup (containers + volumes + networks)")
    .option("-f, --full", "Full cleanup (standard + images)")
    .addOption(
      new Option(
        "-a, --aggressive",
        `Remove everything unused, including tagged images and build cache (asks for 'YES')`
      ).conflicts([...CATEGORY_FLAGS, "usage"])
    )
    .addOption(new Option("-u, --usage", "Show disk usage only").conflicts(CATEGORY_FLAGS))
    .addOption(
      new Option("--front-end <name>", "Skip host detection and use this front end").choices(FRONT_END_NAMES)
    )
    .option("--timeout <duration>", "Timeout for each Docker call, e.g. 30s or 2m")
    .option("--no-color", "Disable colored output")
    .version(VERSION)
    .exitOverride();

  if (out) {
    program.configureOutput({
      writeOut: (text) => out.log(text.trimEnd()),
      writeErr: (text) => out.error(text.trimEnd())
    });
  }

  return program;
}

export function parseTimeout(value?: string): number {
  if (value === undefined) return DEFAULT_TIMEOUT_MS;
  const parsed = ms(value);
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new Error("Invalid --timeout value. Use a duration like 30s or 2m.");
  }
  return parsed;
}

function resolveMode(options: CliOptions): CliMode {
  if (options.aggressive) return { kind: "aggressive" };
  if (options.usage) return { kind: "usage" };

  let selected: ResourceType[] = resourceFlags.filter((flag) => options[flag]);
  if (options.full) {
    selected = [...FULL_RESOURCES];
  } else if (options.standard) {
    selected = [...new Set([...STANDARD_RESOURCES, ...selected])];
  }
  if (selected.length === 0) return { kind: "interactive" };

  // Fixed order regardless of flag order.
  return { kind: "batch", resources: FULL_RESOURCES.filter((type) => selected.includes(type)) };
}

/** Throws CommanderError for --help, --version and malformed flags. */
export function parseArgs(argv: string[], out?: Writer): ParsedArgs {
  const program = buildProgram(out);
  program.parse(argv);
  const raw = program.opts<RawOptions>();

  const frontEnd = raw.frontEnd !== undefined && isFrontEndName(raw.frontEnd) ? raw.frontEnd : undefined;

  const options: CliOptions = {
    containers: Boolean(raw.containers),
    volumes: Boolean(raw.volumes),
    networks: Boolean(raw.networks),
    images: Boolean(raw.images),
    standard: Boolean(raw.standard),
    full: Boolean(raw.full),
    aggressive: Boolean(raw.aggressive),
    usage: Boolean(raw.usage),
    noColor: raw.color === false,
    frontEnd,
    timeout: raw.timeout
  };

  return {
    options,
    mode: resolveMode(options),
    timeoutMs: parseTimeout(options.timeout)
  };
}
