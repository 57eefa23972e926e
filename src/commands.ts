// ─── midi-muse: CLI Commands ────────────────────────────────────────────────
//
// Argument parsing and command dispatch, kept apart from the bin entry
// (cli.ts) so the whole flow runs in tests with a captured output.
// ─────────────────────────────────────────────────────────────────────────────

import { extractFeatures } from "./midi/features.js";
import { isMidiFeatureError } from "./midi/errors.js";
import { InspirationGenerator } from "./ideas.js";
import { createDefaultRandom, createSeededRandom, type RandomSource } from "./random.js";
import {
  CliOptionsSchema,
  loadUserConfig,
  resolveOptions,
  type CliOptions,
  type ResolvedOptions,
  type UserConfig,
} from "./config.js";
import { launchTerminalUi, type InspirationAppOptions } from "./ui.js";

// ─── Exit Codes ──────────────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

// ─── Argument Parsing ────────────────────────────────────────────────────────

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["--show-features", "--show-json", "--ui", "--help", "-h"]);
const VALUE_FLAGS: ReadonlySet<string> = new Set(["--seed"]);

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Parse argv (without node and script path). */
export function parseCliArgs(args: string[]): ParseResult {
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      if (i + 1 >= args.length) return { ok: false, error: `${arg} requires a value` };
      i++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      continue;
    } else if (arg.startsWith("-")) {
      return { ok: false, error: `Unknown option: "${arg}"` };
    } else {
      positionals.push(arg);
    }
  }

  // `midi-muse help` reads as a request for help, not a file called "help".
  const help = hasFlag(args, "--help") || hasFlag(args, "-h") || positionals[0] === "help";
  if (!help && positionals.length > 1) {
    return { ok: false, error: `Expected one MIDI file, got ${positionals.length}` };
  }

  const seedStr = getFlag(args, "--seed");
  const seed = seedStr !== null ? Number(seedStr) : undefined;
  if (seed !== undefined && Number.isNaN(seed)) {
    return { ok: false, error: `Invalid seed: "${seedStr}". Must be a non-negative integer.` };
  }

  const result = CliOptionsSchema.safeParse({
    midiFile: help ? undefined : positionals[0],
    showFeatures: hasFlag(args, "--show-features"),
    showJson: hasFlag(args, "--show-json"),
    seed,
    ui: hasFlag(args, "--ui"),
    help,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, error: `Invalid ${issue.path.join(".") || "arguments"}: ${issue.message}` };
  }
  return { ok: true, options: result.data };
}

// ─── Output ──────────────────────────────────────────────────────────────────

/** Where command output goes. Defaults to the console. */
export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text),
};

export const USAGE = `
midi-muse: musical inspiration from MIDI files

Usage:
  midi-muse <file.mid> [options]   Analyze a file and print ideas
  midi-muse --ui                   Interactive terminal mode
  midi-muse help                   Show this help

Options:
  --show-features            Include a human-readable feature dump
  --show-json                Include the raw feature JSON
  --seed <n>                 Seed the phrasing choice (reproducible output)
  --ui                       Start interactive mode instead of a one-shot run

Defaults for --show-features, --show-json and --seed can be set in
~/.midi-muse/config.json (or the file named by $MIDI_MUSE_CONFIG).
`;

// ─── Commands ────────────────────────────────────────────────────────────────

function makeRandom(seed: number | undefined): RandomSource {
  return seed !== undefined ? createSeededRandom(seed) : createDefaultRandom();
}

/** Analyze one file and print ideas. */
export function cmdAnalyze(options: ResolvedOptions, io: CliIo = consoleIo): number {
  if (!options.midiFile) {
    io.err("error: midi_file is required unless --ui is specified");
    return EXIT_USAGE;
  }

  try {
    const features = extractFeatures(options.midiFile);
    const generator = new InspirationGenerator(features, makeRandom(options.seed));
    io.out(generator.generateIdeas({
      showFeatures: options.showFeatures,
      showJson: options.showJson,
    }));
    return EXIT_OK;
  } catch (err) {
    if (!isMidiFeatureError(err)) throw err;
    io.err(`Error extracting features: ${err.message}`);
    return EXIT_FAILURE;
  }
}

export interface RunCliDeps {
  io?: CliIo;
  loadConfig?: () => UserConfig;
  launchUi?: (options: InspirationAppOptions) => Promise<void>;
}

/** Parse, resolve against the user config, and dispatch. Returns the exit code. */
export async function runCli(args: string[], deps: RunCliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    io.err(`error: ${parsed.error}`);
    io.err("Run 'midi-muse help' for usage.");
    return EXIT_USAGE;
  }
  if (parsed.options.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  let config: UserConfig;
  try {
    config = (deps.loadConfig ?? loadUserConfig)();
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    return EXIT_FAILURE;
  }
  const options = resolveOptions(parsed.options, config);

  if (options.ui) {
    await (deps.launchUi ?? launchTerminalUi)({
      rng: makeRandom(options.seed),
      showFeatures: options.showFeatures,
      showJson: options.showJson,
    });
    return EXIT_OK;
  }

  return cmdAnalyze(options, io);
}
