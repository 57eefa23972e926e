// ─── midi-muse: Configuration ───────────────────────────────────────────────
//
// Two zod schemas:
//   - CliOptionsSchema: what the argument parser produced
//   - UserConfigSchema: ~/.midi-muse/config.json, defaults for the CLI
//
// Command-line flags win over the config file.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const SeedSchema = z.number().int().min(0).max(0xffffffff);

export const UserConfigSchema = z
  .object({
    showFeatures: z.boolean().optional(),
    showJson: z.boolean().optional(),
    seed: SeedSchema.optional(),
  })
  .strict();

export const CliOptionsSchema = z.object({
  midiFile: z.string().min(1).optional(),
  showFeatures: z.boolean(),
  showJson: z.boolean(),
  seed: SeedSchema.optional(),
  ui: z.boolean(),
  help: z.boolean(),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type UserConfig = z.infer<typeof UserConfigSchema>;
export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** CLI options after the user config has filled in the gaps. */
export interface ResolvedOptions {
  midiFile?: string;
  showFeatures: boolean;
  showJson: boolean;
  seed?: number;
  ui: boolean;
}

// ─── Loading ─────────────────────────────────────────────────────────────────

export const CONFIG_ENV_VAR = "MIDI_MUSE_CONFIG";

/** $MIDI_MUSE_CONFIG, or ~/.midi-muse/config.json. */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_ENV_VAR] ?? join(homedir(), ".midi-muse", "config.json");
}

/**
 * Load and validate the user config. A missing file yields `{}`;
 * unreadable JSON or a schema mismatch throws.
 */
export function loadUserConfig(path: string = defaultConfigPath()): UserConfig {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new Error(`Invalid config ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = UserConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${path}:\n${issues}`);
  }
  return result.data;
}

/** Merge parsed flags over config-file defaults. */
export function resolveOptions(cli: CliOptions, config: UserConfig): ResolvedOptions {
  return {
    midiFile: cli.midiFile,
    showFeatures: cli.showFeatures || (config.showFeatures ?? false),
    showJson: cli.showJson || (config.showJson ?? false),
    seed: cli.seed ?? config.seed,
    ui: cli.ui,
  };
}
