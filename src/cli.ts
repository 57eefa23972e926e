#!/usr/bin/env node
// ─── midi-muse: CLI Entry Point ─────────────────────────────────────────────
//
// Usage:
//   midi-muse                              # Show help
//   midi-muse song.mid                     # Print ideas for a file
//   midi-muse song.mid --show-features     # ... plus a feature dump
//   midi-muse song.mid --show-json         # ... plus the feature JSON
//   midi-muse song.mid --seed 7            # Reproducible phrasing
//   midi-muse --ui                         # Interactive terminal mode
// ─────────────────────────────────────────────────────────────────────────────

import { runCli } from "./commands.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const code = await runCli(args.length > 0 ? args : ["help"]);
  process.exit(code);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
