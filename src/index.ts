// ─── midi-muse ──────────────────────────────────────────────────────────────
//
// Structural statistics from standard MIDI files, and creative prompts
// built from them.
//
// Usage:
//   import { extractFeatures, InspirationGenerator, createSeededRandom } from "midi-muse";
//   const features = extractFeatures("song.mid");
//   console.log(new InspirationGenerator(features, createSeededRandom(7)).generateIdeas());
// ─────────────────────────────────────────────────────────────────────────────

// Export feature extraction
export {
  extractFeatures,
  extractFeaturesFromBuffer,
  aggregateFeatures,
} from "./midi/features.js";
export { decodeHeader, HEADER_SIZE } from "./midi/header.js";
export type { DecodedHeader } from "./midi/header.js";
export {
  nextChunk,
  readChunks,
  END_OF_INPUT,
  HEADER_TAG,
  TRACK_TAG,
} from "./midi/chunks.js";
export type { EndOfInput } from "./midi/chunks.js";
export { ByteCursor } from "./midi/cursor.js";
export {
  scanTrack,
  classifyStatus,
  statusCommand,
  statusChannel,
  isChannelVoiceStatus,
} from "./midi/scanner.js";
export type {
  Chunk,
  Header,
  TrackStats,
  FeatureRecord,
  EventShape,
} from "./midi/types.js";

// Export errors
export { MidiFeatureError, isMidiFeatureError, ERROR_KINDS } from "./midi/errors.js";
export type { MidiFeatureErrorKind } from "./midi/errors.js";

// Export serialization
export { featuresToJson, featuresToText, formatStatusByte } from "./midi/serialize.js";

// Export inspiration generator
export {
  InspirationGenerator,
  describeStructure,
  suggestedFocus,
  grooveTip,
  CREATIVE_DIRECTIONS,
} from "./ideas.js";
export type { GenerateIdeasOptions, GeneratorFactory } from "./ideas.js";

// Export random sources
export { createSeededRandom, createDefaultRandom, choose } from "./random.js";
export type { RandomSource } from "./random.js";

// Export UI layer
export {
  InspirationApp,
  createTerminalUi,
  launchTerminalUi,
  MIDI_FILE_DIALOG,
} from "./ui.js";
export type { UiCapabilities, FileDialogOptions, InspirationAppOptions } from "./ui.js";

// Export configuration
export {
  UserConfigSchema,
  CliOptionsSchema,
  loadUserConfig,
  resolveOptions,
  defaultConfigPath,
} from "./config.js";
export type { UserConfig, CliOptions, ResolvedOptions } from "./config.js";

// Export CLI runner
export { runCli, parseCliArgs } from "./commands.js";
export type { CliIo, RunCliDeps, ParseResult } from "./commands.js";
