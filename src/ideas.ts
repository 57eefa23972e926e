// ─── midi-muse: Inspiration Generator ───────────────────────────────────────
//
// Turns a FeatureRecord into a short block of creative suggestions.
// The only nondeterminism is the creative-direction pick, which goes
// through the RandomSource the caller hands in.
// ─────────────────────────────────────────────────────────────────────────────

import type { FeatureRecord } from "./midi/types.js";
import { featuresToJson, featuresToText } from "./midi/serialize.js";
import { isChannelVoiceStatus, statusChannel } from "./midi/scanner.js";
import { choose, createDefaultRandom, type RandomSource } from "./random.js";

// ─── Phrasing ────────────────────────────────────────────────────────────────

export const CREATIVE_DIRECTIONS = [
  "Transform the harmonic rhythm by extending progressions over multiple bars.",
  "Use call-and-response motifs between melodic voices for dialogue.",
  "Swap a track's instrumentation with an unexpected timbre to spark a new vibe.",
] as const;

const SPARSE_DENSITY = 4;
const BUSY_DENSITY = 16;

/** 0-based channel 9 is General MIDI percussion ("channel 10"). */
const PERCUSSION_CHANNEL = 9;

// ─── Feature Descriptions ────────────────────────────────────────────────────

/** One-line structural summary. */
export function describeStructure(features: FeatureRecord): string {
  const tracks = features.tracks_observed;
  const segments = [
    `Format ${features.format_type} with ${tracks} track${tracks !== 1 ? "s" : ""}`,
    `Timing division: ${features.division}`,
    `Average note density: ${features.density.toFixed(2)}`,
  ];
  if (!features.track_consistency) {
    segments.push("Declared track count does not match observed data");
  }
  return segments.join("; ");
}

/** Advice keyed on note density. */
export function suggestedFocus(features: FeatureRecord): string {
  if (features.density < SPARSE_DENSITY) {
    return "Consider adding rhythmic ostinatos to increase energy.";
  }
  if (features.density > BUSY_DENSITY) {
    return "Try introducing sparse breakdowns for contrast.";
  }
  return "Balance momentum with space by alternating busy and calm sections.";
}

/** Percussion-aware groove advice. */
export function grooveTip(features: FeatureRecord): string {
  const hasPercussion = features.distinct_status_bytes.some(
    s => isChannelVoiceStatus(s) && statusChannel(s) === PERCUSSION_CHANNEL,
  );
  if (hasPercussion) {
    return `Highlight the percussion on channel ${PERCUSSION_CHANNEL + 1} with subtle dynamics.`;
  }
  return "Experiment with layering tuned percussion or found sounds for unique grooves.";
}

// ─── Generator ───────────────────────────────────────────────────────────────

export interface GenerateIdeasOptions {
  /** Append the human-readable feature dump. Wins over showJson. */
  showFeatures?: boolean;
  /** Append the raw feature JSON. */
  showJson?: boolean;
}

export class InspirationGenerator {
  readonly features: FeatureRecord;
  private readonly rng: RandomSource;

  constructor(features: FeatureRecord, rng: RandomSource = createDefaultRandom()) {
    this.features = features;
    this.rng = rng;
  }

  generateIdeas(options: GenerateIdeasOptions = {}): string {
    const { showFeatures = false, showJson = false } = options;
    const outline = [
      "🎼 MIDI Snapshot",
      describeStructure(this.features),
      "",
      "✨ Creative Directions",
      choose(this.rng, CREATIVE_DIRECTIONS),
      suggestedFocus(this.features),
      grooveTip(this.features),
    ];

    if (showFeatures) {
      outline.push("", "📊 Feature Summary", featuresToText(this.features));
    } else if (showJson) {
      outline.push("", "📊 Feature JSON", featuresToJson(this.features));
    }

    return outline.join("\n").trim();
  }
}

/** Factory signature the UI controller takes, so tests can swap generators. */
export type GeneratorFactory = (features: FeatureRecord) => {
  generateIdeas(options?: GenerateIdeasOptions): string;
};
