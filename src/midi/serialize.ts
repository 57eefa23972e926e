// ─── FeatureRecord → JSON ───────────────────────────────────────────────────

import type { FeatureRecord } from "./types.js";

/**
 * Render a FeatureRecord as JSON with keys in lexicographic order.
 * List fields keep their own order (chunk order, or ascending for
 * distinct_status_bytes).
 */
export function featuresToJson(features: FeatureRecord, indent = 2): string {
  const sorted = Object.fromEntries(
    Object.entries(features).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
  return JSON.stringify(sorted, null, indent);
}

/** Format a status byte as two-digit uppercase hex, e.g. 0x90 → "0x90". */
export function formatStatusByte(status: number): string {
  return `0x${status.toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * Human-readable dump, one field per line, for the "show features" view.
 * Status bytes are shown in hex.
 */
export function featuresToText(features: FeatureRecord): string {
  const lines = [
    `Format type:           ${features.format_type}`,
    `Tracks declared:       ${features.tracks_declared}`,
    `Tracks observed:       ${features.tracks_observed}`,
    `Track consistency:     ${features.track_consistency ? "yes" : "no"}`,
    `Division:              ${features.division}`,
    `File size:             ${features.file_size} bytes`,
    `Track lengths:         ${features.track_lengths.join(", ") || "-"}`,
    `Note-on events:        ${features.note_on_events.join(", ") || "-"}`,
    `Note density:          ${features.density.toFixed(2)}`,
    `Distinct status bytes: ${features.distinct_status_bytes.map(formatStatusByte).join(" ") || "-"}`,
  ];
  return lines.join("\n");
}
