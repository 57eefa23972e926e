// ─── MIDI → FeatureRecord ───────────────────────────────────────────────────
//
// Reads a standard MIDI file and reduces it to structural statistics:
// header fields, per-track byte lengths and note-on counts, the set of
// status bytes in use, and a couple of derived metrics.
//
// Hard failures (missing file, bad header, truncated chunk) throw a
// MidiFeatureError. Bad bytes inside a track only cut that track short.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync, statSync } from "node:fs";
import { readChunks, TRACK_TAG } from "./chunks.js";
import { decodeHeader } from "./header.js";
import { scanTrack } from "./scanner.js";
import { notFound } from "./errors.js";
import type { FeatureRecord, Header, TrackStats } from "./types.js";

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Extract features from the MIDI file at `path`.
 *
 * The whole file is read synchronously; no handle outlives the call.
 */
export function extractFeatures(path: string): FeatureRecord {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw notFound(path);
  }
  return extractFeaturesFromBuffer(readFileSync(path));
}

/** Extract features from bytes already in memory. */
export function extractFeaturesFromBuffer(bytes: Uint8Array): FeatureRecord {
  const { header, cursor } = decodeHeader(bytes);

  const tracks: TrackStats[] = [];
  for (const chunk of readChunks(cursor)) {
    // Unknown chunk types are framed and skipped whole.
    if (chunk.tag !== TRACK_TAG) continue;
    tracks.push(scanTrack(chunk.payload));
  }

  return aggregateFeatures(header, tracks, bytes.length);
}

/** Combine header fields and per-track stats into a frozen FeatureRecord. */
export function aggregateFeatures(
  header: Header,
  tracks: readonly TrackStats[],
  fileSize: number,
): FeatureRecord {
  const noteOnEvents = tracks.map(t => t.noteOnCount);
  const tracksObserved = tracks.length;
  const totalNoteOns = noteOnEvents.reduce((sum, n) => sum + n, 0);

  const statusBytes = new Set<number>();
  for (const track of tracks) {
    for (const status of track.statusBytesSeen) statusBytes.add(status);
  }

  return Object.freeze({
    format_type: header.formatType,
    tracks_declared: header.tracksDeclared,
    division: header.division,
    track_lengths: Object.freeze(tracks.map(t => t.byteLength)),
    note_on_events: Object.freeze(noteOnEvents),
    distinct_status_bytes: Object.freeze([...statusBytes].sort((a, b) => a - b)),
    file_size: fileSize,
    tracks_observed: tracksObserved,
    track_consistency: tracksObserved === header.tracksDeclared,
    density: tracksObserved > 0 ? totalNoteOns / tracksObserved : 0,
  });
}
