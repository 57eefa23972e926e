// ─── MIDI Feature Types ─────────────────────────────────────────────────────
//
// Types for the structural scan of a standard MIDI file.
// The scanner never builds an event list; it only counts what it walks
// past. FeatureRecord is the single artifact handed to the rest of the app.
// ─────────────────────────────────────────────────────────────────────────────

/** A tagged, length-prefixed block of bytes. */
export interface Chunk {
  /** Four ASCII characters, e.g. "MThd" or "MTrk". */
  tag: string;
  /** Declared payload length (unsigned 32-bit). */
  length: number;
  /** Exactly `length` bytes. */
  payload: Uint8Array;
}

/** Decoded MThd fields. */
export interface Header {
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  formatType: number;
  /** Track count the header claims. */
  tracksDeclared: number;
  /** Raw division word (ticks per quarter, or SMPTE when the top bit is set). */
  division: number;
}

/** Counts gathered from one MTrk chunk. */
export interface TrackStats {
  /** Payload length in bytes, whether or not every event decoded. */
  byteLength: number;
  /** Note-on events with nonzero velocity. */
  noteOnCount: number;
  /** Every status byte (explicit or inherited) the scan resolved. */
  statusBytesSeen: Set<number>;
}

/**
 * Everything the app knows about a file.
 *
 * Keys are snake_case because they double as the JSON rendering's keys.
 */
export interface FeatureRecord {
  readonly format_type: number;
  readonly tracks_declared: number;
  readonly division: number;
  /** One entry per observed track, in chunk order. */
  readonly track_lengths: readonly number[];
  /** One entry per observed track, in chunk order. */
  readonly note_on_events: readonly number[];
  /** Ascending, no duplicates. */
  readonly distinct_status_bytes: readonly number[];
  readonly file_size: number;
  readonly tracks_observed: number;
  readonly track_consistency: boolean;
  /** Average note-on count per observed track; 0 with no tracks. */
  readonly density: number;
}

/** How many bytes follow a status byte, by event family. */
export type EventShape =
  | { kind: "channel"; dataLength: 1 | 2 }
  | { kind: "meta" }
  | { kind: "sysex" }
  | { kind: "system"; dataLength: 0 | 1 | 2 };
