// ─── SMF Byte Builders (tests only) ─────────────────────────────────────────
//
// Hand-assembled Standard MIDI File bytes, so tests can say exactly what
// is on the wire: bad tags, short chunks, running status, and so on.
// ─────────────────────────────────────────────────────────────────────────────

import { MidiFeatureError } from "../errors.js";

export function ascii(text: string): number[] {
  return [...text].map(c => c.charCodeAt(0));
}

export function u16(n: number): number[] {
  return [(n >> 8) & 0xff, n & 0xff];
}

export function u32(n: number): number[] {
  return [(n >>> 24) & 0xff, (n >>> 16) & 0xff, (n >>> 8) & 0xff, n & 0xff];
}

/** <tag><length><payload> with the length taken from the payload. */
export function chunk(tag: string, payload: number[]): number[] {
  return [...ascii(tag), ...u32(payload.length), ...payload];
}

/** Canonical 14-byte MThd chunk. */
export function header(format: number, tracks: number, division: number): number[] {
  return chunk("MThd", [...u16(format), ...u16(tracks), ...u16(division)]);
}

export function track(payload: number[]): number[] {
  return chunk("MTrk", payload);
}

export function smf(...parts: number[][]): Uint8Array {
  return new Uint8Array(parts.flat());
}

/** delta 0, note-on C4 vel 64, delta 96, note-off C4. */
export const SINGLE_NOTE_TRACK = [0x00, 0x90, 0x3c, 0x40, 0x60, 0x80, 0x3c, 0x40];

/** Run `fn` and return the MidiFeatureError it throws. */
export function captureMidiError(fn: () => unknown): MidiFeatureError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MidiFeatureError) return err;
    throw err;
  }
  throw new Error("Expected a MidiFeatureError to be thrown");
}
