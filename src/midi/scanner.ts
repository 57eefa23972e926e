// ─── Event Stream Scanner ───────────────────────────────────────────────────
//
// Walks one MTrk payload event by event:
//
//   <delta VLQ> <status | running-status data byte> <data...>
//
// and counts what it sees. Nothing is decoded beyond what is needed to
// find the next event. A fault anywhere in the stream (short VLQ, short
// data, running status with nothing to inherit) ends this track's scan
// and keeps the counts gathered so far.
// ─────────────────────────────────────────────────────────────────────────────

import { ByteCursor } from "./cursor.js";
import { isMidiFeatureError } from "./errors.js";
import type { EventShape, TrackStats } from "./types.js";

// ─── Status Bytes ────────────────────────────────────────────────────────────

export const NOTE_OFF = 0x80;
export const NOTE_ON = 0x90;
export const POLY_PRESSURE = 0xa0;
export const CONTROL_CHANGE = 0xb0;
export const PROGRAM_CHANGE = 0xc0;
export const CHANNEL_PRESSURE = 0xd0;
export const PITCH_BEND = 0xe0;

export const SYSEX = 0xf0;
export const SYSEX_ESCAPE = 0xf7;
export const META = 0xff;

const SONG_POSITION = 0xf2;
const TIME_CODE_QUARTER = 0xf1;
const SONG_SELECT = 0xf3;

/** High nibble of a status byte. */
export function statusCommand(status: number): number {
  return status & 0xf0;
}

/** Low nibble of a status byte (0-based MIDI channel). */
export function statusChannel(status: number): number {
  return status & 0x0f;
}

/** True for 0x80-0xEF: note, controller, program, pressure, pitch bend. */
export function isChannelVoiceStatus(status: number): boolean {
  return status >= 0x80 && status < SYSEX;
}

/**
 * Work out how many bytes follow a status byte.
 *
 * Sysex (F0/F7) carries a VLQ-prefixed payload and system common messages
 * carry their fixed data, so files that contain them stay aligned.
 */
export function classifyStatus(status: number): EventShape {
  if (status === META) return { kind: "meta" };
  if (status === SYSEX || status === SYSEX_ESCAPE) return { kind: "sysex" };

  switch (statusCommand(status)) {
    case PROGRAM_CHANGE:
    case CHANNEL_PRESSURE:
      return { kind: "channel", dataLength: 1 };
    case NOTE_OFF:
    case NOTE_ON:
    case POLY_PRESSURE:
    case CONTROL_CHANGE:
    case PITCH_BEND:
      return { kind: "channel", dataLength: 2 };
  }

  if (status === SONG_POSITION) return { kind: "system", dataLength: 2 };
  if (status === TIME_CODE_QUARTER || status === SONG_SELECT) {
    return { kind: "system", dataLength: 1 };
  }
  return { kind: "system", dataLength: 0 };
}

// ─── Public API ──────────────────────────────────────────────────────────────

/** Scan one track payload and return its counts. Never throws on bad data. */
export function scanTrack(payload: Uint8Array): TrackStats {
  const stats: TrackStats = {
    byteLength: payload.length,
    noteOnCount: 0,
    statusBytesSeen: new Set<number>(),
  };

  const cursor = new ByteCursor(payload);
  let runningStatus: number | null = null;

  try {
    while (!cursor.atEnd()) {
      cursor.readVlq(); // delta time, not needed for counting

      let status = cursor.peekU8();
      if (status < 0x80) {
        // Data byte: inherit the last status and leave the byte for the body.
        if (runningStatus === null) break;
        status = runningStatus;
      } else {
        cursor.skip(1);
        runningStatus = status;
      }

      stats.statusBytesSeen.add(status);
      scanEventBody(cursor, status, stats);
    }
  } catch (err) {
    // Only running out of bytes ends a track quietly.
    if (!isMidiFeatureError(err) || err.kind !== "Truncated") throw err;
  }

  return stats;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function scanEventBody(cursor: ByteCursor, status: number, stats: TrackStats): void {
  const shape = classifyStatus(status);

  switch (shape.kind) {
    case "channel": {
      const data = cursor.readBytes(shape.dataLength);
      // Velocity 0 is the note-off convention.
      if (statusCommand(status) === NOTE_ON && data[1] > 0) {
        stats.noteOnCount++;
      }
      return;
    }
    case "meta":
      cursor.skip(1); // meta type
      cursor.skip(cursor.readVlq());
      return;
    case "sysex":
      cursor.skip(cursor.readVlq());
      return;
    case "system":
      cursor.skip(shape.dataLength);
      return;
  }
}
