// ─── Chunk Reader ───────────────────────────────────────────────────────────
//
// Every SMF chunk is <4-byte tag><4-byte big-endian length><payload>.
// Fewer than 8 bytes left means the file is over; a frame whose payload
// runs past the end of the buffer is a hard Truncated failure.
// ─────────────────────────────────────────────────────────────────────────────

import type { ByteCursor } from "./cursor.js";
import type { Chunk } from "./types.js";
import { truncated } from "./errors.js";

export const CHUNK_FRAME_SIZE = 8;
export const HEADER_TAG = "MThd";
export const TRACK_TAG = "MTrk";

/** Sentinel for normal termination of the chunk loop. */
export const END_OF_INPUT = Symbol("END_OF_INPUT");
export type EndOfInput = typeof END_OF_INPUT;

/**
 * Read the next chunk, or END_OF_INPUT when no complete frame remains.
 * Throws Truncated when the frame is present but the payload is short.
 */
export function nextChunk(cursor: ByteCursor): Chunk | EndOfInput {
  if (cursor.remaining < CHUNK_FRAME_SIZE) return END_OF_INPUT;

  const start = cursor.position;
  const tag = cursor.readTag();
  const length = cursor.readU32BE();

  if (length > cursor.remaining) {
    throw truncated(
      `Chunk "${tag}" at offset ${start} declares ${length} byte(s) but only ${cursor.remaining} remain`,
    );
  }

  return { tag, length, payload: cursor.readBytes(length) };
}

/** Iterate chunks until END_OF_INPUT. */
export function* readChunks(cursor: ByteCursor): Generator<Chunk> {
  for (;;) {
    const chunk = nextChunk(cursor);
    if (chunk === END_OF_INPUT) return;
    yield chunk;
  }
}
