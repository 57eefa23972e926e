// ─── Header Decoder ─────────────────────────────────────────────────────────
//
// Offset  Size  Field
//   0      4    "MThd"
//   4      4    chunk length (6, or more with vendor extensions)
//   8      2    format
//  10      2    declared track count
//  12      2    division
// ─────────────────────────────────────────────────────────────────────────────

import { ByteCursor } from "./cursor.js";
import { HEADER_TAG } from "./chunks.js";
import { invalidHeader } from "./errors.js";
import type { Header } from "./types.js";

export const HEADER_SIZE = 14;
const CANONICAL_HEADER_LENGTH = 6;

export interface DecodedHeader {
  header: Header;
  /** Positioned at the first chunk after the header. */
  cursor: ByteCursor;
}

/**
 * Decode the MThd chunk at the start of `bytes`.
 *
 * Throws InvalidHeader for short input or a wrong tag, and Truncated when
 * a longer-than-canonical header runs past the end of the buffer.
 */
export function decodeHeader(bytes: Uint8Array): DecodedHeader {
  if (bytes.length < HEADER_SIZE) {
    throw invalidHeader(`File too small to be a valid MIDI file (${bytes.length} bytes)`);
  }

  const cursor = new ByteCursor(bytes);
  if (cursor.readTag() !== HEADER_TAG) {
    throw invalidHeader("Missing MIDI header chunk (MThd)");
  }

  const declaredLength = cursor.readU32BE();
  const header: Header = {
    formatType: cursor.readU16BE(),
    tracksDeclared: cursor.readU16BE(),
    division: cursor.readU16BE(),
  };

  // Shorter-than-canonical lengths are read as if they were 6.
  if (declaredLength > CANONICAL_HEADER_LENGTH) {
    cursor.skip(declaredLength - CANONICAL_HEADER_LENGTH);
  }

  return { header, cursor };
}
