// ─── Byte Cursor ────────────────────────────────────────────────────────────
//
// Forward-only reader over a fixed byte buffer. Every read is bounds
// checked; running past the end throws a Truncated MidiFeatureError so
// callers can decide whether that is fatal (chunk framing) or local
// (a track's event stream).
// ─────────────────────────────────────────────────────────────────────────────

import { truncated } from "./errors.js";

export class ByteCursor {
  private readonly bytes: Uint8Array;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  get length(): number {
    return this.bytes.length;
  }

  atEnd(): boolean {
    return this.offset >= this.bytes.length;
  }

  /** Return exactly `n` bytes and advance past them. */
  readBytes(n: number): Uint8Array {
    if (n < 0 || n > this.remaining) {
      throw truncated(
        `Unexpected end of data: wanted ${n} byte(s) at offset ${this.offset}, ${this.remaining} left`,
      );
    }
    const out = this.bytes.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  skip(n: number): void {
    this.readBytes(n);
  }

  readU8(): number {
    return this.readBytes(1)[0];
  }

  /** Look at the next byte without consuming it. */
  peekU8(): number {
    if (this.atEnd()) {
      throw truncated(`Unexpected end of data at offset ${this.offset}`);
    }
    return this.bytes[this.offset];
  }

  readU16BE(): number {
    const b = this.readBytes(2);
    return (b[0] << 8) | b[1];
  }

  readU32BE(): number {
    const b = this.readBytes(4);
    // Multiply instead of shifting so lengths >= 2^31 stay positive.
    return b[0] * 0x1000000 + ((b[1] << 16) | (b[2] << 8) | b[3]);
  }

  /** Four bytes as ASCII, for chunk tags. */
  readTag(): string {
    return String.fromCharCode(...this.readBytes(4));
  }

  /**
   * Decode a variable-length quantity: 7 bits per byte, big-endian,
   * high bit set on every byte but the last.
   *
   *   [0x00]       → 0
   *   [0x7F]       → 127
   *   [0x81, 0x00] → 128
   */
  readVlq(): number {
    let value = 0;
    for (;;) {
      const byte = this.readU8();
      value = value * 128 + (byte & 0x7f);
      if ((byte & 0x80) === 0) return value;
    }
  }
}
