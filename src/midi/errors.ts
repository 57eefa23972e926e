// ─── Feature Extraction Errors ──────────────────────────────────────────────
//
// Hard failures that abort a whole extraction. Faults inside a single
// track's event stream never reach this type; the scanner absorbs them.
// ─────────────────────────────────────────────────────────────────────────────

export const ERROR_KINDS = ["NotFound", "InvalidHeader", "Truncated"] as const;

export type MidiFeatureErrorKind = (typeof ERROR_KINDS)[number];

export class MidiFeatureError extends Error {
  readonly kind: MidiFeatureErrorKind;

  constructor(kind: MidiFeatureErrorKind, message: string) {
    super(message);
    this.name = "MidiFeatureError";
    this.kind = kind;
  }
}

export function isMidiFeatureError(err: unknown): err is MidiFeatureError {
  return err instanceof MidiFeatureError;
}

export function notFound(path: string): MidiFeatureError {
  return new MidiFeatureError("NotFound", `MIDI file not found: ${path}`);
}

export function invalidHeader(message: string): MidiFeatureError {
  return new MidiFeatureError("InvalidHeader", message);
}

export function truncated(message: string): MidiFeatureError {
  return new MidiFeatureError("Truncated", message);
}
