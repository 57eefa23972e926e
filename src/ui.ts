// ─── midi-muse: UI Layer ────────────────────────────────────────────────────
//
// InspirationApp holds the front-end state (selected file, toggles) and
// talks to the outside world only through UiCapabilities: a file dialog,
// message boxes, and a text area. The terminal implementation below backs
// those with readline and the console; tests pass their own.
// ─────────────────────────────────────────────────────────────────────────────

import { createInterface, type Interface } from "node:readline/promises";
import { extractFeatures } from "./midi/features.js";
import { isMidiFeatureError } from "./midi/errors.js";
import type { FeatureRecord } from "./midi/types.js";
import { InspirationGenerator, type GeneratorFactory } from "./ideas.js";
import { createDefaultRandom, type RandomSource } from "./random.js";

// ─── Capabilities ────────────────────────────────────────────────────────────

export interface FileDialogOptions {
  title: string;
  /** [label, space-separated glob patterns] */
  filetypes: Array<[string, string]>;
}

/** Everything the app needs from a presentation layer. */
export interface UiCapabilities {
  /** Resolve to a path, or null when the user cancels. */
  askOpenFilename(options: FileDialogOptions): Promise<string | null>;
  showInfo(title: string, message: string): void;
  showError(title: string, message: string): void;
  /** Replace the output area's contents. */
  displayText(text: string): void;
}

export const MIDI_FILE_DIALOG: FileDialogOptions = {
  title: "Select MIDI file",
  filetypes: [
    ["MIDI files", "*.mid *.midi"],
    ["All files", "*.*"],
  ],
};

// ─── App Controller ──────────────────────────────────────────────────────────

export interface InspirationAppOptions {
  generatorFactory?: GeneratorFactory;
  /** Used by the default generator factory. */
  rng?: RandomSource;
  extract?: (path: string) => FeatureRecord;
  showFeatures?: boolean;
  showJson?: boolean;
}

export class InspirationApp {
  selectedFile = "";
  private features = false;
  private json = false;

  private readonly ui: UiCapabilities;
  private readonly generatorFactory: GeneratorFactory;
  private readonly extract: (path: string) => FeatureRecord;

  constructor(ui: UiCapabilities, options: InspirationAppOptions = {}) {
    this.ui = ui;
    const rng = options.rng ?? createDefaultRandom();
    this.generatorFactory =
      options.generatorFactory ?? (features => new InspirationGenerator(features, rng));
    this.extract = options.extract ?? extractFeatures;
    this.setShowFeatures(options.showFeatures ?? false);
    this.setShowJson(options.showJson ?? false);
  }

  get showFeatures(): boolean {
    return this.features;
  }

  get showJson(): boolean {
    return this.json;
  }

  /** The feature dump replaces the JSON view, so turning it on clears JSON. */
  setShowFeatures(value: boolean): void {
    this.features = value;
    this.syncToggles();
  }

  setShowJson(value: boolean): void {
    this.json = value;
    this.syncToggles();
  }

  private syncToggles(): void {
    if (this.features) this.json = false;
  }

  /** Ask for a file; keeps the previous selection on cancel. */
  async openFileDialog(): Promise<void> {
    const filename = await this.ui.askOpenFilename(MIDI_FILE_DIALOG);
    if (filename) this.selectedFile = filename;
  }

  /** Analyze the selected file and display ideas. Returns false if nothing was shown. */
  generateIdeas(): boolean {
    const path = this.selectedFile;
    if (!path) {
      this.ui.showInfo("No file selected", "Choose a MIDI file to analyze.");
      return false;
    }

    let features: FeatureRecord;
    try {
      features = this.extract(path);
    } catch (err) {
      if (!isMidiFeatureError(err)) throw err;
      this.ui.showError("Feature extraction failed", err.message);
      return false;
    }

    const ideas = this.generatorFactory(features).generateIdeas({
      showFeatures: this.features,
      showJson: this.json,
    });
    this.ui.displayText(ideas);
    return true;
  }
}

// ─── Terminal Implementation ─────────────────────────────────────────────────

/** UiCapabilities over a readline interface and the console. */
export function createTerminalUi(rl: Interface): UiCapabilities {
  return {
    async askOpenFilename(options) {
      const patterns = options.filetypes[0]?.[1] ?? "*.*";
      const answer = (await rl.question(`${options.title} (${patterns}, blank to quit): `)).trim();
      return answer === "" ? null : answer;
    },

    showInfo(title, message) {
      console.log(`ℹ️  ${title}: ${message}`);
    },

    showError(title, message) {
      console.error(`❗ ${title}: ${message}`);
    },

    displayText(text) {
      console.log(`\n${text}\n`);
    },
  };
}

/**
 * Run the interactive terminal session: pick a file, show ideas, repeat
 * until the user answers with a blank line.
 */
export async function launchTerminalUi(options: InspirationAppOptions = {}): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const app = new InspirationApp(createTerminalUi(rl), options);
    console.log("\nMIDI Inspiration: interactive mode\n");
    for (;;) {
      app.selectedFile = "";
      await app.openFileDialog();
      if (!app.selectedFile) break;
      app.generateIdeas();
    }
  } finally {
    rl.close();
  }
}
