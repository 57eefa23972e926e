import { describe, it, expect } from "vitest";
import { scanTrack, classifyStatus, isChannelVoiceStatus } from "./scanner.js";

function scan(bytes: number[]) {
  const stats = scanTrack(new Uint8Array(bytes));
  return {
    byteLength: stats.byteLength,
    noteOnCount: stats.noteOnCount,
    statuses: [...stats.statusBytesSeen].sort((a, b) => a - b),
  };
}

describe("scanTrack", () => {
  it("counts a note-on and records both status bytes", () => {
    expect(scan([0x00, 0x90, 0x3c, 0x40, 0x60, 0x80, 0x3c, 0x40])).toEqual({
      byteLength: 8,
      noteOnCount: 1,
      statuses: [0x80, 0x90],
    });
  });

  it("decodes running status as a second note-on on the same channel", () => {
    expect(scan([0x00, 0x90, 0x3c, 0x40, 0x10, 0x3e, 0x50])).toEqual({
      byteLength: 7,
      noteOnCount: 2,
      statuses: [0x90],
    });
  });

  it("does not count a note-on with velocity 0", () => {
    const result = scan([0x00, 0x90, 0x3c, 0x40, 0x00, 0x90, 0x3c, 0x00]);
    expect(result.noteOnCount).toBe(1);
  });

  it("does not count a running-status note-on with velocity 0", () => {
    expect(scan([0x00, 0x90, 0x3c, 0x40, 0x60, 0x3c, 0x00]).noteOnCount).toBe(1);
  });

  it("counts note-ons per channel under one track", () => {
    const result = scan([
      0x00, 0x90, 0x3c, 0x40,
      0x00, 0x91, 0x3c, 0x40,
      0x00, 0x90, 0x3e, 0x40,
    ]);
    expect(result.noteOnCount).toBe(3);
    expect(result.statuses).toEqual([0x90, 0x91]);
  });

  it("handles multi-byte delta times", () => {
    expect(scan([0x81, 0x00, 0x90, 0x3c, 0x40]).noteOnCount).toBe(1);
  });

  it("skips meta events by their VLQ length", () => {
    const result = scan([
      0x00, 0xff, 0x03, 0x04, 0x54, 0x65, 0x73, 0x74, // track name "Test"
      0x00, 0x90, 0x3c, 0x40,
      0x00, 0xff, 0x2f, 0x00, // end of track
    ]);
    expect(result.noteOnCount).toBe(1);
    expect(result.statuses).toEqual([0x90, 0xff]);
  });

  it("reads one data byte for program change", () => {
    const result = scan([0x00, 0xc0, 0x05, 0x00, 0x90, 0x3c, 0x40]);
    expect(result.noteOnCount).toBe(1);
    expect(result.statuses).toEqual([0x90, 0xc0]);
  });

  it("skips a system-exclusive payload", () => {
    const result = scan([0x00, 0xf0, 0x03, 0x7e, 0x7f, 0xf7, 0x00, 0x90, 0x3c, 0x40]);
    expect(result.noteOnCount).toBe(1);
    expect(result.statuses).toEqual([0x90, 0xf0]);
  });

  it("reads a zero-length track as empty", () => {
    expect(scan([])).toEqual({ byteLength: 0, noteOnCount: 0, statuses: [] });
  });
});

describe("scanTrack local faults", () => {
  it("stops when running status has nothing to inherit", () => {
    expect(scan([0x00, 0x3c, 0x40, 0x00, 0x90, 0x3c, 0x40])).toEqual({
      byteLength: 7,
      noteOnCount: 0,
      statuses: [],
    });
  });

  it("keeps earlier counts when the last event is missing data", () => {
    expect(scan([0x00, 0x90, 0x3c, 0x40, 0x00, 0x90, 0x3c])).toEqual({
      byteLength: 7,
      noteOnCount: 1,
      statuses: [0x90],
    });
  });

  it("keeps earlier counts when the data ends mid-VLQ", () => {
    expect(scan([0x00, 0x90, 0x3c, 0x40, 0x81]).noteOnCount).toBe(1);
  });

  it("stops when a meta payload runs past the end", () => {
    expect(scan([0x00, 0xff, 0x01, 0x10, 0x41])).toEqual({
      byteLength: 5,
      noteOnCount: 0,
      statuses: [0xff],
    });
  });

  it("stops when a delta time is followed by nothing", () => {
    expect(scan([0x00, 0x90, 0x3c, 0x40, 0x00]).noteOnCount).toBe(1);
  });
});

describe("classifyStatus", () => {
  it("gives two data bytes to note, pressure, controller and pitch bend", () => {
    for (const status of [0x80, 0x9f, 0xa0, 0xb3, 0xe5]) {
      expect(classifyStatus(status)).toEqual({ kind: "channel", dataLength: 2 });
    }
  });

  it("gives one data byte to program change and channel pressure", () => {
    expect(classifyStatus(0xc3)).toEqual({ kind: "channel", dataLength: 1 });
    expect(classifyStatus(0xd0)).toEqual({ kind: "channel", dataLength: 1 });
  });

  it("recognizes meta and sysex", () => {
    expect(classifyStatus(0xff)).toEqual({ kind: "meta" });
    expect(classifyStatus(0xf0)).toEqual({ kind: "sysex" });
    expect(classifyStatus(0xf7)).toEqual({ kind: "sysex" });
  });

  it("sizes system common messages", () => {
    expect(classifyStatus(0xf2)).toEqual({ kind: "system", dataLength: 2 });
    expect(classifyStatus(0xf1)).toEqual({ kind: "system", dataLength: 1 });
    expect(classifyStatus(0xf3)).toEqual({ kind: "system", dataLength: 1 });
    expect(classifyStatus(0xf6)).toEqual({ kind: "system", dataLength: 0 });
  });
});

describe("isChannelVoiceStatus", () => {
  it("covers 0x80 through 0xEF only", () => {
    expect(isChannelVoiceStatus(0x7f)).toBe(false);
    expect(isChannelVoiceStatus(0x80)).toBe(true);
    expect(isChannelVoiceStatus(0xef)).toBe(true);
    expect(isChannelVoiceStatus(0xf9)).toBe(false);
  });
});
