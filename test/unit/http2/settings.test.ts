import { describe, it, expect, vi } from "vitest";
import { Buffer } from "node:buffer";
import { Settings } from "../../../src/http2/settings.js";
import { ProtocolViolation } from "../../../src/http2/errors.js";
import { SettingsId, ErrorCode } from "../../../src/http2/constants.js";

function payload(entries: Array<[number, number]>): Buffer {
  const buf = Buffer.alloc(entries.length * 6);
  entries.forEach(([key, value], i) => {
    buf.writeUInt16BE(key, i * 6);
    buf.writeUInt32BE(value, i * 6 + 2);
  });
  return buf;
}

describe("Settings", () => {
  it("should start with protocol defaults", () => {
    expect(new Settings().snapshot()).toEqual({
      maxConcurrentStreams: 100,
      initialWindowSize: 65535,
      enablePush: true,
    });
  });

  describe("apply", () => {
    it("should update recognized identifiers", () => {
      const settings = new Settings();

      expect(settings.apply(SettingsId.MAX_CONCURRENT_STREAMS, 10)).toBe(true);
      expect(settings.apply(SettingsId.INITIAL_WINDOW_SIZE, 16384)).toBe(true);
      expect(settings.apply(SettingsId.ENABLE_PUSH, 0)).toBe(true);

      expect(settings.snapshot()).toEqual({
        maxConcurrentStreams: 10,
        initialWindowSize: 16384,
        enablePush: false,
      });
    });

    it("should treat any non-zero ENABLE_PUSH as true", () => {
      const settings = new Settings();
      settings.apply(SettingsId.ENABLE_PUSH, 0);
      settings.apply(SettingsId.ENABLE_PUSH, 7);
      expect(settings.enablePush).toBe(true);
    });

    it("should ignore unknown identifiers without error", () => {
      const settings = new Settings();
      expect(settings.apply(SettingsId.MAX_FRAME_SIZE, 32768)).toBe(false);
      expect(settings.apply(0xff, 1)).toBe(false);
      expect(settings.snapshot()).toEqual(new Settings().snapshot());
    });

    it("should accept out-of-range values unless strict", () => {
      const settings = new Settings();
      settings.apply(SettingsId.INITIAL_WINDOW_SIZE, 0xffffffff);
      expect(settings.initialWindowSize).toBe(0xffffffff);
    });

    it("should reject ENABLE_PUSH above 1 in strict mode", () => {
      const settings = new Settings({ strict: true });
      expect(() => settings.apply(SettingsId.ENABLE_PUSH, 2)).toThrow(ProtocolViolation);
      expect(settings.enablePush).toBe(true);
    });

    it("should reject oversized INITIAL_WINDOW_SIZE in strict mode", () => {
      const settings = new Settings({ strict: true });
      let caught: unknown;
      try {
        settings.apply(SettingsId.INITIAL_WINDOW_SIZE, 0x80000000);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ProtocolViolation);
      expect(caught).toMatchObject({ code: ErrorCode.FLOW_CONTROL_ERROR });
      expect(settings.initialWindowSize).toBe(65535);
    });
  });

  describe("applyPayload", () => {
    it("should apply each 6-byte entry once, in order", () => {
      const settings = new Settings();
      const apply = vi.spyOn(settings, "apply");

      const entries = settings.applyPayload(
        payload([
          [SettingsId.INITIAL_WINDOW_SIZE, 16384],
          [0x09, 5],
          [SettingsId.INITIAL_WINDOW_SIZE, 32768],
        ]),
      );

      expect(apply).toHaveBeenCalledTimes(3);
      expect(apply).toHaveBeenNthCalledWith(1, SettingsId.INITIAL_WINDOW_SIZE, 16384);
      expect(apply).toHaveBeenNthCalledWith(2, 0x09, 5);
      expect(apply).toHaveBeenNthCalledWith(3, SettingsId.INITIAL_WINDOW_SIZE, 32768);
      expect(entries).toEqual([
        [SettingsId.INITIAL_WINDOW_SIZE, 16384, true],
        [0x09, 5, false],
        [SettingsId.INITIAL_WINDOW_SIZE, 32768, true],
      ]);
      // Last write wins
      expect(settings.initialWindowSize).toBe(32768);
    });

    it("should leave fields not covered by the payload untouched", () => {
      const settings = new Settings();
      settings.apply(SettingsId.MAX_CONCURRENT_STREAMS, 7);

      settings.applyPayload(payload([[SettingsId.INITIAL_WINDOW_SIZE, 1000]]));

      expect(settings.maxConcurrentStreams).toBe(7);
      expect(settings.enablePush).toBe(true);
      expect(settings.initialWindowSize).toBe(1000);
    });

    it("should accept an empty payload", () => {
      const settings = new Settings();
      expect(settings.applyPayload(Buffer.alloc(0))).toEqual([]);
    });

    it("should reject a payload whose length is not a multiple of 6", () => {
      const settings = new Settings();
      const apply = vi.spyOn(settings, "apply");

      expect(() => settings.applyPayload(Buffer.alloc(7))).toThrow(ProtocolViolation);
      expect(() => settings.applyPayload(Buffer.alloc(7))).toThrow(/not a multiple of 6/);
      expect(apply).not.toHaveBeenCalled();
    });
  });
});
