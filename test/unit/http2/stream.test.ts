import { describe, it, expect } from "vitest";
import { StreamTable } from "../../../src/http2/stream.js";
import { ProtocolViolation } from "../../../src/http2/errors.js";
import { ErrorCode } from "../../../src/http2/constants.js";

describe("StreamTable", () => {
  it("should report unseen streams as idle", () => {
    const table = new StreamTable();
    expect(table.get(1)).toBe("idle");
    expect(table.lastStreamId).toBe(0);
    expect(table.activeCount).toBe(0);
  });

  it("should open a stream on HEADERS and half-close it on END_STREAM", () => {
    const table = new StreamTable();

    expect(table.receiveHeaders(1, false)).toBe("open");
    expect(table.receiveHeaders(3, true)).toBe("half-closed-remote");
    expect(table.get(1)).toBe("open");
    expect(table.activeCount).toBe(2);
  });

  it("should track the last processed stream", () => {
    const table = new StreamTable();
    table.receiveHeaders(1, true);
    table.receiveHeaders(3, true);

    table.close(3);
    table.close(1);

    expect(table.lastStreamId).toBe(3);
    expect(table.get(1)).toBe("closed");
    expect(table.get(3)).toBe("closed");
    expect(table.get(5)).toBe("idle");
    expect(table.activeCount).toBe(0);
  });

  it("should reject HEADERS on stream 0", () => {
    expect(() => new StreamTable().receiveHeaders(0, true)).toThrow(ProtocolViolation);
  });

  it("should reject even client stream IDs", () => {
    expect(() => new StreamTable().receiveHeaders(2, true)).toThrow(/even stream ID 2/);
  });

  it("should treat skipped lower stream IDs as closed", () => {
    const table = new StreamTable();
    table.receiveHeaders(5, false);
    expect(table.get(3)).toBe("closed");
    expect(() => table.receiveHeaders(3, true)).toThrow("HEADERS on stream 3 in state closed");
  });

  it("should reject HEADERS on a closed stream with STREAM_CLOSED", () => {
    const table = new StreamTable();
    table.receiveHeaders(1, true);
    table.close(1);

    let caught: unknown;
    try {
      table.receiveHeaders(1, true);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProtocolViolation);
    expect(caught).toMatchObject({ code: ErrorCode.STREAM_CLOSED });
  });

  it("should allow trailing HEADERS on an open stream", () => {
    const table = new StreamTable();
    table.receiveHeaders(1, false);
    expect(table.receiveHeaders(1, true)).toBe("half-closed-remote");
  });
});
