/**
 * Negotiated connection parameters, updated from the peer's SETTINGS frames.
 */
import { Buffer } from "node:buffer";
import {
  SettingsId,
  ErrorCode,
  SETTINGS_ENTRY_SIZE,
  MAX_STREAM_ID,
  DEFAULT_INITIAL_WINDOW_SIZE,
  DEFAULT_MAX_CONCURRENT_STREAMS,
} from "./constants.js";
import { ProtocolViolation } from "./errors.js";

export interface SettingsOptions {
  /**
   * Reject out-of-range values for recognized identifiers
   * (RFC 7540 Section 6.5.2). Off by default: values are taken as sent.
   */
  strict?: boolean;
}

/** One decoded entry: identifier, value, and whether the identifier is known */
export type SettingsEntry = [key: number, value: number, recognized: boolean];

export interface SettingsSnapshot {
  maxConcurrentStreams: number;
  initialWindowSize: number;
  enablePush: boolean;
}

export class Settings {
  maxConcurrentStreams = DEFAULT_MAX_CONCURRENT_STREAMS;
  initialWindowSize = DEFAULT_INITIAL_WINDOW_SIZE;
  enablePush = true;

  private readonly strict: boolean;

  constructor(options: SettingsOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /**
   * Apply one setting. Unknown identifiers are ignored, as the protocol
   * requires; returns whether the identifier was recognized.
   */
  apply(key: number, value: number): boolean {
    switch (key) {
      case SettingsId.ENABLE_PUSH:
        if (this.strict && value > 1) {
          throw new ProtocolViolation(`ENABLE_PUSH must be 0 or 1, got ${value}`);
        }
        this.enablePush = value !== 0;
        return true;
      case SettingsId.MAX_CONCURRENT_STREAMS:
        this.maxConcurrentStreams = value;
        return true;
      case SettingsId.INITIAL_WINDOW_SIZE:
        if (this.strict && value > MAX_STREAM_ID) {
          throw new ProtocolViolation(
            `INITIAL_WINDOW_SIZE ${value} exceeds ${MAX_STREAM_ID}`,
            ErrorCode.FLOW_CONTROL_ERROR,
          );
        }
        this.initialWindowSize = value;
        return true;
      default:
        return false;
    }
  }

  /**
   * Apply every 6-byte entry of a SETTINGS payload in order.
   * Returns the entries so the caller can log them.
   */
  applyPayload(payload: Buffer): SettingsEntry[] {
    if (payload.length % SETTINGS_ENTRY_SIZE !== 0) {
      throw new ProtocolViolation(
        `SETTINGS payload length ${payload.length} is not a multiple of ${SETTINGS_ENTRY_SIZE}`,
        ErrorCode.FRAME_SIZE_ERROR,
      );
    }
    const entries: SettingsEntry[] = [];
    for (let offset = 0; offset < payload.length; offset += SETTINGS_ENTRY_SIZE) {
      const key = payload.readUInt16BE(offset);
      const value = payload.readUInt32BE(offset + 2);
      entries.push([key, value, this.apply(key, value)]);
    }
    return entries;
  }

  snapshot(): SettingsSnapshot {
    return {
      maxConcurrentStreams: this.maxConcurrentStreams,
      initialWindowSize: this.initialWindowSize,
      enablePush: this.enablePush,
    };
  }
}
