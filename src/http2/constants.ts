/**
 * HTTP/2 protocol constants (RFC 7540 / RFC 9113).
 */
import { Buffer } from "node:buffer";

/** Frame types (RFC 7540 Section 6) */
export const enum FrameType {
  DATA = 0x00,
  HEADERS = 0x01,
  PRIORITY = 0x02,
  RST_STREAM = 0x03,
  SETTINGS = 0x04,
  PUSH_PROMISE = 0x05,
  PING = 0x06,
  GOAWAY = 0x07,
  WINDOW_UPDATE = 0x08,
  CONTINUATION = 0x09,
}

/** Frame flags */
export const FrameFlags = {
  ACK: 0x01,
  END_STREAM: 0x01, // same bit as ACK, context-dependent
  END_HEADERS: 0x04,
  PADDED: 0x08,
  PRIORITY: 0x20,
} as const;

/** Settings identifiers (RFC 7540 Section 6.5.2) */
export const enum SettingsId {
  HEADER_TABLE_SIZE = 0x01,
  ENABLE_PUSH = 0x02,
  MAX_CONCURRENT_STREAMS = 0x03,
  INITIAL_WINDOW_SIZE = 0x04,
  MAX_FRAME_SIZE = 0x05,
  MAX_HEADER_LIST_SIZE = 0x06,
}

/** Error codes (RFC 7540 Section 7) */
export const enum ErrorCode {
  NO_ERROR = 0x00,
  PROTOCOL_ERROR = 0x01,
  INTERNAL_ERROR = 0x02,
  FLOW_CONTROL_ERROR = 0x03,
  SETTINGS_TIMEOUT = 0x04,
  STREAM_CLOSED = 0x05,
  FRAME_SIZE_ERROR = 0x06,
  REFUSED_STREAM = 0x07,
  CANCEL = 0x08,
  COMPRESSION_ERROR = 0x09,
}

/** Frame header size in bytes */
export const FRAME_HEADER_SIZE = 9;

/** Size of one SETTINGS entry: 16-bit identifier + 32-bit value */
export const SETTINGS_ENTRY_SIZE = 6;

/** Largest value the 24-bit length field can carry */
export const MAX_FRAME_LENGTH = 0xffffff;

/** Largest 31-bit stream identifier / window increment */
export const MAX_STREAM_ID = 0x7fffffff;

/** Default values */
export const DEFAULT_MAX_FRAME_SIZE = 16384; // 16 KB
export const DEFAULT_HEADER_TABLE_SIZE = 4096; // 4 KB
export const DEFAULT_INITIAL_WINDOW_SIZE = 65535; // 64 KB - 1
export const DEFAULT_MAX_CONCURRENT_STREAMS = 100;

/** HTTP/2 connection preface (RFC 7540 Section 3.5) */
export const CONNECTION_PREFACE = Buffer.from("PRI * HTTP/2.0\r\n\r\nSM\r\n\r\n");
