/**
 * HTTP/2 frame codec.
 * Decodes the fixed 9-byte frame header and encodes outgoing frames.
 *
 * Frame layout (RFC 7540 Section 4.1):
 *   +-----------------------------------------------+
 *   |                 Length (24)                     |
 *   +---------------+---------------+---------------+
 *   |   Type (8)    |   Flags (8)   |
 *   +-+-------------+---------------+---------+
 *   |R|         Stream Identifier (31)         |
 *   +=+=========================================+
 *   |               Frame Payload                    |
 *   +-----------------------------------------------+
 *
 * Every outgoing frame goes through encodeFrameHeader so the byte layout
 * lives in exactly one place.
 */
import { Buffer } from "node:buffer";
import {
  FrameType,
  FrameFlags,
  SettingsId,
  ErrorCode,
  FRAME_HEADER_SIZE,
  SETTINGS_ENTRY_SIZE,
  MAX_FRAME_LENGTH,
  MAX_STREAM_ID,
} from "./constants.js";

export interface FrameHeader {
  /** Payload byte count (24-bit) */
  length: number;
  /** Frame type tag; unknown types are kept as-is */
  type: number;
  flags: number;
  /** 31-bit stream identifier, reserved bit already cleared */
  streamId: number;
}

/** Outgoing frame; the header length is derived from the payload. */
export interface Frame {
  type: FrameType;
  flags: number;
  streamId: number;
  payload: Buffer;
}

/** Frame as read off the wire: header plus exactly `length` payload bytes. */
export type ReceivedFrame = FrameHeader & { payload: Buffer };

/**
 * Decode a 9-byte frame header. Any 9 bytes give a structurally valid
 * header; whether it makes sense is the dispatcher's call.
 */
export function decodeFrameHeader(bytes: Buffer): FrameHeader {
  if (bytes.length < FRAME_HEADER_SIZE) {
    throw new RangeError(`Frame header needs ${FRAME_HEADER_SIZE} bytes, got ${bytes.length}`);
  }
  return {
    length: bytes.readUIntBE(0, 3),
    type: bytes[3],
    flags: bytes[4],
    streamId: bytes.readUInt32BE(5) & MAX_STREAM_ID,
  };
}

/** Encode a frame header. The reserved stream-id bit is always written as 0. */
export function encodeFrameHeader(header: FrameHeader, target?: Buffer): Buffer {
  if (header.length < 0 || header.length > MAX_FRAME_LENGTH) {
    throw new RangeError(`Frame length ${header.length} does not fit in 24 bits`);
  }
  const buf = target ?? Buffer.alloc(FRAME_HEADER_SIZE);

  // Length (24 bits, big-endian)
  buf.writeUIntBE(header.length, 0, 3);
  buf[3] = header.type & 0xff;
  buf[4] = header.flags & 0xff;
  // Stream ID (31 bits, big-endian, R bit = 0)
  buf.writeUInt32BE(header.streamId & MAX_STREAM_ID, 5);

  return buf;
}

/**
 * Encode a frame into its wire format (9-byte header + payload).
 */
export function encodeFrame(frame: Frame): Buffer {
  const { type, flags, streamId, payload } = frame;
  const buf = Buffer.alloc(FRAME_HEADER_SIZE + payload.length);
  encodeFrameHeader({ length: payload.length, type, flags, streamId }, buf);
  payload.copy(buf, FRAME_HEADER_SIZE);
  return buf;
}

/** Encode a SETTINGS frame; an ACK always has an empty payload. */
export function encodeSettings(settings: Array<[SettingsId, number]>, ack = false): Buffer {
  if (ack) {
    return encodeFrame({
      type: FrameType.SETTINGS,
      flags: FrameFlags.ACK,
      streamId: 0,
      payload: Buffer.alloc(0),
    });
  }

  const payload = Buffer.alloc(settings.length * SETTINGS_ENTRY_SIZE);
  settings.forEach(([id, value], i) => {
    const offset = i * SETTINGS_ENTRY_SIZE;
    payload.writeUInt16BE(id, offset);
    payload.writeUInt32BE(value, offset + 2);
  });

  return encodeFrame({
    type: FrameType.SETTINGS,
    flags: 0,
    streamId: 0,
    payload,
  });
}

/** Encode a WINDOW_UPDATE frame */
export function encodeWindowUpdate(streamId: number, increment: number): Buffer {
  const payload = Buffer.alloc(4);
  payload.writeUInt32BE(increment & MAX_STREAM_ID, 0);
  return encodeFrame({
    type: FrameType.WINDOW_UPDATE,
    flags: 0,
    streamId,
    payload,
  });
}

/** Encode a GOAWAY frame */
export function encodeGoaway(
  lastStreamId: number,
  errorCode: ErrorCode,
  debugData?: Buffer,
): Buffer {
  const payload = Buffer.alloc(8 + (debugData?.length ?? 0));
  payload.writeUInt32BE(lastStreamId & MAX_STREAM_ID, 0);
  payload.writeUInt32BE(errorCode, 4);
  if (debugData) {
    debugData.copy(payload, 8);
  }
  return encodeFrame({
    type: FrameType.GOAWAY,
    flags: 0,
    streamId: 0,
    payload,
  });
}

/** Encode a HEADERS frame */
export function encodeHeaders(
  streamId: number,
  headerBlock: Buffer,
  endStream: boolean,
  endHeaders: boolean,
): Buffer {
  let flags = 0;
  if (endStream) flags |= FrameFlags.END_STREAM;
  if (endHeaders) flags |= FrameFlags.END_HEADERS;

  return encodeFrame({
    type: FrameType.HEADERS,
    flags,
    streamId,
    payload: headerBlock,
  });
}

/** Encode a DATA frame */
export function encodeData(streamId: number, data: Buffer, endStream: boolean): Buffer {
  return encodeFrame({
    type: FrameType.DATA,
    flags: endStream ? FrameFlags.END_STREAM : 0,
    streamId,
    payload: data,
  });
}
