/**
 * h2-frame-server: connection-level HTTP/2 engine for a single client
 * socket (preface, SETTINGS negotiation, frame dispatch, HPACK decoding).
 */

// Server
export { createServer, handleSocket } from "./server.js";
export type { Http2ServerOptions } from "./server.js";

// Connection engine (advanced usage)
export { Http2ServerConnection } from "./http2/connection.js";
export type {
  ConnectionState,
  ServerConnectionOptions,
  Http2Request,
  RequestHandler,
  GoawayInfo,
  Logger,
} from "./http2/connection.js";
export { ByteStream } from "./http2/byte-stream.js";
export type { ByteStreamOptions } from "./http2/byte-stream.js";

// Protocol building blocks
export {
  decodeFrameHeader,
  encodeFrameHeader,
  encodeFrame,
  encodeSettings,
  encodeWindowUpdate,
  encodeGoaway,
  encodeHeaders,
  encodeData,
} from "./http2/framer.js";
export type { Frame, FrameHeader, ReceivedFrame } from "./http2/framer.js";
export { isConnectionPreface, validatePreface } from "./http2/preface.js";
export { Settings } from "./http2/settings.js";
export type { SettingsOptions, SettingsSnapshot, SettingsEntry } from "./http2/settings.js";
export { HpackDecoder, HpackEncoder } from "./http2/hpack.js";
export type { HeaderDecoder, HeaderField } from "./http2/hpack.js";
export { StreamTable } from "./http2/stream.js";
export type { StreamState } from "./http2/stream.js";
export { ResponseEncoder, helloWorld, renderPlainHeaderBlock } from "./http2/response.js";
export type { Http2Response, HeaderEncoding, ResponseEncoderOptions } from "./http2/response.js";
export { Http2Error, TransportError, ProtocolViolation, DecodeError } from "./http2/errors.js";
export {
  FrameType,
  FrameFlags,
  SettingsId,
  ErrorCode,
  CONNECTION_PREFACE,
  FRAME_HEADER_SIZE,
} from "./http2/constants.js";
