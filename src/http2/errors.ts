/**
 * Connection-fatal error classes. Each carries the HTTP/2 error code that is
 * reported to the peer in GOAWAY when the connection is torn down.
 */
import { ErrorCode } from "./constants.js";

export class Http2Error extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = ErrorCode.INTERNAL_ERROR) {
    super(message);
    this.name = "Http2Error";
    this.code = code;
  }
}

/** Short read, EOF, socket reset, read deadline or failed write */
export class TransportError extends Http2Error {
  constructor(message: string) {
    super(message, ErrorCode.INTERNAL_ERROR);
    this.name = "TransportError";
  }
}

/** Peer sent something the connection state does not allow */
export class ProtocolViolation extends Http2Error {
  constructor(message: string, code: ErrorCode = ErrorCode.PROTOCOL_ERROR) {
    super(message, code);
    this.name = "ProtocolViolation";
  }
}

/** Header block could not be decompressed */
export class DecodeError extends Http2Error {
  constructor(message: string) {
    super(message, ErrorCode.COMPRESSION_ERROR);
    this.name = "DecodeError";
  }
}
