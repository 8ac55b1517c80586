/**
 * HTTP/2 server connection.
 * Handles the full lifecycle of one client socket: preface, SETTINGS
 * exchange, frame dispatch, response emission and shutdown.
 *
 *   awaiting-preface → awaiting-server-settings-sent → awaiting-client-settings
 *     → established ⟲ → closed
 *
 * Frames are processed one at a time in arrival order; each handler runs to
 * completion (including its writes) before the next frame header is read.
 */
import { Buffer } from "node:buffer";
import { EventEmitter } from "node:events";
import {
  FrameType,
  FrameFlags,
  SettingsId,
  ErrorCode,
  FRAME_HEADER_SIZE,
  MAX_STREAM_ID,
  DEFAULT_MAX_FRAME_SIZE,
  DEFAULT_HEADER_TABLE_SIZE,
} from "./constants.js";
import { decodeFrameHeader, encodeGoaway, encodeSettings } from "./framer.js";
import type { FrameHeader, ReceivedFrame } from "./framer.js";
import type { ByteStream } from "./byte-stream.js";
import { validatePreface } from "./preface.js";
import { Settings } from "./settings.js";
import { HpackDecoder, type HeaderDecoder, type HeaderField } from "./hpack.js";
import { StreamTable } from "./stream.js";
import {
  ResponseEncoder,
  helloWorld,
  type HeaderEncoding,
  type Http2Response,
} from "./response.js";
import { Http2Error, ProtocolViolation, DecodeError, TransportError } from "./errors.js";

export type ConnectionState =
  | "awaiting-preface"
  | "awaiting-server-settings-sent"
  | "awaiting-client-settings"
  | "established"
  | "closed";

export type Logger = Pick<Console, "debug" | "warn">;

export interface Http2Request {
  streamId: number;
  headers: HeaderField[];
}

export type RequestHandler = (request: Http2Request) => Http2Response | Promise<Http2Response>;

export interface GoawayInfo {
  lastStreamId: number;
  errorCode: number;
  debugData: Buffer;
}

export interface ServerConnectionOptions {
  /** Settings advertised in the server's first SETTINGS frame (default: none) */
  localSettings?: Array<[SettingsId, number]>;
  /** Largest inbound frame payload accepted (default: 16384) */
  maxFrameSize?: number;
  /** HPACK dynamic table size for decoding and hpack response encoding (default: 4096) */
  headerTableSize?: number;
  /** Reject out-of-range values for known SETTINGS (default: false) */
  strictSettings?: boolean;
  /** Response header block rendering (default: "plain") */
  headerEncoding?: HeaderEncoding;
  /** Header decompression capability (default: hpack.js-backed HpackDecoder) */
  decoder?: HeaderDecoder;
  /** Produces the reply for a decoded request (default: "Hello, world!") */
  respond?: RequestHandler;
  /** Send GOAWAY before closing on a fatal error (default: true) */
  sendGoawayOnError?: boolean;
  logger?: Logger;
}

const FRAME_TYPE_NAMES: Record<number, string> = {
  [FrameType.DATA]: "DATA",
  [FrameType.HEADERS]: "HEADERS",
  [FrameType.PRIORITY]: "PRIORITY",
  [FrameType.RST_STREAM]: "RST_STREAM",
  [FrameType.SETTINGS]: "SETTINGS",
  [FrameType.PUSH_PROMISE]: "PUSH_PROMISE",
  [FrameType.PING]: "PING",
  [FrameType.GOAWAY]: "GOAWAY",
  [FrameType.WINDOW_UPDATE]: "WINDOW_UPDATE",
  [FrameType.CONTINUATION]: "CONTINUATION",
};

function frameTypeName(type: number): string {
  return FRAME_TYPE_NAMES[type] ?? `UNKNOWN(0x${type.toString(16).padStart(2, "0")})`;
}

let nextConnectionId = 1;

/**
 * One HTTP/2 connection over an owned byte stream.
 * Call run() once; it resolves when the connection reaches `closed`.
 *
 * Events: `state` (from, to), `settings` (SettingsSnapshot), `settings-ack`,
 * `window-update` ({ streamId, increment }), `request` (Http2Request),
 * `goaway` (GoawayInfo), `close` (Http2Error | null).
 */
export class Http2ServerConnection extends EventEmitter {
  readonly id: number;
  readonly settings: Settings;

  private stream: ByteStream;
  private streams = new StreamTable();
  private decoder: HeaderDecoder;
  private responseEncoder: ResponseEncoder;
  private respond: RequestHandler;
  private logger: Logger;
  private localSettings: Array<[SettingsId, number]>;
  private maxFrameSize: number;
  private sendGoawayOnError: boolean;

  private _state: ConnectionState = "awaiting-preface";
  private prefaceAccepted = false;
  private started = false;
  private windowIncrements = new Map<number, number>();
  private _closeReason: Http2Error | null = null;

  constructor(stream: ByteStream, options: ServerConnectionOptions = {}) {
    super();
    this.id = nextConnectionId++;
    this.stream = stream;

    const tableSize = options.headerTableSize ?? DEFAULT_HEADER_TABLE_SIZE;
    this.settings = new Settings({ strict: options.strictSettings ?? false });
    this.decoder = options.decoder ?? new HpackDecoder(tableSize);
    this.responseEncoder = new ResponseEncoder({
      headerEncoding: options.headerEncoding,
      headerTableSize: tableSize,
    });
    this.respond = options.respond ?? helloWorld;
    this.logger = options.logger ?? console;
    this.localSettings = [...(options.localSettings ?? [])];
    // The decoder enforces tableSize, so the peer has to be told about it.
    if (
      tableSize !== DEFAULT_HEADER_TABLE_SIZE &&
      !this.localSettings.some(([key]) => key === SettingsId.HEADER_TABLE_SIZE)
    ) {
      this.localSettings.push([SettingsId.HEADER_TABLE_SIZE, tableSize]);
    }
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.sendGoawayOnError = options.sendGoawayOnError ?? true;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Why the connection closed; null for a peer GOAWAY or while still open */
  get closeReason(): Http2Error | null {
    return this._closeReason;
  }

  /**
   * Sum of WINDOW_UPDATE increments received for a stream (0 = connection).
   * Per-stream sums are dropped once the stream closes.
   */
  windowIncrement(streamId: number): number {
    return this.windowIncrements.get(streamId) ?? 0;
  }

  /**
   * Drive the connection until it closes. Never rejects: every failure ends
   * in the `closed` state with `closeReason` set.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error("run() may only be called once per connection");
    }
    this.started = true;

    try {
      await this.handshake();
      while (this._state === "established") {
        await this.processFrame();
      }
    } catch (err) {
      await this.fail(err);
    }
  }

  // --- Handshake ---

  private async handshake(): Promise<void> {
    // 1. Client connection preface
    if (!(await validatePreface(this.stream))) {
      this.logger.debug(`${this.tag} invalid connection preface`);
      this.close(new ProtocolViolation("Invalid connection preface"));
      return;
    }
    this.prefaceAccepted = true;
    this.transition("awaiting-server-settings-sent");

    // 2. Server SETTINGS
    await this.stream.write(encodeSettings(this.localSettings));
    this.transition("awaiting-client-settings");

    // 3. Client SETTINGS, which must be the first frame
    const header = await this.readHeader();
    if (header.type !== FrameType.SETTINGS) {
      throw new ProtocolViolation(
        `Expected SETTINGS frame, got ${frameTypeName(header.type)}`,
      );
    }
    if (header.flags & FrameFlags.ACK) {
      throw new ProtocolViolation("First client SETTINGS frame must not be an ACK");
    }
    await this.handleSettingsFrame(await this.readPayload(header));
    this.transition("established");
  }

  // --- Frame dispatch ---

  private async processFrame(): Promise<void> {
    const header = await this.readHeader();

    switch (header.type) {
      case FrameType.SETTINGS:
        return this.handleSettingsFrame(await this.readPayload(header));
      case FrameType.WINDOW_UPDATE:
        return this.handleWindowUpdateFrame(await this.readPayload(header));
      case FrameType.HEADERS:
        return this.handleHeadersFrame(await this.readPayload(header));
      case FrameType.GOAWAY:
        return this.handleGoawayFrame(await this.readPayload(header));
      default:
        // Payload is left unread: the connection is going away.
        throw new ProtocolViolation(
          `Unexpected ${frameTypeName(header.type)} frame on stream ${header.streamId}`,
        );
    }
  }

  private async readHeader(): Promise<FrameHeader> {
    return decodeFrameHeader(await this.stream.readExact(FRAME_HEADER_SIZE));
  }

  private async readPayload(header: FrameHeader): Promise<ReceivedFrame> {
    if (header.length > this.maxFrameSize) {
      throw new ProtocolViolation(
        `Frame size ${header.length} exceeds maximum ${this.maxFrameSize}`,
        ErrorCode.FRAME_SIZE_ERROR,
      );
    }
    const payload = await this.stream.readExact(header.length);
    const flags = header.flags.toString(16).padStart(2, "0");
    this.logger.debug(
      `${this.tag} ← ${frameTypeName(header.type)} len=${header.length}` +
        ` flags=0x${flags} stream=${header.streamId}`,
    );
    return { ...header, payload };
  }

  private async handleSettingsFrame(frame: ReceivedFrame): Promise<void> {
    // SETTINGS must be on stream 0 (RFC 7540 Section 6.5)
    if (frame.streamId !== 0) {
      throw new ProtocolViolation(`SETTINGS frame on stream ${frame.streamId}`);
    }

    if (frame.flags & FrameFlags.ACK) {
      // SETTINGS ACK must have empty payload (RFC 7540 Section 6.5)
      if (frame.payload.length !== 0) {
        throw new ProtocolViolation(
          `SETTINGS ACK with ${frame.payload.length}-byte payload`,
          ErrorCode.FRAME_SIZE_ERROR,
        );
      }
      this.emit("settings-ack");
      return;
    }

    for (const [key, value, recognized] of this.settings.applyPayload(frame.payload)) {
      const id = `0x${key.toString(16).padStart(2, "0")}`;
      this.logger.debug(`${this.tag} setting ${id}=${value}${recognized ? "" : " (ignored)"}`);
    }

    await this.stream.write(encodeSettings([], true));
    this.emit("settings", this.settings.snapshot());
  }

  private handleWindowUpdateFrame(frame: ReceivedFrame): void {
    if (frame.payload.length !== 4) {
      throw new ProtocolViolation(
        `WINDOW_UPDATE payload must be 4 bytes, got ${frame.payload.length}`,
        ErrorCode.FRAME_SIZE_ERROR,
      );
    }
    const { streamId } = frame;
    const increment = frame.payload.readUInt32BE(0) & MAX_STREAM_ID;
    const state = streamId === 0 ? "open" : this.streams.get(streamId);
    if (state === "idle") {
      throw new ProtocolViolation(`WINDOW_UPDATE on idle stream ${streamId}`);
    }
    if (state === "closed") {
      // Allowed briefly after END_STREAM (RFC 7540 Section 6.9); nothing to track.
      this.logger.debug(`${this.tag} window increment ${increment} on closed stream ${streamId}`);
      return;
    }
    this.windowIncrements.set(streamId, this.windowIncrement(streamId) + increment);
    this.logger.debug(`${this.tag} window increment ${increment} on stream ${streamId}`);
    this.emit("window-update", { streamId, increment });
  }

  private async handleHeadersFrame(frame: ReceivedFrame): Promise<void> {
    const streamId = frame.streamId;
    const endStream = !!(frame.flags & FrameFlags.END_STREAM);
    this.streams.receiveHeaders(streamId, endStream);

    const headers = await this.decodeHeaderBlock(this.headerBlock(frame));
    for (const [name, value] of headers) {
      this.logger.debug(`${this.tag} [${streamId}] ${name}: ${value}`);
    }

    const request: Http2Request = { streamId, headers };
    this.emit("request", request);

    const response = await this.respond(request);
    await this.responseEncoder.sendResponse(this.stream, streamId, this.settings, response);
    this.streams.close(streamId);
    this.windowIncrements.delete(streamId);
  }

  /** Strip PADDED and PRIORITY fields (RFC 7540 Section 6.2). */
  private headerBlock(frame: ReceivedFrame): Buffer {
    let payload = frame.payload;

    if (frame.flags & FrameFlags.PADDED) {
      if (payload.length < 1) {
        throw new ProtocolViolation("PADDED HEADERS frame without pad length");
      }
      const padLength = payload[0];
      // Validate: padLength must not exceed remaining payload
      if (padLength > payload.length - 1) {
        throw new ProtocolViolation(`Pad length ${padLength} exceeds HEADERS payload`);
      }
      payload = payload.subarray(1, payload.length - padLength);
    }

    if (frame.flags & FrameFlags.PRIORITY) {
      // PRIORITY: 4-byte dependency + 1-byte weight = 5 bytes
      if (payload.length < 5) {
        throw new ProtocolViolation("HEADERS PRIORITY fields truncated");
      }
      payload = payload.subarray(5);
    }

    return payload;
  }

  private async decodeHeaderBlock(block: Buffer): Promise<HeaderField[]> {
    try {
      return await this.decoder.decode(block);
    } catch (err) {
      if (err instanceof DecodeError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new DecodeError(`Header block decode failed: ${reason}`);
    }
  }

  private handleGoawayFrame(frame: ReceivedFrame): void {
    const { payload } = frame;
    const info: GoawayInfo = {
      lastStreamId: payload.length >= 4 ? payload.readUInt32BE(0) & MAX_STREAM_ID : 0,
      errorCode: payload.length >= 8 ? payload.readUInt32BE(4) : ErrorCode.NO_ERROR,
      debugData: payload.length > 8 ? payload.subarray(8) : Buffer.alloc(0),
    };
    this.logger.debug(
      `${this.tag} GOAWAY last_stream_id=${info.lastStreamId} error=${info.errorCode}` +
        (info.debugData.length > 0 ? ` debug=${info.debugData.toString("utf8")}` : ""),
    );
    this.emit("goaway", info);
    // The peer is done with this connection; nothing more is read or written.
    this.close(null);
  }

  // --- Shutdown ---

  /** Report a fatal error to the peer when possible, then close. */
  private async fail(err: unknown): Promise<void> {
    if (this._state === "closed") return;

    const error =
      err instanceof Http2Error
        ? err
        : new Http2Error(
            `Internal error: ${err instanceof Error ? err.message : String(err)}`,
            ErrorCode.INTERNAL_ERROR,
          );
    // EOF or a socket failure: the peer is gone, there is nobody to tell.
    const peerGone = error instanceof TransportError && !this.stream.readable;
    const level = peerGone ? "debug" : "warn";
    this.logger[level](`${this.tag} closing in ${this._state}: ${error.name}: ${error.message}`);

    if (this.sendGoawayOnError && this.prefaceAccepted && !peerGone && this.stream.writable) {
      const goaway = encodeGoaway(this.streams.lastStreamId, error.code, Buffer.from(error.message));
      try {
        await this.stream.write(goaway);
      } catch (writeErr) {
        const reason = writeErr instanceof Error ? writeErr.message : String(writeErr);
        this.logger.debug(`${this.tag} GOAWAY write failed: ${reason}`);
      }
    }

    this.close(error);
  }

  private close(reason: Http2Error | null): void {
    if (this._state === "closed") return;
    this._closeReason = reason;
    this.transition("closed");
    this.stream.close();
    this.emit("close", reason);
  }

  private transition(next: ConnectionState): void {
    const prev = this._state;
    this._state = next;
    this.logger.debug(`${this.tag} state: ${prev} → ${next}`);
    this.emit("state", prev, next);
  }

  private get tag(): string {
    return `[h2:conn#${this.id}]`;
  }
}
