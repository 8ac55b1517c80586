/**
 * Builds the reply to one request: a HEADERS frame (END_HEADERS) followed by
 * DATA frame(s), the last carrying END_STREAM. All frames go out in a single
 * write so nothing is left half-sent on the wire.
 */
import { Buffer } from "node:buffer";
import { ErrorCode, DEFAULT_MAX_FRAME_SIZE } from "./constants.js";
import { encodeHeaders, encodeData } from "./framer.js";
import { Http2Error } from "./errors.js";
import { HpackEncoder, type HeaderField } from "./hpack.js";
import type { ByteStream } from "./byte-stream.js";
import type { Settings } from "./settings.js";

/** How the response header block is rendered */
export type HeaderEncoding = "plain" | "hpack";

export interface Http2Response {
  status: number;
  /** Regular headers; `content-length` is added from the body when absent */
  headers?: HeaderField[];
  body?: Buffer | string;
}

export interface ResponseEncoderOptions {
  headerEncoding?: HeaderEncoding;
  /** Largest DATA payload to emit (default: 16384, the protocol minimum) */
  maxFrameSize?: number;
  headerTableSize?: number;
}

/**
 * The canned reply sent when no request handler is configured.
 * content-length is derived from the body, so it is 13 here, not 12.
 */
export function helloWorld(): Http2Response {
  return { status: 200, body: "Hello, world!" };
}

/**
 * Plain-text header block: one `name value` line per field, then an empty
 * line. Not HPACK; only a peer that expects this rendering can read it.
 */
export function renderPlainHeaderBlock(fields: HeaderField[]): Buffer {
  const lines = fields.map(([name, value]) => `${name} ${value}\r\n`);
  return Buffer.from(`${lines.join("")}\r\n`, "latin1");
}

export class ResponseEncoder {
  private headerEncoding: HeaderEncoding;
  private maxFrameSize: number;
  private hpackEncoder: HpackEncoder | null;

  constructor(options: ResponseEncoderOptions = {}) {
    this.headerEncoding = options.headerEncoding ?? "plain";
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.hpackEncoder =
      this.headerEncoding === "hpack" ? new HpackEncoder(options.headerTableSize) : null;
  }

  /** Header fields as they go on the wire, `:status` first. */
  responseFields(response: Http2Response, body: Buffer): HeaderField[] {
    const fields: HeaderField[] = [[":status", String(response.status)]];
    let hasLength = false;
    for (const [name, value] of response.headers ?? []) {
      const lower = name.toLowerCase();
      if (lower === "content-length") hasLength = true;
      fields.push([lower, value]);
    }
    if (!hasLength) fields.push(["content-length", String(body.length)]);
    return fields;
  }

  /** Encode the full HEADERS + DATA sequence without writing it. */
  encode(streamId: number, settings: Settings, response: Http2Response): Buffer[] {
    const body =
      typeof response.body === "string"
        ? Buffer.from(response.body)
        : (response.body ?? Buffer.alloc(0));

    // Without WINDOW_UPDATE accounting the peer's initial window is a hard cap.
    if (body.length > settings.initialWindowSize) {
      throw new Http2Error(
        `Response body of ${body.length} bytes exceeds peer window ${settings.initialWindowSize}`,
        ErrorCode.FLOW_CONTROL_ERROR,
      );
    }

    const fields = this.responseFields(response, body);
    const block = this.hpackEncoder
      ? this.hpackEncoder.encode(fields)
      : renderPlainHeaderBlock(fields);
    const frames = [encodeHeaders(streamId, block, false, true)];

    if (body.length === 0) {
      frames.push(encodeData(streamId, body, true));
      return frames;
    }
    for (let offset = 0; offset < body.length; offset += this.maxFrameSize) {
      const chunk = body.subarray(offset, offset + this.maxFrameSize);
      frames.push(encodeData(streamId, chunk, offset + chunk.length >= body.length));
    }
    return frames;
  }

  async sendResponse(
    stream: ByteStream,
    streamId: number,
    settings: Settings,
    response: Http2Response = helloWorld(),
  ): Promise<void> {
    await stream.writeMulti(this.encode(streamId, settings, response));
  }
}
