/**
 * Pull-style reader/writer over a Node.js Duplex.
 *
 * The dispatcher works one frame at a time: it asks for exactly N bytes and
 * suspends until they are buffered. Incoming chunks are queued the same way
 * the frame parser used to queue them; readExact() consumes from the queue.
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import { TransportError } from "./errors.js";

export interface ByteStreamOptions {
  /** Deadline for a single readExact() in ms; 0 or undefined disables it */
  readTimeout?: number;
}

interface PendingRead {
  size: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | undefined;
}

export class ByteStream {
  private socket: Duplex;
  private chunks: Buffer[] = [];
  private bufferLength = 0;
  private pending: PendingRead | null = null;
  private readTimeout: number;

  private ended = false;
  private failure: Error | null = null;
  private closed = false;

  constructor(socket: Duplex, options: ByteStreamOptions = {}) {
    this.socket = socket;
    this.readTimeout = options.readTimeout ?? 0;

    this.socket.on("data", (chunk: Buffer | Uint8Array) => {
      if (this.closed) return;
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      if (buf.length === 0) return;
      this.chunks.push(buf);
      this.bufferLength += buf.length;
      this.settle();
    });
    this.socket.on("end", () => {
      this.ended = true;
      this.settle();
    });
    this.socket.on("error", (err: Error) => {
      this.failure = err;
      this.settle();
    });
    this.socket.on("close", () => {
      this.ended = true;
      this.settle();
    });
  }

  /** Bytes received but not yet consumed */
  get buffered(): number {
    return this.bufferLength;
  }

  /** False once the peer has ended its side or the socket has failed */
  get readable(): boolean {
    return !this.ended && this.failure === null;
  }

  /** Whether frames can still be written to the peer */
  get writable(): boolean {
    return !this.closed && this.socket.writable && !this.socket.destroyed;
  }

  /**
   * Resolve with exactly `size` bytes. Rejects with TransportError when the
   * peer ends the stream first, the socket errors, or the deadline passes.
   */
  readExact(size: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error("readExact() called while another read is pending"));
    }
    if (size === 0) return Promise.resolve(Buffer.alloc(0));

    return new Promise<Buffer>((resolve, reject) => {
      const pending: PendingRead = { size, resolve, reject, timer: undefined };
      if (this.readTimeout > 0) {
        pending.timer = setTimeout(() => {
          if (this.pending !== pending) return;
          this.pending = null;
          reject(new TransportError(`Read timed out after ${this.readTimeout}ms`));
        }, this.readTimeout);
      }
      this.pending = pending;
      this.settle();
    });
  }

  /** Write one buffer; resolves once the socket has flushed it. */
  write(data: Buffer): Promise<void> {
    return this.writeMulti([data]);
  }

  /** Write multiple frames as a single socket.write(). */
  writeMulti(frames: Buffer[]): Promise<void> {
    if (frames.length === 0) return Promise.resolve();
    if (!this.writable) {
      return Promise.reject(new TransportError("Socket is not writable"));
    }
    const merged = frames.length === 1 ? frames[0] : Buffer.concat(frames);
    return new Promise((resolve, reject) => {
      this.socket.write(merged, (err?: Error | null) => {
        if (err) reject(new TransportError(`Write failed: ${err.message}`));
        else resolve();
      });
    });
  }

  /**
   * Fail any pending read, drop buffered and later input, and release the
   * socket once queued writes have flushed. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.ended = true;
    this.chunks = [];
    this.bufferLength = 0;
    this.settle();
    this.socket.end(() => this.socket.destroy());
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.bufferLength >= pending.size) {
      this.finish(pending);
      pending.resolve(this.read(pending.size));
      return;
    }

    if (this.failure) {
      this.finish(pending);
      pending.reject(new TransportError(`Socket error: ${this.failure.message}`));
    } else if (this.ended) {
      this.finish(pending);
      pending.reject(
        new TransportError(
          `Stream ended after ${this.bufferLength} of ${pending.size} expected bytes`,
        ),
      );
    }
  }

  private finish(pending: PendingRead): void {
    clearTimeout(pending.timer);
    this.pending = null;
  }

  /**
   * Consume `size` bytes from the chunks queue.
   * Assumes `this.bufferLength >= size`.
   */
  private read(size: number): Buffer {
    // Optimization: if first chunk has enough data
    if (this.chunks[0].length >= size) {
      const chunk = this.chunks[0];
      // Copy to avoid consumers mutating the original buffer
      const ret = Buffer.from(chunk.subarray(0, size));
      if (chunk.length === size) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(size);
      }
      this.bufferLength -= size;
      return ret;
    }

    // Slow path: spans multiple chunks
    const ret = Buffer.allocUnsafe(size);
    let copied = 0;
    while (copied < size) {
      const chunk = this.chunks[0];
      const len = Math.min(chunk.length, size - copied);
      chunk.copy(ret, copied, 0, len);
      copied += len;
      if (len === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(len);
      }
    }
    this.bufferLength -= size;
    return ret;
  }
}
