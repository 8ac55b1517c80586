/**
 * Per-stream state, kept apart from the connection-level dispatch loop.
 * Client-initiated stream IDs are odd (1, 3, 5, ...).
 */
import { ErrorCode } from "./constants.js";
import { ProtocolViolation } from "./errors.js";

/** Stream states (RFC 7540 Section 5.1), server side, no push */
export type StreamState = "idle" | "open" | "half-closed-remote" | "closed";

export class StreamTable {
  private states = new Map<number, StreamState>();
  private highestClientStreamId = 0;
  private lastProcessed = 0;

  /** State of a stream. IDs below the highest opened one are closed once done. */
  get(streamId: number): StreamState {
    const state = this.states.get(streamId);
    if (state) return state;
    return streamId !== 0 && streamId <= this.highestClientStreamId ? "closed" : "idle";
  }

  /** Highest stream ID whose request was fully handled (for GOAWAY) */
  get lastStreamId(): number {
    return this.lastProcessed;
  }

  /** Number of streams that are neither idle nor closed */
  get activeCount(): number {
    return this.states.size;
  }

  /**
   * Handle a HEADERS frame that opens a stream.
   * A new client stream ID must be odd; IDs at or below the highest one seen
   * are already closed (RFC 7540 Section 5.1.1).
   */
  receiveHeaders(streamId: number, endStream: boolean): StreamState {
    if (streamId === 0) {
      throw new ProtocolViolation("HEADERS frame on stream 0");
    }
    const current = this.get(streamId);
    if (current === "closed" || current === "half-closed-remote") {
      throw new ProtocolViolation(
        `HEADERS on stream ${streamId} in state ${current}`,
        ErrorCode.STREAM_CLOSED,
      );
    }
    if (current === "idle") {
      if (streamId % 2 === 0) {
        throw new ProtocolViolation(`Client opened even stream ID ${streamId}`);
      }
      this.highestClientStreamId = streamId;
    }
    const next: StreamState = endStream ? "half-closed-remote" : "open";
    this.states.set(streamId, next);
    return next;
  }

  /** Our response (END_STREAM) has been written. */
  close(streamId: number): void {
    this.states.delete(streamId);
    if (streamId > this.lastProcessed) this.lastProcessed = streamId;
  }
}
