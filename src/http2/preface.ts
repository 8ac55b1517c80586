/**
 * Client connection preface check (RFC 7540 Section 3.5).
 */
import { Buffer } from "node:buffer";
import { CONNECTION_PREFACE } from "./constants.js";
import type { ByteStream } from "./byte-stream.js";
import { TransportError } from "./errors.js";

/** Byte-for-byte comparison against the 24-byte preface. */
export function isConnectionPreface(bytes: Buffer): boolean {
  return bytes.equals(CONNECTION_PREFACE);
}

/**
 * Read exactly 24 bytes and check them. A short read, EOF, read timeout or
 * socket error counts as an invalid preface.
 */
export async function validatePreface(stream: ByteStream): Promise<boolean> {
  let received: Buffer;
  try {
    received = await stream.readExact(CONNECTION_PREFACE.length);
  } catch (err) {
    if (err instanceof TransportError) return false;
    throw err;
  }
  return isConnectionPreface(received);
}
