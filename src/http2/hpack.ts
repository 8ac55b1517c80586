/**
 * HPACK header compression wrapper.
 *
 * Uses hpack.js low-level API (encoder/decoder + table) directly,
 * bypassing its Duplex stream wrappers so a header block is decoded
 * synchronously and failures surface as a single DecodeError.
 */
import { Buffer } from "node:buffer";
import hpack from "hpack.js";
import type { Encoder, Table, TableEntry } from "hpack.js";
import { DEFAULT_HEADER_TABLE_SIZE } from "./constants.js";
import { DecodeError } from "./errors.js";

/** Header name/value pair, in wire order */
export type HeaderField = [name: string, value: string];

/**
 * Decompression capability consumed by the connection. One instance per
 * connection: HPACK state is connection-scoped.
 */
export interface HeaderDecoder {
  /** Decode one complete header block. Rejects with DecodeError on malformed input. */
  decode(block: Buffer): Promise<HeaderField[]>;
}

/**
 * HPACK encoder: compresses header list into binary block.
 * Uses hpack.js encoder + table directly (no stream wrapper).
 */
export class HpackEncoder {
  private table: Table;

  constructor(tableSize: number = DEFAULT_HEADER_TABLE_SIZE) {
    this.table = hpack.table.create({ maxSize: tableSize });
  }

  encode(headers: HeaderField[]): Buffer {
    const enc = hpack.encoder.create();
    for (const [name, value] of headers) {
      this.encodeHeader(enc, name, value);
    }
    const chunks = enc.render();
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
  }

  /**
   * Headers that should NOT be added to HPACK dynamic table.
   * High-cardinality values waste table space (matches nghttp2 strategy).
   */
  private static readonly NEVER_INDEX = new Set([
    "content-length",
    "content-range",
    "date",
    "last-modified",
    "etag",
    "age",
    "expires",
    "set-cookie",
    "location",
  ]);

  private encodeHeader(enc: Encoder, name: string, value: string): void {
    const index = this.table.reverseLookup(name, value);
    const isIndexed = index > 0;
    const isIncremental = !HpackEncoder.NEVER_INDEX.has(name);

    enc.encodeBit(isIndexed ? 1 : 0);
    if (isIndexed) {
      enc.encodeInt(index);
      return;
    }

    const nameArr = hpack.utils.toArray(name);
    const valueArr = hpack.utils.toArray(value);

    enc.encodeBit(isIncremental ? 1 : 0);
    if (isIncremental) {
      this.table.add(name, value, nameArr.length, valueArr.length);
    } else {
      enc.encodeBit(0); // update = false
      enc.encodeBit(name === "set-cookie" ? 1 : 0); // neverIndex
    }

    enc.encodeInt(-index);
    if (index === 0) {
      enc.encodeStr(nameArr, true); // huffman = true
    }
    enc.encodeStr(valueArr, true); // huffman = true
  }
}

/**
 * HPACK decoder: decompresses binary block into header list.
 * Uses hpack.js decoder + table directly (no Duplex stream wrapper).
 */
export class HpackDecoder implements HeaderDecoder {
  private table: Table;
  private tableSize: number;

  constructor(tableSize: number = DEFAULT_HEADER_TABLE_SIZE) {
    this.tableSize = tableSize;
    this.table = hpack.table.create({ maxSize: tableSize });
  }

  async decode(block: Buffer): Promise<HeaderField[]> {
    try {
      return this.decodeBlock(block);
    } catch (err) {
      if (err instanceof DecodeError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new DecodeError(`HPACK decode failed: ${reason}`);
    }
  }

  private decodeBlock(block: Buffer): HeaderField[] {
    const dec = hpack.decoder.create();
    dec.push(block);

    const headers: HeaderField[] = [];
    // RFC 7541 Section 4.2: dynamic table size updates MUST occur at the
    // beginning of the first header block following a size change.
    let seenNonUpdate = false;

    while (!dec.isEmpty()) {
      if (dec.decodeBit()) {
        // Indexed header field (RFC 7541 Section 6.1)
        seenNonUpdate = true;
        const entry = this.lookup(dec.decodeInt());
        headers.push([entry.name, entry.value]);
        continue;
      }

      const isIncremental = dec.decodeBit();
      if (!isIncremental) {
        if (dec.decodeBit()) {
          // Dynamic table size update (RFC 7541 Section 6.3)
          if (seenNonUpdate) {
            throw new DecodeError(
              "HPACK dynamic table size update must occur at the start of a header block",
            );
          }
          const size = dec.decodeInt();
          if (size > this.tableSize) {
            throw new DecodeError(
              `HPACK dynamic table size update ${size} exceeds limit ${this.tableSize}`,
            );
          }
          this.table.updateSize(size);
          continue;
        }

        // Literal without indexing or never indexed
        seenNonUpdate = true;
        dec.decodeBit(); // neverIndex: only matters when re-encoding
        const index = dec.decodeInt();
        const name =
          index === 0 ? hpack.utils.stringify(dec.decodeStr()) : this.lookup(index).name;
        const value = hpack.utils.stringify(dec.decodeStr());
        headers.push([name, value]);
        continue;
      }

      // Literal with incremental indexing (RFC 7541 Section 6.2.1)
      seenNonUpdate = true;
      const index = dec.decodeInt();

      let name: string;
      let nameSize: number;
      if (index === 0) {
        const nameArr = dec.decodeStr();
        nameSize = nameArr.length;
        name = hpack.utils.stringify(nameArr);
      } else {
        const entry = this.lookup(index);
        nameSize = entry.nameSize;
        name = entry.name;
      }

      const valueArr = dec.decodeStr();
      const value = hpack.utils.stringify(valueArr);

      this.table.add(name, value, nameSize, valueArr.length);
      headers.push([name, value]);
    }

    return headers;
  }

  private lookup(index: number): TableEntry {
    if (index === 0) {
      throw new DecodeError("HPACK index 0 is not a valid table reference");
    }
    const entry = this.table.lookup(index);
    if (!entry) {
      throw new DecodeError(`HPACK index ${index} is out of range`);
    }
    return entry;
  }
}
