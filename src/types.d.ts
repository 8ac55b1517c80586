/** Type declarations for modules without types */

declare module "hpack.js" {
  export interface TableEntry {
    name: string;
    value: string;
    nameSize: number;
    totalSize: number;
  }

  export interface Table {
    /** 1-based index into static + dynamic table */
    lookup(index: number): TableEntry | undefined;
    /** > 0 full match, < 0 name-only match, 0 not found */
    reverseLookup(name: string, value: string): number;
    add(name: string, value: string, nameSize: number, valueSize: number): void;
    updateSize(size: number): void;
  }

  export interface Decoder {
    push(chunk: Buffer): void;
    isEmpty(): boolean;
    decodeBit(): number;
    decodeInt(): number;
    decodeStr(): number[];
  }

  export interface Encoder {
    encodeBit(bit: number): void;
    encodeInt(num: number): void;
    encodeStr(value: number[], huffman: boolean): void;
    render(): Buffer[];
  }

  export interface Utils {
    toArray(str: string): number[];
    stringify(arr: number[]): string;
  }

  export interface Hpack {
    table: { create(options: { maxSize: number }): Table };
    decoder: { create(): Decoder };
    encoder: { create(): Encoder };
    utils: Utils;
  }

  const hpack: Hpack;
  export default hpack;
}
