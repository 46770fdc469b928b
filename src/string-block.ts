/**
 * String heap trailing the record array.
 *
 * Entries are nul-terminated and addressed by byte offset. Offset 0 is the
 * empty string in well-formed files. New strings are appended to the end of
 * the block; existing bytes are never rewritten.
 */

import { MalformedError } from './errors.js';
import type { StringBlockEncoding } from './types/dbc-store-options.js';

const INITIAL_CAPACITY = 256;

export class StringBlock {
  private bytes: Buffer;
  private length: number;
  /** Offsets of strings located or appended so far, keyed by text. */
  private readonly interned = new Map<string, number>();

  constructor(data: Buffer, private readonly encoding: StringBlockEncoding = 'utf8') {
    this.bytes = Buffer.from(data);
    this.length = data.length;
  }

  get size(): number {
    return this.length;
  }

  /**
   * Reads the nul-terminated string starting at `offset`.
   * @throws {MalformedError} If the offset lies outside the block or the entry is unterminated
   */
  read(offset: number): string {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.length) {
      // An empty block still decodes offset 0 as the empty string.
      if (offset === 0 && this.length === 0) {
        return '';
      }
      throw new MalformedError(`String offset ${offset} is outside the string block (${this.length} bytes)`);
    }
    const end: number = this.bytes.indexOf(0, offset);
    if (end === -1 || end >= this.length) {
      throw new MalformedError(`String at offset ${offset} is not nul-terminated`);
    }
    return this.bytes.toString(this.encoding, offset, end);
  }

  contains(offset: number): boolean {
    return Number.isInteger(offset) && offset >= 0 && offset < this.length;
  }

  /**
   * Returns the offset of `text`, appending it to the block if no existing
   * entry matches. Matching only considers whole entries: an offset into the
   * middle of another string is never reused.
   */
  intern(text: string): number {
    const problem: string | null = this.checkStorable(text);
    if (problem !== null) {
      throw new MalformedError(problem);
    }
    const known: number | undefined = this.interned.get(text) ?? this.find(text);
    if (known !== undefined) {
      this.interned.set(text, known);
      return known;
    }

    const encoded: Buffer = Buffer.from(text, this.encoding);
    const offset: number = this.length;
    this.ensureCapacity(encoded.length + 1);
    encoded.copy(this.bytes, offset);
    this.bytes[offset + encoded.length] = 0;
    this.length += encoded.length + 1;
    this.interned.set(text, offset);
    return offset;
  }

  /**
   * Why `text` cannot be stored as an entry, or `null` if it can. Entries
   * cannot hold a nul and must survive an encode/decode round trip in the
   * block's encoding.
   */
  checkStorable(text: string): string | null {
    if (text.includes('\0')) {
      return 'strings cannot contain nul characters';
    }
    if (Buffer.from(text, this.encoding).toString(this.encoding) !== text) {
      return `${JSON.stringify(text)} cannot be represented in ${this.encoding}`;
    }
    return null;
  }

  /**
   * Current block length, to restore with {@link truncate} if a mutation
   * that interned strings has to be abandoned.
   */
  mark(): number {
    return this.length;
  }

  truncate(length: number): void {
    if (length >= this.length) {
      return;
    }
    this.length = length;
    for (const [text, offset] of this.interned) {
      if (offset >= length) {
        this.interned.delete(text);
      }
    }
  }

  /** Copy of the live bytes. */
  toBuffer(): Buffer {
    return Buffer.from(this.bytes.subarray(0, this.length));
  }

  private find(text: string): number | undefined {
    const needle: Buffer = Buffer.concat([Buffer.from(text, this.encoding), Buffer.alloc(1)]);
    const haystack: Buffer = this.bytes.subarray(0, this.length);
    let from = 0;
    while (from < haystack.length) {
      const hit: number = haystack.indexOf(needle, from);
      if (hit === -1) {
        return undefined;
      }
      if (hit === 0 || haystack[hit - 1] === 0) {
        return hit;
      }
      from = hit + 1;
    }
    return undefined;
  }

  private ensureCapacity(extra: number): void {
    const required: number = this.length + extra;
    if (required <= this.bytes.length) {
      return;
    }
    let capacity: number = Math.max(this.bytes.length, INITIAL_CAPACITY);
    while (capacity < required) {
      capacity *= 2;
    }
    const grown: Buffer = Buffer.alloc(capacity);
    this.bytes.copy(grown, 0, 0, this.length);
    this.bytes = grown;
  }
}
