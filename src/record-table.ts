/**
 * Fixed-width record storage backed by one contiguous, growable buffer.
 *
 * Slots are kept as their raw 4-byte little-endian encoding; typing is
 * applied by the caller through the schema.
 */

import { SLOT_SIZE } from './constants/dbc-layout.js';

export class RecordTable {
  private buffer: Buffer;
  private count: number;
  readonly stride: number;

  constructor(readonly fieldCount: number, data: Buffer = Buffer.alloc(0)) {
    this.stride = fieldCount * SLOT_SIZE;
    if (this.stride > 0 && data.length % this.stride !== 0) {
      throw new RangeError(`Record data of ${data.length} bytes is not a multiple of the ${this.stride}-byte stride`);
    }
    this.buffer = Buffer.from(data);
    this.count = this.stride === 0 ? 0 : data.length / this.stride;
  }

  get length(): number {
    return this.count;
  }

  readSlot(record: number, slot: number): number {
    return this.buffer.readUInt32LE(this.slotOffset(record, slot));
  }

  writeSlot(record: number, slot: number, raw: number): void {
    this.buffer.writeUInt32LE(raw >>> 0, this.slotOffset(record, slot));
  }

  /** Copy of one record's bytes. */
  readRecord(record: number): Buffer {
    const start: number = record * this.stride;
    return Buffer.from(this.buffer.subarray(start, start + this.stride));
  }

  writeRecord(record: number, bytes: Buffer): void {
    if (bytes.length !== this.stride) {
      throw new RangeError(`Record must be ${this.stride} bytes, got ${bytes.length}`);
    }
    bytes.copy(this.buffer, record * this.stride);
  }

  /** Appends a zero-filled record and returns its index. */
  append(): number {
    this.ensureCapacity(this.count + 1);
    const index: number = this.count;
    this.buffer.fill(0, index * this.stride, (index + 1) * this.stride);
    this.count += 1;
    return index;
  }

  /** Removes a record, shifting every later record down by one. */
  remove(record: number): void {
    const start: number = record * this.stride;
    const end: number = this.count * this.stride;
    this.buffer.copyWithin(start, start + this.stride, end);
    this.count -= 1;
  }

  /** Copy of the live record bytes, ready to be written after the header. */
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.count * this.stride));
  }

  private slotOffset(record: number, slot: number): number {
    return record * this.stride + slot * SLOT_SIZE;
  }

  private ensureCapacity(records: number): void {
    const required: number = records * this.stride;
    if (required <= this.buffer.length) {
      return;
    }
    const grown: Buffer = Buffer.alloc(Math.max(required, this.buffer.length * 2));
    this.buffer.copy(grown, 0, 0, this.count * this.stride);
    this.buffer = grown;
  }
}
