/**
 * Mutable in-memory view of a DBC file.
 *
 * A store is bound to a path and a caller-supplied schema. `read()` loads the
 * file, the CRUD methods edit the decoded copy, and `write()` / `writeTo()`
 * serialize it back. String fields keep referencing the loaded string block;
 * strings not already present are appended to it.
 */

import { DBC_MAGIC, SLOT_SIZE } from './constants/dbc-layout.js';
import { DbcBinary } from './dbc-binary.js';
import { DbcStateError, IndexOutOfRangeError } from './errors.js';
import { decodeSlot, encodeValue, normalizeForField } from './field-codec.js';
import { FieldSchema, type FieldDefinition } from './field-schema.js';
import { RecordTable } from './record-table.js';
import { StringBlock } from './string-block.js';
import type { DbcBinaryStructure } from './types/dbc-binary-structure.js';
import type { DbcHeader } from './types/dbc-header.js';
import type { DbcStoreOptions, StringBlockEncoding } from './types/dbc-store-options.js';
import type { DbcRecord, DbcValue, DbcValues, FieldValue } from './types/field-value.js';

interface LoadedState {
  readonly magic: string;
  readonly recordSize: number;
  readonly records: RecordTable;
  readonly strings: StringBlock;
}

export class DbcStore {
  private state: LoadedState | null = null;
  private readonly expectedMagic: string | null;
  private readonly encoding: StringBlockEncoding;

  constructor(
    readonly filePath: string,
    readonly schema: FieldSchema,
    options: DbcStoreOptions = {}
  ) {
    this.expectedMagic = options.magic === undefined ? DBC_MAGIC : options.magic;
    this.encoding = options.encoding ?? 'utf8';
  }

  /**
   * Creates a store and loads `filePath` into it.
   */
  static async open(filePath: string, schema: FieldSchema, options?: DbcStoreOptions): Promise<DbcStore> {
    const store = new DbcStore(filePath, schema, options);
    await store.read();
    return store;
  }

  get loaded(): boolean {
    return this.state !== null;
  }

  /**
   * Replaces the loaded state with the contents of the store's file.
   * The previous state is kept if anything fails.
   *
   * @throws {DbcIoError} If the file cannot be read
   * @throws {TruncatedInputError} If the file ends early
   * @throws {MalformedError} If the magic tag is not the expected one
   * @throws {SchemaMismatchError} If the file's field count differs from the schema's
   */
  async read(): Promise<void> {
    const structure: DbcBinaryStructure = await DbcBinary.read({
      filePath: this.filePath,
      expect: { magic: this.expectedMagic, fieldCount: this.schema.fieldCount },
    });
    const { header } = structure;

    this.state = {
      magic: header.magic,
      recordSize: header.recordSize,
      records: new RecordTable(header.fieldCount, structure.records),
      strings: new StringBlock(structure.stringBlock, this.encoding),
    };
  }

  /**
   * Writes the current state back to the path the store was opened with.
   */
  async write(): Promise<void> {
    await this.writeTo(this.filePath);
  }

  /**
   * Writes the current state to `outputPath`. Store state is not modified.
   *
   * @throws {DestinationUnwritableError} If the destination directory is missing or not writable
   */
  async writeTo(outputPath: string): Promise<void> {
    await DbcBinary.write({ structure: this.toStructure(), outputPath });
  }

  /** Serializes the current state to a file image without touching disk. */
  toBuffer(): Buffer {
    return DbcBinary.serialize({ structure: this.toStructure() });
  }

  get header(): DbcHeader {
    const state: LoadedState = this.requireState();
    return {
      magic: state.magic,
      recordCount: state.records.length,
      fieldCount: this.schema.fieldCount,
      recordSize: state.recordSize,
      stringBlockSize: state.strings.size,
    };
  }

  get recordCount(): number {
    return this.requireState().records.length;
  }

  /**
   * Decodes the record at `index`.
   *
   * @throws {IndexOutOfRangeError} If there is no such record
   * @throws {MalformedError} If a string field points outside the string block
   */
  getRecord(index: number): DbcRecord {
    const state: LoadedState = this.requireState();
    this.checkIndex(state, index);
    return this.decodeRecord(state, index);
  }

  /**
   * Decodes a single field of the record at `index`, with its type tag.
   */
  getField(index: number, field: string): FieldValue {
    const state: LoadedState = this.requireState();
    this.checkIndex(state, index);
    const definition: FieldDefinition = this.schema.field(field);
    return decodeSlot(definition, state.records.readSlot(index, definition.index), state.strings);
  }

  /**
   * Every record whose `field` decodes to `value`, in storage order.
   *
   * @throws {UnknownFieldError} If the schema has no such field
   */
  findBy(field: string, value: DbcValue): DbcRecord[] {
    const state: LoadedState = this.requireState();
    const definition: FieldDefinition = this.schema.field(field);
    const wanted: DbcValue = normalizeForField(definition, value);
    const matches: DbcRecord[] = [];
    for (let index = 0; index < state.records.length; index++) {
      const current: FieldValue = decodeSlot(definition, state.records.readSlot(index, definition.index), state.strings);
      if (current.value === wanted) {
        matches.push(this.decodeRecord(state, index));
      }
    }
    return matches;
  }

  *records(): IterableIterator<DbcRecord> {
    const state: LoadedState = this.requireState();
    for (let index = 0; index < state.records.length; index++) {
      yield this.decodeRecord(state, index);
    }
  }

  /**
   * Appends a zero-filled record.
   * @returns Index of the new record
   */
  createRecord(): number {
    return this.requireState().records.append();
  }

  /**
   * Appends a record initialized from `values`. Fields left out stay zero.
   * Nothing is appended if any name or value is rejected.
   *
   * @throws {UnknownFieldError} If a name is not in the schema
   * @throws {InvalidValueError} If a value does not fit its field
   */
  createRecordWithValues(values: DbcValues): number {
    const state: LoadedState = this.requireState();
    const encoded: Buffer = this.encodeRecord(state, Buffer.alloc(this.schema.recordSize), values);
    const index: number = state.records.append();
    state.records.writeRecord(index, encoded);
    return index;
  }

  /**
   * @throws {IndexOutOfRangeError} If there is no such record
   * @throws {UnknownFieldError} If the schema has no such field
   * @throws {InvalidValueError} If the value does not fit the field
   */
  updateRecord(index: number, field: string, value: DbcValue): void {
    this.updateRecordMulti(index, { [field]: value });
  }

  /**
   * Applies several field updates to one record. Either every update is
   * applied or, if any name or value is rejected, none is.
   *
   * @throws {IndexOutOfRangeError} If there is no such record
   * @throws {UnknownFieldError} If a name is not in the schema
   * @throws {InvalidValueError} If a value does not fit its field
   */
  updateRecordMulti(index: number, values: DbcValues): void {
    const state: LoadedState = this.requireState();
    this.checkIndex(state, index);
    const encoded: Buffer = this.encodeRecord(state, state.records.readRecord(index), values);
    state.records.writeRecord(index, encoded);
  }

  /**
   * Removes a record; later records shift down by one.
   *
   * @throws {IndexOutOfRangeError} If there is no such record
   */
  deleteRecord(index: number): void {
    const state: LoadedState = this.requireState();
    this.checkIndex(state, index);
    state.records.remove(index);
  }

  private requireState(): LoadedState {
    if (this.state === null) {
      throw new DbcStateError(`No data loaded for ${this.filePath}; call read() first`);
    }
    return this.state;
  }

  private checkIndex(state: LoadedState, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= state.records.length) {
      throw new IndexOutOfRangeError(index, state.records.length);
    }
  }

  private decodeRecord(state: LoadedState, index: number): DbcRecord {
    const record: DbcRecord = {};
    for (const field of this.schema) {
      record[field.name] = decodeSlot(field, state.records.readSlot(index, field.index), state.strings).value;
    }
    return record;
  }

  /**
   * Encodes `values` over a scratch copy of a record. Names are all checked
   * before any value is encoded; strings interned along the way are dropped
   * again if a later value is rejected.
   */
  private encodeRecord(state: LoadedState, base: Buffer, values: DbcValues): Buffer {
    const updates: [FieldDefinition, DbcValue][] = Object.entries(values).map(
      ([name, value]: [string, DbcValue]): [FieldDefinition, DbcValue] => [this.schema.field(name), value]
    );

    const mark: number = state.strings.mark();
    try {
      for (const [field, value] of updates) {
        base.writeUInt32LE(encodeValue(field, value, state.strings) >>> 0, field.index * SLOT_SIZE);
      }
    } catch (error) {
      state.strings.truncate(mark);
      throw error;
    }
    return base;
  }

  private toStructure(): DbcBinaryStructure {
    const state: LoadedState = this.requireState();
    return {
      header: this.header,
      records: state.records.toBuffer(),
      stringBlock: state.strings.toBuffer(),
    };
  }
}
