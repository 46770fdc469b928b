import { afterEach, describe, it, expect, vi } from 'vitest';
import { DbcBinary } from '../src/dbc-binary.js';
import { MalformedError, SchemaMismatchError, TruncatedInputError } from '../src/errors.js';
import { buildDbc, itemRecords } from './helpers.js';

describe('DbcBinary.parse', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('splits a file into header, records and string block', () => {
    const buffer = buildDbc({ fieldCount: 8, records: itemRecords, strings: '\0abc\0' });
    const structure = DbcBinary.parse({ buffer });
    expect(structure.header).toEqual({
      magic: 'WDBC',
      recordCount: 3,
      fieldCount: 8,
      recordSize: 32,
      stringBlockSize: 5,
    });
    expect(structure.records.length).toBe(96);
    expect(structure.records.readUInt32LE(0)).toBe(32837);
    expect(structure.stringBlock.toString('utf8')).toBe('\0abc\0');
  });

  it('rejects a buffer shorter than the header', () => {
    let caught: unknown;
    try {
      DbcBinary.parse({ buffer: Buffer.alloc(10) });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TruncatedInputError);
    expect(caught).toMatchObject({ expectedBytes: 20, actualBytes: 10, code: 'TRUNCATED_INPUT' });
  });

  it('rejects a truncated record array', () => {
    const buffer = buildDbc({ fieldCount: 8, records: itemRecords }).subarray(0, 70);
    expect(() => DbcBinary.parse({ buffer })).toThrow(TruncatedInputError);
  });

  it('rejects a truncated string block', () => {
    const full = buildDbc({ fieldCount: 8, records: itemRecords, strings: '\0abc\0' });
    expect(() => DbcBinary.parse({ buffer: full.subarray(0, full.length - 1) })).toThrow('String block extends beyond file bounds');
  });

  it('checks expected header values before section lengths', () => {
    const buffer = buildDbc({ fieldCount: 8, records: itemRecords });
    buffer.writeUInt32LE(10, 8);
    expect(() => DbcBinary.parse({ buffer })).toThrow(TruncatedInputError);
    expect(() => DbcBinary.parse({ buffer, expect: { fieldCount: 8 } })).toThrow(SchemaMismatchError);
    expect(() => DbcBinary.parse({ buffer, expect: { magic: 'WDB2', fieldCount: 8 } })).toThrow(MalformedError);
  });

  it('warns about trailing bytes and a disagreeing record size', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const buffer = buildDbc({ fieldCount: 8, records: itemRecords, recordSize: 36, trailing: 3 });
    const structure = DbcBinary.parse({ buffer, filePath: 'Item.dbc' });
    expect(structure.header.recordSize).toBe(36);
    expect(structure.stringBlock.length).toBe(1);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('Item.dbc: ignoring 3 trailing bytes after the string block');
  });
});

describe('DbcBinary.serialize', () => {
  it('reproduces the parsed bytes', () => {
    const buffer = buildDbc({ fieldCount: 8, records: itemRecords, strings: '\0abc\0' });
    expect(DbcBinary.serialize({ structure: DbcBinary.parse({ buffer }) })).toEqual(buffer);
  });

  it('refuses sections that disagree with the header', () => {
    const structure = DbcBinary.parse({ buffer: buildDbc({ fieldCount: 8, records: itemRecords }) });
    expect(() => DbcBinary.serialize({ structure: { ...structure, stringBlock: Buffer.alloc(4) } })).toThrow(MalformedError);
    expect(() => DbcBinary.serialize({ structure: { ...structure, records: Buffer.alloc(8) } })).toThrow(MalformedError);
    expect(() => DbcBinary.serialize({ structure: { ...structure, header: { ...structure.header, magic: 'WDB' } } })).toThrow('Header magic must be 4 bytes, got 3');
  });
});
