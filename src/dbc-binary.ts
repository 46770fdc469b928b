/**
 * DBC binary helpers: splitting a file image into header, record array and
 * string block, and assembling one back.
 */
import { access, readFile, stat, writeFile } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  HEADER_SIZE,
  MAGIC_LENGTH,
  OFFSET_FIELD_COUNT,
  OFFSET_MAGIC,
  OFFSET_RECORD_COUNT,
  OFFSET_RECORD_SIZE,
  OFFSET_STRING_BLOCK_SIZE,
  SLOT_SIZE,
} from './constants/dbc-layout.js';
import { DbcIoError, DestinationUnwritableError, MalformedError, SchemaMismatchError, TruncatedInputError } from './errors.js';
import type { DbcBinaryStructure } from './types/dbc-binary-structure.js';
import type { DbcHeader } from './types/dbc-header.js';

/**
 * Decodes the 20-byte header.
 * @throws {TruncatedInputError} If the buffer is shorter than a header
 */
function readHeader(buffer: Buffer, filePath: string): DbcHeader {
  if (buffer.length < HEADER_SIZE) {
    throw new TruncatedInputError(`File too small to hold a DBC header: ${filePath}`, HEADER_SIZE, buffer.length);
  }
  return {
    magic: buffer.toString('latin1', OFFSET_MAGIC, OFFSET_MAGIC + MAGIC_LENGTH),
    recordCount: buffer.readUInt32LE(OFFSET_RECORD_COUNT),
    fieldCount: buffer.readUInt32LE(OFFSET_FIELD_COUNT),
    recordSize: buffer.readUInt32LE(OFFSET_RECORD_SIZE),
    stringBlockSize: buffer.readUInt32LE(OFFSET_STRING_BLOCK_SIZE),
  };
}

function writeHeader(buffer: Buffer, header: DbcHeader): void {
  const magic: Buffer = Buffer.from(header.magic, 'latin1');
  if (magic.length !== MAGIC_LENGTH) {
    throw new MalformedError(`Header magic must be ${MAGIC_LENGTH} bytes, got ${magic.length}`);
  }
  magic.copy(buffer, OFFSET_MAGIC);
  buffer.writeUInt32LE(header.recordCount, OFFSET_RECORD_COUNT);
  buffer.writeUInt32LE(header.fieldCount, OFFSET_FIELD_COUNT);
  buffer.writeUInt32LE(header.recordSize, OFFSET_RECORD_SIZE);
  buffer.writeUInt32LE(header.stringBlockSize, OFFSET_STRING_BLOCK_SIZE);
}

/**
 * Header expectations checked before any section is sized.
 */
export interface DbcParseExpectations {
  /** Required magic tag; `null` or omitted accepts any. */
  readonly magic?: string | null;
  /** Required field count, normally the schema's. */
  readonly fieldCount?: number;
}

function checkHeader(header: DbcHeader, filePath: string, expect: DbcParseExpectations): void {
  if (expect.magic !== undefined && expect.magic !== null && header.magic !== expect.magic) {
    throw new MalformedError(`Invalid DBC magic in ${filePath}: expected ${JSON.stringify(expect.magic)}, got ${JSON.stringify(header.magic)}`);
  }
  if (expect.fieldCount !== undefined && header.fieldCount !== expect.fieldCount) {
    throw new SchemaMismatchError(expect.fieldCount, header.fieldCount);
  }
}

/**
 * Splits a full file image into its sections.
 *
 * Record boundaries follow `fieldCount`; a disagreeing `recordSize` only
 * earns a warning, as does trailing data after the string block.
 *
 * @throws {MalformedError} If the magic tag is not the expected one
 * @throws {SchemaMismatchError} If the field count is not the expected one
 * @throws {TruncatedInputError} If any section extends past the end of the buffer
 */
function parseStructure(buffer: Buffer, filePath: string, expect: DbcParseExpectations): DbcBinaryStructure {
  const header: DbcHeader = readHeader(buffer, filePath);
  checkHeader(header, filePath, expect);
  const recordBytes: number = header.recordCount * header.fieldCount * SLOT_SIZE;
  const recordsEnd: number = HEADER_SIZE + recordBytes;
  if (recordsEnd > buffer.length) {
    throw new TruncatedInputError(
      `Record array extends beyond file bounds: ${header.recordCount} records of ${header.fieldCount} fields, fileSize=${buffer.length}`,
      recordsEnd,
      buffer.length
    );
  }
  const stringsEnd: number = recordsEnd + header.stringBlockSize;
  if (stringsEnd > buffer.length) {
    throw new TruncatedInputError(
      `String block extends beyond file bounds: offset=${recordsEnd}, size=${header.stringBlockSize}, fileSize=${buffer.length}`,
      stringsEnd,
      buffer.length
    );
  }

  if (header.recordSize !== header.fieldCount * SLOT_SIZE) {
    console.warn(`${filePath}: header record size ${header.recordSize} disagrees with ${header.fieldCount} fields of ${SLOT_SIZE} bytes`);
  }
  if (stringsEnd < buffer.length) {
    console.warn(`${filePath}: ignoring ${buffer.length - stringsEnd} trailing bytes after the string block`);
  }

  return {
    header,
    records: buffer.subarray(HEADER_SIZE, recordsEnd),
    stringBlock: buffer.subarray(recordsEnd, stringsEnd),
  };
}

/**
 * Assembles a file image. Section lengths must agree with the header.
 */
function serializeStructure(structure: DbcBinaryStructure): Buffer {
  const { header, records, stringBlock } = structure;
  if (records.length !== header.recordCount * header.fieldCount * SLOT_SIZE) {
    throw new MalformedError(`Record data is ${records.length} bytes but header declares ${header.recordCount} records of ${header.fieldCount} fields`);
  }
  if (stringBlock.length !== header.stringBlockSize) {
    throw new MalformedError(`String block is ${stringBlock.length} bytes but header declares ${header.stringBlockSize}`);
  }

  const buffer: Buffer = Buffer.alloc(HEADER_SIZE + records.length + stringBlock.length);
  writeHeader(buffer, header);
  records.copy(buffer, HEADER_SIZE);
  stringBlock.copy(buffer, HEADER_SIZE + records.length);
  return buffer;
}

/**
 * Confirms the destination's directory exists and can be written to, and that
 * the path itself is not a directory, before anything is opened for writing.
 */
async function ensureWritable(outputPath: string): Promise<void> {
  const target: string = resolve(outputPath);
  try {
    const directory = await stat(dirname(target));
    if (!directory.isDirectory()) {
      throw new DestinationUnwritableError(outputPath);
    }
    await access(dirname(target), fsConstants.W_OK);
  } catch (error) {
    if (error instanceof DestinationUnwritableError) {
      throw error;
    }
    throw new DestinationUnwritableError(outputPath, error);
  }

  const existing = await stat(target).catch((error: unknown) => {
    if (isNotFound(error)) {
      return null;
    }
    throw new DestinationUnwritableError(outputPath, error);
  });
  if (existing === null) {
    return;
  }
  if (existing.isDirectory()) {
    throw new DestinationUnwritableError(outputPath);
  }
  await access(target, fsConstants.W_OK).catch((error: unknown) => {
    throw new DestinationUnwritableError(outputPath, error);
  });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * DBC binary file utilities.
 */
export class DbcBinary {
  /**
   * Reads a DBC file from disk and splits it into sections.
   *
   * @throws {DbcIoError} If the file cannot be read
   * @throws {MalformedError} If the magic tag is not the expected one
   * @throws {SchemaMismatchError} If the field count is not the expected one
   * @throws {TruncatedInputError} If the file is shorter than its header declares
   */
  static async read({ filePath, expect = {} }: { readonly filePath: string; readonly expect?: DbcParseExpectations }): Promise<DbcBinaryStructure> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new DbcIoError(`Could not open file: ${filePath}`, error);
    }
    return parseStructure(buffer, filePath, expect);
  }

  /**
   * Writes a DBC structure to disk.
   *
   * @throws {DestinationUnwritableError} If the destination cannot be created or written
   */
  static async write({ structure, outputPath }: { readonly structure: DbcBinaryStructure; readonly outputPath: string }): Promise<void> {
    const buffer: Buffer = serializeStructure(structure);
    await ensureWritable(outputPath);
    try {
      await writeFile(outputPath, buffer);
    } catch (error) {
      throw new DestinationUnwritableError(outputPath, error);
    }
  }

  static parse({ buffer, filePath = '<buffer>', expect = {} }: {
    readonly buffer: Buffer;
    readonly filePath?: string;
    readonly expect?: DbcParseExpectations;
  }): DbcBinaryStructure {
    return parseStructure(buffer, filePath, expect);
  }

  static serialize({ structure }: { readonly structure: DbcBinaryStructure }): Buffer {
    return serializeStructure(structure);
  }
}
