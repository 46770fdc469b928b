/**
 * Error classes raised by DBC file operations.
 */

export type DbcErrorCode =
  | 'TRUNCATED_INPUT'
  | 'SCHEMA_MISMATCH'
  | 'INDEX_OUT_OF_RANGE'
  | 'UNKNOWN_FIELD'
  | 'DESTINATION_UNWRITABLE'
  | 'MALFORMED'
  | 'INVALID_VALUE'
  | 'INVALID_SCHEMA'
  | 'IO_ERROR'
  | 'NOT_LOADED';

/**
 * Base class for every error thrown by this package.
 */
export class DbcError extends Error {
  constructor(message: string, public readonly code: DbcErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DbcError';
  }
}

/** The file ends before the header, record array or string block does. */
export class TruncatedInputError extends DbcError {
  constructor(
    message: string,
    public readonly expectedBytes: number,
    public readonly actualBytes: number
  ) {
    super(message, 'TRUNCATED_INPUT');
    this.name = 'TruncatedInputError';
  }
}

export class SchemaMismatchError extends DbcError {
  constructor(public readonly schemaFieldCount: number, public readonly fileFieldCount: number) {
    super(`Schema defines ${schemaFieldCount} fields but file header declares ${fileFieldCount}`, 'SCHEMA_MISMATCH');
    this.name = 'SchemaMismatchError';
  }
}

export class IndexOutOfRangeError extends DbcError {
  constructor(public readonly index: number, public readonly recordCount: number) {
    const range: string = recordCount > 0 ? `0..${recordCount - 1}` : 'none, store is empty';
    super(`Invalid record index ${index} (valid: ${range})`, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRangeError';
  }
}

export class UnknownFieldError extends DbcError {
  constructor(public readonly field: string) {
    super(`Invalid field name: ${field}`, 'UNKNOWN_FIELD');
    this.name = 'UnknownFieldError';
  }
}

export class DestinationUnwritableError extends DbcError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Could not open file for writing: ${path}`, 'DESTINATION_UNWRITABLE', cause);
    this.name = 'DestinationUnwritableError';
  }
}

/** Structurally invalid content, such as a bad magic tag or a string offset past the block. */
export class MalformedError extends DbcError {
  constructor(message: string) {
    super(message, 'MALFORMED');
    this.name = 'MalformedError';
  }
}

export class InvalidValueError extends DbcError {
  constructor(public readonly field: string, message: string) {
    super(`Invalid value for field ${field}: ${message}`, 'INVALID_VALUE');
    this.name = 'InvalidValueError';
  }
}

export class SchemaError extends DbcError {
  constructor(message: string) {
    super(message, 'INVALID_SCHEMA');
    this.name = 'SchemaError';
  }
}

export class DbcIoError extends DbcError {
  constructor(message: string, cause?: unknown) {
    super(message, 'IO_ERROR', cause);
    this.name = 'DbcIoError';
  }
}

export class DbcStateError extends DbcError {
  constructor(message: string) {
    super(message, 'NOT_LOADED');
    this.name = 'DbcStateError';
  }
}
