/**
 * dbc-tools - Main entry point
 *
 * Typed read/modify/write access to DBC binary record database files.
 */

export { DbcStore } from './dbc-store.js';
export { DbcBinary } from './dbc-binary.js';
export type { DbcParseExpectations } from './dbc-binary.js';
export { FieldSchema } from './field-schema.js';
export type { FieldDefinition } from './field-schema.js';

export {
  DbcError,
  TruncatedInputError,
  SchemaMismatchError,
  IndexOutOfRangeError,
  UnknownFieldError,
  DestinationUnwritableError,
  MalformedError,
  InvalidValueError,
  SchemaError,
  DbcIoError,
  DbcStateError,
} from './errors.js';
export type { DbcErrorCode } from './errors.js';

export { DBC_MAGIC, HEADER_SIZE, SLOT_SIZE } from './constants/dbc-layout.js';
export { FIELD_TYPES } from './types/field-type.js';
export type { FieldType } from './types/field-type.js';
export type { FieldValue, DbcValue, DbcRecord, DbcValues } from './types/field-value.js';
export type { DbcHeader } from './types/dbc-header.js';
export type { DbcBinaryStructure } from './types/dbc-binary-structure.js';
export type { DbcStoreOptions, StringBlockEncoding } from './types/dbc-store-options.js';
