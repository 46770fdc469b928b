/**
 * Raw sections of a DBC file, split but not yet decoded.
 */
import type { DbcHeader } from './dbc-header.js';

export interface DbcBinaryStructure {
  readonly header: DbcHeader;
  /** recordCount × fieldCount × 4 bytes. */
  readonly records: Buffer;
  readonly stringBlock: Buffer;
}
