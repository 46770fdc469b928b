/**
 * Decoded 20-byte DBC header.
 */
export interface DbcHeader {
  /** Format tag as four latin1 characters. */
  readonly magic: string;
  readonly recordCount: number;
  readonly fieldCount: number;
  /** Carried over from the source file, never recomputed. */
  readonly recordSize: number;
  readonly stringBlockSize: number;
}
