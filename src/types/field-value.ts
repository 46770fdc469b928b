/**
 * Decoded slot contents, tagged with the logical type of the slot.
 */
export type FieldValue =
  | { readonly type: 'uint32'; readonly value: number }
  | { readonly type: 'int32'; readonly value: number }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'string'; readonly value: string; readonly offset: number };

/** Plain value of a decoded field as handed to callers. */
export type DbcValue = number | string;

/** One decoded record: field name to value, in schema order. */
export type DbcRecord = Record<string, DbcValue>;

/**
 * Values accepted when writing a record. String fields take either the text
 * itself or an existing string block offset.
 */
export type DbcValues = Readonly<Record<string, DbcValue>>;
