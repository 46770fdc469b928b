/**
 * Logical type of a record slot. The on-disk slot is always 4 bytes.
 */
export type FieldType = 'uint32' | 'int32' | 'float' | 'string';

export const FIELD_TYPES: readonly FieldType[] = ['uint32', 'int32', 'float', 'string'];

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && (FIELD_TYPES as readonly string[]).includes(value);
}
