/**
 * Conversion between raw 4-byte slot words and typed field values.
 */

import { INT32_MAX, INT32_MIN, UINT32_MAX } from './constants/dbc-layout.js';
import { InvalidValueError } from './errors.js';
import type { FieldDefinition } from './field-schema.js';
import type { StringBlock } from './string-block.js';
import type { DbcValue, FieldValue } from './types/field-value.js';

const scratch: Buffer = Buffer.alloc(4);

function floatFromBits(raw: number): number {
  scratch.writeUInt32LE(raw >>> 0, 0);
  return scratch.readFloatLE(0);
}

function bitsFromFloat(value: number): number {
  scratch.writeFloatLE(value, 0);
  return scratch.readUInt32LE(0);
}

/**
 * Decodes one raw slot according to its field type.
 * @throws {MalformedError} If a string slot points outside the string block
 */
export function decodeSlot(field: FieldDefinition, raw: number, strings: StringBlock): FieldValue {
  switch (field.type) {
    case 'uint32':
      return { type: 'uint32', value: raw >>> 0 };
    case 'int32':
      return { type: 'int32', value: raw | 0 };
    case 'float':
      return { type: 'float', value: floatFromBits(raw) };
    case 'string':
      return { type: 'string', value: strings.read(raw), offset: raw >>> 0 };
  }
}

/**
 * Encodes a caller-supplied value into the raw slot word for `field`.
 * String values are interned into `strings`, which may grow the block.
 * @throws {InvalidValueError} If the value does not fit the field type
 */
export function encodeValue(field: FieldDefinition, value: DbcValue, strings: StringBlock): number {
  switch (field.type) {
    case 'uint32':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
        throw new InvalidValueError(field.name, `expected an unsigned 32-bit integer, got ${formatValue(value)}`);
      }
      return value;
    case 'int32':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
        throw new InvalidValueError(field.name, `expected a signed 32-bit integer, got ${formatValue(value)}`);
      }
      return value >>> 0;
    case 'float':
      if (typeof value !== 'number') {
        throw new InvalidValueError(field.name, `expected a number, got ${formatValue(value)}`);
      }
      return bitsFromFloat(value);
    case 'string':
      if (typeof value === 'string') {
        const problem: string | null = strings.checkStorable(value);
        if (problem !== null) {
          throw new InvalidValueError(field.name, problem);
        }
        return strings.intern(value);
      }
      if (!strings.contains(value) && !(value === 0 && strings.size === 0)) {
        throw new InvalidValueError(field.name, `string offset ${formatValue(value)} is outside the string block (${strings.size} bytes)`);
      }
      return value;
  }
}

/**
 * Normalizes a search value so it compares equal to what {@link decodeSlot}
 * would produce for the same stored value.
 */
export function normalizeForField(field: FieldDefinition, value: DbcValue): DbcValue {
  if (field.type === 'float' && typeof value === 'number') {
    return Math.fround(value);
  }
  return value;
}

function formatValue(value: DbcValue): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}
