/**
 * Helpers for turning command-line text into store inputs.
 */
import { readFile } from 'node:fs/promises';
import { InvalidValueError } from './errors.js';
import { FieldSchema } from './field-schema.js';
import type { DbcValue, DbcValues } from './types/field-value.js';

/**
 * Loads a JSON schema file (`{ "id": "uint32", "name": "string", ... }`).
 */
export async function loadSchema(schemaPath: string): Promise<FieldSchema> {
  const text: string = await readFile(schemaPath, 'utf8');
  return FieldSchema.fromJSON(text);
}

/**
 * Converts raw text to the value type of `field`: numbers for numeric
 * fields, the text itself for string fields.
 */
export function parseFieldValue(schema: FieldSchema, field: string, raw: string): DbcValue {
  if (schema.typeOf(field) === 'string') {
    return raw;
  }
  const trimmed: string = raw.trim();
  const value: number = Number(trimmed);
  if (trimmed.length === 0 || Number.isNaN(value)) {
    throw new InvalidValueError(field, `${JSON.stringify(raw)} is not a number`);
  }
  return value;
}

/**
 * Parses `field=value` assignments. Only the first `=` separates name from value.
 */
export function parseAssignments(schema: FieldSchema, assignments: readonly string[]): DbcValues {
  const values: Record<string, DbcValue> = {};
  for (const assignment of assignments) {
    const separator: number = assignment.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Expected field=value, got ${JSON.stringify(assignment)}`);
    }
    const field: string = assignment.slice(0, separator);
    values[field] = parseFieldValue(schema, field, assignment.slice(separator + 1));
  }
  return values;
}

export function parseIndex(raw: string): number {
  const text: string = raw.trim();
  if (!/^-?\d+$/.test(text)) {
    throw new Error(`Record index must be an integer, got ${JSON.stringify(raw)}`);
  }
  return Number(text);
}
