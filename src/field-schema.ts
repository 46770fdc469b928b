/**
 * Ordered field name to type mapping describing the layout of one record.
 *
 * DBC files carry no field names or types, so the caller supplies the schema
 * on every open. Declaration order is slot order.
 */

import { SLOT_SIZE } from './constants/dbc-layout.js';
import { SchemaError, UnknownFieldError } from './errors.js';
import { isFieldType, FIELD_TYPES, type FieldType } from './types/field-type.js';

export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldType;
  readonly index: number;
}

export class FieldSchema implements Iterable<FieldDefinition> {
  private readonly fields: readonly FieldDefinition[];
  private readonly byName: ReadonlyMap<string, FieldDefinition>;

  /**
   * @param definitions - Either an object literal (`{ id: 'uint32', name: 'string' }`)
   *   or an ordered list of `[name, type]` pairs
   * @throws {SchemaError} If the schema is empty, repeats a name or names an unknown type
   */
  constructor(definitions: Readonly<Record<string, FieldType>> | ReadonlyArray<readonly [string, FieldType]>) {
    const entries: ReadonlyArray<readonly [string, unknown]> = isEntryList(definitions) ? definitions : Object.entries(definitions);
    if (entries.length === 0) {
      throw new SchemaError('Schema must define at least one field');
    }

    const fields: FieldDefinition[] = [];
    const byName = new Map<string, FieldDefinition>();
    for (const [name, type] of entries) {
      if (name.length === 0) {
        throw new SchemaError(`Field ${fields.length} has an empty name`);
      }
      // Decoded records are plain objects keyed by field name.
      if (name === '__proto__') {
        throw new SchemaError('Field name __proto__ is reserved');
      }
      if (byName.has(name)) {
        throw new SchemaError(`Duplicate field name: ${name}`);
      }
      if (!isFieldType(type)) {
        throw new SchemaError(`Invalid field type for ${name}: ${String(type)} (expected one of ${FIELD_TYPES.join(', ')})`);
      }
      const field: FieldDefinition = { name, type, index: fields.length };
      fields.push(field);
      byName.set(name, field);
    }

    this.fields = fields;
    this.byName = byName;
  }

  /**
   * Parses a schema file: a JSON object mapping field names to type names.
   */
  static fromJSON(text: string): FieldSchema {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new SchemaError(`Schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new SchemaError('Schema JSON must be an object of field name to type');
    }

    const entries: [string, FieldType][] = [];
    for (const [name, type] of Object.entries(parsed)) {
      if (!isFieldType(type)) {
        throw new SchemaError(`Invalid field type for ${name}: ${JSON.stringify(type)}`);
      }
      entries.push([name, type]);
    }
    return new FieldSchema(entries);
  }

  /**
   * Builds a schema in which every field is an unsigned integer.
   */
  static fromNames(names: readonly string[]): FieldSchema {
    return new FieldSchema(names.map((name: string): [string, FieldType] => [name, 'uint32']));
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  /** Bytes per record implied by the schema. */
  get recordSize(): number {
    return this.fields.length * SLOT_SIZE;
  }

  get names(): readonly string[] {
    return this.fields.map((field: FieldDefinition) => field.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * @throws {UnknownFieldError} If the schema has no such field
   */
  field(name: string): FieldDefinition {
    const field: FieldDefinition | undefined = this.byName.get(name);
    if (!field) {
      throw new UnknownFieldError(name);
    }
    return field;
  }

  indexOf(name: string): number {
    return this.field(name).index;
  }

  typeOf(name: string): FieldType {
    return this.field(name).type;
  }

  [Symbol.iterator](): Iterator<FieldDefinition> {
    return this.fields[Symbol.iterator]();
  }

  toJSON(): Record<string, FieldType> {
    const result: Record<string, FieldType> = {};
    for (const field of this.fields) {
      result[field.name] = field.type;
    }
    return result;
  }
}

function isEntryList(
  definitions: Readonly<Record<string, FieldType>> | ReadonlyArray<readonly [string, FieldType]>
): definitions is ReadonlyArray<readonly [string, FieldType]> {
  return Array.isArray(definitions);
}
