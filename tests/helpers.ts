import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FieldSchema } from '../src/field-schema.js';

export interface DbcFixture {
  readonly magic?: string;
  readonly fieldCount: number;
  /** Raw slot words; negative numbers are stored as two's complement. */
  readonly records: readonly (readonly number[])[];
  readonly strings?: string;
  readonly recordSize?: number;
  readonly trailing?: number;
}

/** Assembles a DBC file image byte by byte. */
export function buildDbc({ magic = 'WDBC', fieldCount, records, strings = '\0', recordSize = fieldCount * 4, trailing = 0 }: DbcFixture): Buffer {
  const stringBytes = Buffer.from(strings, 'utf8');
  const buffer = Buffer.alloc(20 + records.length * fieldCount * 4 + stringBytes.length + trailing);
  buffer.write(magic, 0, 'latin1');
  buffer.writeUInt32LE(records.length, 4);
  buffer.writeUInt32LE(fieldCount, 8);
  buffer.writeUInt32LE(recordSize, 12);
  buffer.writeUInt32LE(stringBytes.length, 16);
  let offset = 20;
  for (const record of records) {
    for (const slot of record) {
      buffer.writeUInt32LE(slot >>> 0, offset);
      offset += 4;
    }
  }
  stringBytes.copy(buffer, offset);
  return buffer;
}

export function floatBits(value: number): number {
  const scratch = Buffer.alloc(4);
  scratch.writeFloatLE(value, 0);
  return scratch.readUInt32LE(0);
}

export const itemSchema = new FieldSchema([
  ['id', 'uint32'],
  ['class', 'uint32'],
  ['subclass', 'uint32'],
  ['sound_override_subclass', 'int32'],
  ['material', 'uint32'],
  ['displayid', 'uint32'],
  ['inventory_type', 'uint32'],
  ['sheath_type', 'uint32'],
]);

export const itemRecords: readonly (readonly number[])[] = [
  [32837, 2, 7, -1, 1, 20000, 13, 3],
  [25, 2, 0, -1, 1, 1542, 21, 1],
  [35, 4, 1, -1, 2, 2000, 5, 0],
];

export const displaySchema = new FieldSchema({
  id: 'uint32',
  model_name: 'string',
  icon: 'string',
  scale: 'float',
  geoset: 'int32',
});

/** Offsets: '' at 0, 'Sword.mdx' at 1, 'INV_Sword_01' at 11; 24 bytes. */
export const displayStrings = '\0Sword.mdx\0INV_Sword_01\0';

export const displayRecords: readonly (readonly number[])[] = [
  [1, 1, 11, floatBits(1.5), -2],
  [2, 0, 11, floatBits(1), 0],
];

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'dbc-tools-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(dir: string, name: string, fixture: DbcFixture): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, buildDbc(fixture));
  return path;
}
