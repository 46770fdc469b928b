import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { DbcStore } from '../src/dbc-store.js';
import { InvalidValueError, MalformedError } from '../src/errors.js';
import { displayRecords, displaySchema, displayStrings, makeTempDir, removeTempDir, writeFixture } from './helpers.js';

describe('DbcStore string and float fields', () => {
  let dir: string;
  let path: string;
  let store: DbcStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    path = await writeFixture(dir, 'ItemDisplayInfo.dbc', { fieldCount: 5, records: displayRecords, strings: displayStrings });
    store = await DbcStore.open(path, displaySchema);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('decodes every field type', () => {
    expect(store.getRecord(0)).toEqual({
      id: 1,
      model_name: 'Sword.mdx',
      icon: 'INV_Sword_01',
      scale: 1.5,
      geoset: -2,
    });
  });

  it('decodes offset 0 as the empty string', () => {
    expect(store.getRecord(1).model_name).toBe('');
  });

  it('exposes the type tag of a single field', () => {
    expect(store.getField(0, 'icon')).toEqual({ type: 'string', value: 'INV_Sword_01', offset: 11 });
    expect(store.getField(0, 'scale')).toEqual({ type: 'float', value: 1.5 });
    expect(store.getField(0, 'geoset')).toEqual({ type: 'int32', value: -2 });
  });

  it('appends a new string and points the field at it', () => {
    store.updateRecord(0, 'model_name', 'NewModelName');
    expect(store.getRecord(0).model_name).toBe('NewModelName');
    expect(store.getField(0, 'model_name')).toEqual({ type: 'string', value: 'NewModelName', offset: 24 });
    expect(store.header.stringBlockSize).toBe(37);
  });

  it('reuses a string that is already in the block', () => {
    store.updateRecord(1, 'model_name', 'Sword.mdx');
    expect(store.getField(1, 'model_name')).toEqual({ type: 'string', value: 'Sword.mdx', offset: 1 });
    expect(store.header.stringBlockSize).toBe(24);
  });

  it('accepts an existing offset for a string field', () => {
    store.updateRecord(1, 'model_name', 11);
    expect(store.getRecord(1).model_name).toBe('INV_Sword_01');
  });

  it('rejects an offset outside the string block', () => {
    expect(() => store.updateRecord(1, 'model_name', 24)).toThrow(InvalidValueError);
    expect(store.getRecord(1).model_name).toBe('');
  });

  it('stores empty strings at offset 0', () => {
    const index = store.createRecordWithValues({ id: 99999, model_name: '', icon: '' });
    expect(store.getRecord(index)).toEqual({ id: 99999, model_name: '', icon: '', scale: 0, geoset: 0 });
    expect(store.header.stringBlockSize).toBe(24);
  });

  it('rejects strings containing a nul character', () => {
    expect(() => store.updateRecord(0, 'icon', 'a\0b')).toThrow('Invalid value for field icon: strings cannot contain nul characters');
    expect(store.getRecord(0).icon).toBe('INV_Sword_01');
    expect(store.header.stringBlockSize).toBe(24);
  });

  it('drops strings interned by a rejected record', () => {
    expect(() => store.createRecordWithValues({ id: 5, model_name: 'Brand New', geoset: 2 ** 40 })).toThrow(InvalidValueError);
    expect(store.recordCount).toBe(2);
    expect(store.header.stringBlockSize).toBe(24);
  });

  it('rounds floats to single precision', () => {
    store.updateRecord(1, 'scale', 0.1);
    expect(store.getRecord(1).scale).toBe(Math.fround(0.1));
    expect(store.findBy('scale', 0.1).map((record) => record.id)).toEqual([2]);
  });

  it('finds records by string and float values', () => {
    expect(store.findBy('icon', 'INV_Sword_01').map((record) => record.id)).toEqual([1, 2]);
    expect(store.findBy('model_name', 'Sword.mdx')).toEqual([store.getRecord(0)]);
    expect(store.findBy('scale', 1)).toEqual([store.getRecord(1)]);
    expect(store.findBy('geoset', -2).map((record) => record.id)).toEqual([1]);
    expect(store.findBy('model_name', 'Missing.mdx')).toEqual([]);
  });

  it('writes appended strings to a new file', async () => {
    store.updateRecord(0, 'model_name', 'NewModelName');
    const copy = join(dir, 'ItemDisplayInfo_new.dbc');
    await store.writeTo(copy);

    const reopened = await DbcStore.open(copy, displaySchema);
    expect(reopened.getRecord(0).model_name).toBe('NewModelName');
    expect(reopened.getRecord(0).icon).toBe('INV_Sword_01');
    expect(reopened.header.stringBlockSize).toBe(37);
  });

  it('stores latin1 text in a latin1 block and rejects what it cannot represent', async () => {
    const latin1 = await DbcStore.open(path, displaySchema, { encoding: 'latin1' });
    expect(() => latin1.updateRecord(0, 'model_name', '\u0100')).toThrow(InvalidValueError);
    expect(latin1.getRecord(0).model_name).toBe('Sword.mdx');
    expect(latin1.header.stringBlockSize).toBe(24);

    latin1.updateRecord(0, 'model_name', '\u00e9');
    expect(latin1.getField(0, 'model_name')).toEqual({ type: 'string', value: '\u00e9', offset: 24 });
    expect(latin1.header.stringBlockSize).toBe(26);
    expect(latin1.toBuffer().subarray(20 + 2 * 20 + 24)).toEqual(Buffer.from([0xe9, 0]));
  });

  it('fails closed on a stored offset past the string block', async () => {
    const broken = await writeFixture(dir, 'Broken.dbc', {
      fieldCount: 5,
      records: [[3, 500, 0, 0, 0]],
      strings: displayStrings,
    });
    const damaged = await DbcStore.open(broken, displaySchema);
    expect(() => damaged.getRecord(0)).toThrow(MalformedError);
    expect(damaged.getField(0, 'id')).toEqual({ type: 'uint32', value: 3 });
  });
});
