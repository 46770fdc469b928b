#!/usr/bin/env node
/**
 * dbc-tools - CLI Interface
 *
 * Command-line interface for inspecting and editing DBC files.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { DbcStore } from './dbc-store.js';
import { loadSchema, parseAssignments, parseFieldValue, parseIndex } from './cli-values.js';
import type { DbcStoreOptions } from './types/dbc-store-options.js';

interface SchemaOptions {
  readonly schema: string;
  readonly magicCheck: boolean;
}

interface WriteOptions extends SchemaOptions {
  readonly out?: string;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('dbc-tools')
  .description('Inspect and edit DBC binary record database files')
  .version(version);

async function openStore(file: string, options: SchemaOptions): Promise<DbcStore> {
  const schema = await loadSchema(resolve(options.schema));
  const storeOptions: DbcStoreOptions = options.magicCheck ? {} : { magic: null };
  return DbcStore.open(resolve(file), schema, storeOptions);
}

async function save(store: DbcStore, options: WriteOptions): Promise<string> {
  if (options.out) {
    const target = resolve(options.out);
    await store.writeTo(target);
    return target;
  }
  await store.write();
  return store.filePath;
}

function fail(action: string, error: unknown): never {
  console.error(`❌ ${action} failed:`, error instanceof Error ? error.message : String(error));
  process.exit(1);
}

function withSchema(command: Command): Command {
  return command
    .requiredOption('--schema <file>', 'JSON file mapping field names to uint32, int32, float or string')
    .option('--no-magic-check', 'Accept files whose header magic is not WDBC');
}

withSchema(
  program
    .command('info')
    .description('Print the header of a DBC file')
    .argument('<file>', 'Path to the DBC file')
).action(async (file: string, options: SchemaOptions) => {
  try {
    const store = await openStore(file, options);
    console.log(JSON.stringify(store.header, null, 2));
  } catch (error) {
    fail('Info', error);
  }
});

withSchema(
  program
    .command('get')
    .description('Print one record as JSON')
    .argument('<file>', 'Path to the DBC file')
    .argument('<index>', 'Zero-based record index')
).action(async (file: string, index: string, options: SchemaOptions) => {
  try {
    const store = await openStore(file, options);
    console.log(JSON.stringify(store.getRecord(parseIndex(index)), null, 2));
  } catch (error) {
    fail('Get', error);
  }
});

withSchema(
  program
    .command('find')
    .description('Print every record whose field equals a value')
    .argument('<file>', 'Path to the DBC file')
    .argument('<field>', 'Field name from the schema')
    .argument('<value>', 'Value to match')
).action(async (file: string, field: string, value: string, options: SchemaOptions) => {
  try {
    const store = await openStore(file, options);
    const matches = store.findBy(field, parseFieldValue(store.schema, field, value));
    console.log(JSON.stringify(matches, null, 2));
  } catch (error) {
    fail('Find', error);
  }
});

withSchema(
  program
    .command('set')
    .description('Update fields of one record')
    .argument('<file>', 'Path to the DBC file')
    .argument('<index>', 'Zero-based record index')
    .argument('<assignments...>', 'One or more field=value pairs')
    .option('--out <file>', 'Write the result here instead of over the input')
).action(async (file: string, index: string, assignments: string[], options: WriteOptions) => {
  try {
    const store = await openStore(file, options);
    store.updateRecordMulti(parseIndex(index), parseAssignments(store.schema, assignments));
    const target = await save(store, options);
    console.log(`✅ Updated record ${index} in ${target}`);
  } catch (error) {
    fail('Set', error);
  }
});

withSchema(
  program
    .command('add')
    .description('Append a record')
    .argument('<file>', 'Path to the DBC file')
    .argument('[assignments...]', 'field=value pairs; omitted fields are zero')
    .option('--out <file>', 'Write the result here instead of over the input')
).action(async (file: string, assignments: string[], options: WriteOptions) => {
  try {
    const store = await openStore(file, options);
    const index = store.createRecordWithValues(parseAssignments(store.schema, assignments));
    const target = await save(store, options);
    console.log(`✅ Added record ${index} to ${target}`);
  } catch (error) {
    fail('Add', error);
  }
});

withSchema(
  program
    .command('delete')
    .description('Delete one record, shifting later records down')
    .argument('<file>', 'Path to the DBC file')
    .argument('<index>', 'Zero-based record index')
    .option('--out <file>', 'Write the result here instead of over the input')
).action(async (file: string, index: string, options: WriteOptions) => {
  try {
    const store = await openStore(file, options);
    store.deleteRecord(parseIndex(index));
    const target = await save(store, options);
    console.log(`✅ Deleted record ${index} from ${target}`);
  } catch (error) {
    fail('Delete', error);
  }
});

program.parseAsync().catch((error: unknown) => fail('Command', error));
