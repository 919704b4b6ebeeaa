#!/usr/bin/env npx tsx
/**
 * CLI tool to parse a binary file with a named schema and print the result
 * as JSON. Byte arrays are printed as hex strings, bigints as decimal strings.
 *
 * The schema file is either SchemaNode JSON (`.json`) or schema notation.
 *
 * Usage:
 *   npx tsx cli/parse-binary.ts [--compiled] <schema.json|schema.txt> <Type> <file.bin>
 */

import * as fs from 'fs';
import * as path from 'path';
import { bytesToHex } from '../src/ByteStream';
import { isConstructError } from '../src/errors';
import { parseSchemaModule } from '../src/parser/SchemaParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';
import { SchemaBuilder } from '../src/schema/SchemaBuilder';
import { SchemaCodec } from '../src/schema/SchemaCodec';
import type { SchemaRegistry } from '../src/schema/SchemaRegistry';

function loadRegistry(schemaPath: string): SchemaRegistry {
  const text = fs.readFileSync(schemaPath, 'utf-8');
  if (path.extname(schemaPath) === '.json') {
    return SchemaBuilder.fromJSON(text);
  }
  return SchemaBuilder.buildAll(convertModuleToSchemaNodes(parseSchemaModule(text)));
}

/** JSON replacer: hex for byte arrays, decimal strings for bigints. */
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) return bytesToHex(value);
  if (typeof value === 'bigint') return value.toString();
  return value;
}

function main(): void {
  const args = process.argv.slice(2);
  const compiled = args[0] === '--compiled';
  const [schemaArg, typeName, binaryArg] = compiled ? args.slice(1) : args;

  if (!schemaArg || !typeName || !binaryArg) {
    console.error('Usage: npx tsx cli/parse-binary.ts [--compiled] <schema.json|schema.txt> <Type> <file.bin>');
    process.exit(1);
  }

  const schemaPath = path.resolve(schemaArg);
  const binaryPath = path.resolve(binaryArg);
  for (const file of [schemaPath, binaryPath]) {
    if (!fs.existsSync(file)) {
      console.error(`Error: file not found: ${file}`);
      process.exit(1);
    }
  }

  try {
    const registry = loadRegistry(schemaPath);
    const codec = SchemaCodec.fromRegistry(registry, typeName, {
      compiled,
      onFallback: f => console.error(`compiler: ${f.path} (${f.construct}) interpreted: ${f.reason}`),
    });
    const value = codec.decode(new Uint8Array(fs.readFileSync(binaryPath)));
    process.stdout.write(JSON.stringify(value, replacer, 2) + '\n');
  } catch (err) {
    if (!isConstructError(err)) throw err;
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
}

main();
