#!/usr/bin/env npx tsx
/**
 * CLI tool to generate SchemaNode JSON from a schema notation file.
 *
 * Usage:
 *   npx tsx cli/generate-schema.ts <input.schema> [output.schema.json]
 *
 * If no output path is given, prints to stdout.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isConstructError } from '../src/errors';
import { parseSchemaModule } from '../src/parser/SchemaParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length < 1) {
    console.error('Usage: npx tsx cli/generate-schema.ts <input.schema> [output.schema.json]');
    process.exit(1);
  }

  const inputPath = path.resolve(args[0]);
  const outputPath = args[1] ? path.resolve(args[1]) : null;

  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  const text = fs.readFileSync(inputPath, 'utf-8');

  let json: string;
  try {
    const schemas = convertModuleToSchemaNodes(parseSchemaModule(text));
    json = JSON.stringify(schemas, null, 2) + '\n';
  } catch (err) {
    if (!isConstructError(err)) throw err;
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }

  if (outputPath) {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, json, 'utf-8');
    const typeCount = Object.keys(JSON.parse(json)).length;
    console.log(`Wrote ${typeCount} type(s) from ${path.basename(inputPath)} to ${outputPath}`);
  } else {
    process.stdout.write(json);
  }
}

main();
