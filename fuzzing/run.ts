/**
 * Standalone continuous fuzzer for the schema notation front end and the
 * compiler.
 *
 * Runs grammar-aware generation and mutation-based fuzzing in a loop,
 * reporting any inputs that cause crashes, hangs or compiled programs that
 * disagree with the interpreter.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { compile } from '../src/compiler/CompiledConstruct';
import { verifyCompiled } from '../src/compiler/verify';
import { ArgumentError } from '../src/errors';
import { parseSchemaModule } from '../src/parser/SchemaParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';
import { SchemaBuilder } from '../src/schema/SchemaBuilder';
import { generatePayload, generateSchemaModule, Rng } from './generators/schema-generator';
import { mutate } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

const TIMEOUT_MS = 2000;

interface FuzzResult {
  seed: number;
  strategy: string;
  input: string;
  error?: string;
  timedOut: boolean;
  parseOk: boolean;
  convertOk: boolean;
  compileOk: boolean;
}

function fuzzOne(input: string, seed: number, strategy: string): FuzzResult {
  const result: FuzzResult = {
    seed,
    strategy,
    input,
    timedOut: false,
    parseOk: false,
    convertOk: false,
    compileOk: false,
  };

  const start = Date.now();
  const rng = new Rng(seed + 1);

  try {
    const module = parseSchemaModule(input);
    result.parseOk = true;

    if (Date.now() - start > TIMEOUT_MS) {
      result.timedOut = true;
      return result;
    }

    const schemas = convertModuleToSchemaNodes(module);
    result.convertOk = true;

    const registry = SchemaBuilder.buildAll(schemas);
    for (const name of registry.names()) {
      const source = registry.get(name);
      const payloads = Array.from({ length: 8 }, () => generatePayload(rng));
      verifyCompiled(source, compile(source), payloads);
    }
    result.compileOk = true;
  } catch (e) {
    // Rejecting malformed notation is fine; anything else is a finding
    if (!(e instanceof ArgumentError)) {
      result.error = e instanceof Error ? e.message : String(e);
    }
  }

  if (Date.now() - start > TIMEOUT_MS) {
    result.timedOut = true;
  }

  return result;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log(`Schema Notation and Compiler Fuzzer`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let generated = 0;
  let mutated = 0;
  let parseOk = 0;
  let convertOk = 0;
  let compileOk = 0;
  let timedOut = 0;
  const crashes: FuzzResult[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    let result: FuzzResult;

    if (iteration % 2 === 0) {
      // Grammar-aware generation
      const input = generateSchemaModule(iteration);
      result = fuzzOne(input, iteration, 'generation');
      generated++;
    } else {
      // Mutation-based
      const seed = ALL_SEEDS[iteration % ALL_SEEDS.length];
      const rng = new Rng(iteration);
      const input = mutate(seed, rng, rng.int(1, 5));
      result = fuzzOne(input, iteration, 'mutation');
      mutated++;
    }

    if (result.parseOk) parseOk++;
    if (result.convertOk) convertOk++;
    if (result.compileOk) compileOk++;
    if (result.error !== undefined) {
      crashes.push(result);
      console.error(`\n[!] FAILURE at iteration ${iteration} (${result.strategy}): ${result.error}`);
      console.error(`    Input: ${result.input.slice(0, 200)}...`);
    }
    if (result.timedOut) {
      timedOut++;
      crashes.push(result);
      console.error(`\n[!] TIMEOUT at iteration ${iteration} (${result.strategy}):`);
      console.error(`    Input: ${result.input.slice(0, 200)}...`);
    }

    iteration++;

    // Progress report every 1000 iterations
    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `generated=${generated} mutated=${mutated} ` +
        `parseOk=${parseOk} convertOk=${convertOk} compileOk=${compileOk} ` +
        `timeouts=${timedOut}`
      );
    }
  }

  // Final report
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Generated: ${generated}`);
  console.log(`Mutated: ${mutated}`);
  console.log(`Parse successes: ${parseOk}`);
  console.log(`Convert successes: ${convertOk}`);
  console.log(`Compile checks passed: ${compileOk}`);
  console.log(`Timeouts: ${timedOut}`);

  if (crashes.length > 0) {
    console.log('');
    console.log(`=== ${crashes.length} issue(s) found ===`);
    for (const crash of crashes) {
      console.log(`  Seed: ${crash.seed}, Strategy: ${crash.strategy}`);
      if (crash.error !== undefined) console.log(`  Error: ${crash.error}`);
      console.log(`  Input: ${crash.input.slice(0, 300)}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
