/**
 * Differential fuzz tests for the compiler.
 *
 * Every definition of a generated module is compiled, then random payloads
 * go through both the interpreted and the compiled tree: parse results,
 * error kinds and paths, and rebuilt bytes must agree.
 */

import { compile } from '../src/compiler/CompiledConstruct';
import type { CompileFallback } from '../src/compiler/Compiler';
import { verifyCompiled } from '../src/compiler/verify';
import { parseSchemaModule } from '../src/parser/SchemaParser';
import { convertModuleToSchemaNodes } from '../src/parser/toSchemaNode';
import { SchemaBuilder } from '../src/schema/SchemaBuilder';
import type { SchemaRegistry } from '../src/schema/SchemaRegistry';
import { generatePayload, generateSchemaModule, Rng } from './generators/schema-generator';
import { ALL_SEEDS, SEED_RECURSIVE } from './seeds';

const FUZZ_ITERATIONS = Number(process.env.FUZZ_ITERATIONS) || 200;
const PAYLOADS_PER_DEFINITION = 8;

function buildRegistry(notation: string): SchemaRegistry {
  return SchemaBuilder.buildAll(convertModuleToSchemaNodes(parseSchemaModule(notation)));
}

function payloads(rng: Rng): Uint8Array[] {
  return Array.from({ length: PAYLOADS_PER_DEFINITION }, () => generatePayload(rng));
}

describe('Compiler fuzzing: generated modules', () => {
  it('should agree with the interpreter on every generated definition', () => {
    let definitions = 0;
    for (let i = 0; i < FUZZ_ITERATIONS; i++) {
      const notation = generateSchemaModule(i);
      const registry = buildRegistry(notation);
      const rng = new Rng(i + 300000);
      for (const name of registry.names()) {
        const source = registry.get(name);
        const compiled = compile(source);
        try {
          verifyCompiled(source, compiled, payloads(rng));
        } catch (err) {
          throw new Error(`seed ${i}, definition ${name}:\n${notation}`, { cause: err });
        }
        definitions++;
      }
    }
    expect(definitions).toBeGreaterThanOrEqual(FUZZ_ITERATIONS);
  });

  it('should produce stable programs when compiled twice', () => {
    const rng = new Rng(7);
    for (let i = 0; i < Math.min(50, FUZZ_ITERATIONS); i++) {
      const registry = buildRegistry(generateSchemaModule(i));
      for (const name of registry.names()) {
        const source = registry.get(name);
        const first = compile(source);
        const second = compile(source);
        verifyCompiled(first, second, payloads(rng));
      }
    }
  });
});

describe('Compiler fuzzing: seed modules', () => {
  it('should agree with the interpreter on every seed definition', () => {
    const rng = new Rng(4242);
    for (const seed of ALL_SEEDS) {
      const registry = buildRegistry(seed);
      for (const name of registry.names()) {
        const source = registry.get(name);
        verifyCompiled(source, compile(source), payloads(rng));
      }
    }
  });

  it('should fall back to the interpreter for recursive definitions', () => {
    const registry = buildRegistry(SEED_RECURSIVE);
    const fallbacks: CompileFallback[] = [];
    const compiled = compile(registry.get('Tree'), { onFallback: f => fallbacks.push(f) });

    expect(registry.isRecursive('Tree')).toBe(true);
    expect(compiled.fullyCompiled).toBe(false);
    expect(fallbacks.length).toBeGreaterThan(0);
    verifyCompiled(registry.get('Tree'), compiled, payloads(new Rng(5)));
  });
});
