/**
 * Grammar-aware random schema notation generator, plus random payloads.
 *
 * Produces valid notation text by following the grammar structure with
 * randomized choices at each production. Definitions only refer to earlier
 * definitions, so generated schemas are never recursive.
 */

/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift32 never leaves the zero state
    this.state = seed === 0 ? 0x9e3779b9 : seed;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }
}

export interface GeneratorOptions {
  /** Maximum nesting depth for types (default: 3). */
  maxDepth?: number;
  /** Maximum number of definitions per module (default: 5). */
  maxDefinitions?: number;
  /** Maximum fields per struct (default: 5). */
  maxFields?: number;
  /** Probability of generating a reference to an earlier definition (default: 0.2). */
  refProbability?: number;
}

const DEFAULTS: Required<GeneratorOptions> = {
  maxDepth: 3,
  maxDefinitions: 5,
  maxFields: 5,
  refProbability: 0.2,
};

const UPPER_NAMES = [
  'Alpha', 'Beta', 'Gamma', 'Delta', 'Epsilon', 'Zeta', 'Eta', 'Theta',
  'Iota', 'Kappa', 'Lambda', 'Sigma', 'Tau', 'Phi', 'Chi', 'Omega',
];

const LOWER_NAMES = [
  'alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'eta', 'theta',
  'iota', 'kappa', 'lambda', 'sigma', 'tau', 'phi', 'chi', 'omega',
];

const INT_TYPES = ['u8', 's8', 'u16be', 'u16le', 's16be', 'u32be', 's32le', 'u64le', 's64be'];
const COUNT_TYPES = ['u8', 'u16be', 'u16le'];
const FIXED_LEAVES = ['u8', 'u16be', 'u32le', 's16le', 'f32be', 'f64le', 'flag', 'bytes(2)', 'padding(1)', 'const [1, 2]'];

export class SchemaGenerator {
  private rng: Rng;
  private opts: Required<GeneratorOptions>;
  private defined: string[] = [];

  constructor(seed: number, options?: GeneratorOptions) {
    this.rng = new Rng(seed);
    this.opts = { ...DEFAULTS, ...options };
  }

  /** Generate a complete notation module string. */
  generateModule(): string {
    this.defined = [];
    const count = this.rng.int(1, this.opts.maxDefinitions);
    const lines: string[] = [];
    for (let i = 0; i < count; i++) {
      const name = this.uniqueTypeName();
      lines.push(`${name} = ${this.generateType(0, [])}`);
      this.defined.push(name);
    }
    return lines.join('\n\n') + '\n';
  }

  /**
   * Random type. `counts` are names of unsigned integer fields parsed
   * earlier in the enclosing struct, usable in expressions.
   */
  private generateType(depth: number, counts: readonly string[]): string {
    if (depth >= this.opts.maxDepth) {
      return this.generateLeaf(counts);
    }
    if (this.defined.length > 0 && this.rng.chance(this.opts.refProbability)) {
      return this.rng.pick(this.defined);
    }
    if (this.rng.chance(Math.min(0.7, 0.3 + depth * 0.15))) {
      return this.generateLeaf(counts);
    }
    const choices = [
      () => this.generateStruct(depth),
      () => this.generateFixedStruct(),
      () => `array(${this.countExpr(counts)}, ${this.generateType(depth + 1, [])})`,
      () => `greedy(${this.rng.pick(INT_TYPES)})`,
      () => `prefixed(u8, ${this.generateType(depth + 1, [])})`,
      () => `prefixedArray(u8, ${this.generateType(depth + 1, [])})`,
      () => this.generateSwitch(depth, counts),
      () => this.generateIf(depth, counts),
      () => 'enum(u8) { low = 0, mid = 1, high = 2 }',
    ];
    return this.rng.pick(choices)();
  }

  private generateLeaf(counts: readonly string[]): string {
    const leaves = [
      () => this.rng.pick(INT_TYPES),
      () => this.rng.pick(['f32be', 'f64le']),
      () => 'flag',
      () => 'varint',
      () => `bytes(${this.countExpr(counts)})`,
      () => `string(${this.rng.int(0, 4)}, "ascii")`,
      () => 'cstring',
      () => `padding(${this.rng.int(0, 3)})`,
      () => `const [${this.rng.int(0, 3)}]`,
      () => `const(${this.rng.int(0, 3)}, u8)`,
      () => 'pass',
    ];
    return this.rng.pick(leaves)();
  }

  /** Expression over earlier count fields, kept small. */
  private countExpr(counts: readonly string[]): string {
    if (counts.length === 0 || this.rng.chance(0.3)) {
      return String(this.rng.int(0, 4));
    }
    return `${this.rng.pick(counts)} % ${this.rng.int(2, 5)}`;
  }

  private generateStruct(depth: number): string {
    const used = new Set<string>();
    const counts: string[] = [];
    const fields: string[] = [];
    const n = this.rng.int(1, this.opts.maxFields);
    for (let i = 0; i < n; i++) {
      const name = this.uniqueFieldName(used);
      used.add(name);
      if (this.rng.chance(0.35)) {
        fields.push(`${name}: ${this.rng.pick(COUNT_TYPES)}`);
        counts.push(name);
        continue;
      }
      if (counts.length > 0 && this.rng.chance(0.15)) {
        fields.push(`${name}: computed(${this.rng.pick(counts)} + 1)`);
        continue;
      }
      fields.push(`${name}: ${this.generateType(depth + 1, counts)}`);
    }
    return `{ ${fields.join(', ')} }`;
  }

  /** Struct of fixed-size leaves only, eligible for single block reads. */
  private generateFixedStruct(): string {
    const used = new Set<string>();
    const fields: string[] = [];
    const n = this.rng.int(1, this.opts.maxFields);
    for (let i = 0; i < n; i++) {
      const name = this.uniqueFieldName(used);
      used.add(name);
      fields.push(`${name}: ${this.rng.pick(FIXED_LEAVES)}`);
    }
    return `{ ${fields.join(', ')} }`;
  }

  private generateSwitch(depth: number, counts: readonly string[]): string {
    const selector = counts.length > 0 ? `${this.rng.pick(counts)} % 3` : String(this.rng.int(0, 3));
    const cases = [
      `0: ${this.generateType(depth + 1, [])}`,
      `1: ${this.generateType(depth + 1, [])}`,
    ];
    if (this.rng.chance(0.6)) {
      cases.push(`default: ${this.generateType(depth + 1, [])}`);
    }
    return `switch(${selector}) { ${cases.join(', ')} }`;
  }

  private generateIf(depth: number, counts: readonly string[]): string {
    const condition = counts.length > 0 ? `${this.rng.pick(counts)} > ${this.rng.int(0, 8)}` : this.rng.pick(['true', 'false']);
    const otherwise = this.rng.chance(0.5) ? ` else ${this.generateType(depth + 1, [])}` : '';
    return `if (${condition}) ${this.generateType(depth + 1, [])}${otherwise}`;
  }

  private uniqueTypeName(): string {
    let name: string;
    let attempts = 0;
    do {
      name = this.rng.pick(UPPER_NAMES) + this.rng.int(1, 999);
      attempts++;
    } while (this.defined.includes(name) && attempts < 100);
    return name;
  }

  private uniqueFieldName(used: Set<string>): string {
    let name: string;
    let attempts = 0;
    do {
      name = this.rng.pick(LOWER_NAMES) + this.rng.int(1, 999);
      attempts++;
    } while (used.has(name) && attempts < 100);
    return name;
  }
}

/**
 * Generate a random notation module string.
 * @param seed - RNG seed for reproducibility
 * @param options - Generator options
 */
export function generateSchemaModule(seed: number, options?: GeneratorOptions): string {
  const gen = new SchemaGenerator(seed, options);
  return gen.generateModule();
}

/**
 * Random payload, biased toward small byte values so that counts and
 * selectors read from it stay small.
 */
export function generatePayload(rng: Rng, maxLength = 48): Uint8Array {
  const out = new Uint8Array(rng.int(0, maxLength));
  for (let i = 0; i < out.length; i++) {
    out[i] = rng.chance(0.6) ? rng.int(0, 4) : rng.int(0, 255);
  }
  return out;
}
