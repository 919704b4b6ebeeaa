import { MemoryStream } from '../ByteStream';
import type { Context } from '../Context';
import { ConstructError, MissingFieldError, SelectError, SizeofError, SwitchError } from '../errors';
import { evaluateParam, Param } from '../expr';
import { formatValue } from '../helpers';
import type { Path } from '../Path';
import { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';
import { Pass } from './Special';

/** `thenCon` when the condition holds, `elseCon` otherwise. */
export class IfThenElse extends Construct {
  readonly condition: Param<boolean>;
  readonly thenCon: Construct;
  readonly elseCon: Construct;

  constructor(condition: Param<boolean>, thenCon: Construct, elseCon: Construct) {
    super();
    this.condition = condition;
    this.thenCon = thenCon;
    this.elseCon = elseCon;
  }

  get subconstructs(): readonly Construct[] {
    return [this.thenCon, this.elseCon];
  }

  get buildsFromNothing(): boolean {
    return this.thenCon.buildsFromNothing && this.elseCon.buildsFromNothing;
  }

  choose(ctx: Context, path: Path): Construct {
    return evaluateParam(this.condition, ctx, path) ? this.thenCon : this.elseCon;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.choose(ctx, path)._parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): unknown {
    const branch = this.choose(ctx, path);
    expectBranchInput(branch, value, path);
    return branch._build(value, cursor, ctx, path);
  }

  _sizeof(ctx: Context, path: Path): number {
    return this.choose(ctx, path)._sizeof(ctx, path);
  }
}

/** An absent value is only accepted by a branch that builds from nothing. */
export function expectBranchInput(branch: Construct, value: unknown, path: Path): void {
  if (value === undefined && !branch.buildsFromNothing) {
    throw new MissingFieldError('missing value for the selected branch', path);
  }
}

/** `subcon` when the condition holds, nothing otherwise. */
export class If extends IfThenElse {
  constructor(condition: Param<boolean>, subcon: Construct) {
    super(condition, subcon, Pass);
  }

  /** A false condition builds nothing, so an absent value is fine. */
  get buildsFromNothing(): boolean {
    return true;
  }
}

export type SwitchCases = ReadonlyMap<unknown, Construct> | Readonly<Record<string, Construct>>;

export interface SwitchOptions {
  selector: Param<unknown>;
  cases: SwitchCases;
  default?: Construct;
}

function normalizeKey(key: unknown): unknown {
  return typeof key === 'bigint' && key >= Number.MIN_SAFE_INTEGER && key <= Number.MAX_SAFE_INTEGER
    ? Number(key)
    : key;
}

/** Branch picked by a key evaluated over the context. */
export class Switch extends Construct {
  readonly selector: Param<unknown>;
  readonly cases: ReadonlyMap<unknown, Construct>;
  readonly defaultCase: Construct | undefined;

  constructor(options: SwitchOptions) {
    super();
    this.selector = options.selector;
    this.cases = toCaseMap(options.cases);
    this.defaultCase = options.default;
  }

  get subconstructs(): readonly Construct[] {
    const all = [...this.cases.values()];
    return this.defaultCase ? [...all, this.defaultCase] : all;
  }

  /** Branch for an already evaluated key. */
  caseFor(key: unknown, path: Path): Construct {
    return selectCase(this.cases, this.defaultCase, key, path);
  }

  choose(ctx: Context, path: Path): Construct {
    return this.caseFor(evaluateParam(this.selector, ctx, path), path);
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.choose(ctx, path)._parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.choose(ctx, path)._build(value, cursor, ctx, path);
  }

  /**
   * Size of the selected branch; without a key, the size shared by every
   * branch when they all agree.
   */
  _sizeof(ctx: Context, path: Path): number {
    let key: unknown;
    try {
      key = evaluateParam(this.selector, ctx, path);
    } catch (err) {
      if (!(err instanceof SizeofError)) throw err;
      return this.commonSize(ctx, path);
    }
    return this.caseFor(key, path)._sizeof(ctx, path);
  }

  private commonSize(ctx: Context, path: Path): number {
    const sizes = new Set(this.subconstructs.map(c => c._sizeof(ctx, path)));
    if (sizes.size !== 1) {
      throw new SizeofError('switch branches differ in size and the key is unknown', path);
    }
    return [...sizes][0];
  }
}

/** Case for `key`, matching numbers, bigints and their string forms alike. */
export function selectCase<B>(cases: ReadonlyMap<unknown, B>, fallback: B | undefined, key: unknown, path: Path): B {
  const normalized = normalizeKey(key);
  const branch = cases.get(normalized) ?? cases.get(String(normalized)) ?? fallback;
  if (branch === undefined) {
    throw new SwitchError(`no case matches key ${formatValue(key)}`, path);
  }
  return branch;
}

function toCaseMap(cases: SwitchCases): ReadonlyMap<unknown, Construct> {
  if (cases instanceof Map) {
    return new Map([...cases.entries()].map(([k, v]) => [normalizeKey(k), v]));
  }
  return new Map(Object.entries(cases));
}

/** Switch whose chosen branch's keys are merged into the parent record. */
export class EmbeddedSwitch extends Switch {
  get embedded(): boolean {
    return true;
  }
}

/** First alternative that parses (or builds) without an engine error. */
export class Select extends Construct {
  readonly alternatives: readonly Construct[];

  constructor(alternatives: readonly Construct[]) {
    super();
    this.alternatives = alternatives;
  }

  get subconstructs(): readonly Construct[] {
    return this.alternatives;
  }

  get buildsFromNothing(): boolean {
    return this.alternatives.some(a => a.buildsFromNothing);
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown {
    for (const alternative of this.alternatives) {
      const mark = cursor.mark();
      try {
        const value = alternative._parse(cursor, ctx, path);
        cursor.release(mark);
        return value;
      } catch (err) {
        cursor.rewind(mark);
        if (!(err instanceof ConstructError)) throw err;
      }
    }
    throw new SelectError('no alternative matched', path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): unknown {
    for (const alternative of this.alternatives) {
      const scratch = MemoryStream.alloc();
      let built: unknown;
      try {
        built = alternative._build(value, new StreamCursor(scratch), ctx, path);
      } catch (err) {
        if (err instanceof ConstructError) continue;
        throw err;
      }
      cursor.write(scratch.toUint8Array());
      return built;
    }
    throw new SelectError(`no alternative could build ${formatValue(value)}`, path);
  }
}

/** The value, or undefined when it cannot be parsed or built. */
export class Optional extends Select {
  constructor(subcon: Construct) {
    super([subcon, Pass]);
  }
}
