import type { Context } from '../Context';
import { CheckError, MappingError, NamedTupleError } from '../errors';
import { evaluateParam, Param } from '../expr';
import { deepEqual, formatValue, isRecord } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct, Subconstruct } from './Construct';

/** Callback shape shared by every value adapter. */
export type AdapterFn<In, Out> = (obj: In, ctx: Context, path: Path) => Out;

/**
 * Rewrites values around one inner construct: `decode` after the inner
 * parse, `encode` before the inner build. `validate` runs on the outer
 * value on both paths. Inner errors are never intercepted.
 */
export abstract class Adapter<Inner = unknown, Outer = unknown> extends Subconstruct<Outer, Inner> {
  abstract decode(obj: Inner, ctx: Context, path: Path): Outer;
  abstract encode(obj: unknown, ctx: Context, path: Path): unknown;

  /** Raise (normally CheckError) to reject a value. */
  validate(_obj: unknown, _ctx: Context, _path: Path): void {}

  _parse(cursor: StreamCursor, ctx: Context, path: Path): Outer {
    const obj = this.decode(this.subcon._parse(cursor, ctx, path), ctx, path);
    this.validate(obj, ctx, path);
    return obj;
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): Outer {
    this.validate(value, ctx, path);
    const inner = this.subcon._build(this.encode(value, ctx, path), cursor, ctx, path);
    return this.decode(inner, ctx, path);
  }
}

/** Adapter whose encode is its decode. */
export abstract class SymmetricAdapter<T> extends Adapter<T, T> {
  protected abstract transform(obj: unknown, ctx: Context, path: Path): T;

  decode(obj: T, ctx: Context, path: Path): T {
    return this.transform(obj, ctx, path);
  }

  encode(obj: unknown, ctx: Context, path: Path): unknown {
    return this.transform(obj, ctx, path);
  }
}

/** Pass-through adapter that only accepts values `isValid` approves. */
export abstract class Validator<T> extends Adapter<T, T> {
  protected abstract isValid(obj: unknown, ctx: Context, path: Path): boolean;

  decode(obj: T): T {
    return obj;
  }

  encode(obj: unknown): unknown {
    return obj;
  }

  validate(obj: unknown, ctx: Context, path: Path): void {
    if (!this.isValid(obj, ctx, path)) {
      throw new CheckError(`object failed validation: ${formatValue(obj)}`, path);
    }
  }
}

export interface ExprAdapterOptions {
  decode: AdapterFn<unknown, unknown>;
  encode: AdapterFn<unknown, unknown>;
  validate?: AdapterFn<unknown, boolean>;
  /**
   * Declares both callbacks free of side effects, which makes the adapter
   * eligible for compilation.
   */
  pure?: boolean;
}

/** Adapter built from callbacks. */
export class ExprAdapter extends Adapter {
  readonly options: ExprAdapterOptions;

  constructor(subcon: Construct, options: ExprAdapterOptions) {
    super(subcon);
    this.options = options;
  }

  get pure(): boolean {
    return this.options.pure === true;
  }

  decode(obj: unknown, ctx: Context, path: Path): unknown {
    return this.options.decode(obj, ctx, path);
  }

  encode(obj: unknown, ctx: Context, path: Path): unknown {
    return this.options.encode(obj, ctx, path);
  }

  validate(obj: unknown, ctx: Context, path: Path): void {
    const check = this.options.validate;
    if (check && !check(obj, ctx, path)) {
      throw new CheckError(`object failed validation: ${formatValue(obj)}`, path);
    }
  }
}

/** Validator built from a predicate. */
export class ExprValidator<T> extends Validator<T> {
  readonly predicate: AdapterFn<unknown, boolean>;

  constructor(subcon: Construct<T>, predicate: AdapterFn<unknown, boolean>) {
    super(subcon);
    this.predicate = predicate;
  }

  protected isValid(obj: unknown, ctx: Context, path: Path): boolean {
    return this.predicate(obj, ctx, path);
  }
}

/** Accepts only the listed values. */
export class OneOf<T> extends Validator<T> {
  readonly values: readonly unknown[];

  constructor(subcon: Construct<T>, values: readonly unknown[]) {
    super(subcon);
    this.values = values;
  }

  protected isValid(obj: unknown): boolean {
    return this.values.some(v => deepEqual(v, obj));
  }
}

/** Rejects the listed values. */
export class NoneOf<T> extends Validator<T> {
  readonly values: readonly unknown[];

  constructor(subcon: Construct<T>, values: readonly unknown[]) {
    super(subcon);
    this.values = values;
  }

  protected isValid(obj: unknown): boolean {
    return !this.values.some(v => deepEqual(v, obj));
  }
}

/** Two-way table between outer values and inner values. */
export class Mapping extends Adapter {
  /** outer -> inner */
  readonly table: ReadonlyMap<unknown, unknown>;

  constructor(subcon: Construct, table: ReadonlyMap<unknown, unknown>) {
    super(subcon);
    this.table = table;
  }

  decode(obj: unknown, _ctx: Context, path: Path): unknown {
    for (const [outer, inner] of this.table) {
      if (deepEqual(inner, obj)) return outer;
    }
    throw new MappingError(`no mapping for parsed value ${formatValue(obj)}`, path);
  }

  encode(obj: unknown, _ctx: Context, path: Path): unknown {
    for (const [outer, inner] of this.table) {
      if (deepEqual(outer, obj)) return inner;
    }
    throw new MappingError(`no mapping for value ${formatValue(obj)}`, path);
  }
}

/**
 * Named integer values. Unknown integers parse to themselves, and both names
 * and raw integers build.
 */
export class Enum extends Adapter<unknown, string | number | bigint> {
  readonly members: Readonly<Record<string, number>>;

  constructor(subcon: Construct, members: Readonly<Record<string, number>>) {
    super(subcon);
    this.members = members;
  }

  decode(obj: unknown, _ctx: Context, path: Path): string | number | bigint {
    for (const [name, value] of Object.entries(this.members)) {
      if (deepEqual(value, typeof obj === 'bigint' ? Number(obj) : obj)) return name;
    }
    if (typeof obj === 'number' || typeof obj === 'bigint') return obj;
    throw new MappingError(`enum value ${formatValue(obj)} is not an integer`, path);
  }

  encode(obj: unknown, _ctx: Context, path: Path): unknown {
    if (typeof obj === 'number' || typeof obj === 'bigint') return obj;
    if (typeof obj === 'string' && Object.prototype.hasOwnProperty.call(this.members, obj)) {
      return this.members[obj];
    }
    throw new MappingError(`${formatValue(obj)} is not a member of the enum`, path);
  }
}

/** Array of values viewed as a record with the given field names. */
export class NamedTuple extends Adapter<unknown, Record<string, unknown>> {
  readonly names: readonly string[];

  constructor(names: readonly string[], subcon: Construct) {
    super(subcon);
    this.names = names;
  }

  decode(obj: unknown, _ctx: Context, path: Path): Record<string, unknown> {
    if (!Array.isArray(obj) || obj.length !== this.names.length) {
      throw new NamedTupleError(`expected ${this.names.length} values for (${this.names.join(', ')}), got ${formatValue(obj)}`, path);
    }
    return Object.fromEntries(this.names.map((name, i) => [name, obj[i]]));
  }

  encode(obj: unknown, _ctx: Context, path: Path): unknown {
    if (Array.isArray(obj)) {
      if (obj.length !== this.names.length) {
        throw new NamedTupleError(`expected ${this.names.length} values, got ${obj.length}`, path);
      }
      return obj;
    }
    if (!isRecord(obj)) {
      throw new NamedTupleError(`expected a record or array, got ${formatValue(obj)}`, path);
    }
    return this.names.map(name => {
      if (!Object.prototype.hasOwnProperty.call(obj, name)) {
        throw new NamedTupleError(`missing tuple field '${name}'`, path);
      }
      return obj[name];
    });
  }
}

/** Builds a value computed from the context instead of the supplied one. */
export class Rebuild<T> extends Subconstruct<T, T> {
  readonly func: Param<unknown>;

  constructor(subcon: Construct<T>, func: Param<unknown>) {
    super(subcon);
    this.func = func;
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.subcon._parse(cursor, ctx, path);
  }

  _build(_value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.subcon._build(evaluateParam(this.func, ctx, path), cursor, ctx, path);
  }
}

/** Builds `value` when none is supplied. */
export class Default<T> extends Subconstruct<T, T> {
  readonly value: Param<unknown>;

  constructor(subcon: Construct<T>, value: Param<unknown>) {
    super(subcon);
    this.value = value;
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.subcon._parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const input = value === undefined ? evaluateParam(this.value, ctx, path) : value;
    return this.subcon._build(input, cursor, ctx, path);
  }
}
