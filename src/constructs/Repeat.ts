import type { Context } from '../Context';
import {
  ArgumentError,
  ConstructError,
  describeError,
  IndexFieldError,
  RepeatError,
  SizeofError,
  StreamError,
} from '../errors';
import { checkCount, evaluateCount, Param } from '../expr';
import { formatValue } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct, Subconstruct } from './Construct';

/**
 * Run one repetition element with `_index` set. Engine errors pass through
 * unchanged (their path already ends in the index); anything else thrown by
 * a user callback is wrapped in IndexFieldError.
 */
export function runElement<R>(ctx: Context, index: number, path: Path, run: () => R): R {
  const previous = ctx.setIndex(index);
  try {
    return run();
  } catch (err) {
    if (err instanceof ConstructError) throw err;
    throw new IndexFieldError(`element ${index} failed: ${describeError(err)}`, path, { cause: err });
  } finally {
    ctx.setIndex(previous);
  }
}

export function expectArray(value: unknown, path: Path): unknown[] {
  if (!Array.isArray(value)) {
    throw new ArgumentError(`expected an array, got ${formatValue(value)}`, path);
  }
  return value;
}

export function parseCounted<T>(count: number, ctx: Context, path: Path, parseOne: (elementPath: Path) => T): T[] {
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    const elementPath = path.child(i);
    items.push(runElement(ctx, i, elementPath, () => parseOne(elementPath)));
  }
  return items;
}

/** Require an array of exactly `count` elements. */
export function expectCount(value: unknown, count: number, path: Path): unknown[] {
  const items = expectArray(value, path);
  if (items.length !== count) {
    throw new RepeatError(`expected ${count} elements, got ${items.length}`, path);
  }
  return items;
}

/** Exactly `count` elements. */
export class ArrayOf<T> extends Subconstruct<T[], T> {
  readonly count: Param<number>;

  constructor(count: Param<number>, subcon: Construct<T>) {
    super(subcon);
    this.count = count;
  }

  get buildsFromNothing(): boolean {
    return false;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T[] {
    const count = evaluateCount(this.count, ctx, path);
    return parseCounted(count, ctx, path, elementPath => this.subcon._parse(cursor, ctx, elementPath));
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T[] {
    const items = expectCount(value, evaluateCount(this.count, ctx, path), path);
    return buildElements(this.subcon, items, cursor, ctx, path);
  }

  _sizeof(ctx: Context, path: Path): number {
    const count = evaluateCount(this.count, ctx, path);
    let total = 0;
    for (let i = 0; i < count; i++) {
      const elementPath = path.child(i);
      total += runElement(ctx, i, elementPath, () => this.subcon._sizeof(ctx, elementPath));
    }
    return total;
  }
}

export function buildElements<T>(subcon: Construct<T>, items: readonly unknown[], cursor: StreamCursor, ctx: Context, path: Path): T[] {
  return buildEach(items, ctx, path, (item, elementPath) => subcon._build(item, cursor, ctx, elementPath));
}

export function buildEach<T>(items: readonly unknown[], ctx: Context, path: Path, buildOne: (item: unknown, elementPath: Path) => T): T[] {
  return items.map((item, i) => {
    const elementPath = path.child(i);
    return runElement(ctx, i, elementPath, () => buildOne(item, elementPath));
  });
}

/** Parse elements until the stream ends or an element runs out of input. */
export function parseGreedy<T>(cursor: StreamCursor, ctx: Context, path: Path, parseOne: (elementPath: Path) => T): T[] {
  const items: T[] = [];
  while (!cursor.atEnd()) {
    const index = items.length;
    const elementPath = path.child(index);
    const mark = cursor.mark();
    let item: T;
    try {
      item = runElement(ctx, index, elementPath, () => parseOne(elementPath));
    } catch (err) {
      if (err instanceof StreamError) {
        cursor.rewind(mark);
        break;
      }
      cursor.release(mark);
      throw err;
    }
    cursor.release(mark);
    if (cursor.offset === mark.offset) {
      throw new RepeatError('element consumed no input', elementPath);
    }
    items.push(item);
  }
  return items;
}

/**
 * As many elements as the stream holds. An element that runs out of input
 * is discarded and its bytes are returned to the stream.
 */
export class GreedyRange<T> extends Subconstruct<T[], T> {
  get buildsFromNothing(): boolean {
    return false;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T[] {
    return parseGreedy(cursor, ctx, path, elementPath => this.subcon._parse(cursor, ctx, elementPath));
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T[] {
    return buildElements(this.subcon, expectArray(value, path), cursor, ctx, path);
  }

  _sizeof(_ctx: Context, path: Path): number {
    throw new SizeofError('greedy repetition has no determinable size', path);
  }
}

export type UntilPredicate<T> = (obj: T, list: readonly T[], ctx: Context) => boolean;

/** Elements up to and including the first one the predicate accepts. */
export class RepeatUntil<T> extends Subconstruct<T[], T> {
  readonly predicate: UntilPredicate<T>;

  constructor(predicate: UntilPredicate<T>, subcon: Construct<T>) {
    super(subcon);
    this.predicate = predicate;
  }

  get buildsFromNothing(): boolean {
    return false;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T[] {
    const items: T[] = [];
    for (let i = 0; ; i++) {
      const elementPath = path.child(i);
      const done = runElement(ctx, i, elementPath, () => {
        const item = this.subcon._parse(cursor, ctx, elementPath);
        items.push(item);
        return this.predicate(item, items, ctx);
      });
      if (done) return items;
    }
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T[] {
    const input = expectArray(value, path);
    const items: T[] = [];
    for (let i = 0; i < input.length; i++) {
      const elementPath = path.child(i);
      const done = runElement(ctx, i, elementPath, () => {
        const item = this.subcon._build(input[i], cursor, ctx, elementPath);
        items.push(item);
        return this.predicate(item, items, ctx);
      });
      if (done) return items;
    }
    throw new RepeatError('no element satisfied the terminating predicate', path);
  }

  _sizeof(_ctx: Context, path: Path): number {
    throw new SizeofError('RepeatUntil has no determinable size', path);
  }
}

/** Element count written before the elements. */
export class PrefixedArray<T> extends Subconstruct<T[], T> {
  readonly countField: Construct;

  constructor(countField: Construct, subcon: Construct<T>) {
    super(subcon);
    this.countField = countField;
  }

  get subconstructs(): readonly Construct[] {
    return [this.countField, this.subcon];
  }

  get buildsFromNothing(): boolean {
    return false;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T[] {
    const count = checkCount(this.countField._parse(cursor, ctx, path), path);
    return parseCounted(count, ctx, path, elementPath => this.subcon._parse(cursor, ctx, elementPath));
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T[] {
    const items = expectArray(value, path);
    this.countField._build(items.length, cursor, ctx, path);
    return buildElements(this.subcon, items, cursor, ctx, path);
  }

  _sizeof(_ctx: Context, path: Path): number {
    throw new SizeofError('PrefixedArray has no determinable size', path);
  }
}
