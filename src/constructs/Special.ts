import type { Context } from '../Context';
import { CheckError, IndexFieldError, StreamError } from '../errors';
import { evaluateCount, evaluateParam, Expr, Param } from '../expr';
import { deepEqual, formatValue } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Bytes } from './Bytes';
import { Construct } from './Construct';

/** Fixed value. Parsing checks it, building writes it when no value is given. */
export class Const<T> extends Construct<T> {
  readonly value: T;
  readonly subcon: Construct<T>;

  constructor(value: T, subcon: Construct<T>) {
    super();
    this.value = value;
    this.subcon = subcon;
  }

  /** Const over raw bytes, e.g. a magic number. */
  static bytes(value: Uint8Array): Const<Uint8Array> {
    return new Const(value, new Bytes(value.length));
  }

  get subconstructs(): readonly Construct[] {
    return [this.subcon];
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  /** Reject a parsed value that differs from the constant. */
  verify(parsed: T, path: Path): T {
    if (!deepEqual(parsed, this.value)) {
      throw new CheckError(`expected ${formatValue(this.value)} but parsed ${formatValue(parsed)}`, path);
    }
    return parsed;
  }

  /** Reject a supplied build value that differs from the constant. */
  checkInput(value: unknown, path: Path): void {
    if (value !== undefined && !deepEqual(value, this.value)) {
      throw new CheckError(`expected ${formatValue(this.value)} but got ${formatValue(value)}`, path);
    }
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.verify(this.subcon._parse(cursor, ctx, path), path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    this.checkInput(value, path);
    return this.subcon._build(this.value, cursor, ctx, path);
  }

  _sizeof(ctx: Context, path: Path): number {
    return this.subcon._sizeof(ctx, path);
  }
}

/** Value derived from the context. Consumes and produces no bytes. */
export class Computed extends Construct<unknown> {
  readonly func: Param<unknown>;

  constructor(func: Param<unknown>) {
    super();
    this.func = func;
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(_cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return evaluateParam(this.func, ctx, path);
  }

  _build(_value: unknown, _cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return evaluateParam(this.func, ctx, path);
  }

  _sizeof(): number {
    return 0;
  }
}

/** Does nothing. Parses to undefined. */
export class PassField extends Construct<undefined> {
  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(): undefined {
    return undefined;
  }

  _build(): undefined {
    return undefined;
  }

  _sizeof(): number {
    return 0;
  }
}

export const Pass = new PassField();

/** Fails unless the stream is exhausted. */
export class TerminatedField extends Construct<undefined> {
  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(cursor: StreamCursor, _ctx: Context, path: Path): undefined {
    if (!cursor.atEnd()) {
      throw new StreamError('expected end of stream', path);
    }
    return undefined;
  }

  _build(): undefined {
    return undefined;
  }

  _sizeof(): number {
    return 0;
  }
}

export const Terminated = new TerminatedField();

/** Filler bytes. A strict padding checks every byte equals the pattern. */
export class Padding extends Construct<undefined> {
  readonly length: Param<number>;
  readonly pattern: number;
  readonly strict: boolean;

  constructor(length: Param<number>, pattern = 0, strict = false) {
    super();
    this.length = length;
    this.pattern = pattern;
    this.strict = strict;
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  verify(data: Uint8Array, path: Path): undefined {
    if (this.strict && data.some(b => b !== this.pattern)) {
      throw new CheckError(`padding ${formatValue(data)} does not match pattern 0x${this.pattern.toString(16)}`, path);
    }
    return undefined;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): undefined {
    return this.verify(cursor.read(evaluateCount(this.length, ctx, path, 'length'), path), path);
  }

  _build(_value: unknown, cursor: StreamCursor, ctx: Context, path: Path): undefined {
    cursor.write(new Uint8Array(evaluateCount(this.length, ctx, path, 'length')).fill(this.pattern));
    return undefined;
  }

  _sizeof(ctx: Context, path: Path): number {
    return evaluateCount(this.length, ctx, path, 'length');
  }
}

/** Current repetition index. */
export class IndexField extends Construct<number> {
  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(_cursor: StreamCursor, ctx: Context, path: Path): number {
    return this.current(ctx, path);
  }

  _build(_value: unknown, _cursor: StreamCursor, ctx: Context, path: Path): number {
    return this.current(ctx, path);
  }

  _sizeof(): number {
    return 0;
  }

  private current(ctx: Context, path: Path): number {
    const index = ctx.index;
    if (index === undefined) {
      throw new IndexFieldError('Index used outside of a repetition', path);
    }
    return index;
  }
}

export const Index = new IndexField();

/** Raises CheckError when the predicate is false. */
export class Check extends Construct<undefined> {
  readonly predicate: Param<boolean>;

  constructor(predicate: Param<boolean>) {
    super();
    this.predicate = predicate;
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(_cursor: StreamCursor, ctx: Context, path: Path): undefined {
    this.verify(ctx, path);
    return undefined;
  }

  _build(_value: unknown, _cursor: StreamCursor, ctx: Context, path: Path): undefined {
    this.verify(ctx, path);
    return undefined;
  }

  _sizeof(): number {
    return 0;
  }

  verify(ctx: Context, path: Path): void {
    if (!evaluateParam(this.predicate, ctx, path)) {
      const text = this.predicate instanceof Expr ? this.predicate.toString() : 'predicate';
      throw new CheckError(`check failed: ${text}`, path);
    }
  }
}

export type ProbeSink = (line: string) => void;

/**
 * Debugging aid: prints the path, the stream offset and either the whole
 * frame or one expression. Consumes and produces nothing.
 */
export class Probe extends Construct<undefined> {
  readonly into: Expr | undefined;
  readonly sink: ProbeSink;

  constructor(into?: Expr, sink: ProbeSink = line => console.log(line)) {
    super();
    this.into = into;
    this.sink = sink;
  }

  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(_cursor: StreamCursor, ctx: Context, path: Path): undefined {
    this.report(ctx, path);
    return undefined;
  }

  _build(_value: unknown, _cursor: StreamCursor, ctx: Context, path: Path): undefined {
    this.report(ctx, path);
    return undefined;
  }

  _sizeof(): number {
    return 0;
  }

  private report(ctx: Context, path: Path): void {
    const shown = this.into
      ? `${this.into.toString()} = ${formatValue(this.into.evaluate(ctx, path))}`
      : formatValue(ctx.entries());
    this.sink(`Probe ${path.toString()} at offset ${ctx.offset ?? '?'}: ${shown}`);
  }
}
