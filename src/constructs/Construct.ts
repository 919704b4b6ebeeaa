import { ByteStream, MemoryStream } from '../ByteStream';
import { Context, ContextArena } from '../Context';
import { SizeofError } from '../errors';
import { Path } from '../Path';
import { StreamCursor } from '../StreamCursor';

/**
 * Base class for every schema node. Parsing, building and sizing share one
 * contract so combinators only ever talk to their children through it.
 * @template T The value this construct parses to and builds from.
 */
export abstract class Construct<T = unknown> {
  /** Whether the parent merges this construct's result keys into its own. */
  get embedded(): boolean {
    return false;
  }

  /** Whether build accepts an absent value (the construct derives its own). */
  get buildsFromNothing(): boolean {
    return false;
  }

  get subconstructs(): readonly Construct[] {
    return [];
  }

  /** Parse a complete byte array. Trailing bytes are left unread. */
  parse(data: Uint8Array, entries?: Record<string, unknown>): T {
    return this.parseStream(MemoryStream.from(data), entries);
  }

  parseStream(stream: ByteStream, entries?: Record<string, unknown>): T {
    const cursor = new StreamCursor(stream);
    const ctx = ContextArena.open('parsing', cursor, entries);
    return this._parse(cursor, ctx, Path.root('parsing'));
  }

  build(value: T, entries?: Record<string, unknown>): Uint8Array {
    const stream = MemoryStream.alloc();
    this.buildStream(value, stream, entries);
    return stream.toUint8Array();
  }

  /** Build into `stream`, returning the number of bytes written. */
  buildStream(value: T, stream: ByteStream, entries?: Record<string, unknown>): number {
    const cursor = new StreamCursor(stream);
    const ctx = ContextArena.open('building', cursor, entries);
    this._build(value, cursor, ctx, Path.root('building'));
    return cursor.offset;
  }

  /** Size in bytes, or SizeofError when it depends on unknown data. */
  sizeof(entries?: Record<string, unknown>): number {
    const ctx = ContextArena.open('sizeof', undefined, entries);
    return this._sizeof(ctx, Path.root('sizeof'));
  }

  abstract _parse(cursor: StreamCursor, ctx: Context, path: Path): T;

  /** Write `value`, returning the value effectively built. */
  abstract _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T;

  _sizeof(_ctx: Context, path: Path): number {
    throw new SizeofError(`${this.constructor.name} has no determinable size`, path);
  }
}

/** Construct that wraps exactly one child. */
export abstract class Subconstruct<T = unknown, Inner = unknown> extends Construct<T> {
  readonly subcon: Construct<Inner>;

  constructor(subcon: Construct<Inner>) {
    super();
    this.subcon = subcon;
  }

  get subconstructs(): readonly Construct[] {
    return [this.subcon];
  }

  get buildsFromNothing(): boolean {
    return this.subcon.buildsFromNothing;
  }

  _sizeof(ctx: Context, path: Path): number {
    return this.subcon._sizeof(ctx, path);
  }
}

/** Mark a child so its result keys are spliced into the parent's. */
export class Embedded<T> extends Subconstruct<T, T> {
  get embedded(): boolean {
    return true;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.subcon._parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.subcon._build(value, cursor, ctx, path);
  }
}
