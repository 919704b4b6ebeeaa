import type { Context } from '../Context';
import { evaluateCount, Param } from '../expr';
import type { Path } from '../Path';
import { StreamCursor } from '../StreamCursor';
import { Construct, Subconstruct } from './Construct';

/** Parses `subcon` without consuming input. Builds nothing. */
export class Peek extends Subconstruct<unknown, unknown> {
  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown {
    const mark = cursor.mark();
    try {
      return this.subcon._parse(cursor, ctx, path);
    } finally {
      cursor.rewind(mark);
    }
  }

  _build(value: unknown): unknown {
    return value;
  }

  _sizeof(): number {
    return 0;
  }
}

/**
 * Parses or builds `subcon` at an absolute offset (relative to where the
 * invocation started), then returns to the current position. Needs a
 * seekable stream.
 */
export class Pointer<T> extends Subconstruct<T, T> {
  readonly offset: Param<number>;

  constructor(offset: Param<number>, subcon: Construct<T>) {
    super(subcon);
    this.offset = offset;
  }

  get buildsFromNothing(): boolean {
    return this.subcon.buildsFromNothing;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.atOffset(cursor, ctx, path, sub => this.subcon._parse(sub, ctx, path));
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.atOffset(cursor, ctx, path, sub => this.subcon._build(value, sub, ctx, path));
  }

  _sizeof(): number {
    return 0;
  }

  private atOffset(cursor: StreamCursor, ctx: Context, path: Path, run: (sub: StreamCursor) => T): T {
    const offset = evaluateCount(this.offset, ctx, path, 'offset');
    const { stream, origin } = cursor.seekable(path);
    const resume = stream.tell();
    stream.seek(origin + offset);
    try {
      return run(new StreamCursor(stream));
    } finally {
      stream.seek(resume);
    }
  }
}

/** Current offset of the invocation. Consumes and produces nothing. */
export class TellField extends Construct<number> {
  get buildsFromNothing(): boolean {
    return true;
  }

  _parse(cursor: StreamCursor): number {
    return cursor.offset;
  }

  _build(_value: unknown, cursor: StreamCursor): number {
    return cursor.offset;
  }

  _sizeof(): number {
    return 0;
  }
}

export const Tell = new TellField();
