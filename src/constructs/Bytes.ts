import type { Context } from '../Context';
import { CheckError, FormatFieldError, StringError } from '../errors';
import { evaluateCount, Param } from '../expr';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';

/** Require a byte array, raising StringError for text. */
export function expectBytes(value: unknown, path: Path): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') {
    throw new StringError(`expected bytes, got text ${JSON.stringify(value)}`, path);
  }
  throw new FormatFieldError(`expected bytes, got ${typeof value}`, path);
}

/** Raw bytes of a given (possibly context-derived) length. */
export class Bytes extends Construct<Uint8Array> {
  readonly length: Param<number>;

  constructor(length: Param<number>) {
    super();
    this.length = length;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): Uint8Array {
    return cursor.read(evaluateCount(this.length, ctx, path, 'length'), path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): Uint8Array {
    const data = expectBytes(value, path);
    const length = evaluateCount(this.length, ctx, path, 'length');
    if (data.length !== length) {
      throw new CheckError(`expected ${length} bytes, got ${data.length}`, path);
    }
    cursor.write(data);
    return data;
  }

  _sizeof(ctx: Context, path: Path): number {
    return evaluateCount(this.length, ctx, path, 'length');
  }
}

/** All remaining bytes of the stream. */
export class GreedyBytesField extends Construct<Uint8Array> {
  _parse(cursor: StreamCursor): Uint8Array {
    return cursor.readRest();
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): Uint8Array {
    const data = expectBytes(value, path);
    cursor.write(data);
    return data;
  }
}

export const GreedyBytes = new GreedyBytesField();
