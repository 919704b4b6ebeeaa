import type { Context } from '../Context';
import { ArgumentError, RawCopyError } from '../errors';
import { formatValue, isRecord } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { expectBytes } from './Bytes';
import { Subconstruct } from './Construct';
import { buildWindow, parseWindow } from './Transform';

export interface RawCopyValue<T> {
  data: Uint8Array;
  value: T;
  offset1: number;
  offset2: number;
  length: number;
}

/**
 * Parses `subcon` and also returns the exact bytes it consumed with their
 * offsets. Builds from `data` when given, otherwise from `value`.
 */
export class RawCopy<T> extends Subconstruct<RawCopyValue<T>, T> {
  _parse(cursor: StreamCursor, ctx: Context, path: Path): RawCopyValue<T> {
    const offset1 = cursor.offset;
    const mark = cursor.mark();
    let value: T;
    let data: Uint8Array;
    try {
      value = this.subcon._parse(cursor, ctx, path);
      data = cursor.captured(mark);
    } finally {
      cursor.release(mark);
    }
    return { data, value, offset1, offset2: cursor.offset, length: data.length };
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): RawCopyValue<T> {
    if (!isRecord(value)) {
      throw new ArgumentError(`expected {data} or {value}, got ${formatValue(value)}`, path);
    }
    const offset1 = cursor.offset;
    let data: Uint8Array;
    let built: T;
    if (value.data !== undefined) {
      data = expectBytes(value.data, path);
      built = parseWindow(this.subcon, data, ctx, path);
    } else if (value.value !== undefined) {
      ({ built, data } = buildWindow(this.subcon, value.value, ctx, path));
    } else {
      throw new RawCopyError('neither data nor value was given', path);
    }
    cursor.write(data);
    return { data, value: built, offset1, offset2: cursor.offset, length: data.length };
  }
}
