import { MemoryStream } from '../ByteStream';
import type { Context } from '../Context';
import { ArgumentError, CheckError, SizeofError } from '../errors';
import { checkCount, evaluateCount, evaluateParam, Param } from '../expr';
import type { Path } from '../Path';
import { StreamCursor } from '../StreamCursor';
import { expectBytes } from './Bytes';
import { Construct, Subconstruct } from './Construct';

/** Parse `subcon` over `data` as if it were the whole stream. */
export function parseWindow<T>(subcon: Construct<T>, data: Uint8Array, ctx: Context, path: Path): T {
  return subcon._parse(new StreamCursor(MemoryStream.from(data)), ctx, path);
}

/** Build `subcon` into a scratch stream and return its bytes. */
export function buildWindow<T>(subcon: Construct<T>, value: unknown, ctx: Context, path: Path): { built: T; data: Uint8Array } {
  const scratch = MemoryStream.alloc();
  const built = subcon._build(value, new StreamCursor(scratch), ctx, path);
  return { built, data: scratch.toUint8Array() };
}

export type ByteTransform = (data: Uint8Array, ctx: Context, path: Path) => Uint8Array;

export interface TransformOptions {
  decode: ByteTransform;
  /** Bytes read before decoding; omitted means the rest of the stream. */
  decodeAmount?: Param<number>;
  encode: ByteTransform;
  /** Expected size of the encoded window; omitted means unchecked. */
  encodeAmount?: Param<number>;
}

/** Read a byte window, decode it, and parse `subcon` from the result. */
export class Transformed<T> extends Subconstruct<T, T> {
  readonly options: TransformOptions;

  constructor(subcon: Construct<T>, options: TransformOptions) {
    super(subcon);
    this.options = options;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    const { decodeAmount } = this.options;
    const raw = decodeAmount === undefined
      ? cursor.readRest()
      : cursor.read(evaluateCount(decodeAmount, ctx, path, 'decodeAmount'), path);
    return parseWindow(this.subcon, this.options.decode(raw, ctx, path), ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const { built, data } = buildWindow(this.subcon, value, ctx, path);
    const encoded = this.options.encode(data, ctx, path);
    const { encodeAmount } = this.options;
    if (encodeAmount !== undefined) {
      const expected = evaluateCount(encodeAmount, ctx, path, 'encodeAmount');
      if (encoded.length !== expected) {
        throw new CheckError(`transformation produced ${encoded.length} bytes, expected ${expected}`, path);
      }
    }
    cursor.write(encoded);
    return built;
  }

  _sizeof(ctx: Context, path: Path): number {
    const { decodeAmount } = this.options;
    if (decodeAmount === undefined) {
      throw new SizeofError('transformed window runs to the end of the stream', path);
    }
    return evaluateCount(decodeAmount, ctx, path, 'decodeAmount');
  }
}

/** Byte length written before the data; `subcon` sees only that window. */
export class Prefixed<T> extends Subconstruct<T, T> {
  readonly lengthField: Construct;

  constructor(lengthField: Construct, subcon: Construct<T>) {
    super(subcon);
    this.lengthField = lengthField;
  }

  get subconstructs(): readonly Construct[] {
    return [this.lengthField, this.subcon];
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    const length = checkCount(this.lengthField._parse(cursor, ctx, path), path, 'length');
    return parseWindow(this.subcon, cursor.read(length, path), ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const { built, data } = buildWindow(this.subcon, value, ctx, path);
    this.lengthField._build(data.length, cursor, ctx, path);
    cursor.write(data);
    return built;
  }

  _sizeof(ctx: Context, path: Path): number {
    return this.lengthField._sizeof(ctx, path) + this.subcon._sizeof(ctx, path);
  }
}

/** Parse `subcon` from bytes taken from the context; the stream is untouched. */
export class RestreamData<T> extends Subconstruct<T, T> {
  readonly data: Param<Uint8Array>;

  constructor(data: Param<Uint8Array>, subcon: Construct<T>) {
    super(subcon);
    this.data = data;
  }

  _parse(_cursor: StreamCursor, ctx: Context, path: Path): T {
    return parseWindow(this.subcon, expectBytes(evaluateParam(this.data, ctx, path), path), ctx, path);
  }

  _build(value: unknown, _cursor: StreamCursor, ctx: Context, path: Path): T {
    return buildWindow(this.subcon, value, ctx, path).built;
  }

  _sizeof(): number {
    return 0;
  }
}

/** `subcon` stored with its bytes in reverse order. Needs a fixed size. */
export class ByteSwapped<T> extends Subconstruct<T, T> {
  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    const size = this.subcon._sizeof(ctx, path);
    return parseWindow(this.subcon, cursor.read(size, path).reverse(), ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const { built, data } = buildWindow(this.subcon, value, ctx, path);
    cursor.write(data.reverse());
    return built;
  }
}

function bytesToBits(data: Uint8Array): Uint8Array {
  const bits = new Uint8Array(data.length * 8);
  data.forEach((byte, i) => {
    for (let b = 0; b < 8; b++) bits[i * 8 + b] = (byte >> (7 - b)) & 1;
  });
  return bits;
}

function bitsToBytes(bits: Uint8Array, path: Path): Uint8Array {
  if (bits.length % 8 !== 0) {
    throw new ArgumentError(`${bits.length} bits do not fill whole bytes`, path);
  }
  const out = new Uint8Array(bits.length / 8);
  bits.forEach((bit, i) => {
    if (bit) out[i >> 3] |= 0x80 >> (i & 7);
  });
  return out;
}

/**
 * Exposes the bytes to `subcon` as one byte per bit, most significant first.
 * Reads `sizeof(subcon) / 8` bytes, or the rest of the stream when the size
 * is not determinable.
 */
export class Bitwise<T> extends Subconstruct<T, T> {
  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    const bits = this.bitSize(ctx, path);
    const raw = bits === undefined ? cursor.readRest() : cursor.read(bits / 8, path);
    return parseWindow(this.subcon, bytesToBits(raw), ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const { built, data } = buildWindow(this.subcon, value, ctx, path);
    cursor.write(bitsToBytes(data, path));
    return built;
  }

  _sizeof(ctx: Context, path: Path): number {
    const bits = this.subcon._sizeof(ctx, path);
    if (bits % 8 !== 0) {
      throw new SizeofError(`${bits} bits do not fill whole bytes`, path);
    }
    return bits / 8;
  }

  private bitSize(ctx: Context, path: Path): number | undefined {
    let bits: number;
    try {
      bits = this.subcon._sizeof(ctx.child(), path);
    } catch (err) {
      if (err instanceof SizeofError) return undefined;
      throw err;
    }
    if (bits % 8 !== 0) {
      throw new ArgumentError(`${bits} bits do not fill whole bytes`, path);
    }
    return bits;
  }
}

/** `subcon` followed by filler up to exactly `length` bytes. */
export class Padded<T> extends Subconstruct<T, T> {
  readonly length: Param<number>;
  readonly pattern: number;

  constructor(length: Param<number>, subcon: Construct<T>, pattern = 0) {
    super(subcon);
    this.length = length;
    this.pattern = pattern;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    const length = evaluateCount(this.length, ctx, path, 'length');
    const start = cursor.offset;
    const value = this.subcon._parse(cursor, ctx, path);
    cursor.read(this.padding(length, cursor.offset - start, path), path);
    return value;
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const length = evaluateCount(this.length, ctx, path, 'length');
    const start = cursor.offset;
    const built = this.subcon._build(value, cursor, ctx, path);
    cursor.write(new Uint8Array(this.padding(length, cursor.offset - start, path)).fill(this.pattern));
    return built;
  }

  _sizeof(ctx: Context, path: Path): number {
    return evaluateCount(this.length, ctx, path, 'length');
  }

  private padding(length: number, used: number, path: Path): number {
    if (used > length) {
      throw new CheckError(`content used ${used} bytes, more than the padded length ${length}`, path);
    }
    return length - used;
  }
}

/** `subcon` followed by filler up to the next multiple of `modulus`. */
export class Aligned<T> extends Subconstruct<T, T> {
  readonly modulus: Param<number>;
  readonly pattern: number;

  constructor(modulus: Param<number>, subcon: Construct<T>, pattern = 0) {
    super(subcon);
    this.modulus = modulus;
    this.pattern = pattern;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    const modulus = this.evaluateModulus(ctx, path);
    const start = cursor.offset;
    const value = this.subcon._parse(cursor, ctx, path);
    cursor.read(padTo(cursor.offset - start, modulus), path);
    return value;
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    const modulus = this.evaluateModulus(ctx, path);
    const start = cursor.offset;
    const built = this.subcon._build(value, cursor, ctx, path);
    cursor.write(new Uint8Array(padTo(cursor.offset - start, modulus)).fill(this.pattern));
    return built;
  }

  _sizeof(ctx: Context, path: Path): number {
    const modulus = this.evaluateModulus(ctx, path);
    const size = this.subcon._sizeof(ctx, path);
    return size + padTo(size, modulus);
  }

  private evaluateModulus(ctx: Context, path: Path): number {
    const modulus = evaluateCount(this.modulus, ctx, path, 'modulus');
    if (modulus < 1) {
      throw new ArgumentError(`modulus must be at least 1, got ${modulus}`, path);
    }
    return modulus;
  }
}

function padTo(used: number, modulus: number): number {
  return (modulus - (used % modulus)) % modulus;
}
