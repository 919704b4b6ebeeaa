import type { Context } from '../Context';
import { FormatFieldError, IntegerError } from '../errors';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';

export type NumericKind = 'uint' | 'int' | 'float';
export type Endian = 'big' | 'little';
export type FieldSize = 1 | 2 | 4 | 8;

/**
 * Fixed-width integer or float field. 8-byte integers parse to bigint;
 * every other field parses to number.
 */
export class FormatField extends Construct<number | bigint> {
  readonly size: FieldSize;
  readonly kind: NumericKind;
  readonly endian: Endian;
  private readonly min: bigint;
  private readonly max: bigint;

  constructor(size: FieldSize, kind: NumericKind, endian: Endian) {
    super();
    if (kind === 'float' && size !== 4 && size !== 8) {
      throw new FormatFieldError(`no ${size}-byte float format`);
    }
    this.size = size;
    this.kind = kind;
    this.endian = endian;
    const bits = BigInt(size * 8);
    this.min = kind === 'int' ? -(1n << (bits - 1n)) : 0n;
    this.max = kind === 'int' ? (1n << (bits - 1n)) - 1n : (1n << bits) - 1n;
  }

  /** Decode the field from `view` at `offset`. */
  unpack(view: DataView, offset: number): number | bigint {
    const le = this.endian === 'little';
    if (this.kind === 'float') {
      return this.size === 4 ? view.getFloat32(offset, le) : view.getFloat64(offset, le);
    }
    const signed = this.kind === 'int';
    switch (this.size) {
      case 1: return signed ? view.getInt8(offset) : view.getUint8(offset);
      case 2: return signed ? view.getInt16(offset, le) : view.getUint16(offset, le);
      case 4: return signed ? view.getInt32(offset, le) : view.getUint32(offset, le);
      case 8: return signed ? view.getBigInt64(offset, le) : view.getBigUint64(offset, le);
    }
  }

  /** Encode `value`, raising FormatFieldError or IntegerError. */
  pack(value: unknown, path: Path): Uint8Array {
    const out = new Uint8Array(this.size);
    const view = new DataView(out.buffer);
    const le = this.endian === 'little';
    if (this.kind === 'float') {
      if (typeof value !== 'number') {
        throw new FormatFieldError(`expected a number, got ${typeof value}`, path);
      }
      if (this.size === 4) view.setFloat32(0, value, le);
      else view.setFloat64(0, value, le);
      return out;
    }
    if (typeof value !== 'number' && typeof value !== 'bigint') {
      throw new FormatFieldError(`expected an integer, got ${typeof value}`, path);
    }
    if (typeof value === 'number' && !Number.isInteger(value)) {
      throw new FormatFieldError(`expected an integer, got ${value}`, path);
    }
    const big = BigInt(value);
    if (big < this.min || big > this.max) {
      throw new IntegerError(`value ${value} out of range for ${this.describe()} [${this.min}, ${this.max}]`, path);
    }
    const n = Number(big);
    switch (this.size) {
      case 1:
        if (this.kind === 'int') view.setInt8(0, n); else view.setUint8(0, n);
        break;
      case 2:
        if (this.kind === 'int') view.setInt16(0, n, le); else view.setUint16(0, n, le);
        break;
      case 4:
        if (this.kind === 'int') view.setInt32(0, n, le); else view.setUint32(0, n, le);
        break;
      case 8:
        if (this.kind === 'int') view.setBigInt64(0, big, le); else view.setBigUint64(0, big, le);
        break;
    }
    return out;
  }

  /** The value `pack` accepted, normalised to what `unpack` would return. */
  normalize(value: unknown): number | bigint {
    if (this.kind !== 'float' && this.size === 8 && typeof value === 'number') return BigInt(value);
    if (this.size !== 8 && typeof value === 'bigint') return Number(value);
    if (this.kind === 'float' && this.size === 4 && typeof value === 'number') return Math.fround(value);
    return typeof value === 'bigint' ? value : Number(value);
  }

  describe(): string {
    const prefix = this.kind === 'float' ? 'Float' : 'Int';
    const sign = this.kind === 'float' ? '' : this.kind === 'int' ? 's' : 'u';
    return `${prefix}${this.size * 8}${sign}${this.endian === 'big' ? 'b' : 'l'}`;
  }

  _parse(cursor: StreamCursor, _ctx: Context, path: Path): number | bigint {
    const data = cursor.read(this.size, path);
    return this.unpack(new DataView(data.buffer, data.byteOffset, data.byteLength), 0);
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): number | bigint {
    cursor.write(this.pack(value, path));
    return this.normalize(value);
  }

  _sizeof(): number {
    return this.size;
  }
}

export const Int8ub = new FormatField(1, 'uint', 'big');
export const Int16ub = new FormatField(2, 'uint', 'big');
export const Int32ub = new FormatField(4, 'uint', 'big');
export const Int64ub = new FormatField(8, 'uint', 'big');
export const Int8sb = new FormatField(1, 'int', 'big');
export const Int16sb = new FormatField(2, 'int', 'big');
export const Int32sb = new FormatField(4, 'int', 'big');
export const Int64sb = new FormatField(8, 'int', 'big');
export const Int8ul = new FormatField(1, 'uint', 'little');
export const Int16ul = new FormatField(2, 'uint', 'little');
export const Int32ul = new FormatField(4, 'uint', 'little');
export const Int64ul = new FormatField(8, 'uint', 'little');
export const Int8sl = new FormatField(1, 'int', 'little');
export const Int16sl = new FormatField(2, 'int', 'little');
export const Int32sl = new FormatField(4, 'int', 'little');
export const Int64sl = new FormatField(8, 'int', 'little');
export const Float32b = new FormatField(4, 'float', 'big');
export const Float64b = new FormatField(8, 'float', 'big');
export const Float32l = new FormatField(4, 'float', 'little');
export const Float64l = new FormatField(8, 'float', 'little');
export const Byte = Int8ub;

/** One byte: zero parses to false, anything else to true. */
export class FlagField extends Construct<boolean> {
  _parse(cursor: StreamCursor, _ctx: Context, path: Path): boolean {
    return cursor.read(1, path)[0] !== 0;
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): boolean {
    if (typeof value !== 'boolean') {
      throw new FormatFieldError(`expected a boolean, got ${typeof value}`, path);
    }
    cursor.write(Uint8Array.of(value ? 1 : 0));
    return value;
  }

  _sizeof(): number {
    return 1;
  }
}

export const Flag = new FlagField();
