import type { Context } from '../Context';
import { FormatFieldError, IntegerError } from '../errors';
import { evaluateCount, Param } from '../expr';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';

/** Widths up to this many bits decode to number, wider ones to bigint. */
const SAFE_BITS = 48;

function expectInteger(value: unknown, path: Path): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  throw new FormatFieldError(`expected an integer, got ${String(value)}`, path);
}

function checkRange(value: bigint, bits: number, signed: boolean, path: Path): bigint {
  const width = BigInt(bits);
  const min = signed ? -(1n << (width - 1n)) : 0n;
  const max = signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n;
  if (value < min || value > max) {
    throw new IntegerError(`value ${value} out of range for ${bits}-bit ${signed ? 'signed' : 'unsigned'} integer`, path);
  }
  // two's complement
  return value < 0n ? value + (1n << width) : value;
}

function fromUnsigned(raw: bigint, bits: number, signed: boolean): number | bigint {
  const width = BigInt(bits);
  const value = signed && bits > 0 && raw >= 1n << (width - 1n) ? raw - (1n << width) : raw;
  return bits <= SAFE_BITS ? Number(value) : value;
}

/** Integer of `length` bytes, big endian unless `littleEndian`. */
export class BytesInteger extends Construct<number | bigint> {
  readonly length: Param<number>;
  readonly signed: boolean;
  readonly littleEndian: boolean;

  constructor(length: Param<number>, signed = false, littleEndian = false) {
    super();
    this.length = length;
    this.signed = signed;
    this.littleEndian = littleEndian;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): number | bigint {
    const length = evaluateCount(this.length, ctx, path, 'length');
    const data = cursor.read(length, path);
    const ordered = this.littleEndian ? data.slice().reverse() : data;
    let raw = 0n;
    for (const byte of ordered) raw = (raw << 8n) | BigInt(byte);
    return fromUnsigned(raw, length * 8, this.signed);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): number | bigint {
    const length = evaluateCount(this.length, ctx, path, 'length');
    const big = expectInteger(value, path);
    let raw = checkRange(big, length * 8, this.signed, path);
    const out = new Uint8Array(length);
    for (let i = length - 1; i >= 0; i--) {
      out[i] = Number(raw & 0xffn);
      raw >>= 8n;
    }
    cursor.write(this.littleEndian ? out.reverse() : out);
    return length * 8 <= SAFE_BITS ? Number(big) : big;
  }

  _sizeof(ctx: Context, path: Path): number {
    return evaluateCount(this.length, ctx, path, 'length');
  }
}

/**
 * Integer of `bits` bits, read from a bit stream where each byte holds one
 * bit (see Bitwise). Most significant bit first.
 */
export class BitsInteger extends Construct<number | bigint> {
  readonly bits: number;
  readonly signed: boolean;

  constructor(bits: number, signed = false) {
    super();
    this.bits = bits;
    this.signed = signed;
  }

  _parse(cursor: StreamCursor, _ctx: Context, path: Path): number | bigint {
    const data = cursor.read(this.bits, path);
    let raw = 0n;
    for (const bit of data) raw = (raw << 1n) | (bit ? 1n : 0n);
    return fromUnsigned(raw, this.bits, this.signed);
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): number | bigint {
    const big = expectInteger(value, path);
    let raw = checkRange(big, this.bits, this.signed, path);
    const out = new Uint8Array(this.bits);
    for (let i = this.bits - 1; i >= 0; i--) {
      out[i] = Number(raw & 1n);
      raw >>= 1n;
    }
    cursor.write(out);
    return this.bits <= SAFE_BITS ? Number(big) : big;
  }

  _sizeof(): number {
    return this.bits;
  }
}

/** Unsigned LEB128 variable-length integer. */
export class VarIntField extends Construct<number | bigint> {
  _parse(cursor: StreamCursor, _ctx: Context, path: Path): number | bigint {
    let result = 0n;
    let shift = 0n;
    for (;;) {
      const byte = cursor.read(1, path)[0];
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) break;
      shift += 7n;
    }
    return result <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(result) : result;
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): number | bigint {
    const big = expectInteger(value, path);
    if (big < 0n) {
      throw new IntegerError(`VarInt cannot encode negative value ${big}`, path);
    }
    let raw = big;
    const out: number[] = [];
    do {
      let byte = Number(raw & 0x7fn);
      raw >>= 7n;
      if (raw > 0n) byte |= 0x80;
      out.push(byte);
    } while (raw > 0n);
    cursor.write(Uint8Array.from(out));
    return big <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(big) : big;
  }
}

export const VarInt = new VarIntField();
