import { FormatFieldError, IntegerError, StreamError } from '../../src/errors';
import {
  Flag,
  Float32b,
  Float64l,
  FormatField,
  Int16sl,
  Int16ub,
  Int32ub,
  Int64sb,
  Int8sb,
  Int8ub,
} from '../../src/constructs/FormatField';
import { buildUntyped } from '../support/untyped';

describe('FormatField', () => {
  it('parses big and little endian integers', () => {
    expect(Int16ub.parse(Uint8Array.of(0x01, 0x02))).toBe(0x0102);
    expect(Int16sl.parse(Uint8Array.of(0xfe, 0xff))).toBe(-2);
    expect(Int8sb.parse(Uint8Array.of(0x80))).toBe(-128);
  });

  it('parses 8-byte integers to bigint', () => {
    expect(Int64sb.parse(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfe))).toBe(-2n);
  });

  it('builds integers', () => {
    expect(Int32ub.build(0x01020304)).toEqual(Uint8Array.of(1, 2, 3, 4));
    expect(Int16sl.build(-2)).toEqual(Uint8Array.of(0xfe, 0xff));
    expect(Int64sb.build(1)).toEqual(Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 1));
  });

  it('round-trips floats', () => {
    expect(Float32b.build(1.5)).toEqual(Uint8Array.of(0x3f, 0xc0, 0, 0));
    expect(Float64l.parse(Float64l.build(-0.25))).toBe(-0.25);
  });

  it('reports its size', () => {
    expect(Int32ub.sizeof()).toBe(4);
    expect(Float64l.sizeof()).toBe(8);
  });

  it('rejects out-of-range values', () => {
    expect(() => Int8ub.build(256)).toThrow(IntegerError);
    expect(() => Int8ub.build(256)).toThrow('value 256 out of range for Int8ub [0, 255]');
    expect(() => Int8sb.build(-129)).toThrow('value -129 out of range for Int8sb [-128, 127]');
  });

  it('rejects values of the wrong type', () => {
    expect(() => buildUntyped(Int8ub, '1')).toThrow(FormatFieldError);
    expect(() => buildUntyped(Int8ub, '1')).toThrow('expected an integer, got string');
    expect(() => Int8ub.build(1.5)).toThrow('expected an integer, got 1.5');
    expect(() => Float32b.build(1n)).toThrow('expected a number, got bigint');
  });

  it('has no 2-byte float', () => {
    expect(() => new FormatField(2, 'float', 'big')).toThrow('no 2-byte float format');
  });

  it('raises StreamError on short input', () => {
    expect(() => Int32ub.parse(Uint8Array.of(1, 2))).toThrow(StreamError);
    expect(() => Int32ub.parse(Uint8Array.of(1, 2))).toThrow('expected 4 bytes, found 2\n(parsing)');
  });

  it('describes itself', () => {
    expect(Int16sl.describe()).toBe('Int16sl');
    expect(Float32b.describe()).toBe('Float32b');
  });
});

describe('Flag', () => {
  it('parses any nonzero byte as true', () => {
    expect(Flag.parse(Uint8Array.of(0))).toBe(false);
    expect(Flag.parse(Uint8Array.of(7))).toBe(true);
  });

  it('builds booleans only', () => {
    expect(Flag.build(true)).toEqual(Uint8Array.of(1));
    expect(() => buildUntyped(Flag, 1)).toThrow('expected a boolean, got number');
  });
});
