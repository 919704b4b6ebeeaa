import { ArgumentError, SelectError, SizeofError } from '../../src/errors';
import { Embedded } from '../../src/constructs/Construct';
import { Int16ub, Int8ub } from '../../src/constructs/FormatField';
import { Struct } from '../../src/constructs/Struct';
import { Union } from '../../src/constructs/Union';
import { OneWayStream } from '../support/OneWayStream';

const pair = new Struct({
  fields: [
    { name: 'b1', construct: Int8ub },
    { name: 'b2', construct: Int8ub },
  ],
});

describe('Union', () => {
  const union = new Union({
    fields: [
      { name: 'a', construct: Int16ub },
      { name: 'b', construct: pair },
    ],
  });

  it('parses every field from the same bytes', () => {
    expect(union.parse(Uint8Array.of(1, 2))).toEqual({ a: 0x0102, b: { b1: 1, b2: 2 } });
  });

  it('consumes nothing without parseFrom', () => {
    const packet = new Struct({
      fields: [
        { name: 'u', construct: union },
        { name: 'next', construct: Int8ub },
      ],
    });
    expect(packet.parse(Uint8Array.of(1, 2))).toEqual({ u: { a: 0x0102, b: { b1: 1, b2: 2 } }, next: 1 });
  });

  it('continues after the parseFrom field on a one-way stream', () => {
    const packet = new Struct({
      fields: [
        {
          name: 'u',
          construct: new Union({
            parseFrom: 'a',
            fields: [
              { name: 'lo', construct: Int8ub },
              { name: 'a', construct: Int16ub },
            ],
          }),
        },
        { name: 'rest', construct: Int8ub },
      ],
    });
    expect(packet.parseStream(new OneWayStream(Uint8Array.of(1, 2, 3)))).toEqual({
      u: { lo: 1, a: 0x0102 },
      rest: 3,
    });
  });

  it('builds the first field present', () => {
    expect(union.build({ b: { b1: 1, b2: 2 } })).toEqual(Uint8Array.of(1, 2));
    expect(union.build({ a: 0x0304, b: { b1: 1, b2: 2 } })).toEqual(Uint8Array.of(3, 4));
  });

  it('fails to build when no field is present', () => {
    expect(() => union.build({ x: 1 })).toThrow(SelectError);
    expect(() => union.build({ x: 1 })).toThrow('no union field is present in {x: 1}\n(building)');
  });

  it('merges embedded fields', () => {
    const overlay = new Union({
      fields: [
        { construct: new Embedded(new Struct({ fields: [{ name: 'char', construct: Int8ub }] })) },
        { name: 'wide', construct: Int16ub },
      ],
    });
    expect(overlay.parse(Uint8Array.of(5, 6))).toEqual({ char: 5, wide: 0x0506 });
    expect(overlay.build({ char: 7 })).toEqual(Uint8Array.of(7));
  });

  it('has a size only when every field agrees', () => {
    const bytes = new Union({
      fields: [
        { name: 'x', construct: Int8ub },
        { name: 'y', construct: Int8ub },
      ],
    });
    expect(bytes.sizeof()).toBe(1);
    expect(() => union.sizeof()).toThrow(SizeofError);
    expect(() => new Union({ fields: [{ name: 'x', construct: Int8ub }, { name: 'w', construct: Int16ub }] }).sizeof())
      .toThrow('union fields differ in size');
  });

  it('checks parseFrom', () => {
    const fields = [{ name: 'x', construct: Int8ub }];
    expect(() => new Union({ fields, parseFrom: 'z' })).toThrow(ArgumentError);
    expect(() => new Union({ fields, parseFrom: 'z' })).toThrow("union has no field 'z'");
    expect(() => new Union({ fields, parseFrom: 1 })).toThrow('union field index 1 is out of range');
    expect(() => new Union({ fields: [] })).toThrow('a union needs at least one field');
  });
});
