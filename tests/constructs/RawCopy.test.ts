import { RawCopyError } from '../../src/errors';
import { Int16ub, Int8ub } from '../../src/constructs/FormatField';
import { RawCopy } from '../../src/constructs/RawCopy';
import { Struct } from '../../src/constructs/Struct';

describe('RawCopy', () => {
  const packet = new Struct({
    fields: [
      { name: 'a', construct: Int8ub },
      { name: 'raw', construct: new RawCopy(Int16ub) },
    ],
  });

  it('returns the consumed bytes with their offsets', () => {
    expect(packet.parse(Uint8Array.of(9, 1, 2))).toEqual({
      a: 9,
      raw: { data: Uint8Array.of(1, 2), value: 0x0102, offset1: 1, offset2: 3, length: 2 },
    });
  });

  it('builds from a value', () => {
    expect(packet.build({ a: 9, raw: { value: 0x0102 } })).toEqual(Uint8Array.of(9, 1, 2));
  });

  it('builds from raw data', () => {
    expect(packet.build({ a: 9, raw: { data: Uint8Array.of(0, 5) } })).toEqual(Uint8Array.of(9, 0, 5));
  });

  it('needs data or a value', () => {
    expect(() => packet.build({ a: 9, raw: {} })).toThrow(RawCopyError);
    expect(() => packet.build({ a: 9, raw: {} })).toThrow('neither data nor value was given\n(building) -> raw');
  });
});
