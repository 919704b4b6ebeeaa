import { ArgumentError, MissingFieldError } from '../../src/errors';
import { ref } from '../../src/expr';
import { Bytes } from '../../src/constructs/Bytes';
import { Embedded } from '../../src/constructs/Construct';
import { Int16ub, Int8ub } from '../../src/constructs/FormatField';
import { Sequence } from '../../src/constructs/Sequence';
import { Struct } from '../../src/constructs/Struct';

describe('Sequence', () => {
  it('parses to an array', () => {
    const pair = new Sequence({ items: [{ construct: Int8ub }, { construct: Int16ub }] });
    expect(pair.parse(Uint8Array.of(1, 0, 2))).toEqual([1, 2]);
    expect(pair.build([1, 2])).toEqual(Uint8Array.of(1, 0, 2));
    expect(pair.sizeof()).toBe(3);
  });

  it('exposes named items to later items', () => {
    const packet = new Sequence({ items: [{ name: 'n', construct: Int8ub }, { construct: new Bytes(ref('n')) }] });
    expect(packet.parse(Uint8Array.of(2, 7, 8))).toEqual([2, Uint8Array.of(7, 8)]);
  });

  describe('embedding', () => {
    const triple = new Sequence({
      items: [
        { construct: Int8ub },
        { construct: new Embedded(new Sequence({ items: [{ construct: Int8ub }, { construct: Int8ub }] })) },
      ],
    });

    it('splices an embedded sequence', () => {
      expect(triple.width).toBe(3);
      expect(triple.parse(Uint8Array.of(1, 2, 3))).toEqual([1, 2, 3]);
      expect(triple.build([1, 2, 3])).toEqual(Uint8Array.of(1, 2, 3));
    });

    it('rejects too many entries', () => {
      expect(() => triple.build([1, 2, 3, 4])).toThrow(ArgumentError);
      expect(() => triple.build([1, 2, 3, 4])).toThrow('expected 3 entries, got 4');
    });

    it('accepts only sequences', () => {
      const header = new Struct({ fields: [{ name: 'a', construct: Int8ub }] });
      expect(() => new Sequence({ items: [{ construct: new Embedded(header) }] })).toThrow(
        'only a Sequence can be embedded in a Sequence, got Struct',
      );
    });
  });

  it('reports a missing entry', () => {
    const pair = new Sequence({ items: [{ construct: Int8ub }, { construct: Int8ub }] });
    expect(() => pair.build([1])).toThrow(MissingFieldError);
    expect(() => pair.build([1])).toThrow('missing entry 1');
  });
});
