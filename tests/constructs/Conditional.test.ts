import { MissingFieldError, SelectError, SizeofError, SwitchError } from '../../src/errors';
import { lit, ref } from '../../src/expr';
import { EmbeddedSwitch, If, IfThenElse, Optional, Select, Switch } from '../../src/constructs/Conditional';
import { Flag, Int16ub, Int8ub } from '../../src/constructs/FormatField';
import { Const } from '../../src/constructs/Special';
import { Struct } from '../../src/constructs/Struct';

describe('IfThenElse', () => {
  it('picks a branch from the context', () => {
    const field = new IfThenElse(ref('wide'), Int16ub, Int8ub);
    expect(field.parse(Uint8Array.of(1, 2), { wide: true })).toBe(0x0102);
    expect(field.parse(Uint8Array.of(1, 2), { wide: false })).toBe(1);
    expect(field.sizeof({ wide: true })).toBe(2);
  });
});

describe('If', () => {
  const packet = new Struct({
    fields: [
      { name: 'flag', construct: Flag },
      { name: 'value', construct: new If(ref('flag'), Int8ub) },
    ],
  });

  it('parses nothing when the condition is false', () => {
    expect(packet.parse(Uint8Array.of(0))).toEqual({ flag: false, value: undefined });
    expect(packet.parse(Uint8Array.of(1, 5))).toEqual({ flag: true, value: 5 });
  });

  it('builds without a value when the condition is false', () => {
    expect(packet.build({ flag: false })).toEqual(Uint8Array.of(0));
    expect(packet.build({ flag: true, value: 5 })).toEqual(Uint8Array.of(1, 5));
  });

  it('requires a value when the condition holds', () => {
    expect(() => packet.build({ flag: true })).toThrow(MissingFieldError);
    expect(() => packet.build({ flag: true })).toThrow('missing value for the selected branch\n(building) -> value');
  });
});

describe('Switch', () => {
  const packet = new Struct({
    fields: [
      { name: 'kind', construct: Int8ub },
      { name: 'body', construct: new Switch({ selector: ref('kind'), cases: { 1: Int8ub, 2: Int16ub } }) },
    ],
  });

  it('selects the case by key', () => {
    expect(packet.parse(Uint8Array.of(2, 0, 5))).toEqual({ kind: 2, body: 5 });
    expect(packet.build({ kind: 1, body: 9 })).toEqual(Uint8Array.of(1, 9));
  });

  it('raises SwitchError without a matching case', () => {
    expect(() => packet.parse(Uint8Array.of(3, 0))).toThrow(SwitchError);
    expect(() => packet.parse(Uint8Array.of(3, 0))).toThrow('no case matches key 3\n(parsing) -> body');
  });

  it('falls back to the default case', () => {
    const body = new Switch({ selector: ref('kind'), cases: { 1: Int8ub }, default: Int16ub });
    expect(body.parse(Uint8Array.of(0, 4), { kind: 7 })).toBe(4);
  });

  it('matches bigint and number keys alike', () => {
    const body = new Switch({ selector: lit(1), cases: new Map([[1n, Int8ub]]) });
    expect(body.parse(Uint8Array.of(6))).toBe(6);
  });

  it('sizes equal branches without a key', () => {
    const same = new Switch({ selector: ref('kind'), cases: { 1: Int8ub, 2: Flag } });
    expect(same.sizeof()).toBe(1);
  });

  it('refuses to size differing branches without a key', () => {
    const body = new Switch({ selector: ref('kind'), cases: { 1: Int8ub, 2: Int16ub } });
    expect(body.sizeof({ kind: 2 })).toBe(2);
    expect(() => body.sizeof()).toThrow(SizeofError);
    expect(() => body.sizeof()).toThrow('switch branches differ in size and the key is unknown');
  });
});

describe('EmbeddedSwitch', () => {
  const packet = new Struct({
    fields: [
      { name: 'kind', construct: Int8ub },
      {
        construct: new EmbeddedSwitch({
          selector: ref('kind'),
          cases: {
            1: new Struct({ fields: [{ name: 'x', construct: Int8ub }] }),
            2: new Struct({ fields: [{ name: 'y', construct: Int8ub }, { name: 'z', construct: Int8ub }] }),
          },
        }),
      },
    ],
  });

  it('merges the chosen branch into the parent', () => {
    expect(packet.parse(Uint8Array.of(2, 3, 4))).toEqual({ kind: 2, y: 3, z: 4 });
    expect(packet.build({ kind: 1, x: 9 })).toEqual(Uint8Array.of(1, 9));
  });
});

describe('Select', () => {
  it('takes the first alternative that parses', () => {
    const field = new Select([new Const(1, Int8ub), Int16ub]);
    expect(field.parse(Uint8Array.of(1))).toBe(1);
    expect(field.parse(Uint8Array.of(2, 3))).toBe(0x0203);
  });

  it('raises SelectError when nothing matches', () => {
    const field = new Select([new Const(1, Int8ub), new Const(2, Int8ub)]);
    expect(() => field.parse(Uint8Array.of(3))).toThrow(SelectError);
    expect(() => field.parse(Uint8Array.of(3))).toThrow('no alternative matched');
  });

  it('builds with the first alternative that accepts the value', () => {
    expect(new Select([Int8ub, Int16ub]).build(300)).toEqual(Uint8Array.of(0x01, 0x2c));
  });
});

describe('Optional', () => {
  it('parses to undefined and leaves the input', () => {
    const packet = new Struct({
      fields: [
        { name: 'wide', construct: new Optional(Int16ub) },
        { name: 'last', construct: Int8ub },
      ],
    });
    expect(packet.parse(Uint8Array.of(7))).toEqual({ wide: undefined, last: 7 });
  });
});
