import { CheckError, IndexFieldError, StreamError } from '../../src/errors';
import { add, eq, ref } from '../../src/expr';
import { Int8ub } from '../../src/constructs/FormatField';
import { Check, Computed, Const, Index, Padding, Pass, Probe, Terminated } from '../../src/constructs/Special';
import { Struct } from '../../src/constructs/Struct';

describe('Const', () => {
  it('checks parsed bytes', () => {
    const magic = Const.bytes(Uint8Array.of(1, 2));
    expect(magic.parse(Uint8Array.of(1, 2))).toEqual(Uint8Array.of(1, 2));
    expect(() => magic.parse(Uint8Array.of(1, 3))).toThrow(CheckError);
    expect(() => magic.parse(Uint8Array.of(1, 3))).toThrow('expected <01 02> but parsed <01 03>');
  });

  it('checks parsed values', () => {
    expect(() => new Const(1, Int8ub).parse(Uint8Array.of(2))).toThrow('expected 1 but parsed 2');
  });

  it('writes the constant when a record omits it', () => {
    const packet = new Struct({ fields: [{ name: 'magic', construct: new Const(7, Int8ub) }, { name: 'a', construct: Int8ub }] });
    expect(packet.build({ a: 1 })).toEqual(Uint8Array.of(7, 1));
    expect(packet.parse(Uint8Array.of(7, 1))).toEqual({ magic: 7, a: 1 });
  });

  it('rejects a different build value', () => {
    expect(() => new Const(1, Int8ub).build(2)).toThrow('expected 1 but got 2');
  });
});

describe('Computed', () => {
  it('evaluates without touching the stream', () => {
    const field = new Computed(add(ref('a'), 1));
    expect(field.parse(new Uint8Array(0), { a: 1 })).toBe(2);
    expect(field.build(undefined, { a: 4 })).toEqual(new Uint8Array(0));
    expect(field.sizeof()).toBe(0);
  });
});

describe('Pass and Terminated', () => {
  it('consume nothing', () => {
    expect(Pass.parse(Uint8Array.of(1))).toBeUndefined();
    expect(Pass.sizeof()).toBe(0);
    expect(Terminated.parse(new Uint8Array(0))).toBeUndefined();
  });

  it('rejects trailing data', () => {
    expect(() => Terminated.parse(Uint8Array.of(1))).toThrow(StreamError);
    expect(() => Terminated.parse(Uint8Array.of(1))).toThrow('expected end of stream');
  });
});

describe('Padding', () => {
  it('writes the pattern', () => {
    expect(new Padding(3, 0xff).build(undefined)).toEqual(Uint8Array.of(0xff, 0xff, 0xff));
    expect(new Padding(ref('n')).sizeof({ n: 2 })).toBe(2);
  });

  it('ignores content unless strict', () => {
    expect(new Padding(2).parse(Uint8Array.of(0, 1))).toBeUndefined();
    expect(() => new Padding(2, 0, true).parse(Uint8Array.of(0, 1))).toThrow(
      'padding <00 01> does not match pattern 0x0',
    );
  });
});

describe('Index', () => {
  it('fails outside of a repetition', () => {
    expect(() => Index.parse(new Uint8Array(0))).toThrow(IndexFieldError);
    expect(() => Index.parse(new Uint8Array(0))).toThrow('Index used outside of a repetition');
  });
});

describe('Check', () => {
  it('names the failing expression', () => {
    const check = new Check(eq(ref('a'), 1));
    expect(check.parse(new Uint8Array(0), { a: 1 })).toBeUndefined();
    expect(() => check.parse(new Uint8Array(0), { a: 2 })).toThrow('check failed: (a == 1)');
  });

  it('describes function predicates generically', () => {
    expect(() => new Check(() => false).build(undefined)).toThrow('check failed: predicate');
  });
});

describe('Probe', () => {
  it('reports an expression with path and offset', () => {
    const lines: string[] = [];
    const packet = new Struct({
      fields: [
        { name: 'a', construct: Int8ub },
        { name: 'probe', construct: new Probe(ref('a'), line => lines.push(line)) },
      ],
    });
    expect(packet.parse(Uint8Array.of(7))).toEqual({ a: 7, probe: undefined });
    expect(lines).toEqual(['Probe (parsing) -> probe at offset 1: a = 7']);
  });

  it('reports the whole frame', () => {
    const lines: string[] = [];
    const packet = new Struct({
      fields: [
        { name: 'a', construct: Int8ub },
        { construct: new Probe(undefined, line => lines.push(line)) },
      ],
    });
    packet.parse(Uint8Array.of(2));
    expect(lines).toEqual(['Probe (parsing) -> 1 at offset 1: {a: 2}']);
  });
});
