import { ArgumentError } from '../../src/errors';
import { parseSchemaModule } from '../../src/parser/SchemaParser';
import { convertModuleToSchemaNodes } from '../../src/parser/toSchemaNode';
import type { SchemaNode } from '../../src/schema/SchemaBuilder';

function convert(text: string): Record<string, SchemaNode> {
  return convertModuleToSchemaNodes(parseSchemaModule(text));
}

const u8: SchemaNode = { type: 'int', size: 1, signed: false, endian: 'big' };

describe('convertModuleToSchemaNodes', () => {
  it('converts primitives', () => {
    expect(convert('A = u8\nB = u16le\nC = greedybytes\nD = cstring("ascii")')).toEqual({
      A: u8,
      B: { type: 'int', size: 2, signed: false, endian: 'little' },
      C: { type: 'greedyBytes' },
      D: { type: 'cstring', encoding: 'ascii' },
    });
  });

  it('converts structs with expressions', () => {
    expect(convert('Packet = { length: rebuild(u32be, len(data)), data: bytes(length) }')).toEqual({
      Packet: {
        type: 'struct',
        fields: [
          {
            name: 'length',
            schema: { type: 'rebuild', schema: { type: 'int', size: 4, signed: false, endian: 'big' }, value: { len: 'data' } },
          },
          { name: 'data', schema: { type: 'bytes', length: 'length' } },
        ],
      },
    });
  });

  it('keeps optional markers and defaults', () => {
    expect(convert('R = { a: u8 = 3, b?: u8 }').R).toEqual({
      type: 'struct',
      fields: [
        { name: 'a', schema: u8, defaultValue: 3 },
        { name: 'b', schema: u8, optional: true },
      ],
    });
  });

  it('turns references into $ref nodes', () => {
    expect(convert('H = { x: u8 }\nM = { embed H\n h: H }').M).toEqual({
      type: 'struct',
      fields: [
        { schema: { type: '$ref', ref: 'H' }, embedded: true },
        { name: 'h', schema: { type: '$ref', ref: 'H' } },
      ],
    });
  });

  it('allows references to later definitions', () => {
    expect(convert('A = array(2, B)\nB = u8').A).toEqual({ type: 'array', count: 2, item: { type: '$ref', ref: 'B' } });
  });

  it('keys switch cases by string', () => {
    expect(convert('S = switch (kind) { 1: u8, default: pass }').S).toEqual({
      type: 'switch',
      selector: 'kind',
      cases: { 1: u8 },
      default: { type: 'pass' },
      embedded: false,
    });
  });

  it('converts enums to member maps', () => {
    expect(convert('E = enum(u8) { on = 1, off = 0 }').E).toEqual({
      type: 'enum',
      schema: u8,
      members: { on: 1, off: 0 },
    });
  });

  describe('errors', () => {
    it('rejects duplicate definitions', () => {
      expect(() => convert('A = u8\nA = u16be')).toThrow(ArgumentError);
      expect(() => convert('A = u8\nA = u16be')).toThrow("line 2: 'A' is defined twice");
    });

    it('rejects unknown references', () => {
      expect(() => convert('B = {\n  a: Missing\n}')).toThrow("line 2: unknown type 'Missing'");
    });

    it('rejects duplicate enum members', () => {
      expect(() => convert('E = enum(u8) { a = 1, a = 2 }')).toThrow("enum member 'a' is defined twice");
    });

    it('rejects constants that are not bytes', () => {
      expect(() => convert('M = const [1, 256]')).toThrow(ArgumentError);
      expect(() => convert('M = const [-1]')).toThrow('-1 is not a byte');
    });

        it('rejects unknown encodings', () => {
      expect(() => convert('S = cstring("latin1")')).toThrow("unknown text encoding 'latin1'");
    });
  });
});
