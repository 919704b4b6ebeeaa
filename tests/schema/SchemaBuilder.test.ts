import { ArgumentError } from '../../src/errors';
import { RefExpr } from '../../src/expr';
import { If } from '../../src/constructs/Conditional';
import { FormatField } from '../../src/constructs/FormatField';
import { buildExpr, SchemaBuilder } from '../../src/schema/SchemaBuilder';
import type { SchemaNode } from '../../src/schema/SchemaBuilder';

const u8: SchemaNode = { type: 'int', size: 1 };

describe('SchemaBuilder', () => {
  describe('primitives', () => {
    it('builds integer fields', () => {
      const field = SchemaBuilder.build({ type: 'int', size: 2, signed: true, endian: 'little' });
      expect(field).toBeInstanceOf(FormatField);
      expect(field.parse(Uint8Array.of(0xfe, 0xff))).toBe(-2);
    });

    it('builds floats, flags and varints', () => {
      expect(SchemaBuilder.build({ type: 'float', size: 4 }).build(1.5)).toEqual(Uint8Array.of(0x3f, 0xc0, 0, 0));
      expect(SchemaBuilder.build({ type: 'flag' }).parse(Uint8Array.of(1))).toBe(true);
      expect(SchemaBuilder.build({ type: 'varint' }).build(300)).toEqual(Uint8Array.of(0xac, 0x02));
    });

    it('builds strings with their encoding', () => {
      expect(SchemaBuilder.build({ type: 'string', length: 3, encoding: 'ascii' }).build('a')).toEqual(
        Uint8Array.of(0x61, 0, 0),
      );
      expect(SchemaBuilder.build({ type: 'pascalString', lengthField: u8 }).build('hi')).toEqual(
        Uint8Array.of(2, 0x68, 0x69),
      );
      expect(SchemaBuilder.build({ type: 'cstring' }).parse(Uint8Array.of(0x61, 0))).toBe('a');
    });

    it('builds byte and value constants', () => {
      expect(SchemaBuilder.build({ type: 'const', value: [0xca, 0xfe] }).parse(Uint8Array.of(0xca, 0xfe))).toEqual(
        Uint8Array.of(0xca, 0xfe),
      );
      expect(() => SchemaBuilder.build({ type: 'const', value: 1, schema: u8 }).parse(Uint8Array.of(2))).toThrow(
        'expected 1 but parsed 2',
      );
    });
  });

  describe('structures', () => {
    const packet = SchemaBuilder.build({
      type: 'struct',
      fields: [
        { name: 'length', schema: { type: 'rebuild', schema: u8, value: { len: 'data' } } },
        { name: 'data', schema: { type: 'bytes', length: 'length' } },
        { name: 'count', schema: u8 },
        { name: 'items', schema: { type: 'array', count: { op: '*', left: 'count', right: 2 }, item: u8 } },
      ],
    });

    it('evaluates expressions over earlier fields', () => {
      expect(packet.parse(Uint8Array.of(1, 9, 1, 4, 5))).toEqual({
        length: 1,
        data: Uint8Array.of(9),
        count: 1,
        items: [4, 5],
      });
    });

    it('rebuilds derived fields', () => {
      expect(packet.build({ data: Uint8Array.of(9, 8), count: 0, items: [] })).toEqual(Uint8Array.of(2, 9, 8, 0));
    });

    it('builds switches keyed by string', () => {
      const tagged = SchemaBuilder.build({
        type: 'struct',
        fields: [
          { name: 'kind', schema: u8 },
          { name: 'body', schema: { type: 'switch', selector: 'kind', cases: { 1: u8, 2: { type: 'int', size: 2 } } } },
        ],
      });
      expect(tagged.parse(Uint8Array.of(2, 0, 7))).toEqual({ kind: 2, body: 7 });
    });

    it('builds embedded switches', () => {
      const tagged = SchemaBuilder.build({
        type: 'struct',
        fields: [
          { name: 'kind', schema: u8 },
          {
            embedded: true,
            schema: {
              type: 'switch',
              selector: 'kind',
              embedded: true,
              cases: { 1: { type: 'struct', fields: [{ name: 'x', schema: u8 }] } },
            },
          },
        ],
      });
      expect(tagged.parse(Uint8Array.of(1, 4))).toEqual({ kind: 1, x: 4 });
    });

    it('builds an if without else as If', () => {
      const optional = SchemaBuilder.build({ type: 'if', condition: 'present', then: u8 });
      expect(optional).toBeInstanceOf(If);
      expect(optional.parse(Uint8Array.of(3), { present: false })).toBeUndefined();
    });

    it('builds optional fields and defaults', () => {
      const record = SchemaBuilder.build({
        type: 'struct',
        fields: [
          { name: 'a', schema: u8, defaultValue: 4 },
          { name: 'b', schema: u8, optional: true },
        ],
      });
      expect(record.build({})).toEqual(Uint8Array.of(4));
      expect(record.parse(Uint8Array.of(1, 2))).toEqual({ a: 1, b: 2 });
    });

    it('builds enums and prefixed arrays', () => {
      const list = SchemaBuilder.build({
        type: 'prefixedArray',
        countField: u8,
        item: { type: 'enum', schema: u8, members: { on: 1, off: 0 } },
      });
      expect(list.parse(Uint8Array.of(2, 1, 0))).toEqual(['on', 'off']);
      expect(list.build(['off'])).toEqual(Uint8Array.of(1, 0));
    });

    it('builds sequences', () => {
      const pair = SchemaBuilder.build({ type: 'sequence', items: [{ name: 'n', schema: u8 }, { schema: { type: 'bytes', length: 'n' } }] });
      expect(pair.parse(Uint8Array.of(1, 7))).toEqual([1, Uint8Array.of(7)]);
    });
  });

  describe('references', () => {
    it('needs a registry', () => {
      expect(() => SchemaBuilder.build({ type: '$ref', ref: 'Header' })).toThrow(ArgumentError);
      expect(() => SchemaBuilder.build({ type: '$ref', ref: 'Header' })).toThrow(
        "cannot resolve $ref 'Header' without a schema registry; use SchemaBuilder.buildAll() for schemas containing $ref nodes",
      );
    });

    it('resolves recursive schemas built together', () => {
      const registry = SchemaBuilder.buildAll({
        Tree: {
          type: 'struct',
          fields: [
            { name: 'value', schema: u8 },
            { name: 'children', schema: { type: 'prefixedArray', countField: u8, item: { type: '$ref', ref: 'Tree' } } },
          ],
        },
      });
      expect(registry.isRecursive('Tree')).toBe(true);
      expect(registry.get('Tree').parse(Uint8Array.of(1, 1, 2, 0))).toEqual({
        value: 1,
        children: [{ value: 2, children: [] }],
      });
    });
  });

  describe('fromJSON', () => {
    it('validates and builds a module', () => {
      const registry = SchemaBuilder.fromJSON('{"Id": {"type": "int", "size": 2}}');
      expect(registry.names()).toEqual(['Id']);
      expect(registry.get('Id').parse(Uint8Array.of(1, 0))).toBe(256);
    });

    it('reports malformed JSON', () => {
      expect(() => SchemaBuilder.fromJSON('{')).toThrow(ArgumentError);
      expect(() => SchemaBuilder.fromJSON('{')).toThrow(/^schema JSON is malformed: /);
    });

    it('reports invalid nodes with their location', () => {
      expect(() => SchemaBuilder.fromJSON('{"Id": {"type": "int", "size": 3}}')).toThrow(
        'Id.size: integer size must be 1, 2, 4 or 8',
      );
    });
  });
});

describe('buildExpr', () => {
  it('turns strings into references', () => {
    const expr = buildExpr('header.length');
    expect(expr).toBeInstanceOf(RefExpr);
    expect(expr.toString()).toBe('header.length');
  });

  it('builds operator trees', () => {
    expect(buildExpr({ op: '+', left: 'a', right: 1 }).toString()).toBe('(a + 1)');
    expect(buildExpr({ not: { op: '==', left: { len: 'data' }, right: 0 } }).toString()).toBe('!(len(data) == 0)');
    expect(buildExpr({ lit: 'x' }).toString()).toBe('"x"');
    expect(buildExpr(true).toString()).toBe('true');
  });
});
