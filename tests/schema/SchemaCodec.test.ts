import { CompiledConstruct } from '../../src/compiler/CompiledConstruct';
import type { CompileFallback } from '../../src/compiler/Compiler';
import { Int16ub } from '../../src/constructs/FormatField';
import { SchemaBuilder } from '../../src/schema/SchemaBuilder';
import type { SchemaNode } from '../../src/schema/SchemaBuilder';
import { SchemaCodec } from '../../src/schema/SchemaCodec';

const record: SchemaNode = {
  type: 'struct',
  fields: [
    { name: 'id', schema: { type: 'int', size: 2 } },
    { name: 'name', schema: { type: 'pascalString', lengthField: { type: 'int', size: 1 } } },
  ],
};

describe('SchemaCodec', () => {
  it('encodes and decodes through a schema node', () => {
    const codec = new SchemaCodec(record);
    expect(codec.encodeToHex({ id: 258, name: 'ab' })).toBe('0102026162');
    expect(codec.decodeFromHex('0102026162')).toEqual({ id: 258, name: 'ab' });
  });

  it('wraps a construct', () => {
    const codec = new SchemaCodec(Int16ub);
    expect(codec.construct).toBe(Int16ub);
    expect(codec.sizeof()).toBe(2);
    expect(codec.encode(7)).toEqual(Uint8Array.of(0, 7));
  });

  it('compiles on request', () => {
    const codec = new SchemaCodec(record, { compiled: true });
    expect(codec.construct).toBeInstanceOf(CompiledConstruct);
    expect(codec.decode(Uint8Array.of(0, 1, 1, 0x7a))).toEqual({ id: 1, name: 'z' });
  });

  it('reports compiler fallbacks', () => {
    const seen: CompileFallback[] = [];
    const registry = SchemaBuilder.buildAll({
      List: {
        type: 'struct',
        fields: [
          { name: 'more', schema: { type: 'flag' } },
          { name: 'next', schema: { type: 'if', condition: 'more', then: { type: '$ref', ref: 'List' } } },
        ],
      },
    });
    const codec = SchemaCodec.fromRegistry(registry, 'List', { compiled: true, onFallback: f => seen.push(f) });
    expect(seen).toEqual([{ path: 'next', construct: 'Ref', reason: "recursive reference 'List'" }]);
    expect(codec.decodeFromHex('0100')).toEqual({ more: true, next: { more: false, next: undefined } });
  });

  it('passes context entries through', () => {
    const codec = new SchemaCodec({ type: 'bytes', length: 'size' });
    expect(codec.decodeFromHex('0a0b0c', { size: 2 })).toEqual(Uint8Array.of(0x0a, 0x0b));
    expect(codec.sizeof({ size: 5 })).toBe(5);
  });
});
