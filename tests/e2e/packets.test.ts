import { hexToBytes } from '../../src/ByteStream';
import { verifyCompiled } from '../../src/compiler/verify';
import { compile } from '../../src/compiler/CompiledConstruct';
import { parseSchemaModule } from '../../src/parser/SchemaParser';
import { convertModuleToSchemaNodes } from '../../src/parser/toSchemaNode';
import { SchemaBuilder } from '../../src/schema/SchemaBuilder';
import { SchemaCodec } from '../../src/schema/SchemaCodec';

const NOTATION = `
# Telemetry frames
Header = {
  magic: const [0x53, 0x4e],
  version: u8,
  kind: enum(u8) { reading = 1, status = 2 },
}

Reading = {
  sensor: u16be,
  value: s32le,
}

Frame = {
  embed Header
  count: rebuild(u8, len(readings)),
  readings: array(count, Reading),
  note: pascalstring(u8, "utf8"),
}

// Arithmetic tree; every non-zero op has two operands
Node = {
  op: u8,
  body: switch (op) {
    0: { value: s16be },
    default: { left: Node, right: Node },
  },
}
`;

const FRAME_HEX = '534e0101020007feffffff000800010000026869';

const frame = {
  magic: Uint8Array.of(0x53, 0x4e),
  version: 1,
  kind: 'reading',
  count: 2,
  readings: [
    { sensor: 7, value: -2 },
    { sensor: 8, value: 256 },
  ],
  note: 'hi',
};

const nodes = convertModuleToSchemaNodes(parseSchemaModule(NOTATION));
const registry = SchemaBuilder.buildAll(nodes);

describe('notation to codec', () => {
  it('decodes a frame with an embedded header', () => {
    expect(SchemaCodec.fromRegistry(registry, 'Frame').decodeFromHex(FRAME_HEX)).toEqual(frame);
  });

  it('encodes a frame, deriving the count', () => {
    const codec = SchemaCodec.fromRegistry(registry, 'Frame');
    expect(
      codec.encodeToHex({ version: 1, kind: 'reading', readings: frame.readings, note: 'hi' }),
    ).toBe(FRAME_HEX);
  });

  it('handles recursive definitions', () => {
    const codec = SchemaCodec.fromRegistry(registry, 'Node');
    const tree = {
      op: 1,
      body: { left: { op: 0, body: { value: 5 } }, right: { op: 0, body: { value: -2 } } },
    };
    expect(registry.isRecursive('Node')).toBe(true);
    expect(registry.isRecursive('Frame')).toBe(false);
    expect(codec.decodeFromHex('0100000500fffe')).toEqual(tree);
    expect(codec.encodeToHex(tree)).toBe('0100000500fffe');
  });

  it('gives the same result through JSON', () => {
    const fromJson = SchemaBuilder.fromJSON(JSON.stringify(nodes));
    expect(fromJson.names()).toEqual(['Header', 'Reading', 'Frame', 'Node']);
    expect(new SchemaCodec(fromJson.get('Frame')).decodeFromHex(FRAME_HEX)).toEqual(frame);
  });
});

describe('compiled codecs', () => {
  it('agree with the interpreter', () => {
    const source = registry.get('Frame');
    const payloads = [hexToBytes(FRAME_HEX), hexToBytes('534e0102000000')];
    expect(() => verifyCompiled(source, compile(source), payloads)).not.toThrow();
  });

  it('decode the same frame', () => {
    const codec = SchemaCodec.fromRegistry(registry, 'Frame', { compiled: true });
    expect(codec.decodeFromHex(FRAME_HEX)).toEqual(frame);
  });

  it('run recursive definitions', () => {
    const codec = SchemaCodec.fromRegistry(registry, 'Node', { compiled: true });
    expect(codec.decodeFromHex('0000fe')).toEqual({ op: 0, body: { value: -2 } });
  });
});
