import { StreamError } from '../../src/errors';
import { ref } from '../../src/expr';
import { Int16ub, Int8ub } from '../../src/constructs/FormatField';
import { Peek, Pointer, Tell } from '../../src/constructs/StreamOps';
import { Struct } from '../../src/constructs/Struct';
import { OneWayStream } from '../support/OneWayStream';

describe('Pointer', () => {
  const packet = new Struct({
    fields: [
      { name: 'ptr', construct: Int8ub },
      { name: 'target', construct: new Pointer(ref('ptr'), Int8ub) },
      { name: 'next', construct: Int8ub },
    ],
  });

  it('parses at an absolute offset and returns', () => {
    expect(packet.parse(Uint8Array.of(3, 0x0a, 0x0b, 0x0c))).toEqual({ ptr: 3, target: 12, next: 10 });
  });

  it('builds at an absolute offset', () => {
    const layout = new Struct({
      fields: [
        { name: 'ptr', construct: Int8ub },
        { name: 'data', construct: new Pointer(4, Int8ub) },
      ],
    });
    expect(layout.build({ ptr: 1, data: 7 })).toEqual(Uint8Array.of(1, 0, 0, 0, 7));
  });

  it('needs a seekable stream', () => {
    const stream = new OneWayStream(Uint8Array.of(3, 0x0a, 0x0b, 0x0c));
    expect(() => packet.parseStream(stream)).toThrow(StreamError);
    expect(() => packet.parseStream(new OneWayStream(Uint8Array.of(3, 0)))).toThrow(
      'stream is not seekable\n(parsing) -> target',
    );
  });
});

describe('Peek', () => {
  it('parses without consuming', () => {
    const packet = new Struct({
      fields: [
        { name: 'peeked', construct: new Peek(Int16ub) },
        { name: 'a', construct: Int8ub },
        { name: 'b', construct: Int8ub },
      ],
    });
    expect(packet.parseStream(new OneWayStream(Uint8Array.of(1, 2)))).toEqual({ peeked: 0x0102, a: 1, b: 2 });
    expect(packet.build({ a: 1, b: 2 })).toEqual(Uint8Array.of(1, 2));
  });
});

describe('Tell', () => {
  it('reports the offset', () => {
    const packet = new Struct({ fields: [{ name: 'a', construct: Int8ub }, { name: 'at', construct: Tell }] });
    expect(packet.parse(Uint8Array.of(5))).toEqual({ a: 5, at: 1 });
    expect(packet.build({ a: 5 })).toEqual(Uint8Array.of(5));
  });
});
