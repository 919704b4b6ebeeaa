import { MemoryStream } from '../src/ByteStream';
import { StreamError } from '../src/errors';
import { Path } from '../src/Path';
import { StreamCursor } from '../src/StreamCursor';
import { OneWayStream } from './support/OneWayStream';

const path = Path.root('parsing');

function oneWay(...bytes: number[]): StreamCursor {
  return new StreamCursor(new OneWayStream(Uint8Array.from(bytes)));
}

describe('StreamCursor', () => {
  it('assembles exact reads from short stream reads', () => {
    const cursor = oneWay(1, 2, 3, 4);
    expect(cursor.read(3, path)).toEqual(Uint8Array.of(1, 2, 3));
    expect(cursor.offset).toBe(3);
  });

  it('raises StreamError when data runs out', () => {
    const cursor = oneWay(1, 2);
    let caught: unknown;
    try {
      cursor.read(4, path.child('len'));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StreamError);
    expect(caught).toHaveProperty('detail', 'expected 4 bytes, found 2');
    expect(caught).toHaveProperty('message', 'expected 4 bytes, found 2\n(parsing) -> len');
  });

  it('checks for the end without consuming input', () => {
    const cursor = oneWay(7);
    expect(cursor.atEnd()).toBe(false);
    expect(cursor.offset).toBe(0);
    expect(cursor.read(1, path)).toEqual(Uint8Array.of(7));
    expect(cursor.atEnd()).toBe(true);
  });

  it('rewinds speculative reads on a stream without seek', () => {
    const cursor = oneWay(1, 2, 3, 4, 5);
    cursor.read(1, path);
    const mark = cursor.mark();
    expect(cursor.read(3, path)).toEqual(Uint8Array.of(2, 3, 4));
    cursor.rewind(mark);
    expect(cursor.offset).toBe(1);
    expect(cursor.readRest()).toEqual(Uint8Array.of(2, 3, 4, 5));
  });

  it('supports nested marks', () => {
    const cursor = oneWay(1, 2, 3, 4);
    const outer = cursor.mark();
    cursor.read(1, path);
    const inner = cursor.mark();
    cursor.read(2, path);
    cursor.rewind(inner);
    expect(cursor.captured(outer)).toEqual(Uint8Array.of(1));
    cursor.read(1, path);
    cursor.rewind(outer);
    expect(cursor.read(4, path)).toEqual(Uint8Array.of(1, 2, 3, 4));
  });

  it('captures bytes read since a mark', () => {
    const cursor = oneWay(9, 8, 7);
    cursor.read(1, path);
    const mark = cursor.mark();
    cursor.read(2, path);
    expect(cursor.captured(mark)).toEqual(Uint8Array.of(8, 7));
    cursor.release(mark);
    expect(cursor.atEnd()).toBe(true);
  });

  it('counts written bytes', () => {
    const stream = new OneWayStream();
    const cursor = new StreamCursor(stream);
    cursor.write(Uint8Array.of(1, 2));
    cursor.write(Uint8Array.of(3));
    expect(cursor.offset).toBe(3);
    expect(stream.written).toEqual([1, 2, 3]);
  });

  it('refuses seeking on a one-way stream', () => {
    expect(() => oneWay(1).seekable(path)).toThrow(StreamError);
    expect(() => oneWay(1).seekable(path)).toThrow('stream is not seekable');
  });

  it('exposes a seekable stream with its origin', () => {
    const stream = MemoryStream.fromHex('000102');
    stream.read(1);
    const cursor = new StreamCursor(stream);
    expect(cursor.seekable(path).origin).toBe(1);
  });
});
