import { ByteStream, SeekableByteStream, isSeekable } from './ByteStream';
import { StreamError } from './errors';
import type { Path } from './Path';

/** Token returned by {@link StreamCursor.mark}. */
export interface CursorMark {
  readonly offset: number;
  readonly journalLength: number;
  readonly depth: number;
}

/**
 * Per-invocation view over a {@link ByteStream}.
 *
 * The cursor counts consumed and produced bytes itself, so no construct ever
 * asks the stream where it is. Bytes read after a mark are journaled and
 * pushed back on rewind, which lets speculative constructs (greedy repeat,
 * Select, Peek) run over streams without seek support.
 */
export class StreamCursor {
  readonly stream: ByteStream;
  private _offset = 0;
  private pushback: Uint8Array = new Uint8Array(0);
  private pushbackPos = 0;
  private journal: number[] = [];
  private marks = 0;
  /** Stream position matching offset 0, for seekable streams. */
  private readonly origin: number | undefined;

  constructor(stream: ByteStream) {
    this.stream = stream;
    this.origin = isSeekable(stream) ? stream.tell() : undefined;
  }

  /** Bytes consumed (parsing) or produced (building) so far. */
  get offset(): number {
    return this._offset;
  }

  /** Read exactly `size` bytes or raise StreamError. */
  read(size: number, path: Path): Uint8Array {
    const data = this.take(size);
    if (data.length !== size) {
      throw new StreamError(`expected ${size} bytes, found ${data.length}`, path);
    }
    return data;
  }

  /** Read up to `size` bytes; fewer only at the end of data. */
  readAtMost(size: number): Uint8Array {
    return this.take(size);
  }

  /** Read everything up to the end of the stream. */
  readRest(): Uint8Array {
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const chunk = this.take(4096);
      if (chunk.length === 0) break;
      chunks.push(chunk);
      total += chunk.length;
    }
    return concat(chunks, total);
  }

  /** Whether no further byte can be read. Does not consume input. */
  atEnd(): boolean {
    if (this.pushbackPos < this.pushback.length) return false;
    const probe = this.stream.read(1);
    if (probe.length === 0) return true;
    this.unread(probe);
    return false;
  }

  write(data: Uint8Array): void {
    this.stream.write(data);
    this._offset += data.length;
  }

  /** Start journaling reads so that they can be rewound or captured. */
  mark(): CursorMark {
    this.marks++;
    return { offset: this._offset, journalLength: this.journal.length, depth: this.marks };
  }

  /** Bytes read since `mark`, without releasing it. */
  captured(mark: CursorMark): Uint8Array {
    return Uint8Array.from(this.journal.slice(mark.journalLength));
  }

  /** Push every byte read since `mark` back and release the mark. */
  rewind(mark: CursorMark): void {
    const replay = Uint8Array.from(this.journal.slice(mark.journalLength));
    this.journal.length = mark.journalLength;
    this._offset = mark.offset;
    this.unread(replay);
    this.release(mark);
  }

  /** Stop journaling for `mark`, keeping everything read since. */
  release(mark: CursorMark): void {
    this.marks = mark.depth - 1;
    if (this.marks === 0) {
      this.journal = [];
    }
  }

  /**
   * Absolute stream position of `offset` (relative to where this cursor
   * started). Raises StreamError when the stream cannot seek.
   */
  seekable(path: Path): { stream: SeekableByteStream; origin: number } {
    const stream = this.stream;
    if (!isSeekable(stream) || this.origin === undefined) {
      throw new StreamError('stream is not seekable', path);
    }
    return { stream, origin: this.origin };
  }

  private take(size: number): Uint8Array {
    if (size === 0) return new Uint8Array(0);
    const parts: Uint8Array[] = [];
    let got = 0;
    if (this.pushbackPos < this.pushback.length) {
      const n = Math.min(size, this.pushback.length - this.pushbackPos);
      parts.push(this.pushback.subarray(this.pushbackPos, this.pushbackPos + n));
      this.pushbackPos += n;
      got += n;
    }
    while (got < size) {
      const chunk = this.stream.read(size - got);
      if (chunk.length === 0) break;
      parts.push(chunk);
      got += chunk.length;
    }
    const data = concat(parts, got);
    this._offset += data.length;
    if (this.marks > 0) {
      for (const byte of data) this.journal.push(byte);
    }
    return data;
  }

  private unread(data: Uint8Array): void {
    if (data.length === 0) return;
    const rest = this.pushback.subarray(this.pushbackPos);
    const merged = new Uint8Array(data.length + rest.length);
    merged.set(data);
    merged.set(rest, data.length);
    this.pushback = merged;
    this.pushbackPos = 0;
  }
}

function concat(parts: Uint8Array[], total: number): Uint8Array {
  if (parts.length === 1) return parts[0].slice();
  const out = new Uint8Array(total);
  let at = 0;
  for (const part of parts) {
    out.set(part, at);
    at += part.length;
  }
  return out;
}
