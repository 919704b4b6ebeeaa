/**
 * Byte source/sink the engine reads from and writes to.
 * `read` returns fewer bytes than requested only at the end of data.
 * `tell` and `seek` are optional; only position-based constructs need them.
 */
export interface ByteStream {
  read(size: number): Uint8Array;
  write(data: Uint8Array): number;
  tell?(): number;
  seek?(offset: number): number;
}

/** A stream that supports `tell` and `seek`. */
export interface SeekableByteStream extends ByteStream {
  tell(): number;
  seek(offset: number): number;
}

export function isSeekable(stream: ByteStream): stream is SeekableByteStream {
  return typeof stream.tell === 'function' && typeof stream.seek === 'function';
}

/**
 * In-memory seekable byte stream.
 * Manages a growable byte array with a cursor.
 */
export class MemoryStream implements SeekableByteStream {
  private _data: Uint8Array;
  private _length: number;
  private _offset: number;

  private constructor(data: Uint8Array, length: number, offset: number) {
    this._data = data;
    this._length = length;
    this._offset = offset;
  }

  /** Allocate a writable stream with optional initial capacity. */
  static alloc(initialCapacity = 256): MemoryStream {
    return new MemoryStream(new Uint8Array(Math.max(initialCapacity, 1)), 0, 0);
  }

  /** Wrap a copy of existing bytes for reading. */
  static from(data: Uint8Array): MemoryStream {
    return new MemoryStream(new Uint8Array(data), data.length, 0);
  }

  /** Parse a hex string ("0a ff", "0aff") into a stream. */
  static fromHex(hex: string): MemoryStream {
    return MemoryStream.from(hexToBytes(hex));
  }

  /** Total number of valid bytes. */
  get length(): number {
    return this._length;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this._length - this._offset;
  }

  read(size: number): Uint8Array {
    const end = Math.min(this._offset + size, this._length);
    const result = this._data.slice(this._offset, end);
    this._offset = end;
    return result;
  }

  write(data: Uint8Array): number {
    this.ensureCapacity(this._offset + data.length);
    this._data.set(data, this._offset);
    this._offset += data.length;
    if (this._offset > this._length) {
      this._length = this._offset;
    }
    return data.length;
  }

  tell(): number {
    return this._offset;
  }

  /** Seek to an absolute offset. Writing past the end zero-fills the gap. */
  seek(offset: number): number {
    if (offset < 0) {
      throw new RangeError(`seek: offset ${offset} is negative`);
    }
    if (offset > this._length) {
      this.ensureCapacity(offset);
    }
    this._offset = offset;
    return offset;
  }

  /** Return a compact copy of the valid bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  /** Return hex string representation. */
  toHex(): string {
    return bytesToHex(this.toUint8Array());
  }

  /** Reset cursor to 0. */
  reset(): void {
    this._offset = 0;
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data);
    this._data = newData;
  }
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new RangeError(`Invalid hex string: '${hex}'`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
