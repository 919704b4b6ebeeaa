import type { Context } from '../Context';
import { FormatFieldError, StringError } from '../errors';
import { checkCount, evaluateCount, Param } from '../expr';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';

export type TextEncoding = 'utf8' | 'utf16le' | 'ascii';

export const TEXT_ENCODINGS: readonly TextEncoding[] = ['utf8', 'utf16le', 'ascii'];

export function isTextEncoding(name: string): name is TextEncoding {
  return TEXT_ENCODINGS.some(e => e === name);
}

/** Bytes per code unit, which is also the terminator width. */
export function unitSize(encoding: TextEncoding): number {
  return encoding === 'utf16le' ? 2 : 1;
}

export function expectText(value: unknown, path: Path): string {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) {
    throw new StringError('expected text, got bytes', path);
  }
  throw new FormatFieldError(`expected text, got ${typeof value}`, path);
}

export function encodeText(text: string, encoding: TextEncoding, path: Path): Uint8Array {
  switch (encoding) {
    case 'utf8':
      return new TextEncoder().encode(text);
    case 'utf16le': {
      const out = new Uint8Array(text.length * 2);
      for (let i = 0; i < text.length; i++) {
        const unit = text.charCodeAt(i);
        out[i * 2] = unit & 0xff;
        out[i * 2 + 1] = unit >> 8;
      }
      return out;
    }
    case 'ascii': {
      const out = new Uint8Array(text.length);
      for (let i = 0; i < text.length; i++) {
        const code = text.charCodeAt(i);
        if (code > 0x7f) {
          throw new StringError(`character ${JSON.stringify(text[i])} is not ascii`, path);
        }
        out[i] = code;
      }
      return out;
    }
  }
}

export function decodeText(data: Uint8Array, encoding: TextEncoding, path: Path): string {
  if (encoding === 'ascii') {
    const bad = data.findIndex(b => b > 0x7f);
    if (bad >= 0) {
      throw new StringError(`byte 0x${data[bad].toString(16)} at ${bad} is not ascii`, path);
    }
    // ascii is a subset of utf-8
    return new TextDecoder('utf-8').decode(data);
  }
  const label = encoding === 'utf8' ? 'utf-8' : 'utf-16le';
  try {
    return new TextDecoder(label, { fatal: true }).decode(data);
  } catch (err) {
    throw new StringError(`bytes are not valid ${encoding}`, path, { cause: err });
  }
}

/** Remove trailing zero code units. */
function stripPadding(data: Uint8Array, unit: number): Uint8Array {
  let end = data.length - (data.length % unit);
  while (end >= unit && data.subarray(end - unit, end).every(b => b === 0)) {
    end -= unit;
  }
  return data.subarray(0, end);
}

/** Text in a fixed-size field, right-padded with zero bytes. */
export class PaddedString extends Construct<string> {
  readonly length: Param<number>;
  readonly encoding: TextEncoding;

  constructor(length: Param<number>, encoding: TextEncoding = 'utf8') {
    super();
    this.length = length;
    this.encoding = encoding;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): string {
    const length = evaluateCount(this.length, ctx, path, 'length');
    const data = cursor.read(length, path);
    return decodeText(stripPadding(data, unitSize(this.encoding)), this.encoding, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): string {
    const text = expectText(value, path);
    const length = evaluateCount(this.length, ctx, path, 'length');
    const encoded = encodeText(text, this.encoding, path);
    if (encoded.length > length) {
      throw new StringError(`encoded text is ${encoded.length} bytes, field holds ${length}`, path);
    }
    const out = new Uint8Array(length);
    out.set(encoded);
    cursor.write(out);
    return text;
  }

  _sizeof(ctx: Context, path: Path): number {
    return evaluateCount(this.length, ctx, path, 'length');
  }
}

/** Text preceded by its encoded length. */
export class PascalString extends Construct<string> {
  readonly lengthField: Construct;
  readonly encoding: TextEncoding;

  constructor(lengthField: Construct, encoding: TextEncoding = 'utf8') {
    super();
    this.lengthField = lengthField;
    this.encoding = encoding;
  }

  get subconstructs(): readonly Construct[] {
    return [this.lengthField];
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): string {
    const length = checkCount(this.lengthField._parse(cursor, ctx, path), path, 'length');
    return decodeText(cursor.read(length, path), this.encoding, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): string {
    const text = expectText(value, path);
    const encoded = encodeText(text, this.encoding, path);
    this.lengthField._build(encoded.length, cursor, ctx, path);
    cursor.write(encoded);
    return text;
  }
}

/** Text terminated by one zero code unit. */
export class CString extends Construct<string> {
  readonly encoding: TextEncoding;

  constructor(encoding: TextEncoding = 'utf8') {
    super();
    this.encoding = encoding;
  }

  _parse(cursor: StreamCursor, _ctx: Context, path: Path): string {
    const unit = unitSize(this.encoding);
    const bytes: number[] = [];
    for (;;) {
      const chunk = cursor.read(unit, path);
      if (chunk.every(b => b === 0)) break;
      bytes.push(...chunk);
    }
    return decodeText(Uint8Array.from(bytes), this.encoding, path);
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): string {
    const text = expectText(value, path);
    const encoded = encodeText(text, this.encoding, path);
    const unit = unitSize(this.encoding);
    for (let i = 0; i + unit <= encoded.length; i += unit) {
      if (encoded.subarray(i, i + unit).every(b => b === 0)) {
        throw new StringError('text contains the terminator', path);
      }
    }
    cursor.write(encoded);
    cursor.write(new Uint8Array(unit));
    return text;
  }
}

/** Text running to the end of the stream. */
export class GreedyString extends Construct<string> {
  readonly encoding: TextEncoding;

  constructor(encoding: TextEncoding = 'utf8') {
    super();
    this.encoding = encoding;
  }

  _parse(cursor: StreamCursor, _ctx: Context, path: Path): string {
    return decodeText(cursor.readRest(), this.encoding, path);
  }

  _build(value: unknown, cursor: StreamCursor, _ctx: Context, path: Path): string {
    const text = expectText(value, path);
    cursor.write(encodeText(text, this.encoding, path));
    return text;
  }
}
