import type { Context } from '../Context';
import { ArgumentError, MissingFieldError } from '../errors';
import { formatValue } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct, Embedded } from './Construct';

export interface SequenceItem {
  /** Optional context name; the value is still kept positionally. */
  name?: string;
  construct: Construct;
}

export interface SequenceOptions {
  items: readonly SequenceItem[];
}

/** Positional fields. Parses to an array holding every item's value. */
export class Sequence extends Construct<unknown[]> {
  readonly items: readonly SequenceItem[];
  /** Number of array slots this sequence produces. */
  readonly width: number;

  constructor(options: SequenceOptions) {
    super();
    this.items = options.items;
    this.width = options.items.reduce((sum, item) => sum + slotCount(item.construct), 0);
  }

  get subconstructs(): readonly Construct[] {
    return this.items.map(i => i.construct);
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown[] {
    const frame = ctx.child();
    const result: unknown[] = [];
    this.items.forEach((item, i) => {
      const itemPath = path.child(i);
      const value = item.construct._parse(cursor, frame, itemPath);
      storeItem(item, value, result, frame, itemPath);
    });
    return result;
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): unknown[] {
    const input = expectSequenceInput(value, this.width, path);
    const frame = ctx.child();
    const result: unknown[] = [];
    let slot = 0;
    this.items.forEach((item, i) => {
      const itemPath = path.child(i);
      const entry = itemInput(item, input, slot, itemPath);
      slot += slotCount(item.construct);
      const built = item.construct._build(entry, cursor, frame, itemPath);
      storeItem(item, built, result, frame, itemPath);
    });
    return result;
  }

  _sizeof(ctx: Context, path: Path): number {
    const frame = ctx.child();
    return this.items.reduce((sum, item, i) => sum + item.construct._sizeof(frame, path.child(i)), 0);
  }
}

/** Array slots a sequence item fills: one, or the width of an embedded Sequence. */
export function slotCount(construct: Construct): number {
  if (!construct.embedded) return 1;
  let inner: Construct = construct;
  while (inner instanceof Embedded) inner = inner.subcon;
  if (inner instanceof Sequence) return inner.width;
  throw new ArgumentError(`only a Sequence can be embedded in a Sequence, got ${inner.constructor.name}`);
}

export function expectSequenceInput(value: unknown, width: number, path: Path): unknown[] {
  if (!Array.isArray(value)) {
    throw new ArgumentError(`expected an array, got ${formatValue(value)}`, path);
  }
  if (value.length > width) {
    throw new ArgumentError(`expected ${width} entries, got ${value.length}`, path);
  }
  return value;
}

/** Entry an item builds from, starting at array slot `slot`. */
export function itemInput(item: SequenceItem, input: readonly unknown[], slot: number, path: Path): unknown {
  if (item.construct.embedded) {
    return input.slice(slot, slot + slotCount(item.construct));
  }
  if (slot >= input.length && !item.construct.buildsFromNothing) {
    throw new MissingFieldError(`missing entry ${slot}`, path);
  }
  return input[slot];
}

export function storeItem(item: SequenceItem, value: unknown, result: unknown[], frame: Context, path: Path): void {
  if (item.construct.embedded) {
    if (!Array.isArray(value)) {
      throw new ArgumentError(`embedded construct produced ${formatValue(value)}, not an array`, path);
    }
    result.push(...value);
    return;
  }
  result.push(value);
  if (item.name !== undefined) frame.set(item.name, value);
}
