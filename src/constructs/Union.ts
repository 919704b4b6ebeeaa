import type { Context } from '../Context';
import { ArgumentError, SelectError, SizeofError } from '../errors';
import { formatValue } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';
import { expectRecord, storeField, StructField } from './Struct';

export type UnionField = Pick<StructField, 'name' | 'construct'>;

export interface UnionOptions {
  fields: readonly UnionField[];
  /**
   * Field (index or name) whose end is where parsing continues. Without it
   * the union consumes nothing.
   */
  parseFrom?: number | string;
}

/**
 * Overlapping fields, like a C union. Every field parses the same bytes;
 * building writes the first field present in the value.
 */
export class Union extends Construct<Record<string, unknown>> {
  readonly fields: readonly UnionField[];
  readonly parseFrom: number | undefined;

  constructor(options: UnionOptions) {
    super();
    if (options.fields.length === 0) {
      throw new ArgumentError('a union needs at least one field');
    }
    this.fields = options.fields;
    this.parseFrom = resolveParseFrom(options.fields, options.parseFrom);
  }

  get subconstructs(): readonly Construct[] {
    return this.fields.map(f => f.construct);
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): Record<string, unknown> {
    const frame = ctx.child();
    const result: Record<string, unknown> = {};
    let advance = 0;
    this.fields.forEach((field, i) => {
      const fieldPath = path.child(field.name ?? i);
      const mark = cursor.mark();
      let value: unknown;
      try {
        value = field.construct._parse(cursor, frame, fieldPath);
        if (i === this.parseFrom) advance = cursor.offset - mark.offset;
      } finally {
        cursor.rewind(mark);
      }
      storeField(field, value, result, frame, fieldPath);
    });
    cursor.read(advance, path);
    return result;
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): Record<string, unknown> {
    const record = expectRecord(value, path);
    const frame = ctx.child(record);
    for (const [i, field] of this.fields.entries()) {
      const input = field.construct.embedded ? record : field.name === undefined ? undefined : record[field.name];
      if (input === undefined) continue;
      const fieldPath = path.child(field.name ?? i);
      const built = field.construct._build(input, cursor, frame, fieldPath);
      const result: Record<string, unknown> = {};
      storeField(field, built, result, frame, fieldPath);
      return result;
    }
    throw new SelectError(`no union field is present in ${formatValue(value)}`, path);
  }

  /** Size shared by every field; any field may be the one built. */
  _sizeof(ctx: Context, path: Path): number {
    const frame = ctx.child();
    const sizes = new Set(this.fields.map((f, i) => f.construct._sizeof(frame, path.child(f.name ?? i))));
    if (sizes.size !== 1) {
      throw new SizeofError('union fields differ in size', path);
    }
    return [...sizes][0];
  }
}

function resolveParseFrom(fields: readonly UnionField[], parseFrom: number | string | undefined): number | undefined {
  if (parseFrom === undefined) return undefined;
  if (typeof parseFrom === 'string') {
    const index = fields.findIndex(f => f.name === parseFrom);
    if (index < 0) throw new ArgumentError(`union has no field '${parseFrom}'`);
    return index;
  }
  if (!Number.isInteger(parseFrom) || parseFrom < 0 || parseFrom >= fields.length) {
    throw new ArgumentError(`union field index ${parseFrom} is out of range`);
  }
  return parseFrom;
}
