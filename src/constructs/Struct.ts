import type { Context } from '../Context';
import { ArgumentError, CollisionError, MissingFieldError, SizeofError } from '../errors';
import { formatValue, isRecord } from '../helpers';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';

export interface StructField {
  /** Key in the parsed record. Unnamed fields are parsed but not kept. */
  name?: string;
  construct: Construct;
  /**
   * Absent on build means the field is skipped. On parse the field is read
   * only while input remains, so optional fields belong at the end.
   */
  optional?: boolean;
  /** Value built when the input record lacks this field. */
  defaultValue?: unknown;
}

export interface StructOptions {
  fields: readonly StructField[];
}

/**
 * Named fields in order. Each invocation opens a context frame in which
 * every field sees the fields before it.
 */
export class Struct extends Construct<Record<string, unknown>> {
  readonly fields: readonly StructField[];

  constructor(options: StructOptions) {
    super();
    const seen = new Set<string>();
    for (const field of options.fields) {
      if (field.name === undefined) continue;
      if (seen.has(field.name)) {
        throw new ArgumentError(`duplicate field name '${field.name}'`);
      }
      seen.add(field.name);
    }
    this.fields = options.fields;
  }

  get subconstructs(): readonly Construct[] {
    return this.fields.map(f => f.construct);
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): Record<string, unknown> {
    const frame = ctx.child();
    const result: Record<string, unknown> = {};
    this.fields.forEach((field, i) => {
      const fieldPath = path.child(field.name ?? i);
      if (field.optional && cursor.atEnd()) return;
      const value = field.construct._parse(cursor, frame, fieldPath);
      storeField(field, value, result, frame, fieldPath);
    });
    return result;
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): Record<string, unknown> {
    const record = expectRecord(value, path);
    const frame = ctx.child(record);
    const result: Record<string, unknown> = {};
    this.fields.forEach((field, i) => {
      const fieldPath = path.child(field.name ?? i);
      const input = fieldInput(field, record, fieldPath);
      if (!input) return;
      const built = field.construct._build(input.value, cursor, frame, fieldPath);
      storeField(field, built, result, frame, fieldPath);
    });
    return result;
  }

  _sizeof(ctx: Context, path: Path): number {
    const frame = ctx.child();
    let total = 0;
    this.fields.forEach((field, i) => {
      const fieldPath = path.child(field.name ?? i);
      if (field.optional) {
        throw new SizeofError(`optional field '${field.name ?? i}' has no fixed size`, fieldPath);
      }
      total += field.construct._sizeof(frame, fieldPath);
    });
    return total;
  }
}

export function expectRecord(value: unknown, path: Path): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ArgumentError(`expected a record, got ${formatValue(value)}`, path);
  }
  return value;
}

/**
 * What a field builds from `record`: the whole record for embedded fields,
 * the named entry, or its default. Undefined means the field is skipped.
 */
export function fieldInput(field: StructField, record: Record<string, unknown>, path: Path): { value: unknown } | undefined {
  if (field.construct.embedded) return { value: record };
  const value = field.name === undefined ? undefined : record[field.name];
  if (value !== undefined) return { value };
  if (field.defaultValue !== undefined) return { value: field.defaultValue };
  if (field.optional) return undefined;
  if (field.name !== undefined && !field.construct.buildsFromNothing) {
    throw new MissingFieldError(`missing required field '${field.name}'`, path);
  }
  return { value: undefined };
}

/**
 * Record one field's value in the result and the frame. Embedded results
 * are spliced key by key; any key defined twice is a collision.
 */
export function storeField(
  field: StructField,
  value: unknown,
  result: Record<string, unknown>,
  frame: Context,
  path: Path,
): void {
  if (field.construct.embedded) {
    if (!isRecord(value)) {
      throw new ArgumentError(`embedded construct produced ${formatValue(value)}, not a record`, path);
    }
    for (const [key, entry] of Object.entries(value)) {
      defineKey(key, entry, result, frame, path);
    }
    return;
  }
  if (field.name !== undefined) {
    defineKey(field.name, value, result, frame, path);
  }
}

function defineKey(key: string, value: unknown, result: Record<string, unknown>, frame: Context, path: Path): void {
  if (Object.prototype.hasOwnProperty.call(result, key)) {
    throw new CollisionError(`key '${key}' is already defined`, path);
  }
  result[key] = value;
  frame.set(key, value);
}
