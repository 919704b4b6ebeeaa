import { ArgumentError } from '../errors';
import { isBinaryOp } from '../expr';
import { isRecord } from '../helpers';
import { isTextEncoding, TextEncoding } from '../constructs/Strings';
import type { SchemaExpr, SchemaField, SchemaNode } from './SchemaBuilder';

/*
 * Validation of untrusted JSON into SchemaNode trees. Every reader takes the
 * location of the value (e.g. `Packet.fields[1].schema`) for its errors.
 */

function fail(at: string, message: string): never {
  throw new ArgumentError(`${at}: ${message}`);
}

function record(value: unknown, at: string): Record<string, unknown> {
  if (!isRecord(value)) fail(at, 'expected an object');
  return value;
}

function str(value: unknown, at: string): string {
  if (typeof value !== 'string') fail(at, 'expected a string');
  return value;
}

function optionalStr(value: unknown, at: string): string | undefined {
  return value === undefined ? undefined : str(value, at);
}

function num(value: unknown, at: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) fail(at, 'expected a number');
  return value;
}

function optionalBool(value: unknown, at: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') fail(at, 'expected a boolean');
  return value;
}

function byteList(value: unknown, at: string): number[] {
  if (!Array.isArray(value)) fail(at, 'expected an array of bytes');
  return value.map((b, i) => {
    const n = num(b, `${at}[${i}]`);
    if (!Number.isInteger(n) || n < 0 || n > 255) fail(`${at}[${i}]`, `${n} is not a byte`);
    return n;
  });
}

function encoding(value: unknown, at: string): TextEncoding | undefined {
  if (value === undefined) return undefined;
  const name = str(value, at);
  if (!isTextEncoding(name)) fail(at, `unknown encoding '${name}'`);
  return name;
}

function endian(value: unknown, at: string): 'big' | 'little' | undefined {
  if (value === undefined || value === 'big' || value === 'little') return value;
  return fail(at, "expected 'big' or 'little'");
}

function intSize(value: unknown, at: string): 1 | 2 | 4 | 8 {
  if (value === 1 || value === 2 || value === 4 || value === 8) return value;
  return fail(at, 'integer size must be 1, 2, 4 or 8');
}

function floatSize(value: unknown, at: string): 4 | 8 {
  if (value === 4 || value === 8) return value;
  return fail(at, 'float size must be 4 or 8');
}

export function readSchemaExpr(value: unknown, at: string): SchemaExpr {
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string') return value;
  const obj = record(value, at);
  if ('lit' in obj) {
    const inner = obj.lit;
    if (typeof inner === 'number' || typeof inner === 'boolean' || typeof inner === 'string') return { lit: inner };
    return fail(`${at}.lit`, 'expected a string, number or boolean');
  }
  if ('len' in obj) return { len: readSchemaExpr(obj.len, `${at}.len`) };
  if ('not' in obj) return { not: readSchemaExpr(obj.not, `${at}.not`) };
  const op = str(obj.op, `${at}.op`);
  if (!isBinaryOp(op)) fail(`${at}.op`, `unknown operator '${op}'`);
  return { op, left: readSchemaExpr(obj.left, `${at}.left`), right: readSchemaExpr(obj.right, `${at}.right`) };
}

function readField(value: unknown, at: string): SchemaField {
  const obj = record(value, at);
  return {
    name: optionalStr(obj.name, `${at}.name`),
    schema: readSchemaNode(obj.schema, `${at}.schema`),
    optional: optionalBool(obj.optional, `${at}.optional`),
    defaultValue: obj.defaultValue,
    embedded: optionalBool(obj.embedded, `${at}.embedded`),
  };
}

function readMembers(value: unknown, at: string): Record<string, number> {
  const obj = record(value, at);
  const members: Record<string, number> = {};
  for (const [name, member] of Object.entries(obj)) members[name] = num(member, `${at}.${name}`);
  return members;
}

function readCases(value: unknown, at: string): Record<string, SchemaNode> {
  const obj = record(value, at);
  const cases: Record<string, SchemaNode> = {};
  for (const [key, node] of Object.entries(obj)) cases[key] = readSchemaNode(node, `${at}.${key}`);
  return cases;
}

/** Validate one schema node. */
export function readSchemaNode(value: unknown, at: string): SchemaNode {
  const obj = record(value, at);
  const node = (key: string): SchemaNode => readSchemaNode(obj[key], `${at}.${key}`);
  const expr = (key: string): SchemaExpr => readSchemaExpr(obj[key], `${at}.${key}`);
  const type = str(obj.type, `${at}.type`);
  switch (type) {
    case 'int':
      return { type, size: intSize(obj.size, `${at}.size`), signed: optionalBool(obj.signed, `${at}.signed`), endian: endian(obj.endian, `${at}.endian`) };
    case 'float':
      return { type, size: floatSize(obj.size, `${at}.size`), endian: endian(obj.endian, `${at}.endian`) };
    case 'varint':
    case 'flag':
    case 'greedyBytes':
    case 'pass':
    case 'terminated':
      return { type };
    case 'bytes':
      return { type, length: expr('length') };
    case 'string':
      return { type, length: expr('length'), encoding: encoding(obj.encoding, `${at}.encoding`) };
    case 'cstring':
    case 'greedyString':
      return { type, encoding: encoding(obj.encoding, `${at}.encoding`) };
    case 'pascalString':
      return { type, lengthField: node('lengthField'), encoding: encoding(obj.encoding, `${at}.encoding`) };
    case 'const':
      if (Array.isArray(obj.value)) return { type, value: byteList(obj.value, `${at}.value`) };
      return { type, value: num(obj.value, `${at}.value`), schema: node('schema') };
    case 'padding':
      return {
        type,
        length: expr('length'),
        pattern: obj.pattern === undefined ? undefined : num(obj.pattern, `${at}.pattern`),
        strict: optionalBool(obj.strict, `${at}.strict`),
      };
    case 'computed':
      return { type, value: expr('value') };
    case 'struct': {
      if (!Array.isArray(obj.fields)) return fail(`${at}.fields`, 'expected an array');
      return { type, fields: obj.fields.map((f, i) => readField(f, `${at}.fields[${i}]`)) };
    }
    case 'sequence': {
      if (!Array.isArray(obj.items)) return fail(`${at}.items`, 'expected an array');
      return {
        type,
        items: obj.items.map((item, i) => {
          const entry = record(item, `${at}.items[${i}]`);
          return {
            name: optionalStr(entry.name, `${at}.items[${i}].name`),
            schema: readSchemaNode(entry.schema, `${at}.items[${i}].schema`),
          };
        }),
      };
    }
    case 'array':
      return { type, count: expr('count'), item: node('item') };
    case 'greedyRange':
      return { type, item: node('item') };
    case 'prefixed':
      return { type, lengthField: node('lengthField'), schema: node('schema') };
    case 'prefixedArray':
      return { type, countField: node('countField'), item: node('item') };
    case 'enum':
      return { type, schema: node('schema'), members: readMembers(obj.members, `${at}.members`) };
    case 'switch':
      return {
        type,
        selector: expr('selector'),
        cases: readCases(obj.cases, `${at}.cases`),
        default: obj.default === undefined ? undefined : node('default'),
        embedded: optionalBool(obj.embedded, `${at}.embedded`),
      };
    case 'if':
      return {
        type,
        condition: expr('condition'),
        then: node('then'),
        else: obj.else === undefined ? undefined : node('else'),
      };
    case 'rebuild':
      return { type, schema: node('schema'), value: expr('value') };
    case '$ref':
      return { type, ref: str(obj.ref, `${at}.ref`) };
    default:
      return fail(`${at}.type`, `unknown schema type '${type}'`);
  }
}

/** Validate a module of named schema nodes. */
export function readSchemaModule(value: unknown): Record<string, SchemaNode> {
  const obj = record(value, '(schema module)');
  const schemas: Record<string, SchemaNode> = {};
  for (const [name, node] of Object.entries(obj)) schemas[name] = readSchemaNode(node, name);
  return schemas;
}
