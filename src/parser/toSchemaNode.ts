import { ArgumentError } from '../errors';
import { isTextEncoding, TextEncoding } from '../constructs/Strings';
import type { SchemaField, SchemaNode } from '../schema/SchemaBuilder';
import type { FieldAst, SchemaModuleAst, TypeAst } from './types';

/**
 * Convert all definitions of a notation module to a map of SchemaNode
 * definitions.
 *
 * References to other definitions become `$ref` nodes, so a definition may
 * refer to itself; build the result with `SchemaBuilder.buildAll`.
 *
 * @throws ArgumentError on a duplicate definition, an unknown reference or an
 * unknown text encoding
 */
export function convertModuleToSchemaNodes(module: SchemaModuleAst): Record<string, SchemaNode> {
  const names = new Set<string>();

  // First pass: collect all definition names
  for (const definition of module.definitions) {
    if (names.has(definition.name)) {
      throw new ArgumentError(`line ${definition.line}: '${definition.name}' is defined twice`);
    }
    names.add(definition.name);
  }

  const result: Record<string, SchemaNode> = {};
  for (const definition of module.definitions) {
    result[definition.name] = convertType(definition.type, names);
  }
  return result;
}

function encodingOf(name: string | undefined): TextEncoding | undefined {
  if (name === undefined) return undefined;
  if (!isTextEncoding(name)) {
    throw new ArgumentError(`unknown text encoding '${name}'`);
  }
  return name;
}

function convertType(type: TypeAst, names: ReadonlySet<string>): SchemaNode {
  const convert = (inner: TypeAst): SchemaNode => convertType(inner, names);
  switch (type.kind) {
    case 'int':
      return { type: 'int', size: type.size, signed: type.signed, endian: type.endian };

    case 'float':
      return { type: 'float', size: type.size, endian: type.endian };

    case 'varint':
    case 'flag':
    case 'pass':
    case 'terminated':
      return { type: type.kind };

    case 'greedybytes':
      return { type: 'greedyBytes' };

    case 'cstring':
      return { type: 'cstring', encoding: encodingOf(type.encoding) };

    case 'greedystring':
      return { type: 'greedyString', encoding: encodingOf(type.encoding) };

    case 'bytes':
      return { type: 'bytes', length: type.length };

    case 'string':
      return { type: 'string', length: type.length, encoding: encodingOf(type.encoding) };

    case 'pascalstring':
      return { type: 'pascalString', lengthField: convert(type.lengthField), encoding: encodingOf(type.encoding) };

    case 'array':
      return { type: 'array', count: type.count, item: convert(type.item) };

    case 'greedy':
      return { type: 'greedyRange', item: convert(type.item) };

    case 'prefixed':
      return { type: 'prefixed', lengthField: convert(type.lengthField), schema: convert(type.inner) };

    case 'prefixedArray':
      return { type: 'prefixedArray', countField: convert(type.countField), item: convert(type.item) };

    case 'enum': {
      const members: Record<string, number> = {};
      for (const member of type.members) {
        if (Object.hasOwn(members, member.name)) {
          throw new ArgumentError(`enum member '${member.name}' is defined twice`);
        }
        members[member.name] = member.value;
      }
      return { type: 'enum', schema: convert(type.inner), members };
    }

    case 'switch': {
      const cases: Record<string, SchemaNode> = {};
      for (const entry of type.cases) {
        cases[String(entry.key)] = convert(entry.type);
      }
      return {
        type: 'switch',
        selector: type.selector,
        cases,
        default: type.fallback ? convert(type.fallback) : undefined,
        embedded: type.embedded,
      };
    }

    case 'if':
      return {
        type: 'if',
        condition: type.condition,
        then: convert(type.then),
        else: type.else ? convert(type.else) : undefined,
      };

    case 'constBytes':
      for (const byte of type.value) {
        if (byte < 0 || byte > 255) {
          throw new ArgumentError(`${byte} is not a byte`);
        }
      }
      return { type: 'const', value: type.value };

    case 'const':
      return { type: 'const', value: type.value, schema: convert(type.type) };

    case 'padding':
      return { type: 'padding', length: type.length };

    case 'computed':
      return { type: 'computed', value: type.value };

    case 'rebuild':
      return { type: 'rebuild', schema: convert(type.inner), value: type.value };

    case 'struct':
      return { type: 'struct', fields: type.fields.map(f => convertField(f, names)) };

    case 'ref':
      if (!names.has(type.name)) {
        throw new ArgumentError(`line ${type.line}: unknown type '${type.name}'`);
      }
      return { type: '$ref', ref: type.name };
  }
}

function convertField(field: FieldAst, names: ReadonlySet<string>): SchemaField {
  const schema = convertType(field.type, names);
  if (field.embedded) {
    return { schema, embedded: true };
  }
  const entry: SchemaField = { name: field.name, schema };
  if (field.optional) {
    entry.optional = true;
  }
  if (field.defaultValue !== undefined) {
    entry.defaultValue = field.defaultValue;
  }
  return entry;
}
