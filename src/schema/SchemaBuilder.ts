import { ArgumentError } from '../errors';
import { BinaryExpr, BinaryOp, Expr, len, lit, not, Param, ref } from '../expr';
import { Enum, Rebuild } from '../constructs/Adapter';
import { Bytes, GreedyBytes } from '../constructs/Bytes';
import { EmbeddedSwitch, If, IfThenElse, Switch } from '../constructs/Conditional';
import { Construct, Embedded } from '../constructs/Construct';
import { Endian, FieldSize, Flag, FormatField } from '../constructs/FormatField';
import { VarInt } from '../constructs/Integer';
import { ArrayOf, GreedyRange, PrefixedArray } from '../constructs/Repeat';
import { Sequence } from '../constructs/Sequence';
import { Computed, Const, Pass, Padding, Terminated } from '../constructs/Special';
import { CString, GreedyString, PaddedString, PascalString, TextEncoding } from '../constructs/Strings';
import { Struct } from '../constructs/Struct';
import { Prefixed } from '../constructs/Transform';
import { readSchemaModule } from './SchemaJson';
import { SchemaRegistry } from './SchemaRegistry';

/**
 * JSON-serializable expression: a dotted context reference (`"header.length"`),
 * a number or boolean constant, or an operator node.
 */
export type SchemaExpr =
  | number
  | boolean
  | string
  | { lit: string | number | boolean }
  | { len: SchemaExpr }
  | { not: SchemaExpr }
  | { op: BinaryOp; left: SchemaExpr; right: SchemaExpr };

export interface SchemaField {
  /** Omitted for anonymous fields such as padding or embedded nodes. */
  name?: string;
  schema: SchemaNode;
  optional?: boolean;
  defaultValue?: unknown;
  /** Merge this field's keys into the enclosing struct. */
  embedded?: boolean;
}

/**
 * JSON-serializable schema definition for any construct the builder knows.
 */
export type SchemaNode =
  | { type: 'int'; size: FieldSize; signed?: boolean; endian?: Endian }
  | { type: 'float'; size: 4 | 8; endian?: Endian }
  | { type: 'varint' }
  | { type: 'flag' }
  | { type: 'bytes'; length: SchemaExpr }
  | { type: 'greedyBytes' }
  | { type: 'string'; length: SchemaExpr; encoding?: TextEncoding }
  | { type: 'cstring'; encoding?: TextEncoding }
  | { type: 'pascalString'; lengthField: SchemaNode; encoding?: TextEncoding }
  | { type: 'greedyString'; encoding?: TextEncoding }
  | { type: 'const'; value: number[] }
  | { type: 'const'; value: number; schema: SchemaNode }
  | { type: 'padding'; length: SchemaExpr; pattern?: number; strict?: boolean }
  | { type: 'computed'; value: SchemaExpr }
  | { type: 'pass' }
  | { type: 'terminated' }
  | { type: 'struct'; fields: SchemaField[] }
  | { type: 'sequence'; items: Array<{ name?: string; schema: SchemaNode }> }
  | { type: 'array'; count: SchemaExpr; item: SchemaNode }
  | { type: 'greedyRange'; item: SchemaNode }
  | { type: 'prefixed'; lengthField: SchemaNode; schema: SchemaNode }
  | { type: 'prefixedArray'; countField: SchemaNode; item: SchemaNode }
  | { type: 'enum'; schema: SchemaNode; members: Record<string, number> }
  | {
      type: 'switch';
      selector: SchemaExpr;
      cases: Record<string, SchemaNode>;
      default?: SchemaNode;
      embedded?: boolean;
    }
  | { type: 'if'; condition: SchemaExpr; then: SchemaNode; else?: SchemaNode }
  | { type: 'rebuild'; schema: SchemaNode; value: SchemaExpr }
  | { type: '$ref'; ref: string };

export type SchemaType = SchemaNode['type'];

export function buildExpr(node: SchemaExpr): Expr {
  if (typeof node === 'number' || typeof node === 'boolean') return lit(node);
  if (typeof node === 'string') return ref(node);
  if ('lit' in node) return lit(node.lit);
  if ('len' in node) return len(buildExpr(node.len));
  if ('not' in node) return not(buildExpr(node.not));
  return new BinaryExpr(node.op, buildExpr(node.left), buildExpr(node.right));
}

function countParam(node: SchemaExpr): Param<number> {
  return typeof node === 'number' ? node : buildExpr(node);
}

function conditionParam(node: SchemaExpr): Param<boolean> {
  return typeof node === 'boolean' ? node : buildExpr(node);
}

/**
 * Builds a construct tree from a JSON schema definition.
 */
export class SchemaBuilder {
  /**
   * Build a construct from a schema node. `$ref` nodes need `registry`;
   * they resolve through it when first used.
   */
  static build(node: SchemaNode, registry?: SchemaRegistry): Construct {
    const build = (child: SchemaNode): Construct => SchemaBuilder.build(child, registry);
    switch (node.type) {
      case 'int':
        return new FormatField(node.size, node.signed ? 'int' : 'uint', node.endian ?? 'big');

      case 'float':
        return new FormatField(node.size, 'float', node.endian ?? 'big');

      case 'varint':
        return VarInt;

      case 'flag':
        return Flag;

      case 'bytes':
        return new Bytes(countParam(node.length));

      case 'greedyBytes':
        return GreedyBytes;

      case 'string':
        return new PaddedString(countParam(node.length), node.encoding);

      case 'cstring':
        return new CString(node.encoding);

      case 'pascalString':
        return new PascalString(build(node.lengthField), node.encoding);

      case 'greedyString':
        return new GreedyString(node.encoding);

      case 'const':
        if ('schema' in node) return new Const<unknown>(node.value, build(node.schema));
        return Const.bytes(Uint8Array.from(node.value));

      case 'padding':
        return new Padding(countParam(node.length), node.pattern, node.strict);

      case 'computed':
        return new Computed(buildExpr(node.value));

      case 'pass':
        return Pass;

      case 'terminated':
        return Terminated;

      case 'struct':
        return new Struct({
          fields: node.fields.map(f => {
            const construct = build(f.schema);
            return {
              name: f.name,
              construct: f.embedded ? new Embedded(construct) : construct,
              optional: f.optional,
              defaultValue: f.defaultValue,
            };
          }),
        });

      case 'sequence':
        return new Sequence({
          items: node.items.map(i => ({ name: i.name, construct: build(i.schema) })),
        });

      case 'array':
        return new ArrayOf(countParam(node.count), build(node.item));

      case 'greedyRange':
        return new GreedyRange(build(node.item));

      case 'prefixed':
        return new Prefixed(build(node.lengthField), build(node.schema));

      case 'prefixedArray':
        return new PrefixedArray(build(node.countField), build(node.item));

      case 'enum':
        return new Enum(build(node.schema), node.members);

      case 'switch': {
        const cases: Record<string, Construct> = {};
        for (const [key, schema] of Object.entries(node.cases)) cases[key] = build(schema);
        const options = {
          selector: buildExpr(node.selector),
          cases,
          default: node.default ? build(node.default) : undefined,
        };
        return node.embedded ? new EmbeddedSwitch(options) : new Switch(options);
      }

      case 'if':
        return node.else
          ? new IfThenElse(conditionParam(node.condition), build(node.then), build(node.else))
          : new If(conditionParam(node.condition), build(node.then));

      case 'rebuild':
        return new Rebuild(build(node.schema), buildExpr(node.value));

      case '$ref':
        if (!registry) {
          throw new ArgumentError(
            `cannot resolve $ref '${node.ref}' without a schema registry; `
              + 'use SchemaBuilder.buildAll() for schemas containing $ref nodes',
          );
        }
        return registry.ref(node.ref);
    }
  }

  /**
   * Build every schema into one registry, so `$ref` nodes may point at any
   * entry, including their own.
   */
  static buildAll(schemas: Record<string, SchemaNode>, registry = new SchemaRegistry()): SchemaRegistry {
    for (const [name, node] of Object.entries(schemas)) {
      registry.define(name, SchemaBuilder.build(node, registry));
    }
    return registry;
  }

  /** Parse and validate a JSON schema module (name → node) and build it. */
  static fromJSON(text: string): SchemaRegistry {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ArgumentError(`schema JSON is malformed: ${err instanceof Error ? err.message : String(err)}`, undefined, { cause: err });
    }
    return SchemaBuilder.buildAll(readSchemaModule(parsed));
  }
}
