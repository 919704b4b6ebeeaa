/**
 * AST types for parsed schema notation.
 */

import type { Endian, FieldSize } from '../constructs/FormatField';
import type { SchemaExpr } from '../schema/SchemaBuilder';

/** A complete notation module: an ordered list of definitions. */
export interface SchemaModuleAst {
  definitions: DefinitionAst[];
}

/** `Name = type` */
export interface DefinitionAst {
  name: string;
  type: TypeAst;
  line: number;
}

/** Discriminated union of all notation types. */
export type TypeAst =
  | IntTypeAst
  | FloatTypeAst
  | SimpleTypeAst
  | TextTypeAst
  | BytesTypeAst
  | StringTypeAst
  | PascalStringTypeAst
  | ArrayTypeAst
  | GreedyTypeAst
  | PrefixedTypeAst
  | PrefixedArrayTypeAst
  | EnumTypeAst
  | SwitchTypeAst
  | IfTypeAst
  | ConstBytesTypeAst
  | ConstTypeAst
  | PaddingTypeAst
  | ComputedTypeAst
  | RebuildTypeAst
  | StructTypeAst
  | ReferenceTypeAst;

export interface IntTypeAst {
  kind: 'int';
  size: FieldSize;
  signed: boolean;
  endian: Endian;
}

export interface FloatTypeAst {
  kind: 'float';
  size: 4 | 8;
  endian: Endian;
}

export interface SimpleTypeAst {
  kind: 'varint' | 'flag' | 'pass' | 'terminated' | 'greedybytes';
}

/** `cstring` / `greedystring`, optionally with an encoding argument. */
export interface TextTypeAst {
  kind: 'cstring' | 'greedystring';
  encoding?: string;
}

export interface BytesTypeAst {
  kind: 'bytes';
  length: SchemaExpr;
}

export interface StringTypeAst {
  kind: 'string';
  length: SchemaExpr;
  encoding?: string;
}

export interface PascalStringTypeAst {
  kind: 'pascalstring';
  lengthField: TypeAst;
  encoding?: string;
}

export interface ArrayTypeAst {
  kind: 'array';
  count: SchemaExpr;
  item: TypeAst;
}

export interface GreedyTypeAst {
  kind: 'greedy';
  item: TypeAst;
}

export interface PrefixedTypeAst {
  kind: 'prefixed';
  lengthField: TypeAst;
  inner: TypeAst;
}

export interface PrefixedArrayTypeAst {
  kind: 'prefixedArray';
  countField: TypeAst;
  item: TypeAst;
}

export interface EnumTypeAst {
  kind: 'enum';
  inner: TypeAst;
  members: Array<{ name: string; value: number }>;
}

export interface SwitchCaseAst {
  key: string | number;
  type: TypeAst;
}

export interface SwitchTypeAst {
  kind: 'switch';
  selector: SchemaExpr;
  cases: SwitchCaseAst[];
  fallback?: TypeAst;
  embedded: boolean;
}

export interface IfTypeAst {
  kind: 'if';
  condition: SchemaExpr;
  then: TypeAst;
  else?: TypeAst;
}

export interface ConstBytesTypeAst {
  kind: 'constBytes';
  value: number[];
}

export interface ConstTypeAst {
  kind: 'const';
  value: number;
  type: TypeAst;
}

export interface PaddingTypeAst {
  kind: 'padding';
  length: SchemaExpr;
}

export interface ComputedTypeAst {
  kind: 'computed';
  value: SchemaExpr;
}

export interface RebuildTypeAst {
  kind: 'rebuild';
  inner: TypeAst;
  value: SchemaExpr;
}

/** A struct field: named, or an embedded type. */
export type FieldAst =
  | { embedded: true; type: TypeAst }
  | { embedded?: undefined; name: string; optional: boolean; type: TypeAst; defaultValue?: unknown };

export interface StructTypeAst {
  kind: 'struct';
  fields: FieldAst[];
}

export interface ReferenceTypeAst {
  kind: 'ref';
  name: string;
  line: number;
}
