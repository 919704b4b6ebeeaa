export { parseSchemaModule } from './SchemaParser';
export { convertModuleToSchemaNodes } from './toSchemaNode';
export type {
  SchemaModuleAst,
  DefinitionAst,
  TypeAst,
  FieldAst,
  IntTypeAst,
  FloatTypeAst,
  SimpleTypeAst,
  TextTypeAst,
  BytesTypeAst,
  StringTypeAst,
  PascalStringTypeAst,
  ArrayTypeAst,
  GreedyTypeAst,
  PrefixedTypeAst,
  PrefixedArrayTypeAst,
  EnumTypeAst,
  SwitchCaseAst,
  SwitchTypeAst,
  IfTypeAst,
  ConstBytesTypeAst,
  ConstTypeAst,
  PaddingTypeAst,
  ComputedTypeAst,
  RebuildTypeAst,
  StructTypeAst,
  ReferenceTypeAst,
} from './types';
