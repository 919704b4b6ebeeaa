export { MemoryStream, isSeekable, bytesToHex, hexToBytes } from './ByteStream';
export type { ByteStream, SeekableByteStream } from './ByteStream';
export { StreamCursor } from './StreamCursor';
export type { CursorMark } from './StreamCursor';
export { Path } from './Path';
export type { PathMode, PathSegment } from './Path';
export { Context, ContextArena } from './Context';
export {
  ConstructError,
  StreamError,
  FormatFieldError,
  StringError,
  IntegerError,
  RepeatError,
  IndexFieldError,
  CheckError,
  NamedTupleError,
  RawCopyError,
  MissingFieldError,
  SizeofError,
  SwitchError,
  SelectError,
  CollisionError,
  ArgumentError,
  MappingError,
  isConstructError,
  describeError,
} from './errors';
export type { ErrorKind } from './errors';
export {
  Expr,
  RefExpr,
  LitExpr,
  LenExpr,
  BinaryExpr,
  NotExpr,
  ref,
  lit,
  len,
  add,
  sub,
  mul,
  div,
  mod,
  eq,
  ne,
  lt,
  le,
  gt,
  ge,
  and,
  or,
  not,
  evaluateParam,
} from './expr';
export type { BinaryOp, ContextFn, Param } from './expr';

export { Construct, Subconstruct, Embedded } from './constructs/Construct';
export {
  FormatField,
  FlagField,
  Flag,
  Byte,
  Int8ub,
  Int16ub,
  Int32ub,
  Int64ub,
  Int8sb,
  Int16sb,
  Int32sb,
  Int64sb,
  Int8ul,
  Int16ul,
  Int32ul,
  Int64ul,
  Int8sl,
  Int16sl,
  Int32sl,
  Int64sl,
  Float32b,
  Float64b,
  Float32l,
  Float64l,
} from './constructs/FormatField';
export type { Endian, FieldSize, NumericKind } from './constructs/FormatField';
export { Bytes, GreedyBytesField, GreedyBytes } from './constructs/Bytes';
export { BytesInteger, BitsInteger, VarIntField, VarInt } from './constructs/Integer';
export { PaddedString, PascalString, CString, GreedyString, TEXT_ENCODINGS } from './constructs/Strings';
export type { TextEncoding } from './constructs/Strings';
export {
  Const,
  Computed,
  PassField,
  Pass,
  TerminatedField,
  Terminated,
  Padding,
  IndexField,
  Index,
  Check,
  Probe,
} from './constructs/Special';
export type { ProbeSink } from './constructs/Special';
export { Struct } from './constructs/Struct';
export type { StructField, StructOptions } from './constructs/Struct';
export { Union } from './constructs/Union';
export type { UnionField, UnionOptions } from './constructs/Union';
export { Sequence } from './constructs/Sequence';
export type { SequenceItem, SequenceOptions } from './constructs/Sequence';
export { ArrayOf, GreedyRange, RepeatUntil, PrefixedArray } from './constructs/Repeat';
export type { UntilPredicate } from './constructs/Repeat';
export { IfThenElse, If, Switch, EmbeddedSwitch, Select, Optional } from './constructs/Conditional';
export type { SwitchCases, SwitchOptions } from './constructs/Conditional';
export {
  Adapter,
  SymmetricAdapter,
  Validator,
  ExprAdapter,
  ExprValidator,
  OneOf,
  NoneOf,
  Mapping,
  Enum,
  NamedTuple,
  Rebuild,
  Default,
} from './constructs/Adapter';
export type { AdapterFn, ExprAdapterOptions } from './constructs/Adapter';
export {
  Transformed,
  Prefixed,
  RestreamData,
  ByteSwapped,
  Bitwise,
  Padded,
  Aligned,
} from './constructs/Transform';
export type { ByteTransform, TransformOptions } from './constructs/Transform';
export { RawCopy } from './constructs/RawCopy';
export type { RawCopyValue } from './constructs/RawCopy';
export { Peek, Pointer, TellField, Tell } from './constructs/StreamOps';
export { LazyBound, Ref } from './constructs/Lazy';
export type { ConstructResolver } from './constructs/Lazy';

export { Compiler, compileProgram } from './compiler/Compiler';
export type {
  CompiledNode,
  CompiledProgram,
  CompileFallback,
  CompileOptions,
  ParseRoutine,
  BuildRoutine,
} from './compiler/Compiler';
export { CompiledConstruct, compile } from './compiler/CompiledConstruct';
export { verifyCompiled } from './compiler/verify';

export { SchemaBuilder, buildExpr } from './schema/SchemaBuilder';
export type { SchemaNode, SchemaExpr, SchemaField, SchemaType } from './schema/SchemaBuilder';
export { readSchemaNode, readSchemaModule, readSchemaExpr } from './schema/SchemaJson';
export { SchemaRegistry } from './schema/SchemaRegistry';
export { SchemaCodec } from './schema/SchemaCodec';
export type { SchemaCodecOptions } from './schema/SchemaCodec';
export { parseSchemaModule } from './parser/SchemaParser';
export { convertModuleToSchemaNodes } from './parser/toSchemaNode';
export type { SchemaModuleAst, DefinitionAst, TypeAst, FieldAst } from './parser/types';
