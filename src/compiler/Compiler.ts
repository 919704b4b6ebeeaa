import { MemoryStream } from '../ByteStream';
import type { Context } from '../Context';
import { StreamError } from '../errors';
import { checkCount, constantCount, evaluateCount, evaluateParam, isStaticParam, LitExpr } from '../expr';
import type { Path, PathSegment } from '../Path';
import { StreamCursor } from '../StreamCursor';
import { Adapter, Default, Enum, ExprAdapter, Mapping, NamedTuple, NoneOf, OneOf, Rebuild } from '../constructs/Adapter';
import { Bytes } from '../constructs/Bytes';
import { expectBranchInput, IfThenElse, selectCase, Switch } from '../constructs/Conditional';
import { Construct, Embedded } from '../constructs/Construct';
import { FlagField, FormatField } from '../constructs/FormatField';
import { LazyBound, Ref } from '../constructs/Lazy';
import {
  buildEach,
  expectArray,
  expectCount,
  parseCounted,
  parseGreedy,
  ArrayOf,
  GreedyRange,
} from '../constructs/Repeat';
import { expectSequenceInput, itemInput, Sequence, slotCount, storeItem } from '../constructs/Sequence';
import { Check, Computed, Const, Padding, PassField } from '../constructs/Special';
import { PaddedString } from '../constructs/Strings';
import { expectRecord, fieldInput, storeField, Struct, StructField } from '../constructs/Struct';
import { Prefixed } from '../constructs/Transform';

export type ParseRoutine = (cursor: StreamCursor, ctx: Context, path: Path) => unknown;
export type BuildRoutine = (value: unknown, cursor: StreamCursor, ctx: Context, path: Path) => unknown;

/** Specialised routine pair for one schema node. */
export interface CompiledNode {
  readonly parse: ParseRoutine;
  readonly build: BuildRoutine;
  /** Constant size, when it follows from the structure alone. */
  readonly staticSize: number | undefined;
}

/** A node the compiled program hands back to the interpreter. */
export interface CompileFallback {
  readonly path: string;
  readonly construct: string;
  readonly reason: string;
}

export interface CompiledProgram extends CompiledNode {
  /** Leaf classes the program calls through their own parse/build. */
  readonly externals: ReadonlySet<string>;
  readonly fallbacks: readonly CompileFallback[];
}

export interface CompileOptions {
  /** Called once per fallback, e.g. to log why a subtree stays interpreted. */
  onFallback?: (fallback: CompileFallback) => void;
}

/** Decoder for one slot of a fixed-layout struct block. */
interface FixedSlot {
  readonly size: number;
  decode(block: Uint8Array, view: DataView, offset: number, path: Path): unknown;
}

function sumSizes(sizes: readonly (number | undefined)[]): number | undefined {
  let total = 0;
  for (const size of sizes) {
    if (size === undefined) return undefined;
    total += size;
  }
  return total;
}

function describePath(at: readonly PathSegment[]): string {
  return at.length === 0 ? '(root)' : at.join(' -> ');
}

/** Constant truth value of a parameter, when it has one. */
function constantCondition(param: unknown): boolean | undefined {
  if (typeof param === 'boolean') return param;
  if (param instanceof LitExpr) return Boolean(param.value);
  return undefined;
}

/** Switch key known without a context, or undefined. */
function constantKey(selector: unknown): string | number | boolean | undefined {
  const key = selector instanceof LitExpr ? selector.value : selector;
  if (typeof key === 'string' || typeof key === 'number' || typeof key === 'boolean') return key;
  return undefined;
}

/**
 * Turns a construct tree into closures specialised for its shape. Nodes the
 * compiler cannot express run through the interpreter from inside the
 * compiled program, so the result always behaves like the source tree.
 */
export class Compiler {
  private readonly options: CompileOptions;
  private readonly fallbacks: CompileFallback[] = [];
  private readonly externals = new Set<string>();
  private readonly refNodes = new Map<Construct, CompiledNode>();

  constructor(options: CompileOptions = {}) {
    this.options = options;
  }

  compile(construct: Construct): CompiledProgram {
    const node = this.node(construct, []);
    return {
      parse: node.parse,
      build: node.build,
      staticSize: node.staticSize,
      externals: new Set(this.externals),
      fallbacks: [...this.fallbacks],
    };
  }

  private node(c: Construct, at: readonly PathSegment[]): CompiledNode {
    if (c instanceof FormatField) return this.formatField(c);
    if (c instanceof FlagField) return this.leaf(c, 1);
    if (c instanceof PassField) return this.leaf(c, 0);
    if (c instanceof Bytes || c instanceof PaddedString || c instanceof Padding) {
      if (!isStaticParam(c.length)) return this.fallback(c, at, 'opaque length function');
      return this.leaf(c, constantCount(c.length));
    }
    if (c instanceof Computed) {
      if (!isStaticParam(c.func)) return this.fallback(c, at, 'opaque value function');
      return this.leaf(c, 0);
    }
    if (c instanceof Check) {
      if (!isStaticParam(c.predicate)) return this.fallback(c, at, 'opaque predicate');
      return this.leaf(c, 0);
    }
    if (c instanceof Const) return this.constant(c, at);
    if (c instanceof Struct) return this.struct(c, at);
    if (c instanceof Sequence) return this.sequence(c, at);
    if (c instanceof ArrayOf) {
      if (!isStaticParam(c.count)) return this.fallback(c, at, 'opaque count function');
      return this.arrayOf(c, at);
    }
    if (c instanceof GreedyRange) return this.greedyRange(c, at);
    if (c instanceof IfThenElse) {
      if (!isStaticParam(c.condition)) return this.fallback(c, at, 'opaque condition');
      return this.ifThenElse(c, at);
    }
    if (c instanceof Switch) {
      if (!isStaticParam(c.selector)) return this.fallback(c, at, 'opaque selector');
      return this.switchNode(c, at);
    }
    if (c instanceof Rebuild) {
      if (!isStaticParam(c.func)) return this.fallback(c, at, 'opaque rebuild function');
      return this.rebuild(c, at);
    }
    if (c instanceof Default) {
      if (!isStaticParam(c.value)) return this.fallback(c, at, 'opaque default function');
      return this.defaultNode(c, at);
    }
    if (c instanceof Embedded) return this.node(c.subcon, at);
    if (c instanceof Prefixed) return this.prefixed(c, at);
    if (c instanceof ExprAdapter) {
      if (!c.pure) return this.fallback(c, at, 'adapter not declared pure');
      return this.adapter(c, at);
    }
    if (c instanceof Mapping || c instanceof Enum || c instanceof OneOf || c instanceof NoneOf || c instanceof NamedTuple) {
      return this.adapter(c, at);
    }
    if (c instanceof Ref) return this.ref(c, at);
    if (c instanceof LazyBound) return this.fallback(c, at, 'lazy resolver');
    if (c instanceof Adapter) return this.fallback(c, at, 'adapter with opaque functions');
    if (c.subconstructs.length === 0) return this.external(c);
    return this.fallback(c, at, `no specialised routine for ${c.constructor.name}`);
  }

  private interpreted(c: Construct): CompiledNode {
    return {
      parse: (cursor, ctx, path) => c._parse(cursor, ctx, path),
      build: (value, cursor, ctx, path) => c._build(value, cursor, ctx, path),
      staticSize: undefined,
    };
  }

  private fallback(c: Construct, at: readonly PathSegment[], reason: string): CompiledNode {
    const record: CompileFallback = { path: describePath(at), construct: c.constructor.name, reason };
    this.fallbacks.push(record);
    this.options.onFallback?.(record);
    return this.interpreted(c);
  }

  private external(c: Construct): CompiledNode {
    this.externals.add(c.constructor.name);
    return this.interpreted(c);
  }

  /** Leaf with static parameters: its own routines, plus a known size. */
  private leaf(c: Construct, staticSize: number | undefined): CompiledNode {
    return { ...this.interpreted(c), staticSize };
  }

  private formatField(c: FormatField): CompiledNode {
    const size = c.size;
    return {
      parse: (cursor, _ctx, path) => {
        const data = cursor.read(size, path);
        return c.unpack(new DataView(data.buffer, data.byteOffset, data.byteLength), 0);
      },
      build: (value, cursor, _ctx, path) => {
        cursor.write(c.pack(value, path));
        return c.normalize(value);
      },
      staticSize: size,
    };
  }

  private constant(c: Const<unknown>, at: readonly PathSegment[]): CompiledNode {
    const sub = this.node(c.subcon, at);
    return {
      parse: (cursor, ctx, path) => c.verify(sub.parse(cursor, ctx, path), path),
      build: (value, cursor, ctx, path) => {
        c.checkInput(value, path);
        return sub.build(c.value, cursor, ctx, path);
      },
      staticSize: sub.staticSize,
    };
  }

  private struct(c: Struct, at: readonly PathSegment[]): CompiledNode {
    const fields = c.fields.map((field, i) => ({
      field,
      key: field.name ?? i,
      node: this.node(field.construct, [...at, field.name ?? i]),
    }));
    const staticSize = sumSizes(fields.map(f => (f.field.optional ? undefined : f.node.staticSize)));
    const layout = this.fixedLayout(c.fields);
    const parse: ParseRoutine = layout && staticSize !== undefined
      ? this.fixedStructParse(c.fields, layout, staticSize)
      : (cursor, ctx, path) => {
          const frame = ctx.child();
          const result: Record<string, unknown> = {};
          for (const { field, key, node } of fields) {
            const fieldPath = path.child(key);
            if (field.optional && cursor.atEnd()) continue;
            storeField(field, node.parse(cursor, frame, fieldPath), result, frame, fieldPath);
          }
          return result;
        };
    const build: BuildRoutine = (value, cursor, ctx, path) => {
      const record = expectRecord(value, path);
      const frame = ctx.child(record);
      const result: Record<string, unknown> = {};
      for (const { field, key, node } of fields) {
        const fieldPath = path.child(key);
        const input = fieldInput(field, record, fieldPath);
        if (!input) continue;
        storeField(field, node.build(input.value, cursor, frame, fieldPath), result, frame, fieldPath);
      }
      return result;
    };
    return { parse, build, staticSize };
  }

  /** Slots for a struct made only of fixed-size leaves, or undefined. */
  private fixedLayout(fields: readonly StructField[]): FixedSlot[] | undefined {
    const slots: FixedSlot[] = [];
    for (const field of fields) {
      if (field.optional || field.construct.embedded) return undefined;
      const slot = this.fixedSlot(field.construct);
      if (!slot) return undefined;
      slots.push(slot);
    }
    return slots;
  }

  private fixedSlot(c: Construct): FixedSlot | undefined {
    if (c instanceof FormatField) {
      return { size: c.size, decode: (_block, view, offset) => c.unpack(view, offset) };
    }
    if (c instanceof FlagField) {
      return { size: 1, decode: (block, _view, offset) => block[offset] !== 0 };
    }
    if (c instanceof Bytes) {
      const size = constantCount(c.length);
      if (size === undefined) return undefined;
      return { size, decode: (block, _view, offset) => block.slice(offset, offset + size) };
    }
    if (c instanceof Padding) {
      const size = constantCount(c.length);
      if (size === undefined) return undefined;
      return { size, decode: (block, _view, offset, path) => c.verify(block.subarray(offset, offset + size), path) };
    }
    if (c instanceof Const) {
      const inner = this.fixedSlot(c.subcon);
      if (!inner) return undefined;
      return {
        size: inner.size,
        decode: (block, view, offset, path) => c.verify(inner.decode(block, view, offset, path), path),
      };
    }
    return undefined;
  }

  /**
   * One block read for the whole struct. A short block fails at the first
   * field it cannot cover, exactly as field-by-field reads would.
   */
  private fixedStructParse(fields: readonly StructField[], slots: readonly FixedSlot[], total: number): ParseRoutine {
    return (cursor, ctx, path) => {
      const block = cursor.readAtMost(total);
      const view = new DataView(block.buffer, block.byteOffset, block.byteLength);
      const frame = ctx.child();
      const result: Record<string, unknown> = {};
      let offset = 0;
      slots.forEach((slot, i) => {
        const field = fields[i];
        const fieldPath = path.child(field.name ?? i);
        if (offset + slot.size > block.length) {
          throw new StreamError(`expected ${slot.size} bytes, found ${block.length - offset}`, fieldPath);
        }
        storeField(field, slot.decode(block, view, offset, fieldPath), result, frame, fieldPath);
        offset += slot.size;
      });
      return result;
    };
  }

  private sequence(c: Sequence, at: readonly PathSegment[]): CompiledNode {
    const items = c.items.map((item, i) => ({ item, node: this.node(item.construct, [...at, i]) }));
    return {
      parse: (cursor, ctx, path) => {
        const frame = ctx.child();
        const result: unknown[] = [];
        items.forEach(({ item, node }, i) => {
          const itemPath = path.child(i);
          storeItem(item, node.parse(cursor, frame, itemPath), result, frame, itemPath);
        });
        return result;
      },
      build: (value, cursor, ctx, path) => {
        const input = expectSequenceInput(value, c.width, path);
        const frame = ctx.child();
        const result: unknown[] = [];
        let slot = 0;
        items.forEach(({ item, node }, i) => {
          const itemPath = path.child(i);
          const entry = itemInput(item, input, slot, itemPath);
          slot += slotCount(item.construct);
          storeItem(item, node.build(entry, cursor, frame, itemPath), result, frame, itemPath);
        });
        return result;
      },
      staticSize: sumSizes(items.map(i => i.node.staticSize)),
    };
  }

  private arrayOf(c: ArrayOf<unknown>, at: readonly PathSegment[]): CompiledNode {
    const sub = this.node(c.subcon, [...at, '[]']);
    const count = c.count;
    const fixedCount = constantCount(count);
    const element = c.subcon;
    const parse: ParseRoutine = element instanceof FormatField
      ? this.packedArrayParse(count, element)
      : (cursor, ctx, path) =>
          parseCounted(evaluateCount(count, ctx, path), ctx, path, elementPath => sub.parse(cursor, ctx, elementPath));
    return {
      parse,
      build: (value, cursor, ctx, path) => {
        const items = expectCount(value, evaluateCount(count, ctx, path), path);
        return buildEach(items, ctx, path, (item, elementPath) => sub.build(item, cursor, ctx, elementPath));
      },
      staticSize: fixedCount !== undefined && sub.staticSize !== undefined ? fixedCount * sub.staticSize : undefined,
    };
  }

  /** Array of numeric fields: one block read, decoded in place. */
  private packedArrayParse(count: unknown, field: FormatField): ParseRoutine {
    const size = field.size;
    return (cursor, ctx, path) => {
      const n = evaluateCount(count, ctx, path);
      const block = cursor.readAtMost(n * size);
      const view = new DataView(block.buffer, block.byteOffset, block.byteLength);
      const items: unknown[] = [];
      for (let i = 0; i < n; i++) {
        const offset = i * size;
        if (offset + size > block.length) {
          throw new StreamError(`expected ${size} bytes, found ${block.length - offset}`, path.child(i));
        }
        items.push(field.unpack(view, offset));
      }
      return items;
    };
  }

  private greedyRange(c: GreedyRange<unknown>, at: readonly PathSegment[]): CompiledNode {
    const sub = this.node(c.subcon, [...at, '[]']);
    return {
      parse: (cursor, ctx, path) => parseGreedy(cursor, ctx, path, elementPath => sub.parse(cursor, ctx, elementPath)),
      build: (value, cursor, ctx, path) =>
        buildEach(expectArray(value, path), ctx, path, (item, elementPath) => sub.build(item, cursor, ctx, elementPath)),
      staticSize: undefined,
    };
  }

  private ifThenElse(c: IfThenElse, at: readonly PathSegment[]): CompiledNode {
    const thenNode = this.node(c.thenCon, at);
    const elseNode = this.node(c.elseCon, at);
    const condition = c.condition;
    const choose = (ctx: Context, path: Path): CompiledNode =>
      evaluateParam(condition, ctx, path) ? thenNode : elseNode;
    const fixed = constantCondition(condition);
    return {
      parse: (cursor, ctx, path) => choose(ctx, path).parse(cursor, ctx, path),
      build: (value, cursor, ctx, path) => {
        const holds = Boolean(evaluateParam(condition, ctx, path));
        expectBranchInput(holds ? c.thenCon : c.elseCon, value, path);
        return (holds ? thenNode : elseNode).build(value, cursor, ctx, path);
      },
      staticSize: fixed === undefined ? undefined : (fixed ? thenNode : elseNode).staticSize,
    };
  }

  private switchNode(c: Switch, at: readonly PathSegment[]): CompiledNode {
    const cases = new Map<unknown, CompiledNode>();
    for (const [key, branch] of c.cases) {
      cases.set(key, this.node(branch, [...at, String(key)]));
    }
    const fallbackNode = c.defaultCase ? this.node(c.defaultCase, [...at, 'default']) : undefined;
    const selector = c.selector;
    const choose = (ctx: Context, path: Path): CompiledNode =>
      selectCase(cases, fallbackNode, evaluateParam(selector, ctx, path), path);
    const key = constantKey(selector);
    const known = key === undefined ? undefined : cases.get(key) ?? cases.get(String(key)) ?? fallbackNode;
    return {
      parse: (cursor, ctx, path) => choose(ctx, path).parse(cursor, ctx, path),
      build: (value, cursor, ctx, path) => choose(ctx, path).build(value, cursor, ctx, path),
      staticSize: known?.staticSize,
    };
  }

  private rebuild(c: Rebuild<unknown>, at: readonly PathSegment[]): CompiledNode {
    const sub = this.node(c.subcon, at);
    const func = c.func;
    return {
      parse: sub.parse,
      build: (_value, cursor, ctx, path) => sub.build(evaluateParam(func, ctx, path), cursor, ctx, path),
      staticSize: sub.staticSize,
    };
  }

  private defaultNode(c: Default<unknown>, at: readonly PathSegment[]): CompiledNode {
    const sub = this.node(c.subcon, at);
    const fallbackValue = c.value;
    return {
      parse: sub.parse,
      build: (value, cursor, ctx, path) =>
        sub.build(value === undefined ? evaluateParam(fallbackValue, ctx, path) : value, cursor, ctx, path),
      staticSize: sub.staticSize,
    };
  }

  private prefixed(c: Prefixed<unknown>, at: readonly PathSegment[]): CompiledNode {
    const lengthNode = this.node(c.lengthField, at);
    const sub = this.node(c.subcon, at);
    return {
      parse: (cursor, ctx, path) => {
        const length = checkCount(lengthNode.parse(cursor, ctx, path), path, 'length');
        const window = new StreamCursor(MemoryStream.from(cursor.read(length, path)));
        return sub.parse(window, ctx, path);
      },
      build: (value, cursor, ctx, path) => {
        const scratch = MemoryStream.alloc();
        const built = sub.build(value, new StreamCursor(scratch), ctx, path);
        const data = scratch.toUint8Array();
        lengthNode.build(data.length, cursor, ctx, path);
        cursor.write(data);
        return built;
      },
      staticSize: sumSizes([lengthNode.staticSize, sub.staticSize]),
    };
  }

  private adapter(c: Adapter, at: readonly PathSegment[]): CompiledNode {
    const sub = this.node(c.subcon, at);
    return {
      parse: (cursor, ctx, path) => {
        const obj = c.decode(sub.parse(cursor, ctx, path), ctx, path);
        c.validate(obj, ctx, path);
        return obj;
      },
      build: (value, cursor, ctx, path) => {
        c.validate(value, ctx, path);
        return c.decode(sub.build(c.encode(value, ctx, path), cursor, ctx, path), ctx, path);
      },
      staticSize: sub.staticSize,
    };
  }

  private ref(c: Ref, at: readonly PathSegment[]): CompiledNode {
    if (c.registry.isRecursive(c.name)) return this.fallback(c, at, `recursive reference '${c.name}'`);
    const target = c.registry.lookup(c.name);
    if (!target) return this.fallback(c, at, `unresolved reference '${c.name}'`);
    const cached = this.refNodes.get(target);
    if (cached) return cached;
    const node = this.node(target, [...at, `$${c.name}`]);
    this.refNodes.set(target, node);
    return node;
  }
}

/** Compile `construct` into a program (see {@link Compiler}). */
export function compileProgram(construct: Construct, options?: CompileOptions): CompiledProgram {
  return new Compiler(options).compile(construct);
}
