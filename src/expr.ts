import { Context } from './Context';
import { ArgumentError } from './errors';
import type { Path } from './Path';

/**
 * Statically inspectable expression over the context. Unlike an opaque
 * `(ctx) => value` function, an Expr can be specialised by the compiler.
 */
export abstract class Expr {
  abstract evaluate(ctx: Context, path: Path): unknown;
  abstract toString(): string;
}

export class RefExpr extends Expr {
  readonly segments: readonly string[];

  constructor(segments: readonly string[]) {
    super();
    if (segments.length === 0) throw new ArgumentError('ref() needs at least one name');
    this.segments = segments;
  }

  evaluate(ctx: Context, path: Path): unknown {
    return ctx.resolve(this.segments, path);
  }

  toString(): string {
    return this.segments.join('.');
  }
}

export class LitExpr extends Expr {
  readonly value: unknown;

  constructor(value: unknown) {
    super();
    this.value = value;
  }

  evaluate(): unknown {
    return this.value;
  }

  toString(): string {
    return typeof this.value === 'string' ? JSON.stringify(this.value) : String(this.value);
  }
}

export class LenExpr extends Expr {
  readonly operand: Expr;

  constructor(operand: Expr) {
    super();
    this.operand = operand;
  }

  evaluate(ctx: Context, path: Path): unknown {
    const value = this.operand.evaluate(ctx, path);
    if (value instanceof Uint8Array || typeof value === 'string' || Array.isArray(value)) {
      return value.length;
    }
    throw new ArgumentError(`len(${this.operand.toString()}) of a value without length`, path);
  }

  toString(): string {
    return `len(${this.operand.toString()})`;
  }
}

export type BinaryOp = '+' | '-' | '*' | '/' | '%' | '==' | '!=' | '<' | '<=' | '>' | '>=' | '&&' | '||';

export const BINARY_OPS: readonly BinaryOp[] = ['+', '-', '*', '/', '%', '==', '!=', '<', '<=', '>', '>=', '&&', '||'];

export function isBinaryOp(op: string): op is BinaryOp {
  return BINARY_OPS.some(candidate => candidate === op);
}

export class BinaryExpr extends Expr {
  readonly op: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;

  constructor(op: BinaryOp, left: Expr, right: Expr) {
    super();
    this.op = op;
    this.left = left;
    this.right = right;
  }

  evaluate(ctx: Context, path: Path): unknown {
    const l = this.left.evaluate(ctx, path);
    if (this.op === '&&') return Boolean(l) && Boolean(this.right.evaluate(ctx, path));
    if (this.op === '||') return Boolean(l) || Boolean(this.right.evaluate(ctx, path));
    const r = this.right.evaluate(ctx, path);
    switch (this.op) {
      case '==': return looseKey(l) === looseKey(r);
      case '!=': return looseKey(l) !== looseKey(r);
    }
    const a = numeric(l, this, path);
    const b = numeric(r, this, path);
    if (typeof a === 'bigint' || typeof b === 'bigint') {
      return bigintOp(this.op, BigInt(a), BigInt(b), this, path);
    }
    switch (this.op) {
      case '+': return a + b;
      case '-': return a - b;
      case '*': return a * b;
      case '/':
        if (b === 0) throw new ArgumentError(`division by zero in ${this.toString()}`, path);
        return Math.trunc(a / b);
      case '%':
        if (b === 0) throw new ArgumentError(`division by zero in ${this.toString()}`, path);
        return a % b;
      case '<': return a < b;
      case '<=': return a <= b;
      case '>': return a > b;
      default: return a >= b;
    }
  }

  toString(): string {
    return `(${this.left.toString()} ${this.op} ${this.right.toString()})`;
  }
}

export class NotExpr extends Expr {
  readonly operand: Expr;

  constructor(operand: Expr) {
    super();
    this.operand = operand;
  }

  evaluate(ctx: Context, path: Path): unknown {
    return !this.operand.evaluate(ctx, path);
  }

  toString(): string {
    return `!${this.operand.toString()}`;
  }
}

function numeric(value: unknown, expr: Expr, path: Path): number | bigint {
  if (typeof value === 'number' || typeof value === 'bigint') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new ArgumentError(`non-numeric operand ${String(value)} in ${expr.toString()}`, path);
}

/** Numbers and bigints of equal value compare equal. */
function looseKey(value: unknown): unknown {
  return typeof value === 'bigint' && value >= Number.MIN_SAFE_INTEGER && value <= Number.MAX_SAFE_INTEGER
    ? Number(value)
    : value;
}

function bigintOp(op: BinaryOp, a: bigint, b: bigint, expr: Expr, path: Path): bigint | boolean {
  switch (op) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '/':
    case '%':
      if (b === 0n) throw new ArgumentError(`division by zero in ${expr.toString()}`, path);
      return op === '/' ? a / b : a % b;
    case '<': return a < b;
    case '<=': return a <= b;
    case '>': return a > b;
    default: return a >= b;
  }
}

type Operand = Expr | number | bigint | string | boolean;

function toExpr(operand: Operand): Expr {
  return operand instanceof Expr ? operand : new LitExpr(operand);
}

/** Reference into the context, e.g. `ref('_', 'header', 'length')`. */
export function ref(...segments: string[]): RefExpr {
  return new RefExpr(segments.flatMap(s => s.split('.')));
}

export const lit = (value: unknown): LitExpr => new LitExpr(value);
export const len = (operand: Operand): LenExpr => new LenExpr(toExpr(operand));
export const add = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('+', toExpr(a), toExpr(b));
export const sub = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('-', toExpr(a), toExpr(b));
export const mul = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('*', toExpr(a), toExpr(b));
export const div = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('/', toExpr(a), toExpr(b));
export const mod = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('%', toExpr(a), toExpr(b));
export const eq = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('==', toExpr(a), toExpr(b));
export const ne = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('!=', toExpr(a), toExpr(b));
export const lt = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('<', toExpr(a), toExpr(b));
export const le = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('<=', toExpr(a), toExpr(b));
export const gt = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('>', toExpr(a), toExpr(b));
export const ge = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('>=', toExpr(a), toExpr(b));
export const and = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('&&', toExpr(a), toExpr(b));
export const or = (a: Operand, b: Operand): BinaryExpr => new BinaryExpr('||', toExpr(a), toExpr(b));
export const not = (a: Operand): NotExpr => new NotExpr(toExpr(a));

/** A user function over the context. Opaque to the compiler. */
export type ContextFn<T> = (ctx: Context) => T;

/** Construct parameter: a constant, an expression or a context function. */
export type Param<T> = T | Expr | ContextFn<T>;

function isContextFn(param: unknown): param is ContextFn<unknown> {
  return typeof param === 'function';
}

export function evaluateParam(param: unknown, ctx: Context, path: Path): unknown {
  if (param instanceof Expr) return param.evaluate(ctx, path);
  if (isContextFn(param)) return param(ctx);
  return param;
}

/** Whether a parameter is a constant or an Expr (compiler-eligible). */
export function isStaticParam(param: unknown): boolean {
  return !isContextFn(param);
}

/** Evaluate a count or length, requiring a non-negative integer. */
export function evaluateCount(param: unknown, ctx: Context, path: Path, what = 'count'): number {
  return checkCount(evaluateParam(param, ctx, path), path, what);
}

export function checkCount(value: unknown, path: Path, what = 'count'): number {
  if (typeof value === 'bigint') {
    if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ArgumentError(`${what} ${value} is out of range`, path);
    }
    return Number(value);
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ArgumentError(`${what} must be an integer, got ${String(value)}`, path);
  }
  if (value < 0) {
    throw new ArgumentError(`${what} must be non-negative, got ${value}`, path);
  }
  return value;
}

/** Constant count known without a context, or undefined. */
export function constantCount(param: unknown): number | undefined {
  if (typeof param === 'number' && Number.isInteger(param) && param >= 0) return param;
  if (param instanceof LitExpr) return constantCount(param.value);
  return undefined;
}
