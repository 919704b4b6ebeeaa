import type { Context, ContextArena } from '../Context';
import { ArgumentError, SizeofError } from '../errors';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from './Construct';

/**
 * Defers to the construct returned by `resolver`, called afresh on every
 * parse, build and sizeof. Lets a schema refer to itself.
 */
export class LazyBound<T = unknown> extends Construct<T> {
  readonly resolver: () => Construct<T>;
  /** Invocations currently sizing this construct. */
  private readonly sizing = new WeakSet<ContextArena>();

  constructor(resolver: () => Construct<T>) {
    super();
    this.resolver = resolver;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.resolver()._parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): T {
    return this.resolver()._build(value, cursor, ctx, path);
  }

  _sizeof(ctx: Context, path: Path): number {
    if (this.sizing.has(ctx.arena)) {
      throw new SizeofError('recursive lazy construct has no determinable size', path);
    }
    this.sizing.add(ctx.arena);
    try {
      return this.resolver()._sizeof(ctx, path);
    } finally {
      this.sizing.delete(ctx.arena);
    }
  }
}

/** Name lookup used by {@link Ref}. Implemented by SchemaRegistry. */
export interface ConstructResolver {
  lookup(name: string): Construct | undefined;
  isRecursive(name: string): boolean;
}

/** Named reference resolved through a registry at call time. */
export class Ref extends Construct {
  readonly registry: ConstructResolver;
  readonly name: string;
  /** Invocations currently sizing this reference. */
  private readonly sizing = new WeakSet<ContextArena>();

  constructor(registry: ConstructResolver, name: string) {
    super();
    this.registry = registry;
    this.name = name;
  }

  /** Target construct, raising ArgumentError when the name is unknown. */
  resolve(path?: Path): Construct {
    const target = this.registry.lookup(this.name);
    if (!target) {
      throw new ArgumentError(`unknown schema reference '${this.name}'`, path);
    }
    return target;
  }

  get embedded(): boolean {
    return !this.registry.isRecursive(this.name) && (this.registry.lookup(this.name)?.embedded ?? false);
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.resolve(path)._parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.resolve(path)._build(value, cursor, ctx, path);
  }

  _sizeof(ctx: Context, path: Path): number {
    const target = this.resolve(path);
    if (this.sizing.has(ctx.arena)) {
      throw new SizeofError(`recursive reference '${this.name}' has no determinable size`, path);
    }
    this.sizing.add(ctx.arena);
    try {
      return target._sizeof(ctx, path);
    } finally {
      this.sizing.delete(ctx.arena);
    }
  }
}
