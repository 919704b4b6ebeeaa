import { MissingFieldError, SizeofError } from './errors';
import type { Path, PathMode } from './Path';
import type { StreamCursor } from './StreamCursor';
import { isRecord } from './helpers';

interface Frame {
  readonly entries: Map<string, unknown>;
  /** Value being built by the construct that owns this frame. */
  readonly input: Record<string, unknown> | undefined;
  readonly parent: number | undefined;
  index: number | undefined;
}

/**
 * All context frames of one parse/build/sizeof invocation. Frames are
 * addressed by integer handle and link to their parent by handle.
 */
export class ContextArena {
  readonly mode: PathMode;
  readonly cursor: StreamCursor | undefined;
  private readonly frames: Frame[] = [];

  constructor(mode: PathMode, cursor?: StreamCursor) {
    this.mode = mode;
    this.cursor = cursor;
  }

  /** Create the root context of an invocation, seeded with caller entries. */
  static open(mode: PathMode, cursor?: StreamCursor, entries?: Record<string, unknown>): Context {
    const arena = new ContextArena(mode, cursor);
    const root = arena.allocate(undefined, undefined);
    if (entries) {
      for (const [key, value] of Object.entries(entries)) root.set(key, value);
    }
    return root;
  }

  allocate(parent: number | undefined, input: Record<string, unknown> | undefined): Context {
    const handle = this.frames.length;
    this.frames.push({ entries: new Map(), input, parent, index: undefined });
    return new Context(this, handle);
  }

  frame(handle: number): Frame {
    return this.frames[handle];
  }

  get size(): number {
    return this.frames.length;
  }
}

/**
 * View of one context frame. Lookups walk own entries, then the value being
 * built (if any), then the parent chain.
 */
export class Context {
  readonly arena: ContextArena;
  readonly handle: number;

  constructor(arena: ContextArena, handle: number) {
    this.arena = arena;
    this.handle = handle;
  }

  get mode(): PathMode {
    return this.arena.mode;
  }

  /** Open a nested frame whose parent is this one. */
  child(input?: Record<string, unknown>): Context {
    return this.arena.allocate(this.handle, input);
  }

  get parent(): Context | undefined {
    const parent = this.arena.frame(this.handle).parent;
    return parent === undefined ? undefined : new Context(this.arena, parent);
  }

  get root(): Context {
    let handle = this.handle;
    for (let p = this.arena.frame(handle).parent; p !== undefined; p = this.arena.frame(p).parent) {
      handle = p;
    }
    return new Context(this.arena, handle);
  }

  /** Nearest repetition index up the frame chain. */
  get index(): number | undefined {
    for (let h: number | undefined = this.handle; h !== undefined; h = this.arena.frame(h).parent) {
      const index = this.arena.frame(h).index;
      if (index !== undefined) return index;
    }
    return undefined;
  }

  /** Set this frame's repetition index, returning the previous one. */
  setIndex(index: number | undefined): number | undefined {
    const frame = this.arena.frame(this.handle);
    const previous = frame.index;
    frame.index = index;
    return previous;
  }

  /**
   * Offset in the invocation's stream. Constructs that parse or build a
   * byte window (Prefixed, Transformed, Pointer) keep reporting the outer
   * stream here, while `Tell` reports the position inside the window.
   */
  get offset(): number | undefined {
    return this.arena.cursor?.offset;
  }

  set(name: string, value: unknown): void {
    this.arena.frame(this.handle).entries.set(name, value);
  }

  /** Whether `name` is an own entry of this frame. */
  hasOwn(name: string): boolean {
    return this.arena.frame(this.handle).entries.has(name);
  }

  has(name: string): boolean {
    return this.lookup(name).found;
  }

  /** Look up `name`, raising MissingFieldError (SizeofError while sizing). */
  get(name: string, path?: Path): unknown {
    const result = this.lookup(name);
    if (!result.found) {
      const detail = `context has no entry '${name}'`;
      throw this.mode === 'sizeof' ? new SizeofError(detail, path) : new MissingFieldError(detail, path);
    }
    return result.value;
  }

  /** Resolve a dotted chain such as `['_', 'header', 'length']`. */
  resolve(segments: readonly string[], path?: Path): unknown {
    let current: unknown = this;
    for (const segment of segments) {
      if (current instanceof Context) {
        current = current.get(segment, path);
      } else if (isRecord(current) && segment in current) {
        current = current[segment];
      } else if (Array.isArray(current) && /^\d+$/.test(segment) && Number(segment) < current.length) {
        current = current[Number(segment)];
      } else {
        const detail = `cannot resolve '${segments.join('.')}' at '${segment}'`;
        throw this.mode === 'sizeof' ? new SizeofError(detail, path) : new MissingFieldError(detail, path);
      }
    }
    return current;
  }

  /** Own entries of this frame, in insertion order. */
  entries(): Record<string, unknown> {
    return Object.fromEntries(this.arena.frame(this.handle).entries);
  }

  private lookup(name: string): { found: true; value: unknown } | { found: false } {
    switch (name) {
      case '_': {
        const parent = this.parent;
        return parent ? { found: true, value: parent } : { found: false };
      }
      case '_root':
        return { found: true, value: this.root };
      case '_index': {
        const index = this.index;
        return index === undefined ? { found: false } : { found: true, value: index };
      }
      case '_offset': {
        const offset = this.offset;
        return offset === undefined ? { found: false } : { found: true, value: offset };
      }
    }
    for (let h: number | undefined = this.handle; h !== undefined; h = this.arena.frame(h).parent) {
      const frame = this.arena.frame(h);
      if (frame.entries.has(name)) return { found: true, value: frame.entries.get(name) };
      if (frame.input && Object.prototype.hasOwnProperty.call(frame.input, name)) {
        return { found: true, value: frame.input[name] };
      }
    }
    return { found: false };
  }
}
