import type { Context } from '../Context';
import type { Path } from '../Path';
import type { StreamCursor } from '../StreamCursor';
import { Construct } from '../constructs/Construct';
import { CompiledProgram, CompileOptions, compileProgram } from './Compiler';

/**
 * A construct backed by a compiled program. Interchangeable with the source
 * tree: same values, same bytes, same errors.
 */
export class CompiledConstruct extends Construct<unknown> {
  readonly source: Construct;
  readonly program: CompiledProgram;

  constructor(source: Construct, program: CompiledProgram) {
    super();
    this.source = source;
    this.program = program;
  }

  get embedded(): boolean {
    return this.source.embedded;
  }

  get buildsFromNothing(): boolean {
    return this.source.buildsFromNothing;
  }

  /** Whether every node runs specialised, with no interpreter fallback. */
  get fullyCompiled(): boolean {
    return this.program.fallbacks.length === 0;
  }

  _parse(cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.program.parse(cursor, ctx, path);
  }

  _build(value: unknown, cursor: StreamCursor, ctx: Context, path: Path): unknown {
    return this.program.build(value, cursor, ctx, path);
  }

  _sizeof(ctx: Context, path: Path): number {
    return this.program.staticSize ?? this.source._sizeof(ctx, path);
  }
}

/** Compile a construct tree. Always succeeds; see `program.fallbacks`. */
export function compile(construct: Construct, options?: CompileOptions): CompiledConstruct {
  return new CompiledConstruct(construct, compileProgram(construct, options));
}
