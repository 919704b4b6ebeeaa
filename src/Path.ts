export type PathSegment = string | number;

export type PathMode = 'parsing' | 'building' | 'sizeof';

/**
 * Location of a construct invocation inside a schema tree.
 * Immutable: entering a named or indexed child returns a new Path.
 */
export class Path {
  readonly mode: PathMode;
  readonly segments: readonly PathSegment[];

  private constructor(mode: PathMode, segments: readonly PathSegment[]) {
    this.mode = mode;
    this.segments = segments;
  }

  static root(mode: PathMode): Path {
    return new Path(mode, []);
  }

  child(segment: PathSegment): Path {
    return new Path(this.mode, [...this.segments, segment]);
  }

  equals(other: Path): boolean {
    if (other.mode !== this.mode || other.segments.length !== this.segments.length) {
      return false;
    }
    return this.segments.every((s, i) => s === other.segments[i]);
  }

  /** Renders as `(parsing) -> header -> items -> 2`. */
  toString(): string {
    return [`(${this.mode})`, ...this.segments.map(String)].join(' -> ');
  }
}
