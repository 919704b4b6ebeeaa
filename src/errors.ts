import type { Path } from './Path';

/** Closed set of failure kinds raised by the engine. */
export type ErrorKind =
  | 'StreamError'
  | 'FormatFieldError'
  | 'StringError'
  | 'IntegerError'
  | 'RepeatError'
  | 'IndexFieldError'
  | 'CheckError'
  | 'NamedTupleError'
  | 'RawCopyError'
  | 'MissingFieldError'
  | 'SizeofError'
  | 'SwitchError'
  | 'SelectError'
  | 'CollisionError'
  | 'ArgumentError'
  | 'MappingError';

/**
 * Base class of every engine failure. Carries the kind, the path of the
 * frame that raised it and a human-readable detail. Never mutated after
 * construction.
 */
export class ConstructError extends Error {
  readonly kind: ErrorKind;
  readonly path: Path | undefined;
  readonly detail: string;

  constructor(kind: ErrorKind, detail: string, path?: Path, options?: { cause?: unknown }) {
    super(path ? `${detail}\n${path.toString()}` : detail, options);
    this.name = kind;
    this.kind = kind;
    this.detail = detail;
    this.path = path;
  }
}

/** Stream returned fewer bytes than requested, or lacks a required capability. */
export class StreamError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('StreamError', detail, path, options);
  }
}

/** A fixed-format field could not encode or decode a value. */
export class FormatFieldError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('FormatFieldError', detail, path, options);
  }
}

/** Bytes were given where text was expected, or the reverse. */
export class StringError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('StringError', detail, path, options);
  }
}

/** Integral value out of range for its width or signedness. */
export class IntegerError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('IntegerError', detail, path, options);
  }
}

/** Repetition constraint violated. */
export class RepeatError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('RepeatError', detail, path, options);
  }
}

/**
 * A repetition element failed with a non-engine exception, or an index was
 * requested outside of any repetition.
 */
export class IndexFieldError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('IndexFieldError', detail, path, options);
  }
}

/** A declared check or validation predicate returned false. */
export class CheckError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('CheckError', detail, path, options);
  }
}

export class NamedTupleError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('NamedTupleError', detail, path, options);
  }
}

export class RawCopyError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('RawCopyError', detail, path, options);
  }
}

/** A required named entry is missing from a built value or from context. */
export class MissingFieldError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('MissingFieldError', detail, path, options);
  }
}

/** Size depends on data that is not known. */
export class SizeofError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('SizeofError', detail, path, options);
  }
}

/** No case matched the selector and no default was given. */
export class SwitchError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('SwitchError', detail, path, options);
  }
}

export class SelectError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('SelectError', detail, path, options);
  }
}

/** An embedded child exposed a key the parent already holds. */
export class CollisionError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('CollisionError', detail, path, options);
  }
}

/** A parameter evaluated outside its domain (negative count, bad argument). */
export class ArgumentError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('ArgumentError', detail, path, options);
  }
}

export class MappingError extends ConstructError {
  constructor(detail: string, path?: Path, options?: { cause?: unknown }) {
    super('MappingError', detail, path, options);
  }
}

export function isConstructError(err: unknown): err is ConstructError {
  return err instanceof ConstructError;
}

/** Message of an arbitrary thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
