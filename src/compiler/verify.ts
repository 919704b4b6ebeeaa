import { CheckError, ConstructError } from '../errors';
import { bytesEqual, deepEqual, formatValue } from '../helpers';
import type { Construct } from '../constructs/Construct';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: ConstructError };

function attempt<T>(run: () => T): Outcome<T> {
  try {
    return { ok: true, value: run() };
  } catch (err) {
    if (err instanceof ConstructError) return { ok: false, error: err };
    throw err;
  }
}

function describeOutcome<T>(outcome: Outcome<T>, show: (value: T) => string): string {
  if (outcome.ok) return show(outcome.value);
  return `${outcome.error.kind} at ${outcome.error.path?.toString() ?? '(no path)'}`;
}

function sameOutcome<T>(a: Outcome<T>, b: Outcome<T>, equal: (x: T, y: T) => boolean): boolean {
  if (a.ok && b.ok) return equal(a.value, b.value);
  if (!a.ok && !b.ok) {
    const pathA = a.error.path;
    const pathB = b.error.path;
    const samePath = pathA && pathB ? pathA.equals(pathB) : pathA === pathB;
    return a.error.kind === b.error.kind && samePath;
  }
  return false;
}

/**
 * Run every payload through both trees: parse results (or error kind and
 * path) must agree, and so must the bytes each rebuilds from the parsed value.
 * The static sizes (or sizing errors) are compared last.
 * Raises CheckError describing the first difference.
 */
export function verifyCompiled(source: Construct, compiled: Construct, payloads: readonly Uint8Array[]): void {
  payloads.forEach((payload, i) => {
    const expected = attempt(() => source.parse(payload));
    const actual = attempt(() => compiled.parse(payload));
    if (!sameOutcome(expected, actual, deepEqual)) {
      throw new CheckError(
        `payload ${i}: interpreted parse gave ${describeOutcome(expected, formatValue)}, `
          + `compiled gave ${describeOutcome(actual, formatValue)}`,
      );
    }
    if (!expected.ok) return;
    const rebuilt = attempt(() => source.build(expected.value));
    const recompiled = attempt(() => compiled.build(expected.value));
    if (!sameOutcome(rebuilt, recompiled, bytesEqual)) {
      throw new CheckError(
        `payload ${i}: interpreted build gave ${describeOutcome(rebuilt, formatValue)}, `
          + `compiled gave ${describeOutcome(recompiled, formatValue)}`,
      );
    }
  });
  const size = attempt(() => source.sizeof());
  const compiledSize = attempt(() => compiled.sizeof());
  if (!sameOutcome(size, compiledSize, (a, b) => a === b)) {
    throw new CheckError(
      `interpreted sizeof gave ${describeOutcome(size, String)}, compiled gave ${describeOutcome(compiledSize, String)}`,
    );
  }
}
