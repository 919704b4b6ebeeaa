import type { Construct } from '../../src/constructs/Construct';

/** Build a value the construct's static type would not admit. */
export function buildUntyped(construct: Construct, value: unknown): Uint8Array {
  return construct.build(value);
}
