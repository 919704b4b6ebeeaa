/**
 * Mutation strategies for schema notation.
 *
 * Each strategy targets one construct of the notation (expressions, switch
 * cases, enum members, field markers, byte lists, encodings) so that the
 * mutated module reaches the parser's and converter's error paths rather than
 * failing on the first character.
 */

import { Rng } from './schema-generator';

/** A mutation function that transforms an input string. */
export type Mutator = (input: string, rng: Rng) => string;

/** Replace one random match of `pattern` (which must be global). */
function replaceRandom(
  input: string,
  pattern: RegExp,
  rng: Rng,
  replace: (match: RegExpMatchArray) => string,
): string {
  const matches = [...input.matchAll(pattern)];
  if (matches.length === 0) return input;
  const match = rng.pick(matches);
  const idx = match.index ?? 0;
  return input.slice(0, idx) + replace(match) + input.slice(idx + match[0].length);
}

// -- Expressions --

const OPERATORS = ['+', '-', '*', '/', '%', '==', '!=', '<', '>=', '&&', '||', '!', '', '+ +', '=='];

/** Swap a binary operator for another, a unary one or nothing. */
export function swapOperator(input: string, rng: Rng): string {
  return replaceRandom(input, /==|!=|<=|>=|&&|\|\||[-+*/%<>]/g, rng, () => rng.pick(OPERATORS));
}

const EXPR_PREFIXES = ['len(', '(', '!', '-', '0x', '"', 'len', '_.', '..'];

/** Damage the start of an expression argument. */
export function corruptExpression(input: string, rng: Rng): string {
  return replaceRandom(input, /\b(bytes|array|padding|computed|string|if|switch)\s*\(/g, rng, m => m[0] + rng.pick(EXPR_PREFIXES));
}

/** Replace a length or count with a boundary number. */
export function numberBoundary(input: string, rng: Rng): string {
  const numbers = ['0', '-1', '255', '256', '65536', '4294967296', '0x', '0xffffffffffff', '99999999999999999999'];
  return replaceRandom(input, /-?\b\d+\b/g, rng, () => rng.pick(numbers));
}

// -- Switch and enum bodies --

/** Replace a case key: a second default, an empty key, an unterminated string. */
export function corruptCaseKey(input: string, rng: Rng): string {
  const keys = ['default', '', '"', '0x', 'a b', '-', '1 2'];
  return replaceRandom(input, /(-?\d+|"[^"]*"|default)(\s*:)/g, rng, m => rng.pick(keys) + m[2]);
}

/** Repeat an enum member, which the converter must reject. */
export function duplicateEnumMember(input: string, rng: Rng): string {
  return replaceRandom(input, /\b([a-z_]\w*)\s*=\s*(-?\d+)/g, rng, m => `${m[0]}, ${m[1]} = ${m[2]}`);
}

// -- Struct fields --

/** Add, remove or double the optional marker of a field. */
export function toggleOptional(input: string, rng: Rng): string {
  return replaceRandom(input, /\b([a-z_]\w*)(\??)(\s*):/g, rng, m => {
    const marker = m[2] === '?' ? rng.pick(['', '??', '? ?']) : '?';
    return `${m[1]}${marker}${m[3]}:`;
  });
}

/** Drop an `embed`, or embed a type in a named field. */
export function misplaceEmbed(input: string, rng: Rng): string {
  if (input.includes('embed') && rng.chance(0.5)) {
    return replaceRandom(input, /\bembed\s+/g, rng, () => rng.pick(['', 'embed embed ', 'x: embed ']));
  }
  return replaceRandom(input, /:\s*/g, rng, m => `${m[0]}embed `);
}

/** Inject a field that refers to a name nothing defines. */
export function injectUnknownReference(input: string, rng: Rng): string {
  return replaceRandom(input, /,/g, rng, () => `, ghost: Missing${rng.int(0, 9)},`);
}

// -- Leaves --

/** Put invalid bytes into a constant byte list. */
export function corruptByteList(input: string, rng: Rng): string {
  const contents = ['', '256', '-1', '0x', '1,,2', '0xfff', 'a', '1 2'];
  return replaceRandom(input, /const\s*\[[^\]]*\]/g, rng, () => `const [${rng.pick(contents)}]`);
}

/** Replace a text encoding with an unknown or malformed one. */
export function swapEncoding(input: string, rng: Rng): string {
  const encodings = ['"latin1"', '""', '"UTF8"', '"utf8', 'utf8'];
  return replaceRandom(input, /"(utf8|utf16le|ascii)"/g, rng, () => rng.pick(encodings));
}

/** Replace a primitive with a near miss. */
export function swapPrimitive(input: string, rng: Rng): string {
  const near = ['u24be', 's8le', 'u16', 'f16be', 'u8x', 'U8', 'u64', 'varint8'];
  return replaceRandom(input, /\b([us](8|16|32|64)(be|le)?|f(32|64)(be|le))\b/g, rng, () => rng.pick(near));
}

// -- Module structure --

/** Define a name a second time. */
export function duplicateDefinition(input: string, rng: Rng): string {
  return replaceRandom(input, /^[A-Za-z_]\w*\s*=[^\n]*$/gm, rng, m => `${m[0]}\n${m[0]}`);
}

/** Remove or add a bracket. */
export function unbalanceBrackets(input: string, rng: Rng): string {
  if (rng.chance(0.5)) {
    return replaceRandom(input, /[{}()[\]]/g, rng, () => '');
  }
  const pos = rng.int(0, input.length);
  return input.slice(0, pos) + rng.pick(['{', '}', '(', ')', '[', ']']) + input.slice(pos);
}

/** Truncate the input at a random position. */
export function truncate(input: string, rng: Rng): string {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** All available mutators. */
export const MUTATORS: Mutator[] = [
  swapOperator,
  corruptExpression,
  numberBoundary,
  corruptCaseKey,
  duplicateEnumMember,
  toggleOptional,
  misplaceEmbed,
  injectUnknownReference,
  corruptByteList,
  swapEncoding,
  swapPrimitive,
  duplicateDefinition,
  unbalanceBrackets,
  truncate,
];

/** Apply `count` (default 1 to 3) random mutations. */
export function mutate(input: string, rng: Rng, count?: number): string {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(MUTATORS)(result, rng);
  }
  return result;
}
