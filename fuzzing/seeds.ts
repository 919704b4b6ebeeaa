/**
 * Seed corpus of valid schema notation modules for mutation-based fuzzing.
 * Each seed exercises a different grammar feature.
 */

/** Minimal valid module. */
export const SEED_MINIMAL = `
Byte = u8
`;

/** All primitive types. */
export const SEED_PRIMITIVES = `
Small = u8
Signed = s8
Wide = u32be
Little = s16le
Huge = u64le
Real = f64be
Count = varint
Bit = flag
Rest = greedybytes
Text = greedystring
Zero = cstring
Nothing = pass
End = terminated
`;

/** Structs with optional and default fields. */
export const SEED_STRUCT = `
Person = {
  age: u8,
  height: u16be = 170,
  nickname?: cstring("utf8")
}
`;

/** Length fields and rebuilt counts. */
export const SEED_LENGTHS = `
Packet = {
  length: rebuild(u32be, len(data)),
  data: bytes(length)
}
`;

/** Arrays driven by expressions. */
export const SEED_ARRAYS = `
Matrix = {
  rows: u8,
  cols: u8,
  cells: array(rows * cols, u16le),
  tail: greedy(u8)
}
`;

/** Switches and conditionals. */
export const SEED_SWITCH = `
Message = {
  kind: u8,
  body: switch(kind) {
    1: u32be,
    2: cstring,
    0x10: { x: s16be, y: s16be },
    default: pass
  },
  extra: if (kind > 1 && kind != 16) u8 else pass
}
`;

/** Embedded switch merging keys into the parent. */
export const SEED_EMBED = `
Header = { version: u8, flags: u8 }

Frame = {
  embed Header,
  op: enum(u8) { read = 1, write = 2 },
  embed embedswitch(op) {
    "read": { address: u16be },
    "write": { address: u16be, value: u8 }
  }
}
`;

/** Type references. */
export const SEED_TYPE_REFS = `
Name = pascalstring(u8, "utf8")
Age = u8
Person = { name: Name, age: Age }
People = prefixedArray(u16be, Person)
`;

/** Recursive type (produces $ref). */
export const SEED_RECURSIVE = `
Tree = {
  value: u16be,
  children: prefixedArray(u8, Tree)
}
`;

/** Constants, padding and computed values. */
export const SEED_SPECIAL = `
Magic = {
  signature: const [0x89, 0x50, 0x4e, 0x47],
  version: const(1, u8),
  reserved: padding(3),
  doubled: computed(version * 2),
  label: string(8, "ascii")
}
`;

/** Comments. */
export const SEED_COMMENTS = `
# A byte
Byte = u8 // trailing comment
// Another comment
Word = u16be;
`;

/** Complex nested structure. */
export const SEED_COMPLEX = `
Header = {
  version: u8,
  flags: u8,
  timestamp: u32be
}

Extension = {
  id: u8,
  value: prefixed(u8, greedybytes)
}

Payload = switch(header.version) {
  1: pascalstring(u16be, "utf8"),
  2: { kind: enum(u8) { request = 0, response = 1 }, data: prefixed(u16be, greedybytes) },
  default: greedybytes
}

Message = {
  header: Header,
  count: u8,
  extensions: array(count, Extension),
  checksum?: u32le
}
`;

/** All seeds as an array for iteration. */
export const ALL_SEEDS: string[] = [
  SEED_MINIMAL,
  SEED_PRIMITIVES,
  SEED_STRUCT,
  SEED_LENGTHS,
  SEED_ARRAYS,
  SEED_SWITCH,
  SEED_EMBED,
  SEED_TYPE_REFS,
  SEED_RECURSIVE,
  SEED_SPECIAL,
  SEED_COMMENTS,
  SEED_COMPLEX,
];
