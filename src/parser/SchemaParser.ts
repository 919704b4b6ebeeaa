import peggy from 'peggy';
import { ArgumentError } from '../errors';
import { SCHEMA_GRAMMAR } from './grammar';
import type { SchemaModuleAst } from './types';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(SCHEMA_GRAMMAR);
  }
  return cachedParser;
}

/**
 * Parse schema notation text into an AST.
 *
 * @param input - notation text (e.g. contents of a .schema file)
 * @throws ArgumentError, with line and column, if the text is not valid notation
 */
export function parseSchemaModule(input: string): SchemaModuleAst {
  const parser = getParser();
  try {
    return parser.parse(input) as SchemaModuleAst;
  } catch (err) {
    if (err instanceof parser.SyntaxError) {
      const { line, column } = err.location.start;
      throw new ArgumentError(`schema notation, line ${line} column ${column}: ${err.message}`, undefined, { cause: err });
    }
    throw err;
  }
}
