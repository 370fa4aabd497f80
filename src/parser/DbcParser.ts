import peggy from 'peggy';
import { DbcParseError } from '../errors';
import type { SourceLocation } from '../errors';
import { DBC_GRAMMAR } from './grammar';
import type { DbcFile } from './types';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(DBC_GRAMMAR);
  }
  return cachedParser;
}

/**
 * Parse DBC text into an AST.
 *
 * @param input - DBC file contents
 * @throws DbcParseError with the line and column of the first syntax error
 */
export function parseDbc(input: string): DbcFile {
  const parser = getParser();
  try {
    return parser.parse(input);
  } catch (e) {
    const location = syntaxLocation(e);
    if (location && e instanceof Error) {
      throw new DbcParseError(e.message, location);
    }
    throw e;
  }
}

function syntaxLocation(error: unknown): SourceLocation | undefined {
  if (typeof error !== 'object' || error === null || !('location' in error)) return undefined;
  const { location } = error;
  if (typeof location !== 'object' || location === null || !('start' in location)) return undefined;
  const { start } = location;
  if (typeof start !== 'object' || start === null || !('line' in start) || !('column' in start)) return undefined;
  const { line, column } = start;
  return typeof line === 'number' && typeof column === 'number' ? { line, column } : undefined;
}
