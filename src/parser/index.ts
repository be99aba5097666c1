import { type CompiledGrammar, type GrammarParseOptions } from '../grammar/index.js';
import { type Location } from '../utils/index.js';
import { highlightSnippet } from '../utils/highlight.js';

export interface ParseResult<T> {
  result: T;
  success: true;
}

export interface ParseError {
  success: false;
  error: string;
  location?: Location;
  expected?: string[];
  found?: string | null;
  stack?: string;
  input?: string;
  snippet?: string;
}

export function parseInput<T>(
  grammar: CompiledGrammar<T>,
  input: string,
  options: GrammarParseOptions = {}
): ParseResult<T> | ParseError {
  try {
    return { result: grammar.parse(input, options), success: true };
  } catch (error: unknown) {
    return createParseError(error, input);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isLocation(value: unknown): value is Location {
  if (!isRecord(value) || !isRecord(value.start) || !isRecord(value.end)) return false;
  return [value.start, value.end].every(
    pos => typeof pos.line === 'number' && typeof pos.column === 'number' && typeof pos.offset === 'number'
  );
}

function describeExpectation(expectation: unknown): string | null {
  if (!isRecord(expectation)) return null;
  if (typeof expectation.description === 'string') return expectation.description;
  if (typeof expectation.text === 'string') return `"${expectation.text}"`;
  if (typeof expectation.type === 'string') return expectation.type;
  return null;
}

function createParseError(error: unknown, input: string): ParseError {
  const parseError: ParseError = {
    success: false,
    error: error instanceof Error ? error.message : String(error),
    input,
  };
  if (!isRecord(error)) return parseError;

  if (isLocation(error.location)) {
    parseError.location = error.location;
    parseError.snippet = highlightSnippet(input, error.location, false);
  }

  if (Array.isArray(error.expected)) {
    const expected = error.expected
      .map(describeExpectation)
      .filter((item): item is string => item !== null);
    parseError.expected = Array.from(new Set(expected));
  }

  parseError.found = typeof error.found === 'string' ? error.found : null;
  parseError.stack = typeof error.stack === 'string' ? error.stack : undefined;
  return parseError;
}
