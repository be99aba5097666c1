import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { generate, type ParserBuildOptions } from 'peggy';
import { formatAnyError, formatCompilationError } from '../utils/index.js';
import { type Location } from '../utils/index.js';

export type GrammarParseOptions = {
  grammarSource?: string;
  startRule?: string;
};

export interface CompiledGrammar<ASTNode = unknown> {
  parse: (input: string, options?: GrammarParseOptions) => ASTNode;
  source: string;
  options: CompileOptions;
}

export interface CompileOptions {
  allowedStartRules?: string[];
  cache?: boolean;
  grammarSource?: string;
  trace?: boolean;
}

interface GrammarErrorShape {
  message: string;
  location: Location;
}

function isGrammarError(error: unknown): error is GrammarErrorShape {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'location' in error &&
    typeof error.location === 'object' &&
    error.location !== null
  );
}

export function compileGrammar<ASTNode = unknown>(
  grammar: string,
  options: CompileOptions = {}
): CompiledGrammar<ASTNode> {
  try {
    const defaultOptions: CompileOptions = {
      allowedStartRules: ['Program'],
      cache: false,
      trace: false,
      ...options,
    };

    const buildOptions: ParserBuildOptions = {
      allowedStartRules: defaultOptions.allowedStartRules,
      cache: defaultOptions.cache,
      grammarSource: defaultOptions.grammarSource,
      trace: defaultOptions.trace,
      output: 'parser',
    };
    const parser = generate(grammar, buildOptions);
    return {
      parse: (input: string, parseOptions?: GrammarParseOptions): ASTNode => parser.parse(input, parseOptions),
      source: grammar,
      options: defaultOptions,
    };
  } catch (error: unknown) {
    const formattedError = isGrammarError(error)
      ? formatCompilationError(error.message, error.location, grammar)
      : formatAnyError(error);
    throw new Error(`Grammar compilation failed:\n${formattedError}`);
  }
}

// Sources sit beside this module; built output looks back into src/.
const GRAMMAR_CANDIDATES = [
  path.resolve(__dirname, 'imp.peg'),
  path.resolve(__dirname, '../../src/grammar/imp.peg'),
];

export function resolveGrammarPath(candidates: string[] = GRAMMAR_CANDIDATES): string {
  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }
  throw new Error(`Imp grammar not found. Looked in:\n  ${candidates.join('\n  ')}`);
}

let cachedGrammar: CompiledGrammar | null = null;

export function loadImpGrammar(): CompiledGrammar {
  if (!cachedGrammar) {
    const grammarPath = resolveGrammarPath();
    cachedGrammar = compileGrammar(readFileSync(grammarPath, 'utf-8'), { grammarSource: grammarPath });
  }
  return cachedGrammar;
}
