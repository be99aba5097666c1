import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { type ParamCheckPolicy } from './imp/actions.js';
import { isRecord } from './parser/index.js';

export const CONFIG_FILE_NAME = 'impc.config.json';

export type ImpConfig = {
  indent: number;
  paramCheck: ParamCheckPolicy;
  color?: boolean;
  maxDiagnostics: number;
  entries?: string[];
  outDir?: string;
};

export const defaultConfig: ImpConfig = {
  indent: 2,
  paramCheck: 'all',
  maxDiagnostics: 100,
};

export class ImpConfigError extends Error {
  readonly problems: string[];

  constructor(configPath: string, problems: string[]) {
    super(`Invalid ${configPath}:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ImpConfigError';
    this.problems = problems;
  }
}

/**
 * Reads `impc.config.json` from `cwd` (or an explicit path). A missing file
 * yields the defaults.
 */
export function loadConfig(cwd = process.cwd(), explicitPath?: string): ImpConfig {
  const configPath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    if (explicitPath) throw new ImpConfigError(configPath, ['file not found']);
    return { ...defaultConfig };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ImpConfigError(configPath, [`not valid JSON (${err instanceof Error ? err.message : String(err)})`]);
  }
  return validateConfig(raw, configPath);
}

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;

export function validateConfig(raw: unknown, configPath = CONFIG_FILE_NAME): ImpConfig {
  if (!isRecord(raw) || Array.isArray(raw)) {
    throw new ImpConfigError(configPath, ['config must be a JSON object']);
  }

  const errors: string[] = [];
  const normalized: ImpConfig = { ...defaultConfig };

  const { indent, paramCheck, color, maxDiagnostics, outDir } = raw;

  if (indent !== undefined) {
    if (isPositiveInteger(indent)) normalized.indent = indent;
    else errors.push('indent must be a positive integer');
  }
  if (paramCheck !== undefined) {
    if (paramCheck === 'all' || paramCheck === 'first') normalized.paramCheck = paramCheck;
    else errors.push('paramCheck must be "all" or "first"');
  }
  if (color !== undefined) {
    if (typeof color === 'boolean') normalized.color = color;
    else errors.push('color must be a boolean');
  }
  if (maxDiagnostics !== undefined) {
    if (isPositiveInteger(maxDiagnostics)) normalized.maxDiagnostics = maxDiagnostics;
    else errors.push('maxDiagnostics must be a positive integer');
  }
  if (outDir !== undefined) {
    if (typeof outDir === 'string') normalized.outDir = outDir;
    else errors.push('outDir must be a string');
  }

  const normalizeList = (value: unknown, key: string): string[] | undefined => {
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    if (typeof value === 'string') return [value];
    errors.push(`${key} must be a string or string[]`);
    return undefined;
  };

  const entries = normalizeList(raw.entries, 'entries');
  if (entries) normalized.entries = entries;

  if (errors.length > 0) {
    throw new ImpConfigError(configPath, errors);
  }

  return normalized;
}
