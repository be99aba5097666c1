import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';

import { type ImpConfig, ImpConfigError, loadConfig } from '../config.js';
import { type ParamCheckPolicy } from '../imp/actions.js';
import { compile } from '../imp/compile.js';
import { ImpSyntaxError } from '../imp/parser.js';
import {
  type Logger,
  createLogger,
  formatDiagnosticSummary,
  formatErrorWithColors,
  formatSemanticDiagnostic,
} from '../utils/index.js';

type Command = 'build' | 'check';

const VALUE_FLAGS = new Set(['--out', '--out-dir', '--config', '--indent', '--param-check']);

export interface CliArgs {
  command?: string;
  files: string[];
  args: Map<string, string | boolean>;
}

export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  const files: string[] = [];
  const args = new Map<string, string | boolean>();
  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    if (!a.startsWith('--')) {
      files.push(a);
      continue;
    }
    const next = rest[i + 1];
    if (VALUE_FLAGS.has(a) && next !== undefined && !next.startsWith('--')) {
      args.set(a, next);
      i++;
    } else {
      args.set(a, true);
    }
  }
  return { command, files, args };
}

function stringFlag(args: Map<string, string | boolean>, key: string): string | undefined {
  const value = args.get(key);
  return typeof value === 'string' ? value : undefined;
}

function parseIndent(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 1) {
    throw new Error(`--indent expects a positive integer, got "${value}"`);
  }
  return indent;
}

function parseParamCheck(value: string | undefined): ParamCheckPolicy | undefined {
  if (value === undefined) return undefined;
  if (value === 'all' || value === 'first') return value;
  throw new Error(`--param-check expects "all" or "first", got "${value}"`);
}

async function expandEntries(entries: string[], cwd: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of entries) {
    if (fg.isDynamicPattern(entry)) {
      const globbed = await fg(entry, { cwd, onlyFiles: true, unique: true, dot: false });
      files.push(...globbed.sort().map((file) => path.resolve(cwd, file)));
    } else {
      files.push(path.resolve(cwd, entry));
    }
  }
  return Array.from(new Set(files));
}

function resolveOutPath(sourcePath: string, outArg: string | undefined, outDir: string | undefined, cwd: string) {
  if (outArg) return path.resolve(cwd, outArg);
  if (outDir) return path.resolve(cwd, outDir, path.basename(sourcePath));
  return null;
}

interface FileOptions {
  command: Command;
  config: ImpConfig;
  color: boolean;
  outPath: string | null;
  log: Logger;
  cwd: string;
}

async function processFile(sourcePath: string, options: FileOptions): Promise<boolean> {
  const { log, color, config } = options;
  const display = path.relative(options.cwd, sourcePath) || sourcePath;
  if (options.command === 'build' && options.outPath === sourcePath) {
    log.error(`Refusing to overwrite ${display} with its own output`);
    return false;
  }
  log.debug(`Reading ${display}`);
  const source = await fs.readFile(sourcePath, 'utf-8');

  let result: ReturnType<typeof compile>;
  try {
    result = compile(source, {
      indent: config.indent,
      paramCheck: config.paramCheck,
      fileName: display,
    });
  } catch (err) {
    if (err instanceof ImpSyntaxError) {
      log.error(`Syntax error in ${display}`);
      log.raw(formatErrorWithColors(err.details, color), 'err');
      return false;
    }
    throw err;
  }

  if (!result.ok) {
    const shown = result.diagnostics.slice(0, config.maxDiagnostics);
    for (const diagnostic of shown) {
      log.raw(formatSemanticDiagnostic(diagnostic, source, color), 'err');
    }
    const hidden = result.diagnostics.length - shown.length;
    if (hidden > 0) log.warn(`${hidden} more diagnostic(s) not shown (maxDiagnostics: ${config.maxDiagnostics})`);
    log.raw(formatDiagnosticSummary(result.diagnostics.length, display, color), 'err');
    return false;
  }

  if (options.command === 'check') {
    log.success(`${display}: no semantic errors`);
    return true;
  }

  if (options.outPath) {
    await fs.mkdir(path.dirname(options.outPath), { recursive: true });
    await fs.writeFile(options.outPath, `${result.code}\n`, 'utf-8');
    log.build(`${display} → ${path.relative(options.cwd, options.outPath) || options.outPath}`);
  } else {
    log.raw(result.code);
  }
  return true;
}

export function helpText(): string {
  return `
impc <command> <files|globs...> [options]

Commands:
  build <files>    Check and render the typed program
  check <files>    Check only (no output)

Options:
  --out <file>            Output file (single input only)
  --out-dir <dir>         Output directory (default: stdout)
  --config <path>         Config file (default: impc.config.json)
  --indent <n>            Spaces per nesting level (default: 2)
  --param-check <policy>  "all" reports every bad argument, "first" stops at the first
  --no-color              Disable colored output
  --verbose               Print debug output
  --help                  Show this help

Config file:
  impc.config.json supports indent, paramCheck, color, maxDiagnostics, entries, outDir
`;
}

export interface RunOptions {
  cwd?: string;
  log?: Logger;
  isTTY?: boolean;
}

/** Runs the CLI and resolves to the process exit code. */
export async function runImpc(argv: string[], options: RunOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const { command, files, args } = parseArgs(argv);
  const verbose = args.get('--verbose') === true;

  if (!command || command === '--help' || command === '-h' || args.has('--help')) {
    (options.log ?? createLogger()).raw(helpText());
    return 0;
  }

  let config: ImpConfig;
  try {
    config = loadConfig(cwd, stringFlag(args, '--config'));
  } catch (err) {
    if (!(err instanceof ImpConfigError)) throw err;
    (options.log ?? createLogger({ color: false })).error(err.message);
    return 1;
  }

  const color = args.has('--no-color') ? false : config.color ?? options.isTTY ?? process.stdout.isTTY === true;
  const log = options.log ?? createLogger({ color, verbose });

  if (command !== 'build' && command !== 'check') {
    log.error(`Unknown command "${command}"`);
    log.raw(helpText());
    return 1;
  }

  try {
    config = {
      ...config,
      indent: parseIndent(stringFlag(args, '--indent')) ?? config.indent,
      paramCheck: parseParamCheck(stringFlag(args, '--param-check')) ?? config.paramCheck,
    };
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  const sources = await expandEntries(files.length > 0 ? files : config.entries ?? [], cwd);
  if (sources.length === 0) {
    log.error(`Missing <files> for ${command}`);
    return 1;
  }

  const outArg = stringFlag(args, '--out');
  if (outArg && sources.length > 1) {
    log.error('--out takes a single input; use --out-dir for several');
    return 1;
  }
  const outDir = stringFlag(args, '--out-dir') ?? config.outDir;

  let ok = true;
  for (const sourcePath of sources) {
    try {
      const fileOk = await processFile(sourcePath, {
        command,
        config,
        color,
        outPath: resolveOutPath(sourcePath, outArg, outDir, cwd),
        log,
        cwd,
      });
      ok = ok && fileOk;
    } catch (err) {
      log.error(`Failed to process ${sourcePath}: ${err instanceof Error ? err.message : String(err)}`);
      ok = false;
    }
  }
  return ok ? 0 : 1;
}
