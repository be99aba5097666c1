import { createColors } from 'colorette';

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
  build(msg: string): void;
  /** Writes a line as is, e.g. a pre-formatted diagnostic. */
  raw(msg: string, stream?: 'out' | 'err'): void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const colors = createColors({ useColor: options.color ?? true });
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  return {
    info: msg => out(`${colors.blue('ℹ️')}  ${msg}`),
    success: msg => out(`${colors.green('✅')} ${msg}`),
    warn: msg => err(`${colors.yellow('⚠️')}  ${msg}`),
    error: msg => err(`${colors.red('❌')} ${msg}`),
    debug: msg => {
      if (options.verbose) out(colors.dim(`🐛 ${msg}`));
    },
    build: msg => out(`${colors.magenta('🔧')} ${msg}`),
    raw: (msg, stream = 'out') => (stream === 'out' ? out(msg) : err(msg)),
  };
}
