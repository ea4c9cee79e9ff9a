/* eslint-disable no-console */
/**
 * CLI logging with colors. Color is off under NO_COLOR or when stdout is not
 * a terminal; `debug` prints only when DEBUG is set.
 */

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
  log(message: string): void;
  newline(): void;
  section(title: string): void;
  progress(current: number, total: number, item: string): void;
}

export interface LoggerOptions {
  color?: boolean;
  debug?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const color = options.color ?? (!process.env.NO_COLOR && process.stdout.isTTY !== false);
  const debugEnabled = options.debug ?? Boolean(process.env.DEBUG);
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  const paint = (code: string, text: string): string => (color ? `\x1b[${code}m${text}\x1b[0m` : text);

  return {
    info: (message) => out(paint('34', `ℹ ${message}`)),
    success: (message) => out(paint('32', `✓ ${message}`)),
    error: (message) => err(paint('31', `✗ ${message}`)),
    warn: (message) => err(paint('33', `⚠ ${message}`)),
    debug: (message) => {
      if (debugEnabled) out(paint('2', `🔍 ${message}`));
    },
    log: (message) => out(message),
    newline: () => out(''),
    section: (title) => {
      out('');
      out(paint('1', `━━━ ${title} ━━━`));
    },
    progress: (current, total, item) => out(`[${current}/${total}] ${item}`),
  };
}

export const logger: Logger = createLogger();
