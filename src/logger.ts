import { config } from './config';

// ANSI colors for console output
const colors = {
  reset: '\x1b[0m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Scoped console logger with a level threshold
 */
export class Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = config.logging.level
  ) {}

  private timestamp(): string {
    return new Date().toISOString().split('T')[1].slice(0, 12);
  }

  private enabled(level: LogLevel): boolean {
    return severity[level] >= severity[this.level];
  }

  private prefix(color: string): string {
    return `${colors.gray}[${this.timestamp()}]${colors.reset} ${color}${this.scope}${colors.reset}`;
  }

  debug(msg: string): void {
    if (!this.enabled('debug')) return;
    console.log(`${this.prefix(colors.cyan)} ${colors.gray}${msg}${colors.reset}`);
  }

  info(msg: string): void {
    if (!this.enabled('info')) return;
    console.log(`${this.prefix(colors.green)} ${msg}`);
  }

  warn(msg: string, error?: unknown): void {
    if (!this.enabled('warn')) return;
    console.warn(`${this.prefix(colors.yellow)} ${msg}${formatError(error)}`);
  }

  error(msg: string, error?: unknown): void {
    if (!this.enabled('error')) return;
    console.error(`${this.prefix(colors.red)} ${msg}${formatError(error)}`);
  }

  /**
   * Log an HTTP request line, colored by status class
   */
  request(line: string, status: number, durationMs: number): void {
    const level: LogLevel = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    if (!this.enabled(level)) return;
    const color = status >= 500 ? colors.red : status >= 400 ? colors.yellow : colors.green;
    console.log(
      `${this.prefix(color)} ${line} ${status} ${colors.gray}(${durationMs.toFixed(2)}ms)${colors.reset}`
    );
  }
}

function formatError(error: unknown): string {
  if (error === undefined) return '';
  if (error instanceof Error) {
    const cause = error.cause !== undefined ? ` (cause: ${formatError(error.cause).slice(2)})` : '';
    return `: ${error.message}${cause}`;
  }
  return `: ${String(error)}`;
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
