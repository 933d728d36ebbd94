/**
 * Levelled console logger. Writes to stderr so that command output on stdout
 * stays machine-readable.
 */
import chalk from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export type LogWriter = (line: string) => void;

export class Logger {
  constructor(
    private level: LogLevel = 'warn',
    private readonly write: LogWriter = (line: string): void => {
      console.error(line);
    }
  ) {}

  get currentLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[this.level];
  }

  error(message: string, err?: unknown): void {
    if (!this.isEnabled('error')) return;
    const detail = err === undefined ? '' : ` ${err instanceof Error ? err.message : String(err)}`;
    this.write(`${chalk.red('[error]')} ${message}${detail}`);
  }

  warn(message: string): void {
    if (!this.isEnabled('warn')) return;
    this.write(`${chalk.yellow('[warn]')} ${message}`);
  }

  info(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write(`${chalk.cyan('[info]')} ${message}`);
  }

  debug(message: string): void {
    if (!this.isEnabled('debug')) return;
    this.write(`${chalk.gray('[debug]')} ${message}`);
  }
}

/** Process-wide logger used by the decoders and the resolver. */
export const logger = new Logger();
