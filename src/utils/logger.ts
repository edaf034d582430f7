import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.dim('debug'),
  info: chalk.blue('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

export class Logger {
  private _level?: LogLevel;

  constructor(private readonly write: (line: string) => void = line => process.stderr.write(line + '\n')) {}

  get level(): LogLevel {
    if (this._level === undefined) {
      const fromEnv = process.env.ROFFDOC_LOG_LEVEL;
      this._level = isLogLevel(fromEnv) ? fromEnv : 'warn';
    }
    return this._level;
  }

  setLevel(level: LogLevel): void {
    this._level = level;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const metaStr = meta ? ' ' + chalk.dim(JSON.stringify(meta)) : '';
    this.write(`${LABELS[level]} ${message}${metaStr}`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.emit('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.emit('error', message, meta);
  }
}

export const logger: Logger = new Logger();
