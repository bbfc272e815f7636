export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

class Logger {
  private threshold: LogLevel = 'warn';

  setLevel(level: LogLevel) {
    this.threshold = level;
  }

  get level(): LogLevel {
    return this.threshold;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return RANK[level] >= RANK[this.threshold];
  }

  debug(message: string) {
    this.write('debug', message);
  }

  info(message: string) {
    this.write('info', message);
  }

  warn(message: string) {
    this.write('warn', message);
  }

  error(message: string) {
    this.write('error', message);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string) {
    if (!this.isEnabled(level)) return;
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }
}

export const logger = new Logger();

/** -q wins over -v; -v is info, -vv and above is debug. */
export function levelFromVerbosity(verbosity: number, quiet: boolean, fallback: LogLevel = 'warn'): LogLevel {
  if (quiet) return 'silent';
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'info';
  return fallback;
}
