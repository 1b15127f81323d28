export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(scope: string, message: string): void;
  info(scope: string, message: string): void;
  warn(scope: string, message: string): void;
  error(scope: string, message: string): void;
}

/**
 * Leveled logger writing `[LEVEL scope] message` lines to stderr. Stdout is
 * reserved for MCP traffic, so nothing here may ever touch it.
 */
export class StderrLogger implements Logger {
  constructor(
    private level: LogLevel = 'info',
    private readonly write: (line: string) => void = (line) => {
      process.stderr.write(line);
    }
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(scope: string, message: string): void {
    this.log('debug', scope, message);
  }

  info(scope: string, message: string): void {
    this.log('info', scope, message);
  }

  warn(scope: string, message: string): void {
    this.log('warn', scope, message);
  }

  error(scope: string, message: string): void {
    this.log('error', scope, message);
  }

  private log(level: Exclude<LogLevel, 'silent'>, scope: string, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    this.write(`[${level.toUpperCase()} ${scope}] ${message}\n`);
  }
}

export const logger = new StderrLogger();

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
