/**
 * Logger interface that implements all log levels.
 * Use the {@link LogLevel} when configuring to change which level to output.
 *
 * All methods should be pre-bound to the logger so they can be called from the level-filtered object.
 * The global `console` satisfies this interface.
 */
export interface ILogger {
  debug(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;

  group(...label: unknown[]): void;
  groupEnd(): void;
}

export enum LogLevel {
  debug = 0,
  info = 1,
  warn = 2,
  error = 3,
  silent = 4,
}

export interface ILogConfig {
  readonly logger: ILogger;
  readonly level: LogLevel;
}

function noopLog() {}

export const noopLogger: ILogger = {
  debug: noopLog,
  info: noopLog,
  warn: noopLog,
  error: noopLog,
  group: noopLog,
  groupEnd: noopLog,
};

export const defaultLogConfig: ILogConfig = {
  logger: console,
  level: LogLevel.warn,
};

export function buildLeveledLogger({ level, logger }: ILogConfig): ILogger {
  if (level >= LogLevel.silent) {
    return noopLogger;
  }

  // groups wrap debug lines only
  const grouped = level <= LogLevel.debug;
  return {
    debug: level <= LogLevel.debug ? logger.debug : noopLog,
    info: level <= LogLevel.info ? logger.info : noopLog,
    warn: level <= LogLevel.warn ? logger.warn : noopLog,
    error: level <= LogLevel.error ? logger.error : noopLog,
    group: grouped ? logger.group : noopLog,
    groupEnd: grouped ? logger.groupEnd : noopLog,
  };
}
