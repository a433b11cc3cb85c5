export * from './keyed-archive';
export { LogLevel, buildLeveledLogger, noopLogger, type ILogger, type ILogConfig } from './shared/logger';
export { AssertError } from './assert';
