import { describe, expect, it, vi } from 'vitest';
import { buildLeveledLogger, LogLevel, type ILogger } from './logger';

function spyLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    group: vi.fn(),
    groupEnd: vi.fn(),
  };
}

describe('buildLeveledLogger', () => {
  it('drops lines below the configured level', () => {
    const logger = spyLogger();
    const leveled = buildLeveledLogger({ logger, level: LogLevel.warn });

    leveled.debug('DBG: %s', 'hidden');
    leveled.info('hidden');
    leveled.warn('WARN: %s', 'shown');
    leveled.error('shown');

    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('WARN: %s', 'shown');
    expect(logger.error).toHaveBeenCalledWith('shown');
  });

  it('only groups at debug level', () => {
    const quiet = spyLogger();
    buildLeveledLogger({ logger: quiet, level: LogLevel.info }).group('root %s', 'root');
    expect(quiet.group).not.toHaveBeenCalled();

    const verbose = spyLogger();
    const leveled = buildLeveledLogger({ logger: verbose, level: LogLevel.debug });
    leveled.group('root %s', 'root');
    leveled.groupEnd();
    expect(verbose.group).toHaveBeenCalledWith('root %s', 'root');
    expect(verbose.groupEnd).toHaveBeenCalledOnce();
  });

  it('stays silent when asked to', () => {
    const logger = spyLogger();
    buildLeveledLogger({ logger, level: LogLevel.silent }).error('nothing');

    expect(logger.error).not.toHaveBeenCalled();
  });
});
