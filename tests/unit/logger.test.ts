import { childLogger, logger, loggerOptions, SERVICE_NAME } from '../../src/observability/logger';

describe('loggerOptions', () => {
  it('should write through pino/file to stdout in development', () => {
    const options = loggerOptions({ level: 'debug', nodeEnv: 'development' });
    expect(options.level).toBe('debug');
    expect(options.transport).toEqual({ target: 'pino/file', options: { destination: 1 } });
  });

  it('should write plain JSON lines elsewhere', () => {
    expect(loggerOptions({ level: 'info', nodeEnv: 'production' }).transport).toBeUndefined();
    expect(loggerOptions({ level: 'info', nodeEnv: 'test' }).transport).toBeUndefined();
  });

  it('should tag lines with the service name and a textual level', () => {
    const options = loggerOptions({ level: 'info', nodeEnv: 'production' });
    expect(options.base).toEqual({ service: 'ticket-allocator' });
    expect(options.formatters?.level?.('warn', 40)).toEqual({ level: 'warn' });
  });
});

describe('childLogger', () => {
  it('should bind the run id and extra fields', () => {
    const log = childLogger('run-1', { source: 'cli' });
    expect(log.bindings()).toEqual({ service: SERVICE_NAME, runId: 'run-1', source: 'cli' });
  });

  it('should take its level from the environment', () => {
    expect(logger.level).toBe('silent');
    expect(childLogger('run-2').level).toBe('silent');
  });
});
