import { describe, it, expect } from 'vitest';
import { Logger } from '../core/Logger';

describe('Logger', () => {
  it('logs to the console only when no directory is given', () => {
    const logger = new Logger({ level: 'debug', silent: true });
    const winstonLogger = logger.getWinstonLogger();

    expect(winstonLogger.level).toBe('debug');
    expect(winstonLogger.transports).toHaveLength(1);
  });
});
