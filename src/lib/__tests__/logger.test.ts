import { describe, it, expect } from 'vitest';
import logger, { createLogger, createRequestLogger } from '@/lib/logger';

describe('logger', () => {
  it('is silent under test', () => {
    expect(logger.level).toBe('silent');
  });

  it('createLogger binds the module name', () => {
    const log = createLogger('ticket-fetcher');
    expect(log.bindings()).toMatchObject({ module: 'ticket-fetcher' });
  });

  it('createRequestLogger binds module and request id', () => {
    const log = createRequestLogger('api:comments', 'req-abc-123');
    expect(log.bindings()).toMatchObject({ module: 'api:comments', requestId: 'req-abc-123' });
  });

  it('child loggers are distinct instances', () => {
    expect(createLogger('module-a')).not.toBe(createLogger('module-b'));
  });
});
