import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';

describe('logger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.LOG_LEVEL;
    delete process.env.SKILLPORT_LOG_LEVEL;
    vi.resetModules();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('defaults to warn so command output stays clean', async () => {
    const { logger } = await import('../../../src/utils/logger.js');
    expect(logger.level).toBe('warn');
  });

  it('respects LOG_LEVEL env var', async () => {
    process.env.LOG_LEVEL = 'debug';
    const { logger } = await import('../../../src/utils/logger.js');
    expect(logger.level).toBe('debug');
  });

  it('respects SKILLPORT_LOG_LEVEL env var', async () => {
    process.env.SKILLPORT_LOG_LEVEL = 'info';
    const { logger } = await import('../../../src/utils/logger.js');
    expect(logger.level).toBe('info');
  });

  it('prefers LOG_LEVEL over SKILLPORT_LOG_LEVEL', async () => {
    process.env.LOG_LEVEL = 'error';
    process.env.SKILLPORT_LOG_LEVEL = 'debug';
    const { logger } = await import('../../../src/utils/logger.js');
    expect(logger.level).toBe('error');
  });

  it('creates child loggers bound to a module name', async () => {
    const { createModuleLogger } = await import('../../../src/utils/logger.js');
    const child = createModuleLogger('installer');
    expect(child.bindings()).toEqual({ module: 'installer' });
  });

  it('redacts sensitive fields', async () => {
    const { REDACT_PATHS } = await import('../../../src/utils/logger.js');
    const chunks: string[] = [];
    const dest = {
      write(chunk: string) {
        chunks.push(chunk);
      },
    };
    const testLogger = pino({ level: 'info', redact: { paths: REDACT_PATHS, censor: '[REDACTED]' } }, dest);

    testLogger.info({ request: { token: 'test-secret' } }, 'fetching');

    const line = JSON.parse(chunks.join(''));
    expect(line.request.token).toBe('[REDACTED]');
  });
});
