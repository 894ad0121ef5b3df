import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from '../../src/core/logging/index.js';
import { CapturingLoggerFactory } from '../helpers/capturing-logger.js';

describe('logging', () => {
  it('binds the component to child loggers', () => {
    const loggers = new CapturingLoggerFactory();
    loggers.create('RunLifecycle').info({ studyRunId: 3 }, 'Study run finished');
    expect(loggers.logs).toEqual([
      expect.objectContaining({
        level: 'info',
        msg: 'Study run finished',
        fields: expect.objectContaining({ component: 'RunLifecycle', studyRunId: 3 }),
      }),
    ]);
  });

  it('masks cookies and credentials', () => {
    const loggers = new CapturingLoggerFactory();
    loggers.root.warn(
      { cookie: 'STUDY_RUN_IDS_0=studyResultId=1', req: { headers: { cookie: 'a=b', authorization: 'test-secret' } } },
      'Suspicious request'
    );
    expect(loggers.logs[0]?.fields).toMatchObject({
      cookie: '[REDACTED]',
      req: { headers: { cookie: '[REDACTED]', authorization: '[REDACTED]' } },
    });
  });

  it('resolves log levels case-insensitively with info as fallback', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
    expect(resolveLogLevel('chatty')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});
