import { describe, it, expect } from 'vitest';
import { DEFAULT_COOKIE_MAX_AGE_SECONDS, loadConfig } from '../../src/config/app-config.js';
import { formatAppError } from '../../src/errors/formatter.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'loading config');
    expect(config).toEqual({
      http: { host: '127.0.0.1', port: 9000 },
      cookies: { base: 'STUDY_RUN_IDS', path: '/', maxAgeSeconds: DEFAULT_COOKIE_MAX_AGE_SECONDS },
      catalogFile: null,
      logLevel: 'info',
    });
    expect(DEFAULT_COOKIE_MAX_AGE_SECONDS).toBe(2_147_483_647);
  });

  it('reads every setting from the environment', () => {
    const config = expectOk(
      loadConfig({
        env: {
          STUDY_RUNS_PORT: '8080',
          STUDY_RUNS_HOST: '0.0.0.0',
          STUDY_RUNS_COOKIE_BASE: 'RUNS',
          STUDY_RUNS_COOKIE_PATH: '/publix',
          STUDY_RUNS_COOKIE_MAX_AGE: '3600',
          STUDY_RUNS_CATALOG_FILE: './catalog.json',
          STUDY_RUNS_LOG_LEVEL: 'debug',
        },
      }),
      'loading config'
    );
    expect(config).toEqual({
      http: { host: '0.0.0.0', port: 8080 },
      cookies: { base: 'RUNS', path: '/publix', maxAgeSeconds: 3600 },
      catalogFile: './catalog.json',
      logLevel: 'debug',
    });
  });

  it('ignores unrelated variables', () => {
    expect(expectOk(loadConfig({ env: { PATH: '/usr/bin', HOME: '/root' } }), 'loading config').http.port).toBe(9000);
  });

  it('rejects an out-of-range port', () => {
    const error = expectErr(loadConfig({ env: { STUDY_RUNS_PORT: '70000' } }), 'loading config');
    expect(error).toEqual({
      _tag: 'ConfigInvalid',
      source: 'environment',
      message: 'Invalid configuration in environment',
      issues: [{ path: 'STUDY_RUNS_PORT', message: 'Port must be <= 65535' }],
    });
  });

  it('reports every invalid setting', () => {
    const error = expectErr(
      loadConfig({
        env: {
          STUDY_RUNS_COOKIE_BASE: 'has-dash',
          STUDY_RUNS_COOKIE_PATH: 'publix',
          STUDY_RUNS_COOKIE_MAX_AGE: '-1',
        },
      }),
      'loading config'
    );
    expect(error.issues.map((i) => i.path)).toEqual([
      'STUDY_RUNS_COOKIE_BASE',
      'STUDY_RUNS_COOKIE_PATH',
      'STUDY_RUNS_COOKIE_MAX_AGE',
    ]);
  });

  it('rejects unknown log levels', () => {
    const error = expectErr(loadConfig({ env: { STUDY_RUNS_LOG_LEVEL: 'verbose' } }), 'loading config');
    expect(error.issues[0]?.path).toBe('STUDY_RUNS_LOG_LEVEL');
  });

  it('formats issues for the console', () => {
    const error = expectErr(loadConfig({ env: { STUDY_RUNS_PORT: '0' } }), 'loading config');
    expect(formatAppError(error)).toBe('Invalid configuration in environment\n\n  - STUDY_RUNS_PORT: Port must be >= 1');
  });
});
