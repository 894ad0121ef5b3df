/**
 * Paths pino masks before anything is written.
 *
 * Session-token cookie values identify a worker's run; they never reach the log
 * verbatim. Handlers log the run id instead.
 */
export const REDACTION_CONFIG = {
  paths: [
    'cookie',
    'cookies',
    'tokenValue',
    'secret',
    'password',
    'authorization',

    '*.cookie',
    '*.cookies',
    '*.tokenValue',
    '*.password',

    'req.headers.cookie',
    'req.headers.authorization',
    'res.headers["set-cookie"]',
    'headers.cookie',
    'headers.authorization',
  ],
  censor: '[REDACTED]',
};
