import pino from 'pino';

/**
 * Package logger. Credentials and keys are redacted wherever they appear.
 */
export const logger = pino({
  name: 'hawk-auth',
  level: process.env['LOG_LEVEL'] || 'info',
  redact: {
    paths: [
      'authorization',
      'headers.authorization',
      'req.headers.authorization',
      '*.key',
      '*.secret',
    ],
    censor: '[REDACTED]',
  },
});
