import pino from 'pino';

const env = process.env['NODE_ENV'];

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['token', 'password', 'secret', 'authorization', '*.token', '*.password'],
    censor: '***REDACTED***',
  },
});

export type Logger = typeof logger;
