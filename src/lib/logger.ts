import pino, { type Logger } from 'pino';

const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  name: 'zendesk-pulse',
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  transport: process.env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['apiKey', 'auth.apiKey', 'headers.authorization', 'headers.Authorization'],
    censor: '***',
  },
});

export type { Logger };

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

/** Child logger that also tags every line with the inbound request id. */
export function createRequestLogger(module: string, requestId: string): Logger {
  return logger.child({ module, requestId });
}

export default logger;
