import pino from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  // Jest sets NODE_ENV=test; keep test output clean unless LOG_LEVEL asks otherwise
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Root logger. Components take `logger.child({ component })` and add
 * requestId / sessionId / channel bindings per turn.
 */
export const logger = pino({
  level: resolveLevel(),
  base: { service: 'reply-gateway', env: process.env.NODE_ENV ?? 'development' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Reply targets embed Discord interaction tokens and phone numbers
  redact: {
    paths: ['replyTarget', 'target', 'token', '*.replyTarget', '*.target', '*.token'],
    censor: '[REDACTED]',
  },
});
