import pino from 'pino';

// Create logger instance with Lambda-friendly settings
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  // Lambda already adds timestamp
  timestamp: false,
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Upstream credentials must never reach the logs
  redact: {
    paths: [
      'authorization',
      'Authorization',
      'apiKey',
      'headers.authorization',
      'headers.Authorization',
    ],
    censor: '[REDACTED]',
  },
});

// Create child logger with request context
export function createRequestLogger(requestId: string) {
  return logger.child({ requestId });
}

export type Logger = typeof logger;
