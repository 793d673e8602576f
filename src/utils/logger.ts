import winston from 'winston';
import * as Sentry from '@sentry/node';

/**
 * Winston logger configuration for structured logging.
 * Console defaults to warn; the file transport records debug.
 */
const consoleTransport = new winston.transports.Console({
  level: process.env.LOG_LEVEL || 'warn',
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      let msg = `${timestamp} [${level}]: ${message}`;
      if (Object.keys(meta).length > 0) {
        msg += ` ${JSON.stringify(meta)}`;
      }
      return msg;
    }),
  ),
});

const transports: winston.transport[] = [consoleTransport];

// Only add file transport outside of tests
if (process.env.NODE_ENV !== 'test') {
  transports.push(
    new winston.transports.File({ filename: 'linkharvest.log', level: 'debug' }),
  );
}

export const logger = winston.createLogger({
  level: 'debug',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'linkharvest' },
  transports,
});

/**
 * Change the console level after configuration is loaded
 */
export function setConsoleLevel(level: string): void {
  consoleTransport.level = level;
}

/**
 * Log an operation
 */
export function logOperation(
  operation: string,
  details?: Record<string, unknown>,
): void {
  logger.info(operation, details);
}

/**
 * Log an error with stack trace and forward it to Sentry
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
  Sentry.captureException(error, { extra: context });
}
