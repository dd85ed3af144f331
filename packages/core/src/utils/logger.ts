// Logger utility - structured logging with configurable levels and formats

import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = winston.Logger;

// Create logger instance
export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    logFormat === 'json'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: {
    service: 'telemetry-relay',
    version: process.env.npm_package_version || '1.0.0',
  },
  transports: [
    new winston.transports.Console({
      handleExceptions: true,
      handleRejections: true,
    }),
  ],
});

// Add file logging when LOG_TO_FILE is enabled
if (process.env.LOG_TO_FILE === 'true' && !process.env.DISABLE_FILE_LOGGING) {
  const logDir = process.env.LOG_DIR || '/tmp';

  logger.add(
    new winston.transports.File({
      filename: `${logDir}/relay-error.log`,
      level: 'error',
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    })
  );

  logger.add(
    new winston.transports.File({
      filename: `${logDir}/relay-combined.log`,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    })
  );
}

/**
 * Apply a level from configuration. LOG_LEVEL, when set, takes precedence.
 */
export function setLogLevel(level: LogLevel): void {
  if (process.env.LOG_LEVEL) {
    return;
  }
  logger.level = level;
}

/**
 * Child logger carrying the component id on every line.
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
