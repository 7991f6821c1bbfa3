/**
 * Logger utility module for the engagement bot.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Directory path for log files.
 * Logs are stored in the 'logs' directory at the project root.
 */
const logDir = path.join(__dirname, '../../logs');

/**
 * File transports are on unless LOG_TO_FILE is explicitly "false".
 * Reads directly from process.env to avoid circular dependency with config module.
 */
const logToFile = process.env.LOG_TO_FILE !== 'false';

if (logToFile && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0 && meta.stack) {
      msg += `\n${meta.stack}`;
    } else if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const fileTransports = () => [
  // Combined log file with rotation
  new winston.transports.File({
    filename: path.join(logDir, 'combined.log'),
    maxsize: 10485760, // 10MB
    maxFiles: 5,
    tailable: true
  }),
  // Error log file with rotation
  new winston.transports.File({
    filename: path.join(logDir, 'error.log'),
    level: 'error',
    maxsize: 10485760, // 10MB
    maxFiles: 5,
    tailable: true
  })
];

/**
 * Main Winston logger instance.
 *
 * Console output is always on. When file logging is enabled the logger also
 * writes a combined log, an error-only log, and captures uncaught exceptions
 * and unhandled rejections, each with 10MB rotation.
 *
 * @example
 * ```typescript
 * logger.info('Level up', { guildId: -100123, userId: 42, level: 5 });
 * logger.error('Giveaway resolution failed', { error, giveawayId: 7 });
 * ```
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),
    ...(logToFile ? fileTransports() : [])
  ],
  exceptionHandlers: logToFile
    ? [
        new winston.transports.File({
          filename: path.join(logDir, 'exceptions.log'),
          maxsize: 10485760, // 10MB
          maxFiles: 3
        })
      ]
    : [],
  rejectionHandlers: logToFile
    ? [
        new winston.transports.File({
          filename: path.join(logDir, 'rejections.log'),
          maxsize: 10485760, // 10MB
          maxFiles: 3
        })
      ]
    : []
});

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
  /** Telegram group chat ID */
  guildId?: number;
  /** Telegram user ID */
  userId?: number;
  /** Username */
  username?: string;
  /** Giveaway (timer) ID */
  giveawayId?: number;
  /** Operation type */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
  /**
   * Logs a user action with context.
   *
   * @example
   * ```typescript
   * StructuredLogger.logUserAction('Giveaway entered', {
   *   guildId: -100123,
   *   userId: 12345,
   *   giveawayId: 9,
   *   operation: 'giveaway_enter'
   * });
   * ```
   */
  static logUserAction(action: string, context: LogContext): void {
    logger.info(action, this.sanitizeContext(context));
  }

  /**
   * Logs a guild-level event (config changes, giveaway lifecycle, role rewards).
   */
  static logGuildEvent(event: string, context: LogContext): void {
    logger.info(`[GUILD] ${event}`, this.sanitizeContext(context));
  }

  /**
   * Logs an error with full context and stack trace.
   */
  static logError(error: unknown, context: LogContext = {}): void {
    if (error instanceof Error) {
      logger.error(error.message, { ...this.sanitizeContext(context), stack: error.stack });
    } else {
      logger.error(String(error), this.sanitizeContext(context));
    }
  }

  /**
   * Logs a debug message (only in debug log level).
   */
  static logDebug(message: string, context: LogContext = {}): void {
    logger.debug(message, this.sanitizeContext(context));
  }

  /**
   * Removes or masks sensitive fields before they reach a transport.
   */
  private static sanitizeContext(context: LogContext): LogContext {
    const sanitized = { ...context };

    const sensitiveKeys = ['token', 'password', 'secret'];

    for (const key of sensitiveKeys) {
      if (key in sanitized) {
        sanitized[key] = '[REDACTED]';
      }
    }

    return sanitized;
  }
}
