import winston from 'winston';
import path from 'path';
import fs from 'fs';
import type { Logger } from '../types/services';
export type { Logger } from '../types/services';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log levels
const levels: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Colors for each level
const colors: Record<string, string> = {
  error: 'red',
  warn: 'yellow',
  info: 'cyan',
  http: 'magenta',
  debug: 'gray',
};

winston.addColors(colors);

interface LogLine {
  level: string;
  message: string;
  timestamp?: string;
  context?: string;
  stack?: string;
}

function toLogLine(info: winston.Logform.TransformableInfo): LogLine {
  const field = (key: string): string | undefined => {
    const value = info[key];
    return typeof value === 'string' ? value : undefined;
  };
  return {
    level: info.level,
    message: String(info.message),
    timestamp: field('timestamp'),
    context: field('context'),
    stack: field('stack'),
  };
}

function renderLine(info: LogLine, level: string): string {
  const ctx = info.context ? ` [${info.context}]` : '';
  const msg = info.stack || info.message;
  return `${info.timestamp} ${level}${ctx} ${msg}`;
}

const consoleFormat = printf((info) => {
  const line = toLogLine(info);
  return renderLine(line, line.level);
});

/**
 * Redact credentials before they reach a transport: passwords embedded in
 * ws/http URLs and Authorization header values.
 */
export function sanitizeLogMessage(message: string): string {
  let sanitized = message;

  // ws://user:password@host or https://:password@host
  sanitized = sanitized.replace(/((?:wss?|https?):\/\/[^:\s/]*:)[^@\s]+@/gi, '$1****@');

  // Authorization: secret / authorization=secret
  sanitized = sanitized.replace(/(authorization["']?\s*[:=]\s*["']?)[^\s"',}]+/gi, '$1****');

  return sanitized;
}

// Colors only when stdout is a TTY
const isTty = typeof process.stdout?.isTTY === 'boolean' && process.stdout.isTTY;
const consoleTransportFormat = isTty
  ? combine(colorize({ all: true }), consoleFormat)
  : combine(consoleFormat);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleTransportFormat,
  }),
];

// Error file only when a log directory is configured
const logsDir = process.env['LOG_DIR'];
if (logsDir) {
  try {
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        format: combine(
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          printf((info) => {
            const line = toLogLine(info);
            return renderLine(line, line.level.toUpperCase());
          })
        ),
      })
    );
  } catch (error) {
    process.emitWarning(`Log directory ${logsDir} is not writable: ${String(error)}`);
  }
}

const logger = winston.createLogger({
  levels,
  level: process.env['LOG_LEVEL'] || 'info',
  format: combine(errors({ stack: true }), timestamp({ format: 'HH:mm:ss' })),
  transports,
});

// Helper to create child logger with context
export function createLogger(context: string): Logger {
  return {
    error: (message: string, meta: Record<string, unknown> = {}) =>
      logger.error(sanitizeLogMessage(message), { context, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(sanitizeLogMessage(message), { context, ...meta }),
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(sanitizeLogMessage(message), { context, ...meta }),
    http: (message: string, meta: Record<string, unknown> = {}) =>
      logger.http(sanitizeLogMessage(message), { context, ...meta }),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(sanitizeLogMessage(message), { context, ...meta }),
  };
}

export { logger };
