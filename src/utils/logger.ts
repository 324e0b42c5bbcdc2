/**
 * Structured Logger
 *
 * Winston-based logger with:
 * - JSON format for production, colorized console for development
 * - Correlation IDs for request tracing
 * - Daily log rotation in production
 * - Sensitive data filtering (webhook secrets, bot tokens, signatures)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { AsyncLocalStorage } from 'async_hooks';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

export const asyncLocalStorage = new AsyncLocalStorage<{ correlationId: string }>();

/**
 * Key fragments that mark a value as sensitive
 */
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'secret',
  'signature',
  'authorization',
  'cookie',
  'DATABASE_URL',
];

const MAX_STRING_LENGTH = 500;

/**
 * Redact sensitive keys and truncate long strings in log metadata
 */
export function sanitizeData(data: unknown): unknown {
  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    if (data.length > MAX_STRING_LENGTH) {
      return `[String of length ${data.length}]`;
    }
    return data;
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (Array.isArray(data)) {
    return data.map(sanitizeData);
  }

  if (typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeData(value);
    }

    return sanitized;
  }

  return data;
}

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lowerKey.includes(field.toLowerCase()));
}

const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'service', 'environment', 'stack', 'correlationId']);

/**
 * Adds the request correlation ID and sanitizes metadata in place
 */
const correlationFormat = winston.format((info) => {
  const store = asyncLocalStorage.getStore();

  if (store?.correlationId) {
    info.correlationId = store.correlationId;
  }

  for (const key of Object.keys(info)) {
    if (RESERVED_KEYS.has(key)) continue;
    info[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeData(info[key]);
  }

  return info;
});

const devFormat = printf(({ level, message, timestamp: ts, correlationId, ...metadata }) => {
  let msg = `${String(ts)}`;

  if (typeof correlationId === 'string') {
    msg += ` [${correlationId}]`;
  }

  msg += ` [${level}]: ${String(message)}`;

  const { service: _service, environment: _environment, ...rest } = metadata;

  if (Object.keys(rest).length > 0) {
    msg += ` ${JSON.stringify(rest)}`;
  }

  return msg;
});

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isDevelopment ? combine(colorize(), devFormat) : json(),
    silent: isTest,
  }),
];

if (!isDevelopment && !isTest) {
  transports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: json(),
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      format: json(),
      maxSize: '20m',
      maxFiles: '14d',
      zippedArchive: true,
    })
  );
}

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), correlationFormat()),
  defaultMeta: {
    service: 'fleet-safety-alerts',
    environment: process.env.NODE_ENV || 'development',
  },
  transports,
  exitOnError: false,
});

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Log through the shared logger; correlationFormat adds the ID and sanitizes
 */
export function logWithCorrelation(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  logger.log(level, message, { ...meta });
}

// Stream for Morgan HTTP logging
export const stream = {
  write: (message: string): void => {
    logger.info(message.trim());
  },
};

export const logHelpers = {
  apiRequest: (method: string, path: string, meta?: Record<string, unknown>) => {
    logWithCorrelation('debug', `API Request: ${method} ${path}`, meta);
  },

  apiResponse: (method: string, path: string, statusCode: number, duration: number) => {
    const level: LogLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logWithCorrelation(level, `API Response: ${method} ${path}`, {
      statusCode,
      duration: `${duration}ms`,
    });
  },

  dbQuery: (operation: string, table: string, duration?: number) => {
    logWithCorrelation('debug', `DB Query: ${operation} on ${table}`, {
      duration: duration !== undefined ? `${duration}ms` : undefined,
    });
  },

  /**
   * Log business event (accepted, suppressed, alert sent)
   */
  business: (event: string, meta?: Record<string, unknown>) => {
    logWithCorrelation('info', `Business Event: ${event}`, meta);
  },

  security: (event: string, severity: 'low' | 'medium' | 'high', meta?: Record<string, unknown>) => {
    const level: LogLevel = severity === 'high' ? 'error' : severity === 'medium' ? 'warn' : 'info';
    logWithCorrelation(level, `Security: ${event}`, { severity, ...meta });
  },
};

if (!isTest) {
  logger.info('Logger initialized', {
    level: LOG_LEVEL,
    environment: process.env.NODE_ENV || 'development',
    rotation: !isDevelopment ? 'enabled' : 'disabled',
  });
}
