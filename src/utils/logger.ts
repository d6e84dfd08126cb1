import winston from 'winston';
import path from 'path';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// GeoJSON payloads can be huge; metadata only ever carries a summary of them
const OMITTED_KEYS = new Set(['geometry', 'coordinates', 'features']);

function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (OMITTED_KEYS.has(key)) {
      return '[Omitted]';
    }

    return value;
  });
}

const logFormat = printf(({ level, message, timestamp, stack, module, ...metadata }) => {
  const scope = typeof module === 'string' ? ` [${module}]` : '';
  let log = `${String(timestamp)} [${level}]${scope}: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    try {
      log += ` ${safeStringify(metadata)}`;
    } catch (error) {
      log += ` [Error stringifying metadata: ${error instanceof Error ? error.message : 'Unknown error'}]`;
    }
  }

  if (typeof stack === 'string') {
    log += `\n${stack}`;
  }

  return log;
});

export const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      ),
    }),
  ],
});

if (config.isProduction) {
  logger.add(
    new winston.transports.File({
      filename: path.join('logs', 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join('logs', 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Child logger tagging every line with the emitting module.
 */
export function moduleLogger(module: string): winston.Logger {
  return logger.child({ module });
}

export default logger;
