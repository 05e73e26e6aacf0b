import winston from 'winston';
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'askbridge';

const transports: winston.transport[] = [
  // Console transport with high-density format
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, service, message, ...meta }) => {
        const { pid, nodeVersion, ...cleanMeta } = meta;

        // Collapse message to single line
        const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();

        const hasUsefulMeta =
          Object.keys(cleanMeta).length > 0 &&
          !Object.values(cleanMeta).every((v) => v === undefined || v === null);
        const metaStr = hasUsefulMeta ? ` ${JSON.stringify(cleanMeta)}` : '';

        const shortService = String(service || 'unknown').replace('@askbridge/', '').substring(0, 8);

        return `${timestamp} ${level} ${shortService}: ${cleanMessage}${metaStr}`;
      })
    ),
  }),
];

if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: serviceName,
    pid: process.pid,
    nodeVersion: process.version,
  },
  transports,
});

export interface LogMetrics {
  duration?: number;
  statusCode?: number;
  requestId?: string;
  correlationId?: string;
  endpoint?: string;
  channel?: string;
  model?: string;
  errorCode?: string;
  success?: boolean;
  error?: string;
  userAgent?: string;
  ip?: string;
  responseLength?: number;
  messageLength?: number;
  memoryUsage?: number;
}

export interface StructuredLogger {
  info(message: string, meta?: LogMetrics): void;
  error(message: string, error?: Error, meta?: LogMetrics): void;
  warn(message: string, meta?: LogMetrics): void;
  debug(message: string, meta?: LogMetrics): void;
  http(message: string, meta?: LogMetrics): void;
}

export const structuredLogger: StructuredLogger = {
  info: (message, meta) => {
    logger.info(message, meta);
  },

  error: (message, error, meta) => {
    logger.error(message, {
      ...meta,
      error: error?.message,
      stack: error?.stack,
      errorCode: meta?.errorCode,
    });
  },

  warn: (message, meta) => {
    logger.warn(message, meta);
  },

  debug: (message, meta) => {
    logger.debug(message, meta);
  },

  http: (message, meta) => {
    logger.http(message, meta);
  },
};

// Performance monitoring utilities
export const performanceLogger = {
  startTimer: (label: string) => {
    const start = process.hrtime.bigint();
    return {
      end: (meta?: LogMetrics): number => {
        const duration = Number(process.hrtime.bigint() - start) / 1000000; // ns -> ms
        logger.info(`${label} completed`, {
          ...meta,
          duration: Math.round(duration),
          memoryUsage: process.memoryUsage().heapUsed,
        });
        return duration;
      },
    };
  },

  measureAsync: async <T>(label: string, fn: () => Promise<T>, meta?: LogMetrics): Promise<T> => {
    const timer = performanceLogger.startTimer(label);
    try {
      const result = await fn();
      timer.end({ ...meta, success: true });
      return result;
    } catch (error) {
      timer.end({ ...meta, success: false, error: error instanceof Error ? error.message : 'Unknown error' });
      throw error;
    }
  },
};

/**
 * Express middleware that tags each request with an id (exposed as
 * `res.locals.requestId` and the `X-Request-Id` header) and logs its start and
 * completion at `http` level.
 */
export const createRequestLogger = (service: string) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = randomUUID();
    const startTime = Date.now();

    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    structuredLogger.http(`${service}: incoming request`, {
      requestId,
      endpoint: `${req.method} ${req.path}`,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    });

    res.on('finish', () => {
      structuredLogger.http(`${service}: request completed`, {
        requestId,
        endpoint: `${req.method} ${req.path}`,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });

    next();
  };
};

