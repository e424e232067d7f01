import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

/**
 * Request context stored in AsyncLocalStorage for automatic propagation
 * throughout the request lifecycle.
 */
export interface RequestContext {
  requestId: string;
  method?: string;
  path?: string;
  gameId?: string;
  startTime?: number;
}

// ============================================================================
// Request Context (AsyncLocalStorage)
// ============================================================================

/**
 * AsyncLocalStorage for propagating request context through async call chains.
 * Any code can read the current request's correlation ID without it being
 * threaded through function parameters.
 */
export const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context from AsyncLocalStorage.
 * Returns undefined if called outside of a request context.
 */
export const getRequestContext = (): RequestContext | undefined => {
  return requestContextStorage.getStore();
};

/**
 * Run a function within a request context. All logs and async operations
 * within the callback will have access to the context.
 */
export const runWithContext = <T>(context: RequestContext, fn: () => T): T => {
  return requestContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /auth/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Redact a sensitive string value.
 * Shows first 4 characters for debugging while hiding the rest.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  if (!isPlainRecord(obj)) {
    return obj;
  }

  return maskRecord(obj, maxDepth);
};

const maskRecord = (obj: Record<string, unknown>, maxDepth: number): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!isSensitiveKey(key)) {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else if (value === null || value === undefined) {
      result[key] = value;
    } else if (typeof value === 'string') {
      result[key] = redactSensitiveString(value);
    } else if (typeof value === 'object') {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else {
      result[key] = '[REDACTED]';
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = config.app.name;

/**
 * Custom format to add request context from AsyncLocalStorage to log entries.
 */
const addRequestContext = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.requestId = context.requestId;
    if (context.method) {
      info.method = context.method;
    }
    if (context.path) {
      info.path = context.path;
    }
    if (context.gameId && info.gameId === undefined) {
      info.gameId = context.gameId;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  const { level, message, timestamp, ...rest } = info;
  return {
    level,
    message,
    timestamp,
    ...maskRecord(rest, 5),
  };
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, requestId, service: _service, environment: _env, ...meta }) => {
    const reqIdStr = requestId ? ` [${String(requestId)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(maskSensitiveData(meta))}` : '';
    return `${String(timestamp)} ${level}${reqIdStr}: ${String(message)}${metaStr}`;
  })
);

const buildTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ];

  const logFile = config.logging.file;
  if (logFile) {
    const logPath = path.resolve(logFile);
    const logDir = path.dirname(logPath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    // File transport - always use JSON format
    transports.push(
      new winston.transports.File({
        filename: logPath,
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
};

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: buildTransports(),
});

export { logger };
