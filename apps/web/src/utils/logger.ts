/**
 * Structured logging utility with debug flags
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.debug('session', 'Token still fresh', { expiresAt });
 *   logger.info('auth', 'Login succeeded', { username: 'alice' });
 *   logger.error('api', 'Request failed', error);
 *
 * Enable debug logging via environment variables:
 *   VITE_DEBUG_AUTH=true     - Login/register/logout
 *   VITE_DEBUG_SESSION=true  - Restoration and freshness checks
 *   VITE_DEBUG_API=true      - Outbound requests
 *   VITE_DEBUG_ALL=true      - All debug logging
 */

import { env, readRuntimeEnv } from '../config/env';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogCategory = 'auth' | 'session' | 'api' | 'events' | 'tasks' | 'general';

interface LogContext {
  [key: string]: unknown;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isDebugEnabled(category: LogCategory): boolean {
  const source = readRuntimeEnv();
  if (source.VITE_DEBUG_ALL === 'true') return true;

  const envKey = `VITE_DEBUG_${category.toUpperCase()}`;
  return source[envKey] === 'true';
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[env.VITE_LOG_LEVEL];
}

function formatMessage(
  level: LogLevel,
  category: LogCategory,
  message: string,
  context?: LogContext | Error
): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}] [${category}]`;

  if (context instanceof Error) {
    return `${prefix} ${message}: ${context.message}`;
  }

  if (context && Object.keys(context).length > 0) {
    const safeContext = redactSensitive(context);
    return `${prefix} ${message} ${JSON.stringify(safeContext)}`;
  }

  return `${prefix} ${message}`;
}

const sensitiveKeys = [
  'password', 'secret', 'token', 'authorization', 'cookie'
];

function isLogContext(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactSensitive(obj: LogContext): LogContext {
  const redacted: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveKeys.some(sk => lowerKey.includes(sk))) {
      if (typeof value === 'string' && value.length > 8) {
        redacted[key] = `${value.slice(0, 8)}...[REDACTED]`;
      } else {
        redacted[key] = '[REDACTED]';
      }
    } else if (isLogContext(value)) {
      redacted[key] = redactSensitive(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

export const logger = {
  /**
   * Debug level - only logs if debug is enabled for the category
   */
  debug(category: LogCategory, message: string, context?: LogContext | Error): void {
    if (isDebugEnabled(category)) {
      console.log(formatMessage('debug', category, message, context));
    }
  },

  info(category: LogCategory, message: string, context?: LogContext): void {
    if (shouldLog('info')) {
      console.log(formatMessage('info', category, message, context));
    }
  },

  warn(category: LogCategory, message: string, context?: LogContext | Error): void {
    if (shouldLog('warn')) {
      console.warn(formatMessage('warn', category, message, context));
    }
  },

  /**
   * Error level - always logs
   */
  error(category: LogCategory, message: string, context?: LogContext | Error): void {
    console.error(formatMessage('error', category, message, context));
    if (context instanceof Error && context.stack) {
      console.error(context.stack);
    }
  },

  child(category: LogCategory) {
    return {
      debug: (message: string, context?: LogContext | Error) =>
        logger.debug(category, message, context),
      info: (message: string, context?: LogContext) =>
        logger.info(category, message, context),
      warn: (message: string, context?: LogContext | Error) =>
        logger.warn(category, message, context),
      error: (message: string, context?: LogContext | Error) =>
        logger.error(category, message, context),
    };
  },
};

export type Logger = ReturnType<typeof logger.child>;

export const authLogger = logger.child('auth');
export const sessionLogger = logger.child('session');
export const apiLogger = logger.child('api');
