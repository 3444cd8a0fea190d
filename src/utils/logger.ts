/**
 * Structured logging utility for OutputCheck
 * Provides context-aware logging with request ID tracking via AsyncLocalStorage.
 *
 * Every level is written to stderr: stdout carries the MCP protocol stream.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log context that can be passed to any log method
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Request context stored in AsyncLocalStorage for tracking across async calls
 */
interface RequestContext {
  requestId: string;
  toolName?: string | undefined;
  schemaName?: string | undefined;
  validationType?: string | undefined;
  startTime: number;
}

const requestStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a short request ID
 * Format: req-{8 chars of base64url}
 */
function generateRequestId(): string {
  return `req-${randomBytes(6).toString('base64url')}`;
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return { errorValue: String(error) };
}

/**
 * Format a log line with timestamp, level, request context, and optional data
 */
function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const reqContext = requestStorage.getStore();

  const fullContext: LogContext = {};

  if (reqContext) {
    fullContext.requestId = reqContext.requestId;
    if (reqContext.toolName) fullContext.tool = reqContext.toolName;
    if (reqContext.schemaName) fullContext.schema = reqContext.schemaName;
    if (reqContext.validationType) fullContext.validationType = reqContext.validationType;
  }

  if (context) {
    Object.assign(fullContext, context);
  }

  const contextStr = Object.keys(fullContext).length > 0
    ? ` ${JSON.stringify(fullContext)}`
    : '';

  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

function getElapsedMs(): number | undefined {
  const reqContext = requestStorage.getStore();
  return reqContext ? Date.now() - reqContext.startTime : undefined;
}

function withError(context: LogContext | undefined, error: unknown): LogContext | undefined {
  return error ? { ...context, ...formatError(error) } : context;
}

/**
 * Logger with support for structured context and request ID tracking
 */
export const logger = {
  /**
   * Log a debug message (only when LOG_LEVEL=debug)
   */
  debug(message: string, error?: unknown, context?: LogContext): void {
    if (process.env.LOG_LEVEL === 'debug') {
      console.error(formatMessage('debug', message, withError(context, error)));
    }
  },

  info(message: string, context?: LogContext): void {
    console.error(formatMessage('info', message, context));
  },

  warn(message: string, error?: unknown, context?: LogContext): void {
    console.error(formatMessage('warn', message, withError(context, error)));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    console.error(formatMessage('error', message, withError(context, error)));
  },

  /**
   * Run a function within a request context.
   * All logs within the callback will include the request ID and other context.
   *
   * @example
   * ```typescript
   * const report = await logger.withRequestContext(
   *   { toolName: 'outputcheck_validate', schemaName: 'summary' },
   *   async () => {
   *     logger.info('Validating'); // includes requestId, tool, schema
   *     return await validator.validate(request);
   *   }
   * );
   * ```
   */
  async withRequestContext<T>(
    options: {
      toolName?: string | undefined;
      schemaName?: string | undefined;
      validationType?: string | undefined;
    },
    fn: () => Promise<T>
  ): Promise<T> {
    const context: RequestContext = {
      requestId: generateRequestId(),
      toolName: options.toolName,
      schemaName: options.schemaName,
      validationType: options.validationType,
      startTime: Date.now(),
    };

    return requestStorage.run(context, fn);
  },

  getRequestId(): string | undefined {
    return requestStorage.getStore()?.requestId;
  },

  /**
   * Elapsed time since request start in milliseconds
   */
  getElapsedMs,

  /**
   * Update the current request context (e.g. once a named schema is resolved)
   */
  updateContext(updates: Partial<Pick<RequestContext, 'schemaName' | 'validationType'>>): void {
    const current = requestStorage.getStore();
    if (current) {
      if (updates.schemaName !== undefined) current.schemaName = updates.schemaName;
      if (updates.validationType !== undefined) current.validationType = updates.validationType;
    }
  },
};
