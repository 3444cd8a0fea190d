/**
 * Error classes and classification for the OutputCheck MCP server.
 *
 * Validation outcomes are reports, not errors. These classes cover the tool
 * surface: bad arguments, unknown tools and schemas, schema compilation and
 * semantic service failures.
 */

import { ZodError } from 'zod';

/**
 * Error codes for programmatic error handling.
 */
export const ErrorCode = {
  // Client errors (4xx equivalent)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  NOT_FOUND: 'NOT_FOUND',
  SCHEMA_ERROR: 'SCHEMA_ERROR',

  // Server errors (5xx equivalent)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',

  // Tool-specific errors
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const HttpStatus = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * Base error class for OutputCheck with error code support
 */
export class OutputCheckError extends Error {
  public readonly code: ErrorCodeType;
  public readonly httpStatus: number;
  public readonly details: Record<string, unknown> | undefined;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: {
      httpStatus?: number;
      details?: Record<string, unknown> | undefined;
      isRetryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'OutputCheckError';
    this.code = code;
    this.httpStatus = options?.httpStatus ?? this.defaultHttpStatus(code);
    this.details = options?.details;
    this.isRetryable = options?.isRetryable ?? this.defaultRetryable(code);
  }

  private defaultHttpStatus(code: ErrorCodeType): number {
    switch (code) {
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.INVALID_ARGUMENTS:
      case ErrorCode.SCHEMA_ERROR:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case ErrorCode.UNKNOWN_TOOL:
        return HttpStatus.BAD_REQUEST;
      case ErrorCode.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case ErrorCode.EXTERNAL_SERVICE_ERROR:
        return HttpStatus.SERVICE_UNAVAILABLE;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  private defaultRetryable(code: ErrorCodeType): boolean {
    return code === ErrorCode.EXTERNAL_SERVICE_ERROR;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export class NotFoundError extends OutputCheckError {
  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      details: { resourceType, resourceId },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when tool arguments fail validation
 */
export class ValidationError extends OutputCheckError {
  constructor(
    message: string,
    validationErrors?: Array<{ path: string; message: string }>
  ) {
    const details = validationErrors ? { errors: validationErrors } : undefined;
    super(message, ErrorCode.VALIDATION_ERROR, { details });
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError): ValidationError {
    const validationErrors = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(
      `Validation failed: ${validationErrors.map((e) => e.message).join(', ')}`,
      validationErrors
    );
  }
}

/**
 * A single problem found while compiling a schema description
 */
export interface CompilationIssue {
  /** Dotted path of the offending field spec inside the schema description */
  path: string;
  message: string;
}

/**
 * Error thrown when a schema description is internally inconsistent.
 * Raised before any payload data is examined.
 */
export class CompilationError extends OutputCheckError {
  public readonly issues: CompilationIssue[];

  constructor(issues: CompilationIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid schema: ${summary}`, ErrorCode.SCHEMA_ERROR, {
      details: { issues },
    });
    this.name = 'CompilationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when an external service fails
 */
export class ExternalServiceError extends OutputCheckError {
  constructor(
    serviceName: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(
      `External service error (${serviceName}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      { details: { serviceName, ...details } }
    );
    this.name = 'ExternalServiceError';
  }
}

/**
 * Classify an error and return an appropriate OutputCheckError.
 */
export function classifyError(error: unknown): OutputCheckError {
  if (error instanceof OutputCheckError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  // Repository I/O and other unexpected failures
  if (error instanceof Error) {
    return new OutputCheckError(error.message, ErrorCode.INTERNAL_ERROR, { cause: error });
  }

  return new OutputCheckError(
    'An unexpected error occurred',
    ErrorCode.INTERNAL_ERROR,
    {
      details: { originalError: String(error) },
    }
  );
}

/**
 * Create a structured error response for MCP tools.
 */
export function createErrorResponse(
  error: unknown,
  requestId?: string
): Record<string, unknown> {
  const classified = classifyError(error);
  return {
    ...classified.toJSON(),
    ...(requestId && { requestId }),
  };
}
