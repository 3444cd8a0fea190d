/**
 * Tests for error classification utilities
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  OutputCheckError,
  NotFoundError,
  ValidationError,
  CompilationError,
  ExternalServiceError,
  classifyError,
  createErrorResponse,
  ErrorCode,
  HttpStatus,
} from './errors.js';

describe('errors', () => {
  describe('OutputCheckError', () => {
    it('should create error with code and message', () => {
      const error = new OutputCheckError('Test error', ErrorCode.INTERNAL_ERROR);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.name).toBe('OutputCheckError');
    });

    it('should set default HTTP status based on code', () => {
      expect(new OutputCheckError('', ErrorCode.VALIDATION_ERROR).httpStatus).toBe(
        HttpStatus.UNPROCESSABLE_ENTITY
      );
      expect(new OutputCheckError('', ErrorCode.SCHEMA_ERROR).httpStatus).toBe(
        HttpStatus.UNPROCESSABLE_ENTITY
      );
      expect(new OutputCheckError('', ErrorCode.UNKNOWN_TOOL).httpStatus).toBe(HttpStatus.BAD_REQUEST);
      expect(new OutputCheckError('', ErrorCode.NOT_FOUND).httpStatus).toBe(HttpStatus.NOT_FOUND);
      expect(new OutputCheckError('', ErrorCode.INTERNAL_ERROR).httpStatus).toBe(
        HttpStatus.INTERNAL_SERVER_ERROR
      );
    });

    it('should allow custom HTTP status', () => {
      const error = new OutputCheckError('Test', ErrorCode.INTERNAL_ERROR, { httpStatus: 418 });
      expect(error.httpStatus).toBe(418);
    });

    it('should set retryable flag appropriately', () => {
      expect(new OutputCheckError('', ErrorCode.EXTERNAL_SERVICE_ERROR).isRetryable).toBe(true);
      expect(new OutputCheckError('', ErrorCode.VALIDATION_ERROR).isRetryable).toBe(false);
    });

    it('should serialize to JSON correctly', () => {
      const error = new OutputCheckError('Test error', ErrorCode.NOT_FOUND, {
        details: { resourceId: '123' },
      });

      expect(error.toJSON()).toEqual({
        error: true,
        code: ErrorCode.NOT_FOUND,
        message: 'Test error',
        httpStatus: HttpStatus.NOT_FOUND,
        isRetryable: false,
        details: { resourceId: '123' },
      });
    });

    it('should keep the cause', () => {
      const cause = new Error('root');
      const error = new OutputCheckError('wrapped', ErrorCode.INTERNAL_ERROR, { cause });
      expect(error.cause).toBe(cause);
    });
  });

  describe('NotFoundError', () => {
    it('should create error with resource info', () => {
      const error = new NotFoundError('Schema', 'summary@2.0.0');

      expect(error.message).toBe('Schema not found: summary@2.0.0');
      expect(error.code).toBe(ErrorCode.NOT_FOUND);
      expect(error.details).toEqual({
        resourceType: 'Schema',
        resourceId: 'summary@2.0.0',
      });
    });
  });

  describe('ValidationError', () => {
    it('should create error with validation details', () => {
      const error = new ValidationError('Invalid input', [
        { path: 'schemaName', message: 'Required' },
        { path: 'validationLevel', message: 'Invalid enum value' },
      ]);

      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.details?.['errors']).toHaveLength(2);
    });

    it('should create from ZodError', () => {
      const result = z.object({ name: z.string().min(1) }).safeParse({ name: '' });
      expect(result.success).toBe(false);
      if (result.success) return;

      const error = ValidationError.fromZodError(result.error);

      expect(error.message).toBe('Validation failed: String must contain at least 1 character(s)');
      expect(error.details).toEqual({
        errors: [{ path: 'name', message: 'String must contain at least 1 character(s)' }],
      });
    });
  });

  describe('CompilationError', () => {
    it('should summarise every issue', () => {
      const error = new CompilationError([
        { path: 'age', message: '"pattern" is not valid on a field of type integer' },
        { path: '', message: 'Schema must declare at least one field' },
      ]);

      expect(error.message).toBe(
        'Invalid schema: age: "pattern" is not valid on a field of type integer; Schema must declare at least one field'
      );
      expect(error.code).toBe(ErrorCode.SCHEMA_ERROR);
      expect(error.issues).toHaveLength(2);
    });
  });

  describe('ExternalServiceError', () => {
    it('should create retryable external service error', () => {
      const error = new ExternalServiceError('http', 'Semantic service responded with 502');

      expect(error.code).toBe(ErrorCode.EXTERNAL_SERVICE_ERROR);
      expect(error.isRetryable).toBe(true);
      expect(error.message).toBe('External service error (http): Semantic service responded with 502');
      expect(error.details?.['serviceName']).toBe('http');
    });
  });

  describe('classifyError', () => {
    it('should pass through OutputCheckError unchanged', () => {
      const original = new OutputCheckError('Test', ErrorCode.INTERNAL_ERROR);
      expect(classifyError(original)).toBe(original);
    });

    it('should convert ZodError to ValidationError', () => {
      const result = z.string().min(5).safeParse('abc');
      expect(result.success).toBe(false);
      if (result.success) return;

      const classified = classifyError(result.error);

      expect(classified).toBeInstanceOf(ValidationError);
      expect(classified.code).toBe(ErrorCode.VALIDATION_ERROR);
    });

    it('should treat a plain Error as internal, keeping it as the cause', () => {
      const cause = new Error('EACCES: permission denied');
      const classified = classifyError(cause);

      expect(classified.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(classified.message).toBe('EACCES: permission denied');
      expect(classified.cause).toBe(cause);
    });

    it('should handle non-Error objects', () => {
      const classified = classifyError('string error');

      expect(classified.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(classified.details?.['originalError']).toBe('string error');
    });
  });

  describe('createErrorResponse', () => {
    it('should create structured error response', () => {
      const response = createErrorResponse(new NotFoundError('Schema', 'contact'), 'req-123');

      expect(response['error']).toBe(true);
      expect(response['code']).toBe(ErrorCode.NOT_FOUND);
      expect(response['message']).toBe('Schema not found: contact');
      expect(response['requestId']).toBe('req-123');
    });

    it('should omit the request id when there is none', () => {
      const response = createErrorResponse(new Error('Unknown error'));

      expect(response['code']).toBe(ErrorCode.INTERNAL_ERROR);
      expect(response).not.toHaveProperty('requestId');
    });
  });
});
