import { describe, it, expect } from 'vitest';
import { createSuccess, createError, createErrorFromException } from '../Types/StandardResponse.js';
import { ValidationError, TimeoutError, BaseError } from '../Types/errors.js';

describe('StandardResponse', () => {
  describe('createSuccess', () => {
    it('should return success: true with data', () => {
      const result = createSuccess({ name: 'test' });
      expect(result).toEqual({ success: true, data: { name: 'test' } });
    });

    it('should handle null data', () => {
      expect(createSuccess(null).data).toBeNull();
    });
  });

  describe('createError', () => {
    it('should include errorCode and errorDetails when provided', () => {
      const result = createError('bad input', 'VALIDATION_ERROR', { field: 'level' });
      expect(result).toEqual({
        success: false,
        error: 'bad input',
        errorCode: 'VALIDATION_ERROR',
        errorDetails: { field: 'level' },
      });
    });

    it('should omit errorCode and errorDetails when not provided', () => {
      const result = createError('plain error');
      expect(result).not.toHaveProperty('errorCode');
      expect(result).not.toHaveProperty('errorDetails');
    });
  });

  describe('createErrorFromException', () => {
    it('should map plain Error to INTERNAL_ERROR', () => {
      const result = createErrorFromException(new Error('plain'), false);
      expect(result).toEqual({ success: false, error: 'plain', errorCode: 'INTERNAL_ERROR' });
    });

    it('should keep code and object details of BaseError subclasses', () => {
      const result = createErrorFromException(
        new ValidationError('bad level', { field: 'level' }),
        false,
      );
      expect(result.errorCode).toBe('VALIDATION_ERROR');
      expect(result.errorDetails).toEqual({ field: 'level' });
    });

    it('should wrap non-object details', () => {
      const result = createErrorFromException(new BaseError('odd', 'ODD', 42), false);
      expect(result.errorDetails).toEqual({ details: 42 });
    });

    it('should omit errorDetails for BaseError without details', () => {
      const result = createErrorFromException(new TimeoutError('slow'), false);
      expect(result.errorCode).toBe('TIMEOUT_ERROR');
      expect(result).not.toHaveProperty('errorDetails');
    });

    it('should attach the stack when requested', () => {
      const result = createErrorFromException(new TimeoutError('slow'), true);
      expect(result.errorDetails?.stack).toEqual(expect.stringContaining('slow'));
    });

    it('should handle string throws', () => {
      const result = createErrorFromException('string error');
      expect(result).toEqual({ success: false, error: 'string error', errorCode: 'UNKNOWN_ERROR' });
    });
  });
});
