import { describe, it, expect } from 'vitest';
import {
  BaseError,
  ConfigurationError,
  ValidationError,
  TimeoutError,
  isBaseError,
} from '../Types/errors.js';

describe('BaseError', () => {
  it('should set message, code, and details', () => {
    const err = new BaseError('test message', 'TEST_CODE', { key: 'val' });
    expect(err.message).toBe('test message');
    expect(err.code).toBe('TEST_CODE');
    expect(err.details).toEqual({ key: 'val' });
  });

  it('should be instanceof Error', () => {
    const err = new BaseError('msg', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(BaseError);
    expect(err.name).toBe('BaseError');
  });

  it('should convert to a plain record', () => {
    const err = new BaseError('msg', 'CODE', { line: 3 });
    expect(err.toRecord()).toEqual({
      name: 'BaseError',
      code: 'CODE',
      message: 'msg',
      details: { line: 3 },
    });
  });

  it('should omit details from the record when absent', () => {
    const record = new BaseError('msg', 'CODE').toRecord();
    expect(record).not.toHaveProperty('details');
  });
});

describe('Error subclasses', () => {
  const subclasses = [
    { Class: ConfigurationError, name: 'ConfigurationError', code: 'CONFIGURATION_ERROR' },
    { Class: ValidationError, name: 'ValidationError', code: 'VALIDATION_ERROR' },
    { Class: TimeoutError, name: 'TimeoutError', code: 'TIMEOUT_ERROR' },
  ] as const;

  for (const { Class, name, code } of subclasses) {
    describe(name, () => {
      it(`should have code "${code}" and name "${name}"`, () => {
        const err = new Class('test');
        expect(err.code).toBe(code);
        expect(err.name).toBe(name);
      });

      it('should be recognised by isBaseError', () => {
        expect(isBaseError(new Class('test'))).toBe(true);
      });
    });
  }

  it('should not treat plain errors as BaseError', () => {
    expect(isBaseError(new Error('plain'))).toBe(false);
    expect(isBaseError('text')).toBe(false);
  });
});
