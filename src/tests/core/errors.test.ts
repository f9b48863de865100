import { describe, it, expect } from 'vitest';
import { AINError, ErrorCode, isAINError, wrapError } from '../../core/errors';

describe('AINError', () => {
  describe('constructor', () => {
    it('should create error with code and message', () => {
      const error = new AINError(ErrorCode.VALIDATION_ERROR, 'Test message');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AINError);
      expect(error.name).toBe('AINError');
      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.message).toBe('Test message');
      expect(error.context).toBeUndefined();
    });

    it('should create error with context', () => {
      const context = { lower: 5, upper: 1 };
      const error = new AINError(ErrorCode.VALIDATION_ERROR, 'Bounds out of order', context);

      expect(error.context).toEqual(context);
    });

    it('should preserve stack trace', () => {
      const error = new AINError(ErrorCode.INTERNAL_ERROR, 'Test');
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('AINError');
    });
  });

  describe('toString', () => {
    it('should format error without context', () => {
      const error = new AINError(ErrorCode.INVALID_INPUT, 'Bad input');
      expect(error.toString()).toBe('AINError [INVALID_INPUT]: Bad input');
    });

    it('should format error with context', () => {
      const error = new AINError(ErrorCode.DOMAIN_ERROR, 'Logarithm of a non-positive value', {
        lower: -1,
        upper: 2,
      });

      expect(error.toString()).toBe(
        'AINError [DOMAIN_ERROR]: Logarithm of a non-positive value Context: {"lower":-1,"upper":2}'
      );
    });
  });

  describe('is', () => {
    it('should match only its own code', () => {
      const error = new AINError(ErrorCode.COMPLEX_RESULT, 'Test');
      expect(error.is(ErrorCode.COMPLEX_RESULT)).toBe(true);
      expect(error.is(ErrorCode.DOMAIN_ERROR)).toBe(false);
    });
  });

  describe('isOneOf', () => {
    it('should return true if error code is in list', () => {
      const error = new AINError(ErrorCode.RANGE_ERROR, 'Test');
      expect(error.isOneOf([ErrorCode.DOMAIN_ERROR, ErrorCode.RANGE_ERROR])).toBe(true);
    });

    it('should return false for empty list', () => {
      const error = new AINError(ErrorCode.RANGE_ERROR, 'Test');
      expect(error.isOneOf([])).toBe(false);
    });
  });
});

describe('ErrorCode', () => {
  it('should use the code name as its value', () => {
    expect(ErrorCode.VALIDATION_ERROR).toBe('VALIDATION_ERROR');
    expect(ErrorCode.DOMAIN_ERROR).toBe('DOMAIN_ERROR');
    expect(ErrorCode.COMPLEX_RESULT).toBe('COMPLEX_RESULT');
    expect(ErrorCode.RANGE_ERROR).toBe('RANGE_ERROR');
    expect(ErrorCode.INVALID_INPUT).toBe('INVALID_INPUT');
    expect(ErrorCode.INVALID_CONFIG).toBe('INVALID_CONFIG');
    expect(ErrorCode.INTERNAL_ERROR).toBe('INTERNAL_ERROR');
  });
});

describe('isAINError', () => {
  it('should return true for AINError instances', () => {
    expect(isAINError(new AINError(ErrorCode.INTERNAL_ERROR, 'Test'))).toBe(true);
  });

  it('should return false for other values', () => {
    expect(isAINError(new Error('Regular error'))).toBe(false);
    expect(isAINError('string')).toBe(false);
    expect(isAINError(null)).toBe(false);
    expect(isAINError({})).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return AINError as-is', () => {
    const original = new AINError(ErrorCode.DOMAIN_ERROR, 'Original');
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap regular Error with default code', () => {
    const original = new Error('Regular error');
    const wrapped = wrapError(original);

    expect(wrapped).toBeInstanceOf(AINError);
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Regular error');
    expect(wrapped.context).toEqual({ originalStack: original.stack });
  });

  it('should wrap regular Error with custom code', () => {
    const wrapped = wrapError(new Error('Bad input'), ErrorCode.INVALID_INPUT);
    expect(wrapped.code).toBe(ErrorCode.INVALID_INPUT);
  });

  it('should wrap non-Error values', () => {
    const wrapped = wrapError(42);

    expect(wrapped.message).toBe('42');
    expect(wrapped.context).toEqual({ originalError: 42 });
  });
});
