/**
 * Tests for serialization and fitting
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { AIN } from '../../core/ain/AIN';
import {
  fitAIN,
  fromRecord,
  fromTuple,
  parseAIN,
  stringifyAIN,
  toRecord,
  toTuple,
} from '../../core/data';
import { ErrorCode } from '../../core/errors';
import { expectErr, expectOk } from '../utilities/assertions';

describe('serialization', () => {
  describe('fromRecord', () => {
    it('should build an AIN from a record', () => {
      expect(expectOk(fromRecord({ lower: 1, upper: 4, expected: 2 })).toTuple()).toEqual([
        1, 4, 2,
      ]);
    });

    it('should default a missing expected value to the midpoint', () => {
      expect(expectOk(fromRecord({ lower: 1, upper: 4 })).expected).toBe(2.5);
    });

    it('should reject malformed records', () => {
      expectErr(fromRecord(null), ErrorCode.INVALID_INPUT);
      expectErr(fromRecord([1, 2]), ErrorCode.INVALID_INPUT);
      expectErr(fromRecord({ lower: '1', upper: 4 }), ErrorCode.INVALID_INPUT);
      expectErr(fromRecord({ lower: 1, upper: 4, expected: 'mid' }), ErrorCode.INVALID_INPUT);
    });

    it('should keep the validation error of an invalid triple', () => {
      expectErr(fromRecord({ lower: 4, upper: 1 }), ErrorCode.VALIDATION_ERROR);
    });
  });

  describe('fromTuple', () => {
    it('should accept two or three numbers', () => {
      expect(expectOk(fromTuple([0, 10, 2])).toTuple()).toEqual([0, 10, 2]);
      expect(expectOk(fromTuple([0, 10])).expected).toBe(5);
    });

    it('should reject malformed tuples', () => {
      expectErr(fromTuple([1]), ErrorCode.INVALID_INPUT);
      expectErr(fromTuple([1, 2, 3, 4]), ErrorCode.INVALID_INPUT);
      expectErr(fromTuple([1, 'two']), ErrorCode.INVALID_INPUT);
      expectErr(fromTuple('1,2'), ErrorCode.INVALID_INPUT);
    });
  });

  describe('JSON', () => {
    it('should write records and read them back', () => {
      const ain = AIN.of(0, 10, 2);
      const text = stringifyAIN(ain);

      expect(text).toBe('{"lower":0,"upper":10,"expected":2}');
      expect(expectOk(parseAIN(text)).equals(ain)).toBe(true);
    });

    it('should parse tuple text', () => {
      expect(expectOk(parseAIN('[1, 3, 2]')).toTuple()).toEqual([1, 3, 2]);
    });

    it('should report invalid JSON as invalid input', () => {
      const error = expectErr(parseAIN('{lower: 1'), ErrorCode.INVALID_INPUT);
      expect(error.message).toBe('AIN text is not valid JSON');
    });

    it('should expose plain-data forms', () => {
      const ain = AIN.of(1, 4, 2);
      expect(toRecord(ain)).toEqual({ lower: 1, upper: 4, expected: 2 });
      expect(toTuple(ain)).toEqual([1, 4, 2]);
    });
  });
});

describe('fitAIN', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should take the extremes as bounds and the mean as expected value', () => {
    expect(expectOk(fitAIN([1, 2, 3, 4, 10])).toTuple()).toEqual([1, 10, 4]);
  });

  it('should trim outliers before taking the bounds', () => {
    const data = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 100];
    const fitted = expectOk(fitAIN(data, { trim: 0.1 }));

    expect(fitted.lower).toBeCloseTo(1, 12);
    expect(fitted.upper).toBeCloseTo(9, 12);
    expect(fitted.expected).toBeCloseTo(5, 12);
  });

  it('should keep the expected value inside when the kept data sits on a bound', () => {
    // The 10% percentile is 0 and every kept value is 0, so the mean is the lower bound
    const data = [...new Array<number>(18).fill(0), 5, 10];
    const fitted = expectOk(fitAIN(data, { trim: 0.1 }));

    expect(fitted.lower).toBe(0);
    expect(fitted.upper).toBeCloseTo(0.5, 10);
    expect(fitted.expected).toBeGreaterThan(0);
    expect(fitted.expected).toBeCloseTo(0, 8);
  });

  it('should return a point for constant data without warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(expectOk(fitAIN([2, 2, 2])).toTuple()).toEqual([2, 2, 2]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn when given a single observation', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(expectOk(fitAIN([7])).toTuple()).toEqual([7, 7, 7]);
    expect(warn).toHaveBeenCalledWith(
      'fitAIN received a single observation; returning a point interval'
    );
  });

  it('should warn when trimming collapses the data', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const data = [0, 5, 5, 5, 5, 5, 5, 5, 5, 5, 10];

    expect(expectOk(fitAIN(data, { trim: 0.1 })).toTuple()).toEqual([5, 5, 5]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should reject an invalid trim fraction', () => {
    expectErr(fitAIN([1, 2, 3], { trim: 0.5 }), ErrorCode.INVALID_CONFIG);
    expectErr(fitAIN([1, 2, 3], { trim: -0.1 }), ErrorCode.INVALID_CONFIG);
  });

  it('should reject empty or non-finite data', () => {
    expectErr(fitAIN([]), ErrorCode.INVALID_INPUT);
    expectErr(fitAIN([1, Number.NaN, 3]), ErrorCode.INVALID_INPUT);
  });
});
