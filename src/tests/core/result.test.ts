import { describe, it, expect } from 'vitest';
import { AINError, ErrorCode } from '../../core/errors';
import {
  Result,
  andThen,
  err,
  isErr,
  isOk,
  map,
  ok,
  unwrap,
  unwrapOr,
} from '../../core/result';

const failure = new AINError(ErrorCode.DOMAIN_ERROR, 'failed');

describe('Result', () => {
  it('should tag successes and failures', () => {
    const success: Result<number> = ok(3);
    const failed: Result<number> = err(failure);

    expect(success).toEqual({ tag: 'Ok', value: 3 });
    expect(isOk(success)).toBe(true);
    expect(isErr(success)).toBe(false);
    expect(isErr(failed)).toBe(true);
  });

  it('should map only successful values', () => {
    expect(map(ok(3), (v) => v * 2)).toEqual(ok(6));

    const failed: Result<number> = err(failure);
    expect(map(failed, (v: number) => v * 2)).toBe(failed);
  });

  it('should stop a chain at the first failure', () => {
    const half = (v: number): Result<number> =>
      v % 2 === 0 ? ok(v / 2) : err(new AINError(ErrorCode.RANGE_ERROR, `${v} is odd`));

    expect(andThen(andThen(ok(12), half), half)).toEqual(ok(3));

    const chained = andThen(andThen(ok(6), half), half);
    expect(chained.tag).toBe('Err');
    if (chained.tag === 'Err') {
      expect(chained.error.message).toBe('3 is odd');
    }
  });

  it('should unwrap values and throw carried errors', () => {
    expect(unwrap(ok('value'))).toBe('value');
    expect(() => unwrap(err(failure))).toThrow(failure);
  });

  it('should fall back on failure with unwrapOr', () => {
    expect(unwrapOr(ok(1), 0)).toBe(1);
    expect(unwrapOr(err(failure), 0)).toBe(0);
  });
});
