/**
 * Fit an AIN to empirical observations
 *
 * Bounds come from the extremes of the data (or from symmetric percentiles
 * when trimming), and the expected value is the mean of the observations
 * kept inside those bounds.
 */

import jStat from 'jstat';
import { AIN } from '../ain/AIN';
import { AINError, ErrorCode } from '../errors';
import { Result, err } from '../result';

export interface FitOptions {
  /**
   * Fraction cut from each tail before taking the bounds, in [0, 0.5)
   */
  trim?: number;
}

export function fitAIN(data: readonly number[], options: FitOptions = {}): Result<AIN> {
  const trim = options.trim ?? 0;

  if (!(trim >= 0 && trim < 0.5)) {
    return err(
      new AINError(ErrorCode.INVALID_CONFIG, `Trim fraction must be in [0, 0.5), got ${trim}`, {
        trim,
      })
    );
  }

  if (data.length === 0) {
    return err(new AINError(ErrorCode.INVALID_INPUT, 'Cannot fit an AIN to empty data'));
  }

  if (!data.every(Number.isFinite)) {
    return err(
      new AINError(ErrorCode.INVALID_INPUT, 'Observations must all be finite numbers', {
        count: data.length,
      })
    );
  }

  const values = [...data];
  if (values.length === 1) {
    console.warn('fitAIN received a single observation; returning a point interval');
    return AIN.create(values[0], values[0], values[0]);
  }

  const lower = trim > 0 ? jStat.percentile(values, trim) : jStat.min(values);
  const upper = trim > 0 ? jStat.percentile(values, 1 - trim) : jStat.max(values);
  const kept = values.filter((v) => v >= lower && v <= upper);

  if (lower === upper) {
    if (trim > 0 && jStat.min(values) !== jStat.max(values)) {
      console.warn(`fitAIN trimmed ${trim} from each tail and collapsed the data to a point`);
    }
    return AIN.create(lower, lower, lower);
  }

  // Data piled on a bound puts the mean on it; derive moves it inside
  return AIN.derive(lower, upper, jStat.mean(kept));
}
