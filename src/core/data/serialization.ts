/**
 * Plain-data and JSON forms of an AIN
 *
 * Parsing returns a Result: malformed input is INVALID_INPUT, while a
 * well-formed triple that breaks the interval invariant keeps the
 * VALIDATION_ERROR from AIN.create.
 */

import { AIN, AINRecord, AINTuple } from '../ain/AIN';
import { AINError, ErrorCode } from '../errors';
import { Result, err } from '../result';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, context?: Record<string, unknown>): Result<AIN> {
  return err(new AINError(ErrorCode.INVALID_INPUT, message, context));
}

/**
 * Build an AIN from `{ lower, upper, expected? }`
 */
export function fromRecord(value: unknown): Result<AIN> {
  if (!isRecord(value)) {
    return invalid('AIN record must be an object with numeric lower and upper fields');
  }

  const { lower, upper, expected } = value;
  if (typeof lower !== 'number' || typeof upper !== 'number') {
    return invalid('AIN record must have numeric lower and upper fields', {
      lowerType: typeof lower,
      upperType: typeof upper,
    });
  }
  if (expected !== undefined && typeof expected !== 'number') {
    return invalid('AIN record field expected must be a number when present', {
      expectedType: typeof expected,
    });
  }

  return AIN.create(lower, upper, expected);
}

/**
 * Build an AIN from `[lower, upper]` or `[lower, upper, expected]`
 */
export function fromTuple(value: unknown): Result<AIN> {
  if (!Array.isArray(value) || value.length < 2 || value.length > 3) {
    return invalid('AIN tuple must be an array of two or three numbers');
  }

  const entries: unknown[] = value;
  if (!entries.every((entry): entry is number => typeof entry === 'number')) {
    return invalid('AIN tuple entries must all be numbers');
  }

  const [lower, upper] = entries;
  return AIN.create(lower, upper, entries.length === 3 ? entries[2] : undefined);
}

export function toRecord(ain: AIN): AINRecord {
  return ain.toJSON();
}

export function toTuple(ain: AIN): AINTuple {
  return ain.toTuple();
}

export function stringifyAIN(ain: AIN): string {
  return JSON.stringify(ain);
}

/**
 * Parse JSON text holding either a record or a tuple
 */
export function parseAIN(text: string): Result<AIN> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return invalid('AIN text is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return Array.isArray(parsed) ? fromTuple(parsed) : fromRecord(parsed);
}
