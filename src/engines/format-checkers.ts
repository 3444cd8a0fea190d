/**
 * Format Checkers
 *
 * Pure checks over a single, already type-checked scalar. Each returns null
 * on acceptance or a CheckFailure naming the violated constraint.
 */

import { z } from 'zod';
import type { EnumValue, StructuralErrorKind } from '../types/index.js';

/**
 * A rejected value: the violation kind plus text for humans and clients
 */
export interface CheckFailure {
  type: StructuralErrorKind;
  msg: string;
  suggestion: string;
  /** Extra machine-readable detail, e.g. the name heuristic's reason code */
  ctx?: Record<string, string> | undefined;
}

export type CheckOutcome = CheckFailure | null;

const EmailSchema = z.string().email();

/** Strict YYYY-MM-DD calendar date (leap years included) */
const IsoDateSchema = z.string().date();

const DAY_FIRST_DATE = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/;
const YEAR_FIRST_DATE = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;

export function checkEmail(value: string): CheckOutcome {
  if (EmailSchema.safeParse(value).success) {
    return null;
  }
  return {
    type: 'invalid_email',
    msg: 'Value is not a valid email address',
    suggestion: 'Provide an address of the form name@example.com',
  };
}

export function isIsoDate(value: string): boolean {
  return IsoDateSchema.safeParse(value).success;
}

/**
 * Re-order a day-first or slash-separated date into YYYY-MM-DD, if the
 * result is a real calendar date.
 */
export function suggestIsoDate(value: string): string | null {
  const trimmed = value.trim();
  let year: string | undefined;
  let month: string | undefined;
  let day: string | undefined;

  const dayFirst = DAY_FIRST_DATE.exec(trimmed);
  const yearFirst = YEAR_FIRST_DATE.exec(trimmed);
  if (dayFirst) {
    [, day, month, year] = dayFirst;
  } else if (yearFirst) {
    [, year, month, day] = yearFirst;
  }

  if (!year || !month || !day) {
    return null;
  }

  const candidate = `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  return isIsoDate(candidate) ? candidate : null;
}

export function checkDate(value: string): CheckOutcome {
  if (isIsoDate(value)) {
    return null;
  }
  const candidate = suggestIsoDate(value);
  return {
    type: 'invalid_date',
    msg: 'Value is not a valid date in YYYY-MM-DD format',
    suggestion: candidate
      ? `Use the ISO format YYYY-MM-DD; did you mean "${candidate}"?`
      : 'Use the ISO format YYYY-MM-DD, e.g. "2023-10-15"',
  };
}

/**
 * Compile a user-supplied pattern so that it must match the whole value.
 *
 * @throws {SyntaxError} If the pattern is not a valid regular expression
 */
export function compileAnchoredPattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}

export function checkPattern(value: string, anchored: RegExp, source: string): CheckOutcome {
  if (anchored.test(value)) {
    return null;
  }
  return {
    type: 'pattern_mismatch',
    msg: `Value does not match pattern ${source}`,
    suggestion: `Provide a value that fully matches ${source}`,
  };
}

/**
 * Numeric bounds: min/max inclusive, gt/lt exclusive
 */
export interface NumericBounds {
  min?: number | undefined;
  max?: number | undefined;
  gt?: number | undefined;
  lt?: number | undefined;
}

export function checkRange(value: number, bounds: NumericBounds): CheckOutcome {
  const outOfRange = (msg: string, suggestion: string): CheckFailure => ({
    type: 'out_of_range',
    msg,
    suggestion,
  });

  if (bounds.gt !== undefined && !(value > bounds.gt)) {
    return outOfRange(
      `Value must be greater than ${bounds.gt}`,
      `Use a value greater than ${bounds.gt}`
    );
  }
  if (bounds.min !== undefined && value < bounds.min) {
    return outOfRange(
      `Value must be greater than or equal to ${bounds.min}`,
      `Use a value of at least ${bounds.min}`
    );
  }
  if (bounds.lt !== undefined && !(value < bounds.lt)) {
    return outOfRange(
      `Value must be less than ${bounds.lt}`,
      `Use a value less than ${bounds.lt}`
    );
  }
  if (bounds.max !== undefined && value > bounds.max) {
    return outOfRange(
      `Value must be less than or equal to ${bounds.max}`,
      `Use a value of at most ${bounds.max}`
    );
  }
  return null;
}

export function checkEnum(value: EnumValue, allowed: readonly EnumValue[]): CheckOutcome {
  if (allowed.includes(value)) {
    return null;
  }
  const listed = allowed.map((item) => JSON.stringify(item)).join(', ');
  return {
    type: 'not_in_enum',
    msg: `Value must be one of: ${listed}`,
    suggestion: `Use one of the allowed values: ${listed}`,
  };
}

/**
 * Inclusive length bounds for strings (code points) and arrays (items)
 */
export interface LengthBounds {
  minLength?: number | undefined;
  maxLength?: number | undefined;
}

export function measureLength(value: string | readonly unknown[]): number {
  return typeof value === 'string' ? Array.from(value).length : value.length;
}

export function checkLength(value: string | readonly unknown[], bounds: LengthBounds): CheckOutcome {
  const length = measureLength(value);
  const noun = typeof value === 'string' ? 'String' : 'Array';
  const unit = typeof value === 'string' ? 'character' : 'item';
  const plural = (n: number): string => `${n} ${unit}${n === 1 ? '' : 's'}`;

  if (bounds.minLength !== undefined && length < bounds.minLength) {
    return {
      type: 'length_violation',
      msg: `${noun} should have at least ${plural(bounds.minLength)}`,
      suggestion: `Lengthen the value to at least ${plural(bounds.minLength)} (currently ${length})`,
    };
  }
  if (bounds.maxLength !== undefined && length > bounds.maxLength) {
    return {
      type: 'length_violation',
      msg: `${noun} should have at most ${plural(bounds.maxLength)}`,
      suggestion: `Shorten the value to at most ${plural(bounds.maxLength)} (currently ${length})`,
    };
  }
  return null;
}
