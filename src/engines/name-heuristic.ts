/**
 * Name Heuristic
 *
 * Flags strings that are unlikely to be a human name: too short, built from
 * very few distinct characters, typed along a keyboard row, or padded with
 * repeated characters. Checks run in that order and stop at the first hit.
 *
 * Deliberately simple: no dictionary and no scoring model. A short or unusual
 * name passes as long as it trips none of the explicit checks. Names written
 * in scripts the keyboard tables don't cover are only subject to the length,
 * distinct-character and repetition checks.
 */

export type NameRejectionReason =
  | 'too_short'
  | 'low_entropy'
  | 'keyboard_pattern'
  | 'repeating_chars';

export interface NameHeuristicOptions {
  /** Minimum normalized length in code points */
  minLength: number;
  /** Minimum ratio of distinct characters to total characters */
  minDistinctRatio: number;
  /** Shortest keyboard run that can count as a pattern */
  keyboardRunLength: number;
  /** Share of the normalized string the keyboard run must cover */
  keyboardCoverage: number;
  /** Longest allowed run of one repeated character */
  maxRepeatRun: number;
  /** Keyboard rows/columns; each is also matched reversed */
  keyboardSequences: readonly string[];
}

export const DEFAULT_KEYBOARD_SEQUENCES: readonly string[] = [
  '`1234567890-=',
  '~!@#$%^&*()_+',
  'qwertyuiop[]\\',
  "asdfghjkl;'",
  'zxcvbnm,./',
  '1qaz',
  '2wsx',
  '3edc',
  '4rfv',
  '5tgb',
  '6yhn',
  '7ujm',
  '8ik,',
  '9ol.',
  '0p;/',
];

export const DEFAULT_NAME_HEURISTIC_OPTIONS: NameHeuristicOptions = {
  minLength: 2,
  minDistinctRatio: 0.3,
  keyboardRunLength: 4,
  keyboardCoverage: 0.5,
  maxRepeatRun: 2,
  keyboardSequences: DEFAULT_KEYBOARD_SEQUENCES,
};

export type NameCheckResult =
  | { accepted: true }
  | { accepted: false; reason: NameRejectionReason };

const NAME_SEPARATORS = /[\s\-'’.]/gu;

/**
 * Lower-case and drop separators, returning code points
 */
export function normalizeName(value: string): string[] {
  return Array.from(value.toLowerCase().replace(NAME_SEPARATORS, ''));
}

/**
 * Length of the longest contiguous slice that also appears in a keyboard
 * sequence, read forwards or backwards.
 */
export function longestKeyboardRun(chars: readonly string[], sequences: readonly string[]): number {
  const haystacks = sequences.flatMap((seq) => [seq, Array.from(seq).reverse().join('')]);
  let best = 0;

  for (let start = 0; start < chars.length; start++) {
    for (let end = start + best + 1; end <= chars.length; end++) {
      const slice = chars.slice(start, end).join('');
      if (!haystacks.some((seq) => seq.includes(slice))) {
        break;
      }
      best = end - start;
    }
  }

  return best;
}

export function longestRepeatRun(chars: readonly string[]): number {
  let best = 0;
  let run = 0;
  let previous: string | undefined;

  for (const char of chars) {
    run = char === previous ? run + 1 : 1;
    previous = char;
    best = Math.max(best, run);
  }

  return best;
}

export function checkName(
  value: string,
  options: NameHeuristicOptions = DEFAULT_NAME_HEURISTIC_OPTIONS
): NameCheckResult {
  const chars = normalizeName(value);

  if (chars.length < options.minLength) {
    return { accepted: false, reason: 'too_short' };
  }

  const distinct = new Set(chars).size;
  if (distinct / chars.length < options.minDistinctRatio) {
    return { accepted: false, reason: 'low_entropy' };
  }

  const keyboardRun = longestKeyboardRun(chars, options.keyboardSequences);
  if (
    keyboardRun >= options.keyboardRunLength &&
    keyboardRun / chars.length >= options.keyboardCoverage
  ) {
    return { accepted: false, reason: 'keyboard_pattern' };
  }

  if (longestRepeatRun(chars) > options.maxRepeatRun) {
    return { accepted: false, reason: 'repeating_chars' };
  }

  return { accepted: true };
}

const REJECTION_MESSAGES: Record<NameRejectionReason, string> = {
  too_short: 'Name is too short',
  low_entropy: 'Name uses too few distinct characters',
  keyboard_pattern: 'Name looks like a keyboard pattern',
  repeating_chars: 'Name repeats the same character too many times',
};

export function describeNameRejection(reason: NameRejectionReason): string {
  return REJECTION_MESSAGES[reason];
}
