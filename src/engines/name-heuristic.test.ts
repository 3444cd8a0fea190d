import { describe, it, expect } from 'vitest';
import {
  checkName,
  DEFAULT_NAME_HEURISTIC_OPTIONS,
  DEFAULT_KEYBOARD_SEQUENCES,
  describeNameRejection,
  longestKeyboardRun,
  longestRepeatRun,
  normalizeName,
} from './name-heuristic.js';

describe('name heuristic', () => {
  describe('normalizeName', () => {
    it('lower-cases and strips separators', () => {
      expect(normalizeName("Jean-Claude O'Brien Jr.")).toEqual(Array.from('jeanclaudeobrienjr'));
    });

    it('splits into code points', () => {
      expect(normalizeName('李 白')).toEqual(['李', '白']);
    });
  });

  describe('accepted names', () => {
    it.each(['John Smith', 'María Rodríguez', "Jean-Claude O'Brien", '李 白', 'Bo', 'asdf Smith'])(
      'accepts %s',
      (value) => {
        expect(checkName(value)).toEqual({ accepted: true });
      }
    );
  });

  describe('rejected names', () => {
    it.each([
      ['x', 'too_short'],
      ['aaaaaaaa', 'low_entropy'],
      ['qwertyuiop', 'keyboard_pattern'],
      ['asdfghjkl', 'keyboard_pattern'],
      ['123456', 'keyboard_pattern'],
      ['!@#$%^', 'keyboard_pattern'],
      ['poiuytrewq', 'keyboard_pattern'],
      ['zaq1', 'keyboard_pattern'],
      ['Joooohn', 'repeating_chars'],
    ])('rejects %s as %s', (value, reason) => {
      expect(checkName(value)).toEqual({ accepted: false, reason });
    });

    it('reports the first failing check', () => {
      // Also a keyboard run and a repeat, but entropy is checked first
      expect(checkName('qqqqqqqq')).toEqual({ accepted: false, reason: 'low_entropy' });
    });
  });

  describe('options', () => {
    it('honours a custom minimum length', () => {
      expect(checkName('Li', { ...DEFAULT_NAME_HEURISTIC_OPTIONS, minLength: 3 })).toEqual({
        accepted: false,
        reason: 'too_short',
      });
    });

    it('honours a custom repeat limit', () => {
      const relaxed = { ...DEFAULT_NAME_HEURISTIC_OPTIONS, maxRepeatRun: 4 };
      expect(checkName('Joooohn', relaxed)).toEqual({ accepted: true });
    });
  });

  describe('helpers', () => {
    it('finds keyboard runs in either direction', () => {
      expect(longestKeyboardRun(Array.from('xqwerx'), DEFAULT_KEYBOARD_SEQUENCES)).toBe(4);
      expect(longestKeyboardRun(Array.from('lkjh'), DEFAULT_KEYBOARD_SEQUENCES)).toBe(4);
    });

    it('measures the longest repeated run', () => {
      expect(longestRepeatRun(Array.from('abbbcc'))).toBe(3);
      expect(longestRepeatRun([])).toBe(0);
    });

    it('describes every rejection reason', () => {
      expect(describeNameRejection('keyboard_pattern')).toBe('Name looks like a keyboard pattern');
    });
  });
});
