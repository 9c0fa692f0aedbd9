import { describe, it, expect } from 'vitest';

import type { CorruptionMergeRule } from '../../types/literal.js';
import { DEFAULT_OPTIONS } from '../../types/options.js';
import { buildCorruptionPattern, mergeSplitStrings } from '../corruption-merge.js';

const LEXER = DEFAULT_OPTIONS.lexer;

const CONTEXT_RULE: CorruptionMergeRule = {
  injectedField: { name: 'context', value: 'None' },
  openFragment: '{',
  closeFragment: '}',
};

describe('mergeSplitStrings', () => {
  it('rejoins a format string split by an injected field', () => {
    expect(
      mergeSplitStrings(
        'format!("abc{,\n    context: None\n  }def", x)',
        CONTEXT_RULE,
        LEXER
      )
    ).toEqual({ value: 'format!("abc{}def", x)', occurrences: 1 });
  });

  it('merges every occurrence in one pass', () => {
    expect(
      mergeSplitStrings(
        '"a{,\n context: None\n}b{\n context: None,\n}c"',
        CONTEXT_RULE,
        LEXER
      )
    ).toEqual({ value: '"a{}b{}c"', occurrences: 2 });
  });

  it('handles CRLF line endings', () => {
    expect(
      mergeSplitStrings('"a{,\r\n    context: None\r\n}b"', CONTEXT_RULE, LEXER)
    ).toEqual({ value: '"a{}b"', occurrences: 1 });
  });

  it('leaves a string that legitimately contains the field on one line', () => {
    const value = 'format!("{context: None}")';
    expect(mergeSplitStrings(value, CONTEXT_RULE, LEXER)).toEqual({
      value,
      occurrences: 0,
    });
  });

  it('never touches text outside string literals', () => {
    const value = 'f({\n context: None\n})';
    expect(mergeSplitStrings(value, CONTEXT_RULE, LEXER)).toEqual({
      value,
      occurrences: 0,
    });
  });
});

describe('buildCorruptionPattern', () => {
  it('matches fragments and values literally', () => {
    const rule: CorruptionMergeRule = {
      injectedField: { name: 'x', value: 'a.b' },
      openFragment: '(',
      closeFragment: ')',
    };

    expect(buildCorruptionPattern(rule).test('(\nx: a.b)')).toBe(true);
    expect(buildCorruptionPattern(rule).test('(\nx: aXb)')).toBe(false);
  });
});
