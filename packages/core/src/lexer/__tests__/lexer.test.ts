import { describe, it, expect } from 'vitest';

import { DEFAULT_OPTIONS } from '../../types/options.js';
import {
  charLiteralLength,
  lex,
  stringRanges,
  type LexEvent,
} from '../lexer.js';

const LEXER = DEFAULT_OPTIONS.lexer;

function events(text: string, options = LEXER): LexEvent[] {
  return Array.from(lex(text, options));
}

describe('lex', () => {
  it('reports punctuation outside strings and the string range itself', () => {
    expect(events('a{b:"x{y}",c}')).toEqual([
      { kind: 'punct', char: '{', index: 1 },
      { kind: 'punct', char: ':', index: 3 },
      { kind: 'string', start: 4, end: 10, terminated: true },
      { kind: 'punct', char: ',', index: 10 },
      { kind: 'punct', char: '}', index: 12 },
    ]);
  });

  it('treats :: as a path separator, not a colon', () => {
    expect(events('a::b: c')).toEqual([
      { kind: 'punct', char: ':', index: 4 },
    ]);
  });

  it('hides braces inside line and block comments', () => {
    expect(events('x // }\n}')).toEqual([
      { kind: 'comment', start: 2, end: 6 },
      { kind: 'punct', char: '}', index: 7 },
    ]);
    expect(events('/* { */}')).toEqual([
      { kind: 'comment', start: 0, end: 7 },
      { kind: 'punct', char: '}', index: 7 },
    ]);
  });

  it('keeps an escaped quote inside the string', () => {
    expect(events('"a\\"}"}')).toEqual([
      { kind: 'string', start: 0, end: 6, terminated: true },
      { kind: 'punct', char: '}', index: 6 },
    ]);
  });

  it('skips character literals but not lifetimes', () => {
    expect(events("'{' }")).toEqual([
      { kind: 'punct', char: '}', index: 4 },
    ]);
    expect(events("'a }")).toEqual([
      { kind: 'punct', char: '}', index: 3 },
    ]);
  });

  it('lexes raw strings without escapes', () => {
    expect(events('r"C:\\"}')).toEqual([
      { kind: 'string', start: 0, end: 6, terminated: true },
      { kind: 'punct', char: '}', index: 6 },
    ]);
    expect(events('r#"a "}" b"#}')).toEqual([
      { kind: 'string', start: 0, end: 12, terminated: true },
      { kind: 'punct', char: '}', index: 12 },
    ]);
    expect(events('br"\\"')).toEqual([
      { kind: 'string', start: 1, end: 5, terminated: true },
    ]);
    expect(events('r#"abc"')).toEqual([
      { kind: 'string', start: 0, end: 7, terminated: false },
    ]);
  });

  it('does not mistake raw identifiers or words ending in r for raw strings', () => {
    expect(events('r#type: x')).toEqual([
      { kind: 'punct', char: ':', index: 6 },
    ]);
    expect(events('bar"x"')).toEqual([
      { kind: 'string', start: 3, end: 6, terminated: true },
    ]);
  });

  it('treats r"..." as an escaped string when raw strings are disabled', () => {
    expect(events('r"\\"}"', { ...LEXER, rawStrings: false })).toEqual([
      { kind: 'string', start: 1, end: 6, terminated: true },
    ]);
  });

  it('reports an unterminated string up to the end of the range', () => {
    expect(events('"abc')).toEqual([
      { kind: 'string', start: 0, end: 4, terminated: false },
    ]);
  });

  it('sees braces in comment text when comments are disabled', () => {
    expect(events('// {', { ...LEXER, comments: false })).toEqual([
      { kind: 'punct', char: '{', index: 3 },
    ]);
  });

  it('honours start and end bounds with absolute offsets', () => {
    expect(Array.from(lex('xx{y}zz', LEXER, 2, 5))).toEqual([
      { kind: 'punct', char: '{', index: 2 },
      { kind: 'punct', char: '}', index: 4 },
    ]);
  });
});

describe('charLiteralLength', () => {
  it('measures plain, escaped and unicode-escaped literals', () => {
    expect(charLiteralLength("'x'", 0)).toBe(3);
    expect(charLiteralLength("'\\n'", 0)).toBe(4);
    expect(charLiteralLength("'\\u{1F600}'", 0)).toBe(11);
  });

  it('measures a literal holding a surrogate pair', () => {
    expect(charLiteralLength("'😀'", 0)).toBe(4);
  });

  it('returns 0 for lifetimes and stray quotes', () => {
    expect(charLiteralLength("'a>", 0)).toBe(0);
    expect(charLiteralLength("''", 0)).toBe(0);
    expect(charLiteralLength('x', 0)).toBe(0);
  });
});

describe('stringRanges', () => {
  it('lists every string literal in order', () => {
    expect(stringRanges('f("a", "b")', LEXER)).toEqual([
      { start: 2, end: 5, terminated: true },
      { start: 7, end: 10, terminated: true },
    ]);
  });
});
