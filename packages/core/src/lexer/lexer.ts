/*
 * Lexical state machine shared by the span scanner, the field decomposer and
 * the corruption merge. It does not tokenize a language; it only tells its
 * callers where structural punctuation, string literals and comments are.
 */

import type { ResolvedLexerOptions } from '../types/options.js';

export type LexState =
  | 'normal'
  | 'string'
  | 'escaped'
  | 'line-comment'
  | 'block-comment';

export type Punct = '{' | '}' | '(' | ')' | '[' | ']' | ',' | ':';

export type LexEvent =
  | { kind: 'punct'; char: Punct; index: number }
  | { kind: 'string'; start: number; end: number; terminated: boolean }
  | { kind: 'comment'; start: number; end: number };

const PUNCT: ReadonlySet<string> = new Set([
  '{',
  '}',
  '(',
  ')',
  '[',
  ']',
  ',',
  ':',
]);

function isPunct(ch: string): ch is Punct {
  return PUNCT.has(ch);
}

export const OPENERS: ReadonlySet<Punct> = new Set(['{', '(', '[']);
export const CLOSERS: ReadonlySet<Punct> = new Set(['}', ')', ']']);

export function isIdentifierChar(ch: string): boolean {
  return /^[A-Za-z0-9_$]$/.test(ch);
}

/**
 * Walk `text[start, end)` and yield structural events. `::` is a path
 * separator and never yields a colon. Ranges are absolute offsets; string
 * ranges include their quotes and `end` is exclusive.
 */
export function* lex(
  text: string,
  options: ResolvedLexerOptions,
  start = 0,
  end = text.length
): Generator<LexEvent, void, undefined> {
  let state: LexState = 'normal';
  let tokenStart = start;
  let quote = '';
  let i = start;

  while (i < end) {
    const ch = text.charAt(i);
    const next = i + 1 < end ? text.charAt(i + 1) : '';

    switch (state) {
      case 'normal': {
        if (options.comments && ch === '/' && next === '/') {
          state = 'line-comment';
          tokenStart = i;
          i += 2;
          continue;
        }
        if (options.comments && ch === '/' && next === '*') {
          state = 'block-comment';
          tokenStart = i;
          i += 2;
          continue;
        }
        if (options.rawStrings && ch === 'r') {
          const raw = rawStringAt(text, i, end);
          if (raw) {
            yield { kind: 'string', start: i, end: raw.end, terminated: raw.terminated };
            i = raw.end;
            continue;
          }
        }
        if (options.quotes.includes(ch)) {
          state = 'string';
          quote = ch;
          tokenStart = i;
          i += 1;
          continue;
        }
        if (options.charLiterals && ch === "'") {
          i += Math.max(1, charLiteralLength(text, i, end));
          continue;
        }
        if (ch === ':' && next === ':') {
          i += 2;
          continue;
        }
        if (isPunct(ch)) {
          yield { kind: 'punct', char: ch, index: i };
        }
        i += 1;
        continue;
      }
      case 'string': {
        if (ch === '\\') {
          state = 'escaped';
        } else if (ch === quote) {
          yield { kind: 'string', start: tokenStart, end: i + 1, terminated: true };
          state = 'normal';
        }
        i += 1;
        continue;
      }
      case 'escaped': {
        state = 'string';
        i += 1;
        continue;
      }
      case 'line-comment': {
        if (ch === '\n') {
          yield { kind: 'comment', start: tokenStart, end: i };
          state = 'normal';
        }
        i += 1;
        continue;
      }
      case 'block-comment': {
        if (ch === '*' && next === '/') {
          yield { kind: 'comment', start: tokenStart, end: i + 2 };
          state = 'normal';
          i += 2;
          continue;
        }
        i += 1;
        continue;
      }
    }
  }

  if (state === 'string' || state === 'escaped') {
    yield { kind: 'string', start: tokenStart, end, terminated: false };
  } else if (state === 'line-comment' || state === 'block-comment') {
    yield { kind: 'comment', start: tokenStart, end };
  }
}

/**
 * Length of the character literal opening at `index` ('x', '\n', '\u{1F600}'),
 * or 0 when the quote does not open one (a lifetime such as 'a).
 */
export function charLiteralLength(
  text: string,
  index: number,
  end = text.length
): number {
  if (text.charAt(index) !== "'") return 0;
  const first = text.charAt(index + 1);
  if (first === '' || first === "'" || first === '\n') return 0;

  if (first === '\\') {
    const limit = Math.min(end, index + 12);
    for (let j = index + 3; j < limit; j++) {
      if (text.charAt(j) === "'") return j - index + 1;
      if (text.charAt(j) === '\n') return 0;
    }
    return 0;
  }

  const codePoint = text.codePointAt(index + 1) ?? 0;
  const width = codePoint > 0xffff ? 2 : 1;
  const closing = index + 1 + width;
  if (closing < end && text.charAt(closing) === "'") {
    return closing - index + 1;
  }
  return 0;
}

/**
 * Extent of the raw string opening at `index` (r"..", r#".."#, br".."),
 * or undefined when the `r` does not open one. Raw strings have no
 * escapes: they close at a quote followed by as many `#` as opened them.
 */
export function rawStringAt(
  text: string,
  index: number,
  end = text.length
): { end: number; terminated: boolean } | undefined {
  if (text.charAt(index) !== 'r') return undefined;
  const before = index > 0 ? text.charAt(index - 1) : '';
  if (isIdentifierChar(before)) {
    const byteRaw =
      before === 'b' && (index < 2 || !isIdentifierChar(text.charAt(index - 2)));
    if (!byteRaw) return undefined;
  }

  let j = index + 1;
  while (j < end && text.charAt(j) === '#') j += 1;
  if (j >= end || text.charAt(j) !== '"') return undefined;

  const closing = '"' + '#'.repeat(j - index - 1);
  const close = text.indexOf(closing, j + 1);
  if (close === -1 || close + closing.length > end) {
    return { end, terminated: false };
  }
  return { end: close + closing.length, terminated: true };
}

/** String-literal ranges of `text[start, end)` */
export function stringRanges(
  text: string,
  options: ResolvedLexerOptions,
  start = 0,
  end = text.length
): Array<{ start: number; end: number; terminated: boolean }> {
  const ranges: Array<{ start: number; end: number; terminated: boolean }> =
    [];
  for (const event of lex(text, options, start, end)) {
    if (event.kind === 'string') {
      ranges.push({
        start: event.start,
        end: event.end,
        terminated: event.terminated,
      });
    }
  }
  return ranges;
}
