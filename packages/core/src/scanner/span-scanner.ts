import { lex, isIdentifierChar } from '../lexer/lexer.js';
import { UnbalancedLiteralError } from '../types/errors.js';
import type { LiteralSpan } from '../types/literal.js';
import type { ResolvedLexerOptions } from '../types/options.js';
import { err, mapResult, ok, type Result } from '../types/result.js';

export interface ScanOptions {
  lexer: ResolvedLexerOptions;
  declarationKeywords: readonly string[];
}

export type ScanResult = Result<LiteralSpan[], UnbalancedLiteralError>;

interface OpenLiteral {
  tag: string;
  tagOffset: number;
  start: number;
  depth: number;
  /** Balanced like a literal but never reported (variant or pattern) */
  ignored: boolean;
}

/** A bracket opened outside any literal */
interface Enclosure {
  char: '{' | '(' | '[';
  /** `{` of an `enum Name` body: tags inside it declare variants */
  variantBody: boolean;
  /** `(` of a `matches!` call */
  matchesCall: boolean;
  afterComma: boolean;
}

/**
 * Collect the spans of every tagged literal in one left-to-right sweep.
 *
 * A literal opens at a `{` (outside strings, comments and char literals)
 * whose preceding non-blank text is one of `tags`, and closes at the `}`
 * that balances it. Tagged literals nested inside an open one belong to it,
 * so the returned spans never overlap and are ordered by offset.
 *
 * Brackets outside literals are tracked so that enum variant declarations
 * and patterns (the second argument of `matches!`, or a literal followed by
 * `=>`, `|` or a lone `=`) are balanced but not reported.
 */
export function scanLiterals(
  text: string,
  tags: readonly string[],
  options: ScanOptions
): ScanResult {
  const ordered = Array.from(new Set(tags.filter((tag) => tag.length > 0)));
  ordered.sort((a, b) => b.length - a.length);
  const keywords = new Set(options.declarationKeywords);

  const spans: LiteralSpan[] = [];
  const lines = createLineCounter(text);
  const enclosures: Enclosure[] = [];
  let open: OpenLiteral | undefined;

  for (const event of lex(text, options.lexer)) {
    if (event.kind !== 'punct') continue;

    if (open) {
      if (event.char === '{') {
        open.depth += 1;
      } else if (event.char === '}') {
        open.depth -= 1;
        if (open.depth === 0) {
          if (!open.ignored && !isPatternContext(text, event.index)) {
            spans.push({
              tag: open.tag,
              tagOffset: open.tagOffset,
              start: open.start,
              end: event.index,
              line: lines.lineAt(open.tagOffset),
            });
          }
          open = undefined;
        }
      }
      continue;
    }

    const enclosing = enclosures[enclosures.length - 1];
    switch (event.char) {
      case '{': {
        const match = matchTagBefore(text, event.index, ordered, keywords);
        if (match) {
          open = {
            tag: match.tag,
            tagOffset: match.offset,
            start: event.index,
            depth: 1,
            ignored:
              enclosing !== undefined &&
              (enclosing.variantBody ||
                (enclosing.matchesCall && enclosing.afterComma)),
          };
        } else {
          enclosures.push({
            char: '{',
            variantBody: isEnumBody(text, event.index),
            matchesCall: false,
            afterComma: false,
          });
        }
        break;
      }
      case '(':
      case '[':
        enclosures.push({
          char: event.char,
          variantBody: false,
          matchesCall:
            event.char === '(' && isMacroCall(text, event.index, 'matches!'),
          afterComma: false,
        });
        break;
      case '}':
      case ')':
      case ']':
        enclosures.pop();
        break;
      case ',':
        if (enclosing) enclosing.afterComma = true;
        break;
      case ':':
        break;
    }
  }

  if (open) {
    return err(
      new UnbalancedLiteralError({
        tag: open.tag,
        offset: open.start,
        line: lines.lineAt(open.tagOffset),
        valueExcerpt: text.slice(open.tagOffset, open.tagOffset + 60),
      })
    );
  }
  return ok(spans);
}

/**
 * The first literal tagged `tag` whose tag text starts at or after
 * `fromOffset`, or undefined. The text is always lexed from its start so
 * string and comment state is never guessed.
 */
export function findNextLiteral(
  text: string,
  tag: string,
  fromOffset: number,
  options: ScanOptions
): Result<LiteralSpan | undefined, UnbalancedLiteralError> {
  return mapResult(scanLiterals(text, [tag], options), (spans) =>
    spans.find((span) => span.tagOffset >= fromOffset)
  );
}

function matchTagBefore(
  text: string,
  braceIndex: number,
  tags: readonly string[],
  keywords: ReadonlySet<string>
): { tag: string; offset: number } | undefined {
  const tagEnd = skipBlankBackward(text, braceIndex - 1) + 1;

  for (const tag of tags) {
    const tagStart = tagEnd - tag.length;
    if (tagStart < 0) continue;
    if (text.slice(tagStart, tagEnd) !== tag) continue;
    if (
      tagStart > 0 &&
      isIdentifierChar(tag.charAt(0)) &&
      isIdentifierChar(text.charAt(tagStart - 1))
    ) {
      continue;
    }
    if (isDeclarationContext(text, tagStart, keywords)) return undefined;
    return { tag, offset: tagStart };
  }
  return undefined;
}

// `struct ParseError {`, `impl Display for ParseError {`, `-> ParseError {`
function isDeclarationContext(
  text: string,
  tagStart: number,
  keywords: ReadonlySet<string>
): boolean {
  const wordEnd = skipBlankBackward(text, tagStart - 1) + 1;
  if (text.slice(Math.max(0, wordEnd - 2), wordEnd) === '->') return true;

  let wordStart = wordEnd;
  while (wordStart > 0 && isIdentifierChar(text.charAt(wordStart - 1))) {
    wordStart -= 1;
  }
  if (wordStart === wordEnd) return false;
  return keywords.has(text.slice(wordStart, wordEnd));
}

// `ParseError { .. } =>`, `if let ParseError { message, .. } = err`,
// `ParseError { .. } | StateError { .. } =>`
function isPatternContext(text: string, closeIndex: number): boolean {
  let i = closeIndex + 1;
  while (i < text.length && /\s/.test(text.charAt(i))) i += 1;
  const ch = text.charAt(i);
  if (ch !== '=' && ch !== '|') return false;
  return text.charAt(i + 1) !== ch;
}

// `enum SsbcError {` or `pub enum Wrapper<T: Debug> {`
function isEnumBody(text: string, braceIndex: number): boolean {
  let i = skipBlankBackward(text, braceIndex - 1);
  if (text.charAt(i) === '>') {
    let depth = 0;
    for (; i >= 0; i--) {
      const ch = text.charAt(i);
      if (ch === '>') depth += 1;
      else if (ch === '<') depth -= 1;
      if (depth === 0) break;
    }
    i = skipBlankBackward(text, i - 1);
  }

  const nameEnd = i + 1;
  let nameStart = nameEnd;
  while (nameStart > 0 && isIdentifierChar(text.charAt(nameStart - 1))) {
    nameStart -= 1;
  }
  if (nameStart === nameEnd) return false;

  const keywordEnd = skipBlankBackward(text, nameStart - 1) + 1;
  if (keywordEnd === nameStart) return false;
  const keywordStart = keywordEnd - 'enum'.length;
  return (
    keywordStart >= 0 &&
    text.slice(keywordStart, keywordEnd) === 'enum' &&
    (keywordStart === 0 || !isIdentifierChar(text.charAt(keywordStart - 1)))
  );
}

function isMacroCall(text: string, parenIndex: number, macro: string): boolean {
  const end = skipBlankBackward(text, parenIndex - 1) + 1;
  const start = end - macro.length;
  return (
    start >= 0 &&
    text.slice(start, end) === macro &&
    (start === 0 || !isIdentifierChar(text.charAt(start - 1)))
  );
}

function skipBlankBackward(text: string, index: number): number {
  let i = index;
  while (i >= 0 && /\s/.test(text.charAt(i))) i -= 1;
  return i;
}

/**
 * 1-based line lookup for offsets requested in increasing order
 */
export function createLineCounter(text: string): {
  lineAt(offset: number): number;
} {
  let cursor = 0;
  let line = 1;
  return {
    lineAt(offset: number): number {
      if (offset < cursor) {
        cursor = 0;
        line = 1;
      }
      for (; cursor < offset && cursor < text.length; cursor++) {
        if (text.charCodeAt(cursor) === 10) line += 1;
      }
      return line;
    },
  };
}
