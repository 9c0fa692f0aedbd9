import { CLOSERS, OPENERS, lex } from '../lexer/lexer.js';
import { MalformedFieldError } from '../types/errors.js';
import type { Field } from '../types/literal.js';
import type { ResolvedLexerOptions } from '../types/options.js';

export interface DecomposeResult {
  fields: Field[];
  malformed: MalformedFieldError[];
  /** Comments left after the last field */
  trailingComments: string[];
}

interface Range {
  start: number;
  end: number;
}

interface Segment extends Range {
  colon?: number;
  comments: Range[];
}

// Plain identifiers plus raw identifiers (r#type)
const FIELD_NAME = /^(?:r#)?[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Split a literal interior (the text between its braces) into ordered
 * `name: value` fields.
 *
 * Separators are the commas found at depth zero outside strings and
 * comments; the name ends at the segment's first depth-zero colon. Values
 * keep their own commas, colons and nested braces untouched.
 */
export function decompose(
  interior: string,
  lexer: ResolvedLexerOptions
): DecomposeResult {
  const fields: Field[] = [];
  const malformed: MalformedFieldError[] = [];
  let pendingComments: string[] = [];
  let ordinal = 0;

  for (const segment of splitTopLevel(interior, lexer)) {
    const nameEnd = segment.colon ?? segment.end;
    const leading = segment.comments.filter((c) => c.start < nameEnd);
    const commentTexts = textsOf(interior, leading);
    const nameText = removeRanges(interior, segment.start, nameEnd, leading).trim();

    if (segment.colon === undefined && nameText === '') {
      pendingComments = pendingComments.concat(commentTexts);
      continue;
    }

    const index = ordinal;
    ordinal += 1;

    if (segment.colon === undefined || !FIELD_NAME.test(nameText)) {
      malformed.push(
        new MalformedFieldError({
          segment: interior.slice(segment.start, segment.end),
          segmentIndex: index,
          reason: segment.colon === undefined ? 'missing-colon' : 'invalid-name',
        })
      );
      pendingComments = [];
      continue;
    }

    // Comments after the value move out of it, so a rewrite can put the
    // separator comma right after the value.
    let valueEnd = segment.end;
    const trailing: Range[] = [];
    const afterColon = segment.comments.filter((c) => c.start > nameEnd);
    for (let i = afterColon.length - 1; i >= 0; i--) {
      const comment = afterColon[i];
      if (!comment || interior.slice(comment.end, valueEnd).trim() !== '') break;
      trailing.unshift(comment);
      valueEnd = comment.start;
    }

    fields.push({
      name: nameText,
      rawValue: interior.slice(segment.colon + 1, valueEnd).trim(),
      firstSeenIndex: index,
      comments: pendingComments.concat(commentTexts),
    });
    pendingComments = textsOf(interior, trailing);
  }

  return { fields, malformed, trailingComments: pendingComments };
}

function splitTopLevel(text: string, lexer: ResolvedLexerOptions): Segment[] {
  const segments: Segment[] = [];
  let current: Segment = { start: 0, end: text.length, comments: [] };
  let depth = 0;

  for (const event of lex(text, lexer)) {
    if (event.kind === 'comment') {
      if (depth === 0) {
        current.comments.push({ start: event.start, end: event.end });
      }
      continue;
    }
    if (event.kind !== 'punct') continue;

    if (OPENERS.has(event.char)) {
      depth += 1;
    } else if (CLOSERS.has(event.char)) {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0 && event.char === ',') {
      current.end = event.index;
      segments.push(current);
      current = { start: event.index + 1, end: text.length, comments: [] };
    } else if (depth === 0 && event.char === ':' && current.colon === undefined) {
      current.colon = event.index;
    }
  }

  segments.push(current);
  return segments;
}

function textsOf(text: string, ranges: readonly Range[]): string[] {
  return ranges.map((range) => text.slice(range.start, range.end).trim());
}

function removeRanges(
  text: string,
  start: number,
  end: number,
  ranges: readonly Range[]
): string {
  let out = '';
  let cursor = start;
  for (const range of ranges) {
    if (range.start > cursor) out += text.slice(cursor, Math.min(range.start, end));
    cursor = Math.max(cursor, range.end);
  }
  if (cursor < end) out += text.slice(cursor, end);
  return out;
}
