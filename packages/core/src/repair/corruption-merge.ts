/*
 * Heals the split-string corruption: an earlier edit stopped at a `}` inside
 * a string literal and spliced a field in front of it, e.g.
 *
 *   message: format!("bad header {,
 *       context: None
 *   }", name),
 *
 * which was `message: format!("bad header {}", name)` before the edit.
 */

import { stringRanges } from '../lexer/lexer.js';
import type { CorruptionMergeRule } from '../types/literal.js';
import type { ResolvedLexerOptions } from '../types/options.js';

export interface MergeOutcome {
  value: string;
  occurrences: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern for one injected fragment. The injected field always starts on a
 * new line after the open fragment, which is what keeps a string that
 * legitimately reads "{context: None}" out of reach.
 */
export function buildCorruptionPattern(rule: CorruptionMergeRule): RegExp {
  const { injectedField, openFragment, closeFragment } = rule;
  return new RegExp(
    escapeRegExp(openFragment) +
      '[ \\t]*,?[ \\t]*\\r?\\n\\s*' +
      escapeRegExp(injectedField.name) +
      '\\s*:\\s*' +
      escapeRegExp(injectedField.value) +
      '\\s*,?\\s*' +
      escapeRegExp(closeFragment),
    'g'
  );
}

/**
 * Rejoin every split fragment found inside the string literals of
 * `rawValue`. Text outside string literals is never touched.
 */
export function mergeSplitStrings(
  rawValue: string,
  rule: CorruptionMergeRule,
  lexer: ResolvedLexerOptions
): MergeOutcome {
  const pattern = buildCorruptionPattern(rule);
  const healed = rule.openFragment + rule.closeFragment;
  let occurrences = 0;
  let out = '';
  let cursor = 0;

  for (const range of stringRanges(rawValue, lexer)) {
    const literal = rawValue.slice(range.start, range.end);
    const merged = literal.replace(pattern, () => {
      occurrences += 1;
      return healed;
    });
    out += rawValue.slice(cursor, range.start) + merged;
    cursor = range.end;
  }
  out += rawValue.slice(cursor);

  return { value: occurrences > 0 ? out : rawValue, occurrences };
}
