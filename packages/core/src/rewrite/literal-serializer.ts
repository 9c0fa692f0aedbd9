import type { Field, LiteralSpan } from '../types/literal.js';

export interface LiteralLayout {
  /** Indentation of the line holding the tag; the closing brace gets it too */
  openIndent: string;
  fieldIndent: string;
}

/**
 * Work out the layout of a literal being rewritten. Fields keep the
 * indentation of the first field when it already sits on its own line;
 * otherwise they are indented one `indentUnit` past the opening line.
 */
export function detectLayout(
  text: string,
  span: Pick<LiteralSpan, 'tagOffset' | 'start' | 'end'>,
  indentUnit: string
): LiteralLayout {
  const lineStart = text.lastIndexOf('\n', span.tagOffset - 1) + 1;
  const openIndent = /^[ \t]*/.exec(text.slice(lineStart, span.tagOffset))?.[0] ?? '';

  const interior = text.slice(span.start + 1, span.end);
  const firstContent = interior.search(/\S/);
  if (firstContent > 0) {
    const gap = interior.slice(0, firstContent);
    const lastNewline = gap.lastIndexOf('\n');
    if (lastNewline !== -1) {
      const indent = gap.slice(lastNewline + 1);
      if (/^[ \t]+$/.test(indent)) {
        return { openIndent, fieldIndent: indent };
      }
    }
  }

  return { openIndent, fieldIndent: openIndent + indentUnit };
}

/**
 * Render a field list as literal text from `{` to `}` inclusive: one field
 * per line, each followed by a comma, closing brace at `openIndent`.
 */
export function serializeLiteral(
  fields: readonly Field[],
  layout: LiteralLayout,
  trailingComments: readonly string[] = [],
  newline = '\n'
): string {
  const lines: string[] = ['{'];
  for (const field of fields) {
    for (const comment of field.comments) {
      lines.push(`${layout.fieldIndent}${comment}`);
    }
    lines.push(`${layout.fieldIndent}${field.name}: ${field.rawValue},`);
  }
  for (const comment of trailingComments) {
    lines.push(`${layout.fieldIndent}${comment}`);
  }
  lines.push(`${layout.openIndent}}`);
  return lines.join(newline);
}
