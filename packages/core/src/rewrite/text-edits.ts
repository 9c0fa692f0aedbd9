import { InternalError } from '../types/errors.js';

/** Replace `text[start, end)` with `replacement` */
export interface TextEdit {
  start: number;
  end: number;
  replacement: string;
}

/**
 * Apply staged edits computed against the same original text. Edits are
 * applied from the last offset to the first, so no offset ever shifts.
 *
 * @throws InternalError when two edits overlap or fall outside the text
 */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  if (edits.length === 0) return text;

  const ordered = [...edits].sort((a, b) => b.start - a.start);
  const parts: string[] = [];
  let tail = text.length;

  for (const edit of ordered) {
    if (edit.start < 0 || edit.end < edit.start || edit.end > tail) {
      throw new InternalError(
        `Edit [${edit.start}, ${edit.end}) overlaps another edit or leaves the text (length ${text.length})`
      );
    }
    parts.push(text.slice(edit.end, tail));
    parts.push(edit.replacement);
    tail = edit.start;
  }
  parts.push(text.slice(0, tail));

  return parts.reverse().join('');
}
