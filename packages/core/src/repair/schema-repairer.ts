import { DEFAULT_OPTIONS, type ResolvedLexerOptions } from '../types/options.js';
import type {
  Field,
  FieldRepairResult,
  LiteralSchema,
  RepairAction,
} from '../types/literal.js';
import { mergeSplitStrings } from './corruption-merge.js';

export interface RepairFieldsOptions {
  lexer?: ResolvedLexerOptions;
}

/**
 * Bring a decomposed field list in line with its schema.
 *
 * Rules, in order:
 * 1. duplicate names keep their first occurrence only;
 * 2. split-string corruption is merged back (when the schema has a rule);
 * 3. missing required fields are appended in schema order with defaults.
 *
 * Fields are never reordered. With no action taken the input is returned
 * as-is and `changed` is false, so callers keep the original text.
 */
export function repairFields(
  fields: readonly Field[],
  schema: LiteralSchema,
  options: RepairFieldsOptions = {}
): FieldRepairResult {
  const lexer = options.lexer ?? DEFAULT_OPTIONS.lexer;
  const actions: RepairAction[] = [];

  const seen = new Set<string>();
  const unique: Field[] = [];
  // Comments of a dropped duplicate move down to the next field kept
  let orphaned: string[] = [];
  const ordered = [...fields].sort(
    (a, b) => a.firstSeenIndex - b.firstSeenIndex
  );
  for (const field of ordered) {
    if (seen.has(field.name)) {
      actions.push({
        kind: 'duplicate-removed',
        field: field.name,
        firstSeenIndex: field.firstSeenIndex,
      });
      orphaned = orphaned.concat(field.comments);
      continue;
    }
    seen.add(field.name);
    unique.push(
      orphaned.length > 0
        ? { ...field, comments: orphaned.concat(field.comments) }
        : field
    );
    orphaned = [];
  }

  const rule = schema.corruptionMerge;
  const merged = rule
    ? unique.map((field) => {
        const outcome = mergeSplitStrings(field.rawValue, rule, lexer);
        if (outcome.occurrences === 0) return field;
        actions.push({
          kind: 'corruption-merged',
          field: field.name,
          occurrences: outcome.occurrences,
        });
        return { ...field, rawValue: outcome.value };
      })
    : unique;

  let nextIndex =
    fields.reduce((max, field) => Math.max(max, field.firstSeenIndex), -1) + 1;
  const result = [...merged];
  for (const required of schema.requiredFields) {
    if (seen.has(required.name)) continue;
    seen.add(required.name);
    result.push({
      name: required.name,
      rawValue: required.defaultValue,
      firstSeenIndex: nextIndex,
      comments: orphaned,
    });
    orphaned = [];
    nextIndex += 1;
    actions.push({
      kind: 'field-inserted',
      field: required.name,
      value: required.defaultValue,
    });
  }

  if (actions.length === 0) {
    return { fields: [...fields], changed: false, actions, trailingComments: [] };
  }
  return { fields: result, changed: true, actions, trailingComments: orphaned };
}
