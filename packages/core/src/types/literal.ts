/**
 * Data model shared by the scan → decompose → repair → rewrite stages.
 */

import type { MalformedFieldError } from './errors.js';

/**
 * One balanced occurrence of a tagged literal in a source text.
 * `start` is the opening brace, `end` the matching closing brace (inclusive).
 */
export interface LiteralSpan {
  tag: string;
  tagOffset: number;
  start: number;
  end: number;
  /** 1-based line of the tag */
  line: number;
}

export interface Field {
  name: string;
  /** Value expression exactly as written, trimmed */
  rawValue: string;
  firstSeenIndex: number;
  /** Comments that sat between the previous separator and the field name */
  comments: string[];
}

export interface RequiredField {
  name: string;
  /** Expression inserted verbatim when the field is missing */
  defaultValue: string;
}

/**
 * Shape of the split-string corruption: `injectedField` was spliced in
 * between `openFragment` and `closeFragment` inside a string literal.
 */
export interface CorruptionMergeRule {
  injectedField: { name: string; value: string };
  openFragment: string;
  closeFragment: string;
}

export interface LiteralSchema {
  tag: string;
  requiredFields: RequiredField[];
  corruptionMerge?: CorruptionMergeRule;
}

export type RepairAction =
  | { kind: 'duplicate-removed'; field: string; firstSeenIndex: number }
  | { kind: 'corruption-merged'; field: string; occurrences: number }
  | { kind: 'field-inserted'; field: string; value: string };

export interface FieldRepairResult {
  fields: Field[];
  changed: boolean;
  actions: RepairAction[];
  /** Comments of dropped duplicates that no later field could carry */
  trailingComments: string[];
}

export interface RepairResult {
  changed: boolean;
  newText: string;
}

export type LiteralStatus = 'unchanged' | 'repaired' | 'skipped';

export interface LiteralReport {
  tag: string;
  line: number;
  start: number;
  end: number;
  status: LiteralStatus;
  actions: RepairAction[];
  malformed: MalformedFieldError[];
}

export interface SourceRepairResult extends RepairResult {
  literals: LiteralReport[];
}
