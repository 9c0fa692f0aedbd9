import type { CorruptionMergeRule, LiteralSchema } from '../types/literal.js';

// The faulty edit this heals inserted `context: None` after a `{` that sat
// inside a format string.
const CONTEXT_SPLIT_RULE: CorruptionMergeRule = {
  injectedField: { name: 'context', value: 'None' },
  openFragment: '{',
  closeFragment: '}',
};

export const PARSE_ERROR_SCHEMA: LiteralSchema = {
  tag: 'ParseError',
  requiredFields: [
    { name: 'message', defaultValue: 'String::new()' },
    { name: 'position', defaultValue: 'None' },
    { name: 'context', defaultValue: 'None' },
  ],
  corruptionMerge: CONTEXT_SPLIT_RULE,
};

export const STATE_ERROR_SCHEMA: LiteralSchema = {
  tag: 'StateError',
  requiredFields: [
    { name: 'operation', defaultValue: '"state_operation".to_string()' },
    { name: 'reason', defaultValue: '"state_error".to_string()' },
    { name: 'context', defaultValue: 'None' },
  ],
  corruptionMerge: CONTEXT_SPLIT_RULE,
};

export const DEFAULT_SCHEMAS: readonly LiteralSchema[] = [
  PARSE_ERROR_SCHEMA,
  STATE_ERROR_SCHEMA,
];
