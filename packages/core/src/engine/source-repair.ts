import { decompose } from '../decompose/field-decomposer.js';
import { repairFields } from '../repair/schema-repairer.js';
import {
  detectLayout,
  serializeLiteral,
} from '../rewrite/literal-serializer.js';
import { applyEdits, type TextEdit } from '../rewrite/text-edits.js';
import { scanLiterals } from '../scanner/span-scanner.js';
import type { SchemaRegistry } from '../schemas/registry.js';
import type { UnbalancedLiteralError } from '../types/errors.js';
import type {
  LiteralReport,
  LiteralSpan,
  SourceRepairResult,
} from '../types/literal.js';
import { DEFAULT_OPTIONS, type ResolvedOptions } from '../types/options.js';
import { mapResult, type Result } from '../types/result.js';

interface StagedLiteral {
  report: LiteralReport;
  edit?: TextEdit;
}

/**
 * Repair every registered literal in one source text.
 *
 * Spans are located against the original text, each literal is decomposed
 * and repaired on its own, and the rewritten literals are applied in one
 * back-to-front pass. Literals with malformed segments are reported as
 * skipped and left as written. An unbalanced literal fails the whole text.
 */
export function repairSource(
  text: string,
  registry: SchemaRegistry,
  options: ResolvedOptions = DEFAULT_OPTIONS
): Result<SourceRepairResult, UnbalancedLiteralError> {
  const scan = scanLiterals(text, registry.tags, {
    lexer: options.lexer,
    declarationKeywords: options.declarationKeywords,
  });
  const newline = text.includes('\r\n') ? '\r\n' : '\n';

  return mapResult(scan, (spans) => {
    const staged = spans.map((span) =>
      repairLiteral(text, span, registry, options, newline)
    );
    const edits = staged.flatMap((entry) => (entry.edit ? [entry.edit] : []));
    return {
      changed: edits.length > 0,
      newText: applyEdits(text, edits),
      literals: staged.map((entry) => entry.report),
    };
  });
}

function repairLiteral(
  text: string,
  span: LiteralSpan,
  registry: SchemaRegistry,
  options: ResolvedOptions,
  newline: string
): StagedLiteral {
  const schema = registry.require(span.tag);
  const base = {
    tag: span.tag,
    line: span.line,
    start: span.start,
    end: span.end,
  };

  const interior = text.slice(span.start + 1, span.end);
  const decomposed = decompose(interior, options.lexer);
  if (decomposed.malformed.length > 0) {
    return {
      report: {
        ...base,
        status: 'skipped',
        actions: [],
        malformed: decomposed.malformed,
      },
    };
  }

  const repaired = repairFields(decomposed.fields, schema, {
    lexer: options.lexer,
  });
  if (!repaired.changed) {
    return {
      report: { ...base, status: 'unchanged', actions: [], malformed: [] },
    };
  }

  const layout = detectLayout(text, span, options.indentUnit);
  return {
    report: {
      ...base,
      status: 'repaired',
      actions: repaired.actions,
      malformed: [],
    },
    edit: {
      start: span.start,
      end: span.end + 1,
      replacement: serializeLiteral(
        repaired.fields,
        layout,
        repaired.trailingComments.concat(decomposed.trailingComments),
        newline
      ),
    },
  };
}
