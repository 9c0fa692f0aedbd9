// @fieldmend/core entry point
//
// Public API:
// - repairTarget / repairFile / repairSource run the whole scan → decompose → repair → rewrite
//   flow over a path, a single file or an in-memory text.
// - The stage functions (scanLiterals, decompose, repairFields, serializeLiteral, applyEdits)
//   are exported for callers that need one step on its own.
// - SchemaRegistry and loadRegistryConfig describe which literals are repaired and how.

// Engine
export {
  repairSource,
} from './engine/source-repair.js';
export {
  collectTargetFiles,
  repairFile,
  repairTarget,
  type FileRepairReport,
  type FileRepairStatus,
  type TargetRepairReport,
} from './engine/file-repair.js';

// Stages
export {
  lex,
  stringRanges,
  charLiteralLength,
  type LexEvent,
  type LexState,
  type Punct,
} from './lexer/lexer.js';
export {
  scanLiterals,
  findNextLiteral,
  type ScanOptions,
  type ScanResult,
} from './scanner/span-scanner.js';
export {
  decompose,
  type DecomposeResult,
} from './decompose/field-decomposer.js';
export {
  repairFields,
  type RepairFieldsOptions,
} from './repair/schema-repairer.js';
export {
  buildCorruptionPattern,
  mergeSplitStrings,
  type MergeOutcome,
} from './repair/corruption-merge.js';
export {
  detectLayout,
  serializeLiteral,
  type LiteralLayout,
} from './rewrite/literal-serializer.js';
export { applyEdits, type TextEdit } from './rewrite/text-edits.js';

// Schemas
export {
  SchemaRegistry,
  parseRegistryConfig,
  loadRegistryConfig,
  type RegistryConfig,
  type LoadedRegistryConfig,
} from './schemas/registry.js';
export {
  DEFAULT_SCHEMAS,
  PARSE_ERROR_SCHEMA,
  STATE_ERROR_SCHEMA,
} from './schemas/defaults.js';
export { REGISTRY_CONFIG_SCHEMA } from './schemas/config-schema.js';

// Types
export type {
  CorruptionMergeRule,
  Field,
  FieldRepairResult,
  LiteralReport,
  LiteralSchema,
  LiteralSpan,
  LiteralStatus,
  RepairAction,
  RepairResult,
  RequiredField,
  SourceRepairResult,
} from './types/literal.js';
export {
  DEFAULT_OPTIONS,
  DEFAULT_DECLARATION_KEYWORDS,
  resolveOptions,
  type LexerOptions,
  type RepairOptions,
  type ResolvedLexerOptions,
  type ResolvedOptions,
} from './types/options.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  mapResult,
  type Result,
} from './types/result.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  FieldmendError,
  UnbalancedLiteralError,
  MalformedFieldError,
  FileAccessError,
  ConfigurationError,
  InternalError,
  isFieldmendError,
  toFieldmendError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';

// Metrics
export {
  RepairMetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
