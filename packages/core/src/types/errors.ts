/**
 * Error hierarchy for fieldmend
 * Structured errors carrying a stable code, a location and a value excerpt
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  filePath?: string; // File being repaired
  tag?: string; // Literal tag (e.g. 'ParseError')
  offset?: number; // Character offset into the source text
  line?: number; // 1-based line of the offending text
  valueExcerpt?: string; // Short excerpt of the offending text
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface FieldmendErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all fieldmend errors
 */
export abstract class FieldmendError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: FieldmendErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, cause ? { cause } : undefined);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (typeof context?.suggestion === 'string') {
      this.suggestions = [context.suggestion];
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: omits stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * A tagged literal whose opening brace never balances before end of text.
 * The whole file is left untouched.
 */
export class UnbalancedLiteralError extends FieldmendError {
  constructor(params: {
    tag: string;
    offset: number;
    line: number;
    valueExcerpt?: string;
    filePath?: string;
  }) {
    super({
      message: `Unbalanced ${params.tag} literal opened at line ${params.line}`,
      errorCode: ErrorCode.UNBALANCED_LITERAL,
      context: {
        tag: params.tag,
        offset: params.offset,
        line: params.line,
        valueExcerpt: params.valueExcerpt,
        filePath: params.filePath,
        suggestion:
          'Close the literal by hand; files with unbalanced literals are never rewritten.',
      },
    });
  }

  /** Copy of this error bound to the file it was found in */
  withFilePath(filePath: string): UnbalancedLiteralError {
    return new UnbalancedLiteralError({
      tag: String(this.context?.tag ?? ''),
      offset: Number(this.context?.offset ?? 0),
      line: Number(this.context?.line ?? 0),
      valueExcerpt: this.context?.valueExcerpt,
      filePath,
    });
  }
}

/**
 * A top-level literal segment that cannot be split into `name: value`.
 * Non-fatal: reported on the literal, which is then left as-is.
 */
export class MalformedFieldError extends FieldmendError {
  public readonly segment: string;
  public readonly segmentIndex: number;

  constructor(params: {
    segment: string;
    segmentIndex: number;
    reason: 'missing-colon' | 'invalid-name';
  }) {
    const excerpt = excerptOf(params.segment);
    super({
      message:
        params.reason === 'missing-colon'
          ? `Field segment ${params.segmentIndex} has no name/value separator`
          : `Field segment ${params.segmentIndex} does not start with a field name`,
      errorCode: ErrorCode.MALFORMED_FIELD,
      severity: 'warn',
      context: { valueExcerpt: excerpt, reason: params.reason },
    });
    this.segment = params.segment;
    this.segmentIndex = params.segmentIndex;
  }
}

/**
 * File unreadable or unwritable. Reported per file; the batch continues.
 */
export class FileAccessError extends FieldmendError {
  constructor(params: {
    filePath: string;
    operation: 'read' | 'write' | 'list';
    cause?: Error;
  }) {
    super({
      message: `Failed to ${params.operation} ${params.filePath}${
        params.cause ? `: ${params.cause.message}` : ''
      }`,
      errorCode: ErrorCode.FILE_ACCESS_FAILED,
      context: { filePath: params.filePath, operation: params.operation },
      cause: params.cause,
    });
  }
}

/**
 * Invalid options or schema registry configuration.
 */
export class ConfigurationError extends FieldmendError {
  constructor(
    message: string,
    context?: ErrorContext & { errors?: string[] },
    cause?: Error
  ) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context,
      cause,
    });
  }
}

/**
 * Wraps anything that is not already a FieldmendError
 */
export class InternalError extends FieldmendError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isFieldmendError(error: unknown): error is FieldmendError {
  return error instanceof FieldmendError;
}

export function toFieldmendError(error: unknown): FieldmendError {
  if (isFieldmendError(error)) return error;
  if (error instanceof Error) {
    return new InternalError(error.message || 'Unexpected error', error);
  }
  return new InternalError(String(error) || 'Unexpected error');
}

function excerptOf(text: string, max = 40): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}
