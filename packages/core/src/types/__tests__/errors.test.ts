import { describe, it, expect } from 'vitest';
/**
 * Tests for Error hierarchy
 */

import {
  ConfigurationError,
  FieldmendError,
  FileAccessError,
  InternalError,
  MalformedFieldError,
  UnbalancedLiteralError,
  isFieldmendError,
  toFieldmendError,
  type ErrorContext,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('Error Hierarchy', () => {
  describe('FieldmendError base class', () => {
    class TestError extends FieldmendError {
      constructor(message: string, context?: ErrorContext) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR, context });
      }
    }

    it('creates error with new params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('serializes with stack in dev and without in prod', () => {
      const cause = new Error('root cause');
      const error = new InternalError('Higher level', cause);

      const dev = error.toJSON('dev');
      const prod = error.toJSON('prod');

      expect(dev.stack).toBeDefined();
      expect(prod.stack).toBeUndefined();
      expect(prod).toMatchObject({
        name: 'InternalError',
        message: 'Higher level',
        errorCode: ErrorCode.INTERNAL_ERROR,
        cause: { name: 'Error', message: 'root cause' },
      });
    });
  });

  describe('concrete errors', () => {
    it('UnbalancedLiteralError carries location and a suggestion', () => {
      const error = new UnbalancedLiteralError({
        tag: 'ParseError',
        offset: 19,
        line: 3,
        valueExcerpt: 'ParseError { message',
      });

      expect(error.message).toBe('Unbalanced ParseError literal opened at line 3');
      expect(error.getExitCode()).toBe(10);
      expect(error.suggestions).toHaveLength(1);

      const bound = error.withFilePath('src/lib.rs');
      expect(bound.context).toMatchObject({
        tag: 'ParseError',
        offset: 19,
        line: 3,
        valueExcerpt: 'ParseError { message',
        filePath: 'src/lib.rs',
      });
    });

    it('MalformedFieldError is a warning with a flattened excerpt', () => {
      const error = new MalformedFieldError({
        segment: '\n    message\n',
        segmentIndex: 0,
        reason: 'missing-colon',
      });

      expect(error.severity).toBe('warn');
      expect(error.message).toBe('Field segment 0 has no name/value separator');
      expect(error.context?.valueExcerpt).toBe('message');
      expect(error.getExitCode()).toBe(11);
    });

    it('MalformedFieldError truncates long segments', () => {
      const error = new MalformedFieldError({
        segment: 'x'.repeat(60),
        segmentIndex: 2,
        reason: 'invalid-name',
      });
      expect(error.context?.valueExcerpt).toBe(`${'x'.repeat(39)}…`);
    });

    it('FileAccessError names the operation and keeps the cause', () => {
      const cause = new Error('EACCES');
      const error = new FileAccessError({
        filePath: 'a.rs',
        operation: 'write',
        cause,
      });

      expect(error.message).toBe('Failed to write a.rs: EACCES');
      expect(error.cause).toBe(cause);
      expect(error.getExitCode()).toBe(20);
    });

    it('ConfigurationError maps to its exit code', () => {
      expect(new ConfigurationError('bad').getExitCode()).toBe(30);
    });
  });

  describe('helpers', () => {
    it('recognises fieldmend errors', () => {
      expect(isFieldmendError(new InternalError('x'))).toBe(true);
      expect(isFieldmendError(new Error('x'))).toBe(false);
    });

    it('wraps foreign values as internal errors', () => {
      const original = new ConfigurationError('kept');
      expect(toFieldmendError(original)).toBe(original);

      const wrapped = toFieldmendError(new TypeError('boom'));
      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.cause).toBeInstanceOf(TypeError);

      expect(toFieldmendError('text').message).toBe('text');
      expect(toFieldmendError('').message).toBe('Unexpected error');
    });
  });
});
