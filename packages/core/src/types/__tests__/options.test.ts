import { describe, it, expect } from 'vitest';

import { ConfigurationError } from '../errors.js';
import { DEFAULT_OPTIONS, resolveOptions } from '../options.js';

describe('RepairOptions', () => {
  describe('resolveOptions defaulting behavior', () => {
    it('should apply all defaults when no options provided', () => {
      const resolved = resolveOptions();

      expect(resolved).toEqual(DEFAULT_OPTIONS);
      expect(resolved.indentUnit).toBe('    ');
      expect(resolved.extensions).toEqual(['.rs']);
      expect(resolved.ignoreDirs).toEqual(['node_modules', 'target', '.git', 'dist']);
      expect(resolved.dryRun).toBe(false);
      expect(resolved.lexer).toEqual({
        quotes: ['"'],
        charLiterals: true,
        rawStrings: true,
        comments: true,
      });
    });

    it('should ignore explicitly undefined values', () => {
      const resolved = resolveOptions({ indentUnit: undefined, dryRun: undefined });
      expect(resolved.indentUnit).toBe('    ');
      expect(resolved.dryRun).toBe(false);
    });

    it('should deep merge the lexer group', () => {
      const resolved = resolveOptions({ lexer: { comments: false } });
      expect(resolved.lexer).toEqual({
        quotes: ['"'],
        charLiterals: true,
        rawStrings: true,
        comments: false,
      });
    });

    it('should lower-case extensions', () => {
      expect(resolveOptions({ extensions: ['.RS', '.Ron'] }).extensions).toEqual([
        '.rs',
        '.ron',
      ]);
    });
  });

  describe('validation', () => {
    it.each([
      [{ indentUnit: '' }],
      [{ indentUnit: '--' }],
      [{ extensions: [] }],
      [{ extensions: ['rs'] }],
      [{ lexer: { quotes: [] } }],
      [{ lexer: { quotes: ['""'] } }],
      [{ lexer: { quotes: ['\\'] } }],
      [{ lexer: { quotes: ["'"] } }],
      [{ lexer: { quotes: ['`'] } }],
    ])('should reject %j', (options) => {
      expect(() => resolveOptions(options)).toThrow(ConfigurationError);
    });

    it('should accept single quotes once char literals are off', () => {
      const resolved = resolveOptions({
        lexer: { quotes: ['"', "'"], charLiterals: false },
      });
      expect(resolved.lexer.quotes).toEqual(['"', "'"]);
    });

    it('should accept other quotes once raw strings are off', () => {
      const resolved = resolveOptions({
        lexer: { quotes: ['`'], rawStrings: false },
      });
      expect(resolved.lexer.quotes).toEqual(['`']);
    });

    it('should accept tab indentation', () => {
      expect(resolveOptions({ indentUnit: '\t' }).indentUnit).toBe('\t');
    });
  });
});
