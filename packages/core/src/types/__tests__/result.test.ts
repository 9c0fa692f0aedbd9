/**
 * Tests for Result<T, E> pattern
 */

import { describe, it, expect } from 'vitest';

import {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  mapResult,
  type Result,
} from '../result.js';

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('should create Ok instance with value', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
      expect(result.unwrap()).toBe(42);
    });
  });

  describe('Err class', () => {
    it('should rethrow an Error payload on unwrap', () => {
      const failure = new RangeError('out of range');
      const result = new Err(failure);

      expect(result._tag).toBe('Err');
      expect(result.isErr()).toBe(true);
      expect(() => result.unwrap()).toThrow(failure);
    });

    it('should wrap a non-Error payload on unwrap', () => {
      expect(() => err('nope').unwrap()).toThrow(
        'Called unwrap on an Err value: nope'
      );
    });
  });

  describe('type guards', () => {
    it('should narrow a Result union', () => {
      const results: Array<Result<number, string>> = [ok(1), err('bad')];

      const values: number[] = [];
      const errors: string[] = [];
      for (const result of results) {
        if (isOk(result)) values.push(result.value);
        if (isErr(result)) errors.push(result.error);
      }

      expect(values).toEqual([1]);
      expect(errors).toEqual(['bad']);
    });
  });

  describe('mapResult', () => {
    it('transforms Ok values and passes Err through', () => {
      const double = (n: number): number => n * 2;
      const failure = err('unbalanced');

      expect(mapResult(ok(21), double)).toEqual(ok(42));
      expect(mapResult<number, number, string>(failure, double)).toBe(failure);
    });
  });
});
