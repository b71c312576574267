import { describe, expect, it } from 'vitest';

import { Err, Ok, err, isErr, isOk, ok, type Result } from '../result.js';

describe('Result', () => {
  describe('Ok', () => {
    it('carries the value and tag', () => {
      const result = new Ok(42);
      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('maps and flatMaps the value', () => {
      expect(ok(10).map((x) => x * 2).value).toBe(20);
      const chained = ok(5).flatMap((x) => ok(x * 3));
      expect(isOk(chained) && chained.value).toBe(15);
      const failed = ok(5).flatMap(() => err('failed'));
      expect(isErr(failed) && failed.error).toBe('failed');
    });

    it('ignores mapErr and unwraps', () => {
      const result = ok('success');
      expect(result.mapErr(() => 'error')).toBe(result);
      expect(result.unwrap()).toBe('success');
      expect(result.unwrapOr('default')).toBe('success');
    });
  });

  describe('Err', () => {
    it('carries the error and tag', () => {
      const result = new Err('failure');
      expect(result.error).toBe('failure');
      expect(result._tag).toBe('Err');
      expect(result.isErr()).toBe(true);
    });

    it('ignores map and flatMap', () => {
      const result = err('failure');
      expect(result.map(() => 1)).toBe(result);
      expect(result.flatMap(() => ok(1))).toBe(result);
      expect(result.mapErr((e) => `${e}!`).error).toBe('failure!');
    });

    it('rethrows an Error on unwrap', () => {
      const error = new Error('boom');
      expect(() => err(error).unwrap()).toThrow(error);
      expect(() => err('plain').unwrap()).toThrow(
        'Called unwrap on an Err value: plain'
      );
      expect(err('x').unwrapOr(7)).toBe(7);
    });
  });

  it('narrows a union through the free guards', () => {
    const parse = (text: string): Result<number, string> => {
      const value = Number(text);
      return Number.isNaN(value) ? err(`not a number: ${text}`) : ok(value);
    };
    const good = parse('12');
    const bad = parse('twelve');
    expect(isOk(good) ? good.value : undefined).toBe(12);
    expect(isErr(bad) ? bad.error : undefined).toBe('not a number: twelve');
  });
});
