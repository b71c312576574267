import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../errors.js';
import {
  DEFAULT_OPTIONS,
  compileExclusions,
  resolveOptions,
} from '../options.js';

describe('resolveOptions', () => {
  it('returns the defaults when nothing is given', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('merges each section independently', () => {
    const resolved = resolveOptions({
      generation: { maxDepth: 8 },
      validation: { allErrors: false },
      metrics: false,
    });
    expect(resolved.generation).toEqual({
      maxDepth: 8,
      excludePropertyPatterns: ['\\.gd$'],
      skipGroupingEntries: true,
    });
    expect(resolved.validation).toEqual({
      allErrors: false,
      maxReportedErrors: 20,
      validateBeforeInstantiate: true,
    });
    expect(resolved.metrics).toBe(false);
    expect(resolved.cache.maxEntries).toBe(64);
  });

  it('rejects non-positive depths', () => {
    expect(() => resolveOptions({ generation: { maxDepth: 0 } })).toThrow(
      'generation.maxDepth must be a positive integer'
    );
    expect(() => resolveOptions({ instantiation: { maxDepth: 1.5 } })).toThrow(
      'instantiation.maxDepth must be a positive integer'
    );
  });

  it('rejects an indent outside 0..10', () => {
    try {
      resolveOptions({ output: { indent: 11 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
        expect(error.setting).toBe('output.indent');
        expect(error.message).toBe('output.indent must be an integer between 0 and 10');
      }
    }
  });

  it('rejects exclusion patterns that do not compile', () => {
    expect(() =>
      resolveOptions({ generation: { excludePropertyPatterns: ['('] } })
    ).toThrow('generation.excludePropertyPatterns contains an invalid pattern: (');
  });
});

describe('compileExclusions', () => {
  it('compiles each pattern', () => {
    const [pattern] = compileExclusions(resolveOptions());
    expect(pattern?.test('player.gd')).toBe(true);
    expect(pattern?.test('speed')).toBe(false);
  });
});
