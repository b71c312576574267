/**
 * Configuration options for schema generation, validation and instantiation.
 *
 * Every option is optional; `resolveOptions` deep-merges user values over
 * DEFAULT_OPTIONS and rejects invalid combinations with a ConfigError.
 */

import { ConfigError } from './errors.js';

/**
 * Class-walk configuration
 */
export interface GenerationOptions {
  /** Maximum class nesting depth before generation fails (default: 64) */
  maxDepth?: number;
  /**
   * Regular expressions matched against property names; matching entries
   * are host bookkeeping and never become schema properties
   * (default: the script file-name entry, `\.gd$`)
   */
  excludePropertyPatterns?: string[];
  /** Drop category/group/subgroup entries of the property list (default: true) */
  skipGroupingEntries?: boolean;
}

export interface InstantiationOptions {
  /** Maximum JSON nesting depth accepted by the instantiator (default: 128) */
  maxDepth?: number;
}

export interface ValidationOptions {
  /** Collect every failure instead of stopping at the first (default: true) */
  allErrors?: boolean;
  /** Cap on failures attached to a ValidationError (default: 20) */
  maxReportedErrors?: number;
  /** Validate JSON input before instantiating it (default: true) */
  validateBeforeInstantiate?: boolean;
}

export interface OutputOptions {
  /** Indentation of pretty-printed documents (default: 2) */
  indent?: number;
}

export interface CacheOptions {
  /** Number of class schemas kept by a SchemaLibrary (default: 64) */
  maxEntries?: number;
}

export interface SchemaOptions {
  generation?: GenerationOptions;
  instantiation?: InstantiationOptions;
  validation?: ValidationOptions;
  output?: OutputOptions;
  cache?: CacheOptions;
  /** Collect phase timings and counters (default: true) */
  metrics?: boolean;
}

export interface ResolvedOptions {
  generation: Required<GenerationOptions>;
  instantiation: Required<InstantiationOptions>;
  validation: Required<ValidationOptions>;
  output: Required<OutputOptions>;
  cache: Required<CacheOptions>;
  metrics: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  generation: {
    maxDepth: 64,
    excludePropertyPatterns: ['\\.gd$'],
    skipGroupingEntries: true,
  },
  instantiation: {
    maxDepth: 128,
  },
  validation: {
    allErrors: true,
    maxReportedErrors: 20,
    validateBeforeInstantiate: true,
  },
  output: {
    indent: 2,
  },
  cache: {
    maxEntries: 64,
  },
  metrics: true,
};

/**
 * Resolve partial user options into a complete configuration
 *
 * @throws {ConfigError} When a value is out of range or a pattern does not compile
 */
export function resolveOptions(userOptions: SchemaOptions = {}): ResolvedOptions {
  const resolved: ResolvedOptions = {
    generation: { ...DEFAULT_OPTIONS.generation, ...userOptions.generation },
    instantiation: {
      ...DEFAULT_OPTIONS.instantiation,
      ...userOptions.instantiation,
    },
    validation: { ...DEFAULT_OPTIONS.validation, ...userOptions.validation },
    output: { ...DEFAULT_OPTIONS.output, ...userOptions.output },
    cache: { ...DEFAULT_OPTIONS.cache, ...userOptions.cache },
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
  };

  validateOptions(resolved);
  return resolved;
}

function requirePositiveInteger(value: number, setting: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError({
      message: `${setting} must be a positive integer`,
      context: { setting, value },
    });
  }
}

function validateOptions(options: ResolvedOptions): void {
  requirePositiveInteger(options.generation.maxDepth, 'generation.maxDepth');
  requirePositiveInteger(
    options.instantiation.maxDepth,
    'instantiation.maxDepth'
  );
  requirePositiveInteger(
    options.validation.maxReportedErrors,
    'validation.maxReportedErrors'
  );
  requirePositiveInteger(options.cache.maxEntries, 'cache.maxEntries');

  if (
    !Number.isInteger(options.output.indent) ||
    options.output.indent < 0 ||
    options.output.indent > 10
  ) {
    throw new ConfigError({
      message: 'output.indent must be an integer between 0 and 10',
      context: { setting: 'output.indent', value: options.output.indent },
    });
  }

  for (const pattern of options.generation.excludePropertyPatterns) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigError({
        message: `generation.excludePropertyPatterns contains an invalid pattern: ${pattern}`,
        context: { setting: 'generation.excludePropertyPatterns', value: pattern },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

/**
 * Compile the exclusion patterns once per generation run
 */
export function compileExclusions(options: ResolvedOptions): RegExp[] {
  return options.generation.excludePropertyPatterns.map(
    (pattern) => new RegExp(pattern)
  );
}
