import type { ReflectionHost } from '../host/reflection-host.js';
import type { DefinitionTable } from '../schema/definition.js';
import type {
  GraphError,
  HostError,
  ResolutionError,
} from '../types/errors.js';
import { compileExclusions, type ResolvedOptions } from '../types/options.js';
import type { MetricsCollector } from '../util/metrics.js';

export type GenerationFailure = ResolutionError | GraphError | HostError;

/**
 * Mutable state shared by one generation run
 */
export interface GenerationContext {
  readonly host: ReflectionHost;
  readonly defs: DefinitionTable;
  readonly options: ResolvedOptions;
  readonly exclusions: readonly RegExp[];
  /** Classes whose property walk has started but not finished */
  readonly inProgress: Set<string>;
  /** Classes referenced while still in progress */
  readonly cyclicReferences: Set<string>;
  readonly metrics?: MetricsCollector;
  depth: number;
}

export function createGenerationContext(
  host: ReflectionHost,
  options: ResolvedOptions,
  metrics?: MetricsCollector
): GenerationContext {
  return {
    host,
    defs: new Map(),
    options,
    exclusions: compileExclusions(options),
    inProgress: new Set(),
    cyclicReferences: new Set(),
    metrics,
    depth: 0,
  };
}
