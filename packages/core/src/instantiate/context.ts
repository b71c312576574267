import type { ObjectFactory } from '../host/reflection-host.js';
import type { Definition } from '../schema/definition.js';
import type {
  ConversionError,
  GraphError,
  HostError,
} from '../types/errors.js';
import type { ResolvedOptions } from '../types/options.js';
import type { MetricsCollector } from '../util/metrics.js';

export type InstantiationFailure = ConversionError | GraphError | HostError;

export interface InstantiationContext {
  readonly factory: ObjectFactory;
  readonly defs: ReadonlyMap<string, Definition>;
  readonly maxDepth: number;
  readonly metrics?: MetricsCollector;
  depth: number;
}

export function createInstantiationContext(
  factory: ObjectFactory,
  defs: ReadonlyMap<string, Definition>,
  options: ResolvedOptions,
  metrics?: MetricsCollector
): InstantiationContext {
  return {
    factory,
    defs,
    maxDepth: options.instantiation.maxDepth,
    metrics,
    depth: 0,
  };
}
