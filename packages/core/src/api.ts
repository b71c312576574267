/**
 * SchemaLibrary: the public facade over generation, validation and
 * instantiation. It owns the only mutable state of the package, a bounded
 * cache of compiled class schemas keyed by class identity.
 */

import { ErrorCode } from './errors/codes.js';
import type { SchemaHost } from './host/reflection-host.js';
import type { GenerationFailure } from './resolver/context.js';
import type { PropertyDescriptor } from './resolver/property-descriptor.js';
import {
  classKey,
  namedClass,
  unnamedClass,
  type ClassSource,
} from './schema/class-source.js';
import { RootSchema } from './schema/root-schema.js';
import { ResolutionError } from './types/errors.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type SchemaOptions,
} from './types/options.js';
import { err, isErr, ok, type Result } from './types/result.js';
import { LRUMap } from './util/lru-map.js';
import { MetricsCollector, type MetricsSnapshot } from './util/metrics.js';
import {
  CompiledSchema,
  type CompileFailure,
} from './validator/compiled-schema.js';
import { SchemaValidator } from './validator/schema-validator.js';

export type LibraryFailure = GenerationFailure | CompileFailure;

export class SchemaLibrary {
  readonly options: ResolvedOptions;
  private readonly collector: MetricsCollector;
  private readonly engine: SchemaValidator;
  private readonly cache: LRUMap<string, CompiledSchema>;

  /**
   * @throws {ConfigError} When the options do not resolve
   */
  constructor(
    private readonly host: SchemaHost,
    options: SchemaOptions = {}
  ) {
    this.options = resolveOptions(options);
    this.collector = new MetricsCollector({ enabled: this.options.metrics });
    this.engine = new SchemaValidator(this.options, this.collector);
    this.cache = new LRUMap(this.options.cache.maxEntries);
  }

  /**
   * Generate (or regenerate) the schema of a globally named class
   */
  generateNamedClassSchema(name: string): Result<CompiledSchema, LibraryFailure> {
    const source = this.host.findClass(name);
    if (!source) {
      return err(
        new ResolutionError({
          message: `Class "${name}" is not registered`,
          errorCode: ErrorCode.CLASS_NOT_FOUND,
          context: { definition: name },
        })
      );
    }
    return this.generateClassSchema(source);
  }

  /**
   * Generate the schema of a script class that has no global name
   */
  generateUnnamedClassSchema(
    location: string
  ): Result<CompiledSchema, LibraryFailure> {
    return this.generateClassSchema(unnamedClass(location));
  }

  /**
   * Schema of a single property type. Not cached.
   */
  generateTypeInfoSchema(
    descriptor: PropertyDescriptor
  ): Result<CompiledSchema, LibraryFailure> {
    const root = this.collector.measure('GENERATE', () =>
      RootSchema.fromTypeInfo(descriptor, this.host, this.options, this.collector)
    );
    if (isErr(root)) {
      return root;
    }
    return this.compile(root.value);
  }

  getNamedClassSchema(name: string): Result<CompiledSchema, ResolutionError> {
    return this.lookup(namedClass(name));
  }

  getUnnamedClassSchema(location: string): Result<CompiledSchema, ResolutionError> {
    return this.lookup(unnamedClass(location));
  }

  /** Cached schemas, least recently used first */
  schemas(): CompiledSchema[] {
    return [...this.cache.values()];
  }

  metrics(): MetricsSnapshot {
    return this.collector.snapshotMetrics();
  }

  private generateClassSchema(
    source: ClassSource
  ): Result<CompiledSchema, LibraryFailure> {
    const root = this.collector.measure('GENERATE', () =>
      RootSchema.generate(source, this.host, this.options, this.collector)
    );
    if (isErr(root)) {
      return root;
    }
    const compiled = this.compile(root.value);
    if (isErr(compiled)) {
      return compiled;
    }
    this.cache.set(classKey(source.id), compiled.value);
    return compiled;
  }

  private compile(root: RootSchema): Result<CompiledSchema, CompileFailure> {
    return CompiledSchema.create(
      root,
      this.host,
      this.options,
      this.collector,
      this.engine
    );
  }

  private lookup(source: ClassSource): Result<CompiledSchema, ResolutionError> {
    const cached = this.cache.get(classKey(source.id));
    if (cached) {
      this.collector.increment('cacheHits');
      return ok(cached);
    }
    this.collector.increment('cacheMisses');
    const label =
      source.id.kind === 'named' ? source.id.name : source.id.location;
    return err(
      new ResolutionError({
        message: `No schema has been generated for "${label}"`,
        errorCode: ErrorCode.SCHEMA_NOT_CACHED,
        context: {
          definition: label,
          suggestion:
            source.id.kind === 'named'
              ? 'Call generateNamedClassSchema first'
              : 'Call generateUnnamedClassSchema first',
        },
      })
    );
  }
}
