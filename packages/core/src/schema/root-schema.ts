/**
 * Root schema: a base definition plus the named definitions it refers to.
 */

import { ErrorCode } from '../errors/codes.js';
import type { ObjectFactory, ReflectionHost } from '../host/reflection-host.js';
import {
  createInstantiationContext,
  type InstantiationFailure,
} from '../instantiate/context.js';
import { instantiate } from '../instantiate/instantiator.js';
import type { NativeValue } from '../instantiate/native-value.js';
import { generateClass } from '../resolver/class-generator.js';
import {
  createGenerationContext,
  type GenerationFailure,
} from '../resolver/context.js';
import type { PropertyDescriptor } from '../resolver/property-descriptor.js';
import { resolveProperty } from '../resolver/type-resolver.js';
import { GraphError } from '../types/errors.js';
import { resolveOptions, type ResolvedOptions } from '../types/options.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import type { JsonObject } from '../util/json.js';
import type { MetricsCollector } from '../util/metrics.js';
import { definitionName, type ClassSource } from './class-source.js';
import { closureDefinitions } from './closure.js';
import {
  Def,
  assertNever,
  isObjectLike,
  type ClassDefinition,
  type Definition,
  type DefinitionTable,
  type Type,
} from './definition.js';
import {
  JSON_SCHEMA_DIALECT,
  serializeDefinition,
} from './serializer.js';

/** Property name used when a non-object base is wrapped */
export const WRAPPED_VALUE_KEY = 'value';

function collectReferences(type: Type, into: Set<string>): void {
  switch (type.kind) {
    case 'ref':
      into.add(type.name);
      return;
    case 'object':
    case 'class':
      for (const property of type.properties.values()) {
        collectReferences(property, into);
      }
      return;
    case 'array':
      if (type.items) collectReferences(type.items, into);
      return;
    case 'tuple':
      for (const item of type.items) collectReferences(item, into);
      return;
    case 'null':
    case 'boolean':
    case 'integer':
    case 'number':
    case 'string':
    case 'enum':
    case 'builtin':
      return;
    default:
      assertNever(type, 'type kind');
  }
}

export class RootSchema {
  private readonly table: DefinitionTable;

  constructor(
    public readonly base: Definition,
    defs: Iterable<readonly [string, Definition]> = []
  ) {
    this.table = new Map(defs);
  }

  get defs(): ReadonlyMap<string, Definition> {
    return this.table;
  }

  /**
   * Generate the schema of a class
   */
  static generate(
    source: ClassSource,
    host: ReflectionHost,
    options: ResolvedOptions = resolveOptions(),
    metrics?: MetricsCollector
  ): Result<RootSchema, GenerationFailure> {
    const ctx = createGenerationContext(host, options, metrics);
    const generated = generateClass(source, ctx);
    if (isErr(generated)) {
      return generated;
    }
    const rootName = definitionName(source.id);
    // the class graph points back at the root: keep the root addressable
    if (ctx.cyclicReferences.has(rootName)) {
      ctx.defs.set(rootName, generated.value);
    }
    return ok(new RootSchema(generated.value, ctx.defs));
  }

  /**
   * Generate the schema of a single property type. A named base is lifted
   * out of the table unless something else still refers to it.
   */
  static fromTypeInfo(
    descriptor: PropertyDescriptor,
    host: ReflectionHost,
    options: ResolvedOptions = resolveOptions(),
    metrics?: MetricsCollector
  ): Result<RootSchema, GenerationFailure> {
    const ctx = createGenerationContext(host, options, metrics);
    const resolved = resolveProperty(descriptor, ctx);
    if (isErr(resolved)) {
      return resolved;
    }
    const type = resolved.value;
    if (type.kind !== 'ref') {
      return ok(new RootSchema(type, ctx.defs));
    }

    const base = ctx.defs.get(type.name);
    if (!base) {
      return err(danglingReference([type.name]));
    }
    if (!ctx.cyclicReferences.has(type.name)) {
      ctx.defs.delete(type.name);
    }
    return ok(new RootSchema(base, ctx.defs));
  }

  addDefinition(name: string, definition: Definition): this {
    this.table.set(name, definition);
    return this;
  }

  addClass(definition: ClassDefinition): this {
    return this.addDefinition(definitionName(definition.source.id), definition);
  }

  /** True when the document wraps the base into `{ value: ... }` */
  isWrapped(): boolean {
    return !isObjectLike(this.base);
  }

  /** The definition a document instance is checked against */
  documentBase(): Definition {
    if (!this.isWrapped()) {
      return this.base;
    }
    // the description goes to the document top only
    const value: Definition = { ...this.base };
    if (value.kind !== 'builtin') delete value.description;
    return Def.object([[WRAPPED_VALUE_KEY, value]]);
  }

  /**
   * Schema for an array of this schema's base, registered under `itemName`
   */
  arraySchema(itemName: string): RootSchema {
    return new RootSchema(Def.array(Def.ref(itemName)), [
      ...this.table,
      [itemName, this.base],
    ]);
  }

  /**
   * Names referenced somewhere in the schema but missing from the table
   */
  danglingReferences(): string[] {
    const referenced = new Set<string>();
    collectReferences(this.base, referenced);
    for (const definition of this.table.values()) {
      collectReferences(definition, referenced);
    }
    return [...referenced].filter((name) => !this.table.has(name)).sort();
  }

  checkReferences(): Result<void, GraphError> {
    const dangling = this.danglingReferences();
    return dangling.length > 0 ? err(danglingReference(dangling)) : ok(undefined);
  }

  toDocument(): JsonObject {
    const document: JsonObject = {};
    if (this.base.kind !== 'builtin' && this.base.description !== undefined) {
      document.description = this.base.description;
    }
    document.$schema = JSON_SCHEMA_DIALECT;

    const defs: JsonObject = {};
    const names = [...this.table.keys()].sort();
    for (const name of names) {
      const definition = this.table.get(name);
      if (definition) defs[name] = serializeDefinition(definition);
    }
    for (const [tag, definition] of closureDefinitions(this.base, this.table)) {
      defs[tag] = serializeDefinition(definition);
    }
    document.$defs = defs;

    const fields = serializeDefinition(this.documentBase());
    delete fields.description;
    return { ...document, ...fields };
  }

  toJsonCompact(): string {
    return JSON.stringify(this.toDocument());
  }

  toJsonPretty(indent = 2): string {
    return JSON.stringify(this.toDocument(), null, indent);
  }

  /**
   * Instantiate an (already unwrapped) JSON value against the base
   */
  instantiate(
    value: unknown,
    factory: ObjectFactory,
    options: ResolvedOptions = resolveOptions(),
    metrics?: MetricsCollector
  ): Result<NativeValue, InstantiationFailure> {
    const ctx = createInstantiationContext(factory, this.table, options, metrics);
    return instantiate(value, this.base, ctx);
  }
}

function danglingReference(names: string[]): GraphError {
  return new GraphError({
    message: `Expected definition${names.length > 1 ? 's' : ''} ${names
      .map((name) => `"${name}"`)
      .join(', ')} to be in the definition table`,
    errorCode: ErrorCode.DANGLING_REFERENCE,
    context: { definition: names.join(', ') },
  });
}
