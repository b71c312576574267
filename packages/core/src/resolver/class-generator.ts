/**
 * Class generation and class instantiation.
 *
 * Generation walks the host's property list in order and resolves every
 * non-bookkeeping entry. A class that is already registered, or whose walk
 * is still in progress higher up the stack, is returned as a reference so
 * that recursive class graphs stay finite.
 */

import { ErrorCode } from '../errors/codes.js';
import { instantiate } from '../instantiate/instantiator.js';
import type {
  InstantiationContext,
  InstantiationFailure,
} from '../instantiate/context.js';
import type { NativeValue } from '../instantiate/native-value.js';
import { definitionName, type ClassSource } from '../schema/class-source.js';
import {
  Def,
  resolveType,
  type ClassDefinition,
  type RefType,
  type Type,
} from '../schema/definition.js';
import {
  ConversionError,
  GraphError,
  HostError,
  toCause,
} from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { appendPointer, describeJsonType, excerpt, isJsonObject } from '../util/json.js';
import type { GenerationContext, GenerationFailure } from './context.js';
import {
  GROUPING_USAGE,
  hasUsage,
  type PropertyDescriptor,
} from './property-descriptor.js';
import { resolveProperty } from './type-resolver.js';

function isBookkeeping(
  descriptor: PropertyDescriptor,
  ctx: GenerationContext
): boolean {
  if (
    ctx.options.generation.skipGroupingEntries &&
    hasUsage(descriptor, GROUPING_USAGE)
  ) {
    return true;
  }
  return ctx.exclusions.some((pattern) => pattern.test(descriptor.name));
}

export function generateClass(
  source: ClassSource,
  ctx: GenerationContext
): Result<ClassDefinition, GenerationFailure> {
  const name = definitionName(source.id);
  if (ctx.depth >= ctx.options.generation.maxDepth) {
    return err(
      new GraphError({
        message: `Class nesting exceeds the maximum depth of ${ctx.options.generation.maxDepth} at "${name}"`,
        errorCode: ErrorCode.DEPTH_LIMIT_EXCEEDED,
        context: { definition: name, setting: 'generation.maxDepth' },
      })
    );
  }

  let descriptors: PropertyDescriptor[];
  try {
    descriptors = ctx.host.propertyList(source);
  } catch (thrown) {
    return err(
      new HostError({
        message: `Host failed to list the properties of "${name}"`,
        errorCode: ErrorCode.PROPERTY_LIST_FAILED,
        context: { definition: name },
        cause: toCause(thrown),
      })
    );
  }

  ctx.inProgress.add(name);
  ctx.depth += 1;
  try {
    const properties = new Map<string, Type>();
    for (const descriptor of descriptors) {
      if (isBookkeeping(descriptor, ctx)) continue;
      const resolved = resolveProperty(descriptor, ctx);
      if (isErr(resolved)) {
        return resolved;
      }
      properties.set(descriptor.name, resolved.value);
    }
    ctx.metrics?.increment('classesGenerated');
    const definition: ClassDefinition = { kind: 'class', source, properties };
    return ok(definition);
  } finally {
    ctx.inProgress.delete(name);
    ctx.depth -= 1;
  }
}

/**
 * Register the class (generating it on first sight) and reference it
 */
export function referenceClass(
  source: ClassSource,
  ctx: GenerationContext
): Result<RefType, GenerationFailure> {
  const name = definitionName(source.id);
  if (ctx.inProgress.has(name)) {
    ctx.cyclicReferences.add(name);
    return ok(Def.ref(name));
  }
  if (ctx.defs.has(name)) {
    return ok(Def.ref(name));
  }
  const generated = generateClass(source, ctx);
  if (isErr(generated)) {
    return generated;
  }
  ctx.defs.set(name, generated.value);
  return ok(Def.ref(name));
}

/**
 * Build a host object from a JSON object whose keys are exactly the
 * declared properties of the class
 */
export function instantiateClass(
  cls: ClassDefinition,
  value: unknown,
  ctx: InstantiationContext,
  path: string
): Result<NativeValue, InstantiationFailure> {
  const className = definitionName(cls.source.id);
  if (!isJsonObject(value)) {
    return err(
      new ConversionError({
        message: `Expected an object for class "${className}", got ${describeJsonType(value)}`,
        errorCode: ErrorCode.TYPE_MISMATCH,
        context: { path, definition: className, valueExcerpt: excerpt(value) },
      })
    );
  }

  for (const key of Object.keys(value)) {
    if (!cls.properties.has(key)) {
      return err(
        new ConversionError({
          message: `Class "${className}" has no property "${key}"`,
          errorCode: ErrorCode.UNKNOWN_PROPERTY,
          context: {
            path: appendPointer(path, key),
            definition: className,
            property: key,
            suggestion: `Declared properties: ${[...cls.properties.keys()].join(', ')}`,
          },
        })
      );
    }
  }
  for (const name of cls.properties.keys()) {
    if (!Object.hasOwn(value, name)) {
      return err(
        new ConversionError({
          message: `Missing property "${name}" of class "${className}"`,
          errorCode: ErrorCode.MISSING_PROPERTY,
          context: { path, definition: className, property: name },
        })
      );
    }
  }

  let handle: object;
  try {
    handle = ctx.factory.construct(cls.source);
  } catch (thrown) {
    return err(
      new HostError({
        message: `Host failed to construct an instance of "${className}"`,
        errorCode: ErrorCode.CONSTRUCTION_FAILED,
        context: { path, definition: className },
        cause: toCause(thrown),
      })
    );
  }

  for (const [key, raw] of Object.entries(value)) {
    const declared = cls.properties.get(key);
    if (!declared) continue;
    const definition = resolveType(declared, ctx.defs);
    if (isErr(definition)) {
      return definition;
    }
    const childPath = appendPointer(path, key);
    const converted = instantiate(raw, definition.value, ctx, childPath);
    if (isErr(converted)) {
      return converted;
    }
    try {
      ctx.factory.setProperty(handle, key, converted.value);
    } catch (thrown) {
      return err(
        new HostError({
          message: `Host failed to assign property "${key}" of "${className}"`,
          errorCode: ErrorCode.PROPERTY_ASSIGNMENT_FAILED,
          context: { path: childPath, definition: className, property: key },
          cause: toCause(thrown),
        })
      );
    }
  }

  const instance: NativeValue = { type: 'object', className, handle };
  return ok(instance);
}
