/**
 * Property type resolution.
 *
 * A descriptor is matched against an ordered rule table; the first rule
 * whose predicate holds produces the property's Type. Named types (classes
 * and enums) are registered in the run's definition table and returned as
 * references.
 */

import { ErrorCode } from '../errors/codes.js';
import { builtinByKind, builtinByName } from '../schema/builtins.js';
import {
  Def,
  type Definition,
  type RefType,
  type Type,
} from '../schema/definition.js';
import { HostError, ResolutionError, toCause } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { referenceClass } from './class-generator.js';
import type { GenerationContext, GenerationFailure } from './context.js';
import {
  PropertyUsage,
  hasUsage,
  type PropertyDescriptor,
  type ValueKind,
} from './property-descriptor.js';

type Resolution = Result<Type, GenerationFailure>;

interface ResolutionRule {
  readonly name: string;
  matches(descriptor: PropertyDescriptor): boolean;
  resolve(descriptor: PropertyDescriptor, ctx: GenerationContext): Resolution;
}

const PRIMITIVE_KINDS: ReadonlyMap<ValueKind, () => Definition> = new Map<
  ValueKind,
  () => Definition
>([
  ['bool', Def.boolean],
  ['int', () => Def.integer()],
  ['float', Def.number],
  ['string', Def.string],
  ['string_name', Def.string],
  ['node_path', Def.string],
  ['dictionary', Def.dictionary],
]);

/** Type spellings accepted in a hint payload */
const PRIMITIVE_SPELLINGS: ReadonlyMap<string, () => Definition> = new Map<
  string,
  () => Definition
>([
  ['int', () => Def.integer()],
  ['float', Def.number],
  ['bool', Def.boolean],
  ['String', Def.string],
  ['StringName', Def.string],
  ['NodePath', Def.string],
  ['Dictionary', Def.dictionary],
  ['Array', () => Def.array()],
]);

const RULES: readonly ResolutionRule[] = [
  {
    name: 'enum-typed integer',
    matches: (d) => d.kind === 'int' && hasUsage(d, PropertyUsage.CLASS_IS_ENUM),
    resolve: (d, ctx) => resolveEnumPath(d.className, ctx, d.name),
  },
  {
    name: 'object',
    matches: (d) => d.kind === 'object',
    resolve: (d, ctx) =>
      d.className !== ''
        ? resolveClassName(d.className, ctx, d.name)
        : resolveTypeName(d.hintString, ctx, d.name),
  },
  {
    name: 'typed array',
    matches: (d) => d.kind === 'array' && d.hint === 'array_type',
    resolve: (d, ctx) => {
      const element = resolveTypeName(d.hintString, ctx, d.name);
      return isErr(element) ? element : ok(Def.array(element.value));
    },
  },
  {
    name: 'untyped array',
    matches: (d) => d.kind === 'array',
    resolve: () => ok(Def.array()),
  },
  {
    name: 'value kind',
    matches: () => true,
    resolve: (d) => resolveKind(d),
  },
];

export function resolveProperty(
  descriptor: PropertyDescriptor,
  ctx: GenerationContext
): Resolution {
  for (const rule of RULES) {
    if (rule.matches(descriptor)) {
      return rule.resolve(descriptor, ctx);
    }
  }
  return resolveKind(descriptor);
}

function resolveKind(descriptor: PropertyDescriptor): Resolution {
  const primitive = PRIMITIVE_KINDS.get(descriptor.kind);
  if (primitive) {
    return ok(primitive());
  }
  const builtin = builtinByKind(descriptor.kind);
  if (builtin) {
    return ok(Def.builtin(builtin.tag));
  }
  return err(
    new ResolutionError({
      message: `Unsupported property type "${descriptor.kind}" for property "${descriptor.name}"`,
      errorCode: ErrorCode.UNSUPPORTED_KIND,
      context: { property: descriptor.name, value: descriptor.kind },
    })
  );
}

/**
 * Resolve a type spelled out in a hint payload: empty, built-in composite,
 * primitive spelling, class name, then enum path
 */
export function resolveTypeName(
  name: string,
  ctx: GenerationContext,
  property: string
): Resolution {
  if (name === '') {
    return ok(Def.null());
  }
  const builtin = builtinByName(name);
  if (builtin) {
    return ok(Def.builtin(builtin.tag));
  }
  const primitive = PRIMITIVE_SPELLINGS.get(name);
  if (primitive) {
    return ok(primitive());
  }
  const source = ctx.host.findClass(name);
  if (source) {
    return referenceClass(source, ctx);
  }
  if (name.includes('.')) {
    return resolveEnumPath(name, ctx, property);
  }
  return err(
    new ResolutionError({
      message: `Unsupported type hint "${name}" for property "${property}"`,
      errorCode: ErrorCode.UNSUPPORTED_HINT,
      context: {
        property,
        value: name,
        suggestion:
          'Use a built-in type name, a primitive spelling, a class known to the host or a Class.Enum path',
      },
    })
  );
}

export function resolveClassName(
  name: string,
  ctx: GenerationContext,
  property: string
): Resolution {
  const source = ctx.host.findClass(name);
  if (!source) {
    return err(
      new ResolutionError({
        message: `Class "${name}" of property "${property}" is not known to the host`,
        errorCode: ErrorCode.CLASS_NOT_FOUND,
        context: { property, value: name },
      })
    );
  }
  return referenceClass(source, ctx);
}

/**
 * Resolve `Class.Enum` into an enum definition registered under the path
 */
export function resolveEnumPath(
  path: string,
  ctx: GenerationContext,
  property: string
): Result<RefType, ResolutionError | HostError> {
  const parts = path.split('.');
  const [className, enumName] = parts;
  if (parts.length !== 2 || !className || !enumName) {
    return err(
      new ResolutionError({
        message: `Expected enum path "ClassName.EnumName" with exactly 2 parts, got "${path}"`,
        errorCode: ErrorCode.ENUM_PATH_MALFORMED,
        context: { property, value: path },
      })
    );
  }

  const source = ctx.host.findClass(className);
  if (!source) {
    return err(
      new ResolutionError({
        message: `Class "${className}" declaring enum "${path}" is not known to the host`,
        errorCode: ErrorCode.CLASS_NOT_FOUND,
        context: { property, value: path },
      })
    );
  }

  let variants: ReadonlyArray<readonly [string, number]> | undefined;
  try {
    variants = ctx.host.enumVariants(source, enumName);
  } catch (thrown) {
    return err(
      new HostError({
        message: `Host failed to list variants of enum "${path}"`,
        errorCode: ErrorCode.PROPERTY_LIST_FAILED,
        context: { property, value: path },
        cause: toCause(thrown),
      })
    );
  }
  if (!variants) {
    return err(
      new ResolutionError({
        message: `Class "${className}" declares no enum "${enumName}"`,
        errorCode: ErrorCode.ENUM_NOT_FOUND,
        context: { property, value: path },
      })
    );
  }

  ctx.defs.set(path, Def.stringEnum(variants));
  return ok(Def.ref(path));
}
