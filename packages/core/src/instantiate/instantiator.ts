/**
 * JSON → native instantiation against a definition.
 */

import { ErrorCode } from '../errors/codes.js';
import { instantiateClass } from '../resolver/class-generator.js';
import { builtinEntry } from '../schema/builtins.js';
import { definitionName } from '../schema/class-source.js';
import {
  assertNever,
  resolveType,
  type Definition,
  type EnumDefinition,
  type IntegerDefinition,
  type IntegerFormat,
  type ObjectDefinition,
  type Type,
} from '../schema/definition.js';
import { ConversionError, GraphError } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import {
  appendPointer,
  describeJsonType,
  excerpt,
  isJsonObject,
} from '../util/json.js';
import type { InstantiationContext, InstantiationFailure } from './context.js';
import { Native, type ElementType, type NativeValue } from './native-value.js';
import { rawToNative } from './raw-json.js';

type Instantiation = Result<NativeValue, InstantiationFailure>;

const INTEGER_RANGES: Record<IntegerFormat, readonly [bigint, bigint]> = {
  int8: [-(2n ** 7n), 2n ** 7n - 1n],
  int16: [-(2n ** 15n), 2n ** 15n - 1n],
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint8: [0n, 2n ** 8n - 1n],
  uint16: [0n, 2n ** 16n - 1n],
  uint32: [0n, 2n ** 32n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
};

// signed or unsigned 64-bit
const DEFAULT_INTEGER_RANGE: readonly [bigint, bigint] = [
  -(2n ** 63n),
  2n ** 64n - 1n,
];

function mismatch(expected: string, value: unknown, path: string): ConversionError {
  return new ConversionError({
    message: `Expected ${expected}, got ${describeJsonType(value)}`,
    errorCode: ErrorCode.TYPE_MISMATCH,
    context: { path, value, valueExcerpt: excerpt(value) },
  });
}

export function instantiate(
  value: unknown,
  definition: Definition,
  ctx: InstantiationContext,
  path = ''
): Instantiation {
  if (ctx.depth >= ctx.maxDepth) {
    return err(
      new GraphError({
        message: `JSON nesting exceeds the maximum depth of ${ctx.maxDepth}`,
        errorCode: ErrorCode.DEPTH_LIMIT_EXCEEDED,
        context: { path, setting: 'instantiation.maxDepth' },
      })
    );
  }
  ctx.depth += 1;
  try {
    return convert(value, definition, ctx, path);
  } finally {
    ctx.depth -= 1;
  }
}

/**
 * Resolve a type against the context's table, then instantiate
 */
export function instantiateType(
  value: unknown,
  type: Type,
  ctx: InstantiationContext,
  path: string
): Instantiation {
  const definition = resolveType(type, ctx.defs);
  if (isErr(definition)) {
    return definition;
  }
  return instantiate(value, definition.value, ctx, path);
}

function convert(
  value: unknown,
  definition: Definition,
  ctx: InstantiationContext,
  path: string
): Instantiation {
  switch (definition.kind) {
    case 'null':
      return value === null ? ok(Native.nil()) : err(mismatch('null', value, path));
    case 'boolean':
      return typeof value === 'boolean'
        ? ok(Native.bool(value))
        : err(mismatch('boolean', value, path));
    case 'integer':
      return convertInteger(value, definition, path);
    case 'number':
      if (typeof value === 'bigint') {
        return ok(Native.float(Number(value)));
      }
      return typeof value === 'number' && Number.isFinite(value)
        ? ok(Native.float(value))
        : err(mismatch('number', value, path));
    case 'string':
      return typeof value === 'string'
        ? ok(Native.string(value))
        : err(mismatch('string', value, path));
    case 'object':
      return convertObject(value, definition, ctx, path);
    case 'array': {
      if (!Array.isArray(value)) {
        return err(mismatch('array', value, path));
      }
      if (!definition.items) {
        return rawToNative(value, ctx, path);
      }
      const itemDefinition = resolveType(definition.items, ctx.defs);
      if (isErr(itemDefinition)) {
        return itemDefinition;
      }
      const items: NativeValue[] = [];
      for (const [index, item] of value.entries()) {
        const converted = instantiate(
          item,
          itemDefinition.value,
          ctx,
          appendPointer(path, index)
        );
        if (isErr(converted)) return converted;
        items.push(converted.value);
      }
      return ok(Native.array(items, elementTypeOf(itemDefinition.value)));
    }
    case 'tuple': {
      if (!Array.isArray(value)) {
        return err(mismatch('array', value, path));
      }
      if (value.length !== definition.items.length) {
        return err(
          new ConversionError({
            message: `Expected tuple of ${definition.items.length} items, got ${value.length}`,
            errorCode: ErrorCode.TUPLE_ARITY_MISMATCH,
            context: { path, valueExcerpt: excerpt(value) },
          })
        );
      }
      const items: NativeValue[] = [];
      for (const [index, type] of definition.items.entries()) {
        const converted = instantiateType(
          value[index],
          type,
          ctx,
          appendPointer(path, index)
        );
        if (isErr(converted)) return converted;
        items.push(converted.value);
      }
      return ok(Native.array(items));
    }
    case 'enum':
      return convertEnum(value, definition, path);
    case 'class':
      return instantiateClass(definition, value, ctx, path);
    case 'builtin': {
      const inner = instantiate(
        value,
        builtinEntry(definition.tag).sourceDefinition(),
        ctx,
        path
      );
      if (isErr(inner)) return inner;
      return ok(Native.builtin(definition.tag, inner.value));
    }
    default:
      return assertNever(definition, 'definition kind');
  }
}

function convertInteger(
  value: unknown,
  definition: IntegerDefinition,
  path: string
): Instantiation {
  if (typeof value === 'bigint') {
    return checkIntegerRange(value, definition, path);
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return err(mismatch('integer', value, path));
  }
  if (!Number.isInteger(value)) {
    return err(
      new ConversionError({
        message: 'Expected integer, got float',
        errorCode: ErrorCode.EXPECTED_INTEGER_GOT_FLOAT,
        context: { path, value },
      })
    );
  }
  // a double past 2^53 may already be rounded
  if (!Number.isSafeInteger(value)) {
    return err(
      new ConversionError({
        message: `Integer ${value} cannot be represented exactly`,
        errorCode: ErrorCode.INTEGER_OUT_OF_RANGE,
        context: { path, value },
      })
    );
  }
  return checkIntegerRange(BigInt(value), definition, path);
}

function checkIntegerRange(
  value: bigint,
  definition: IntegerDefinition,
  path: string
): Instantiation {
  const [min, max] = definition.format
    ? INTEGER_RANGES[definition.format]
    : DEFAULT_INTEGER_RANGE;
  if (value < min || value > max) {
    return err(
      new ConversionError({
        message: `Integer ${value} is outside the ${definition.format ?? 'int64/uint64'} range [${min}, ${max}]`,
        errorCode: ErrorCode.INTEGER_OUT_OF_RANGE,
        context: { path, value: value.toString() },
      })
    );
  }
  const number = Number(value);
  return ok(Native.int(Number.isSafeInteger(number) ? number : value));
}

function convertObject(
  value: unknown,
  definition: ObjectDefinition,
  ctx: InstantiationContext,
  path: string
): Instantiation {
  if (!isJsonObject(value)) {
    return err(mismatch('object', value, path));
  }
  if (definition.properties.size === 0) {
    return rawToNative(value, ctx, path);
  }

  const keys = Object.keys(value);
  if (keys.length !== definition.properties.size) {
    return err(
      new ConversionError({
        message: `Expected JSON object to have ${definition.properties.size} properties, got ${keys.length}`,
        errorCode: ErrorCode.PROPERTY_COUNT_MISMATCH,
        context: { path, valueExcerpt: excerpt(value) },
      })
    );
  }

  const entries: Array<[string, NativeValue]> = [];
  for (const [name, type] of definition.properties) {
    if (!Object.hasOwn(value, name)) {
      return err(
        new ConversionError({
          message: `Missing property "${name}"`,
          errorCode: ErrorCode.MISSING_PROPERTY,
          context: { path, property: name },
        })
      );
    }
    const converted = instantiateType(
      value[name],
      type,
      ctx,
      appendPointer(path, name)
    );
    if (isErr(converted)) return converted;
    entries.push([name, converted.value]);
  }
  return ok(Native.dictionary(entries));
}

function convertEnum(
  value: unknown,
  definition: EnumDefinition,
  path: string
): Instantiation {
  if (typeof value !== 'string') {
    return err(mismatch('enum variant name', value, path));
  }
  const variant = definition.variants.get(value);
  if (variant === undefined) {
    const names = [...definition.variants.keys()].join(', ');
    return err(
      new ConversionError({
        message: `Expected one of ${names}, got "${value}"`,
        errorCode: ErrorCode.UNKNOWN_VARIANT,
        context: { path, value, suggestion: `Use one of: ${names}` },
      })
    );
  }
  return ok(Native.int(variant));
}

/**
 * Element type recorded on arrays typed by a definition
 */
export function elementTypeOf(definition: Definition): ElementType {
  switch (definition.kind) {
    case 'null':
      return { type: 'nil' };
    case 'boolean':
      return { type: 'bool' };
    case 'integer':
    case 'enum':
      return { type: 'int' };
    case 'number':
      return { type: 'float' };
    case 'string':
      return { type: 'string' };
    case 'object':
      return { type: 'dictionary' };
    case 'array':
    case 'tuple':
      return { type: 'array' };
    case 'class':
      return { type: 'object', className: definitionName(definition.source.id) };
    case 'builtin':
      return { type: 'builtin', tag: definition.tag };
    default:
      return assertNever(definition, 'definition kind');
  }
}
