/**
 * Untyped JSON → native mapping, used for open dictionaries and untyped
 * arrays. Arrays whose elements all share one non-nil kind become typed.
 */

import { ErrorCode } from '../errors/codes.js';
import { ConversionError, GraphError } from '../types/errors.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { appendPointer, describeJsonType, isJsonObject } from '../util/json.js';
import type { InstantiationContext } from './context.js';
import {
  Native,
  elementTypeOfValue,
  sameElementType,
  type ElementType,
  type NativeValue,
} from './native-value.js';

type RawResult = Result<NativeValue, ConversionError | GraphError>;

export function rawToNative(
  value: unknown,
  ctx: InstantiationContext,
  path: string,
  depth = ctx.depth
): RawResult {
  if (depth > ctx.maxDepth) {
    return err(
      new GraphError({
        message: `JSON nesting exceeds the maximum depth of ${ctx.maxDepth}`,
        errorCode: ErrorCode.DEPTH_LIMIT_EXCEEDED,
        context: { path, setting: 'instantiation.maxDepth' },
      })
    );
  }

  if (value === null) return ok(Native.nil());
  if (typeof value === 'boolean') return ok(Native.bool(value));
  if (typeof value === 'string') return ok(Native.string(value));
  if (typeof value === 'bigint') return ok(Native.int(value));
  if (typeof value === 'number' && Number.isFinite(value)) {
    return ok(Number.isInteger(value) ? Native.int(value) : Native.float(value));
  }

  if (Array.isArray(value)) {
    const items: NativeValue[] = [];
    for (const [index, item] of value.entries()) {
      const converted = rawToNative(item, ctx, appendPointer(path, index), depth + 1);
      if (isErr(converted)) return converted;
      items.push(converted.value);
    }
    return ok(Native.array(items, inferElementType(items)));
  }

  if (isJsonObject(value)) {
    const entries: Array<[string, NativeValue]> = [];
    for (const [key, item] of Object.entries(value)) {
      const converted = rawToNative(item, ctx, appendPointer(path, key), depth + 1);
      if (isErr(converted)) return converted;
      entries.push([key, converted.value]);
    }
    return ok(Native.dictionary(entries));
  }

  return err(
    new ConversionError({
      message: `Value of type ${describeJsonType(value)} has no JSON representation`,
      errorCode: ErrorCode.TYPE_MISMATCH,
      context: { path },
    })
  );
}

/**
 * Shared element type of the items, or null when mixed, empty or all nil
 */
export function inferElementType(items: readonly NativeValue[]): ElementType | null {
  const [first, ...rest] = items;
  if (!first || first.type === 'nil') return null;
  const candidate = elementTypeOfValue(first);
  for (const item of rest) {
    if (!sameElementType(candidate, elementTypeOfValue(item))) {
      return null;
    }
  }
  return candidate;
}
