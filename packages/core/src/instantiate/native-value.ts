/**
 * Dynamic values handed to the host.
 *
 * Integers and floats are distinct so that `1` instantiated against a
 * number definition stays a float. An integer is a bigint only when it
 * lies outside the safe range of a double.
 */

import type { BuiltinTag } from '../schema/builtins.js';
import type { ObjectHandle } from '../host/reflection-host.js';
import type { ExactJsonValue } from '../util/json.js';

export type NativeValue =
  | { type: 'nil' }
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number | bigint }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'array'; element: ElementType | null; items: NativeValue[] }
  | { type: 'dictionary'; entries: Map<string, NativeValue> }
  | { type: 'builtin'; tag: BuiltinTag; value: NativeValue }
  | { type: 'object'; className: string; handle: ObjectHandle };

export type NativeType = NativeValue['type'];

/** Element type of a typed array */
export type ElementType =
  | { type: Exclude<NativeType, 'builtin' | 'object'> }
  | { type: 'builtin'; tag: BuiltinTag }
  | { type: 'object'; className: string };

export const Native = {
  nil: (): NativeValue => ({ type: 'nil' }),
  bool: (value: boolean): NativeValue => ({ type: 'bool', value }),
  int: (value: number | bigint): NativeValue => ({ type: 'int', value }),
  float: (value: number): NativeValue => ({ type: 'float', value }),
  string: (value: string): NativeValue => ({ type: 'string', value }),
  array: (items: NativeValue[], element: ElementType | null = null): NativeValue => ({
    type: 'array',
    element,
    items,
  }),
  dictionary: (entries: Iterable<readonly [string, NativeValue]>): NativeValue => ({
    type: 'dictionary',
    entries: new Map(entries),
  }),
  builtin: (tag: BuiltinTag, value: NativeValue): NativeValue => ({
    type: 'builtin',
    tag,
    value,
  }),
} as const;

export function sameElementType(a: ElementType, b: ElementType): boolean {
  if (a.type === 'builtin' && b.type === 'builtin') return a.tag === b.tag;
  if (a.type === 'object' && b.type === 'object') {
    return a.className === b.className;
  }
  return a.type === b.type;
}

/**
 * Element type a value would contribute to an inferred array type
 */
export function elementTypeOfValue(value: NativeValue): ElementType {
  switch (value.type) {
    case 'builtin':
      return { type: 'builtin', tag: value.tag };
    case 'object':
      return { type: 'object', className: value.className };
    default:
      return { type: value.type };
  }
}

/**
 * Plain JSON rendering, used for output and diagnostics.
 * Objects render through `describeObject`, which hosts may supply.
 */
export function toPlain(
  value: NativeValue,
  describeObject: (className: string, handle: object) => ExactJsonValue = (className) => ({
    $class: className,
  })
): ExactJsonValue {
  switch (value.type) {
    case 'nil':
      return null;
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map((item) => toPlain(item, describeObject));
    case 'dictionary': {
      const out: Record<string, ExactJsonValue> = {};
      for (const [key, item] of value.entries) {
        out[key] = toPlain(item, describeObject);
      }
      return out;
    }
    case 'builtin':
      return toPlain(value.value, describeObject);
    case 'object':
      return describeObject(value.className, value.handle);
  }
}
