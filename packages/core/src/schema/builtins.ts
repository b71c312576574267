/**
 * Catalog of built-in composite value types.
 *
 * Each entry maps a host value kind to a canonical definition name, the
 * structural definition emitted under `$defs`, and the other entries that
 * structure refers to.
 */

import type { ValueKind } from '../resolver/property-descriptor.js';
import { Def, type Definition, type IntegerFormat } from './definition.js';

export const BUILTIN_TAGS = [
  'Vector2',
  'Vector2i',
  'Rect2',
  'Rect2i',
  'Vector3',
  'Vector3i',
  'Transform2D',
  'Vector4',
  'Vector4i',
  'Plane',
  'Quaternion',
  'AABB',
  'Basis',
  'Transform3D',
  'Projection',
  'Color',
  'RID',
  'PackedByteArray',
  'PackedInt32Array',
  'PackedInt64Array',
  'PackedFloat32Array',
  'PackedFloat64Array',
  'PackedStringArray',
  'PackedVector2Array',
  'PackedVector3Array',
  'PackedColorArray',
  'PackedVector4Array',
] as const;

export type BuiltinTag = (typeof BUILTIN_TAGS)[number];

export interface BuiltinEntry {
  readonly tag: BuiltinTag;
  /** Host value kind this entry is resolved from */
  readonly kind: ValueKind;
  readonly dependencies: readonly BuiltinTag[];
  sourceDefinition(): Definition;
}

function floats(...names: string[]): Definition {
  return Def.object(names.map((name) => [name, Def.number()] as const));
}

function ints(format: IntegerFormat, ...names: string[]): Definition {
  return Def.object(names.map((name) => [name, Def.integer(format)] as const));
}

function fields(entries: Record<string, BuiltinTag>): Definition {
  return Def.object(
    Object.entries(entries).map(([name, tag]) => [name, Def.builtin(tag)] as const)
  );
}

function entry(
  tag: BuiltinTag,
  kind: ValueKind,
  sourceDefinition: () => Definition,
  dependencies: readonly BuiltinTag[] = []
): BuiltinEntry {
  return { tag, kind, dependencies, sourceDefinition };
}

const ENTRIES: readonly BuiltinEntry[] = [
  entry('Vector2', 'vector2', () => floats('x', 'y')),
  entry('Vector2i', 'vector2i', () => ints('int32', 'x', 'y')),
  entry(
    'Rect2',
    'rect2',
    () => fields({ position: 'Vector2', size: 'Vector2' }),
    ['Vector2']
  ),
  entry(
    'Rect2i',
    'rect2i',
    () => fields({ position: 'Vector2i', size: 'Vector2i' }),
    ['Vector2i']
  ),
  entry('Vector3', 'vector3', () => floats('x', 'y', 'z')),
  entry('Vector3i', 'vector3i', () => ints('int32', 'x', 'y', 'z')),
  entry(
    'Transform2D',
    'transform2d',
    () => fields({ a: 'Vector2', b: 'Vector2', origin: 'Vector2' }),
    ['Vector2']
  ),
  entry('Vector4', 'vector4', () => floats('x', 'y', 'z', 'w')),
  entry('Vector4i', 'vector4i', () => ints('int32', 'x', 'y', 'z', 'w')),
  entry(
    'Plane',
    'plane',
    () =>
      Def.object([
        ['normal', Def.builtin('Vector3')],
        ['d', Def.number()],
      ]),
    ['Vector3']
  ),
  entry('Quaternion', 'quaternion', () => floats('x', 'y', 'z', 'w')),
  entry(
    'AABB',
    'aabb',
    () => fields({ position: 'Vector3', size: 'Vector3' }),
    ['Vector3']
  ),
  entry(
    'Basis',
    'basis',
    () =>
      Def.object([
        [
          'rows',
          Def.tuple([
            Def.builtin('Vector3'),
            Def.builtin('Vector3'),
            Def.builtin('Vector3'),
          ]),
        ],
      ]),
    ['Vector3']
  ),
  entry(
    'Transform3D',
    'transform3d',
    () => fields({ basis: 'Basis', origin: 'Vector3' }),
    ['Basis', 'Vector3']
  ),
  entry(
    'Projection',
    'projection',
    () =>
      Def.object([
        [
          'cols',
          Def.tuple([
            Def.builtin('Vector4'),
            Def.builtin('Vector4'),
            Def.builtin('Vector4'),
            Def.builtin('Vector4'),
          ]),
        ],
      ]),
    ['Vector4']
  ),
  entry('Color', 'color', () => floats('r', 'g', 'b', 'a')),
  entry('RID', 'rid', () => Def.integer('uint64')),
  entry('PackedByteArray', 'packed_byte_array', () =>
    Def.array(Def.integer('uint8'))
  ),
  entry('PackedInt32Array', 'packed_int32_array', () =>
    Def.array(Def.integer('int32'))
  ),
  entry('PackedInt64Array', 'packed_int64_array', () =>
    Def.array(Def.integer('int64'))
  ),
  entry('PackedFloat32Array', 'packed_float32_array', () =>
    Def.array(Def.number())
  ),
  entry('PackedFloat64Array', 'packed_float64_array', () =>
    Def.array(Def.number())
  ),
  entry('PackedStringArray', 'packed_string_array', () =>
    Def.array(Def.string())
  ),
  entry(
    'PackedVector2Array',
    'packed_vector2_array',
    () => Def.array(Def.builtin('Vector2')),
    ['Vector2']
  ),
  entry(
    'PackedVector3Array',
    'packed_vector3_array',
    () => Def.array(Def.builtin('Vector3')),
    ['Vector3']
  ),
  entry(
    'PackedColorArray',
    'packed_color_array',
    () => Def.array(Def.builtin('Color')),
    ['Color']
  ),
  entry(
    'PackedVector4Array',
    'packed_vector4_array',
    () => Def.array(Def.builtin('Vector4')),
    ['Vector4']
  ),
];

const BY_TAG = new Map<string, BuiltinEntry>(
  ENTRIES.map((item) => [item.tag, item])
);
const BY_KIND = new Map<ValueKind, BuiltinEntry>(
  ENTRIES.map((item) => [item.kind, item])
);

export function builtinEntries(): readonly BuiltinEntry[] {
  return ENTRIES;
}

export function builtinEntry(tag: BuiltinTag): BuiltinEntry {
  const found = BY_TAG.get(tag);
  if (!found) {
    throw new Error(`Built-in catalog has no entry for ${tag}`);
  }
  return found;
}

/** Look up a catalog entry by its canonical name (e.g. an array hint payload) */
export function builtinByName(name: string): BuiltinEntry | undefined {
  return BY_TAG.get(name);
}

export function builtinByKind(kind: ValueKind): BuiltinEntry | undefined {
  return BY_KIND.get(kind);
}
