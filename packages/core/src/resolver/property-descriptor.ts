/**
 * Reflective property descriptors as reported by the host.
 */

export const VALUE_KINDS = [
  'nil',
  'bool',
  'int',
  'float',
  'string',
  'vector2',
  'vector2i',
  'rect2',
  'rect2i',
  'vector3',
  'vector3i',
  'transform2d',
  'vector4',
  'vector4i',
  'plane',
  'quaternion',
  'aabb',
  'basis',
  'transform3d',
  'projection',
  'color',
  'string_name',
  'node_path',
  'rid',
  'object',
  'callable',
  'signal',
  'dictionary',
  'array',
  'packed_byte_array',
  'packed_int32_array',
  'packed_int64_array',
  'packed_float32_array',
  'packed_float64_array',
  'packed_string_array',
  'packed_vector2_array',
  'packed_vector3_array',
  'packed_color_array',
  'packed_vector4_array',
] as const;

export type ValueKind = (typeof VALUE_KINDS)[number];

export const PROPERTY_HINTS = [
  'none',
  'range',
  'enum',
  'flags',
  'file',
  'dir',
  'resource_type',
  'multiline_text',
  'placeholder_text',
  'type_string',
  'array_type',
] as const;

export type PropertyHint = (typeof PROPERTY_HINTS)[number];

/** Usage bit flags */
export const PropertyUsage = {
  NONE: 0,
  STORAGE: 1 << 1,
  EDITOR: 1 << 2,
  GROUP: 1 << 6,
  CATEGORY: 1 << 7,
  SUBGROUP: 1 << 8,
  SCRIPT_VARIABLE: 1 << 12,
  CLASS_IS_ENUM: 1 << 16,
  DEFAULT: (1 << 1) | (1 << 2),
} as const;

export const GROUPING_USAGE =
  PropertyUsage.GROUP | PropertyUsage.CATEGORY | PropertyUsage.SUBGROUP;

export interface PropertyDescriptor {
  name: string;
  kind: ValueKind;
  /** Class name for objects, `Class.Enum` path for enum-typed integers */
  className: string;
  hint: PropertyHint;
  /** Hint payload, e.g. the element type name of a typed array */
  hintString: string;
  usage: number;
}

export function hasUsage(descriptor: PropertyDescriptor, flag: number): boolean {
  return (descriptor.usage & flag) !== 0;
}

const KIND_SET: ReadonlySet<string> = new Set(VALUE_KINDS);
const HINT_SET: ReadonlySet<string> = new Set(PROPERTY_HINTS);

export function isValueKind(value: string): value is ValueKind {
  return KIND_SET.has(value);
}

export function isPropertyHint(value: string): value is PropertyHint {
  return HINT_SET.has(value);
}

/**
 * Fill in the defaults of a partially specified descriptor
 */
export function propertyDescriptor(
  init: Pick<PropertyDescriptor, 'name' | 'kind'> & Partial<PropertyDescriptor>
): PropertyDescriptor {
  return {
    className: '',
    hint: 'none',
    hintString: '',
    usage: PropertyUsage.DEFAULT,
    ...init,
  };
}
