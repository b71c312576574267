/**
 * Capabilities the schema layer needs from the reflective runtime.
 *
 * Hosts may throw from any method; callers wrap the failure into a
 * HostError.
 */

import type { NativeValue } from '../instantiate/native-value.js';
import type { PropertyDescriptor } from '../resolver/property-descriptor.js';
import type { ClassSource } from '../schema/class-source.js';

/** Opaque reference to a host object */
export type ObjectHandle = object;

export interface ReflectionHost {
  /** Resolve a class by its global name */
  findClass(name: string): ClassSource | undefined;
  /** Ordered property list, including host bookkeeping entries */
  propertyList(source: ClassSource): PropertyDescriptor[];
  /**
   * Variants of an enum declared by the class, in declaration order, or
   * undefined when the class declares no such enum
   */
  enumVariants(
    source: ClassSource,
    enumName: string
  ): ReadonlyArray<readonly [string, number]> | undefined;
}

export interface ObjectFactory {
  /** Blank instance of the class */
  construct(source: ClassSource): ObjectHandle;
  setProperty(handle: ObjectHandle, name: string, value: NativeValue): void;
}

export type SchemaHost = ReflectionHost & ObjectFactory;
