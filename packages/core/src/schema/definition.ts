/**
 * Schema IR.
 *
 * A Definition is one node of the schema graph; a Type is either a
 * Definition inlined at its use site or a Ref naming an entry of the
 * definition table. Property and variant maps keep host order.
 */

import { ErrorCode } from '../errors/codes.js';
import { GraphError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { BuiltinTag } from './builtins.js';
import type { ClassSource } from './class-source.js';

export type IntegerFormat =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64';

interface Described {
  description?: string;
}

export interface NullDefinition extends Described {
  kind: 'null';
}

export interface BooleanDefinition extends Described {
  kind: 'boolean';
}

export interface IntegerDefinition extends Described {
  kind: 'integer';
  /** Width enforced when instantiating; absent means any 64-bit integer */
  format?: IntegerFormat;
}

export interface NumberDefinition extends Described {
  kind: 'number';
}

export interface StringDefinition extends Described {
  kind: 'string';
}

/** An object with no declared properties is an open dictionary */
export interface ObjectDefinition extends Described {
  kind: 'object';
  properties: Map<string, Type>;
}

export interface ArrayDefinition extends Described {
  kind: 'array';
  items?: Type;
}

export interface TupleDefinition extends Described {
  kind: 'tuple';
  items: Type[];
}

/** String enum serialized by name, instantiated as the integer value */
export interface EnumDefinition extends Described {
  kind: 'enum';
  variants: Map<string, number>;
}

export interface ClassDefinition extends Described {
  kind: 'class';
  source: ClassSource;
  properties: Map<string, Type>;
}

/** Built-in composite value type; its structure lives in the catalog */
export interface BuiltinDefinition {
  kind: 'builtin';
  tag: BuiltinTag;
}

export type Definition =
  | NullDefinition
  | BooleanDefinition
  | IntegerDefinition
  | NumberDefinition
  | StringDefinition
  | ObjectDefinition
  | ArrayDefinition
  | TupleDefinition
  | EnumDefinition
  | ClassDefinition
  | BuiltinDefinition;

export interface RefType extends Described {
  kind: 'ref';
  name: string;
}

export type Type = Definition | RefType;

export type DefinitionTable = Map<string, Definition>;

export const Def = {
  null: (): NullDefinition => ({ kind: 'null' }),
  boolean: (): BooleanDefinition => ({ kind: 'boolean' }),
  integer: (format?: IntegerFormat): IntegerDefinition =>
    format ? { kind: 'integer', format } : { kind: 'integer' },
  number: (): NumberDefinition => ({ kind: 'number' }),
  string: (): StringDefinition => ({ kind: 'string' }),
  dictionary: (): ObjectDefinition => ({ kind: 'object', properties: new Map() }),
  object: (entries: Iterable<readonly [string, Type]>): ObjectDefinition => ({
    kind: 'object',
    properties: new Map(entries),
  }),
  array: (items?: Type): ArrayDefinition =>
    items ? { kind: 'array', items } : { kind: 'array' },
  tuple: (items: Type[]): TupleDefinition => ({ kind: 'tuple', items }),
  stringEnum: (entries: Iterable<readonly [string, number]>): EnumDefinition => ({
    kind: 'enum',
    variants: new Map(entries),
  }),
  builtin: (tag: BuiltinTag): BuiltinDefinition => ({ kind: 'builtin', tag }),
  ref: (name: string): RefType => ({ kind: 'ref', name }),
} as const;

export function isRef(type: Type): type is RefType {
  return type.kind === 'ref';
}

/**
 * Objects and classes are emitted as-is at the root; everything else is
 * wrapped into `{ value: ... }`.
 */
export function isObjectLike(
  definition: Definition
): definition is ObjectDefinition | ClassDefinition {
  return definition.kind === 'object' || definition.kind === 'class';
}

/**
 * Attach a description. Built-in definitions are shared catalog entries
 * and refuse descriptions.
 */
export function withDescription<T extends Type>(type: T, description: string): T {
  if (type.kind === 'builtin') {
    console.warn(
      `[reflect-schema] description ignored on built-in type ${type.tag}`
    );
    return type;
  }
  return { ...type, description };
}

export function resolveType(
  type: Type,
  defs: ReadonlyMap<string, Definition>
): Result<Definition, GraphError> {
  if (type.kind !== 'ref') {
    return ok(type);
  }
  const found = defs.get(type.name);
  if (!found) {
    return err(
      new GraphError({
        message: `Expected definition "${type.name}" to be in the definition table`,
        errorCode: ErrorCode.DANGLING_REFERENCE,
        context: { definition: type.name },
      })
    );
  }
  return ok(found);
}

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
