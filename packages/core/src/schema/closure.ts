/**
 * Built-in dependency closure.
 *
 * Built-in composites are referenced by tag but defined by the catalog, so
 * every tag reachable from the schema (and every tag those entries depend
 * on) needs a `$defs` entry next to the explicit definitions.
 */

import { builtinEntry, type BuiltinTag } from './builtins.js';
import { assertNever, type Definition, type Type } from './definition.js';

export function insertBuiltinDefinitions(type: Type, into: BuiltinTag[]): void {
  switch (type.kind) {
    case 'ref':
    case 'null':
    case 'boolean':
    case 'integer':
    case 'number':
    case 'string':
    case 'enum':
      return;
    case 'object':
    case 'class':
      for (const property of type.properties.values()) {
        insertBuiltinDefinitions(property, into);
      }
      return;
    case 'array':
      if (type.items) insertBuiltinDefinitions(type.items, into);
      return;
    case 'tuple':
      for (const item of type.items) insertBuiltinDefinitions(item, into);
      return;
    case 'builtin':
      insertWithDependencies(type.tag, into);
      return;
    default:
      assertNever(type, 'type kind');
  }
}

function insertWithDependencies(tag: BuiltinTag, into: BuiltinTag[]): void {
  into.push(tag);
  for (const dependency of builtinEntry(tag).dependencies) {
    insertWithDependencies(dependency, into);
  }
}

/**
 * Catalog definitions needed by the schema, minus names already present in
 * the explicit table, deduplicated and sorted by name
 */
export function closureDefinitions(
  base: Definition,
  defs: ReadonlyMap<string, Definition>
): Array<[BuiltinTag, Definition]> {
  const tags: BuiltinTag[] = [];
  insertBuiltinDefinitions(base, tags);
  for (const definition of defs.values()) {
    insertBuiltinDefinitions(definition, tags);
  }

  const unique = [...new Set(tags)]
    .filter((tag) => !defs.has(tag))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return unique.map((tag) => [tag, builtinEntry(tag).sourceDefinition()]);
}
