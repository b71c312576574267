/**
 * Class identity as seen by the schema layer.
 *
 * A named class is registered globally by the host under its name; an
 * unnamed class is only reachable through the location of its script.
 */

export type ClassId =
  | { kind: 'named'; name: string }
  | { kind: 'unnamed'; location: string };

/** `native` classes come from the engine, `script` classes from user code */
export type ClassOrigin = 'native' | 'script';

export interface ClassSource {
  readonly id: ClassId;
  readonly origin: ClassOrigin;
}

export function namedClass(name: string, origin: ClassOrigin = 'script'): ClassSource {
  return { id: { kind: 'named', name }, origin };
}

export function unnamedClass(location: string): ClassSource {
  return { id: { kind: 'unnamed', location }, origin: 'script' };
}

/**
 * Key of the class definition in a definition table
 */
export function definitionName(id: ClassId): string {
  return id.kind === 'named' ? id.name : id.location;
}

/**
 * Cache key; named and unnamed identities never collide
 */
export function classKey(id: ClassId): string {
  return id.kind === 'named' ? `named:${id.name}` : `unnamed:${id.location}`;
}
