/**
 * IR → JSON Schema (draft 2020-12).
 */

import type { JsonObject, JsonValue } from '../util/json.js';
import { escapePointerToken } from '../util/json.js';
import { assertNever, type Definition, type Type } from './definition.js';

export const JSON_SCHEMA_DIALECT =
  'https://json-schema.org/draft/2020-12/schema';

/** `$ref` target of a `$defs` entry */
export function definitionRef(name: string): string {
  return `#/$defs/${encodeURIComponent(escapePointerToken(name))}`;
}

function propertiesFields(properties: ReadonlyMap<string, Type>): JsonObject {
  const serialized: JsonObject = {};
  for (const [name, type] of properties) {
    serialized[name] = serializeType(type);
  }
  return {
    properties: serialized,
    required: [...properties.keys()],
    additionalProperties: false,
  };
}

export function serializeType(type: Type): JsonObject {
  if (type.kind === 'ref') {
    return type.description !== undefined
      ? { description: type.description, $ref: definitionRef(type.name) }
      : { $ref: definitionRef(type.name) };
  }
  return serializeDefinition(type);
}

export function serializeDefinition(definition: Definition): JsonObject {
  const out: JsonObject = {};
  if (definition.kind !== 'builtin' && definition.description !== undefined) {
    out.description = definition.description;
  }
  return { ...out, ...definitionFields(definition) };
}

function definitionFields(definition: Definition): JsonObject {
  switch (definition.kind) {
    case 'null':
      return { type: 'null' };
    case 'boolean':
      return { type: 'boolean' };
    case 'integer':
      return { type: 'integer' };
    case 'number':
      return { type: 'number' };
    case 'string':
      return { type: 'string' };
    case 'object':
      return definition.properties.size > 0
        ? { type: 'object', ...propertiesFields(definition.properties) }
        : { type: 'object' };
    case 'class':
      return { type: 'object', ...propertiesFields(definition.properties) };
    case 'array':
      return definition.items
        ? { type: 'array', items: serializeType(definition.items) }
        : { type: 'array' };
    case 'tuple': {
      const prefixItems: JsonValue[] = definition.items.map(serializeType);
      return { type: 'array', prefixItems };
    }
    case 'enum':
      return { type: 'string', enum: [...definition.variants.keys()] };
    case 'builtin':
      return { $ref: definitionRef(definition.tag) };
    default:
      return assertNever(definition, 'definition kind');
  }
}

export interface ResponseFormat extends JsonObject {
  type: 'json_schema';
  json_schema: { name: string; schema: JsonObject };
}

export const RESPONSE_FORMAT_NAME = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Structured-output wrapper around a schema document
 */
export function responseFormat(name: string, schema: JsonObject): ResponseFormat {
  return { type: 'json_schema', json_schema: { name, schema } };
}
