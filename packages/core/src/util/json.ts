/**
 * Plain JSON value model and JSON Pointer helpers.
 */

import { isInteger, parse, stringify } from 'lossless-json';

import { ParseError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

export type JsonPrimitive = null | boolean | number | string;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** JSON read without loss: integers beyond 2^53 are bigint */
export type ExactJsonValue =
  | JsonPrimitive
  | bigint
  | ExactJsonValue[]
  | { [key: string]: ExactJsonValue };

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function unescapePointerToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function appendPointer(base: string, token: string | number): string {
  return `${base}/${escapePointerToken(String(token))}`;
}

/**
 * Parse JSON text. The result is typed `unknown`; consumers narrow it
 * against a definition.
 */
export function parseJson(text: string, input = '<input>'): Result<unknown, ParseError> {
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    return err(
      new ParseError({
        message: `Invalid JSON in ${input}: ${error instanceof Error ? error.message : String(error)}`,
        context: { input },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}

function parseExactNumber(text: string): number | bigint {
  const number = Number(text);
  return isInteger(text) && !Number.isSafeInteger(number) ? BigInt(text) : number;
}

/**
 * Parse a JSON payload keeping every integer exact. Integers that do not
 * fit a double without rounding come back as bigint.
 */
export function parseJsonExact(text: string, input = '<input>'): Result<unknown, ParseError> {
  try {
    const parsed: unknown = parse(text, null, parseExactNumber);
    return ok(parsed);
  } catch (error) {
    return err(
      new ParseError({
        message: `Invalid JSON in ${input}: ${error instanceof Error ? error.message : String(error)}`,
        context: { input },
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
}

/**
 * JSON text of a value that may hold bigint integers
 */
export function formatJson(value: unknown, indent?: number): string {
  return stringify(value, undefined, indent) ?? 'null';
}

/**
 * Numeric view of an exact payload for the validator, which only
 * understands numbers. Returns the value itself when it holds no bigint.
 */
export function toValidationValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (Array.isArray(value)) {
    let changed = false;
    const items = value.map((item: unknown) => {
      const next = toValidationValue(item);
      if (next !== item) changed = true;
      return next;
    });
    return changed ? items : value;
  }
  if (isJsonObject(value)) {
    let changed = false;
    const entries = Object.entries(value).map(([key, item]): [string, unknown] => {
      const next = toValidationValue(item);
      if (next !== item) changed = true;
      return [key, next];
    });
    return changed ? Object.fromEntries(entries) : value;
  }
  return value;
}

/**
 * Short, single-line rendering of a value for error excerpts
 */
export function excerpt(value: unknown, max = 60): string {
  let text: string;
  try {
    text = stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  return typeof value;
}
