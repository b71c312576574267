import fs from 'node:fs';
import path from 'node:path';
import { Ajv2020 } from 'ajv/dist/2020.js';
import {
  ConfigError,
  err,
  isErr,
  ok,
  parseJson,
  type ParseError,
  type Result,
  type SchemaOptions,
} from '@reflect-schema/core';

const positiveInteger = { type: 'integer', minimum: 1 } as const;

/** Shape of a `--config` file; mirrors SchemaOptions */
export const CONFIG_FILE_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  properties: {
    generation: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxDepth: positiveInteger,
        excludePropertyPatterns: { type: 'array', items: { type: 'string' } },
        skipGroupingEntries: { type: 'boolean' },
      },
    },
    instantiation: {
      type: 'object',
      additionalProperties: false,
      properties: { maxDepth: positiveInteger },
    },
    validation: {
      type: 'object',
      additionalProperties: false,
      properties: {
        allErrors: { type: 'boolean' },
        maxReportedErrors: positiveInteger,
        validateBeforeInstantiate: { type: 'boolean' },
      },
    },
    output: {
      type: 'object',
      additionalProperties: false,
      properties: { indent: { type: 'integer', minimum: 0, maximum: 10 } },
    },
    cache: {
      type: 'object',
      additionalProperties: false,
      properties: { maxEntries: positiveInteger },
    },
    metrics: { type: 'boolean' },
  },
} as const;

const validateConfig = new Ajv2020({ logger: false }).compile<SchemaOptions>(
  CONFIG_FILE_SCHEMA
);

export function parseConfig(
  text: string,
  file = '<config>'
): Result<SchemaOptions, ConfigError | ParseError> {
  const parsed = parseJson(text, file);
  if (isErr(parsed)) {
    return parsed;
  }
  if (!validateConfig(parsed.value)) {
    const first = validateConfig.errors?.[0];
    const where = first?.instancePath || '/';
    return err(
      new ConfigError({
        message: `Invalid configuration in ${file}: ${where} ${first?.message ?? 'is invalid'}`,
        context: { setting: where, path: first?.instancePath },
      })
    );
  }
  return ok(parsed.value);
}

/**
 * Read a file given on the command line, relative to the working directory
 *
 * @throws {ConfigError} When the file does not exist
 */
export function readCliFile(file: string, setting: string): string {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `File not found: ${abs}`,
      context: { setting, value: file },
    });
  }
  return fs.readFileSync(abs, 'utf8');
}

export function loadConfigFile(
  file: string | undefined
): Result<SchemaOptions, ConfigError | ParseError> {
  if (file === undefined) {
    return ok({});
  }
  return parseConfig(readCliFile(file, '--config'), file);
}
