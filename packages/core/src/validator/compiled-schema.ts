/**
 * A root schema together with its serialized document and compiled
 * validator. This is the unit the schema library caches.
 */

import { ErrorCode } from '../errors/codes.js';
import type { ObjectFactory } from '../host/reflection-host.js';
import type { InstantiationFailure } from '../instantiate/context.js';
import type { NativeValue } from '../instantiate/native-value.js';
import { WRAPPED_VALUE_KEY, type RootSchema } from '../schema/root-schema.js';
import {
  RESPONSE_FORMAT_NAME,
  responseFormat,
  type ResponseFormat,
} from '../schema/serializer.js';
import {
  ConfigError,
  ConversionError,
  type GraphError,
  type ParseError,
  type ValidationError,
} from '../types/errors.js';
import { resolveOptions, type ResolvedOptions } from '../types/options.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import {
  describeJsonType,
  isJsonObject,
  parseJsonExact,
  type JsonObject,
} from '../util/json.js';
import type { MetricsCollector } from '../util/metrics.js';
import { SchemaValidator, type CompiledValidator } from './schema-validator.js';

export type CompileFailure = GraphError | ValidationError;
export type InstantiateFailure =
  | ParseError
  | ValidationError
  | InstantiationFailure;

export class CompiledSchema {
  private constructor(
    public readonly root: RootSchema,
    public readonly document: JsonObject,
    private readonly validator: CompiledValidator,
    private readonly engine: SchemaValidator,
    private readonly factory: ObjectFactory,
    private readonly options: ResolvedOptions,
    private readonly metrics?: MetricsCollector
  ) {}

  static create(
    root: RootSchema,
    factory: ObjectFactory,
    options: ResolvedOptions = resolveOptions(),
    metrics?: MetricsCollector,
    engine: SchemaValidator = new SchemaValidator(options, metrics)
  ): Result<CompiledSchema, CompileFailure> {
    const references = root.checkReferences();
    if (isErr(references)) {
      return references;
    }

    const document = metrics
      ? metrics.measure('SERIALIZE', () => root.toDocument())
      : root.toDocument();
    const defs = document.$defs;
    if (isJsonObject(defs)) {
      metrics?.increment('definitionsEmitted', Object.keys(defs).length);
    }

    const validator = engine.compile(document);
    if (isErr(validator)) {
      return validator;
    }
    return ok(
      new CompiledSchema(
        root,
        document,
        validator.value,
        engine,
        factory,
        options,
        metrics
      )
    );
  }

  /** Document text, indented per `output.indent` */
  get json(): string {
    return JSON.stringify(this.document, null, this.options.output.indent);
  }

  toJsonCompact(): string {
    return JSON.stringify(this.document);
  }

  validate(value: unknown): Result<void, ValidationError> {
    return this.engine.validate(this.validator, value);
  }

  /**
   * Parse, validate, unwrap and instantiate a JSON document. Integers are
   * read exactly, so 64-bit values survive.
   */
  instantiate(text: string): Result<NativeValue, InstantiateFailure> {
    const parsed = parseJsonExact(text);
    if (isErr(parsed)) {
      return parsed;
    }
    return this.instantiateValue(parsed.value);
  }

  instantiateValue(value: unknown): Result<NativeValue, InstantiateFailure> {
    if (this.options.validation.validateBeforeInstantiate) {
      const validated = this.validate(value);
      if (isErr(validated)) {
        return validated;
      }
    }

    const unwrapped = this.unwrap(value);
    if (isErr(unwrapped)) {
      return unwrapped;
    }

    const run = () =>
      this.root.instantiate(unwrapped.value, this.factory, this.options, this.metrics);
    const built = this.metrics ? this.metrics.measure('INSTANTIATE', run) : run();
    if (!isErr(built)) {
      this.metrics?.increment('instancesBuilt');
    }
    return built;
  }

  private unwrap(value: unknown): Result<unknown, ConversionError> {
    if (!this.root.isWrapped()) {
      return ok(value);
    }
    if (!isJsonObject(value) || !Object.hasOwn(value, WRAPPED_VALUE_KEY)) {
      return err(
        new ConversionError({
          message: `Expected an object with a single "${WRAPPED_VALUE_KEY}" property, got ${describeJsonType(value)}`,
          errorCode: ErrorCode.MISSING_PROPERTY,
          context: { path: '', property: WRAPPED_VALUE_KEY },
        })
      );
    }
    return ok(value[WRAPPED_VALUE_KEY]);
  }

  /**
   * Compiled schema for an array of this schema's base
   */
  arraySchema(itemName: string): Result<CompiledSchema, CompileFailure> {
    return CompiledSchema.create(
      this.root.arraySchema(itemName),
      this.factory,
      this.options,
      this.metrics,
      this.engine
    );
  }

  responseFormat(name: string): Result<ResponseFormat, ConfigError> {
    if (!RESPONSE_FORMAT_NAME.test(name)) {
      return err(
        new ConfigError({
          message: `Response format name "${name}" must match ${RESPONSE_FORMAT_NAME.source}`,
          context: { setting: 'responseFormat.name', value: name },
        })
      );
    }
    return ok(responseFormat(name, this.document));
  }

  responseFormatJson(name: string, pretty = true): Result<string, ConfigError> {
    const format = this.responseFormat(name);
    if (isErr(format)) {
      return format;
    }
    return ok(
      pretty
        ? JSON.stringify(format.value, null, this.options.output.indent)
        : JSON.stringify(format.value)
    );
  }
}
