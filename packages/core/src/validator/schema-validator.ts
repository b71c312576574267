/**
 * Draft 2020-12 validation of JSON payloads against generated documents,
 * backed by Ajv.
 */

import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { ValidationError, type ValidationFailure } from '../types/errors.js';
import { resolveOptions, type ResolvedOptions } from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import { excerpt, toValidationValue, type JsonObject } from '../util/json.js';
import type { MetricsCollector } from '../util/metrics.js';

export type CompiledValidator = ValidateFunction;

/**
 * Compiles and runs validators. Every document is compiled by its own Ajv
 * instance, so a validator is released with the schema that owns it and
 * the engine itself retains nothing between compilations.
 */
export class SchemaValidator {
  constructor(
    private readonly options: ResolvedOptions = resolveOptions(),
    private readonly metrics?: MetricsCollector
  ) {}

  private createAjv(): Ajv2020 {
    return new Ajv2020({
      strict: true,
      // tuples are emitted as bare prefixItems
      strictTuples: false,
      allErrors: this.options.validation.allErrors,
      validateFormats: false,
      logger: false,
    });
  }

  /**
   * Compile a generated document. Ajv rejecting it means the generator
   * produced something that is not a valid schema.
   */
  compile(document: JsonObject): Result<CompiledValidator, ValidationError> {
    const compile = (): Result<CompiledValidator, ValidationError> => {
      try {
        return ok(this.createAjv().compile(document));
      } catch (error) {
        return err(
          new ValidationError({
            message: `Generated document is not a valid JSON Schema: ${error instanceof Error ? error.message : String(error)}`,
            errorCode: ErrorCode.INVALID_GENERATED_SCHEMA,
            failures: [],
            cause: error instanceof Error ? error : undefined,
          })
        );
      }
    };
    return this.metrics ? this.metrics.measure('COMPILE', compile) : compile();
  }

  validate(
    validator: CompiledValidator,
    value: unknown
  ): Result<void, ValidationError> {
    const run = (): Result<void, ValidationError> => {
      this.metrics?.increment('validations');
      // Ajv reads bigint integers as numbers
      const checked = toValidationValue(value);
      if (validator(checked)) {
        return ok(undefined);
      }
      this.metrics?.increment('validationFailures');
      const failures = this.formatErrors(validator.errors ?? []);
      const first = failures[0];
      return err(
        new ValidationError({
          message: first
            ? `JSON does not match the schema: ${first.path || '/'} ${first.message}`
            : 'JSON does not match the schema',
          errorCode: ErrorCode.SCHEMA_VALIDATION_FAILED,
          failures,
          context: {
            path: first?.path,
            schemaPath: first?.schemaPath,
            value,
            valueExcerpt: excerpt(value),
          },
        })
      );
    };
    return this.metrics ? this.metrics.measure('VALIDATE', run) : run();
  }

  private formatErrors(errors: ErrorObject[]): ValidationFailure[] {
    return errors
      .slice(0, this.options.validation.maxReportedErrors)
      .map((error) => ({
        path: error.instancePath,
        message: error.message ?? 'Validation failed',
        keyword: error.keyword,
        schemaPath: error.schemaPath,
        params: { ...error.params },
      }));
  }
}
