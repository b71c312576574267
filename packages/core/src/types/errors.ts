/**
 * Error hierarchy for reflect-schema.
 * Every expected failure carries a stable ErrorCode, a severity and a typed
 * context pointing at the offending JSON value or schema location.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as exitCodeFor,
} from '../errors/codes.js';

export interface ErrorContext {
  path?: string; // JSON Pointer into the instance (e.g. '/pets/0/name')
  schemaPath?: string; // JSON Schema pointer (e.g. '#/$defs/Person')
  definition?: string; // canonical definition name
  property?: string;
  value?: unknown; // offending value (may contain PII)
  valueExcerpt?: string;
  suggestion?: string;
  setting?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string };
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
  schemaPath?: string;
}

export interface ErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactValue(
  value: unknown,
  keys: ReadonlySet<string> = SENSITIVE_KEYS
): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, keys));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactValue(v, keys);
    }
    return out;
  }
  return value;
}

/**
 * Base class for all reflect-schema errors
 */
export abstract class ReflectSchemaError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  protected constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    super(params.message, { cause: params.cause });
    this.name = new.target.name;
    this.errorCode = params.errorCode;
    this.severity = params.severity ?? 'error';
    this.context = params.context;
    this.cause = params.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize for logging.
   * - dev: stack and full context
   * - prod: no stack, sensitive keys of context.value redacted
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? redactContext(this.context) : this.context,
    };
    if (this.cause) {
      base.cause = { name: this.cause.name, message: this.cause.message };
    }
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
      schemaPath: this.context?.schemaPath,
    };
  }

  getExitCode(): number {
    return exitCodeFor(this.errorCode);
  }
}

function redactContext(context?: ErrorContext): ErrorContext | undefined {
  if (!context || !('value' in context)) return context;
  return { ...context, value: redactValue(context.value) };
}

/**
 * A property type that cannot be turned into a definition
 * (malformed enum path, unknown class or enum, unsupported hint or kind)
 */
export class ResolutionError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.CLASS_NOT_FOUND });
  }
}

/**
 * Structural problems of the definition graph: dangling references and
 * nesting beyond the configured depth
 */
export class GraphError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.DANGLING_REFERENCE,
    });
  }
}

/**
 * Individual validation failure reported by the validation engine
 */
export interface ValidationFailure {
  path: string;
  message: string;
  keyword: string;
  schemaPath: string;
  params?: Record<string, unknown>;
}

export class ValidationError extends ReflectSchemaError {
  public readonly failures: ValidationFailure[];

  constructor(params: ErrorParams & { failures: ValidationFailure[] }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SCHEMA_VALIDATION_FAILED,
    });
    this.failures = params.failures;
  }
}

/**
 * A JSON value that does not fit the definition it is instantiated against
 */
export class ConversionError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.TYPE_MISMATCH });
  }
}

/**
 * Failures raised by the host while listing properties, constructing
 * objects or assigning properties
 */
export class HostError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONSTRUCTION_FAILED,
    });
  }
}

export class ConfigError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export class ParseError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR });
  }
}

export class InternalError extends ReflectSchemaError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
    });
  }
}

export function isReflectSchemaError(
  error: unknown
): error is ReflectSchemaError {
  return error instanceof ReflectSchemaError;
}

/**
 * Normalize a value thrown by host code into an Error usable as a cause
 */
export function toCause(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
