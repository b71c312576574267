// @reflect-schema/core entry point
//
// SchemaLibrary (./api.js) is the preferred entry point. The building
// blocks below are exported for hosts that drive generation, validation
// and instantiation themselves.

export * from './api.js';

// Results, options and errors
export * from './types/result.js';
export * from './types/options.js';
export * from './types/errors.js';
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';

// Schema IR
export * from './schema/class-source.js';
export * from './schema/definition.js';
export * from './schema/builtins.js';
export { SchemaBuilder, ObjectBuilder, EnumBuilder } from './schema/builder.js';
export { closureDefinitions, insertBuiltinDefinitions } from './schema/closure.js';
export {
  JSON_SCHEMA_DIALECT,
  RESPONSE_FORMAT_NAME,
  definitionRef,
  responseFormat,
  serializeDefinition,
  serializeType,
  type ResponseFormat,
} from './schema/serializer.js';
export { RootSchema, WRAPPED_VALUE_KEY } from './schema/root-schema.js';

// Resolution
export * from './resolver/property-descriptor.js';
export {
  createGenerationContext,
  type GenerationContext,
  type GenerationFailure,
} from './resolver/context.js';
export {
  resolveProperty,
  resolveTypeName,
  resolveClassName,
  resolveEnumPath,
} from './resolver/type-resolver.js';
export { generateClass, referenceClass } from './resolver/class-generator.js';

// Instantiation
export * from './instantiate/native-value.js';
export {
  createInstantiationContext,
  type InstantiationContext,
  type InstantiationFailure,
} from './instantiate/context.js';
export { instantiate, instantiateType, elementTypeOf } from './instantiate/instantiator.js';
export { rawToNative } from './instantiate/raw-json.js';

// Validation
export {
  SchemaValidator,
  type CompiledValidator,
} from './validator/schema-validator.js';
export {
  CompiledSchema,
  type CompileFailure,
  type InstantiateFailure,
} from './validator/compiled-schema.js';

// Hosts
export type {
  ObjectFactory,
  ObjectHandle,
  ReflectionHost,
  SchemaHost,
} from './host/reflection-host.js';
export {
  MANIFEST_SCHEMA,
  ManifestHost,
  ManifestObject,
  type ManifestClass,
  type ManifestDocument,
  type ManifestProperty,
  type UsageFlag,
} from './host/manifest-host.js';

// Utilities
export {
  MetricsCollector,
  METRIC_PHASES,
  METRIC_COUNTERS,
  type MetricCounter,
  type MetricPhase,
  type MetricsSnapshot,
} from './util/metrics.js';
export { LRUMap } from './util/lru-map.js';
export {
  parseJson,
  parseJsonExact,
  formatJson,
  toValidationValue,
  isJsonObject,
  describeJsonType,
  type ExactJsonValue,
  type JsonObject,
  type JsonValue,
} from './util/json.js';
