/**
 * @polycodec/codec: JSON coding for open polymorphic type hierarchies.
 *
 * Register concrete types per interface under a discriminator string,
 * decode and encode through a SerializationContext with a deterministic
 * member order, and derive JSON Schema documents from the same metadata.
 *
 * @packageDocumentation
 */

export {
  CodingError,
  DecodeError,
  MissingDiscriminatorFieldError,
  UnknownDiscriminatorError,
  ArrayElementDecodeError,
  EncodeError,
  UnregisteredInterfaceError,
  InvalidCodingShapeError,
  RegistryValidationError,
  MetadataValidationError,
  SchemaBuildError,
  ConfigurationError,
  formatCodingPath,
  type CodingPathSegment,
  type DecodeErrorReason,
  type MetadataIssue,
} from "./errors.js";

export {
  JSON_TYPES,
  jsonNull,
  jsonBoolean,
  jsonString,
  jsonInteger,
  jsonNumber,
  jsonArray,
  jsonObject,
  kindOf,
  isJsonObject,
  fromNumber,
  fromHost,
  toHost,
  parseJson,
  asNumber,
  parseLocaleNumber,
  eqJsonValue,
  hashJsonValue,
  ordJsonValue,
  isLessThan,
  stringifyJson,
  DEFAULT_NON_CONFORMING_FLOATS,
  type JsonType,
  type JsonValue,
  type JsonNull,
  type JsonBoolean,
  type JsonString,
  type JsonInteger,
  type JsonNumber,
  type JsonArray,
  type JsonObject,
  type HostJson,
  type Eq,
  type Hash,
  type PartialOrd,
  type Ordering,
  type NonConformingFloats,
  type StringifyOptions,
} from "./json-value.js";

export {
  discriminatorSet,
  type DiscriminatorSet,
  type OpenDiscriminator,
} from "./discriminator.js";

export type {
  FieldFormat,
  FieldShape,
  FieldSpec,
  FieldLevel,
  FieldDescriptor,
  TypeMetadata,
  Codable,
  InterfaceDefinition,
  CodingContext,
} from "./types.js";

export {
  LEVEL_STRIDE,
  shapes,
  isPolymorphicShape,
  sameShape,
  fieldDescriptors,
  validateTypeMetadata,
  TypeMetadataBuilder,
  typeMetadata,
  type FieldOptions,
} from "./metadata.js";

export { ObjectReader } from "./reader.js";
export { ObjectWriter } from "./writer.js";

export {
  DEFAULT_DISCRIMINATOR_KEY,
  TypeRegistry,
  defineType,
  type TypeRegistryEntry,
  type TypeRegistryOptions,
  type DuplicateStrategy,
} from "./registry.js";

export { OrderedEncoder, type OrderedEncoderOptions } from "./ordered-encoder.js";

export {
  SerializationContext,
  type SerializationContextOptions,
} from "./serialization-context.js";

export {
  JSON_SCHEMA_DRAFT_07,
  normalizeBaseUrl,
  internalRef,
  externalRef,
  definitionRef,
  renderNode,
  toJsonSchema,
  type SchemaRef,
  type SchemaNode,
  type SchemaObject,
  type SchemaDocument,
} from "./json-schema.js";

export { SchemaBuilder, type SchemaBuilderOptions } from "./schema-builder.js";

export {
  DEFAULT_CONFIG,
  defineConfig,
  resolveConfig,
  type CodecConfig,
  type CodecConfigInput,
  type SchemaConfig,
} from "./config.js";

export {
  CONFIG_SEARCH_PLACES,
  loadConfig,
  configFromEnv,
  parseConfigInput,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config-loader.js";

export {
  createLogger,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogWriter,
} from "./logger.js";
