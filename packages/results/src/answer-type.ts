/**
 * Answer types: how the `value` of an AnswerResult is coded.
 *
 * An answer type is itself polymorphic on `type`. Decoding an answer value
 * through its answer type normalizes loosely typed input, e.g. `"12"` for an
 * integer answer or `"1,5"` for an array answer with a `,` separator.
 */

import {
  DecodeError,
  JSON_TYPES,
  TypeRegistry,
  asNumber,
  defineType,
  jsonArray,
  jsonBoolean,
  jsonInteger,
  jsonNumber,
  jsonString,
  shapes,
  stringifyJson,
  typeMetadata,
  type Codable,
  type CodingPathSegment,
  type InterfaceDefinition,
  type JsonType,
  type JsonValue,
  type TypeRegistryEntry,
  type TypeRegistryOptions,
} from "@polycodec/codec";
import { RESULTS_MODULE, answerTypes, type AnswerTypeName } from "./result-type.js";

export interface AnswerType {
  readonly type: AnswerTypeName;
}

export interface AnswerTypeObject extends AnswerType {
  readonly type: "object";
}

export interface AnswerTypeString extends AnswerType {
  readonly type: "string";
}

export interface AnswerTypeBoolean extends AnswerType {
  readonly type: "boolean";
}

export interface AnswerTypeInteger extends AnswerType {
  readonly type: "integer";
}

export interface AnswerTypeNumber extends AnswerType {
  readonly type: "number";
  readonly significantDigits?: number;
}

export interface AnswerTypeArray extends AnswerType {
  readonly type: "array";
  readonly baseType: JsonType;
  /** When set, the array is written as one string joined by this separator. */
  readonly sequenceSeparator?: string;
}

export interface AnswerTypeDateTime extends AnswerType {
  readonly type: "date-time";
  /** Unicode date pattern of the coded value. */
  readonly codingFormat: string;
}

export interface AnswerTypeMeasurement extends AnswerType {
  readonly type: "measurement";
  /** Unit the value is converted into for storage. */
  readonly unit?: string;
  readonly significantDigits?: number;
}

export const ISO8601_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSZZZZZ";

export function isAnswerType(value: unknown): value is AnswerType {
  return (
    typeof value === "object" && value !== null && "type" in value && typeof value.type === "string"
  );
}

export const answerTypeMetadata = typeMetadata<AnswerType>("AnswerType", RESULTS_MODULE)
  .level(0)
  .field("type", shapes.discriminator("AnswerType"), { required: true })
  .build();

export const AnswerTypeInterface: InterfaceDefinition<AnswerType> = {
  interfaceName: "AnswerType",
  module: RESULTS_MODULE,
  discriminatorKey: "type",
  standardDiscriminators: answerTypes.standard,
  description:
    "Carries additional information about the properties of a JSON-encoded answer result.",
  metadata: answerTypeMetadata,
  is: isAnswerType,
  discriminatorOf: (value) => value.type,
};

// ============================================================================
// Concrete answer types
// ============================================================================

/** Entry for an answer type that has no members besides `type`. */
function plainAnswerType<T extends AnswerType>(
  className: string,
  example: T
): TypeRegistryEntry<AnswerType> {
  const codable: Codable<T> = {
    metadata: typeMetadata<T>(className, RESULTS_MODULE)
      .inherit(answerTypeMetadata)
      .examples(() => [example])
      .build(),
    decode: () => example,
    encode: () => {},
  };
  return defineType<AnswerType, T>({
    discriminator: example.type,
    example,
    is: (value): value is T => value.type === example.type,
    codable,
  });
}

export const answerTypeObjectEntry = plainAnswerType<AnswerTypeObject>("AnswerTypeObject", {
  type: "object",
});
export const answerTypeStringEntry = plainAnswerType<AnswerTypeString>("AnswerTypeString", {
  type: "string",
});
export const answerTypeBooleanEntry = plainAnswerType<AnswerTypeBoolean>("AnswerTypeBoolean", {
  type: "boolean",
});
export const answerTypeIntegerEntry = plainAnswerType<AnswerTypeInteger>("AnswerTypeInteger", {
  type: "integer",
});

const significantDigitsOptions = {
  description: "The number of significant digits to use in encoding the answer.",
};

export const AnswerTypeNumberCodable: Codable<AnswerTypeNumber> = {
  metadata: typeMetadata<AnswerTypeNumber>("AnswerTypeNumber", RESULTS_MODULE)
    .inherit(answerTypeMetadata)
    .level(1)
    .field("significantDigits", shapes.integer, significantDigitsOptions)
    .examples(() => [{ type: "number", significantDigits: 2 }])
    .build(),
  decode: (reader) => ({
    type: "number",
    significantDigits: reader.optionalInteger("significantDigits"),
  }),
  encode: (value, writer) => {
    writer.integer("significantDigits", value.significantDigits);
  },
};

export const AnswerTypeArrayCodable: Codable<AnswerTypeArray> = {
  metadata: typeMetadata<AnswerTypeArray>("AnswerTypeArray", RESULTS_MODULE)
    .inherit(answerTypeMetadata)
    .level(1)
    .field("baseType", shapes.stringEnum("JsonType", JSON_TYPES), {
      required: true,
      description: "The base type of the array.",
    })
    .field("sequenceSeparator", shapes.string, {
      description: "The sequence separator to use for arrays that should be encoded as strings.",
    })
    .examples(() => [
      { type: "array", baseType: "number" },
      { type: "array", baseType: "integer", sequenceSeparator: "," },
    ])
    .build(),
  decode: (reader) => ({
    type: "array",
    baseType: reader.enum("baseType", JSON_TYPES),
    sequenceSeparator: reader.optionalString("sequenceSeparator"),
  }),
  encode: (value, writer) => {
    writer.string("baseType", value.baseType).string("sequenceSeparator", value.sequenceSeparator);
  },
};

export const AnswerTypeDateTimeCodable: Codable<AnswerTypeDateTime> = {
  metadata: typeMetadata<AnswerTypeDateTime>("AnswerTypeDateTime", RESULTS_MODULE)
    .inherit(answerTypeMetadata)
    .level(1)
    .field("codingFormat", shapes.string, {
      description: "The iso8601 format for the date-time components used by this answer type.",
      defaultValue: jsonString(ISO8601_TIMESTAMP_FORMAT),
    })
    .examples(() => [
      { type: "date-time", codingFormat: "yyyy-MM" },
      { type: "date-time", codingFormat: ISO8601_TIMESTAMP_FORMAT },
    ])
    .build(),
  decode: (reader) => ({
    type: "date-time",
    codingFormat: reader.optionalString("codingFormat") ?? ISO8601_TIMESTAMP_FORMAT,
  }),
  encode: (value, writer) => {
    writer.string("codingFormat", value.codingFormat);
  },
};

export const AnswerTypeMeasurementCodable: Codable<AnswerTypeMeasurement> = {
  metadata: typeMetadata<AnswerTypeMeasurement>("AnswerTypeMeasurement", RESULTS_MODULE)
    .inherit(answerTypeMetadata)
    .level(1)
    .field("unit", shapes.string, {
      description: "The unit of measurement into which the value is converted for storage.",
    })
    .field("significantDigits", shapes.integer, significantDigitsOptions)
    .examples(() => [{ type: "measurement", unit: "cm" }])
    .build(),
  decode: (reader) => ({
    type: "measurement",
    unit: reader.optionalString("unit"),
    significantDigits: reader.optionalInteger("significantDigits"),
  }),
  encode: (value, writer) => {
    writer.string("unit", value.unit).integer("significantDigits", value.significantDigits);
  },
};

export const answerTypeNumberEntry = defineType<AnswerType, AnswerTypeNumber>({
  discriminator: "number",
  example: { type: "number" },
  is: (value): value is AnswerTypeNumber => value.type === "number",
  codable: AnswerTypeNumberCodable,
});

export const answerTypeArrayEntry = defineType<AnswerType, AnswerTypeArray>({
  discriminator: "array",
  example: { type: "array", baseType: "string" },
  is: isAnswerTypeArray,
  codable: AnswerTypeArrayCodable,
});

export const answerTypeDateTimeEntry = defineType<AnswerType, AnswerTypeDateTime>({
  discriminator: "date-time",
  example: { type: "date-time", codingFormat: ISO8601_TIMESTAMP_FORMAT },
  is: (value): value is AnswerTypeDateTime => value.type === "date-time",
  codable: AnswerTypeDateTimeCodable,
});

export const answerTypeMeasurementEntry = defineType<AnswerType, AnswerTypeMeasurement>({
  discriminator: "measurement",
  example: { type: "measurement" },
  is: (value): value is AnswerTypeMeasurement => value.type === "measurement",
  codable: AnswerTypeMeasurementCodable,
});

export const standardAnswerTypeEntries: ReadonlyArray<TypeRegistryEntry<AnswerType>> = [
  answerTypeObjectEntry,
  answerTypeArrayEntry,
  answerTypeStringEntry,
  answerTypeIntegerEntry,
  answerTypeNumberEntry,
  answerTypeBooleanEntry,
  answerTypeDateTimeEntry,
  answerTypeMeasurementEntry,
];

export function createAnswerTypeRegistry(options?: TypeRegistryOptions): TypeRegistry<AnswerType> {
  return new TypeRegistry(AnswerTypeInterface, options).registerAll(standardAnswerTypeEntries);
}

function isAnswerTypeArray(value: AnswerType): value is AnswerTypeArray {
  return value.type === "array" && "baseType" in value && typeof value.baseType === "string";
}

// ============================================================================
// Answer values
// ============================================================================

/** The answer type matching the JSON type of a value; undefined for null. */
export function answerTypeFor(value: JsonValue): AnswerType | undefined {
  switch (value.kind) {
    case "null":
      return undefined;
    case "boolean":
      return { type: "boolean" };
    case "string":
      return { type: "string" };
    case "integer":
      return { type: "integer" };
    case "number":
      return { type: "number" };
    case "object":
      return { type: "object" };
    case "array": {
      const baseType = arrayBaseType(value.items);
      return { type: "array", baseType } satisfies AnswerTypeArray;
    }
  }
}

function arrayBaseType(items: ReadonlyArray<JsonValue>): JsonType {
  if (items.every((item) => item.kind === "integer")) return "integer";
  if (items.every((item) => item.kind === "integer" || item.kind === "number")) return "number";
  if (items.every((item) => item.kind === "string")) return "string";
  return "object";
}

/** Leading Y, T or a non-zero digit, after any sign and leading zeros. */
function textToBoolean(text: string): boolean {
  const digits = text.trim().replace(/^[+-]/, "").replace(/^0+/, "");
  return /^[YyTt1-9]/.test(digits);
}

/**
 * Normalize an answer value to the JSON type of its answer type. Values of
 * answer types this module does not know are returned unchanged.
 */
export function decodeAnswerValue(
  answerType: AnswerType,
  value: JsonValue,
  path: ReadonlyArray<CodingPathSegment> = [],
  locale = "en-US"
): JsonValue {
  const mismatch = (): DecodeError =>
    new DecodeError(
      "type_mismatch",
      path,
      `a ${value.kind} is not a valid "${answerType.type}" answer`
    );
  if (value.kind === "null") return value;

  switch (answerType.type) {
    case "object":
      if (value.kind !== "object") throw mismatch();
      return value;
    case "string":
    case "date-time":
      if (value.kind !== "string") throw mismatch();
      return value;
    case "boolean":
      switch (value.kind) {
        case "boolean":
          return value;
        case "integer":
        case "number":
          return jsonBoolean(value.value !== 0);
        case "string":
          return jsonBoolean(textToBoolean(value.value));
        default:
          throw mismatch();
      }
    case "integer": {
      if (value.kind === "integer") return value;
      const magnitude = asNumber(value, locale);
      if (magnitude === undefined || !Number.isSafeInteger(Math.trunc(magnitude))) throw mismatch();
      return jsonInteger(Math.trunc(magnitude));
    }
    case "number":
    case "measurement": {
      if (value.kind === "number") return value;
      const magnitude = asNumber(value, locale);
      if (magnitude === undefined) throw mismatch();
      return jsonNumber(magnitude);
    }
    case "array":
      if (!isAnswerTypeArray(answerType)) return value;
      return decodeArrayValue(answerType, value, path, locale, mismatch);
    default:
      return value;
  }
}

function decodeArrayValue(
  answerType: AnswerTypeArray,
  value: JsonValue,
  path: ReadonlyArray<CodingPathSegment>,
  locale: string,
  mismatch: () => DecodeError
): JsonValue {
  if (value.kind === "array") return value;
  const separator = answerType.sequenceSeparator;
  if (value.kind !== "string" || separator === undefined) throw mismatch();

  const baseType = answerType.baseType;
  return jsonArray(
    value.value.split(separator).map((part, index) => {
      switch (baseType) {
        case "string":
          return jsonString(part);
        case "boolean":
          return jsonBoolean(textToBoolean(part));
        case "integer":
        case "number": {
          const magnitude = asNumber(jsonString(part), locale);
          const whole = magnitude === undefined ? undefined : Math.trunc(magnitude);
          if (baseType === "number" && magnitude !== undefined) return jsonNumber(magnitude);
          if (baseType === "integer" && whole !== undefined && Number.isSafeInteger(whole)) {
            return jsonInteger(whole);
          }
          throw new DecodeError(
            "type_mismatch",
            [...path, index],
            `"${part}" is not a valid ${baseType}`
          );
        }
        default:
          throw new DecodeError(
            "type_mismatch",
            path,
            `a base type of ${baseType} cannot be used with a sequence separator`
          );
      }
    })
  );
}

/** The wire form of an answer value: separated arrays are joined into one string. */
export function encodeAnswerValue(answerType: AnswerType, value: JsonValue): JsonValue {
  if (!isAnswerTypeArray(answerType) || value.kind !== "array") return value;
  const separator = answerType.sequenceSeparator;
  if (separator === undefined) return value;
  return jsonString(
    value.items
      .map((item) => {
        switch (item.kind) {
          case "string":
            return item.value;
          case "integer":
          case "number":
          case "boolean":
            return String(item.value);
          default:
            return stringifyJson(item);
        }
      })
      .join(separator)
  );
}
