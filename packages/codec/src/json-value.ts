/**
 * Typed JSON value model.
 *
 * `integer` and `number` are separate variants so that a document keeps the
 * spelling it was written with, but they compare, order and hash by numeric
 * magnitude: `integer(12)` equals `number(12.0)`.
 */

import {
  InvalidCodingShapeError,
  DecodeError,
  type CodingPathSegment,
} from "./errors.js";

/** The JSON type names, as used by JSON Schema. */
export type JsonType = "null" | "boolean" | "string" | "integer" | "number" | "array" | "object";

export const JSON_TYPES: ReadonlyArray<JsonType> = [
  "string",
  "number",
  "integer",
  "boolean",
  "null",
  "array",
  "object",
];

export type JsonNull = { readonly kind: "null" };
export type JsonBoolean = { readonly kind: "boolean"; readonly value: boolean };
export type JsonString = { readonly kind: "string"; readonly value: string };
export type JsonInteger = { readonly kind: "integer"; readonly value: number };
export type JsonNumber = { readonly kind: "number"; readonly value: number };
export type JsonArray = { readonly kind: "array"; readonly items: ReadonlyArray<JsonValue> };
export type JsonObject = {
  readonly kind: "object";
  readonly members: ReadonlyMap<string, JsonValue>;
};

export type JsonValue =
  | JsonNull
  | JsonBoolean
  | JsonString
  | JsonInteger
  | JsonNumber
  | JsonArray
  | JsonObject;

// ============================================================================
// Constructors
// ============================================================================

export const jsonNull: JsonNull = { kind: "null" };

export function jsonBoolean(value: boolean): JsonBoolean {
  return { kind: "boolean", value };
}

export function jsonString(value: string): JsonString {
  return { kind: "string", value };
}

export function jsonInteger(value: number): JsonInteger {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidCodingShapeError([], `${value} as an integer`);
  }
  return { kind: "integer", value };
}

export function jsonNumber(value: number): JsonNumber {
  return { kind: "number", value };
}

export function jsonArray(items: ReadonlyArray<JsonValue>): JsonArray {
  return { kind: "array", items };
}

/** Build an object from entries or a record. Insertion order is kept. */
export function jsonObject(
  members: Iterable<readonly [string, JsonValue]> | Readonly<Record<string, JsonValue>>
): JsonObject {
  const map = new Map<string, JsonValue>();
  const entries = isEntryIterable(members) ? members : Object.entries(members);
  for (const [key, value] of entries) {
    map.set(key, value);
  }
  return { kind: "object", members: map };
}

function isEntryIterable(
  value: Iterable<readonly [string, JsonValue]> | Readonly<Record<string, JsonValue>>
): value is Iterable<readonly [string, JsonValue]> {
  return Symbol.iterator in value;
}

export function kindOf(value: JsonValue): JsonType {
  return value.kind;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return value.kind === "object";
}

// ============================================================================
// Host conversion
// ============================================================================

/** Lift a JavaScript number, choosing `integer` for safe integral values. */
export function fromNumber(value: number): JsonInteger | JsonNumber {
  return Number.isSafeInteger(value) ? jsonInteger(value) : jsonNumber(value);
}

/**
 * Lift plain host data into a JsonValue.
 *
 * Accepts null, booleans, numbers, strings, safe bigints, Dates (as ISO-8601),
 * URLs, arrays, Maps with string keys and plain objects. `undefined` members
 * of an object are skipped. Anything else throws InvalidCodingShapeError.
 */
export function fromHost(value: unknown, path: ReadonlyArray<CodingPathSegment> = []): JsonValue {
  if (value === null) return jsonNull;
  switch (typeof value) {
    case "boolean":
      return jsonBoolean(value);
    case "string":
      return jsonString(value);
    case "number":
      return fromNumber(value);
    case "bigint":
      if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new InvalidCodingShapeError(path, `bigint ${value} outside the safe integer range`);
      }
      return jsonInteger(Number(value));
    case "object":
      break;
    default:
      throw new InvalidCodingShapeError(path, `a value of type ${typeof value}`);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidCodingShapeError(path, "an invalid Date");
    }
    return jsonString(value.toISOString());
  }
  if (value instanceof URL) {
    return jsonString(value.href);
  }
  if (Array.isArray(value)) {
    return jsonArray(value.map((item, index) => fromHost(item, [...path, index])));
  }
  if (value instanceof Map) {
    const members = new Map<string, JsonValue>();
    for (const [key, item] of value) {
      if (typeof key !== "string") {
        throw new InvalidCodingShapeError(path, `a Map key of type ${typeof key}`);
      }
      if (item !== undefined) members.set(key, fromHost(item, [...path, key]));
    }
    return { kind: "object", members };
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    throw new InvalidCodingShapeError(path, "a class instance");
  }
  const members = new Map<string, JsonValue>();
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) members.set(key, fromHost(item, [...path, key]));
  }
  return { kind: "object", members };
}

/** Plain host data for a JsonValue. */
export type HostJson =
  | null
  | boolean
  | number
  | string
  | HostJson[]
  | { [key: string]: HostJson };

export function toHost(value: JsonValue): HostJson {
  switch (value.kind) {
    case "null":
      return null;
    case "boolean":
    case "string":
    case "integer":
    case "number":
      return value.value;
    case "array":
      return value.items.map(toHost);
    case "object": {
      const out: { [key: string]: HostJson } = {};
      for (const [key, item] of value.members) {
        // Plain assignment would treat "__proto__" as the prototype.
        Object.defineProperty(out, key, {
          value: toHost(item),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/**
 * Parse JSON text. Integral numbers become `integer`.
 *
 * Integer literals outside the safe range would be rounded by `JSON.parse`,
 * so they are rejected instead.
 */
export function parseJson(text: string): JsonValue {
  let parsed: unknown;
  let rounded = false;
  try {
    parsed = JSON.parse(text, (_key, value: unknown) => {
      if (typeof value === "number" && Number.isInteger(value) && !Number.isSafeInteger(value)) {
        rounded = true;
      }
      return value;
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DecodeError("invalid_json", [], `invalid JSON: ${detail}`, { cause: error });
  }
  if (rounded) {
    const literal = unsafeIntegerLiteral(text);
    if (literal !== undefined) {
      throw new DecodeError(
        "integer_out_of_range",
        [],
        `integer ${literal} is outside the safe integer range`
      );
    }
  }
  return fromHost(parsed);
}

// Strings are matched first so digits inside them are skipped.
const TOKEN_PATTERN = /"(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/g;

/** The first integer literal (no fraction or exponent) that is not a safe integer. */
function unsafeIntegerLiteral(text: string): string | undefined {
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (token.startsWith('"') || /[.eE]/.test(token)) continue;
    if (!Number.isSafeInteger(Number(token))) return token;
  }
  return undefined;
}

// ============================================================================
// Numeric coercion
// ============================================================================

const separatorCache = new Map<string, { group: string; decimal: string }>();

function separatorsFor(locale: string): { group: string; decimal: string } {
  const cached = separatorCache.get(locale);
  if (cached) return cached;
  let group = ",";
  let decimal = ".";
  for (const part of new Intl.NumberFormat(locale).formatToParts(12345.6)) {
    if (part.type === "group") group = part.value;
    if (part.type === "decimal") decimal = part.value;
  }
  const result = { group, decimal };
  separatorCache.set(locale, result);
  return result;
}

/**
 * Numeric magnitude of a value, or undefined when it has none.
 *
 * Strings are parsed with the locale's group and decimal separators, so
 * `"1,234.5"` is 1234.5 in `en-US` and `"1.234,5"` is 1234.5 in `de-DE`.
 */
export function asNumber(value: JsonValue, locale = "en-US"): number | undefined {
  switch (value.kind) {
    case "integer":
    case "number":
      return value.value;
    case "string":
      return parseLocaleNumber(value.value, locale);
    default:
      return undefined;
  }
}

export function parseLocaleNumber(text: string, locale = "en-US"): number | undefined {
  const { group, decimal } = separatorsFor(locale);
  let normalized = text.trim();
  if (normalized.length === 0) return undefined;
  // Intl uses a narrow no-break space as the group separator for some locales.
  normalized = normalized.split(group).join("");
  if (group === "\u00a0" || group === "\u202f") {
    normalized = normalized.replace(/[\s\u00a0\u202f]/g, "");
  }
  if (decimal !== ".") {
    normalized = normalized.split(decimal).join(".");
  }
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(normalized)) {
    return undefined;
  }
  return Number(normalized);
}

// ============================================================================
// Eq / Hash / PartialOrd instances
// ============================================================================

export type Ordering = -1 | 0 | 1;

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

export interface Hash<A> extends Eq<A> {
  readonly hash: (a: A) => number;
}

/** Partial ordering; `undefined` when the values are incomparable. */
export interface PartialOrd<A> extends Eq<A> {
  readonly partialCompare: (x: A, y: A) => Ordering | undefined;
  readonly lessThan: (x: A, y: A) => boolean;
}

function isNumeric(value: JsonValue): value is JsonInteger | JsonNumber {
  return value.kind === "integer" || value.kind === "number";
}

function eqv(x: JsonValue, y: JsonValue): boolean {
  if (isNumeric(x) && isNumeric(y)) {
    if (Number.isNaN(x.value) && Number.isNaN(y.value)) return true;
    return x.value === y.value;
  }
  switch (x.kind) {
    case "null":
      return y.kind === "null";
    case "boolean":
      return y.kind === "boolean" && x.value === y.value;
    case "string":
      return y.kind === "string" && x.value === y.value;
    case "array":
      return (
        y.kind === "array" &&
        x.items.length === y.items.length &&
        x.items.every((item, index) => eqv(item, y.items[index]))
      );
    case "object": {
      if (y.kind !== "object" || x.members.size !== y.members.size) return false;
      for (const [key, item] of x.members) {
        const other = y.members.get(key);
        if (other === undefined || !eqv(item, other)) return false;
      }
      return true;
    }
    default:
      return false;
  }
}

function hashNumber(a: number): number {
  if (Number.isNaN(a)) return 0x7fc00000;
  if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
  if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) {
    return a | 0;
  }
  return hashString(String(a));
}

function hashString(a: string): number {
  // djb2
  let hash = 5381;
  for (let i = 0; i < a.length; i++) {
    hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
  }
  return hash >>> 0;
}

function combine(hash: number, next: number): number {
  return (((hash << 5) + hash) ^ next) >>> 0;
}

function hash(value: JsonValue): number {
  switch (value.kind) {
    case "null":
      return 0;
    case "boolean":
      return value.value ? 1 : 0;
    case "string":
      return hashString(value.value);
    case "integer":
    case "number":
      return hashNumber(value.value);
    case "array": {
      let h = value.items.length;
      for (const item of value.items) {
        h = combine(h, hash(item));
      }
      return h >>> 0;
    }
    case "object": {
      // Members are summed so the result does not depend on key order.
      let h = value.members.size;
      for (const [key, item] of value.members) {
        h = (h + combine(hashString(key), hash(item))) >>> 0;
      }
      return h;
    }
  }
}

function partialCompare(x: JsonValue, y: JsonValue, locale?: string): Ordering | undefined {
  if (x.kind === "string" && y.kind === "string") {
    return x.value < y.value ? -1 : x.value > y.value ? 1 : 0;
  }
  if (x.kind === "string" && !isNumeric(y)) return undefined;
  const a = asNumber(x, locale);
  const b = asNumber(y, locale);
  if (a === undefined || b === undefined || Number.isNaN(a) || Number.isNaN(b)) {
    return undefined;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export const eqJsonValue: Eq<JsonValue> = { eqv };

export const hashJsonValue: Hash<JsonValue> = { eqv, hash };

export const ordJsonValue: PartialOrd<JsonValue> = {
  eqv,
  partialCompare: (x, y) => partialCompare(x, y),
  lessThan: (x, y) => partialCompare(x, y) === -1,
};

/**
 * Strings order lexicographically against strings. Everything else orders
 * by numeric magnitude, and is "not less" when either side has none.
 */
export function isLessThan(x: JsonValue, y: JsonValue, locale?: string): boolean {
  return partialCompare(x, y, locale) === -1;
}

// ============================================================================
// Text emission
// ============================================================================

/** Spelling of non-finite numbers, which JSON cannot represent. */
export interface NonConformingFloats {
  readonly positiveInfinity: string;
  readonly negativeInfinity: string;
  readonly nan: string;
}

export const DEFAULT_NON_CONFORMING_FLOATS: NonConformingFloats = {
  positiveInfinity: "Infinity",
  negativeInfinity: "-Infinity",
  nan: "NaN",
};

export interface StringifyOptions {
  /** Spaces per nesting level; 0 writes compact output. */
  readonly indent?: number;
  readonly nonConformingFloats?: NonConformingFloats;
}

/** Write JSON text in one pass, keeping each object's member order. */
export function stringifyJson(value: JsonValue, options: StringifyOptions = {}): string {
  const indent = options.indent ?? 0;
  const floats = options.nonConformingFloats ?? DEFAULT_NON_CONFORMING_FLOATS;
  const parts: string[] = [];

  const newline = (depth: number): void => {
    if (indent > 0) parts.push("\n", " ".repeat(indent * depth));
  };

  const writeNumber = (n: number): void => {
    if (Number.isNaN(n)) parts.push(JSON.stringify(floats.nan));
    else if (n === Infinity) parts.push(JSON.stringify(floats.positiveInfinity));
    else if (n === -Infinity) parts.push(JSON.stringify(floats.negativeInfinity));
    else parts.push(String(n));
  };

  const write = (v: JsonValue, depth: number): void => {
    switch (v.kind) {
      case "null":
        parts.push("null");
        return;
      case "boolean":
        parts.push(v.value ? "true" : "false");
        return;
      case "string":
        parts.push(JSON.stringify(v.value));
        return;
      case "integer":
      case "number":
        writeNumber(v.value);
        return;
      case "array": {
        if (v.items.length === 0) {
          parts.push("[]");
          return;
        }
        parts.push("[");
        v.items.forEach((item, index) => {
          if (index > 0) parts.push(",");
          newline(depth + 1);
          write(item, depth + 1);
        });
        newline(depth);
        parts.push("]");
        return;
      }
      case "object": {
        if (v.members.size === 0) {
          parts.push("{}");
          return;
        }
        parts.push("{");
        let first = true;
        for (const [key, item] of v.members) {
          if (!first) parts.push(",");
          first = false;
          newline(depth + 1);
          parts.push(JSON.stringify(key), indent > 0 ? ": " : ":");
          write(item, depth + 1);
        }
        newline(depth);
        parts.push("}");
        return;
      }
    }
  };

  write(value, 0);
  return parts.join("");
}
