import {
  ArrayElementDecodeError,
  DecodeError,
  type CodingPathSegment,
} from "./errors.js";
import type { JsonValue } from "./json-value.js";
import type { Codable, CodingContext, InterfaceDefinition } from "./types.js";

/**
 * Decode cursor over one JSON object.
 *
 * Concrete decoders read their members through typed getters. `null` counts
 * as absent. Every getter records the key it consumed, so a decoder can ask
 * for `remainingKeys()` when it wants to keep unknown members.
 */
export class ObjectReader {
  readonly members: ReadonlyMap<string, JsonValue>;
  readonly context: CodingContext;
  readonly path: ReadonlyArray<CodingPathSegment>;
  private readonly consumed = new Set<string>();

  constructor(
    members: ReadonlyMap<string, JsonValue>,
    context: CodingContext,
    path: ReadonlyArray<CodingPathSegment> = []
  ) {
    this.members = members;
    this.context = context;
    this.path = path;
  }

  /** True when the member is present and not null. */
  has(key: string): boolean {
    const value = this.members.get(key);
    return value !== undefined && value.kind !== "null";
  }

  markConsumed(key: string): void {
    this.consumed.add(key);
  }

  /** Keys no getter has read yet, in document order. */
  remainingKeys(): string[] {
    return [...this.members.keys()].filter((key) => !this.consumed.has(key));
  }

  pathOf(key: string): CodingPathSegment[] {
    return [...this.path, key];
  }

  // --------------------------------------------------------------------------
  // Raw access
  // --------------------------------------------------------------------------

  optionalValue(key: string): JsonValue | undefined {
    this.consumed.add(key);
    const value = this.members.get(key);
    return value === undefined || value.kind === "null" ? undefined : value;
  }

  value(key: string): JsonValue {
    return this.required(key, this.optionalValue(key));
  }

  // --------------------------------------------------------------------------
  // Primitives
  // --------------------------------------------------------------------------

  optionalString(key: string): string | undefined {
    const value = this.optionalValue(key);
    if (value === undefined) return undefined;
    if (value.kind !== "string") throw this.mismatch(key, "string", value);
    return value.value;
  }

  string(key: string): string {
    return this.required(key, this.optionalString(key));
  }

  optionalInteger(key: string): number | undefined {
    const value = this.optionalValue(key);
    if (value === undefined) return undefined;
    if (value.kind === "integer") return value.value;
    if (value.kind === "number" && Number.isInteger(value.value)) return value.value;
    throw this.mismatch(key, "integer", value);
  }

  integer(key: string): number {
    return this.required(key, this.optionalInteger(key));
  }

  optionalNumber(key: string): number | undefined {
    const value = this.optionalValue(key);
    if (value === undefined) return undefined;
    if (value.kind === "integer" || value.kind === "number") return value.value;
    throw this.mismatch(key, "number", value);
  }

  number(key: string): number {
    return this.required(key, this.optionalNumber(key));
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.optionalValue(key);
    if (value === undefined) return undefined;
    if (value.kind !== "boolean") throw this.mismatch(key, "boolean", value);
    return value.value;
  }

  boolean(key: string): boolean {
    return this.required(key, this.optionalBoolean(key));
  }

  optionalDate(key: string): Date | undefined {
    const value = this.optionalValue(key);
    return value === undefined ? undefined : this.context.decodeDateAt(value, this.pathOf(key));
  }

  date(key: string): Date {
    return this.required(key, this.optionalDate(key));
  }

  optionalStringArray(key: string): string[] | undefined {
    const items = this.optionalArray(key);
    return items?.map((item, index) => {
      if (item.kind !== "string") {
        throw new DecodeError(
          "type_mismatch",
          [...this.pathOf(key), index],
          `expected string, found ${item.kind}`
        );
      }
      return item.value;
    });
  }

  stringArray(key: string): string[] {
    return this.required(key, this.optionalStringArray(key));
  }

  /** A string member restricted to a fixed set of values. */
  optionalEnum<const S extends string>(key: string, values: ReadonlyArray<S>): S | undefined {
    const value = this.optionalString(key);
    if (value === undefined) return undefined;
    const match = values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new DecodeError(
        "type_mismatch",
        this.pathOf(key),
        `expected one of ${values.join(", ")}, found "${value}"`
      );
    }
    return match;
  }

  enum<const S extends string>(key: string, values: ReadonlyArray<S>): S {
    return this.required(key, this.optionalEnum(key, values));
  }

  // --------------------------------------------------------------------------
  // Nested documentable types
  // --------------------------------------------------------------------------

  optionalObject<T>(key: string, codable: Codable<T>): T | undefined {
    const value = this.optionalValue(key);
    if (value === undefined) return undefined;
    return this.context.decodeAt(codable, value, this.pathOf(key));
  }

  object<T>(key: string, codable: Codable<T>): T {
    return this.required(key, this.optionalObject(key, codable));
  }

  optionalObjectArray<T>(key: string, codable: Codable<T>): T[] | undefined {
    return this.optionalArray(key)?.map((item, index) =>
      this.context.decodeAt(codable, item, [...this.pathOf(key), index])
    );
  }

  objectArray<T>(key: string, codable: Codable<T>): T[] {
    return this.required(key, this.optionalObjectArray(key, codable));
  }

  // --------------------------------------------------------------------------
  // Polymorphic members
  // --------------------------------------------------------------------------

  optionalPolymorphic<I>(key: string, token: InterfaceDefinition<I>): I | undefined {
    const value = this.optionalValue(key);
    return value === undefined
      ? undefined
      : this.context.decodePolymorphicAt(token, value, this.pathOf(key));
  }

  polymorphic<I>(key: string, token: InterfaceDefinition<I>): I {
    return this.required(key, this.optionalPolymorphic(key, token));
  }

  /** Fails on the first element that does not decode. */
  optionalPolymorphicArray<I>(key: string, token: InterfaceDefinition<I>): I[] | undefined {
    const items = this.optionalArray(key);
    if (items === undefined) return undefined;
    const arrayPath = this.pathOf(key);
    return items.map((item, index) => {
      try {
        return this.context.decodePolymorphicAt(token, item, [...arrayPath, index]);
      } catch (error) {
        if (error instanceof DecodeError) {
          throw new ArrayElementDecodeError(index, error, arrayPath);
        }
        throw error;
      }
    });
  }

  polymorphicArray<I>(key: string, token: InterfaceDefinition<I>): I[] {
    return this.required(key, this.optionalPolymorphicArray(key, token));
  }

  // --------------------------------------------------------------------------

  private optionalArray(key: string): ReadonlyArray<JsonValue> | undefined {
    const value = this.optionalValue(key);
    if (value === undefined) return undefined;
    if (value.kind !== "array") throw this.mismatch(key, "array", value);
    return value.items;
  }

  private required<T>(key: string, value: T | undefined): T {
    if (value === undefined) {
      throw new DecodeError(
        "value_not_found",
        this.pathOf(key),
        `missing required member "${key}"`
      );
    }
    return value;
  }

  private mismatch(key: string, expected: string, found: JsonValue): DecodeError {
    return new DecodeError(
      "type_mismatch",
      this.pathOf(key),
      `expected ${expected}, found ${found.kind}`
    );
  }
}
