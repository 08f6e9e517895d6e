import {
  jsonArray,
  jsonBoolean,
  jsonInteger,
  jsonNumber,
  jsonString,
  type JsonValue,
} from "./json-value.js";
import type { Codable, CodingContext, InterfaceDefinition } from "./types.js";

/**
 * Collects the members of one JSON object. `undefined` values are omitted,
 * so optional fields can be written unconditionally.
 */
export class ObjectWriter {
  readonly context: CodingContext;
  private readonly members = new Map<string, JsonValue>();

  constructor(context: CodingContext) {
    this.context = context;
  }

  value(key: string, value: JsonValue | undefined): this {
    if (value !== undefined) this.members.set(key, value);
    return this;
  }

  string(key: string, value: string | undefined): this {
    return this.value(key, value === undefined ? undefined : jsonString(value));
  }

  integer(key: string, value: number | undefined): this {
    return this.value(key, value === undefined ? undefined : jsonInteger(value));
  }

  number(key: string, value: number | undefined): this {
    return this.value(key, value === undefined ? undefined : jsonNumber(value));
  }

  boolean(key: string, value: boolean | undefined): this {
    return this.value(key, value === undefined ? undefined : jsonBoolean(value));
  }

  date(key: string, value: Date | undefined): this {
    return this.value(key, value === undefined ? undefined : this.context.encodeDate(value));
  }

  stringArray(key: string, values: ReadonlyArray<string> | undefined): this {
    return this.value(key, values === undefined ? undefined : jsonArray(values.map(jsonString)));
  }

  object<T>(key: string, codable: Codable<T>, value: T | undefined): this {
    return this.value(
      key,
      value === undefined ? undefined : this.context.encode(codable, value)
    );
  }

  objectArray<T>(key: string, codable: Codable<T>, values: ReadonlyArray<T> | undefined): this {
    return this.value(
      key,
      values === undefined
        ? undefined
        : jsonArray(values.map((item) => this.context.encode(codable, item)))
    );
  }

  polymorphic<I>(key: string, token: InterfaceDefinition<I>, value: I | undefined): this {
    return this.value(
      key,
      value === undefined ? undefined : this.context.encodePolymorphic(token, value)
    );
  }

  polymorphicArray<I>(
    key: string,
    token: InterfaceDefinition<I>,
    values: ReadonlyArray<I> | undefined
  ): this {
    return this.value(
      key,
      values === undefined
        ? undefined
        : jsonArray(values.map((item) => this.context.encodePolymorphic(token, item)))
    );
  }

  /** Members in the order they were written. */
  toMembers(): Map<string, JsonValue> {
    return new Map(this.members);
  }
}
