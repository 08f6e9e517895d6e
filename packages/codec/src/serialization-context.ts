import { resolveConfig, type CodecConfig, type CodecConfigInput } from "./config.js";
import {
  ArrayElementDecodeError,
  DecodeError,
  EncodeError,
  UnregisteredInterfaceError,
  type CodingPathSegment,
} from "./errors.js";
import {
  isJsonObject,
  jsonArray,
  jsonString,
  parseJson,
  type JsonArray,
  type JsonObject,
  type JsonValue,
} from "./json-value.js";
import { createLogger, type Logger } from "./logger.js";
import { fieldDescriptors } from "./metadata.js";
import { OrderedEncoder } from "./ordered-encoder.js";
import { ObjectReader } from "./reader.js";
import type { TypeRegistry } from "./registry.js";
import type { Codable, CodingContext, InterfaceDefinition } from "./types.js";
import { ObjectWriter } from "./writer.js";

export interface SerializationContextOptions {
  /** Resolved configuration, or partial settings applied over the defaults. */
  config?: CodecConfig | CodecConfigInput;
  logger?: Logger;
}

const TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})?$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_ONLY = /^\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?$/;

/**
 * Decode/encode dispatcher over a fixed set of interface registries.
 *
 * There is no global instance: a context is built with every registry it
 * needs, and registries are validated when they are added.
 *
 * ```ts
 * const context = new SerializationContext([resultRegistry, answerTypeRegistry]);
 * const result = context.decodePolymorphic(ResultDataInterface, text);
 * ```
 */
export class SerializationContext implements CodingContext {
  readonly config: CodecConfig;
  readonly encoder: OrderedEncoder;
  readonly logger: Logger;
  private readonly store = new Map<string, TypeRegistry<unknown>>();

  constructor(
    registries: Iterable<TypeRegistry<unknown>> = [],
    options: SerializationContextOptions = {}
  ) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? createLogger({ verbose: this.config.debug });
    this.encoder = new OrderedEncoder({
      orderKeys: this.config.orderKeys,
      indent: this.config.indent,
      nonConformingFloats: this.config.nonConformingFloats,
      logger: this.logger,
    });
    for (const registry of registries) this.add(registry);
  }

  get discriminatorKey(): string {
    return this.config.discriminatorKey;
  }

  get locale(): string {
    return this.config.locale;
  }

  // --------------------------------------------------------------------------
  // Registries
  // --------------------------------------------------------------------------

  /** Validate and add a registry, replacing one for the same interface. */
  add(registry: TypeRegistry<unknown>): this {
    registry.validate();
    if (this.store.has(registry.interfaceName)) {
      this.logger.debug(`replacing registry for ${registry.interfaceName}`);
    }
    this.store.set(registry.interfaceName, registry);
    return this;
  }

  registry(interfaceName: string): TypeRegistry<unknown> {
    const registry = this.store.get(interfaceName);
    if (registry === undefined) {
      throw new UnregisteredInterfaceError(interfaceName);
    }
    return registry;
  }

  hasRegistry(interfaceName: string): boolean {
    return this.store.has(interfaceName);
  }

  /** Registries sorted by interface name. */
  registries(): TypeRegistry<unknown>[] {
    return [...this.store.values()].sort((a, b) =>
      a.interfaceName < b.interfaceName ? -1 : a.interfaceName > b.interfaceName ? 1 : 0
    );
  }

  validate(): void {
    for (const registry of this.store.values()) registry.validate();
  }

  // --------------------------------------------------------------------------
  // Polymorphic values
  // --------------------------------------------------------------------------

  decodePolymorphic<I>(token: InterfaceDefinition<I>, input: JsonValue | string): I {
    return this.decodePolymorphicAt(token, this.toValue(input), []);
  }

  decodePolymorphicAt<I>(
    token: InterfaceDefinition<I>,
    value: JsonValue,
    path: ReadonlyArray<CodingPathSegment>
  ): I {
    const decoded = this.registry(token.interfaceName).decode(value, this, path);
    if (!token.is(decoded)) {
      throw new DecodeError(
        "type_mismatch",
        path,
        `decoded value does not implement ${token.interfaceName}`
      );
    }
    return decoded;
  }

  /** All-or-nothing: the first element that fails aborts the whole array. */
  decodePolymorphicArray<I>(token: InterfaceDefinition<I>, input: JsonValue | string): I[] {
    const value = this.toValue(input);
    if (value.kind !== "array") {
      throw new DecodeError("type_mismatch", [], `expected an array, found ${value.kind}`);
    }
    return value.items.map((item, index) => {
      try {
        return this.decodePolymorphicAt(token, item, [index]);
      } catch (error) {
        if (error instanceof DecodeError) {
          throw new ArrayElementDecodeError(index, error, []);
        }
        throw error;
      }
    });
  }

  encodePolymorphic<I>(token: InterfaceDefinition<I>, value: I): JsonObject {
    return this.registry(token.interfaceName).encode(value, this, this.encoder);
  }

  encodePolymorphicArray<I>(token: InterfaceDefinition<I>, values: ReadonlyArray<I>): JsonArray {
    return jsonArray(values.map((value) => this.encodePolymorphic(token, value)));
  }

  // --------------------------------------------------------------------------
  // Documentable, non-polymorphic values
  // --------------------------------------------------------------------------

  decode<T>(codable: Codable<T>, input: JsonValue | string): T {
    return this.decodeAt(codable, this.toValue(input), []);
  }

  decodeAt<T>(codable: Codable<T>, value: JsonValue, path: ReadonlyArray<CodingPathSegment>): T {
    if (!isJsonObject(value)) {
      const name = codable.metadata?.className ?? "object";
      throw new DecodeError("type_mismatch", path, `expected ${name}, found ${value.kind}`);
    }
    return codable.decode(new ObjectReader(value.members, this, path));
  }

  encode<T>(codable: Codable<T>, value: T): JsonObject {
    const writer = new ObjectWriter(this);
    codable.encode(value, writer);
    const metadata = codable.metadata;
    return this.encoder.orderMembers(
      writer.toMembers(),
      metadata === undefined ? undefined : fieldDescriptors(metadata),
      metadata?.className ?? "anonymous type"
    );
  }

  // --------------------------------------------------------------------------
  // Dates
  // --------------------------------------------------------------------------

  /** UTC timestamp with milliseconds, e.g. `2024-03-01T09:30:00.000Z`. */
  encodeDate(date: Date): JsonValue {
    if (Number.isNaN(date.getTime())) {
      throw new EncodeError("Date", "invalid date");
    }
    return jsonString(date.toISOString());
  }

  decodeDate(text: string): Date {
    return this.decodeDateAt(jsonString(text), []);
  }

  /**
   * Accepts full ISO-8601 timestamps (a missing zone means UTC), date-only
   * values (UTC midnight) and time-only values (on 1970-01-01 UTC).
   */
  decodeDateAt(value: JsonValue, path: ReadonlyArray<CodingPathSegment>): Date {
    if (value.kind !== "string") {
      throw new DecodeError(
        "type_mismatch",
        path,
        `expected an ISO-8601 date, found ${value.kind}`
      );
    }
    const text = value.value;
    let normalized: string | undefined;
    const timestamp = TIMESTAMP.exec(text);
    if (timestamp) {
      const zone = timestamp[3] ?? "Z";
      const offset = zone === "Z" ? zone : `${zone.slice(0, 3)}:${zone.slice(-2)}`;
      normalized = `${timestamp[1]}T${timestamp[2]}${offset}`;
    } else if (DATE_ONLY.test(text)) {
      normalized = `${text}T00:00:00Z`;
    } else if (TIME_ONLY.test(text)) {
      normalized = `1970-01-01T${text}Z`;
    }

    const date = normalized === undefined ? undefined : new Date(normalized);
    if (date === undefined || Number.isNaN(date.getTime())) {
      throw new DecodeError("type_mismatch", path, `"${text}" is not an ISO-8601 date`);
    }
    return date;
  }

  // --------------------------------------------------------------------------
  // Text
  // --------------------------------------------------------------------------

  parse(text: string): JsonValue {
    return parseJson(text);
  }

  stringify(value: JsonValue): string {
    return this.encoder.stringify(value);
  }

  private toValue(input: JsonValue | string): JsonValue {
    return typeof input === "string" ? parseJson(input) : input;
  }
}
