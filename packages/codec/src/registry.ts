/**
 * Per-interface type registries.
 *
 * A TypeRegistry maps the discriminator strings of one interface to the
 * concrete decoders and encoders that implement it. New concrete types can
 * be registered by any module at start-up.
 */

import {
  DecodeError,
  EncodeError,
  MissingDiscriminatorFieldError,
  RegistryValidationError,
  UnknownDiscriminatorError,
  type CodingPathSegment,
} from "./errors.js";
import type { JsonObject, JsonValue } from "./json-value.js";
import type { Logger } from "./logger.js";
import { fieldDescriptors, validateTypeMetadata } from "./metadata.js";
import type { OrderedEncoder } from "./ordered-encoder.js";
import { ObjectReader } from "./reader.js";
import type {
  Codable,
  CodingContext,
  FieldDescriptor,
  InterfaceDefinition,
  TypeMetadata,
} from "./types.js";
import { ObjectWriter } from "./writer.js";

/** Default member that carries the discriminator. */
export const DEFAULT_DISCRIMINATOR_KEY = "type";

/** A concrete type registered under one discriminator of interface `I`. */
export interface TypeRegistryEntry<I> {
  readonly discriminator: string;
  /** Sample instance, used to check the entry against its key. */
  readonly prototype: I;
  readonly metadata?: TypeMetadata<I>;
  decode(reader: ObjectReader): I;
  encode(value: I, writer: ObjectWriter): void;
}

/**
 * Declare a concrete type `T` of interface `I`.
 *
 * `is` narrows an interface value to `T` before it is handed to the codable;
 * encoding a value the guard rejects is an EncodeError.
 */
export function defineType<I, T extends I>(options: {
  readonly discriminator: string;
  readonly example: T;
  readonly is: (value: I) => value is T;
  readonly codable: Codable<T>;
}): TypeRegistryEntry<I> {
  const { discriminator, example, is, codable } = options;
  const typeName = codable.metadata?.className ?? discriminator;
  return {
    discriminator,
    prototype: example,
    metadata: codable.metadata,
    decode: (reader) => codable.decode(reader),
    encode: (value, writer) => {
      if (!is(value)) {
        throw new EncodeError(typeName, `value is not a "${discriminator}"`);
      }
      codable.encode(value, writer);
    },
  };
}

/**
 * Duplicate handling for `register`: "replace" keeps the last registration,
 * "error" rejects a discriminator that is already taken.
 */
export type DuplicateStrategy = "replace" | "error";

export interface TypeRegistryOptions {
  readonly duplicateStrategy?: DuplicateStrategy;
  readonly logger?: Logger;
}

export class TypeRegistry<I> {
  readonly definition: InterfaceDefinition<I>;
  private readonly store = new Map<string, TypeRegistryEntry<I>>();
  private readonly duplicateStrategy: DuplicateStrategy;
  private readonly logger?: Logger;

  constructor(definition: InterfaceDefinition<I>, options: TypeRegistryOptions = {}) {
    this.definition = definition;
    this.duplicateStrategy = options.duplicateStrategy ?? "replace";
    this.logger = options.logger;
  }

  get interfaceName(): string {
    return this.definition.interfaceName;
  }

  get size(): number {
    return this.store.size;
  }

  /** Upsert an entry keyed by its discriminator. */
  register(entry: TypeRegistryEntry<I>): this {
    const existing = this.store.get(entry.discriminator);
    if (existing !== undefined) {
      if (this.duplicateStrategy === "error") {
        throw new RegistryValidationError(this.interfaceName, [
          `discriminator "${entry.discriminator}" is already registered`,
        ]);
      }
      this.logger?.debug(
        `${this.interfaceName}: replacing registration for "${entry.discriminator}"`
      );
    }
    this.store.set(entry.discriminator, entry);
    return this;
  }

  registerAll(entries: Iterable<TypeRegistryEntry<I>>): this {
    for (const entry of entries) this.register(entry);
    return this;
  }

  resolve(discriminator: string): TypeRegistryEntry<I> | undefined {
    return this.store.get(discriminator);
  }

  has(discriminator: string): boolean {
    return this.store.has(discriminator);
  }

  /** Entries in registration order. */
  entries(): TypeRegistryEntry<I>[] {
    return [...this.store.values()];
  }

  /** Standard discriminators in declared order, then the others sorted. */
  discriminators(): string[] {
    const standard = this.definition.standardDiscriminators ?? [];
    const known = new Set(standard);
    const added = [...this.store.keys()].filter((key) => !known.has(key)).sort();
    return [...standard, ...added];
  }

  discriminatorKey(context: Pick<CodingContext, "discriminatorKey">): string {
    return this.definition.discriminatorKey ?? context.discriminatorKey;
  }

  /** Read the discriminator, pick the entry and let it decode the same object. */
  decode(input: JsonValue, context: CodingContext, path: ReadonlyArray<CodingPathSegment> = []): I {
    if (input.kind !== "object") {
      throw new DecodeError(
        "type_mismatch",
        path,
        `expected an object for ${this.interfaceName}, found ${input.kind}`
      );
    }

    const key = this.discriminatorKey(context);
    const tag = input.members.get(key);
    if (tag === undefined || tag.kind === "null") {
      throw new MissingDiscriminatorFieldError(this.interfaceName, key, path);
    }
    if (tag.kind !== "string") {
      throw new DecodeError(
        "type_mismatch",
        [...path, key],
        `discriminator must be a string, found ${tag.kind}`
      );
    }

    const entry = this.resolve(tag.value);
    if (entry === undefined) {
      throw new UnknownDiscriminatorError(this.interfaceName, tag.value, path);
    }

    const reader = new ObjectReader(input.members, context, path);
    reader.markConsumed(key);
    return entry.decode(reader);
  }

  encode(value: I, context: CodingContext, encoder: OrderedEncoder): JsonObject {
    const discriminator = this.definition.discriminatorOf(value);
    if (discriminator === undefined) {
      throw new EncodeError(this.interfaceName, "value has no discriminator");
    }
    const entry = this.resolve(discriminator);
    if (entry === undefined) {
      throw new EncodeError(
        this.interfaceName,
        `no type is registered for discriminator "${discriminator}"`
      );
    }

    const key = this.discriminatorKey(context);
    const writer = new ObjectWriter(context);
    writer.string(key, discriminator);
    entry.encode(value, writer);

    return encoder.orderMembers(
      writer.toMembers(),
      this.fieldDescriptors(entry, key),
      entry.metadata?.className ?? `${this.interfaceName}(${discriminator})`
    );
  }

  /**
   * Descriptors of an entry. A discriminator the metadata does not declare
   * is placed after every declared field.
   */
  fieldDescriptors(entry: TypeRegistryEntry<I>, key: string): FieldDescriptor[] | undefined {
    if (entry.metadata === undefined) return undefined;
    const descriptors = fieldDescriptors(entry.metadata);
    if (descriptors.some((d) => d.wireKey === key)) return descriptors;
    const last = descriptors.reduce((max, d) => Math.max(max, d.ordinal), -1);
    return [
      ...descriptors,
      {
        name: key,
        wireKey: key,
        ordinal: last + 1,
        shape: { kind: "discriminator", interfaceName: this.interfaceName },
        isRequired: true,
        isPolymorphic: false,
        constValue: entry.discriminator,
      },
    ];
  }

  /** Check every entry against the key it is registered under. */
  validate(): void {
    const problems: string[] = [];
    for (const [key, entry] of this.store) {
      if (entry.discriminator !== key) {
        problems.push(`entry "${entry.discriminator}" is stored under "${key}"`);
      }
      if (!this.definition.is(entry.prototype)) {
        problems.push(`prototype of "${key}" does not implement ${this.interfaceName}`);
        continue;
      }
      const actual = this.definition.discriminatorOf(entry.prototype);
      if (actual !== key) {
        problems.push(`prototype of "${key}" reports discriminator "${actual ?? "<none>"}"`);
      }
      if (entry.metadata) {
        for (const issue of validateTypeMetadata(entry.metadata)) {
          problems.push(`${entry.metadata.className}.${issue.field}: ${issue.message}`);
        }
      }
    }
    if (problems.length > 0) {
      throw new RegistryValidationError(this.interfaceName, problems);
    }
  }
}
