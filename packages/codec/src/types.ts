import type { CodingPathSegment } from "./errors.js";
import type { JsonType, JsonValue } from "./json-value.js";
import type { ObjectReader } from "./reader.js";
import type { ObjectWriter } from "./writer.js";

/** String formats understood by the schema builder and the date coder. */
export type FieldFormat =
  | "date-time"
  | "date"
  | "time"
  | "uuid"
  | "uri"
  | "uri-relative"
  | "email";

/** The declared shape of a field, used for ordering and schema generation. */
export type FieldShape =
  | { readonly kind: "any" }
  | { readonly kind: "primitive"; readonly jsonType: JsonType }
  | { readonly kind: "format"; readonly format: FieldFormat }
  | { readonly kind: "stringEnum"; readonly name: string; readonly values: ReadonlyArray<string> }
  | { readonly kind: "array"; readonly items: FieldShape }
  | { readonly kind: "dictionary"; readonly values: FieldShape }
  /** Another documentable type, resolved lazily so a type may refer to itself. */
  | { readonly kind: "reference"; readonly target: () => Codable<unknown> }
  /** A value of any type registered for the named interface. */
  | { readonly kind: "interface"; readonly interfaceName: string }
  /** The discriminator member of a concrete type. */
  | { readonly kind: "discriminator"; readonly interfaceName: string };

/** A field as declared on one inheritance level. */
export interface FieldSpec {
  readonly name: string;
  /** Key on the wire; defaults to `name`. */
  readonly wireKey?: string;
  readonly shape: FieldShape;
  readonly required?: boolean;
  readonly description?: string;
  readonly defaultValue?: JsonValue;
  /** Fixed value, rendered as `const` in schemas. */
  readonly constValue?: string;
}

/** The fields one class in an inheritance chain declares. */
export interface FieldLevel {
  readonly relativeIndex: number;
  readonly fields: ReadonlyArray<FieldSpec>;
}

/** A field with its resolved key order. */
export interface FieldDescriptor {
  readonly name: string;
  readonly wireKey: string;
  /** `relativeIndex * 1000 + position within its level`. */
  readonly ordinal: number;
  readonly shape: FieldShape;
  readonly isRequired: boolean;
  readonly isPolymorphic: boolean;
  readonly description?: string;
  readonly defaultValue?: JsonValue;
  readonly constValue?: string;
}

export interface TypeMetadata<T = unknown> {
  readonly className: string;
  /** Namespace the type is published under; other modules reference it externally. */
  readonly module: string;
  readonly levels: ReadonlyArray<FieldLevel>;
  readonly description?: string;
  /** Gets its own schema document instead of a definition inside its interface's. */
  readonly isRoot?: boolean;
  readonly additionalProperties?: boolean;
  examples?(): ReadonlyArray<T>;
}

/** Decode/encode pair for a concrete, non-polymorphic type. */
export interface Codable<T> {
  readonly metadata?: TypeMetadata<T>;
  decode(reader: ObjectReader): T;
  encode(value: T, writer: ObjectWriter): void;
}

/** Runtime token for a polymorphic interface. */
export interface InterfaceDefinition<I> {
  readonly interfaceName: string;
  readonly module: string;
  /** Member holding the discriminator; the context default when omitted. */
  readonly discriminatorKey?: string;
  readonly standardDiscriminators?: ReadonlyArray<string>;
  readonly description?: string;
  /** Fields every implementation shares, documented on the interface schema. */
  readonly metadata?: TypeMetadata<I>;
  is(value: unknown): value is I;
  discriminatorOf(value: I): string | undefined;
}

/** The services readers and writers call back into. */
export interface CodingContext {
  readonly discriminatorKey: string;
  readonly locale: string;
  decodeDateAt(value: JsonValue, path: ReadonlyArray<CodingPathSegment>): Date;
  encodeDate(date: Date): JsonValue;
  decodeAt<T>(codable: Codable<T>, value: JsonValue, path: ReadonlyArray<CodingPathSegment>): T;
  encode<T>(codable: Codable<T>, value: T): JsonValue;
  decodePolymorphicAt<I>(
    token: InterfaceDefinition<I>,
    value: JsonValue,
    path: ReadonlyArray<CodingPathSegment>
  ): I;
  encodePolymorphic<I>(token: InterfaceDefinition<I>, value: I): JsonValue;
}
