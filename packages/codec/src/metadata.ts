import { MetadataValidationError, type MetadataIssue } from "./errors.js";
import type { JsonType, JsonValue } from "./json-value.js";
import type {
  Codable,
  FieldDescriptor,
  FieldFormat,
  FieldLevel,
  FieldShape,
  FieldSpec,
  TypeMetadata,
} from "./types.js";

/** Ordinals of one level occupy `[relativeIndex * 1000, relativeIndex * 1000 + 999]`. */
export const LEVEL_STRIDE = 1000;

// ============================================================================
// Field shapes
// ============================================================================

function primitive(jsonType: JsonType): FieldShape {
  return { kind: "primitive", jsonType };
}

const anyShape: FieldShape = { kind: "any" };

function format(value: FieldFormat): FieldShape {
  return { kind: "format", format: value };
}

export const shapes = {
  any: anyShape,
  string: primitive("string"),
  integer: primitive("integer"),
  number: primitive("number"),
  boolean: primitive("boolean"),
  object: primitive("object"),
  dateTime: format("date-time"),
  date: format("date"),
  time: format("time"),
  uuid: format("uuid"),
  uri: format("uri"),
  uriRelative: format("uri-relative"),
  email: format("email"),
  array: (items: FieldShape): FieldShape => ({ kind: "array", items }),
  dictionary: (values: FieldShape): FieldShape => ({ kind: "dictionary", values }),
  reference: (target: () => Codable<unknown>): FieldShape => ({ kind: "reference", target }),
  polymorphic: (interfaceName: string): FieldShape => ({ kind: "interface", interfaceName }),
  discriminator: (interfaceName: string): FieldShape => ({ kind: "discriminator", interfaceName }),
  stringEnum: (name: string, values: ReadonlyArray<string>): FieldShape => ({
    kind: "stringEnum",
    name,
    values,
  }),
};

/** True when the shape, or an array/dictionary of it, is an interface. */
export function isPolymorphicShape(shape: FieldShape): boolean {
  switch (shape.kind) {
    case "interface":
      return true;
    case "array":
      return isPolymorphicShape(shape.items);
    case "dictionary":
      return isPolymorphicShape(shape.values);
    default:
      return false;
  }
}

/** Structural equality of shapes; references compare by class name. */
export function sameShape(a: FieldShape, b: FieldShape): boolean {
  switch (a.kind) {
    case "any":
      return b.kind === "any";
    case "primitive":
      return b.kind === "primitive" && a.jsonType === b.jsonType;
    case "format":
      return b.kind === "format" && a.format === b.format;
    case "stringEnum":
      return b.kind === "stringEnum" && a.name === b.name;
    case "array":
      return b.kind === "array" && sameShape(a.items, b.items);
    case "dictionary":
      return b.kind === "dictionary" && sameShape(a.values, b.values);
    case "reference":
      return (
        b.kind === "reference" &&
        a.target().metadata?.className === b.target().metadata?.className
      );
    case "interface":
      return b.kind === "interface" && a.interfaceName === b.interfaceName;
    case "discriminator":
      return b.kind === "discriminator" && a.interfaceName === b.interfaceName;
  }
}

// ============================================================================
// Descriptors
// ============================================================================

/**
 * Resolve the ordered field descriptors of a type.
 *
 * When two levels declare the same wire key, the level with the higher
 * `relativeIndex` wins. Result is sorted by ordinal.
 */
export function fieldDescriptors(metadata: TypeMetadata<unknown>): FieldDescriptor[] {
  const byKey = new Map<string, { level: number; descriptor: FieldDescriptor }>();

  for (const level of metadata.levels) {
    level.fields.forEach((field, position) => {
      const wireKey = field.wireKey ?? field.name;
      const existing = byKey.get(wireKey);
      if (existing && existing.level > level.relativeIndex) return;
      byKey.set(wireKey, {
        level: level.relativeIndex,
        descriptor: {
          name: field.name,
          wireKey,
          ordinal: level.relativeIndex * LEVEL_STRIDE + position,
          shape: field.shape,
          isRequired: field.required ?? false,
          isPolymorphic: isPolymorphicShape(field.shape),
          description: field.description,
          defaultValue: field.defaultValue,
          constValue: field.constValue,
        },
      });
    });
  }

  return [...byKey.values()]
    .map((entry) => entry.descriptor)
    .sort((a, b) => a.ordinal - b.ordinal);
}

/** Report every inconsistency in a type's metadata. An empty list means valid. */
export function validateTypeMetadata(metadata: TypeMetadata<unknown>): MetadataIssue[] {
  const issues: MetadataIssue[] = [];

  if (metadata.className.length === 0) {
    issues.push({ field: "<type>", message: "class name must not be empty" });
  }

  const seenLevels = new Set<number>();
  for (const level of metadata.levels) {
    const label = `level ${level.relativeIndex}`;
    if (!Number.isInteger(level.relativeIndex) || level.relativeIndex < 0) {
      issues.push({ field: label, message: "relative index must be a non-negative integer" });
    }
    if (seenLevels.has(level.relativeIndex)) {
      issues.push({ field: label, message: "declared more than once, ordinals would collide" });
    }
    seenLevels.add(level.relativeIndex);

    if (level.fields.length >= LEVEL_STRIDE) {
      issues.push({ field: label, message: `declares more than ${LEVEL_STRIDE - 1} fields` });
    }

    const keys = new Set<string>();
    for (const field of level.fields) {
      const wireKey = field.wireKey ?? field.name;
      if (keys.has(wireKey)) {
        issues.push({ field: wireKey, message: `duplicate key in ${label}` });
      }
      keys.add(wireKey);
      const holdsString =
        field.shape.kind === "discriminator" ||
        (field.shape.kind === "primitive" && field.shape.jsonType === "string");
      if (field.constValue !== undefined && !holdsString) {
        issues.push({ field: wireKey, message: "only string fields may carry a constant" });
      }
    }
  }

  return issues;
}

// ============================================================================
// Fluent builder
// ============================================================================

export interface FieldOptions {
  readonly wireKey?: string;
  readonly required?: boolean;
  readonly description?: string;
  readonly defaultValue?: JsonValue;
  readonly constValue?: string;
}

/**
 * Fluent builder for type metadata.
 *
 * ```ts
 * const metadata = typeMetadata<FileResult>("FileResult", "results")
 *   .inherit(resultDataMetadata)
 *   .level(1)
 *   .field("relativePath", shapes.uriRelative, { required: true })
 *   .field("contentType", shapes.string)
 *   .build();
 * ```
 */
export class TypeMetadataBuilder<T> {
  private readonly _className: string;
  private readonly _module: string;
  private readonly _levels: { relativeIndex: number; fields: FieldSpec[] }[] = [];
  private _current?: { relativeIndex: number; fields: FieldSpec[] };
  private _description?: string;
  private _isRoot = false;
  private _additionalProperties?: boolean;
  private _examples?: () => ReadonlyArray<T>;

  constructor(className: string, module: string) {
    this._className = className;
    this._module = module;
  }

  /** Copy the levels of a parent type. Later levels must use higher indexes. */
  inherit(parent: TypeMetadata<unknown>): this {
    for (const level of parent.levels) {
      this._levels.push({ relativeIndex: level.relativeIndex, fields: [...level.fields] });
    }
    this._current = undefined;
    return this;
  }

  /** Start declaring the fields of one inheritance level. */
  level(relativeIndex: number): this {
    const level: { relativeIndex: number; fields: FieldSpec[] } = { relativeIndex, fields: [] };
    this._levels.push(level);
    this._current = level;
    return this;
  }

  field(name: string, shape: FieldShape, options?: FieldOptions): this {
    if (!this._current) {
      const next = this._levels.reduce((max, l) => Math.max(max, l.relativeIndex + 1), 0);
      this.level(next);
    }
    this._current?.fields.push({ name, shape, ...options });
    return this;
  }

  describe(text: string): this {
    this._description = text;
    return this;
  }

  /** Publish the type as its own schema document. */
  root(): this {
    this._isRoot = true;
    return this;
  }

  /** Reject members that are not declared. */
  closed(): this {
    this._additionalProperties = false;
    return this;
  }

  examples(provider: () => ReadonlyArray<T>): this {
    this._examples = provider;
    return this;
  }

  /** Build the metadata, throwing on validation errors. */
  build(): TypeMetadata<T> {
    const levels: FieldLevel[] = this._levels.map((l) => ({
      relativeIndex: l.relativeIndex,
      fields: [...l.fields],
    }));
    const metadata: TypeMetadata<T> = {
      className: this._className,
      module: this._module,
      levels,
      description: this._description,
      isRoot: this._isRoot,
      additionalProperties: this._additionalProperties,
      examples: this._examples,
    };

    const issues = validateTypeMetadata(metadata);
    if (issues.length > 0) {
      throw new MetadataValidationError(this._className, issues);
    }
    return metadata;
  }
}

/** Create a new metadata builder. */
export function typeMetadata<T>(className: string, module: string): TypeMetadataBuilder<T> {
  return new TypeMetadataBuilder<T>(className, module);
}
