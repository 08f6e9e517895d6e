/**
 * Error types raised while coding polymorphic JSON.
 *
 * Decode failures carry the coding path of the member that failed so that
 * a caller can point at `stepHistory[1].type` rather than at "somewhere".
 */

/** A segment of a coding path: an object key or an array index. */
export type CodingPathSegment = string | number;

/** Render a coding path as `a.b[2].c`. */
export function formatCodingPath(path: ReadonlyArray<CodingPathSegment>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out.length === 0 ? "<root>" : out;
}

/** Base class for every error thrown by the codec. */
export class CodingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodingError";
  }
}

export type DecodeErrorReason =
  | "missing_discriminator"
  | "unknown_discriminator"
  | "array_element"
  | "type_mismatch"
  | "value_not_found"
  | "invalid_json"
  | "integer_out_of_range";

/** The input could not be decoded into the requested type. */
export class DecodeError extends CodingError {
  readonly reason: DecodeErrorReason;
  readonly codingPath: ReadonlyArray<CodingPathSegment>;

  constructor(
    reason: DecodeErrorReason,
    codingPath: ReadonlyArray<CodingPathSegment>,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${formatCodingPath(codingPath)}: ${message}`, options);
    this.name = "DecodeError";
    this.reason = reason;
    this.codingPath = codingPath;
  }
}

/** The input object has no discriminator member. */
export class MissingDiscriminatorFieldError extends DecodeError {
  readonly interfaceName: string;
  readonly key: string;

  constructor(interfaceName: string, key: string, codingPath: ReadonlyArray<CodingPathSegment>) {
    super(
      "missing_discriminator",
      codingPath,
      `missing discriminator "${key}" for interface ${interfaceName}`
    );
    this.name = "MissingDiscriminatorFieldError";
    this.interfaceName = interfaceName;
    this.key = key;
  }
}

/** The discriminator value is not registered for the interface. */
export class UnknownDiscriminatorError extends DecodeError {
  readonly interfaceName: string;
  readonly discriminator: string;

  constructor(
    interfaceName: string,
    discriminator: string,
    codingPath: ReadonlyArray<CodingPathSegment>
  ) {
    super(
      "unknown_discriminator",
      codingPath,
      `no ${interfaceName} is registered for discriminator "${discriminator}"`
    );
    this.name = "UnknownDiscriminatorError";
    this.interfaceName = interfaceName;
    this.discriminator = discriminator;
  }
}

/** An element of a polymorphic array failed to decode. */
export class ArrayElementDecodeError extends DecodeError {
  readonly index: number;
  readonly inner: DecodeError;

  constructor(index: number, inner: DecodeError, codingPath: ReadonlyArray<CodingPathSegment>) {
    super("array_element", codingPath, `element ${index} failed: ${inner.message}`, {
      cause: inner,
    });
    this.name = "ArrayElementDecodeError";
    this.index = index;
    this.inner = inner;
  }
}

/** A value could not be encoded, e.g. it does not match its registry entry. */
export class EncodeError extends CodingError {
  readonly typeName: string;

  constructor(typeName: string, message: string) {
    super(`${typeName}: ${message}`);
    this.name = "EncodeError";
    this.typeName = typeName;
  }
}

/** No registry was supplied for an interface. A configuration error, not bad input. */
export class UnregisteredInterfaceError extends CodingError {
  readonly interfaceName: string;

  constructor(interfaceName: string) {
    super(`no type registry is configured for interface ${interfaceName}`);
    this.name = "UnregisteredInterfaceError";
    this.interfaceName = interfaceName;
  }
}

/** Host data that has no JSON representation was handed to the codec. */
export class InvalidCodingShapeError extends CodingError {
  readonly codingPath: ReadonlyArray<CodingPathSegment>;

  constructor(codingPath: ReadonlyArray<CodingPathSegment>, description: string) {
    super(`${formatCodingPath(codingPath)}: cannot represent ${description} as JSON`);
    this.name = "InvalidCodingShapeError";
    this.codingPath = codingPath;
  }
}

/** A registry entry disagrees with the key it is registered under. */
export class RegistryValidationError extends CodingError {
  readonly interfaceName: string;
  readonly problems: ReadonlyArray<string>;

  constructor(interfaceName: string, problems: ReadonlyArray<string>) {
    super(
      `Registry for ${interfaceName} failed validation:\n` +
        problems.map((p) => `  ${p}`).join("\n")
    );
    this.name = "RegistryValidationError";
    this.interfaceName = interfaceName;
    this.problems = problems;
  }
}

/** A single problem found in type metadata. */
export interface MetadataIssue {
  readonly field: string;
  readonly message: string;
}

/** Type metadata is inconsistent (duplicate ordinals, bad levels). */
export class MetadataValidationError extends CodingError {
  readonly className: string;
  readonly issues: ReadonlyArray<MetadataIssue>;

  constructor(className: string, issues: ReadonlyArray<MetadataIssue>) {
    super(
      `Metadata "${className}" validation failed:\n` +
        issues.map((e) => `  ${e.field}: ${e.message}`).join("\n")
    );
    this.name = "MetadataValidationError";
    this.className = className;
    this.issues = issues;
  }
}

/** A schema document could not be produced. */
export class SchemaBuildError extends CodingError {
  readonly className: string;

  constructor(className: string, message: string) {
    super(`${className}: ${message}`);
    this.name = "SchemaBuildError";
    this.className = className;
  }
}

/** A config file or environment variable holds an unusable value. */
export class ConfigurationError extends CodingError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = "ConfigurationError";
    this.source = source;
  }
}
