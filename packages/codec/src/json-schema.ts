/**
 * JSON Schema document model and its draft-07 rendering.
 */

import {
  jsonArray,
  jsonBoolean,
  jsonObject,
  jsonString,
  type JsonType,
  type JsonValue,
} from "./json-value.js";
import type { FieldFormat } from "./types.js";

export const JSON_SCHEMA_DRAFT_07 = "http://json-schema.org/draft-07/schema#";

/** A `$ref` target. */
export interface SchemaRef {
  readonly className: string;
  /** Points at another document rather than into the current one. */
  readonly isExternal: boolean;
  readonly baseUrl?: string;
  /** The value written as `$ref`. */
  readonly path: string;
}

export interface SchemaObject {
  readonly kind: "object";
  readonly className: string;
  readonly description?: string;
  readonly properties: ReadonlyMap<string, SchemaNode>;
  readonly required: ReadonlyArray<string>;
  readonly allOf: ReadonlyArray<SchemaRef>;
  /** Only `false` is written; objects are open by default. */
  readonly additionalProperties?: boolean;
  readonly examples: ReadonlyArray<JsonValue>;
}

export type SchemaNode =
  | SchemaObject
  | { readonly kind: "array"; readonly items: SchemaNode; readonly description?: string }
  | { readonly kind: "dictionary"; readonly values: SchemaNode; readonly description?: string }
  | {
      readonly kind: "const";
      readonly value: string;
      readonly ref?: SchemaRef;
      readonly description?: string;
    }
  | { readonly kind: "reference"; readonly ref: SchemaRef; readonly description?: string }
  | {
      readonly kind: "oneOf";
      readonly refs: ReadonlyArray<SchemaRef>;
      readonly description?: string;
    }
  | {
      readonly kind: "primitive";
      /** Absent for a member that may hold any JSON value. */
      readonly jsonType?: JsonType;
      readonly description?: string;
      readonly defaultValue?: JsonValue;
    }
  | { readonly kind: "format"; readonly format: FieldFormat; readonly description?: string }
  /** An open string type; the listed values are examples, not a closed set. */
  | {
      readonly kind: "stringLiteral";
      readonly className: string;
      readonly description?: string;
      readonly examples: ReadonlyArray<string>;
    }
  | {
      readonly kind: "stringEnum";
      readonly className: string;
      readonly description?: string;
      readonly values: ReadonlyArray<string>;
    };

export interface SchemaDocument {
  readonly id: { readonly namespace: string; readonly className: string };
  readonly url: string;
  readonly root: SchemaObject;
  /** Sorted by class name. */
  readonly definitions: ReadonlyMap<string, SchemaNode>;
}

// ============================================================================
// References
// ============================================================================

/** Append a trailing slash, as relative resolution against the base needs one. */
export function normalizeBaseUrl(baseUrl: string): string {
  if (baseUrl.length === 0 || baseUrl.endsWith("/")) return baseUrl;
  return `${baseUrl}/`;
}

/** `#ClassName`, a definition of the current document. */
export function internalRef(className: string): SchemaRef {
  return { className, isExternal: false, path: `#${className}` };
}

/** `[baseUrl]ClassName.json`, another document. */
export function externalRef(className: string, baseUrl?: string): SchemaRef {
  const base = baseUrl === undefined ? "" : normalizeBaseUrl(baseUrl);
  return {
    className,
    isExternal: true,
    baseUrl: base.length > 0 ? base : undefined,
    path: `${base}${className}.json`,
  };
}

/** `[baseUrl]Owner.json#ClassName`, a definition inside another document. */
export function definitionRef(className: string, owner: SchemaRef): SchemaRef {
  return {
    className,
    isExternal: true,
    baseUrl: owner.baseUrl,
    path: `${owner.path}#${className}`,
  };
}

/** The document itself. */
export const selfRef: SchemaRef = { className: "", isExternal: false, path: "#" };

// ============================================================================
// Rendering
// ============================================================================

function put(entries: [string, JsonValue][], key: string, value: JsonValue | undefined): void {
  if (value !== undefined) entries.push([key, value]);
}

function text(value: string | undefined): JsonValue | undefined {
  return value === undefined || value.length === 0 ? undefined : jsonString(value);
}

function renderRef(ref: SchemaRef): JsonValue {
  return jsonObject([["$ref", jsonString(ref.path)]]);
}

function renderObjectBody(entries: [string, JsonValue][], node: SchemaObject): void {
  if (node.properties.size > 0) {
    put(
      entries,
      "properties",
      jsonObject([...node.properties].map(([key, child]) => [key, renderNode(child)] as const))
    );
  }
  if (node.required.length > 0) {
    put(entries, "required", jsonArray(node.required.map(jsonString)));
  }
  if (node.allOf.length > 0) {
    put(entries, "allOf", jsonArray(node.allOf.map(renderRef)));
  }
  if (node.additionalProperties === false) {
    put(entries, "additionalProperties", jsonBoolean(false));
  }
  if (node.examples.length > 0) {
    put(entries, "examples", jsonArray(node.examples));
  }
}

/** Render a property or definition node. */
export function renderNode(node: SchemaNode): JsonValue {
  const entries: [string, JsonValue][] = [];
  switch (node.kind) {
    case "object":
      put(entries, "$id", jsonString(`#${node.className}`));
      put(entries, "type", jsonString("object"));
      put(entries, "title", jsonString(node.className));
      put(entries, "description", text(node.description));
      renderObjectBody(entries, node);
      break;
    case "array":
      put(entries, "type", jsonString("array"));
      put(entries, "description", text(node.description));
      put(entries, "items", renderNode(node.items));
      break;
    case "dictionary":
      put(entries, "type", jsonString("object"));
      put(entries, "description", text(node.description));
      put(entries, "additionalProperties", renderNode(node.values));
      break;
    case "const":
      put(entries, "const", jsonString(node.value));
      put(entries, "$ref", node.ref === undefined ? undefined : jsonString(node.ref.path));
      put(entries, "description", text(node.description));
      break;
    case "reference":
      put(entries, "$ref", jsonString(node.ref.path));
      put(entries, "description", text(node.description));
      break;
    case "oneOf":
      put(entries, "oneOf", jsonArray(node.refs.map(renderRef)));
      put(entries, "description", text(node.description));
      break;
    case "primitive":
      put(entries, "type", node.jsonType === undefined ? undefined : jsonString(node.jsonType));
      put(entries, "description", text(node.description));
      put(entries, "default", node.defaultValue);
      break;
    case "format":
      put(entries, "type", jsonString("string"));
      put(entries, "description", text(node.description));
      put(entries, "format", jsonString(node.format));
      break;
    case "stringLiteral":
      put(entries, "$id", jsonString(`#${node.className}`));
      put(entries, "type", jsonString("string"));
      put(entries, "title", jsonString(node.className));
      put(entries, "description", text(node.description));
      if (node.examples.length > 0) {
        put(entries, "examples", jsonArray(node.examples.map(jsonString)));
      }
      break;
    case "stringEnum":
      put(entries, "$id", jsonString(`#${node.className}`));
      put(entries, "type", jsonString("string"));
      put(entries, "title", jsonString(node.className));
      put(entries, "description", text(node.description));
      put(entries, "enum", jsonArray(node.values.map(jsonString)));
      break;
  }
  return jsonObject(entries);
}

/**
 * Render a document as draft-07 JSON Schema. Keys are written in the order
 * `$id, $schema, type, title, description, definitions, properties,
 * required, allOf, additionalProperties, examples`.
 */
export function toJsonSchema(document: SchemaDocument): JsonValue {
  const { root } = document;
  const entries: [string, JsonValue][] = [];
  put(entries, "$id", jsonString(document.url));
  put(entries, "$schema", jsonString(JSON_SCHEMA_DRAFT_07));
  put(entries, "type", jsonString("object"));
  put(entries, "title", jsonString(root.className));
  put(entries, "description", text(root.description));
  if (document.definitions.size > 0) {
    put(
      entries,
      "definitions",
      jsonObject([...document.definitions].map(([key, node]) => [key, renderNode(node)] as const))
    );
  }
  renderObjectBody(entries, root);
  return jsonObject(entries);
}
