import { SchemaBuildError } from "./errors.js";
import {
  definitionRef,
  externalRef,
  internalRef,
  normalizeBaseUrl,
  selfRef,
  type SchemaDocument,
  type SchemaNode,
  type SchemaObject,
  type SchemaRef,
} from "./json-schema.js";
import type { JsonValue } from "./json-value.js";
import { silentLogger, type Logger } from "./logger.js";
import { fieldDescriptors, sameShape } from "./metadata.js";
import type { TypeRegistry, TypeRegistryEntry } from "./registry.js";
import type { SerializationContext } from "./serialization-context.js";
import type { Codable, FieldDescriptor, FieldShape, TypeMetadata } from "./types.js";

export interface SchemaBuilderOptions {
  /** Module whose documents are emitted. */
  readonly module: string;
  /** Base URL per module. Modules without one are referenced relatively. */
  readonly baseUrls?: Readonly<Record<string, string>>;
  /** Non-polymorphic types that get a document of their own. */
  readonly roots?: ReadonlyArray<Codable<unknown>>;
  readonly logger?: Logger;
}

/** Per-document state: hoisted definitions and the classes being expanded. */
interface DocumentScope {
  readonly module: string;
  /** Interface whose document this is, if any. */
  readonly interfaceName?: string;
  /** Root type whose document this is, if any. */
  readonly rootClassName?: string;
  readonly definitions: Map<string, SchemaNode>;
  readonly expanding: Set<string>;
}

/**
 * Builds JSON Schema documents from the registries of a context.
 *
 * Each interface of the module gets a document holding its shared fields,
 * a `<Interface>Type` definition listing the discriminators, and one
 * definition per concrete type. Root types get a document of their own.
 * Types from another module are only ever referenced, never expanded.
 */
export class SchemaBuilder {
  private readonly context: SerializationContext;
  private readonly module: string;
  private readonly baseUrls: Readonly<Record<string, string>>;
  private readonly roots: ReadonlyArray<Codable<unknown>>;
  private readonly logger: Logger;

  constructor(context: SerializationContext, options: SchemaBuilderOptions) {
    this.context = context;
    this.module = options.module;
    this.baseUrls = options.baseUrls ?? context.config.schema.baseUrls;
    this.roots = options.roots ?? [];
    this.logger = options.logger ?? silentLogger;
  }

  buildSchemas(): SchemaDocument[] {
    const registries = this.context.registries();
    const interfaceDocs = registries
      .filter((registry) => registry.definition.module === this.module)
      .map((registry) => this.buildInterfaceDocument(registry));

    const rootDocs: SchemaDocument[] = [];
    for (const registry of registries) {
      for (const entry of registry.entries()) {
        const metadata = entry.metadata;
        if (metadata === undefined || metadata.module !== this.module) continue;
        if (this.isRootEntry(registry, entry)) {
          rootDocs.push(this.buildRootDocument(registry, entry, metadata));
        }
      }
    }
    for (const codable of this.roots) {
      const metadata = this.requireMetadata(codable, "root type");
      if (metadata.module !== this.module) continue;
      rootDocs.push(this.buildCodableDocument(codable, metadata));
    }
    rootDocs.sort((a, b) => compareNames(a.id.className, b.id.className));

    return [...interfaceDocs, ...rootDocs];
  }

  // --------------------------------------------------------------------------
  // Documents
  // --------------------------------------------------------------------------

  private buildInterfaceDocument(registry: TypeRegistry<unknown>): SchemaDocument {
    const definition = registry.definition;
    const name = definition.interfaceName;
    this.logger.debug(`building schema for interface ${name}`);
    const scope = this.newScope(definition.module, name);

    const typeName = `${name}Type`;
    scope.definitions.set(typeName, {
      kind: "stringLiteral",
      className: typeName,
      description: `The discriminator values of ${name}.`,
      examples: registry.discriminators(),
    });

    const key = registry.discriminatorKey(this.context);
    const properties = new Map<string, SchemaNode>();
    const required: string[] = [];
    const interfaceFields = definition.metadata ? fieldDescriptors(definition.metadata) : [];
    for (const field of interfaceFields) {
      if (field.wireKey === key) continue;
      properties.set(field.wireKey, this.buildProperty(field, scope));
      if (field.isRequired) required.push(field.wireKey);
    }
    properties.set(key, { kind: "reference", ref: internalRef(typeName) });
    required.push(key);

    for (const entry of registry.entries()) {
      const metadata = entry.metadata;
      if (metadata === undefined || this.isRootEntry(registry, entry)) continue;
      if (scope.definitions.has(metadata.className)) continue;
      scope.expanding.add(metadata.className);
      const node = this.buildEntryObject(registry, entry, metadata, scope, [selfRef]);
      scope.definitions.set(metadata.className, node);
      scope.expanding.delete(metadata.className);
    }

    return this.document(scope, name, {
      kind: "object",
      className: name,
      description: definition.description ?? definition.metadata?.description,
      properties,
      required,
      allOf: [],
      additionalProperties: definition.metadata?.additionalProperties,
      examples: [],
    });
  }

  private buildRootDocument(
    registry: TypeRegistry<unknown>,
    entry: TypeRegistryEntry<unknown>,
    metadata: TypeMetadata<unknown>
  ): SchemaDocument {
    this.logger.debug(`building schema for root ${metadata.className}`);
    const scope = this.newScope(metadata.module, undefined, metadata.className);
    scope.expanding.add(metadata.className);
    const interfaceRef = this.interfaceDocumentRef(registry.definition.interfaceName, scope);
    const root = this.buildEntryObject(registry, entry, metadata, scope, [interfaceRef]);
    return this.document(scope, metadata.className, root);
  }

  private buildCodableDocument(
    codable: Codable<unknown>,
    metadata: TypeMetadata<unknown>
  ): SchemaDocument {
    this.logger.debug(`building schema for root ${metadata.className}`);
    const scope = this.newScope(metadata.module, undefined, metadata.className);
    scope.expanding.add(metadata.className);
    const root = this.buildCodableObject(codable, metadata, scope);
    return this.document(scope, metadata.className, root);
  }

  private document(scope: DocumentScope, className: string, root: SchemaObject): SchemaDocument {
    const definitions = new Map(
      [...scope.definitions].sort(([a], [b]) => compareNames(a, b))
    );
    return {
      id: { namespace: scope.module, className },
      url: externalRef(className, this.baseUrlFor(scope.module)).path,
      root,
      definitions,
    };
  }

  // --------------------------------------------------------------------------
  // Objects
  // --------------------------------------------------------------------------

  /** A concrete type of an interface, minus the fields the interface declares. */
  private buildEntryObject(
    registry: TypeRegistry<unknown>,
    entry: TypeRegistryEntry<unknown>,
    metadata: TypeMetadata<unknown>,
    scope: DocumentScope,
    allOf: SchemaRef[]
  ): SchemaObject {
    const key = registry.discriminatorKey(this.context);
    const inherited = registry.definition.metadata
      ? fieldDescriptors(registry.definition.metadata)
      : [];
    const fields = registry.fieldDescriptors(entry, key) ?? [];

    const properties = new Map<string, SchemaNode>();
    const required: string[] = [];
    for (const field of fields) {
      if (field.wireKey === key) {
        properties.set(key, {
          kind: "const",
          value: entry.discriminator,
          ref: this.discriminatorTypeRef(registry.definition.interfaceName, scope),
          description: field.description,
        });
        required.push(key);
        continue;
      }

      const parent = inherited.find((p) => p.wireKey === field.wireKey);
      const isInherited =
        parent !== undefined &&
        field.constValue === undefined &&
        field.defaultValue === undefined &&
        sameShape(parent.shape, field.shape);
      if (isInherited) continue;

      properties.set(field.wireKey, this.buildProperty(field, scope));
      if (field.isRequired) required.push(field.wireKey);
    }

    const examples: JsonValue[] = [];
    for (const example of metadata.examples?.() ?? []) {
      examples.push(registry.encode(example, this.context, this.context.encoder));
    }

    return {
      kind: "object",
      className: metadata.className,
      description: metadata.description,
      properties,
      required,
      allOf,
      additionalProperties: metadata.additionalProperties,
      examples,
    };
  }

  private buildCodableObject(
    codable: Codable<unknown>,
    metadata: TypeMetadata<unknown>,
    scope: DocumentScope
  ): SchemaObject {
    const properties = new Map<string, SchemaNode>();
    const required: string[] = [];
    for (const field of fieldDescriptors(metadata)) {
      properties.set(field.wireKey, this.buildProperty(field, scope));
      if (field.isRequired) required.push(field.wireKey);
    }
    const examples = (metadata.examples?.() ?? []).map((example) =>
      this.context.encode(codable, example)
    );
    return {
      kind: "object",
      className: metadata.className,
      description: metadata.description,
      properties,
      required,
      allOf: [],
      additionalProperties: metadata.additionalProperties,
      examples,
    };
  }

  // --------------------------------------------------------------------------
  // Properties
  // --------------------------------------------------------------------------

  private buildProperty(field: FieldDescriptor, scope: DocumentScope): SchemaNode {
    const node = this.buildShape(field.shape, scope, field.wireKey);
    if (field.constValue !== undefined) {
      return { kind: "const", value: field.constValue, description: field.description };
    }
    if (node.kind === "primitive") {
      return { ...node, description: field.description, defaultValue: field.defaultValue };
    }
    if (node.kind === "object" || node.kind === "stringLiteral" || node.kind === "stringEnum") {
      return node;
    }
    return { ...node, description: field.description };
  }

  private buildShape(shape: FieldShape, scope: DocumentScope, wireKey: string): SchemaNode {
    switch (shape.kind) {
      case "any":
        return { kind: "primitive" };
      case "primitive":
        return { kind: "primitive", jsonType: shape.jsonType };
      case "format":
        return { kind: "format", format: shape.format };
      case "stringEnum":
        if (!scope.definitions.has(shape.name)) {
          scope.definitions.set(shape.name, {
            kind: "stringEnum",
            className: shape.name,
            values: shape.values,
          });
        }
        return { kind: "reference", ref: internalRef(shape.name) };
      case "array":
        return { kind: "array", items: this.buildShape(shape.items, scope, wireKey) };
      case "dictionary":
        return { kind: "dictionary", values: this.buildShape(shape.values, scope, wireKey) };
      case "reference":
        return { kind: "reference", ref: this.referenceTo(shape.target(), scope, wireKey) };
      case "interface":
        return {
          kind: "oneOf",
          refs: this.implementationRefs(shape.interfaceName, scope, wireKey),
        };
      case "discriminator":
        return {
          kind: "reference",
          ref: this.discriminatorTypeRef(shape.interfaceName, scope),
        };
    }
  }

  /** Hoist a nested type into the document, or reference it where it lives. */
  private referenceTo(codable: Codable<unknown>, scope: DocumentScope, wireKey: string): SchemaRef {
    const metadata = this.requireMetadata(codable, `member "${wireKey}"`);
    const name = metadata.className;
    if (metadata.module !== scope.module) {
      return externalRef(name, this.baseUrlFor(metadata.module));
    }
    // A root lives in its own document, so it is never hoisted.
    if (metadata.isRoot === true || name === scope.rootClassName) {
      return externalRef(name);
    }
    if (!scope.definitions.has(name) && !scope.expanding.has(name)) {
      scope.expanding.add(name);
      scope.definitions.set(name, this.buildCodableObject(codable, metadata, scope));
      scope.expanding.delete(name);
    }
    return internalRef(name);
  }

  /** One reference per concrete type registered for the interface. */
  private implementationRefs(
    interfaceName: string,
    scope: DocumentScope,
    wireKey: string
  ): SchemaRef[] {
    if (!this.context.hasRegistry(interfaceName)) {
      throw new SchemaBuildError(
        interfaceName,
        `member "${wireKey}" references an interface with no registered types`
      );
    }
    const registry = this.context.registry(interfaceName);
    const refs: SchemaRef[] = [];
    for (const entry of registry.entries()) {
      const metadata = entry.metadata;
      if (metadata === undefined) {
        this.logger.debug(
          `${interfaceName}: "${entry.discriminator}" has no metadata, left out of oneOf`
        );
        continue;
      }
      if (this.isRootEntry(registry, entry)) {
        refs.push(externalRef(metadata.className, this.foreignBaseUrl(metadata.module, scope)));
      } else if (scope.interfaceName === interfaceName) {
        refs.push(internalRef(metadata.className));
      } else {
        const owner = this.interfaceDocumentRef(interfaceName, scope);
        refs.push(definitionRef(metadata.className, owner));
      }
    }
    return refs;
  }

  private interfaceDocumentRef(interfaceName: string, scope: DocumentScope): SchemaRef {
    const module = this.context.registry(interfaceName).definition.module;
    return externalRef(interfaceName, this.foreignBaseUrl(module, scope));
  }

  private discriminatorTypeRef(interfaceName: string, scope: DocumentScope): SchemaRef {
    const typeName = `${interfaceName}Type`;
    if (scope.interfaceName === interfaceName) return internalRef(typeName);
    return definitionRef(typeName, this.interfaceDocumentRef(interfaceName, scope));
  }

  // --------------------------------------------------------------------------

  /** Explicit roots, and types registered from another module than their interface. */
  private isRootEntry(registry: TypeRegistry<unknown>, entry: TypeRegistryEntry<unknown>): boolean {
    const metadata = entry.metadata;
    if (metadata === undefined) return false;
    return metadata.isRoot === true || metadata.module !== registry.definition.module;
  }

  private newScope(module: string, interfaceName?: string, rootClassName?: string): DocumentScope {
    return { module, interfaceName, rootClassName, definitions: new Map(), expanding: new Set() };
  }

  private baseUrlFor(module: string): string | undefined {
    const base = this.baseUrls[module];
    return base === undefined ? undefined : normalizeBaseUrl(base);
  }

  /** Base URL for a reference, omitted within the same module. */
  private foreignBaseUrl(module: string, scope: DocumentScope): string | undefined {
    return module === scope.module ? undefined : this.baseUrlFor(module);
  }

  private requireMetadata(codable: Codable<unknown>, where: string): TypeMetadata<unknown> {
    if (codable.metadata === undefined) {
      throw new SchemaBuildError(where, "referenced type has no metadata");
    }
    return codable.metadata;
  }
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
