import { describe, expect, it } from "vitest";
import {
  JSON_SCHEMA_DRAFT_07,
  SchemaBuildError,
  SchemaBuilder,
  SerializationContext,
  TypeRegistry,
  jsonNumber,
  shapes,
  stringifyJson,
  toHost,
  toJsonSchema,
  typeMetadata,
  type Codable,
  type SchemaDocument,
} from "../index.js";
import {
  OwnerCodable,
  PetInterface,
  catEntry,
  createPetRegistry,
  dogEntry,
  parrotEntry,
} from "./fixtures.js";

const baseUrls = {
  pets: "https://example.org/schemas/pets",
  birds: "https://example.org/schemas/birds/",
};

function petContext(): SerializationContext {
  return new SerializationContext([createPetRegistry().register(parrotEntry)], {
    config: { schema: { baseUrls } },
  });
}

function find(docs: SchemaDocument[], className: string): SchemaDocument {
  const doc = docs.find((d) => d.id.className === className);
  if (doc === undefined) throw new Error(`no document for ${className}`);
  return doc;
}

function keysOf(doc: SchemaDocument): string[] {
  const json = toJsonSchema(doc);
  return json.kind === "object" ? [...json.members.keys()] : [];
}

interface Collar {
  readonly size: string;
}

const CollarCodable: Codable<Collar> = {
  metadata: typeMetadata<Collar>("Collar", "pets")
    .root()
    .field("size", shapes.stringEnum("CollarSize", ["s", "m", "l"]), { required: true })
    .field("labels", shapes.dictionary(shapes.string))
    .field("kind", shapes.string, { constValue: "collar", description: "Always collar." })
    .field("weight", shapes.number, { defaultValue: jsonNumber(0.5), description: "Grams." })
    .examples(() => [{ size: "m" }])
    .build(),
  decode: (reader) => ({ size: reader.string("size") }),
  encode: (value, writer) => {
    writer.string("size", value.size);
  },
};

describe("SchemaBuilder interface documents", () => {
  const docs = new SchemaBuilder(petContext(), { module: "pets" }).buildSchemas();
  const pet = find(docs, "Pet");

  it("emits the interface document first", () => {
    expect(docs.map((d) => d.id.className)).toEqual(["Pet"]);
    expect(pet.url).toBe("https://example.org/schemas/pets/Pet.json");
    expect(pet.id).toEqual({ namespace: "pets", className: "Pet" });
  });

  it("lists definitions sorted by name, leaving out types of other modules", () => {
    expect([...pet.definitions.keys()]).toEqual(["Cat", "Dog", "PetType"]);
  });

  it("writes shared fields and the discriminator at the root", () => {
    expect(toHost(toJsonSchema(pet))).toMatchObject({
      $id: "https://example.org/schemas/pets/Pet.json",
      $schema: JSON_SCHEMA_DRAFT_07,
      type: "object",
      title: "Pet",
      description: "An animal kept at home.",
      properties: { name: { type: "string" }, type: { $ref: "#PetType" } },
      required: ["name", "type"],
    });
    expect(keysOf(pet)).toEqual([
      "$id",
      "$schema",
      "type",
      "title",
      "description",
      "definitions",
      "properties",
      "required",
    ]);
  });

  it("lists every registered discriminator on the type definition", () => {
    expect(toHost(toJsonSchema(pet))).toMatchObject({
      definitions: {
        PetType: {
          $id: "#PetType",
          type: "string",
          title: "PetType",
          description: "The discriminator values of Pet.",
          examples: ["dog", "cat", "parrot"],
        },
      },
    });
  });

  it("renders concrete types without the inherited fields", () => {
    expect(toHost(toJsonSchema(pet))).toMatchObject({
      definitions: {
        Dog: {
          $id: "#Dog",
          type: "object",
          title: "Dog",
          properties: {
            breed: { type: "string" },
            tags: { type: "array", items: { type: "string" } },
            type: { const: "dog", $ref: "#PetType" },
          },
          required: ["tags", "type"],
          allOf: [{ $ref: "#" }],
          examples: [{ name: "Rex", tags: ["good"], type: "dog" }],
        },
      },
    });
    const dog = pet.definitions.get("Dog");
    const keys = dog?.kind === "object" ? [...dog.properties.keys()] : [];
    expect(keys).toEqual(["breed", "tags", "type"]);
  });
});

describe("SchemaBuilder root documents", () => {
  const docs = new SchemaBuilder(petContext(), {
    module: "pets",
    roots: [OwnerCodable, CollarCodable],
  }).buildSchemas();

  it("orders root documents by class name after the interfaces", () => {
    expect(docs.map((d) => d.id.className)).toEqual(["Pet", "Collar", "Owner"]);
  });

  it("references every implementation of a polymorphic member", () => {
    const owner = toHost(toJsonSchema(find(docs, "Owner")));
    expect(owner).toMatchObject({
      $id: "https://example.org/schemas/pets/Owner.json",
      description: "A person and their pets.",
      properties: {
        name: { type: "string" },
        pets: {
          type: "array",
          items: {
            oneOf: [
              { $ref: "Pet.json#Dog" },
              { $ref: "Pet.json#Cat" },
              { $ref: "https://example.org/schemas/birds/Parrot.json" },
            ],
          },
        },
        home: { $ref: "#Address" },
        tree: { $ref: "#TreeNode" },
        notes: {},
      },
      required: ["name", "pets"],
    });
  });

  it("hoists nested types once, even when they refer to themselves", () => {
    const owner = find(docs, "Owner");
    expect([...owner.definitions.keys()]).toEqual(["Address", "TreeNode"]);
    expect(toHost(toJsonSchema(owner))).toMatchObject({
      definitions: {
        Address: {
          $id: "#Address",
          type: "object",
          properties: { street: { type: "string" } },
          required: ["street"],
        },
        TreeNode: {
          properties: {
            label: { type: "string" },
            children: { type: "array", items: { $ref: "#TreeNode" } },
          },
          required: ["label"],
        },
      },
    });
  });

  it("renders enums, dictionaries, constants and defaults", () => {
    expect(toHost(toJsonSchema(find(docs, "Collar")))).toEqual({
      $id: "https://example.org/schemas/pets/Collar.json",
      $schema: JSON_SCHEMA_DRAFT_07,
      type: "object",
      title: "Collar",
      definitions: {
        CollarSize: {
          $id: "#CollarSize",
          type: "string",
          title: "CollarSize",
          enum: ["s", "m", "l"],
        },
      },
      properties: {
        size: { $ref: "#CollarSize" },
        labels: { type: "object", additionalProperties: { type: "string" } },
        kind: { const: "collar", description: "Always collar." },
        weight: { type: "number", description: "Grams.", default: 0.5 },
      },
      required: ["size"],
      examples: [{ size: "m" }],
    });
  });
});

interface Leash {
  readonly length: number;
  readonly extension?: Leash;
}

const LeashCodable: Codable<Leash> = {
  metadata: typeMetadata<Leash>("Leash", "pets")
    .field("length", shapes.number, { required: true })
    .field("extension", shapes.reference(() => LeashCodable))
    .build(),
  decode: (reader) => ({
    length: reader.number("length"),
    extension: reader.optionalObject("extension", LeashCodable),
  }),
  encode: (value, writer) => {
    writer.number("length", value.length).object("extension", LeashCodable, value.extension);
  },
};

describe("SchemaBuilder self-referencing roots", () => {
  it("points a recursive member of a root at its own document", () => {
    const builder = new SchemaBuilder(petContext(), { module: "pets", roots: [LeashCodable] });
    const docs = builder.buildSchemas();
    const leash = find(docs, "Leash");
    expect([...leash.definitions.keys()]).toEqual([]);
    expect(toHost(toJsonSchema(leash))).toEqual({
      $id: "https://example.org/schemas/pets/Leash.json",
      $schema: JSON_SCHEMA_DRAFT_07,
      type: "object",
      title: "Leash",
      properties: {
        length: { type: "number" },
        extension: { $ref: "Leash.json" },
      },
      required: ["length"],
    });
  });
});

describe("SchemaBuilder output stability", () => {
  const render = (docs: SchemaDocument[]): string[] =>
    docs.map((d) => stringifyJson(toJsonSchema(d)));

  it("builds identical documents from the same registries", () => {
    const build = () =>
      new SchemaBuilder(petContext(), {
        module: "pets",
        roots: [OwnerCodable, CollarCodable],
      }).buildSchemas();
    expect(render(build())).toEqual(render(build()));
  });

  it("sorts definitions independently of registration order", () => {
    const reversed = new SerializationContext([
      new TypeRegistry(PetInterface).registerAll([catEntry, dogEntry]).register(parrotEntry),
    ]);
    const docs = new SchemaBuilder(reversed, { module: "pets" }).buildSchemas();
    expect([...find(docs, "Pet").definitions.keys()]).toEqual(["Cat", "Dog", "PetType"]);
  });
});

describe("SchemaBuilder for a module extending another", () => {
  const docs = new SchemaBuilder(petContext(), { module: "birds" }).buildSchemas();

  it("publishes a foreign implementation as its own document", () => {
    expect(docs.map((d) => d.id.className)).toEqual(["Parrot"]);
    expect(toHost(toJsonSchema(find(docs, "Parrot")))).toEqual({
      $id: "https://example.org/schemas/birds/Parrot.json",
      $schema: JSON_SCHEMA_DRAFT_07,
      type: "object",
      title: "Parrot",
      properties: {
        words: { type: "integer" },
        type: { const: "parrot", $ref: "https://example.org/schemas/pets/Pet.json#PetType" },
      },
      required: ["words", "type"],
      allOf: [{ $ref: "https://example.org/schemas/pets/Pet.json" }],
    });
  });
});

describe("SchemaBuilder errors", () => {
  it("fails when a member names an interface with no registry", () => {
    const builder = new SchemaBuilder(new SerializationContext(), {
      module: "pets",
      roots: [OwnerCodable],
    });
    expect(() => builder.buildSchemas()).toThrow(SchemaBuildError);
    expect(() => builder.buildSchemas()).toThrow(
      'Pet: member "pets" references an interface with no registered types'
    );
  });

  it("falls back to relative references without base URLs", () => {
    const docs = new SchemaBuilder(new SerializationContext([createPetRegistry()]), {
      module: "pets",
    }).buildSchemas();
    expect(find(docs, "Pet").url).toBe("Pet.json");
  });
});
