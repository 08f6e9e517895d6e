import {
  defineType,
  discriminatorSet,
  shapes,
  typeMetadata,
  TypeRegistry,
  type Codable,
  type InterfaceDefinition,
  type JsonValue,
  type TypeRegistryOptions,
} from "../index.js";

export const petTypes = discriminatorSet("Pet", ["dog", "cat"]);

export interface Pet {
  readonly type: string;
  readonly name: string;
}

export interface Dog extends Pet {
  readonly type: "dog";
  readonly breed?: string;
  readonly tags: string[];
}

export interface Cat extends Pet {
  readonly type: "cat";
  readonly lives: number;
  readonly birthday?: Date;
}

export interface Parrot extends Pet {
  readonly type: "parrot";
  readonly words: number;
}

export const petMetadata = typeMetadata<Pet>("Pet", "pets")
  .level(0)
  .field("name", shapes.string, { required: true })
  .build();

export const PetInterface: InterfaceDefinition<Pet> = {
  interfaceName: "Pet",
  module: "pets",
  standardDiscriminators: petTypes.standard,
  description: "An animal kept at home.",
  metadata: petMetadata,
  is: (value): value is Pet =>
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    "name" in value &&
    typeof value.name === "string",
  discriminatorOf: (value) => value.type,
};

export const rex: Dog = { type: "dog", name: "Rex", tags: ["good"] };

export const DogCodable: Codable<Dog> = {
  metadata: typeMetadata<Dog>("Dog", "pets")
    .inherit(petMetadata)
    .level(1)
    .field("breed", shapes.string)
    .field("tags", shapes.array(shapes.string), { required: true })
    .examples(() => [rex])
    .build(),
  decode: (reader) => ({
    type: "dog",
    name: reader.string("name"),
    breed: reader.optionalString("breed"),
    tags: reader.stringArray("tags"),
  }),
  encode: (value, writer) => {
    writer.string("name", value.name).string("breed", value.breed).stringArray("tags", value.tags);
  },
};

export const tom: Cat = { type: "cat", name: "Tom", lives: 9 };

export const CatCodable: Codable<Cat> = {
  metadata: typeMetadata<Cat>("Cat", "pets")
    .inherit(petMetadata)
    .level(1)
    .field("lives", shapes.integer, { required: true })
    .field("birthday", shapes.dateTime)
    .examples(() => [tom])
    .build(),
  decode: (reader) => ({
    type: "cat",
    name: reader.string("name"),
    lives: reader.integer("lives"),
    birthday: reader.optionalDate("birthday"),
  }),
  encode: (value, writer) => {
    writer
      .string("name", value.name)
      .integer("lives", value.lives)
      .date("birthday", value.birthday);
  },
};

export const ParrotCodable: Codable<Parrot> = {
  metadata: typeMetadata<Parrot>("Parrot", "birds")
    .inherit(petMetadata)
    .level(1)
    .field("words", shapes.integer, { required: true })
    .build(),
  decode: (reader) => ({
    type: "parrot",
    name: reader.string("name"),
    words: reader.integer("words"),
  }),
  encode: (value, writer) => {
    writer.string("name", value.name).integer("words", value.words);
  },
};

export const dogEntry = defineType<Pet, Dog>({
  discriminator: "dog",
  example: rex,
  is: (value): value is Dog => value.type === "dog",
  codable: DogCodable,
});

export const catEntry = defineType<Pet, Cat>({
  discriminator: "cat",
  example: tom,
  is: (value): value is Cat => value.type === "cat",
  codable: CatCodable,
});

export const parrotEntry = defineType<Pet, Parrot>({
  discriminator: "parrot",
  example: { type: "parrot", name: "Polly", words: 12 },
  is: (value): value is Parrot => value.type === "parrot",
  codable: ParrotCodable,
});

export function createPetRegistry(options?: TypeRegistryOptions): TypeRegistry<Pet> {
  return new TypeRegistry(PetInterface, options).registerAll([dogEntry, catEntry]);
}

// ----------------------------------------------------------------------------
// Non-polymorphic types
// ----------------------------------------------------------------------------

export interface Address {
  readonly street: string;
}

export const AddressCodable: Codable<Address> = {
  metadata: typeMetadata<Address>("Address", "pets")
    .field("street", shapes.string, { required: true })
    .build(),
  decode: (reader) => ({ street: reader.string("street") }),
  encode: (value, writer) => {
    writer.string("street", value.street);
  },
};

export interface TreeNode {
  readonly label: string;
  readonly children?: TreeNode[];
}

export const TreeNodeCodable: Codable<TreeNode> = {
  metadata: typeMetadata<TreeNode>("TreeNode", "pets")
    .field("label", shapes.string, { required: true })
    .field("children", shapes.array(shapes.reference(() => TreeNodeCodable)))
    .build(),
  decode: (reader) => ({
    label: reader.string("label"),
    children: reader.optionalObjectArray("children", TreeNodeCodable),
  }),
  encode: (value, writer) => {
    writer.string("label", value.label).objectArray("children", TreeNodeCodable, value.children);
  },
};

export interface Owner {
  readonly name: string;
  readonly pets: Pet[];
  readonly home?: Address;
  readonly tree?: TreeNode;
  readonly notes?: JsonValue;
}

export const OwnerCodable: Codable<Owner> = {
  metadata: typeMetadata<Owner>("Owner", "pets")
    .root()
    .describe("A person and their pets.")
    .field("name", shapes.string, { required: true })
    .field("pets", shapes.array(shapes.polymorphic("Pet")), { required: true })
    .field("home", shapes.reference(() => AddressCodable))
    .field("tree", shapes.reference(() => TreeNodeCodable))
    .field("notes", shapes.any)
    .build(),
  decode: (reader) => ({
    name: reader.string("name"),
    pets: reader.polymorphicArray("pets", PetInterface),
    home: reader.optionalObject("home", AddressCodable),
    tree: reader.optionalObject("tree", TreeNodeCodable),
    notes: reader.optionalValue("notes"),
  }),
  encode: (value, writer) => {
    writer
      .string("name", value.name)
      .polymorphicArray("pets", PetInterface, value.pets)
      .object("home", AddressCodable, value.home)
      .object("tree", TreeNodeCodable, value.tree)
      .value("notes", value.notes);
  },
};
