import { describe, expect, it } from "vitest";
import {
  MetadataValidationError,
  fieldDescriptors,
  sameShape,
  shapes,
  typeMetadata,
  validateTypeMetadata,
  type TypeMetadata,
} from "../index.js";
import { AddressCodable, DogCodable, TreeNodeCodable, petMetadata } from "./fixtures.js";

describe("fieldDescriptors", () => {
  it("spaces levels a thousand ordinals apart", () => {
    const descriptors = fieldDescriptors(DogCodable.metadata ?? petMetadata);
    expect(descriptors.map((d) => [d.wireKey, d.ordinal])).toEqual([
      ["name", 0],
      ["breed", 1000],
      ["tags", 1001],
    ]);
  });

  it("lets a derived level redeclare a base key", () => {
    const metadata = typeMetadata("Named", "pets")
      .inherit(petMetadata)
      .level(1)
      .field("nickname", shapes.string)
      .field("name", shapes.string, { description: "Display name." })
      .build();
    const name = fieldDescriptors(metadata).find((d) => d.wireKey === "name");
    expect(name?.ordinal).toBe(1001);
    expect(name?.description).toBe("Display name.");
    expect(name?.isRequired).toBe(false);
  });

  it("maps field names to wire keys", () => {
    const metadata = typeMetadata("Keyed", "pets")
      .field("schemaUrl", shapes.uri, { wireKey: "$schema" })
      .build();
    expect(fieldDescriptors(metadata)[0]).toMatchObject({
      name: "schemaUrl",
      wireKey: "$schema",
      ordinal: 0,
    });
  });

  it("marks polymorphic fields", () => {
    const metadata = typeMetadata("Kennel", "pets")
      .field("pets", shapes.array(shapes.polymorphic("Pet")))
      .field("owner", shapes.string)
      .build();
    expect(fieldDescriptors(metadata).map((d) => d.isPolymorphic)).toEqual([true, false]);
  });
});

describe("TypeMetadataBuilder", () => {
  it("starts at level 0 when no level is given", () => {
    expect(AddressCodable.metadata?.levels.map((l) => l.relativeIndex)).toEqual([0]);
  });

  it("continues after inherited levels", () => {
    const metadata = typeMetadata("Puppy", "pets")
      .inherit(petMetadata)
      .field("age", shapes.integer)
      .build();
    expect(metadata.levels.map((l) => l.relativeIndex)).toEqual([0, 1]);
  });

  it("records root, closed and description flags", () => {
    const metadata = typeMetadata("Sealed", "pets").root().closed().describe("Sealed box.").build();
    expect(metadata.isRoot).toBe(true);
    expect(metadata.additionalProperties).toBe(false);
    expect(metadata.description).toBe("Sealed box.");
  });

  it("throws on inconsistent levels", () => {
    const build = (): TypeMetadata<unknown> =>
      typeMetadata("Broken", "pets")
        .level(0)
        .field("a", shapes.string)
        .level(0)
        .field("b", shapes.string)
        .build();
    expect(build).toThrow(MetadataValidationError);
    expect(build).toThrow(
      'Metadata "Broken" validation failed:\n  level 0: declared more than once, ordinals would collide'
    );
  });
});

describe("validateTypeMetadata", () => {
  it("reports duplicate keys and misplaced constants", () => {
    const issues = validateTypeMetadata({
      className: "",
      module: "pets",
      levels: [
        {
          relativeIndex: -1,
          fields: [
            { name: "a", shape: shapes.string },
            { name: "b", wireKey: "a", shape: shapes.integer, constValue: "x" },
          ],
        },
      ],
    });
    expect(issues).toEqual([
      { field: "<type>", message: "class name must not be empty" },
      { field: "level -1", message: "relative index must be a non-negative integer" },
      { field: "a", message: "duplicate key in level -1" },
      { field: "a", message: "only string fields may carry a constant" },
    ]);
  });
});

describe("sameShape", () => {
  it("compares nested shapes structurally", () => {
    expect(sameShape(shapes.array(shapes.string), shapes.array(shapes.string))).toBe(true);
    expect(sameShape(shapes.array(shapes.string), shapes.array(shapes.integer))).toBe(false);
    expect(sameShape(shapes.dateTime, shapes.date)).toBe(false);
  });

  it("compares references by class name", () => {
    const tree = shapes.reference(() => TreeNodeCodable);
    expect(sameShape(tree, shapes.reference(() => TreeNodeCodable))).toBe(true);
    expect(sameShape(tree, shapes.reference(() => AddressCodable))).toBe(false);
  });
});
