import { defineType, shapes, typeMetadata, type Codable } from "@polycodec/codec";
import { exampleAnswers, isAnswerResult, type AnswerResult } from "./answer-result.js";
import {
  ResultDataInterface,
  readResultFields,
  resultDataMetadata,
  secondsAfter,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

/** A set of results recorded by one step, such as the answers on a form. */
export interface CollectionResult extends ResultData {
  readonly type: "collection";
  readonly children: ReadonlyArray<ResultData>;
}

export function createCollectionResult(
  identifier: string,
  children: ReadonlyArray<ResultData> = []
): CollectionResult {
  return { type: "collection", identifier, startDate: new Date(), children };
}

/** The last answer among the children with this identifier. */
export function findAnswer(
  collection: CollectionResult,
  identifier: string
): AnswerResult | undefined {
  for (let i = collection.children.length - 1; i >= 0; i--) {
    const child = collection.children[i];
    if (child !== undefined && child.identifier === identifier && isAnswerResult(child)) {
      return child;
    }
  }
  return undefined;
}

/**
 * Add a child, replacing any child with the same identifier in place.
 * Returns the new collection and the replaced child.
 */
export function insertChild(
  collection: CollectionResult,
  child: ResultData
): { collection: CollectionResult; previous?: ResultData } {
  const index = collection.children.findIndex((c) => c.identifier === child.identifier);
  if (index < 0) {
    return { collection: { ...collection, children: [...collection.children, child] } };
  }
  const children = [...collection.children];
  const [previous] = children.splice(index, 1, child);
  return { collection: { ...collection, children }, previous };
}

export function removeChild(
  collection: CollectionResult,
  identifier: string
): { collection: CollectionResult; removed?: ResultData } {
  const index = collection.children.findIndex((c) => c.identifier === identifier);
  if (index < 0) return { collection };
  const children = [...collection.children];
  const [removed] = children.splice(index, 1);
  return { collection: { ...collection, children }, removed };
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

export const CollectionResultCodable: Codable<CollectionResult> = {
  metadata: typeMetadata<CollectionResult>("CollectionResult", RESULTS_MODULE)
    .inherit(resultDataMetadata)
    .level(1)
    .field("children", shapes.array(shapes.polymorphic("ResultData")), {
      required: true,
      description: "The list of input results associated with this step.",
    })
    .examples(() => [
      {
        type: "collection",
        identifier: "answers",
        startDate: exampleStart,
        endDate: secondsAfter(exampleStart, 2 * 60),
        children: exampleAnswers,
      },
    ])
    .build(),
  decode: (reader) => ({
    type: "collection",
    ...readResultFields(reader),
    children: reader.polymorphicArray("children", ResultDataInterface),
  }),
  encode: (value, writer) => {
    writeResultFields(writer, value).polymorphicArray(
      "children",
      ResultDataInterface,
      value.children
    );
  },
};

export const collectionResultEntry = defineType<ResultData, CollectionResult>({
  discriminator: "collection",
  example: { type: "collection", identifier: "answers", startDate: exampleStart, children: [] },
  is: (value): value is CollectionResult => value.type === "collection",
  codable: CollectionResultCodable,
});
