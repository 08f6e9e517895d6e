import { defineType, typeMetadata, type Codable } from "@polycodec/codec";
import {
  readResultFields,
  resultDataMetadata,
  secondsAfter,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

/** Plain result of a step that records nothing but its timing. */
export interface ResultObject extends ResultData {
  readonly type: "base";
}

export function createResult(
  identifier: string,
  startDate: Date = new Date(),
  endDate?: Date
): ResultObject {
  return { type: "base", identifier, startDate, endDate };
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

export const ResultObjectCodable: Codable<ResultObject> = {
  metadata: typeMetadata<ResultObject>("ResultObject", RESULTS_MODULE)
    .inherit(resultDataMetadata)
    .examples(() => [createResult("step1", exampleStart, secondsAfter(exampleStart, 5 * 60))])
    .build(),
  decode: (reader) => ({ type: "base", ...readResultFields(reader) }),
  encode: (value, writer) => {
    writeResultFields(writer, value);
  },
};

export const resultObjectEntry = defineType<ResultData, ResultObject>({
  discriminator: "base",
  example: createResult("step1", exampleStart),
  is: (value): value is ResultObject => value.type === "base",
  codable: ResultObjectCodable,
});
