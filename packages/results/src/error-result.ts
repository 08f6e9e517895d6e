import { defineType, shapes, typeMetadata, type Codable } from "@polycodec/codec";
import {
  readResultFields,
  resultDataMetadata,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

/** Records a step that failed. */
export interface ErrorResult extends ResultData {
  readonly type: "error";
  readonly errorDescription: string;
  readonly errorDomain: string;
  readonly errorCode: number;
}

/** Record a caught error. Errors without a numeric `code` get code 0. */
export function errorResultFrom(
  identifier: string,
  error: unknown,
  startDate = new Date()
): ErrorResult {
  const base = { type: "error", identifier, startDate, endDate: startDate } as const;
  if (!(error instanceof Error)) {
    return { ...base, errorDescription: String(error), errorDomain: "Error", errorCode: 0 };
  }
  return {
    ...base,
    errorDescription: error.message,
    errorDomain: error.name,
    errorCode: "code" in error && typeof error.code === "number" ? error.code : 0,
  };
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

export const ErrorResultCodable: Codable<ErrorResult> = {
  metadata: typeMetadata<ErrorResult>("ErrorResult", RESULTS_MODULE)
    .inherit(resultDataMetadata)
    .level(1)
    .field("errorDescription", shapes.string, {
      required: true,
      description: "A description associated with the error.",
    })
    .field("errorDomain", shapes.string, {
      required: true,
      description: "The domain of the error.",
    })
    .field("errorCode", shapes.integer, { required: true, description: "The error code." })
    .examples(() => [
      {
        type: "error",
        identifier: "errorResult",
        startDate: exampleStart,
        endDate: exampleStart,
        errorDescription: "example error",
        errorDomain: "ExampleDomain",
        errorCode: 1,
      },
    ])
    .build(),
  decode: (reader) => ({
    type: "error",
    ...readResultFields(reader),
    errorDescription: reader.string("errorDescription"),
    errorDomain: reader.string("errorDomain"),
    errorCode: reader.integer("errorCode"),
  }),
  encode: (value, writer) => {
    writeResultFields(writer, value)
      .string("errorDescription", value.errorDescription)
      .string("errorDomain", value.errorDomain)
      .integer("errorCode", value.errorCode);
  },
};

export const errorResultEntry = defineType<ResultData, ErrorResult>({
  discriminator: "error",
  example: errorResultFrom("error", new Error("failed"), exampleStart),
  is: (value): value is ErrorResult => value.type === "error",
  codable: ErrorResultCodable,
});
