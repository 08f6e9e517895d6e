import {
  shapes,
  typeMetadata,
  type InterfaceDefinition,
  type ObjectReader,
  type ObjectWriter,
} from "@polycodec/codec";
import { RESULTS_MODULE, resultTypes, type ResultType } from "./result-type.js";

/** Base interface of every result recorded for a task, step or async action. */
export interface ResultData {
  readonly type: ResultType;
  /** Identifier of the task, step or asynchronous action. */
  readonly identifier: string;
  readonly startDate: Date;
  readonly endDate?: Date;
}

/** The members every result shares. */
export type ResultFields = Pick<ResultData, "identifier" | "startDate" | "endDate">;

export const resultDataMetadata = typeMetadata<ResultData>("ResultData", RESULTS_MODULE)
  .level(0)
  .field("identifier", shapes.string, {
    required: true,
    description: "The identifier for the result.",
  })
  .field("startDate", shapes.dateTime, {
    required: true,
    description: "The start date timestamp for the result.",
  })
  .field("endDate", shapes.dateTime, {
    description: "The end date timestamp for the result.",
  })
  .build();

export function isResultData(value: unknown): value is ResultData {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    "identifier" in value &&
    typeof value.identifier === "string" &&
    "startDate" in value &&
    value.startDate instanceof Date
  );
}

export const ResultDataInterface: InterfaceDefinition<ResultData> = {
  interfaceName: "ResultData",
  module: RESULTS_MODULE,
  standardDiscriminators: resultTypes.standard,
  description:
    "The interface for any result that is serialized through a polymorphic type registry.",
  metadata: resultDataMetadata,
  is: isResultData,
  discriminatorOf: (value) => value.type,
};

export function readResultFields(reader: ObjectReader): ResultFields {
  return {
    identifier: reader.string("identifier"),
    startDate: reader.date("startDate"),
    endDate: reader.optionalDate("endDate"),
  };
}

export function writeResultFields(writer: ObjectWriter, value: ResultData): ObjectWriter {
  return writer
    .string("identifier", value.identifier)
    .date("startDate", value.startDate)
    .date("endDate", value.endDate);
}

/** `startDate` plus a number of seconds. */
export function secondsAfter(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}
