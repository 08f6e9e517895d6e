import { discriminatorSet, type OpenDiscriminator } from "@polycodec/codec";

/** Module that owns the result interfaces and their standard types. */
export const RESULTS_MODULE = "results";

export type StandardResultType =
  | "answer"
  | "assessment"
  | "base"
  | "collection"
  | "error"
  | "file"
  | "section";

export const resultTypes = discriminatorSet<StandardResultType>("ResultData", [
  "answer",
  "assessment",
  "base",
  "collection",
  "error",
  "file",
  "section",
]);

/** Discriminator of a ResultData. Modules may add their own values. */
export type ResultType = OpenDiscriminator<StandardResultType>;

export type StandardAnswerTypeName =
  | "object"
  | "array"
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "date-time"
  | "measurement";

export const answerTypes = discriminatorSet<StandardAnswerTypeName>("AnswerType", [
  "object",
  "array",
  "string",
  "integer",
  "number",
  "boolean",
  "date-time",
  "measurement",
]);

export type AnswerTypeName = OpenDiscriminator<StandardAnswerTypeName>;
