import {
  defineType,
  jsonArray,
  jsonBoolean,
  jsonInteger,
  jsonNumber,
  jsonString,
  shapes,
  typeMetadata,
  type Codable,
  type JsonValue,
} from "@polycodec/codec";
import {
  AnswerTypeInterface,
  decodeAnswerValue,
  encodeAnswerValue,
  type AnswerType,
} from "./answer-type.js";
import {
  readResultFields,
  resultDataMetadata,
  secondsAfter,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

/** The answer to a single question, coded by its answer type. */
export interface AnswerResult extends ResultData {
  readonly type: "answer";
  readonly answerType?: AnswerType;
  readonly value?: JsonValue;
  readonly questionText?: string;
}

export function isAnswerResult(value: ResultData): value is AnswerResult {
  return value.type === "answer";
}

export function createAnswerResult(
  identifier: string,
  answerType?: AnswerType,
  value?: JsonValue,
  questionText?: string
): AnswerResult {
  return { type: "answer", identifier, startDate: new Date(), answerType, value, questionText };
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

function exampleAnswer(
  identifier: string,
  answerType: AnswerType,
  value: JsonValue,
  questionText?: string
): AnswerResult {
  return {
    type: "answer",
    identifier,
    startDate: exampleStart,
    endDate: secondsAfter(exampleStart, 60),
    answerType,
    value,
    questionText,
  };
}

export const exampleAnswers: ReadonlyArray<AnswerResult> = [
  exampleAnswer("age", { type: "integer" }, jsonInteger(42), "How old are you?"),
  exampleAnswer("height", { type: "measurement", unit: "cm" }, jsonNumber(170.5)),
  exampleAnswer(
    "favorites",
    { type: "array", baseType: "integer", sequenceSeparator: "," },
    jsonArray([jsonInteger(1), jsonInteger(5)])
  ),
  exampleAnswer("smoker", { type: "boolean" }, jsonBoolean(false), "Do you smoke?"),
];

export const AnswerResultCodable: Codable<AnswerResult> = {
  metadata: typeMetadata<AnswerResult>("AnswerResult", RESULTS_MODULE)
    .inherit(resultDataMetadata)
    .level(1)
    .field("answerType", shapes.polymorphic("AnswerType"), {
      description: "The answer type of the value.",
    })
    .field("value", shapes.any, { description: "The answer value." })
    .field("questionText", shapes.string, {
      description: "The question text shown to the participant.",
    })
    .examples(() => exampleAnswers)
    .build(),
  decode: (reader) => {
    const answerType = reader.optionalPolymorphic("answerType", AnswerTypeInterface);
    const raw = reader.optionalValue("value");
    const value =
      raw === undefined || answerType === undefined
        ? raw
        : decodeAnswerValue(answerType, raw, reader.pathOf("value"), reader.context.locale);
    return {
      type: "answer",
      ...readResultFields(reader),
      answerType,
      value,
      questionText: reader.optionalString("questionText"),
    };
  },
  encode: (value, writer) => {
    const answer =
      value.value === undefined || value.answerType === undefined
        ? value.value
        : encodeAnswerValue(value.answerType, value.value);
    writeResultFields(writer, value)
      .polymorphic("answerType", AnswerTypeInterface, value.answerType)
      .value("value", answer)
      .string("questionText", value.questionText);
  },
};

export const answerResultEntry = defineType<ResultData, AnswerResult>({
  discriminator: "answer",
  example: exampleAnswer("question", { type: "string" }, jsonString("yes")),
  is: isAnswerResult,
  codable: AnswerResultCodable,
});
