import { randomUUID } from "node:crypto";
import { defineType, shapes, typeMetadata, type Codable } from "@polycodec/codec";
import {
  branchNodeMetadata,
  exampleSection,
  readBranchNodeFields,
  writeBranchNodeFields,
  type BranchNodeFields,
} from "./branch-node-result.js";
import { exampleAnswers } from "./answer-result.js";
import type { CollectionResult } from "./collection-result.js";
import { exampleFileResult } from "./file-result.js";
import {
  readResultFields,
  secondsAfter,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

/** The top-level result of running an assessment. */
export interface AssessmentResult extends ResultData, BranchNodeFields {
  readonly type: "assessment";
  /** Identifier of the assessment this run belongs to, when it differs from `identifier`. */
  readonly assessmentIdentifier?: string;
  readonly versionString?: string;
  /** Identifier of the schema that describes how the run was configured. */
  readonly schemaIdentifier?: string;
  /** Unique identifier of this run. */
  readonly taskRunUUID: string;
  /** URL of the JSON Schema for this result, written as `$schema`. */
  readonly jsonSchema?: string;
}

export interface AssessmentResultOptions {
  readonly assessmentIdentifier?: string;
  readonly versionString?: string;
  readonly schemaIdentifier?: string;
  readonly taskRunUUID?: string;
  readonly startDate?: Date;
}

export function createAssessmentResult(
  identifier: string,
  options: AssessmentResultOptions = {}
): AssessmentResult {
  return {
    type: "assessment",
    identifier,
    startDate: options.startDate ?? new Date(),
    stepHistory: [],
    path: [],
    assessmentIdentifier: options.assessmentIdentifier,
    versionString: options.versionString,
    schemaIdentifier: options.schemaIdentifier,
    taskRunUUID: options.taskRunUUID ?? randomUUID(),
  };
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

export function exampleAssessment(): AssessmentResult {
  const collection: CollectionResult = {
    type: "collection",
    identifier: "answers",
    startDate: secondsAfter(exampleStart, 40),
    endDate: secondsAfter(exampleStart, 160),
    children: exampleAnswers,
  };
  const section = exampleSection("intro", exampleStart);
  return {
    type: "assessment",
    identifier: "example",
    startDate: exampleStart,
    endDate: secondsAfter(exampleStart, 180),
    stepHistory: [section, collection],
    asyncResults: [exampleFileResult],
    path: [
      { identifier: "intro", direction: "forward" },
      { identifier: "answers", direction: "forward" },
    ],
    assessmentIdentifier: "example-assessment",
    versionString: "1.0.2",
    schemaIdentifier: "example-schema",
    taskRunUUID: "00000000-0000-4000-8000-000000000001",
    jsonSchema: "https://example.org/schemas/results/AssessmentResult.json",
  };
}

export const AssessmentResultCodable: Codable<AssessmentResult> = {
  metadata: typeMetadata<AssessmentResult>("AssessmentResult", RESULTS_MODULE)
    .root()
    .describe("A top-level result for this assessment.")
    .inherit(branchNodeMetadata)
    .level(2)
    .field("assessmentIdentifier", shapes.string, {
      description: "The identifier of the assessment, when it differs from the result identifier.",
    })
    .field("versionString", shapes.string, {
      description: "The version of the assessment that was run.",
    })
    .field("schemaIdentifier", shapes.string, {
      description: "The identifier of the schema that configured the assessment.",
    })
    .field("taskRunUUID", shapes.uuid, {
      required: true,
      description: "A unique identifier for this run of the assessment.",
    })
    .field("jsonSchema", shapes.uri, {
      wireKey: "$schema",
      description: "The URL of the JSON schema for this result.",
    })
    .examples(() => [exampleAssessment()])
    .build(),
  decode: (reader) => ({
    type: "assessment",
    ...readResultFields(reader),
    ...readBranchNodeFields(reader),
    assessmentIdentifier: reader.optionalString("assessmentIdentifier"),
    versionString: reader.optionalString("versionString"),
    schemaIdentifier: reader.optionalString("schemaIdentifier"),
    taskRunUUID: reader.string("taskRunUUID"),
    jsonSchema: reader.optionalString("$schema"),
  }),
  encode: (value, writer) => {
    writeBranchNodeFields(writeResultFields(writer, value), value)
      .string("assessmentIdentifier", value.assessmentIdentifier)
      .string("versionString", value.versionString)
      .string("schemaIdentifier", value.schemaIdentifier)
      .string("taskRunUUID", value.taskRunUUID)
      .string("$schema", value.jsonSchema);
  },
};

export const assessmentResultEntry = defineType<ResultData, AssessmentResult>({
  discriminator: "assessment",
  example: createAssessmentResult("assessment", {
    startDate: exampleStart,
    taskRunUUID: "00000000-0000-4000-8000-000000000000",
  }),
  is: (value): value is AssessmentResult => value.type === "assessment",
  codable: AssessmentResultCodable,
});
