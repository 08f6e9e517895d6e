import { defineType, shapes, typeMetadata, type Codable } from "@polycodec/codec";
import {
  readResultFields,
  resultDataMetadata,
  secondsAfter,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

/** A result whose data was written to a file beside the archive. */
export interface FileResult extends ResultData {
  readonly type: "file";
  /** Path of the file, relative to the archive that holds the results. */
  readonly relativePath: string;
  /** MIME type of the file. */
  readonly contentType?: string;
  /** System uptime, in seconds, when the file was started. */
  readonly startUptime?: number;
  /** URL of the JSON Schema for a JSON file. */
  readonly jsonSchema?: string;
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

export const exampleFileResult: FileResult = {
  type: "file",
  identifier: "motion",
  startDate: exampleStart,
  endDate: secondsAfter(exampleStart, 30),
  relativePath: "motion.json",
  contentType: "application/json",
  startUptime: 1234.567,
  jsonSchema: "https://example.org/schemas/motion.json",
};

export const FileResultCodable: Codable<FileResult> = {
  metadata: typeMetadata<FileResult>("FileResult", RESULTS_MODULE)
    .inherit(resultDataMetadata)
    .level(1)
    .field("relativePath", shapes.uriRelative, {
      required: true,
      description: "The relative path to the file-based result.",
    })
    .field("contentType", shapes.string, { description: "The MIME content type of the result." })
    .field("startUptime", shapes.number, {
      description: "The system clock uptime when the recorder was started.",
    })
    .field("jsonSchema", shapes.uri, {
      description: "The URL for the JSON schema that defines the format of the file.",
    })
    .examples(() => [exampleFileResult])
    .build(),
  decode: (reader) => ({
    type: "file",
    ...readResultFields(reader),
    relativePath: reader.string("relativePath"),
    contentType: reader.optionalString("contentType"),
    startUptime: reader.optionalNumber("startUptime"),
    jsonSchema: reader.optionalString("jsonSchema"),
  }),
  encode: (value, writer) => {
    writeResultFields(writer, value)
      .string("relativePath", value.relativePath)
      .string("contentType", value.contentType)
      .number("startUptime", value.startUptime)
      .string("jsonSchema", value.jsonSchema);
  },
};

export const fileResultEntry = defineType<ResultData, FileResult>({
  discriminator: "file",
  example: { type: "file", identifier: "file", startDate: exampleStart, relativePath: "file.json" },
  is: (value): value is FileResult => value.type === "file",
  codable: FileResultCodable,
});
