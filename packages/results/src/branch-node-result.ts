import {
  defineType,
  shapes,
  typeMetadata,
  type Codable,
  type ObjectReader,
  type ObjectWriter,
} from "@polycodec/codec";
import {
  ResultDataInterface,
  readResultFields,
  resultDataMetadata,
  secondsAfter,
  writeResultFields,
  type ResultData,
} from "./result-data.js";
import { RESULTS_MODULE } from "./result-type.js";

export type PathMarkerDirection = "forward" | "backward" | "exit";

export const PATH_MARKER_DIRECTIONS: ReadonlyArray<PathMarkerDirection> = [
  "forward",
  "backward",
  "exit",
];

/** One step of the navigation path through a branch node. */
export interface PathMarker {
  readonly identifier: string;
  readonly direction: PathMarkerDirection;
}

export const PathMarkerCodable: Codable<PathMarker> = {
  metadata: typeMetadata<PathMarker>("PathMarker", RESULTS_MODULE)
    .describe("A marker for a navigation step through a branch node.")
    .field("identifier", shapes.string, {
      required: true,
      description: "The identifier of the node that was navigated to.",
    })
    .field("direction", shapes.stringEnum("PathMarkerDirection", PATH_MARKER_DIRECTIONS), {
      required: true,
      description: "The direction of navigation.",
    })
    .build(),
  decode: (reader) => ({
    identifier: reader.string("identifier"),
    direction: reader.enum("direction", PATH_MARKER_DIRECTIONS),
  }),
  encode: (value, writer) => {
    writer.string("identifier", value.identifier).string("direction", value.direction);
  },
};

/** Members shared by every result that records a walk through child nodes. */
export interface BranchNodeFields {
  /** Results of the child steps, in the order they finished. */
  readonly stepHistory: ReadonlyArray<ResultData>;
  /** Results of asynchronous actions, such as recorders. */
  readonly asyncResults?: ReadonlyArray<ResultData>;
  /** Navigation steps, including backward moves and exits. */
  readonly path: ReadonlyArray<PathMarker>;
}

/** Result of a section of an assessment. */
export interface BranchNodeResult extends ResultData, BranchNodeFields {
  readonly type: "section";
}

export const branchNodeMetadata = typeMetadata<BranchNodeResult>("BranchNodeResult", RESULTS_MODULE)
  .inherit(resultDataMetadata)
  .level(1)
  .field("stepHistory", shapes.array(shapes.polymorphic("ResultData")), {
    required: true,
    description: "The list of result objects for the nodes that were visited.",
  })
  .field("asyncResults", shapes.array(shapes.polymorphic("ResultData")), {
    description: "The list of results of asynchronous actions.",
  })
  .field("path", shapes.array(shapes.reference(() => PathMarkerCodable)), {
    description: "The navigation path through the branch.",
  })
  .build();

export function readBranchNodeFields(reader: ObjectReader): BranchNodeFields {
  return {
    stepHistory: reader.polymorphicArray("stepHistory", ResultDataInterface),
    asyncResults: reader.optionalPolymorphicArray("asyncResults", ResultDataInterface),
    path: reader.optionalObjectArray("path", PathMarkerCodable) ?? [],
  };
}

export function writeBranchNodeFields(writer: ObjectWriter, value: BranchNodeFields): ObjectWriter {
  return writer
    .polymorphicArray("stepHistory", ResultDataInterface, value.stepHistory)
    .polymorphicArray("asyncResults", ResultDataInterface, value.asyncResults)
    .objectArray("path", PathMarkerCodable, value.path);
}

/** Append a child result and a forward path marker. */
export function appendStep<T extends BranchNodeFields>(node: T, result: ResultData): T {
  return {
    ...node,
    stepHistory: [...node.stepHistory, result],
    path: [...node.path, { identifier: result.identifier, direction: "forward" }],
  };
}

/** The last result in the step history with this identifier. */
export function findStep(node: BranchNodeFields, identifier: string): ResultData | undefined {
  for (let i = node.stepHistory.length - 1; i >= 0; i--) {
    const step = node.stepHistory[i];
    if (step !== undefined && step.identifier === identifier) return step;
  }
  return undefined;
}

const exampleStart = new Date("2017-10-17T05:28:09.000Z");

export function exampleSection(identifier: string, start: Date = exampleStart): BranchNodeResult {
  const intro: ResultData = {
    type: "base",
    identifier: "intro",
    startDate: start,
    endDate: secondsAfter(start, 20),
  };
  const outro: ResultData = {
    type: "base",
    identifier: "outro",
    startDate: secondsAfter(start, 20),
    endDate: secondsAfter(start, 40),
  };
  return {
    type: "section",
    identifier,
    startDate: start,
    endDate: secondsAfter(start, 40),
    stepHistory: [intro, outro],
    path: [
      { identifier: "intro", direction: "forward" },
      { identifier: "outro", direction: "forward" },
    ],
  };
}

export const BranchNodeResultCodable: Codable<BranchNodeResult> = {
  metadata: typeMetadata<BranchNodeResult>("BranchNodeResult", RESULTS_MODULE)
    .inherit(branchNodeMetadata)
    .examples(() => [exampleSection("section1")])
    .build(),
  decode: (reader) => ({
    type: "section",
    ...readResultFields(reader),
    ...readBranchNodeFields(reader),
  }),
  encode: (value, writer) => {
    writeBranchNodeFields(writeResultFields(writer, value), value);
  },
};

export const branchNodeResultEntry = defineType<ResultData, BranchNodeResult>({
  discriminator: "section",
  example: {
    type: "section",
    identifier: "section",
    startDate: exampleStart,
    stepHistory: [],
    path: [],
  },
  is: (value): value is BranchNodeResult => value.type === "section",
  codable: BranchNodeResultCodable,
});
