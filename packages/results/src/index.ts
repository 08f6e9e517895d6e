/**
 * @polycodec/results: result records for assessments, coded through
 * the `ResultData` and `AnswerType` registries.
 *
 * @packageDocumentation
 */

export {
  RESULTS_MODULE,
  resultTypes,
  answerTypes,
  type ResultType,
  type StandardResultType,
  type AnswerTypeName,
  type StandardAnswerTypeName,
} from "./result-type.js";

export {
  ResultDataInterface,
  resultDataMetadata,
  isResultData,
  readResultFields,
  writeResultFields,
  secondsAfter,
  type ResultData,
  type ResultFields,
} from "./result-data.js";

export {
  ISO8601_TIMESTAMP_FORMAT,
  AnswerTypeInterface,
  answerTypeMetadata,
  isAnswerType,
  AnswerTypeNumberCodable,
  AnswerTypeArrayCodable,
  AnswerTypeDateTimeCodable,
  AnswerTypeMeasurementCodable,
  answerTypeObjectEntry,
  answerTypeStringEntry,
  answerTypeBooleanEntry,
  answerTypeIntegerEntry,
  answerTypeNumberEntry,
  answerTypeArrayEntry,
  answerTypeDateTimeEntry,
  answerTypeMeasurementEntry,
  standardAnswerTypeEntries,
  createAnswerTypeRegistry,
  answerTypeFor,
  decodeAnswerValue,
  encodeAnswerValue,
  type AnswerType,
  type AnswerTypeObject,
  type AnswerTypeString,
  type AnswerTypeBoolean,
  type AnswerTypeInteger,
  type AnswerTypeNumber,
  type AnswerTypeArray,
  type AnswerTypeDateTime,
  type AnswerTypeMeasurement,
} from "./answer-type.js";

export {
  ResultObjectCodable,
  resultObjectEntry,
  createResult,
  type ResultObject,
} from "./result-object.js";

export {
  AnswerResultCodable,
  answerResultEntry,
  createAnswerResult,
  isAnswerResult,
  exampleAnswers,
  type AnswerResult,
} from "./answer-result.js";

export {
  CollectionResultCodable,
  collectionResultEntry,
  createCollectionResult,
  findAnswer,
  insertChild,
  removeChild,
  type CollectionResult,
} from "./collection-result.js";

export {
  FileResultCodable,
  fileResultEntry,
  exampleFileResult,
  type FileResult,
} from "./file-result.js";

export {
  ErrorResultCodable,
  errorResultEntry,
  errorResultFrom,
  type ErrorResult,
} from "./error-result.js";

export {
  PATH_MARKER_DIRECTIONS,
  PathMarkerCodable,
  BranchNodeResultCodable,
  branchNodeMetadata,
  branchNodeResultEntry,
  readBranchNodeFields,
  writeBranchNodeFields,
  appendStep,
  findStep,
  exampleSection,
  type PathMarker,
  type PathMarkerDirection,
  type BranchNodeFields,
  type BranchNodeResult,
} from "./branch-node-result.js";

export {
  AssessmentResultCodable,
  assessmentResultEntry,
  createAssessmentResult,
  exampleAssessment,
  type AssessmentResult,
  type AssessmentResultOptions,
} from "./assessment-result.js";

export {
  standardResultEntries,
  createResultRegistry,
  createResultContext,
  buildResultSchemas,
  type ResultContextOptions,
} from "./result-context.js";
