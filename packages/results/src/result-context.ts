import {
  SchemaBuilder,
  SerializationContext,
  TypeRegistry,
  createLogger,
  resolveConfig,
  type CodecConfig,
  type CodecConfigInput,
  type Logger,
  type SchemaDocument,
  type TypeRegistryEntry,
  type TypeRegistryOptions,
} from "@polycodec/codec";
import { answerResultEntry } from "./answer-result.js";
import { createAnswerTypeRegistry, type AnswerType } from "./answer-type.js";
import { assessmentResultEntry } from "./assessment-result.js";
import { branchNodeResultEntry } from "./branch-node-result.js";
import { collectionResultEntry } from "./collection-result.js";
import { errorResultEntry } from "./error-result.js";
import { fileResultEntry } from "./file-result.js";
import { ResultDataInterface, type ResultData } from "./result-data.js";
import { resultObjectEntry } from "./result-object.js";
import { RESULTS_MODULE } from "./result-type.js";

export const standardResultEntries: ReadonlyArray<TypeRegistryEntry<ResultData>> = [
  answerResultEntry,
  assessmentResultEntry,
  resultObjectEntry,
  collectionResultEntry,
  errorResultEntry,
  fileResultEntry,
  branchNodeResultEntry,
];

export function createResultRegistry(options?: TypeRegistryOptions): TypeRegistry<ResultData> {
  return new TypeRegistry(ResultDataInterface, options).registerAll(standardResultEntries);
}

export interface ResultContextOptions {
  config?: CodecConfig | CodecConfigInput;
  logger?: Logger;
  /**
   * Result types registered after the standard ones. A repeated discriminator
   * replaces the standard type.
   */
  results?: Iterable<TypeRegistryEntry<ResultData>>;
  answerTypes?: Iterable<TypeRegistryEntry<AnswerType>>;
}

/** A context that codes ResultData and AnswerType values. */
export function createResultContext(options: ResultContextOptions = {}): SerializationContext {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createLogger({ verbose: config.debug });
  const results = createResultRegistry({ logger }).registerAll(options.results ?? []);
  const answers = createAnswerTypeRegistry({ logger }).registerAll(options.answerTypes ?? []);
  return new SerializationContext([results, answers], { config, logger });
}

/** JSON Schema documents for the result types registered with a context. */
export function buildResultSchemas(
  context: SerializationContext,
  baseUrls?: Readonly<Record<string, string>>
): SchemaDocument[] {
  const builder = new SchemaBuilder(context, {
    module: RESULTS_MODULE,
    baseUrls,
    logger: context.logger,
  });
  return builder.buildSchemas();
}
