/**
 * Codec configuration.
 *
 * The core never reads files or the environment; contexts take a resolved
 * `CodecConfig`. See `loadConfig` for the file and environment loader.
 */

import {
  DEFAULT_NON_CONFORMING_FLOATS,
  type NonConformingFloats,
} from "./json-value.js";

export interface SchemaConfig {
  /** Module whose documents `buildSchemas` emits when none is given. */
  module?: string;
  /** Base URL per module, used for `$id` and external `$ref`s. */
  baseUrls: Record<string, string>;
}

export interface CodecConfig {
  /** Write debug diagnostics. */
  debug: boolean;
  /** Member holding the discriminator for interfaces that do not set their own. */
  discriminatorKey: string;
  /** Order members by field metadata when encoding. */
  orderKeys: boolean;
  /** Indentation of emitted text; 0 is compact. */
  indent: number;
  /** Locale used when coercing numeric strings. */
  locale: string;
  nonConformingFloats: NonConformingFloats;
  schema: SchemaConfig;
}

/** Partial configuration, as written in a config file or passed in code. */
export interface CodecConfigInput {
  debug?: boolean;
  discriminatorKey?: string;
  orderKeys?: boolean;
  indent?: number;
  locale?: string;
  nonConformingFloats?: Partial<NonConformingFloats>;
  schema?: Partial<SchemaConfig>;
}

export const DEFAULT_CONFIG: CodecConfig = {
  debug: false,
  discriminatorKey: "type",
  orderKeys: true,
  indent: 0,
  locale: "en-US",
  nonConformingFloats: DEFAULT_NON_CONFORMING_FLOATS,
  schema: { baseUrls: {} },
};

/** Identity helper for typed config files. */
export function defineConfig(config: CodecConfigInput): CodecConfigInput {
  return config;
}

/** Apply partial inputs over the defaults; later inputs take precedence. */
export function resolveConfig(...inputs: ReadonlyArray<CodecConfigInput | undefined>): CodecConfig {
  let config = DEFAULT_CONFIG;
  for (const input of inputs) {
    if (input === undefined) continue;
    config = {
      debug: input.debug ?? config.debug,
      discriminatorKey: input.discriminatorKey ?? config.discriminatorKey,
      orderKeys: input.orderKeys ?? config.orderKeys,
      indent: input.indent ?? config.indent,
      locale: input.locale ?? config.locale,
      nonConformingFloats: {
        positiveInfinity:
          input.nonConformingFloats?.positiveInfinity ??
          config.nonConformingFloats.positiveInfinity,
        negativeInfinity:
          input.nonConformingFloats?.negativeInfinity ??
          config.nonConformingFloats.negativeInfinity,
        nan: input.nonConformingFloats?.nan ?? config.nonConformingFloats.nan,
      },
      schema: {
        module: input.schema?.module ?? config.schema.module,
        baseUrls: { ...config.schema.baseUrls, ...input.schema?.baseUrls },
      },
    };
  }
  return config;
}
