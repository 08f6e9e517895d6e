/**
 * Configuration loading.
 *
 * Sources, lowest precedence first:
 *
 * 1. Defaults
 * 2. Config files found by cosmiconfig: `package.json#polycodec`,
 *    `.polycodecrc`, `.polycodecrc.json`, `polycodec.config.js`, ...
 * 3. Environment variables: POLYCODEC_*
 * 4. Programmatic overrides
 *
 * @example
 * ```typescript
 * const { config } = loadConfig({ overrides: { indent: 2 } });
 * const context = createResultContext({ config });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { resolveConfig, type CodecConfig, type CodecConfigInput } from "./config.js";
import { ConfigurationError } from "./errors.js";

const MODULE_NAME = "polycodec";
const ENV_PREFIX = "POLYCODEC_";

export interface LoadConfigOptions {
  /** Directory to search for a config file; the working directory by default. */
  searchFrom?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: CodecConfigInput;
}

export interface LoadedConfig {
  config: CodecConfig;
  /** Path of the config file that was applied, if any. */
  filepath?: string;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Map POLYCODEC_* variables onto a config object.
 *
 * Double underscore separates nesting levels; single underscores join words
 * into camelCase:
 *   POLYCODEC_DISCRIMINATOR_KEY=kind        → { discriminatorKey: "kind" }
 *   POLYCODEC_SCHEMA__MODULE=results        → { schema: { module: "results" } }
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .split("__")
      .map((segment) =>
        segment.toLowerCase().replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase())
      );

    let parsedValue: unknown;
    if (value === "true") {
      parsedValue = true;
    } else if (value === "false") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (const part of path.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[path[path.length - 1]] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Validation
// ============================================================================

/** Check a raw config object and keep the recognised keys. */
export function parseConfigInput(raw: unknown, source: string): CodecConfigInput {
  if (!isRecord(raw)) {
    throw new ConfigurationError(source, "configuration must be an object");
  }
  const input: CodecConfigInput = {};

  const flag = (key: string): boolean | undefined => {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === "boolean") return value;
    if (value === 1 || value === 0) return value === 1;
    throw new ConfigurationError(source, `"${key}" must be a boolean`);
  };
  const text = (from: Record<string, unknown>, key: string): string | undefined => {
    const value = from[key];
    if (value === undefined) return undefined;
    if (typeof value === "string" && value.length > 0) return value;
    throw new ConfigurationError(source, `"${key}" must be a non-empty string`);
  };

  input.debug = flag("debug");
  input.orderKeys = flag("orderKeys");
  input.discriminatorKey = text(raw, "discriminatorKey");
  input.locale = text(raw, "locale");

  if (raw.indent !== undefined) {
    const indent = raw.indent;
    if (typeof indent !== "number" || !Number.isInteger(indent) || indent < 0 || indent > 10) {
      throw new ConfigurationError(source, `"indent" must be an integer between 0 and 10`);
    }
    input.indent = indent;
  }

  if (raw.nonConformingFloats !== undefined) {
    const floats = raw.nonConformingFloats;
    if (!isRecord(floats)) {
      throw new ConfigurationError(source, `"nonConformingFloats" must be an object`);
    }
    input.nonConformingFloats = {
      positiveInfinity: text(floats, "positiveInfinity"),
      negativeInfinity: text(floats, "negativeInfinity"),
      nan: text(floats, "nan"),
    };
  }

  if (raw.schema !== undefined) {
    const schema = raw.schema;
    if (!isRecord(schema)) {
      throw new ConfigurationError(source, `"schema" must be an object`);
    }
    const baseUrls: Record<string, string> = {};
    if (schema.baseUrls !== undefined) {
      if (!isRecord(schema.baseUrls)) {
        throw new ConfigurationError(source, `"schema.baseUrls" must be an object`);
      }
      for (const [module, url] of Object.entries(schema.baseUrls)) {
        if (typeof url !== "string") {
          throw new ConfigurationError(source, `"schema.baseUrls.${module}" must be a string`);
        }
        baseUrls[module] = url;
      }
    }
    input.schema = { module: text(schema, "module"), baseUrls };
  }

  return input;
}

// ============================================================================
// Config File Loading
// ============================================================================

/** Where the file search looks, in order. The sync loader cannot load ESM files. */
export const CONFIG_SEARCH_PLACES: ReadonlyArray<string> = [
  "package.json",
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `.${MODULE_NAME}rc.js`,
  `.${MODULE_NAME}rc.cjs`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.cjs`,
];

function loadConfigFromFiles(searchFrom?: string): { input: CodecConfigInput; filepath?: string } {
  const explorer = cosmiconfigSync(MODULE_NAME, { searchPlaces: [...CONFIG_SEARCH_PLACES] });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search(searchFrom);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(MODULE_NAME, `could not read configuration: ${detail}`, {
      cause: error,
    });
  }
  if (result === null || result.isEmpty) return { input: {} };
  const raw: unknown = result.config;
  return { input: parseConfigInput(raw, result.filepath), filepath: result.filepath };
}

/** Load configuration from files and the environment. */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const file = loadConfigFromFiles(options.searchFrom);
  const env = parseConfigInput(configFromEnv(options.env ?? process.env), "environment");

  return {
    config: resolveConfig(file.input, env, options.overrides),
    filepath: file.filepath,
  };
}
