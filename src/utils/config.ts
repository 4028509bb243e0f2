/**
 * Configuration Loading
 *
 * Layers, lowest precedence first: schema defaults, .scenegraph/config.json,
 * environment variables, explicit overrides (CLI flags).
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { getConfigPath, readJson } from "./index.js";
import { createLogger } from "./logger.js";
import {
  SceneGraphConfigSchema,
  formatZodError,
  safeValidate,
  type SceneGraphConfig,
} from "./validation.js";

const logger = createLogger("config");

/**
 * Partial configuration as accepted from each layer
 */
export interface ConfigOverrides {
  typedb?: Partial<SceneGraphConfig["typedb"]>;
  model?: Partial<SceneGraphConfig["model"]>;
  frames?: Partial<SceneGraphConfig["frames"]>;
}

export interface LoadConfigOptions {
  overrides?: ConfigOverrides;
  /** Defaults to .scenegraph/config.json under the working directory */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(value: unknown, key: string): Record<string, unknown> {
  if (!isRecord(value)) return {};
  const inner = value[key];
  return isRecord(inner) ? inner : {};
}

/**
 * Drops undefined entries so they never shadow a lower layer
 */
function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  );
}

function envOverrides(env: NodeJS.ProcessEnv): Record<"typedb" | "model", Record<string, unknown>> {
  return {
    typedb: defined({
      address: env.TYPEDB_ADDRESS,
      username: env.TYPEDB_USERNAME,
      password: env.TYPEDB_PASSWORD,
      database: env.TYPEDB_DATABASE,
    }),
    model: defined({ id: env.SCENEGRAPH_MODEL }),
  };
}

/**
 * Loads and validates the configuration.
 *
 * @throws ConfigurationError when the file is unreadable or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): SceneGraphConfig {
  const configPath = options.configPath ?? getConfigPath();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let fileConfig: unknown;
  try {
    fileConfig = readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(`Failed to read configuration file ${configPath}`, ErrorCode.CONFIG_INVALID, {
      configPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const fromEnv = envOverrides(env);
  const merged = {
    typedb: { ...section(fileConfig, "typedb"), ...fromEnv.typedb, ...defined(overrides.typedb ?? {}) },
    model: { ...section(fileConfig, "model"), ...fromEnv.model, ...defined(overrides.model ?? {}) },
    frames: { ...section(fileConfig, "frames"), ...defined(overrides.frames ?? {}) },
  };

  const result = safeValidate(SceneGraphConfigSchema, merged);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      issues,
    });
  }

  logger.debug({ configPath, database: result.data.typedb.database }, "Configuration loaded");
  return result.data;
}

/**
 * Reads the Anthropic API key, failing before any store interaction
 */
export function requireApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(
      "ANTHROPIC_API_KEY environment variable is required for vision analysis and query translation.\n" +
        "Set it with: export ANTHROPIC_API_KEY=your_key_here",
      ErrorCode.CONFIG_MISSING_CREDENTIALS
    );
  }
  return apiKey;
}
