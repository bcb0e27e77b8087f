/**
 * Application configuration.
 * Reads the environment once and exposes typed values.
 */

import {
  ConfigError,
  firstEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError, requireEnv, type EnvSource } from "./env.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Application name, used in the HTTP User-Agent */
  readonly appName: string;
  /** Gemini API key (GEMINI_API_KEY, falling back to GOOGLE_API_KEY) */
  readonly apiKey?: string;
  /** Model that writes the article */
  readonly contentModel: string;
  /** Model used for grounded replacement search */
  readonly validatorModel: string;
  /** Timeout for every HTTP check, in milliseconds */
  readonly httpTimeoutMs: number;
  /** Also append log entries to a file under logDir */
  readonly logToFile: boolean;
  readonly logDir: string;
}

/**
 * Load configuration from the environment.
 * Throws ConfigError when a numeric or boolean variable is malformed.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "grounded-article-writer", env),
    apiKey: firstEnv(["GEMINI_API_KEY", "GOOGLE_API_KEY"], env),
    contentModel: optionalEnv("CONTENT_MODEL", "gemini-2.5-pro", env),
    validatorModel: optionalEnv("VALIDATOR_MODEL", "gemini-2.5-flash", env),
    httpTimeoutMs: optionalEnvInt("HTTP_TIMEOUT_MS", 8000, env),
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
  };
}

/**
 * Validate configuration values that have a closed set of options.
 * Call at startup to fail fast.
 */
export function validateConfig(config: AppConfig): { logLevel: LogLevel } {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return { logLevel: config.logLevel };
}

/**
 * Require an API key, from the CLI flag or the environment.
 */
export function resolveApiKey(config: AppConfig, override?: string): string {
  const key = override ?? config.apiKey;
  if (key === undefined || key === "") {
    throw new ConfigError(
      "Missing Gemini API key: pass --api-key or set GEMINI_API_KEY / GOOGLE_API_KEY"
    );
  }
  return key;
}
