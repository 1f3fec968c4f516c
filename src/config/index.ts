/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 *
 * The Gemini API key is deliberately not part of AppConfig: it is read
 * only when a backend is constructed (see backend/gemini.ts).
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvFloat,
} from "./env.js";

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvFloat,
  optionalEnvBool,
} from "./env.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Also append log lines to a file under logDir */
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  /** Gemini model identifier */
  readonly modelName: string;
  /** Sampling temperature passed to the model */
  readonly temperature: number;
}

export const DEFAULT_MODEL_NAME = "gemini-2.5-flash";
export const DEFAULT_TEMPERATURE = 0.7;

/**
 * Load configuration from the current process environment.
 */
export function loadConfig(): AppConfig {
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName: optionalEnv("APP_NAME", "content-repurposer"),
    modelName: optionalEnv("GEMINI_MODEL", DEFAULT_MODEL_NAME),
    temperature: optionalEnvFloat("GEMINI_TEMPERATURE", DEFAULT_TEMPERATURE),
  });
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(cfg: AppConfig = config): void {
  if (!["development", "production", "test"].includes(cfg.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${cfg.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(cfg.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${cfg.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (cfg.temperature < 0 || cfg.temperature > 2) {
    throw new ConfigError(
      `Invalid GEMINI_TEMPERATURE: ${cfg.temperature}. Must be between 0 and 2.`
    );
  }

  if (cfg.modelName.trim() === "") {
    throw new ConfigError("GEMINI_MODEL must not be blank.");
  }
}
