/**
 * Wire a TransformationService from configuration.
 */

import { config as defaultConfig, validateConfig, type AppConfig } from "../config/index.js";
import { GeminiBackend, type ModelBackend } from "../backend/index.js";
import { createLogger, isLogLevel, type Logger } from "../logging/index.js";
import { TemplateRegistry } from "../registry/index.js";
import { PromptTemplateLoader } from "../prompts/index.js";
import { TransformationService } from "./transformer.js";

export interface ServiceFactoryOptions {
  /** Overrides GOOGLE_API_KEY */
  apiKey?: string;
  /** Overrides GEMINI_MODEL */
  modelName?: string;
  /** Use this backend instead of Gemini */
  backend?: ModelBackend;
  /** Directory with custom templates */
  promptsDir?: string;
  logger?: Logger;
  config?: AppConfig;
}

/**
 * Build a logger from configuration.
 */
export function createConfiguredLogger(cfg: AppConfig = defaultConfig): Logger {
  return createLogger({
    level: isLogLevel(cfg.logLevel) ? cfg.logLevel : "info",
    logDir: cfg.logDir,
    file: cfg.logToFile,
  });
}

/**
 * Validate configuration and build a ready service.
 *
 * @throws ConfigError             on invalid configuration
 * @throws MissingCredentialError  if no API key is available
 * @throws TemplateLoadError       if a template file is missing
 */
export function createTransformationService(
  options: ServiceFactoryOptions = {}
): TransformationService {
  const cfg = options.config ?? defaultConfig;
  validateConfig(cfg);

  const backend =
    options.backend ??
    new GeminiBackend({
      apiKey: options.apiKey,
      modelName: options.modelName ?? cfg.modelName,
      temperature: cfg.temperature,
    });

  const registry = TemplateRegistry.load(
    options.promptsDir ? new PromptTemplateLoader(options.promptsDir) : undefined
  );

  return new TransformationService({
    backend,
    registry,
    logger: options.logger ?? createConfiguredLogger(cfg),
  });
}
