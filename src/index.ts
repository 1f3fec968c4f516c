/**
 * Content repurposer.
 *
 * Rewrites long-form text into a blog post, a tweet thread or Instagram
 * carousel text with one templated Gemini request per transformation.
 *
 * ```typescript
 * import { createTransformationService } from "content-repurposer";
 *
 * const service = createTransformationService();
 * const thread = await service.transform(article, "tweet_thread", { tone: "witty" });
 * ```
 */

export * from "./formats/index.js";
export * from "./prompts/index.js";
export * from "./registry/index.js";
export * from "./contracts/index.js";
export * from "./backend/index.js";
export * from "./service/index.js";
export {
  config,
  loadConfig,
  validateConfig,
  ConfigError,
  DEFAULT_MODEL_NAME,
  DEFAULT_TEMPERATURE,
  type AppConfig,
} from "./config/index.js";
export {
  createLogger,
  createSilentLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
