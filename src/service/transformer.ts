/**
 * Transformation service.
 *
 * One request runs a straight line of steps, each with its own typed
 * failure:
 *
 *   validate content  EmptyContentError
 *   resolve template  UnsupportedFormatError
 *   merge parameters  InvalidParameterError
 *   render prompt     TemplateRenderError
 *   call the model    BackendError
 *   check the answer  MalformedStructuredOutputError
 *
 * The service holds no per-request state. The registry is read-only and
 * the backend is called exactly once per request, with no retry.
 */

import type {
  AvailableFormat,
  Format,
  ParameterOverrides,
  ParameterSet,
} from "../formats/index.js";
import { TemplateRegistry } from "../registry/index.js";
import { toDisplayText, validate, type FinalResult } from "../contracts/index.js";
import { BackendError, type ModelBackend } from "../backend/index.js";
import {
  createSilentLogger,
  generateRequestId,
  type Logger,
} from "../logging/index.js";
import { describeError } from "./errors.js";
import { preparePrompt, type PreparedPrompt } from "./prepare.js";

export interface TransformationServiceOptions {
  backend: ModelBackend;
  /** Defaults to the bundled templates */
  registry?: TemplateRegistry;
  /** Defaults to a silent logger */
  logger?: Logger;
}

export interface TransformResult {
  requestId: string;
  format: AvailableFormat;
  parameters: ParameterSet;
  /** The exact prompt sent to the model */
  prompt: string;
  result: FinalResult;
  /** The result as one display string */
  text: string;
  durationMs: number;
}

export class TransformationService {
  readonly registry: TemplateRegistry;
  private readonly backend: ModelBackend;
  private readonly logger: Logger;

  constructor(options: TransformationServiceOptions) {
    this.backend = options.backend;
    this.registry = options.registry ?? TemplateRegistry.load();
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Validate the input and render the prompt, without calling the model.
   * See preparePrompt() for the failures.
   */
  preparePrompt<F extends Format>(
    content: string,
    format: F,
    params?: ParameterOverrides<F>
  ): PreparedPrompt;
  preparePrompt(
    content: string,
    format: string,
    params?: Record<string, unknown>
  ): PreparedPrompt;
  preparePrompt(content: string, format: string, params: unknown = {}): PreparedPrompt {
    return preparePrompt(this.registry, content, format, params);
  }

  /**
   * Run one transformation and return the result with its metadata.
   */
  run<F extends Format>(
    content: string,
    format: F,
    params?: ParameterOverrides<F>
  ): Promise<TransformResult>;
  run(
    content: string,
    format: string,
    params?: Record<string, unknown>
  ): Promise<TransformResult>;
  run(content: string, format: string, params: unknown = {}): Promise<TransformResult> {
    return this.execute(content, format, params);
  }

  /**
   * Run one transformation and return the display text.
   */
  transform<F extends Format>(
    content: string,
    format: F,
    params?: ParameterOverrides<F>
  ): Promise<string>;
  transform(
    content: string,
    format: string,
    params?: Record<string, unknown>
  ): Promise<string>;
  async transform(content: string, format: string, params: unknown = {}): Promise<string> {
    const outcome = await this.execute(content, format, params);
    return outcome.text;
  }

  private async execute(
    content: string,
    format: string,
    params: unknown
  ): Promise<TransformResult> {
    const requestId = generateRequestId();
    const log = this.logger.child({ requestId, format });
    const started = Date.now();

    try {
      const prepared = preparePrompt(this.registry, content, format, params);
      log.debug("Prompt rendered", {
        template: prepared.template.name,
        promptChars: prepared.prompt.length,
        contentChars: content.length,
      });

      const response = await this.callBackend(prepared.prompt);
      const result = validate(prepared.format, response);
      const durationMs = Date.now() - started;

      log.info("Transformation completed", {
        model: this.backend.modelName,
        responseChars: response.length,
        durationMs,
      });

      return {
        requestId,
        format: prepared.format,
        parameters: prepared.parameters,
        prompt: prepared.prompt,
        result,
        text: toDisplayText(result),
        durationMs,
      };
    } catch (err) {
      const failure = describeError(err);
      log.warn("Transformation failed", {
        kind: failure.kind,
        message: failure.message,
        durationMs: Date.now() - started,
      });
      throw err;
    }
  }

  private async callBackend(prompt: string): Promise<string> {
    try {
      return await this.backend.complete(prompt);
    } catch (err) {
      throw err instanceof BackendError
        ? err
        : new BackendError(this.backend.modelName, err);
    }
  }
}
