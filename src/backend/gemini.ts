/**
 * Google Gemini backend.
 */

import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { config } from "../config/index.js";
import { MissingCredentialError, type ModelBackend } from "./types.js";

export const API_KEY_ENV = "GOOGLE_API_KEY";

export interface GeminiBackendOptions {
  /** Overrides the key read from the environment */
  apiKey?: string;
  /** Defaults to GEMINI_MODEL (gemini-2.5-flash) */
  modelName?: string;
  /** Defaults to GEMINI_TEMPERATURE (0.7) */
  temperature?: number;
  /** Environment to read the key from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export class GeminiBackend implements ModelBackend {
  readonly modelName: string;
  readonly temperature: number;
  private readonly model: GenerativeModel;

  /**
   * @throws MissingCredentialError if no API key is given or found
   */
  constructor(options: GeminiBackendOptions = {}) {
    const env = options.env ?? process.env;
    const apiKey = options.apiKey?.trim() || env[API_KEY_ENV]?.trim();
    if (!apiKey) {
      throw new MissingCredentialError(API_KEY_ENV);
    }

    this.modelName = options.modelName ?? config.modelName;
    this.temperature = options.temperature ?? config.temperature;
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
      model: this.modelName,
      generationConfig: { temperature: this.temperature },
    });
  }

  async complete(prompt: string): Promise<string> {
    const result = await this.model.generateContent(prompt);
    return result.response.text();
  }
}
