/**
 * Typed prompt context.
 *
 * Every legal `{{variable}}` in a prompt template maps to a key of
 * PromptContextMap. A context is built per request from the user's content,
 * the resolved ParameterSet and, for structured formats, the format
 * instructions of the output contract. It holds exactly the variables the
 * format's template uses.
 *
 * Adding a new variable requires exactly two changes:
 *   1. Add the key to PromptContextMap (and VALID_VARIABLES in template.ts)
 *   2. Populate it in buildPromptContext()
 */

import type { ParameterSet } from "../formats/index.js";

/**
 * Exhaustive map of every variable available inside prompt templates.
 * Values are always strings (template rendering is text-to-text).
 */
export interface PromptContextMap {
  /** The user's original long-form text */
  content: string;
  /** Blog post target audience */
  audience: string;
  tone: string;
  /** Blog post length in words */
  length: string;
  /** Number of carousel slides */
  numSlides: string;
  /** Response-shape directive for structured formats */
  formatInstructions: string;
}

/** Union of every valid template variable name. */
export type PromptVariable = keyof PromptContextMap;

/** A context holds values only for the variables its format uses. */
export type PromptContext = Partial<PromptContextMap>;

export interface PromptContextInput {
  content: string;
  parameters: ParameterSet;
  /** Required when the format's output is structured */
  formatInstructions?: string;
}

/**
 * Build the rendering context for one request.
 */
export function buildPromptContext(input: PromptContextInput): PromptContext {
  const { content, parameters, formatInstructions } = input;

  switch (parameters.format) {
    case "blog_post":
      return {
        content,
        audience: parameters.params.audience,
        tone: parameters.params.tone,
        length: String(parameters.params.length),
      };
    case "tweet_thread":
      return {
        content,
        tone: parameters.params.tone,
        formatInstructions,
      };
    case "instagram_carousel":
      return {
        content,
        tone: parameters.params.tone,
        numSlides: String(parameters.params.numSlides),
      };
  }
}
