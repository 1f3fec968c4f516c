/**
 * Prompt preparation: every step of a transformation before the model call.
 */

import {
  resolveParameters,
  type AvailableFormat,
  type ParameterSet,
} from "../formats/index.js";
import { buildPromptContext, renderPrompt } from "../prompts/index.js";
import type { Template, TemplateRegistry } from "../registry/index.js";
import { getFormatInstructions } from "../contracts/index.js";
import { EmptyContentError } from "./errors.js";

export interface PreparedPrompt {
  format: AvailableFormat;
  template: Template;
  parameters: ParameterSet;
  prompt: string;
}

/**
 * Validate the input and render the prompt for one request.
 *
 * @throws EmptyContentError       if content is empty or whitespace-only
 * @throws UnsupportedFormatError  for unknown or coming-soon formats
 * @throws InvalidParameterError   for illegal parameter values or keys
 * @throws TemplateRenderError     if a placeholder cannot be resolved
 */
export function preparePrompt(
  registry: TemplateRegistry,
  content: string,
  format: string,
  params: unknown = {}
): PreparedPrompt {
  if (content.trim() === "") {
    throw new EmptyContentError();
  }

  const template = registry.resolve(format);
  const parameters = resolveParameters(template.format, params);
  const context = buildPromptContext({
    content,
    parameters,
    formatInstructions: getFormatInstructions(template.format),
  });

  return {
    format: template.format,
    template,
    parameters,
    prompt: renderPrompt(template.parsed, context),
  };
}
