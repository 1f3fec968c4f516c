/**
 * Prompt renderer.
 *
 * Takes a ParsedTemplate and a PromptContext and produces the final prompt
 * string. Processing pipeline:
 *
 *   1. Every {{variable}} in the template MUST have a value in the context.
 *   2. In strict mode (default), every value in the context MUST be used
 *      by the template, which catches context/template mismatches early.
 *   3. Placeholders are substituted in a single pass, so a value that itself
 *      contains `{{…}}` (user content often does) is never re-expanded.
 */

import {
  PLACEHOLDER_RE,
  isValidVariable,
  type ParsedTemplate,
} from "./template.js";
import type { PromptContext, PromptVariable } from "./context.js";

export class TemplateRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    public readonly unusedVariables: string[] = [],
    message?: string
  ) {
    super(message ?? TemplateRenderError.describe(templateName, missingVariables, unusedVariables));
    this.name = "TemplateRenderError";
  }

  private static describe(
    templateName: string,
    missing: string[],
    unused: string[]
  ): string {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`context is missing value(s) for: ${missing.join(", ")}`);
    }
    if (unused.length > 0) {
      parts.push(`template does not use context variable(s): ${unused.join(", ")}`);
    }
    return `Cannot render template "${templateName}": ${parts.join("; ")}`;
  }
}

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the context contains variables
   * that the template does not reference.
   */
  strict?: boolean;
}

function lookup(context: PromptContext, name: string): string | undefined {
  return isValidVariable(name) ? context[name] : undefined;
}

/**
 * Render a parsed template against a prompt context.
 *
 * @throws TemplateRenderError if a placeholder has no value, or (strict
 *         mode) the context carries a variable the template never uses
 */
export function renderPrompt(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const { strict = true } = options;
  const templateName = template.name ?? "(anonymous)";

  const missing = template.variables.filter(
    (variable) => lookup(context, variable) === undefined
  );

  let unused: PromptVariable[] = [];
  if (strict) {
    const used = new Set<string>(template.variables);
    unused = Object.keys(context)
      .filter(isValidVariable)
      .filter((key) => context[key] !== undefined && !used.has(key));
  }

  if (missing.length > 0 || unused.length > 0) {
    throw new TemplateRenderError(templateName, missing, unused);
  }

  return template.source.replace(
    PLACEHOLDER_RE,
    (_match, name: string) => lookup(context, name) ?? ""
  );
}
