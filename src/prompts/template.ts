/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is a plain-text string (loaded from a .md or .txt file)
 * containing `{{variable}}` placeholders. This module extracts the
 * placeholders and validates them against the PromptContextMap vocabulary
 * so that a misspelled variable is caught when the template is loaded,
 * not when a request is rendered.
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are alphanumeric identifiers: {{numSlides}}
 *   - Whitespace inside braces is trimmed: {{ tone }} is valid
 *   - Unrecognized variable names are rejected at parse time
 *   - Duplicate placeholders are fine (same value rendered)
 */

import type { PromptVariable } from "./context.js";

/**
 * Matches `{{variable}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_]*)\s*\}\}/g;

/**
 * A parsed and validated prompt template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: PromptVariable[];
  /** Optional name/id for error messages. */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

/**
 * Complete set of legal variable names.
 *
 * Must stay in sync with PromptContextMap in context.ts.
 */
const VALID_VARIABLES: ReadonlySet<string> = new Set<PromptVariable>([
  "content",
  "audience",
  "tone",
  "length",
  "numSlides",
  "formatInstructions",
]);

export function isValidVariable(name: string): name is PromptVariable {
  return VALID_VARIABLES.has(name);
}

/**
 * Return all valid variable names (sorted).
 */
export function getValidVariables(): PromptVariable[] {
  return [...VALID_VARIABLES].filter(isValidVariable).sort();
}

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/**
 * Parse a template string, extracting and validating all variables.
 *
 * @param source - The raw template text
 * @param name   - Optional template name for error messages
 * @throws TemplateParseError if any {{variable}} name is invalid, or the
 *         template has no placeholders at all
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const templateName = name ?? "(anonymous)";
  const rawVariables = extractVariables(source);
  const invalid = rawVariables.filter((v) => !isValidVariable(v));

  if (invalid.length > 0) {
    throw new TemplateParseError(templateName, invalid);
  }

  if (rawVariables.length === 0) {
    throw new TemplateParseError(
      templateName,
      [],
      `Template "${templateName}" contains no placeholders`
    );
  }

  return {
    source,
    variables: rawVariables.filter(isValidVariable),
    name,
  };
}
