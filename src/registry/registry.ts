/**
 * Template registry.
 *
 * Maps every available format to its prompt template and the list of
 * placeholders the template requires. Built once at startup, then
 * read-only: resolve() is a pure lookup.
 *
 * Invariant: a template's placeholders and its declared parameters are the
 * same set. A template file that uses an undeclared placeholder, or omits a
 * declared one, fails when the registry is built.
 */

import {
  AVAILABLE_FORMATS,
  FORMAT_LABELS,
  Format,
  UnsupportedFormatError,
  isAvailableFormat,
  isComingSoonFormat,
  type AvailableFormat,
} from "../formats/index.js";
import {
  PromptTemplateLoader,
  TemplateParseError,
  parseTemplate,
  type ParsedTemplate,
  type PromptVariable,
} from "../prompts/index.js";

export interface TemplateDefinition {
  /** Template file name inside the prompts directory */
  file: string;
  /** Placeholders the template must use, and only these */
  parameters: readonly PromptVariable[];
}

export const TEMPLATE_DEFINITIONS: Readonly<Record<AvailableFormat, TemplateDefinition>> = {
  blog_post: {
    file: "blog-post.md",
    parameters: ["content", "audience", "tone", "length"],
  },
  tweet_thread: {
    file: "tweet-thread.md",
    parameters: ["content", "tone", "formatInstructions"],
  },
  instagram_carousel: {
    file: "instagram-carousel.md",
    parameters: ["content", "tone", "numSlides"],
  },
};

export interface Template {
  readonly format: AvailableFormat;
  readonly name: string;
  readonly parameters: readonly PromptVariable[];
  readonly parsed: ParsedTemplate;
}

export interface FormatInfo {
  format: Format;
  label: string;
  available: boolean;
}

/**
 * Check a parsed template against its declared parameters.
 *
 * @throws TemplateParseError listing undeclared and unused placeholders
 */
export function buildTemplate(
  format: AvailableFormat,
  parsed: ParsedTemplate,
  parameters: readonly PromptVariable[]
): Template {
  const name = parsed.name ?? format;
  const declared = new Set<string>(parameters);
  const used = new Set<string>(parsed.variables);

  const undeclared = parsed.variables.filter((v) => !declared.has(v));
  const unused = parameters.filter((p) => !used.has(p));

  if (undeclared.length > 0 || unused.length > 0) {
    const problems: string[] = [];
    if (undeclared.length > 0) {
      problems.push(`undeclared placeholder(s): ${undeclared.join(", ")}`);
    }
    if (unused.length > 0) {
      problems.push(`declared but unused parameter(s): ${unused.join(", ")}`);
    }
    throw new TemplateParseError(
      name,
      undeclared,
      `Template "${name}" for ${format} does not match its parameters: ${problems.join("; ")}`
    );
  }

  return Object.freeze({
    format,
    name,
    parameters: Object.freeze([...parameters].sort()),
    parsed: Object.freeze({ ...parsed, variables: [...parsed.variables] }),
  });
}

export class TemplateRegistry {
  private readonly templates: ReadonlyMap<AvailableFormat, Template>;

  private constructor(templates: Map<AvailableFormat, Template>) {
    this.templates = templates;
  }

  /**
   * Load every available format's template from disk.
   *
   * @throws TemplateLoadError   if a template file is missing
   * @throws TemplateParseError  if a template breaks the parameter invariant
   */
  static load(loader: PromptTemplateLoader = new PromptTemplateLoader()): TemplateRegistry {
    const templates = new Map<AvailableFormat, Template>();
    for (const format of AVAILABLE_FORMATS) {
      const definition = TEMPLATE_DEFINITIONS[format];
      templates.set(
        format,
        buildTemplate(format, loader.load(definition.file), definition.parameters)
      );
    }
    return new TemplateRegistry(templates);
  }

  /**
   * Build a registry from in-memory template sources.
   * Every available format must be given.
   */
  static fromSources(sources: Readonly<Record<AvailableFormat, string>>): TemplateRegistry {
    const templates = new Map<AvailableFormat, Template>();
    for (const format of AVAILABLE_FORMATS) {
      const parsed = parseTemplate(sources[format], format);
      templates.set(
        format,
        buildTemplate(format, parsed, TEMPLATE_DEFINITIONS[format].parameters)
      );
    }
    return new TemplateRegistry(templates);
  }

  /**
   * Look up the template for a format.
   *
   * @throws UnsupportedFormatError for coming-soon formats and for any
   *         identifier outside the Format enum
   */
  resolve(format: string): Template {
    const parsed = Format.safeParse(format);
    if (!parsed.success) {
      throw new UnsupportedFormatError(format, false);
    }
    const known = parsed.data;
    if (isComingSoonFormat(known)) {
      throw new UnsupportedFormatError(known, true);
    }

    const template = this.templates.get(known);
    if (!template) {
      throw new UnsupportedFormatError(known, false);
    }
    return template;
  }

  /**
   * Every known format with its label and availability.
   */
  list(): FormatInfo[] {
    return Format.options.map((format) => ({
      format,
      label: FORMAT_LABELS[format],
      available: isAvailableFormat(format) && this.templates.has(format),
    }));
  }
}
