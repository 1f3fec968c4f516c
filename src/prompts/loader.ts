/**
 * Prompt template loader.
 *
 * Loads prompt templates from disk (.md or .txt files), parses and validates
 * them, and caches the parsed result. The templates shipped with the package
 * live in the repository-level `prompts/` directory.
 *
 * USAGE:
 *
 *   const loader = new PromptTemplateLoader();          // bundled prompts/
 *   const tmpl = loader.load("blog-post.md");
 *
 *   const custom = new PromptTemplateLoader("my-prompts/");
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

/**
 * Directory holding the bundled templates. Resolves to `<root>/prompts`
 * both from `src/prompts/` and from the compiled `dist/prompts/`.
 */
export const BUNDLED_PROMPTS_DIR = fileURLToPath(
  new URL("../../prompts/", import.meta.url)
);

export class PromptTemplateLoader {
  readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing prompt template files
   * @throws TemplateLoadError if the directory does not exist
   */
  constructor(baseDir: string = BUNDLED_PROMPTS_DIR) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir) || !statSync(this.baseDir).isDirectory()) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and parse a single template file. Results are cached.
   *
   * @param filename - Filename relative to baseDir (e.g. "blog-post.md")
   * @throws TemplateLoadError   if the file is missing or has the wrong extension
   * @throws TemplateParseError  if the template contains unknown variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const source = readFileSync(filePath, "utf-8");
    const parsed = parseTemplate(source, basename(filename, ext));

    this.cache.set(filename, parsed);
    return parsed;
  }
}
