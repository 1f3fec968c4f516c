/**
 * Prompt template system.
 *
 * Templates use `{{variable}}` placeholders validated against a typed
 * context built from the request's content and resolved parameters.
 *
 * ```typescript
 * const loader = new PromptTemplateLoader();
 * const template = loader.load("blog-post.md");
 *
 * const context = buildPromptContext({
 *   content,
 *   parameters: resolveParameters("blog_post", { tone: "casual" }),
 * });
 *
 * const prompt = renderPrompt(template, context);
 * ```
 */

export {
  buildPromptContext,
  type PromptContext,
  type PromptContextMap,
  type PromptContextInput,
  type PromptVariable,
} from "./context.js";

export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  getValidVariables,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

export {
  renderPrompt,
  TemplateRenderError,
  type RenderOptions,
} from "./renderer.js";

export {
  PromptTemplateLoader,
  TemplateLoadError,
  BUNDLED_PROMPTS_DIR,
} from "./loader.js";
