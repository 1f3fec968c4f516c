#!/usr/bin/env node
/**
 * CLI tool to preview the exact prompt a transformation would send.
 *
 * Renders the template for a format with the given content and parameters,
 * without calling the model and without needing an API key.
 *
 * Usage:
 *   npm run preview-prompt -- --format blog_post --text "AI is transforming industries."
 *   npm run preview-prompt -- --format tweet_thread --input article.md --tone witty --json
 *
 * Options:
 *   -f, --format <format>   Target format (required)
 *   -t, --text <string>     Content given inline
 *   -i, --input <path>      Read content from a file (default: stdin)
 *   --tone, --audience, --length, --slides   Format parameters
 *   --prompts <dir>         Directory with custom templates
 *   --json                  Output as JSON (includes metadata)
 *   --no-color              Disable ANSI colors
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (empty content, unknown format, invalid parameters)
 *   2 - The chosen format is coming soon
 */

import { parseArgs } from "node:util";

import { parseFormat } from "../formats/index.js";
import { PromptTemplateLoader } from "../prompts/index.js";
import { TemplateRegistry } from "../registry/index.js";
import { describeError, preparePrompt } from "../service/index.js";
import {
  buildParameterOverrides,
  c,
  exitCodeFor,
  readContent,
  setColors,
  type ParameterFlags,
} from "./shared.js";

export interface PreviewResult {
  format: string;
  templateName: string;
  parameters: Record<string, string | number>;
  rendered: string;
  metadata: {
    variableCount: number;
    lineCount: number;
    charCount: number;
  };
}

export interface PreviewOptions extends ParameterFlags {
  format: string;
  content: string;
  promptsDir?: string;
}

/**
 * Render the prompt for a format, content and CLI parameter flags.
 */
export function renderPreview(options: PreviewOptions): PreviewResult {
  const registry = TemplateRegistry.load(
    options.promptsDir ? new PromptTemplateLoader(options.promptsDir) : undefined
  );
  const prepared = preparePrompt(
    registry,
    options.content,
    parseFormat(options.format),
    buildParameterOverrides(options)
  );

  return {
    format: prepared.format,
    templateName: prepared.template.name,
    parameters: { ...prepared.parameters.params },
    rendered: prepared.prompt,
    metadata: {
      variableCount: prepared.template.parameters.length,
      lineCount: prepared.prompt.split("\n").length,
      charCount: prepared.prompt.length,
    },
  };
}

function printPreviewHeader(result: PreviewResult): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Prompt Preview"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
  console.log(`  ${c("cyan", "Format:")}     ${result.format}`);
  console.log(`  ${c("cyan", "Template:")}   ${result.templateName}`);
  for (const [name, value] of Object.entries(result.parameters)) {
    console.log(`  ${c("cyan", `${name}:`.padEnd(12))}${value}`);
  }
  console.log(`  ${c("cyan", "Lines:")}      ${result.metadata.lineCount}`);
  console.log(`  ${c("cyan", "Characters:")} ${result.metadata.charCount}`);
  console.log(`  ${c("cyan", "Variables:")}  ${result.metadata.variableCount}`);
  console.log("");
  console.log("─".repeat(60));
  console.log("");
}

async function main(): Promise<number> {
  const { values: args } = parseArgs({
    options: {
      format: { type: "string", short: "f" },
      text: { type: "string", short: "t" },
      input: { type: "string", short: "i" },
      tone: { type: "string" },
      audience: { type: "string" },
      length: { type: "string" },
      slides: { type: "string" },
      prompts: { type: "string" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (args["no-color"]) setColors(false);

  if (args.help) {
    console.log(`
Usage: preview-prompt --format <format> [--text <string> | --input <path>] [parameters]

  --tone <tone>  --audience <text>  --length <words>  --slides <n>
  --prompts <dir>   Directory with custom templates
  --json            Output as JSON
  --no-color        Disable ANSI colors
`);
    return 0;
  }

  if (!args.format) {
    console.error(c("red", "Error: --format is required"));
    return 1;
  }

  try {
    const content = await readContent({ text: args.text, input: args.input });
    const preview = renderPreview({
      format: args.format,
      content,
      promptsDir: args.prompts,
      tone: args.tone,
      audience: args.audience,
      length: args.length,
      slides: args.slides,
    });

    if (args.json) {
      console.log(JSON.stringify({ mode: "preview", ...preview }, null, 2));
    } else {
      printPreviewHeader(preview);
      console.log(preview.rendered);
    }
    return 0;
  } catch (err) {
    const failure = describeError(err);
    console.error(c("red", `Error [${failure.kind}]: ${failure.message}`));
    for (const detail of failure.details ?? []) {
      console.error(c("dim", `  - ${detail}`));
    }
    return exitCodeFor(err);
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("preview-prompt.ts") ||
   process.argv[1].endsWith("preview-prompt.js"));

if (isDirectExecution) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(c("red", `Error: ${message}`));
      process.exit(1);
    }
  );
}
