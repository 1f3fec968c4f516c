#!/usr/bin/env node
/**
 * CLI tool to repurpose long-form text.
 *
 * Reads content from --text, --input or stdin, sends one templated request
 * to Gemini and prints the result.
 *
 * Usage:
 *   npm run repurpose -- --format tweet_thread --input article.md
 *   cat article.md | npm run repurpose -- --format "Blog Post" --tone casual --length 400
 *   npm run repurpose -- --list-formats
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (missing credential, empty content, invalid parameters, model failure)
 *   2 - The chosen format is coming soon
 */

import { parseArgs } from "node:util";

import { config } from "../config/index.js";
import {
  AVAILABLE_FORMATS,
  COMING_SOON_FORMATS,
  FORMAT_LABELS,
  TONE_PRESETS,
} from "../formats/index.js";
import { initRunId } from "../logging/index.js";
import {
  createTransformationService,
  describeError,
  type FailureDescriptor,
} from "../service/index.js";
import {
  buildParameterOverrides,
  c,
  exitCodeFor,
  readContent,
  resolveRequestedFormat,
  setColors,
} from "./shared.js";

const HELP = `
Usage: repurpose --format <format> [content] [parameters] [options]

Content (first match wins):
  -t, --text <string>     Content given inline
  -i, --input <path>      Read content from a file
  (stdin)                 Piped content

Formats:
  ${AVAILABLE_FORMATS.map((f) => `${f} ("${FORMAT_LABELS[f]}")`).join("\n  ")}
  ${COMING_SOON_FORMATS.map((f) => `${f} (coming soon)`).join("\n  ")}

Parameters:
  --tone <tone>           All formats
  --audience <text>       blog_post (default: general audience)
  --length <words>        blog_post, 100-1000 (default: 500)
  --slides <n>            instagram_carousel, 3-10 (default: 5)

Options:
  -f, --format <format>   Target format (required)
  --api-key <key>         Gemini API key (default: GOOGLE_API_KEY)
  --model <name>          Gemini model (default: ${config.modelName})
  --json                  Output JSON (result, tweets, metadata)
  --list-formats          List formats and tone presets
  --no-color              Disable ANSI colors
  -h, --help              Show this help message
`;

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      format: { type: "string", short: "f" },
      text: { type: "string", short: "t" },
      input: { type: "string", short: "i" },
      tone: { type: "string" },
      audience: { type: "string" },
      length: { type: "string" },
      slides: { type: "string" },
      "api-key": { type: "string" },
      model: { type: "string" },
      json: { type: "boolean", default: false },
      "list-formats": { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

function printFormats(): void {
  console.log(c("bold", "Available formats:"));
  for (const format of AVAILABLE_FORMATS) {
    console.log(`  ${c("cyan", format.padEnd(20))} ${FORMAT_LABELS[format]}`);
    console.log(c("dim", `  ${"".padEnd(20)} tones: ${TONE_PRESETS[format].join(", ")}`));
  }
  console.log(c("bold", "\nComing soon:"));
  for (const format of COMING_SOON_FORMATS) {
    console.log(`  ${c("dim", format.padEnd(20))} ${FORMAT_LABELS[format]}`);
  }
}

function printFailure(failure: FailureDescriptor, json: boolean): void {
  if (json) {
    console.log(JSON.stringify({ success: false, error: failure }, null, 2));
    return;
  }
  console.error(c("red", `Error [${failure.kind}]: ${failure.message}`));
  for (const detail of failure.details ?? []) {
    console.error(c("dim", `  - ${detail}`));
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs();
  if (args["no-color"]) setColors(false);

  if (args.help) {
    console.log(HELP);
    return 0;
  }
  if (args["list-formats"]) {
    printFormats();
    return 0;
  }
  if (!args.format) {
    console.error(c("red", "Error: --format is required"));
    console.error("  Usage: npm run repurpose -- --format <format> --input <file>");
    return 1;
  }

  initRunId();

  try {
    // Coming-soon formats exit 2 even when no API key is configured
    const format = resolveRequestedFormat(args.format);
    const content = await readContent({ text: args.text, input: args.input });
    const service = createTransformationService({
      apiKey: args["api-key"],
      modelName: args.model,
    });

    const outcome = await service.run(content, format, buildParameterOverrides(args));

    if (args.json) {
      console.log(JSON.stringify({
        success: true,
        requestId: outcome.requestId,
        format: outcome.format,
        parameters: outcome.parameters.params,
        tweets: outcome.result.kind === "thread" ? outcome.result.tweets : undefined,
        text: outcome.text,
        durationMs: outcome.durationMs,
      }, null, 2));
    } else {
      console.log(outcome.text);
    }
    return 0;
  } catch (err) {
    printFailure(describeError(err), args.json ?? false);
    return exitCodeFor(err);
  }
}

const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("repurpose.ts") ||
   process.argv[1].endsWith("repurpose.js"));

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
