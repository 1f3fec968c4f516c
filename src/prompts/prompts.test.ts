/**
 * Prompt template system tests.
 *
 * Run: node --import tsx src/prompts/prompts.test.ts
 *
 * Tests cover:
 *   1. Template parsing — variable extraction and validation
 *   2. Context building — from resolved parameter sets
 *   3. Rendering — substitution, missing vars, unused vars
 *   4. Loader — disk-based template loading and caching
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { resolveParameters } from "../formats/index.js";
import { buildPromptContext } from "./context.js";
import {
  extractVariables,
  getValidVariables,
  isValidVariable,
  parseTemplate,
  TemplateParseError,
} from "./template.js";
import { renderPrompt, TemplateRenderError } from "./renderer.js";
import { PromptTemplateLoader, TemplateLoadError } from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function expectError<T extends Error>(
  fn: () => unknown,
  ErrorClass: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (err) {
    if (err instanceof ErrorClass) return err;
    throw new Error(`Expected ${ErrorClass.name}, got: ${String(err)}`);
  }
  throw new Error(`Expected ${ErrorClass.name} to be thrown`);
}

const LOADER_DIR = join(tmpdir(), `repurposer-prompts-test-${process.pid}`);

function setupLoaderDir(): void {
  rmSync(LOADER_DIR, { recursive: true, force: true });
  mkdirSync(LOADER_DIR, { recursive: true });
  writeFileSync(join(LOADER_DIR, "summary.md"), "Summarize in a {{tone}} tone:\n{{content}}\n");
  writeFileSync(join(LOADER_DIR, "broken.md"), "Write about {{topic}}");
  writeFileSync(join(LOADER_DIR, "notes.json"), "{}");
}

function cleanupLoaderDir(): void {
  rmSync(LOADER_DIR, { recursive: true, force: true });
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Template parsing");

test("extractVariables deduplicates and sorts", () => {
  assert.deepEqual(
    extractVariables("{{tone}} then {{ content }} then {{tone}}"),
    ["content", "tone"]
  );
});

test("extractVariables ignores single braces", () => {
  assert.deepEqual(extractVariables('{"tweets": ["{tone}"]}'), []);
});

test("valid variable vocabulary", () => {
  assert.deepEqual(getValidVariables(), [
    "audience",
    "content",
    "formatInstructions",
    "length",
    "numSlides",
    "tone",
  ]);
  assert.equal(isValidVariable("numSlides"), true);
  assert.equal(isValidVariable("num_slides"), false);
});

test("parseTemplate keeps source and name", () => {
  const parsed = parseTemplate("Tone: {{tone}}\n{{content}}", "demo");
  assert.equal(parsed.name, "demo");
  assert.equal(parsed.source, "Tone: {{tone}}\n{{content}}");
  assert.deepEqual(parsed.variables, ["content", "tone"]);
});

test("parseTemplate rejects unknown variables", () => {
  const err = expectError(
    () => parseTemplate("{{content}} for {{topic}} and {{reader}}", "bad"),
    TemplateParseError
  );
  assert.equal(err.templateName, "bad");
  assert.deepEqual(err.invalidVariables, ["reader", "topic"]);
});

test("parseTemplate rejects a template without placeholders", () => {
  const err = expectError(() => parseTemplate("Just text."), TemplateParseError);
  assert.equal(err.message, 'Template "(anonymous)" contains no placeholders');
});

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

section("Context building");

test("blog post context stringifies the length", () => {
  const context = buildPromptContext({
    content: "Original text",
    parameters: resolveParameters("blog_post"),
  });
  assert.deepEqual(context, {
    content: "Original text",
    audience: "general audience",
    tone: "informative",
    length: "500",
  });
});

test("tweet thread context carries the format instructions", () => {
  const context = buildPromptContext({
    content: "Original text",
    parameters: resolveParameters("tweet_thread", { tone: "witty" }),
    formatInstructions: "Answer in JSON.",
  });
  assert.deepEqual(context, {
    content: "Original text",
    tone: "witty",
    formatInstructions: "Answer in JSON.",
  });
});

test("carousel context ignores format instructions", () => {
  const context = buildPromptContext({
    content: "Original text",
    parameters: resolveParameters("instagram_carousel", { numSlides: 7 }),
    formatInstructions: "",
  });
  assert.deepEqual(context, {
    content: "Original text",
    tone: "visual and inspiring",
    numSlides: "7",
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

const SIMPLE = parseTemplate("Tone: {{tone}}\n{{content}}", "simple");

test("substitutes every placeholder", () => {
  assert.equal(
    renderPrompt(SIMPLE, { tone: "casual", content: "Hello" }),
    "Tone: casual\nHello"
  );
});

test("repeated placeholders render the same value", () => {
  const template = parseTemplate("{{tone}}/{{tone}}: {{content}}");
  assert.equal(renderPrompt(template, { tone: "fun", content: "x" }), "fun/fun: x");
});

test("missing values fail with TemplateRenderError", () => {
  const err = expectError(() => renderPrompt(SIMPLE, { tone: "casual" }), TemplateRenderError);
  assert.equal(err.templateName, "simple");
  assert.deepEqual(err.missingVariables, ["content"]);
  assert.deepEqual(err.unusedVariables, []);
  assert.equal(
    err.message,
    'Cannot render template "simple": context is missing value(s) for: content'
  );
});

test("strict mode rejects unused context variables", () => {
  const err = expectError(
    () => renderPrompt(SIMPLE, { tone: "casual", content: "Hi", audience: "devs" }),
    TemplateRenderError
  );
  assert.deepEqual(err.missingVariables, []);
  assert.deepEqual(err.unusedVariables, ["audience"]);
});

test("non-strict mode allows unused context variables", () => {
  assert.equal(
    renderPrompt(SIMPLE, { tone: "casual", content: "Hi", audience: "devs" }, { strict: false }),
    "Tone: casual\nHi"
  );
});

test("placeholders inside values are not expanded", () => {
  assert.equal(
    renderPrompt(SIMPLE, { tone: "casual", content: "Use {{tone}} here" }),
    "Tone: casual\nUse {{tone}} here"
  );
});

test("replacement patterns inside values are kept literally", () => {
  assert.equal(
    renderPrompt(SIMPLE, { tone: "$&", content: "costs $1" }),
    "Tone: $&\ncosts $1"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════

section("Loader");

setupLoaderDir();

test("loads and parses a template file", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  const template = loader.load("summary.md");
  assert.equal(template.name, "summary");
  assert.deepEqual(template.variables, ["content", "tone"]);
});

test("caches parsed templates", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  assert.equal(loader.load("summary.md"), loader.load("summary.md"));
});

test("rejects a missing file", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  const err = expectError(() => loader.load("absent.md"), TemplateLoadError);
  assert.equal(err.filePath, join(LOADER_DIR, "absent.md"));
});

test("rejects unsupported extensions", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  assert.throws(() => loader.load("notes.json"), /Unsupported template extension ".json"/);
});

test("surfaces parse errors from template files", () => {
  const loader = new PromptTemplateLoader(LOADER_DIR);
  assert.throws(() => loader.load("broken.md"), TemplateParseError);
});

test("rejects a missing directory", () => {
  assert.throws(
    () => new PromptTemplateLoader(join(LOADER_DIR, "nope")),
    TemplateLoadError
  );
});

test("default loader reads the bundled templates", () => {
  const loader = new PromptTemplateLoader();
  assert.deepEqual(loader.load("blog-post.md").variables, [
    "audience",
    "content",
    "length",
    "tone",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

cleanupLoaderDir();

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
