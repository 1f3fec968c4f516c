/**
 * Template registry tests.
 *
 * Run: node --import tsx src/registry/registry.test.ts
 */

import { strict as assert } from "node:assert";

import { AVAILABLE_FORMATS, UnsupportedFormatError } from "../formats/index.js";
import { extractVariables, parseTemplate, TemplateParseError } from "../prompts/index.js";
import { TEMPLATE_DEFINITIONS, TemplateRegistry, buildTemplate } from "./registry.js";

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

const registry = TemplateRegistry.load();

const INLINE_SOURCES = {
  blog_post: "Blog for {{audience}}, {{tone}}, {{length}} words:\n{{content}}",
  tweet_thread: "Thread, {{tone}}:\n{{content}}\n{{formatInstructions}}",
  instagram_carousel: "{{numSlides}} slides, {{tone}}:\n{{content}}",
};

// ═══════════════════════════════════════════════════════════════════════════
// BUNDLED TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════

section("Bundled templates");

test("every available format resolves", () => {
  for (const format of AVAILABLE_FORMATS) {
    assert.equal(registry.resolve(format).format, format);
  }
});

test("placeholders match declared parameters exactly", () => {
  for (const format of AVAILABLE_FORMATS) {
    const template = registry.resolve(format);
    assert.deepEqual(
      extractVariables(template.parsed.source),
      [...TEMPLATE_DEFINITIONS[format].parameters].sort(),
      `placeholder mismatch for ${format}`
    );
    assert.deepEqual([...template.parameters], template.parsed.variables);
  }
});

test("template names come from their files", () => {
  assert.equal(registry.resolve("blog_post").name, "blog-post");
  assert.equal(registry.resolve("tweet_thread").name, "tweet-thread");
  assert.equal(registry.resolve("instagram_carousel").name, "instagram-carousel");
});

test("resolve is a stable lookup", () => {
  assert.equal(registry.resolve("tweet_thread"), registry.resolve("tweet_thread"));
});

test("resolved templates are frozen", () => {
  const template = registry.resolve("blog_post");
  assert.ok(Object.isFrozen(template));
  assert.ok(Object.isFrozen(template.parameters));
});

// ═══════════════════════════════════════════════════════════════════════════
// UNSUPPORTED FORMATS
// ═══════════════════════════════════════════════════════════════════════════

section("Unsupported formats");

test("coming-soon formats fail with UnsupportedFormatError", () => {
  for (const format of ["linkedin_post", "email_newsletter"]) {
    const err = expectError(() => registry.resolve(format), UnsupportedFormatError);
    assert.equal(err.format, format);
    assert.equal(err.comingSoon, true);
  }
});

test("unknown identifiers fail with UnsupportedFormatError", () => {
  const err = expectError(() => registry.resolve("podcast"), UnsupportedFormatError);
  assert.equal(err.comingSoon, false);
  assert.equal(err.message, 'Unknown format "podcast"');
});

test("labels are not identifiers", () => {
  assert.throws(() => registry.resolve("Blog Post"), UnsupportedFormatError);
});

test("list reports availability for every format", () => {
  assert.deepEqual(registry.list(), [
    { format: "blog_post", label: "Blog Post", available: true },
    { format: "tweet_thread", label: "Tweet Thread", available: true },
    { format: "instagram_carousel", label: "Instagram Carousel", available: true },
    { format: "linkedin_post", label: "LinkedIn Post", available: false },
    { format: "email_newsletter", label: "Email Newsletter", available: false },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// PARAMETER INVARIANT
// ═══════════════════════════════════════════════════════════════════════════

section("Parameter invariant");

test("in-memory sources build a registry", () => {
  const inline = TemplateRegistry.fromSources(INLINE_SOURCES);
  assert.equal(inline.resolve("instagram_carousel").parsed.source, INLINE_SOURCES.instagram_carousel);
});

test("an undeclared placeholder is rejected", () => {
  const parsed = parseTemplate("{{content}} {{tone}} {{numSlides}}", "extra");
  const err = expectError(
    () => buildTemplate("tweet_thread", parsed, ["content", "tone"]),
    TemplateParseError
  );
  assert.deepEqual(err.invalidVariables, ["numSlides"]);
  assert.equal(
    err.message,
    'Template "extra" for tweet_thread does not match its parameters: undeclared placeholder(s): numSlides'
  );
});

test("a declared but unused parameter is rejected", () => {
  const parsed = parseTemplate("{{content}} in a {{tone}} tone", "short");
  const err = expectError(
    () => buildTemplate("blog_post", parsed, TEMPLATE_DEFINITIONS.blog_post.parameters),
    TemplateParseError
  );
  assert.deepEqual(err.invalidVariables, []);
  assert.equal(
    err.message,
    'Template "short" for blog_post does not match its parameters: declared but unused parameter(s): audience, length'
  );
});

test("fromSources enforces the invariant", () => {
  assert.throws(
    () =>
      TemplateRegistry.fromSources({
        ...INLINE_SOURCES,
        tweet_thread: "Thread:\n{{content}}\n{{formatInstructions}}",
      }),
    /declared but unused parameter\(s\): tone/
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
