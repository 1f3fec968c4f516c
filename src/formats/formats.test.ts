/**
 * Format and parameter tests.
 *
 * Run: node --import tsx src/formats/formats.test.ts
 */

import { strict as assert } from "node:assert";

import {
  AVAILABLE_FORMATS,
  COMING_SOON_FORMATS,
  FORMAT_LABELS,
  InvalidParameterError,
  UnsupportedFormatError,
  isAvailableFormat,
  parseFormat,
  requireAvailable,
  resolveParameters,
} from "./index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// FORMATS
// ═══════════════════════════════════════════════════════════════════════════

section("Format identifiers");

test("three formats are available and two are coming soon", () => {
  assert.deepEqual([...AVAILABLE_FORMATS], ["blog_post", "tweet_thread", "instagram_carousel"]);
  assert.deepEqual([...COMING_SOON_FORMATS], ["linkedin_post", "email_newsletter"]);
  assert.equal(isAvailableFormat("linkedin_post"), false);
  assert.equal(isAvailableFormat("tweet_thread"), true);
});

test("parseFormat accepts identifiers and labels", () => {
  assert.equal(parseFormat("tweet_thread"), "tweet_thread");
  assert.equal(parseFormat("Blog Post"), "blog_post");
  assert.equal(parseFormat("instagram-carousel"), "instagram_carousel");
  assert.equal(parseFormat("  EMAIL_NEWSLETTER "), "email_newsletter");
});

test("parseFormat ignores a coming-soon suffix", () => {
  assert.equal(parseFormat("LinkedIn Post (Coming Soon)"), "linkedin_post");
});

test("parseFormat accepts short aliases", () => {
  assert.equal(parseFormat("blog"), "blog_post");
  assert.equal(parseFormat("thread"), "tweet_thread");
  assert.equal(parseFormat("carousel"), "instagram_carousel");
});

test("every label parses back to its format", () => {
  for (const [format, label] of Object.entries(FORMAT_LABELS)) {
    assert.equal(parseFormat(label), format);
  }
});

test("parseFormat rejects unknown input", () => {
  const err = expectError(() => parseFormat("podcast script"), UnsupportedFormatError);
  assert.equal(err.format, "podcast script");
  assert.equal(err.comingSoon, false);
});

test("requireAvailable rejects coming-soon formats", () => {
  const err = expectError(() => requireAvailable("email_newsletter"), UnsupportedFormatError);
  assert.equal(err.comingSoon, true);
  assert.equal(requireAvailable("blog_post"), "blog_post");
});

// ═══════════════════════════════════════════════════════════════════════════
// PARAMETERS
// ═══════════════════════════════════════════════════════════════════════════

section("Parameter defaults");

test("blog post defaults", () => {
  assert.deepEqual(resolveParameters("blog_post"), {
    format: "blog_post",
    params: { audience: "general audience", tone: "informative", length: 500 },
  });
});

test("tweet thread defaults", () => {
  assert.deepEqual(resolveParameters("tweet_thread", {}), {
    format: "tweet_thread",
    params: { tone: "engaging" },
  });
});

test("instagram carousel defaults", () => {
  assert.deepEqual(resolveParameters("instagram_carousel"), {
    format: "instagram_carousel",
    params: { tone: "visual and inspiring", numSlides: 5 },
  });
});

section("Parameter overrides");

test("explicit values win over defaults", () => {
  const resolved = resolveParameters("blog_post", { tone: "professional", length: 400 });
  assert.deepEqual(resolved.params, {
    audience: "general audience",
    tone: "professional",
    length: 400,
  });
});

test("undefined values fall back to defaults", () => {
  const resolved = resolveParameters("instagram_carousel", { tone: undefined, numSlides: 4 });
  assert.deepEqual(resolved.params, { tone: "visual and inspiring", numSlides: 4 });
});

test("tones outside the presets are accepted", () => {
  const resolved = resolveParameters("tweet_thread", { tone: "informative and engaging" });
  assert.deepEqual(resolved.params, { tone: "informative and engaging" });
});

test("tone whitespace is trimmed", () => {
  const resolved = resolveParameters("tweet_thread", { tone: "  witty " });
  assert.deepEqual(resolved.params, { tone: "witty" });
});

section("Parameter validation");

test("blog length outside 100-1000 is rejected", () => {
  assert.throws(() => resolveParameters("blog_post", { length: 50 }), InvalidParameterError);
  assert.throws(() => resolveParameters("blog_post", { length: 1001 }), InvalidParameterError);
  assert.doesNotThrow(() => resolveParameters("blog_post", { length: 100 }));
  assert.doesNotThrow(() => resolveParameters("blog_post", { length: 1000 }));
});

test("slide count outside 3-10 is rejected", () => {
  const err = expectError(() => resolveParameters("instagram_carousel", { numSlides: 12 }), InvalidParameterError);
  assert.equal(err.format, "instagram_carousel");
  assert.equal(err.issues.length, 1);
  assert.deepEqual(err.issues[0]?.path, ["numSlides"]);
  assert.equal(err.issues[0]?.code, "too_big");
});

test("non-integer lengths are rejected", () => {
  assert.throws(() => resolveParameters("blog_post", { length: 450.5 }), InvalidParameterError);
  assert.throws(() => resolveParameters("blog_post", { length: Number("abc") }), InvalidParameterError);
});

test("empty tone is rejected", () => {
  const err = expectError(() => resolveParameters("tweet_thread", { tone: "   " }), InvalidParameterError);
  assert.equal(err.issues[0]?.message, "Tone must not be empty");
});

test("parameters of another format are rejected", () => {
  const err = expectError(() => resolveParameters("tweet_thread", { numSlides: 4 }), InvalidParameterError);
  assert.equal(err.issues[0]?.code, "unrecognized_keys");
});

test("every issue is reported at once", () => {
  const err = expectError(() => resolveParameters("blog_post", { audience: "", length: 5 }), InvalidParameterError);
  assert.deepEqual(
    err.issues.map((issue) => issue.path.join(".")).sort(),
    ["audience", "length"]
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
