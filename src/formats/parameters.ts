/**
 * Per-format parameter sets.
 *
 * Each format carries only the parameters that are legal for it. Schemas
 * are strict (unknown keys are rejected) and hold the documented defaults,
 * so a caller may omit any parameter entirely.
 *
 * Out-of-range values are rejected rather than clamped: the bounds are the
 * ranges a human can pick in the UI, and a value outside them is a caller bug.
 */

import { z } from "zod";
import {
  Format,
  isComingSoonFormat,
  type AvailableFormat,
} from "./enums.js";
import {
  InvalidParameterError,
  UnsupportedFormatError,
  formatZodIssues,
} from "./errors.js";

const Tone = z.string().trim().min(1, "Tone must not be empty");

export const BLOG_LENGTH_RANGE = { min: 100, max: 1000 } as const;
export const CAROUSEL_SLIDE_RANGE = { min: 3, max: 10 } as const;

export const BlogPostParamsSchema = z
  .object({
    audience: z
      .string()
      .trim()
      .min(1, "Audience must not be empty")
      .default("general audience")
      .describe("Who the blog post is written for"),
    tone: Tone.default("informative"),
    length: z
      .number()
      .int()
      .min(BLOG_LENGTH_RANGE.min)
      .max(BLOG_LENGTH_RANGE.max)
      .default(500)
      .describe("Approximate length in words"),
  })
  .strict();

export const TweetThreadParamsSchema = z
  .object({
    tone: Tone.default("engaging"),
  })
  .strict();

export const InstagramCarouselParamsSchema = z
  .object({
    tone: Tone.default("visual and inspiring"),
    numSlides: z
      .number()
      .int()
      .min(CAROUSEL_SLIDE_RANGE.min)
      .max(CAROUSEL_SLIDE_RANGE.max)
      .default(5)
      .describe("Number of carousel slides"),
  })
  .strict();

export type BlogPostParams = z.output<typeof BlogPostParamsSchema>;
export type TweetThreadParams = z.output<typeof TweetThreadParamsSchema>;
export type InstagramCarouselParams = z.output<typeof InstagramCarouselParamsSchema>;

/**
 * What a caller may pass for each format. Every field is optional;
 * coming-soon formats take nothing.
 */
export interface ParameterOverridesMap {
  blog_post: z.input<typeof BlogPostParamsSchema>;
  tweet_thread: z.input<typeof TweetThreadParamsSchema>;
  instagram_carousel: z.input<typeof InstagramCarouselParamsSchema>;
  linkedin_post: Record<string, never>;
  email_newsletter: Record<string, never>;
}

export type ParameterOverrides<F extends Format> = ParameterOverridesMap[F];

/**
 * Fully resolved parameters, tagged by format.
 */
export type ParameterSet =
  | { format: "blog_post"; params: BlogPostParams }
  | { format: "tweet_thread"; params: TweetThreadParams }
  | { format: "instagram_carousel"; params: InstagramCarouselParams };

/**
 * Drop keys whose value is `undefined`: an explicitly undefined parameter
 * means "use the default", same as an omitted one.
 */
function withoutUndefined(value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined)
  );
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  format: AvailableFormat,
  overrides: unknown
): T {
  const result = schema.safeParse(withoutUndefined(overrides ?? {}));
  if (!result.success) {
    throw new InvalidParameterError(format, formatZodIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Merge caller overrides over the format's defaults and validate the result.
 *
 * @throws InvalidParameterError  on wrong types, out-of-range values, or
 *                                keys that are not legal for the format
 */
export function resolveParameters(
  format: AvailableFormat,
  overrides: unknown = {}
): ParameterSet {
  switch (format) {
    case "blog_post":
      return { format, params: parseWith(BlogPostParamsSchema, format, overrides) };
    case "tweet_thread":
      return { format, params: parseWith(TweetThreadParamsSchema, format, overrides) };
    case "instagram_carousel":
      return {
        format,
        params: parseWith(InstagramCarouselParamsSchema, format, overrides),
      };
  }
}

const FORMAT_ALIASES: Readonly<Record<string, Format>> = {
  blog: "blog_post",
  tweets: "tweet_thread",
  thread: "tweet_thread",
  twitter_thread: "tweet_thread",
  carousel: "instagram_carousel",
  instagram: "instagram_carousel",
  linkedin: "linkedin_post",
  newsletter: "email_newsletter",
  email: "email_newsletter",
};

/**
 * Parse a format identifier or display label.
 *
 * "Blog Post", "blog-post", "BLOG_POST" and "blog" all resolve to
 * `blog_post`. A trailing "(Coming Soon)" is ignored.
 *
 * @throws UnsupportedFormatError if the input names no known format
 */
export function parseFormat(input: string): Format {
  const normalized = input
    .trim()
    .toLowerCase()
    .replace(/\(coming soon\)/g, "")
    .trim()
    .replace(/[\s-]+/g, "_");

  const direct = Format.safeParse(normalized);
  if (direct.success) return direct.data;

  const alias = FORMAT_ALIASES[normalized];
  if (alias !== undefined) return alias;

  throw new UnsupportedFormatError(input, false);
}

/**
 * Narrow a format to one that can be generated.
 *
 * @throws UnsupportedFormatError for coming-soon formats
 */
export function requireAvailable(format: Format): AvailableFormat {
  if (isComingSoonFormat(format)) {
    throw new UnsupportedFormatError(format, true);
  }
  return format;
}
