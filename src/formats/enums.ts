/**
 * Format enumerations.
 *
 * The set of formats is fixed at build time. Two of them are known to the
 * system but not yet implemented; they resolve to UnsupportedFormatError
 * everywhere a template would be needed.
 */

import { z } from "zod";

/**
 * Every format identifier the system recognises.
 *
 * @readonly
 * @enum {string}
 */
export const Format = z.enum([
  "blog_post",
  "tweet_thread",
  "instagram_carousel",
  "linkedin_post",
  "email_newsletter",
]);
export type Format = z.infer<typeof Format>;

/** Formats with a template and an output contract. */
export const AvailableFormat = Format.extract([
  "blog_post",
  "tweet_thread",
  "instagram_carousel",
]);
export type AvailableFormat = z.infer<typeof AvailableFormat>;

/** Formats that are declared but not implemented yet. */
export const ComingSoonFormat = Format.extract([
  "linkedin_post",
  "email_newsletter",
]);
export type ComingSoonFormat = z.infer<typeof ComingSoonFormat>;

export const AVAILABLE_FORMATS: readonly AvailableFormat[] = AvailableFormat.options;
export const COMING_SOON_FORMATS: readonly ComingSoonFormat[] = ComingSoonFormat.options;

/** Human-readable labels, as shown by presentation layers. */
export const FORMAT_LABELS: Readonly<Record<Format, string>> = {
  blog_post: "Blog Post",
  tweet_thread: "Tweet Thread",
  instagram_carousel: "Instagram Carousel",
  linkedin_post: "LinkedIn Post",
  email_newsletter: "Email Newsletter",
};

/**
 * Suggested tones per format. Presentation layers offer these as choices;
 * any non-empty tone string is accepted by the parameter schemas.
 */
export const TONE_PRESETS: Readonly<Record<AvailableFormat, readonly string[]>> = {
  blog_post: ["informative", "casual", "professional", "humorous", "academic"],
  tweet_thread: ["engaging", "informative", "witty", "casual"],
  instagram_carousel: ["visual and inspiring", "educational", "motivational", "fun"],
};

export function isAvailableFormat(format: Format): format is AvailableFormat {
  return AvailableFormat.safeParse(format).success;
}

export function isComingSoonFormat(format: Format): format is ComingSoonFormat {
  return ComingSoonFormat.safeParse(format).success;
}
