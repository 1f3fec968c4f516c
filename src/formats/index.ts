/**
 * Format identifiers and their parameter sets.
 */

export {
  Format,
  AvailableFormat,
  ComingSoonFormat,
  AVAILABLE_FORMATS,
  COMING_SOON_FORMATS,
  FORMAT_LABELS,
  TONE_PRESETS,
  isAvailableFormat,
  isComingSoonFormat,
} from "./enums.js";

export {
  BlogPostParamsSchema,
  TweetThreadParamsSchema,
  InstagramCarouselParamsSchema,
  BLOG_LENGTH_RANGE,
  CAROUSEL_SLIDE_RANGE,
  resolveParameters,
  parseFormat,
  requireAvailable,
  type BlogPostParams,
  type TweetThreadParams,
  type InstagramCarouselParams,
  type ParameterOverrides,
  type ParameterOverridesMap,
  type ParameterSet,
} from "./parameters.js";

export {
  UnsupportedFormatError,
  InvalidParameterError,
  formatZodIssues,
  type ParameterIssue,
} from "./errors.js";
