/**
 * Output contracts: the expected response shape per format.
 */

export {
  validate,
  toDisplayText,
  getFormatInstructions,
  OUTPUT_SHAPES,
  THREAD_SEPARATOR,
  type FinalResult,
  type OutputShape,
} from "./output-contract.js";

export {
  parseTweetThread,
  extractJsonText,
  tweetLength,
  TweetThreadSchema,
  MAX_TWEET_LENGTH,
  TWEET_THREAD_FORMAT_INSTRUCTIONS,
  type TweetThread,
} from "./tweet-thread.js";

export { MalformedStructuredOutputError } from "./errors.js";
