/**
 * Structured output contract for tweet threads.
 *
 * The model is asked to answer with a JSON object `{ "tweets": [...] }`.
 * The response is parsed and validated against TweetThreadSchema; any
 * deviation fails the whole response. Nothing is truncated or repaired.
 */

import { z } from "zod";
import { formatZodIssues } from "../formats/index.js";
import { MalformedStructuredOutputError } from "./errors.js";

export const MAX_TWEET_LENGTH = 280;

/** Length in user-perceived characters (code points), not UTF-16 units. */
export function tweetLength(tweet: string): number {
  return [...tweet].length;
}

export const TweetSchema = z
  .string()
  .refine((tweet) => tweet.trim().length > 0, "Tweet must not be empty")
  .refine(
    (tweet) => tweetLength(tweet) <= MAX_TWEET_LENGTH,
    (tweet) => ({
      message: `Tweet is ${tweetLength(tweet)} characters; the limit is ${MAX_TWEET_LENGTH}`,
    })
  );

export const TweetThreadSchema = z.object({
  tweets: z
    .array(TweetSchema)
    .min(1, "Thread must contain at least one tweet")
    .describe(`List of concise tweets, each under ${MAX_TWEET_LENGTH} characters.`),
});

export type TweetThread = z.infer<typeof TweetThreadSchema>;

/**
 * JSON Schema shown to the model. Mirrors TweetThreadSchema.
 */
const TWEET_THREAD_JSON_SCHEMA = {
  type: "object",
  properties: {
    tweets: {
      type: "array",
      description: `List of concise tweets, each under ${MAX_TWEET_LENGTH} characters.`,
      items: { type: "string", maxLength: MAX_TWEET_LENGTH },
      minItems: 1,
    },
  },
  required: ["tweets"],
} as const;

export const TWEET_THREAD_FORMAT_INSTRUCTIONS = [
  "The output must be a JSON object that conforms to the JSON schema below.",
  "",
  'For example, for the schema {"properties": {"foo": {"type": "array", "items": {"type": "string"}}}, "required": ["foo"]}',
  'the object {"foo": ["bar", "baz"]} is well-formatted; {"properties": {"foo": ["bar", "baz"]}} is not.',
  "",
  "Here is the output schema:",
  "```json",
  JSON.stringify(TWEET_THREAD_JSON_SCHEMA),
  "```",
  "",
  "Answer with the JSON object only, keeping the tweets in thread order.",
].join("\n");

const FENCED_BLOCK_RE = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/;

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pull the JSON document out of a model response. A response that is
 * itself valid JSON is taken whole, even when a tweet contains backticks;
 * otherwise the body of its first fenced code block is used.
 */
export function extractJsonText(response: string): string {
  const whole = response.trim();
  if (isJson(whole)) return whole;

  const fenced = FENCED_BLOCK_RE.exec(response);
  return fenced ? fenced[1].trim() : whole;
}

/**
 * Parse a model response into an ordered list of tweets.
 *
 * @throws MalformedStructuredOutputError on invalid JSON, a missing or
 *         mistyped `tweets` field, an empty list, a blank tweet, or an
 *         over-long tweet
 */
export function parseTweetThread(response: string): string[] {
  let data: unknown;
  try {
    data = JSON.parse(extractJsonText(response));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedStructuredOutputError("tweet_thread", response, [
      { path: [], message: `Response is not valid JSON (${reason})`, code: "invalid_json" },
    ]);
  }

  const result = TweetThreadSchema.safeParse(data);
  if (!result.success) {
    throw new MalformedStructuredOutputError(
      "tweet_thread",
      response,
      formatZodIssues(result.error.issues)
    );
  }

  return result.data.tweets;
}
