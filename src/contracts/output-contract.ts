/**
 * Output contracts.
 *
 * Each available format declares the shape of its model response:
 *
 *   blog_post, instagram_carousel  free text; the response is the result
 *   tweet_thread                   JSON `{ "tweets": string[] }`, validated
 *
 * Validation is independent of prompt construction and of the backend, so
 * contracts can be exercised against literal response fixtures.
 */

import type { AvailableFormat } from "../formats/index.js";
import {
  parseTweetThread,
  TWEET_THREAD_FORMAT_INSTRUCTIONS,
} from "./tweet-thread.js";

export type OutputShape = "text" | "thread";

export type FinalResult =
  | { kind: "text"; text: string }
  | { kind: "thread"; tweets: string[] };

/** Separator placed between tweets when a thread is shown as one text. */
export const THREAD_SEPARATOR = "\n\n";

export const OUTPUT_SHAPES: Readonly<Record<AvailableFormat, OutputShape>> = {
  blog_post: "text",
  tweet_thread: "thread",
  instagram_carousel: "text",
};

/**
 * Validate a model response against the format's contract.
 *
 * @throws MalformedStructuredOutputError for a structured format whose
 *         response does not match its schema
 */
export function validate(format: AvailableFormat, response: string): FinalResult {
  switch (OUTPUT_SHAPES[format]) {
    case "text":
      return { kind: "text", text: response };
    case "thread":
      return { kind: "thread", tweets: parseTweetThread(response) };
  }
}

/**
 * Render a result as a single string for display.
 */
export function toDisplayText(result: FinalResult): string {
  switch (result.kind) {
    case "text":
      return result.text;
    case "thread":
      return result.tweets.join(THREAD_SEPARATOR);
  }
}

/**
 * The response-shape directive a template embeds via
 * `{{formatInstructions}}`; empty for free-text formats.
 */
export function getFormatInstructions(format: AvailableFormat): string {
  return OUTPUT_SHAPES[format] === "thread" ? TWEET_THREAD_FORMAT_INSTRUCTIONS : "";
}
