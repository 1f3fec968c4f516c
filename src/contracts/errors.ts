/**
 * Output contract errors.
 */

import type { ParameterIssue } from "../formats/index.js";

export class MalformedStructuredOutputError extends Error {
  constructor(
    public readonly format: string,
    /** The model response exactly as received */
    public readonly rawResponse: string,
    public readonly issues: ParameterIssue[]
  ) {
    super(
      `Model response for "${format}" does not match the expected structure: ` +
        issues
          .map((issue) => {
            const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
            return `${path}: ${issue.message}`;
          })
          .join("; ")
    );
    this.name = "MalformedStructuredOutputError";
  }
}
