/**
 * Errors raised while resolving a format or its parameters.
 */

import type { ZodIssue } from "zod";

export class UnsupportedFormatError extends Error {
  constructor(
    /** The format as the caller supplied it */
    public readonly format: string,
    /** True when the format is known but not implemented yet */
    public readonly comingSoon: boolean,
    message?: string
  ) {
    super(
      message ??
        (comingSoon
          ? `Format "${format}" is coming soon and cannot be generated yet`
          : `Unknown format "${format}"`)
    );
    this.name = "UnsupportedFormatError";
  }
}

/**
 * Individual parameter validation issue.
 */
export interface ParameterIssue {
  /** Path to the invalid parameter */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

export class InvalidParameterError extends Error {
  constructor(
    public readonly format: string,
    public readonly issues: ParameterIssue[]
  ) {
    super(
      `Invalid parameters for format "${format}": ` +
        issues
          .map((issue) => {
            const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
            return `${path}: ${issue.message}`;
          })
          .join("; ")
    );
    this.name = "InvalidParameterError";
  }
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: ZodIssue[]): ParameterIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}
