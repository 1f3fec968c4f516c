/**
 * Failure descriptors for presentation layers.
 *
 * The core throws typed errors; a UI or CLI turns them into a
 * `{ kind, message, details }` record with describeError().
 */

import { ConfigError } from "../config/index.js";
import {
  InvalidParameterError,
  UnsupportedFormatError,
  type ParameterIssue,
} from "../formats/index.js";
import {
  TemplateLoadError,
  TemplateParseError,
  TemplateRenderError,
} from "../prompts/index.js";
import { MalformedStructuredOutputError } from "../contracts/index.js";
import { BackendError, MissingCredentialError } from "../backend/index.js";

export class EmptyContentError extends Error {
  constructor() {
    super("Content is empty. Provide some text to repurpose.");
    this.name = "EmptyContentError";
  }
}

/** The content to transform could not be read. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export type FailureKind =
  | "MissingCredential"
  | "EmptyContent"
  | "UnsupportedFormat"
  | "InvalidParameter"
  | "TemplateRender"
  | "MalformedStructuredOutput"
  | "Backend"
  | "Configuration"
  | "Input"
  | "Unknown";

export interface FailureDescriptor {
  kind: FailureKind;
  message: string;
  details?: string[];
}

function issueLines(issues: ParameterIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Map any thrown value to a failure descriptor.
 */
export function describeError(err: unknown): FailureDescriptor {
  if (err instanceof MissingCredentialError) {
    return { kind: "MissingCredential", message: err.message };
  }
  if (err instanceof EmptyContentError) {
    return { kind: "EmptyContent", message: err.message };
  }
  if (err instanceof InputError) {
    return { kind: "Input", message: err.message };
  }
  if (err instanceof UnsupportedFormatError) {
    return { kind: "UnsupportedFormat", message: err.message };
  }
  if (err instanceof InvalidParameterError) {
    return {
      kind: "InvalidParameter",
      message: `Invalid parameters for format "${err.format}"`,
      details: issueLines(err.issues),
    };
  }
  if (err instanceof TemplateRenderError) {
    return {
      kind: "TemplateRender",
      message: err.message,
      details: [
        ...err.missingVariables.map((v) => `missing: ${v}`),
        ...err.unusedVariables.map((v) => `unused: ${v}`),
      ],
    };
  }
  if (err instanceof MalformedStructuredOutputError) {
    return {
      kind: "MalformedStructuredOutput",
      message: `The model's answer for "${err.format}" could not be parsed`,
      details: issueLines(err.issues),
    };
  }
  if (err instanceof BackendError) {
    return { kind: "Backend", message: err.message };
  }
  if (
    err instanceof ConfigError ||
    err instanceof TemplateLoadError ||
    err instanceof TemplateParseError
  ) {
    return { kind: "Configuration", message: err.message };
  }
  return {
    kind: "Unknown",
    message: err instanceof Error ? err.message : String(err),
  };
}
