/**
 * Model backend boundary.
 *
 * A backend turns one prompt into one text completion. Everything about the
 * remote service (credentials, timeouts, transport) stays behind this
 * interface; callers treat its failures as opaque.
 */

export interface ModelBackend {
  /** Model identifier, for logging */
  readonly modelName: string;
  /** Send a prompt, resolve with the model's full text completion. */
  complete(prompt: string): Promise<string>;
}

export class MissingCredentialError extends Error {
  constructor(
    /** Environment variable the credential is read from */
    public readonly variable: string
  ) {
    super(
      `${variable} is not set. Provide an API key explicitly or set ${variable} ` +
        `in the environment (a .env file is loaded automatically).`
    );
    this.name = "MissingCredentialError";
  }
}

/**
 * Any failure raised by a backend call. The original error is kept as
 * `cause` and its message is carried over unchanged.
 */
export class BackendError extends Error {
  constructor(
    public readonly modelName: string,
    cause: unknown
  ) {
    super(
      `Model backend "${modelName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "BackendError";
  }
}
