/**
 * Base error for remote classification failures. These errors are caught
 * inside the remote classifier and turned into rule-based fallbacks.
 */
export class ClassifierError extends Error {
  constructor(
    message: string,
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ClassifierRequestError extends ClassifierError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    isRetryable = false,
    cause?: Error,
  ) {
    super(message, isRetryable, cause);
  }
}

/**
 * The model answered, but not with a usable classification array.
 */
export class ClassifierResponseError extends ClassifierError {
  constructor(message: string, cause?: Error) {
    super(`Malformed classification response: ${message}`, false, cause);
  }
}
