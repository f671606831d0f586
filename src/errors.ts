/**
 * Error handling for in-memory reference stores
 *
 * Every failure raised by this library is a RefCacheError carrying a
 * machine-readable code next to the human-readable message.
 */

/**
 * Failure codes used across the library
 */
export type ErrorCode = "INVALID_ARGUMENT" | "NOT_FOUND" | "FAILED_PRECONDITION" | "UNKNOWN";

/**
 * Base error class for all refcache errors
 */
export class RefCacheError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: string
  ) {
    super(message);
    this.name = "RefCacheError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }

  /**
   * Wrap anything thrown by a reference operation
   */
  static from(error: unknown): RefCacheError {
    if (error instanceof RefCacheError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new RefCacheError(message, "UNKNOWN");
  }
}

/**
 * Malformed construction input or an unanswerable query
 */
export class InvalidArgumentError extends RefCacheError {
  constructor(message: string, context?: string) {
    super(message, "INVALID_ARGUMENT", context);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Lookup of a contig or cached sequence that does not exist
 */
export class NotFoundError extends RefCacheError {
  constructor(
    message: string,
    public readonly referenceName: string,
    context?: string
  ) {
    super(message, "NOT_FOUND", context);
    this.name = "NotFoundError";
  }
}

/**
 * Operation on a reference or iterator that has been torn down
 */
export class LivenessError extends RefCacheError {
  constructor(message: string) {
    super(message, "FAILED_PRECONDITION");
    this.name = "LivenessError";
  }
}

const ERROR_SUGGESTIONS: Record<ErrorCode, string | undefined> = {
  INVALID_ARGUMENT: "Check that regions are 0-based half-open and match their bases",
  NOT_FOUND: "Check the contig catalog for the reference name",
  FAILED_PRECONDITION: "Create a new reference and iterator instead of reusing a closed one",
  UNKNOWN: undefined,
};

/**
 * Get a short hint for resolving an error
 */
export function getErrorSuggestion(error: RefCacheError): string | undefined {
  return ERROR_SUGGESTIONS[error.code];
}
