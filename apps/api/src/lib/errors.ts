/**
 * Error taxonomy for the report assistant. Every error that reaches the
 * orchestrator boundary carries the text shown to the user.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly userMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

/** Unreadable, encrypted or empty document. Not retryable. */
export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "❌ Sorry, I couldn't read this file. Please make sure it's a text-based PDF that isn't password protected.",
      options
    );
    this.name = "ExtractionError";
  }
}

export class EmbeddingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "❌ Sorry, I couldn't index your report right now. Please try uploading it again in a few minutes.",
      options
    );
    this.name = "EmbeddingError";
  }
}

export class ModelCallError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "❌ Sorry, something went wrong while I was thinking about that. Please try again.",
      options
    );
    this.name = "ModelCallError";
  }
}

export class StoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      "❌ Sorry, I couldn't save our conversation just now. Please try again.",
      options
    );
    this.name = "StoreError";
  }
}

/**
 * Failure reported by a remote provider (embedding or chat API). Raised by
 * the transport adapters and wrapped into the component error by callers.
 */
export class ProviderError extends Error {
  constructor(
    public readonly status: number | null,
    message: string,
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(status === null ? message : `Provider error ${status}: ${message}`, options);
    this.name = "ProviderError";
  }

  isRateLimited(): boolean {
    return this.status === 429;
  }

  isRetryable(): boolean {
    if (this.status === null) return true;
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
