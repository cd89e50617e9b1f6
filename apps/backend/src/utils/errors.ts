export class ApiError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.details = details;
  }
}

export type PromptValidationCode = "EMPTY_PROMPT" | "PROMPT_TOO_LONG";

export class PromptValidationError extends ApiError {
  readonly code: PromptValidationCode;

  constructor(code: PromptValidationCode, message: string) {
    super(400, message, { code });
    this.name = "PromptValidationError";
    this.code = code;
  }
}

export class RateLimitExceededError extends ApiError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(429, "Rate limit exceeded. Please wait a minute before generating another image.", {
      retryAfterMs
    });
    this.name = "RateLimitExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class ImageTooLargeError extends ApiError {
  constructor(width: number, height: number, maxDimension: number) {
    super(422, "Image dimensions are too large.", { width, height, maxDimension });
    this.name = "ImageTooLargeError";
  }
}

export class RecordNotFoundError extends ApiError {
  constructor(recordId: number) {
    super(404, "Generation not found", { recordId });
    this.name = "RecordNotFoundError";
  }
}

/**
 * Failure reported by the remote inference service. `statusCode` is the
 * upstream HTTP status, or 0 when no response was received at all.
 */
export class GenerationError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "GenerationError";
    this.statusCode = statusCode;
  }
}
