/**
 * Error taxonomy for snippet analysis.
 *
 * `transient` marks failures worth retrying; `statusCode` is what the HTTP
 * layer answers with.
 */

export type AnalysisErrorCode =
  | "SERVICE_UNAVAILABLE"
  | "TIMEOUT"
  | "INVALID_RESPONSE"
  | "RATE_LIMIT_EXCEEDED"
  | "MODEL_NOT_FOUND"
  | "REQUEST_REJECTED"
  | "EMPTY_SNIPPET";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly statusCode: number;
  readonly transient: boolean;

  constructor(message: string, code: AnalysisErrorCode, statusCode: number, transient = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.transient = transient;
  }
}

/**
 * The inference service could not be reached or answered 429/5xx.
 */
export class ServiceUnavailableError extends AnalysisError {
  constructor(
    message = "Could not connect to the inference service. Please make sure Ollama is running locally.",
    code: AnalysisErrorCode = "SERVICE_UNAVAILABLE",
    statusCode = 503
  ) {
    super(message, code, statusCode, true);
  }
}

export class InferenceTimeoutError extends ServiceUnavailableError {
  constructor(message = "Request timed out. The model may be overloaded or unavailable.") {
    super(message, "TIMEOUT", 504);
  }
}

/**
 * The service answered, but not with usable text.
 */
export class InvalidResponseError extends AnalysisError {
  constructor(message = "The inference service returned no analysis.") {
    super(message, "INVALID_RESPONSE", 502);
  }
}

export class RateLimitExceededError extends AnalysisError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super("Rate limit exceeded. Please try again later.", "RATE_LIMIT_EXCEEDED", 429);
    this.retryAfterMs = retryAfterMs;
  }
}

export class ModelNotFoundError extends AnalysisError {
  constructor(model: string) {
    super(`Model '${model}' not found. Please select another model.`, "MODEL_NOT_FOUND", 404);
  }
}

/**
 * The service refused the request for a reason retrying will not fix.
 */
export class InferenceRequestError extends AnalysisError {
  constructor(message: string) {
    super(message, "REQUEST_REJECTED", 502);
  }
}

export class EmptySnippetError extends AnalysisError {
  constructor() {
    super("Please enter some code to analyze.", "EMPTY_SNIPPET", 400);
  }
}
