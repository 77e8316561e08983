/**
 * Inference integration for Snippet Lens.
 *
 * Talks to a local Ollama server through its OpenAI-compatible API to
 * explain code snippets.
 *
 * - Transient failures (connection refused, timeouts, 429, 5xx) are retried
 *   with exponential backoff; everything else surfaces at once.
 * - Calls are throttled per model by a fixed-window RateLimiter.
 * - Failures are AnalysisError subclasses carrying an HTTP status code.
 */

export type {
  AnalysisRequest,
  AnalysisResult,
  GenerateParams,
  Generation,
  InferenceClient,
} from "./types";

export { MAX_ATTEMPTS, BASE_DELAY_MS, DEFAULT_TEMPERATURE, DEFAULT_MAX_TOKENS } from "./types";

export {
  AnalysisError,
  ServiceUnavailableError,
  InferenceTimeoutError,
  InvalidResponseError,
  RateLimitExceededError,
  ModelNotFoundError,
  InferenceRequestError,
  EmptySnippetError,
} from "./errors";
export type { AnalysisErrorCode } from "./errors";

export { analyzeSnippet, getAvailableModels } from "./analysis";
export type { AnalyzeOptions } from "./analysis";
export { OllamaClient, createOpenAIClient, toAnalysisError } from "./client";
export type { OllamaClientOptions } from "./client";
export { RateLimiter } from "./rateLimiter";
export type { RateLimiterOptions } from "./rateLimiter";
export { withRetry, isTransientError, backoffDelay } from "./retry";
export type { RetryOptions } from "./retry";
export { buildAnalysisPrompt } from "./prompts";
export { estimateTokenCount, truncate } from "./utils";
