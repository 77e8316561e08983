/**
 * Inference types and constants.
 */

// ============================================================================
// Request / Result
// ============================================================================

/**
 * A snippet submitted for explanation.
 */
export interface AnalysisRequest {
  snippet: string;
  /** Falls back to the configured default model when omitted. */
  model?: string;
}

/**
 * A successful analysis, as cached and displayed.
 */
export interface AnalysisResult {
  response: string;
  model: string;
  latencyMs: number;
  inputTokens: number;
  outputTokens: number;
  /** True when the token counts are local estimates rather than service usage. */
  tokensEstimated: boolean;
  /** ISO-8601 completion time. */
  timestamp: string;
}

// ============================================================================
// Inference client seam
// ============================================================================

export interface GenerateParams {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface Generation {
  text: string;
  promptTokens?: number;
  completionTokens?: number;
}

/**
 * Anything that can run a prompt against a model.
 * Implementations throw AnalysisError subclasses on failure.
 */
export interface InferenceClient {
  generate(params: GenerateParams): Promise<Generation>;
  listModels(): Promise<string[]>;
}

// ============================================================================
// Constants
// ============================================================================

/** Total calls made for one analysis before giving up */
export const MAX_ATTEMPTS = 3;

/** Delay in milliseconds before the first retry; doubles afterwards */
export const BASE_DELAY_MS = 2000;

/** Upper bound of random jitter added to each backoff delay */
export const JITTER_MS = 100;

/** Lower temperature keeps explanations focused */
export const DEFAULT_TEMPERATURE = 0.1;

export const DEFAULT_MAX_TOKENS = 2048;
