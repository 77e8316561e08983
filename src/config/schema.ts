/**
 * Configuration schema types for .snippetlens.yml files.
 *
 * Every section is optional; missing fields fall back to the defaults below.
 */

/**
 * Inference request options.
 */
export interface SnippetLensLlmConfig {
  /**
   * Model used when a request does not name one.
   * Default: DEFAULT_MODEL env var, else "codellama"
   */
  default_model?: string;

  /**
   * Sampling temperature (0.0 - 2.0).
   * Default: 0.1
   */
  temperature?: number;

  /**
   * Maximum tokens the model may generate.
   * Default: 2048
   */
  max_tokens?: number;

  /**
   * Per-request timeout in milliseconds.
   * Default: 60000
   */
  timeout_ms?: number;

  /**
   * Timeout for listing the available models, in milliseconds.
   * Default: 5000
   */
  models_timeout_ms?: number;
}

/**
 * Retry behaviour for transient inference failures.
 */
export interface SnippetLensRetryConfig {
  /**
   * Total number of calls made before giving up.
   * Default: 3
   */
  max_attempts?: number;

  /**
   * Delay before the first retry; doubles on each further retry.
   * Default: 2000
   */
  delay_ms?: number;
}

/**
 * Inference rate limiting, applied per model.
 */
export interface SnippetLensRateLimitConfig {
  /**
   * Calls admitted per window.
   * Default: 3
   */
  max_calls?: number;

  /**
   * Window length in milliseconds.
   * Default: 5000
   */
  period_ms?: number;

  /**
   * Longest a request may wait for the window to reset before it is rejected.
   * 0 rejects immediately.
   * Default: 30000
   */
  max_wait_ms?: number;
}

export interface SnippetLensHistoryConfig {
  /**
   * Oldest entries are dropped past this count.
   * Default: 100
   */
  max_entries?: number;
}

export interface SnippetLensServerConfig {
  /**
   * HTTP requests admitted per client per minute.
   * Default: 60
   */
  requests_per_minute?: number;
}

/**
 * Root configuration structure for .snippetlens.yml.
 */
export interface SnippetLensConfig {
  version?: number;
  llm?: SnippetLensLlmConfig;
  retry?: SnippetLensRetryConfig;
  rate_limit?: SnippetLensRateLimitConfig;
  history?: SnippetLensHistoryConfig;
  server?: SnippetLensServerConfig;
}

export type RequiredLlmConfig = Required<SnippetLensLlmConfig>;
export type RequiredRetryConfig = Required<SnippetLensRetryConfig>;
export type RequiredRateLimitConfig = Required<SnippetLensRateLimitConfig>;
export type RequiredHistoryConfig = Required<SnippetLensHistoryConfig>;
export type RequiredServerConfig = Required<SnippetLensServerConfig>;

export const DEFAULT_LLM_CONFIG: RequiredLlmConfig = {
  default_model: "codellama",
  temperature: 0.1,
  max_tokens: 2048,
  timeout_ms: 60_000,
  models_timeout_ms: 5000,
};

export const DEFAULT_RETRY_CONFIG: RequiredRetryConfig = {
  max_attempts: 3,
  delay_ms: 2000,
};

export const DEFAULT_RATE_LIMIT_CONFIG: RequiredRateLimitConfig = {
  max_calls: 3,
  period_ms: 5000,
  max_wait_ms: 30_000,
};

export const DEFAULT_HISTORY_CONFIG: RequiredHistoryConfig = {
  max_entries: 100,
};

export const DEFAULT_SERVER_CONFIG: RequiredServerConfig = {
  requests_per_minute: 60,
};
