/**
 * Snippet analysis service: cache, then rate limit, then inference.
 *
 * A failed request leaves the cache and history exactly as they were.
 */

import { AnalysisCache } from "./cache";
import { HistoryEntry, HistoryRecorder, HistorySummary, LatencyPoint } from "./history";
import { logger } from "./logger";
import { LoadedConfig } from "./config/loader";
import {
  AnalysisRequest,
  AnalysisResult,
  EmptySnippetError,
  InferenceClient,
  RateLimiter,
  RetryOptions,
  analyzeSnippet,
  getAvailableModels,
} from "./integrations/llm";

export interface AnalysisOutcome {
  key: string;
  result: AnalysisResult;
  /** True when served from the cache without contacting the service. */
  cached: boolean;
}

export interface SnippetAnalyzerDeps {
  client: InferenceClient;
  config: LoadedConfig;
  cache?: AnalysisCache;
  history?: HistoryRecorder;
  rateLimiter?: RateLimiter;
  /** Overrides the retry settings derived from config (tests inject sleep here). */
  retry?: RetryOptions;
  now?: () => number;
}

export class SnippetAnalyzer {
  readonly cache: AnalysisCache;
  readonly history: HistoryRecorder;
  readonly rateLimiter: RateLimiter;
  private readonly client: InferenceClient;
  private readonly config: LoadedConfig;
  private readonly retry: RetryOptions;
  private readonly now?: () => number;

  constructor(deps: SnippetAnalyzerDeps) {
    this.client = deps.client;
    this.config = deps.config;
    this.cache = deps.cache ?? new AnalysisCache();
    this.history = deps.history ?? new HistoryRecorder(deps.config.history.max_entries);
    this.rateLimiter =
      deps.rateLimiter ??
      new RateLimiter({
        maxCalls: deps.config.rateLimit.max_calls,
        periodMs: deps.config.rateLimit.period_ms,
        maxWaitMs: deps.config.rateLimit.max_wait_ms,
      });
    this.retry = {
      maxAttempts: deps.config.retry.max_attempts,
      baseDelayMs: deps.config.retry.delay_ms,
      ...deps.retry,
    };
    this.now = deps.now;
  }

  get defaultModel(): string {
    return this.config.llm.default_model;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
    if (request.snippet.trim() === "") {
      throw new EmptySnippetError();
    }

    const model = request.model?.trim() || this.defaultModel;
    const key = this.cache.keyFor(request.snippet);

    const cachedResult = this.cache.get(key);
    if (cachedResult) {
      logger.info("[Analyzer] Retrieved from cache", { key, model: cachedResult.model });
      return { key, result: cachedResult, cached: true };
    }

    await this.rateLimiter.acquire(model);

    const result = await analyzeSnippet(this.client, request.snippet, model, {
      temperature: this.config.llm.temperature,
      maxTokens: this.config.llm.max_tokens,
      retry: this.retry,
      now: this.now,
    });

    this.cache.put(key, result);
    this.history.record(request.snippet, key, result);
    return { key, result, cached: false };
  }

  /**
   * A past result by cache key, if it is still cached.
   */
  lookup(key: string): AnalysisResult | undefined {
    return this.cache.get(key);
  }

  /**
   * Round-trip time of a model listing, for health checks. Throws when the
   * service is unreachable.
   */
  async ping(): Promise<number> {
    const startedAt = Date.now();
    await this.client.listModels();
    return Date.now() - startedAt;
  }

  listModels(): Promise<string[]> {
    return getAvailableModels(this.client, this.defaultModel);
  }

  getHistory(): HistoryEntry[] {
    return this.history.list();
  }

  findHistoryEntry(id: number): HistoryEntry | undefined {
    return this.history.find(id);
  }

  latencySeries(): LatencyPoint[] {
    return this.history.latencySeries();
  }

  summarize(): HistorySummary {
    return this.history.summarize();
  }

  /**
   * Clears the history list only; cached results stay available.
   */
  clearHistory(): void {
    this.history.clear();
    logger.info("[Analyzer] History cleared");
  }
}
