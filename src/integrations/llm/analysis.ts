/**
 * Main analysis function: prompt, call with retries, measure.
 */

import { logger, errorMessage } from "../../logger";
import { buildAnalysisPrompt } from "./prompts";
import { withRetry, RetryOptions } from "./retry";
import { estimateTokenCount } from "./utils";
import {
  AnalysisResult,
  InferenceClient,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from "./types";

export interface AnalyzeOptions {
  temperature?: number;
  maxTokens?: number;
  retry?: RetryOptions;
  /** Injected for tests. */
  now?: () => number;
}

/**
 * Explain a snippet with the given model.
 *
 * Latency covers the whole call including retries and backoff, as the user
 * experiences it. Throws an AnalysisError when the service stays
 * unavailable after the last attempt or answers with something unusable.
 */
export async function analyzeSnippet(
  client: InferenceClient,
  snippet: string,
  model: string,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const now = options.now ?? Date.now;
  const prompt = buildAnalysisPrompt(snippet);
  const startedAt = now();

  let attempts = 0;
  try {
    const generation = await withRetry(() => {
      attempts++;
      return client.generate({
        model,
        prompt,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      });
    }, options.retry);

    const finishedAt = now();
    const tokensEstimated = generation.promptTokens === undefined || generation.completionTokens === undefined;
    const result: AnalysisResult = {
      response: generation.text,
      model,
      latencyMs: finishedAt - startedAt,
      inputTokens: generation.promptTokens ?? estimateTokenCount(snippet),
      outputTokens: generation.completionTokens ?? estimateTokenCount(generation.text),
      tokensEstimated,
      timestamp: new Date(finishedAt).toISOString(),
    };

    logger.info("[LLM] Analysis completed", {
      model,
      attempts,
      latencyMs: result.latencyMs,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
    });
    return result;
  } catch (error) {
    logger.error("[LLM] Analysis failed", { model, attempts, error: errorMessage(error) });
    throw error;
  }
}

/**
 * Models offered for selection. Falls back to the default model when the
 * service cannot be asked or reports none.
 */
export async function getAvailableModels(client: InferenceClient, defaultModel: string): Promise<string[]> {
  try {
    const models = await client.listModels();
    if (models.length > 0) {
      return models;
    }
    logger.warn("[LLM] Inference service reported no models, offering the default", { defaultModel });
  } catch (error) {
    logger.warn("[LLM] Could not list models, offering the default", { defaultModel, error: errorMessage(error) });
  }
  return [defaultModel];
}
