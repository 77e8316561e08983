/**
 * Inference client for a local Ollama server, reached through its
 * OpenAI-compatible API.
 */

import OpenAI from "openai";
import { config } from "../../env";
import {
  AnalysisError,
  InferenceRequestError,
  InferenceTimeoutError,
  InvalidResponseError,
  ModelNotFoundError,
  ServiceUnavailableError,
} from "./errors";
import { GenerateParams, Generation, InferenceClient } from "./types";

export interface OllamaClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Bound on model discovery, which page renders wait on. */
  modelsTimeoutMs?: number;
  /** Ollama ignores the key, but the SDK requires one. */
  apiKey?: string;
}

/**
 * Create an OpenAI SDK client pointed at the Ollama server.
 * SDK-level retries are off; withRetry owns retrying.
 */
export function createOpenAIClient(options: OllamaClientOptions = {}): OpenAI {
  const baseUrl = (options.baseUrl ?? config.OLLAMA_BASE_URL).replace(/\/+$/, "");
  return new OpenAI({
    apiKey: options.apiKey ?? "ollama",
    baseURL: `${baseUrl}/v1`,
    timeout: options.timeoutMs ?? 60_000,
    maxRetries: 0,
  });
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Map an SDK or transport failure onto the analysis error taxonomy.
 */
export function toAnalysisError(error: unknown, model: string): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }

  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);
  const lowered = `${error instanceof Error ? error.name : ""} ${message}`.toLowerCase();

  if (status !== undefined) {
    if (status === 404) {
      return lowered.includes("model")
        ? new ModelNotFoundError(model)
        : new InferenceRequestError("API endpoint not found. Is Ollama running?");
    }
    if (status === 408) {
      return new InferenceTimeoutError();
    }
    if (status === 429) {
      return new ServiceUnavailableError("The inference service is busy (429). Please try again later.");
    }
    if (status >= 500) {
      return new ServiceUnavailableError(`The inference service failed (status ${status}).`);
    }
    return new InferenceRequestError(`API error (status code: ${status}): ${message}`);
  }

  if (lowered.includes("timeout") || lowered.includes("timed out")) {
    return new InferenceTimeoutError();
  }
  if (
    lowered.includes("connection") ||
    lowered.includes("econnrefused") ||
    lowered.includes("econnreset") ||
    lowered.includes("network") ||
    lowered.includes("socket") ||
    lowered.includes("fetch failed")
  ) {
    return new ServiceUnavailableError();
  }
  return new InferenceRequestError(`Inference request failed: ${message}`);
}

export class OllamaClient implements InferenceClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: OllamaClientOptions = {}) {}

  /**
   * Lazily created so importing this module never touches the network stack.
   */
  private sdk(): OpenAI {
    if (!this.client) {
      this.client = createOpenAIClient(this.options);
    }
    return this.client;
  }

  async generate(params: GenerateParams): Promise<Generation> {
    const completion = await this.sdk()
      .chat.completions.create({
        model: params.model,
        messages: [{ role: "user", content: params.prompt }],
        temperature: params.temperature,
        max_tokens: params.maxTokens,
        stream: false,
      })
      .catch((error: unknown) => {
        throw toAnalysisError(error, params.model);
      });

    const text = completion.choices?.[0]?.message?.content;
    if (typeof text !== "string" || text.trim() === "") {
      throw new InvalidResponseError();
    }

    return {
      text,
      promptTokens: completion.usage?.prompt_tokens,
      completionTokens: completion.usage?.completion_tokens,
    };
  }

  async listModels(): Promise<string[]> {
    try {
      const page = await this.sdk().models.list({ timeout: this.options.modelsTimeoutMs ?? 5000 });
      return page.data.map((model) => model.id);
    } catch (error) {
      throw toAnalysisError(error, "");
    }
  }
}
