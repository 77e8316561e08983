/**
 * Shared test doubles.
 */

import {
  AnalysisResult,
  GenerateParams,
  Generation,
  InferenceClient,
  ServiceUnavailableError,
} from "../src/integrations/llm";

/**
 * In-process stand-in for the inference service. Answers queued responses in
 * order and behaves as unreachable once the queue is empty.
 */
export class FakeInferenceClient implements InferenceClient {
  readonly calls: GenerateParams[] = [];
  models: string[] | Error = ["codellama", "llama3"];
  private readonly responses: Array<Generation | Error> = [];

  queue(...responses: Array<Generation | Error>): this {
    this.responses.push(...responses);
    return this;
  }

  async generate(params: GenerateParams): Promise<Generation> {
    this.calls.push(params);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new ServiceUnavailableError();
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async listModels(): Promise<string[]> {
    if (this.models instanceof Error) {
      throw this.models;
    }
    return this.models;
  }
}

export const noSleep = async (): Promise<void> => {};

export function makeResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    response: "Prints the number 1.",
    model: "codellama",
    latencyMs: 1200,
    inputTokens: 4,
    outputTokens: 5,
    tokensEstimated: false,
    timestamp: "2026-01-15T10:00:00.000Z",
    ...overrides,
  };
}
