/**
 * In-memory memoization of analysis results, keyed by snippet content.
 * Lives as long as the process; last write wins.
 */

import { createHash } from "crypto";
import { AnalysisResult } from "./integrations/llm";

/**
 * Normalize line endings and surrounding whitespace so the same code pasted
 * from different editors hits the same entry.
 */
export function normalizeSnippet(snippet: string): string {
  return snippet.replace(/\r\n?/g, "\n").trim();
}

/**
 * Cache key for a snippet: MD5 hex digest of its normalized text.
 */
export function cacheKey(snippet: string): string {
  return createHash("md5").update(normalizeSnippet(snippet), "utf8").digest("hex");
}

export class AnalysisCache {
  private readonly entries = new Map<string, AnalysisResult>();

  keyFor(snippet: string): string {
    return cacheKey(snippet);
  }

  get(key: string): AnalysisResult | undefined {
    return this.entries.get(key);
  }

  put(key: string, result: AnalysisResult): void {
    this.entries.set(key, result);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
