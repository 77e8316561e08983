/**
 * In-session log of completed analyses, feeding the history list, the
 * metric cards and the latency chart.
 */

import { AnalysisResult, truncate } from "./integrations/llm";

export const PREVIEW_LENGTH = 50;

export interface HistoryEntry {
  id: number;
  /** Cache key of the analyzed snippet. */
  key: string;
  preview: string;
  model: string;
  timestamp: string;
  latencyMs: number;
  inputTokens: number;
  outputTokens: number;
}

export interface LatencyPoint {
  timestamp: string;
  latencyMs: number;
}

export interface HistorySummary {
  count: number;
  averageLatencyMs: number | null;
  minLatencyMs: number | null;
  maxLatencyMs: number | null;
  totalInputTokens: number;
  totalOutputTokens: number;
}

export class HistoryRecorder {
  private entries: HistoryEntry[] = [];
  private nextId = 1;

  constructor(private readonly maxEntries = 100) {
    if (maxEntries < 1) {
      throw new RangeError("maxEntries must be at least 1");
    }
  }

  /**
   * Append an entry; the oldest is dropped once maxEntries is reached.
   */
  record(snippet: string, key: string, result: AnalysisResult): HistoryEntry {
    const entry: HistoryEntry = {
      id: this.nextId++,
      key,
      preview: truncate(snippet, PREVIEW_LENGTH),
      model: result.model,
      timestamp: result.timestamp,
      latencyMs: result.latencyMs,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
    };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
    return entry;
  }

  /**
   * Entries, newest first.
   */
  list(): HistoryEntry[] {
    return [...this.entries].reverse();
  }

  find(id: number): HistoryEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Chronological latency observations.
   */
  latencySeries(): LatencyPoint[] {
    return this.entries.map(({ timestamp, latencyMs }) => ({ timestamp, latencyMs }));
  }

  summarize(): HistorySummary {
    if (this.entries.length === 0) {
      return {
        count: 0,
        averageLatencyMs: null,
        minLatencyMs: null,
        maxLatencyMs: null,
        totalInputTokens: 0,
        totalOutputTokens: 0,
      };
    }

    const latencies = this.entries.map((entry) => entry.latencyMs);
    const total = latencies.reduce((sum, latency) => sum + latency, 0);
    return {
      count: this.entries.length,
      averageLatencyMs: Math.round(total / latencies.length),
      minLatencyMs: Math.min(...latencies),
      maxLatencyMs: Math.max(...latencies),
      totalInputTokens: this.entries.reduce((sum, entry) => sum + entry.inputTokens, 0),
      totalOutputTokens: this.entries.reduce((sum, entry) => sum + entry.outputTokens, 0),
    };
  }
}
