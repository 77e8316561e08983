/**
 * Tests for the history recorder and the latency chart.
 */

import { HistoryRecorder } from "../src/history";
import { renderLatencyChart } from "../src/chart";
import { makeResult } from "./helpers";

describe("HistoryRecorder", () => {
  it("should record entries with a preview of the snippet", () => {
    const history = new HistoryRecorder();
    const snippet = "x".repeat(60);

    const entry = history.record(snippet, "key-1", makeResult());

    expect(entry).toEqual({
      id: 1,
      key: "key-1",
      preview: `${"x".repeat(50)}...`,
      model: "codellama",
      timestamp: "2026-01-15T10:00:00.000Z",
      latencyMs: 1200,
      inputTokens: 4,
      outputTokens: 5,
    });
  });

  it("should keep short snippets whole in the preview", () => {
    const history = new HistoryRecorder();
    expect(history.record("print(1)", "k", makeResult()).preview).toBe("print(1)");
  });

  it("should list newest first and find entries by id", () => {
    const history = new HistoryRecorder();
    history.record("first", "k1", makeResult());
    history.record("second", "k2", makeResult());

    expect(history.list().map((entry) => entry.preview)).toEqual(["second", "first"]);
    expect(history.find(1)?.key).toBe("k1");
    expect(history.find(99)).toBeUndefined();
  });

  it("should drop the oldest entries past maxEntries", () => {
    const history = new HistoryRecorder(2);
    history.record("a", "ka", makeResult());
    history.record("b", "kb", makeResult());
    history.record("c", "kc", makeResult());

    expect(history.size).toBe(2);
    expect(history.list().map((entry) => entry.id)).toEqual([3, 2]);
  });

  it("should produce a chronological latency series", () => {
    const history = new HistoryRecorder();
    history.record("a", "ka", makeResult({ latencyMs: 900, timestamp: "2026-01-15T10:00:00.000Z" }));
    history.record("b", "kb", makeResult({ latencyMs: 1800, timestamp: "2026-01-15T10:01:00.000Z" }));

    expect(history.latencySeries()).toEqual([
      { timestamp: "2026-01-15T10:00:00.000Z", latencyMs: 900 },
      { timestamp: "2026-01-15T10:01:00.000Z", latencyMs: 1800 },
    ]);
  });

  it("should summarize latency and token totals", () => {
    const history = new HistoryRecorder();
    history.record("a", "ka", makeResult({ latencyMs: 1000, inputTokens: 10, outputTokens: 100 }));
    history.record("b", "kb", makeResult({ latencyMs: 2000, inputTokens: 20, outputTokens: 200 }));
    history.record("c", "kc", makeResult({ latencyMs: 4000, inputTokens: 30, outputTokens: 300 }));

    expect(history.summarize()).toEqual({
      count: 3,
      averageLatencyMs: 2333,
      minLatencyMs: 1000,
      maxLatencyMs: 4000,
      totalInputTokens: 60,
      totalOutputTokens: 600,
    });
  });

  it("should summarize an empty history with null latencies", () => {
    const history = new HistoryRecorder();
    history.record("a", "ka", makeResult());
    history.clear();

    expect(history.summarize()).toEqual({
      count: 0,
      averageLatencyMs: null,
      minLatencyMs: null,
      maxLatencyMs: null,
      totalInputTokens: 0,
      totalOutputTokens: 0,
    });
  });

  it("should reject a non-positive bound", () => {
    expect(() => new HistoryRecorder(0)).toThrow(RangeError);
  });
});

describe("renderLatencyChart", () => {
  it("should return null with nothing to plot", () => {
    expect(renderLatencyChart([])).toBeNull();
    expect(renderLatencyChart([{ timestamp: "not-a-date", latencyMs: 100 }])).toBeNull();
  });

  it("should label the chart and its axes", () => {
    const svg = renderLatencyChart([{ timestamp: "2026-01-15T10:00:00.000Z", latencyMs: 1500 }]);

    expect(svg).toContain(">Response Latency Over Time</text>");
    expect(svg).toContain(">Latency (seconds)</text>");
    expect(svg).toContain(">Time</text>");
    expect(svg).toContain(">10:00:00</text>");
  });

  it("should centre a single point horizontally", () => {
    const svg = renderLatencyChart([{ timestamp: "2026-01-15T10:00:00.000Z", latencyMs: 1500 }]);

    expect(svg).toContain('<circle cx="420" cy="60" r="4" fill="#1f77b4"/>');
  });

  it("should scale points across the plot area", () => {
    const svg = renderLatencyChart([
      { timestamp: "2026-01-15T10:00:00.000Z", latencyMs: 1000 },
      { timestamp: "2026-01-15T10:01:00.000Z", latencyMs: 2000 },
    ]);

    expect(svg).toContain('<polyline points="60,160 780,60" fill="none" stroke="#1f77b4" stroke-width="2"/>');
    expect(svg?.match(/<circle /g)).toHaveLength(2);
  });

  it("should plot zero latencies on the axis", () => {
    const svg = renderLatencyChart([{ timestamp: "2026-01-15T10:00:00.000Z", latencyMs: 0 }]);

    expect(svg).toContain('<circle cx="420" cy="260" r="4" fill="#1f77b4"/>');
  });

  it("should escape a custom title", () => {
    const svg = renderLatencyChart([{ timestamp: "2026-01-15T10:00:00.000Z", latencyMs: 10 }], {
      title: "<b>Latency</b>",
    });

    expect(svg).toContain(">&lt;b&gt;Latency&lt;/b&gt;</text>");
  });
});
