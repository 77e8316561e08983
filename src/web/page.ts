/**
 * Server-rendered page: snippet form, result with metrics, latency chart
 * and history sidebar.
 */

import { AnalysisOutcome } from "../analyzer";
import { HistoryEntry, HistorySummary } from "../history";
import { escapeHtml } from "./html";

export interface PageView {
  models: string[];
  selectedModel: string;
  snippet: string;
  outcome?: AnalysisOutcome;
  error?: string;
  history: HistoryEntry[];
  summary: HistorySummary;
}

export function formatLatency(ms: number): string {
  return `${(ms / 1000).toFixed(2)} seconds`;
}

function metric(label: string, value: string): string {
  return `<div class="metric"><span class="label">${escapeHtml(label)}</span><span class="value">${escapeHtml(value)}</span></div>`;
}

function renderModelSelect(models: string[], selected: string): string {
  const options = models
    .map((model) => {
      const attr = model === selected ? " selected" : "";
      return `<option value="${escapeHtml(model)}"${attr}>${escapeHtml(model)}</option>`;
    })
    .join("");
  return `<select name="model" id="model" form="analyze-form">${options}</select>`;
}

function renderResult(view: PageView): string {
  if (view.error) {
    return `<div class="error" role="alert">Error: ${escapeHtml(view.error)}</div>`;
  }
  if (!view.outcome) {
    return `<p class="placeholder">Submit a snippet to see its analysis.</p>`;
  }

  const { result, cached } = view.outcome;
  const notice = cached ? `<div class="success">Retrieved from cache!</div>` : "";
  return `${notice}
<pre class="analysis">${escapeHtml(result.response)}</pre>
<h3>Performance Metrics</h3>
<div class="metrics">
${metric("Latency", formatLatency(result.latencyMs))}
${metric("Input Tokens", String(result.inputTokens))}
${metric("Output Tokens", String(result.outputTokens))}
${metric("Model", result.model)}
</div>`;
}

function renderHistory(history: HistoryEntry[]): string {
  if (history.length === 0) {
    return `<p class="info">No analysis history yet</p>`;
  }
  const items = history
    .map(
      (entry) =>
        `<li><a href="/?entry=${entry.id}">${escapeHtml(entry.timestamp)} - ${escapeHtml(entry.preview)}</a></li>`
    )
    .join("\n");
  return `<form method="post" action="/history/clear"><button type="submit">Clear History</button></form>
<ul class="history">
${items}
</ul>`;
}

function renderSummary(summary: HistorySummary): string {
  if (summary.count === 0 || summary.averageLatencyMs === null) {
    return "";
  }
  return `<div class="metrics">
${metric("Requests", String(summary.count))}
${metric("Average Latency", formatLatency(summary.averageLatencyMs))}
</div>
<img src="/chart.svg" alt="Response latency over time" width="800" height="320"/>`;
}

export function renderPage(view: PageView): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8"/>
<title>Code Analysis App</title>
</head>
<body>
<aside>
<h2>Settings</h2>
<label for="model">Select Model</label>
${renderModelSelect(view.models, view.selectedModel)}
<h3>Analysis History</h3>
${renderHistory(view.history)}
</aside>
<main>
<h1>Code Analysis App</h1>
<section class="input">
<h2>Code Input</h2>
<a class="button" href="/?example=1">Load Example</a>
<form id="analyze-form" method="post" action="/analyze">
<label for="snippet">Enter your code snippet:</label>
<textarea id="snippet" name="snippet" rows="18" placeholder="Paste your code here...">${escapeHtml(view.snippet)}</textarea>
<button type="submit" class="primary">Analyze Code</button>
</form>
</section>
<section class="result">
<h2>Analysis Result</h2>
${renderResult(view)}
</section>
<section class="performance">
${renderSummary(view.summary)}
</section>
<footer>This app uses local LLMs to analyze code snippets. No data is sent to external servers.</footer>
</main>
</body>
</html>
`;
}
