/**
 * Latency history chart, rendered as a standalone SVG document.
 */

import { LatencyPoint } from "./history";
import { escapeHtml } from "./web/html";

export interface ChartOptions {
  width?: number;
  height?: number;
  title?: string;
}

const MARGIN = { top: 40, right: 20, bottom: 60, left: 60 };
const GRID_LINES = 5;
const MAX_TIME_LABELS = 6;

function fmt(value: number): string {
  return String(Number(value.toFixed(1)));
}

/**
 * HH:MM:SS in UTC, matching the ISO timestamps stored in history.
 */
function timeLabel(ms: number): string {
  return new Date(ms).toISOString().slice(11, 19);
}

/**
 * Render latencies (plotted in seconds) against completion time.
 * Returns null when there is nothing to plot.
 */
export function renderLatencyChart(points: LatencyPoint[], options: ChartOptions = {}): string | null {
  const width = options.width ?? 800;
  const height = options.height ?? 320;
  const title = options.title ?? "Response Latency Over Time";

  const samples = points
    .map((point) => ({ time: Date.parse(point.timestamp), seconds: point.latencyMs / 1000 }))
    .filter((sample) => Number.isFinite(sample.time) && Number.isFinite(sample.seconds));
  if (samples.length === 0) {
    return null;
  }

  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;

  const times = samples.map((sample) => sample.time);
  const tMin = Math.min(...times);
  const tMax = Math.max(...times);
  const maxSeconds = Math.max(...samples.map((sample) => sample.seconds));
  const yMax = maxSeconds > 0 ? maxSeconds * 1.1 : 1;

  const x = (time: number): number =>
    tMax === tMin ? (left + right) / 2 : left + ((time - tMin) / (tMax - tMin)) * (right - left);
  const y = (seconds: number): number => bottom - (seconds / yMax) * (bottom - top);

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif" font-size="11">`
  );
  parts.push(`<rect width="${width}" height="${height}" fill="#ffffff"/>`);
  parts.push(
    `<text x="${fmt(width / 2)}" y="${fmt(top / 2)}" text-anchor="middle" font-size="14">${escapeHtml(title)}</text>`
  );

  // Horizontal grid with second labels
  for (let i = 0; i <= GRID_LINES; i++) {
    const seconds = (yMax / GRID_LINES) * i;
    const gy = fmt(y(seconds));
    parts.push(
      `<line x1="${left}" y1="${gy}" x2="${right}" y2="${gy}" stroke="#cccccc" stroke-dasharray="4 3" stroke-opacity="0.7"/>`
    );
    parts.push(`<text x="${left - 6}" y="${gy}" text-anchor="end" dominant-baseline="middle">${seconds.toFixed(1)}</text>`);
  }

  // Time labels, thinned out to at most MAX_TIME_LABELS
  const step = Math.max(1, Math.ceil(samples.length / MAX_TIME_LABELS));
  samples.forEach((sample, index) => {
    if (index % step !== 0) {
      return;
    }
    const lx = fmt(x(sample.time));
    const ly = fmt(bottom + 14);
    parts.push(
      `<text x="${lx}" y="${ly}" text-anchor="end" transform="rotate(-45 ${lx} ${ly})">${timeLabel(sample.time)}</text>`
    );
  });

  parts.push(`<line x1="${left}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="#333333"/>`);
  parts.push(`<line x1="${left}" y1="${top}" x2="${left}" y2="${bottom}" stroke="#333333"/>`);
  parts.push(`<text x="${fmt((left + right) / 2)}" y="${height - 6}" text-anchor="middle">Time</text>`);
  parts.push(
    `<text x="14" y="${fmt((top + bottom) / 2)}" text-anchor="middle" transform="rotate(-90 14 ${fmt((top + bottom) / 2)})">Latency (seconds)</text>`
  );

  const coords = samples.map((sample) => `${fmt(x(sample.time))},${fmt(y(sample.seconds))}`);
  parts.push(`<polyline points="${coords.join(" ")}" fill="none" stroke="#1f77b4" stroke-width="2"/>`);
  for (const sample of samples) {
    parts.push(`<circle cx="${fmt(x(sample.time))}" cy="${fmt(y(sample.seconds))}" r="4" fill="#1f77b4"/>`);
  }

  parts.push("</svg>");
  return parts.join("\n");
}
