/**
 * LLM utility functions.
 */

const TOKEN_PATTERN = /\b\w+\b|[^\w\s]/g;

/**
 * Rough token count: each word run and each punctuation character counts once.
 * Real tokenizers differ per model; this is only used when the service
 * reports no usage.
 */
export function estimateTokenCount(text: string): number {
  return text.match(TOKEN_PATTERN)?.length ?? 0;
}

/**
 * Shorten text for logs and history previews.
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
