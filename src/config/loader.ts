/**
 * Configuration loader for Snippet Lens.
 *
 * Loads .snippetlens.yml, validates each field, and fills the gaps with
 * defaults (the DEFAULT_MODEL env var seeds the default model).
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { config as env } from "../env";
import { logger, errorMessage } from "../logger";
import {
  SnippetLensConfig,
  RequiredLlmConfig,
  RequiredRetryConfig,
  RequiredRateLimitConfig,
  RequiredHistoryConfig,
  RequiredServerConfig,
  DEFAULT_LLM_CONFIG,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_HISTORY_CONFIG,
  DEFAULT_SERVER_CONFIG,
} from "./schema";

/**
 * The loaded and resolved configuration.
 */
export interface LoadedConfig {
  /**
   * The validated file contents (empty when no file was found).
   */
  raw: SnippetLensConfig;

  llm: RequiredLlmConfig;
  retry: RequiredRetryConfig;
  rateLimit: RequiredRateLimitConfig;
  history: RequiredHistoryConfig;
  server: RequiredServerConfig;
}

/**
 * Config file name to search for.
 */
export const CONFIG_FILE_NAME = ".snippetlens.yml";

type Section = Record<string, unknown>;

function toSection(value: unknown): Section | undefined {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function readNumber(
  section: Section | undefined,
  key: string,
  sectionName: string,
  isValid: (value: number) => boolean
): number | undefined {
  const value = section?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || !isValid(value)) {
    logger.warn(`[Config] Ignoring invalid value for ${sectionName}.${key}`, { value: String(value) });
    return undefined;
  }
  return value;
}

function readString(section: Section | undefined, key: string, sectionName: string): string | undefined {
  const value = section?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    logger.warn(`[Config] Ignoring invalid value for ${sectionName}.${key}`, { value: String(value) });
    return undefined;
  }
  return value.trim();
}

const positive = (n: number): boolean => n > 0;
const positiveInt = (n: number): boolean => Number.isInteger(n) && n > 0;
const nonNegative = (n: number): boolean => n >= 0;

/**
 * Validate a parsed YAML document into a SnippetLensConfig.
 * Unknown keys are dropped; invalid values are dropped with a warning.
 */
export function parseConfig(document: unknown): SnippetLensConfig {
  const root = toSection(document);
  if (!root) {
    return {};
  }

  const llm = toSection(root.llm);
  const retry = toSection(root.retry);
  const rateLimit = toSection(root.rate_limit);
  const history = toSection(root.history);
  const server = toSection(root.server);

  return {
    version: readNumber(root, "version", "root", positiveInt),
    llm: {
      default_model: readString(llm, "default_model", "llm"),
      temperature: readNumber(llm, "temperature", "llm", (n) => n >= 0 && n <= 2),
      max_tokens: readNumber(llm, "max_tokens", "llm", positiveInt),
      timeout_ms: readNumber(llm, "timeout_ms", "llm", positive),
      models_timeout_ms: readNumber(llm, "models_timeout_ms", "llm", positive),
    },
    retry: {
      max_attempts: readNumber(retry, "max_attempts", "retry", positiveInt),
      delay_ms: readNumber(retry, "delay_ms", "retry", nonNegative),
    },
    rate_limit: {
      max_calls: readNumber(rateLimit, "max_calls", "rate_limit", positiveInt),
      period_ms: readNumber(rateLimit, "period_ms", "rate_limit", positive),
      max_wait_ms: readNumber(rateLimit, "max_wait_ms", "rate_limit", nonNegative),
    },
    history: {
      max_entries: readNumber(history, "max_entries", "history", positiveInt),
    },
    server: {
      requests_per_minute: readNumber(server, "requests_per_minute", "server", positiveInt),
    },
  };
}

/**
 * Apply defaults to a validated configuration.
 */
export function resolveConfig(raw: SnippetLensConfig): LoadedConfig {
  return {
    raw,
    llm: {
      default_model: raw.llm?.default_model ?? env.DEFAULT_MODEL ?? DEFAULT_LLM_CONFIG.default_model,
      temperature: raw.llm?.temperature ?? DEFAULT_LLM_CONFIG.temperature,
      max_tokens: raw.llm?.max_tokens ?? DEFAULT_LLM_CONFIG.max_tokens,
      timeout_ms: raw.llm?.timeout_ms ?? DEFAULT_LLM_CONFIG.timeout_ms,
      models_timeout_ms: raw.llm?.models_timeout_ms ?? DEFAULT_LLM_CONFIG.models_timeout_ms,
    },
    retry: {
      max_attempts: raw.retry?.max_attempts ?? DEFAULT_RETRY_CONFIG.max_attempts,
      delay_ms: raw.retry?.delay_ms ?? DEFAULT_RETRY_CONFIG.delay_ms,
    },
    rateLimit: {
      max_calls: raw.rate_limit?.max_calls ?? DEFAULT_RATE_LIMIT_CONFIG.max_calls,
      period_ms: raw.rate_limit?.period_ms ?? DEFAULT_RATE_LIMIT_CONFIG.period_ms,
      max_wait_ms: raw.rate_limit?.max_wait_ms ?? DEFAULT_RATE_LIMIT_CONFIG.max_wait_ms,
    },
    history: {
      max_entries: raw.history?.max_entries ?? DEFAULT_HISTORY_CONFIG.max_entries,
    },
    server: {
      requests_per_minute: raw.server?.requests_per_minute ?? DEFAULT_SERVER_CONFIG.requests_per_minute,
    },
  };
}

/**
 * Load configuration from a directory containing .snippetlens.yml.
 * A missing or unparseable file yields the defaults.
 */
export function loadConfig(configDir: string): LoadedConfig {
  const configPath = path.join(configDir, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }

  try {
    const fileContents = fs.readFileSync(configPath, "utf-8");
    return loadConfigFromString(fileContents);
  } catch (err) {
    logger.warn(`[Config] Failed to parse ${CONFIG_FILE_NAME}, using defaults`, {
      path: configPath,
      error: errorMessage(err),
    });
    return createDefaultConfig();
  }
}

/**
 * Load configuration from a YAML string. Throws on malformed YAML.
 */
export function loadConfigFromString(yamlContent: string): LoadedConfig {
  return resolveConfig(parseConfig(yaml.load(yamlContent)));
}

/**
 * Create a default configuration (no file present).
 */
export function createDefaultConfig(): LoadedConfig {
  return resolveConfig({});
}
