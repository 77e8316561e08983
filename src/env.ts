import dotenv from "dotenv";

dotenv.config();

export const config = {
  PORT: process.env.PORT || "3000",
  // Ollama serves an OpenAI-compatible API under /v1 on this host
  OLLAMA_BASE_URL: process.env.OLLAMA_BASE_URL || "http://localhost:11434",
  // Unset falls through to the config file, then the built-in default
  DEFAULT_MODEL: process.env.DEFAULT_MODEL || undefined,
  // Directory searched for .snippetlens.yml
  CONFIG_DIR: process.env.SNIPPETLENS_CONFIG_DIR || process.cwd(),
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
};
