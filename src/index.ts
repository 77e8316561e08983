import { createApp } from "./app";
import { SnippetAnalyzer } from "./analyzer";
import { loadConfig } from "./config/loader";
import { config } from "./env";
import { OllamaClient } from "./integrations/llm";
import { logger, errorMessage } from "./logger";

const settings = loadConfig(config.CONFIG_DIR);
const port = Number(config.PORT) || 3000;

const analyzer = new SnippetAnalyzer({
  client: new OllamaClient({
    baseUrl: config.OLLAMA_BASE_URL,
    timeoutMs: settings.llm.timeout_ms,
    modelsTimeoutMs: settings.llm.models_timeout_ms,
  }),
  config: settings,
});

// Read by the request middleware
let isShuttingDown = false;

const app = createApp(analyzer, {
  requestsPerMinute: settings.server.requests_per_minute,
  isShuttingDown: () => isShuttingDown,
});

const server = app.listen(port, () => {
  logger.info("Snippet Lens listening", {
    port,
    inferenceUrl: config.OLLAMA_BASE_URL,
    defaultModel: settings.llm.default_model,
  });
});

function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  logger.info("Graceful shutdown started", { signal });
  isShuttingDown = true;

  server.close((err) => {
    if (err) {
      logger.error("Error closing HTTP server", { error: errorMessage(err) });
      process.exit(1);
    }
    logger.info("HTTP server closed");
    process.exit(0);
  });

  // Give in-flight analyses time to finish
  setTimeout(() => {
    logger.warn("Forcing shutdown after timeout");
    process.exit(0);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { error: errorMessage(reason) });
});
