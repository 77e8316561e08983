/**
 * HTTP surface: the form page and a JSON API over SnippetAnalyzer.
 */

import express, { Request, Response, NextFunction } from "express";
import bodyParser from "body-parser";
import rateLimit from "express-rate-limit";
import { AnalysisOutcome, SnippetAnalyzer } from "./analyzer";
import { renderLatencyChart } from "./chart";
import { AnalysisError } from "./integrations/llm";
import { logger, errorMessage } from "./logger";
import { EXAMPLE_SNIPPET } from "./web/examples";
import { PageView, renderPage } from "./web/page";

export interface AppOptions {
  /** HTTP requests admitted per client per minute. */
  requestsPerMinute?: number;
  /** Lets the server reject traffic while shutting down. */
  isShuttingDown?: () => boolean;
}

function errorStatus(error: unknown): number {
  return error instanceof AnalysisError ? error.statusCode : 500;
}

/**
 * Message shown to the user; unexpected errors stay generic.
 */
function publicMessage(error: unknown): string {
  return error instanceof AnalysisError ? error.message : "Internal server error";
}

function sendApiError(res: Response, error: unknown): void {
  const status = errorStatus(error);
  if (status >= 500 && !(error instanceof AnalysisError)) {
    logger.error("Unexpected API error", { error: errorMessage(error) });
  }
  res.status(status).json({
    success: false,
    error: publicMessage(error),
    code: error instanceof AnalysisError ? error.code : "INTERNAL_ERROR",
  });
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function createApp(analyzer: SnippetAnalyzer, options: AppOptions = {}): express.Express {
  const app = express();

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: options.requestsPerMinute ?? 60,
    message: { error: "Too many requests, please try again later" },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === "/health",
  });
  app.use(limiter);

  app.use((_req: Request, res: Response, next: NextFunction) => {
    if (options.isShuttingDown?.()) {
      res.status(503).json({ error: "Server is shutting down" });
      return;
    }
    next();
  });

  app.use(bodyParser.json({ limit: "256kb" }));
  app.use(bodyParser.urlencoded({ extended: false, limit: "256kb" }));

  async function buildView(partial: Partial<PageView>, selectedModel?: string): Promise<PageView> {
    const models = await analyzer.listModels();
    const selected =
      selectedModel && models.includes(selectedModel) ? selectedModel : (models[0] ?? analyzer.defaultModel);
    return {
      models,
      selectedModel: selected,
      snippet: "",
      history: analyzer.getHistory(),
      summary: analyzer.summarize(),
      ...partial,
    };
  }

  app.get("/health", async (_req: Request, res: Response) => {
    const health: {
      status: "healthy" | "degraded";
      timestamp: string;
      uptime: number;
      checks: { inference: { status: string; latency?: number } };
    } = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { inference: { status: "connected" } },
    };

    try {
      health.checks.inference.latency = await analyzer.ping();
    } catch (err) {
      health.checks.inference = { status: "unreachable" };
      health.status = "degraded";
      logger.warn("Inference service health check failed", { error: errorMessage(err) });
    }

    res.status(200).json(health);
  });

  app.get("/", async (req: Request, res: Response) => {
    try {
      const partial: Partial<PageView> = {};
      if (readString(req.query.example) === "1") {
        partial.snippet = EXAMPLE_SNIPPET;
      }

      const entryId = Number(readString(req.query.entry));
      if (Number.isInteger(entryId)) {
        const entry = analyzer.findHistoryEntry(entryId);
        const result = entry ? analyzer.lookup(entry.key) : undefined;
        if (entry && result) {
          partial.outcome = { key: entry.key, result, cached: true };
        }
      }

      res.status(200).type("html").send(renderPage(await buildView(partial, readString(req.query.model))));
    } catch (err) {
      logger.error("Failed to render page", { error: errorMessage(err) });
      res.status(500).send("Internal server error");
    }
  });

  app.post("/analyze", async (req: Request, res: Response) => {
    const snippet = readString(req.body?.snippet) ?? "";
    const model = readString(req.body?.model);

    let outcome: AnalysisOutcome | undefined;
    let error: string | undefined;
    let status = 200;
    try {
      outcome = await analyzer.analyze({ snippet, model });
    } catch (err) {
      status = errorStatus(err);
      error = publicMessage(err);
      if (!(err instanceof AnalysisError)) {
        logger.error("Analysis failed unexpectedly", { error: errorMessage(err) });
      }
    }

    try {
      const view = await buildView({ snippet, outcome, error }, model);
      res.status(status).type("html").send(renderPage(view));
    } catch (err) {
      logger.error("Failed to render page", { error: errorMessage(err) });
      res.status(500).send("Internal server error");
    }
  });

  app.post("/history/clear", (_req: Request, res: Response) => {
    analyzer.clearHistory();
    res.redirect(303, "/");
  });

  app.get("/chart.svg", (_req: Request, res: Response) => {
    const svg = renderLatencyChart(analyzer.latencySeries());
    if (!svg) {
      res.status(404).json({ error: "No latency history yet" });
      return;
    }
    res.status(200).type("image/svg+xml").send(svg);
  });

  app.get("/api/models", async (_req: Request, res: Response) => {
    try {
      const models = await analyzer.listModels();
      res.status(200).json({ models, defaultModel: analyzer.defaultModel });
    } catch (err) {
      sendApiError(res, err);
    }
  });

  app.post("/api/analyze", async (req: Request, res: Response) => {
    const snippet = readString(req.body?.snippet);
    const model = req.body?.model === undefined ? undefined : readString(req.body.model);

    if (snippet === undefined || (req.body?.model !== undefined && model === undefined)) {
      res.status(400).json({
        success: false,
        error: "snippet must be a string and model, when given, a string",
        code: "INVALID_REQUEST",
      });
      return;
    }

    try {
      const outcome = await analyzer.analyze({ snippet, model });
      res.status(200).json({ success: true, ...outcome });
    } catch (err) {
      sendApiError(res, err);
    }
  });

  app.get("/api/results/:key", (req: Request, res: Response) => {
    const result = analyzer.lookup(req.params.key);
    if (!result) {
      res.status(404).json({ success: false, error: "No cached result for this key", code: "NOT_FOUND" });
      return;
    }
    res.status(200).json({ success: true, key: req.params.key, result });
  });

  app.get("/api/history", (_req: Request, res: Response) => {
    res.status(200).json({ entries: analyzer.getHistory(), summary: analyzer.summarize() });
  });

  app.get("/api/history/summary", (_req: Request, res: Response) => {
    res.status(200).json(analyzer.summarize());
  });

  app.delete("/api/history", (_req: Request, res: Response) => {
    analyzer.clearHistory();
    res.status(204).end();
  });

  return app;
}
