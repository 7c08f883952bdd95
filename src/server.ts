import bodyParser from "body-parser";
import express, { NextFunction, Request, Response } from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import type { Logger } from "pino";

import { Classifier } from "./classifier";
import logger from "./logger";

export interface AppOptions {
  maxTextLength: number;
  logger?: Logger;
}

const SERVICE_NAME = "feedback-classifier";

// An incoming X-Request-ID is kept only when it is a UUID.
const UUID_PATTERN = /^[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}$/i;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const bodyParserErrorType = (err: unknown): string | undefined =>
  isRecord(err) && typeof err.type === "string" ? err.type : undefined;

export const readFeedbackText = (body: unknown): string =>
  isRecord(body) && typeof body.text === "string" ? body.text : "";

const isDebugRequested = (value: unknown): boolean => value === "true" || value === "1";

export function createApp(classifier: Classifier, options: AppOptions) {
  const log = options.logger ?? logger;
  const app = express();

  app.use((req, res, next) => {
    const header = req.header("x-request-id");
    const requestId = header && UUID_PATTERN.test(header) ? header : randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("X-Request-ID", requestId);

    const startedAt = performance.now();
    res.on("finish", () => {
      log.info(
        {
          requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Math.round((performance.now() - startedAt) * 100) / 100,
        },
        "Request completed",
      );
    });
    next();
  });

  app.use(bodyParser.json({ limit: "256kb" }));

  app.get("/", (_req, res) => {
    res.json({ name: SERVICE_NAME, status: "ok" });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.post("/check_feedback", (req, res) => {
    const text = readFeedbackText(req.body);
    if (text.length > options.maxTextLength) {
      res.status(413).json({
        error: "TEXT_TOO_LONG",
        message: `Feedback must be at most ${options.maxTextLength} characters`,
      });
      return;
    }
    res.json(classifier.classify(text, { debug: isDebugRequested(req.query.debug) }));
  });

  app.use((req, res) => {
    res.status(404).json({ error: "NOT_FOUND", message: `Route ${req.method} ${req.path} not found` });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const type = bodyParserErrorType(err);
    if (type === "entity.parse.failed") {
      res.status(400).json({ error: "INVALID_JSON", message: "Request body must be valid JSON" });
      return;
    }
    if (type === "entity.too.large") {
      res.status(413).json({ error: "TEXT_TOO_LONG", message: "Request body is too large" });
      return;
    }
    log.error({ err, requestId: res.locals.requestId }, "Unhandled error");
    res.status(500).json({ error: "INTERNAL_ERROR", message: "An unexpected error occurred" });
  });

  return app;
}

export function startServer(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}
