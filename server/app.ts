import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { httpMetricsMiddleware, registerMetricsEndpoint } from "./metrics";
import { createRetrievalRouter, sendError } from "./routes/retrieval";
import type { RetrievalContext } from "./services/retrieval/context";
import { ValidationError } from "./services/retrieval/errors";
import { createLogger } from "./utils/log";

const log = createLogger("express");

const isBodyParseError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";

export function createApp(ctx: RetrievalContext): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "25mb" }));
  app.use(httpMetricsMiddleware);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        log.info(`${req.method} ${req.originalUrl} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, store: ctx.store.kind });
  });
  registerMetricsEndpoint(app);
  app.use("/api", createRetrievalRouter(ctx));

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "not_found", message: "no such endpoint" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      sendError(res, new ValidationError("request body is not valid JSON"));
      return;
    }
    sendError(res, err);
  });

  return app;
}
