import express, { type NextFunction, type Request, type Response } from "express";

import { config } from "./config.js";
import { logger } from "./logger.js";
import { registry } from "./metrics/registry.js";

export interface ConsumerStatus {
  readonly connectionCount: number;
}

export const createApp = (consumer?: ConsumerStatus) => {
  const app = express();

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = performance.now();
    res.on("finish", () => {
      logger.debug({
        msg: "http_request",
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Number((performance.now() - start).toFixed(2)),
      });
    });
    next();
  });

  // Liveness
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      timestamp: Date.now(),
      service: config.serviceName,
      connections: consumer?.connectionCount ?? 0,
    });
  });

  // Metrics endpoint (Prometheus text format)
  app.get("/metrics", async (_req: Request, res: Response) => {
    try {
      res.setHeader("Content-Type", registry.contentType);
      res.send(await registry.metrics());
    } catch (error) {
      logger.error({ error }, "Failed to render metrics");
      res.status(500).send(error instanceof Error ? error.message : String(error));
    }
  });

  return app;
};
