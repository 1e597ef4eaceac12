import { Hono } from "hono";
import { cors } from "hono/cors";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { getRequestId, requestIdMiddleware } from "./middleware/request-id.js";
import { createStateRouter, readStateOrThrow } from "./routes/state.js";
import { createUiRouter } from "./routes/ui.js";
import type { MonitorStateStore } from "./services/monitor-state.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  stateStore: MonitorStateStore;
  corsOrigin?: string;
  nowFn?: () => number;
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();
  const nowFn = options.nowFn ?? (() => Date.now());

  app.use("*", requestIdMiddleware);
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("request", {
      requestId: getRequestId(c),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "*",
    cors({
      origin: options.corsOrigin ?? "*",
      allowMethods: ["GET", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.get("/healthz", async (c) => {
    const state = await readStateOrThrow(options.stateStore);
    return c.json(
      {
        code: 200,
        message: "ok",
        data: {
          monitoringEnabled: state.monitoring_enabled,
          lastRunStatus: state.last_run_status,
          lastRunTime: state.last_run_time,
        },
      },
      200,
    );
  });

  app.route("/", createUiRouter(options.stateStore, nowFn));
  app.route("/", createStateRouter(options.stateStore));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}
