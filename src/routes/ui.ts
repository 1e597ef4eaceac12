import { Hono } from "hono";
import type { MonitorStateStore } from "../services/monitor-state.js";
import { renderStatusPage } from "../utils/status-page.js";
import { readStateOrThrow } from "./state.js";

export function createUiRouter(store: MonitorStateStore, nowFn: () => number): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    const state = await readStateOrThrow(store);
    c.header("cache-control", "no-store");
    return c.html(renderStatusPage(state, nowFn()));
  });

  return app;
}
