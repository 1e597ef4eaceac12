import { Hono } from "hono";
import { StateCorruptionError } from "../domain/errors.js";
import { AppError } from "../middleware/error-handler.js";
import type { MonitorStateStore } from "../services/monitor-state.js";
import type { MonitorState } from "../types/monitor.js";

export async function readStateOrThrow(store: MonitorStateStore): Promise<MonitorState> {
  try {
    return await store.load();
  } catch (error) {
    if (error instanceof StateCorruptionError) {
      throw new AppError("State document unreadable", 503);
    }
    throw error;
  }
}

export function createStateRouter(store: MonitorStateStore): Hono {
  const app = new Hono();

  app.get("/api/v1/state", async (c) => {
    const state = await readStateOrThrow(store);
    c.header("cache-control", "no-store");
    return c.json({ code: 200, message: "ok", data: state }, 200);
  });

  // same shape the monitor writes, for static readers of the file
  app.get("/state/state.json", async (c) => {
    const state = await readStateOrThrow(store);
    c.header("cache-control", "no-store");
    return c.json(state, 200);
  });

  return app;
}
