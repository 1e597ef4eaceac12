import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config/env.js";
import { ConfigError } from "./domain/errors.js";
import { FileBackedMonitorStateStore } from "./services/monitor-state.js";
import { describeError, logger, setLogLevel } from "./utils/logger.js";

function start(): void {
  let config: ServerConfig;
  try {
    config = loadServerConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("config_invalid", { issues: error.issues });
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  setLogLevel(config.logLevel);
  const app = createApp({
    stateStore: new FileBackedMonitorStateStore(config.stateFile),
    corsOrigin: config.corsOrigin,
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
    },
    () => {
      logger.info("server_started", {
        port: config.port,
        env: config.nodeEnv,
        stateFile: config.stateFile,
      });
    },
  );

  server.on("error", (error) => {
    logger.error("server_start_failed", {
      port: config.port,
      error: describeError(error),
    });
  });
}

start();
