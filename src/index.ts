#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./cli.js";
import { describeError, logger } from "./utils/logger.js";

runCli(process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("monitor_crashed", { error: describeError(error) });
    process.exitCode = 1;
  });
