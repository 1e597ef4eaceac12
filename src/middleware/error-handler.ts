import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { logger } from "../utils/logger.js";
import { getRequestId } from "./request-id.js";

export class AppError extends Error {
  status: ContentfulStatusCode;

  constructor(message: string, status: ContentfulStatusCode = 500) {
    super(message);
    this.name = "AppError";
    this.status = status;
  }
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = getRequestId(c);

  if (error instanceof AppError) {
    logger.warn("request_failed", {
      requestId,
      status: error.status,
      path: c.req.path,
      message: error.message,
    });
    return c.json(
      {
        code: error.status,
        message: error.message,
      },
      error.status,
    );
  }

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    message: error instanceof Error ? error.message : String(error),
  });

  return c.json(
    {
      code: 500,
      message: "Internal Server Error",
    },
    500,
  );
}
