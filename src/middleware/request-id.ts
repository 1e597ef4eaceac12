import type { Context, MiddlewareHandler } from "hono";

const REQUEST_ID_HEADER = "x-request-id";

function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

export function getRequestId(c: Context): string | undefined {
  return c.res.headers.get(REQUEST_ID_HEADER) ?? c.req.header(REQUEST_ID_HEADER);
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incomingId = c.req.header(REQUEST_ID_HEADER)?.trim();
  c.header(REQUEST_ID_HEADER, incomingId || generateRequestId());
  await next();
};
