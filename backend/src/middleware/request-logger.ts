import { createMiddleware } from "hono/factory";
import type { Logger } from "../lib/logger";

/**
 * Logs one line per request with status and duration
 */
export function requestLogger(logger: Logger) {
  return createMiddleware(async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("Request processed", {
      method: c.req.method,
      path: c.req.path,
      status_code: c.res.status,
      process_time_ms: Date.now() - start,
    });
  });
}
