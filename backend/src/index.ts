/**
 * HTTP application for the exam-practice API
 * Wires routers, auth, request logging and the error translation layer
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AdminService } from "./lib/admin";
import { AppError, toHttpError } from "./lib/errors";
import { describeError, type Logger } from "./lib/logger";
import type { ProgressService } from "./lib/progress";
import type { QuestionService } from "./lib/questions";
import type { AccountGateway, IdentityProvider } from "./lib/stores";
import { authMiddleware, type AppEnv } from "./middleware/auth";
import { requestLogger } from "./middleware/request-logger";
import { createAdminRouter } from "./routes/admin";
import { createAuthRouter } from "./routes/auth";
import { createProgressRouter } from "./routes/progress";
import { createQuestionsRouter } from "./routes/questions";

export interface Services {
  questions: QuestionService;
  progress: ProgressService;
  /** Null when no service role key is configured */
  admin: AdminService | null;
  identity: IdentityProvider;
  accounts: AccountGateway;
  logger: Logger;
}

export interface AppOptions {
  version: string;
  corsOrigins: "*" | string[];
}

export function createApp(services: Services, options: AppOptions) {
  const { logger } = services;
  const app = new Hono<AppEnv>();

  app.use("*", requestLogger(logger));
  app.use(
    "*",
    cors({
      origin: options.corsOrigins,
      allowHeaders: ["Authorization", "Content-Type"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    })
  );

  app.get("/health", (c) => {
    return c.json({ status: "healthy", version: options.version });
  });

  app.route("/api/auth", createAuthRouter(services.accounts));

  const requireAuth = authMiddleware(services.identity);

  app.route("/api/questions", createQuestionsRouter(services.questions, requireAuth));
  app.route("/api/progress", createProgressRouter(services.progress, requireAuth));

  if (services.admin) {
    app.route("/api/admin", createAdminRouter(services.admin, requireAuth));
  } else {
    const unconfigured = new Hono<AppEnv>();
    unconfigured.use("*", requireAuth);
    unconfigured.all("*", () => {
      throw new AppError("upstream_unavailable", "Admin operations are not configured");
    });
    app.route("/api/admin", unconfigured);
  }

  app.notFound((c) => c.json({ detail: "Not Found" }, 404));

  app.onError((error, c) => {
    const http = toHttpError(error);
    const fields = {
      method: c.req.method,
      path: c.req.path,
      status_code: http.status,
      error: describeError(error),
    };

    if (!(error instanceof AppError)) {
      logger.error("Unhandled exception", {
        ...fields,
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else if (error.kind === "upstream_unavailable" || error.kind === "upstream_rejected") {
      logger.warn("Upstream call failed", fields);
    } else {
      logger.debug("Request rejected", fields);
    }

    return c.json({ detail: http.detail }, http.status, http.headers);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
