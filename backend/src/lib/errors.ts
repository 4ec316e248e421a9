/**
 * Application error kinds and their HTTP translation
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";

export type ErrorKind =
  | "unauthenticated"
  | "forbidden"
  | "not_found"
  | "validation"
  | "upstream_rejected"
  | "upstream_unavailable";

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.kind = kind;
  }
}

export const unauthenticated = (message = "Invalid authentication credentials") =>
  new AppError("unauthenticated", message);

export const forbidden = (message = "Insufficient permissions") =>
  new AppError("forbidden", message);

export const notFound = (message: string) => new AppError("not_found", message);

export const validation = (message: string) => new AppError("validation", message);

/**
 * Shape of an error reported by the remote store. `status` is the HTTP status of
 * the upstream response; it is absent or 0 when the request never completed.
 */
export interface UpstreamFailure {
  message: string;
  status?: number;
}

export function upstreamError(failure: UpstreamFailure, cause?: unknown): AppError {
  const unavailable = !failure.status || failure.status >= 500;
  return new AppError(
    unavailable ? "upstream_unavailable" : "upstream_rejected",
    failure.message,
    { cause }
  );
}

export interface HttpError {
  status: ContentfulStatusCode;
  detail: string;
  headers?: Record<string, string>;
}

/**
 * Translate any thrown value into the response the client sees.
 * Messages of auth and unavailability errors are never passed through.
 */
export function toHttpError(error: unknown): HttpError {
  if (!(error instanceof AppError)) {
    return { status: 500, detail: "Internal server error" };
  }

  switch (error.kind) {
    case "unauthenticated":
      return {
        status: 401,
        detail: "Invalid authentication credentials",
        headers: { "WWW-Authenticate": "Bearer" },
      };
    case "forbidden":
      return { status: 403, detail: error.message };
    case "not_found":
      return { status: 404, detail: error.message };
    case "validation":
    case "upstream_rejected":
      return { status: 400, detail: error.message };
    case "upstream_unavailable":
      return { status: 503, detail: "Upstream service unavailable" };
  }
}
