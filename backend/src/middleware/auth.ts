/**
 * Authentication middleware for bearer tokens and role checks
 */

import { createMiddleware } from "hono/factory";
import { forbidden, unauthenticated } from "../lib/errors";
import type { IdentityProvider } from "../lib/stores";
import type { AuthUser, UserRole } from "../types/database";

export interface AppEnv {
  Variables: {
    user: AuthUser;
  };
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match ? match[1] : null;
}

/**
 * Authentication middleware
 * Validates the bearer token once per request and attaches the user
 */
export function authMiddleware(identity: IdentityProvider) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const token = bearerToken(c.req.header("Authorization"));
    if (!token) {
      throw unauthenticated();
    }

    const user = await identity.validate(token);
    c.set("user", user);

    await next();
  });
}

/**
 * Role gate
 * Must be used after authMiddleware
 */
export function requireRole(...roles: UserRole[]) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const user = c.get("user");
    if (!roles.includes(user.role)) {
      throw forbidden(`Requires role: ${roles.join(" or ")}`);
    }
    await next();
  });
}
