/**
 * Local verification of auth-server access tokens (HS256 with the project JWT secret)
 */

import { errors, jwtVerify } from "jose";
import { z } from "zod";
import type { AuthUser } from "../types/database";
import { unauthenticated } from "./errors";
import type { Logger } from "./logger";
import { toAuthUser } from "./roles";
import type { IdentityProvider } from "./stores";

const AUDIENCE = "authenticated";

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string().nullish(),
  user_metadata: z.record(z.unknown()).nullish(),
});

export class JwtIdentityProvider implements IdentityProvider {
  private readonly secretKey: Uint8Array;

  constructor(
    secret: string,
    private readonly logger: Logger
  ) {
    this.secretKey = new TextEncoder().encode(secret);
  }

  async validate(token: string): Promise<AuthUser> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.secretKey, {
        audience: AUDIENCE,
        algorithms: ["HS256"],
      }));
    } catch (error) {
      const reason = error instanceof errors.JOSEError ? error.code : "ERR_UNKNOWN";
      this.logger.warn("JWT verification failed", { reason });
      throw unauthenticated();
    }

    const claims = accessTokenPayloadSchema.safeParse(payload);
    if (!claims.success) {
      this.logger.warn("JWT payload rejected", { issues: claims.error.issues.length });
      throw unauthenticated();
    }

    return toAuthUser({
      id: claims.data.sub,
      email: claims.data.email,
      user_metadata: claims.data.user_metadata,
    });
  }
}
