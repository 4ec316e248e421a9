/**
 * Email/password account routes, delegated to the auth platform
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AccountGateway } from "../lib/stores";
import { readJsonBody } from "../lib/validation";

const signUpSchema = z.object({
  email: z.string().email(),
  password: z.string().min(6),
  name: z.string().trim().min(1),
});

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export function createAuthRouter(accounts: AccountGateway) {
  const router = new Hono();

  /**
   * POST /api/auth/signup
   */
  router.post("/signup", async (c) => {
    const input = await readJsonBody(c, signUpSchema);
    const user = await accounts.signUp(input);
    return c.json({ message: "Signup successful", user }, 201);
  });

  /**
   * POST /api/auth/login
   * Returns the access token to send as `Authorization: Bearer <token>`
   */
  router.post("/login", async (c) => {
    const { email, password } = await readJsonBody(c, loginSchema);
    const session = await accounts.signIn(email, password);
    return c.json({ access_token: session.accessToken, user: session.user });
  });

  return router;
}
