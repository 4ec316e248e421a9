/**
 * Access Control Tests
 * Verifies role-based access control for admin operations
 */

import { describe, it, expect } from "vitest";
import { bearer, createTestContext, makeQuestion, TOKENS } from "./helpers";

describe("Access Control Tests", () => {
  describe("Admin Operations", () => {
    it("should deny regular users from listing users", async () => {
      const { app } = createTestContext();

      const response = await app.request("/api/admin/users", {
        headers: bearer(TOKENS.student),
      });

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({ detail: "Requires role: admin" });
    });

    it("should allow admin to list users", async () => {
      const { app } = createTestContext();

      const response = await app.request("/api/admin/users", {
        headers: bearer(TOKENS.admin),
      });

      expect(response.status).toBe(200);
      const data = await response.json();
      expect(data).toHaveLength(3);
    });

    it("should deny regular users from changing roles", async () => {
      const { app, users } = createTestContext();

      const response = await app.request("/api/admin/users/user-2", {
        method: "PUT",
        headers: { ...bearer(TOKENS.student), "Content-Type": "application/json" },
        body: JSON.stringify({ role: "admin" }),
      });

      expect(response.status).toBe(403);
      expect(users.accounts.find((account) => account.id === "user-2")?.role).toBe("student");
    });

    it("should deny regular users from deleting users", async () => {
      const { app, users } = createTestContext();

      const response = await app.request("/api/admin/users/user-2", {
        method: "DELETE",
        headers: bearer(TOKENS.student),
      });

      expect(response.status).toBe(403);
      expect(users.accounts).toHaveLength(3);
    });

    it("should deny regular users from system stats", async () => {
      const { app } = createTestContext();

      const response = await app.request("/api/admin/stats/system", {
        headers: bearer(TOKENS.student),
      });

      expect(response.status).toBe(403);
    });

    it("should require authentication before the role check", async () => {
      const { app } = createTestContext();

      const response = await app.request("/api/admin/users");

      expect(response.status).toBe(401);
      expect(response.headers.get("WWW-Authenticate")).toBe("Bearer");
    });

    it("should answer 503 to admins when admin operations are not configured", async () => {
      const { app } = createTestContext({ withAdmin: false });

      const response = await app.request("/api/admin/users", {
        headers: bearer(TOKENS.admin),
      });

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({ detail: "Upstream service unavailable" });
    });

    it("should still reject anonymous callers when admin operations are not configured", async () => {
      const { app } = createTestContext({ withAdmin: false });

      const response = await app.request("/api/admin/users");

      expect(response.status).toBe(401);
    });
  });

  describe("Question Access", () => {
    it("should allow all authenticated users to read questions", async () => {
      const { app } = createTestContext({ questions: [makeQuestion(1)] });

      for (const token of [TOKENS.student, TOKENS.admin]) {
        const response = await app.request("/api/questions", { headers: bearer(token) });
        expect(response.status).toBe(200);
        const data = await response.json();
        expect(data.total).toBe(1);
      }
    });

    it("should deny unauthenticated users from reading questions", async () => {
      const { app } = createTestContext({ questions: [makeQuestion(1)] });

      const response = await app.request("/api/questions");

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ detail: "Invalid authentication credentials" });
    });
  });

  describe("Public Endpoints", () => {
    it("should serve health without authentication", async () => {
      const { app } = createTestContext();

      const response = await app.request("/health");

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: "healthy", version: "test" });
    });
  });
});
