/**
 * Admin API routes
 * User management, system statistics and question import
 * Every route requires the admin role
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AdminService } from "../lib/admin";
import { validation } from "../lib/errors";
import { readJsonBody } from "../lib/validation";
import { requireRole, type AppEnv } from "../middleware/auth";
import { USER_ROLES } from "../types/database";

const userUpdateSchema = z.object({
  role: z.enum(USER_ROLES).optional(),
  is_active: z.boolean().optional(),
});

export function createAdminRouter(
  admin: AdminService,
  requireAuth: MiddlewareHandler<AppEnv>
) {
  const router = new Hono<AppEnv>();

  router.use("*", requireAuth, requireRole("admin"));

  /**
   * GET /api/admin/users
   * Every account with attempt totals and last activity
   */
  router.get("/users", async (c) => {
    return c.json(await admin.listUserStats());
  });

  /**
   * PUT /api/admin/users/:id
   * Change role and/or active flag
   */
  router.put("/users/:id", async (c) => {
    const body = await readJsonBody(c, userUpdateSchema);
    await admin.updateUser(c.req.param("id"), {
      role: body.role,
      isActive: body.is_active,
    });
    return c.json({ message: "User updated successfully" });
  });

  /**
   * DELETE /api/admin/users/:id
   * Remove the account and its attempt history
   */
  router.delete("/users/:id", async (c) => {
    await admin.deleteUser(c.req.param("id"));
    return c.json({ message: "User and associated data deleted successfully" });
  });

  router.get("/stats/system", async (c) => {
    return c.json(await admin.getSystemStats());
  });

  /**
   * POST /api/admin/bulk-upload
   * multipart/form-data with a `file` field (.xlsx, .xls or .csv)
   */
  router.post("/bulk-upload", async (c) => {
    const body = await c.req.parseBody();
    const file = body["file"];
    if (!(file instanceof File)) {
      throw validation("file: a spreadsheet upload is required");
    }

    const outcome = await admin.bulkUpload({
      name: file.name,
      data: new Uint8Array(await file.arrayBuffer()),
    });
    return c.json(outcome);
  });

  return router;
}
