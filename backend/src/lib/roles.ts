/**
 * Boundary parsing of identity records into typed users
 */

import { z } from "zod";
import { USER_ROLES, type AuthUser, type UserRole } from "../types/database";

const roleSchema = z.enum(USER_ROLES);

/** Missing or unknown roles fall back to student */
export function parseUserRole(value: unknown): UserRole {
  const parsed = roleSchema.safeParse(value);
  return parsed.success ? parsed.data : "student";
}

const metadataSchema = z.record(z.unknown()).nullish();

export const identityRecordSchema = z.object({
  id: z.string().min(1),
  email: z.string().nullish(),
  user_metadata: metadataSchema,
  banned_until: z.string().nullish(),
});

export type IdentityRecord = z.infer<typeof identityRecordSchema>;

export function toAuthUser(record: IdentityRecord): AuthUser {
  const metadata = record.user_metadata ?? {};
  const name = metadata["name"];
  return {
    id: record.id,
    email: record.email ?? "",
    name: typeof name === "string" ? name : null,
    role: parseUserRole(metadata["role"]),
  };
}

export function isBanned(record: IdentityRecord, now: Date): boolean {
  if (!record.banned_until) return false;
  const until = Date.parse(record.banned_until);
  return Number.isFinite(until) && until > now.getTime();
}
