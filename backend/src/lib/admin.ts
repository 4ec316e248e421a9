/**
 * Admin operations over users, their history and the catalog
 */

import type { UserRole } from "../types/database";
import { validation } from "./errors";
import { withOperation, type Logger } from "./logger";
import { importQuestions, readSheetRows, type ImportOutcome } from "./question-import";
import type { CatalogStore, ProgressStore, UserDirectory, UserUpdate } from "./stores";

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export interface UserStats {
  user_id: string;
  email: string;
  name: string | null;
  role: UserRole;
  is_active: boolean;
  total_attempts: number;
  correct_attempts: number;
  last_active: string | null;
}

export interface SystemStats {
  total_users: number;
  total_questions: number;
  total_attempts: number;
  weekly_active_users: number;
  weekly_attempts: number;
}

export interface UploadedFile {
  name: string;
  data: Uint8Array;
}

interface AdminServiceDeps {
  catalog: CatalogStore;
  progress: ProgressStore;
  users: UserDirectory;
  logger: Logger;
  now?: () => Date;
}

export class AdminService {
  private readonly now: () => Date;

  constructor(private readonly deps: AdminServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async listUserStats(): Promise<UserStats[]> {
    const [accounts, attempts] = await Promise.all([
      this.deps.users.listUsers(),
      this.deps.progress.listAllAttempts(),
    ]);

    const totals = new Map<string, { total: number; correct: number; last: string | null }>();
    for (const attempt of attempts) {
      const entry = totals.get(attempt.user_id) ?? { total: 0, correct: 0, last: null };
      entry.total++;
      if (attempt.is_correct) entry.correct++;
      if (
        entry.last === null ||
        Date.parse(attempt.attempted_at) > Date.parse(entry.last)
      ) {
        entry.last = attempt.attempted_at;
      }
      totals.set(attempt.user_id, entry);
    }

    return accounts.map((account) => {
      const entry = totals.get(account.id);
      return {
        user_id: account.id,
        email: account.email,
        name: account.name,
        role: account.role,
        is_active: account.is_active,
        total_attempts: entry?.total ?? 0,
        correct_attempts: entry?.correct ?? 0,
        last_active: entry?.last ?? null,
      };
    });
  }

  async updateUser(userId: string, update: UserUpdate): Promise<void> {
    if (update.role === undefined && update.isActive === undefined) {
      throw validation("Nothing to update: provide role or is_active");
    }
    await this.deps.users.updateUser(userId, update);
    this.deps.logger.info("User updated", {
      userId,
      role: update.role,
      isActive: update.isActive,
    });
  }

  /** Attempts are removed before the account */
  async deleteUser(userId: string): Promise<void> {
    await withOperation(this.deps.logger, "delete_user", { userId }, async () => {
      await this.deps.progress.deleteAttemptsForUser(userId);
      await this.deps.users.deleteUser(userId);
    });
  }

  async getSystemStats(): Promise<SystemStats> {
    const since = new Date(this.now().getTime() - WEEK_MS).toISOString();
    const [accounts, totalQuestions, totalAttempts, recent] = await Promise.all([
      this.deps.users.listUsers(),
      this.deps.catalog.countQuestions({}),
      this.deps.progress.countAttempts(),
      this.deps.progress.listAllAttempts(since),
    ]);

    return {
      total_users: accounts.length,
      total_questions: totalQuestions,
      total_attempts: totalAttempts,
      weekly_active_users: new Set(recent.map((attempt) => attempt.user_id)).size,
      weekly_attempts: recent.length,
    };
  }

  async bulkUpload(file: UploadedFile): Promise<ImportOutcome> {
    return withOperation(this.deps.logger, "bulk_upload", { file: file.name }, async () => {
      const rows = readSheetRows(file.data, file.name);
      const outcome = await importQuestions(this.deps.catalog, rows);
      this.deps.logger.info("Bulk upload processed", {
        file: file.name,
        rows: rows.length,
        status: outcome.status,
      });
      return outcome;
    });
  }
}
