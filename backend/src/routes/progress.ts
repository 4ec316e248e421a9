/**
 * Progress routes
 * Attempt recording and per-user statistics; all scoped to the caller
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { TIME_RANGES, type ProgressService } from "../lib/progress";
import { parseWith, readJsonBody } from "../lib/validation";
import type { AppEnv } from "../middleware/auth";

const attemptSchema = z.object({
  question_id: z.number().int().positive(),
  selected_answer: z.string(),
  time_taken: z.number().int().min(0),
  is_correct: z.boolean(),
});

const statsQuerySchema = z.object({
  time_range: z.enum(TIME_RANGES).default("all"),
});

const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const timelineQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export function createProgressRouter(
  progress: ProgressService,
  requireAuth: MiddlewareHandler<AppEnv>
) {
  const router = new Hono<AppEnv>();

  router.use("*", requireAuth);

  /**
   * POST /api/progress/attempt
   * Record one submitted answer
   */
  router.post("/attempt", async (c) => {
    const input = await readJsonBody(c, attemptSchema);
    const attempt = await progress.recordAttempt(c.get("user").id, input);
    return c.json(attempt, 201);
  });

  /**
   * GET /api/progress/stats
   * Accuracy over today, the last week, the last month or everything
   */
  router.get("/stats", async (c) => {
    const { time_range } = parseWith(statsQuerySchema, c.req.query());
    return c.json(await progress.getStats(c.get("user").id, time_range));
  });

  router.get("/topic-progress", async (c) => {
    return c.json(await progress.getTopicProgress(c.get("user").id));
  });

  router.get("/difficulty-progress", async (c) => {
    return c.json(await progress.getDifficultyProgress(c.get("user").id));
  });

  router.get("/recent-attempts", async (c) => {
    const { limit } = parseWith(recentQuerySchema, c.req.query());
    return c.json(await progress.getRecentAttempts(c.get("user").id, limit));
  });

  router.get("/daily-streak", async (c) => {
    return c.json(await progress.getDailyStreak(c.get("user").id));
  });

  /**
   * GET /api/progress/performance-timeline
   * Daily attempt counts and accuracy for the last `days` days
   */
  router.get("/performance-timeline", async (c) => {
    const { days } = parseWith(timelineQuerySchema, c.req.query());
    return c.json(await progress.getPerformanceTimeline(c.get("user").id, days));
  });

  return router;
}
