/**
 * Question catalog routes
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { MAX_PAGE_SIZE } from "../lib/pagination";
import type { QuestionService } from "../lib/questions";
import { parseWith } from "../lib/validation";
import type { AppEnv } from "../middleware/auth";
import { QUESTION_STATUSES, type QuestionStatus } from "../types/database";

export const DEFAULT_PAGE_SIZE = 20;

const optionalFilter = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  difficulty: optionalFilter,
  topic: optionalFilter,
  source: optionalFilter,
  q_type: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().optional()
  ),
});

const statusSchema = z.array(z.enum(QUESTION_STATUSES));

/** `status` may repeat and each value may hold a comma separated list */
function parseStatuses(values: string[] | undefined): Set<QuestionStatus> {
  const tokens = (values ?? [])
    .flatMap((value) => value.split(","))
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
  return new Set(parseWith(statusSchema, tokens));
}

export function createQuestionsRouter(
  questions: QuestionService,
  requireAuth: MiddlewareHandler<AppEnv>
) {
  const router = new Hono<AppEnv>();

  router.use("*", requireAuth);

  /**
   * GET /api/questions
   * Paginated catalog with the caller's status per question
   */
  router.get("/", async (c) => {
    const query = parseWith(listQuerySchema, c.req.query());
    const statuses = parseStatuses(c.req.queries("status"));
    const user = c.get("user");

    const result = await questions.listQuestions(
      user.id,
      {
        difficulty: query.difficulty,
        topic: query.topic,
        source: query.source,
        q_type: query.q_type,
        statuses,
      },
      query.page,
      query.size
    );
    return c.json(result);
  });

  /**
   * GET /api/questions/filters
   * Distinct topics and sources plus the difficulty scale
   */
  router.get("/filters", async (c) => {
    return c.json(await questions.getFilters());
  });

  /**
   * GET /api/questions/:id
   * Single question with its solution
   */
  router.get("/:id{[0-9]+}", async (c) => {
    const id = Number(c.req.param("id"));
    return c.json(await questions.getQuestion(id));
  });

  return router;
}
