import {
  DIFFICULTIES,
  type Difficulty,
  type PaginatedResult,
  type Question,
  type QuestionStatus,
  type QuestionWithStatus,
} from "../types/database";
import { resolveStatuses } from "./attempt-status";
import { notFound } from "./errors";
import type { Logger } from "./logger";
import { paginate, toPaginatedResult } from "./pagination";
import type { CatalogFilter, CatalogStore, ProgressStore } from "./stores";

export interface QuestionFilters {
  difficulty?: string;
  topic?: string;
  source?: string;
  q_type?: number;
  statuses?: ReadonlySet<QuestionStatus>;
}

export interface QuestionFilterOptions {
  topics: string[];
  difficulties: readonly Difficulty[];
  sources: string[];
}

interface QuestionServiceDeps {
  catalog: CatalogStore;
  progress: ProgressStore;
  logger: Logger;
}

export class QuestionService {
  constructor(private readonly deps: QuestionServiceDeps) {}

  /**
   * One page of the catalog annotated with the user's status per question.
   *
   * Issues an attempt-history fetch, a count and a page fetch. The count and the
   * page are separate round trips, so a write landing between them can make
   * `total` disagree with the rows. Nothing here is cancelled when the client
   * goes away; in-flight calls run to completion.
   */
  async listQuestions(
    userId: string,
    filters: QuestionFilters,
    page: number,
    size: number
  ): Promise<PaginatedResult<QuestionWithStatus>> {
    const { catalog, progress, logger } = this.deps;

    const attempts = await progress.listAttempts(userId);
    const { statusByQuestion, eligibility } = resolveStatuses(attempts, filters.statuses);

    if (eligibility.kind === "none") {
      logger.debug("Status filter admits no questions", { userId });
      return toPaginatedResult([], 0, page, size, paginate(0, page, size));
    }

    const catalogFilter: CatalogFilter = {
      difficulty: filters.difficulty,
      topic: filters.topic,
      source: filters.source,
      q_type: filters.q_type,
      ids: eligibility.kind === "no_filter" ? undefined : eligibility,
    };

    const total = await catalog.countQuestions(catalogFilter);
    const pagination = paginate(total, page, size);
    const rows = await catalog.findQuestions(catalogFilter, {
      offset: pagination.offset,
      limit: pagination.limit,
    });

    const items = rows.map(
      (question): QuestionWithStatus => ({
        ...question,
        status: statusByQuestion.get(question.ques_number) ?? "unattempted",
      })
    );

    return toPaginatedResult(items, total, page, size, pagination);
  }

  async getQuestion(quesNumber: number): Promise<Question> {
    const question = await this.deps.catalog.getQuestion(quesNumber);
    if (!question) {
      throw notFound("Question not found");
    }
    return question;
  }

  async getFilters(): Promise<QuestionFilterOptions> {
    const facets = await this.deps.catalog.listFacets();
    return {
      topics: distinctSorted(facets.topics),
      difficulties: DIFFICULTIES,
      sources: distinctSorted(facets.sources),
    };
  }
}

function distinctSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}
