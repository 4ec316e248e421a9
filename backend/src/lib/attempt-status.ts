/**
 * Per-user question status and status-filter eligibility
 */

import type { Attempt, QuestionStatus } from "../types/database";
import type { IdPredicate } from "./stores";

export type AnsweredStatus = Exclude<QuestionStatus, "unattempted">;

/**
 * Which question ids a status filter admits.
 * `no_filter` admits everything; `none` admits nothing and the catalog need not be asked.
 */
export type Eligibility = { kind: "no_filter" } | { kind: "none" } | IdPredicate;

export interface StatusResolution {
  statusByQuestion: Map<number, AnsweredStatus>;
  eligibility: Eligibility;
}

/**
 * Fold attempts into a status per question. The most recent attempt by
 * `attempted_at` decides; equal timestamps keep the order they were given in,
 * so the later one wins.
 */
export function buildStatusMap(attempts: readonly Attempt[]): Map<number, AnsweredStatus> {
  const ordered = attempts
    .map((attempt, index) => ({ attempt, index, at: Date.parse(attempt.attempted_at) }))
    .sort((a, b) => {
      const byTime = (Number.isNaN(a.at) ? 0 : a.at) - (Number.isNaN(b.at) ? 0 : b.at);
      return byTime !== 0 ? byTime : a.index - b.index;
    });

  const statusByQuestion = new Map<number, AnsweredStatus>();
  for (const { attempt } of ordered) {
    statusByQuestion.set(attempt.question_id, attempt.is_correct ? "correct" : "incorrect");
  }
  return statusByQuestion;
}

export function resolveStatuses(
  attempts: readonly Attempt[],
  requested?: ReadonlySet<QuestionStatus> | null
): StatusResolution {
  const statusByQuestion = buildStatusMap(attempts);

  if (!requested || requested.size === 0) {
    return { statusByQuestion, eligibility: { kind: "no_filter" } };
  }

  const attemptedIds: number[] = [];
  const filterIds: number[] = [];
  for (const [questionId, status] of statusByQuestion) {
    attemptedIds.push(questionId);
    if (requested.has(status)) filterIds.push(questionId);
  }
  attemptedIds.sort((a, b) => a - b);
  filterIds.sort((a, b) => a - b);

  if (requested.has("unattempted")) {
    if (attemptedIds.length === 0) {
      return { statusByQuestion, eligibility: { kind: "no_filter" } };
    }
    if (filterIds.length > 0) {
      return {
        statusByQuestion,
        eligibility: { kind: "in_or_not_in", include: filterIds, exclude: attemptedIds },
      };
    }
    return { statusByQuestion, eligibility: { kind: "not_in", ids: attemptedIds } };
  }

  if (filterIds.length > 0) {
    return { statusByQuestion, eligibility: { kind: "in", ids: filterIds } };
  }

  return { statusByQuestion, eligibility: { kind: "none" } };
}

/** Does `questionId` pass the eligibility predicate */
export function isEligible(eligibility: Eligibility, questionId: number): boolean {
  switch (eligibility.kind) {
    case "no_filter":
      return true;
    case "none":
      return false;
    case "in":
      return eligibility.ids.includes(questionId);
    case "not_in":
      return !eligibility.ids.includes(questionId);
    case "in_or_not_in":
      return (
        eligibility.include.includes(questionId) ||
        !eligibility.exclude.includes(questionId)
      );
  }
}
