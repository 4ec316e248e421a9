/**
 * Progress functions
 * Records attempts and aggregates a user's history in process
 */

import type { Attempt, NewAttempt, Question } from "../types/database";
import { notFound } from "./errors";
import type { CatalogStore, ProgressStore } from "./stores";

export const TIME_RANGES = ["today", "week", "month", "all"] as const;

export type TimeRange = (typeof TIME_RANGES)[number];

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AttemptInput {
  question_id: number;
  selected_answer: string;
  time_taken: number;
  is_correct: boolean;
}

export interface AttemptStats {
  total_attempts: number;
  correct_answers: number;
  accuracy: number;
}

export interface GroupProgress {
  total_attempts: number;
  correct_attempts: number;
  accuracy: number;
  average_time: number;
}

export interface TopicProgress extends GroupProgress {
  topic: string;
}

export interface DailyStreak {
  current_streak: number;
  longest_streak: number;
}

export interface TimelinePoint {
  date: string;
  attempts: number;
  correct: number;
  accuracy: number;
}

interface ProgressServiceDeps {
  catalog: CatalogStore;
  progress: ProgressStore;
  now?: () => Date;
}

/** UTC calendar day, YYYY-MM-DD */
export function utcDay(value: Date | string): string {
  return new Date(value).toISOString().split("T")[0];
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Inclusive lower bound of a time range, or undefined for `all` */
export function rangeStart(range: TimeRange, now: Date): string | undefined {
  const today = startOfUtcDay(now).getTime();
  switch (range) {
    case "today":
      return new Date(today).toISOString();
    case "week":
      return new Date(today - 7 * DAY_MS).toISOString();
    case "month":
      return new Date(today - 30 * DAY_MS).toISOString();
    case "all":
      return undefined;
  }
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

function summarize(attempts: readonly Attempt[]): GroupProgress {
  const correct = attempts.filter((attempt) => attempt.is_correct).length;
  const totalTime = attempts.reduce((sum, attempt) => sum + attempt.time_taken, 0);
  return {
    total_attempts: attempts.length,
    correct_attempts: correct,
    accuracy: percentage(correct, attempts.length),
    average_time: attempts.length > 0 ? totalTime / attempts.length : 0,
  };
}

/**
 * Current and longest runs of consecutive practice days.
 * The current run may end yesterday when nothing was practised yet today.
 */
export function computeStreak(days: readonly string[], today: string): DailyStreak {
  const practised = new Set(days);
  if (practised.size === 0) {
    return { current_streak: 0, longest_streak: 0 };
  }

  let cursor = new Date(`${today}T00:00:00.000Z`).getTime();
  if (!practised.has(today)) cursor -= DAY_MS;
  let current = 0;
  while (practised.has(utcDay(new Date(cursor)))) {
    current++;
    cursor -= DAY_MS;
  }

  const ordered = [...practised].sort();
  let longest = 0;
  let run = 0;
  let previous: number | null = null;
  for (const day of ordered) {
    const time = new Date(`${day}T00:00:00.000Z`).getTime();
    run = previous !== null && time - previous === DAY_MS ? run + 1 : 1;
    longest = Math.max(longest, run);
    previous = time;
  }

  return { current_streak: current, longest_streak: longest };
}

export class ProgressService {
  private readonly now: () => Date;

  constructor(private readonly deps: ProgressServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async recordAttempt(userId: string, input: AttemptInput): Promise<Attempt> {
    const question = await this.deps.catalog.getQuestion(input.question_id);
    if (!question) {
      throw notFound("Question not found");
    }

    const attempt: NewAttempt = {
      user_id: userId,
      question_id: input.question_id,
      selected_answer: input.selected_answer,
      time_taken: input.time_taken,
      is_correct: input.is_correct,
    };
    return this.deps.progress.insertAttempt(attempt);
  }

  async getStats(userId: string, range: TimeRange): Promise<AttemptStats> {
    const since = rangeStart(range, this.now());
    const [total, correct] = await Promise.all([
      this.deps.progress.countUserAttempts(userId, { since }),
      this.deps.progress.countUserAttempts(userId, { since, correctOnly: true }),
    ]);
    return {
      total_attempts: total,
      correct_answers: correct,
      accuracy: percentage(correct, total),
    };
  }

  async getTopicProgress(userId: string): Promise<TopicProgress[]> {
    const groups = await this.groupByQuestion(userId, (question) => question.topic);
    return [...groups.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([topic, attempts]) => ({ topic, ...summarize(attempts) }));
  }

  async getDifficultyProgress(userId: string): Promise<Record<string, GroupProgress>> {
    const groups = await this.groupByQuestion(userId, (question) => question.difficulty);
    const result: Record<string, GroupProgress> = {};
    for (const [difficulty, attempts] of groups) {
      result[difficulty] = summarize(attempts);
    }
    return result;
  }

  async getRecentAttempts(userId: string, limit: number): Promise<Attempt[]> {
    return this.deps.progress.listRecentAttempts(userId, limit);
  }

  async getDailyStreak(userId: string): Promise<DailyStreak> {
    const attempts = await this.deps.progress.listAttempts(userId);
    const days = attempts.map((attempt) => utcDay(attempt.attempted_at));
    return computeStreak(days, utcDay(this.now()));
  }

  async getPerformanceTimeline(userId: string, days: number): Promise<TimelinePoint[]> {
    const since = new Date(startOfUtcDay(this.now()).getTime() - days * DAY_MS);
    const attempts = await this.deps.progress.listAttempts(userId, since.toISOString());

    const byDay = new Map<string, { attempts: number; correct: number }>();
    for (const attempt of attempts) {
      const day = utcDay(attempt.attempted_at);
      const bucket = byDay.get(day) ?? { attempts: 0, correct: 0 };
      bucket.attempts++;
      if (attempt.is_correct) bucket.correct++;
      byDay.set(day, bucket);
    }

    return [...byDay.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, bucket]) => ({
        date,
        attempts: bucket.attempts,
        correct: bucket.correct,
        accuracy: percentage(bucket.correct, bucket.attempts),
      }));
  }

  /** Attempts whose question has left the catalog are dropped */
  private async groupByQuestion(
    userId: string,
    key: (question: Question) => string
  ): Promise<Map<string, Attempt[]>> {
    const attempts = await this.deps.progress.listAttempts(userId);
    const ids = [...new Set(attempts.map((attempt) => attempt.question_id))];
    const questions = await this.deps.catalog.getQuestionsByIds(ids);
    const byId = new Map(questions.map((question) => [question.ques_number, question]));

    const groups = new Map<string, Attempt[]>();
    for (const attempt of attempts) {
      const question = byId.get(attempt.question_id);
      if (!question) continue;
      const group = key(question);
      const bucket = groups.get(group) ?? [];
      bucket.push(attempt);
      groups.set(group, bucket);
    }
    return groups;
  }
}
