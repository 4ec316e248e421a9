/**
 * Progress API Tests
 * Attempt recording and statistics over HTTP
 */

import { describe, it, expect } from "vitest";
import { bearer, createTestContext, makeAttempt, makeQuestion, TOKENS } from "./helpers";

const NOW = new Date("2024-03-10T12:00:00.000Z");

function context() {
  return createTestContext({
    questions: [
      makeQuestion(1, { topic: "Algebra", difficulty: "Easy" }),
      makeQuestion(2, { topic: "Functions", difficulty: "Medium" }),
    ],
    attempts: [
      makeAttempt(1, true, "2024-03-10T09:00:00.000Z"),
      makeAttempt(2, false, "2024-03-09T09:00:00.000Z"),
      makeAttempt(2, true, "2024-01-15T09:00:00.000Z"),
    ],
    now: () => NOW,
  });
}

async function get(path: string) {
  const { app } = context();
  const response = await app.request(path, { headers: bearer(TOKENS.student) });
  return { response, data: await response.json() };
}

describe("POST /api/progress/attempt", () => {
  it("records the attempt and returns it", async () => {
    const { app } = context();

    const response = await app.request("/api/progress/attempt", {
      method: "POST",
      headers: { ...bearer(TOKENS.student), "Content-Type": "application/json" },
      body: JSON.stringify({ question_id: 1, selected_answer: "B", time_taken: 12, is_correct: false }),
    });

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({
      id: 1000,
      user_id: "user-1",
      question_id: 1,
      selected_answer: "B",
      time_taken: 12,
      is_correct: false,
      attempted_at: "2024-03-10T12:00:00.000Z",
    });
  });

  it("validates the body", async () => {
    const { app } = context();

    const response = await app.request("/api/progress/attempt", {
      method: "POST",
      headers: { ...bearer(TOKENS.student), "Content-Type": "application/json" },
      body: JSON.stringify({ question_id: 1, selected_answer: "B", time_taken: -1 }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      detail: "time_taken: Number must be greater than or equal to 0; is_correct: Required",
    });
  });
});

describe("GET /api/progress/*", () => {
  it("reports stats for a time range", async () => {
    const { data } = await get("/api/progress/stats?time_range=week");

    expect(data).toEqual({ total_attempts: 2, correct_answers: 1, accuracy: 50 });
  });

  it("rejects an unknown time range", async () => {
    const { response } = await get("/api/progress/stats?time_range=year");

    expect(response.status).toBe(400);
  });

  it("reports topic progress", async () => {
    const { data } = await get("/api/progress/topic-progress");

    expect(data).toEqual([
      { topic: "Algebra", total_attempts: 1, correct_attempts: 1, accuracy: 100, average_time: 60 },
      { topic: "Functions", total_attempts: 2, correct_attempts: 1, accuracy: 50, average_time: 60 },
    ]);
  });

  it("reports difficulty progress", async () => {
    const { data } = await get("/api/progress/difficulty-progress");

    expect(Object.keys(data).sort()).toEqual(["Easy", "Medium"]);
    expect(data.Medium.total_attempts).toBe(2);
  });

  it("limits recent attempts", async () => {
    const { data } = await get("/api/progress/recent-attempts?limit=1");

    expect(data).toHaveLength(1);
    expect(data[0].attempted_at).toBe("2024-03-10T09:00:00.000Z");
  });

  it("rejects a recent-attempts limit above 50", async () => {
    const { response } = await get("/api/progress/recent-attempts?limit=51");

    expect(response.status).toBe(400);
  });

  it("reports the daily streak", async () => {
    const { data } = await get("/api/progress/daily-streak");

    expect(data).toEqual({ current_streak: 2, longest_streak: 2 });
  });

  it("builds the performance timeline", async () => {
    const { data } = await get("/api/progress/performance-timeline?days=90");

    expect(data).toEqual([
      { date: "2024-01-15", attempts: 1, correct: 1, accuracy: 100 },
      { date: "2024-03-09", attempts: 1, correct: 0, accuracy: 0 },
      { date: "2024-03-10", attempts: 1, correct: 1, accuracy: 100 },
    ]);
  });
});
