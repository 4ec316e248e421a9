/**
 * Database types matching the remote tables
 */

export const DIFFICULTIES = ["Easy", "Medium", "Hard"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

/** Row of the question catalog table */
export interface Question {
  ques_number: number;
  question: string;
  options: string;
  solution: string;
  topic: string;
  difficulty: string;
  source: string;
  q_type: number;
  correct_answer: string;
  image: string | null;
  solution_image: string | null;
  created_at: string;
}

export type NewQuestion = Omit<Question, "created_at">;

/** Row of the progress table */
export interface Attempt {
  id: number;
  user_id: string;
  question_id: number;
  selected_answer: string;
  is_correct: boolean;
  time_taken: number;
  attempted_at: string;
}

export type NewAttempt = Omit<Attempt, "id" | "attempted_at">;

export const QUESTION_STATUSES = ["correct", "incorrect", "unattempted"] as const;

export type QuestionStatus = (typeof QUESTION_STATUSES)[number];

export interface QuestionWithStatus extends Question {
  status: QuestionStatus;
}

export const USER_ROLES = ["admin", "teacher", "student"] as const;

export type UserRole = (typeof USER_ROLES)[number];

/** Identity resolved from a bearer token */
export interface AuthUser {
  id: string;
  email: string;
  name: string | null;
  role: UserRole;
}

/** Account as seen by the user directory */
export interface UserAccount extends AuthUser {
  is_active: boolean;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  size: number;
  total_pages: number;
  has_next: boolean;
  has_previous: boolean;
  next_page: number | null;
  previous_page: number | null;
}
