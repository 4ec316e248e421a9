/**
 * Collaborator contracts
 * The remote tables and the auth platform are reached only through these
 */

import type {
  Attempt,
  AuthUser,
  NewAttempt,
  NewQuestion,
  Question,
  UserAccount,
  UserRole,
} from "../types/database";

/**
 * Restriction on the question identifier.
 * `in_or_not_in` is one predicate: id in `include` OR id not in `exclude`.
 */
export type IdPredicate =
  | { kind: "in"; ids: number[] }
  | { kind: "not_in"; ids: number[] }
  | { kind: "in_or_not_in"; include: number[]; exclude: number[] };

export interface CatalogFilter {
  difficulty?: string;
  topic?: string;
  source?: string;
  q_type?: number;
  ids?: IdPredicate;
}

export interface PageRange {
  offset: number;
  limit: number;
}

export interface CatalogFacets {
  topics: string[];
  sources: string[];
}

export interface CatalogStore {
  /** Exact row count for the filter; fetches no rows */
  countQuestions(filter: CatalogFilter): Promise<number>;
  /** One page of matching rows, ascending by question number */
  findQuestions(filter: CatalogFilter, range: PageRange): Promise<Question[]>;
  getQuestion(quesNumber: number): Promise<Question | null>;
  getQuestionsByIds(ids: number[]): Promise<Question[]>;
  /** Raw topic and source values, possibly repeated */
  listFacets(): Promise<CatalogFacets>;
  insertQuestions(questions: NewQuestion[]): Promise<void>;
}

export interface AttemptCountOptions {
  /** Inclusive ISO timestamp */
  since?: string;
  correctOnly?: boolean;
}

export interface ProgressStore {
  /** Full history of one user, optionally from `since` (inclusive ISO timestamp) */
  listAttempts(userId: string, since?: string): Promise<Attempt[]>;
  /** Exact count of one user's attempts; fetches no rows */
  countUserAttempts(userId: string, options?: AttemptCountOptions): Promise<number>;
  /** Newest first */
  listRecentAttempts(userId: string, limit: number): Promise<Attempt[]>;
  insertAttempt(attempt: NewAttempt): Promise<Attempt>;
  /** Every user's attempts, optionally from `since` */
  listAllAttempts(since?: string): Promise<Attempt[]>;
  countAttempts(): Promise<number>;
  deleteAttemptsForUser(userId: string): Promise<void>;
}

export interface IdentityProvider {
  /** Resolve a bearer token to a user; rejects with an `unauthenticated` AppError */
  validate(token: string): Promise<AuthUser>;
}

export interface SignUpInput {
  email: string;
  password: string;
  name: string;
}

export interface SignInResult {
  accessToken: string;
  user: AuthUser;
}

export interface AccountGateway {
  signUp(input: SignUpInput): Promise<AuthUser>;
  signIn(email: string, password: string): Promise<SignInResult>;
}

export interface UserUpdate {
  role?: UserRole;
  isActive?: boolean;
}

export interface UserDirectory {
  listUsers(): Promise<UserAccount[]>;
  updateUser(userId: string, update: UserUpdate): Promise<void>;
  deleteUser(userId: string): Promise<void>;
}
