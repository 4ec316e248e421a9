/**
 * Test Helper Functions
 * In-process stand-ins for the remote stores plus token and fixture builders
 */

import { SignJWT } from "jose";
import { createApp, type Services } from "../index";
import { AdminService } from "../lib/admin";
import { isEligible } from "../lib/attempt-status";
import { unauthenticated } from "../lib/errors";
import { silentLogger } from "../lib/logger";
import { ProgressService } from "../lib/progress";
import { QuestionService } from "../lib/questions";
import type {
  AccountGateway,
  AttemptCountOptions,
  CatalogFacets,
  CatalogFilter,
  CatalogStore,
  IdentityProvider,
  PageRange,
  ProgressStore,
  SignInResult,
  SignUpInput,
  UserDirectory,
  UserUpdate,
} from "../lib/stores";
import type {
  Attempt,
  AuthUser,
  NewAttempt,
  NewQuestion,
  Question,
  UserAccount,
} from "../types/database";

export const TEST_JWT_SECRET = "test-secret-key-min-32-chars-long-for-testing";

export const STUDENT: AuthUser = {
  id: "user-1",
  email: "user@test.com",
  name: "Regular User",
  role: "student",
};

export const OTHER_STUDENT: AuthUser = {
  id: "user-2",
  email: "user2@test.com",
  name: "User Two",
  role: "student",
};

export const ADMIN: AuthUser = {
  id: "admin-1",
  email: "admin@test.com",
  name: "Admin User",
  role: "admin",
};

export const TOKENS = {
  student: "student-token",
  otherStudent: "other-student-token",
  admin: "admin-token",
} as const;

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/**
 * Create an access token shaped like the auth server's
 */
export async function createTestToken(
  userId: string,
  email: string,
  metadata: Record<string, unknown> = {},
  options: { secret?: string; expiresIn?: string | number; audience?: string } = {}
): Promise<string> {
  const secret = new TextEncoder().encode(options.secret ?? TEST_JWT_SECRET);

  return new SignJWT({ email, user_metadata: metadata })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(userId)
    .setAudience(options.audience ?? "authenticated")
    .setIssuedAt()
    .setExpirationTime(options.expiresIn ?? "1h")
    .sign(secret);
}

export function makeQuestion(quesNumber: number, overrides: Partial<Question> = {}): Question {
  return {
    ques_number: quesNumber,
    question: `Question ${quesNumber}`,
    options: "A) 1\nB) 2\nC) 3\nD) 4",
    solution: "Worked solution",
    topic: "Algebra",
    difficulty: "Easy",
    source: "Paper 1",
    q_type: 1,
    correct_answer: "A",
    image: null,
    solution_image: null,
    created_at: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

let attemptSequence = 0;

export function makeAttempt(
  questionId: number,
  isCorrect: boolean,
  attemptedAt: string,
  userId: string = STUDENT.id
): Attempt {
  attemptSequence++;
  return {
    id: attemptSequence,
    user_id: userId,
    question_id: questionId,
    selected_answer: isCorrect ? "A" : "B",
    is_correct: isCorrect,
    time_taken: 60,
    attempted_at: attemptedAt,
  };
}

function matches(filter: CatalogFilter, question: Question): boolean {
  if (filter.difficulty !== undefined && question.difficulty !== filter.difficulty) return false;
  if (filter.topic !== undefined && question.topic !== filter.topic) return false;
  if (filter.source !== undefined && question.source !== filter.source) return false;
  if (filter.q_type !== undefined && question.q_type !== filter.q_type) return false;
  if (filter.ids && !isEligible(filter.ids, question.ques_number)) return false;
  return true;
}

export class MemoryCatalogStore implements CatalogStore {
  readonly questions: Question[];

  constructor(questions: Question[] = []) {
    this.questions = [...questions];
  }

  async countQuestions(filter: CatalogFilter): Promise<number> {
    return this.questions.filter((question) => matches(filter, question)).length;
  }

  async findQuestions(filter: CatalogFilter, range: PageRange): Promise<Question[]> {
    return this.questions
      .filter((question) => matches(filter, question))
      .sort((a, b) => a.ques_number - b.ques_number)
      .slice(range.offset, range.offset + range.limit);
  }

  async getQuestion(quesNumber: number): Promise<Question | null> {
    return this.questions.find((question) => question.ques_number === quesNumber) ?? null;
  }

  async getQuestionsByIds(ids: number[]): Promise<Question[]> {
    return this.questions.filter((question) => ids.includes(question.ques_number));
  }

  async listFacets(): Promise<CatalogFacets> {
    return {
      topics: this.questions.map((question) => question.topic),
      sources: this.questions.map((question) => question.source),
    };
  }

  async insertQuestions(questions: NewQuestion[]): Promise<void> {
    for (const question of questions) {
      this.questions.push({ ...question, created_at: "2024-06-01T00:00:00.000Z" });
    }
  }
}

export class MemoryProgressStore implements ProgressStore {
  readonly attempts: Attempt[];
  private nextId = 1000;

  constructor(
    attempts: Attempt[] = [],
    private readonly now: () => Date = () => new Date()
  ) {
    this.attempts = [...attempts];
  }

  async listAttempts(userId: string, since?: string): Promise<Attempt[]> {
    return this.attempts.filter(
      (attempt) => attempt.user_id === userId && onOrAfter(attempt, since)
    );
  }

  async countUserAttempts(userId: string, options: AttemptCountOptions = {}): Promise<number> {
    const attempts = await this.listAttempts(userId, options.since);
    return options.correctOnly
      ? attempts.filter((attempt) => attempt.is_correct).length
      : attempts.length;
  }

  async listRecentAttempts(userId: string, limit: number): Promise<Attempt[]> {
    return this.attempts
      .filter((attempt) => attempt.user_id === userId)
      .sort((a, b) => Date.parse(b.attempted_at) - Date.parse(a.attempted_at))
      .slice(0, limit);
  }

  async insertAttempt(attempt: NewAttempt): Promise<Attempt> {
    const row: Attempt = {
      ...attempt,
      id: this.nextId++,
      attempted_at: this.now().toISOString(),
    };
    this.attempts.push(row);
    return row;
  }

  async listAllAttempts(since?: string): Promise<Attempt[]> {
    return this.attempts.filter((attempt) => onOrAfter(attempt, since));
  }

  async countAttempts(): Promise<number> {
    return this.attempts.length;
  }

  async deleteAttemptsForUser(userId: string): Promise<void> {
    const kept = this.attempts.filter((attempt) => attempt.user_id !== userId);
    this.attempts.splice(0, this.attempts.length, ...kept);
  }
}

function onOrAfter(attempt: Attempt, since?: string): boolean {
  return since === undefined || Date.parse(attempt.attempted_at) >= Date.parse(since);
}

export class StaticIdentityProvider implements IdentityProvider {
  constructor(private readonly users: Map<string, AuthUser>) {}

  async validate(token: string): Promise<AuthUser> {
    const user = this.users.get(token);
    if (!user) throw unauthenticated();
    return user;
  }
}

export class MemoryAccountGateway implements AccountGateway {
  readonly accounts = new Map<string, { password: string; user: AuthUser }>();

  async signUp(input: SignUpInput): Promise<AuthUser> {
    const user: AuthUser = {
      id: `account-${this.accounts.size + 1}`,
      email: input.email,
      name: input.name,
      role: "student",
    };
    this.accounts.set(input.email, { password: input.password, user });
    return user;
  }

  async signIn(email: string, password: string): Promise<SignInResult> {
    const account = this.accounts.get(email);
    if (!account || account.password !== password) throw unauthenticated();
    return { accessToken: `access-${account.user.id}`, user: account.user };
  }
}

export class MemoryUserDirectory implements UserDirectory {
  readonly accounts: UserAccount[];

  constructor(accounts: UserAccount[] = []) {
    this.accounts = [...accounts];
  }

  async listUsers(): Promise<UserAccount[]> {
    return [...this.accounts];
  }

  async updateUser(userId: string, update: UserUpdate): Promise<void> {
    const account = this.accounts.find((candidate) => candidate.id === userId);
    if (!account) return;
    if (update.role !== undefined) account.role = update.role;
    if (update.isActive !== undefined) account.is_active = update.isActive;
  }

  async deleteUser(userId: string): Promise<void> {
    const index = this.accounts.findIndex((candidate) => candidate.id === userId);
    if (index !== -1) this.accounts.splice(index, 1);
  }
}

export interface TestContext {
  app: ReturnType<typeof createApp>;
  catalog: MemoryCatalogStore;
  progress: MemoryProgressStore;
  users: MemoryUserDirectory;
  accounts: MemoryAccountGateway;
}

/**
 * Build the full app over in-memory stores
 */
export function createTestContext(
  options: {
    questions?: Question[];
    attempts?: Attempt[];
    accounts?: UserAccount[];
    identity?: IdentityProvider;
    withAdmin?: boolean;
    now?: () => Date;
  } = {}
): TestContext {
  const catalog = new MemoryCatalogStore(options.questions);
  const progress = new MemoryProgressStore(options.attempts, options.now);
  const users = new MemoryUserDirectory(
    options.accounts ?? [
      { ...STUDENT, is_active: true },
      { ...OTHER_STUDENT, is_active: true },
      { ...ADMIN, is_active: true },
    ]
  );
  const accounts = new MemoryAccountGateway();
  const identity =
    options.identity ??
    new StaticIdentityProvider(
      new Map<string, AuthUser>([
        [TOKENS.student, STUDENT],
        [TOKENS.otherStudent, OTHER_STUDENT],
        [TOKENS.admin, ADMIN],
      ])
    );

  const services: Services = {
    questions: new QuestionService({ catalog, progress, logger: silentLogger }),
    progress: new ProgressService({ catalog, progress, now: options.now }),
    admin:
      options.withAdmin === false
        ? null
        : new AdminService({ catalog, progress, users, logger: silentLogger, now: options.now }),
    identity,
    accounts,
    logger: silentLogger,
  };

  const app = createApp(services, { version: "test", corsOrigins: "*" });
  return { app, catalog, progress, users, accounts };
}
