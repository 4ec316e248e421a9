/**
 * Supabase-backed implementations of the collaborator contracts
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "../config/env";
import type {
  Attempt,
  AuthUser,
  NewAttempt,
  NewQuestion,
  Question,
  UserAccount,
} from "../types/database";
import { AppError, unauthenticated, upstreamError } from "./errors";
import { identityRecordSchema, isBanned, toAuthUser } from "./roles";
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
} from "./stores";

// Effectively permanent; lifted again with "none"
const DEACTIVATED_BAN_DURATION = "876000h";
const USER_PAGE_SIZE = 1000;
// Matches the PostgREST max-rows cap of hosted projects
const READ_PAGE_SIZE = 1000;
const QUESTION_KEY = "ques_number";

interface QueryOutcome {
  error: { message: string } | null;
  status: number;
}

function check(outcome: QueryOutcome): void {
  if (outcome.error) {
    throw upstreamError(
      { message: outcome.error.message, status: outcome.status },
      outcome.error
    );
  }
}

interface AuthFailure {
  message: string;
  status?: number;
}

function authFailure(error: AuthFailure): AppError {
  if (!error.status || error.status >= 500) {
    return upstreamError({ message: error.message, status: error.status }, error);
  }
  return unauthenticated();
}

interface PageOutcome<T> extends QueryOutcome {
  data: T[] | null;
}

/**
 * Read every row of a query one range at a time; a short page ends the scan.
 * `page` must apply a stable order so ranges do not overlap.
 */
export async function readAllPages<T>(
  page: (from: number, to: number) => PromiseLike<PageOutcome<T>>
): Promise<T[]> {
  const rows: T[] = [];
  for (let from = 0; ; from += READ_PAGE_SIZE) {
    const result = await page(from, from + READ_PAGE_SIZE - 1);
    check(result);
    const data = result.data ?? [];
    rows.push(...data);
    if (data.length < READ_PAGE_SIZE) break;
  }
  return rows;
}

export function createSupabaseClient(url: string, key: string): SupabaseClient {
  return createClient(url, key, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
}

const idList = (ids: number[]) => `(${ids.join(",")})`;

interface FilterPlan {
  clauses: Array<[column: string, operator: string, value: string]>;
  or: string | null;
}

/**
 * Translate a catalog filter into PostgREST clauses. The identifier predicate
 * collapses to nothing when its exclusion list is empty, since every row passes.
 */
export function planCatalogFilter(filter: CatalogFilter): FilterPlan {
  const clauses: FilterPlan["clauses"] = [];
  if (filter.difficulty) clauses.push(["difficulty", "eq", filter.difficulty]);
  if (filter.topic) clauses.push(["topic", "eq", filter.topic]);
  if (filter.source) clauses.push(["source", "eq", filter.source]);
  if (filter.q_type !== undefined) clauses.push(["q_type", "eq", String(filter.q_type)]);

  let or: string | null = null;
  const ids = filter.ids;
  if (ids?.kind === "in") {
    clauses.push([QUESTION_KEY, "in", idList(ids.ids)]);
  } else if (ids?.kind === "not_in" && ids.ids.length > 0) {
    clauses.push([QUESTION_KEY, "not.in", idList(ids.ids)]);
  } else if (ids?.kind === "in_or_not_in" && ids.exclude.length > 0) {
    or = `${QUESTION_KEY}.in.${idList(ids.include)},${QUESTION_KEY}.not.in.${idList(ids.exclude)}`;
  }

  return { clauses, or };
}

export class SupabaseCatalogStore implements CatalogStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async countQuestions(filter: CatalogFilter): Promise<number> {
    const plan = planCatalogFilter(filter);
    let query = this.client
      .from(this.table)
      .select("*", { count: "exact", head: true });
    for (const [column, operator, value] of plan.clauses) {
      query = query.filter(column, operator, value);
    }
    if (plan.or) query = query.or(plan.or);

    const result = await query;
    check(result);
    return result.count ?? 0;
  }

  async findQuestions(filter: CatalogFilter, range: PageRange): Promise<Question[]> {
    const plan = planCatalogFilter(filter);
    let query = this.client.from(this.table).select("*");
    for (const [column, operator, value] of plan.clauses) {
      query = query.filter(column, operator, value);
    }
    if (plan.or) query = query.or(plan.or);

    const result = await query
      .order(QUESTION_KEY, { ascending: true })
      .range(range.offset, range.offset + range.limit - 1);
    check(result);
    return result.data ?? [];
  }

  async getQuestion(quesNumber: number): Promise<Question | null> {
    const result = await this.client
      .from(this.table)
      .select("*")
      .eq(QUESTION_KEY, quesNumber)
      .maybeSingle();
    check(result);
    return result.data;
  }

  async getQuestionsByIds(ids: number[]): Promise<Question[]> {
    if (ids.length === 0) return [];
    const result = await this.client
      .from(this.table)
      .select("*")
      .in(QUESTION_KEY, ids);
    check(result);
    return result.data ?? [];
  }

  async listFacets(): Promise<CatalogFacets> {
    const rows = await readAllPages<{ topic: string | null; source: string | null }>(
      (from, to) =>
        this.client
          .from(this.table)
          .select("topic, source")
          .order(QUESTION_KEY, { ascending: true })
          .range(from, to)
    );
    return {
      topics: rows.flatMap((row) => (row.topic ? [row.topic] : [])),
      sources: rows.flatMap((row) => (row.source ? [row.source] : [])),
    };
  }

  async insertQuestions(questions: NewQuestion[]): Promise<void> {
    const result = await this.client.from(this.table).insert(questions);
    check(result);
  }
}

export class SupabaseProgressStore implements ProgressStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async listAttempts(userId: string, since?: string): Promise<Attempt[]> {
    return readAllPages<Attempt>((from, to) => {
      let query = this.client.from(this.table).select("*").eq("user_id", userId);
      if (since) query = query.gte("attempted_at", since);
      return query.order("id", { ascending: true }).range(from, to);
    });
  }

  async countUserAttempts(userId: string, options: AttemptCountOptions = {}): Promise<number> {
    let query = this.client
      .from(this.table)
      .select("*", { count: "exact", head: true })
      .eq("user_id", userId);
    if (options.since) query = query.gte("attempted_at", options.since);
    if (options.correctOnly) query = query.eq("is_correct", true);
    const result = await query;
    check(result);
    return result.count ?? 0;
  }

  async listRecentAttempts(userId: string, limit: number): Promise<Attempt[]> {
    const result = await this.client
      .from(this.table)
      .select("*")
      .eq("user_id", userId)
      .order("attempted_at", { ascending: false })
      .limit(limit);
    check(result);
    return result.data ?? [];
  }

  async insertAttempt(attempt: NewAttempt): Promise<Attempt> {
    const result = await this.client
      .from(this.table)
      .insert(attempt)
      .select("*")
      .single();
    check(result);
    return result.data;
  }

  async listAllAttempts(since?: string): Promise<Attempt[]> {
    return readAllPages<Attempt>((from, to) => {
      let query = this.client.from(this.table).select("*");
      if (since) query = query.gte("attempted_at", since);
      return query.order("id", { ascending: true }).range(from, to);
    });
  }

  async countAttempts(): Promise<number> {
    const result = await this.client
      .from(this.table)
      .select("*", { count: "exact", head: true });
    check(result);
    return result.count ?? 0;
  }

  async deleteAttemptsForUser(userId: string): Promise<void> {
    const result = await this.client.from(this.table).delete().eq("user_id", userId);
    check(result);
  }
}

/**
 * Validates tokens with a round trip to the auth server and handles
 * email/password sign-up and sign-in.
 */
export class SupabaseAuthGateway implements IdentityProvider, AccountGateway {
  constructor(private readonly client: SupabaseClient) {}

  async validate(token: string): Promise<AuthUser> {
    const { data, error } = await this.client.auth.getUser(token);
    if (error) throw authFailure(error);
    const record = identityRecordSchema.safeParse(data.user);
    if (!record.success) throw unauthenticated();
    return toAuthUser(record.data);
  }

  async signUp(input: SignUpInput): Promise<AuthUser> {
    const { data, error } = await this.client.auth.signUp({
      email: input.email,
      password: input.password,
      options: { data: { name: input.name } },
    });
    if (error) {
      throw upstreamError({ message: error.message, status: error.status }, error);
    }
    const record = identityRecordSchema.safeParse(data.user);
    if (!record.success) {
      throw upstreamError({ message: "Sign-up returned no user", status: 502 });
    }
    return toAuthUser(record.data);
  }

  async signIn(email: string, password: string): Promise<SignInResult> {
    const { data, error } = await this.client.auth.signInWithPassword({
      email,
      password,
    });
    if (error) throw authFailure(error);
    const record = identityRecordSchema.safeParse(data.user);
    if (!record.success || !data.session) throw unauthenticated();
    return {
      accessToken: data.session.access_token,
      user: toAuthUser(record.data),
    };
  }
}

/** Needs a client created with the service role key */
export class SupabaseUserDirectory implements UserDirectory {
  constructor(
    private readonly client: SupabaseClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listUsers(): Promise<UserAccount[]> {
    const accounts: UserAccount[] = [];
    for (let page = 1; ; page++) {
      const { data, error } = await this.client.auth.admin.listUsers({
        page,
        perPage: USER_PAGE_SIZE,
      });
      if (error) {
        throw upstreamError({ message: error.message, status: error.status }, error);
      }
      for (const user of data.users) {
        const record = identityRecordSchema.parse(user);
        accounts.push({
          ...toAuthUser(record),
          is_active: !isBanned(record, this.now()),
        });
      }
      if (data.users.length < USER_PAGE_SIZE) break;
    }
    return accounts;
  }

  async updateUser(userId: string, update: UserUpdate): Promise<void> {
    const { error } = await this.client.auth.admin.updateUserById(userId, {
      ...(update.role !== undefined ? { user_metadata: { role: update.role } } : {}),
      ...(update.isActive !== undefined
        ? { ban_duration: update.isActive ? "none" : DEACTIVATED_BAN_DURATION }
        : {}),
    });
    if (error) {
      throw upstreamError({ message: error.message, status: error.status }, error);
    }
  }

  async deleteUser(userId: string): Promise<void> {
    const { error } = await this.client.auth.admin.deleteUser(userId);
    if (error) {
      throw upstreamError({ message: error.message, status: error.status }, error);
    }
  }
}

export interface SupabaseCollaborators {
  catalog: SupabaseCatalogStore;
  progress: SupabaseProgressStore;
  auth: SupabaseAuthGateway;
  users: SupabaseUserDirectory | null;
}

export function createSupabaseCollaborators(config: AppConfig): SupabaseCollaborators {
  const client = createSupabaseClient(config.supabaseUrl, config.supabaseKey);
  const admin = config.supabaseServiceRoleKey
    ? createSupabaseClient(config.supabaseUrl, config.supabaseServiceRoleKey)
    : null;
  // Table writes that bypass row level security go through the service role
  const tables = admin ?? client;

  return {
    catalog: new SupabaseCatalogStore(tables, config.questionsTable),
    progress: new SupabaseProgressStore(tables, config.progressTable),
    auth: new SupabaseAuthGateway(client),
    users: admin ? new SupabaseUserDirectory(admin) : null,
  };
}
