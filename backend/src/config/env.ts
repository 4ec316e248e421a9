import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../lib/logger";

export interface AppConfig {
  supabaseUrl: string;
  supabaseKey: string;
  supabaseServiceRoleKey: string | null;
  supabaseJwtSecret: string | null;
  port: number;
  logLevel: LogLevel;
  corsOrigins: "*" | string[];
  questionsTable: string;
  progressTable: string;
  version: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const envSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_KEY: z.string().min(1),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_JWT_SECRET: optionalString,
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CORS_ORIGINS: z.string().default("*"),
  QUESTIONS_TABLE: z.string().min(1).default("TMUA"),
  PROGRESS_TABLE: z.string().min(1).default("user_progress"),
  APP_VERSION: z.string().default("0.1.0"),
});

/**
 * Build the application config from environment variables.
 * Throws with every offending key listed when the environment is incomplete.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration - ${problems}`);
  }

  const values = parsed.data;
  const origins = values.CORS_ORIGINS.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    supabaseUrl: values.SUPABASE_URL,
    supabaseKey: values.SUPABASE_KEY,
    supabaseServiceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY,
    supabaseJwtSecret: values.SUPABASE_JWT_SECRET,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    corsOrigins: origins.length === 0 || origins.includes("*") ? "*" : origins,
    questionsTable: values.QUESTIONS_TABLE,
    progressTable: values.PROGRESS_TABLE,
    version: values.APP_VERSION,
  };
}
