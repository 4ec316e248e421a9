import type { AppConfig } from "./config/env";
import type { Services } from "./index";
import { AdminService } from "./lib/admin";
import { JwtIdentityProvider } from "./lib/jwt";
import type { Logger } from "./lib/logger";
import { ProgressService } from "./lib/progress";
import { QuestionService } from "./lib/questions";
import { createSupabaseCollaborators } from "./lib/supabase";

/**
 * Build every service against the configured Supabase project.
 * Tokens are verified locally when a JWT secret is configured, otherwise by the auth server.
 */
export function createServices(config: AppConfig, logger: Logger): Services {
  const { catalog, progress, auth, users } = createSupabaseCollaborators(config);

  const identity = config.supabaseJwtSecret
    ? new JwtIdentityProvider(config.supabaseJwtSecret, logger)
    : auth;

  if (!users) {
    logger.warn("SUPABASE_SERVICE_ROLE_KEY not set; admin routes are disabled");
  }

  return {
    questions: new QuestionService({ catalog, progress, logger }),
    progress: new ProgressService({ catalog, progress }),
    admin: users ? new AdminService({ catalog, progress, users, logger }) : null,
    identity,
    accounts: auth,
    logger,
  };
}
