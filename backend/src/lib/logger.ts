/**
 * Leveled console logger
 * Created once from config and handed to whatever needs it
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const sinks: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(level: LogLevel, name = "exam-api"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (at: LogLevel, message: string, fields?: LogFields) => {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    const line = `${new Date().toISOString()} | ${at.toUpperCase().padEnd(5)} | ${name} - ${message}`;
    if (fields && Object.keys(fields).length > 0) {
      sinks[at](line, fields);
    } else {
      sinks[at](line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log start, completion and failure of a named operation around `run`.
 * Failures are rethrown unchanged.
 */
export async function withOperation<T>(
  logger: Logger,
  operation: string,
  fields: LogFields,
  run: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  logger.debug(`Starting operation: ${operation}`, { operation, ...fields });
  try {
    const result = await run();
    logger.info(`Operation completed: ${operation}`, {
      operation,
      duration_ms: Date.now() - start,
      ...fields,
    });
    return result;
  } catch (error) {
    logger.error(`Operation failed: ${operation}`, {
      operation,
      error: describeError(error),
      ...fields,
    });
    throw error;
  }
}
