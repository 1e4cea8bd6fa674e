/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * Malformed values throw at startup.
 */

export type StoreKind = "postgres" | "memory";

export interface AppConfig {
  /** Which WorkflowStore backs the engine */
  store: StoreKind;
  database: {
    url: string | null;
    poolSize: number;
    connectTimeoutSeconds: number;
    /** Server-side limit on any one statement. 0 disables it. */
    statementTimeoutMs: number;
    /** How long a statement may wait for a row lock. 0 disables it. */
    lockTimeoutMs: number;
  };
  workflow: {
    /** How many times a transition is re-attempted after losing a race */
    maxRetries: number;
    /** Base delay between attempts; attempt n waits n × this */
    retryDelayMs: number;
    /** How long cached statuses and edges stay fresh. 0 disables the cache. */
    cacheTtlMs: number;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Parses a non-negative integer variable, or returns the fallback when unset.
 * Throws on anything that is not a whole number.
 */
function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readStore(env: Env, databaseUrl: string | null): StoreKind {
  const raw = env.WORKFLOW_STORE;
  if (raw === undefined || raw === "") {
    return databaseUrl ? "postgres" : "memory";
  }
  if (raw !== "postgres" && raw !== "memory") {
    throw new Error(`WORKFLOW_STORE must be "postgres" or "memory", got "${raw}"`);
  }
  return raw;
}

/**
 * Loads configuration from the environment (process.env by default).
 * Throws immediately if a value is malformed or the postgres store is
 * selected without a DATABASE_URL.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim() || null;
  const store = readStore(env, databaseUrl);

  if (store === "postgres" && !databaseUrl) {
    throw new Error(
      "DATABASE_URL environment variable is required when WORKFLOW_STORE=postgres."
    );
  }

  return {
    store,
    database: {
      url: databaseUrl,
      poolSize: readInt(env, "DATABASE_POOL_SIZE", 10),
      connectTimeoutSeconds: readInt(env, "DATABASE_CONNECT_TIMEOUT", 10),
      statementTimeoutMs: readInt(env, "DATABASE_STATEMENT_TIMEOUT_MS", 30_000),
      lockTimeoutMs: readInt(env, "DATABASE_LOCK_TIMEOUT_MS", 5_000),
    },
    workflow: {
      maxRetries: readInt(env, "WORKFLOW_MAX_RETRIES", 3),
      retryDelayMs: readInt(env, "WORKFLOW_RETRY_DELAY_MS", 25),
      cacheTtlMs: readInt(env, "WORKFLOW_CACHE_TTL_MS", 30_000),
    },
  };
}
