import { type PoolConfig } from "pg";
import { ConfigurationError } from "./errors";

/**
 * How ledger batch numbers are assigned during one migrate() call.
 *
 * - `one-batch-per-unit`: the next batch is re-read before every insert, so each
 *   unit gets its own batch and rollback() reverts a single unit.
 * - `one-batch-per-call`: the next batch is read once and shared by every unit
 *   applied in the call, so rollback() reverts the whole call.
 */
export type BatchPolicy = "one-batch-per-unit" | "one-batch-per-call";

export const BATCH_POLICIES: readonly BatchPolicy[] = [
  "one-batch-per-unit",
  "one-batch-per-call",
];

export interface TidemarkConfig {
  /** Directory holding the migration files */
  migrationsPath: string;
  /** Ledger table name */
  table: string;
  batchPolicy: BatchPolicy;
  /** File extensions discovery treats as migration files */
  extensions: string[];
}

export const DEFAULT_TABLE = "migrations";
/**
 * Loadable extensions in preference order. Compiled output comes first so a
 * built CLI requires `x.js` rather than its `x.ts` source; ES module files are
 * left out because they cannot be required.
 */
export const DEFAULT_EXTENSIONS = [".js", ".cjs", ".ts"];

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isBatchPolicy(value: string): value is BatchPolicy {
  return BATCH_POLICIES.some((policy) => policy === value);
}

/**
 * Fill in defaults and validate a partial configuration
 * @throws ConfigurationError if the table name is not a plain SQL identifier
 */
export function resolveConfig(
  config: Partial<TidemarkConfig> & { migrationsPath: string },
): TidemarkConfig {
  const table = config.table ?? DEFAULT_TABLE;

  if (!IDENTIFIER_PATTERN.test(table)) {
    throw new ConfigurationError(
      `Ledger table name must be a plain SQL identifier, got "${table}"`,
    );
  }

  return {
    migrationsPath: config.migrationsPath,
    table,
    batchPolicy: config.batchPolicy ?? "one-batch-per-unit",
    extensions: config.extensions ?? DEFAULT_EXTENSIONS,
  };
}

const REQUIRED_ENV_VARS = [
  "POSTGRES_USER",
  "POSTGRES_HOST",
  "POSTGRES_DATABASE",
  "POSTGRES_PASSWORD",
  "POSTGRES_PORT",
  "MIGRATIONS_PATH",
];

function parseInteger(
  env: Record<string, string | undefined>,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }

  return value;
}

/**
 * Read connection settings and migrator configuration from environment variables
 * @param env Environment to read (usually process.env)
 * @param prefix Optional prefix, e.g. "API_" for "API_POSTGRES_USER"
 * @throws ConfigurationError listing every missing variable
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined>,
  prefix: string = "",
): { pool: PoolConfig; migrator: TidemarkConfig } {
  const missing = REQUIRED_ENV_VARS.filter((name) => !env[`${prefix}${name}`]);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.map((name) => `${prefix}${name}`).join(", ")}`,
    );
  }

  const batchPolicy = env[`${prefix}MIGRATIONS_BATCH_POLICY`];
  if (batchPolicy !== undefined && !isBatchPolicy(batchPolicy)) {
    throw new ConfigurationError(
      `${prefix}MIGRATIONS_BATCH_POLICY must be one of ${BATCH_POLICIES.join(", ")}, got "${batchPolicy}"`,
    );
  }

  const pool: PoolConfig = {
    user: env[`${prefix}POSTGRES_USER`],
    host: env[`${prefix}POSTGRES_HOST`],
    database: env[`${prefix}POSTGRES_DATABASE`],
    password: env[`${prefix}POSTGRES_PASSWORD`],
    port: parseInteger(env, `${prefix}POSTGRES_PORT`, 5432),
    max: parseInteger(env, `${prefix}POSTGRES_MAX_CONNECTIONS`, 20),
    idleTimeoutMillis: parseInteger(env, `${prefix}POSTGRES_IDLE_TIMEOUT`, 30000),
    connectionTimeoutMillis: parseInteger(
      env,
      `${prefix}POSTGRES_CONNECTION_TIMEOUT`,
      2000,
    ),
  };

  const migrator = resolveConfig({
    migrationsPath: env[`${prefix}MIGRATIONS_PATH`] ?? "",
    table: env[`${prefix}MIGRATIONS_TABLE`] || undefined,
    batchPolicy,
  });

  return { pool, migrator };
}
