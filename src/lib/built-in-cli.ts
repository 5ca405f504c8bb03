import { Pool } from "pg";
import { type LogDataInput, BaseLogger, buildLogPrefix } from "./logger";
import { type BatchPolicy, loadConfigFromEnv } from "./config";
import { getErrorMessage } from "./errors";
import { type MigrationStatus, Migrator } from "./migrator";
import { type MigrationRegistry } from "./resolver";

/**
 * Logger function type for the Tidemark CLI
 */
export type CLILoggerFunction = (
  type:
    | "info"
    | "error"
    | "warn"
    | "migrate-info"
    | "migrate-error"
    | "migrate-warn",
  message: string,
) => void;

/**
 * Console-based logger implementation for the Tidemark CLI
 * @param migrateVerbose Whether to print migrator info messages
 */
export const createCLIConsoleLogger = (
  migrateVerbose: boolean = true,
): CLILoggerFunction => {
  return (type, message) => {
    switch (type) {
      case "info":
        console.log(message);
        break;
      case "error":
        console.error(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "migrate-info":
        if (migrateVerbose) {
          console.log(`[MIGRATE-INFO] ${message}`);
        }
        break;
      case "migrate-error":
        console.error(`[MIGRATE-ERROR] ${message}`);
        break;
      case "migrate-warn":
        console.warn(`[MIGRATE-WARN] ${message}`);
        break;
    }
  };
};

/**
 * Routes migrator log calls to the migrate-* channels of a CLI logger function
 */
export class CLIMigratorLogger extends BaseLogger {
  private cliLogger: CLILoggerFunction;

  constructor(logger: CLILoggerFunction) {
    super();
    this.cliLogger = logger;
  }

  info(data: LogDataInput): void {
    this.cliLogger("migrate-info", `${buildLogPrefix(data)}${data.message}`);
  }

  error(data: LogDataInput): void {
    const message =
      data.error === undefined
        ? data.message
        : `${data.message}: ${getErrorMessage(data.error)}`;

    this.cliLogger("migrate-error", `${buildLogPrefix(data)}${message}`);
  }

  warn(data: LogDataInput): void {
    this.cliLogger("migrate-warn", `${buildLogPrefix(data)}${data.message}`);
  }
}

async function testConnection(
  pool: Pool,
  logger: CLILoggerFunction,
  loadedFrom: "env" | "pool",
): Promise<boolean> {
  try {
    await pool.query("SELECT 1");
    logger("info", "Successfully connected to database");
    return true;
  } catch (error) {
    logger("error", "Error connecting to database:");
    logger("error", `→ ${getErrorMessage(error)}`);

    if (loadedFrom === "env") {
      logger(
        "error",
        "\nPlease check the POSTGRES_* environment variables and make sure PostgreSQL is running and accessible.",
      );
    } else {
      logger(
        "error",
        "\nPlease check that the provided database pool is configured correctly.",
      );
    }

    return false;
  }
}

function reportList(
  logger: CLILoggerFunction,
  verb: string,
  pastTense: string,
  migrations: string[],
  pretend: boolean,
): void {
  if (migrations.length === 0) {
    logger("info", `Nothing to ${verb}`);
    return;
  }

  const label = pretend ? `Would ${verb}` : pastTense;
  logger("info", `${label} ${migrations.length} migration(s):`);

  for (const migration of migrations) {
    logger("info", `  ${migration}`);
  }
}

function showMigrationStatus(
  status: MigrationStatus[],
  migrationsPath: string,
  logger: CLILoggerFunction,
): void {
  logger("info", "\nMigration Status:");
  logger("info", "=================");
  logger("info", `Directory: ${migrationsPath}`);

  if (status.length === 0) {
    logger("info", "No migrations found.");
    return;
  }

  const width = Math.max(9, ...status.map((entry) => entry.migration.length));

  logger("info", `${"Migration".padEnd(width)} | Ran | Batch`);
  logger("info", `${"-".repeat(width)}-|-----|------`);

  for (const entry of status) {
    const ran = entry.ran ? "Yes" : "No ";
    const batch = entry.batch === null ? "" : String(entry.batch);
    const note = entry.orphaned ? " (file missing)" : "";

    logger(
      "info",
      `${entry.migration.padEnd(width)} | ${ran} | ${batch}${note}`.trimEnd(),
    );
  }
}

const HELP_TEXT = `
Tidemark Migration CLI

Available commands:
  migrate     Run pending migrations
  rollback    Roll back the last batch
  reset       Roll back every applied migration
  status      Show migration status

Options:
  --pretend          List what would run without running it
  --batch-per-call   Give every migration applied by one migrate call the same batch
`;

/**
 * Run the Tidemark CLI with the provided configuration
 * @param config.registry Registry of migration implementations built at startup (file exports are loaded on top)
 * @param config.loadFrom Read the connection and migrator settings from environment variables, or use a provided pool
 * @param config.envPrefix Optional prefix for environment variables (e.g., "API_" for "API_POSTGRES_USER")
 * @param config.pool Connection pool to use when loadFrom is "pool"; the caller keeps ownership of it
 * @param config.migrationsPath Migration directory when loadFrom is "pool"
 * @param config.table Ledger table name when loadFrom is "pool"
 * @param config.batchPolicy Batch policy when loadFrom is "pool"
 * @param config.logger Logger function to use for logging
 * @param config.argv Optional array to use instead of process.argv
 * @param config.env Optional environment object to use instead of process.env
 */
export async function RunTidemarkCLI(config: {
  registry?: MigrationRegistry;
  loadFrom: "env" | "pool";
  envPrefix?: string;
  pool?: Pool;
  migrationsPath?: string;
  table?: string;
  batchPolicy?: BatchPolicy;
  logger: CLILoggerFunction;
  argv?: string[];
  env?: Record<string, string | undefined>;
}): Promise<void> {
  let pool: Pool;
  let ownsPool = false;
  let migrationsPath: string;
  let table = config.table;
  let batchPolicy = config.batchPolicy;

  if (config.loadFrom === "env") {
    if (config.pool) {
      throw new Error("Cannot provide both pool and loadFrom='env'");
    }

    let settings: ReturnType<typeof loadConfigFromEnv>;
    try {
      settings = loadConfigFromEnv(config.env ?? process.env, config.envPrefix ?? "");
    } catch (error) {
      config.logger("error", getErrorMessage(error));
      config.logger(
        "error",
        "Please ensure all required configuration is set in your .env file or environment variables.",
      );
      throw error;
    }

    pool = new Pool(settings.pool);
    ownsPool = true;
    migrationsPath = settings.migrator.migrationsPath;
    table = settings.migrator.table;
    batchPolicy = settings.migrator.batchPolicy;

    pool.on("error", (err) => {
      config.logger(
        "error",
        `Unexpected error on idle client in PostgreSQL pool: ${err.message}`,
      );
    });
  } else {
    if (!config.pool) {
      throw new Error("Must provide pool when loadFrom='pool'");
    }

    if (config.envPrefix) {
      throw new Error("Cannot provide envPrefix when loadFrom='pool'");
    }

    if (!config.migrationsPath) {
      throw new Error("Must provide migrationsPath when loadFrom='pool'");
    }

    pool = config.pool;
    migrationsPath = config.migrationsPath;
  }

  const args = config.argv ?? process.argv;
  const operation = args[2] ?? "help";
  const pretend = args.includes("--pretend");

  if (args.includes("--batch-per-call")) {
    batchPolicy = "one-batch-per-call";
  }

  try {
    if (operation === "help" || !["migrate", "rollback", "reset", "status"].includes(operation)) {
      config.logger("info", HELP_TEXT);
      return;
    }

    const connected = await testConnection(pool, config.logger, config.loadFrom);

    if (!connected) {
      config.logger(
        "error",
        "\nAborting operation due to database connection failure.\n",
      );
      throw new Error("Database connection failure");
    }

    const migrator = new Migrator(
      pool,
      { migrationsPath, table, batchPolicy },
      {
        registry: config.registry,
        logger: new CLIMigratorLogger(config.logger),
      },
    );

    switch (operation) {
      case "migrate":
        reportList(config.logger, "migrate", "Migrated", await migrator.migrate({ pretend }), pretend);
        break;
      case "rollback":
        reportList(config.logger, "roll back", "Rolled back", await migrator.rollback({ pretend }), pretend);
        break;
      case "reset":
        reportList(config.logger, "reset", "Reset", await migrator.reset({ pretend }), pretend);
        break;
      case "status":
        showMigrationStatus(
          await migrator.status(),
          migrator.getPath(),
          config.logger,
        );
        break;
    }
  } catch (error) {
    config.logger("error", `Error: ${getErrorMessage(error)}`);
    throw error;
  } finally {
    if (ownsPool) {
      await pool.end();
    }
  }
}
