import { type Pool } from "pg";
import { type IMemoryDb, newDb } from "pg-mem";
import { type LogDataInput, BaseLogger, buildLogPrefix } from "../logger";
import { type BatchPolicy } from "../config";
import { getErrorMessage } from "../errors";
import { Migrator } from "../migrator";
import { type MigrationRegistry } from "../resolver";

/**
 * Logger function type
 */
export type LoggerFunction = (
  type: "info" | "error" | "warn" | "migrate",
  message: string,
) => void;

/**
 * Console-based logger implementation for TestDatabaseInstance
 * @param migrateVerbose Whether to log verbose migration messages
 */
export const createTestDBConsoleLogger = (
  migrateVerbose: boolean = true,
): LoggerFunction => {
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
      case "migrate":
        if (migrateVerbose) {
          console.log(`[MIGRATE] ${message}`);
        }
        break;
    }
  };
};

/**
 * Adapter that sends migrator log calls to a LoggerFunction
 * @internal
 */
class TestDBMigratorLogger extends BaseLogger {
  private testDbLogger?: LoggerFunction;

  constructor(logger?: LoggerFunction) {
    super();
    this.testDbLogger = logger;
  }

  info(data: LogDataInput): void {
    this.testDbLogger?.("migrate", `${buildLogPrefix(data)}${data.message}`);
  }

  error(data: LogDataInput): void {
    const message =
      data.error === undefined
        ? data.message
        : `${data.message}: ${getErrorMessage(data.error)}`;
    this.testDbLogger?.("error", `${buildLogPrefix(data)}${message}`);
  }

  warn(data: LogDataInput): void {
    this.testDbLogger?.("warn", `${buildLogPrefix(data)}${data.message}`);
  }
}

interface TestDatabaseOptions {
  logger?: LoggerFunction;
  /** Directory of migrations to apply on start */
  migrationsPath?: string;
  registry?: MigrationRegistry;
  table?: string;
  batchPolicy?: BatchPolicy;
}

/**
 * In-process PostgreSQL (pg-mem) for tests, with migrations applied on start
 */
export class TestDatabaseInstance {
  private db?: IMemoryDb;
  private pool?: Pool;
  private options: TestDatabaseOptions;
  private appliedMigrations: string[] = [];

  constructor(options: TestDatabaseOptions = {}) {
    this.options = options;
  }

  private log(type: "info" | "error" | "warn" | "migrate", message: string): void {
    this.options.logger?.(type, message);
  }

  /**
   * Check if the database is running
   */
  public isReady(): boolean {
    return !!this.pool;
  }

  /**
   * Create the database and apply migrations
   */
  public async start(): Promise<void> {
    if (this.pool) {
      return;
    }

    const db = newDb();
    const adapter = db.adapters.createPg();
    const pool: Pool = new adapter.Pool();

    try {
      await pool.query("SELECT 1");
      this.appliedMigrations = await this.applyMigrations(pool);
    } catch (error) {
      this.log("error", `Failed to start test database: ${getErrorMessage(error)}`);
      throw error;
    }

    this.db = db;
    this.pool = pool;
    this.log("info", "In-memory PostgreSQL started");
  }

  private async applyMigrations(pool: Pool): Promise<string[]> {
    if (!this.options.migrationsPath) {
      this.log("info", "No migrations path provided, skipping migration application");
      return [];
    }

    const migrator = new Migrator(
      pool,
      {
        migrationsPath: this.options.migrationsPath,
        table: this.options.table,
        batchPolicy: this.options.batchPolicy,
      },
      {
        registry: this.options.registry,
        logger: new TestDBMigratorLogger(this.options.logger),
      },
    );

    const applied = await migrator.migrate();
    this.log("info", `Applied ${applied.length} migration(s)`);
    return applied;
  }

  /**
   * The connection pool, or null if not started
   */
  public getPool(): Pool | null {
    return this.pool ?? null;
  }

  /**
   * The pg-mem database behind the pool, or null if not started
   */
  public getMemoryDb(): IMemoryDb | null {
    return this.db ?? null;
  }

  /**
   * Migrations applied by the last start() or reset(), in execution order
   */
  public getAppliedMigrations(): string[] {
    return [...this.appliedMigrations];
  }

  /**
   * Throw the database away and start again from an empty one
   */
  public async reset(): Promise<void> {
    await this.stop();
    await this.start();
  }

  public async stop(): Promise<void> {
    // pg-mem keeps everything in memory; dropping the references frees it
    this.pool = undefined;
    this.db = undefined;
    this.appliedMigrations = [];
  }
}
