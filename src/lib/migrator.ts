import { type Pool } from "pg";
import { type Logger, consoleLogger, createPrefixedLogger } from "./logger";
import { type BatchPolicy, type TidemarkConfig, resolveConfig } from "./config";
import { type DirectoryLister, MigrationDiscovery, fsDirectoryLister } from "./discovery";
import { type LedgerEntry, type LedgerStore, Ledger, PostgresLedgerStore } from "./ledger";
import {
  type MigrationLoader,
  FileMigrationLoader,
  MigrationRegistry,
} from "./resolver";
import { type MigrationContext, type MigrationUnit } from "./migration";
import { createSchemaHelpers } from "./schema-helpers";
import {
  type MigrationRunOperation,
  MigrationRunError,
  ResolutionError,
  StoreError,
  getErrorMessage,
} from "./errors";

/**
 * Collaborators the migrator works through. Anything left out gets the
 * PostgreSQL / filesystem default built from the pool and config.
 */
export interface MigratorOptions {
  store?: LedgerStore;
  registry?: MigrationRegistry;
  loader?: MigrationLoader;
  lister?: DirectoryLister;
  logger?: Logger;
}

export interface RunOptions {
  /** Log what would run without calling units or touching the ledger */
  pretend?: boolean;
}

export interface MigrationStatus {
  migration: string;
  ran: boolean;
  batch: number | null;
  /** Logged in the ledger but no longer found on disk */
  orphaned: boolean;
}

/**
 * Migrator - discovers migration files, diffs them against the ledger and
 * runs units forward or backward.
 *
 * Every step is awaited before the next one starts. Nothing is locked or
 * wrapped in a transaction across units, so run a single migrator per ledger.
 */
export class Migrator {
  private pool: Pool;
  private config: TidemarkConfig;
  private discovery: MigrationDiscovery;
  private ledger: Ledger;
  private registry: MigrationRegistry;
  private loader: MigrationLoader;
  private logger: Logger;

  /**
   * @param pool Database connection pool, handed to migration units
   * @param config Migration directory, ledger table and batch policy
   * @param opts Optional collaborators, mostly for tests
   */
  constructor(
    pool: Pool,
    config: Partial<TidemarkConfig> & { migrationsPath: string },
    opts: MigratorOptions = {},
  ) {
    this.pool = pool;
    this.config = resolveConfig(config);
    this.logger = opts.logger ?? consoleLogger;
    this.discovery = new MigrationDiscovery(
      this.config.migrationsPath,
      this.config.extensions,
      opts.lister ?? fsDirectoryLister,
    );
    this.ledger = new Ledger(
      opts.store ?? new PostgresLedgerStore(pool, this.config.table),
    );
    this.registry = opts.registry ?? new MigrationRegistry();
    this.loader =
      opts.loader ?? new FileMigrationLoader(this.discovery, this.logger);
  }

  getPath(): string {
    return this.config.migrationsPath;
  }

  getBatchPolicy(): BatchPolicy {
    return this.config.batchPolicy;
  }

  private createContext(migration: string): MigrationContext {
    const logger = createPrefixedLogger(this.logger, { migration });

    return {
      migration,
      pool: this.pool,
      schema: createSchemaHelpers(this.pool, logger),
      logger,
    };
  }

  /**
   * Migration identifiers on disk, ascending
   */
  async listUnits(): Promise<string[]> {
    return this.discovery.listUnits();
  }

  /**
   * Build the unit for a migration identifier, loading its file if needed
   * @throws ResolutionError if no implementation is registered
   */
  async resolve(migration: string): Promise<MigrationUnit> {
    await this.loader.load([migration], this.registry);
    return this.registry.resolve(migration, this.createContext(migration));
  }

  /**
   * Run a unit's up() without touching the ledger
   */
  async up(migration: string): Promise<void> {
    const unit = await this.resolve(migration);

    this.logger.info({ migration, operation: "up", message: "Migrating" });
    await unit.up();
    this.logger.info({ migration, operation: "up", message: "Migrated" });
  }

  /**
   * Run a unit's down() without touching the ledger
   */
  async down(migration: string): Promise<void> {
    const unit = await this.resolve(migration);

    this.logger.info({ migration, operation: "down", message: "Rolling back" });
    await unit.down();
    this.logger.info({ migration, operation: "down", message: "Rolled back" });
  }

  async find(migration: string): Promise<LedgerEntry[]> {
    return this.ledger.find(migration);
  }

  async ran(): Promise<string[]> {
    return this.ledger.ran();
  }

  async lastBatch(): Promise<number> {
    return this.ledger.lastBatch();
  }

  async nextBatch(): Promise<number> {
    return this.ledger.nextBatch();
  }

  /**
   * Apply every pending migration, newest first, logging each one in the ledger
   * @returns Identifiers applied, in execution order
   * @throws MigrationRunError if a unit fails, ResolutionError or StoreError
   * otherwise; earlier units stay applied either way
   */
  async migrate(options: RunOptions = {}): Promise<string[]> {
    const migrations = (await this.listUnits()).reverse();

    await this.loader.load(migrations, this.registry);

    const ran = new Set(await this.ledger.ran());
    const pending = migrations.filter((migration) => !ran.has(migration));

    if (pending.length === 0) {
      this.logger.info({ operation: "migrate", message: "Nothing to migrate" });
      return [];
    }

    if (options.pretend) {
      for (const migration of pending) {
        this.logger.info({ migration, operation: "migrate", message: "Would migrate" });
      }
      return pending;
    }

    // Under one-batch-per-unit the batch is re-read after every insert
    const sharedBatch =
      this.config.batchPolicy === "one-batch-per-call"
        ? await this.ledger.nextBatch()
        : null;

    const migrated: string[] = [];

    for (const migration of pending) {
      try {
        await this.up(migration);
        await this.ledger.log(migration, sharedBatch ?? (await this.ledger.nextBatch()));
      } catch (error) {
        throw this.runFailed("migrate", migration, migrated, error);
      }

      migrated.push(migration);
    }

    return migrated;
  }

  /**
   * Revert the migrations logged in the highest batch, newest first
   * @returns Identifiers rolled back, in execution order
   */
  async rollback(options: RunOptions = {}): Promise<string[]> {
    const migrations = await this.ledger.lastBatchMigrations(
      await this.listUnits(),
    );

    if (migrations.length === 0) {
      this.logger.info({ operation: "rollback", message: "Nothing to roll back" });
      return [];
    }

    return this.revert("rollback", migrations, options);
  }

  /**
   * Revert every applied migration found on disk, oldest first
   * @returns Identifiers reverted, in execution order
   */
  async reset(options: RunOptions = {}): Promise<string[]> {
    return this.revert("reset", await this.listUnits(), options);
  }

  private async revert(
    operation: MigrationRunOperation,
    migrations: string[],
    options: RunOptions,
  ): Promise<string[]> {
    await this.loader.load(migrations, this.registry);

    const reverted: string[] = [];

    for (const migration of migrations) {
      try {
        const rows = await this.ledger.find(migration);
        if (rows.length === 0) {
          continue;
        }

        if (options.pretend) {
          this.logger.info({ migration, operation, message: "Would roll back" });
        } else {
          await this.down(migration);
          await this.ledger.delete(migration);
        }
      } catch (error) {
        throw this.runFailed(operation, migration, reverted, error);
      }

      reverted.push(migration);
    }

    return reverted;
  }

  /**
   * ResolutionError and StoreError keep their type and carry the run's
   * progress; anything a unit throws becomes a MigrationRunError
   */
  private runFailed(
    operation: MigrationRunOperation,
    migration: string,
    completed: string[],
    error: unknown,
  ): Error {
    this.logger.error({
      migration,
      operation,
      message: `Failed after ${completed.length} migration(s): ${getErrorMessage(error)}`,
      error,
    });

    if (error instanceof ResolutionError || error instanceof StoreError) {
      error.progress = { operation, failed: migration, completed: [...completed] };
      return error;
    }

    return new MigrationRunError(operation, migration, [...completed], error);
  }

  /**
   * Every migration on disk with its ledger state, ascending, followed by
   * ledger entries whose file is gone
   */
  async status(): Promise<MigrationStatus[]> {
    const migrations = await this.listUnits();
    const entries = await this.ledger.entries();
    const batches = new Map(entries.map((entry) => [entry.migration, entry.batch]));
    const onDisk = new Set(migrations);

    const known: MigrationStatus[] = migrations.map((migration) => {
      const batch = batches.get(migration);

      return {
        migration,
        ran: batch !== undefined,
        batch: batch ?? null,
        orphaned: false,
      };
    });

    const orphaned: MigrationStatus[] = entries
      .filter((entry) => !onDisk.has(entry.migration))
      .map((entry) => ({
        migration: entry.migration,
        ran: true,
        batch: entry.batch,
        orphaned: true,
      }));

    return [...known, ...orphaned];
  }
}
