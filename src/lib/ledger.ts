import { type Pool } from "pg";
import { StoreError } from "./errors";
import { compareIdentifiers } from "./discovery";

/**
 * One applied migration. A migration has at most one entry.
 */
export interface LedgerEntry {
  migration: string;
  batch: number;
}

/**
 * Persisted table behind the ledger
 */
export interface LedgerStore {
  /** Create the backing table if it does not exist yet */
  ensureTable(): Promise<void>;
  insert(entry: LedgerEntry): Promise<void>;
  /** Highest stored batch, or null when the table is empty */
  maxBatch(): Promise<number | null>;
  where(migration: string): Promise<LedgerEntry[]>;
  /** All entries ordered by migration identifier */
  all(): Promise<LedgerEntry[]>;
  /** Delete the entries of a migration, returning how many went away */
  remove(migration: string): Promise<number>;
}

/**
 * LedgerStore on a PostgreSQL table of `{ migration, batch }` rows
 */
export class PostgresLedgerStore implements LedgerStore {
  private pool: Pool;
  private table: string;

  /**
   * @param pool Database connection pool
   * @param table Ledger table name, already validated as a plain identifier
   */
  constructor(pool: Pool, table: string) {
    this.pool = pool;
    this.table = table;
  }

  async ensureTable(): Promise<void> {
    const { rows } = await this.pool.query(
      `SELECT table_name FROM information_schema.tables WHERE table_name = $1`,
      [this.table],
    );

    if (rows.length > 0) {
      return;
    }

    await this.pool.query(`
      CREATE TABLE ${this.table} (
        id SERIAL PRIMARY KEY,
        migration VARCHAR(255) NOT NULL UNIQUE,
        batch INTEGER NOT NULL
      )
    `);
  }

  async insert(entry: LedgerEntry): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.table} (migration, batch) VALUES ($1, $2)`,
      [entry.migration, entry.batch],
    );
  }

  async maxBatch(): Promise<number | null> {
    const { rows } = await this.pool.query<{ batch: number | null }>(
      `SELECT MAX(batch) AS batch FROM ${this.table}`,
    );

    const batch = rows[0]?.batch;
    return batch === null || batch === undefined ? null : Number(batch);
  }

  async where(migration: string): Promise<LedgerEntry[]> {
    const { rows } = await this.pool.query<LedgerEntry>(
      `SELECT migration, batch FROM ${this.table} WHERE migration = $1`,
      [migration],
    );

    return rows.map((row) => ({ migration: row.migration, batch: Number(row.batch) }));
  }

  async all(): Promise<LedgerEntry[]> {
    const { rows } = await this.pool.query<LedgerEntry>(
      `SELECT migration, batch FROM ${this.table} ORDER BY migration ASC`,
    );

    return rows.map((row) => ({ migration: row.migration, batch: Number(row.batch) }));
  }

  async remove(migration: string): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM ${this.table} WHERE migration = $1`,
      [migration],
    );

    return result.rowCount ?? 0;
  }
}

/**
 * LedgerStore kept in process memory
 */
export class MemoryLedgerStore implements LedgerStore {
  private rows: LedgerEntry[] = [];

  constructor(entries: LedgerEntry[] = []) {
    this.rows = entries.map((entry) => ({ ...entry }));
  }

  async ensureTable(): Promise<void> {}

  async insert(entry: LedgerEntry): Promise<void> {
    if (this.rows.some((row) => row.migration === entry.migration)) {
      throw new Error(`Duplicate ledger entry for migration ${entry.migration}`);
    }

    this.rows.push({ ...entry });
  }

  async maxBatch(): Promise<number | null> {
    if (this.rows.length === 0) {
      return null;
    }

    return Math.max(...this.rows.map((row) => row.batch));
  }

  async where(migration: string): Promise<LedgerEntry[]> {
    return this.rows
      .filter((row) => row.migration === migration)
      .map((row) => ({ ...row }));
  }

  async all(): Promise<LedgerEntry[]> {
    return this.rows
      .map((row) => ({ ...row }))
      .sort((a, b) => compareIdentifiers(a.migration, b.migration));
  }

  async remove(migration: string): Promise<number> {
    const before = this.rows.length;
    this.rows = this.rows.filter((row) => row.migration !== migration);
    return before - this.rows.length;
  }
}

/**
 * Record of which migrations ran and in which batch.
 * Every query goes to the store; nothing is cached between calls.
 */
export class Ledger {
  private store: LedgerStore;
  private initialized = false;

  constructor(store: LedgerStore) {
    this.store = store;
  }

  private async query<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      if (!this.initialized) {
        await this.store.ensureTable();
        this.initialized = true;
      }

      return await fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }

      throw new StoreError(action, error);
    }
  }

  async find(migration: string): Promise<LedgerEntry[]> {
    return this.query(`find ${migration}`, () => this.store.where(migration));
  }

  async log(migration: string, batch: number): Promise<void> {
    await this.query(`record ${migration}`, () =>
      this.store.insert({ migration, batch }),
    );
  }

  async delete(migration: string): Promise<number> {
    return this.query(`delete ${migration}`, () => this.store.remove(migration));
  }

  /**
   * All entries, ascending by identifier whatever order the store returns
   */
  async entries(): Promise<LedgerEntry[]> {
    const entries = await this.query("list entries", () => this.store.all());
    return entries.sort((a, b) => compareIdentifiers(a.migration, b.migration));
  }

  /**
   * Identifiers of every applied migration, ascending
   */
  async ran(): Promise<string[]> {
    return (await this.entries()).map((entry) => entry.migration);
  }

  /**
   * Highest stored batch, 0 when the ledger is empty
   */
  async lastBatch(): Promise<number> {
    return (await this.query("read the last batch", () => this.store.maxBatch())) ?? 0;
  }

  /**
   * Read fresh on every call, so it moves as entries are logged
   */
  async nextBatch(): Promise<number> {
    return (await this.lastBatch()) + 1;
  }

  /**
   * Identifiers among `candidates` logged in the last batch, descending
   */
  async lastBatchMigrations(candidates: string[]): Promise<string[]> {
    const lastBatch = await this.lastBatch();
    const wanted = new Set(candidates);

    return (await this.entries())
      .filter((entry) => entry.batch === lastBatch && wanted.has(entry.migration))
      .map((entry) => entry.migration)
      .reverse();
  }
}
