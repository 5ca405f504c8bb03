import { describe, it, expect, beforeEach, vi } from "vitest";
import * as path from "path";
import { type Pool } from "pg";
import { newDb } from "pg-mem";
import { Migrator } from "./migrator";
import { MemoryLedgerStore, type LedgerEntry } from "./ledger";
import { MigrationRegistry, type MigrationLoader } from "./resolver";
import { type DirectoryLister } from "./discovery";
import { type BatchPolicy } from "./config";
import { consoleLogger, MutableLogger } from "./logger";
import { MigrationRunError, ResolutionError, StoreError } from "./errors";
import { createSchemaHelpers } from "./schema-helpers";

const USERS = "2020_01_01_000000_create_users_table";
const POSTS = "2020_01_02_000000_create_posts_table";
const ROLES = "2020_01_03_000000_create_roles_table";
const REMOVED = "2019_06_01_000000_create_legacy_table";

const silentLogger = new MutableLogger(consoleLogger, false);

// Registry entries are all in place up front, so nothing is imported
const noopLoader: MigrationLoader = { load: async () => {} };

function memoryPool(): Pool {
  const { Pool: MemoryPool } = newDb().adapters.createPg();
  return new MemoryPool();
}

function listerOf(ids: string[]): DirectoryLister {
  return { list: async () => ids.map((id) => `${id}.ts`) };
}

interface Harness {
  migrator: Migrator;
  store: MemoryLedgerStore;
  calls: string[];
}

/**
 * Migrator over a stub directory and an in-memory ledger, with units that
 * record their calls. Units named in `failing` throw from that direction.
 */
function harness(
  ids: string[],
  opts: {
    entries?: LedgerEntry[];
    batchPolicy?: BatchPolicy;
    failing?: Partial<Record<string, "up" | "down">>;
    registered?: string[];
  } = {},
): Harness {
  const calls: string[] = [];
  const registry = new MigrationRegistry();
  const store = new MemoryLedgerStore(opts.entries);

  for (const id of opts.registered ?? ids) {
    registry.register(id, () => ({
      up: () => {
        if (opts.failing?.[id] === "up") {
          throw new Error(`up failed for ${id}`);
        }
        calls.push(`up:${id}`);
      },
      down: () => {
        if (opts.failing?.[id] === "down") {
          throw new Error(`down failed for ${id}`);
        }
        calls.push(`down:${id}`);
      },
    }));
  }

  const migrator = new Migrator(
    memoryPool(),
    { migrationsPath: "/migrations", batchPolicy: opts.batchPolicy },
    {
      store,
      registry,
      loader: noopLoader,
      lister: listerOf(ids),
      logger: silentLogger,
    },
  );

  return { migrator, store, calls };
}

function migratorOver(
  store: MemoryLedgerStore,
  ids: string[],
  registry: MigrationRegistry = new MigrationRegistry(),
): Migrator {
  return new Migrator(
    memoryPool(),
    { migrationsPath: "/migrations" },
    { store, registry, loader: noopLoader, lister: listerOf(ids), logger: silentLogger },
  );
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (err: unknown) => err,
  );
}

async function runError(promise: Promise<unknown>): Promise<MigrationRunError> {
  const error = await rejection(promise);

  if (!(error instanceof MigrationRunError)) {
    throw new Error(`Expected a MigrationRunError, got ${String(error)}`);
  }

  return error;
}

describe("Migrator", () => {
  describe("migrate", () => {
    it("should apply every pending migration newest first with its own batch", async () => {
      const { migrator, store, calls } = harness([USERS, POSTS]);

      expect(await migrator.migrate()).toEqual([POSTS, USERS]);
      expect(calls).toEqual([`up:${POSTS}`, `up:${USERS}`]);
      expect(await store.all()).toEqual([
        { migration: USERS, batch: 2 },
        { migration: POSTS, batch: 1 },
      ]);
    });

    it("should only apply migrations missing from the ledger", async () => {
      const { migrator, calls } = harness([USERS, POSTS], {
        entries: [{ migration: USERS, batch: 1 }],
      });

      expect(await migrator.migrate()).toEqual([POSTS]);
      expect(calls).toEqual([`up:${POSTS}`]);
      expect(await migrator.find(POSTS)).toEqual([{ migration: POSTS, batch: 2 }]);
    });

    it("should do nothing on a second run", async () => {
      const { migrator, calls } = harness([USERS, POSTS]);

      await migrator.migrate();
      calls.length = 0;

      expect(await migrator.migrate()).toEqual([]);
      expect(calls).toEqual([]);
      expect(await migrator.ran()).toEqual([USERS, POSTS]);
    });

    it("should share one batch across the call under one-batch-per-call", async () => {
      const { migrator, store } = harness([USERS, POSTS, ROLES], {
        batchPolicy: "one-batch-per-call",
        entries: [{ migration: USERS, batch: 3 }],
      });

      expect(await migrator.migrate()).toEqual([ROLES, POSTS]);
      expect(await store.all()).toEqual([
        { migration: USERS, batch: 3 },
        { migration: POSTS, batch: 4 },
        { migration: ROLES, batch: 4 },
      ]);
      expect(migrator.getBatchPolicy()).toBe("one-batch-per-call");
    });

    it("should stop at the first failure and keep what was applied", async () => {
      const { migrator, calls } = harness([USERS, POSTS, ROLES], {
        failing: { [POSTS]: "up" },
      });

      const error = await runError(migrator.migrate());

      expect(error.operation).toBe("migrate");
      expect(error.failed).toBe(POSTS);
      expect(error.completed).toEqual([ROLES]);
      expect(error.cause).toEqual(new Error(`up failed for ${POSTS}`));
      expect(error.message).toBe(
        `migrate stopped at ${POSTS} after 1 migration(s): up failed for ${POSTS}`,
      );
      expect(calls).toEqual([`up:${ROLES}`]);
      expect(await migrator.ran()).toEqual([ROLES]);
    });

    it("should raise ResolutionError for a migration without an implementation", async () => {
      const { migrator } = harness([USERS, POSTS], { registered: [POSTS] });

      const error = await rejection(migrator.migrate());

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error instanceof ResolutionError && error.progress).toEqual({
        operation: "migrate",
        failed: USERS,
        completed: [POSTS],
      });
      expect(await migrator.ran()).toEqual([POSTS]);
    });

    it("should raise StoreError when the ledger write fails after the unit ran", async () => {
      class ReadOnlyStore extends MemoryLedgerStore {
        async insert(): Promise<void> {
          throw new Error("read-only transaction");
        }
      }

      const up = vi.fn();
      const registry = new MigrationRegistry().register(USERS, () => ({
        up,
        down: vi.fn(),
      }));

      const error = await rejection(
        migratorOver(new ReadOnlyStore(), [USERS], registry).migrate(),
      );

      expect(up).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(StoreError);
      expect(error instanceof StoreError && error.message).toBe(
        `Ledger store failed to record ${USERS}: read-only transaction`,
      );
      expect(error instanceof StoreError && error.progress).toEqual({
        operation: "migrate",
        failed: USERS,
        completed: [],
      });
    });

    it("should raise StoreError when the ledger cannot be read", async () => {
      class UnreadableStore extends MemoryLedgerStore {
        async all(): Promise<LedgerEntry[]> {
          throw new Error("connection refused");
        }
      }

      const error = await rejection(
        migratorOver(new UnreadableStore(), [USERS]).migrate(),
      );

      expect(error).toBeInstanceOf(StoreError);
      expect(error instanceof StoreError && error.progress).toBeUndefined();
    });

    it("should list pending migrations without running them when pretending", async () => {
      const { migrator, calls } = harness([USERS, POSTS]);

      expect(await migrator.migrate({ pretend: true })).toEqual([POSTS, USERS]);
      expect(calls).toEqual([]);
      expect(await migrator.ran()).toEqual([]);
    });

    it("should return nothing when the directory is empty", async () => {
      const { migrator } = harness([]);

      expect(await migrator.migrate()).toEqual([]);
    });
  });

  describe("rollback", () => {
    it("should revert only the highest batch under one-batch-per-unit", async () => {
      const { migrator, calls } = harness([USERS, POSTS]);
      await migrator.migrate();
      calls.length = 0;

      expect(await migrator.rollback()).toEqual([USERS]);
      expect(calls).toEqual([`down:${USERS}`]);
      expect(await migrator.ran()).toEqual([POSTS]);
      expect(await migrator.lastBatch()).toBe(1);
    });

    it("should revert the whole call under one-batch-per-call, newest first", async () => {
      const { migrator, calls } = harness([USERS, POSTS], {
        batchPolicy: "one-batch-per-call",
      });
      await migrator.migrate();
      calls.length = 0;

      expect(await migrator.rollback()).toEqual([POSTS, USERS]);
      expect(calls).toEqual([`down:${POSTS}`, `down:${USERS}`]);
      expect(await migrator.ran()).toEqual([]);
    });

    it("should do nothing on an empty ledger", async () => {
      const { migrator, calls } = harness([USERS]);

      expect(await migrator.rollback()).toEqual([]);
      expect(calls).toEqual([]);
    });

    it("should leave ledger entries whose file is gone", async () => {
      const { migrator, calls } = harness([USERS], {
        entries: [
          { migration: USERS, batch: 1 },
          { migration: REMOVED, batch: 2 },
        ],
      });

      expect(await migrator.rollback()).toEqual([]);
      expect(calls).toEqual([]);
      expect(await migrator.ran()).toEqual([REMOVED, USERS]);
    });

    it("should stop at the first failure and keep what was reverted", async () => {
      const { migrator } = harness([USERS, POSTS, ROLES], {
        batchPolicy: "one-batch-per-call",
        failing: { [POSTS]: "down" },
      });
      await migrator.migrate();

      const error = await runError(migrator.rollback());

      expect(error.operation).toBe("rollback");
      expect(error.failed).toBe(POSTS);
      expect(error.completed).toEqual([ROLES]);
      expect(await migrator.ran()).toEqual([USERS, POSTS]);
    });

    it("should raise StoreError when the row cannot be deleted", async () => {
      class UndeletableStore extends MemoryLedgerStore {
        async remove(): Promise<number> {
          throw new Error("permission denied");
        }
      }

      const down = vi.fn();
      const registry = new MigrationRegistry().register(USERS, () => ({
        up: vi.fn(),
        down,
      }));
      const store = new UndeletableStore([{ migration: USERS, batch: 1 }]);

      const error = await rejection(migratorOver(store, [USERS], registry).rollback());

      expect(down).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(StoreError);
      expect(error instanceof StoreError && error.progress).toEqual({
        operation: "rollback",
        failed: USERS,
        completed: [],
      });
    });

    it("should keep the ledger when pretending", async () => {
      const { migrator, calls } = harness([USERS, POSTS]);
      await migrator.migrate();
      calls.length = 0;

      expect(await migrator.rollback({ pretend: true })).toEqual([USERS]);
      expect(calls).toEqual([]);
      expect(await migrator.ran()).toEqual([USERS, POSTS]);
    });
  });

  describe("reset", () => {
    it("should revert every applied migration oldest first", async () => {
      const { migrator, calls } = harness([USERS, POSTS]);
      await migrator.migrate();
      calls.length = 0;

      expect(await migrator.reset()).toEqual([USERS, POSTS]);
      expect(calls).toEqual([`down:${USERS}`, `down:${POSTS}`]);
      expect(await migrator.ran()).toEqual([]);
      expect(await migrator.lastBatch()).toBe(0);
    });

    it("should skip migrations that never ran", async () => {
      const { migrator, calls } = harness([USERS, POSTS, ROLES], {
        entries: [{ migration: POSTS, batch: 1 }],
      });

      expect(await migrator.reset()).toEqual([POSTS]);
      expect(calls).toEqual([`down:${POSTS}`]);
    });

    it("should stop at the first failure and keep what was reverted", async () => {
      const { migrator } = harness([USERS, POSTS, ROLES], {
        failing: { [POSTS]: "down" },
      });
      await migrator.migrate();

      const error = await runError(migrator.reset());

      expect(error.operation).toBe("reset");
      expect(error.failed).toBe(POSTS);
      expect(error.completed).toEqual([USERS]);
      expect(await migrator.ran()).toEqual([POSTS, ROLES]);
    });

    it("should list what it would revert when pretending", async () => {
      const { migrator, calls } = harness([USERS, POSTS], {
        entries: [
          { migration: USERS, batch: 1 },
          { migration: POSTS, batch: 2 },
        ],
      });

      expect(await migrator.reset({ pretend: true })).toEqual([USERS, POSTS]);
      expect(calls).toEqual([]);
      expect(await migrator.ran()).toEqual([USERS, POSTS]);
    });
  });

  describe("status", () => {
    it("should report each migration on disk then ledger entries whose file is gone", async () => {
      const { migrator } = harness([USERS, POSTS], {
        entries: [
          { migration: USERS, batch: 1 },
          { migration: REMOVED, batch: 1 },
        ],
      });

      expect(await migrator.status()).toEqual([
        { migration: USERS, ran: true, batch: 1, orphaned: false },
        { migration: POSTS, ran: false, batch: null, orphaned: false },
        { migration: REMOVED, ran: true, batch: 1, orphaned: true },
      ]);
    });
  });

  describe("up and down", () => {
    it("should run a single unit without touching the ledger", async () => {
      const { migrator, calls } = harness([USERS]);

      await migrator.up(USERS);
      await migrator.down(USERS);

      expect(calls).toEqual([`up:${USERS}`, `down:${USERS}`]);
      expect(await migrator.ran()).toEqual([]);
    });

    it("should throw ResolutionError for an unknown migration", async () => {
      const { migrator } = harness([USERS]);

      await expect(migrator.up(POSTS)).rejects.toBeInstanceOf(ResolutionError);
    });
  });

  describe("with migration files and a PostgreSQL ledger", () => {
    let pool: Pool;
    let migrator: Migrator;

    beforeEach(() => {
      pool = memoryPool();
      migrator = new Migrator(
        pool,
        {
          migrationsPath: path.join(__dirname, "__fixtures__", "migrations"),
          table: "schema_history",
        },
        { logger: silentLogger },
      );
    });

    it("should create the tables, log them and drop them again on reset", async () => {
      const schema = createSchemaHelpers(pool, silentLogger);

      expect(await migrator.migrate()).toEqual([POSTS, USERS]);
      expect(await schema.hasTable("users")).toBe(true);
      expect(await schema.hasTable("posts")).toBe(true);

      const { rows } = await pool.query(
        "SELECT migration, batch FROM schema_history ORDER BY batch",
      );
      expect(rows).toEqual([
        { migration: POSTS, batch: 1 },
        { migration: USERS, batch: 2 },
      ]);

      expect(await migrator.reset()).toEqual([USERS, POSTS]);
      expect(await schema.hasTable("users")).toBe(false);
      expect(await schema.hasTable("posts")).toBe(false);
      expect(await migrator.ran()).toEqual([]);
    });
  });
});
