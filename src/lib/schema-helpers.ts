import { type Pool } from "pg";
import { type Logger, consoleLogger } from "./logger";

/**
 * Idempotent DDL helpers handed to migration units through their context.
 * Table, column and index names are interpolated as given; only pass trusted names.
 */
export interface SchemaHelpers {
  hasTable: (tableName: string) => Promise<boolean>;

  createTable: (
    tableName: string,
    columns: Record<string, string>,
    constraints?: string[],
  ) => Promise<void>;

  dropTable: (tableName: string) => Promise<void>;

  addColumn: (
    tableName: string,
    columnName: string,
    columnType: string,
    defaultValue?: string,
  ) => Promise<void>;

  removeColumn: (tableName: string, columnName: string) => Promise<void>;

  addIndex: (
    tableName: string,
    indexName: string,
    columns: string[],
    unique?: boolean,
  ) => Promise<void>;

  removeIndex: (indexName: string) => Promise<void>;
}

/**
 * Anything that runs SQL the way a pg Pool does
 */
export type Queryable = Pick<Pool, "query">;

/**
 * Create schema helpers bound to a pool
 */
export function createSchemaHelpers(
  pool: Queryable,
  logger: Logger = consoleLogger,
): SchemaHelpers {
  async function run(sql: string, done: string, failed: string): Promise<void> {
    try {
      await pool.query(sql);
    } catch (error) {
      logger.error({ message: failed, error });
      throw error;
    }

    logger.info({ message: done });
  }

  async function hasTable(tableName: string): Promise<boolean> {
    const { rows } = await pool.query(
      `SELECT table_name FROM information_schema.tables WHERE table_name = $1`,
      [tableName],
    );

    return rows.length > 0;
  }

  async function createTable(
    tableName: string,
    columns: Record<string, string>,
    constraints: string[] = [],
  ): Promise<void> {
    if (await hasTable(tableName)) {
      logger.info({ message: `Table ${tableName} already exists` });
      return;
    }

    const definitions = [
      ...Object.entries(columns).map(([name, type]) => `${name} ${type}`),
      ...constraints,
    ].join(",\n        ");

    await run(
      `
      CREATE TABLE IF NOT EXISTS ${tableName} (
        ${definitions}
      )
      `,
      `Ensured table ${tableName} exists`,
      `Error creating table ${tableName}:`,
    );
  }

  async function dropTable(tableName: string): Promise<void> {
    await run(
      `DROP TABLE IF EXISTS ${tableName}`,
      `Dropped table ${tableName} if it existed`,
      `Error dropping table ${tableName}:`,
    );
  }

  async function addColumn(
    tableName: string,
    columnName: string,
    columnType: string,
    defaultValue?: string,
  ): Promise<void> {
    const defaultClause = defaultValue ? ` DEFAULT ${defaultValue}` : "";

    await run(
      `ALTER TABLE ${tableName} ADD COLUMN IF NOT EXISTS ${columnName} ${columnType}${defaultClause}`,
      `Ensured column ${columnName} exists on table ${tableName}`,
      `Error adding column ${columnName} to table ${tableName}:`,
    );
  }

  async function removeColumn(
    tableName: string,
    columnName: string,
  ): Promise<void> {
    await run(
      `ALTER TABLE ${tableName} DROP COLUMN IF EXISTS ${columnName}`,
      `Removed column ${columnName} from table ${tableName} if it existed`,
      `Error removing column ${columnName} from table ${tableName}:`,
    );
  }

  async function addIndex(
    tableName: string,
    indexName: string,
    columns: string[],
    unique: boolean = false,
  ): Promise<void> {
    const uniqueClause = unique ? "UNIQUE " : "";

    await run(
      `CREATE ${uniqueClause}INDEX IF NOT EXISTS ${indexName} ON ${tableName} (${columns.join(", ")})`,
      `Ensured index ${indexName} exists on table ${tableName}`,
      `Error creating index ${indexName} on table ${tableName}:`,
    );
  }

  async function removeIndex(indexName: string): Promise<void> {
    await run(
      `DROP INDEX IF EXISTS ${indexName}`,
      `Removed index ${indexName} if it existed`,
      `Error removing index ${indexName}:`,
    );
  }

  return {
    hasTable,
    createTable,
    dropTable,
    addColumn,
    removeColumn,
    addIndex,
    removeIndex,
  };
}
