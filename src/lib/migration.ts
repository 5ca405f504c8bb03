import { type Pool } from "pg";
import { type Logger } from "./logger";
import { type SchemaHelpers } from "./schema-helpers";

/**
 * What a migration unit receives when it is constructed
 */
export interface MigrationContext {
  /** Identifier of the migration being run */
  migration: string;
  pool: Pool;
  schema: SchemaHelpers;
  /** Logger prefixed with the migration identifier */
  logger: Logger;
}

/**
 * A single forward/backward schema change
 */
export interface MigrationUnit {
  up(): Promise<void> | void;
  down(): Promise<void> | void;
}

export type MigrationFactory = (context: MigrationContext) => MigrationUnit;

export type MigrationClass = new (context: MigrationContext) => MigrationUnit;

/**
 * Convenience base class for migration files.
 *
 * ```ts
 * export class CreateUsersTable extends Migration {
 *   async up() {
 *     await this.schema.createTable("users", { id: "SERIAL PRIMARY KEY" });
 *   }
 *
 *   async down() {
 *     await this.schema.dropTable("users");
 *   }
 * }
 * ```
 */
export abstract class Migration implements MigrationUnit {
  protected readonly pool: Pool;
  protected readonly schema: SchemaHelpers;
  protected readonly logger: Logger;

  constructor(context: MigrationContext) {
    this.pool = context.pool;
    this.schema = context.schema;
    this.logger = context.logger;
  }

  abstract up(): Promise<void> | void;

  abstract down(): Promise<void> | void;
}

export function isMigrationClass(value: unknown): value is MigrationClass {
  if (typeof value !== "function") {
    return false;
  }

  const proto: unknown = value.prototype;
  return (
    typeof proto === "object" &&
    proto !== null &&
    typeof Reflect.get(proto, "up") === "function" &&
    typeof Reflect.get(proto, "down") === "function"
  );
}
