/**
 * Tidemark - batch-numbered, reversible migrations for pluggable application modules
 *
 * Discovers timestamp-prefixed migration files, diffs them against a ledger
 * table and runs their up()/down() logic in order
 */

export { Migrator } from "./lib/migrator";
export type { MigratorOptions, RunOptions, MigrationStatus } from "./lib/migrator";
export {
  Migration,
  isMigrationClass,
} from "./lib/migration";
export type {
  MigrationContext,
  MigrationUnit,
  MigrationFactory,
  MigrationClass,
} from "./lib/migration";
export {
  MigrationRegistry,
  FileMigrationLoader,
  deriveMigrationName,
  studlyCase,
} from "./lib/resolver";
export type { MigrationLoader } from "./lib/resolver";
export {
  MigrationDiscovery,
  fsDirectoryLister,
  compareIdentifiers,
} from "./lib/discovery";
export type { DirectoryLister } from "./lib/discovery";
export {
  Ledger,
  PostgresLedgerStore,
  MemoryLedgerStore,
} from "./lib/ledger";
export type { LedgerEntry, LedgerStore } from "./lib/ledger";
export {
  resolveConfig,
  loadConfigFromEnv,
  isBatchPolicy,
  BATCH_POLICIES,
  DEFAULT_TABLE,
  DEFAULT_EXTENSIONS,
} from "./lib/config";
export type { BatchPolicy, TidemarkConfig } from "./lib/config";
export { createSchemaHelpers } from "./lib/schema-helpers";
export type { SchemaHelpers, Queryable } from "./lib/schema-helpers";
export {
  TidemarkError,
  ConfigurationError,
  ResolutionError,
  DuplicateMigrationError,
  StoreError,
  MigrationRunError,
  getErrorMessage,
} from "./lib/errors";
export type { MigrationRunOperation, RunProgress } from "./lib/errors";
export {
  BaseLogger,
  ConsoleLogger,
  MutableLogger,
  PrefixedLogger,
  consoleLogger,
  createPrefixedLogger,
  buildLogPrefix,
} from "./lib/logger";
export type { Logger, LogDataInput, LogData, LogLevel, LogOperation } from "./lib/logger";
