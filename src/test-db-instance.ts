/**
 * In-memory PostgreSQL for tests, migrated on start
 */

export {
  TestDatabaseInstance,
  createTestDBConsoleLogger,
} from "./lib/db-utilities/test-db-instance";
export type { LoggerFunction } from "./lib/db-utilities/test-db-instance";
