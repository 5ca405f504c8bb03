#!/usr/bin/env node
// Load environment variables first if you keep them in a .env file

import { RunTidemarkCLI, createCLIConsoleLogger } from "../src/cli";
import { MigrationRegistry } from "../src";

// Implementations registered here win over the exports of the migration files.
// Leave it empty to load every implementation from MIGRATIONS_PATH.
const registry = new MigrationRegistry();

// Pass false to hide the migrator's info lines
const logger = createCLIConsoleLogger(true);

// Reads POSTGRES_* and MIGRATIONS_* from the environment
RunTidemarkCLI({
  registry,
  loadFrom: "env",
  logger,
}).catch((error: unknown) => {
  console.error(
    `Failed to run CLI: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
