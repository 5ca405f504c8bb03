export {
  RunTidemarkCLI,
  createCLIConsoleLogger,
  CLIMigratorLogger,
} from "./lib/built-in-cli";
export type { CLILoggerFunction } from "./lib/built-in-cli";
