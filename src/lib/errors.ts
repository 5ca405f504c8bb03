export type MigrationRunOperation = "migrate" | "rollback" | "reset";

/**
 * Where a migrate, rollback or reset call stood when it stopped
 */
export interface RunProgress {
  operation: MigrationRunOperation;
  /** The migration being processed when the call stopped */
  failed: string;
  /** Migrations applied (or reverted) before it; they are not compensated */
  completed: string[];
}

/**
 * Base class for every error raised by Tidemark
 */
export class TidemarkError extends Error {
  /** Set when the error stopped a migrate, rollback or reset call part way */
  progress?: RunProgress;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TidemarkError";
  }
}

export class ConfigurationError extends TidemarkError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * No implementation is registered for a migration's derived name
 */
export class ResolutionError extends TidemarkError {
  readonly migration: string;
  readonly derivedName: string;

  constructor(migration: string, derivedName: string) {
    super(
      `No implementation registered for migration ${migration} (looked up as ${derivedName})`,
    );
    this.name = "ResolutionError";
    this.migration = migration;
    this.derivedName = derivedName;
  }
}

export class DuplicateMigrationError extends TidemarkError {
  constructor(name: string) {
    super(`Migration implementation already registered: ${name}`);
    this.name = "DuplicateMigrationError";
  }
}

/**
 * The ledger store failed to answer a query or to persist a change
 */
export class StoreError extends TidemarkError {
  constructor(action: string, cause: unknown) {
    super(`Ledger store failed to ${action}: ${getErrorMessage(cause)}`, {
      cause,
    });
    this.name = "StoreError";
  }
}

/**
 * A unit's up() or down() threw during a migrate, rollback or reset call.
 * Units listed in `completed` stay applied (or reverted); nothing is compensated.
 */
export class MigrationRunError extends TidemarkError {
  readonly operation: MigrationRunOperation;
  readonly completed: string[];
  readonly failed: string;

  constructor(
    operation: MigrationRunOperation,
    failed: string,
    completed: string[],
    cause: unknown,
  ) {
    super(
      `${operation} stopped at ${failed} after ${completed.length} migration(s): ${getErrorMessage(cause)}`,
      { cause },
    );
    this.name = "MigrationRunError";
    this.operation = operation;
    this.failed = failed;
    this.completed = completed;
    this.progress = { operation, failed, completed };
  }
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
