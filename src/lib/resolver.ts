import { type Logger, consoleLogger } from "./logger";
import { DuplicateMigrationError, ResolutionError } from "./errors";
import { type MigrationDiscovery } from "./discovery";
import {
  type MigrationClass,
  type MigrationContext,
  type MigrationFactory,
  type MigrationUnit,
  isMigrationClass,
} from "./migration";

/**
 * Convert snake, kebab or space separated words to StudlyCase
 */
export function studlyCase(value: string): string {
  return value
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

/**
 * Name an identifier's implementation is registered under:
 * `2020_01_01_000000_create_users_table` becomes `CreateUsersTable`
 */
export function deriveMigrationName(id: string): string {
  return studlyCase(id.split("_").slice(4).join("_"));
}

/**
 * Explicit map from implementation name to factory, built once at startup
 */
export class MigrationRegistry {
  private factories = new Map<string, MigrationFactory>();

  /**
   * @throws DuplicateMigrationError if the name is taken
   */
  register(name: string, factory: MigrationFactory): this {
    if (this.factories.has(name)) {
      throw new DuplicateMigrationError(name);
    }

    this.factories.set(name, factory);
    return this;
  }

  /**
   * Register a class under its own name
   */
  registerClass(migrationClass: MigrationClass): this {
    return this.register(
      migrationClass.name,
      (context) => new migrationClass(context),
    );
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Build the unit for a migration identifier. A factory registered under the
   * full identifier wins over one registered under the derived name.
   * @throws ResolutionError if neither is registered
   */
  resolve(id: string, context: MigrationContext): MigrationUnit {
    const derivedName = deriveMigrationName(id);
    const factory = this.factories.get(id) ?? this.factories.get(derivedName);

    if (!factory) {
      throw new ResolutionError(id, derivedName);
    }

    return factory(context);
  }
}

/**
 * Makes implementations for a set of identifiers available in the registry
 */
export interface MigrationLoader {
  load(ids: string[], registry: MigrationRegistry): Promise<void>;
}

function exportNamed(mod: unknown, name: string): unknown {
  if (typeof mod !== "object" || mod === null) {
    return undefined;
  }

  return Reflect.get(mod, name);
}

/**
 * Loads migration files from the migration directory.
 *
 * Each file is imported at most once per loader. The export named after the
 * identifier's derived name (or the default export) is registered under the
 * full identifier, so two files sharing a derived name do not collide.
 * Identifiers that already resolve through the registry are left alone.
 */
export class FileMigrationLoader implements MigrationLoader {
  private discovery: MigrationDiscovery;
  private logger: Logger;
  private loaded = new Set<string>();

  constructor(discovery: MigrationDiscovery, logger: Logger = consoleLogger) {
    this.discovery = discovery;
    this.logger = logger;
  }

  async load(ids: string[], registry: MigrationRegistry): Promise<void> {
    const pending = ids.filter(
      (id) => !registry.has(id) && !registry.has(deriveMigrationName(id)),
    );

    if (pending.length === 0) {
      return;
    }

    const paths = await this.discovery.paths();

    for (const id of pending) {
      const file = paths.get(id);
      if (!file || this.loaded.has(file)) {
        continue;
      }

      const mod: unknown = await import(file);
      this.loaded.add(file);

      const derivedName = deriveMigrationName(id);
      const candidate =
        exportNamed(mod, derivedName) ?? exportNamed(mod, "default");

      if (isMigrationClass(candidate)) {
        registry.register(id, (context) => new candidate(context));
      } else {
        this.logger.warn({
          migration: id,
          message: `File ${file} does not export a migration class named ${derivedName}`,
        });
      }
    }
  }
}
