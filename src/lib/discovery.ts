import { promises as fs } from "fs";
import * as path from "path";

/**
 * Lists the file names in a directory, or null when the directory cannot be read
 */
export interface DirectoryLister {
  list(directory: string): Promise<string[] | null>;
}

/**
 * DirectoryLister backed by the local filesystem
 */
export const fsDirectoryLister: DirectoryLister = {
  async list(directory) {
    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch {
      // Missing or unreadable directories simply hold no migrations
      return null;
    }
  },
};

/**
 * Code-unit ordering; timestamp prefixes make it chronological
 */
export function compareIdentifiers(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// "<timestamp>_<name>", the same shape as a *_* glob
const MIGRATION_FILE_PATTERN = /^[^_]+_.+$/;

/**
 * Finds migration identifiers in the configured migration directory
 */
export class MigrationDiscovery {
  private directory: string;
  private extensions: string[];
  private lister: DirectoryLister;

  constructor(
    directory: string,
    extensions: string[],
    lister: DirectoryLister = fsDirectoryLister,
  ) {
    this.directory = directory;
    this.extensions = extensions;
    this.lister = lister;
  }

  /**
   * Strip a loadable extension from a file name, or return null if the file is not a migration
   */
  private identifierFor(fileName: string): string | null {
    if (fileName.endsWith(".d.ts")) {
      return null;
    }

    const extension = this.extensions.find((ext) => fileName.endsWith(ext));
    if (!extension) {
      return null;
    }

    const id = fileName.slice(0, -extension.length);
    return MIGRATION_FILE_PATTERN.test(id) ? id : null;
  }

  /**
   * Map of migration identifier to the file backing it
   */
  async paths(): Promise<Map<string, string>> {
    const names = (await this.lister.list(this.directory)) ?? [];
    const byId = new Map<string, string>();

    // Extensions are listed in preference order; the first one present wins
    for (const extension of this.extensions) {
      for (const name of names) {
        const id = this.identifierFor(name);
        if (id !== null && name === `${id}${extension}` && !byId.has(id)) {
          byId.set(id, path.join(this.directory, name));
        }
      }
    }

    return byId;
  }

  /**
   * List migration identifiers in ascending (chronological) order
   */
  async listUnits(): Promise<string[]> {
    return Array.from((await this.paths()).keys()).sort(compareIdentifiers);
  }

  /**
   * Path of the file backing a migration identifier
   */
  async pathFor(id: string): Promise<string | null> {
    return (await this.paths()).get(id) ?? null;
  }
}
