/**
 * Schema Migration Runner
 *
 * Applies versioned schema migrations to an embedded SQLite database.
 * Versions are tracked per schema in a `schema_migrations` table so several
 * stores can share one database file.
 *
 * @module
 */

import type { Connection } from "./sqlite-database.js";
import { AtlasError, ErrorCode } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Migration definition interface.
 * Each migration has an up (apply) and down (revert) function.
 */
export interface Migration {
  /** Migration version number (must be sequential, starting at 1) */
  version: number;
  /** Human-readable migration name */
  name: string;
  /** Description of what this migration does */
  description?: string;
  /** Applies the migration. Runs inside a transaction. */
  up: (conn: Connection) => void;
  /** Reverts the migration. Runs inside a transaction. */
  down: (conn: Connection) => void;
}

export interface MigrationStatus {
  currentVersion: number;
  targetVersion: number;
  pendingMigrations: Migration[];
  needsMigration: boolean;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  appliedMigrations: string[];
}

// =============================================================================
// Migration Runner
// =============================================================================

/**
 * Manages schema migrations for one named schema.
 *
 * @example
 * ```typescript
 * const runner = new MigrationRunner("graph", graphMigrations);
 * db.withConnection((conn) => runner.migrate(conn));
 * ```
 */
export class MigrationRunner {
  private readonly migrations: Migration[];

  constructor(
    private readonly schema: string,
    migrations: Migration[]
  ) {
    const sorted = [...migrations].sort((a, b) => a.version - b.version);
    sorted.forEach((migration, i) => {
      if (migration.version !== i + 1) {
        throw new AtlasError(
          `Migration versions must be sequential. Expected version ${i + 1}, got ${migration.version}`,
          ErrorCode.STORAGE_MIGRATION_FAILED,
          { schema }
        );
      }
    });
    this.migrations = sorted;
  }

  get latestVersion(): number {
    return this.migrations.length;
  }

  getCurrentVersion(conn: Connection): number {
    this.ensureMigrationTable(conn);
    const row: unknown = conn
      .prepare("SELECT MAX(version) AS version FROM schema_migrations WHERE schema = ?")
      .get(this.schema);
    if (typeof row === "object" && row !== null && "version" in row && typeof row.version === "number") {
      return row.version;
    }
    return 0;
  }

  getStatus(conn: Connection): MigrationStatus {
    const currentVersion = this.getCurrentVersion(conn);
    const pendingMigrations = this.migrations.filter((m) => m.version > currentVersion);
    return {
      currentVersion,
      targetVersion: this.latestVersion,
      pendingMigrations,
      needsMigration: currentVersion !== this.latestVersion,
    };
  }

  /**
   * Migrates up to the target version (defaults to latest).
   */
  migrate(conn: Connection, targetVersion: number = this.latestVersion): MigrationResult {
    const fromVersion = this.getCurrentVersion(conn);
    const applied: string[] = [];

    for (const migration of this.migrations) {
      if (migration.version <= fromVersion || migration.version > targetVersion) continue;
      const apply = conn.transaction(() => {
        migration.up(conn);
        conn
          .prepare("INSERT INTO schema_migrations(schema, version, name, applied_at) VALUES (?, ?, ?, ?)")
          .run(this.schema, migration.version, migration.name, new Date().toISOString());
      });
      try {
        apply();
      } catch (error) {
        throw new AtlasError(
          `Migration ${this.schema}#${migration.version} (${migration.name}) failed`,
          ErrorCode.STORAGE_MIGRATION_FAILED,
          { schema: this.schema, cause: error instanceof Error ? error.message : String(error) }
        );
      }
      applied.push(migration.name);
    }

    return { fromVersion, toVersion: Math.max(fromVersion, Math.min(targetVersion, this.latestVersion)), appliedMigrations: applied };
  }

  /**
   * Reverts migrations down to the target version (defaults to one step back).
   */
  rollback(conn: Connection, targetVersion?: number): MigrationResult {
    const fromVersion = this.getCurrentVersion(conn);
    const target = targetVersion ?? Math.max(0, fromVersion - 1);
    const reverted: string[] = [];

    for (const migration of [...this.migrations].reverse()) {
      if (migration.version > fromVersion || migration.version <= target) continue;
      conn.transaction(() => {
        migration.down(conn);
        conn.prepare("DELETE FROM schema_migrations WHERE schema = ? AND version = ?").run(this.schema, migration.version);
      })();
      reverted.push(migration.name);
    }

    return { fromVersion, toVersion: target, appliedMigrations: reverted };
  }

  private ensureMigrationTable(conn: Connection): void {
    conn.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        schema TEXT NOT NULL,
        version INTEGER NOT NULL,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL,
        PRIMARY KEY (schema, version)
      )
    `);
  }
}
