/**
 * SQLite Database Wrapper
 *
 * Owns the location and schema of one embedded database file and hands out
 * short-lived connections: every store call opens a connection, operates and
 * closes it. SQLite's own file locking arbitrates between concurrent callers.
 *
 * @module
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { MigrationRunner, type Migration, type MigrationResult } from "./migration-runner.js";
import { AtlasError, ErrorCode } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("sqlite-database");

export type Connection = Database.Database;

/**
 * Database configuration options
 */
export interface SqliteDatabaseConfig {
  /** Path to the database file */
  dbPath: string;
  /** Name of the schema owned by this database (used to track migrations) */
  schema: string;
  /** Schema migrations, applied on initialize */
  migrations: Migration[];
  /** Milliseconds to wait on a locked database before failing (default: 5000) */
  busyTimeoutMs?: number;
}

/**
 * Embedded SQLite database with per-call connections.
 *
 * @example
 * ```typescript
 * const db = new SqliteDatabase({ dbPath: "./graph.sqlite3", schema: "graph", migrations });
 * db.initialize();
 *
 * const count = db.withConnection((conn) =>
 *   conn.prepare("SELECT COUNT(*) AS c FROM nodes").get()
 * );
 *
 * db.transaction((conn) => {
 *   conn.prepare("DELETE FROM edges WHERE project = ?").run("demo");
 * });
 * ```
 */
export class SqliteDatabase {
  readonly dbPath: string;
  private readonly schema: string;
  private readonly runner: MigrationRunner;
  private readonly busyTimeoutMs: number;
  private initialized = false;

  constructor(config: SqliteDatabaseConfig) {
    this.dbPath = path.resolve(config.dbPath);
    this.schema = config.schema;
    this.runner = new MigrationRunner(config.schema, config.migrations);
    this.busyTimeoutMs = config.busyTimeoutMs ?? 5000;
  }

  /**
   * Creates the parent directory and applies pending migrations.
   * Safe to call more than once.
   */
  initialize(): MigrationResult | null {
    if (this.initialized) {
      return null;
    }

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const result = this.withConnection((conn) => this.runner.migrate(conn));
    this.initialized = true;

    logger.debug(
      { dbPath: this.dbPath, schema: this.schema, applied: result.appliedMigrations },
      "Database initialized"
    );
    return result;
  }

  /**
   * Whether migrations have been applied by this instance.
   */
  get isReady(): boolean {
    return this.initialized;
  }

  /**
   * Opens a connection, runs `fn` and closes the connection.
   */
  withConnection<T>(fn: (conn: Connection) => T): T {
    const conn = this.open();
    try {
      return fn(conn);
    } finally {
      conn.close();
    }
  }

  /**
   * Runs `fn` inside a single transaction on a fresh connection.
   * Commits on return, rolls back if `fn` throws.
   */
  transaction<T>(fn: (conn: Connection) => T): T {
    return this.withConnection((conn) => conn.transaction(() => fn(conn)).immediate());
  }

  getSchemaVersion(): number {
    return this.withConnection((conn) => this.runner.getCurrentVersion(conn));
  }

  private open(): Connection {
    let conn: Connection;
    try {
      conn = new Database(this.dbPath);
    } catch (error) {
      throw new AtlasError(`Failed to open database at ${this.dbPath}`, ErrorCode.STORAGE_OPEN_FAILED, {
        dbPath: this.dbPath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    conn.pragma("journal_mode = WAL");
    conn.pragma("synchronous = NORMAL");
    conn.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
    return conn;
  }
}
