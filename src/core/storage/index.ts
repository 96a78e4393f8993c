/**
 * Storage Module
 *
 * Embedded SQLite access shared by the graph and checkpoint stores.
 *
 * @module
 */

export { SqliteDatabase, type Connection, type SqliteDatabaseConfig } from "./sqlite-database.js";
export { MigrationRunner, type Migration, type MigrationResult, type MigrationStatus } from "./migration-runner.js";
