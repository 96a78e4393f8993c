/**
 * Migration 002: Indexing Status
 *
 * Adds per-file hash tracking and the per-project indexing job row.
 *
 * @module
 */

import type { Migration } from "../../storage/migration-runner.js";

export const migration: Migration = {
  version: 2,
  name: "indexing_status",
  description: "Adds file_status and indexing_jobs tables",

  up(conn) {
    conn.exec(`
      CREATE TABLE IF NOT EXISTS file_status (
        project TEXT NOT NULL,
        file_path TEXT NOT NULL,
        file_hash TEXT NOT NULL,
        status TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (project, file_path)
      );
      CREATE TABLE IF NOT EXISTS indexing_jobs (
        project TEXT NOT NULL PRIMARY KEY,
        status TEXT NOT NULL,
        message TEXT NULL,
        files_total INTEGER NOT NULL DEFAULT 0,
        files_indexed INTEGER NOT NULL DEFAULT 0,
        started_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  },

  down(conn) {
    conn.exec(`
      DROP TABLE IF EXISTS indexing_jobs;
      DROP TABLE IF EXISTS file_status;
    `);
  },
};
