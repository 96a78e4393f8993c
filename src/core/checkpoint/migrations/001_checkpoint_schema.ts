/**
 * Migration 001: Checkpoint Schema
 *
 * Creates checkpoints, channel blobs and pending writes.
 *
 * @module
 */

import type { Migration } from "../../storage/migration-runner.js";

export const migration: Migration = {
  version: 1,
  name: "checkpoint_schema",
  description: "Creates checkpoints, blobs and writes tables",

  up(conn) {
    conn.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        thread_id TEXT NOT NULL,
        checkpoint_ns TEXT NOT NULL,
        checkpoint_id TEXT NOT NULL,
        parent_checkpoint_id TEXT NULL,
        checkpoint_type TEXT NOT NULL,
        checkpoint_blob BLOB NOT NULL,
        metadata_type TEXT NOT NULL,
        metadata_blob BLOB NOT NULL,
        PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id)
      );
      CREATE INDEX IF NOT EXISTS idx_checkpoints_latest
        ON checkpoints(thread_id, checkpoint_ns, checkpoint_id DESC);

      CREATE TABLE IF NOT EXISTS blobs (
        thread_id TEXT NOT NULL,
        checkpoint_ns TEXT NOT NULL,
        channel TEXT NOT NULL,
        version TEXT NOT NULL,
        value_type TEXT NOT NULL,
        value_blob BLOB NOT NULL,
        PRIMARY KEY (thread_id, checkpoint_ns, channel, version)
      );

      CREATE TABLE IF NOT EXISTS writes (
        thread_id TEXT NOT NULL,
        checkpoint_ns TEXT NOT NULL,
        checkpoint_id TEXT NOT NULL,
        task_id TEXT NOT NULL,
        write_idx INTEGER NOT NULL,
        channel TEXT NOT NULL,
        value_type TEXT NOT NULL,
        value_blob BLOB NOT NULL,
        task_path TEXT NOT NULL,
        PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id, task_id, write_idx)
      );
    `);
  },

  down(conn) {
    conn.exec(`
      DROP TABLE IF EXISTS writes;
      DROP TABLE IF EXISTS blobs;
      DROP INDEX IF EXISTS idx_checkpoints_latest;
      DROP TABLE IF EXISTS checkpoints;
    `);
  },
};
