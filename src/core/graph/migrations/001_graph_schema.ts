/**
 * Migration 001: Graph Schema
 *
 * Creates the node and edge tables of the project graph.
 *
 * @module
 */

import type { Migration } from "../../storage/migration-runner.js";

export const migration: Migration = {
  version: 1,
  name: "graph_schema",
  description: "Creates nodes and edges tables keyed by project scope",

  up(conn) {
    conn.exec(`
      CREATE TABLE IF NOT EXISTS nodes (
        project TEXT NOT NULL,
        node_id TEXT NOT NULL,
        kind TEXT NOT NULL,
        label TEXT NOT NULL,
        file_path TEXT NULL,
        signature TEXT NULL,
        PRIMARY KEY (project, node_id)
      );
      CREATE TABLE IF NOT EXISTS edges (
        project TEXT NOT NULL,
        src TEXT NOT NULL,
        dst TEXT NOT NULL,
        type TEXT NOT NULL,
        PRIMARY KEY (project, src, dst, type)
      );
      CREATE INDEX IF NOT EXISTS idx_edges_src ON edges(project, src);
      CREATE INDEX IF NOT EXISTS idx_edges_dst ON edges(project, dst);
    `);
  },

  down(conn) {
    conn.exec(`
      DROP INDEX IF EXISTS idx_edges_dst;
      DROP INDEX IF EXISTS idx_edges_src;
      DROP TABLE IF EXISTS edges;
      DROP TABLE IF EXISTS nodes;
    `);
  },
};
