/**
 * Graph Migration Registry
 *
 * Exports all graph schema migrations in order. Add new migrations here.
 *
 * @module
 */

import type { Migration } from "../../storage/migration-runner.js";
import { migration as migration001 } from "./001_graph_schema.js";
import { migration as migration002 } from "./002_indexing_status.js";

export const GRAPH_SCHEMA = "project_graph";

/**
 * All registered migrations in version order.
 */
export const graphMigrations: Migration[] = [migration001, migration002];
