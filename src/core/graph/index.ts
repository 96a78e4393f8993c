/**
 * Project Graph Module
 *
 * @module
 */

export * from "./models.js";
export { buildProjectGraph } from "./call-graph-builder.js";
export { SqliteProjectGraphStore, type SqliteProjectGraphStoreOptions } from "./sqlite-graph-store.js";
export { GRAPH_SCHEMA, graphMigrations } from "./migrations/index.js";
