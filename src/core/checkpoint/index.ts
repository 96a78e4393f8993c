/**
 * Checkpoint Module
 *
 * @module
 */

export * from "./models.js";
export { SqliteCheckpointSaver, type SqliteCheckpointSaverOptions } from "./sqlite-checkpoint-saver.js";
export { dumpsTyped, loadsTyped, EMPTY_VALUE, type TypedValue, type ValueType } from "./serializer.js";
export { ERROR, SCHEDULED, INTERRUPT, RESUME, WRITES_IDX_MAP, isReservedChannel, writeIndexFor } from "./write-index.js";
export { CHECKPOINT_SCHEMA, checkpointMigrations } from "./migrations/index.js";
