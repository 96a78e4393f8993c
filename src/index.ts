/**
 * repo-atlas
 *
 * Project-scoped call graphs, conversation checkpoints and cancellable
 * documentation jobs, backed by SQLite.
 *
 * @module
 */

export * from "./core/index.js";
export { loadConfig } from "./utils/config.js";
export type { AtlasConfig, AtlasConfigInput, CodeBlockRecord, CodeBlockRecordInput } from "./utils/validation.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
export { CancellationError, CancellationToken, CancellationTokenSource, Mutex } from "./utils/async.js";
