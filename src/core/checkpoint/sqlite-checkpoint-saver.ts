/**
 * SQLite Checkpoint Saver
 *
 * Persists conversation checkpoints, their channel blobs and pending writes in
 * one SQLite file. Only channels listed in `newVersions` are serialized on
 * `put`; unchanged channels keep pointing at blobs written earlier.
 *
 * @module
 */

import { isDeepStrictEqual } from "node:util";
import { SqliteDatabase, type Connection } from "../storage/sqlite-database.js";
import { CHECKPOINT_SCHEMA, checkpointMigrations } from "./migrations/index.js";
import {
  CheckpointMetadataSchema,
  StoredCheckpointSchema,
  type ChannelVersions,
  type ChannelWrite,
  type Checkpoint,
  type CheckpointConfig,
  type CheckpointListOptions,
  type CheckpointMetadata,
  type CheckpointTuple,
  type PendingWrite,
  type StoredCheckpoint,
} from "./models.js";
import { EMPTY_VALUE, dumpsTyped, loadsTyped } from "./serializer.js";
import { isReservedChannel, writeIndexFor } from "./write-index.js";
import type { ICheckpointSaver } from "../interfaces/ICheckpointSaver.js";
import { CheckpointError, ErrorCode, InvalidInputError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("checkpoint-saver");

// =============================================================================
// Row Types
// =============================================================================

interface CheckpointRow {
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  checkpoint_type: string;
  checkpoint_blob: Buffer;
  metadata_type: string;
  metadata_blob: Buffer;
}

interface BlobRow {
  value_type: string;
  value_blob: Buffer;
}

interface WriteRow {
  task_id: string;
  channel: string;
  value_type: string;
  value_blob: Buffer;
}

interface Scope {
  threadId: string;
  ns: string;
}

export interface SqliteCheckpointSaverOptions {
  /** Path to the SQLite file */
  dbPath: string;
  /** When set, each `put` prunes its scope down to this many checkpoints */
  maxCheckpointsPerThread?: number;
}

// =============================================================================
// Helpers
// =============================================================================

function requireThread(config: CheckpointConfig): Scope {
  const threadId = config.configurable?.thread_id;
  if (!threadId) {
    throw new InvalidInputError("Missing required config: configurable.thread_id", ErrorCode.CHECKPOINT_MISSING_THREAD);
  }
  return { threadId, ns: config.configurable?.checkpoint_ns ?? "" };
}

function scopedConfig(scope: Scope, checkpointId: string): CheckpointConfig {
  return { configurable: { thread_id: scope.threadId, checkpoint_ns: scope.ns, checkpoint_id: checkpointId } };
}

function matchesFilter(metadata: CheckpointMetadata, filter: CheckpointMetadata | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => isDeepStrictEqual(metadata[key], value));
}

// =============================================================================
// Saver
// =============================================================================

/**
 * SQLite-backed checkpoint saver.
 *
 * @example
 * ```typescript
 * const saver = new SqliteCheckpointSaver({ dbPath: "./checkpoints.sqlite3" });
 * const checkpoint = emptyCheckpoint();
 * checkpoint.channel_values = { messages: ["hi"] };
 * checkpoint.channel_versions = { messages: 1 };
 *
 * const config = saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "demo" } }, checkpoint, {}, { messages: 1 });
 * saver.getTuple(config)?.checkpoint.channel_values.messages; // ["hi"]
 * ```
 */
export class SqliteCheckpointSaver implements ICheckpointSaver {
  private readonly db: SqliteDatabase;
  private readonly maxCheckpointsPerThread?: number;

  constructor(options: SqliteCheckpointSaverOptions) {
    this.db = new SqliteDatabase({ dbPath: options.dbPath, schema: CHECKPOINT_SCHEMA, migrations: checkpointMigrations });
    this.db.initialize();
    this.maxCheckpointsPerThread = options.maxCheckpointsPerThread;
  }

  get path(): string {
    return this.db.dbPath;
  }

  getTuple(config: CheckpointConfig): CheckpointTuple | undefined {
    const scope = requireThread(config);
    const checkpointId = config.configurable?.checkpoint_id;

    return this.db.withConnection((conn) => {
      const row = checkpointId
        ? conn
            .prepare<[string, string, string], CheckpointRow>(
              `SELECT checkpoint_id, parent_checkpoint_id, checkpoint_type, checkpoint_blob, metadata_type, metadata_blob
               FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?`
            )
            .get(scope.threadId, scope.ns, checkpointId)
        : conn
            .prepare<[string, string], CheckpointRow>(
              `SELECT checkpoint_id, parent_checkpoint_id, checkpoint_type, checkpoint_blob, metadata_type, metadata_blob
               FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ?
               ORDER BY checkpoint_id DESC LIMIT 1`
            )
            .get(scope.threadId, scope.ns);

      if (!row) return undefined;
      return this.toTuple(conn, scope, row, checkpointId ? config : scopedConfig(scope, row.checkpoint_id));
    });
  }

  *list(config: CheckpointConfig | undefined, options: CheckpointListOptions = {}): Generator<CheckpointTuple> {
    const threadId = config?.configurable?.thread_id;
    if (!threadId) return;
    const scope: Scope = { threadId, ns: config?.configurable?.checkpoint_ns ?? "" };

    const beforeId = options.before?.configurable?.checkpoint_id;
    const limit = options.limit !== undefined ? Math.max(0, Math.trunc(options.limit)) : undefined;

    let sql = "SELECT checkpoint_id FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ?";
    const params: (string | number)[] = [scope.threadId, scope.ns];
    if (beforeId) {
      sql += " AND checkpoint_id < ?";
      params.push(beforeId);
    }
    sql += " ORDER BY checkpoint_id DESC";
    // A metadata filter is applied per tuple, so the cap has to be counted here instead.
    if (limit !== undefined && !options.filter) {
      sql += " LIMIT ?";
      params.push(limit);
    }

    const ids = this.db
      .withConnection((conn) => conn.prepare<(string | number)[], { checkpoint_id: string }>(sql).all(...params))
      .map((row) => row.checkpoint_id);

    let yielded = 0;
    for (const id of ids) {
      if (limit !== undefined && yielded >= limit) return;
      const tuple = this.getTuple(scopedConfig(scope, id));
      if (tuple && matchesFilter(tuple.metadata, options.filter)) {
        yielded++;
        yield tuple;
      }
    }
  }

  put(
    config: CheckpointConfig,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
    newVersions: ChannelVersions
  ): CheckpointConfig {
    const scope = requireThread(config);
    const parentId = config.configurable?.checkpoint_id ?? null;
    const { channel_values: values, ...body } = checkpoint;

    const [checkpointType, checkpointBlob] = dumpsTyped(body);
    const [metadataType, metadataBlob] = dumpsTyped({ ...config.metadata, ...metadata });

    this.db.transaction((conn) => {
      const insertBlob = conn.prepare(
        `INSERT OR IGNORE INTO blobs(thread_id, checkpoint_ns, channel, version, value_type, value_blob)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      for (const [channel, version] of Object.entries(newVersions)) {
        const [valueType, valueBlob] = Object.hasOwn(values, channel) ? dumpsTyped(values[channel]) : EMPTY_VALUE;
        insertBlob.run(scope.threadId, scope.ns, channel, String(version), valueType, valueBlob);
      }

      conn
        .prepare(
          `INSERT OR REPLACE INTO checkpoints(
             thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id,
             checkpoint_type, checkpoint_blob, metadata_type, metadata_blob)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(scope.threadId, scope.ns, checkpoint.id, parentId, checkpointType, checkpointBlob, metadataType, metadataBlob);
    });

    logger.debug(
      { threadId: scope.threadId, ns: scope.ns, checkpointId: checkpoint.id, channels: Object.keys(newVersions).length },
      "Checkpoint stored"
    );
    if (this.maxCheckpointsPerThread !== undefined) {
      this.pruneThread(scope.threadId, scope.ns, this.maxCheckpointsPerThread);
    }
    return scopedConfig(scope, checkpoint.id);
  }

  putWrites(config: CheckpointConfig, writes: readonly ChannelWrite[], taskId: string, taskPath = ""): void {
    const scope = requireThread(config);
    const checkpointId = config.configurable?.checkpoint_id;
    if (!checkpointId) {
      throw new InvalidInputError("Missing required config: configurable.checkpoint_id", ErrorCode.CHECKPOINT_MISSING_ID, {
        threadId: scope.threadId,
      });
    }

    const columns = `(thread_id, checkpoint_ns, checkpoint_id, task_id, write_idx, channel, value_type, value_blob, task_path)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`;

    this.db.transaction((conn) => {
      const replace = conn.prepare(`INSERT OR REPLACE INTO writes${columns}`);
      const insert = conn.prepare(`INSERT OR IGNORE INTO writes${columns}`);

      writes.forEach(([channel, value], position) => {
        const [valueType, valueBlob] = dumpsTyped(value);
        const statement = isReservedChannel(channel) ? replace : insert;
        statement.run(
          scope.threadId,
          scope.ns,
          checkpointId,
          taskId,
          writeIndexFor(channel, position),
          channel,
          valueType,
          valueBlob,
          taskPath
        );
      });
    });
  }

  deleteThread(threadId: string): void {
    this.db.transaction((conn) => {
      for (const table of ["writes", "blobs", "checkpoints"]) {
        conn.prepare(`DELETE FROM ${table} WHERE thread_id = ?`).run(threadId);
      }
    });
    logger.info({ threadId }, "Thread deleted");
  }

  deleteThreadNamespace(threadId: string, checkpointNs: string): void {
    this.db.transaction((conn) => {
      for (const table of ["writes", "blobs", "checkpoints"]) {
        conn.prepare(`DELETE FROM ${table} WHERE thread_id = ? AND checkpoint_ns = ?`).run(threadId, checkpointNs);
      }
    });
    logger.info({ threadId, ns: checkpointNs }, "Thread namespace deleted");
  }

  listThreadsNamespace(checkpointNs: string): string[] {
    return this.db
      .withConnection((conn) =>
        conn
          .prepare<[string], { thread_id: string }>(
            "SELECT DISTINCT thread_id FROM checkpoints WHERE checkpoint_ns = ? ORDER BY thread_id"
          )
          .all(checkpointNs)
      )
      .map((row) => row.thread_id);
  }

  /**
   * Drops every checkpoint of the scope except the newest `keepLast`, together
   * with their pending writes and the blobs no surviving checkpoint points at.
   */
  pruneThread(threadId: string, checkpointNs: string, keepLast: number): number {
    if (!Number.isInteger(keepLast) || keepLast < 0) {
      throw new InvalidInputError(`keepLast must be a non-negative integer, got ${keepLast}`, ErrorCode.INVALID_ARGUMENT, {
        threadId,
      });
    }
    const scope: Scope = { threadId, ns: checkpointNs };

    const removed = this.db.transaction((conn) => {
      const rows = conn
        .prepare<[string, string], CheckpointRow>(
          `SELECT checkpoint_id, parent_checkpoint_id, checkpoint_type, checkpoint_blob, metadata_type, metadata_blob
           FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ? ORDER BY checkpoint_id DESC`
        )
        .all(threadId, checkpointNs);

      const survivors = rows.slice(0, keepLast);
      const doomed = rows.slice(keepLast);
      if (doomed.length === 0) return 0;

      const deleteCheckpoint = conn.prepare(
        "DELETE FROM checkpoints WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?"
      );
      const deleteWrites = conn.prepare("DELETE FROM writes WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?");
      for (const row of doomed) {
        deleteCheckpoint.run(threadId, checkpointNs, row.checkpoint_id);
        deleteWrites.run(threadId, checkpointNs, row.checkpoint_id);
      }

      const referenced = new Set<string>();
      for (const row of survivors) {
        const body = this.decodeBody(scope, row);
        for (const [channel, version] of Object.entries(body.channel_versions)) {
          referenced.add(`${channel}\u0000${String(version)}`);
        }
      }

      const deleteBlob = conn.prepare(
        "DELETE FROM blobs WHERE thread_id = ? AND checkpoint_ns = ? AND channel = ? AND version = ?"
      );
      const blobs = conn
        .prepare<[string, string], { channel: string; version: string }>(
          "SELECT channel, version FROM blobs WHERE thread_id = ? AND checkpoint_ns = ?"
        )
        .all(threadId, checkpointNs);
      for (const blob of blobs) {
        if (!referenced.has(`${blob.channel}\u0000${blob.version}`)) {
          deleteBlob.run(threadId, checkpointNs, blob.channel, blob.version);
        }
      }

      return doomed.length;
    });

    if (removed > 0) {
      logger.info({ threadId, ns: checkpointNs, removed, kept: keepLast }, "Thread pruned");
    }
    return removed;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private toTuple(conn: Connection, scope: Scope, row: CheckpointRow, config: CheckpointConfig): CheckpointTuple {
    const body = this.decodeBody(scope, row);

    const metadataResult = CheckpointMetadataSchema.safeParse(loadsTyped(row.metadata_type, row.metadata_blob));
    if (!metadataResult.success) {
      throw new CheckpointError("Stored checkpoint metadata is not an object", ErrorCode.CHECKPOINT_SERIALIZATION_FAILED, {
        threadId: scope.threadId,
        checkpointId: row.checkpoint_id,
      });
    }

    const blobStatement = conn.prepare<[string, string, string, string], BlobRow>(
      `SELECT value_type, value_blob FROM blobs
       WHERE thread_id = ? AND checkpoint_ns = ? AND channel = ? AND version = ?`
    );
    const channelValues: Record<string, unknown> = {};
    for (const [channel, version] of Object.entries(body.channel_versions)) {
      const blob = blobStatement.get(scope.threadId, scope.ns, channel, String(version));
      if (blob && blob.value_type !== "empty") {
        channelValues[channel] = loadsTyped(blob.value_type, blob.value_blob);
      }
    }

    const pendingWrites: PendingWrite[] = conn
      .prepare<[string, string, string], WriteRow>(
        `SELECT task_id, channel, value_type, value_blob FROM writes
         WHERE thread_id = ? AND checkpoint_ns = ? AND checkpoint_id = ?
         ORDER BY task_id ASC, write_idx ASC`
      )
      .all(scope.threadId, scope.ns, row.checkpoint_id)
      .map((w): PendingWrite => [w.task_id, w.channel, loadsTyped(w.value_type, w.value_blob)]);

    return {
      config,
      checkpoint: { ...body, channel_values: channelValues },
      metadata: metadataResult.data,
      parentConfig: row.parent_checkpoint_id ? scopedConfig(scope, row.parent_checkpoint_id) : undefined,
      pendingWrites,
    };
  }

  private decodeBody(scope: Scope, row: CheckpointRow): StoredCheckpoint {
    const result = StoredCheckpointSchema.safeParse(loadsTyped(row.checkpoint_type, row.checkpoint_blob));
    if (!result.success) {
      throw new CheckpointError("Stored checkpoint body is malformed", ErrorCode.CHECKPOINT_SERIALIZATION_FAILED, {
        threadId: scope.threadId,
        checkpointId: row.checkpoint_id,
      });
    }
    return result.data;
  }
}
