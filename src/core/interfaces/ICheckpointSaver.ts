/**
 * ICheckpointSaver - Conversation state persistence
 *
 * Point-in-time snapshots keyed by (thread, namespace) with versioned channel
 * values and replayable pending writes. The thread id is the conversation,
 * the namespace is the project it belongs to.
 *
 * @module
 */

import type {
  ChannelVersions,
  ChannelWrite,
  Checkpoint,
  CheckpointConfig,
  CheckpointListOptions,
  CheckpointMetadata,
  CheckpointTuple,
} from "../checkpoint/models.js";

export interface ICheckpointSaver {
  /**
   * Exact checkpoint when the config names one, else the latest of the scope.
   *
   * @throws {InvalidInputError} When `configurable.thread_id` is missing
   */
  getTuple(config: CheckpointConfig): CheckpointTuple | undefined;

  /** Newest first; evaluated lazily, one lookup per step */
  list(config: CheckpointConfig | undefined, options?: CheckpointListOptions): Generator<CheckpointTuple>;

  /**
   * Stores the checkpoint and the channel values named in `newVersions`.
   * Returns a config pointing at the stored checkpoint.
   */
  put(
    config: CheckpointConfig,
    checkpoint: Checkpoint,
    metadata: CheckpointMetadata,
    newVersions: ChannelVersions
  ): CheckpointConfig;

  /** Records pending writes of one task against the config's checkpoint */
  putWrites(config: CheckpointConfig, writes: readonly ChannelWrite[], taskId: string, taskPath?: string): void;

  deleteThread(threadId: string): void;
  deleteThreadNamespace(threadId: string, checkpointNs: string): void;
  listThreadsNamespace(checkpointNs: string): string[];

  /** Keeps the newest `keepLast` checkpoints of a scope; returns how many were removed */
  pruneThread(threadId: string, checkpointNs: string, keepLast: number): number;
}
