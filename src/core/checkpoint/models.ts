/**
 * Checkpoint Model
 *
 * Types exchanged with the conversational agent runtime. A checkpoint is a
 * snapshot of channel-version pointers; channel values live beside it as
 * immutable blobs keyed by (channel, version).
 *
 * @module
 */

import { z } from "zod";

export type ChannelVersion = string | number;
export type ChannelVersions = Record<string, ChannelVersion>;

export interface Checkpoint {
  /** Format version of the checkpoint body */
  v: number;
  /** Sortable checkpoint id */
  id: string;
  /** ISO timestamp */
  ts: string;
  channel_values: Record<string, unknown>;
  channel_versions: ChannelVersions;
  /** Per node: the channel versions it has already consumed */
  versions_seen: Record<string, ChannelVersions>;
  /** Other runtime fields (`pending_sends`, `updated_channels`, ...) are stored as given */
  [field: string]: unknown;
}

export type CheckpointMetadata = Record<string, unknown>;

export interface CheckpointConfigurable {
  thread_id?: string;
  checkpoint_ns?: string;
  checkpoint_id?: string;
}

export interface CheckpointConfig {
  configurable?: CheckpointConfigurable;
  /** Merged into the metadata of checkpoints written with this config */
  metadata?: CheckpointMetadata;
}

/** `[taskId, channel, value]` */
export type PendingWrite = [taskId: string, channel: string, value: unknown];

/** `[channel, value]` as proposed by a task */
export type ChannelWrite = [channel: string, value: unknown];

export interface CheckpointTuple {
  config: CheckpointConfig;
  checkpoint: Checkpoint;
  metadata: CheckpointMetadata;
  parentConfig?: CheckpointConfig;
  pendingWrites: PendingWrite[];
}

export interface CheckpointListOptions {
  /** Only checkpoints with an id strictly lower than this config's id */
  before?: CheckpointConfig;
  limit?: number;
  /** Keeps tuples whose metadata carries every key with an equal value */
  filter?: CheckpointMetadata;
}

// =============================================================================
// Stored body validation
// =============================================================================

const ChannelVersionsSchema = z.record(z.union([z.string(), z.number()]));

/**
 * Stored checkpoint body: everything except the channel values. Fields
 * beyond the ones validated here are kept.
 */
export const StoredCheckpointSchema = z
  .object({
    v: z.number(),
    id: z.string(),
    ts: z.string(),
    channel_versions: ChannelVersionsSchema.default({}),
    versions_seen: z.record(ChannelVersionsSchema).default({}),
  })
  .passthrough();

export type StoredCheckpoint = z.infer<typeof StoredCheckpointSchema>;

export const CheckpointMetadataSchema = z.record(z.unknown());

// =============================================================================
// Ids
// =============================================================================

let lastMillis = 0;
let sequence = 0;

/**
 * Returns a checkpoint id that sorts after every id previously issued by
 * this process: 12 hex digits of milliseconds, 6 of sequence, 8 random.
 */
export function createCheckpointId(now: number = Date.now()): string {
  if (now <= lastMillis) {
    sequence++;
  } else {
    lastMillis = now;
    sequence = 0;
  }
  const random = Math.floor(Math.random() * 0x100000000);
  return [
    lastMillis.toString(16).padStart(12, "0"),
    sequence.toString(16).padStart(6, "0"),
    random.toString(16).padStart(8, "0"),
  ].join("-");
}

export function emptyCheckpoint(): Checkpoint {
  return {
    v: 1,
    id: createCheckpointId(),
    ts: new Date().toISOString(),
    channel_values: {},
    channel_versions: {},
    versions_seen: {},
  };
}
