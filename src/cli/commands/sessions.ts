/**
 * sessions commands - Inspect and clean up stored conversation checkpoints
 */

import chalk from "chalk";

import { SqliteCheckpointSaver } from "../../core/checkpoint/sqlite-checkpoint-saver.js";
import { ErrorCode, InvalidInputError } from "../../core/errors.js";
import { loadConfig } from "../../utils/config.js";

export interface SessionScopeOptions {
  /** Checkpoint namespace (the project a conversation belongs to) */
  ns?: string;
}

export interface SessionShowOptions extends SessionScopeOptions {
  limit?: number;
}

export interface SessionPruneOptions extends SessionScopeOptions {
  keep?: number;
}

function openSaver(): { saver: SqliteCheckpointSaver; config: ReturnType<typeof loadConfig> } {
  const config = loadConfig();
  const saver = new SqliteCheckpointSaver({
    dbPath: config.checkpointDbPath,
    maxCheckpointsPerThread: config.retention.maxCheckpointsPerThread,
  });
  return { saver, config };
}

export async function sessionsListCommand(options: SessionScopeOptions): Promise<void> {
  const { saver } = openSaver();
  const threads = saver.listThreadsNamespace(options.ns ?? "");
  if (threads.length === 0) {
    console.log(chalk.dim("No conversations."));
    return;
  }
  for (const thread of threads) {
    console.log(thread);
  }
}

/**
 * Lists a conversation's checkpoints, newest first
 */
export async function sessionsShowCommand(threadId: string, options: SessionShowOptions): Promise<void> {
  const { saver } = openSaver();
  const config = { configurable: { thread_id: threadId, checkpoint_ns: options.ns ?? "" } };
  let count = 0;

  for (const tuple of saver.list(config, { limit: options.limit ?? 20 })) {
    count++;
    const channels = Object.keys(tuple.checkpoint.channel_values).sort().join(", ");
    console.log(`${chalk.cyan(tuple.checkpoint.id)} ${chalk.dim(tuple.checkpoint.ts)}`);
    console.log(`  Channels:  ${channels || chalk.dim("(none)")}`);
    console.log(`  Metadata:  ${JSON.stringify(tuple.metadata)}`);
    if (tuple.pendingWrites.length > 0) {
      console.log(`  Pending:   ${tuple.pendingWrites.length} write(s)`);
    }
  }

  if (count === 0) {
    console.log(chalk.dim(`No checkpoints for ${threadId}.`));
  }
}

export async function sessionsDeleteCommand(threadId: string, options: SessionScopeOptions): Promise<void> {
  const { saver } = openSaver();
  if (options.ns !== undefined) {
    saver.deleteThreadNamespace(threadId, options.ns);
  } else {
    saver.deleteThread(threadId);
  }
  console.log(chalk.green("✓ Deleted ") + threadId);
}

export async function sessionsPruneCommand(threadId: string, options: SessionPruneOptions): Promise<void> {
  const { saver, config } = openSaver();
  const keep = options.keep ?? config.retention.maxCheckpointsPerThread;
  if (keep === undefined) {
    throw new InvalidInputError(
      "Pass --keep or set retention.maxCheckpointsPerThread in the configuration",
      ErrorCode.INVALID_ARGUMENT
    );
  }
  const removed = saver.pruneThread(threadId, options.ns ?? "", keep);
  console.log(chalk.green("✓ Pruned ") + `${removed} checkpoint(s) from ${threadId}`);
}
