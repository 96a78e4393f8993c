/**
 * docs commands - Generate missing doc blocks and read the audit logs
 */

import chalk from "chalk";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { DocJobCoordinator } from "../../core/jobs/doc-job-coordinator.js";
import { DirectoryDocGenerator } from "../../core/documentation/doc-generator.js";
import { DocumentationAuditLog, safeLogFilename } from "../../core/documentation/audit-log.js";
import { ApiChatModel, isApiProvider } from "../../core/llm/api-chat-model.js";
import type { ChatModel } from "../../core/interfaces/IChatModel.js";
import { ConfigurationError, ErrorCode, InvalidInputError, JobError } from "../../core/errors.js";
import { loadConfig } from "../../utils/config.js";
import type { AtlasConfig } from "../../utils/validation.js";
import { createLogger } from "../../utils/index.js";
import { onShutdown } from "../shutdown.js";

const logger = createLogger("docs-command");

export interface DocsRunOptions {
  minLines?: number;
  provider?: string;
  model?: string;
}

/**
 * Builds the chat model from flags, falling back to the `llm` configuration.
 *
 * @throws {ConfigurationError} When no provider is configured or it is unknown
 */
export function createChatModel(config: AtlasConfig, options: Pick<DocsRunOptions, "provider" | "model">): ChatModel {
  const provider = options.provider ?? config.llm.provider;
  if (!provider) {
    throw new ConfigurationError("No model provider configured", [
      "Pass --provider, set llm.provider in the configuration, or set ATLAS_LLM_PROVIDER",
    ]);
  }
  if (!isApiProvider(provider)) {
    throw new ConfigurationError(`Unknown model provider: ${provider}`, ["Supported providers: anthropic, openai"]);
  }
  return new ApiChatModel({
    provider,
    modelId: options.model ?? config.llm.modelId,
    maxTokens: config.llm.maxTokens,
  });
}

/**
 * Document a directory and wait for the job; Ctrl+C stops it after the
 * member in progress.
 */
export async function docsRunCommand(rootDir: string, options: DocsRunOptions): Promise<void> {
  const config = loadConfig();
  const llm = createChatModel(config, options);
  const { minMeaningfulLines, ...docs } = config.docs;

  const coordinator = new DocJobCoordinator({
    generator: new DirectoryDocGenerator({ ...docs, llm }),
    auditLogDir: config.auditLogDir,
    minMeaningfulLines,
    maxFinishedJobs: config.retention.maxFinishedJobs,
  });

  const job = await coordinator.start(rootDir, { minMeaningfulLines: options.minLines });
  console.log(chalk.cyan("Documentation job ") + job.jobId);
  console.log(chalk.dim(`  Root: ${job.rootDir}`));
  console.log(chalk.dim(`  Log:  ${job.logFile}`));

  const unregister = onShutdown(async () => {
    coordinator.stop(job.jobId);
    await coordinator.waitFor(job.jobId);
  });
  const finished = await coordinator.waitFor(job.jobId);
  unregister();

  logger.info({ jobId: finished.jobId, status: finished.status }, "Documentation job settled");

  if (finished.status === "failed") {
    throw new JobError(finished.error ?? "Documentation job failed", ErrorCode.JOB_FAILED, { jobId: finished.jobId });
  }

  const summary = finished.summary;
  console.log();
  console.log(finished.status === "completed" ? chalk.green("✓ Completed") : chalk.yellow("■ Stopped"));
  if (summary) {
    console.log(`  Files scanned:      ${summary.filesScanned}`);
    console.log(`  Files modified:     ${summary.filesModified}`);
    console.log(`  Members documented: ${summary.membersDocumented}`);
  }
}

/**
 * Audit log file names, newest first
 */
export async function listAuditLogs(logDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(logDir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }
  return entries.filter((name) => name.startsWith("postimplementation_") && name.endsWith(".log")).sort().reverse();
}

export async function docsLogsCommand(): Promise<void> {
  const config = loadConfig();
  const logs = await listAuditLogs(config.auditLogDir);
  if (logs.length === 0) {
    console.log(chalk.dim("No documentation logs."));
    return;
  }
  for (const name of logs) {
    console.log(name);
  }
}

export async function docsLogCommand(name: string): Promise<void> {
  const config = loadConfig();
  const safe = safeLogFilename(name);
  if (!safe) {
    throw new InvalidInputError(`Invalid log file name: ${name}`, ErrorCode.INVALID_ARGUMENT);
  }
  const content = await DocumentationAuditLog.open(path.join(config.auditLogDir, safe)).read();
  process.stdout.write(content);
}
