/**
 * Documentation Job Coordinator
 *
 * Runs documentation passes as cancellable background jobs, one async worker
 * per job. Jobs whose roots overlap (equal, ancestor or descendant) never run
 * at the same time.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomUUID } from "node:crypto";

import type { ChatModel } from "../interfaces/IChatModel.js";
import type { IDocumentationGenerator } from "../interfaces/IDocumentationGenerator.js";
import { DocumentationAuditLog } from "../documentation/audit-log.js";
import { pathsOverlap } from "./path-overlap.js";
import { isTerminal, type Job, type JobStatus } from "./models.js";
import { CancellationError, CancellationTokenSource, Mutex } from "../../utils/async.js";
import { ErrorCode, InvalidInputError, JobConflictError, JobNotFoundError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("doc-jobs");

// =============================================================================
// Types
// =============================================================================

export interface DocJobCoordinatorOptions {
  /** Runs the documentation pass for a job */
  generator: IDocumentationGenerator;
  /** Directory receiving one audit log per job */
  auditLogDir: string;
  /** Model used when a job does not bring its own */
  llm?: ChatModel;
  /** Default threshold for jobs that do not set one (default: 3) */
  minMeaningfulLines?: number;
  /** Terminal jobs retained after each job finishes; unset keeps all */
  maxFinishedJobs?: number;
}

export interface DocJobStartOptions {
  minMeaningfulLines?: number;
  llm?: ChatModel;
}

interface JobEntry {
  job: Job;
  /** Insertion order, breaks createdAt ties */
  seq: number;
  source: CancellationTokenSource;
  worker: Promise<void>;
}

function snapshot(job: Job): Job {
  return { ...job, summary: job.summary ? { ...job.summary } : null };
}

// =============================================================================
// Coordinator
// =============================================================================

/**
 * Starts, tracks and stops documentation jobs.
 *
 * @example
 * ```typescript
 * const jobs = new DocJobCoordinator({ generator, auditLogDir: ".repo-atlas/postimplementation_logs" });
 * const job = await jobs.start("./src", { minMeaningfulLines: 3 });
 * jobs.stop(job.jobId);
 * const finished = await jobs.waitFor(job.jobId); // status "stopped"
 * ```
 */
export class DocJobCoordinator {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly mutex = new Mutex();
  private nextSeq = 0;

  constructor(private readonly options: DocJobCoordinatorOptions) {}

  /**
   * Starts a job for `rootDir` and returns it in the `running` state.
   *
   * @throws {InvalidInputError} When `rootDir` is not a directory
   * @throws {JobConflictError} When a running job covers an overlapping directory
   */
  async start(rootDir: string, options: DocJobStartOptions = {}): Promise<Job> {
    const root = await this.resolveRoot(rootDir);

    return this.mutex.runExclusive(async () => {
      for (const entry of this.jobs.values()) {
        if (entry.job.status === "running" && pathsOverlap(root, entry.job.rootDir)) {
          throw new JobConflictError(root, entry.job.rootDir, entry.job.jobId);
        }
      }

      const jobId = randomUUID().replace(/-/g, "");
      const log = await DocumentationAuditLog.create(this.options.auditLogDir, jobId);
      await log.writeHeader(root, jobId);

      const now = Date.now();
      const entry: JobEntry = {
        job: {
          jobId,
          rootDir: root,
          status: "running",
          createdAt: now,
          startedAt: now,
          finishedAt: null,
          stopRequested: false,
          logFile: log.path,
          summary: null,
          error: null,
        },
        seq: this.nextSeq++,
        source: new CancellationTokenSource(),
        worker: Promise.resolve(),
      };
      this.jobs.set(jobId, entry);
      const started = snapshot(entry.job);
      entry.worker = this.run(entry, log, options);

      logger.info({ jobId, rootDir: root, logFile: log.path }, "Documentation job started");
      return started;
    });
  }

  /**
   * All known jobs, newest first.
   */
  list(): Job[] {
    return [...this.jobs.values()]
      .sort((a, b) => b.job.createdAt - a.job.createdAt || b.seq - a.seq)
      .map((entry) => snapshot(entry.job));
  }

  get(jobId: string): Job | undefined {
    const entry = this.jobs.get(jobId);
    return entry ? snapshot(entry.job) : undefined;
  }

  /**
   * Requests cooperative cancellation. Returns without waiting for the worker;
   * terminal jobs are returned unchanged.
   *
   * @throws {JobNotFoundError} When the job is unknown
   */
  stop(jobId: string): Job {
    const entry = this.require(jobId);
    if (entry.job.status === "running") {
      entry.job.stopRequested = true;
      entry.source.cancel("stop requested");
      logger.info({ jobId }, "Stop requested");
    }
    return snapshot(entry.job);
  }

  /**
   * @throws {JobNotFoundError} When the job is unknown
   */
  async readLog(jobId: string): Promise<string> {
    const entry = this.require(jobId);
    return DocumentationAuditLog.open(entry.job.logFile).read();
  }

  /**
   * Resolves with the job once its worker has settled.
   *
   * @throws {JobNotFoundError} When the job is unknown
   */
  async waitFor(jobId: string): Promise<Job> {
    const entry = this.require(jobId);
    await entry.worker;
    return snapshot(entry.job);
  }

  async waitForAll(): Promise<void> {
    await Promise.all([...this.jobs.values()].map((entry) => entry.worker));
  }

  /**
   * Forgets the oldest terminal jobs beyond `maxFinished`. Running jobs are
   * never pruned. Returns the number of jobs removed.
   */
  prune(maxFinished: number): number {
    const finished = [...this.jobs.values()]
      .filter((entry) => isTerminal(entry.job.status))
      .sort((a, b) => a.seq - b.seq);

    const excess = finished.slice(0, Math.max(0, finished.length - Math.max(0, maxFinished)));
    for (const entry of excess) {
      this.jobs.delete(entry.job.jobId);
    }
    if (excess.length > 0) {
      logger.debug({ removed: excess.length, kept: maxFinished }, "Pruned finished jobs");
    }
    return excess.length;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private require(jobId: string): JobEntry {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw new JobNotFoundError(jobId);
    }
    return entry;
  }

  private async resolveRoot(rootDir: string): Promise<string> {
    const absolute = path.resolve(rootDir);
    let resolved: string;
    try {
      resolved = await fs.realpath(absolute);
    } catch (error) {
      throw new InvalidInputError(`Not a directory: ${absolute}`, ErrorCode.JOB_INVALID_ROOT, {
        rootDir: absolute,
        cause: errorMessage(error),
      });
    }
    const stat = await fs.stat(resolved);
    if (!stat.isDirectory()) {
      throw new InvalidInputError(`Not a directory: ${resolved}`, ErrorCode.JOB_INVALID_ROOT, { rootDir: resolved });
    }
    return resolved;
  }

  private async run(entry: JobEntry, log: DocumentationAuditLog, options: DocJobStartOptions): Promise<void> {
    const { job, source } = entry;
    try {
      const summary = await this.options.generator.generate(job.rootDir, {
        token: source.token,
        log,
        minMeaningfulLines: options.minMeaningfulLines ?? this.options.minMeaningfulLines ?? 3,
        llm: options.llm ?? this.options.llm,
      });
      job.summary = summary;
      this.finish(entry, job.stopRequested || source.token.cancelled ? "stopped" : "completed");
    } catch (error) {
      if (error instanceof CancellationError) {
        this.finish(entry, "stopped");
        return;
      }
      job.error = errorMessage(error);
      this.finish(entry, "failed");
      logger.error({ jobId: job.jobId, err: error }, "Documentation job failed");
    }
  }

  private finish(entry: JobEntry, status: Exclude<JobStatus, "running">): void {
    const { job } = entry;
    if (job.finishedAt !== null) return;

    job.status = status;
    job.finishedAt = Date.now();
    logger.info(
      { jobId: job.jobId, status, membersDocumented: job.summary?.membersDocumented ?? 0 },
      "Documentation job finished"
    );

    if (this.options.maxFinishedJobs !== undefined) {
      this.prune(this.options.maxFinishedJobs);
    }
  }
}
