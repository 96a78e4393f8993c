/**
 * Job Record Model
 *
 * @module
 */

import type { DocumentationSummary } from "../interfaces/IDocumentationGenerator.js";

export type JobStatus = "running" | "completed" | "failed" | "stopped";

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(["completed", "failed", "stopped"]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * A background documentation job. Times are epoch milliseconds.
 */
export interface Job {
  jobId: string;
  /** Absolute, symlink-resolved root */
  rootDir: string;
  status: JobStatus;
  createdAt: number;
  startedAt: number | null;
  /** Set once, on the terminal transition */
  finishedAt: number | null;
  stopRequested: boolean;
  logFile: string;
  summary: DocumentationSummary | null;
  error: string | null;
}
