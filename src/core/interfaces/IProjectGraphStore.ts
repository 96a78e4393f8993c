/**
 * IProjectGraphStore - Project-scoped call graph storage
 *
 * Rebuilds and queries the file/method graph of one project scope at a time.
 * A scope that was never indexed answers with zero counts and empty reports.
 *
 * @module
 */

import type { CodeBlockRecordInput } from "../../utils/validation.js";
import type {
  FileStatus,
  FileIndexStatus,
  GraphStats,
  IndexingJobRecord,
  IndexingJobUpdate,
  ProjectScope,
} from "../graph/models.js";

/**
 * Project graph store interface.
 *
 * @example
 * ```typescript
 * const stats = store.rebuild("demo", blocks);
 * console.log(store.overviewText("demo"));
 * console.log(store.neighborsText("demo", "demo::A", 2));
 * ```
 */
export interface IProjectGraphStore {
  /**
   * Replaces every node and edge of the scope with the graph computed from `methods`.
   *
   * @throws {InvalidInputError} When a record is malformed; nothing is written
   */
  rebuild(project: ProjectScope, methods: readonly CodeBlockRecordInput[]): GraphStats;

  /** Counts, top callers, top callees and sample call edges */
  overviewText(project: ProjectScope, limit?: number): string;

  /** Bounded breadth-first listing of calls around one node */
  neighborsText(project: ProjectScope, nodeId: string, depth?: number, limit?: number): string;

  /** Cross-file call dependencies: file → files it calls into */
  getFileDependencies(project: ProjectScope): Record<string, string[]>;

  getFileStatus(project: ProjectScope, filePath: string): FileStatus | undefined;
  updateFileStatus(project: ProjectScope, filePath: string, fileHash: string, status: FileIndexStatus): void;
  listFileStatuses(project: ProjectScope): FileStatus[];

  getIndexingJob(project: ProjectScope): IndexingJobRecord | undefined;
  updateIndexingJob(project: ProjectScope, update: IndexingJobUpdate): IndexingJobRecord;

  /** Removes every row belonging to the scope */
  deleteProject(project: ProjectScope): void;

  /** Named scopes that currently hold nodes */
  listProjects(): string[];
}
