/**
 * SQLite Project Graph Store
 *
 * Persists the file/method call graph per project scope in one SQLite file and
 * renders text reports over it. Every call opens its own connection.
 *
 * @module
 */

import { SqliteDatabase, type Connection } from "../storage/sqlite-database.js";
import { buildProjectGraph } from "./call-graph-builder.js";
import { GRAPH_SCHEMA, graphMigrations } from "./migrations/index.js";
import {
  scopeKey,
  type FileIndexStatus,
  type FileStatus,
  type GraphStats,
  type IndexingJobRecord,
  type IndexingJobUpdate,
  type ProjectScope,
} from "./models.js";
import type { IProjectGraphStore } from "../interfaces/IProjectGraphStore.js";
import { CodeBlockRecordListSchema, formatZodError, type CodeBlockRecordInput } from "../../utils/validation.js";
import { ErrorCode, GraphError, InvalidInputError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("graph-store");

const LABEL_CHUNK_SIZE = 500;
const MAX_DEPTH = 4;
const MAX_NEIGHBOR_LIMIT = 200;
const DEFAULT_OVERVIEW_LIMIT = 25;

// =============================================================================
// Row Types
// =============================================================================

interface CountRow {
  c: number;
}

interface DegreeRow {
  node_id: string;
  c: number;
}

interface EdgeRow {
  src: string;
  dst: string;
}

interface LabelRow {
  node_id: string;
  label: string;
}

interface FileDependencyRow {
  src_file: string;
  dst_file: string;
}

interface FileStatusRow {
  file_path: string;
  file_hash: string;
  status: FileIndexStatus;
  updated_at: string;
}

interface IndexingJobRow {
  project: string;
  status: IndexingJobRecord["status"];
  message: string | null;
  files_total: number;
  files_indexed: number;
  started_at: string;
  updated_at: string;
}

export interface SqliteProjectGraphStoreOptions {
  /** Path to the SQLite file */
  dbPath: string;
}

function clamp(value: number, min: number, max: number, fallback: number = min): number {
  const n = Number.isFinite(value) ? Math.trunc(value) : fallback;
  return Math.max(min, Math.min(n, max));
}

function toFileStatus(row: FileStatusRow): FileStatus {
  return { filePath: row.file_path, fileHash: row.file_hash, status: row.status, updatedAt: row.updated_at };
}

function toIndexingJob(row: IndexingJobRow): IndexingJobRecord {
  return {
    project: row.project === "" ? null : row.project,
    status: row.status,
    message: row.message,
    filesTotal: row.files_total,
    filesIndexed: row.files_indexed,
    startedAt: row.started_at,
    updatedAt: row.updated_at,
  };
}

// =============================================================================
// Store
// =============================================================================

/**
 * SQLite-backed project graph.
 *
 * Nodes are methods and files; edges are file → method (`contains`) and
 * method → method (`calls`). Unscoped projects are stored under an empty scope.
 */
export class SqliteProjectGraphStore implements IProjectGraphStore {
  private readonly db: SqliteDatabase;

  constructor(options: SqliteProjectGraphStoreOptions) {
    this.db = new SqliteDatabase({ dbPath: options.dbPath, schema: GRAPH_SCHEMA, migrations: graphMigrations });
    this.db.initialize();
  }

  get path(): string {
    return this.db.dbPath;
  }

  rebuild(project: ProjectScope, methods: readonly CodeBlockRecordInput[]): GraphStats {
    const parsed = CodeBlockRecordListSchema.safeParse(methods);
    if (!parsed.success) {
      throw new InvalidInputError("Invalid code block records", ErrorCode.GRAPH_INVALID_RECORD, {
        project,
        issues: formatZodError(parsed.error),
      });
    }

    const key = scopeKey(project);
    const graph = buildProjectGraph(project, parsed.data);

    try {
      this.db.transaction((conn) => {
        conn.prepare("DELETE FROM edges WHERE project = ?").run(key);
        conn.prepare("DELETE FROM nodes WHERE project = ?").run(key);

        const insertNode = conn.prepare(
          "INSERT OR REPLACE INTO nodes(project, node_id, kind, label, file_path, signature) VALUES (?, ?, ?, ?, ?, ?)"
        );
        for (const node of graph.nodes) {
          insertNode.run(key, node.nodeId, node.kind, node.label, node.filePath, node.signature);
        }

        const insertEdge = conn.prepare("INSERT OR REPLACE INTO edges(project, src, dst, type) VALUES (?, ?, ?, ?)");
        for (const edge of graph.edges) {
          insertEdge.run(key, edge.src, edge.dst, edge.type);
        }
      });
    } catch (error) {
      throw new GraphError(`Failed to rebuild graph for ${project ?? "(default)"}`, ErrorCode.GRAPH_REBUILD_FAILED, {
        project,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    logger.info({ ...graph.stats }, "Graph rebuilt");
    return graph.stats;
  }

  overviewText(project: ProjectScope, limit = DEFAULT_OVERVIEW_LIMIT): string {
    const key = scopeKey(project);
    const lim = clamp(limit, 1, Number.MAX_SAFE_INTEGER, DEFAULT_OVERVIEW_LIMIT);

    return this.db.withConnection((conn) => {
      const count = (sql: string): number => conn.prepare<[string], CountRow>(sql).get(key)?.c ?? 0;

      const methodCount = count("SELECT COUNT(*) AS c FROM nodes WHERE project = ? AND kind = 'method'");
      const fileCount = count("SELECT COUNT(*) AS c FROM nodes WHERE project = ? AND kind = 'file'");
      const callCount = count("SELECT COUNT(*) AS c FROM edges WHERE project = ? AND type = 'calls'");

      const topCallers = conn
        .prepare<[string, number], DegreeRow>(
          `SELECT src AS node_id, COUNT(*) AS c FROM edges
           WHERE project = ? AND type = 'calls'
           GROUP BY src ORDER BY c DESC, src ASC LIMIT ?`
        )
        .all(key, lim);
      const topCallees = conn
        .prepare<[string, number], DegreeRow>(
          `SELECT dst AS node_id, COUNT(*) AS c FROM edges
           WHERE project = ? AND type = 'calls'
           GROUP BY dst ORDER BY c DESC, dst ASC LIMIT ?`
        )
        .all(key, lim);
      const sampleEdges = conn
        .prepare<[string, number], EdgeRow>(
          "SELECT src, dst FROM edges WHERE project = ? AND type = 'calls' ORDER BY src, dst LIMIT ?"
        )
        .all(key, lim);

      const labels = this.labelsFor(conn, key, [
        ...topCallers.map((r) => r.node_id),
        ...topCallees.map((r) => r.node_id),
        ...sampleEdges.flatMap((r) => [r.src, r.dst]),
      ]);
      const label = (id: string): string => labels.get(id) ?? id;

      const lines = [
        project ? `Project: ${project}` : "Project: (default)",
        `Files indexed: ${fileCount}`,
        `Methods indexed: ${methodCount}`,
        `Call edges (best-effort): ${callCount}`,
      ];

      if (topCallers.length > 0) {
        lines.push("", "Top callers (out-degree):");
        for (const row of topCallers) lines.push(`- ${label(row.node_id)} (calls=${row.c})`);
      }
      if (topCallees.length > 0) {
        lines.push("", "Top callees (in-degree):");
        for (const row of topCallees) lines.push(`- ${label(row.node_id)} (called_by=${row.c})`);
      }
      if (sampleEdges.length > 0) {
        lines.push("", "Sample call edges:");
        for (const row of sampleEdges) lines.push(`- ${label(row.src)} -> ${label(row.dst)}`);
      }

      return lines.join("\n");
    });
  }

  neighborsText(project: ProjectScope, nodeId: string, depth = 1, limit = 60): string {
    const key = scopeKey(project);
    const d = clamp(depth, 1, MAX_DEPTH);
    const lim = clamp(limit, 1, MAX_NEIGHBOR_LIMIT);

    return this.db.withConnection((conn) => {
      const outgoing = conn.prepare<[string, string, number], { dst: string }>(
        "SELECT dst FROM edges WHERE project = ? AND type = 'calls' AND src = ? ORDER BY dst LIMIT ?"
      );
      const incoming = conn.prepare<[string, string, number], { src: string }>(
        "SELECT src FROM edges WHERE project = ? AND type = 'calls' AND dst = ? ORDER BY src LIMIT ?"
      );

      const visited = new Set<string>([nodeId]);
      const edgesOut: EdgeRow[] = [];
      const edgesIn: EdgeRow[] = [];
      let frontier = [nodeId];

      for (let level = 0; level < d && frontier.length > 0; level++) {
        const next = new Set<string>();
        for (const current of [...frontier].sort().slice(0, lim)) {
          for (const { dst } of outgoing.all(key, current, lim)) {
            edgesOut.push({ src: current, dst });
            if (!visited.has(dst)) {
              visited.add(dst);
              next.add(dst);
            }
          }
          for (const { src } of incoming.all(key, current, lim)) {
            edgesIn.push({ src, dst: current });
            if (!visited.has(src)) {
              visited.add(src);
              next.add(src);
            }
          }
        }
        frontier = [...next];
      }

      const labels = this.labelsFor(conn, key, visited);
      const label = (id: string): string => labels.get(id) ?? id;

      const lines = [`Node: ${label(nodeId)}`, `Depth: ${d}`];
      if (edgesOut.length > 0) {
        lines.push("", "Calls:");
        for (const edge of edgesOut.slice(0, lim)) lines.push(`- ${label(edge.src)} -> ${label(edge.dst)}`);
      }
      if (edgesIn.length > 0) {
        lines.push("", "Called by:");
        for (const edge of edgesIn.slice(0, lim)) lines.push(`- ${label(edge.src)} -> ${label(edge.dst)}`);
      }
      return lines.join("\n");
    });
  }

  getFileDependencies(project: ProjectScope): Record<string, string[]> {
    const rows = this.db.withConnection((conn) =>
      conn
        .prepare<[string], FileDependencyRow>(
          `SELECT DISTINCT s.file_path AS src_file, d.file_path AS dst_file
           FROM edges e
           JOIN nodes s ON s.project = e.project AND s.node_id = e.src
           JOIN nodes d ON d.project = e.project AND d.node_id = e.dst
           WHERE e.project = ? AND e.type = 'calls'
             AND s.file_path IS NOT NULL AND d.file_path IS NOT NULL
             AND s.file_path <> d.file_path
           ORDER BY src_file, dst_file`
        )
        .all(scopeKey(project))
    );

    const deps: Record<string, string[]> = {};
    for (const row of rows) {
      (deps[row.src_file] ??= []).push(row.dst_file);
    }
    return deps;
  }

  getFileStatus(project: ProjectScope, filePath: string): FileStatus | undefined {
    const row = this.db.withConnection((conn) =>
      conn
        .prepare<[string, string], FileStatusRow>(
          "SELECT file_path, file_hash, status, updated_at FROM file_status WHERE project = ? AND file_path = ?"
        )
        .get(scopeKey(project), filePath)
    );
    return row ? toFileStatus(row) : undefined;
  }

  updateFileStatus(project: ProjectScope, filePath: string, fileHash: string, status: FileIndexStatus): void {
    this.db.withConnection((conn) =>
      conn
        .prepare(
          `INSERT INTO file_status(project, file_path, file_hash, status, updated_at) VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(project, file_path) DO UPDATE SET
             file_hash = excluded.file_hash, status = excluded.status, updated_at = excluded.updated_at`
        )
        .run(scopeKey(project), filePath, fileHash, status, new Date().toISOString())
    );
  }

  listFileStatuses(project: ProjectScope): FileStatus[] {
    return this.db
      .withConnection((conn) =>
        conn
          .prepare<[string], FileStatusRow>(
            "SELECT file_path, file_hash, status, updated_at FROM file_status WHERE project = ? ORDER BY file_path"
          )
          .all(scopeKey(project))
      )
      .map(toFileStatus);
  }

  getIndexingJob(project: ProjectScope): IndexingJobRecord | undefined {
    const row = this.db.withConnection((conn) => this.readIndexingJob(conn, scopeKey(project)));
    return row ? toIndexingJob(row) : undefined;
  }

  /**
   * Upserts the job row of a scope. Moving into `running` from any other state
   * restarts the clock; omitted counters keep their previous values.
   */
  updateIndexingJob(project: ProjectScope, update: IndexingJobUpdate): IndexingJobRecord {
    const key = scopeKey(project);
    const now = new Date().toISOString();

    const row = this.db.transaction((conn): IndexingJobRow => {
      const previous = this.readIndexingJob(conn, key);
      const restarting = update.status === "running" && previous?.status !== "running";
      const next: IndexingJobRow = {
        project: key,
        status: update.status,
        message: update.message !== undefined ? update.message : (previous?.message ?? null),
        files_total: update.filesTotal ?? (restarting ? 0 : (previous?.files_total ?? 0)),
        files_indexed: update.filesIndexed ?? (restarting ? 0 : (previous?.files_indexed ?? 0)),
        started_at: restarting || !previous ? now : previous.started_at,
        updated_at: now,
      };
      conn
        .prepare(
          `INSERT OR REPLACE INTO indexing_jobs(project, status, message, files_total, files_indexed, started_at, updated_at)
           VALUES (@project, @status, @message, @files_total, @files_indexed, @started_at, @updated_at)`
        )
        .run(next);
      return next;
    });

    return toIndexingJob(row);
  }

  deleteProject(project: ProjectScope): void {
    const key = scopeKey(project);
    this.db.transaction((conn) => {
      for (const table of ["edges", "nodes", "file_status", "indexing_jobs"]) {
        conn.prepare(`DELETE FROM ${table} WHERE project = ?`).run(key);
      }
    });
    logger.info({ project }, "Project graph deleted");
  }

  listProjects(): string[] {
    return this.db
      .withConnection((conn) =>
        conn
          .prepare<[], { project: string }>("SELECT DISTINCT project FROM nodes WHERE project <> '' ORDER BY project")
          .all()
      )
      .map((row) => row.project);
  }

  private readIndexingJob(conn: Connection, key: string): IndexingJobRow | undefined {
    return conn
      .prepare<[string], IndexingJobRow>(
        `SELECT project, status, message, files_total, files_indexed, started_at, updated_at
         FROM indexing_jobs WHERE project = ?`
      )
      .get(key);
  }

  private labelsFor(conn: Connection, key: string, nodeIds: Iterable<string>): Map<string, string> {
    const ids = [...new Set(nodeIds)].filter((id) => id.length > 0);
    const labels = new Map<string, string>();

    for (let i = 0; i < ids.length; i += LABEL_CHUNK_SIZE) {
      const chunk = ids.slice(i, i + LABEL_CHUNK_SIZE);
      const placeholders = chunk.map(() => "?").join(",");
      const rows = conn
        .prepare<string[], LabelRow>(
          `SELECT node_id, label FROM nodes WHERE project = ? AND node_id IN (${placeholders})`
        )
        .all(key, ...chunk);
      for (const row of rows) labels.set(row.node_id, row.label);
    }
    return labels;
  }
}
