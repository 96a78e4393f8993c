/**
 * Project Graph Model
 *
 * Node, edge and bookkeeping types shared by the graph builder and store.
 *
 * @module
 */

/**
 * Project scope. `null` selects the unscoped partition.
 */
export type ProjectScope = string | null;

export type NodeKind = "method" | "file";
export type EdgeType = "contains" | "calls";

export interface GraphNode {
  nodeId: string;
  kind: NodeKind;
  /** Display signature for methods, path for files */
  label: string;
  filePath: string | null;
  signature: string | null;
}

export interface GraphEdge {
  src: string;
  dst: string;
  type: EdgeType;
}

/**
 * Result of one rebuild.
 */
export interface GraphStats {
  readonly project: ProjectScope;
  readonly files: number;
  readonly methods: number;
  readonly callEdges: number;
  readonly containsEdges: number;
}

/**
 * Nodes and edges computed for one project scope, ready to persist.
 */
export interface ProjectGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
  stats: GraphStats;
}

export type FileIndexStatus = "indexed" | "failed" | "skipped";

export interface FileStatus {
  filePath: string;
  fileHash: string;
  status: FileIndexStatus;
  updatedAt: string;
}

export type IndexingJobStatus = "running" | "completed" | "failed";

export interface IndexingJobRecord {
  project: ProjectScope;
  status: IndexingJobStatus;
  message: string | null;
  filesTotal: number;
  filesIndexed: number;
  startedAt: string;
  updatedAt: string;
}

export interface IndexingJobUpdate {
  status: IndexingJobStatus;
  message?: string | null;
  filesTotal?: number;
  filesIndexed?: number;
}

/** Label given to methods whose parser record carries no file path */
export const UNKNOWN_FILE = "(unknown)";

/** Stored value of the unscoped partition */
export const UNSCOPED = "";

export function scopeKey(project: ProjectScope): string {
  return project ?? UNSCOPED;
}

export function methodNodeId(project: ProjectScope, methodId: string): string {
  return project ? `${project}::${methodId}` : methodId;
}

export function fileNodeId(project: ProjectScope, filePath: string): string {
  return project ? `${project}::file::${filePath}` : `file::${filePath}`;
}
