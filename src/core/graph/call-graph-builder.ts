/**
 * Call Graph Builder
 *
 * Turns parser records into the node and edge sets persisted for one project
 * scope. Call edges are resolved by name only: a recorded call name links to
 * every other method whose signature contains it, ignoring case.
 *
 * @module
 */

import type { CodeBlockRecord } from "../../utils/validation.js";
import {
  UNKNOWN_FILE,
  fileNodeId,
  methodNodeId,
  type GraphEdge,
  type GraphNode,
  type ProjectGraph,
  type ProjectScope,
} from "./models.js";

// =============================================================================
// Types
// =============================================================================

interface SignatureEntry {
  nodeId: string;
  signatureLower: string;
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Computes the full graph for a project scope.
 *
 * @example
 * ```typescript
 * const graph = buildProjectGraph("demo", [
 *   { id: "A", signature: "void A()", calls: ["B"], filePath: "F1" },
 *   { id: "B", signature: "void B()", calls: [], filePath: "F1" },
 * ]);
 * graph.stats; // { project: "demo", files: 1, methods: 2, callEdges: 1, containsEdges: 2 }
 * ```
 */
export function buildProjectGraph(project: ProjectScope, records: readonly CodeBlockRecord[]): ProjectGraph {
  const fileNodes = new Map<string, GraphNode>();
  const methodNodes: GraphNode[] = [];
  const containsEdges = new Map<string, GraphEdge>();
  const signatureIndex: SignatureEntry[] = [];

  for (const record of records) {
    const filePath = record.filePath || UNKNOWN_FILE;
    const nodeId = methodNodeId(project, record.id);

    methodNodes.push({
      nodeId,
      kind: "method",
      label: record.signature || record.id,
      filePath,
      signature: record.signature,
    });
    signatureIndex.push({ nodeId, signatureLower: record.signature.toLowerCase() });

    const fileId = fileNodeId(project, filePath);
    if (!fileNodes.has(fileId)) {
      fileNodes.set(fileId, { nodeId: fileId, kind: "file", label: filePath, filePath, signature: null });
    }

    addEdge(containsEdges, { src: fileId, dst: nodeId, type: "contains" });
  }

  const callEdges = new Map<string, GraphEdge>();
  for (const record of records) {
    const src = methodNodeId(project, record.id);
    for (const rawName of record.calls) {
      const name = rawName.trim().toLowerCase();
      if (!name) continue;
      for (const entry of signatureIndex) {
        if (entry.nodeId !== src && entry.signatureLower.includes(name)) {
          addEdge(callEdges, { src, dst: entry.nodeId, type: "calls" });
        }
      }
    }
  }

  const nodes = [...fileNodes.values(), ...methodNodes];
  const edges = [...containsEdges.values(), ...callEdges.values()];
  const files = new Set(records.map((r) => r.filePath || UNKNOWN_FILE)).size;

  return {
    nodes,
    edges,
    stats: Object.freeze({
      project,
      files,
      methods: methodNodes.length,
      callEdges: callEdges.size,
      containsEdges: containsEdges.size,
    }),
  };
}

function addEdge(edges: Map<string, GraphEdge>, edge: GraphEdge): void {
  const key = `${edge.src}\u0000${edge.dst}\u0000${edge.type}`;
  if (!edges.has(key)) {
    edges.set(key, edge);
  }
}
