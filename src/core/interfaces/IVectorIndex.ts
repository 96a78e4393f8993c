/**
 * Vector Index Interface
 *
 * Embedding-backed document store that receives code blocks after a reindex.
 */

import type { CodeBlockRecord } from "../../utils/validation.js";
import type { ProjectScope } from "../graph/models.js";

export interface VectorIndex {
  /** Replaces the indexed blocks of a project scope; returns how many were indexed */
  indexCodeBlocks(project: ProjectScope, blocks: readonly CodeBlockRecord[]): Promise<number>;
}
