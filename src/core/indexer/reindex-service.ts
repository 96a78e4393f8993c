/**
 * Reindex Service
 *
 * Full reindex of one project scope: scan, vector indexing, graph rebuild.
 * Progress is recorded in the graph store's indexing-job and file-status tables.
 *
 * @module
 */

import * as path from "node:path";

import type { CodeBlockSource } from "../interfaces/ICodeBlockSource.js";
import type { IProjectGraphStore } from "../interfaces/IProjectGraphStore.js";
import type { VectorIndex } from "../interfaces/IVectorIndex.js";
import type { GraphStats, ProjectScope } from "../graph/models.js";
import { CodeBlockRecordListSchema, formatZodError, type CodeBlockRecord } from "../../utils/validation.js";
import { Mutex } from "../../utils/async.js";
import { ErrorCode, InvalidInputError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("reindex");

export interface ReindexServiceOptions {
  store: IProjectGraphStore;
  source: CodeBlockSource;
  vectorIndex?: VectorIndex;
  /** Entries per section of the returned overview (default: 25) */
  overviewLimit?: number;
}

export interface ReindexResult {
  stats: GraphStats;
  overview: string;
  filesIndexed: number;
  blocksIndexed: number;
}

/**
 * Runs full reindexes. Reindexes never overlap within a process, whichever
 * instance starts them.
 *
 * @example
 * ```typescript
 * const service = new ReindexService({ store, source: parser });
 * const { stats, overview } = await service.reindex("demo", "./repo");
 * ```
 */
export class ReindexService {
  private static readonly mutex = new Mutex();

  constructor(private readonly options: ReindexServiceOptions) {}

  /** Whether a reindex is running in this process */
  static get busy(): boolean {
    return ReindexService.mutex.isLocked;
  }

  /**
   * @throws {InvalidInputError} When the source yields malformed records
   */
  async reindex(project: ProjectScope, rootDir: string): Promise<ReindexResult> {
    return ReindexService.mutex.runExclusive(() => this.run(project, path.resolve(rootDir)));
  }

  private async run(project: ProjectScope, root: string): Promise<ReindexResult> {
    const { store, source, vectorIndex } = this.options;
    const started = Date.now();
    logger.info({ project, rootDir: root }, "Reindex started");
    store.updateIndexingJob(project, { status: "running", message: `Scanning ${root}` });

    try {
      const scan = await source.scan(root);
      const blocks = this.normalizeBlocks(project, scan.blocks);
      store.updateIndexingJob(project, { status: "running", message: "Indexing", filesTotal: scan.files.length });

      if (blocks.length === 0) {
        logger.warn({ project, rootDir: root }, "No code blocks found");
      }
      const blocksIndexed = vectorIndex ? await vectorIndex.indexCodeBlocks(project, blocks) : 0;
      const stats = store.rebuild(project, blocks);

      const filesWithBlocks = new Set(blocks.map((block) => block.filePath));
      let filesIndexed = 0;
      for (const file of scan.files) {
        const indexed = filesWithBlocks.has(file.filePath);
        store.updateFileStatus(project, file.filePath, file.fileHash, indexed ? "indexed" : "skipped");
        if (indexed) filesIndexed++;
      }

      store.updateIndexingJob(project, {
        status: "completed",
        message: `${stats.methods} methods, ${stats.callEdges} call edges`,
        filesIndexed,
      });
      logger.info({ ...stats, filesIndexed, durationMs: Date.now() - started }, "Reindex completed");

      return {
        stats,
        overview: store.overviewText(project, this.options.overviewLimit),
        filesIndexed,
        blocksIndexed,
      };
    } catch (error) {
      store.updateIndexingJob(project, { status: "failed", message: errorMessage(error) });
      logger.error({ project, err: error }, "Reindex failed");
      throw error;
    }
  }

  /** Validates the scanned records and stamps them with the requested scope */
  private normalizeBlocks(project: ProjectScope, input: unknown): CodeBlockRecord[] {
    const parsed = CodeBlockRecordListSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidInputError("Malformed code block records", ErrorCode.GRAPH_INVALID_RECORD, {
        issues: formatZodError(parsed.error),
      });
    }
    return project === null ? parsed.data : parsed.data.map((block) => ({ ...block, project }));
  }
}
