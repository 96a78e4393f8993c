/**
 * Indexer Module
 *
 * @module
 */

export { ReindexService, type ReindexServiceOptions, type ReindexResult } from "./reindex-service.js";
