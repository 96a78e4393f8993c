/**
 * Documentation Module
 *
 * Doc block generation over source trees, with an append-only audit log per run.
 *
 * @module
 */

export * from "./audit-log.js";
export * from "./doc-block.js";
export * from "./member-locator.js";
export * from "./prompts.js";
export * from "./doc-generator.js";
