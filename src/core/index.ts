/**
 * Core module - Stores, jobs and services shared by the CLI and embedding applications
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./interfaces/index.js";
export * from "./storage/index.js";
export * from "./graph/index.js";
export * from "./checkpoint/index.js";
export * from "./documentation/index.js";
export * from "./jobs/index.js";
export * from "./indexer/index.js";
export * from "./llm/index.js";
