/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

export * from "./logger.js";
export * from "./fs.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".repo-atlas";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getDataDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "data");
}

export function getGraphDbPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), "project_graph.sqlite3");
}

export function getCheckpointDbPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), "checkpoints.sqlite3");
}

export function getAuditLogDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "postimplementation_logs");
}

// =============================================================================
// JSON helpers
// =============================================================================

/**
 * Reads and parses a JSON file. Returns undefined when the file does not
 * exist; callers validate the shape.
 */
export function readJson(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  return parsed;
}
