/**
 * File System Utilities
 * File discovery for documentation jobs
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
}

/**
 * Directories never worth scanning
 */
export const DEFAULT_IGNORE_PATTERNS = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.venv/**",
  "**/venv/**",
  "**/dist/**",
  "**/build/**",
  "**/vendor/**",
  "**/__pycache__/**",
  "**/coverage/**",
];

/**
 * Find files matching glob patterns. Results are sorted so scans are reproducible.
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = true, onlyFiles = true } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    ignore: [...DEFAULT_IGNORE_PATTERNS, ...ignore],
    dot: false,
  });
  return files.sort();
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fsPromises.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Detect file language based on extension
 */
export function detectLanguage(filePath: string): string | null {
  const ext = path.extname(filePath).toLowerCase();
  const languageMap: Record<string, string> = {
    ".ts": "typescript",
    ".tsx": "typescript",
    ".js": "javascript",
    ".jsx": "javascript",
    ".mjs": "javascript",
    ".cjs": "javascript",
    ".java": "java",
    ".kt": "kotlin",
    ".scala": "scala",
    ".cs": "csharp",
    ".go": "go",
    ".rs": "rust",
  };

  return languageMap[ext] ?? null;
}
