/**
 * Documentation Audit Log
 *
 * One append-only, line-oriented log file per documentation run: a `#` header
 * followed by one tab-separated line per edited member.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import type { AuditLogWriter, DocChange } from "../interfaces/IDocumentationGenerator.js";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * UTC timestamp used in log file names: `YYYYMMDD_HHMMSS_ffffff`.
 * Sub-millisecond digits are always zero.
 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds() * 1000, 6)}`
  );
}

/**
 * Accepts a bare log file name supplied by a caller; rejects anything that
 * could address another directory.
 */
export function safeLogFilename(name: string): string | null {
  if (!name || name === "." || name === "..") return null;
  if (name.includes("/") || name.includes("\\")) return null;
  return name;
}

export class DocumentationAuditLog implements AuditLogWriter {
  private constructor(readonly path: string) {}

  /**
   * Creates an empty log file in `logDir`, named after the current time and
   * the session id (or a random suffix).
   */
  static async create(logDir: string, sessionId?: string, now: Date = new Date()): Promise<DocumentationAuditLog> {
    await fs.mkdir(logDir, { recursive: true });
    const suffix = sessionId ?? randomUUID().replace(/-/g, "").slice(0, 8);
    const filePath = path.join(logDir, `postimplementation_${formatLogTimestamp(now)}Z_${suffix}.log`);
    await fs.appendFile(filePath, "", "utf8");
    return new DocumentationAuditLog(filePath);
  }

  /**
   * Opens an existing log for appending.
   */
  static open(filePath: string): DocumentationAuditLog {
    return new DocumentationAuditLog(filePath);
  }

  async writeHeader(rootDir: string, sessionId?: string): Promise<void> {
    const lines = ["# postimplementation log", `# created_utc=${new Date().toISOString()}`, `# root_dir=${rootDir}`];
    if (sessionId) lines.push(`# session_id=${sessionId}`);
    for (const line of lines) {
      await this.appendLine(line);
    }
  }

  async appendChange(change: DocChange): Promise<void> {
    await this.appendLine(
      [
        new Date().toISOString(),
        "UPDATED_DOC",
        `file=${change.filePath}`,
        `type=${change.memberType}`,
        `signature=${change.signature.replace(/\s+/g, " ").trim()}`,
        `reason=${change.reason}`,
      ].join("\t")
    );
  }

  async appendLine(line: string): Promise<void> {
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, line.replace(/\n+$/, "") + os.EOL, "utf8");
  }

  async read(): Promise<string> {
    return fs.readFile(this.path, "utf8");
  }
}
