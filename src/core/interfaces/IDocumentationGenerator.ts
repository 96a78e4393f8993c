/**
 * Documentation Generator Interface
 *
 * Runs one documentation pass over a directory on behalf of a background job.
 *
 * @module
 */

import type { CancellationToken } from "../../utils/async.js";
import type { ChatModel } from "./IChatModel.js";

/**
 * Kind of source member a doc block belongs to.
 */
export type MemberType = "class" | "interface" | "enum" | "constructor" | "method" | "function";

/**
 * Why a member's doc block was (re)generated.
 */
export type DocChangeReason = "missing_doc" | "short_doc";

export interface DocChange {
  filePath: string;
  memberType: MemberType;
  signature: string;
  reason: DocChangeReason;
}

/**
 * Append-only record of the edits made by one run.
 */
export interface AuditLogWriter {
  readonly path: string;
  appendChange(change: DocChange): Promise<void>;
}

export interface DocumentationSummary {
  rootDir: string;
  filesScanned: number;
  filesModified: number;
  membersDocumented: number;
  logFile: string;
}

export interface DocGenerationOptions {
  /** Checked before each file and each member */
  token: CancellationToken;
  log: AuditLogWriter;
  /** Existing doc blocks with fewer meaningful lines are regenerated */
  minMeaningfulLines: number;
  /** Overrides the generator's own model for this run */
  llm?: ChatModel;
}

export interface IDocumentationGenerator {
  /**
   * Documents every member in `rootDir` that lacks a meaningful doc block.
   * Returns early, with the work done so far, once the token is cancelled.
   * A generator may instead let the token's `CancellationError` propagate;
   * the job then stops without a summary.
   */
  generate(rootDir: string, options: DocGenerationOptions): Promise<DocumentationSummary>;
}

/**
 * A documentable declaration located in a source file.
 * Line numbers are 0-based indexes into the file's lines.
 */
export interface DocMember {
  memberType: MemberType;
  name: string;
  /** Declaration text up to the opening brace */
  signature: string;
  /** First line of the declaration (annotations included) */
  startLine: number;
  /** Leading whitespace of the declaration line */
  indent: string;
  /** Existing doc block lines, inclusive, if any */
  doc?: { startLine: number; endLine: number; text: string };
  /** Source of the member, used as model context */
  code: string;
}

export interface MemberLocator {
  locate(source: string, filePath: string): DocMember[];
}
