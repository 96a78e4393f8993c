/**
 * Code Block Source Interface
 *
 * Producer of parsed method/function records for a directory.
 * The source parser is an external collaborator.
 */

import type { CodeBlockRecordInput } from "../../utils/validation.js";

export interface ScannedFile {
  /** Path relative to the scanned root */
  filePath: string;
  /** Content hash used for change tracking */
  fileHash: string;
}

export interface CodeBlockScan {
  files: ScannedFile[];
  blocks: CodeBlockRecordInput[];
}

export interface CodeBlockSource {
  scan(rootDir: string): Promise<CodeBlockScan>;
}
