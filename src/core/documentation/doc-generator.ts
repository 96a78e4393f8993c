/**
 * Directory Documentation Generator
 *
 * Walks a source tree, asks the chat model for a doc block wherever a member
 * has none (or only a short one), and edits the files in place.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { ChatModel } from "../interfaces/IChatModel.js";
import type {
  DocChange,
  DocChangeReason,
  DocGenerationOptions,
  DocMember,
  DocumentationSummary,
  IDocumentationGenerator,
  MemberLocator,
} from "../interfaces/IDocumentationGenerator.js";
import { HeuristicMemberLocator } from "./member-locator.js";
import { countMeaningfulLines, extractDocBlock, indentBlock, normalizeLineEndings, truncateSnippet } from "./doc-block.js";
import { DOC_SYSTEM_PROMPT, buildDocUserPrompt } from "./prompts.js";
import { detectLanguage, findFiles, isDirectory } from "../../utils/fs.js";
import { DocsConfigSchema, type DocsConfig } from "../../utils/validation.js";
import { ErrorCode, InvalidInputError, JobError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { CancellationError } from "../../utils/async.js";

const logger = createLogger("doc-generator");

export interface DirectoryDocGeneratorOptions extends Partial<Omit<DocsConfig, "minMeaningfulLines">> {
  /** Model used when a run does not bring its own */
  llm?: ChatModel;
  locator?: MemberLocator;
}

interface PassProgress {
  filesModified: number;
  membersDocumented: number;
}

interface PendingEdit {
  member: DocMember;
  reason: DocChangeReason;
  block: string[];
}

/**
 * True when any directory between `root` and `filePath` is named `test`
 * (case-insensitive). File names are not considered.
 */
export function isUnderTestDirectory(root: string, filePath: string): boolean {
  const dirs = path.relative(root, filePath).split(path.sep).slice(0, -1);
  return dirs.some((dir) => dir.toLowerCase() === "test");
}

export class DirectoryDocGenerator implements IDocumentationGenerator {
  private readonly llm?: ChatModel;
  private readonly locator: MemberLocator;
  private readonly config: Omit<DocsConfig, "minMeaningfulLines">;

  constructor(options: DirectoryDocGeneratorOptions = {}) {
    const { llm, locator, ...config } = options;
    this.llm = llm;
    this.locator = locator ?? new HeuristicMemberLocator();
    this.config = DocsConfigSchema.omit({ minMeaningfulLines: true }).parse(config);
  }

  /**
   * @throws {InvalidInputError} When `rootDir` is not a directory
   * @throws {JobError} When no chat model is available
   */
  async generate(rootDir: string, options: DocGenerationOptions): Promise<DocumentationSummary> {
    const root = path.resolve(rootDir);
    if (!(await isDirectory(root))) {
      throw new InvalidInputError(`Not a directory: ${root}`, ErrorCode.JOB_INVALID_ROOT, { rootDir: root });
    }
    const model = options.llm ?? this.llm;
    if (!model) {
      throw new JobError("No chat model configured for documentation", ErrorCode.JOB_NO_MODEL);
    }

    const files = await this.listSourceFiles(root);
    const progress: PassProgress = { filesModified: 0, membersDocumented: 0 };

    try {
      for (const filePath of files) {
        options.token.throwIfCancelled();
        await this.documentFile(filePath, model, options, progress);
      }
      logger.info({ rootDir: root, files: files.length, ...progress }, "Documentation pass finished");
    } catch (error) {
      if (!(error instanceof CancellationError)) throw error;
      logger.info({ rootDir: root, files: files.length, ...progress }, "Documentation pass cancelled");
    }

    return {
      rootDir: root,
      filesScanned: files.length,
      filesModified: progress.filesModified,
      membersDocumented: progress.membersDocumented,
      logFile: options.log.path,
    };
  }

  private async listSourceFiles(root: string): Promise<string[]> {
    const files = await findFiles({
      patterns: this.config.sourcePatterns,
      ignore: this.config.ignorePatterns,
      cwd: root,
    });
    return this.config.excludeTests ? files.filter((file) => !isUnderTestDirectory(root, file)) : files;
  }

  /**
   * Documents one file. Edits collected before a cancellation are written and
   * logged, then the cancellation propagates.
   */
  private async documentFile(
    filePath: string,
    model: ChatModel,
    options: DocGenerationOptions,
    progress: PassProgress
  ): Promise<void> {
    const original = await fs.readFile(filePath, "utf8");
    const source = normalizeLineEndings(original);
    const edits: PendingEdit[] = [];
    let cancellation: CancellationError | undefined;

    try {
      await this.collectEdits(filePath, source, model, options, edits);
    } catch (error) {
      if (!(error instanceof CancellationError)) throw error;
      cancellation = error;
    }

    if (edits.length > 0) {
      const changes = await this.applyEdits(filePath, original, source, edits);
      progress.filesModified++;
      progress.membersDocumented += changes.length;
      for (const change of changes) {
        await options.log.appendChange(change);
      }
    }

    if (cancellation) throw cancellation;
  }

  private async collectEdits(
    filePath: string,
    source: string,
    model: ChatModel,
    options: DocGenerationOptions,
    edits: PendingEdit[]
  ): Promise<void> {
    const language = detectLanguage(filePath);

    for (const member of this.locator.locate(source, filePath)) {
      options.token.throwIfCancelled();

      let reason: DocChangeReason;
      if (!member.doc) {
        reason = "missing_doc";
      } else if (countMeaningfulLines(member.doc.text) < options.minMeaningfulLines) {
        reason = "short_doc";
      } else {
        continue;
      }

      const response = await model.invoke([
        { role: "system", content: DOC_SYSTEM_PROMPT },
        {
          role: "user",
          content: buildDocUserPrompt({
            signature: member.signature,
            memberType: member.memberType,
            language,
            code: truncateSnippet(member.code, this.config.maxCodeChars),
          }),
        },
      ]);

      const block = extractDocBlock(response.content);
      if (!block) {
        logger.warn({ filePath, signature: member.signature }, "Model response is not a doc block, skipping");
        continue;
      }
      edits.push({ member, reason, block: indentBlock(block, member.indent).split("\n") });
    }
  }

  /**
   * Applies edits bottom-up so earlier line numbers stay valid; CRLF files keep CRLF.
   */
  private async applyEdits(filePath: string, original: string, source: string, edits: PendingEdit[]): Promise<DocChange[]> {
    const lines = source.split("\n");
    const anchor = (edit: PendingEdit): number => edit.member.doc?.startLine ?? edit.member.startLine;
    for (const edit of [...edits].sort((a, b) => anchor(b) - anchor(a))) {
      const { doc } = edit.member;
      if (doc) {
        lines.splice(doc.startLine, doc.endLine - doc.startLine + 1, ...edit.block);
      } else {
        lines.splice(edit.member.startLine, 0, ...edit.block);
      }
    }

    const updated = lines.join("\n");
    await fs.writeFile(filePath, original.includes("\r\n") ? updated.replace(/\n/g, "\r\n") : updated, "utf8");
    logger.debug({ filePath, edits: edits.length }, "Updated doc blocks");

    return edits.map(({ member, reason }) => ({
      filePath,
      memberType: member.memberType,
      signature: member.signature,
      reason,
    }));
  }
}
