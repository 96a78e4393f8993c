/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and collaborator input at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Code Block Records (parser output)
// =============================================================================

/**
 * A parsed method/function record as emitted by the source parser.
 */
export const CodeBlockRecordSchema = z.object({
  /** Parser-assigned identifier, unique within a project */
  id: z.string().min(1),
  /** Display signature; empty when the parser could not extract one */
  signature: z.string().default(""),
  /** Plain identifiers of the calls made by this block */
  calls: z.array(z.string()).default([]),
  /** Source file the block was found in */
  filePath: z.string().nullish(),
  /** Project scope the block belongs to */
  project: z.string().nullish(),
});

export type CodeBlockRecord = z.infer<typeof CodeBlockRecordSchema>;
export type CodeBlockRecordInput = z.input<typeof CodeBlockRecordSchema>;

export const CodeBlockRecordListSchema = z.array(CodeBlockRecordSchema);

// =============================================================================
// Configuration
// =============================================================================

export const DocsConfigSchema = z.object({
  minMeaningfulLines: z.number().int().min(1).default(3),
  maxCodeChars: z.number().int().min(200).default(4000),
  sourcePatterns: z.array(z.string()).default(["**/*.{java,ts,tsx,js,jsx}"]),
  ignorePatterns: z.array(z.string()).default([]),
  excludeTests: z.boolean().default(true),
});

export type DocsConfig = z.infer<typeof DocsConfigSchema>;

export const GraphConfigSchema = z.object({
  overviewLimit: z.number().int().min(1).default(25),
  neighborLimit: z.number().int().min(1).max(200).default(60),
});

export const RetentionConfigSchema = z.object({
  /** Terminal jobs kept in memory; older ones are pruned */
  maxFinishedJobs: z.number().int().min(0).default(100),
  /** Checkpoints kept per thread; unset keeps everything */
  maxCheckpointsPerThread: z.number().int().min(1).optional(),
});

export const LlmConfigSchema = z.object({
  /** Hosted provider used by `docs run`; unset disables generation */
  provider: z.enum(["anthropic", "openai"]).optional(),
  modelId: z.string().min(1).optional(),
  maxTokens: z.number().int().min(1).default(2048),
});

export const AtlasConfigSchema = z.object({
  /** Project root directory (absolute path) */
  projectRoot: z.string().min(1),
  graphDbPath: z.string().min(1),
  checkpointDbPath: z.string().min(1),
  auditLogDir: z.string().min(1),
  docs: DocsConfigSchema.default({}),
  graph: GraphConfigSchema.default({}),
  retention: RetentionConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
});

export type AtlasConfig = z.infer<typeof AtlasConfigSchema>;
export type AtlasConfigInput = z.input<typeof AtlasConfigSchema>;

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
