/**
 * Core Interfaces Module
 *
 * Contracts between the stores, the job coordinator and their external
 * collaborators (parser, chat model, vector index).
 *
 * @module
 */

export type { IProjectGraphStore } from "./IProjectGraphStore.js";
export type { ICheckpointSaver } from "./ICheckpointSaver.js";
export type { ChatModel, ChatMessage, ChatResponse, ChatRole } from "./IChatModel.js";
export type { CodeBlockSource, CodeBlockScan, ScannedFile } from "./ICodeBlockSource.js";
export type { VectorIndex } from "./IVectorIndex.js";
export type {
  AuditLogWriter,
  DocChange,
  DocChangeReason,
  DocGenerationOptions,
  DocMember,
  DocumentationSummary,
  IDocumentationGenerator,
  MemberLocator,
  MemberType,
} from "./IDocumentationGenerator.js";
