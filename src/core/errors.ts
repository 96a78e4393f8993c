/**
 * Error Classes for repo-atlas
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Storage errors (2xxx)
  STORAGE_OPEN_FAILED = "E2000",
  STORAGE_MIGRATION_FAILED = "E2001",

  // Graph errors (3xxx)
  GRAPH_QUERY_FAILED = "E3001",
  GRAPH_REBUILD_FAILED = "E3002",
  GRAPH_INVALID_RECORD = "E3003",

  // Checkpoint errors (4xxx)
  CHECKPOINT_MISSING_THREAD = "E4000",
  CHECKPOINT_MISSING_ID = "E4001",
  CHECKPOINT_SERIALIZATION_FAILED = "E4002",

  // Job errors (7xxx)
  JOB_FAILED = "E7000",
  JOB_CONFLICT = "E7001",
  JOB_NOT_FOUND = "E7002",
  JOB_INVALID_ROOT = "E7003",
  JOB_NO_MODEL = "E7004",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all repo-atlas errors
 */
export class AtlasError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, context?: Record<string, unknown>) {
    super(message);
    this.name = "AtlasError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Structurally invalid calls: missing scope identifiers, bad records, non-directory roots
 */
export class InvalidInputError extends AtlasError {
  constructor(message: string, code: ErrorCode = ErrorCode.INVALID_ARGUMENT, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "InvalidInputError";
  }
}

/**
 * Graph store errors
 */
export class GraphError extends AtlasError {
  public readonly project?: string | null;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_QUERY_FAILED,
    context?: Record<string, unknown> & { project?: string | null }
  ) {
    super(message, code, context);
    this.name = "GraphError";
    this.project = context?.project;
  }
}

/**
 * Checkpoint store errors
 */
export class CheckpointError extends AtlasError {
  public readonly threadId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CHECKPOINT_SERIALIZATION_FAILED,
    context?: Record<string, unknown> & { threadId?: string }
  ) {
    super(message, code, context);
    this.name = "CheckpointError";
    this.threadId = context?.threadId;
  }
}

/**
 * Background job errors
 */
export class JobError extends AtlasError {
  public readonly jobId?: string;

  constructor(message: string, code: ErrorCode = ErrorCode.JOB_FAILED, context?: Record<string, unknown> & { jobId?: string }) {
    super(message, code, context);
    this.name = "JobError";
    this.jobId = context?.jobId;
  }
}

/**
 * A running job already covers an overlapping directory
 */
export class JobConflictError extends JobError {
  public readonly requestedRoot: string;
  public readonly runningRoot: string;

  constructor(requestedRoot: string, runningRoot: string, runningJobId: string) {
    super(
      `A documentation job is already running for '${runningRoot}' (requested: '${requestedRoot}')`,
      ErrorCode.JOB_CONFLICT,
      { jobId: runningJobId, requestedRoot, runningRoot }
    );
    this.name = "JobConflictError";
    this.requestedRoot = requestedRoot;
    this.runningRoot = runningRoot;
  }
}

export class JobNotFoundError extends JobError {
  constructor(jobId: string) {
    super(`Unknown job: ${jobId}`, ErrorCode.JOB_NOT_FOUND, { jobId });
    this.name = "JobNotFoundError";
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends AtlasError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { ...context, issues });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Check if an error is an AtlasError
 */
export function isAtlasError(error: unknown): error is AtlasError {
  return error instanceof AtlasError;
}

/**
 * Best-effort message extraction for errors captured at worker boundaries
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === "string") return error;
  return String(error);
}
