/**
 * Configuration loading
 *
 * Defaults, then `.repo-atlas/config.json`, then environment overrides.
 *
 * @module
 */

import * as path from "node:path";
import {
  getAuditLogDir,
  getCheckpointDbPath,
  getConfigPath,
  getGraphDbPath,
  getProjectRoot,
  readJson,
} from "./index.js";
import { AtlasConfigSchema, formatZodError, type AtlasConfig } from "./validation.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseIntEnv(name: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`Environment variable ${name} must be an integer`, [`${name}: ${raw}`]);
  }
  return value;
}

/**
 * Loads and validates the configuration for a project.
 *
 * Relative paths in the file are resolved against the project root.
 *
 * @throws {ConfigurationError} When the merged configuration is invalid
 */
export function loadConfig(projectRoot: string = getProjectRoot(), env: Env = process.env): AtlasConfig {
  const root = path.resolve(projectRoot);
  const configPath = getConfigPath(root);
  let fileConfig: unknown;
  try {
    fileConfig = readJson(configPath);
  } catch (error) {
    throw new ConfigurationError("Cannot read repo-atlas configuration", [errorMessage(error)], { configPath });
  }
  const fromFile: Record<string, unknown> = isRecord(fileConfig) ? fileConfig : {};

  const resolvePath = (value: unknown, fallback: string): string =>
    typeof value === "string" && value.length > 0 ? path.resolve(root, value) : fallback;

  const docs: Record<string, unknown> = isRecord(fromFile.docs) ? { ...fromFile.docs } : {};
  if (env.ATLAS_MIN_MEANINGFUL_LINES) {
    docs.minMeaningfulLines = parseIntEnv("ATLAS_MIN_MEANINGFUL_LINES", env.ATLAS_MIN_MEANINGFUL_LINES);
  }

  const llm: Record<string, unknown> = isRecord(fromFile.llm) ? { ...fromFile.llm } : {};
  if (env.ATLAS_LLM_PROVIDER) llm.provider = env.ATLAS_LLM_PROVIDER;
  if (env.ATLAS_LLM_MODEL) llm.modelId = env.ATLAS_LLM_MODEL;

  const merged = {
    ...fromFile,
    projectRoot: root,
    graphDbPath: resolvePath(env.ATLAS_GRAPH_DB ?? fromFile.graphDbPath, getGraphDbPath(root)),
    checkpointDbPath: resolvePath(env.ATLAS_CHECKPOINT_DB ?? fromFile.checkpointDbPath, getCheckpointDbPath(root)),
    auditLogDir: resolvePath(env.POSTIMPLEMENTATION_LOG_DIR ?? fromFile.auditLogDir, getAuditLogDir(root)),
    docs,
    llm,
  };

  const result = AtlasConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError("Invalid repo-atlas configuration", formatZodError(result.error), {
      configPath,
    });
  }
  return result.data;
}
