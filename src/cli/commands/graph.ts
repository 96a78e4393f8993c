/**
 * graph commands - Rebuild and query the project call graph
 */

import chalk from "chalk";
import * as fs from "node:fs";
import * as path from "node:path";

import { SqliteProjectGraphStore } from "../../core/graph/sqlite-graph-store.js";
import { ErrorCode, InvalidInputError, errorMessage } from "../../core/errors.js";
import { loadConfig } from "../../utils/config.js";
import { createLogger } from "../../utils/index.js";
import { CodeBlockRecordListSchema, formatZodError, type CodeBlockRecord } from "../../utils/validation.js";
import { toProjectScope } from "../options.js";

const logger = createLogger("graph-command");

export interface GraphScopeOptions {
  project?: string;
}

export interface GraphOverviewOptions extends GraphScopeOptions {
  limit?: number;
}

export interface GraphNeighborsOptions extends GraphScopeOptions {
  depth?: number;
  limit?: number;
}

function openStore(): { store: SqliteProjectGraphStore; config: ReturnType<typeof loadConfig> } {
  const config = loadConfig();
  return { store: new SqliteProjectGraphStore({ dbPath: config.graphDbPath }), config };
}

/**
 * Reads and validates a JSON array of code block records.
 */
export function readRecordsFile(filePath: string): CodeBlockRecord[] {
  const absolute = path.resolve(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolute, "utf-8"));
  } catch (error) {
    throw new InvalidInputError(`Cannot read records from ${absolute}: ${errorMessage(error)}`, ErrorCode.INVALID_ARGUMENT, {
      filePath: absolute,
    });
  }
  const result = CodeBlockRecordListSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidInputError(`Expected a JSON array of code block records in ${absolute}`, ErrorCode.GRAPH_INVALID_RECORD, {
      filePath: absolute,
      issues: formatZodError(result.error),
    });
  }
  return result.data;
}

/**
 * Replace a project's graph with the records in a JSON file
 */
export async function graphRebuildCommand(recordsFile: string, options: GraphScopeOptions): Promise<void> {
  const { store } = openStore();
  const project = toProjectScope(options.project);
  const records = readRecordsFile(recordsFile);
  logger.info({ project, records: records.length }, "Rebuilding graph");

  const stats = store.rebuild(project, records);

  console.log(chalk.green("✓ Graph rebuilt") + chalk.dim(` (${project ?? "unscoped"})`));
  console.log(`  Files:         ${stats.files}`);
  console.log(`  Methods:       ${stats.methods}`);
  console.log(`  Call edges:    ${stats.callEdges}`);
  console.log(`  Contains:      ${stats.containsEdges}`);
}

export async function graphOverviewCommand(options: GraphOverviewOptions): Promise<void> {
  const { store, config } = openStore();
  console.log(store.overviewText(toProjectScope(options.project), options.limit ?? config.graph.overviewLimit));
}

export async function graphNeighborsCommand(nodeId: string, options: GraphNeighborsOptions): Promise<void> {
  const { store, config } = openStore();
  console.log(
    store.neighborsText(toProjectScope(options.project), nodeId, options.depth ?? 1, options.limit ?? config.graph.neighborLimit)
  );
}

export async function graphDepsCommand(options: GraphScopeOptions): Promise<void> {
  const { store } = openStore();
  const deps = store.getFileDependencies(toProjectScope(options.project));
  const files = Object.keys(deps).sort();

  if (files.length === 0) {
    console.log(chalk.dim("No cross-file calls."));
    return;
  }
  for (const file of files) {
    console.log(`${chalk.cyan(file)} ${chalk.dim("->")} ${deps[file].join(", ")}`);
  }
}

export async function graphProjectsCommand(): Promise<void> {
  const { store } = openStore();
  const projects = store.listProjects();
  if (projects.length === 0) {
    console.log(chalk.dim("No projects indexed."));
    return;
  }
  for (const project of projects) {
    const job = store.getIndexingJob(project);
    console.log(job ? `${project} ${chalk.dim(`[${job.status}] ${job.updatedAt}`)}` : project);
  }
}

export async function graphDeleteCommand(options: GraphScopeOptions): Promise<void> {
  const { store } = openStore();
  const project = toProjectScope(options.project);
  store.deleteProject(project);
  console.log(chalk.green("✓ Deleted") + chalk.dim(` (${project ?? "unscoped"})`));
}
