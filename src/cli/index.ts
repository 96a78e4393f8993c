#!/usr/bin/env node

/**
 * repo-atlas CLI
 * Command line access to the call graph, conversation checkpoints and documentation jobs
 */

import { Command } from "commander";
import chalk from "chalk";
import {
  graphDeleteCommand,
  graphDepsCommand,
  graphNeighborsCommand,
  graphOverviewCommand,
  graphProjectsCommand,
  graphRebuildCommand,
} from "./commands/graph.js";
import {
  sessionsDeleteCommand,
  sessionsListCommand,
  sessionsPruneCommand,
  sessionsShowCommand,
} from "./commands/sessions.js";
import { docsLogCommand, docsLogsCommand, docsRunCommand } from "./commands/docs.js";
import { parseInteger, parsePositiveInteger } from "./options.js";
import { runShutdownHooks } from "./shutdown.js";
import { ConfigurationError, isAtlasError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("repo-atlas")
  .description("Project call graphs, conversation checkpoints and documentation jobs")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

const graph = program.command("graph").description("Build and query project call graphs");

graph
  .command("rebuild")
  .description("Replace a project's graph with the code block records in a JSON file")
  .argument("<records>", "JSON array of {id, signature, calls, filePath} records")
  .option("-p, --project <name>", "Project scope (omit for the unscoped graph)")
  .action(graphRebuildCommand);

graph
  .command("overview")
  .description("Counts, top callers, top callees and sample call edges")
  .option("-p, --project <name>", "Project scope")
  .option("-l, --limit <n>", "Entries per section", parseInteger)
  .action(graphOverviewCommand);

graph
  .command("neighbors")
  .description("Calls around one node, breadth first")
  .argument("<nodeId>", "Node id, e.g. demo::A")
  .option("-p, --project <name>", "Project scope")
  .option("-d, --depth <n>", "Traversal depth (1-4)", parseInteger)
  .option("-l, --limit <n>", "Maximum nodes (1-200)", parseInteger)
  .action(graphNeighborsCommand);

graph
  .command("deps")
  .description("Cross-file call dependencies")
  .option("-p, --project <name>", "Project scope")
  .action(graphDepsCommand);

graph.command("projects").description("List indexed projects").action(graphProjectsCommand);

graph
  .command("delete")
  .description("Remove every node, edge and status row of a project")
  .option("-p, --project <name>", "Project scope")
  .action(graphDeleteCommand);

const sessions = program.command("sessions").description("Inspect stored conversation checkpoints");

sessions
  .command("list")
  .description("Conversations stored under a namespace")
  .option("-n, --ns <namespace>", "Checkpoint namespace")
  .action(sessionsListCommand);

sessions
  .command("show")
  .description("Checkpoints of one conversation, newest first")
  .argument("<threadId>")
  .option("-n, --ns <namespace>", "Checkpoint namespace")
  .option("-l, --limit <n>", "Maximum checkpoints", parsePositiveInteger)
  .action(sessionsShowCommand);

sessions
  .command("delete")
  .description("Delete a conversation (one namespace with --ns, else all)")
  .argument("<threadId>")
  .option("-n, --ns <namespace>", "Checkpoint namespace")
  .action(sessionsDeleteCommand);

sessions
  .command("prune")
  .description("Keep only the newest checkpoints of a conversation")
  .argument("<threadId>")
  .option("-n, --ns <namespace>", "Checkpoint namespace")
  .option("-k, --keep <n>", "Checkpoints to keep", parseInteger)
  .action(sessionsPruneCommand);

const docs = program.command("docs").description("Generate missing doc blocks");

docs
  .command("run")
  .description("Document a directory in place and wait for the job")
  .argument("<dir>", "Source directory")
  .option("-m, --min-lines <n>", "Regenerate doc blocks with fewer meaningful lines", parsePositiveInteger)
  .option("--provider <name>", "Model provider (anthropic, openai)")
  .option("--model <id>", "Model id")
  .action(docsRunCommand);

docs.command("logs").description("List documentation audit logs, newest first").action(docsLogsCommand);

docs
  .command("log")
  .description("Print one documentation audit log")
  .argument("<file>", "Log file name")
  .action(docsLogCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${isAtlasError(error) ? error.toString() : error.message}`));
    if (error instanceof ConfigurationError) {
      for (const issue of error.issues) {
        console.error(chalk.dim(`  ${issue}`));
      }
    }
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, shutting down gracefully...`));

  setTimeout(() => {
    logger.warn("Shutdown timeout, forcing exit");
    process.exit(1);
  }, 5000).unref();

  await runShutdownHooks();
  process.exit(0);
}

process.on("SIGINT", () => {
  shutdown("SIGINT").catch(handleError);
});

process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch(handleError);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
