/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { loadConfig } from "../config.js";
import { ConfigurationError } from "../../core/errors.js";

describe("loadConfig", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const writeConfig = async (config: unknown): Promise<void> => {
    await fs.mkdir(path.join(root, ".repo-atlas"), { recursive: true });
    await fs.writeFile(path.join(root, ".repo-atlas", "config.json"), JSON.stringify(config), "utf8");
  };

  it("should fall back to defaults under the project's config directory", () => {
    const config = loadConfig(root, {});

    expect(config.projectRoot).toBe(root);
    expect(config.graphDbPath).toBe(path.join(root, ".repo-atlas", "data", "project_graph.sqlite3"));
    expect(config.checkpointDbPath).toBe(path.join(root, ".repo-atlas", "data", "checkpoints.sqlite3"));
    expect(config.auditLogDir).toBe(path.join(root, ".repo-atlas", "postimplementation_logs"));
    expect(config.docs.minMeaningfulLines).toBe(3);
    expect(config.docs.excludeTests).toBe(true);
    expect(config.graph).toEqual({ overviewLimit: 25, neighborLimit: 60 });
    expect(config.retention).toEqual({ maxFinishedJobs: 100 });
    expect(config.llm).toEqual({ maxTokens: 2048 });
  });

  it("should resolve file paths against the project root", async () => {
    await writeConfig({ graphDbPath: "db/graph.sqlite3", docs: { minMeaningfulLines: 5 }, retention: { maxCheckpointsPerThread: 10 } });

    const config = loadConfig(root, {});

    expect(config.graphDbPath).toBe(path.join(root, "db", "graph.sqlite3"));
    expect(config.docs.minMeaningfulLines).toBe(5);
    expect(config.docs.maxCodeChars).toBe(4000);
    expect(config.retention.maxCheckpointsPerThread).toBe(10);
  });

  it("should let the environment override the file", async () => {
    await writeConfig({ docs: { minMeaningfulLines: 5 }, llm: { provider: "anthropic" } });

    const config = loadConfig(root, {
      ATLAS_MIN_MEANINGFUL_LINES: "2",
      POSTIMPLEMENTATION_LOG_DIR: "/var/log/atlas",
      ATLAS_LLM_PROVIDER: "openai",
      ATLAS_LLM_MODEL: "gpt-4o-mini",
    });

    expect(config.docs.minMeaningfulLines).toBe(2);
    expect(config.auditLogDir).toBe("/var/log/atlas");
    expect(config.llm).toEqual({ provider: "openai", modelId: "gpt-4o-mini", maxTokens: 2048 });
  });

  it("should reject a non-numeric threshold from the environment", () => {
    expect(() => loadConfig(root, { ATLAS_MIN_MEANINGFUL_LINES: "many" })).toThrow(ConfigurationError);
  });

  it("should report schema violations with their paths", async () => {
    await writeConfig({ docs: { minMeaningfulLines: 0 } });

    try {
      loadConfig(root, {});
      expect.unreachable("loadConfig should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith("docs.minMeaningfulLines: ")).toBe(true);
      }
    }
  });

  it("should reject unknown model providers", () => {
    expect(() => loadConfig(root, { ATLAS_LLM_PROVIDER: "google" })).toThrow(ConfigurationError);
  });

  it("should report a config file that is not JSON", async () => {
    await fs.mkdir(path.join(root, ".repo-atlas"), { recursive: true });
    await fs.writeFile(path.join(root, ".repo-atlas", "config.json"), "{ not json", "utf8");

    expect(() => loadConfig(root, {})).toThrow("Cannot read repo-atlas configuration");
  });
});
