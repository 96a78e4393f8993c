/**
 * SqliteProjectGraphStore Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { SqliteProjectGraphStore } from "../sqlite-graph-store.js";
import { InvalidInputError } from "../../errors.js";
import type { CodeBlockRecordInput } from "../../../utils/validation.js";

const DEMO: CodeBlockRecordInput[] = [
  { id: "A", signature: "A", calls: ["B"], filePath: "F1" },
  { id: "B", signature: "B", calls: [], filePath: "F1" },
];

const CHAIN: CodeBlockRecordInput[] = [
  { id: "alpha", signature: "alpha", calls: ["beta"], filePath: "a.ts" },
  { id: "beta", signature: "beta", calls: ["gamma"], filePath: "b.ts" },
  { id: "gamma", signature: "gamma", calls: [], filePath: "b.ts" },
];

describe("SqliteProjectGraphStore", () => {
  let tempDir: string;
  let dbPath: string;
  let store: SqliteProjectGraphStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "graph-store-test-"));
    dbPath = path.join(tempDir, "nested", "graph.sqlite3");
    store = new SqliteProjectGraphStore({ dbPath });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("rebuild", () => {
    it("should return stats for the demo project", () => {
      const stats = store.rebuild("demo", DEMO);

      expect(stats).toEqual({ project: "demo", files: 1, methods: 2, callEdges: 1, containsEdges: 2 });
    });

    it("should replace the previous graph of the same scope", () => {
      store.rebuild("demo", DEMO);
      store.rebuild("demo", [{ id: "C", signature: "C", filePath: "F2" }]);

      const overview = store.overviewText("demo");
      expect(overview).toBe(
        ["Project: demo", "Files indexed: 1", "Methods indexed: 1", "Call edges (best-effort): 0"].join("\n")
      );
    });

    it("should leave other scopes untouched", () => {
      store.rebuild("demo", DEMO);
      store.rebuild("other", [{ id: "X", signature: "X" }]);

      expect(store.overviewText("demo")).toContain("Methods indexed: 2");
      expect(store.overviewText("other")).toContain("Methods indexed: 1");
    });

    it("should reject malformed records without writing", () => {
      store.rebuild("demo", DEMO);

      expect(() => store.rebuild("demo", [{ id: "" }])).toThrow(InvalidInputError);
      expect(store.overviewText("demo")).toContain("Methods indexed: 2");
    });

    it("should treat null and empty-string projects as the same partition", () => {
      store.rebuild(null, [{ id: "A", signature: "A" }]);

      expect(store.overviewText("")).toContain("Methods indexed: 1");
      expect(store.overviewText(null).split("\n")[0]).toBe("Project: (default)");
    });

    it("should persist across store instances", () => {
      store.rebuild("demo", DEMO);

      const reopened = new SqliteProjectGraphStore({ dbPath });
      expect(reopened.overviewText("demo")).toContain("Files indexed: 1");
    });
  });

  describe("overviewText", () => {
    it("should render counts and ranked sections", () => {
      store.rebuild("demo", DEMO);

      expect(store.overviewText("demo")).toBe(
        [
          "Project: demo",
          "Files indexed: 1",
          "Methods indexed: 2",
          "Call edges (best-effort): 1",
          "",
          "Top callers (out-degree):",
          "- A (calls=1)",
          "",
          "Top callees (in-degree):",
          "- B (called_by=1)",
          "",
          "Sample call edges:",
          "- A -> B",
        ].join("\n")
      );
    });

    it("should break count ties by node id", () => {
      store.rebuild("demo", [
        { id: "z", signature: "zeta", calls: ["target"], filePath: "f" },
        { id: "m", signature: "mu", calls: ["target"], filePath: "f" },
        { id: "t", signature: "target", calls: [], filePath: "f" },
      ]);

      const lines = store.overviewText("demo").split("\n");
      const callers = lines.slice(lines.indexOf("Top callers (out-degree):") + 1, lines.indexOf("Top callers (out-degree):") + 3);
      expect(callers).toEqual(["- mu (calls=1)", "- zeta (calls=1)"]);
    });

    it("should fall back to the default limit for non-numeric limits", () => {
      store.rebuild("demo", [
        { id: "z", signature: "zeta", calls: ["target"], filePath: "f" },
        { id: "m", signature: "mu", calls: ["target"], filePath: "f" },
        { id: "t", signature: "target", calls: [], filePath: "f" },
      ]);
      const callers = (text: string): string[] => {
        const lines = text.split("\n");
        const start = lines.indexOf("Top callers (out-degree):") + 1;
        return lines.slice(start, lines.indexOf("", start));
      };

      expect(callers(store.overviewText("demo", Number.NaN))).toEqual(["- mu (calls=1)", "- zeta (calls=1)"]);
      expect(callers(store.overviewText("demo", 0))).toEqual(["- mu (calls=1)"]);
    });

    it("should report an unindexed project as empty", () => {
      expect(store.overviewText("never-indexed")).toBe(
        ["Project: never-indexed", "Files indexed: 0", "Methods indexed: 0", "Call edges (best-effort): 0"].join("\n")
      );
    });
  });

  describe("neighborsText", () => {
    it("should list outgoing calls at depth 1", () => {
      store.rebuild("demo", DEMO);

      expect(store.neighborsText("demo", "demo::A", 1)).toBe(["Node: A", "Depth: 1", "", "Calls:", "- A -> B"].join("\n"));
    });

    it("should list incoming calls", () => {
      store.rebuild("demo", DEMO);

      expect(store.neighborsText("demo", "demo::B")).toBe(
        ["Node: B", "Depth: 1", "", "Called by:", "- A -> B"].join("\n")
      );
    });

    it("should expand the frontier per level", () => {
      store.rebuild("demo", CHAIN);

      expect(store.neighborsText("demo", "demo::alpha", 2)).toBe(
        [
          "Node: alpha",
          "Depth: 2",
          "",
          "Calls:",
          "- alpha -> beta",
          "- beta -> gamma",
          "",
          "Called by:",
          "- alpha -> beta",
        ].join("\n")
      );
    });

    it("should clamp depth into [1, 4]", () => {
      store.rebuild("demo", CHAIN);

      expect(store.neighborsText("demo", "demo::alpha", 99).split("\n")[1]).toBe("Depth: 4");
      expect(store.neighborsText("demo", "demo::alpha", 0).split("\n")[1]).toBe("Depth: 1");
    });

    it("should cap rows per node at the limit", () => {
      store.rebuild("demo", [
        { id: "hub", signature: "hub", calls: ["one", "two", "three"], filePath: "h" },
        { id: "one", signature: "one", filePath: "h" },
        { id: "two", signature: "two", filePath: "h" },
        { id: "three", signature: "three", filePath: "h" },
      ]);

      expect(store.neighborsText("demo", "demo::hub", 1, 2)).toBe(
        ["Node: hub", "Depth: 1", "", "Calls:", "- hub -> one", "- hub -> three"].join("\n")
      );
    });

    it("should echo an unknown node id without error", () => {
      expect(store.neighborsText("demo", "demo::missing")).toBe("Node: demo::missing\nDepth: 1");
    });
  });

  describe("getFileDependencies", () => {
    it("should join call edges through file paths", () => {
      store.rebuild("demo", CHAIN);

      expect(store.getFileDependencies("demo")).toEqual({ "a.ts": ["b.ts"] });
    });

    it("should return an empty map for unknown scopes", () => {
      expect(store.getFileDependencies("nope")).toEqual({});
    });
  });

  describe("file status", () => {
    it("should upsert and list statuses per scope", () => {
      store.updateFileStatus("demo", "src/b.ts", "hash-1", "indexed");
      store.updateFileStatus("demo", "src/a.ts", "hash-2", "failed");
      store.updateFileStatus("demo", "src/b.ts", "hash-3", "indexed");
      store.updateFileStatus("other", "src/c.ts", "hash-4", "indexed");

      expect(store.getFileStatus("demo", "src/b.ts")?.fileHash).toBe("hash-3");
      expect(store.listFileStatuses("demo").map((s) => [s.filePath, s.status])).toEqual([
        ["src/a.ts", "failed"],
        ["src/b.ts", "indexed"],
      ]);
      expect(store.getFileStatus("demo", "src/c.ts")).toBeUndefined();
    });
  });

  describe("indexing job", () => {
    it("should keep counters and start time across updates", () => {
      const started = store.updateIndexingJob("demo", { status: "running", filesTotal: 3 });
      expect(started).toMatchObject({ project: "demo", status: "running", filesTotal: 3, filesIndexed: 0, message: null });

      const done = store.updateIndexingJob("demo", { status: "completed", filesIndexed: 3, message: "ok" });
      expect(done).toMatchObject({ status: "completed", filesTotal: 3, filesIndexed: 3, message: "ok" });
      expect(done.startedAt).toBe(started.startedAt);

      expect(store.getIndexingJob("demo")).toEqual(done);
      expect(store.getIndexingJob("other")).toBeUndefined();
    });

    it("should reset counters when a new run starts", () => {
      store.updateIndexingJob("demo", { status: "running", filesTotal: 3 });
      store.updateIndexingJob("demo", { status: "completed", filesIndexed: 3 });

      const rerun = store.updateIndexingJob("demo", { status: "running" });
      expect(rerun).toMatchObject({ filesTotal: 0, filesIndexed: 0 });
    });
  });

  describe("projects", () => {
    it("should list named scopes and delete one", () => {
      store.rebuild("demo", DEMO);
      store.rebuild("alpha", CHAIN);
      store.rebuild(null, DEMO);
      store.updateFileStatus("demo", "F1", "h", "indexed");

      expect(store.listProjects()).toEqual(["alpha", "demo"]);

      store.deleteProject("demo");

      expect(store.listProjects()).toEqual(["alpha"]);
      expect(store.listFileStatuses("demo")).toEqual([]);
      expect(store.overviewText("demo")).toContain("Methods indexed: 0");
    });
  });
});
