/**
 * SqliteCheckpointSaver Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import Database from "better-sqlite3";

import { SqliteCheckpointSaver } from "../sqlite-checkpoint-saver.js";
import { emptyCheckpoint, type Checkpoint, type CheckpointConfig } from "../models.js";
import { InvalidInputError } from "../../errors.js";

function checkpoint(id: string, values: Record<string, unknown>, versions: Record<string, number>): Checkpoint {
  return { ...emptyCheckpoint(), id, channel_values: values, channel_versions: versions };
}

function ids(tuples: Iterable<{ checkpoint: Checkpoint }>): string[] {
  return [...tuples].map((t) => t.checkpoint.id);
}

describe("SqliteCheckpointSaver", () => {
  let tempDir: string;
  let dbPath: string;
  let saver: SqliteCheckpointSaver;
  const scope: CheckpointConfig = { configurable: { thread_id: "t1", checkpoint_ns: "proj" } };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "checkpoint-test-"));
    dbPath = path.join(tempDir, "checkpoints.sqlite3");
    saver = new SqliteCheckpointSaver({ dbPath });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("put / getTuple", () => {
    it("should round-trip channel values across instances", () => {
      const config = saver.put(scope, checkpoint("cp-1", { x: 123 }, { x: 1 }), { source: "input", step: -1 }, { x: 1 });

      expect(config).toEqual({ configurable: { thread_id: "t1", checkpoint_ns: "proj", checkpoint_id: "cp-1" } });
      expect(saver.getTuple(config)?.checkpoint.channel_values).toEqual({ x: 123 });

      const reopened = new SqliteCheckpointSaver({ dbPath });
      expect(reopened.getTuple(config)?.checkpoint.channel_values.x).toBe(123);
    });

    it("should return the latest checkpoint when no id is given", () => {
      saver.put(scope, checkpoint("cp-1", {}, {}), {}, {});
      saver.put(scope, checkpoint("cp-2", {}, {}), {}, {});

      const tuple = saver.getTuple(scope);
      expect(tuple?.checkpoint.id).toBe("cp-2");
      expect(tuple?.config).toEqual({ configurable: { thread_id: "t1", checkpoint_ns: "proj", checkpoint_id: "cp-2" } });
    });

    it("should chain parents through the caller's checkpoint id", () => {
      const first = saver.put(scope, checkpoint("cp-1", {}, {}), {}, {});
      const second = saver.put(first, checkpoint("cp-2", {}, {}), {}, {});

      expect(saver.getTuple(first)?.parentConfig).toBeUndefined();
      expect(saver.getTuple(second)?.parentConfig).toEqual(first);
    });

    it("should only write channels named in newVersions", () => {
      const first = saver.put(scope, checkpoint("cp-1", { x: 1 }, { x: 1 }), {}, { x: 1 });
      const second = saver.put(
        first,
        checkpoint("cp-2", { x: 999, y: "new" }, { x: 1, y: 1 }),
        {},
        { y: 1 }
      );

      expect(saver.getTuple(second)?.checkpoint.channel_values).toEqual({ x: 1, y: "new" });
    });

    it("should treat empty and missing blobs as unset", () => {
      const config = saver.put(scope, checkpoint("cp-1", {}, { cleared: 1, lost: 5 }), {}, { cleared: 1 });

      const tuple = saver.getTuple(config);
      expect(tuple?.checkpoint.channel_values).toEqual({});
      expect(tuple?.checkpoint.channel_versions).toEqual({ cleared: 1, lost: 5 });
    });

    it("should store binary channel values as bytes", () => {
      const config = saver.put(scope, checkpoint("cp-1", { raw: Buffer.from([1, 2, 3]) }, { raw: 1 }), {}, { raw: 1 });

      expect(saver.getTuple(config)?.checkpoint.channel_values.raw).toEqual(Buffer.from([1, 2, 3]));
    });

    it("should return channel values shaped like an undefined marker unchanged", () => {
      const config = saver.put(scope, checkpoint("cp-1", { x: { $undefined: true }, gone: undefined }, { x: 1, gone: 1 }), {}, {
        x: 1,
        gone: 1,
      });

      const values = saver.getTuple(config)?.checkpoint.channel_values;
      expect(values?.x).toEqual({ $undefined: true });
      expect(values && Object.hasOwn(values, "gone")).toBe(true);
      expect(values?.gone).toBeUndefined();
    });

    it("should keep body fields it does not know about", () => {
      const body = { ...checkpoint("cp-1", {}, {}), pending_sends: [{ node: "n" }], updated_channels: ["x"] };
      const config = saver.put(scope, body, {}, {});

      const stored = saver.getTuple(config)?.checkpoint;
      expect(stored?.pending_sends).toEqual([{ node: "n" }]);
      expect(stored?.updated_channels).toEqual(["x"]);
    });

    it("should merge config metadata into checkpoint metadata", () => {
      const config = saver.put({ ...scope, metadata: { user: "u1" } }, checkpoint("cp-1", {}, {}), { step: 1 }, {});

      expect(saver.getTuple(config)?.metadata).toEqual({ user: "u1", step: 1 });
    });

    it("should overwrite a checkpoint put twice under the same id", () => {
      saver.put(scope, checkpoint("cp-1", {}, {}), { step: 1 }, {});
      const config = saver.put(scope, checkpoint("cp-1", {}, {}), { step: 2 }, {});

      expect(saver.getTuple(config)?.metadata).toEqual({ step: 2 });
      expect(ids(saver.list(scope))).toEqual(["cp-1"]);
    });

    it("should require a thread id", () => {
      expect(() => saver.getTuple({ configurable: { checkpoint_ns: "proj" } })).toThrow(InvalidInputError);
      expect(() => saver.put({}, checkpoint("cp-1", {}, {}), {}, {})).toThrow(InvalidInputError);
    });

    it("should report unknown threads as absent", () => {
      expect(saver.getTuple({ configurable: { thread_id: "nobody" } })).toBeUndefined();
    });
  });

  describe("putWrites", () => {
    let config: CheckpointConfig;

    beforeEach(() => {
      config = saver.put(scope, checkpoint("cp-1", {}, {}), {}, {});
    });

    it("should attach pending writes to the checkpoint", () => {
      saver.putWrites(config, [["note", "hello"]], "task-1");

      expect(saver.getTuple(config)?.pendingWrites).toEqual([["task-1", "note", "hello"]]);
    });

    it("should ignore retries at an occupied index", () => {
      saver.putWrites(config, [["note", "hello"]], "task-1");
      saver.putWrites(config, [["note", "hello"]], "task-1");
      saver.putWrites(config, [["note", "changed"]], "task-1");

      expect(saver.getTuple(config)?.pendingWrites).toEqual([["task-1", "note", "hello"]]);
    });

    it("should overwrite reserved channels in place", () => {
      saver.putWrites(config, [["__error__", "boom"]], "task-1");
      saver.putWrites(config, [["__error__", "boom again"]], "task-1");

      expect(saver.getTuple(config)?.pendingWrites).toEqual([["task-1", "__error__", "boom again"]]);
    });

    it("should order writes by task then index", () => {
      saver.putWrites(config, [["b", 2]], "task-2");
      saver.putWrites(config, [["a", 1], ["__error__", "e"]], "task-1");

      expect(saver.getTuple(config)?.pendingWrites).toEqual([
        ["task-1", "__error__", "e"],
        ["task-1", "a", 1],
        ["task-2", "b", 2],
      ]);
    });

    it("should require a checkpoint id", () => {
      expect(() => saver.putWrites(scope, [["note", "x"]], "task-1")).toThrow(InvalidInputError);
    });
  });

  describe("list", () => {
    beforeEach(() => {
      saver.put(scope, checkpoint("cp-1", {}, {}), { source: "input", step: 1 }, {});
      saver.put(scope, checkpoint("cp-2", {}, {}), { source: "loop", step: 2 }, {});
      saver.put(scope, checkpoint("cp-3", {}, {}), { source: "loop", step: 3 }, {});
    });

    it("should list newest first", () => {
      expect(ids(saver.list(scope))).toEqual(["cp-3", "cp-2", "cp-1"]);
    });

    it("should apply a strict before cursor", () => {
      const before = { configurable: { thread_id: "t1", checkpoint_ns: "proj", checkpoint_id: "cp-3" } };
      expect(ids(saver.list(scope, { before }))).toEqual(["cp-2", "cp-1"]);
    });

    it("should cap results with limit", () => {
      expect(ids(saver.list(scope, { limit: 1 }))).toEqual(["cp-3"]);
    });

    it("should filter on metadata before applying the limit", () => {
      expect(ids(saver.list(scope, { filter: { source: "loop" } }))).toEqual(["cp-3", "cp-2"]);
      expect(ids(saver.list(scope, { filter: { source: "input" }, limit: 1 }))).toEqual(["cp-1"]);
    });

    it("should yield nothing without a thread", () => {
      expect(ids(saver.list(undefined))).toEqual([]);
      expect(ids(saver.list({ configurable: {} }))).toEqual([]);
    });

    it("should not query until iterated", () => {
      const pending = saver.list(scope);
      saver.deleteThread("t1");

      expect(ids(pending)).toEqual([]);
    });
  });

  describe("deletion", () => {
    it("should delete one namespace of a thread", () => {
      const a = saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "ns-a" } }, checkpoint("cp-1", {}, {}), {}, {});
      const b = saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "ns-b" } }, checkpoint("cp-1", {}, {}), {}, {});

      saver.deleteThreadNamespace("t1", "ns-a");

      expect(saver.getTuple(a)).toBeUndefined();
      expect(saver.getTuple(b)?.checkpoint.id).toBe("cp-1");
    });

    it("should delete every namespace of a thread", () => {
      const a = saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "ns-a" } }, checkpoint("cp-1", {}, {}), {}, {});
      const b = saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "ns-b" } }, checkpoint("cp-1", {}, {}), {}, {});
      saver.putWrites(a, [["note", "x"]], "task-1");

      saver.deleteThread("t1");

      expect(saver.getTuple(a)).toBeUndefined();
      expect(saver.getTuple(b)).toBeUndefined();
    });

    it("should list distinct threads of a namespace in order", () => {
      saver.put({ configurable: { thread_id: "t2", checkpoint_ns: "proj" } }, checkpoint("cp-1", {}, {}), {}, {});
      saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "proj" } }, checkpoint("cp-1", {}, {}), {}, {});
      saver.put({ configurable: { thread_id: "t1", checkpoint_ns: "proj" } }, checkpoint("cp-2", {}, {}), {}, {});
      saver.put({ configurable: { thread_id: "t3", checkpoint_ns: "other" } }, checkpoint("cp-1", {}, {}), {}, {});

      expect(saver.listThreadsNamespace("proj")).toEqual(["t1", "t2"]);
      expect(saver.listThreadsNamespace("missing")).toEqual([]);
    });
  });

  describe("pruneThread", () => {
    it("should keep the newest checkpoints and the blobs they reference", () => {
      const first = saver.put(scope, checkpoint("cp-1", { x: 1 }, { x: 1 }), {}, { x: 1 });
      saver.putWrites(first, [["note", "old"]], "task-1");
      const second = saver.put(first, checkpoint("cp-2", { x: 2 }, { x: 2 }), {}, { x: 2 });
      const third = saver.put(second, checkpoint("cp-3", { x: 2, y: "y" }, { x: 2, y: 1 }), {}, { y: 1 });

      expect(saver.pruneThread("t1", "proj", 1)).toBe(2);

      expect(ids(saver.list(scope))).toEqual(["cp-3"]);
      expect(saver.getTuple(third)?.checkpoint.channel_values).toEqual({ x: 2, y: "y" });

      const db = new Database(dbPath);
      try {
        const blobs = db.prepare<[], { channel: string; version: string }>(
          "SELECT channel, version FROM blobs ORDER BY channel, version"
        ).all();
        const writes = db.prepare<[], { c: number }>("SELECT COUNT(*) AS c FROM writes").get();
        expect(blobs).toEqual([
          { channel: "x", version: "2" },
          { channel: "y", version: "1" },
        ]);
        expect(writes?.c).toBe(0);
      } finally {
        db.close();
      }
    });

    it("should do nothing when under the bound", () => {
      saver.put(scope, checkpoint("cp-1", {}, {}), {}, {});

      expect(saver.pruneThread("t1", "proj", 5)).toBe(0);
      expect(ids(saver.list(scope))).toEqual(["cp-1"]);
    });

    it("should reject a negative bound", () => {
      expect(() => saver.pruneThread("t1", "proj", -1)).toThrow(InvalidInputError);
    });

    it("should prune on every put when a bound is configured", () => {
      const bounded = new SqliteCheckpointSaver({ dbPath, maxCheckpointsPerThread: 2 });
      let config = scope;
      for (const id of ["cp-1", "cp-2", "cp-3"]) {
        config = bounded.put(config, checkpoint(id, {}, {}), {}, {});
      }
      bounded.put({ configurable: { thread_id: "t2", checkpoint_ns: "proj" } }, checkpoint("cp-9", {}, {}), {}, {});

      expect(ids(bounded.list(scope))).toEqual(["cp-3", "cp-2"]);
      expect(ids(bounded.list({ configurable: { thread_id: "t2", checkpoint_ns: "proj" } }))).toEqual(["cp-9"]);
    });
  });
});
