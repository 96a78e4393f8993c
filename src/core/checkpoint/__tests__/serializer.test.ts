/**
 * Typed serializer Tests
 */

import { describe, it, expect } from "vitest";
import { dumpsTyped, loadsTyped } from "../serializer.js";
import { CheckpointError } from "../../errors.js";

describe("typed serializer", () => {
  it("should tag plain values as json", () => {
    const [type, payload] = dumpsTyped({ a: [1, "two"] });

    expect(type).toBe("json");
    expect(payload.toString("utf8")).toBe('{"a":[1,"two"]}');
    expect(loadsTyped(type, payload)).toEqual({ a: [1, "two"] });
  });

  it("should tag binary values as bytes", () => {
    const [type, payload] = dumpsTyped(new Uint8Array([7, 8]));

    expect(type).toBe("bytes");
    expect(loadsTyped(type, payload)).toEqual(Buffer.from([7, 8]));
  });

  it("should keep undefined distinct from null", () => {
    const [type, payload] = dumpsTyped(undefined);

    expect(type).toBe("undefined");
    expect(payload.length).toBe(0);
    expect(loadsTyped(type, payload)).toBeUndefined();
    expect(loadsTyped(...dumpsTyped(null))).toBeNull();
  });

  it("should return objects that look like an undefined marker unchanged", () => {
    const [type, payload] = dumpsTyped({ $undefined: true });

    expect(type).toBe("json");
    expect(loadsTyped(type, payload)).toEqual({ $undefined: true });
  });

  it("should decode empty as unset", () => {
    expect(loadsTyped("empty", Buffer.alloc(0))).toBeUndefined();
  });

  it("should reject values JSON cannot represent", () => {
    expect(() => dumpsTyped(10n)).toThrow(CheckpointError);
    expect(() => dumpsTyped(() => 1)).toThrow(CheckpointError);
  });

  it("should reject unknown type tags", () => {
    expect(() => loadsTyped("pickle", Buffer.from("x"))).toThrow(CheckpointError);
  });
});
