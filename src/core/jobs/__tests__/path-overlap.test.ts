/**
 * pathsOverlap Tests
 */

import { describe, it, expect } from "vitest";
import { pathsOverlap } from "../path-overlap.js";

describe("pathsOverlap", () => {
  it("should treat equal paths as overlapping", () => {
    expect(pathsOverlap("/repo", "/repo")).toBe(true);
    expect(pathsOverlap("/repo/", "/repo")).toBe(true);
  });

  it("should detect containment in both directions", () => {
    expect(pathsOverlap("/repo", "/repo/src")).toBe(true);
    expect(pathsOverlap("/repo/src/main", "/repo")).toBe(true);
  });

  it("should compare whole segments", () => {
    expect(pathsOverlap("/repo", "/repository")).toBe(false);
    expect(pathsOverlap("/repo/src", "/repo/other")).toBe(false);
  });

  it("should not mistake dot-prefixed names for parents", () => {
    expect(pathsOverlap("/repo", "/repo/..hidden")).toBe(true);
    expect(pathsOverlap("/repo/a", "/repo/..hidden")).toBe(false);
  });
});
