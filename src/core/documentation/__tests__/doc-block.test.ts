import { describe, it, expect } from "vitest";

import {
  TRUNCATION_MARKER,
  countMeaningfulLines,
  extractDocBlock,
  indentBlock,
  normalizeLineEndings,
  truncateSnippet,
} from "../doc-block.js";

describe("doc block helpers", () => {
  describe("countMeaningfulLines", () => {
    it("should ignore delimiters, asterisks and blank lines", () => {
      expect(countMeaningfulLines("/**\n * TODO\n */")).toBe(1);
      expect(countMeaningfulLines("/**\n * First.\n *\n * Second.\n * @param a value\n */")).toBe(3);
    });

    it("should count text on the delimiter lines", () => {
      expect(countMeaningfulLines("/** Adds two numbers. */")).toBe(1);
      expect(countMeaningfulLines("/**\n */")).toBe(0);
    });
  });

  it("should normalize CRLF and CR line endings", () => {
    expect(normalizeLineEndings("a\r\nb\rc\n")).toBe("a\nb\nc\n");
  });

  it("should indent non-empty lines and keep empty lines free of trailing blanks", () => {
    expect(indentBlock("/**\n\n * x\n */", "    ")).toBe("    /**\n\n     * x\n     */");
    expect(indentBlock("a\n\nb", "\t ")).toBe("\t a\n\t\n\t b");
  });

  describe("extractDocBlock", () => {
    it("should strip surrounding chatter", () => {
      expect(extractDocBlock("Here you go:\n/**\n * Adds.\n */\nThanks")).toBe("/**\n * Adds.\n */");
    });

    it("should realign continuation lines", () => {
      expect(extractDocBlock("/**\n     * Adds.\n     */")).toBe("/**\n * Adds.\n */");
    });

    it("should reject responses without a doc block", () => {
      expect(extractDocBlock("Adds two numbers.")).toBeNull();
      expect(extractDocBlock("/* plain comment */")).toBeNull();
    });
  });

  it("should truncate long snippets with a marker", () => {
    expect(truncateSnippet("abcdef", 10)).toBe("abcdef");
    expect(truncateSnippet("abcdef", 3)).toBe("abc" + TRUNCATION_MARKER);
  });
});
