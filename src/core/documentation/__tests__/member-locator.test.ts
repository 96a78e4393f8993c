/**
 * HeuristicMemberLocator Tests
 */

import { describe, it, expect } from "vitest";

import { HeuristicMemberLocator, findDocAbove, maskCommentsAndStrings } from "../member-locator.js";

const JAVA = [
  "package demo;",
  "",
  "import java.util.List;",
  "",
  "/**",
  " * Existing.",
  " */",
  "public class A {",
  "    private final int x = 1;",
  "",
  "    @Override",
  "    public String toString() {",
  '        return "A{" + x + "}";',
  "    }",
  "",
  "    public A(int x) {",
  "        this.x = x;",
  "    }",
  "",
  "    /** Short. */",
  "    public <T> List<T> wrap(T value) throws IllegalStateException {",
  "        if (value == null) {",
  '            throw new IllegalStateException("null");',
  "        }",
  "        return List.of(value);",
  "    }",
  "",
  "    abstract void run();",
  "}",
  "",
].join("\n");

const TYPESCRIPT = [
  "export interface Options {",
  "  retries: number;",
  "  load(id: string): Promise<void>;",
  "}",
  "",
  "export class Service {",
  "  constructor(private readonly opts: Options) {}",
  "",
  "  async fetch(id: string, extra: { force: boolean }): Promise<string> {",
  "    if (this.opts.retries > 0) {",
  "      return `value-${id}`;",
  "    }",
  '    return "";',
  "  }",
  "}",
  "",
  "/**",
  " * Adds.",
  " */",
  "export function add(a: number, b: number): number {",
  "  return a + b;",
  "}",
  "",
  "const helper = () => {",
  "  function inner() {}",
  "};",
  "",
].join("\n");

describe("HeuristicMemberLocator", () => {
  const locator = new HeuristicMemberLocator();

  describe("Java", () => {
    const members = locator.locate(JAVA, "A.java");

    it("should find types, methods and constructors in source order", () => {
      expect(members.map((m) => [m.memberType, m.name])).toEqual([
        ["class", "A"],
        ["method", "toString"],
        ["constructor", "A"],
        ["method", "wrap"],
        ["method", "run"],
      ]);
    });

    it("should attach existing doc blocks", () => {
      expect(members[0].doc).toEqual({ startLine: 4, endLine: 6, text: "/**\n * Existing.\n */" });
      expect(members[3].doc).toEqual({ startLine: 19, endLine: 19, text: "    /** Short. */" });
      expect(members[2].doc).toBeUndefined();
    });

    it("should start members at their annotations", () => {
      expect(members[1].startLine).toBe(10);
      expect(members[1].indent).toBe("    ");
      expect(members[1].code).toBe(
        ["    @Override", "    public String toString() {", '        return "A{" + x + "}";', "    }"].join("\n")
      );
    });

    it("should collapse signatures up to the body", () => {
      expect(members.map((m) => m.signature)).toEqual([
        "public class A",
        "public String toString()",
        "public A(int x)",
        "public <T> List<T> wrap(T value) throws IllegalStateException",
        "abstract void run()",
      ]);
      expect(members[4].code).toBe("    abstract void run();");
    });
  });

  describe("TypeScript", () => {
    const members = locator.locate(TYPESCRIPT, "service.ts");

    it("should find interface members, class members and top-level functions", () => {
      expect(members.map((m) => [m.memberType, m.name])).toEqual([
        ["interface", "Options"],
        ["method", "load"],
        ["class", "Service"],
        ["constructor", "constructor"],
        ["method", "fetch"],
        ["function", "add"],
      ]);
    });

    it("should keep object types in parameter lists", () => {
      expect(members[4].signature).toBe("async fetch(id: string, extra: { force: boolean }): Promise<string>");
      expect(members[1].signature).toBe("load(id: string): Promise<void>");
    });

    it("should find the doc block of a top-level function", () => {
      expect(members[5].startLine).toBe(19);
      expect(members[5].doc).toEqual({ startLine: 16, endLine: 18, text: "/**\n * Adds.\n */" });
    });
  });

  it("should read CRLF sources", () => {
    const members = locator.locate("class A {\r\n  void run() {\r\n  }\r\n}\r\n", "A.java");
    expect(members.map((m) => m.name)).toEqual(["A", "run"]);
    expect(members[1].code).toBe("  void run() {\n  }");
  });

  it("should ignore declarations inside comments and strings", () => {
    const source = ['// class Fake {', 'const s = "class Other {";', "/*", "class Hidden {}", "*/", ""].join("\n");
    expect(locator.locate(source, "x.ts")).toEqual([]);
  });
});

describe("maskCommentsAndStrings", () => {
  it("should blank strings and line comments", () => {
    expect(maskCommentsAndStrings('a = "x{y}"; // {\nb')).toBe("a = " + " ".repeat(6) + "; " + " ".repeat(4) + "\nb");
  });

  it("should keep newlines inside block comments", () => {
    expect(maskCommentsAndStrings("/* a\n b */x")).toBe(" ".repeat(4) + "\n" + " ".repeat(5) + "x");
  });
});

describe("findDocAbove", () => {
  it("should ignore plain block comments", () => {
    expect(findDocAbove(["/* plain */", "class A {}"], 1)).toBeUndefined();
  });

  it("should not reach past the end of an earlier comment", () => {
    expect(findDocAbove(["/** a */", "int x;", " */", "class A {}"], 3)).toBeUndefined();
  });
});
