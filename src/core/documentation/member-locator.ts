/**
 * Heuristic Member Locator
 *
 * Finds documentable declarations in brace-delimited languages (Java,
 * TypeScript, JavaScript and their relatives) without a full parser.
 * Comments and string literals are masked out first, so braces and keywords
 * inside them never count.
 *
 * @module
 */

import type { DocMember, MemberLocator, MemberType } from "../interfaces/IDocumentationGenerator.js";
import { normalizeLineEndings } from "./doc-block.js";

// =============================================================================
// Patterns
// =============================================================================

const IDENT = "[A-Za-z_$][\\w$]*";
const GENERICS = "<[^(){};=]*>";

const TYPE_DECL = new RegExp(
  "^[ \\t]*(?:@\\w+(?:\\([^)]*\\))?\\s+)*" +
    "(?:(?:public|protected|private|static|final|abstract|sealed|non-sealed|strictfp|export|default|declare|const)\\s+)*" +
    `(class|interface|enum)\\s+(${IDENT})`,
  "gm"
);

const FUNCTION_DECL = new RegExp(
  `^[ \\t]*(?:(?:export|default|async|declare)\\s+)*function\\s*\\*?\\s*(${IDENT})\\s*(?:${GENERICS}\\s*)?\\(`,
  "gm"
);

const METHOD_DECL = new RegExp(
  "^[ \\t]*" +
    "(?:(?:public|protected|private|static|final|abstract|synchronized|native|default|async|override|readonly|get|set)\\s+)*" +
    `(?:${GENERICS}\\s*)?` +
    `(?:([\\w$][\\w$.]*(?:\\s*${GENERICS})?(?:\\[\\])*)\\s+)?` +
    `(${IDENT})\\s*(?:${GENERICS}\\s*)?\\(`,
  "gm"
);

/** Words that open statements or expressions, never declarations */
const NOT_A_NAME = new Set([
  "if",
  "for",
  "while",
  "switch",
  "catch",
  "return",
  "new",
  "else",
  "do",
  "try",
  "throw",
  "synchronized",
  "function",
  "super",
  "this",
  "typeof",
  "await",
  "yield",
  "case",
  "delete",
]);

const NOT_A_TYPE = new Set(["return", "new", "throw", "else", "case", "await", "yield", "typeof", "delete", "extends"]);

// Allowed between a parameter list and its body: `throws X`, or a return type annotation.
const DECL_TAIL = /^\s*(?:throws\s+[\w$.,\s<>]+|:\s*[^{};=]+)?\s*$/;

// =============================================================================
// Masking
// =============================================================================

/**
 * Replaces comments and string literals with spaces, keeping every newline
 * so offsets and line numbers stay aligned with the original.
 */
export function maskCommentsAndStrings(source: string): string {
  const out: string[] = [];
  let i = 0;
  const blank = (ch: string): string => (ch === "\n" ? "\n" : " ");

  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === "/" && next === "/") {
      while (i < source.length && source[i] !== "\n") {
        out.push(" ");
        i++;
      }
    } else if (ch === "/" && next === "*") {
      const end = source.indexOf("*/", i + 2);
      const stop = end === -1 ? source.length : end + 2;
      for (; i < stop; i++) out.push(blank(source[i]));
    } else if (ch === '"' || ch === "'" || ch === "`") {
      out.push(" ");
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === "\\" && i + 1 < source.length) {
          out.push(" ", blank(source[i + 1]));
          i += 2;
          continue;
        }
        // Only template literals may span lines
        if (source[i] === "\n" && ch !== "`") break;
        out.push(blank(source[i]));
        i++;
      }
      if (i < source.length && source[i] === ch) {
        out.push(" ");
        i++;
      }
    } else {
      out.push(ch);
      i++;
    }
  }
  return out.join("");
}

// =============================================================================
// Locator
// =============================================================================

interface BraceIndex {
  /** Open brace offsets, ascending */
  opens: number[];
  /** Matching close offset per open offset */
  closeOf: Map<number, number>;
}

interface Declaration {
  memberType: MemberType;
  name: string;
  /** Offset of the declaration line start */
  lineStart: number;
  /** Offset of the body's opening brace, or the terminating semicolon */
  end: number;
  hasBody: boolean;
}

function indexBraces(masked: string): BraceIndex {
  const opens: number[] = [];
  const closeOf = new Map<number, number>();
  const stack: number[] = [];
  for (let i = 0; i < masked.length; i++) {
    if (masked[i] === "{") {
      stack.push(i);
      opens.push(i);
    } else if (masked[i] === "}") {
      const open = stack.pop();
      if (open !== undefined) closeOf.set(open, i);
    }
  }
  return { opens, closeOf };
}

function enclosingBrace(braces: BraceIndex, offset: number): number | undefined {
  for (let k = braces.opens.length - 1; k >= 0; k--) {
    const open = braces.opens[k];
    if (open >= offset) continue;
    const close = braces.closeOf.get(open);
    if (close === undefined || close > offset) return open;
  }
  return undefined;
}

/**
 * From just past an opening parenthesis, finds the end of the declaration:
 * the body brace or a terminating semicolon after a well-formed tail.
 */
function findDeclarationEnd(masked: string, afterParen: number): { end: number; hasBody: boolean; tail: string } | null {
  let depth = 1;
  // Object types in parameter lists nest braces inside the parentheses
  let braceDepth = 0;
  let i = afterParen;
  for (; i < masked.length && depth > 0; i++) {
    const ch = masked[i];
    if (ch === "(") depth++;
    else if (ch === ")") depth--;
    else if (ch === "{") braceDepth++;
    else if (ch === "}") {
      if (--braceDepth < 0) return null;
    } else if (ch === ";" && braceDepth === 0) return null;
  }
  if (depth > 0) return null;

  for (let j = i; j < masked.length; j++) {
    const ch = masked[j];
    if (ch === "{" || ch === ";") {
      const tail = masked.slice(i, j);
      if (!DECL_TAIL.test(tail)) return null;
      return { end: j, hasBody: ch === "{", tail };
    }
    if (ch === "}" || ch === "(" || ch === "=") return null;
  }
  return null;
}

function lineStartOf(text: string, offset: number): number {
  return text.lastIndexOf("\n", offset - 1) + 1;
}

/**
 * Regex-driven locator for brace languages. Recognizes class, interface and
 * enum declarations, methods and constructors directly inside them, and
 * top-level `function` declarations.
 */
export class HeuristicMemberLocator implements MemberLocator {
  locate(source: string, _filePath: string): DocMember[] {
    const text = normalizeLineEndings(source);
    const masked = maskCommentsAndStrings(text);
    const braces = indexBraces(masked);
    const lines = text.split("\n");
    const lineOffsets: number[] = [];
    let offset = 0;
    for (const line of lines) {
      lineOffsets.push(offset);
      offset += line.length + 1;
    }

    const typeBodies = new Map<number, string>();
    const declarations: Declaration[] = [];

    for (const match of masked.matchAll(TYPE_DECL)) {
      const start = match.index ?? 0;
      const bodyOpen = masked.indexOf("{", start + match[0].length);
      if (bodyOpen === -1 || masked.slice(start + match[0].length, bodyOpen).includes(";")) continue;
      const kind = match[1];
      const memberType: MemberType = kind === "interface" ? "interface" : kind === "enum" ? "enum" : "class";
      typeBodies.set(bodyOpen, match[2]);
      declarations.push({ memberType, name: match[2], lineStart: lineStartOf(masked, start + match[0].length), end: bodyOpen, hasBody: true });
    }

    for (const match of masked.matchAll(FUNCTION_DECL)) {
      const start = match.index ?? 0;
      if (enclosingBrace(braces, start) !== undefined) continue;
      const decl = findDeclarationEnd(masked, start + match[0].length);
      if (!decl?.hasBody) continue;
      declarations.push({ memberType: "function", name: match[1], lineStart: start, end: decl.end, hasBody: true });
    }

    for (const match of masked.matchAll(METHOD_DECL)) {
      const start = match.index ?? 0;
      const returnType = match[1];
      const name = match[2];
      if (NOT_A_NAME.has(name) || (returnType !== undefined && NOT_A_TYPE.has(returnType))) continue;
      if (returnType === "function" || returnType === "class" || returnType === "interface" || returnType === "enum") {
        continue;
      }

      const owner = enclosingBrace(braces, start);
      const ownerName = owner === undefined ? undefined : typeBodies.get(owner);
      if (ownerName === undefined) continue;

      const decl = findDeclarationEnd(masked, start + match[0].length);
      if (!decl) continue;
      // Without a body, only abstract or interface signatures qualify
      if (!decl.hasBody && returnType === undefined && !decl.tail.includes(":")) continue;

      const isConstructor = name === "constructor" || (returnType === undefined && name === ownerName);
      declarations.push({
        memberType: isConstructor ? "constructor" : "method",
        name,
        lineStart: start,
        end: decl.end,
        hasBody: decl.hasBody,
      });
    }

    declarations.sort((a, b) => a.lineStart - b.lineStart);

    const members: DocMember[] = [];
    const seen = new Set<number>();
    for (const decl of declarations) {
      if (seen.has(decl.lineStart)) continue;
      seen.add(decl.lineStart);
      members.push(this.toMember(decl, text, lines, lineOffsets, braces));
    }
    return members;
  }

  private toMember(
    decl: Declaration,
    text: string,
    lines: string[],
    lineOffsets: number[],
    braces: BraceIndex
  ): DocMember {
    const declLine = lineIndexOf(lineOffsets, decl.lineStart);

    // Annotations and decorators belong to the member
    let startLine = declLine;
    while (startLine > 0 && lines[startLine - 1].trim().startsWith("@")) {
      startLine--;
    }

    const bodyEnd = decl.hasBody ? braces.closeOf.get(decl.end) ?? decl.end : decl.end;
    const endLine = lineIndexOf(lineOffsets, bodyEnd);

    const signature = text.slice(lineOffsets[declLine], decl.end).replace(/\s+/g, " ").trim();
    const indent = /^[ \t]*/.exec(lines[startLine])?.[0] ?? "";

    return {
      memberType: decl.memberType,
      name: decl.name,
      signature,
      startLine,
      indent,
      doc: findDocAbove(lines, startLine),
      code: lines.slice(startLine, endLine + 1).join("\n"),
    };
  }
}

function lineIndexOf(lineOffsets: number[], offset: number): number {
  let lo = 0;
  let hi = lineOffsets.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineOffsets[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/**
 * The `/** ... *\/` block ending on the line right above `line`, if any.
 */
export function findDocAbove(lines: string[], line: number): DocMember["doc"] {
  const endLine = line - 1;
  if (endLine < 0 || !lines[endLine].trim().endsWith("*/")) return undefined;

  for (let start = endLine; start >= 0; start--) {
    const trimmed = lines[start].trim();
    if (start < endLine && trimmed.includes("*/")) return undefined;
    if (trimmed.startsWith("/*")) {
      if (!trimmed.startsWith("/**")) return undefined;
      return { startLine: start, endLine, text: lines.slice(start, endLine + 1).join("\n") };
    }
  }
  return undefined;
}
