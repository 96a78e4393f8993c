/**
 * Doc block text helpers
 *
 * @module
 */

export const TRUNCATION_MARKER = "\n// ... truncated ...\n";

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Number of lines in a `/** ... *\/` block that carry text once the comment
 * delimiters and leading asterisks are removed.
 */
export function countMeaningfulLines(block: string): number {
  let count = 0;
  for (const raw of normalizeLineEndings(block).split("\n")) {
    const line = raw
      .trim()
      .replace(/^\/\*\*/, "")
      .replace(/\*\/$/, "")
      .trim()
      .replace(/^\*+/, "")
      .trim();
    if (line.length > 0) count++;
  }
  return count;
}

/**
 * Prefixes each line with `indent`. Empty lines get the indent with trailing
 * blanks removed, so no whitespace-only lines are produced.
 */
export function indentBlock(block: string, indent: string): string {
  const bare = indent.replace(/[ \t]+$/, "");
  return normalizeLineEndings(block)
    .split("\n")
    .map((line) => (line ? indent + line : bare))
    .join("\n");
}

/**
 * Cuts a model response down to its `/** ... *\/` block. Returns null when
 * no such block can be recovered.
 */
export function extractDocBlock(text: string): string | null {
  let block = normalizeLineEndings(text).trim();
  if (!block.startsWith("/**")) {
    const start = block.indexOf("/**");
    if (start !== -1) block = block.slice(start);
  }
  if (!block.endsWith("*/")) {
    const end = block.lastIndexOf("*/");
    if (end !== -1) block = block.slice(0, end + 2);
  }
  block = block.trim();
  if (!block.startsWith("/**") || !block.endsWith("*/") || block.length < 5) {
    return null;
  }
  return block
    .split("\n")
    .map((line, index) => (index === 0 ? line : line.replace(/^[ \t]*(?=\*)/, " ")))
    .join("\n");
}

export function truncateSnippet(code: string, maxChars: number): string {
  return code.length > maxChars ? code.slice(0, maxChars) + TRUNCATION_MARKER : code;
}
