/**
 * Prompts for doc block generation
 *
 * @module
 */

import type { MemberType } from "../interfaces/IDocumentationGenerator.js";

export const DOC_SYSTEM_PROMPT = [
  "You write API documentation comments for source code.",
  "Return ONLY a valid doc block comment that starts with '/**' and ends with '*/'.",
  "No markdown, no extra text.",
  "Write thorough documentation that fully describes behavior and intent.",
  "For classes, interfaces and enums: describe the responsibility, key concepts or invariants, and usage notes when evident.",
  "For methods, constructors and functions: describe what it does, important edge cases, side effects, and any assumptions visible in the code.",
  "Include @param tags for each parameter when parameters exist; include @return (Java) or @returns (TypeScript, JavaScript) when a value is returned.",
  "Include @throws only when obvious from the code.",
].join(" ");

export interface DocPromptInput {
  signature: string;
  memberType: MemberType;
  language: string | null;
  code: string;
}

export function buildDocUserPrompt(input: DocPromptInput): string {
  const parts = [`Signature: ${input.signature}`, `Type: ${input.memberType}`];
  if (input.language) parts.push(`Language: ${input.language}`);
  parts.push("Code:", input.code);
  return parts.join("\n\n");
}
