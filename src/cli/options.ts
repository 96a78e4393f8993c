/**
 * Option parsers shared by the commands
 */

import { InvalidArgumentError } from "commander";

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError("Must be at least 1.");
  }
  return parsed;
}

/**
 * `--project ""` and an omitted flag both select the unscoped graph.
 */
export function toProjectScope(project: string | undefined): string | null {
  return project ? project : null;
}
