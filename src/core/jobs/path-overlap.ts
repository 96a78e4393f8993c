/**
 * Directory overlap checks between job roots.
 *
 * @module
 */

import * as path from "node:path";

function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === "" || path.isAbsolute(relative)) return false;
  return relative.split(path.sep)[0] !== "..";
}

/**
 * True when the two absolute paths are equal or one contains the other.
 * Containment is by whole path segments: `/repo` does not contain `/repository`.
 */
export function pathsOverlap(a: string, b: string): boolean {
  const left = path.resolve(a);
  const right = path.resolve(b);
  return left === right || isWithin(left, right) || isWithin(right, left);
}
