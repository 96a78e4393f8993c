/**
 * Reserved pending-write channels.
 *
 * Writes to these channels land on a fixed negative index, so a retry
 * overwrites the previous value in place instead of appending.
 *
 * @module
 */

export const ERROR = "__error__";
export const SCHEDULED = "__scheduled__";
export const INTERRUPT = "__interrupt__";
export const RESUME = "__resume__";

export const WRITES_IDX_MAP: Readonly<Record<string, number>> = Object.freeze({
  [ERROR]: -1,
  [SCHEDULED]: -2,
  [INTERRUPT]: -3,
  [RESUME]: -4,
});

export function isReservedChannel(channel: string): boolean {
  return Object.hasOwn(WRITES_IDX_MAP, channel);
}

/**
 * Index a write is stored under: the reserved slot, else its position in the call.
 */
export function writeIndexFor(channel: string, position: number): number {
  return isReservedChannel(channel) ? (WRITES_IDX_MAP[channel] ?? position) : position;
}
