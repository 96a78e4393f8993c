/**
 * Typed serialization of checkpoint payloads.
 *
 * Every stored value carries a type tag next to its bytes:
 * - `json`: UTF-8 JSON text
 * - `bytes`: raw binary values (`Uint8Array`/`Buffer`)
 * - `undefined`: a top-level `undefined`, which JSON cannot express; empty payload
 * - `empty`: reserved for channels that have no value at a version
 *
 * @module
 */

import { CheckpointError, ErrorCode } from "../errors.js";

export type ValueType = "json" | "bytes" | "undefined" | "empty";
export type TypedValue = [type: ValueType, payload: Buffer];

export const EMPTY_VALUE: TypedValue = ["empty", Buffer.alloc(0)];

function isValueType(type: string): type is ValueType {
  return type === "json" || type === "bytes" || type === "undefined" || type === "empty";
}

export function dumpsTyped(value: unknown): TypedValue {
  if (value instanceof Uint8Array) {
    return ["bytes", Buffer.from(value)];
  }
  if (value === undefined) {
    return ["undefined", Buffer.alloc(0)];
  }

  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    throw new CheckpointError("Value is not JSON serializable", ErrorCode.CHECKPOINT_SERIALIZATION_FAILED, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (text === undefined) {
    throw new CheckpointError(`Cannot serialize value of type ${typeof value}`, ErrorCode.CHECKPOINT_SERIALIZATION_FAILED);
  }
  return ["json", Buffer.from(text, "utf8")];
}

export function loadsTyped(type: string, payload: Buffer | Uint8Array): unknown {
  if (!isValueType(type)) {
    throw new CheckpointError(`Unknown value type: ${type}`, ErrorCode.CHECKPOINT_SERIALIZATION_FAILED);
  }
  switch (type) {
    case "empty":
    case "undefined":
      return undefined;
    case "bytes":
      return Buffer.from(payload);
    case "json": {
      const text = Buffer.from(payload).toString("utf8");
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new CheckpointError("Stored JSON payload is corrupt", ErrorCode.CHECKPOINT_SERIALIZATION_FAILED, {
          cause: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
