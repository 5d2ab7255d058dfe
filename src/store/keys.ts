/**
 * Deterministic object keys.
 *
 * Slot artifacts:           <runId>/<category>/<slot>.<ext>
 * Human-browsable reports:  <prefix>/YYYY/MM/DD/<runId>.json   (UTC date)
 *
 * Because a slot key is a pure function of (runId, category, slot), a stage
 * that is invoked twice overwrites its previous output instead of creating a
 * second copy.
 */

import { PipelineError, type ErrorAttribution } from "../errors/index.js";

const SEGMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface SlotAddress {
  runId: string;
  category: string;
  slot: string;
}

export interface ParsedSlotKey extends SlotAddress {
  extension: string;
}

/**
 * Validate one key segment (run id, category or slot).
 *
 * @throws PipelineError (ValidationError) for empty segments, path
 *         separators or relative path components
 */
export function validateKeySegment(
  value: string,
  label: string,
  attribution: ErrorAttribution
): string {
  if (!SEGMENT_PATTERN.test(value) || value.includes("..")) {
    throw new PipelineError(
      "ValidationError",
      `Invalid ${label} "${value}": expected letters, digits, ".", "_" or "-"`,
      attribution
    );
  }
  return value;
}

export function slotKey(address: SlotAddress, extension: string): string {
  const attribution: ErrorAttribution = { operation: "slotKey", ...address };
  validateKeySegment(address.runId, "run id", attribution);
  validateKeySegment(address.category, "category", attribution);
  validateKeySegment(address.slot, "slot", attribution);
  return `${address.runId}/${address.category}/${address.slot}.${extension}`;
}

/**
 * Inverse of slotKey(). Returns undefined for keys of any other shape.
 */
export function parseSlotKey(key: string): ParsedSlotKey | undefined {
  const parts = key.split("/");
  if (parts.length !== 3) {
    return undefined;
  }
  const [runId, category, file] = parts;
  if (!runId || !category || !file) {
    return undefined;
  }
  const dot = file.lastIndexOf(".");
  if (dot <= 0 || dot === file.length - 1) {
    return undefined;
  }
  return { runId, category, slot: file.slice(0, dot), extension: file.slice(dot + 1) };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Date-partitioned key, e.g. "logs/2025/03/07/verif-20250307120000-ab12.json".
 */
export function datePartitionedKey(prefix: string, runId: string, at: Date): string {
  validateKeySegment(runId, "run id", { operation: "datePartitionedKey", runId });
  const year = at.getUTCFullYear();
  const month = pad(at.getUTCMonth() + 1);
  const day = pad(at.getUTCDate());
  return `${prefix}/${year}/${month}/${day}/${runId}.json`;
}
