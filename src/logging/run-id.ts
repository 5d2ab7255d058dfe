/**
 * Verification ID generation and parsing.
 * Each run gets a unique ID used for tracing, blob keys and the results table.
 */

import { randomBytes } from "node:crypto";

const VERIFICATION_ID_PATTERN = /^verif-(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:-[0-9a-z]+)?$/;

/**
 * Generate a verification ID.
 * Format: "verif-" + UTC timestamp + random suffix (e.g., "verif-20250307121530-a1b2")
 */
export function generateVerificationId(now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:T]/g, "");
  const randomPart = randomBytes(2).toString("hex");
  return `verif-${stamp}-${randomPart}`;
}

/**
 * Recover the creation time encoded in a verification ID.
 * Returns undefined for IDs of any other format.
 */
export function parseVerificationTimestamp(verificationId: string): string | undefined {
  const match = VERIFICATION_ID_PATTERN.exec(verificationId);
  if (match === null) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match;
  const iso = `${year}-${month}-${day}T${hour}:${minute}:${second}.000Z`;
  const parsed = new Date(iso);
  // Impossible dates (month 13, February 30) do not survive the round trip.
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString() !== iso) {
    return undefined;
  }
  return iso;
}
