/**
 * In-process verification table for tests and local runs.
 *
 * Records are kept as JSON text and validated on read, so callers never
 * share objects with the table.
 */

import { PipelineError } from "../errors/index.js";
import {
  parseVerificationContext,
  type VerificationContext,
  type VerificationStatus,
} from "../status/index.js";
import type { VerificationTable } from "./table-store.js";

export class MemoryVerificationTable implements VerificationTable {
  readonly name: string;
  private readonly records = new Map<string, string>();

  constructor(name = "memory-verification-results") {
    this.name = name;
  }

  async get(verificationId: string): Promise<VerificationContext | undefined> {
    const text = this.records.get(verificationId);
    if (text === undefined) {
      return undefined;
    }
    return parseVerificationContext(JSON.parse(text), {
      operation: "table.get",
      runId: verificationId,
    });
  }

  async putConditional(
    record: VerificationContext,
    expectedStatus: VerificationStatus | null
  ): Promise<void> {
    const existing = await this.get(record.verificationId);
    if (existing !== undefined && existing.status !== expectedStatus) {
      throw new PipelineError(
        "Conflict",
        `Stored status is ${existing.status}, expected ${expectedStatus ?? "no record"}`,
        { operation: "table.put", runId: record.verificationId },
        { details: { stored: existing.status, expected: expectedStatus } }
      );
    }
    this.records.set(record.verificationId, JSON.stringify(record));
  }

  /** Insert or replace without a condition, e.g. to seed a test */
  seed(record: VerificationContext): void {
    this.records.set(record.verificationId, JSON.stringify(record));
  }

  get size(): number {
    return this.records.size;
  }
}
