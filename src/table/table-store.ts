/**
 * Verification table contract.
 *
 * The table holds one VerificationContext per run. Writes are conditional on
 * the status the writer last observed:
 *
 *   putConditional(record, null)        create; fails if a record exists
 *   putConditional(record, "TURN1_...") replace; fails if the stored status
 *                                       differs (a missing record is created)
 *
 * A failed condition is a Conflict (client category, never retried). Any
 * other backend failure is StoreUnavailable with the backend error as cause.
 */

import type { VerificationContext, VerificationStatus } from "../status/index.js";

export interface VerificationTable {
  /** Table name, for logs */
  readonly name: string;

  /** Stored context, or undefined when the run has no record */
  get(verificationId: string): Promise<VerificationContext | undefined>;

  putConditional(record: VerificationContext, expectedStatus: VerificationStatus | null): Promise<void>;
}
