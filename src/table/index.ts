/**
 * Durable per-run verification records.
 */

export type { VerificationTable } from "./table-store.js";
export { MemoryVerificationTable } from "./memory-table.js";
export { DynamoVerificationTable, buildPutInput, tableFailure } from "./dynamo-table.js";
