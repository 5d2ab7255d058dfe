/**
 * Default pipeline configuration.
 */

import { DEFAULT_THRESHOLD_BYTES } from "../codec/index.js";
import { DEFAULT_RETRY_POLICIES } from "../errors/index.js";
import type { PipelineConfig } from "./schema.js";

const { capacity, transient } = DEFAULT_RETRY_POLICIES;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  env: "development",
  stateBucket: "verification-state",
  storage: { driver: "memory" },
  hybrid: { enabled: true, thresholdBytes: DEFAULT_THRESHOLD_BYTES },
  integrity: { enabled: true },
  stageTimeoutMs: 60_000,
  retry: {
    capacity: {
      maxAttempts: capacity.maxAttempts,
      baseDelayMs: capacity.baseDelayMs,
      maxDelayMs: capacity.maxDelayMs,
    },
    transient: {
      maxAttempts: transient.maxAttempts,
      baseDelayMs: transient.baseDelayMs,
      maxDelayMs: transient.maxDelayMs,
    },
  },
  tables: { verificationResults: "VerificationResults" },
  logging: { level: "info", json: false },
};
