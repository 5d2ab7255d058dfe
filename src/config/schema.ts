/**
 * Pipeline configuration schema.
 *
 * Configuration is read once at startup, validated, frozen and passed
 * explicitly to everything that needs it. Nothing reads the environment
 * after that point, so every stage invocation of a run sees the same
 * threshold, timeouts and retry budget.
 */

import { z } from "zod";

export const RuntimeEnv = z.enum(["development", "production", "test"]);
export type RuntimeEnv = z.infer<typeof RuntimeEnv>;

/** Backend holding blobs (and, for s3, the DynamoDB verification table) */
export const StorageDriver = z.enum(["memory", "file", "s3"]);
export type StorageDriver = z.infer<typeof StorageDriver>;

export const LogLevelSetting = z.enum(["debug", "info", "warn", "error"]);
export type LogLevelSetting = z.infer<typeof LogLevelSetting>;

export const RetrySettingsSchema = z
  .object({
    /** Retries allowed after the first failure */
    maxAttempts: z.number().int().min(0),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
  })
  .strict()
  .refine((settings) => settings.maxDelayMs >= settings.baseDelayMs, {
    message: "maxDelayMs must be at least baseDelayMs",
    path: ["maxDelayMs"],
  });

export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

export const PipelineConfigSchema = z
  .object({
    env: RuntimeEnv,

    /** Container recorded in every reference */
    stateBucket: z.string().min(1),

    storage: z
      .object({
        driver: StorageDriver,
        /** Root directory for the file driver */
        directory: z.string().min(1).optional(),
        /** AWS region for the s3 driver */
        region: z.string().min(1).optional(),
      })
      .strict(),

    hybrid: z
      .object({
        enabled: z.boolean(),
        /** Payloads of at most this many bytes are carried inline */
        thresholdBytes: z.number().int().min(0),
      })
      .strict(),

    integrity: z.object({ enabled: z.boolean() }).strict(),

    stageTimeoutMs: z.number().int().positive(),

    /** Budgets for the retryable categories; the others are never retried */
    retry: z
      .object({
        capacity: RetrySettingsSchema,
        transient: RetrySettingsSchema,
      })
      .strict(),

    tables: z.object({ verificationResults: z.string().min(1) }).strict(),

    logging: z
      .object({
        level: LogLevelSetting,
        json: z.boolean(),
        file: z.string().min(1).optional(),
      })
      .strict(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.storage.driver === "file" && config.storage.directory === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["storage", "directory"],
        message: "directory is required for the file driver",
      });
    }
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
