/**
 * Runtime wiring.
 *
 * Builds every long-lived collaborator from a validated configuration,
 * once per process:
 *
 *   storage.driver   blob store         verification table
 *   memory           MemoryBlobStore    MemoryVerificationTable
 *   file             FileBlobStore      MemoryVerificationTable
 *   s3               S3BlobStore        DynamoVerificationTable
 */

import { S3Client } from "@aws-sdk/client-s3";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

import { DEFAULT_RETRY_POLICIES, type RetryPolicy, type RetryPolicyTable } from "../errors/index.js";
import { DEFAULT_CATALOG, type CategoryCatalog } from "../categories/index.js";
import {
  BlobStoreClient,
  FileBlobStore,
  MemoryBlobStore,
  S3BlobStore,
  type BlobStore,
} from "../store/index.js";
import { HybridPayloadCodec } from "../codec/index.js";
import { EnvelopeManager } from "../envelope/index.js";
import {
  DynamoVerificationTable,
  MemoryVerificationTable,
  type VerificationTable,
} from "../table/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { StageRunnerOptions } from "../stages/index.js";
import type { PipelineConfig } from "./schema.js";

export interface Runtime {
  readonly config: Readonly<PipelineConfig>;
  readonly logger: Logger;
  readonly catalog: CategoryCatalog;
  readonly store: BlobStore;
  readonly client: BlobStoreClient;
  readonly codec: HybridPayloadCodec;
  readonly manager: EnvelopeManager;
  readonly table: VerificationTable;
  readonly retryPolicies: RetryPolicyTable;
  /** Options for runStage() bound to this runtime */
  stageOptions(): StageRunnerOptions;
}

export interface RuntimeOverrides {
  logger?: Logger;
  store?: BlobStore;
  table?: VerificationTable;
  now?: () => Date;
}

/**
 * Retry table with the configured budgets for the retryable categories.
 */
export function retryPoliciesFrom(config: Readonly<PipelineConfig>): RetryPolicyTable {
  const capacity: RetryPolicy = { strategy: "jittered", ...config.retry.capacity };
  const transient: RetryPolicy = { strategy: "exponential", ...config.retry.transient };
  return Object.freeze({
    ...DEFAULT_RETRY_POLICIES,
    capacity: Object.freeze(capacity),
    transient: Object.freeze(transient),
  });
}

function createStore(config: Readonly<PipelineConfig>): BlobStore {
  const { driver, directory, region } = config.storage;
  switch (driver) {
    case "memory":
      return new MemoryBlobStore(config.stateBucket);
    case "file":
      return new FileBlobStore(directory ?? ".", config.stateBucket);
    case "s3":
      return new S3BlobStore(new S3Client(region === undefined ? {} : { region }), config.stateBucket);
  }
}

function createTable(config: Readonly<PipelineConfig>): VerificationTable {
  const name = config.tables.verificationResults;
  if (config.storage.driver !== "s3") {
    return new MemoryVerificationTable(name);
  }
  const region = config.storage.region;
  const documents = DynamoDBDocumentClient.from(
    new DynamoDBClient(region === undefined ? {} : { region }),
    { marshallOptions: { removeUndefinedValues: true } }
  );
  return new DynamoVerificationTable(documents, name);
}

export function createRuntime(
  config: Readonly<PipelineConfig>,
  overrides: RuntimeOverrides = {}
): Runtime {
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      json: config.logging.json,
      file: config.logging.file,
    });
  const catalog = DEFAULT_CATALOG;
  const store = overrides.store ?? createStore(config);
  const client = new BlobStoreClient(store, { integrity: config.integrity.enabled, catalog });
  const codec = new HybridPayloadCodec(client, {
    enabled: config.hybrid.enabled,
    thresholdBytes: config.hybrid.thresholdBytes,
  });
  const manager = new EnvelopeManager({ client, codec, catalog, logger, now: overrides.now });
  const table = overrides.table ?? createTable(config);
  const retryPolicies = retryPoliciesFrom(config);

  logger.debug("Runtime created", {
    driver: config.storage.driver,
    stateBucket: config.stateBucket,
    table: table.name,
    thresholdBytes: config.hybrid.thresholdBytes,
  });

  return {
    config,
    logger,
    catalog,
    store,
    client,
    codec,
    manager,
    table,
    retryPolicies,
    stageOptions: () => ({
      manager,
      timeoutMs: config.stageTimeoutMs,
      logger,
      retryPolicies,
    }),
  };
}
