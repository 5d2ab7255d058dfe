/**
 * Verification table backed by DynamoDB.
 *
 * Key schema: verificationId (partition) + verificationAt (sort). Lookups by
 * run id query the partition and take the newest item.
 */

import {
  PutCommand,
  QueryCommand,
  type DynamoDBDocumentClient,
  type PutCommandInput,
} from "@aws-sdk/lib-dynamodb";

import { PipelineError, type ErrorAttribution } from "../errors/index.js";
import {
  parseVerificationContext,
  type VerificationContext,
  type VerificationStatus,
} from "../status/index.js";
import type { VerificationTable } from "./table-store.js";

/**
 * Conditional put request for a record.
 */
export function buildPutInput(
  tableName: string,
  record: VerificationContext,
  expectedStatus: VerificationStatus | null
): PutCommandInput {
  if (expectedStatus === null) {
    return {
      TableName: tableName,
      Item: record,
      ConditionExpression: "attribute_not_exists(verificationId)",
    };
  }
  return {
    TableName: tableName,
    Item: record,
    ConditionExpression: "attribute_not_exists(verificationId) OR #status = :expected",
    ExpressionAttributeNames: { "#status": "status" },
    ExpressionAttributeValues: { ":expected": expectedStatus },
  };
}

/**
 * Map a DynamoDB failure to a PipelineError.
 */
export function tableFailure(err: unknown, tableName: string, attribution: ErrorAttribution): PipelineError {
  if (err instanceof PipelineError) {
    return err;
  }
  if (err instanceof Error && err.name === "ConditionalCheckFailedException") {
    return new PipelineError(
      "Conflict",
      `Conditional write to ${tableName} rejected`,
      attribution,
      { cause: err }
    );
  }
  return new PipelineError(
    "StoreUnavailable",
    `${attribution.operation} on ${tableName} failed`,
    attribution,
    { cause: err }
  );
}

export class DynamoVerificationTable implements VerificationTable {
  readonly name: string;
  private readonly client: DynamoDBDocumentClient;

  constructor(client: DynamoDBDocumentClient, tableName: string) {
    this.client = client;
    this.name = tableName;
  }

  async get(verificationId: string): Promise<VerificationContext | undefined> {
    const attribution: ErrorAttribution = { operation: "table.get", runId: verificationId };
    try {
      const response = await this.client.send(
        new QueryCommand({
          TableName: this.name,
          KeyConditionExpression: "verificationId = :id",
          ExpressionAttributeValues: { ":id": verificationId },
          ScanIndexForward: false,
          Limit: 1,
        })
      );
      const item = response.Items?.[0];
      return item === undefined ? undefined : parseVerificationContext(item, attribution);
    } catch (err) {
      throw tableFailure(err, this.name, attribution);
    }
  }

  async putConditional(
    record: VerificationContext,
    expectedStatus: VerificationStatus | null
  ): Promise<void> {
    const attribution: ErrorAttribution = { operation: "table.put", runId: record.verificationId };
    try {
      await this.client.send(new PutCommand(buildPutInput(this.name, record, expectedStatus)));
    } catch (err) {
      throw tableFailure(err, this.name, attribution);
    }
  }
}
