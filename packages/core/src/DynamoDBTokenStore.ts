import {
  ConditionalCheckFailedException,
  CreateTableCommand,
  DescribeTableCommand,
  DynamoDBClient,
  ResourceNotFoundException,
  waitUntilTableExists,
} from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  ScanCommand,
  ScanCommandInput,
  ScanCommandOutput,
  UpdateCommand,
} from "@aws-sdk/lib-dynamodb";
import * as z from "zod";

import { toTokenStoreError, TokenStoreError } from "./errors";
import {
  jsonValueSchema,
  JsonValue,
  payloadUserId,
  TokenRecord,
  tokenRecordSchema,
} from "./schema";
import type { TokenStore } from "./TokenStore";

export type DynamoDBTokenStoreConfig = {
  ddbClient?: DynamoDBClient;
  docClient?: DynamoDBDocumentClient;
  tableName: string;
  scanBatchLimit?: number;
};

export const DEFAULT_SCAN_BATCH_LIMIT = 500;

const tableWaitTimeSeconds = 30;

// Attribute names are always aliased so none can collide with a reserved word.
const attributeNames = {
  "#token": "token",
  "#payload": "payload",
  "#modifiedAt": "modifiedAt",
};

const scannedAgeSchema = z.object({
  token: z.string(),
  modifiedAt: z.number(),
});

const scannedPayloadSchema = z.object({
  token: z.string(),
  payload: jsonValueSchema,
});

/**
 * DynamoDB-backed {@link TokenStore}. The table's partition key is the string
 * attribute `token`; records also carry `payload` and `modifiedAt`.
 *
 * The compare-and-set is a single conditional `UpdateItem`, and bulk deletes
 * re-check their predicate on every item they delete.
 */
export class DynamoDBTokenStore implements TokenStore {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly scanBatchLimit: number;

  constructor(config: DynamoDBTokenStoreConfig) {
    this.docClient =
      config.docClient ??
      DynamoDBDocumentClient.from(config.ddbClient ?? new DynamoDBClient({}));
    this.tableName = config.tableName;
    this.scanBatchLimit = config.scanBatchLimit ?? DEFAULT_SCAN_BATCH_LIMIT;
  }

  async insert(
    token: string,
    payload: JsonValue,
    modifiedAt: number,
  ): Promise<void> {
    const parseResult = tokenRecordSchema.safeParse({
      token,
      payload,
      modifiedAt,
    });
    if (!parseResult.success) {
      throw new TokenStoreError(
        "invalid_record",
        `Cannot store invalid token record: ${parseResult.error.message}`,
      );
    }

    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: parseResult.data,
          ConditionExpression: "attribute_not_exists(#token)",
          ExpressionAttributeNames: { "#token": attributeNames["#token"] },
        }),
      );
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        throw new TokenStoreError(
          "conflict",
          `Token already exists: ${token.slice(0, 8)}`,
          { cause: err },
        );
      }
      throw toTokenStoreError(err, "insert");
    }
  }

  async get(token: string): Promise<TokenRecord | null> {
    let item: Record<string, unknown> | undefined;
    try {
      const result = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { token },
          ConsistentRead: true,
        }),
      );
      item = result.Item;
    } catch (err) {
      throw toTokenStoreError(err, "get");
    }

    return item ? parseRecord(item, token) : null;
  }

  async compareAndSetModifiedAt(
    token: string,
    expected: number,
    next: number,
  ): Promise<TokenRecord | null> {
    let attributes: Record<string, unknown> | undefined;
    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { token },
          ConditionExpression: "#modifiedAt = :expected",
          UpdateExpression: "SET #modifiedAt = :next",
          ExpressionAttributeNames: {
            "#modifiedAt": attributeNames["#modifiedAt"],
          },
          ExpressionAttributeValues: {
            ":expected": expected,
            ":next": next,
          },
          ReturnValues: "ALL_NEW",
        }),
      );
      attributes = result.Attributes;
    } catch (err) {
      // A missing item has no modifiedAt, so it fails the same condition.
      if (err instanceof ConditionalCheckFailedException) {
        return null;
      }
      throw toTokenStoreError(err, "compareAndSetModifiedAt");
    }

    if (!attributes) {
      throw new TokenStoreError(
        "invalid_record",
        `Update of token ${token.slice(0, 8)} returned no attributes`,
      );
    }
    return parseRecord(attributes, token);
  }

  async delete(token: string): Promise<boolean> {
    try {
      const result = await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { token },
          ReturnValues: "ALL_OLD",
        }),
      );
      return result.Attributes !== undefined;
    } catch (err) {
      throw toTokenStoreError(err, "delete");
    }
  }

  async deleteWhereUserId(userId: string | number): Promise<number> {
    const target = String(userId);
    let removed = 0;

    // The user id is matched in code rather than in a FilterExpression, since
    // a payload may hold it as either a number or a string.
    for await (const item of this.scan({
      ProjectionExpression: "#token, #payload",
      ExpressionAttributeNames: {
        "#token": attributeNames["#token"],
        "#payload": attributeNames["#payload"],
      },
    })) {
      const parsed = scannedPayloadSchema.safeParse(item);
      if (!parsed.success || payloadUserId(parsed.data.payload) !== target) {
        continue;
      }
      if (await this.delete(parsed.data.token)) {
        ++removed;
      }
    }

    return removed;
  }

  async deleteOlderThan(cutoff: number): Promise<number> {
    let removed = 0;

    for await (const item of this.scan({
      ProjectionExpression: "#token, #modifiedAt",
      FilterExpression: "#modifiedAt < :cutoff",
      ExpressionAttributeNames: {
        "#token": attributeNames["#token"],
        "#modifiedAt": attributeNames["#modifiedAt"],
      },
      ExpressionAttributeValues: { ":cutoff": cutoff },
    })) {
      const parsed = scannedAgeSchema.safeParse(item);
      if (!parsed.success) {
        continue;
      }

      try {
        await this.docClient.send(
          new DeleteCommand({
            TableName: this.tableName,
            Key: { token: parsed.data.token },
            ConditionExpression: "#modifiedAt < :cutoff",
            ExpressionAttributeNames: {
              "#modifiedAt": attributeNames["#modifiedAt"],
            },
            ExpressionAttributeValues: { ":cutoff": cutoff },
          }),
        );
        ++removed;
      } catch (err) {
        // Renewed or deleted since the scan read it.
        if (err instanceof ConditionalCheckFailedException) {
          continue;
        }
        throw toTokenStoreError(err, "deleteOlderThan");
      }
    }

    return removed;
  }

  private async *scan(
    params: Omit<ScanCommandInput, "TableName" | "ExclusiveStartKey">,
  ): AsyncGenerator<Record<string, unknown>> {
    let lastEvaluatedKey: Record<string, unknown> | undefined;
    do {
      let result: ScanCommandOutput;
      try {
        result = await this.docClient.send(
          new ScanCommand({
            ...params,
            TableName: this.tableName,
            ConsistentRead: true,
            Limit: this.scanBatchLimit,
            ExclusiveStartKey: lastEvaluatedKey,
          }),
        );
      } catch (err) {
        throw toTokenStoreError(err, "scan");
      }

      for (const item of result.Items ?? []) {
        yield item;
      }
      lastEvaluatedKey = result.LastEvaluatedKey;
    } while (lastEvaluatedKey);
  }
}

/**
 * Creates the token table if it does not exist yet and waits for it to become
 * active.
 *
 * @returns Whether the table was created.
 */
export async function createTokenTable(
  ddbClient: DynamoDBClient,
  tableName: string,
): Promise<boolean> {
  try {
    await ddbClient.send(new DescribeTableCommand({ TableName: tableName }));
    return false;
  } catch (err) {
    if (!(err instanceof ResourceNotFoundException)) {
      throw err;
    }
  }

  await ddbClient.send(
    new CreateTableCommand({
      TableName: tableName,
      KeySchema: [{ AttributeName: "token", KeyType: "HASH" }],
      AttributeDefinitions: [{ AttributeName: "token", AttributeType: "S" }],
      BillingMode: "PAY_PER_REQUEST",
    }),
  );

  await waitUntilTableExists(
    { client: ddbClient, maxWaitTime: tableWaitTimeSeconds },
    { TableName: tableName },
  );

  return true;
}

function parseRecord(item: Record<string, unknown>, token: string): TokenRecord {
  const parseResult = tokenRecordSchema.safeParse(item);
  if (!parseResult.success) {
    throw new TokenStoreError(
      "invalid_record",
      `Cannot load invalid record for token ${token.slice(0, 8)}: ${parseResult.error.message}`,
    );
  }
  return parseResult.data;
}
