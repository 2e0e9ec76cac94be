import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBTokenStore, TokenManager } from "@session-tokens/core";
import pino from "pino";

import { ResolvedConfig } from "../config/schemas";

export function createDynamoDBClient(config: ResolvedConfig): DynamoDBClient {
  return new DynamoDBClient({
    region: config.region,
    ...(config.endpoint ? { endpoint: config.endpoint } : {}),
  });
}

export function createTokenManager(
  config: ResolvedConfig,
  logger: pino.Logger,
): TokenManager {
  const store = new DynamoDBTokenStore({
    ddbClient: createDynamoDBClient(config),
    tableName: config.tableName,
  });

  return new TokenManager({
    store,
    secret: config.secret,
    ttlSeconds: config.ttlSeconds,
    renewThresholdSeconds: config.renewThresholdSeconds,
    logger,
  });
}
