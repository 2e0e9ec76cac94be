import { createTokenTable } from "@session-tokens/core";

import { ConfigLoader } from "../config/loader";
import { Logger } from "../utils/logger";
import { createDynamoDBClient } from "../utils/manager-factory";

import type { CommonOptions } from "./options";

export type CreateTableOptions = CommonOptions;

export async function createTableCommand(
  options: CreateTableOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const config = await loader.resolve(options);
  const client = createDynamoDBClient(config);

  logger.verbose(`Creating table ${config.tableName} in ${config.region}...`);

  const created = await createTokenTable(client, config.tableName);

  if (created) {
    logger.success(`Table ${config.tableName} created`);
  } else {
    logger.info(`Table ${config.tableName} already exists`);
  }
}
