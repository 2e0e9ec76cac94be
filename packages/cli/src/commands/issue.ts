import { ConfigLoader } from "../config/loader";
import { formatExpiry } from "../utils/format";
import { createCoreLogger, Logger } from "../utils/logger";
import { createTokenManager } from "../utils/manager-factory";
import { parsePayload } from "../utils/payload";

import type { CommonOptions } from "./options";

export type IssueOptions = CommonOptions & {
  payload: string;
  json?: boolean;
};

export async function issueCommand(
  options: IssueOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const payload = parsePayload(options.payload);
  const config = await loader.resolve(options);
  const manager = createTokenManager(config, createCoreLogger(options));

  logger.verbose(`Issuing token in table ${config.tableName}...`);

  const result = await manager.issue(payload);

  if (options.json) {
    logger.json(result);
  } else {
    logger.success("Token issued successfully!");
    logger.info("");
    logger.info("TOKEN (save this securely, it won't be shown again):");
    logger.info(result.token);
    logger.info("");
    logger.info(`Expires at: ${formatExpiry(result.expiresAt)}`);
  }
}
