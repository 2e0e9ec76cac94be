import { ConfigLoader } from "../config/loader";
import { formatExpiry } from "../utils/format";
import { createCoreLogger, Logger } from "../utils/logger";
import { createTokenManager } from "../utils/manager-factory";

import type { CommonOptions } from "./options";

export type ValidateOptions = CommonOptions & {
  token: string;
  renew?: boolean;
  json?: boolean;
};

export async function validateCommand(
  options: ValidateOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const config = await loader.resolve(options);
  const manager = createTokenManager(config, createCoreLogger(options));

  logger.verbose(`Validating token in table ${config.tableName}...`);

  const result = await manager.validate(options.token, options.renew ?? false);

  if (options.json) {
    logger.json(result);
  }

  if (!result.valid) {
    throw new Error(
      result.reason === "expired" ? "Token expired" : "Token not found",
    );
  }

  if (!options.json) {
    logger.success("Token is valid");
    logger.info(`Payload: ${JSON.stringify(result.record.payload)}`);
    logger.info(`Renewed: ${result.renewed ? "yes" : "no"}`);
    logger.info(`Expires at: ${formatExpiry(result.expiresAt)}`);
  }
}
