import { ConfigLoader } from "../config/loader";
import { formatTokenPrefix } from "../utils/format";
import { createCoreLogger, Logger } from "../utils/logger";
import { createTokenManager } from "../utils/manager-factory";

import type { CommonOptions } from "./options";

export type RevokeOptions = CommonOptions & {
  token: string;
};

export async function revokeCommand(
  options: RevokeOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const config = await loader.resolve(options);
  const manager = createTokenManager(config, createCoreLogger(options));

  const prefix = formatTokenPrefix(options.token);
  logger.verbose(`Revoking token ${prefix}`);

  if (await manager.revoke(options.token)) {
    logger.success(`Token ${prefix} revoked successfully`);
  } else {
    logger.warn(`Token ${prefix} not found`);
  }
}
