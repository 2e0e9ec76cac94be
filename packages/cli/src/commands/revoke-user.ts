import { ConfigLoader } from "../config/loader";
import { createCoreLogger, Logger } from "../utils/logger";
import { createTokenManager } from "../utils/manager-factory";

import type { CommonOptions } from "./options";

export type RevokeUserOptions = CommonOptions & {
  userId: string;
  json?: boolean;
};

export async function revokeUserCommand(
  options: RevokeUserOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const config = await loader.resolve(options);
  const manager = createTokenManager(config, createCoreLogger(options));

  logger.verbose(`Revoking all tokens for user ${options.userId}...`);

  const revoked = await manager.revokeAllForUser(options.userId);

  if (options.json) {
    logger.json({ userId: options.userId, revoked });
  } else {
    logger.success(`Revoked ${revoked} token(s) for user ${options.userId}`);
  }
}
