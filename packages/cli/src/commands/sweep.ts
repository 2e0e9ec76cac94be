import { ConfigLoader } from "../config/loader";
import { createCoreLogger, Logger } from "../utils/logger";
import { createTokenManager } from "../utils/manager-factory";

import type { CommonOptions } from "./options";

export type SweepOptions = CommonOptions & {
  json?: boolean;
};

export async function sweepCommand(
  options: SweepOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const config = await loader.resolve(options);
  const manager = createTokenManager(config, createCoreLogger(options));

  logger.verbose(
    `Removing tokens older than ${manager.ttl}s from ${config.tableName}...`,
  );

  const removed = await manager.sweep();

  if (options.json) {
    logger.json({ removed });
  } else {
    logger.success(`Removed ${removed} expired token(s)`);
  }
}
