import { TokenSweeper } from "@session-tokens/core";

import { ConfigLoader } from "../config/loader";
import { createCoreLogger, Logger } from "../utils/logger";
import { createTokenManager } from "../utils/manager-factory";

import type { CommonOptions } from "./options";

export type SweeperOptions = CommonOptions & {
  interval?: number;
};

/**
 * Runs the background sweep until `signal` is aborted, then waits for any
 * sweep in progress to finish.
 */
export async function sweeperCommand(
  options: SweeperOptions,
  signal: AbortSignal,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  const logger = new Logger(options);
  const loader = new ConfigLoader(options.configDir, env);

  const config = await loader.resolve(options);
  const coreLogger = createCoreLogger(options);
  const manager = createTokenManager(config, coreLogger);
  const sweeper = new TokenSweeper(manager, {
    intervalSeconds: options.interval,
    logger: coreLogger,
  });

  const interval = options.interval ?? manager.sweepInterval;
  logger.info(
    `Sweeping ${config.tableName} every ${interval}s (Ctrl+C to stop)`,
  );

  sweeper.start();
  await waitForAbort(signal);

  logger.verbose("Stopping sweeper...");
  await sweeper.stop();
  logger.success("Sweeper stopped");
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
