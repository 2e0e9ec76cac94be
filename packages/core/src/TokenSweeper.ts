import pino from "pino";

import { getDefaultLogger } from "./logger";
import type { TokenManager } from "./TokenManager";

export type TokenSweeperOptions = {
  // Defaults to the manager's sweep interval.
  intervalSeconds?: number;
  logger?: pino.Logger;
  onError?: (err: unknown) => void;
  // Lets the process exit while the sweeper waits for its next run.
  unref?: boolean;
};

/**
 * Runs {@link TokenManager.sweep} in the background: once on start, then again
 * a fixed interval after each run finishes. Runs never overlap, and a failed
 * run is logged and retried on the next interval.
 */
export class TokenSweeper {
  private readonly manager: Pick<TokenManager, "sweep" | "sweepInterval">;
  private readonly intervalMs: number;
  private readonly logger: pino.Logger;
  private readonly onError?: (err: unknown) => void;
  private readonly unref: boolean;

  private active = false;
  // Bumped on every start and stop; a loop only reschedules itself while its
  // generation is current.
  private generation = 0;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    manager: Pick<TokenManager, "sweep" | "sweepInterval">,
    options?: TokenSweeperOptions,
  ) {
    this.manager = manager;
    this.intervalMs =
      (options?.intervalSeconds ?? manager.sweepInterval) * 1000;
    this.logger = (options?.logger ?? getDefaultLogger()).child({
      component: "TokenSweeper",
    });
    this.onError = options?.onError;
    this.unref = options?.unref ?? false;
  }

  get running(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.logger.info(
      { intervalSeconds: this.intervalMs / 1000 },
      "Starting token sweeper",
    );
    this.schedule(0, ++this.generation);
  }

  /**
   * Stops scheduling runs and resolves once any run in progress has finished.
   */
  async stop(): Promise<void> {
    this.active = false;
    ++this.generation;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  /**
   * Run a single sweep.
   *
   * @returns The number of tokens removed, or `null` if the sweep failed.
   */
  async runOnce(): Promise<number | null> {
    try {
      const removed = await this.manager.sweep();
      if (removed > 0) {
        this.logger.info({ removed }, "Removed expired tokens");
      } else {
        this.logger.debug("No expired tokens to remove");
      }
      return removed;
    } catch (err) {
      this.logger.error({ err }, "Token sweep failed");
      this.reportError(err);
      return null;
    }
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      // A run left over from before a restart finishes before this one begins.
      const previous = this.inFlight;
      const run: Promise<void> = (async () => {
        await previous;
        await this.runOnce();
        if (this.inFlight === run) {
          this.inFlight = null;
        }
        if (this.generation === generation) {
          this.schedule(this.intervalMs, generation);
        }
      })();
      this.inFlight = run;
    }, delayMs);

    if (this.unref) {
      this.timer.unref();
    }
  }

  private reportError(err: unknown): void {
    if (!this.onError) {
      return;
    }
    try {
      this.onError(err);
    } catch (hookErr) {
      this.logger.warn({ err: hookErr }, "Sweep error hook threw");
    }
  }
}
