import chalk from "chalk";
import pino from "pino";

export type LogLevel = "quiet" | "normal" | "verbose";

export type LogOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

function toLogLevel(level: LogLevel | LogOptions): LogLevel {
  if (typeof level === "string") {
    return level;
  } else if (level.quiet) {
    return "quiet";
  } else if (level.verbose) {
    return "verbose";
  }
  return "normal";
}

export class Logger {
  private readonly level: LogLevel;

  constructor(level: LogLevel | LogOptions = "normal") {
    this.level = toLogLevel(level);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level !== "quiet") {
      console.warn(chalk.yellow(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level !== "quiet") {
      // eslint-disable-next-line no-console
      console.log(message, ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.level !== "quiet") {
      // eslint-disable-next-line no-console
      console.log(chalk.green(message), ...args);
    }
  }

  verbose(message: string, ...args: unknown[]): void {
    if (this.level === "verbose") {
      // eslint-disable-next-line no-console
      console.log(chalk.gray(message), ...args);
    }
  }

  json(data: unknown): void {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(data, null, 2));
  }
}

const pinoLevels: Record<LogLevel, pino.LevelWithSilent> = {
  quiet: "error",
  normal: "info",
  verbose: "debug",
};

/**
 * Structured logger handed to the token manager and sweeper. It writes to
 * stderr so that stdout carries only command output.
 */
export function createCoreLogger(
  level: LogLevel | LogOptions = "normal",
): pino.Logger {
  return pino({ level: pinoLevels[toLogLevel(level)] }, pino.destination(2));
}
