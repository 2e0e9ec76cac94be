import pino from "pino";

let defaultLogger: pino.Logger | undefined;

/**
 * Process-wide logger used when a component is not given one.
 */
export function getDefaultLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = pino({
      level: process.env.LOG_LEVEL ?? "info",
    });
  }
  return defaultLogger;
}

// Tokens are bearer credentials; only a short prefix ever reaches the logs.
export function tokenPrefix(token: string): string {
  return token.slice(0, 8);
}
