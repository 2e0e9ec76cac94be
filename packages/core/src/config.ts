import * as z from "zod";

export const DEFAULT_TTL_SECONDS = 300;
export const DEFAULT_RENEW_THRESHOLD_SECONDS = 30;
export const DEVELOPMENT_SECRET = "local_secret";

// Unset or non-integer values parse as undefined.
function envInteger() {
  return z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/)
    .transform((value) => parseInt(value, 10))
    .optional()
    .catch(undefined);
}

function envString() {
  return z.string().min(1).optional().catch(undefined);
}

export const tokenManagerEnvSchema = z.object({
  TOKEN_TTL_SECONDS: envInteger(),
  TOKEN_RENEW_THRESHOLD_SECONDS: envInteger(),
  TOKEN_SECRET: envString(),
  JWT_SECRET: envString(),
});

export type TokenSettings = {
  ttlSeconds: number;
  renewThresholdSeconds: number;
  secret: string;
};

/**
 * Reads token lifetime settings and the token secret from the environment.
 * `TOKEN_SECRET` is preferred over `JWT_SECRET`; without either, the
 * development secret is used.
 */
export function loadTokenSettings(
  env: NodeJS.ProcessEnv = process.env,
): TokenSettings {
  const parsed = tokenManagerEnvSchema.parse(env);
  return {
    ttlSeconds: parsed.TOKEN_TTL_SECONDS ?? DEFAULT_TTL_SECONDS,
    renewThresholdSeconds:
      parsed.TOKEN_RENEW_THRESHOLD_SECONDS ?? DEFAULT_RENEW_THRESHOLD_SECONDS,
    secret: parsed.TOKEN_SECRET ?? parsed.JWT_SECRET ?? DEVELOPMENT_SECRET,
  };
}

/**
 * How often the background sweep should run for a given TTL: half the TTL,
 * but never more often than every 30 seconds.
 */
export function sweepIntervalSeconds(ttlSeconds: number): number {
  if (ttlSeconds <= 0) {
    return 30;
  }
  return Math.max(Math.floor(ttlSeconds / 2), 30);
}
