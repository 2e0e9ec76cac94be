import { createHash, randomBytes } from "crypto";

import pino from "pino";

import {
  DEFAULT_RENEW_THRESHOLD_SECONDS,
  DEFAULT_TTL_SECONDS,
  sweepIntervalSeconds,
} from "./config";
import { getDefaultLogger, tokenPrefix } from "./logger";
import { isWellFormedToken, JsonValue, TokenRecord } from "./schema";
import type { TokenStore } from "./TokenStore";

export const TOKEN_RANDOM_BYTES = 32;

export type TokenManagerConfig = {
  store: TokenStore;
  secret: string;
  ttlSeconds?: number;
  renewThresholdSeconds?: number;
  logger?: pino.Logger;
};

export type IssueResult = {
  token: string;
  expiresAt: number;
};

export type ValidateFailureReason = "not_found" | "expired";

export type ValidateFailure = {
  valid: false;
  reason: ValidateFailureReason;
};

export type ValidateSuccess = {
  valid: true;
  record: TokenRecord;
  // True only for the caller whose compare-and-set extended the token.
  renewed: boolean;
  expiresAt: number;
};

export type ValidateResult = ValidateSuccess | ValidateFailure;

/**
 * Issues, validates, renews and revokes opaque session tokens.
 *
 * The manager holds no per-token state: every operation is a point read or
 * write against the {@link TokenStore}, so one instance can be shared by any
 * number of concurrent requests. Renewal is an optimistic compare-and-set on
 * the record's `modifiedAt`, which lets at most one concurrent validation
 * extend a given token.
 *
 * Store failures are thrown as `TokenStoreError` and never retried here.
 */
export class TokenManager {
  private readonly store: TokenStore;
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly renewThresholdSeconds: number;
  private readonly logger: pino.Logger;

  constructor(config: TokenManagerConfig) {
    this.store = config.store;
    this.ttlSeconds = config.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.renewThresholdSeconds =
      config.renewThresholdSeconds ?? DEFAULT_RENEW_THRESHOLD_SECONDS;
    this.logger = (config.logger ?? getDefaultLogger()).child({
      component: "TokenManager",
    });

    if (!config.secret) {
      throw new Error("Token secret must not be empty");
    }
    this.secret = config.secret;

    if (!Number.isInteger(this.ttlSeconds)) {
      throw new Error(`Invalid ttlSeconds: ${this.ttlSeconds}`);
    }
    if (!Number.isInteger(this.renewThresholdSeconds)) {
      throw new Error(
        `Invalid renewThresholdSeconds: ${this.renewThresholdSeconds}`,
      );
    }
    if (this.ttlSeconds <= 0) {
      this.logger.warn(
        { ttlSeconds: this.ttlSeconds },
        "Non-positive token TTL; every token expires on its next validation",
      );
    }
  }

  get ttl(): number {
    return this.ttlSeconds;
  }

  get renewThreshold(): number {
    return this.renewThresholdSeconds;
  }

  /**
   * Seconds between background sweeps for this manager's TTL.
   */
  get sweepInterval(): number {
    return sweepIntervalSeconds(this.ttlSeconds);
  }

  /**
   * Issue a new token carrying the given payload.
   *
   * @param payload Opaque JSON data returned verbatim by {@link validate}.
   * @returns The token and the Unix time at which it expires unless renewed.
   */
  async issue(payload: JsonValue): Promise<IssueResult> {
    const now = nowSeconds();
    const token = this.generateToken(now);

    await this.store.insert(token, payload, now);
    this.logger.debug({ token: tokenPrefix(token) }, "Issued token");

    return { token, expiresAt: this.expiresAt(now) };
  }

  /**
   * Validate a token and, when asked and the token is old enough, renew it.
   *
   * Expired tokens are deleted as soon as they are seen. When several callers
   * renew the same token at once, exactly one compare-and-set wins; the others
   * re-read the record and return it with `renewed: false`.
   *
   * @param token The token presented by the client.
   * @param renewIfNeeded Whether to extend a token past the renewal threshold.
   */
  async validate(
    token: string,
    renewIfNeeded = false,
  ): Promise<ValidateResult> {
    if (!isWellFormedToken(token)) {
      return failValidate("not_found");
    }

    const record = await this.store.get(token);
    if (!record) {
      return failValidate("not_found");
    }

    const now = nowSeconds();
    if (this.hasExpired(record.modifiedAt, now)) {
      return this.expire(token);
    }

    if (!renewIfNeeded || !this.shouldRenew(record.modifiedAt, now)) {
      return this.succeed(record, false);
    }

    const renewed = await this.store.compareAndSetModifiedAt(
      token,
      record.modifiedAt,
      now,
    );
    if (renewed) {
      this.logger.debug({ token: tokenPrefix(token) }, "Renewed token");
      return this.succeed(renewed, true);
    }

    // Another caller renewed or deleted the record since it was read.
    const latest = await this.store.get(token);
    if (!latest) {
      return failValidate("not_found");
    }
    if (this.hasExpired(latest.modifiedAt, now)) {
      return this.expire(token);
    }
    return this.succeed(latest, false);
  }

  /**
   * Revoke a single token, as on logout.
   *
   * @returns Whether the token existed.
   */
  async revoke(token: string): Promise<boolean> {
    if (!isWellFormedToken(token)) {
      return false;
    }

    const removed = await this.store.delete(token);
    this.logger.debug({ token: tokenPrefix(token), removed }, "Revoked token");
    return removed;
  }

  /**
   * Revoke every token whose payload `user_id` equals `userId`, as after the
   * user's account has been deleted.
   *
   * @returns The number of tokens revoked.
   */
  async revokeAllForUser(userId: string | number): Promise<number> {
    const removed = await this.store.deleteWhereUserId(userId);
    this.logger.info({ userId, removed }, "Revoked all tokens for user");
    return removed;
  }

  /**
   * Delete every token older than the TTL. Runs independently of the expiry
   * check in {@link validate} to reclaim tokens nobody presents again.
   *
   * @returns The number of tokens deleted.
   */
  async sweep(): Promise<number> {
    const cutoff = nowSeconds() - Math.max(this.ttlSeconds, 1);
    return this.store.deleteOlderThan(cutoff);
  }

  private generateToken(now: number): string {
    const timestamp = Buffer.alloc(8);
    timestamp.writeBigInt64BE(BigInt(now));

    return createHash("sha256")
      .update(this.secret)
      .update(randomBytes(TOKEN_RANDOM_BYTES))
      .update(timestamp)
      .digest("hex");
  }

  private expiresAt(modifiedAt: number): number {
    return modifiedAt + this.ttlSeconds;
  }

  private hasExpired(modifiedAt: number, now: number): boolean {
    return now - modifiedAt > this.ttlSeconds;
  }

  // A clock running behind the stored time never moves modifiedAt backwards.
  private shouldRenew(modifiedAt: number, now: number): boolean {
    const age = now - modifiedAt;
    return age >= 0 && age >= this.renewThresholdSeconds;
  }

  private succeed(record: TokenRecord, renewed: boolean): ValidateSuccess {
    return {
      valid: true,
      record,
      renewed,
      expiresAt: this.expiresAt(record.modifiedAt),
    };
  }

  // Expiry is reported whether or not the delete succeeds; the sweep catches
  // anything left behind.
  private async expire(token: string): Promise<ValidateFailure> {
    try {
      await this.store.delete(token);
      this.logger.debug({ token: tokenPrefix(token) }, "Deleted expired token");
    } catch (err) {
      this.logger.warn(
        { token: tokenPrefix(token), err },
        "Failed to delete expired token",
      );
    }
    return failValidate("expired");
  }
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function failValidate(reason: ValidateFailureReason): ValidateFailure {
  return { valid: false, reason };
}
