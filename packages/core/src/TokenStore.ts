import type { JsonValue, TokenRecord } from "./schema";

/**
 * Durable storage for session token records, keyed by token.
 *
 * Every failure other than an absent record is thrown as a
 * {@link TokenStoreError}.
 */
export interface TokenStore {
  /**
   * Stores a new record. Throws a `conflict` error if the token exists.
   */
  insert(token: string, payload: JsonValue, modifiedAt: number): Promise<void>;

  get(token: string): Promise<TokenRecord | null>;

  /**
   * Sets `modifiedAt` to `next` only if it currently equals `expected`, as a
   * single atomic operation. Returns the updated record, or `null` if the
   * record is missing or was changed by someone else.
   */
  compareAndSetModifiedAt(
    token: string,
    expected: number,
    next: number,
  ): Promise<TokenRecord | null>;

  /**
   * @returns Whether a record was removed.
   */
  delete(token: string): Promise<boolean>;

  /**
   * Deletes every record whose payload `user_id` matches, compared as text.
   *
   * @returns The number of records removed.
   */
  deleteWhereUserId(userId: string | number): Promise<number>;

  /**
   * Deletes every record with `modifiedAt < cutoff`.
   *
   * @returns The number of records removed.
   */
  deleteOlderThan(cutoff: number): Promise<number>;
}
