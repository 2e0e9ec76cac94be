import { TokenStoreError } from "./errors";
import { JsonValue, payloadUserId, TokenRecord } from "./schema";
import type { TokenStore } from "./TokenStore";

/**
 * Process-local {@link TokenStore} for tests and single-process deployments.
 * Each operation completes within the call that starts it, so the
 * compare-and-set is atomic with respect to every other caller.
 */
export class MemoryTokenStore implements TokenStore {
  private readonly records = new Map<string, TokenRecord>();

  get size(): number {
    return this.records.size;
  }

  async insert(
    token: string,
    payload: JsonValue,
    modifiedAt: number,
  ): Promise<void> {
    if (this.records.has(token)) {
      throw new TokenStoreError(
        "conflict",
        `Token already exists: ${token.slice(0, 8)}`,
      );
    }
    this.records.set(token, {
      token,
      payload: structuredClone(payload),
      modifiedAt,
    });
  }

  async get(token: string): Promise<TokenRecord | null> {
    const record = this.records.get(token);
    return record ? structuredClone(record) : null;
  }

  async compareAndSetModifiedAt(
    token: string,
    expected: number,
    next: number,
  ): Promise<TokenRecord | null> {
    const record = this.records.get(token);
    if (!record || record.modifiedAt !== expected) {
      return null;
    }

    const updated = { ...record, modifiedAt: next };
    this.records.set(token, updated);
    return structuredClone(updated);
  }

  async delete(token: string): Promise<boolean> {
    return this.records.delete(token);
  }

  async deleteWhereUserId(userId: string | number): Promise<number> {
    const target = String(userId);
    let removed = 0;
    for (const [token, record] of this.records) {
      if (payloadUserId(record.payload) === target) {
        this.records.delete(token);
        ++removed;
      }
    }
    return removed;
  }

  async deleteOlderThan(cutoff: number): Promise<number> {
    let removed = 0;
    for (const [token, record] of this.records) {
      if (record.modifiedAt < cutoff) {
        this.records.delete(token);
        ++removed;
      }
    }
    return removed;
  }
}
