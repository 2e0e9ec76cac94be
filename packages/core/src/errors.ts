export type TokenStoreErrorCode = "conflict" | "invalid_record" | "backend";

/**
 * Raised by a {@link TokenStore} for anything other than an absent record:
 * a duplicate insert, an unreadable stored item, or a failure of the backing
 * database. The original error, if any, is kept as `cause`.
 */
export class TokenStoreError extends Error {
  constructor(
    public readonly code: TokenStoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TokenStoreError";
  }
}

export function isTokenStoreError(error: unknown): error is TokenStoreError {
  return error instanceof TokenStoreError;
}

export function toTokenStoreError(
  error: unknown,
  operation: string,
): TokenStoreError {
  if (isTokenStoreError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TokenStoreError(
    "backend",
    `Token store ${operation} failed: ${message}`,
    { cause: error },
  );
}
