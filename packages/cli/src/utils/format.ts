export function formatExpiry(expiresAt: number): string {
  return new Date(expiresAt * 1000).toISOString();
}

export function formatTokenPrefix(token: string): string {
  return `${token.slice(0, 8)}...`;
}
