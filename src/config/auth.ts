/**
 * Produces the bearer Authorization header value presented to the core during the handshake.
 */
export function computeAuthorizationHeader(token?: string): string {
  const trimmed = token?.trim() ?? '';
  return `Bearer ${trimmed}`;
}

/**
 * Logging-safe representation of a token: keeps the first four characters and the length.
 */
export function redactToken(token?: string): string {
  const trimmed = token?.trim() ?? '';
  if (!trimmed) return '[empty token]';
  const visible = trimmed.length > 8 ? trimmed.slice(0, 4) : '';
  return `${visible}[token redacted, ${trimmed.length} chars]`;
}
