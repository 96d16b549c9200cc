/**
 * Generate unique request IDs for tracing
 */

export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Reuse a caller-supplied X-Request-Id when it looks sane, otherwise mint one
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  if (value && /^[\w.-]{1,64}$/.test(value)) {
    return value;
  }
  return generateRequestId();
}
