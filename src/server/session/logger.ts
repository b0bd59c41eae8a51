/**
 * Structured logging helper for session events
 * Outputs JSON for easy parsing and grepping
 */

export function logSessionEvent(event: string, details: Record<string, unknown> = {}) {
  console.log(JSON.stringify({
    type: 'session_event',
    event,
    timestamp: new Date().toISOString(),
    ...details,
  }));
}

// Only a preview of a credential is ever logged
export function tokenPreview(token: string | null | undefined): string | null {
  if (!token) return null;
  if (token.length <= 12) return `${token.slice(0, 2)}...`;
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}
