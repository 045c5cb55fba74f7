// =============================================================================
// Error text helpers — message extraction + secret masking
// =============================================================================
// Error text ends up in three places an operator can read: the issues
// table, activity summaries and HTTP responses. Contact emails and tokens
// are masked before any of them sees it.
// =============================================================================

const EMAIL_RE = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const BEARER_RE = /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g;
const JWT_RE = /\beyJ[A-Za-z0-9\-_]+\.eyJ[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_.+/=]+\b/g;

/** Long opaque strings: HubSpot private-app tokens, Wrike permanent tokens */
const TOKEN_RE = /\b(?:pat-[a-z0-9]+-)?[A-Za-z0-9-]{40,}\b/g;

const PLACEHOLDERS: Array<[RegExp, string]> = [
  [JWT_RE, '[token]'],
  [BEARER_RE, '[token]'],
  [EMAIL_RE, '[email]'],
  [TOKEN_RE, '[token]'],
];

/**
 * Masks emails and credentials in a message.
 *
 * @param message — raw text, possibly carrying a remote response body
 */
export function sanitizeMessage(message: string): string {
  let sanitized = message;
  for (const [pattern, placeholder] of PLACEHOLDERS) {
    sanitized = sanitized.replace(pattern, placeholder);
  }
  return sanitized;
}

/** Message of any thrown value, unmasked. For server-side logs. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Message of any thrown value, masked. For persisted or client-facing text. */
export function safeErrorMessage(err: unknown): string {
  return sanitizeMessage(errorMessage(err));
}
