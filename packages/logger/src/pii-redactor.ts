const REDACTED = "[REDACTED]";

/**
 * Property names whose values never reach the log output.
 */
const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "token",
  "authorization",
  "password",
  "secret",
  "qdrantApiKey",
] as const;

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

const DEFAULT_MAX_LENGTH = 120;

/**
 * JSON paths for Pino's `redact` option: each sensitive key at the top
 * level and one level down (e.g. `embeddings.apiKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];

/**
 * Prepare free text (queries, passage previews) for logging: e-mail
 * addresses are masked and the result is cut to `maxLength` characters,
 * with an ellipsis marking the cut.
 */
export function redactText(text: string, maxLength = DEFAULT_MAX_LENGTH): string {
  const masked = text.replace(EMAIL_REGEX, REDACTED);
  if (masked.length <= maxLength) {
    return masked;
  }
  return `${masked.slice(0, maxLength)}…`;
}
