/**
 * Secret redaction for log output.
 *
 * The pipeline holds API keys for the embedding, generation, reranker and
 * vector-store backends; none of them may reach a log line.
 */

const REDACTED = "[REDACTED]";

/**
 * Property names whose values are always redacted, in their canonical casing.
 * Matching in {@link redactValue} is case-insensitive.
 */
const SENSITIVE_KEYS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "openaiApiKey",
  "cohereApiKey",
  "qdrantApiKey",
  "authorization",
  "cookie",
  "accessToken",
  "refreshToken",
] as const;

const SENSITIVE_KEY_SET: ReadonlySet<string> = new Set(SENSITIVE_KEYS.map((k) => k.toLowerCase()));

/** Bearer-style API keys (`sk-...`, `sk-proj-...`) embedded in free text. */
const API_KEY_REGEX = /\bsk-[A-Za-z0-9_-]{16,}/g;

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Redact a single key/value pair.
 *
 * Sensitive keys lose their whole value; other string values have API keys
 * and e-mail addresses masked in place.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_KEY_SET.has(key.toLowerCase())) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(API_KEY_REGEX, REDACTED).replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Paths for pino's `redact` option: every sensitive key at the top level and
 * one level down (e.g. `headers.authorization`, `config.apiKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
