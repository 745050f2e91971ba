/**
 * Redaction paths for Pino's `redact` option.
 *
 * Access logs carry the raw request headers, so credentials there are masked
 * along with the usual secret-bearing keys one level deep.
 */

export const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS = ["password", "secret", "token", "apiKey", "accessToken", "refreshToken"];

export const REDACT_PATHS: string[] = [
  "req.headers.authorization",
  "req.headers.cookie",
  'res.headers["set-cookie"]',
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];
