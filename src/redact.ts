/**
 * Redaction for log lines and MCP output. Stored captures are never
 * redacted; this only applies to what apisift prints or serves.
 */

const SENSITIVE_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-csrf-token',
  'api-key',
]);

const SENSITIVE_URL_PARAMS = new Set([
  'token',
  'access_token',
  'key',
  'auth',
  'session',
  'sig',
  'signature',
  'apikey',
  'api_key',
  'password',
]);

const SENSITIVE_JSON_KEYS = new Set([
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'client_secret',
]);

export const REDACTED = '[REDACTED]';

export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([key, value]) => [
      key,
      SENSITIVE_HEADERS.has(key.toLowerCase()) ? REDACTED : value,
    ]),
  );
}

/**
 * Replace values of credential-like query parameters. Returns the input
 * unchanged when nothing matched or it does not parse as a URL.
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  let modified = false;
  for (const key of new Set(parsed.searchParams.keys())) {
    if (SENSITIVE_URL_PARAMS.has(key.toLowerCase())) {
      parsed.searchParams.set(key, REDACTED);
      modified = true;
    }
  }
  return modified ? parsed.toString() : url;
}

/**
 * Deep copy of a parsed JSON value with sensitive keys replaced
 */
export function redactJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactJson);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [
      key,
      SENSITIVE_JSON_KEYS.has(key.toLowerCase()) ? REDACTED : redactJson(inner),
    ]),
  );
}

/**
 * Redact or truncate error messages
 */
export function redactError(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  // Home directories leak user names
  return msg
    .substring(0, 200)
    .replace(/([A-Z]:\\|\/home\/|\/Users\/).+?(?=\s|$)/g, '[PATH]');
}
