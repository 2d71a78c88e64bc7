/**
 * Secret Redaction
 *
 * Removes credential-bearing headers and secret-shaped values from URLs,
 * headers, JSON bodies and free text. Redaction is one-way: the original
 * value is never retained.
 */

export const REDACTED = '[REDACTED]';
export const TRUNCATION_MARKER = '...[TRUNC]';

/**
 * Headers dropped from recordings and logs entirely
 */
export const SENSITIVE_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-csrf-token',
  'x-xsrf-token',
  'x-amz-security-token',
]);

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'access_token',
  'apikey',
  'api_key',
  'auth',
  'authorization',
  'bearer',
  'client_secret',
  'cookie',
  'csrf',
  'id_token',
  'password',
  'refresh_token',
  'secret',
  'session',
  'signature',
  'sig',
  'token',
  'xsrf',
]);

/** Sensitive only when the value looks opaque */
const CONDITIONAL_KEYS: ReadonlySet<string> = new Set(['code', 'key']);

const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'password',
  'passwd',
  'authorization',
  'cookie',
  'session',
  'csrf',
  'xsrf',
  'api_key',
  'apikey',
];

const JWT_RE = /^eyJ[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}$/;
const LONG_BASE64_RE = /^[a-zA-Z0-9+/=_-]{60,}$/;
const LONG_BASE64URL_RE = /^[a-zA-Z0-9_-]{32,}={0,2}$/;
const LONG_HEX_RE = /^[a-fA-F0-9]{32,}$/;
const PATH_TOKEN_RE = /^[a-zA-Z0-9_-]{24,}$/;
const SLACK_TOKEN_RE = /^xox[a-z]-[0-9a-zA-Z-]{10,}$/i;
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Secret shapes embedded in free text */
const TEXT_SECRET_PATTERNS: RegExp[] = [
  /\beyJ[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}/g,
  /\bxox[a-z]-[0-9a-zA-Z-]{10,}/gi,
  /\b(Bearer|Basic)\s+[a-zA-Z0-9._~+/=-]{8,}/g,
  /\b[a-fA-F0-9]{32,}\b/g,
  /\b[a-zA-Z0-9_-]{40,}={0,2}/g,
];

const HAS_DIGIT = /\d/;
const HAS_ALPHA = /[a-zA-Z]/;

export function truncate(value: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (value.length <= maxLength) return value;
  if (maxLength <= TRUNCATION_MARKER.length) return TRUNCATION_MARKER.slice(0, maxLength);
  return value.slice(0, maxLength - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}

export function isSensitiveHeader(name: string): boolean {
  return SENSITIVE_HEADERS.has(name.toLowerCase());
}

/**
 * Key names that always carry secrets (query keys, JSON keys, form fields)
 */
export function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase();
  if (SENSITIVE_KEYS.has(lowered)) return true;
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowered.includes(fragment));
}

export function looksLikeSecretValue(value: string): boolean {
  const v = value.trim();
  if (!v) return false;
  return (
    SLACK_TOKEN_RE.test(v) ||
    JWT_RE.test(v) ||
    LONG_HEX_RE.test(v) ||
    LONG_BASE64URL_RE.test(v) ||
    LONG_BASE64_RE.test(v)
  );
}

/**
 * `code` and `key` are often harmless ("code=fr"), so only opaque values count
 */
function looksLikeOpaqueCodeOrKey(value: string): boolean {
  const v = value.trim();
  if (!v) return false;
  if (/^[a-zA-Z]+$/.test(v) && v.length <= 12) return false;
  return true;
}

export function shouldRedactQueryValue(key: string, value: string): boolean {
  const lowered = key.toLowerCase();
  if (isSensitiveKey(lowered)) return true;
  if (CONDITIONAL_KEYS.has(lowered) && looksLikeOpaqueCodeOrKey(value)) return true;
  return looksLikeSecretValue(value);
}

/**
 * Lowercase slugs with dashes, like "release-20240115-production"
 */
function looksLikeHumanSlug(segment: string): boolean {
  if (!segment.includes('-')) return false;
  if (!/^[a-z0-9-]+$/.test(segment)) return false;

  const core = segment.replace(/-/g, '');
  if (core.length < 12) return false;

  const parts = segment.split('-');
  if (parts.length < 2 || parts.length > 10) return false;
  if (parts.some((part) => part.length === 0 || part.length > 24)) return false;

  const alphaParts = parts.filter((part) => /^[a-z]+$/.test(part)).length;
  if (alphaParts < 2) return false;

  const digits = core.replace(/[^0-9]/g, '').length;
  return digits / core.length <= 0.55;
}

export function looksLikeSecretPathSegment(segment: string): boolean {
  const s = segment.trim();
  if (!s) return false;
  if (UUID_RE.test(s)) return true;
  if (SLACK_TOKEN_RE.test(s) || JWT_RE.test(s) || LONG_HEX_RE.test(s)) return true;
  if (s.length >= 32 && LONG_BASE64URL_RE.test(s)) {
    if (HAS_DIGIT.test(s) || s.includes('_') || s.includes('-')) {
      return !looksLikeHumanSlug(s);
    }
    return false;
  }
  if (LONG_BASE64_RE.test(s)) return true;
  if (PATH_TOKEN_RE.test(s)) {
    return HAS_ALPHA.test(s) && HAS_DIGIT.test(s) && !looksLikeHumanSlug(s);
  }
  return false;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Redact credentials, secret query values, secret path segments and the
 * fragment from a URL. Unparseable input is redacted as text.
 */
export function redactUrl(rawUrl: string): string {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return redactText(rawUrl);
  }

  url.username = '';
  url.password = '';
  url.hash = '';

  const segments = url.pathname.split('/').slice(0, 200);
  url.pathname = segments
    .map((segment) => (looksLikeSecretPathSegment(safeDecode(segment)) ? REDACTED : segment))
    .join('/');

  const entries = Array.from(url.searchParams.entries());
  if (entries.length > 0) {
    const params = new URLSearchParams();
    for (const [key, value] of entries) {
      params.append(key, shouldRedactQueryValue(key, value) ? REDACTED : truncate(value, 128));
    }
    url.search = params.toString();
  }

  return url.toString();
}

/**
 * Drop sensitive headers, lowercase names, and mask secret-shaped values
 */
export function redactHeaders(headers: Record<string, string> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!headers) return out;
  for (const [name, value] of Object.entries(headers)) {
    const lowered = name.toLowerCase();
    if (SENSITIVE_HEADERS.has(lowered)) continue;
    out[lowered] = isSensitiveKey(lowered) || looksLikeSecretValue(value) ? REDACTED : value;
  }
  return out;
}

export function redactText(text: string): string {
  let out = text;
  for (const pattern of TEXT_SECRET_PATTERNS) {
    out = out.replace(pattern, REDACTED);
  }
  return out;
}

/**
 * Redact a decoded JSON value: values under sensitive keys and secret-shaped
 * strings are replaced.
 */
export function redactJsonValue(value: unknown, depth = 0): unknown {
  if (depth > 32) return REDACTED;
  if (typeof value === 'string') {
    return looksLikeSecretValue(value) ? REDACTED : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactJsonValue(item, depth + 1));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = isSensitiveKey(key) ? REDACTED : redactJsonValue(child, depth + 1);
    }
    return out;
  }
  return value;
}

/**
 * Redact a body that may or may not be JSON
 */
export function redactBody(body: string): string {
  const trimmed = body.trimStart();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(body);
      return JSON.stringify(redactJsonValue(parsed));
    } catch {
      // Truncated samples are not valid JSON
      return redactText(body);
    }
  }
  return redactText(body);
}
