/**
 * Signal Extractor - per-exchange feature vectors for candidate ranking
 *
 * Works on the redacted recording only. Bodies are described structurally
 * (keys, types, counts) and never echoed into the summary.
 */

import type { ContentKind, JsonShape, SignalVector } from '../types/candidates.js';
import type { RecordedExchange, SessionRecording } from '../types/recording.js';
import { REDACTED, isSensitiveKey, truncate } from '../utils/redaction.js';

// ============================================
// PATTERNS
// ============================================

const TOKEN_RE = /[a-z0-9]+/g;
const API_PATH_RE = /\/(api|graphql|gql|query|search)(\/|$)/i;
const API_VERSION_RE = /\/v[0-9]+(\/|$)/i;
const TRACKER_PATH_RE = /\/(collect|pixel|beacon|telemetry|events|event|track|tracking)(\/|$)/i;

const TELEMETRY_HOST_FRAGMENTS = [
  'google-analytics',
  'googletagmanager',
  'doubleclick',
  'segment',
  'mixpanel',
  'amplitude',
  'sentry',
  'hotjar',
  'datadog',
  'newrelic',
  'intercom',
  'snowplow',
  'facebook',
  'fbcdn',
];

const CACHE_BUSTER_KEYS: ReadonlySet<string> = new Set([
  '_', '_t', 't', 'ts', 'time', 'timestamp', 'cb', 'cachebust', 'cache_bust',
  'cache_buster', 'nonce', 'rnd', 'random',
]);

/** Keys whose list value usually is the payload */
export const LIST_CONTAINER_KEYS: ReadonlySet<string> = new Set([
  'items', 'results', 'data', 'hits', 'documents', 'rows', 'records',
  'entries', 'elements', 'values', 'value', 'list', 'edges', 'nodes',
]);

const MAX_SUMMARY_CHARS = 500;
const MAX_PARSE_CHARS = 50_000;
const BODY_TOKEN_WINDOW = 4096;

// ============================================
// TOKENS
// ============================================

/**
 * Lowercase alphanumeric tokens of at least three characters, first
 * occurrence order, bounded
 */
export function tokenizeText(text: string, maxTokens = 120): string[] {
  if (!text || maxTokens <= 0) return [];
  const seen = new Set<string>();
  for (const match of text.toLowerCase().matchAll(TOKEN_RE)) {
    const token = match[0];
    if (token.length < 3 || token === 'redacted') continue;
    seen.add(token);
    if (seen.size >= maxTokens) break;
  }
  return [...seen];
}

/**
 * Tokens of host, decoded path, query keys and short query values
 */
export function tokenizeUrl(rawUrl: string): string[] {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return tokenizeText(rawUrl);
  }

  let path = url.pathname;
  try {
    path = decodeURIComponent(path);
  } catch {
    // Keep the encoded form
  }

  const parts = [url.hostname, path];
  for (const [key, value] of url.searchParams) {
    parts.push(key);
    if (value && value !== REDACTED && value.length <= 80) parts.push(value);
  }
  return tokenizeText(parts.join(' '), 140);
}

/**
 * |a ∩ b| / min(|a|, |b|)
 */
export function overlapRatio(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const other = new Set(b);
  let shared = 0;
  for (const token of new Set(a)) {
    if (other.has(token)) shared++;
  }
  return Math.min(1, shared / Math.max(1, Math.min(a.length, b.length)));
}

// ============================================
// CONTENT
// ============================================

export function classifyContent(contentType: string, body: string, bodySize: number): ContentKind {
  const ct = contentType.toLowerCase();
  if (body === '' && bodySize === 0) return 'empty';
  if (ct.startsWith('image/')) return 'image';

  const head = body.trimStart().slice(0, 200).toLowerCase();
  if (ct.includes('json') || head.startsWith('{') || head.startsWith('[')) return 'json';
  if (ct.includes('html') || head.includes('<html') || head.includes('<!doctype html')) return 'html';
  if (ct.startsWith('text/') || body.slice(0, 4000).includes('\n')) return 'text';
  if (/^(font|audio|video)\//.test(ct) || ct === 'application/octet-stream') return 'binary';
  return 'other';
}

/**
 * Parse a JSON body when it is small enough; undefined when unparseable
 */
export function parseJsonBody(body: string): unknown {
  if (body === '' || body.length > MAX_PARSE_CHARS) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Bounded walk collecting structural facts about a JSON value
 */
export function measureJson(value: unknown, maxNodes = 900, maxDepth = 8): JsonShape {
  const keys = new Set<string>();
  let nodes = 0;
  let depth = 0;
  let hasList = false;

  const stack: Array<[unknown, number]> = [[value, 0]];
  while (stack.length > 0 && nodes < maxNodes) {
    const next = stack.pop();
    if (!next) break;
    const [node, level] = next;
    nodes++;
    depth = Math.max(depth, level);
    if (level >= maxDepth) continue;

    if (Array.isArray(node)) {
      hasList = true;
      for (const child of node.slice(0, 12)) {
        if (child !== null && typeof child === 'object') stack.push([child, level + 1]);
      }
    } else if (isRecord(node)) {
      for (const [key, child] of Object.entries(node)) {
        keys.add(key.toLowerCase());
        if (child !== null && typeof child === 'object') stack.push([child, level + 1]);
      }
    }
  }

  let listLength: number | null = null;
  if (Array.isArray(value)) {
    listLength = value.length;
  } else if (isRecord(value)) {
    for (const [key, child] of Object.entries(value)) {
      if (LIST_CONTAINER_KEYS.has(key.toLowerCase()) && Array.isArray(child)) {
        listLength = child.length;
        break;
      }
    }
  }

  return {
    root: Array.isArray(value) ? 'array' : isRecord(value) ? 'object' : 'scalar',
    nodes,
    uniqueKeys: keys.size,
    depth,
    hasList,
    listLength,
  };
}

// ============================================
// STRUCTURAL SUMMARY
// ============================================

function safeKeyName(key: string): string {
  return isSensitiveKey(key) ? '[REDACTED_KEY]' : truncate(key, 64);
}

function describeJson(value: unknown, depth: number): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return `string(len=${value.length})`;

  if (Array.isArray(value)) {
    if (depth >= 3) return `array(len=${value.length})`;
    const kinds = [...new Set(value.slice(0, 25).map((item) => describeJson(item, depth + 1)))].slice(0, 5);
    return `array(len=${value.length}) elems=[${kinds.join(', ')}]`;
  }

  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    if (depth >= 3) return `object(keys=${Math.min(keys.length, 25)})`;
    const named = keys.slice(0, 25).map(safeKeyName);
    const sample = keys
      .slice(0, 8)
      .map((key) => `${safeKeyName(key)}:${describeJson(value[key], depth + 1)}`)
      .join(', ');
    return `object(keys=[${named.join(',')}]) sample={ ${sample} }`;
  }

  return 'unknown';
}

function describeHtml(body: string): string {
  const counts = new Map<string, number>();
  for (const match of body.slice(0, 20_000).matchAll(/<\s*([a-zA-Z0-9]+)[\s>/]/g)) {
    const tag = match[1].toLowerCase();
    counts.set(tag, (counts.get(tag) ?? 0) + 1);
  }
  const top = [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 8)
    .map(([tag, count]) => `${tag}:${count}`);
  return `html chars=${body.length} tags=${counts.size} top=[${top.join(',')}]`;
}

/**
 * Bounded description of a body's structure; never contains body values
 */
export function summarizeStructure(contentType: string, body: string, bodySize = body.length): string {
  if (body === '') return 'no_body';

  let summary: string;
  switch (classifyContent(contentType, body, bodySize)) {
    case 'json': {
      if (body.length > MAX_PARSE_CHARS) {
        summary = `json chars=${body.length} (not_parsed)`;
        break;
      }
      const parsed = parseJsonBody(body);
      summary = parsed === undefined ? `json chars=${body.length} (parse_error)` : describeJson(parsed, 0);
      break;
    }
    case 'html':
      summary = describeHtml(body);
      break;
    case 'text':
      summary = `text chars=${body.length} lines~${body.slice(0, 20_000).split(/\r?\n/).length}`;
      break;
    default:
      summary = `unknown chars=${body.length}`;
  }
  return truncate(summary, MAX_SUMMARY_CHARS);
}

// ============================================
// URL HINTS
// ============================================

export function apiPathHint(path: string): number {
  if (TRACKER_PATH_RE.test(path)) return 0;
  if (API_PATH_RE.test(path)) return 1;
  if (API_VERSION_RE.test(path)) return 0.6;
  const lowered = path.toLowerCase();
  if (lowered.includes('/search') || lowered.includes('/query')) return 0.7;
  return 0;
}

export function isTrackerPath(path: string): boolean {
  return TRACKER_PATH_RE.test(path);
}

export function isTelemetryHost(host: string): boolean {
  return TELEMETRY_HOST_FRAGMENTS.some((fragment) => host.includes(fragment));
}

export function cacheBusterKeys(keys: readonly string[]): string[] {
  return keys.filter((key) => CACHE_BUSTER_KEYS.has(key) || CACHE_BUSTER_KEYS.has(key.toLowerCase()));
}

function hostOf(rawUrl: string | undefined): string {
  if (!rawUrl) return '';
  try {
    return new URL(rawUrl).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Host of the page the task ended on: the last navigation, else the final URL
 */
export function pageHostOf(recording: SessionRecording): string {
  for (let i = recording.exchanges.length - 1; i >= 0; i--) {
    const exchange = recording.exchanges[i];
    if (exchange.resourceKind === 'document' || exchange.initiator.kind === 'navigation') {
      const host = hostOf(exchange.url);
      if (host) return host;
    }
  }
  return hostOf(recording.finalUrl);
}

// ============================================
// EXTRACTION
// ============================================

function completedAt(exchange: RecordedExchange): number {
  return exchange.timing.startedAtMs + exchange.timing.durationMs;
}

export function extractSignal(
  exchange: RecordedExchange,
  context: { pageHost: string; firstCompletion: number; completionSpan: number }
): SignalVector {
  let host = '';
  let path = '';
  let queryKeys: string[] = [];
  try {
    const url = new URL(exchange.url);
    host = url.hostname.toLowerCase();
    path = url.pathname;
    queryKeys = [...new Set(url.searchParams.keys())].sort();
  } catch {
    path = exchange.url;
  }

  const contentKind = classifyContent(exchange.contentType, exchange.bodySample, exchange.bodySize);
  const parsed = contentKind === 'json' ? parseJsonBody(exchange.bodySample) : undefined;
  const json = parsed !== undefined && parsed !== null && typeof parsed === 'object' ? measureJson(parsed) : null;

  const relativePosition = context.completionSpan > 0
    ? Math.min(1, Math.max(0, (completedAt(exchange) - context.firstCompletion) / context.completionSpan))
    : 0;

  return {
    exchangeId: exchange.id,
    seq: exchange.seq,
    url: exchange.url,
    method: exchange.method,
    host,
    path,
    queryKeys,
    status: exchange.status,
    contentType: exchange.contentType,
    contentKind,
    bodySize: exchange.bodySize,
    resourceKind: exchange.resourceKind,
    json,
    urlTokens: tokenizeUrl(exchange.url),
    bodyTokens: tokenizeText(exchange.bodySample.slice(0, BODY_TOKEN_WINDOW), 240),
    apiPathHint: apiPathHint(path),
    trackerPath: isTrackerPath(path),
    telemetryHost: isTelemetryHost(host),
    cacheBusterKeys: cacheBusterKeys(queryKeys),
    sameHostAsPage: host !== '' && host === context.pageHost,
    initiatorHost: hostOf(exchange.initiator.url),
    relativePosition,
    durationMs: exchange.timing.durationMs,
    summary: summarizeStructure(exchange.contentType, exchange.bodySample, exchange.bodySize),
  };
}

/**
 * Signal vectors for every exchange, in recording order
 */
export function extractSignals(recording: SessionRecording): SignalVector[] {
  const completions = recording.exchanges.map(completedAt);
  const firstCompletion = completions.length > 0 ? Math.min(...completions) : 0;
  const lastCompletion = completions.length > 0 ? Math.max(...completions) : 0;
  const context = {
    pageHost: pageHostOf(recording),
    firstCompletion,
    completionSpan: Math.max(0, lastCompletion - firstCompletion),
  };
  return recording.exchanges.map((exchange) => extractSignal(exchange, context));
}
