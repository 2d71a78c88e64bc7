/**
 * Request Templates - `{name}` placeholders in URLs and bodies
 *
 * Templates are built from a recorded URL by replacing chosen query values or
 * path segments with placeholders. Secret-bearing query pairs are dropped on
 * the way, and a template that still carries a redacted value is unusable.
 */

import type { ProposedParameter } from '../types/analysis.js';
import type { ParameterType } from '../types/recipe.js';
import { REDACTED, isSensitiveKey, looksLikeSecretValue } from '../utils/redaction.js';

export const PLACEHOLDER_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const PLACEHOLDER_RE = /\{([^{}]*)\}/g;

/**
 * Names of every `{...}` placeholder, in order of appearance, including
 * malformed ones (callers validate them)
 */
export function listPlaceholders(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER_RE)].map((match) => match[1]);
}

/**
 * Replace placeholders with encoded values; unknown names are left intact
 */
export function fillPlaceholders(
  text: string,
  values: Readonly<Record<string, string>>,
  encode: (value: string) => string = (value) => value
): string {
  return text.replace(PLACEHOLDER_RE, (whole, name: string) =>
    Object.hasOwn(values, name) ? encode(values[name]) : whole
  );
}

/**
 * Where a parameter sits in the recorded URL
 */
export interface ParameterSlot {
  name: string;
  type: ParameterType;
  description?: string;
  /** Query key whose value becomes the placeholder */
  queryKey?: string;
  /** Index among the non-empty path segments */
  pathIndex?: number;
}

export interface UrlTemplate {
  url: string;
  parameters: ProposedParameter[];
  /** Query keys dropped because they carry secrets */
  dropped: string[];
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Build a URL template from a recorded (redacted) URL. Returns null when the
 * URL cannot be parsed or still carries a redacted value that no slot covers.
 */
export function templateFromUrl(rawUrl: string, slots: readonly ParameterSlot[]): UrlTemplate | null {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return null;
  }
  if (url.username || url.password) return null;

  const parameters: ProposedParameter[] = [];
  const used = new Set<string>();
  const propose = (slot: ParameterSlot, example: string): string => {
    if (!used.has(slot.name)) {
      used.add(slot.name);
      parameters.push({
        name: slot.name,
        type: slot.type,
        source: 'caller',
        ...(slot.description ? { description: slot.description } : {}),
        example,
        required: true,
      });
    }
    return `{${slot.name}}`;
  };

  let segmentIndex = -1;
  const path = url.pathname
    .split('/')
    .map((segment) => {
      if (segment === '') return segment;
      segmentIndex++;
      const slot = slots.find((candidate) => candidate.pathIndex === segmentIndex);
      return slot ? propose(slot, decodeSegment(segment)) : segment;
    })
    .join('/');
  if (path.includes(REDACTED) || path.includes(encodeURIComponent(REDACTED))) return null;

  const pairs: string[] = [];
  const dropped: string[] = [];
  for (const [key, value] of url.searchParams) {
    const slot = slots.find((candidate) => candidate.queryKey === key);
    if (slot) {
      pairs.push(`${encodeURIComponent(key)}=${propose(slot, value)}`);
      continue;
    }
    if (isSensitiveKey(key) || value === REDACTED || looksLikeSecretValue(value)) {
      dropped.push(key);
      continue;
    }
    pairs.push(`${encodeURIComponent(key)}=${encodeURIComponent(value)}`);
  }

  const query = pairs.length > 0 ? `?${pairs.join('&')}` : '';
  return { url: `${url.protocol}//${url.host}${path}${query}`, parameters, dropped };
}

/**
 * Query pairs of a URL template without decoding placeholder values
 */
export function templateQueryKeys(template: string): string[] {
  const index = template.indexOf('?');
  if (index < 0) return [];
  return template
    .slice(index + 1)
    .split('&')
    .filter((pair) => pair !== '')
    .map((pair) => decodeSegment(pair.split('=')[0]));
}
