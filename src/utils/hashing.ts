/**
 * Content hashing helpers
 */

import { createHash } from 'node:crypto';

/**
 * JSON serialization with sorted object keys, so equal values hash equally
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        out[key] = sortKeys(child);
      }
    }
    return out;
  }
  return value;
}

export function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

export function contentDigest(value: unknown): string {
  return sha256(canonicalJson(value));
}
