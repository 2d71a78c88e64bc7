/**
 * Transport contracts shared by the three execution tiers
 */

import type { TransportKind } from '../../types/recipe.js';
import { TIMEOUTS } from '../../utils/timeouts.js';

/**
 * Caps applied identically by every tier
 */
export interface TransportLimits {
  /** Body bytes after decompression */
  maxResponseBytes: number;
  /** Sum of header name and value bytes */
  maxHeaderBytes: number;
  maxRedirects: number;
  /** Array/object nesting depth of decoded JSON bodies */
  maxNestingDepth: number;
  timeoutMs: number;
}

export const DEFAULT_TRANSPORT_LIMITS: TransportLimits = {
  maxResponseBytes: 1024 * 1024,
  maxHeaderBytes: 16 * 1024,
  maxRedirects: 5,
  maxNestingDepth: 64,
  timeoutMs: TIMEOUTS.RECIPE_CALL,
};

export interface TransportRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
  /** Exact hosts the request and its redirects may reach */
  allowedDomains: readonly string[];
  /** Defaults to true except for the in-page tier */
  followRedirects?: boolean;
  /** Bypass cached DNS answers */
  fresh?: boolean;
  /** Validate a redirect target, then hand the 3xx back instead of following it */
  returnRedirects?: boolean;
}

export interface TransportResponse {
  status: number;
  /** Lowercased header names */
  headers: Record<string, string>;
  /** Decoded body text */
  body: string;
  /** Decoded body bytes */
  buffer: Buffer;
  /** Decoded body size */
  bytes: number;
  setCookies: string[];
  redirects: number;
  finalUrl: string;
  /** Lowercased media type without parameters */
  contentType: string;
}

export interface Transport {
  readonly kind: TransportKind;
  execute(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse>;
}

export function mediaType(contentType: string | undefined): string {
  if (!contentType) return '';
  return contentType.split(';')[0].trim().toLowerCase();
}
