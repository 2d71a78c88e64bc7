/**
 * Host resolution for the egress policy
 *
 * Answers are cached for a short TTL in a bounded cache. A fresh lookup
 * bypasses the cache and replaces the cached answer.
 */

import { lookup } from 'node:dns/promises';
import { RecipeError } from '../types/errors.js';
import { TtlCache } from '../utils/cache.js';
import { TIMEOUTS } from '../utils/timeouts.js';

export interface ResolvedAddress {
  address: string;
  family: 4 | 6;
}

export interface ResolveOptions {
  /** Skip cached answers */
  fresh?: boolean;
}

export interface HostResolver {
  resolve(host: string, options?: ResolveOptions): Promise<ResolvedAddress[]>;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Resolver backed by the operating system's resolver (getaddrinfo)
 */
export class SystemResolver implements HostResolver {
  async resolve(host: string): Promise<ResolvedAddress[]> {
    try {
      const answers = await lookup(host, { all: true, verbatim: true });
      return answers.map((answer) => ({
        address: answer.address,
        family: answer.family === 6 ? 6 : 4,
      }));
    } catch (error) {
      throw new RecipeError('egress-denied', `DNS lookup failed for ${host}`, {
        stage: 'egress',
        reasons: ['dns_failure', errorCode(error) ?? 'lookup_error'],
        cause: error,
      });
    }
  }
}

export interface CachingResolverOptions {
  ttlMs?: number;
  maxEntries?: number;
}

export class CachingResolver implements HostResolver {
  private readonly cache: TtlCache<ResolvedAddress[]>;

  constructor(
    private readonly inner: HostResolver = new SystemResolver(),
    options: CachingResolverOptions = {}
  ) {
    this.cache = new TtlCache({
      ttlMs: options.ttlMs ?? TIMEOUTS.DNS_CACHE_TTL,
      maxEntries: options.maxEntries ?? 512,
    });
  }

  async resolve(rawHost: string, options: ResolveOptions = {}): Promise<ResolvedAddress[]> {
    const host = rawHost.toLowerCase();
    if (options.fresh !== true) {
      const cached = this.cache.get(host);
      if (cached) return cached;
    }

    const answers = await this.inner.resolve(host, options);
    if (answers.length > 0) {
      this.cache.set(host, answers);
    }
    return answers;
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): ReturnType<TtlCache<ResolvedAddress[]>['getStats']> {
    return this.cache.getStats();
  }
}
