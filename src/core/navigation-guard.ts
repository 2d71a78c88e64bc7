/**
 * Navigation Guard - egress policy for the browser agent's own traffic
 *
 * Every http(s) request a guarded browser context makes is fetched by the
 * engine through the guarded fetch and handed back to the browser, so agent
 * navigation is held to the same egress rules, pins and caps as replay.
 * Redirect targets are validated and then returned to the browser, which
 * issues the next hop as a new request that passes through the guard again.
 */

import { toRecipeError } from '../utils/error-envelope.js';
import { logger } from '../utils/logger.js';
import { redactUrl } from '../utils/redaction.js';
import type { EgressPolicy } from './egress-policy.js';
import { guardedFetch } from './transport/guarded-fetch.js';
import { NodeHttpWire, type HttpWire } from './transport/http-wire.js';
import { fulfillHeaders, type RequestInterceptor, type RouteDecision } from './transport/in-page-transport.js';
import { DEFAULT_TRANSPORT_LIMITS, type TransportLimits } from './transport/types.js';

const log = logger.create('NavigationGuard');

export interface NavigationGuardOptions {
  wire?: HttpWire;
  /** Agent pages load scripts and images, so the body cap is larger than replay's */
  limits?: Partial<TransportLimits>;
  /** Called for every refused request */
  onBlocked?: (url: string, reasons: string[]) => void;
}

export interface NavigationGuardStats {
  allowed: number;
  blocked: number;
}

export class NavigationGuard {
  private readonly wire: HttpWire;
  private readonly limits: TransportLimits;
  private readonly stats: NavigationGuardStats = { allowed: 0, blocked: 0 };

  constructor(private readonly policy: EgressPolicy, private readonly options: NavigationGuardOptions = {}) {
    this.wire = options.wire ?? new NodeHttpWire();
    this.limits = {
      ...DEFAULT_TRANSPORT_LIMITS,
      maxResponseBytes: 16 * 1024 * 1024,
      timeoutMs: 30000,
      ...options.limits,
    };
  }

  /**
   * Install the guard; resolves to a function that removes it
   */
  async install(target: RequestInterceptor): Promise<() => Promise<void>> {
    return target.route((request) => this.decide(request.url, request.method, request.headers, request.body));
  }

  async decide(
    url: string,
    method: string,
    headers: Record<string, string>,
    body?: string
  ): Promise<RouteDecision> {
    try {
      const response = await guardedFetch(
        { url, method, headers, body, allowedDomains: [], followRedirects: true, returnRedirects: true },
        { policy: this.policy, wire: this.wire, limits: this.limits }
      );
      this.stats.allowed++;
      return { action: 'fulfill', status: response.status, headers: fulfillHeaders(response), body: response.buffer };
    } catch (error) {
      const recipeError = toRecipeError(error, 'egress');
      this.stats.blocked++;
      log.warn('Browser request blocked', { url: redactUrl(url), kind: recipeError.kind, reasons: recipeError.reasons });
      this.options.onBlocked?.(url, recipeError.reasons);
      return { action: 'abort', errorCode: 'blockedbyclient' };
    }
  }

  getStats(): NavigationGuardStats {
    return { ...this.stats };
  }
}
