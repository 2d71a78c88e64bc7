/**
 * In-page tier: the request is issued by page script inside a live browser
 * context, for endpoints that depend on the page's own state.
 *
 * The browser never reaches the network directly. Every request the page
 * makes is intercepted and fulfilled through the same guarded fetch the other
 * tiers use, so egress rules and caps are identical. Redirects are refused by
 * default on this tier.
 */

import type { BrowserContext, Page, Route } from 'playwright';
import { RecipeError } from '../../types/errors.js';
import { toRecipeError } from '../../utils/error-envelope.js';
import { logger } from '../../utils/logger.js';
import { redactUrl } from '../../utils/redaction.js';
import type { EgressPolicy } from '../egress-policy.js';
import { guardedFetch } from './guarded-fetch.js';
import { NodeHttpWire, type HttpWire } from './http-wire.js';
import {
  DEFAULT_TRANSPORT_LIMITS,
  type Transport,
  type TransportLimits,
  type TransportRequest,
  type TransportResponse,
} from './types.js';

const log = logger.transport;

// ============================================
// HOST CONTRACT
// ============================================

export interface InterceptedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export type RouteDecision =
  | { action: 'fulfill'; status: number; headers: Record<string, string>; body: Buffer }
  | { action: 'abort'; errorCode: 'blockedbyclient' | 'failed' };

export type RouteHandler = (request: InterceptedRequest) => Promise<RouteDecision>;

export interface PageFetchRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface PageFetchResult {
  status: number;
  url: string;
  body: string;
}

export interface RequestInterceptor {
  /** Install an interceptor for every request; resolves to its removal */
  route(handler: RouteHandler): Promise<() => Promise<void>>;
}

/**
 * The slice of a browser page the in-page tier needs
 */
export interface InPageHost extends RequestInterceptor {
  /** Run fetch() in page script */
  runFetch(request: PageFetchRequest): Promise<PageFetchResult>;
}

// Headers the fulfilling side must recompute
const HOP_HEADERS = new Set(['content-encoding', 'content-length', 'transfer-encoding', 'connection']);

/**
 * Response headers to hand back to the browser; the body is already decoded
 */
export function fulfillHeaders(response: TransportResponse): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(response.headers)) {
    if (!HOP_HEADERS.has(name)) headers[name] = value;
  }
  if (response.setCookies.length > 0) {
    headers['set-cookie'] = response.setCookies.join('\n');
  }
  return headers;
}

export class InPageTransport implements Transport {
  readonly kind = 'in-page' as const;

  constructor(
    private readonly host: InPageHost,
    private readonly policy: EgressPolicy,
    private readonly wire: HttpWire = new NodeHttpWire(),
    private readonly limits: TransportLimits = DEFAULT_TRANSPORT_LIMITS
  ) {}

  async execute(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    const outcome: { denial: RecipeError | null; fulfilled: TransportResponse | null } = {
      denial: null,
      fulfilled: null,
    };
    const followRedirects = request.followRedirects ?? false;

    const unroute = await this.host.route(async (intercepted) => {
      try {
        const response = await guardedFetch(
          {
            url: intercepted.url,
            method: intercepted.method,
            headers: intercepted.headers,
            body: intercepted.body,
            allowedDomains: request.allowedDomains,
            followRedirects,
            fresh: request.fresh,
          },
          { policy: this.policy, wire: this.wire, limits: this.limits },
          signal
        );
        outcome.fulfilled = response;
        return { action: 'fulfill', status: response.status, headers: fulfillHeaders(response), body: response.buffer };
      } catch (error) {
        const denial = toRecipeError(error, 'transport');
        outcome.denial = denial;
        log.warn('In-page request blocked', { url: redactUrl(intercepted.url), kind: denial.kind });
        return { action: 'abort', errorCode: 'blockedbyclient' };
      }
    });

    try {
      await this.host.runFetch({
        url: request.url,
        method: request.method,
        headers: request.headers,
        body: request.body,
        timeoutMs: this.limits.timeoutMs,
      });
    } catch (error) {
      if (outcome.denial === null) {
        throw toRecipeError(error, 'transport');
      }
    } finally {
      await unroute();
    }

    if (outcome.denial !== null) {
      throw outcome.denial;
    }
    if (outcome.fulfilled === null) {
      throw new RecipeError('upstream-error', 'Page fetch completed without passing the request guard', {
        stage: 'transport',
        reasons: ['not_intercepted'],
      });
    }
    return outcome.fulfilled;
  }
}

// ============================================
// PLAYWRIGHT ADAPTER
// ============================================

/**
 * Route every request of a Playwright page or context through a handler
 */
export function playwrightInterceptor(target: Page | BrowserContext): RequestInterceptor {
  return {
    async route(handler: RouteHandler) {
      const onRoute = async (route: Route): Promise<void> => {
        const req = route.request();
        const decision = await handler({
          url: req.url(),
          method: req.method(),
          headers: await req.allHeaders(),
          body: req.postData() ?? undefined,
        });
        if (decision.action === 'fulfill') {
          await route.fulfill({ status: decision.status, headers: decision.headers, body: decision.body });
        } else {
          await route.abort(decision.errorCode);
        }
      };
      await target.route('**/*', onRoute);
      return async () => {
        await target.unroute('**/*', onRoute);
      };
    },
  };
}

/**
 * Adapt a Playwright page to the in-page host contract
 */
export function fromPlaywrightPage(page: Page): InPageHost {
  const interceptor = playwrightInterceptor(page);
  return {
    route: (handler) => interceptor.route(handler),

    async runFetch(request: PageFetchRequest) {
      return page.evaluate(async (args: PageFetchRequest) => {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), args.timeoutMs);
        try {
          const response = await fetch(args.url, {
            method: args.method,
            headers: args.headers,
            body: args.body,
            credentials: 'include',
            signal: controller.signal,
          });
          return { status: response.status, url: response.url, body: await response.text() };
        } finally {
          clearTimeout(timer);
        }
      }, request);
    },
  };
}
