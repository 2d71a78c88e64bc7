/**
 * Guarded fetch - the redirect loop every tier shares
 *
 * Each hop goes through the egress chain before anything is sent, connects to
 * the pinned addresses only, and is held to the same header, body and nesting
 * caps. The overall deadline covers all hops.
 */

import type { CookieJar } from 'tough-cookie';
import { RecipeError } from '../../types/errors.js';
import { toRecipeError } from '../../utils/error-envelope.js';
import { logger } from '../../utils/logger.js';
import { redactUrl } from '../../utils/redaction.js';
import type { EgressPolicy } from '../egress-policy.js';
import { assertNestingDepth, decompress } from './body-decoder.js';
import type { HttpWire, WireResponse } from './http-wire.js';
import { mediaType, type TransportLimits, type TransportRequest, type TransportResponse } from './types.js';

const log = logger.transport;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface GuardedFetchDeps {
  policy: EgressPolicy;
  wire: HttpWire;
  limits: TransportLimits;
  /** Cookie state for session-bound requests */
  jar?: CookieJar;
}

/**
 * Abort controller that fires on the caller's signal or on the deadline
 */
function deadlineController(timeoutMs: number, signal?: AbortSignal): {
  signal: AbortSignal;
  expired: () => boolean;
  dispose: () => void;
} {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  if (signal?.aborted === true) controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    expired: () => expired,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

function finish(
  response: WireResponse,
  finalUrl: string,
  redirects: number,
  limits: TransportLimits
): TransportResponse {
  const decoded = decompress(response.body, response.headers['content-encoding'], limits.maxResponseBytes);
  const text = decoded.toString('utf8');
  const contentType = mediaType(response.headers['content-type']);
  assertNestingDepth(text, contentType, limits.maxNestingDepth);

  return {
    status: response.status,
    headers: response.headers,
    body: text,
    buffer: decoded,
    bytes: decoded.length,
    setCookies: response.setCookies,
    redirects,
    finalUrl,
    contentType,
  };
}

export async function guardedFetch(
  request: TransportRequest,
  deps: GuardedFetchDeps,
  signal?: AbortSignal
): Promise<TransportResponse> {
  const { policy, wire, limits, jar } = deps;
  const deadline = deadlineController(limits.timeoutMs, signal);

  const chain = policy.beginChain({
    allowedDomains: request.allowedDomains,
    maxRedirects: limits.maxRedirects,
    followRedirects: request.followRedirects ?? true,
    fresh: request.fresh ?? false,
  });

  let method = request.method.toUpperCase();
  let body = request.body;
  const baseHeaders: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    baseHeaders[name.toLowerCase()] = value;
  }

  try {
    let target = await chain.admit(request.url);

    for (;;) {
      const headers = { ...baseHeaders };
      if (jar) {
        const cookie = await jar.getCookieString(target.url.href);
        if (cookie !== '') headers.cookie = cookie;
      }

      const response = await wire.send({
        url: target.url,
        method,
        headers,
        body,
        addresses: target.addresses,
        maxHeaderBytes: limits.maxHeaderBytes,
        maxRawBytes: limits.maxResponseBytes,
        timeoutMs: limits.timeoutMs,
        signal: deadline.signal,
      });

      if (response.headerBytes > limits.maxHeaderBytes) {
        throw new RecipeError('response-too-large', `Response headers exceed ${limits.maxHeaderBytes} bytes`, {
          stage: 'transport',
          reasons: ['header_bytes'],
        });
      }

      if (jar) {
        for (const setCookie of response.setCookies) {
          await jar.setCookie(setCookie, target.url.href, { ignoreError: true });
        }
      }

      const location = response.headers.location;
      if (REDIRECT_STATUSES.has(response.status) && location !== undefined) {
        const next = await chain.follow(location);
        if (request.returnRedirects === true) {
          return finish(response, target.url.href, chain.hopCount, limits);
        }
        target = next;
        log.debug('Following redirect', { status: response.status, url: redactUrl(target.url.href), hop: target.hop });

        if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === 'POST')) {
          method = 'GET';
          body = undefined;
          delete baseHeaders['content-type'];
        }
        continue;
      }

      return finish(response, target.url.href, chain.hopCount, limits);
    }
  } catch (error) {
    let failure: RecipeError;
    if (deadline.expired()) {
      failure = new RecipeError('timed-out', `Request did not complete within ${limits.timeoutMs}ms`, {
        stage: 'transport',
        reasons: ['deadline'],
        cause: error,
      });
    } else if (signal?.aborted === true) {
      failure = new RecipeError('timed-out', 'Request cancelled by caller', {
        stage: 'transport',
        reasons: ['cancelled'],
        cause: error,
      });
    } else {
      failure = toRecipeError(error, 'transport');
    }
    failure.redirectHops ??= chain.hopCount;
    throw failure;
  } finally {
    deadline.dispose();
  }
}
