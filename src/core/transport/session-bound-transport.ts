/**
 * Session-bound tier: HTTP carrying a browser session's cookies, without
 * running any page script
 */

import { Cookie, CookieJar } from 'tough-cookie';
import { logger } from '../../utils/logger.js';
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

/**
 * Cookie entry of a browser storage state
 */
export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds; -1 for session cookies */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export interface StorageState {
  cookies: StoredCookie[];
  origins: Array<{ origin: string; localStorage: Array<{ name: string; value: string }> }>;
}

/**
 * Build a cookie jar from a storage state snapshot
 */
export async function cookieJarFromStorageState(state: StorageState): Promise<CookieJar> {
  const jar = new CookieJar();
  for (const stored of state.cookies) {
    const hostOnly = !stored.domain.startsWith('.');
    const domain = stored.domain.replace(/^\./, '');
    const cookie = new Cookie({
      key: stored.name,
      value: stored.value,
      domain,
      path: stored.path || '/',
      secure: stored.secure,
      httpOnly: stored.httpOnly,
      hostOnly,
      expires: stored.expires > 0 ? new Date(stored.expires * 1000) : 'Infinity',
      sameSite: stored.sameSite.toLowerCase(),
    });
    const origin = `${stored.secure ? 'https' : 'http'}://${domain}${cookie.path ?? '/'}`;
    const saved = await jar.setCookie(cookie, origin, { ignoreError: true });
    if (!saved) {
      log.debug('Skipped stored cookie', { domain, name: stored.name });
    }
  }
  return jar;
}

export class SessionBoundTransport implements Transport {
  readonly kind = 'session-bound' as const;

  constructor(
    private readonly policy: EgressPolicy,
    private readonly jar: CookieJar,
    private readonly wire: HttpWire = new NodeHttpWire(),
    private readonly limits: TransportLimits = DEFAULT_TRANSPORT_LIMITS
  ) {}

  execute(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    return guardedFetch(
      request,
      { policy: this.policy, wire: this.wire, limits: this.limits, jar: this.jar },
      signal
    );
  }
}
