/**
 * Session-free tier: plain HTTP with no cookies or stored state
 */

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

export class SessionFreeTransport implements Transport {
  readonly kind = 'session-free' as const;

  constructor(
    private readonly policy: EgressPolicy,
    private readonly wire: HttpWire = new NodeHttpWire(),
    private readonly limits: TransportLimits = DEFAULT_TRANSPORT_LIMITS
  ) {}

  execute(request: TransportRequest, signal?: AbortSignal): Promise<TransportResponse> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      if (name.toLowerCase() !== 'cookie') headers[name] = value;
    }
    return guardedFetch(
      { ...request, headers },
      { policy: this.policy, wire: this.wire, limits: this.limits },
      signal
    );
  }
}
