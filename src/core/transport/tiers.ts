/**
 * Transport tiers - opens the transport for a tier, holding a session lease
 * for as long as the transport is in use
 */

import type { TransportKind } from '../../types/recipe.js';
import { RecipeError } from '../../types/errors.js';
import type { BrowserSessionPool } from '../browser-sessions.js';
import type { EgressPolicy } from '../egress-policy.js';
import { NodeHttpWire, type HttpWire } from './http-wire.js';
import { InPageTransport } from './in-page-transport.js';
import { SessionBoundTransport, cookieJarFromStorageState } from './session-bound-transport.js';
import { SessionFreeTransport } from './session-free-transport.js';
import { DEFAULT_TRANSPORT_LIMITS, type Transport, type TransportLimits } from './types.js';

export interface OpenTransport {
  transport: Transport;
  /** Idempotent; releases the session lease, if any */
  release(): Promise<void>;
}

export interface TransportProvider {
  open(kind: TransportKind, owner: string): Promise<OpenTransport>;
}

export interface TransportTiersOptions {
  policy: EgressPolicy;
  wire?: HttpWire;
  limits?: Partial<TransportLimits>;
  /** Needed for the session-bound and in-page tiers */
  sessions?: BrowserSessionPool;
}

export class TransportTiers implements TransportProvider {
  private readonly policy: EgressPolicy;
  private readonly wire: HttpWire;
  private readonly limits: TransportLimits;
  private readonly sessions?: BrowserSessionPool;
  private readonly sessionFree: SessionFreeTransport;

  constructor(options: TransportTiersOptions) {
    this.policy = options.policy;
    this.wire = options.wire ?? new NodeHttpWire();
    this.limits = { ...DEFAULT_TRANSPORT_LIMITS, ...options.limits };
    this.sessions = options.sessions;
    this.sessionFree = new SessionFreeTransport(this.policy, this.wire, this.limits);
  }

  getLimits(): TransportLimits {
    return { ...this.limits };
  }

  async open(kind: TransportKind, owner: string): Promise<OpenTransport> {
    if (kind === 'session-free') {
      return { transport: this.sessionFree, release: async () => {} };
    }

    if (!this.sessions) {
      throw new RecipeError('upstream-error', `Transport ${kind} needs a browser session pool`, {
        stage: 'session',
        reasons: ['no_session_pool'],
      });
    }

    const lease = await this.sessions.acquire(owner);
    try {
      const transport = kind === 'session-bound'
        ? new SessionBoundTransport(
          this.policy,
          await cookieJarFromStorageState(await lease.session.storageState()),
          this.wire,
          this.limits
        )
        : new InPageTransport(await lease.session.pageHost(), this.policy, this.wire, this.limits);
      return { transport, release: () => lease.release() };
    } catch (error) {
      await lease.release();
      throw error;
    }
  }
}

