/**
 * Browser Session Pool - reference-counted, bounded-lifetime sessions
 *
 * A session holds one browser context (cookies and storage) for one owner.
 * Sessions are created on demand, shared only between leases of the same
 * owner, closed after an idle timeout or their maximum lifetime, and closed
 * as soon as the last lease is released after expiry.
 *
 * Playwright is loaded lazily by the default factory; it is only needed when
 * a session is actually opened.
 */

import type { Browser, BrowserContext, Page } from 'playwright';
import { RecipeError } from '../types/errors.js';
import { toRecipeError } from '../utils/error-envelope.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import type { EgressPolicy } from './egress-policy.js';
import { NavigationGuard } from './navigation-guard.js';
import {
  fromPlaywrightPage,
  playwrightInterceptor,
  type InPageHost,
} from './transport/in-page-transport.js';
import type { StorageState } from './transport/session-bound-transport.js';

const log = logger.sessions;

// ============================================
// TYPES
// ============================================

export interface BrowserSession {
  storageState(): Promise<StorageState>;
  /** Page inside the session's context for the in-page tier */
  pageHost(): Promise<InPageHost>;
  close(): Promise<void>;
}

export type SessionFactory = (owner: string) => Promise<BrowserSession>;

export interface SessionLease {
  readonly owner: string;
  readonly session: BrowserSession;
  /** Idempotent */
  release(): Promise<void>;
}

export interface SessionPoolConfig {
  idleTimeoutMs: number;
  maxLifetimeMs: number;
}

export const DEFAULT_SESSION_POOL_CONFIG: SessionPoolConfig = {
  idleTimeoutMs: TIMEOUTS.SESSION_IDLE,
  maxLifetimeMs: TIMEOUTS.SESSION_MAX_LIFETIME,
};

interface PoolEntry {
  owner: string;
  ready: Promise<BrowserSession>;
  refs: number;
  createdAt: number;
  idleTimer: NodeJS.Timeout | null;
  lifetimeTimer: NodeJS.Timeout | null;
  /** No longer handed out; closes when refs reach zero */
  retired: boolean;
  closed: boolean;
}

export interface SessionPoolStats {
  open: number;
  leases: number;
  created: number;
  closed: number;
}

// ============================================
// POOL
// ============================================

export class BrowserSessionPool {
  private readonly config: SessionPoolConfig;
  private readonly entries: Map<string, PoolEntry> = new Map();
  private readonly retiring: Set<PoolEntry> = new Set();
  private created = 0;
  private closedCount = 0;

  constructor(
    private readonly factory: SessionFactory,
    config: Partial<SessionPoolConfig> = {}
  ) {
    this.config = { ...DEFAULT_SESSION_POOL_CONFIG, ...config };
  }

  async acquire(owner: string): Promise<SessionLease> {
    let entry = this.entries.get(owner);
    if (entry && Date.now() - entry.createdAt >= this.config.maxLifetimeMs) {
      await this.retire(entry);
      entry = undefined;
    }

    if (!entry) {
      entry = this.open(owner);
    }

    const current = entry;
    current.refs++;
    if (current.idleTimer) {
      clearTimeout(current.idleTimer);
      current.idleTimer = null;
    }

    let session: BrowserSession;
    try {
      session = await current.ready;
    } catch (error) {
      current.refs--;
      if (this.entries.get(owner) === current) this.entries.delete(owner);
      throw toRecipeError(error, 'session');
    }

    let released = false;
    return {
      owner,
      session,
      release: async () => {
        if (released) return;
        released = true;
        await this.releaseEntry(current);
      },
    };
  }

  private open(owner: string): PoolEntry {
    const entry: PoolEntry = {
      owner,
      ready: this.factory(owner),
      refs: 0,
      createdAt: Date.now(),
      idleTimer: null,
      lifetimeTimer: null,
      retired: false,
      closed: false,
    };
    entry.lifetimeTimer = setTimeout(() => {
      this.retire(entry).catch((error: unknown) => {
        log.error('Failed to retire session', { owner, error });
      });
    }, this.config.maxLifetimeMs);
    entry.lifetimeTimer.unref();
    this.entries.set(owner, entry);
    this.created++;
    log.debug('Session opened', { owner });
    return entry;
  }

  private async releaseEntry(entry: PoolEntry): Promise<void> {
    entry.refs = Math.max(0, entry.refs - 1);
    if (entry.refs > 0) return;

    if (entry.retired) {
      await this.close(entry);
      return;
    }

    entry.idleTimer = setTimeout(() => {
      this.close(entry).catch((error: unknown) => {
        log.error('Failed to close idle session', { owner: entry.owner, error });
      });
    }, this.config.idleTimeoutMs);
    entry.idleTimer.unref();
  }

  /**
   * Stop handing the entry out; close it now when unused
   */
  private async retire(entry: PoolEntry): Promise<void> {
    if (entry.retired) return;
    entry.retired = true;
    if (this.entries.get(entry.owner) === entry) this.entries.delete(entry.owner);
    if (entry.refs === 0) {
      await this.close(entry);
    } else {
      this.retiring.add(entry);
    }
  }

  private async close(entry: PoolEntry): Promise<void> {
    if (entry.closed) return;
    entry.closed = true;
    if (entry.idleTimer) clearTimeout(entry.idleTimer);
    if (entry.lifetimeTimer) clearTimeout(entry.lifetimeTimer);
    if (this.entries.get(entry.owner) === entry) this.entries.delete(entry.owner);
    this.retiring.delete(entry);
    this.closedCount++;

    try {
      const session = await entry.ready;
      await session.close();
      log.debug('Session closed', { owner: entry.owner });
    } catch (error) {
      log.warn('Session close failed', { owner: entry.owner, error: error instanceof Error ? error.message : String(error) });
    }
  }

  /**
   * Close every session regardless of outstanding leases
   */
  async closeAll(): Promise<void> {
    const all = [...this.entries.values(), ...this.retiring];
    await Promise.all(all.map((entry) => this.close(entry)));
  }

  getStats(): SessionPoolStats {
    let leases = 0;
    for (const entry of this.entries.values()) leases += entry.refs;
    for (const entry of this.retiring) leases += entry.refs;
    return {
      open: this.entries.size + this.retiring.size,
      leases,
      created: this.created,
      closed: this.closedCount,
    };
  }
}

// ============================================
// PLAYWRIGHT FACTORY
// ============================================

let playwrightModule: typeof import('playwright') | null = null;

async function loadPlaywright(): Promise<typeof import('playwright')> {
  if (playwrightModule) return playwrightModule;
  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    throw new RecipeError('upstream-error', 'Playwright is not available; browser tiers are disabled', {
      stage: 'session',
      reasons: ['browser_unavailable'],
      cause: error,
    });
  }
}

export interface PlaywrightSessionOptions {
  policy: EgressPolicy;
  headless?: boolean;
  /** Stored state for an owner, e.g. from an earlier login */
  loadStorageState?: (owner: string) => Promise<StorageState | undefined>;
}

/**
 * Session factory backed by one shared Chromium instance. Every context gets
 * the navigation guard before any page opens.
 */
export function createPlaywrightSessionFactory(options: PlaywrightSessionOptions): SessionFactory {
  let browser: Promise<Browser> | null = null;
  const guard = new NavigationGuard(options.policy);

  const getBrowser = (): Promise<Browser> => {
    if (!browser) {
      browser = loadPlaywright().then((pw) => pw.chromium.launch({ headless: options.headless ?? true }));
    }
    return browser;
  };

  return async (owner: string): Promise<BrowserSession> => {
    const instance = await getBrowser();
    const storageState = await options.loadStorageState?.(owner);
    const context: BrowserContext = await instance.newContext(storageState ? { storageState } : {});
    await guard.install(playwrightInterceptor(context));

    let page: Page | null = null;
    return {
      storageState: () => context.storageState(),
      pageHost: async () => {
        if (!page) page = await context.newPage();
        return fromPlaywrightPage(page);
      },
      close: () => context.close(),
    };
  };
}
