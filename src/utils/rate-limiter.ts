/**
 * Rate Limiter - Per-host throttling shared by replay probes and the runner
 *
 * Three budgets apply to every outbound call:
 * - a global concurrency ceiling
 * - a lower per-host concurrency ceiling
 * - a per-host token bucket with a minimum spacing between call starts
 *
 * Retries go through the same budget as fresh calls. A host left idle long
 * enough for its bucket to refill is forgotten; its next call starts from a
 * fresh, identical state.
 */

import { RecipeError } from '../types/errors.js';
import { logger } from './logger.js';
import { sleep } from './retry.js';

const log = logger.rateLimiter;

export interface RateLimitConfig {
  globalConcurrency: number;
  perHostConcurrency: number;
  bucketCapacity: number;
  refillPerSecond: number;
  minSpacingMs: number;
  /** Waiting longer than this fails with rate-limited */
  maxQueueWaitMs: number;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  globalConcurrency: 16,
  perHostConcurrency: 2,
  bucketCapacity: 4,
  refillPerSecond: 2,
  minSpacingMs: 250,
  maxQueueWaitMs: 10000,
};

interface Waiter {
  grant: () => void;
}

/**
 * Counting semaphore with FIFO waiters and deadline-bounded acquisition
 */
class Slots {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly limit: number) {}

  get inUse(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  async acquire(deadline: number, signal?: AbortSignal): Promise<boolean> {
    if (this.active < this.limit) {
      this.active++;
      return true;
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          this.active++;
          resolve(true);
        },
      };
      const giveUp = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        signal?.removeEventListener('abort', onAbort);
        resolve(false);
      };
      const onAbort = (): void => {
        clearTimeout(timer);
        giveUp();
      };
      const timer = setTimeout(giveUp, Math.max(0, deadline - Date.now()));
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    this.active = Math.max(0, this.active - 1);
    const next = this.waiters.shift();
    if (next) next.grant();
  }
}

interface HostState {
  slots: Slots;
  tokens: number;
  refilledAt: number;
  lastStartAt: number | null;
  totalCalls: number;
}

export interface HostRateStatus {
  host: string;
  active: number;
  queued: number;
  tokens: number;
  totalCalls: number;
}

export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly global: Slots;
  private readonly hosts: Map<string, HostState> = new Map();
  private readonly idleWindowMs: number;
  private sweptAt = 0;

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
    this.global = new Slots(this.config.globalConcurrency);
    this.idleWindowMs = Math.max(
      this.config.minSpacingMs,
      Math.ceil((this.config.bucketCapacity / this.config.refillPerSecond) * 1000)
    );
  }

  /**
   * Drop hosts with nothing running or queued whose bucket is full again
   */
  private evictIdle(now: number): void {
    if (now - this.sweptAt < this.idleWindowMs) return;
    this.sweptAt = now;
    for (const [host, state] of this.hosts) {
      if (state.slots.inUse > 0 || state.slots.queued > 0) continue;
      if (now - (state.lastStartAt ?? state.refilledAt) >= this.idleWindowMs) {
        this.hosts.delete(host);
        log.debug('Idle host forgotten', { host });
      }
    }
  }

  private normalizeHost(host: string): string {
    return host.toLowerCase();
  }

  private getHost(host: string): HostState {
    let state = this.hosts.get(host);
    if (!state) {
      state = {
        slots: new Slots(this.config.perHostConcurrency),
        tokens: this.config.bucketCapacity,
        refilledAt: Date.now(),
        lastStartAt: null,
        totalCalls: 0,
      };
      this.hosts.set(host, state);
    }
    return state;
  }

  private refill(state: HostState, now: number): void {
    const elapsedSeconds = (now - state.refilledAt) / 1000;
    state.tokens = Math.min(
      this.config.bucketCapacity,
      state.tokens + elapsedSeconds * this.config.refillPerSecond
    );
    state.refilledAt = now;
  }

  /**
   * Milliseconds until the host may start another call
   */
  private computeDelay(state: HostState, now: number): number {
    this.refill(state, now);
    const tokenWait = state.tokens >= 1
      ? 0
      : Math.ceil(((1 - state.tokens) / this.config.refillPerSecond) * 1000);
    const spacingWait = state.lastStartAt === null
      ? 0
      : Math.max(0, state.lastStartAt + this.config.minSpacingMs - now);
    return Math.max(tokenWait, spacingWait);
  }

  private rejection(host: string, suggestedDelayMs: number): RecipeError {
    return new RecipeError('rate-limited', `Local rate limit for ${host} exceeded`, {
      stage: 'transport',
      reasons: ['local_budget'],
      suggestedDelayMs,
    });
  }

  private queueFailure(host: string, signal?: AbortSignal): RecipeError {
    if (signal?.aborted === true) {
      return new RecipeError('timed-out', `Call to ${host} cancelled while queued`, {
        stage: 'transport',
        reasons: ['cancelled'],
      });
    }
    return this.rejection(host, this.config.minSpacingMs);
  }

  /**
   * Run `fn` once all budgets for `host` allow it
   */
  async schedule<T>(rawHost: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const host = this.normalizeHost(rawHost);
    this.evictIdle(Date.now());
    const state = this.getHost(host);
    const startedWaiting = Date.now();
    const deadline = startedWaiting + this.config.maxQueueWaitMs;

    if (!(await state.slots.acquire(deadline, signal))) {
      throw this.queueFailure(host, signal);
    }

    try {
      if (!(await this.global.acquire(deadline, signal))) {
        throw this.queueFailure(host, signal);
      }

      try {
        // Another waiter may have started while this one slept
        for (;;) {
          const delay = this.computeDelay(state, Date.now());
          if (delay === 0) break;
          if (Date.now() + delay > deadline) {
            throw this.rejection(host, delay);
          }
          log.debug('Waiting for host budget', { host, delayMs: delay });
          await sleep(delay, signal);
          if (signal?.aborted === true) break;
        }
        if (signal?.aborted === true) {
          throw this.queueFailure(host, signal);
        }

        this.refill(state, Date.now());
        state.tokens = Math.max(0, state.tokens - 1);
        state.lastStartAt = Date.now();
        state.totalCalls++;

        return await fn();
      } finally {
        this.global.release();
      }
    } finally {
      state.slots.release();
    }
  }

  getStatus(rawHost: string): HostRateStatus {
    const host = this.normalizeHost(rawHost);
    const state = this.getHost(host);
    this.refill(state, Date.now());
    return {
      host,
      active: state.slots.inUse,
      queued: state.slots.queued,
      tokens: state.tokens,
      totalCalls: state.totalCalls,
    };
  }

  /**
   * Hosts with budget state currently held
   */
  trackedHosts(): string[] {
    return [...this.hosts.keys()].sort();
  }

  getConfig(): RateLimitConfig {
    return { ...this.config };
  }
}
