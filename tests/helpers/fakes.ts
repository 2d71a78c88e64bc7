/**
 * In-process stand-ins for the network, DNS and browser
 */

import type { BrowserSession, SessionFactory } from '../../src/core/browser-sessions.js';
import type { HostResolver, ResolvedAddress } from '../../src/core/dns-resolver.js';
import type { HttpWire, WireRequest, WireResponse } from '../../src/core/transport/http-wire.js';
import type {
  InPageHost,
  InterceptedRequest,
  PageFetchRequest,
  PageFetchResult,
  RouteHandler,
} from '../../src/core/transport/in-page-transport.js';
import type { StorageState } from '../../src/core/transport/session-bound-transport.js';
import { buildSessionRecording } from '../../src/core/session-recorder.js';
import { RecipeError } from '../../src/types/errors.js';
import type { RecipeDefinition, RecipeRequestTemplate } from '../../src/types/recipe.js';
import type { RawExchange, SessionRecording } from '../../src/types/recording.js';

// ============================================
// WIRE
// ============================================

export interface FakeReply {
  status?: number;
  headers?: Record<string, string>;
  /** Objects are sent as JSON */
  body?: string | Buffer | object;
  setCookies?: string[];
}

export type FakeHandler = (request: WireRequest) => FakeReply | Promise<FakeReply>;

export interface SentRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
  addresses: string[];
}

function headerBytes(headers: Record<string, string>, setCookies: string[]): number {
  let total = 0;
  for (const [name, value] of Object.entries(headers)) total += name.length + value.length;
  for (const cookie of setCookies) total += 'set-cookie'.length + cookie.length;
  return total;
}

/**
 * Wire that answers from a handler and records every request it was given
 */
export class FakeWire implements HttpWire {
  readonly sent: SentRequest[] = [];

  constructor(private readonly handler: FakeHandler = () => ({ status: 200, body: {} })) {}

  async send(request: WireRequest): Promise<WireResponse> {
    this.sent.push({
      url: request.url.href,
      method: request.method,
      headers: { ...request.headers },
      ...(request.body !== undefined ? { body: request.body } : {}),
      addresses: request.addresses.map((entry) => entry.address),
    });
    if (request.signal?.aborted === true) {
      throw new Error('aborted');
    }

    const reply = await this.handler(request);
    const raw = reply.body;
    const isJson = raw !== undefined && typeof raw !== 'string' && !Buffer.isBuffer(raw);
    const body = raw === undefined
      ? Buffer.alloc(0)
      : Buffer.isBuffer(raw) ? raw : Buffer.from(typeof raw === 'string' ? raw : JSON.stringify(raw), 'utf8');
    const headers: Record<string, string> = {
      ...(isJson ? { 'content-type': 'application/json' } : {}),
      ...Object.fromEntries(Object.entries(reply.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v])),
    };
    const setCookies = reply.setCookies ?? [];
    return {
      status: reply.status ?? 200,
      headers,
      setCookies,
      headerBytes: headerBytes(headers, setCookies),
      body,
    };
  }

  urls(): string[] {
    return this.sent.map((request) => request.url);
  }
}

// ============================================
// DNS
// ============================================

/**
 * Resolver answering from a fixed table; unknown hosts have no answers
 */
export class FakeResolver implements HostResolver {
  readonly lookups: string[] = [];

  constructor(private readonly table: Record<string, string[]> = {}) {}

  async resolve(host: string): Promise<ResolvedAddress[]> {
    this.lookups.push(host);
    return (this.table[host.toLowerCase()] ?? []).map((address) => ({
      address,
      family: address.includes(':') ? 6 : 4,
    }));
  }

  set(host: string, addresses: string[]): void {
    this.table[host] = addresses;
  }
}

export const PUBLIC_IP = '93.184.216.34';

// ============================================
// BROWSER
// ============================================

/**
 * Page stand-in: runFetch hands the request to the installed route handler,
 * the way a browser would before touching the network
 */
export class FakeInPageHost implements InPageHost {
  private handler: RouteHandler | null = null;
  readonly fetches: PageFetchRequest[] = [];
  /** Requests the page issues itself after the first one, e.g. a follow-up XHR */
  readonly extraRequests: InterceptedRequest[] = [];
  bypassRouting = false;

  async route(handler: RouteHandler): Promise<() => Promise<void>> {
    this.handler = handler;
    return async () => {
      this.handler = null;
    };
  }

  get routed(): boolean {
    return this.handler !== null;
  }

  async runFetch(request: PageFetchRequest): Promise<PageFetchResult> {
    this.fetches.push(request);
    const handler = this.handler;
    if (!handler || this.bypassRouting) {
      return { status: 200, url: request.url, body: '' };
    }

    for (const extra of this.extraRequests) {
      const decision = await handler(extra);
      if (decision.action === 'abort') throw new Error('TypeError: Failed to fetch');
    }

    const decision = await handler({
      url: request.url,
      method: request.method,
      headers: request.headers,
      ...(request.body !== undefined ? { body: request.body } : {}),
    });
    if (decision.action === 'abort') {
      throw new Error('TypeError: Failed to fetch');
    }
    return { status: decision.status, url: request.url, body: decision.body.toString('utf8') };
  }
}

export interface FakeSessionFactory {
  factory: SessionFactory;
  opened: string[];
  closed: string[];
}

export function fakeSessionFactory(
  host: InPageHost = new FakeInPageHost(),
  state: StorageState = { cookies: [], origins: [] }
): FakeSessionFactory {
  const opened: string[] = [];
  const closed: string[] = [];
  const factory: SessionFactory = async (owner) => {
    opened.push(owner);
    const session: BrowserSession = {
      storageState: async () => state,
      pageHost: async () => host,
      close: async () => {
        closed.push(owner);
      },
    };
    return session;
  };
  return { factory, opened, closed };
}

// ============================================
// RECORDINGS
// ============================================

export function jsonExchange(url: string, body: unknown, overrides: Partial<RawExchange> = {}): RawExchange {
  return {
    url,
    method: 'GET',
    status: 200,
    resourceKind: 'fetch',
    requestHeaders: { accept: 'application/json' },
    responseHeaders: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
    initiator: { kind: 'script' },
    ...overrides,
  };
}

export function assetExchange(url: string, contentType: string, resourceKind: string): RawExchange {
  return {
    url,
    method: 'GET',
    status: 200,
    resourceKind,
    responseHeaders: { 'content-type': contentType },
    body: 'x'.repeat(64),
  };
}

export function documentExchange(url: string, html: string): RawExchange {
  return {
    url,
    method: 'GET',
    status: 200,
    resourceKind: 'document',
    responseHeaders: { 'content-type': 'text/html; charset=utf-8' },
    body: html,
    initiator: { kind: 'navigation' },
  };
}

export function recordingOf(
  task: string,
  exchanges: RawExchange[],
  extra: { finalAnswer?: string; finalUrl?: string; taskId?: string } = {}
): SessionRecording {
  return buildSessionRecording({
    taskId: extra.taskId ?? 'task-1',
    task,
    startedAt: '2026-01-01T00:00:00.000Z',
    exchanges,
    ...(extra.finalAnswer !== undefined ? { finalAnswer: extra.finalAnswer } : {}),
    ...(extra.finalUrl !== undefined ? { finalUrl: extra.finalUrl } : {}),
  });
}

// ============================================
// RECIPES
// ============================================

/**
 * A search recipe against api.example.com; request fields override the
 * defaults one by one
 */
export function searchRecipe(
  overrides: Partial<Omit<RecipeDefinition, 'request'>> = {},
  request: Partial<RecipeRequestTemplate> = {}
): RecipeDefinition {
  return {
    name: 'api-search',
    description: 'Search the catalogue',
    request: {
      url: 'https://api.example.com/api/search?q={query}',
      method: 'GET',
      headers: { accept: 'application/json' },
      responseKind: 'json',
      extract: 'results[*].title',
      allowedDomains: ['api.example.com'],
      ...request,
    },
    parameters: [
      {
        name: 'query',
        type: 'string',
        source: 'caller',
        required: true,
        constraints: { maxLength: 256 },
        examples: ['browser automation'],
      },
    ],
    status: 'draft',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function searchBody(titles: string[]): { results: Array<{ id: number; title: string }> } {
  return { results: titles.map((title, i) => ({ id: i + 1, title })) };
}

// ============================================
// ASSERTIONS
// ============================================

/**
 * The RecipeError a promise rejects with
 */
export async function rejection(promise: Promise<unknown>): Promise<RecipeError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RecipeError) return error;
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

/**
 * The RecipeError a function throws
 */
export function thrown(fn: () => unknown): RecipeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof RecipeError) return error;
    throw error;
  }
  throw new Error('Expected the function to throw');
}
