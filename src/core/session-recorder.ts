/**
 * Session Recorder - captures a browser task's network traffic
 *
 * Exchanges are redacted as they are normalized: sensitive headers are
 * dropped, secret-shaped URL parts and body values replaced, and body
 * samples bounded. The resulting SessionRecording is frozen.
 */

import type { Page, Response } from 'playwright';
import type {
  ExchangeInitiator,
  InitiatorKind,
  RawExchange,
  RecordedExchange,
  ResourceKind,
  SessionRecording,
} from '../types/recording.js';
import { logger } from '../utils/logger.js';
import { redactBody, redactHeaders, redactText, redactUrl, truncate } from '../utils/redaction.js';
import { mediaType } from './transport/types.js';

const log = logger.recorder;

export interface RecordingLimits {
  maxExchanges: number;
  /** Characters of body kept per exchange */
  maxSampleBytes: number;
  maxRequestBodyBytes: number;
}

export const DEFAULT_RECORDING_LIMITS: RecordingLimits = {
  maxExchanges: 200,
  maxSampleBytes: 64 * 1024,
  maxRequestBodyBytes: 8 * 1024,
};

const RESOURCE_KINDS: readonly ResourceKind[] = [
  'fetch', 'xhr', 'document', 'script', 'stylesheet', 'image', 'font', 'media', 'websocket', 'other',
];

const INITIATOR_KINDS: readonly InitiatorKind[] = ['script', 'parser', 'navigation', 'other'];

// Bodies worth sampling; binary payloads keep only their size
const TEXTUAL_TYPE = /json|html|xml|text|javascript|graphql/;

function toResourceKind(value: string | undefined): ResourceKind {
  const lowered = (value ?? '').toLowerCase();
  return RESOURCE_KINDS.find((kind) => kind === lowered) ?? 'other';
}

function toInitiator(raw: RawExchange['initiator'], resourceKind: ResourceKind): ExchangeInitiator {
  const fallback: InitiatorKind = resourceKind === 'document'
    ? 'navigation'
    : resourceKind === 'fetch' || resourceKind === 'xhr' ? 'script' : 'other';
  const kind = INITIATOR_KINDS.find((candidate) => candidate === raw?.kind) ?? fallback;
  return raw?.url ? { kind, url: redactUrl(raw.url) } : { kind };
}

function isNetworkUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}

function headerValue(headers: Record<string, string> | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}

/**
 * Normalize and redact one raw exchange
 */
export function normalizeExchange(
  raw: RawExchange,
  seq: number,
  limits: RecordingLimits = DEFAULT_RECORDING_LIMITS
): RecordedExchange {
  const resourceKind = toResourceKind(raw.resourceKind);
  const contentType = mediaType(headerValue(raw.responseHeaders, 'content-type'));
  const body = raw.body ?? '';
  const bodyTruncated = body.length > limits.maxSampleBytes;
  const sample = bodyTruncated ? body.slice(0, limits.maxSampleBytes) : body;
  const keepSample = body !== '' && (contentType === '' || TEXTUAL_TYPE.test(contentType));

  const exchange: RecordedExchange = {
    id: `ex-${String(seq).padStart(4, '0')}`,
    seq,
    url: redactUrl(raw.url),
    method: raw.method.toUpperCase(),
    status: raw.status,
    contentType,
    resourceKind,
    requestHeaders: Object.freeze(redactHeaders(raw.requestHeaders)),
    responseHeaders: Object.freeze(redactHeaders(raw.responseHeaders)),
    ...(raw.requestBody !== undefined && raw.requestBody !== ''
      ? { requestBody: redactBody(truncate(raw.requestBody, limits.maxRequestBodyBytes)) }
      : {}),
    bodySize: raw.bodySize ?? Buffer.byteLength(body),
    bodySample: keepSample ? redactBody(sample) : '',
    bodyTruncated: keepSample && bodyTruncated,
    initiator: toInitiator(raw.initiator, resourceKind),
    timing: {
      startedAtMs: Math.max(0, raw.startedAtMs ?? 0),
      durationMs: Math.max(0, raw.durationMs ?? 0),
    },
  };
  return Object.freeze(exchange);
}

export interface RecordingInput {
  taskId: string;
  task: string;
  startedAt?: string;
  finalUrl?: string;
  finalAnswer?: string;
  exchanges: readonly RawExchange[];
}

/**
 * Build an immutable recording from raw exchanges, e.g. ones handed over by
 * an external agent
 */
export function buildSessionRecording(
  input: RecordingInput,
  limits: RecordingLimits = DEFAULT_RECORDING_LIMITS
): SessionRecording {
  const network = input.exchanges.filter((raw) => isNetworkUrl(raw.url));
  const kept = network.slice(0, limits.maxExchanges);
  const exchanges = kept.map((raw, index) => normalizeExchange(raw, index, limits));

  const recording: SessionRecording = {
    taskId: input.taskId,
    task: input.task,
    startedAt: input.startedAt ?? new Date().toISOString(),
    ...(input.finalUrl !== undefined ? { finalUrl: redactUrl(input.finalUrl) } : {}),
    ...(input.finalAnswer !== undefined ? { finalAnswer: redactText(input.finalAnswer) } : {}),
    exchanges: Object.freeze(exchanges),
    droppedExchanges: network.length - kept.length,
  };
  return Object.freeze(recording);
}

// ============================================
// LIVE CAPTURE
// ============================================

/**
 * One observed response, before its body has been read
 */
export interface ObservedResponse {
  url: string;
  method: string;
  status: number;
  requestHeaders: Record<string, string>;
  responseHeaders: Record<string, string>;
  requestBody?: string;
  resourceType: string;
  durationMs: number;
  readBody(): Promise<string>;
}

export interface ResponseSource {
  /** Returns an unsubscribe function */
  subscribe(listener: (response: ObservedResponse) => void): () => void;
}

/**
 * Collects exchanges from a response source into a recording
 */
export class NetworkRecorder {
  private readonly raw: RawExchange[] = [];
  private readonly pending: Set<Promise<void>> = new Set();
  private readonly startedAt = Date.now();
  private readonly detachers: Array<() => void> = [];
  private dropped = 0;

  constructor(
    private readonly taskId: string,
    private readonly task: string,
    private readonly limits: RecordingLimits = DEFAULT_RECORDING_LIMITS
  ) {}

  attach(source: ResponseSource): void {
    this.detachers.push(source.subscribe((response) => this.observe(response)));
  }

  get size(): number {
    return this.raw.length;
  }

  private observe(response: ObservedResponse): void {
    if (!isNetworkUrl(response.url)) return;
    if (this.raw.length + this.pending.size >= this.limits.maxExchanges) {
      this.dropped++;
      return;
    }

    const startedAtMs = Date.now() - this.startedAt;
    const task: Promise<void> = this.capture(response, startedAtMs).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  private async capture(response: ObservedResponse, startedAtMs: number): Promise<void> {
    const contentType = mediaType(headerValue(response.responseHeaders, 'content-type'));
    const isRedirect = response.status >= 300 && response.status < 400;

    let body = '';
    if (!isRedirect && (contentType === '' || TEXTUAL_TYPE.test(contentType))) {
      try {
        body = await response.readBody();
      } catch (error) {
        log.debug('Response body unavailable', {
          url: redactUrl(response.url),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.raw.push({
      url: response.url,
      method: response.method,
      status: response.status,
      requestHeaders: response.requestHeaders,
      responseHeaders: response.responseHeaders,
      requestBody: response.requestBody,
      body,
      bodySize: Buffer.byteLength(body),
      resourceKind: response.resourceType,
      startedAtMs,
      durationMs: response.durationMs,
    });
  }

  /**
   * Detach, wait for outstanding body reads, and build the recording
   */
  async finalize(result: { finalUrl?: string; finalAnswer?: string } = {}): Promise<SessionRecording> {
    for (const detach of this.detachers.splice(0)) detach();
    await Promise.all([...this.pending]);

    const ordered = [...this.raw].sort((a, b) => (a.startedAtMs ?? 0) - (b.startedAtMs ?? 0));
    const recording = buildSessionRecording(
      {
        taskId: this.taskId,
        task: this.task,
        startedAt: new Date(this.startedAt).toISOString(),
        finalUrl: result.finalUrl,
        finalAnswer: result.finalAnswer,
        exchanges: ordered,
      },
      this.limits
    );
    log.info('Recording finalized', {
      taskId: this.taskId,
      exchanges: recording.exchanges.length,
      dropped: recording.droppedExchanges + this.dropped,
    });
    return Object.freeze({ ...recording, droppedExchanges: recording.droppedExchanges + this.dropped });
  }
}

/**
 * Response source for a Playwright page
 */
export function playwrightResponseSource(page: Page): ResponseSource {
  return {
    subscribe(listener) {
      const handler = (response: Response): void => {
        const request = response.request();
        const timing = request.timing();
        listener({
          url: response.url(),
          method: request.method(),
          status: response.status(),
          requestHeaders: request.headers(),
          responseHeaders: response.headers(),
          requestBody: request.postData() ?? undefined,
          resourceType: request.resourceType(),
          durationMs: timing.responseStart >= 0 ? timing.responseStart : 0,
          readBody: () => response.text(),
        });
      };
      page.on('response', handler);
      return () => {
        page.off('response', handler);
      };
    },
  };
}
