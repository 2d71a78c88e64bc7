/**
 * Session Recording Types
 *
 * A recording is the redacted network log of one browser task. Secrets are
 * removed before a recording object exists, and recordings are never mutated
 * after they are built.
 */

/**
 * Resource type reported by the browser, with an explicit catch-all
 */
export type ResourceKind =
  | 'fetch'
  | 'xhr'
  | 'document'
  | 'script'
  | 'stylesheet'
  | 'image'
  | 'font'
  | 'media'
  | 'websocket'
  | 'other';

export type InitiatorKind = 'script' | 'parser' | 'navigation' | 'other';

export interface ExchangeInitiator {
  kind: InitiatorKind;
  /** Document or script URL that started the request (redacted) */
  url?: string;
}

export interface ExchangeTiming {
  /** Milliseconds since the recording started */
  startedAtMs: number;
  durationMs: number;
}

/**
 * One request/response pair
 */
export interface RecordedExchange {
  /** Stable id within the recording, e.g. "ex-0007" */
  readonly id: string;
  readonly seq: number;
  readonly url: string;
  readonly method: string;
  readonly status: number;
  /** Lowercased media type without parameters, '' when absent */
  readonly contentType: string;
  readonly resourceKind: ResourceKind;
  readonly requestHeaders: Readonly<Record<string, string>>;
  readonly responseHeaders: Readonly<Record<string, string>>;
  readonly requestBody?: string;
  /** Full body size in bytes as received */
  readonly bodySize: number;
  /** Leading part of the decoded body, redacted */
  readonly bodySample: string;
  readonly bodyTruncated: boolean;
  readonly initiator: ExchangeInitiator;
  readonly timing: ExchangeTiming;
}

export interface SessionRecording {
  readonly taskId: string;
  readonly task: string;
  readonly startedAt: string;
  readonly finalUrl?: string;
  readonly finalAnswer?: string;
  readonly exchanges: readonly RecordedExchange[];
  /** Exchanges not kept because a bound was reached */
  readonly droppedExchanges: number;
}

/**
 * Unredacted exchange as handed over by an agent or captured from a page
 */
export interface RawExchange {
  url: string;
  method: string;
  status: number;
  requestHeaders?: Record<string, string>;
  responseHeaders?: Record<string, string>;
  requestBody?: string;
  body?: string;
  bodySize?: number;
  resourceKind?: string;
  initiator?: { kind?: string; url?: string };
  startedAtMs?: number;
  durationMs?: number;
}
