import { describe, it, expect } from 'vitest';
import {
  NetworkRecorder,
  buildSessionRecording,
  normalizeExchange,
  type ObservedResponse,
  type ResponseSource,
} from '../../src/core/session-recorder.js';
import type { RawExchange } from '../../src/types/recording.js';

class FakeSource implements ResponseSource {
  private listener: ((response: ObservedResponse) => void) | null = null;

  subscribe(listener: (response: ObservedResponse) => void): () => void {
    this.listener = listener;
    return () => {
      this.listener = null;
    };
  }

  get attached(): boolean {
    return this.listener !== null;
  }

  emit(response: ObservedResponse): void {
    this.listener?.(response);
  }
}

function observed(url: string, overrides: Partial<ObservedResponse> = {}): ObservedResponse & { reads: number } {
  const response = {
    url,
    method: 'GET',
    status: 200,
    requestHeaders: {},
    responseHeaders: { 'content-type': 'application/json' },
    resourceType: 'fetch',
    durationMs: 12,
    reads: 0,
    readBody: async (): Promise<string> => {
      response.reads++;
      return '{"items":[]}';
    },
    ...overrides,
  };
  return response;
}

describe('session recorder', () => {
  describe('normalizeExchange', () => {
    const raw: RawExchange = {
      url: 'https://api.example.com/api/items?q=shoes&access_token=test-secret#top',
      method: 'get',
      status: 200,
      resourceKind: 'XHR',
      requestHeaders: { Authorization: 'Bearer test-secret', Accept: 'application/json' },
      responseHeaders: { 'Content-Type': 'application/json; charset=utf-8', 'Set-Cookie': 'sid=test-secret' },
      body: '{"items":[1],"password":"test-secret"}',
    };

    it('should redact secrets as the exchange is normalized', () => {
      const exchange = normalizeExchange(raw, 3);
      expect(exchange.id).toBe('ex-0003');
      expect(exchange.url).toBe('https://api.example.com/api/items?q=shoes&access_token=%5BREDACTED%5D');
      expect(exchange.method).toBe('GET');
      expect(exchange.resourceKind).toBe('xhr');
      expect(exchange.contentType).toBe('application/json');
      expect(exchange.requestHeaders).toEqual({ accept: 'application/json' });
      expect(exchange.responseHeaders).toEqual({ 'content-type': 'application/json; charset=utf-8' });
      expect(exchange.bodySample).toBe('{"items":[1],"password":"[REDACTED]"}');
      expect(exchange.bodySize).toBe(raw.body?.length);
      expect(exchange.initiator).toEqual({ kind: 'script' });
      expect(Object.isFrozen(exchange)).toBe(true);
    });

    it('should keep only the size of binary bodies', () => {
      const exchange = normalizeExchange(
        { url: 'https://www.example.com/logo.png', method: 'GET', status: 200, resourceKind: 'image', responseHeaders: { 'content-type': 'image/png' }, body: 'PNGDATA' },
        0
      );
      expect(exchange.bodySample).toBe('');
      expect(exchange.bodySize).toBe(7);
      expect(exchange.bodyTruncated).toBe(false);
      expect(exchange.initiator).toEqual({ kind: 'other' });
    });

    it('should bound body samples', () => {
      const exchange = normalizeExchange(
        { url: 'https://www.example.com/notes', method: 'GET', status: 200, responseHeaders: { 'content-type': 'text/plain' }, body: 'abcdefghijklmnop' },
        0,
        { maxExchanges: 10, maxSampleBytes: 10, maxRequestBodyBytes: 10 }
      );
      expect(exchange.bodySample).toBe('abcdefghij');
      expect(exchange.bodyTruncated).toBe(true);
      expect(exchange.bodySize).toBe(16);
      expect(exchange.resourceKind).toBe('other');
    });
  });

  describe('buildSessionRecording', () => {
    it('should keep network exchanges up to the bound and count the rest', () => {
      const exchanges: RawExchange[] = [
        { url: 'data:image/png;base64,AAAA', method: 'GET', status: 200 },
        { url: 'https://www.example.com/a', method: 'GET', status: 200 },
        { url: 'https://www.example.com/b', method: 'GET', status: 200 },
        { url: 'https://www.example.com/c', method: 'GET', status: 200 },
      ];
      const recording = buildSessionRecording(
        {
          taskId: 'task-7',
          task: 'find the opening hours',
          startedAt: '2026-01-01T00:00:00.000Z',
          finalAnswer: 'Used Bearer abcdefgh12345 to log in',
          exchanges,
        },
        { maxExchanges: 2, maxSampleBytes: 1024, maxRequestBodyBytes: 1024 }
      );

      expect(recording.exchanges.map((e) => e.url)).toEqual(['https://www.example.com/a', 'https://www.example.com/b']);
      expect(recording.exchanges.map((e) => e.id)).toEqual(['ex-0000', 'ex-0001']);
      expect(recording.droppedExchanges).toBe(1);
      expect(recording.finalAnswer).toBe('Used [REDACTED] to log in');
      expect(Object.isFrozen(recording)).toBe(true);
      expect(Object.isFrozen(recording.exchanges)).toBe(true);
    });
  });

  describe('NetworkRecorder', () => {
    it('should capture responses until finalized', async () => {
      const source = new FakeSource();
      const recorder = new NetworkRecorder('task-1', 'list items');
      recorder.attach(source);

      const redirect = observed('https://www.example.com/old', { status: 302, responseHeaders: { location: '/new' } });
      const image = observed('https://www.example.com/logo.png', { responseHeaders: { 'content-type': 'image/png' } });
      const data = observed('https://api.example.com/api/items');
      source.emit(redirect);
      source.emit(image);
      source.emit(data);
      source.emit(observed('blob:https://www.example.com/123'));

      const recording = await recorder.finalize({ finalUrl: 'https://www.example.com/new' });
      expect(source.attached).toBe(false);
      expect(recording.exchanges).toHaveLength(3);
      expect(recording.finalUrl).toBe('https://www.example.com/new');
      expect(redirect.reads).toBe(0);
      expect(image.reads).toBe(0);
      expect(data.reads).toBe(1);

      const captured = recording.exchanges.find((e) => e.url === 'https://api.example.com/api/items');
      expect(captured?.bodySample).toBe('{"items":[]}');
      expect(captured?.timing.durationMs).toBe(12);
    });

    it('should record an exchange whose body cannot be read', async () => {
      const source = new FakeSource();
      const recorder = new NetworkRecorder('task-1', 'list items');
      recorder.attach(source);
      source.emit(
        observed('https://api.example.com/api/items', {
          readBody: async () => {
            throw new Error('Response body is unavailable for redirect responses');
          },
        })
      );

      const recording = await recorder.finalize();
      expect(recording.exchanges[0].bodySample).toBe('');
      expect(recording.exchanges[0].bodySize).toBe(0);
    });

    it('should count exchanges beyond the bound as dropped', async () => {
      const source = new FakeSource();
      const recorder = new NetworkRecorder('task-1', 'list items', { maxExchanges: 1, maxSampleBytes: 1024, maxRequestBodyBytes: 1024 });
      recorder.attach(source);
      source.emit(observed('https://api.example.com/api/one'));
      source.emit(observed('https://api.example.com/api/two'));

      const recording = await recorder.finalize();
      expect(recording.exchanges.map((e) => e.url)).toEqual(['https://api.example.com/api/one']);
      expect(recording.droppedExchanges).toBe(1);
    });
  });
});
