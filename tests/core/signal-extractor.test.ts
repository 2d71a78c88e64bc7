import { describe, it, expect } from 'vitest';
import {
  apiPathHint,
  cacheBusterKeys,
  classifyContent,
  extractSignals,
  isTelemetryHost,
  measureJson,
  overlapRatio,
  pageHostOf,
  summarizeStructure,
  tokenizeText,
  tokenizeUrl,
} from '../../src/core/signal-extractor.js';
import { documentExchange, jsonExchange, recordingOf } from '../helpers/fakes.js';

describe('signal extraction', () => {
  describe('tokens', () => {
    it('should keep lowercase tokens of three or more characters', () => {
      expect(tokenizeText('Search for Browser automation, a to')).toEqual(['search', 'for', 'browser', 'automation']);
    });

    it('should tokenize host, path, query keys and values', () => {
      expect(tokenizeUrl('https://api.example.com/v1/search?q=browser%20automation&_=123')).toEqual([
        'api',
        'example',
        'com',
        'search',
        'browser',
        'automation',
        '123',
      ]);
    });

    it('should measure overlap against the smaller set', () => {
      expect(overlapRatio(['abc', 'def'], ['abc'])).toBe(1);
      expect(overlapRatio(['abc', 'def', 'ghi', 'jkl'], ['abc', 'xyz'])).toBe(0.5);
      expect(overlapRatio([], ['abc'])).toBe(0);
    });
  });

  describe('content', () => {
    it('should classify bodies', () => {
      expect(classifyContent('application/json', '{}', 2)).toBe('json');
      expect(classifyContent('', '', 0)).toBe('empty');
      expect(classifyContent('image/png', 'x', 1)).toBe('image');
      expect(classifyContent('text/html', '<p>hi</p>', 9)).toBe('html');
      expect(classifyContent('text/plain', 'hello', 5)).toBe('text');
      expect(classifyContent('application/octet-stream', 'abc', 3)).toBe('binary');
    });

    it('should measure JSON structure', () => {
      const shape = measureJson({ results: [{ id: 1, name: 'a' }, { id: 2, name: 'b' }], total: 2 });
      expect(shape).toEqual({ root: 'object', nodes: 4, uniqueKeys: 4, depth: 2, hasList: true, listLength: 2 });
    });

    it('should summarize structure without values', () => {
      expect(summarizeStructure('application/json', '{"b":1,"a":"secretvalue"}')).toBe(
        'object(keys=[a,b]) sample={ a:string(len=11), b:int }'
      );
    });

    it('should hide sensitive key names in summaries', () => {
      expect(summarizeStructure('application/json', '{"token":"x"}')).toBe(
        'object(keys=[[REDACTED_KEY]]) sample={ [REDACTED_KEY]:string(len=1) }'
      );
    });

    it('should describe empty and text bodies', () => {
      expect(summarizeStructure('application/json', '')).toBe('no_body');
      expect(summarizeStructure('text/plain', 'one\ntwo')).toBe('text chars=7 lines~2');
    });
  });

  describe('url hints', () => {
    it('should score API-looking paths', () => {
      expect(apiPathHint('/api/items')).toBe(1);
      expect(apiPathHint('/v2/items')).toBe(0.6);
      expect(apiPathHint('/products/search-results')).toBe(0.7);
      expect(apiPathHint('/collect')).toBe(0);
      expect(apiPathHint('/about')).toBe(0);
    });

    it('should spot cache busters and telemetry hosts', () => {
      expect(cacheBusterKeys(['q', '_', 'ts'])).toEqual(['_', 'ts']);
      expect(isTelemetryHost('www.google-analytics.com')).toBe(true);
      expect(isTelemetryHost('api.example.com')).toBe(false);
    });
  });

  describe('extractSignals', () => {
    const recording = recordingOf('find widgets', [
      documentExchange('https://www.example.com/widgets', '<html><body>widgets</body></html>'),
      jsonExchange('https://www.example.com/api/widgets?page=1&_=99', { items: [{ id: 1 }] }, {
        startedAtMs: 100,
        durationMs: 50,
      }),
    ]);

    it('should find the page host from the last navigation', () => {
      expect(pageHostOf(recording)).toBe('www.example.com');
    });

    it('should produce one vector per exchange in order', () => {
      const signals = extractSignals(recording);
      expect(signals.map((s) => s.exchangeId)).toEqual(['ex-0000', 'ex-0001']);
      const api = signals[1];
      expect(api.host).toBe('www.example.com');
      expect(api.path).toBe('/api/widgets');
      expect(api.queryKeys).toEqual(['_', 'page']);
      expect(api.cacheBusterKeys).toEqual(['_']);
      expect(api.contentKind).toBe('json');
      expect(api.sameHostAsPage).toBe(true);
      expect(api.relativePosition).toBe(1);
      expect(signals[0].relativePosition).toBe(0);
      expect(api.json?.listLength).toBe(1);
    });
  });
});
