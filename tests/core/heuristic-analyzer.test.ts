import { describe, it, expect } from 'vitest';
import { rankCandidates } from '../../src/core/candidate-ranker.js';
import {
  analyzeHeuristically,
  draftFromCandidate,
  responseKindOf,
  suggestRecipeName,
} from '../../src/core/heuristic-analyzer.js';
import { assetExchange, jsonExchange, recordingOf } from '../helpers/fakes.js';

function searchResults(count: number) {
  return {
    results: Array.from({ length: count }, (_, i) => ({
      id: i + 1,
      title: `Browser automation result ${i + 1}`,
      url: `https://www.example.com/r/${i + 1}`,
    })),
  };
}

const TASK = 'search for browser automation';

describe('heuristic analyzer', () => {
  describe('clear-cut recordings', () => {
    const recording = recordingOf(
      TASK,
      [
        jsonExchange('https://api.example.com/api/search?q=browser+automation', searchResults(10)),
        assetExchange('https://www.example.com/logo.png', 'image/png', 'image'),
        { url: 'https://www.google-analytics.com/collect?v=1', method: 'GET', status: 204, resourceKind: 'fetch' },
      ],
      { finalUrl: 'https://www.example.com/search' }
    );

    it('should propose a draft for a dominant JSON GET', () => {
      const decision = analyzeHeuristically(recording, rankCandidates(recording));
      expect(decision.kind).toBe('proposed');
      if (decision.kind !== 'proposed') return;

      const { output } = decision;
      expect(output.strategy).toBe('heuristic');
      expect(output.candidateId).toBe('ex-0000');
      expect(output.name).toBe('api-example-com-api-search');
      expect(output.description).toBe(TASK);
      expect(output.request).toEqual({
        url: 'https://api.example.com/api/search?q={query}',
        method: 'GET',
        headers: { accept: 'application/json' },
        responseKind: 'json',
        extract: 'results[*].id',
      });
      expect(output.parameters).toEqual([
        {
          name: 'query',
          type: 'string',
          source: 'caller',
          description: 'Search query (q)',
          example: 'browser automation',
          required: true,
        },
      ]);
    });

    it('should decline when the thresholds are raised out of reach', () => {
      const decision = analyzeHeuristically(recording, rankCandidates(recording), { minScore: 1, minGap: 1 });
      expect(decision).toEqual({ kind: 'declined', reasons: ['low_score', 'narrow_margin'] });
    });
  });

  describe('ambiguous recordings', () => {
    it('should decline when two data requests score alike', () => {
      const recording = recordingOf(TASK, [
        jsonExchange('https://api.example.com/api/search?q=browser+automation', searchResults(10)),
        jsonExchange('https://api.example.com/api/suggest?q=browser+automation', searchResults(10)),
      ]);
      const decision = analyzeHeuristically(recording, rankCandidates(recording));
      expect(decision).toEqual({ kind: 'declined', reasons: ['narrow_margin'] });
    });

    it('should decline non-GET and non-JSON tops', () => {
      const recording = recordingOf(TASK, [
        jsonExchange('https://api.example.com/api/search', searchResults(10), {
          method: 'POST',
          requestBody: '{"q":"browser automation"}',
        }),
      ]);
      const decision = analyzeHeuristically(recording, rankCandidates(recording));
      expect(decision.kind).toBe('declined');
      if (decision.kind === 'declined') expect(decision.reasons).toContain('not_get');
    });

    it('should decline an empty candidate set', () => {
      const recording = recordingOf(TASK, []);
      expect(analyzeHeuristically(recording, rankCandidates(recording))).toEqual({
        kind: 'declined',
        reasons: ['no_candidates'],
      });
    });
  });

  describe('draftFromCandidate', () => {
    it('should carry a JSON request body for non-GET requests', () => {
      const recording = recordingOf(TASK, [
        jsonExchange('https://api.example.com/graphql', { data: { items: [] } }, {
          method: 'POST',
          requestBody: '{"query":"{ items }"}',
        }),
      ]);
      const [candidate] = rankCandidates(recording).candidates;
      const output = draftFromCandidate(recording, candidate, { strategy: 'model', confidence: 0.5, extract: null });
      expect(output?.request.body).toEqual({ query: '{ items }' });
      expect(output?.request.extract).toBeUndefined();
      expect(output?.parameters).toEqual([]);
    });

    it('should drop secret query pairs from the template', () => {
      const recording = recordingOf(TASK, [
        jsonExchange('https://api.example.com/api/items?page=2&api_key=test-secret', searchResults(2)),
      ]);
      const [candidate] = rankCandidates(recording).candidates;
      const output = draftFromCandidate(recording, candidate, { strategy: 'heuristic', confidence: 0.9 });
      expect(output?.request.url).toBe('https://api.example.com/api/items?page=2');
    });
  });

  describe('helpers', () => {
    it('should derive names from host and path', () => {
      expect(suggestRecipeName('https://API.example.com/v1/Items/', 'x')).toBe('api-example-com-v1-items');
      expect(suggestRecipeName('not a url', 'My Task!')).toBe('my-task');
    });

    it('should map content types to response kinds', () => {
      expect(responseKindOf('application/json')).toBe('json');
      expect(responseKindOf('text/html')).toBe('html');
      expect(responseKindOf('text/plain')).toBe('text');
    });
  });
});
