import { describe, it, expect } from 'vitest';
import { EgressPolicy } from '../../src/core/egress-policy.js';
import { compareFingerprints, computeFingerprint } from '../../src/core/fingerprint.js';
import { RecipeCompiler } from '../../src/core/recipe-compiler.js';
import { RecipeRunner } from '../../src/core/recipe-runner.js';
import { RequestMinimizer, isVolatileField, removableQueryKeys, withoutQueryKey } from '../../src/core/request-minimizer.js';
import { TransportTiers } from '../../src/core/transport/tiers.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { FakeResolver, FakeWire, PUBLIC_IP, searchBody, searchRecipe, type FakeHandler } from '../helpers/fakes.js';

const CAPTURED_HEADERS = {
  accept: 'application/json',
  'accept-language': 'en-US',
  referer: 'https://www.example.com/search',
  'user-agent': 'Mozilla/5.0 (test)',
  'x-client': 'web',
  'x-requested-with': 'XMLHttpRequest',
};

function runnerFor(handler: FakeHandler): { runner: RecipeRunner; wire: FakeWire } {
  const policy = new EgressPolicy({}, new FakeResolver({ 'api.example.com': [PUBLIC_IP] }));
  const wire = new FakeWire(handler);
  const runner = new RecipeRunner({
    compiler: new RecipeCompiler({ policy }),
    transports: new TransportTiers({ policy, wire }),
    rateLimiter: new RateLimiter({ minSpacingMs: 0, bucketCapacity: 100, refillPerSecond: 1000 }),
  });
  return { runner, wire };
}

/** Endpoint that only needs a JSON accept header and the client marker */
const picky: FakeHandler = (request) => {
  const accept = request.headers.accept ?? '';
  if (!accept.includes('json') || request.headers['x-client'] !== 'web') return { status: 400, body: 'bad request' };
  return { body: searchBody(['a', 'b']) };
};

const baseline = computeFingerprint(['a', 'b']);
const draft = () => searchRecipe({}, { headers: { ...CAPTURED_HEADERS } });

describe('RequestMinimizer', () => {
  it('should reduce a six-header capture to the two headers the endpoint needs', async () => {
    const { runner } = runnerFor(picky);
    const minimizer = new RequestMinimizer(runner);
    const { definition, report } = await minimizer.minimize(draft(), { query: 'x' }, baseline);

    expect(definition.request.headers).toEqual({ accept: 'application/json', 'x-client': 'web' });
    expect(report.startedWith.headers).toHaveLength(6);
    expect(report.kept).toEqual({ headers: ['accept', 'x-client'], queryKeys: [] });
    expect(report.removed.map((field) => field.name)).toEqual([
      'accept-language',
      'referer',
      'user-agent',
      'x-requested-with',
    ]);
    expect(report.attempts).toBe(6);
    expect(report.exhausted).toBe(false);

    const acceptProbe = report.probes[0];
    expect(acceptProbe).toEqual({
      field: { kind: 'header', name: 'accept' },
      removed: false,
      status: 400,
      matchScore: null,
      cached: false,
      errorKind: 'upstream-error',
    });

    const replayed = await runner.replay(definition, { query: 'x' });
    expect(replayed.ok).toBe(true);
    if (replayed.ok) expect(compareFingerprints(baseline, replayed.fingerprint).matched).toBe(true);
  });

  it('should keep a field whose removal changes the result shape', async () => {
    const { runner } = runnerFor((request) => {
      if (request.headers['user-agent'] === undefined) return { body: { results: [{ title: 1 }] } };
      return { body: searchBody(['a', 'b']) };
    });
    const { definition, report } = await new RequestMinimizer(runner).minimize(draft(), { query: 'x' }, baseline);

    expect(Object.keys(definition.request.headers)).toEqual(['user-agent']);
    const probe = report.probes.find((p) => p.field.name === 'user-agent');
    expect(probe?.removed).toBe(false);
    expect(probe?.status).toBe(200);
    expect(probe?.matchScore).toBeCloseTo(1 / 3, 10);
  });

  it('should answer repeated probes from its cache', async () => {
    const { runner, wire } = runnerFor(picky);
    const minimizer = new RequestMinimizer(runner);
    await minimizer.minimize(draft(), { query: 'x' }, baseline);
    const second = await minimizer.minimize(draft(), { query: 'x' }, baseline);

    expect(second.report.attempts).toBe(0);
    expect(second.report.probes.every((probe) => probe.cached)).toBe(true);
    expect(wire.sent).toHaveLength(6);
  });

  it('should stop at the attempt cap and keep untried fields', async () => {
    const { runner } = runnerFor(picky);
    const { definition, report } = await new RequestMinimizer(runner, { maxAttempts: 2 }).minimize(
      draft(),
      { query: 'x' },
      baseline
    );
    expect(report.attempts).toBe(2);
    expect(report.exhausted).toBe(true);
    expect(report.probes).toHaveLength(2);
    expect(Object.keys(definition.request.headers)).toHaveLength(5);
  });

  it('should stop when the wall-clock budget is spent', async () => {
    const { runner, wire } = runnerFor(picky);
    let clock = 0;
    const minimizer = new RequestMinimizer(runner, { budgetMs: 1000 }, () => (clock += 600));
    const { report } = await minimizer.minimize(draft(), { query: 'x' }, baseline);
    expect(report.attempts).toBe(1);
    expect(report.exhausted).toBe(true);
    expect(wire.sent).toHaveLength(1);
  });

  it('should stop when cancelled', async () => {
    const { runner } = runnerFor(picky);
    const controller = new AbortController();
    controller.abort();
    const { report } = await new RequestMinimizer(runner).minimize(draft(), { query: 'x' }, baseline, {
      signal: controller.signal,
    });
    expect(report.attempts).toBe(0);
    expect(report.exhausted).toBe(true);
  });

  it('should probe fixed query keys but never templated ones', async () => {
    const { runner } = runnerFor(picky);
    const recipe = searchRecipe({}, {
      url: 'https://api.example.com/api/search?q={query}&lang=en',
      headers: { accept: 'application/json', 'x-client': 'web' },
    });
    const { definition, report } = await new RequestMinimizer(runner).minimize(recipe, { query: 'x' }, baseline);
    expect(definition.request.url).toBe('https://api.example.com/api/search?q={query}');
    expect(report.removed).toEqual([{ kind: 'query', name: 'lang' }]);
  });

  it('should drop cache-busters and tracing headers without replaying', async () => {
    const { runner, wire } = runnerFor(picky);
    const recipe = searchRecipe({}, {
      url: 'https://api.example.com/api/search?q={query}&_=1700000000&lang=en',
      headers: { ...CAPTURED_HEADERS, 'x-request-id': 'req-1', traceparent: '00-abc-def-01' },
    });
    const { definition, report } = await new RequestMinimizer(runner).minimize(recipe, { query: 'x' }, baseline);

    expect(report.removed.slice(0, 3)).toEqual([
      { kind: 'header', name: 'traceparent' },
      { kind: 'header', name: 'x-request-id' },
      { kind: 'query', name: '_' },
    ]);
    expect(report.attempts).toBe(7);
    expect(wire.sent).toHaveLength(7);
    expect(report.probes.map((probe) => probe.field.name)).toEqual([
      'accept',
      'accept-language',
      'referer',
      'user-agent',
      'x-client',
      'x-requested-with',
      'lang',
    ]);
    expect(definition.request.url).toBe('https://api.example.com/api/search?q={query}');
    expect(definition.request.headers).toEqual({ accept: 'application/json', 'x-client': 'web' });
  });

  it('should keep a tracing header that carries a parameter', () => {
    const recipe = searchRecipe({}, { headers: { 'x-request-id': '{query}', 'x-correlation-id': 'fixed' } });
    expect(isVolatileField(recipe, { kind: 'header', name: 'x-request-id' })).toBe(false);
    expect(isVolatileField(recipe, { kind: 'header', name: 'x-correlation-id' })).toBe(true);
    expect(isVolatileField(recipe, { kind: 'query', name: 'lang' })).toBe(false);
  });
});

describe('query template editing', () => {
  const template = 'https://api.example.com/x?q={query}&lang=en&_=1';

  it('should list keys with fixed values', () => {
    expect(removableQueryKeys(template)).toEqual(['lang', '_']);
    expect(removableQueryKeys('https://api.example.com/x')).toEqual([]);
  });

  it('should remove one key at a time', () => {
    expect(withoutQueryKey(template, 'lang')).toBe('https://api.example.com/x?q={query}&_=1');
    expect(withoutQueryKey('https://api.example.com/x?lang=en', 'lang')).toBe('https://api.example.com/x');
  });
});
