import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArtifactStore } from '../../src/core/artifact-store.js';
import { EgressPolicy } from '../../src/core/egress-policy.js';
import { computeFingerprint } from '../../src/core/fingerprint.js';
import { LearningPipeline, exampleParameters, type LearningConfig } from '../../src/core/learning-pipeline.js';
import { RecipeHealthTracker } from '../../src/core/recipe-health.js';
import type { ReplayOptions, ReplayOutcome } from '../../src/core/recipe-runner.js';
import { RecipeStore } from '../../src/core/recipe-store.js';
import { RecipeVerifier, type VerifyOptions } from '../../src/core/recipe-verifier.js';
import { RequestMinimizer, type Replayer } from '../../src/core/request-minimizer.js';
import type { ShapeFingerprint } from '../../src/types/fingerprint.js';
import type { VerificationReport } from '../../src/types/pipeline.js';
import type { ModelClient, ModelRequest, ModelResult } from '../../src/types/analysis.js';
import { RecipeError } from '../../src/types/errors.js';
import type { ParameterSet, RecipeDefinition } from '../../src/types/recipe.js';
import type { RawExchange } from '../../src/types/recording.js';
import { FakeResolver, assetExchange, jsonExchange, recordingOf, searchRecipe } from '../helpers/fakes.js';

const TASK = 'search for browser automation';
const NOW = new Date('2026-01-01T00:00:00.000Z');

function searchResults(count: number) {
  return {
    results: Array.from({ length: count }, (_, i) => ({
      id: i + 1,
      title: `Browser automation result ${i + 1}`,
      url: `https://www.example.com/r/${i + 1}`,
    })),
  };
}

const SEARCH = 'https://api.example.com/api/search?q=browser+automation';
const SUGGEST = 'https://api.example.com/api/suggest?q=browser+automation';

function clearCut(): RawExchange[] {
  return [jsonExchange(SEARCH, searchResults(10)), assetExchange('https://www.example.com/logo.png', 'image/png', 'image')];
}

function ambiguous(): RawExchange[] {
  return [jsonExchange(SEARCH, searchResults(10)), jsonExchange(SUGGEST, searchResults(10))];
}

type Script = (definition: RecipeDefinition, parameters: ParameterSet) => ReplayOutcome;

class ScriptedReplayer implements Replayer {
  readonly calls: Array<{ url: string; parameters: ParameterSet; fresh: boolean | undefined }> = [];

  constructor(private readonly script: Script) {}

  async replay(definition: RecipeDefinition, parameters: ParameterSet, options: ReplayOptions = {}): Promise<ReplayOutcome> {
    this.calls.push({ url: definition.request.url, parameters, fresh: options.fresh });
    return this.script(definition, parameters);
  }
}

function succeed(data: unknown = searchResults(3)): Script {
  return () => ({
    ok: true,
    status: 200,
    data,
    truncated: false,
    fingerprint: computeFingerprint(data),
    transport: 'session-free',
    redirects: 0,
  });
}

const fail: Script = () => ({
  ok: false,
  status: 500,
  error: new RecipeError('upstream-error', 'Upstream answered 500', { stage: 'transport', reasons: ['http_500'] }),
  transport: 'session-free',
  authFailure: false,
});

/** Endpoint that answers 400 once the JSON accept header is gone */
const needsAccept: Script = (definition, parameters) =>
  definition.request.headers.accept === undefined
    ? {
        ok: false,
        status: 400,
        error: new RecipeError('upstream-error', 'Upstream answered 400', {
          stage: 'transport',
          reasons: ['http_400'],
          status: 400,
        }),
        transport: 'session-free',
        authFailure: false,
      }
    : succeed()(definition, parameters);

/** Verifies with a second search term the recording never saw */
class TwoTermVerifier extends RecipeVerifier {
  verify(definition: RecipeDefinition, baseline: ShapeFingerprint, options: VerifyOptions = {}): Promise<VerificationReport> {
    return super.verify(definition, baseline, {
      ...options,
      parameterSets: [{ query: 'browser automation' }, { query: 'playwright' }],
    });
  }
}

class SuggestModel implements ModelClient {
  readonly requests: ModelRequest[] = [];

  async complete(request: ModelRequest): Promise<ModelResult> {
    this.requests.push(request);
    return {
      kind: 'well-formed',
      text: JSON.stringify({
        candidateId: 'ex-0001',
        extractionOption: 0,
        name: 'api-suggest',
        description: 'Search suggestions',
        parameters: [{ name: 'query', queryKey: 'q' }],
        responseKind: 'json',
      }),
    };
  }
}

describe('LearningPipeline', () => {
  let dir: string;
  let store: RecipeStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'learning-'));
    store = new RecipeStore(path.join(dir, 'recipes'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function pipeline(
    replayer: Replayer,
    extra: {
      model?: ModelClient;
      artifacts?: ArtifactStore;
      verifier?: RecipeVerifier;
      minimizer?: RequestMinimizer;
      health?: RecipeHealthTracker;
    } = {},
    config: Partial<LearningConfig> = {}
  ): LearningPipeline {
    return new LearningPipeline(
      { policy: new EgressPolicy({}, new FakeResolver()), replayer, store, ...extra },
      { minimize: false, verify: false, ...config },
      () => NOW
    );
  }

  describe('heuristic path', () => {
    it('should save a draft for a clear-cut recording', async () => {
      const replayer = new ScriptedReplayer(succeed());
      const outcome = await pipeline(replayer).learn(recordingOf(TASK, clearCut()));

      expect(outcome.kind).toBe('saved-draft');
      if (outcome.kind !== 'saved-draft') return;
      expect(outcome.analysis.strategy).toBe('heuristic');
      expect(outcome.recipe.name).toBe('api-example-com-api-search');
      expect(outcome.recipe.status).toBe('draft');
      expect(outcome.recipe.sourceTask).toBe(TASK);
      expect(outcome.recipe.request.url).toBe('https://api.example.com/api/search?q={query}');
      expect(outcome.proof).toEqual({
        executedAt: '2026-01-01T00:00:00.000Z',
        status: 200,
        fingerprintDigest: computeFingerprint(searchResults(3)).digest,
        transport: 'session-free',
      });
      expect(replayer.calls).toEqual([
        { url: 'https://api.example.com/api/search?q={query}', parameters: { query: 'browser automation' }, fresh: true },
      ]);
      expect(await store.list()).toEqual(['api-example-com-api-search']);
    });

    it('should not save a draft whose baseline came back empty', async () => {
      const outcome = await pipeline(new ScriptedReplayer(succeed({}))).learn(recordingOf(TASK, clearCut()));
      expect(outcome.kind).toBe('needs-manual-selection');
      if (outcome.kind === 'needs-manual-selection') {
        expect(outcome.reasons).toEqual(['ex-0000:empty_result']);
        expect(outcome.error.kind).toBe('needs-manual-selection');
      }
      expect(await store.list()).toEqual([]);
    });

    it('should pick a free name when another recipe holds it', async () => {
      await store.save(
        searchRecipe({ name: 'api-example-com-api-search', parameters: [] }, { url: 'https://api.example.com/api/other' }),
        { executedAt: NOW.toISOString(), status: 200, fingerprintDigest: 'abc', transport: 'session-free' }
      );
      const outcome = await pipeline(new ScriptedReplayer(succeed())).learn(recordingOf(TASK, clearCut()));
      expect(outcome.kind === 'saved-draft' ? outcome.recipe.name : null).toBe('api-example-com-api-search-2');
    });

    it('should leave a verified recipe at the same URL untouched', async () => {
      const verification = {
        fingerprintDigest: 'abc',
        algorithmVersion: 'shape-v1',
        verifiedAt: NOW.toISOString(),
        transportHint: 'session-free' as const,
        requiresSession: false,
      };
      const health = new RecipeHealthTracker(store);
      const baseline = computeFingerprint(searchResults(1));
      await store.save(
        searchRecipe({ name: 'api-example-com-api-search' }, { url: 'https://api.example.com/api/search?q={query}' }),
        { executedAt: NOW.toISOString(), status: 200, fingerprintDigest: 'abc', transport: 'session-free' }
      );
      await store.updateStatus('api-example-com-api-search', 'verified', verification);
      await health.setStatus('api-example-com-api-search', 'verified', baseline);

      const outcome = await pipeline(new ScriptedReplayer(succeed()), { health }).learn(recordingOf(TASK, clearCut()));

      expect(outcome.kind === 'saved-draft' ? outcome.recipe.name : null).toBe('api-example-com-api-search-2');
      const kept = await store.load('api-example-com-api-search');
      expect(kept?.status).toBe('verified');
      expect(kept?.verification).toEqual(verification);
      const keptHealth = await store.loadHealth('api-example-com-api-search');
      expect(keptHealth?.status).toBe('verified');
      expect(keptHealth?.baseline).toEqual(baseline);
    });
  });

  describe('model-assisted path', () => {
    it('should route a narrow-margin recording to the model', async () => {
      const model = new SuggestModel();
      const outcome = await pipeline(new ScriptedReplayer(succeed()), { model }).learn(recordingOf(TASK, ambiguous()));

      expect(model.requests).toHaveLength(1);
      expect(outcome.kind).toBe('saved-draft');
      if (outcome.kind !== 'saved-draft') return;
      expect(outcome.analysis.strategy).toBe('model');
      expect(outcome.recipe.name).toBe('api-suggest');
      expect(outcome.recipe.request.url).toBe('https://api.example.com/api/suggest?q={query}');
      expect(outcome.recipe.request.extract).toBe('results[*].id');
    });

    it('should fall back to ranked candidates without a model', async () => {
      const outcome = await pipeline(new ScriptedReplayer(succeed())).learn(recordingOf(TASK, ambiguous()));
      expect(outcome.kind).toBe('saved-draft');
      if (outcome.kind === 'saved-draft') expect(outcome.analysis.strategy).toBe('heuristic');
    });

    it('should ask for manual selection when every candidate fails', async () => {
      const replayer = new ScriptedReplayer(fail);
      const outcome = await pipeline(replayer).learn(recordingOf(TASK, ambiguous()));

      expect(outcome.kind).toBe('needs-manual-selection');
      if (outcome.kind !== 'needs-manual-selection') return;
      expect(outcome.reasons.slice(0, 2)).toEqual(['heuristic:narrow_margin', 'model:model_unavailable']);
      expect(outcome.reasons.slice(2).sort()).toEqual(['ex-0000:http_500', 'ex-0001:http_500']);
      expect(replayer.calls).toHaveLength(2);
    });
  });

  describe('outcomes', () => {
    it('should report recordings with nothing to learn', async () => {
      const outcome = await pipeline(new ScriptedReplayer(succeed())).learn(recordingOf(TASK, []));
      expect(outcome).toEqual({ kind: 'not-recipe-able', reasons: ['no_candidates'] });
    });

    it('should stop when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const replayer = new ScriptedReplayer(succeed());
      const outcome = await pipeline(replayer).learn(recordingOf(TASK, clearCut()), { signal: controller.signal });
      expect(outcome.kind === 'needs-manual-selection' ? outcome.reasons : null).toEqual(['cancelled']);
      expect(replayer.calls).toHaveLength(0);
    });

    it('should write stage artifacts and clear the in-progress marker', async () => {
      const artifacts = new ArtifactStore(path.join(dir, 'artifacts'), { now: () => NOW });
      await pipeline(new ScriptedReplayer(succeed()), { artifacts }).learn(recordingOf(TASK, clearCut()));

      expect(await artifacts.list('task-1')).toEqual([
        'analysis-0.json',
        'baseline-0.json',
        'candidates-0.json',
        'draft-0.json',
        'recording-0.json',
      ]);
      expect(await artifacts.isInProgress('task-1')).toBe(false);
    });

    it('should minimize, save, verify and return the stored result', async () => {
      const replayer = new ScriptedReplayer(needsAccept);
      const health = new RecipeHealthTracker(store);
      const verifier = new TwoTermVerifier({ replayer, store, health }, {}, () => NOW.getTime());
      const artifacts = new ArtifactStore(path.join(dir, 'artifacts'), { now: () => NOW });
      const recording = recordingOf(TASK, [
        jsonExchange(SEARCH, searchResults(10), {
          requestHeaders: { accept: 'application/json', 'accept-language': 'en-US', 'x-requested-with': 'XMLHttpRequest' },
        }),
        assetExchange('https://www.example.com/logo.png', 'image/png', 'image'),
      ]);

      const outcome = await pipeline(
        replayer,
        { minimizer: new RequestMinimizer(replayer), verifier, health, artifacts },
        { minimize: true, verify: true }
      ).learn(recording);

      expect(outcome.kind).toBe('saved-draft');
      if (outcome.kind !== 'saved-draft') return;

      expect(outcome.minimization?.startedWith).toEqual({
        headers: ['accept', 'accept-language', 'x-requested-with'],
        queryKeys: [],
      });
      expect(outcome.minimization?.kept).toEqual({ headers: ['accept'], queryKeys: [] });
      expect(outcome.minimization?.removed).toEqual([
        { kind: 'header', name: 'accept-language' },
        { kind: 'header', name: 'x-requested-with' },
      ]);
      expect(outcome.minimization?.attempts).toBe(3);
      expect(outcome.minimization?.probes[0]).toEqual({
        field: { kind: 'header', name: 'accept' },
        removed: false,
        status: 400,
        matchScore: null,
        cached: false,
        errorKind: 'upstream-error',
      });

      expect(outcome.verification?.verdict).toBe('verified');
      expect(outcome.verification?.runs.map((run) => run.parameters)).toEqual([
        { query: 'browser automation' },
        { query: 'playwright' },
      ]);

      const stored = await store.load('api-example-com-api-search');
      expect(stored?.request.headers).toEqual({ accept: 'application/json' });
      expect(outcome.recipe).toEqual(stored);
      expect(outcome.recipe.status).toBe('verified');
      expect(outcome.recipe.verification).toEqual({
        fingerprintDigest: computeFingerprint(searchResults(3)).digest,
        algorithmVersion: computeFingerprint(searchResults(3)).algorithmVersion,
        verifiedAt: '2026-01-01T00:00:00.000Z',
        transportHint: 'session-free',
        requiresSession: false,
      });

      const written = await artifacts.read('task-1', 'verification', 0);
      expect(written?.payload).toMatchObject({ recipe: 'api-example-com-api-search', from: 'draft', to: 'verified' });
      expect(await artifacts.list('task-1')).toEqual([
        'analysis-0.json',
        'baseline-0.json',
        'candidates-0.json',
        'draft-0.json',
        'minimization-0.json',
        'recording-0.json',
        'verification-0.json',
        'verified-draft-0.json',
      ]);
      expect(replayer.calls).toHaveLength(6);
      expect((await store.loadHealth('api-example-com-api-search'))?.status).toBe('verified');
    });

    it('should hand the saved draft to the verifier', async () => {
      const replayer = new ScriptedReplayer(succeed());
      const health = new RecipeHealthTracker(store);
      const verifier = new RecipeVerifier({ replayer, store, health });
      const outcome = await pipeline(replayer, { verifier }, { verify: true }).learn(recordingOf(TASK, clearCut()));

      expect(outcome.kind).toBe('saved-draft');
      if (outcome.kind !== 'saved-draft') return;
      expect(outcome.verification?.verdict).toBe('needs-second-example');
      expect(outcome.recipe.status).toBe('draft');
    });
  });

  it('should take the first example of each caller parameter', () => {
    const recipe = searchRecipe();
    recipe.parameters.push({ name: 'locale', type: 'string', source: 'constant', required: true, default: 'en' });
    expect(exampleParameters(recipe)).toEqual({ query: 'browser automation' });
  });
});
