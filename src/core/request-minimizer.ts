/**
 * Request Minimizer - drops headers and query keys the endpoint ignores
 *
 * Known cache-busters and tracing headers are dropped up front. Then a
 * single pass over the remaining fields: remove one, replay, and keep the
 * removal only if the status stays 2xx and the result still matches the
 * baseline fingerprint. Probe outcomes are cached by request signature; the
 * pass stops at the attempt cap or the wall-clock budget, keeping whatever
 * was not yet tried. Host pacing comes from the replayer's rate limiter.
 */

import type { ShapeFingerprint } from '../types/fingerprint.js';
import type { MinimizationReport, ProbeField, ProbeRecord } from '../types/pipeline.js';
import type { ParameterSet, RecipeDefinition, TransportKind } from '../types/recipe.js';
import { TtlCache } from '../utils/cache.js';
import { canonicalJson, sha256 } from '../utils/hashing.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { compareFingerprints, DEFAULT_MATCH_THRESHOLD } from './fingerprint.js';
import { listPlaceholders } from './request-template.js';
import type { ReplayOptions, ReplayOutcome } from './recipe-runner.js';

const log = logger.minimizer;

export interface Replayer {
  replay(definition: RecipeDefinition, parameters: ParameterSet, options?: ReplayOptions): Promise<ReplayOutcome>;
}

/** Cache-busters; their values change on every page load */
const VOLATILE_QUERY_KEYS = new Set(['_', 'cb', 't', 'ts', 'timestamp', 'cachebuster', 'nocache', 'rnd']);

/** Per-request tracing headers */
const VOLATILE_HEADERS = new Set([
  'x-request-id',
  'x-correlation-id',
  'traceparent',
  'tracestate',
  'baggage',
  'sentry-trace',
  'b3',
  'x-b3-traceid',
  'x-b3-spanid',
  'x-b3-parentspanid',
  'x-b3-sampled',
  'x-amzn-trace-id',
  'x-cloud-trace-context',
]);

/**
 * Fields dropped without a replay: known volatile names with a fixed value
 */
export function isVolatileField(definition: RecipeDefinition, field: ProbeField): boolean {
  if (field.kind === 'query') return VOLATILE_QUERY_KEYS.has(field.name.toLowerCase());
  const value = definition.request.headers[field.name];
  return VOLATILE_HEADERS.has(field.name.toLowerCase()) && value !== undefined && listPlaceholders(value).length === 0;
}

export interface MinimizerConfig {
  maxAttempts: number;
  budgetMs: number;
  threshold: number;
}

export const DEFAULT_MINIMIZER_CONFIG: MinimizerConfig = {
  maxAttempts: 24,
  budgetMs: TIMEOUTS.MINIMIZER_BUDGET,
  threshold: DEFAULT_MATCH_THRESHOLD,
};

export interface MinimizeOptions {
  transport?: TransportKind;
  signal?: AbortSignal;
}

export interface MinimizeResult {
  definition: RecipeDefinition;
  report: MinimizationReport;
}

interface ProbeVerdict {
  keep: boolean;
  status: number | null;
  matchScore: number | null;
  errorKind?: ProbeRecord['errorKind'];
}

// ============================================
// URL TEMPLATE EDITING
// ============================================

function splitTemplate(template: string): { base: string; pairs: string[] } {
  const index = template.indexOf('?');
  if (index < 0) return { base: template, pairs: [] };
  return { base: template.slice(0, index), pairs: template.slice(index + 1).split('&').filter((p) => p !== '') };
}

function pairKey(pair: string): string {
  const raw = pair.split('=')[0];
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Query keys whose values are fixed; templated keys carry parameters and stay
 */
export function removableQueryKeys(template: string): string[] {
  return splitTemplate(template)
    .pairs.filter((pair) => listPlaceholders(pair).length === 0)
    .map(pairKey);
}

export function withoutQueryKey(template: string, key: string): string {
  const { base, pairs } = splitTemplate(template);
  const kept = pairs.filter((pair) => pairKey(pair) !== key);
  return kept.length > 0 ? `${base}?${kept.join('&')}` : base;
}

function withoutField(definition: RecipeDefinition, field: ProbeField): RecipeDefinition {
  const request = { ...definition.request };
  if (field.kind === 'header') {
    request.headers = Object.fromEntries(Object.entries(request.headers).filter(([name]) => name !== field.name));
  } else {
    request.url = withoutQueryKey(request.url, field.name);
  }
  return { ...definition, request };
}

export function requestSignature(definition: RecipeDefinition, parameters: ParameterSet): string {
  const { url, method, headers, body } = definition.request;
  return sha256(canonicalJson({ url, method, headers, body, parameters }));
}

// ============================================
// MINIMIZER
// ============================================

export class RequestMinimizer {
  private readonly config: MinimizerConfig;
  private readonly probes = new TtlCache<ProbeVerdict>({ ttlMs: 10 * 60 * 1000, maxEntries: 512 });

  constructor(
    private readonly replayer: Replayer,
    config: Partial<MinimizerConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_MINIMIZER_CONFIG, ...config };
  }

  private judge(outcome: ReplayOutcome, baseline: ShapeFingerprint): ProbeVerdict {
    if (!outcome.ok) {
      return { keep: false, status: outcome.status, matchScore: null, errorKind: outcome.error.kind };
    }
    const comparison = compareFingerprints(baseline, outcome.fingerprint, this.config.threshold);
    return {
      keep: outcome.status >= 200 && outcome.status <= 299 && comparison.matched,
      status: outcome.status,
      matchScore: comparison.score,
    };
  }

  async minimize(
    draft: RecipeDefinition,
    parameters: ParameterSet,
    baseline: ShapeFingerprint,
    options: MinimizeOptions = {}
  ): Promise<MinimizeResult> {
    const startedAt = this.now();
    const fields: ProbeField[] = [
      ...Object.keys(draft.request.headers).sort().map((name): ProbeField => ({ kind: 'header', name })),
      ...removableQueryKeys(draft.request.url).map((name): ProbeField => ({ kind: 'query', name })),
    ];

    let current = draft;
    let attempts = 0;
    let exhausted = false;
    const probes: ProbeRecord[] = [];
    const removed: ProbeField[] = [];

    for (const field of fields.filter((f) => isVolatileField(draft, f))) {
      current = withoutField(current, field);
      removed.push(field);
    }

    for (const field of fields.filter((f) => !isVolatileField(draft, f))) {
      if (options.signal?.aborted === true) {
        exhausted = true;
        break;
      }
      const candidate = withoutField(current, field);
      const signature = requestSignature(candidate, parameters);
      let verdict = this.probes.get(signature);
      const cached = verdict !== undefined;

      if (!verdict) {
        if (attempts >= this.config.maxAttempts || this.now() - startedAt >= this.config.budgetMs) {
          exhausted = true;
          break;
        }
        attempts++;
        const outcome = await this.replayer.replay(candidate, parameters, {
          ...(options.transport ? { transport: options.transport } : {}),
          ...(options.signal ? { signal: options.signal } : {}),
        });
        verdict = this.judge(outcome, baseline);
        this.probes.set(signature, verdict);
      }

      probes.push({
        field,
        removed: verdict.keep,
        status: verdict.status,
        matchScore: verdict.matchScore,
        cached,
        ...(verdict.errorKind ? { errorKind: verdict.errorKind } : {}),
      });
      if (verdict.keep) {
        current = candidate;
        removed.push(field);
      }
    }

    const report: MinimizationReport = {
      recipe: draft.name,
      startedWith: {
        headers: Object.keys(draft.request.headers).sort(),
        queryKeys: removableQueryKeys(draft.request.url),
      },
      kept: {
        headers: Object.keys(current.request.headers).sort(),
        queryKeys: removableQueryKeys(current.request.url),
      },
      removed,
      probes,
      attempts,
      exhausted,
      elapsedMs: this.now() - startedAt,
    };
    log.info('Minimization finished', {
      recipe: draft.name,
      removed: removed.length,
      attempts,
      exhausted,
    });
    return { definition: current, report };
  }
}
