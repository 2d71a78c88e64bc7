/**
 * Recipe Verifier - owns every status transition
 *
 * Promotion (draft or deprecated -> verified):
 * - parameterless recipes need consecutive matching replays
 * - parameterized recipes need matching replays across at least two distinct
 *   parameter sets; with only one set the recipe stays draft and the verdict
 *   is needs-second-example
 * - an auth-failure signal blocks promotion on that tier; the next tier up
 *   (with a session) is tried instead
 *
 * Demotion comes from runtime outcomes reported through `observe`: a
 * fingerprint mismatch on a verified recipe demotes it to draft at once, a
 * run of failures deprecates it. Deprecated recipes can be verified again.
 */

import { RecipeError } from '../types/errors.js';
import type { ShapeFingerprint } from '../types/fingerprint.js';
import type { VerificationReport, VerificationRun, VerificationVerdict } from '../types/pipeline.js';
import type { RecipeOutcome } from '../types/recipe-health.js';
import {
  TRANSPORT_ORDER,
  type ParameterSet,
  type RecipeDefinition,
  type RecipeStatus,
  type TransportKind,
  type VerificationSummary,
} from '../types/recipe.js';
import { canonicalJson } from '../utils/hashing.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { compareFingerprints, DEFAULT_MATCH_THRESHOLD } from './fingerprint.js';
import type { RecipeHealthTracker } from './recipe-health.js';
import type { RuntimeObserver } from './recipe-runner.js';
import type { Replayer } from './request-minimizer.js';

const log = logger.verifier;

export interface VerifierConfig {
  /** Matching replays needed for a parameterless recipe */
  requiredSuccesses: number;
  maxAttempts: number;
  budgetMs: number;
  threshold: number;
}

export const DEFAULT_VERIFIER_CONFIG: VerifierConfig = {
  requiredSuccesses: 2,
  maxAttempts: 6,
  budgetMs: TIMEOUTS.VERIFIER_BUDGET,
  threshold: DEFAULT_MATCH_THRESHOLD,
};

/**
 * Status writes; the recipe store implements it
 */
export interface StatusStore {
  load(name: string): Promise<RecipeDefinition | null>;
  updateStatus(name: string, status: RecipeStatus, verification?: VerificationSummary): Promise<RecipeDefinition>;
}

export interface VerifierDeps {
  replayer: Replayer;
  store: StatusStore;
  health: RecipeHealthTracker;
}

export interface VerifyOptions {
  /** Parameter sets to verify with; defaults to sets built from parameter examples */
  parameterSets?: ParameterSet[];
  /** Tiers to try, lowest risk first */
  transports?: TransportKind[];
  signal?: AbortSignal;
}

/**
 * Distinct parameter sets from the examples recorded on each parameter. Set i
 * takes the i-th example of every parameter (or its last one).
 */
export function parameterSetsFromExamples(definition: RecipeDefinition): ParameterSet[] {
  const params = definition.parameters.filter((p) => p.source !== 'constant');
  if (params.length === 0) return [{}];

  const width = Math.max(0, ...params.map((p) => p.examples?.length ?? 0));
  const sets: ParameterSet[] = [];
  for (let i = 0; i < width; i++) {
    const set: ParameterSet = {};
    let complete = true;
    for (const p of params) {
      const examples = p.examples ?? [];
      const value = examples[Math.min(i, examples.length - 1)] ?? p.default;
      if (value === undefined) {
        if (p.required) complete = false;
        continue;
      }
      set[p.name] = value;
    }
    if (complete) sets.push(set);
  }
  return distinctSets(sets);
}

export function distinctSets(sets: readonly ParameterSet[]): ParameterSet[] {
  const seen = new Set<string>();
  return sets.filter((set) => {
    const key = canonicalJson(set);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Status after a verification run that did not promote
 */
function statusAfterFailure(from: RecipeStatus, verdict: VerificationVerdict): RecipeStatus {
  if (from === 'verified' && verdict === 'mismatch') return 'draft';
  return from;
}

export class RecipeVerifier implements RuntimeObserver {
  private readonly config: VerifierConfig;

  constructor(
    private readonly deps: VerifierDeps,
    config: Partial<VerifierConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_VERIFIER_CONFIG, ...config };
  }

  getConfig(): VerifierConfig {
    return { ...this.config };
  }

  /**
   * Replay the recipe under controlled conditions and apply the resulting
   * transition. The recipe must already be stored.
   */
  async verify(
    definition: RecipeDefinition,
    baseline: ShapeFingerprint,
    options: VerifyOptions = {}
  ): Promise<VerificationReport> {
    const startedAt = this.now();
    const from = definition.status;
    const parameterized = definition.parameters.some((p) => p.source !== 'constant');
    const sets = distinctSets(options.parameterSets ?? parameterSetsFromExamples(definition));
    if (sets.length === 0) {
      throw new RecipeError('needs-second-example', `Recipe ${definition.name} has no usable parameter set`, {
        stage: 'verification',
        reasons: ['no_parameter_set'],
      });
    }

    const plan: ParameterSet[] = parameterized
      ? sets.slice(0, Math.max(2, this.config.requiredSuccesses))
      : Array.from({ length: this.config.requiredSuccesses }, () => sets[0]);
    const runs: VerificationRun[] = [];
    let attempts = 0;
    let verdict: VerificationVerdict = 'failed';
    let sawMismatch = false;
    let transportHint: TransportKind | null = null;

    for (const kind of options.transports ?? TRANSPORT_ORDER) {
      let tierVerdict: VerificationVerdict | null = null;
      let last: VerificationRun | undefined;

      for (const parameters of plan) {
        if (attempts >= this.config.maxAttempts || this.now() - startedAt >= this.config.budgetMs) {
          tierVerdict = 'budget-exhausted';
          break;
        }
        attempts++;
        last = await this.runOnce(definition, parameters, kind, baseline, options.signal);
        runs.push(last);
        if (!last.matched) {
          tierVerdict = last.comparison ? 'mismatch' : 'failed';
          break;
        }
      }

      if (tierVerdict === null) {
        transportHint = kind;
        verdict = parameterized && plan.length < 2 ? 'needs-second-example' : 'verified';
        break;
      }
      if (tierVerdict === 'mismatch') sawMismatch = true;
      verdict = sawMismatch && tierVerdict === 'failed' ? 'mismatch' : tierVerdict;
      if (!this.worthNextTier(tierVerdict, last, options.signal)) break;
    }

    const to: RecipeStatus = verdict === 'verified' ? 'verified' : statusAfterFailure(from, verdict);
    const requiresSession = transportHint !== null && transportHint !== 'session-free';
    await this.applyTransition(definition, from, to, verdict, baseline, transportHint, requiresSession);

    const report: VerificationReport = {
      recipe: definition.name,
      from,
      to,
      verdict,
      runs,
      transportHint,
      requiresSession,
      baseline,
      elapsedMs: this.now() - startedAt,
    };
    log.info('Verification finished', { recipe: definition.name, from, to, verdict, runs: runs.length });
    return report;
  }

  /**
   * A higher tier can fix a mismatch, an auth failure or an upstream error;
   * egress denials and rejected input fail the same way on every tier
   */
  private worthNextTier(verdict: VerificationVerdict, last: VerificationRun | undefined, signal?: AbortSignal): boolean {
    if (verdict === 'budget-exhausted' || signal?.aborted === true) return false;
    if (last?.errorKind === 'egress-denied') return false;
    if (last?.errorKind === 'validator-rejected') return last.reasons.includes('illegal_transport');
    return true;
  }

  private async runOnce(
    definition: RecipeDefinition,
    parameters: ParameterSet,
    kind: TransportKind,
    baseline: ShapeFingerprint,
    signal?: AbortSignal
  ): Promise<VerificationRun> {
    const outcome = await this.deps.replayer.replay(definition, parameters, {
      transport: kind,
      fresh: true,
      owner: `verify:${definition.name}`,
      ...(signal ? { signal } : {}),
    });
    if (!outcome.ok) {
      return {
        parameters,
        transport: outcome.transport,
        status: outcome.status,
        matched: false,
        comparison: null,
        errorKind: outcome.error.kind,
        reasons: [...outcome.error.reasons],
        authFailure: outcome.authFailure,
      };
    }
    const comparison = compareFingerprints(baseline, outcome.fingerprint, this.config.threshold);
    log.info('Verification replay compared', {
      recipe: definition.name,
      transport: kind,
      score: comparison.score,
      matched: comparison.matched,
    });
    return {
      parameters,
      transport: outcome.transport,
      status: outcome.status,
      matched: comparison.matched,
      comparison,
      reasons: comparison.matched ? [] : ['fingerprint_mismatch'],
      authFailure: false,
    };
  }

  private async applyTransition(
    definition: RecipeDefinition,
    from: RecipeStatus,
    to: RecipeStatus,
    verdict: VerificationVerdict,
    baseline: ShapeFingerprint,
    transportHint: TransportKind | null,
    requiresSession: boolean
  ): Promise<void> {
    if (to === 'verified' && transportHint !== null) {
      const summary: VerificationSummary = {
        fingerprintDigest: baseline.digest,
        algorithmVersion: baseline.algorithmVersion,
        verifiedAt: new Date(this.now()).toISOString(),
        transportHint,
        requiresSession,
      };
      await this.deps.store.updateStatus(definition.name, 'verified', summary);
      await this.deps.health.setStatus(definition.name, 'verified', baseline);
      return;
    }
    if (to !== from) {
      await this.deps.store.updateStatus(definition.name, to);
      await this.deps.health.setStatus(definition.name, to);
      log.warn('Recipe demoted after verification', { recipe: definition.name, from, to, verdict });
    }
  }

  // ============================================
  // RUNTIME OBSERVER
  // ============================================

  async baselineFor(definition: RecipeDefinition): Promise<ShapeFingerprint | null> {
    const health = await this.deps.health.get(definition.name, definition.status);
    return health.baseline;
  }

  async observe(definition: RecipeDefinition, outcome: RecipeOutcome, fingerprintDigest?: string): Promise<void> {
    const { transition } = await this.deps.health.record(definition.name, definition.status, outcome, fingerprintDigest);
    if (!transition) return;
    if (!(await this.deps.store.load(definition.name))) return;
    await this.deps.store.updateStatus(definition.name, transition.to);
  }
}
