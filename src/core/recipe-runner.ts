/**
 * Recipe Runner - the online hot path
 *
 * compile-or-reuse -> bind parameters -> pick transport -> execute through the
 * egress policy -> extract -> compare against the baseline -> report.
 *
 * Retries only happen for retryable kinds (timed-out, rate-limited), never
 * for a cancelled call, and every attempt opens a fresh egress chain, so the
 * URL and its DNS answers are validated again.
 */

import { randomUUID } from 'node:crypto';
import { isRetryableKind, isRecipeError, classifyHttpStatus, RecipeError, type ErrorStage } from '../types/errors.js';
import type { ExecutionFailure, ExecutionResult, ExecutionSuccess, StageTimings } from '../types/execution.js';
import type { ShapeFingerprint } from '../types/fingerprint.js';
import type { RecipeOutcome } from '../types/recipe-health.js';
import type { ParameterSet, RecipeDefinition, TransportKind } from '../types/recipe.js';
import { TtlCache } from '../utils/cache.js';
import { toRecipeError, toStructuredError } from '../utils/error-envelope.js';
import { canonicalJson, sha256 } from '../utils/hashing.js';
import { logger } from '../utils/logger.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import { redactUrl } from '../utils/redaction.js';
import { withRetry } from '../utils/retry.js';
import { compareFingerprints, computeFingerprint, DEFAULT_MATCH_THRESHOLD } from './fingerprint.js';
import { bindParameters, type BoundRequest, type CompiledRecipe, type RecipeCompiler } from './recipe-compiler.js';
import { extractResponse } from './response-extractor.js';
import type { TransportProvider } from './transport/tiers.js';
import type { TransportResponse } from './transport/types.js';

const log = logger.runner;

const MAX_RETRY_AFTER_MS = 60000;

// ============================================
// TYPES
// ============================================

export interface RecipeSource {
  load(name: string): Promise<RecipeDefinition | null>;
}

/**
 * Receives runtime outcomes and supplies the promotion baseline. The verifier
 * implements it, since it owns status changes.
 */
export interface RuntimeObserver {
  baselineFor(definition: RecipeDefinition): Promise<ShapeFingerprint | null>;
  observe(definition: RecipeDefinition, outcome: RecipeOutcome, fingerprintDigest?: string): Promise<void>;
}

export interface RunnerRetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface RunnerConfig {
  retry: RunnerRetryConfig;
  idempotencyWindowMs: number;
  idempotencyCapacity: number;
  fingerprintThreshold: number;
  maxFingerprintDepth: number;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  retry: { maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 5000 },
  idempotencyWindowMs: 10 * 60 * 1000,
  idempotencyCapacity: 1000,
  fingerprintThreshold: DEFAULT_MATCH_THRESHOLD,
  maxFingerprintDepth: 6,
};

export interface RunnerDeps {
  compiler: RecipeCompiler;
  transports: TransportProvider;
  rateLimiter: RateLimiter;
  store?: RecipeSource;
  observer?: RuntimeObserver;
}

export interface ReplayOptions {
  transport?: TransportKind;
  /** Bypass cached DNS answers */
  fresh?: boolean;
  /** Session owner for the session-bound and in-page tiers; unset means a session of its own */
  owner?: string;
  signal?: AbortSignal;
}

export interface ExecuteOptions {
  idempotencyKey?: string;
  /** Unset means a session of its own, shared only by the retries */
  owner?: string;
  signal?: AbortSignal;
}

export type ReplayOutcome =
  | {
      ok: true;
      status: number;
      data: unknown;
      raw?: string;
      truncated: boolean;
      fingerprint: ShapeFingerprint;
      transport: TransportKind;
      redirects: number;
    }
  | {
      ok: false;
      status: number | null;
      error: RecipeError;
      transport: TransportKind | null;
      authFailure: boolean;
    };

interface IdempotencyEntry {
  inputHash: string;
  result: Promise<ExecutionResult>;
}

// ============================================
// HELPERS
// ============================================

function retryAfterMs(header: string | undefined): number | undefined {
  if (header === undefined) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.min(Math.max(0, date - Date.now()), MAX_RETRY_AFTER_MS);
}

/**
 * Non-2xx statuses become errors; 3xx only reach here when redirects are not
 * followed
 */
export function statusError(response: TransportResponse): RecipeError | null {
  if (response.status >= 200 && response.status <= 299) return null;
  const { kind, reason } = classifyHttpStatus(response.status);
  const suggestedDelayMs = kind === 'rate-limited' ? retryAfterMs(response.headers['retry-after']) : undefined;
  return new RecipeError(kind, `Upstream answered HTTP ${response.status}`, {
    stage: 'transport',
    reasons: [reason],
    status: response.status,
    redirectHops: response.redirects,
    ...(suggestedDelayMs !== undefined ? { suggestedDelayMs } : {}),
  });
}

export function isAuthFailure(error: unknown): boolean {
  return isRecipeError(error) && error.reasons.includes('auth_failure');
}

function isCancelled(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true || (isRecipeError(error) && error.reasons.includes('cancelled'));
}

/**
 * Tier to run on: the proven hint when it is still legal, else the lowest
 * legal tier
 */
export function chooseTransport(compiled: CompiledRecipe, definition: RecipeDefinition): TransportKind {
  const hint = definition.verification?.transportHint;
  if (hint !== undefined && compiled.legalTransports.includes(hint)) return hint;
  return compiled.legalTransports[0];
}

function hostOf(url: string): string {
  return new URL(url).hostname;
}

// ============================================
// RUNNER
// ============================================

export class RecipeRunner {
  private readonly config: RunnerConfig;
  private readonly idempotency: TtlCache<IdempotencyEntry>;

  constructor(
    private readonly deps: RunnerDeps,
    config: Partial<RunnerConfig> = {}
  ) {
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.idempotency = new TtlCache<IdempotencyEntry>({
      ttlMs: this.config.idempotencyWindowMs,
      maxEntries: this.config.idempotencyCapacity,
    });
  }

  getConfig(): RunnerConfig {
    return { ...this.config };
  }

  /**
   * One transport call under the shared host budget; the session lease is
   * released however the call ends
   */
  private async send(
    bound: BoundRequest,
    compiled: CompiledRecipe,
    kind: TransportKind,
    options: { fresh: boolean; owner: string; signal?: AbortSignal }
  ): Promise<TransportResponse> {
    return this.deps.rateLimiter.schedule(
      hostOf(bound.url),
      async () => {
        const open = await this.deps.transports.open(kind, options.owner);
        try {
          const response = await open.transport.execute(
            {
              url: bound.url,
              method: bound.method,
              headers: bound.headers,
              ...(bound.body !== undefined ? { body: bound.body } : {}),
              allowedDomains: compiled.allowedDomains,
              fresh: options.fresh,
            },
            options.signal
          );
          const failure = statusError(response);
          if (failure) throw failure;
          return response;
        } finally {
          await open.release();
        }
      },
      options.signal
    );
  }

  /**
   * Single attempt without retries or health reporting. Used by the
   * minimizer, the verifier and the learning pipeline.
   */
  async replay(definition: RecipeDefinition, parameters: ParameterSet, options: ReplayOptions = {}): Promise<ReplayOutcome> {
    let transport: TransportKind | null = null;
    try {
      const { compiled } = this.deps.compiler.compile(definition);
      const bound = bindParameters(compiled, parameters);
      const kind = options.transport ?? chooseTransport(compiled, definition);
      if (!compiled.legalTransports.includes(kind)) {
        throw new RecipeError('validator-rejected', `Transport ${kind} is not legal for ${definition.name}`, {
          stage: 'runner',
          reasons: ['illegal_transport'],
        });
      }
      transport = kind;

      const response = await this.send(bound, compiled, kind, {
        fresh: options.fresh ?? false,
        owner: options.owner ?? randomUUID(),
        ...(options.signal ? { signal: options.signal } : {}),
      });
      const extracted = extractResponse(compiled, response.body);
      return {
        ok: true,
        status: response.status,
        data: extracted.data,
        ...(extracted.raw !== undefined ? { raw: extracted.raw } : {}),
        truncated: extracted.truncated,
        fingerprint: computeFingerprint(extracted.data, { maxDepth: this.config.maxFingerprintDepth }),
        transport: kind,
        redirects: response.redirects,
      };
    } catch (error) {
      const recipeError = toRecipeError(error, 'runner');
      return {
        ok: false,
        status: recipeError.status ?? null,
        error: recipeError,
        transport,
        authFailure: isAuthFailure(recipeError),
      };
    }
  }

  /**
   * Execute a stored recipe by name, or a definition directly
   */
  async execute(
    target: string | RecipeDefinition,
    parameters: ParameterSet = {},
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const name = typeof target === 'string' ? target : target.name;
    const key = options.idempotencyKey;
    if (key === undefined) return this.run(target, parameters, options);

    const inputHash = sha256(`${name}\n${canonicalJson(parameters)}`);
    const existing = this.idempotency.get(key);
    if (existing) {
      if (existing.inputHash !== inputHash) {
        const reused = new RecipeError('validator-rejected', 'Idempotency key was used with a different input', {
          stage: 'runner',
          reasons: ['idempotency_key_reused'],
        });
        return this.failure(name, Date.now(), reused, { stage: 'runner' });
      }
      log.debug('Idempotent replay', { recipe: name });
      return { ...(await existing.result), idempotentReplay: true };
    }

    const result = this.run(target, parameters, options);
    this.idempotency.set(key, { inputHash, result });
    return result;
  }

  private failure(
    recipe: string,
    startedAt: number,
    error: unknown,
    context: {
      stage: ErrorStage;
      transport?: TransportKind | null;
      attempts?: number;
      cacheHit?: boolean;
      redirectHops?: number;
      timings?: Omit<StageTimings, 'total'>;
      signal?: AbortSignal;
    }
  ): ExecutionFailure {
    const structured = toStructuredError(error, context.stage);
    if (isCancelled(error, context.signal)) structured.retryable = false;
    return {
      success: false,
      recipe,
      transport: context.transport ?? null,
      redirectHops: context.redirectHops ?? (isRecipeError(error) ? error.redirectHops ?? 0 : 0),
      attempts: context.attempts ?? 0,
      cacheHit: context.cacheHit ?? false,
      idempotentReplay: false,
      timings: { ...context.timings, total: Date.now() - startedAt },
      status: structured.status ?? null,
      error: structured,
      authRecoveryRequired: isAuthFailure(error),
    };
  }

  private async run(target: string | RecipeDefinition, parameters: ParameterSet, options: ExecuteOptions): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const name = typeof target === 'string' ? target : target.name;
    const timings: Omit<StageTimings, 'total'> = {};

    let definition: RecipeDefinition;
    let compiled: CompiledRecipe;
    let cacheHit: boolean;
    let bound: BoundRequest;
    try {
      definition = typeof target === 'string' ? await this.load(target) : target;
      const compileStart = Date.now();
      ({ compiled, cacheHit } = this.deps.compiler.compile(definition));
      bound = bindParameters(compiled, parameters);
      timings.compile = Date.now() - compileStart;
    } catch (error) {
      return this.failure(name, startedAt, error, { stage: 'compile', timings });
    }

    const kind = chooseTransport(compiled, definition);
    const owner = options.owner ?? randomUUID();
    let attempts = 0;
    let response: TransportResponse;
    const transportStart = Date.now();
    try {
      const outcome = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.send(bound, compiled, kind, {
            fresh: attempt > 1,
            owner,
            ...(options.signal ? { signal: options.signal } : {}),
          });
        },
        {
          ...this.config.retry,
          ...(options.signal ? { signal: options.signal } : {}),
          retryOn: (error) => isRecipeError(error) && isRetryableKind(error.kind) && !isCancelled(error, options.signal),
          delayFor: (error) => (isRecipeError(error) ? error.suggestedDelayMs : undefined),
        }
      );
      response = outcome.value;
      timings.transport = Date.now() - transportStart;
    } catch (error) {
      timings.transport = Date.now() - transportStart;
      await this.report(definition, {
        kind: 'failure',
        at: Date.now(),
        transport: kind,
        errorKind: toRecipeError(error, 'transport').kind,
      });
      log.warn('Recipe call failed', { recipe: name, url: redactUrl(bound.url), attempts });
      return this.failure(name, startedAt, error, {
        stage: 'transport',
        transport: kind,
        attempts,
        cacheHit,
        timings,
        ...(options.signal ? { signal: options.signal } : {}),
      });
    }

    const extractStart = Date.now();
    let extracted: ReturnType<typeof extractResponse>;
    try {
      extracted = extractResponse(compiled, response.body);
      timings.extraction = Date.now() - extractStart;
    } catch (error) {
      timings.extraction = Date.now() - extractStart;
      await this.report(definition, {
        kind: 'failure',
        at: Date.now(),
        transport: kind,
        errorKind: toRecipeError(error, 'extraction').kind,
      });
      return this.failure(name, startedAt, error, {
        stage: 'extraction',
        transport: kind,
        attempts,
        cacheHit,
        redirectHops: response.redirects,
        timings,
      });
    }

    const fingerprint = computeFingerprint(extracted.data, { maxDepth: this.config.maxFingerprintDepth });
    let baseline: ShapeFingerprint | null;
    try {
      baseline = this.deps.observer ? await this.deps.observer.baselineFor(definition) : null;
    } catch (error) {
      log.error('Baseline lookup failed', { recipe: name, error: error instanceof Error ? error.message : String(error) });
      const unavailable = new RecipeError('upstream-error', `Baseline for ${name} could not be read`, {
        stage: 'fingerprint',
        reasons: ['baseline_unavailable'],
        cause: error,
      });
      return this.failure(name, startedAt, unavailable, {
        stage: 'fingerprint',
        transport: kind,
        attempts,
        cacheHit,
        redirectHops: response.redirects,
        timings,
      });
    }
    let fingerprintMatch: boolean | null = null;
    let matchScore: number | null = null;
    if (baseline) {
      const comparison = compareFingerprints(baseline, fingerprint, this.config.fingerprintThreshold);
      fingerprintMatch = comparison.matched;
      matchScore = comparison.score;
      log.info('Fingerprint compared', {
        recipe: name,
        score: comparison.score,
        matched: comparison.matched,
        missingRequired: comparison.missingRequired.length,
      });
    }
    await this.report(
      definition,
      {
        kind: fingerprintMatch === false ? 'fingerprint-mismatch' : 'success',
        at: Date.now(),
        transport: kind,
        ...(matchScore !== null ? { matchScore } : {}),
      },
      fingerprint.digest
    );

    const result: ExecutionSuccess = {
      success: true,
      recipe: name,
      transport: kind,
      redirectHops: response.redirects,
      attempts,
      cacheHit,
      idempotentReplay: false,
      timings: { ...timings, total: Date.now() - startedAt },
      status: response.status,
      data: extracted.data,
      ...(extracted.raw !== undefined ? { raw: extracted.raw } : {}),
      truncated: extracted.truncated,
      fingerprintMatch,
      matchScore,
    };
    log.info('Recipe executed', { recipe: name, status: response.status, transport: kind, totalMs: result.timings.total });
    return result;
  }

  private async load(name: string): Promise<RecipeDefinition> {
    const definition = this.deps.store ? await this.deps.store.load(name) : null;
    if (!definition) {
      throw new RecipeError('validator-rejected', `Recipe ${name} does not exist`, {
        stage: 'runner',
        reasons: ['recipe_missing'],
      });
    }
    return definition;
  }

  /**
   * Health update errors are logged, not propagated
   */
  private async report(definition: RecipeDefinition, outcome: RecipeOutcome, digest?: string): Promise<void> {
    if (!this.deps.observer) return;
    try {
      await this.deps.observer.observe(definition, outcome, digest);
    } catch (error) {
      log.error('Health update failed', { recipe: definition.name, error: error instanceof Error ? error.message : String(error) });
    }
  }
}
