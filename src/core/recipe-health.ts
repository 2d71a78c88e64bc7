/**
 * Recipe Health Tracker
 *
 * Per-recipe state object: status mirror, success/failure streaks, the most
 * recent outcomes and the verification baseline. All updates for one recipe
 * run through a single-writer queue, so concurrent runs never interleave a
 * read-modify-write of the same record.
 *
 * @example
 * ```typescript
 * const tracker = new RecipeHealthTracker(store);
 * const { transition } = await tracker.record('search-api', 'verified', {
 *   kind: 'fingerprint-mismatch',
 *   at: Date.now(),
 * });
 * if (transition) await store.updateStatus(transition.recipe, transition.to, proof);
 * ```
 */

import type {
  RecipeHealth,
  RecipeHealthConfig,
  RecipeOutcome,
  StatusTransition,
} from '../types/recipe-health.js';
import type { RecipeStatus } from '../types/recipe.js';
import { logger } from '../utils/logger.js';

const log = logger.create('RecipeHealth');

export const DEFAULT_HEALTH_CONFIG: RecipeHealthConfig = {
  demotionFailureRun: 3,
  maxRecentOutcomes: 20,
};

/**
 * Where health records live; the recipe store implements it
 */
export interface HealthPersistence {
  loadHealth(recipe: string): Promise<RecipeHealth | null>;
  saveHealth(health: RecipeHealth): Promise<void>;
}

export function emptyHealth(recipe: string, status: RecipeStatus): RecipeHealth {
  return {
    recipe,
    status,
    consecutiveSuccesses: 0,
    consecutiveFailures: 0,
    recentOutcomes: [],
    lastUsedAt: null,
    lastFingerprintDigest: null,
    lastMatchScore: null,
    baseline: null,
  };
}

/**
 * Caller mistakes say nothing about the recipe and do not count as failures
 */
function countsAsFailure(outcome: RecipeOutcome): boolean {
  return outcome.kind === 'failure' && outcome.errorKind !== 'validator-rejected';
}

/**
 * Status change an outcome causes, if any. Only verified recipes demote.
 */
export function decideTransition(
  health: RecipeHealth,
  outcome: RecipeOutcome,
  config: RecipeHealthConfig
): StatusTransition | null {
  if (health.status !== 'verified') return null;
  if (outcome.kind === 'fingerprint-mismatch') {
    return { recipe: health.recipe, from: 'verified', to: 'draft', reason: 'fingerprint-mismatch', at: outcome.at };
  }
  if (countsAsFailure(outcome) && health.consecutiveFailures >= config.demotionFailureRun) {
    return { recipe: health.recipe, from: 'verified', to: 'deprecated', reason: 'failure-run', at: outcome.at };
  }
  return null;
}

/**
 * Fold one outcome into a health record (pure)
 */
export function applyOutcome(health: RecipeHealth, outcome: RecipeOutcome, config: RecipeHealthConfig): RecipeHealth {
  const next: RecipeHealth = {
    ...health,
    recentOutcomes: [...health.recentOutcomes, outcome].slice(-config.maxRecentOutcomes),
    lastUsedAt: outcome.at,
  };
  if (outcome.kind === 'success') {
    next.consecutiveSuccesses = health.consecutiveSuccesses + 1;
    next.consecutiveFailures = 0;
  } else if (outcome.kind === 'fingerprint-mismatch' || countsAsFailure(outcome)) {
    next.consecutiveSuccesses = 0;
    next.consecutiveFailures = health.consecutiveFailures + 1;
  }
  if (outcome.matchScore !== undefined) next.lastMatchScore = outcome.matchScore;
  return next;
}

export interface RecordResult {
  health: RecipeHealth;
  transition: StatusTransition | null;
}

export class RecipeHealthTracker {
  private readonly config: RecipeHealthConfig;
  private readonly queues: Map<string, Promise<unknown>> = new Map();

  constructor(
    private readonly persistence: HealthPersistence,
    config: Partial<RecipeHealthConfig> = {}
  ) {
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config };
  }

  getConfig(): RecipeHealthConfig {
    return { ...this.config };
  }

  /**
   * Serialized read-modify-write of one recipe's record
   */
  update<T>(
    recipe: string,
    status: RecipeStatus,
    fn: (health: RecipeHealth) => { health: RecipeHealth; result: T }
  ): Promise<T> {
    const previous = this.queues.get(recipe) ?? Promise.resolve();
    const run = previous.then(async () => {
      const current = (await this.persistence.loadHealth(recipe)) ?? emptyHealth(recipe, status);
      const { health, result } = fn(current);
      await this.persistence.saveHealth(health);
      return result;
    });
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(recipe, settled);
    void settled.then(() => {
      if (this.queues.get(recipe) === settled) this.queues.delete(recipe);
    });
    return run;
  }

  /**
   * Record a runtime outcome and report the status change it triggers
   */
  record(recipe: string, status: RecipeStatus, outcome: RecipeOutcome, fingerprintDigest?: string): Promise<RecordResult> {
    return this.update(recipe, status, (stored) => {
      const current = { ...stored, status };
      const updated = applyOutcome(current, outcome, this.config);
      if (fingerprintDigest !== undefined) updated.lastFingerprintDigest = fingerprintDigest;
      const transition = decideTransition(updated, outcome, this.config);
      if (transition) {
        updated.status = transition.to;
        updated.consecutiveSuccesses = 0;
        updated.consecutiveFailures = 0;
        log.warn('Recipe demoted', { recipe, from: transition.from, to: transition.to, reason: transition.reason });
      }
      return { health: updated, result: { health: updated, transition } };
    });
  }

  /**
   * Store a new status mirror and, on promotion, the baseline fingerprint
   */
  setStatus(recipe: string, status: RecipeStatus, baseline?: RecipeHealth['baseline']): Promise<RecipeHealth> {
    return this.update(recipe, status, (stored) => {
      const health: RecipeHealth = {
        ...stored,
        status,
        consecutiveFailures: 0,
        ...(baseline !== undefined ? { baseline, lastFingerprintDigest: baseline?.digest ?? null } : {}),
      };
      return { health, result: health };
    });
  }

  async get(recipe: string, status: RecipeStatus): Promise<RecipeHealth> {
    await this.queues.get(recipe);
    return (await this.persistence.loadHealth(recipe)) ?? emptyHealth(recipe, status);
  }
}
