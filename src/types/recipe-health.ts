/**
 * Recipe Health Types
 *
 * Mutable per-recipe counters, stored apart from the immutable definition.
 */

import type { RecipeErrorKind } from './errors.js';
import type { ShapeFingerprint } from './fingerprint.js';
import type { RecipeStatus, TransportKind } from './recipe.js';

export type OutcomeKind = 'success' | 'failure' | 'fingerprint-mismatch';

export interface RecipeOutcome {
  kind: OutcomeKind;
  at: number;
  transport?: TransportKind;
  errorKind?: RecipeErrorKind;
  matchScore?: number;
}

export interface RecipeHealth {
  recipe: string;
  /** Mirror of the definition status at the time of the last transition */
  status: RecipeStatus;
  consecutiveSuccesses: number;
  consecutiveFailures: number;
  /** Most recent outcomes, newest last */
  recentOutcomes: RecipeOutcome[];
  lastUsedAt: number | null;
  lastFingerprintDigest: string | null;
  lastMatchScore: number | null;
  /** Baseline the verifier promoted against */
  baseline: ShapeFingerprint | null;
}

export interface RecipeHealthConfig {
  /** Consecutive runtime failures that deprecate a verified recipe (default: 3) */
  demotionFailureRun: number;
  /** Outcomes kept per recipe (default: 20) */
  maxRecentOutcomes: number;
}

/**
 * Status change decided by the health tracker
 */
export interface StatusTransition {
  recipe: string;
  from: RecipeStatus;
  to: RecipeStatus;
  reason: 'fingerprint-mismatch' | 'failure-run' | 'verified' | 'reverification-failed';
  at: number;
}
