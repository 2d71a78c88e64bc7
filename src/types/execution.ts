/**
 * Execution Result Envelope
 */

import type { StructuredRecipeError } from './errors.js';
import type { TransportKind } from './recipe.js';

/**
 * Milliseconds spent per runner stage
 */
export interface StageTimings {
  compile?: number;
  queue?: number;
  transport?: number;
  extraction?: number;
  total: number;
}

interface ExecutionBase {
  recipe: string;
  transport: TransportKind | null;
  redirectHops: number;
  attempts: number;
  /** Compiled form came from the cache */
  cacheHit: boolean;
  /** Result was served from the idempotency window */
  idempotentReplay: boolean;
  timings: StageTimings;
}

export interface ExecutionSuccess extends ExecutionBase {
  success: true;
  status: number;
  data: unknown;
  /** Raw body, truncated, when the recipe has no extraction */
  raw?: string;
  truncated: boolean;
  /** null when no baseline is known */
  fingerprintMatch: boolean | null;
  matchScore: number | null;
}

export interface ExecutionFailure extends ExecutionBase {
  success: false;
  status: number | null;
  error: StructuredRecipeError;
  /** Upstream rejected the session; a fresh login may recover */
  authRecoveryRequired: boolean;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;
