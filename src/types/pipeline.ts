/**
 * Learning Pipeline Types
 *
 * Reports produced by the replay-driven stages and the terminal outcome of
 * one learning attempt.
 */

import type { AnalyzerOutput } from './analysis.js';
import type { RecipeErrorKind, StructuredRecipeError } from './errors.js';
import type { FingerprintComparison, ShapeFingerprint } from './fingerprint.js';
import type { ParameterSet, RecipeDefinition, RecipeStatus, TransportKind, ValidationProof } from './recipe.js';

export type ProbeField =
  | { kind: 'header'; name: string }
  | { kind: 'query'; name: string };

export interface ProbeRecord {
  field: ProbeField;
  /** Removal kept because the replay still matched */
  removed: boolean;
  status: number | null;
  matchScore: number | null;
  cached: boolean;
  errorKind?: RecipeErrorKind;
}

export interface MinimizationReport {
  recipe: string;
  startedWith: { headers: string[]; queryKeys: string[] };
  kept: { headers: string[]; queryKeys: string[] };
  removed: ProbeField[];
  probes: ProbeRecord[];
  attempts: number;
  /** Stopped early on the attempt cap or wall-clock budget */
  exhausted: boolean;
  elapsedMs: number;
}

export interface VerificationRun {
  parameters: ParameterSet;
  transport: TransportKind | null;
  status: number | null;
  matched: boolean;
  comparison: FingerprintComparison | null;
  errorKind?: RecipeErrorKind;
  reasons: string[];
  authFailure: boolean;
}

export type VerificationVerdict =
  | 'verified'
  | 'needs-second-example'
  | 'mismatch'
  | 'failed'
  | 'budget-exhausted';

export interface VerificationReport {
  recipe: string;
  from: RecipeStatus;
  to: RecipeStatus;
  verdict: VerificationVerdict;
  runs: VerificationRun[];
  transportHint: TransportKind | null;
  requiresSession: boolean;
  baseline: ShapeFingerprint;
  elapsedMs: number;
}

export type LearningOutcome =
  | {
      kind: 'saved-draft';
      recipe: RecipeDefinition;
      proof: ValidationProof;
      verification: VerificationReport | null;
      minimization: MinimizationReport | null;
      analysis: AnalyzerOutput;
    }
  | { kind: 'needs-manual-selection'; reasons: string[]; error: StructuredRecipeError }
  | { kind: 'not-recipe-able'; reasons: string[] };
