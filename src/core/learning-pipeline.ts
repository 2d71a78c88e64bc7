/**
 * Learning Pipeline - recording in, saved recipe (or an explicit verdict) out
 *
 * Stages, each producing an immutable artifact for the next:
 *   recording -> candidates -> analysis -> validated draft -> baseline
 *   -> minimization -> saved draft -> verification
 *
 * Every attempt ends in one of three outcomes: saved-draft,
 * needs-manual-selection or not-recipe-able. A draft that fails validation or
 * its baseline execution hands over to the next ranked candidate.
 */

import type { AnalysisDecision, AnalyzerOutput, ModelClient } from '../types/analysis.js';
import type { CandidateSet } from '../types/candidates.js';
import { RecipeError } from '../types/errors.js';
import type { ShapeFingerprint } from '../types/fingerprint.js';
import type { LearningOutcome, MinimizationReport, VerificationReport } from '../types/pipeline.js';
import type { ParameterSet, RecipeDefinition, ValidationProof } from '../types/recipe.js';
import type { SessionRecording } from '../types/recording.js';
import { toRecipeError, toStructuredError } from '../utils/error-envelope.js';
import { logger } from '../utils/logger.js';
import type { ArtifactStage, ArtifactStore } from './artifact-store.js';
import { rankCandidates } from './candidate-ranker.js';
import type { EgressPolicy } from './egress-policy.js';
import { analyzeHeuristically, draftFromCandidate } from './heuristic-analyzer.js';
import { ModelAnalyzer } from './model-analyzer.js';
import type { RecipeHealthTracker } from './recipe-health.js';
import type { RecipeStore } from './recipe-store.js';
import { validateDraft } from './recipe-validator.js';
import type { RecipeVerifier } from './recipe-verifier.js';
import type { Replayer, RequestMinimizer } from './request-minimizer.js';

const log = logger.pipeline;

export interface LearningConfig {
  topK: number;
  maxExchanges: number;
  heuristicMinScore?: number;
  heuristicMinGap?: number;
  /** Ranked candidates tried after the analyzer's choice fails */
  maxFallbackCandidates: number;
  allowMutatingMethods: boolean;
  minimize: boolean;
  verify: boolean;
}

export const DEFAULT_LEARNING_CONFIG: LearningConfig = {
  topK: 8,
  maxExchanges: 200,
  maxFallbackCandidates: 3,
  allowMutatingMethods: false,
  minimize: true,
  verify: true,
};

export interface LearningDeps {
  policy: EgressPolicy;
  replayer: Replayer;
  store: Pick<RecipeStore, 'save' | 'load'>;
  minimizer?: RequestMinimizer;
  verifier?: RecipeVerifier;
  /** Keeps the draft's baseline so later verification runs compare against it */
  health?: Pick<RecipeHealthTracker, 'setStatus'>;
  artifacts?: ArtifactStore;
  model?: ModelClient;
}

export interface LearnOptions {
  signal?: AbortSignal;
}

/**
 * First example of every non-constant parameter
 */
export function exampleParameters(definition: RecipeDefinition): ParameterSet {
  const values: ParameterSet = {};
  for (const p of definition.parameters) {
    if (p.source === 'constant') continue;
    const value = p.examples?.[0] ?? p.default;
    if (value !== undefined) values[p.name] = value;
  }
  return values;
}

function isTrivial(fingerprint: ShapeFingerprint): boolean {
  return fingerprint.paths.length <= 1 && !fingerprint.paths.some((p) => p.endsWith(':string') || p.endsWith(':number'));
}

interface DraftAttempt {
  definition: RecipeDefinition;
  analysis: AnalyzerOutput;
  baseline: ShapeFingerprint;
  proof: ValidationProof;
}

export class LearningPipeline {
  private readonly config: LearningConfig;

  constructor(
    private readonly deps: LearningDeps,
    config: Partial<LearningConfig> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_LEARNING_CONFIG, ...config };
  }

  getConfig(): LearningConfig {
    return { ...this.config };
  }

  private async artifact(taskId: string, stage: ArtifactStage, attempt: number, payload: unknown): Promise<void> {
    if (!this.deps.artifacts) return;
    await this.deps.artifacts.write(taskId, stage, attempt, payload);
  }

  async learn(recording: SessionRecording, options: LearnOptions = {}): Promise<LearningOutcome> {
    const taskId = recording.taskId;
    await this.deps.artifacts?.markInProgress(taskId);
    try {
      return await this.run(recording, options);
    } finally {
      await this.deps.artifacts?.markComplete(taskId);
    }
  }

  private async run(recording: SessionRecording, options: LearnOptions): Promise<LearningOutcome> {
    const taskId = recording.taskId;
    await this.artifact(taskId, 'recording', 0, recording);

    const candidates = rankCandidates(recording, { topK: this.config.topK, maxExchanges: this.config.maxExchanges });
    await this.artifact(taskId, 'candidates', 0, candidates);

    const usable = candidates.candidates.filter(
      (c) => c.signals.status >= 200 && c.signals.status <= 299 && ['json', 'html', 'text'].includes(c.signals.contentKind)
    );
    if (usable.length === 0) {
      log.info('Nothing to learn from recording', { taskId, exchanges: recording.exchanges.length });
      return { kind: 'not-recipe-able', reasons: candidates.candidates.length === 0 ? ['no_candidates'] : ['no_data_candidates'] };
    }

    const reasons: string[] = [];
    const proposals = await this.proposals(recording, candidates, reasons, options.signal);

    let attempt = 0;
    for (const output of proposals) {
      if (options.signal?.aborted === true) {
        reasons.push('cancelled');
        break;
      }
      const result = await this.tryDraft(recording, output, attempt, reasons, options.signal);
      attempt++;
      if (result) return this.finish(recording, result, options.signal);
    }

    const error = new RecipeError('needs-manual-selection', 'No candidate produced a working draft', {
      stage: 'analysis',
      reasons,
    });
    log.info('Learning needs manual selection', { taskId, reasons });
    return { kind: 'needs-manual-selection', reasons, error: toStructuredError(error, 'analysis') };
  }

  /**
   * The analyzer's choice first, then the ranked fallbacks
   */
  private async proposals(
    recording: SessionRecording,
    candidates: CandidateSet,
    reasons: string[],
    signal?: AbortSignal
  ): Promise<AnalyzerOutput[]> {
    let decision: AnalysisDecision = analyzeHeuristically(recording, candidates, {
      ...(this.config.heuristicMinScore !== undefined ? { minScore: this.config.heuristicMinScore } : {}),
      ...(this.config.heuristicMinGap !== undefined ? { minGap: this.config.heuristicMinGap } : {}),
    });
    if (decision.kind === 'declined') {
      reasons.push(...decision.reasons.map((reason) => `heuristic:${reason}`));
      decision = this.deps.model
        ? await new ModelAnalyzer(this.deps.model).analyze(recording, candidates, signal)
        : { kind: 'declined', reasons: ['model_unavailable'] };
      if (decision.kind === 'declined') reasons.push(...decision.reasons.map((reason) => `model:${reason}`));
    }

    const out: AnalyzerOutput[] = [];
    const tried = new Set<string>();
    if (decision.kind === 'proposed') {
      out.push(decision.output);
      tried.add(decision.output.candidateId);
    }

    const fallbacks = candidates.candidates.filter(
      (c) => !tried.has(c.id) && c.signals.status >= 200 && c.signals.status <= 299 && c.signals.contentKind === 'json'
    );
    for (const candidate of fallbacks.slice(0, this.config.maxFallbackCandidates)) {
      const draft = draftFromCandidate(recording, candidate, { strategy: 'heuristic', confidence: candidate.score });
      if (draft) out.push(draft);
    }
    return out;
  }

  private async tryDraft(
    recording: SessionRecording,
    output: AnalyzerOutput,
    attempt: number,
    reasons: string[],
    signal?: AbortSignal
  ): Promise<DraftAttempt | null> {
    const taskId = recording.taskId;
    await this.artifact(taskId, 'analysis', attempt, output);

    let draft: RecipeDefinition;
    try {
      draft = validateDraft(output, this.deps.policy, {
        allowMutatingMethods: this.config.allowMutatingMethods,
        now: this.now,
      });
    } catch (error) {
      const rejected = toRecipeError(error, 'validation');
      reasons.push(`${output.candidateId}:${rejected.reasons[0] ?? rejected.kind}`);
      log.info('Draft rejected', { taskId, candidateId: output.candidateId, reasons: rejected.reasons });
      return null;
    }
    draft = { ...draft, sourceTask: recording.task };
    await this.artifact(taskId, 'draft', attempt, draft);

    const outcome = await this.deps.replayer.replay(draft, exampleParameters(draft), {
      fresh: true,
      owner: `learn:${taskId}`,
      ...(signal ? { signal } : {}),
    });
    if (!outcome.ok) {
      reasons.push(`${output.candidateId}:${outcome.error.reasons[0] ?? outcome.error.kind}`);
      log.info('Baseline execution failed', { taskId, candidateId: output.candidateId, kind: outcome.error.kind });
      return null;
    }
    if (isTrivial(outcome.fingerprint)) {
      reasons.push(`${output.candidateId}:empty_result`);
      return null;
    }
    await this.artifact(taskId, 'baseline', attempt, outcome.fingerprint);

    return {
      definition: draft,
      analysis: output,
      baseline: outcome.fingerprint,
      proof: {
        executedAt: this.now().toISOString(),
        status: outcome.status,
        fingerprintDigest: outcome.fingerprint.digest,
        transport: outcome.transport,
      },
    };
  }

  /**
   * First free name; a draft for the same URL is replaced, anything else
   * (another URL, or a recipe that left draft) is left alone
   */
  private async uniqueName(definition: RecipeDefinition): Promise<string> {
    for (let i = 1; i <= 20; i++) {
      const name = i === 1 ? definition.name : `${definition.name.slice(0, 60)}-${i}`;
      const existing = await this.deps.store.load(name);
      if (!existing) return name;
      if (existing.status === 'draft' && existing.request.url === definition.request.url) return name;
    }
    throw new RecipeError('validator-rejected', `No free recipe name for ${definition.name}`, {
      stage: 'store',
      reasons: ['name_exhausted'],
    });
  }

  private async finish(recording: SessionRecording, attempt: DraftAttempt, signal?: AbortSignal): Promise<LearningOutcome> {
    const taskId = recording.taskId;
    const parameters = exampleParameters(attempt.definition);

    let definition = attempt.definition;
    let minimization: MinimizationReport | null = null;
    if (this.config.minimize && this.deps.minimizer) {
      const minimized = await this.deps.minimizer.minimize(definition, parameters, attempt.baseline, {
        transport: attempt.proof.transport,
        ...(signal ? { signal } : {}),
      });
      definition = minimized.definition;
      minimization = minimized.report;
      await this.artifact(taskId, 'minimization', 0, minimization);
    }

    definition = { ...definition, name: await this.uniqueName(definition) };
    await this.deps.store.save(definition, attempt.proof);
    await this.deps.health?.setStatus(definition.name, definition.status, attempt.baseline);

    let verification: VerificationReport | null = null;
    if (this.config.verify && this.deps.verifier) {
      verification = await this.deps.verifier.verify(definition, attempt.baseline, signal ? { signal } : {});
      await this.artifact(taskId, 'verification', 0, verification);
      const stored = await this.deps.store.load(definition.name);
      if (stored) {
        definition = stored;
        await this.artifact(taskId, 'verified-draft', 0, stored);
      }
    }

    log.info('Recipe learned', {
      taskId,
      recipe: definition.name,
      status: definition.status,
      strategy: attempt.analysis.strategy,
    });
    return {
      kind: 'saved-draft',
      recipe: definition,
      proof: attempt.proof,
      verification,
      minimization,
      analysis: attempt.analysis,
    };
  }
}
