/**
 * Recipe Engine - the facade a server hands tasks to
 *
 * A named, verified recipe is replayed directly. Anything else goes to the
 * browser agent, and the agent's recording feeds the learning pipeline so the
 * next run of the same task can skip the browser.
 */

import { randomUUID } from 'node:crypto';
import type { AgentRunOutput, BrowserAgent, ModelClient } from '../types/analysis.js';
import { RecipeError, type StructuredRecipeError } from '../types/errors.js';
import type { ExecutionFailure, ExecutionSuccess } from '../types/execution.js';
import type { LearningOutcome, VerificationReport } from '../types/pipeline.js';
import type { ParameterSet, RecipeDefinition } from '../types/recipe.js';
import { getConfig, type EngineConfig } from '../utils/config-loader.js';
import { toStructuredError } from '../utils/error-envelope.js';
import { configureLogger, logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { ArtifactStore } from './artifact-store.js';
import { BrowserSessionPool, createPlaywrightSessionFactory, type SessionFactory } from './browser-sessions.js';
import type { HostResolver } from './dns-resolver.js';
import { EgressPolicy } from './egress-policy.js';
import { LearningPipeline } from './learning-pipeline.js';
import { RecipeCompiler } from './recipe-compiler.js';
import { RecipeHealthTracker } from './recipe-health.js';
import { RecipeRunner, type RuntimeObserver } from './recipe-runner.js';
import { RecipeStore } from './recipe-store.js';
import { RecipeVerifier } from './recipe-verifier.js';
import { RequestMinimizer } from './request-minimizer.js';
import type { HttpWire } from './transport/http-wire.js';
import { TransportTiers } from './transport/tiers.js';

const log = logger.engine;

const MAX_RECIPE_HINTS = 20;

// ============================================
// TYPES
// ============================================

export interface HandleTaskInput {
  task: string;
  recipeName?: string;
  parameters?: ParameterSet;
  idempotencyKey?: string;
  /** Caller identity; callers with the same owner share a browser session */
  owner?: string;
  /** Skip the learning pipeline after an agent run */
  learn?: boolean;
  signal?: AbortSignal;
}

export interface AgentTaskResult {
  resultText: string;
  finalUrl: string;
}

export type TaskResult =
  | { source: 'recipe'; result: ExecutionSuccess }
  | {
      source: 'agent';
      result: AgentTaskResult;
      learning?: LearningOutcome;
      /** Why the named recipe was not used */
      recipeFailure?: StructuredRecipeError;
      /** Learning failed after the agent succeeded */
      learningError?: StructuredRecipeError;
    };

/**
 * Fully wired components; tests and servers may build them by hand
 */
export interface EngineComponents {
  policy: EgressPolicy;
  store: RecipeStore;
  runner: RecipeRunner;
  verifier: RecipeVerifier;
  pipeline: LearningPipeline;
  artifacts?: ArtifactStore;
  sessions?: BrowserSessionPool;
  agent?: BrowserAgent;
}

export interface EngineCollaborators {
  agent?: BrowserAgent;
  model?: ModelClient;
  resolver?: HostResolver;
  wire?: HttpWire;
  /** Defaults to Playwright, loaded on first use */
  sessionFactory?: SessionFactory;
}

// ============================================
// WIRING
// ============================================

/**
 * Build every component from configuration
 */
export function createEngineComponents(
  config: EngineConfig,
  collaborators: EngineCollaborators = {}
): EngineComponents {
  const policy = new EgressPolicy(config.egress, collaborators.resolver);
  const store = new RecipeStore(config.storage.recipesDir);
  const artifacts = new ArtifactStore(config.storage.artifactsDir, { retentionDays: config.storage.retentionDays });
  const health = new RecipeHealthTracker(store, { demotionFailureRun: config.verifier.demotionFailureRun });
  const sessions = new BrowserSessionPool(collaborators.sessionFactory ?? createPlaywrightSessionFactory({ policy }));
  const transports = new TransportTiers({
    policy,
    sessions,
    ...(collaborators.wire ? { wire: collaborators.wire } : {}),
    limits: { ...config.transport, maxRedirects: config.egress.maxRedirects },
  });

  // Runner and verifier depend on each other: the runner reports outcomes to
  // the verifier, the verifier replays through the runner.
  let verifier: RecipeVerifier | null = null;
  const observer: RuntimeObserver = {
    baselineFor: async (definition) => (verifier ? verifier.baselineFor(definition) : null),
    observe: async (definition, outcome, digest) => {
      await verifier?.observe(definition, outcome, digest);
    },
  };

  const runner = new RecipeRunner(
    {
      compiler: new RecipeCompiler({ policy, capacity: config.runner.compiledCacheCapacity }),
      transports,
      rateLimiter: new RateLimiter(config.rateLimit),
      store,
      observer,
    },
    {
      retry: {
        maxAttempts: config.runner.maxRetryAttempts,
        initialDelayMs: config.runner.initialBackoffMs,
        maxDelayMs: config.runner.maxBackoffMs,
      },
      idempotencyWindowMs: config.runner.idempotencyWindowMs,
      idempotencyCapacity: config.runner.idempotencyCapacity,
      fingerprintThreshold: config.fingerprint.threshold,
      maxFingerprintDepth: config.fingerprint.maxDepth,
    }
  );

  verifier = new RecipeVerifier(
    { replayer: runner, store, health },
    {
      requiredSuccesses: config.verifier.requiredSuccesses,
      maxAttempts: config.verifier.maxAttempts,
      budgetMs: config.verifier.budgetMs,
      threshold: config.fingerprint.threshold,
    }
  );

  const minimizer = new RequestMinimizer(runner, {
    maxAttempts: config.minimizer.maxAttempts,
    budgetMs: config.minimizer.budgetMs,
    threshold: config.fingerprint.threshold,
  });

  const pipeline = new LearningPipeline({
    policy,
    replayer: runner,
    store,
    minimizer,
    verifier,
    health,
    artifacts,
    ...(collaborators.model ? { model: collaborators.model } : {}),
  });

  return {
    policy,
    store,
    runner,
    verifier,
    pipeline,
    artifacts,
    sessions,
    ...(collaborators.agent ? { agent: collaborators.agent } : {}),
  };
}

// ============================================
// ENGINE
// ============================================

export class RecipeEngine {
  constructor(private readonly components: EngineComponents) {}

  static create(collaborators: EngineCollaborators = {}, config: EngineConfig = getConfig()): RecipeEngine {
    configureLogger({ level: config.log.level, prettyPrint: config.log.prettyPrint });
    return new RecipeEngine(createEngineComponents(config, collaborators));
  }

  getComponents(): EngineComponents {
    return this.components;
  }

  async handleTask(input: HandleTaskInput): Promise<TaskResult> {
    let recipeFailure: StructuredRecipeError | undefined;

    if (input.recipeName !== undefined) {
      const outcome = await this.tryRecipe(input.recipeName, input);
      if (outcome.success) return { source: 'recipe', result: outcome };
      recipeFailure = outcome.error;
      if (input.signal?.aborted === true) {
        throw new RecipeError(outcome.error.kind, outcome.error.message, {
          stage: outcome.error.stage,
          reasons: outcome.error.reasons,
        });
      }
    }

    return this.runAgent(input, recipeFailure);
  }

  /**
   * Replay a recipe when it is verified; anything else is reported as a
   * failure so the caller falls back to the agent
   */
  private async tryRecipe(name: string, input: HandleTaskInput): Promise<ExecutionSuccess | ExecutionFailure> {
    const definition = await this.components.store.load(name);
    if (!definition || definition.status !== 'verified') {
      const error = new RecipeError('validator-rejected', `Recipe ${name} is not verified`, {
        stage: 'runner',
        reasons: [definition ? `status_${definition.status}` : 'recipe_missing'],
      });
      log.info('Recipe skipped', { recipe: name, reasons: error.reasons });
      return {
        success: false,
        recipe: name,
        transport: null,
        redirectHops: 0,
        attempts: 0,
        cacheHit: false,
        idempotentReplay: false,
        timings: { total: 0 },
        status: null,
        error: toStructuredError(error, 'runner'),
        authRecoveryRequired: false,
      };
    }

    const result = await this.components.runner.execute(definition, input.parameters ?? {}, {
      owner: input.owner ?? randomUUID(),
      ...(input.idempotencyKey !== undefined ? { idempotencyKey: input.idempotencyKey } : {}),
      ...(input.signal ? { signal: input.signal } : {}),
    });
    if (!result.success) {
      log.warn('Recipe failed, falling back to the browser agent', {
        recipe: name,
        kind: result.error.kind,
        reasons: result.error.reasons,
      });
    }
    return result;
  }

  private async recipeHints(): Promise<Pick<RecipeDefinition, 'name' | 'description'>[]> {
    const hints: Pick<RecipeDefinition, 'name' | 'description'>[] = [];
    for (const name of (await this.components.store.list()).slice(0, MAX_RECIPE_HINTS)) {
      const definition = await this.components.store.load(name);
      if (definition?.status === 'verified') hints.push({ name, description: definition.description });
    }
    return hints;
  }

  private async runAgent(input: HandleTaskInput, recipeFailure?: StructuredRecipeError): Promise<TaskResult> {
    const agent = this.components.agent;
    if (!agent) {
      throw new RecipeError('upstream-error', 'No browser agent is configured', {
        stage: 'internal',
        reasons: ['agent_unavailable'],
      });
    }

    const hints = await this.recipeHints();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), TIMEOUTS.AGENT_TASK);
    const onAbort = (): void => controller.abort();
    input.signal?.addEventListener('abort', onAbort, { once: true });
    let output: AgentRunOutput;
    try {
      output = await agent.run({ task: input.task, recipeHints: hints }, controller.signal);
    } finally {
      clearTimeout(timer);
      input.signal?.removeEventListener('abort', onAbort);
    }

    const result: AgentTaskResult = { resultText: output.resultText, finalUrl: output.finalUrl };
    const base = { source: 'agent' as const, result, ...(recipeFailure ? { recipeFailure } : {}) };
    if (input.learn === false) return base;

    try {
      const learning = await this.components.pipeline.learn(output.recording, input.signal ? { signal: input.signal } : {});
      return { ...base, learning };
    } catch (error) {
      log.error('Learning failed after agent run', { taskId: output.recording.taskId, error });
      return { ...base, learningError: toStructuredError(error, 'analysis') };
    }
  }

  /**
   * Verify a stored recipe again, e.g. with a second parameter example or
   * after deprecation
   */
  async verify(name: string, parameterSets?: ParameterSet[], signal?: AbortSignal): Promise<VerificationReport> {
    const definition = await this.components.store.load(name);
    if (!definition) {
      throw new RecipeError('validator-rejected', `Recipe ${name} does not exist`, {
        stage: 'verification',
        reasons: ['recipe_missing'],
      });
    }
    const baseline = await this.components.verifier.baselineFor(definition);
    if (!baseline) {
      throw new RecipeError('needs-manual-selection', `Recipe ${name} has no baseline fingerprint; learn it again`, {
        stage: 'verification',
        reasons: ['baseline_missing'],
      });
    }
    return this.components.verifier.verify(definition, baseline, {
      ...(parameterSets ? { parameterSets } : {}),
      ...(signal ? { signal } : {}),
    });
  }

  /**
   * Remove expired learning artifacts
   */
  async pruneArtifacts(): Promise<string[]> {
    return this.components.artifacts ? this.components.artifacts.prune() : [];
  }

  async close(): Promise<void> {
    await this.components.sessions?.closeAll();
  }
}
