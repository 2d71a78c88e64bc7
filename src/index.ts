/**
 * Recipe Replay Engine
 *
 * Learns parameterized HTTP recipes from recorded browser sessions and
 * replays them behind one egress policy, so repeated tasks can skip the
 * browser.
 *
 * Features:
 * - LearningPipeline: recording -> ranked candidates -> validated, minimized,
 *   verified recipe
 * - RecipeRunner: compile-or-reuse, tiered transports, bounded retries
 * - EgressPolicy: SSRF, DNS rebinding, redirect and decompression guards
 *   shared by every transport and by the browser agent's navigation
 * - RecipeStore / ArtifactStore: human-editable recipes and versioned
 *   pipeline artifacts
 *
 * Usage:
 * ```typescript
 * import { createRecipeEngine } from 'recipe-replay-engine';
 *
 * const engine = createRecipeEngine({ agent });
 * const outcome = await engine.handleTask({
 *   task: 'search for browser automation',
 *   recipeName: 'api-example-com-search',
 *   parameters: { query: 'browser automation' },
 * });
 * await engine.close();
 * ```
 */

import { RecipeEngine, type EngineCollaborators } from './core/recipe-engine.js';
import type { EngineConfig } from './utils/config-loader.js';

export * from './types/index.js';

// Engine
export {
  RecipeEngine,
  createEngineComponents,
  type EngineCollaborators,
  type EngineComponents,
  type HandleTaskInput,
  type TaskResult,
  type AgentTaskResult,
} from './core/recipe-engine.js';

// Learning
export { LearningPipeline, DEFAULT_LEARNING_CONFIG, exampleParameters, type LearningConfig, type LearningDeps } from './core/learning-pipeline.js';
export { buildSessionRecording, NetworkRecorder, playwrightResponseSource, DEFAULT_RECORDING_LIMITS } from './core/session-recorder.js';
export { extractSignals } from './core/signal-extractor.js';
export { rankCandidates, FEATURE_WEIGHTS, DEFAULT_TOP_K } from './core/candidate-ranker.js';
export { analyzeHeuristically, draftFromCandidate } from './core/heuristic-analyzer.js';
export { ModelAnalyzer, PROMPT_VERSION, buildPrompt, parseModelOutput } from './core/model-analyzer.js';
export { validateDraft, canonicalizeUrlTemplate, isAllowedHeader } from './core/recipe-validator.js';
export { generateExtractionOptions } from './core/extraction-candidates.js';
export { compileExtractionPath, evaluateExtractionPath } from './core/extraction-path.js';
export { computeFingerprint, compareFingerprints, jaccard, FINGERPRINT_ALGORITHM, DEFAULT_MATCH_THRESHOLD } from './core/fingerprint.js';
export { RequestMinimizer, DEFAULT_MINIMIZER_CONFIG, type Replayer } from './core/request-minimizer.js';
export { RecipeVerifier, DEFAULT_VERIFIER_CONFIG, parameterSetsFromExamples } from './core/recipe-verifier.js';

// Replay
export { RecipeCompiler, compileRecipe, bindParameters, recipeHash, type CompiledRecipe } from './core/recipe-compiler.js';
export { RecipeRunner, DEFAULT_RUNNER_CONFIG, type RuntimeObserver, type ReplayOutcome } from './core/recipe-runner.js';
export { extractResponse, extractWithSelectors } from './core/response-extractor.js';
export { TransportTiers, type TransportProvider } from './core/transport/tiers.js';
export { SessionFreeTransport } from './core/transport/session-free-transport.js';
export { SessionBoundTransport, cookieJarFromStorageState } from './core/transport/session-bound-transport.js';
export { InPageTransport, fromPlaywrightPage } from './core/transport/in-page-transport.js';
export { NodeHttpWire, type HttpWire } from './core/transport/http-wire.js';
export { DEFAULT_TRANSPORT_LIMITS, type Transport, type TransportLimits } from './core/transport/types.js';

// Egress
export { EgressPolicy, EgressChain, DEFAULT_EGRESS_CONFIG, type EgressConfig } from './core/egress-policy.js';
export { CachingResolver, SystemResolver, type HostResolver } from './core/dns-resolver.js';
export { NavigationGuard } from './core/navigation-guard.js';
export { BrowserSessionPool, createPlaywrightSessionFactory, type SessionFactory } from './core/browser-sessions.js';

// Stores and health
export { RecipeStore } from './core/recipe-store.js';
export { ArtifactStore, ARTIFACT_SCHEMA_VERSION } from './core/artifact-store.js';
export { RecipeHealthTracker, DEFAULT_HEALTH_CONFIG } from './core/recipe-health.js';

// Utilities
export { loadConfig, getConfig, clearConfigCache, type EngineConfig } from './utils/config-loader.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export { logger, configureLogger, Logger } from './utils/logger.js';
export { toStructuredError } from './utils/error-envelope.js';
export { RateLimiter, DEFAULT_RATE_LIMIT_CONFIG } from './utils/rate-limiter.js';

/**
 * Engine built from the loaded configuration
 */
export function createRecipeEngine(collaborators: EngineCollaborators = {}, config?: EngineConfig): RecipeEngine {
  return RecipeEngine.create(collaborators, config);
}
