/**
 * Analyzer Types and Collaborator Contracts
 */

import type { CandidateSet } from './candidates.js';
import type {
  HttpMethod,
  ParameterSource,
  ParameterType,
  RecipeDefinition,
  ResponseKind,
} from './recipe.js';
import type { SessionRecording } from './recording.js';

export interface ProposedParameter {
  name: string;
  type: ParameterType;
  source: ParameterSource;
  description?: string;
  /** Value observed in the recording */
  example?: string;
  required: boolean;
}

/**
 * Output shared by the heuristic and model-assisted paths. Untrusted until the
 * validator accepts it.
 */
export interface AnalyzerOutput {
  strategy: 'heuristic' | 'model';
  candidateId: string;
  name: string;
  description: string;
  request: {
    url: string;
    method: HttpMethod | string;
    headers: Record<string, string>;
    body?: unknown;
    responseKind: ResponseKind;
    extract?: string;
    selectors?: Record<string, string>;
  };
  parameters: ProposedParameter[];
  confidence: number;
  promptVersion?: string;
}

export type AnalysisDecision =
  | { kind: 'proposed'; output: AnalyzerOutput }
  | { kind: 'declined'; reasons: string[] };

/**
 * Result of one language-model call
 */
export type ModelResult =
  | { kind: 'well-formed'; text: string }
  | { kind: 'malformed'; raw: string; reason: string }
  | { kind: 'refused'; reason: string };

export interface ModelRequest {
  promptVersion: string;
  system: string;
  prompt: string;
  task: string;
  candidateSet: CandidateSet;
  signal?: AbortSignal;
}

/**
 * Language model collaborator. Its output is never trusted for safety fields.
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelResult>;
}

export interface AgentRunInput {
  task: string;
  recipeHints?: Pick<RecipeDefinition, 'name' | 'description'>[];
}

export interface AgentRunOutput {
  resultText: string;
  recording: SessionRecording;
  finalUrl: string;
}

/**
 * Browser automation agent collaborator
 */
export interface BrowserAgent {
  run(input: AgentRunInput, signal?: AbortSignal): Promise<AgentRunOutput>;
}
