/**
 * Signal and Candidate Types
 */

import type { ResourceKind } from './recording.js';

/**
 * Coarse classification of a response body
 */
export type ContentKind = 'json' | 'html' | 'text' | 'image' | 'binary' | 'empty' | 'other';

/**
 * Structural facts about a JSON body
 */
export interface JsonShape {
  root: 'object' | 'array' | 'scalar';
  /** Nodes visited, bounded */
  nodes: number;
  uniqueKeys: number;
  depth: number;
  hasList: boolean;
  /** Length of the root array or of the first list under a container key; null when neither exists */
  listLength: number | null;
}

/**
 * Per-exchange feature vector
 */
export interface SignalVector {
  exchangeId: string;
  seq: number;
  url: string;
  method: string;
  host: string;
  path: string;
  queryKeys: string[];
  status: number;
  contentType: string;
  contentKind: ContentKind;
  bodySize: number;
  resourceKind: ResourceKind;
  json: JsonShape | null;
  urlTokens: string[];
  bodyTokens: string[];
  apiPathHint: number;
  trackerPath: boolean;
  telemetryHost: boolean;
  cacheBusterKeys: string[];
  sameHostAsPage: boolean;
  /** Host of the document that started the request, '' when unknown */
  initiatorHost: string;
  /** Position in the recording, 0 for the first exchange and 1 for the last */
  relativePosition: number;
  durationMs: number;
  /** Short structural description used in prompts */
  summary: string;
}

export type FeatureName =
  | 'urlSimilarity'
  | 'bodyOverlap'
  | 'contentType'
  | 'listLikelihood'
  | 'jsonRichness'
  | 'status'
  | 'apiPathHint'
  | 'trackerPathPenalty'
  | 'telemetryHostPenalty'
  | 'sizeSmallPenalty'
  | 'sizeLargePenalty'
  | 'cacheBusterPenalty'
  | 'recencyBonus'
  | 'sameHostBonus'
  | 'resourceTypeBonus'
  | 'methodGetBonus';

export interface FeatureContribution {
  value: number;
  weight: number;
  contribution: number;
}

export type FeatureBreakdown = Record<FeatureName, FeatureContribution>;

export interface Candidate {
  /** Candidate id, equal to the exemplar exchange id */
  readonly id: string;
  readonly exchangeId: string;
  /** method + host + path + sorted query key set */
  readonly endpointKey: string;
  readonly signals: SignalVector;
  readonly rawScore: number;
  /** Squashed to (0, 1) */
  readonly score: number;
  readonly features: FeatureBreakdown;
  /** Other exchanges that collapsed into this endpoint */
  readonly duplicates: number;
}

export interface CandidateSet {
  readonly taskId: string;
  readonly candidates: readonly Candidate[];
  readonly consideredExchanges: number;
  readonly topK: number;
}

/**
 * Pre-computed option for the extraction expression of a JSON candidate
 */
export interface ExtractionOption {
  expression: string;
  score: number;
  itemCount: number;
  sampleKeys: string[];
  description: string;
}
