/**
 * Candidate Ranker - scores recorded exchanges as possible money requests
 *
 * Pure and deterministic. Scoring is soft: nothing is filtered out, trackers,
 * telemetry and tiny payloads simply sink. Exchanges hitting the same
 * endpoint collapse to their best-scoring exemplar before the top-K cut.
 */

import type {
  Candidate,
  CandidateSet,
  FeatureBreakdown,
  FeatureContribution,
  FeatureName,
  SignalVector,
} from '../types/candidates.js';
import type { SessionRecording } from '../types/recording.js';
import { logger } from '../utils/logger.js';
import { LIST_CONTAINER_KEYS, extractSignals, overlapRatio, tokenizeText } from './signal-extractor.js';

const log = logger.ranker;

export const DEFAULT_TOP_K = 8;
export const DEFAULT_MAX_EXCHANGES = 200;

export const FEATURE_WEIGHTS: Readonly<Record<FeatureName, number>> = {
  urlSimilarity: 1.7,
  bodyOverlap: 1.2,
  contentType: 1.0,
  listLikelihood: 0.9,
  jsonRichness: 0.7,
  status: 0.9,
  apiPathHint: 0.55,
  trackerPathPenalty: -1.4,
  telemetryHostPenalty: -1.6,
  sizeSmallPenalty: -1.0,
  sizeLargePenalty: -0.55,
  cacheBusterPenalty: -0.35,
  recencyBonus: 0.35,
  sameHostBonus: 0.35,
  resourceTypeBonus: 0.25,
  methodGetBonus: 0.15,
};

export interface RankOptions {
  topK?: number;
  maxExchanges?: number;
}

// ============================================
// FEATURES
// ============================================

function contentTypeScore(contentType: string): number {
  const ct = contentType.toLowerCase();
  if (ct.includes('json') || ct.includes('graphql')) return 1;
  if (ct.includes('html')) return -0.4;
  if (ct.startsWith('text/')) return 0;
  if (ct.startsWith('image/')) return -0.5;
  return ct ? -0.1 : -0.2;
}

function statusScore(status: number): number {
  if (status >= 200 && status <= 299) return 1;
  if (status >= 300 && status <= 399) return 0.25;
  if (status >= 400 && status <= 499) return -0.75;
  if (status >= 500 && status <= 599) return -0.95;
  return -0.2;
}

function sizeSmallPenalty(bytes: number): number {
  if (bytes <= 0) return 0.6;
  if (bytes < 200) return 1;
  if (bytes < 600) return 0.5;
  return 0;
}

function sizeLargePenalty(bytes: number): number {
  if (bytes > 32 * 1024) return 1;
  if (bytes > 16 * 1024) return 0.5;
  return 0;
}

function listLikelihood(signal: SignalVector): number {
  const { json } = signal;
  if (json?.root === 'array') return json.listLength !== null && json.listLength >= 1 ? 1 : 0.6;
  if (json?.root === 'object') {
    if (json.listLength === null) return 0.2;
    return json.listLength >= 1 ? 0.9 : 0.65;
  }

  const summary = signal.summary.toLowerCase();
  if (summary.startsWith('array(')) return 0.85;
  for (const key of LIST_CONTAINER_KEYS) {
    if (summary.includes(key)) return 0.55;
  }
  return 0;
}

function jsonRichness(signal: SignalVector): number {
  const { json } = signal;
  if (json && json.root !== 'scalar') {
    if (json.nodes <= 3 && json.uniqueKeys <= 2 && json.depth <= 1) return 0;
    const keyScore = Math.min(1, json.uniqueKeys / 30);
    const depthScore = Math.min(1, json.depth / 6);
    const listScore = json.hasList ? 0.4 : 0;
    return Math.min(1, keyScore * 0.55 + depthScore * 0.35 + listScore);
  }

  const summary = signal.summary.toLowerCase();
  if (summary.includes('object(') && summary.includes('keys=')) return 0.35;
  if (summary.startsWith('array(')) return 0.35;
  if (summary.includes('json')) return 0.2;
  return 0;
}

function sameHostBonus(signal: SignalVector): number {
  if (!signal.host) return 0;
  if (signal.sameHostAsPage) return 1;
  if (signal.initiatorHost && signal.initiatorHost === signal.host) return 0.8;
  return 0;
}

function resourceTypeBonus(signal: SignalVector): number {
  if (signal.resourceKind === 'xhr' || signal.resourceKind === 'fetch') return 1;
  if (signal.resourceKind === 'document') return 0.3;
  return 0;
}

/**
 * Feature values in [-1, 1] for one exchange
 */
export function featureValues(signal: SignalVector, contextTokens: readonly string[]): Record<FeatureName, number> {
  return {
    urlSimilarity: overlapRatio(signal.urlTokens, contextTokens),
    bodyOverlap: overlapRatio(signal.bodyTokens, contextTokens),
    contentType: contentTypeScore(signal.contentType),
    listLikelihood: listLikelihood(signal),
    jsonRichness: jsonRichness(signal),
    status: statusScore(signal.status),
    apiPathHint: signal.apiPathHint,
    trackerPathPenalty: signal.trackerPath ? 1 : 0,
    telemetryHostPenalty: signal.telemetryHost ? 1 : 0,
    sizeSmallPenalty: sizeSmallPenalty(signal.bodySize),
    sizeLargePenalty: sizeLargePenalty(signal.bodySize),
    cacheBusterPenalty: signal.cacheBusterKeys.length > 0 ? 1 : 0,
    recencyBonus: signal.relativePosition,
    sameHostBonus: sameHostBonus(signal),
    resourceTypeBonus: resourceTypeBonus(signal),
    methodGetBonus: signal.method === 'GET' || signal.method === '' ? 1 : 0,
  };
}

/**
 * Logistic squash with the exponent clamped to ±20
 */
export function squash(rawScore: number): number {
  const x = Math.max(-20, Math.min(20, rawScore));
  return 1 / (1 + Math.exp(-x));
}

export function scoreSignal(
  signal: SignalVector,
  contextTokens: readonly string[]
): { rawScore: number; score: number; features: FeatureBreakdown } {
  const values = featureValues(signal, contextTokens);
  const part = (name: FeatureName): FeatureContribution => {
    const weight = FEATURE_WEIGHTS[name];
    return { value: values[name], weight, contribution: weight * values[name] };
  };

  const features: FeatureBreakdown = {
    urlSimilarity: part('urlSimilarity'),
    bodyOverlap: part('bodyOverlap'),
    contentType: part('contentType'),
    listLikelihood: part('listLikelihood'),
    jsonRichness: part('jsonRichness'),
    status: part('status'),
    apiPathHint: part('apiPathHint'),
    trackerPathPenalty: part('trackerPathPenalty'),
    telemetryHostPenalty: part('telemetryHostPenalty'),
    sizeSmallPenalty: part('sizeSmallPenalty'),
    sizeLargePenalty: part('sizeLargePenalty'),
    cacheBusterPenalty: part('cacheBusterPenalty'),
    recencyBonus: part('recencyBonus'),
    sameHostBonus: part('sameHostBonus'),
    resourceTypeBonus: part('resourceTypeBonus'),
    methodGetBonus: part('methodGetBonus'),
  };

  let rawScore = 0;
  for (const feature of Object.values(features)) rawScore += feature.contribution;
  return { rawScore, score: squash(rawScore), features };
}

/**
 * Canonical endpoint identity: method, host, path and the sorted set of
 * query keys
 */
export function endpointKey(signal: Pick<SignalVector, 'method' | 'host' | 'path' | 'queryKeys'>): string {
  return `${signal.method} ${signal.host}${signal.path}?${[...new Set(signal.queryKeys)].sort().join('&')}`;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.signals.url !== b.signals.url) return a.signals.url < b.signals.url ? -1 : 1;
  if (a.signals.method !== b.signals.method) return a.signals.method < b.signals.method ? -1 : 1;
  return a.signals.seq - b.signals.seq;
}

// ============================================
// RANKING
// ============================================

export function rankCandidates(recording: SessionRecording, options: RankOptions = {}): CandidateSet {
  const topK = Math.max(1, Math.floor(options.topK ?? DEFAULT_TOP_K));
  const maxExchanges = Math.max(0, Math.floor(options.maxExchanges ?? DEFAULT_MAX_EXCHANGES));

  const window: SessionRecording = {
    ...recording,
    exchanges: [...recording.exchanges]
      .sort((a, b) => a.timing.startedAtMs - b.timing.startedAtMs || a.seq - b.seq)
      .slice(0, maxExchanges),
  };
  const contextTokens = tokenizeText(`${recording.task} ${recording.finalAnswer ?? ''}`, 120);

  const scored: Candidate[] = extractSignals(window).map((signals) => {
    const { rawScore, score, features } = scoreSignal(signals, contextTokens);
    return {
      id: signals.exchangeId,
      exchangeId: signals.exchangeId,
      endpointKey: endpointKey(signals),
      signals,
      rawScore,
      score,
      features,
      duplicates: 0,
    };
  });
  scored.sort(compareCandidates);

  const byEndpoint = new Map<string, Candidate>();
  for (const candidate of scored) {
    const exemplar = byEndpoint.get(candidate.endpointKey);
    if (exemplar) {
      byEndpoint.set(candidate.endpointKey, { ...exemplar, duplicates: exemplar.duplicates + 1 });
    } else {
      byEndpoint.set(candidate.endpointKey, candidate);
    }
  }

  const candidates = [...byEndpoint.values()].sort(compareCandidates).slice(0, topK).map((c) => Object.freeze(c));

  log.debug('Ranked candidates', {
    taskId: recording.taskId,
    considered: window.exchanges.length,
    endpoints: byEndpoint.size,
    top: candidates[0]?.signals.url,
  });

  return Object.freeze({
    taskId: recording.taskId,
    candidates: Object.freeze(candidates),
    consideredExchanges: window.exchanges.length,
    topK,
  });
}
