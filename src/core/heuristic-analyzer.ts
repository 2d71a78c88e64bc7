/**
 * Heuristic Analyzer - drafts a recipe without a model call
 *
 * Only for clear-cut cases: a JSON GET whose score clears a confidence
 * threshold with a margin over the runner-up. Anything else is declined and
 * goes to the model-assisted path.
 */

import type { AnalysisDecision, AnalyzerOutput } from '../types/analysis.js';
import type { Candidate, CandidateSet } from '../types/candidates.js';
import type { ResponseKind } from '../types/recipe.js';
import type { RecordedExchange, SessionRecording } from '../types/recording.js';
import { logger } from '../utils/logger.js';
import { generateExtractionOptions } from './extraction-candidates.js';
import { templateFromUrl, type ParameterSlot } from './request-template.js';
import { parseJsonBody } from './signal-extractor.js';

const log = logger.analyzer;

export const HIGH_CONFIDENCE_MIN_SCORE = 0.85;
export const HIGH_CONFIDENCE_MIN_GAP = 0.3;

const MIN_BODY_BYTES = 200;
const MAX_BODY_BYTES = 32 * 1024;
const SEARCH_QUERY_KEYS = ['q', 'query', 'term', 'search', 'keyword', 'keywords'];
const DRAFT_HEADERS: ReadonlySet<string> = new Set(['accept', 'accept-language', 'content-type', 'x-requested-with']);

export interface HeuristicOptions {
  minScore?: number;
  minGap?: number;
}

/**
 * Readable, stable recipe name from host and path
 */
export function suggestRecipeName(url: string, fallback: string): string {
  let raw = '';
  try {
    const parsed = new URL(url);
    raw = `${parsed.hostname}${parsed.pathname}`.toLowerCase();
  } catch {
    raw = '';
  }
  const slug = (raw || fallback.toLowerCase()).replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return (slug || 'recipe').slice(0, 60).replace(/-+$/, '');
}

export function draftHeaders(exchange: RecordedExchange): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(exchange.requestHeaders)) {
    if (DRAFT_HEADERS.has(name)) headers[name] = value;
  }
  return headers;
}

/**
 * The search-like query key to parameterize, if any
 */
function searchSlot(url: string): ParameterSlot[] {
  let params: URLSearchParams;
  try {
    params = new URL(url).searchParams;
  } catch {
    return [];
  }
  const present = new Map<string, string>();
  for (const [key, value] of params) {
    if (value && !present.has(key.toLowerCase())) present.set(key.toLowerCase(), key);
  }
  for (const key of SEARCH_QUERY_KEYS) {
    const original = present.get(key);
    if (original) {
      return [{ name: 'query', type: 'string', description: `Search query (${original})`, queryKey: original }];
    }
  }
  return [];
}

export interface DraftOptions {
  strategy: AnalyzerOutput['strategy'];
  confidence: number;
  /** Defaults to the search-like query key, if any */
  slots?: ParameterSlot[];
  /** Defaults to the best generated option for JSON bodies */
  extract?: string | null;
  responseKind?: ResponseKind;
  selectors?: Record<string, string>;
  name?: string;
  description?: string;
  promptVersion?: string;
}

/**
 * Build analyzer output that replays a candidate's own recorded request.
 * Returns null when the candidate's URL cannot be templated.
 */
export function draftFromCandidate(
  recording: SessionRecording,
  candidate: Candidate,
  options: DraftOptions
): AnalyzerOutput | null {
  const exchange = recording.exchanges.find((entry) => entry.id === candidate.exchangeId);
  if (!exchange) return null;

  const template = templateFromUrl(exchange.url, options.slots ?? searchSlot(exchange.url));
  if (!template) return null;

  const responseKind = options.responseKind ?? responseKindOf(exchange.contentType);
  let extract = options.extract ?? undefined;
  if (options.extract === undefined && responseKind === 'json') {
    const body = parseJsonBody(exchange.bodySample);
    const [best] = body === undefined ? [] : generateExtractionOptions(body, { maxOptions: 1 });
    if (best && best.itemCount > 0) extract = best.expression;
  }

  let body: unknown;
  if (exchange.requestBody !== undefined && exchange.method !== 'GET' && exchange.method !== 'HEAD') {
    body = parseJsonBody(exchange.requestBody);
  }

  return {
    strategy: options.strategy,
    candidateId: candidate.id,
    name: options.name ?? suggestRecipeName(template.url, recording.task),
    description: options.description || recording.task,
    request: {
      url: template.url,
      method: exchange.method,
      headers: draftHeaders(exchange),
      ...(body !== undefined ? { body } : {}),
      responseKind,
      ...(extract ? { extract } : {}),
      ...(options.selectors ? { selectors: options.selectors } : {}),
    },
    parameters: template.parameters,
    confidence: options.confidence,
    ...(options.promptVersion ? { promptVersion: options.promptVersion } : {}),
  };
}

export function responseKindOf(contentType: string): ResponseKind {
  if (contentType.includes('json') || contentType.includes('graphql')) return 'json';
  if (contentType.includes('html')) return 'html';
  return 'text';
}

function gate(top: Candidate, runnerUp: Candidate | undefined, minScore: number, minGap: number): string[] {
  const reasons: string[] = [];
  const gap = top.score - (runnerUp?.score ?? 0);
  const ct = top.signals.contentType;
  if (top.score < minScore) reasons.push('low_score');
  if (gap < minGap) reasons.push('narrow_margin');
  if (top.signals.method !== 'GET') reasons.push('not_get');
  if (!ct.includes('json') && !ct.includes('graphql')) reasons.push('not_json');
  if (top.signals.bodySize < MIN_BODY_BYTES || top.signals.bodySize > MAX_BODY_BYTES) reasons.push('body_size');
  if (top.signals.status < 200 || top.signals.status > 299) reasons.push('status');
  return reasons;
}

export function analyzeHeuristically(
  recording: SessionRecording,
  candidates: CandidateSet,
  options: HeuristicOptions = {}
): AnalysisDecision {
  const minScore = options.minScore ?? HIGH_CONFIDENCE_MIN_SCORE;
  const minGap = options.minGap ?? HIGH_CONFIDENCE_MIN_GAP;
  const [top, runnerUp] = candidates.candidates;
  if (!top) return { kind: 'declined', reasons: ['no_candidates'] };

  const reasons = gate(top, runnerUp, minScore, minGap);
  const exchange = recording.exchanges.find((candidate) => candidate.id === top.exchangeId);
  if (!exchange) reasons.push('exchange_missing');
  if (reasons.length > 0 || !exchange) {
    log.debug('Heuristic path declined', { taskId: recording.taskId, reasons, score: top.score });
    return { kind: 'declined', reasons };
  }

  const output = draftFromCandidate(recording, top, { strategy: 'heuristic', confidence: top.score });
  if (!output) return { kind: 'declined', reasons: ['untemplatable_url'] };

  log.info('Heuristic draft proposed', { taskId: recording.taskId, url: output.request.url, score: top.score });
  return { kind: 'proposed', output };
}
