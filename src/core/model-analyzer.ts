/**
 * Model Analyzer - asks a language model to pick the money request
 *
 * The model sees only the bounded candidate set (structural summaries, never
 * bodies) and answers by classification: a candidate id, the index of a
 * pre-computed extraction option, and which query keys or path segments are
 * parameters. The request itself is always rebuilt from the recording, and
 * the result still has to pass the validator.
 */

import { z } from 'zod';
import type {
  AnalysisDecision,
  ModelClient,
  ModelResult,
} from '../types/analysis.js';
import type { Candidate, CandidateSet, ExtractionOption } from '../types/candidates.js';
import type { SessionRecording } from '../types/recording.js';
import { logger } from '../utils/logger.js';
import { redactText, truncate } from '../utils/redaction.js';
import { generateExtractionOptions } from './extraction-candidates.js';
import { draftFromCandidate } from './heuristic-analyzer.js';
import { PLACEHOLDER_NAME_RE } from './request-template.js';
import { parseJsonBody } from './signal-extractor.js';

const log = logger.analyzer;

export const PROMPT_VERSION = 'recipe-select/v2';
const MAX_OPTIONS_PER_CANDIDATE = 8;
const MAX_ANSWER_CHARS = 1000;

// ============================================
// OUTPUT SCHEMA
// ============================================

const ParameterChoiceSchema = z
  .object({
    name: z.string().regex(PLACEHOLDER_NAME_RE).max(40),
    queryKey: z.string().min(1).max(100).optional(),
    pathIndex: z.number().int().min(0).max(32).optional(),
    type: z.enum(['string', 'integer', 'number', 'boolean']).default('string'),
    description: z.string().max(200).optional(),
  })
  .refine((p) => (p.queryKey === undefined) !== (p.pathIndex === undefined), {
    message: 'exactly one of queryKey or pathIndex is required',
  });

export const ModelSelectionSchema = z.object({
  candidateId: z.string().min(1).max(40),
  extractionOption: z.number().int().min(0).nullable().default(null),
  name: z.string().min(1).max(80),
  description: z.string().max(500).default(''),
  parameters: z.array(ParameterChoiceSchema).max(8).default([]),
  responseKind: z.enum(['json', 'html', 'text']),
  selectors: z.record(z.string().min(1).max(200)).optional(),
});

export type ModelSelection = z.infer<typeof ModelSelectionSchema>;

export type ParsedModelOutput =
  | { kind: 'selection'; selection: ModelSelection }
  | { kind: 'malformed'; reason: string };

// ============================================
// PROMPT
// ============================================

export const SYSTEM_PROMPT = `You select the single HTTP request ("money request") that returned the data a browser task needed.
You are given candidate requests with structural summaries and numbered extraction options.
Answer with one JSON object and nothing else:
{
  "candidateId": "<id of the chosen candidate>",
  "extractionOption": <index of the chosen extraction option, or null>,
  "name": "short-kebab-case-name",
  "description": "what the request returns",
  "parameters": [{"name": "query", "queryKey": "q", "type": "string", "description": "..."}],
  "responseKind": "json" | "html" | "text",
  "selectors": {"field": "css selector"}
}
Rules:
- Choose only among the listed candidates and extraction options; never write a URL or expression yourself.
- A parameter names a query key ("queryKey") or a path segment index ("pathIndex", 0-based), never both.
- Parameterize only values the task text varies (search terms, ids, page numbers).
- "selectors" is only for html responses.`;

export function candidateOptions(recording: SessionRecording, candidate: Candidate): ExtractionOption[] {
  if (candidate.signals.contentKind !== 'json') return [];
  const exchange = recording.exchanges.find((entry) => entry.id === candidate.exchangeId);
  if (!exchange) return [];
  const body = parseJsonBody(exchange.bodySample);
  return body === undefined ? [] : generateExtractionOptions(body, { maxOptions: MAX_OPTIONS_PER_CANDIDATE });
}

export function buildPrompt(recording: SessionRecording, candidates: CandidateSet): string {
  const lines: string[] = [
    `PROMPT VERSION: ${PROMPT_VERSION}`,
    '',
    'TASK:',
    recording.task,
    '',
    'AGENT RESULT (excerpt):',
    truncate(redactText(recording.finalAnswer ?? '(none)'), MAX_ANSWER_CHARS),
  ];
  if (recording.finalUrl) {
    lines.push('', `FINAL PAGE URL: ${recording.finalUrl}`);
  }
  lines.push('', 'CANDIDATES:');

  for (const candidate of candidates.candidates) {
    const s = candidate.signals;
    lines.push(
      '',
      `[${candidate.id}] ${s.method} ${s.url}`,
      `  status=${s.status} type=${s.contentType || 'unknown'} bytes=${s.bodySize} score=${candidate.score.toFixed(3)}`,
      `  shape: ${s.summary}`
    );
    const options = candidateOptions(recording, candidate);
    options.forEach((option, index) => {
      lines.push(`  option ${index}: ${option.expression}  (${option.description}; ${option.itemCount} items)`);
    });
  }

  lines.push('', 'Return the JSON object.');
  return lines.join('\n');
}

// ============================================
// PARSING
// ============================================

/**
 * Strip an optional markdown fence and validate against the selection schema
 */
export function parseModelOutput(text: string): ParsedModelOutput {
  let content = text.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  if (fenced) content = fenced[1].trim();

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return { kind: 'malformed', reason: `invalid_json: ${error instanceof Error ? error.message : String(error)}` };
  }

  const parsed = ModelSelectionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { kind: 'malformed', reason: `schema: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}` };
  }
  return { kind: 'selection', selection: parsed.data };
}

// ============================================
// ANALYZER
// ============================================

export class ModelAnalyzer {
  constructor(private readonly model: ModelClient) {}

  async analyze(recording: SessionRecording, candidates: CandidateSet, signal?: AbortSignal): Promise<AnalysisDecision> {
    if (candidates.candidates.length === 0) {
      return { kind: 'declined', reasons: ['no_candidates'] };
    }

    let result: ModelResult;
    try {
      result = await this.model.complete({
        promptVersion: PROMPT_VERSION,
        system: SYSTEM_PROMPT,
        prompt: buildPrompt(recording, candidates),
        task: recording.task,
        candidateSet: candidates,
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      log.warn('Model call failed', {
        taskId: recording.taskId,
        error: redactText(error instanceof Error ? error.message : String(error)),
      });
      return { kind: 'declined', reasons: ['model_unavailable'] };
    }

    if (result.kind === 'refused') {
      log.info('Model refused selection', { taskId: recording.taskId, reason: result.reason });
      return { kind: 'declined', reasons: ['model_refused'] };
    }
    if (result.kind === 'malformed') {
      log.warn('Model output malformed', { taskId: recording.taskId, reason: result.reason });
      return { kind: 'declined', reasons: ['model_malformed'] };
    }

    const parsed = parseModelOutput(result.text);
    if (parsed.kind === 'malformed') {
      log.warn('Model output failed validation', { taskId: recording.taskId, reason: parsed.reason });
      return { kind: 'declined', reasons: ['model_malformed'] };
    }
    return this.toDecision(recording, candidates, parsed.selection);
  }

  private toDecision(recording: SessionRecording, candidates: CandidateSet, selection: ModelSelection): AnalysisDecision {
    const candidate = candidates.candidates.find((entry) => entry.id === selection.candidateId);
    if (!candidate) {
      log.warn('Model chose an unknown candidate', { taskId: recording.taskId, candidateId: selection.candidateId });
      return { kind: 'declined', reasons: ['unknown_candidate'] };
    }

    let extract: string | null = null;
    if (selection.extractionOption !== null) {
      const option = candidateOptions(recording, candidate)[selection.extractionOption];
      if (!option) return { kind: 'declined', reasons: ['unknown_extraction_option'] };
      extract = option.expression;
    }

    const output = draftFromCandidate(recording, candidate, {
      strategy: 'model',
      confidence: candidate.score,
      slots: selection.parameters.map((p) => ({
        name: p.name,
        type: p.type,
        ...(p.description ? { description: p.description } : {}),
        ...(p.queryKey !== undefined ? { queryKey: p.queryKey } : {}),
        ...(p.pathIndex !== undefined ? { pathIndex: p.pathIndex } : {}),
      })),
      extract,
      responseKind: selection.responseKind,
      ...(selection.responseKind === 'html' && selection.selectors ? { selectors: selection.selectors } : {}),
      name: selection.name,
      description: selection.description,
      promptVersion: PROMPT_VERSION,
    });
    if (!output) return { kind: 'declined', reasons: ['untemplatable_url'] };

    const placed = new Set(output.parameters.map((p) => p.name));
    const unplaced = selection.parameters.filter((p) => !placed.has(p.name)).map((p) => p.name);
    if (unplaced.length > 0) {
      log.warn('Model parameters do not match the request', { taskId: recording.taskId, unplaced });
      return { kind: 'declined', reasons: ['unknown_parameter_slot'] };
    }

    log.info('Model draft proposed', { taskId: recording.taskId, candidateId: candidate.id, url: output.request.url });
    return { kind: 'proposed', output };
  }
}
