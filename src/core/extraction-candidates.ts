/**
 * Extraction Candidates - ranked extraction expressions for a JSON body
 *
 * The model-assisted analyzer picks one of these by index instead of writing
 * an expression itself. Generation is deterministic: object keys are visited
 * in sorted order and options are ordered by score, then expression.
 */

import type { ExtractionOption } from '../types/candidates.js';
import { compileExtractionPath, evaluateExtractionPath, formatIdentifier } from './extraction-path.js';

export const DEFAULT_MAX_OPTIONS = 20;
export const DEFAULT_MAX_DEPTH = 6;

const MAX_VISITED_NODES = 750;
const MAX_LIST_SAMPLE = 6;
const MAX_FIELDS_PER_LIST = 6;
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

const COLLECTION_KEY_WEIGHTS: Readonly<Record<string, number>> = {
  items: 120,
  results: 115,
  data: 90,
  value: 80,
  values: 80,
  records: 80,
  rows: 75,
  hits: 75,
  list: 70,
  entries: 70,
  elements: 65,
  documents: 65,
  edges: 85,
  nodes: 85,
};

const WRAPPER_KEY_WEIGHTS: Readonly<Record<string, number>> = {
  data: 70,
  payload: 55,
  response: 45,
  result: 45,
  body: 40,
};

/** A path segment; ANY_ELEMENT stands for every element of a list */
const ANY_ELEMENT = Symbol('any-element');
type Segment = string | typeof ANY_ELEMENT;

interface Scored {
  expression: string;
  score: number;
  description: string;
}

export interface ExtractionCandidateOptions {
  maxOptions?: number;
  maxDepth?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Render segments as an expression; the empty path is `@`
 */
export function pathToExpression(segments: readonly Segment[]): string {
  let out = '';
  for (const segment of segments) {
    if (segment === ANY_ELEMENT) {
      out += '[*]';
    } else {
      out += out ? `.${formatIdentifier(segment)}` : formatIdentifier(segment);
    }
  }
  return out || '@';
}

function lastKey(segments: readonly Segment[]): string {
  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];
    if (segment !== ANY_ELEMENT) return segment;
  }
  return '';
}

/**
 * Preference for a field inside list items: ids, labels and links first
 */
export function fieldScore(key: string): number {
  const k = key.toLowerCase();
  if (k === 'node') return 55;
  if (k === 'id' || k === 'uuid' || k === 'gid') return 50;
  if (k === 'name' || k === 'title' || k === 'label') return 45;
  if (k.endsWith('id')) return 42;
  if (k.includes('name')) return 35;
  if (k.includes('title')) return 33;
  if (['url', 'html_url', 'link', 'href'].includes(k)) return 30;
  if (['description', 'summary', 'desc'].includes(k)) return 26;
  if (k.includes('url') || k.includes('link') || k.includes('href')) return 22;
  if (['count', 'total', 'size'].includes(k)) return 20;
  if (k.includes('count') || k.includes('total')) return 16;
  if (/created|updated|date|time/.test(k)) return 12;
  return 5;
}

function keyFrequencies(objects: readonly Record<string, unknown>[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const item of objects) {
    for (const key of Object.keys(item)) counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, 20);
}

function topFields(frequencies: ReadonlyArray<[string, number]>): Array<[string, number]> {
  return frequencies
    .map(([key, count]): [string, number] => [key, fieldScore(key) + count * 3])
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, MAX_FIELDS_PER_LIST);
}

class OptionSet {
  private readonly byExpression = new Map<string, Scored>();

  add(expression: string, score: number, description: string): void {
    const existing = this.byExpression.get(expression);
    if (!existing || score > existing.score) {
      this.byExpression.set(expression, { expression, score, description });
    }
  }

  best(limit: number): Scored[] {
    return [...this.byExpression.values()]
      .sort((a, b) => b.score - a.score || (a.expression < b.expression ? -1 : a.expression > b.expression ? 1 : 0))
      .slice(0, limit);
  }
}

function listScore(path: readonly Segment[], list: readonly unknown[]): number {
  if (path.length === 0) return 40;
  let score = 40 + (COLLECTION_KEY_WEIGHTS[lastKey(path).toLowerCase()] ?? 0);
  if (list.length >= 2) score += 10;
  if (list.length >= 10) score += 10;
  if (list.slice(0, MAX_LIST_SAMPLE).some(isRecord)) score += 10;
  return Math.max(0, score - path.length * 2);
}

function addListOptions(options: OptionSet, list: readonly unknown[], path: readonly Segment[]): void {
  const base = listScore(path, list);
  if (path.length > 0) {
    options.add(pathToExpression(path), base, 'the list itself');
  }

  const objects = list.slice(0, MAX_LIST_SAMPLE).filter(isRecord);
  if (objects.length === 0) return;

  const fields = topFields(keyFrequencies(objects));
  for (const [key, score] of fields) {
    options.add(pathToExpression([...path, ANY_ELEMENT, key]), base - 60 + score, `field ${key} of each item`);
  }

  const nodes = objects.map((item) => item['node']).filter(isRecord);
  if (nodes.length > 0) {
    options.add(pathToExpression([...path, ANY_ELEMENT, 'node']), base + 60, 'node of each edge');
    for (const [key, score] of topFields(keyFrequencies(nodes))) {
      options.add(
        pathToExpression([...path, ANY_ELEMENT, 'node', key]),
        base + 60 + score,
        `field ${key} of each node`
      );
    }
  }

  const chosen = fields.map(([key]) => key).filter((key) => IDENTIFIER_RE.test(key)).slice(0, 4);
  if (chosen.length >= 2) {
    const hash = `{${chosen.map((key) => `${key}: ${key}`).join(', ')}}`;
    const prefix = path.length === 0 ? '[*]' : `${pathToExpression(path)}[*]`;
    options.add(`${prefix}.${hash}`, base - 20, `records with ${chosen.join(', ')}`);
  }
}

function describeResult(value: unknown): { itemCount: number; sampleKeys: string[] } {
  if (Array.isArray(value)) {
    const first = value.find(isRecord);
    return { itemCount: value.length, sampleKeys: first ? Object.keys(first).sort().slice(0, 8) : [] };
  }
  if (isRecord(value)) return { itemCount: 1, sampleKeys: Object.keys(value).sort().slice(0, 8) };
  return { itemCount: value === null ? 0 : 1, sampleKeys: [] };
}

/**
 * Ranked extraction options for a decoded JSON value
 */
export function generateExtractionOptions(
  value: unknown,
  options: ExtractionCandidateOptions = {}
): ExtractionOption[] {
  const maxOptions = Math.max(1, options.maxOptions ?? DEFAULT_MAX_OPTIONS);
  const maxDepth = Math.max(0, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  const set = new OptionSet();
  let visited = 0;

  if (Array.isArray(value)) {
    set.add('[*]', 200, 'every item of the top-level list');
  }

  const walk = (node: unknown, path: Segment[], depth: number): void => {
    visited++;
    if (visited > MAX_VISITED_NODES || depth > maxDepth) return;

    if (isRecord(node)) {
      const key = path.length > 0 ? path[path.length - 1] : ANY_ELEMENT;
      if (key !== ANY_ELEMENT) {
        const weight = WRAPPER_KEY_WEIGHTS[key.toLowerCase()];
        if (weight !== undefined) set.add(pathToExpression(path), weight, `contents of ${key}`);
      }
      for (const childKey of Object.keys(node).sort()) {
        walk(node[childKey], [...path, childKey], depth + 1);
      }
    } else if (Array.isArray(node)) {
      addListOptions(set, node, path);
      for (const child of node.slice(0, MAX_LIST_SAMPLE)) {
        walk(child, [...path, ANY_ELEMENT], depth + 1);
      }
    }
  };
  walk(value, [], 0);

  return set.best(maxOptions).map((scored) => {
    const result = evaluateExtractionPath(compileExtractionPath(scored.expression), value);
    return { ...scored, ...describeResult(result) };
  });
}
