/**
 * Shape Fingerprint - structural signature of an extracted result
 *
 * A fingerprint is the set of typed paths in a value (`$.items[].title:string`),
 * array indices folded into `[]`, walked to a bounded depth. Two results match
 * when no required path went missing and either the new result is a superset
 * of the baseline or the Jaccard similarity of the path sets clears the
 * threshold. Additive fields therefore never break a match.
 */

import type { FingerprintComparison, ShapeFingerprint } from '../types/fingerprint.js';
import { sha256 } from '../utils/hashing.js';

export const FINGERPRINT_ALGORITHM = 'shape-v1';
export const DEFAULT_FINGERPRINT_DEPTH = 6;
export const DEFAULT_MATCH_THRESHOLD = 0.85;

const MAX_ARRAY_SAMPLE = 50;
const MAX_PATHS = 2000;

export interface FingerprintOptions {
  maxDepth?: number;
}

type ValueType = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

function typeOf(value: unknown): ValueType {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
    case 'bigint':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'object':
      return 'object';
    default:
      return 'null';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function childPath(parent: string, key: string): string {
  return /^[A-Za-z_$][A-Za-z0-9_$-]*$/.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

/**
 * Per untyped path: the types seen, how many object instances sat there, and
 * how many of the parent's instances carried this key
 */
interface PathStats {
  types: Set<ValueType>;
  objects: number;
  presence: number;
  parent: string | null;
}

export function computeFingerprint(value: unknown, options: FingerprintOptions = {}): ShapeFingerprint {
  const maxDepth = Math.max(0, options.maxDepth ?? DEFAULT_FINGERPRINT_DEPTH);
  const stats = new Map<string, PathStats>();

  const statsFor = (path: string, parent: string | null): PathStats => {
    let entry = stats.get(path);
    if (!entry) {
      entry = { types: new Set(), objects: 0, presence: 0, parent };
      stats.set(path, entry);
    }
    return entry;
  };

  const walk = (node: unknown, path: string, parent: string | null, depth: number): void => {
    if (stats.size >= MAX_PATHS && !stats.has(path)) return;
    const entry = statsFor(path, parent);
    const type = typeOf(node);
    entry.types.add(type);
    if (depth >= maxDepth) return;

    if (isRecord(node)) {
      entry.objects++;
      for (const [key, child] of Object.entries(node)) {
        const next = childPath(path, key);
        walk(child, next, path, depth + 1);
        const childStats = stats.get(next);
        if (childStats) childStats.presence++;
      }
    } else if (Array.isArray(node)) {
      for (const child of node.slice(0, MAX_ARRAY_SAMPLE)) {
        walk(child, `${path}[]`, path, depth + 1);
      }
    }
  };
  walk(value, '$', null, 0);

  const required = new Map<string, boolean>();
  const isRequired = (path: string): boolean => {
    const known = required.get(path);
    if (known !== undefined) return known;
    const entry = stats.get(path);
    let result = false;
    if (entry) {
      if (entry.parent === null) {
        result = true;
      } else if (path.endsWith('[]')) {
        result = isRequired(entry.parent);
      } else {
        const parent = stats.get(entry.parent);
        result = parent !== undefined && entry.presence >= parent.objects && isRequired(entry.parent);
      }
    }
    required.set(path, result);
    return result;
  };

  const paths: string[] = [];
  const requiredPaths: string[] = [];
  for (const [path, entry] of stats) {
    for (const type of entry.types) paths.push(`${path}:${type}`);
    const nonNull = [...entry.types].filter((type) => type !== 'null');
    if (nonNull.length === 1 && !entry.types.has('null') && isRequired(path)) {
      requiredPaths.push(`${path}:${nonNull[0]}`);
    }
  }
  paths.sort();
  requiredPaths.sort();

  return {
    algorithmVersion: FINGERPRINT_ALGORITHM,
    paths,
    required: requiredPaths,
    digest: sha256(paths.join('\n')),
  };
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const item of a) if (b.has(item)) shared++;
  return shared / (a.size + b.size - shared);
}

function untyped(path: string): string {
  return path.slice(0, path.lastIndexOf(':'));
}

/**
 * Baseline paths below an array that is present but empty in the candidate
 * say nothing about drift; they are left out of the comparison
 */
function underEmptyArray(path: string, candidateUntyped: ReadonlySet<string>, candidateArrays: ReadonlySet<string>): boolean {
  let index = path.indexOf('[]');
  while (index >= 0) {
    const arrayPath = path.slice(0, index);
    if (candidateArrays.has(arrayPath) && !candidateUntyped.has(`${arrayPath}[]`)) return true;
    index = path.indexOf('[]', index + 2);
  }
  return false;
}

export function compareFingerprints(
  baseline: ShapeFingerprint,
  candidate: ShapeFingerprint,
  threshold = DEFAULT_MATCH_THRESHOLD
): FingerprintComparison {
  const candidatePaths = new Set(candidate.paths);
  const candidateUntyped = new Set(candidate.paths.map(untyped));
  const candidateArrays = new Set(candidate.paths.filter((p) => p.endsWith(':array')).map(untyped));
  const relevant = (path: string): boolean => !underEmptyArray(untyped(path), candidateUntyped, candidateArrays);

  const basePaths = new Set(baseline.paths.filter(relevant));
  const removed = [...basePaths].filter((path) => !candidatePaths.has(path)).sort();
  const added = candidate.paths.filter((path) => !basePaths.has(path) && relevant(path)).sort();
  const missingRequired = baseline.required.filter((path) => relevant(path) && !candidatePaths.has(path)).sort();
  const score = jaccard(basePaths, candidatePaths);

  const compatibleVersion = baseline.algorithmVersion === candidate.algorithmVersion;
  const matched = compatibleVersion && missingRequired.length === 0 && (removed.length === 0 || score >= threshold);
  return { matched, score, missingRequired, added, removed };
}
