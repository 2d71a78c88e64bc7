/**
 * Artifact Store - one schema-tagged document per pipeline stage and attempt
 *
 * Each learning task gets a directory; each stage output is written once as
 * `<stage>-<attempt>.json` inside an envelope carrying the schema identity and
 * a content digest. Reading an artifact written by an incompatible build, or
 * one whose payload no longer matches its digest, fails with schema-mismatch
 * instead of reinterpreting stale data.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { RecipeError } from '../types/errors.js';
import { contentDigest, sha256 } from '../utils/hashing.js';
import { logger } from '../utils/logger.js';
import {
  ensurePrivateDir,
  isMissingFile,
  readTextFile,
  writeFileAtomic,
} from '../utils/persistent-store.js';

const log = logger.artifacts;

export const ARTIFACT_SCHEMA_VERSION = 1;
const IN_PROGRESS_MARKER = '.in-progress';
const TASK_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_-]{0,79}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export type ArtifactStage =
  | 'recording'
  | 'candidates'
  | 'analysis'
  | 'draft'
  | 'baseline'
  | 'minimization'
  | 'verified-draft'
  | 'verification';

/**
 * Top-level payload fields per stage; part of the schema hash, so a change
 * here invalidates artifacts written before it
 */
const STAGE_FIELDS: Readonly<Record<ArtifactStage, readonly string[]>> = {
  recording: ['taskId', 'task', 'startedAt', 'finalUrl', 'finalAnswer', 'exchanges', 'droppedExchanges'],
  candidates: ['taskId', 'candidates', 'consideredExchanges', 'topK'],
  analysis: ['strategy', 'candidateId', 'name', 'description', 'request', 'parameters', 'confidence'],
  draft: ['name', 'description', 'request', 'parameters', 'status', 'createdAt', 'updatedAt'],
  baseline: ['algorithmVersion', 'paths', 'required', 'digest'],
  minimization: ['recipe', 'startedWith', 'kept', 'removed', 'probes', 'attempts', 'exhausted'],
  'verified-draft': ['name', 'description', 'request', 'parameters', 'status', 'createdAt', 'updatedAt'],
  verification: ['recipe', 'from', 'to', 'verdict', 'runs', 'transportHint', 'requiresSession', 'baseline'],
};

export function schemaId(stage: ArtifactStage): string {
  return `recipe-replay/${stage}`;
}

export function schemaHash(stage: ArtifactStage): string {
  return sha256(`${schemaId(stage)}@${ARTIFACT_SCHEMA_VERSION}:${STAGE_FIELDS[stage].join(',')}`).slice(0, 16);
}

const EnvelopeSchema = z.object({
  schema: z.string(),
  schemaVersion: z.number().int(),
  schemaHash: z.string(),
  taskId: z.string(),
  stage: z.string(),
  attempt: z.number().int().min(0),
  createdAt: z.string(),
  digest: z.string(),
  payload: z.unknown(),
});

export type ArtifactEnvelope = z.infer<typeof EnvelopeSchema>;

export interface ArtifactRef {
  file: string;
  digest: string;
}

export interface ArtifactStoreOptions {
  retentionDays?: number;
  now?: () => Date;
}

function mismatch(file: string, expected: string, reasons: string[]): RecipeError {
  return new RecipeError(
    'schema-mismatch',
    `Artifact ${file} does not match schema ${expected}; discard it and re-run the learning task`,
    { stage: 'artifact', reasons }
  );
}

export class ArtifactStore {
  private readonly retentionMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly dir: string,
    options: ArtifactStoreOptions = {}
  ) {
    this.retentionMs = (options.retentionDays ?? 7) * DAY_MS;
    this.now = options.now ?? (() => new Date());
  }

  private taskDir(taskId: string): string {
    if (!TASK_ID_RE.test(taskId)) {
      throw new RecipeError('validator-rejected', `Invalid task id ${taskId}`, {
        stage: 'artifact',
        reasons: ['task_id'],
      });
    }
    return path.join(this.dir, taskId);
  }

  fileFor(taskId: string, stage: ArtifactStage, attempt: number): string {
    return path.join(this.taskDir(taskId), `${stage}-${attempt}.json`);
  }

  async write(taskId: string, stage: ArtifactStage, attempt: number, payload: unknown): Promise<ArtifactRef> {
    const file = this.fileFor(taskId, stage, attempt);
    const digest = contentDigest(payload);
    const envelope: ArtifactEnvelope = {
      schema: schemaId(stage),
      schemaVersion: ARTIFACT_SCHEMA_VERSION,
      schemaHash: schemaHash(stage),
      taskId,
      stage,
      attempt,
      createdAt: this.now().toISOString(),
      digest,
      payload,
    };
    await writeFileAtomic(file, `${JSON.stringify(envelope, null, 2)}\n`);
    log.debug('Artifact written', { taskId, stage, attempt, digest: digest.slice(0, 12) });
    return { file, digest };
  }

  /**
   * Read and check an artifact; null when it was never written
   */
  async read(taskId: string, stage: ArtifactStage, attempt: number): Promise<ArtifactEnvelope | null> {
    const file = this.fileFor(taskId, stage, attempt);
    const expected = `${schemaId(stage)}@${ARTIFACT_SCHEMA_VERSION}`;
    const text = await readTextFile(file);
    if (text === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw mismatch(file, expected, ['unparseable']);
    }
    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) throw mismatch(file, expected, ['envelope']);

    const envelope = parsed.data;
    if (envelope.schema !== schemaId(stage)) throw mismatch(file, expected, ['schema_id']);
    if (envelope.schemaVersion !== ARTIFACT_SCHEMA_VERSION) throw mismatch(file, expected, ['schema_version']);
    if (envelope.schemaHash !== schemaHash(stage)) throw mismatch(file, expected, ['schema_hash']);
    if (envelope.digest !== contentDigest(envelope.payload)) throw mismatch(file, expected, ['digest']);
    return envelope;
  }

  async markInProgress(taskId: string): Promise<void> {
    await writeFileAtomic(path.join(this.taskDir(taskId), IN_PROGRESS_MARKER), this.now().toISOString());
  }

  async markComplete(taskId: string): Promise<void> {
    await fs.rm(path.join(this.taskDir(taskId), IN_PROGRESS_MARKER), { force: true });
  }

  async isInProgress(taskId: string): Promise<boolean> {
    return (await readTextFile(path.join(this.taskDir(taskId), IN_PROGRESS_MARKER))) !== null;
  }

  async list(taskId: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.taskDir(taskId));
      return entries.filter((entry) => entry.endsWith('.json')).sort();
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  /**
   * Remove task directories older than the retention window. Tasks still
   * marked in progress are kept regardless of age.
   */
  async prune(): Promise<string[]> {
    let tasks: string[];
    try {
      tasks = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const cutoff = this.now().getTime() - this.retentionMs;
    const removed: string[] = [];
    for (const taskId of tasks) {
      if (!TASK_ID_RE.test(taskId)) continue;
      const dir = path.join(this.dir, taskId);
      if (await this.isInProgress(taskId)) continue;

      const stat = await fs.stat(dir);
      if (!stat.isDirectory() || stat.mtimeMs >= cutoff) continue;
      await fs.rm(dir, { recursive: true, force: true });
      removed.push(taskId);
    }
    if (removed.length > 0) log.info('Pruned artifacts', { tasks: removed.length });
    return removed;
  }

  async ensureDirectory(): Promise<void> {
    await ensurePrivateDir(this.dir);
  }
}
