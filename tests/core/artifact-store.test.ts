import { mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArtifactStore, schemaHash, schemaId } from '../../src/core/artifact-store.js';
import { rejection } from '../helpers/fakes.js';

const NOW = new Date('2026-03-01T00:00:00.000Z');

describe('ArtifactStore', () => {
  let dir: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'artifacts-'));
    store = new ArtifactStore(dir, { retentionDays: 7, now: () => NOW });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one enveloped document per stage and attempt', async () => {
    const ref = await store.write('task-1', 'baseline', 0, { paths: ['$:array'] });
    expect(ref.file).toBe(path.join(dir, 'task-1', 'baseline-0.json'));

    const envelope = await store.read('task-1', 'baseline', 0);
    expect(envelope).toEqual({
      schema: 'recipe-replay/baseline',
      schemaVersion: 1,
      schemaHash: schemaHash('baseline'),
      taskId: 'task-1',
      stage: 'baseline',
      attempt: 0,
      createdAt: '2026-03-01T00:00:00.000Z',
      digest: ref.digest,
      payload: { paths: ['$:array'] },
    });
    expect(await store.list('task-1')).toEqual(['baseline-0.json']);
  });

  it('should return null for artifacts never written', async () => {
    expect(await store.read('task-1', 'analysis', 0)).toBeNull();
  });

  it('should give every stage its own schema identity', () => {
    expect(schemaId('draft')).toBe('recipe-replay/draft');
    expect(schemaHash('draft')).not.toBe(schemaHash('verified-draft'));
    expect(schemaHash('draft')).toHaveLength(16);
  });

  describe('schema checks', () => {
    async function tamper(edit: (envelope: Record<string, unknown>) => void): Promise<string[]> {
      const ref = await store.write('task-1', 'draft', 1, { name: 'api-search' });
      const envelope: Record<string, unknown> = JSON.parse(await readFile(ref.file, 'utf-8'));
      edit(envelope);
      await writeFile(ref.file, JSON.stringify(envelope));
      const error = await rejection(store.read('task-1', 'draft', 1));
      expect(error.kind).toBe('schema-mismatch');
      return error.reasons;
    }

    it('should refuse artifacts from another schema version', async () => {
      expect(await tamper((e) => (e.schemaVersion = 0))).toEqual(['schema_version']);
    });

    it('should refuse artifacts with another field layout', async () => {
      expect(await tamper((e) => (e.schemaHash = '0000000000000000'))).toEqual(['schema_hash']);
    });

    it('should refuse artifacts read as the wrong stage', async () => {
      expect(await tamper((e) => (e.schema = 'recipe-replay/analysis'))).toEqual(['schema_id']);
    });

    it('should refuse edited payloads', async () => {
      expect(await tamper((e) => (e.payload = { name: 'edited' }))).toEqual(['digest']);
    });

    it('should refuse broken envelopes', async () => {
      expect(await tamper((e) => delete e.digest)).toEqual(['envelope']);
      const file = store.fileFor('task-1', 'draft', 1);
      await writeFile(file, 'not json');
      expect((await rejection(store.read('task-1', 'draft', 1))).reasons).toEqual(['unparseable']);
    });
  });

  it('should reject task ids that are not plain names', async () => {
    const error = await rejection(store.write('../outside', 'draft', 0, {}));
    expect(error.reasons).toEqual(['task_id']);
  });

  describe('retention', () => {
    async function age(taskId: string, days: number): Promise<void> {
      const when = new Date(NOW.getTime() - days * 24 * 60 * 60 * 1000);
      await utimes(path.join(dir, taskId), when, when);
    }

    it('should prune tasks older than the window', async () => {
      await store.write('old-task', 'recording', 0, {});
      await store.write('new-task', 'recording', 0, {});
      await age('old-task', 10);
      await age('new-task', 1);

      expect(await store.prune()).toEqual(['old-task']);
      expect(await store.list('old-task')).toEqual([]);
      expect(await store.list('new-task')).toEqual(['recording-0.json']);
    });

    it('should keep tasks still in progress', async () => {
      await store.write('busy-task', 'recording', 0, {});
      await store.markInProgress('busy-task');
      await age('busy-task', 30);
      expect(await store.prune()).toEqual([]);
      expect(await store.isInProgress('busy-task')).toBe(true);

      await store.markComplete('busy-task');
      expect(await store.isInProgress('busy-task')).toBe(false);
    });
  });
});
