/**
 * Recipe Store - human-editable recipe definitions plus separate health
 *
 * Layout under the recipes directory:
 *   <name>.recipe.yaml   definition, the source of truth
 *   <name>.health.json   mutable counters, never needed to rebuild a definition
 *
 * Saving a new recipe requires a ValidationProof, so nothing that never
 * executed successfully becomes durable. Reads always go to disk, so a
 * hand edit is visible to the next execution.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { RecipeError } from '../types/errors.js';
import type { RecipeHealth } from '../types/recipe-health.js';
import type {
  RecipeDefinition,
  RecipeStatus,
  ValidationProof,
  VerificationSummary,
} from '../types/recipe.js';
import { logger } from '../utils/logger.js';
import { ensurePrivateDir, isMissingFile, readTextFile, writeFileAtomic } from '../utils/persistent-store.js';
import type { HealthPersistence } from './recipe-health.js';

const log = logger.store;

const RECIPE_SUFFIX = '.recipe.yaml';
const HEALTH_SUFFIX = '.health.json';
const RECIPE_NAME_RE = /^[a-z0-9][a-z0-9-]{0,63}$/;

// ============================================
// SCHEMAS
// ============================================

const TransportKindSchema = z.enum(['session-free', 'session-bound', 'in-page']);
const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const ParameterSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  type: z.enum(['string', 'integer', 'number', 'boolean']),
  source: z.enum(['caller', 'session', 'page', 'constant']),
  description: z.string().optional(),
  required: z.boolean(),
  default: ScalarSchema.optional(),
  constraints: z
    .object({
      pattern: z.string().optional(),
      minLength: z.number().int().min(0).optional(),
      maxLength: z.number().int().min(0).optional(),
      min: z.number().optional(),
      max: z.number().optional(),
      enum: z.array(z.string()).optional(),
    })
    .strict()
    .optional(),
  examples: z.array(ScalarSchema).optional(),
});

export const RecipeDefinitionSchema = z.object({
  name: z.string().regex(RECIPE_NAME_RE),
  description: z.string(),
  request: z.object({
    url: z.string().min(1),
    method: z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS']),
    headers: z.record(z.string()).default({}),
    body: z.unknown().optional(),
    responseKind: z.enum(['json', 'html', 'text']),
    extract: z.string().optional(),
    selectors: z.record(z.string()).optional(),
    allowedDomains: z.array(z.string().min(1)).min(1),
  }),
  parameters: z.array(ParameterSchema).default([]),
  status: z.enum(['draft', 'verified', 'deprecated']),
  verification: z
    .object({
      fingerprintDigest: z.string(),
      algorithmVersion: z.string(),
      verifiedAt: z.string(),
      transportHint: TransportKindSchema,
      requiresSession: z.boolean(),
    })
    .optional(),
  sourceTask: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const FingerprintSchema = z.object({
  algorithmVersion: z.string(),
  paths: z.array(z.string()),
  required: z.array(z.string()),
  digest: z.string(),
});

export const RecipeHealthSchema = z.object({
  recipe: z.string(),
  status: z.enum(['draft', 'verified', 'deprecated']),
  consecutiveSuccesses: z.number().int().min(0),
  consecutiveFailures: z.number().int().min(0),
  recentOutcomes: z.array(
    z.object({
      kind: z.enum(['success', 'failure', 'fingerprint-mismatch']),
      at: z.number(),
      transport: TransportKindSchema.optional(),
      errorKind: z
        .enum([
          'egress-denied',
          'timed-out',
          'rate-limited',
          'response-too-large',
          'malformed-response',
          'extraction-failed',
          'schema-mismatch',
          'needs-second-example',
          'needs-manual-selection',
          'validator-rejected',
          'upstream-error',
        ])
        .optional(),
      matchScore: z.number().optional(),
    })
  ),
  lastUsedAt: z.number().nullable(),
  lastFingerprintDigest: z.string().nullable(),
  lastMatchScore: z.number().nullable(),
  baseline: FingerprintSchema.nullable(),
});

// ============================================
// STORE
// ============================================

function isSuccessfulProof(proof: ValidationProof): boolean {
  return (
    proof.status >= 200 &&
    proof.status <= 299 &&
    proof.fingerprintDigest.length > 0 &&
    !Number.isNaN(Date.parse(proof.executedAt))
  );
}

function storeError(message: string, reasons: string[], cause?: unknown): RecipeError {
  return new RecipeError('validator-rejected', message, { stage: 'store', reasons, cause });
}

export class RecipeStore implements HealthPersistence {
  constructor(private readonly dir: string) {}

  getDirectory(): string {
    return this.dir;
  }

  private fileFor(name: string, suffix: string): string {
    if (!RECIPE_NAME_RE.test(name)) throw storeError(`Invalid recipe name ${name}`, ['recipe_name']);
    return path.join(this.dir, `${name}${suffix}`);
  }

  /**
   * Persist a definition. Without a successful validation-execution the
   * call is rejected and nothing is written. Only drafts may be replaced;
   * a verified or deprecated recipe changes through updateStatus.
   */
  async save(definition: RecipeDefinition, proof: ValidationProof | null | undefined): Promise<void> {
    if (!proof || !isSuccessfulProof(proof)) {
      throw storeError(`Recipe ${definition.name} has no successful validation-execution`, ['no_validation_proof']);
    }
    const parsed = RecipeDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw storeError(`Recipe ${definition.name} is not a valid definition`, ['invalid_definition'], parsed.error);
    }
    const existing = await this.load(definition.name);
    if (existing && existing.status !== 'draft') {
      throw storeError(`Recipe ${definition.name} is ${existing.status} and cannot be replaced`, ['overwrite_non_draft']);
    }
    await this.write(parsed.data);
    log.info('Recipe saved', {
      recipe: definition.name,
      status: definition.status,
      proofStatus: proof.status,
      transport: proof.transport,
    });
  }

  private async write(definition: RecipeDefinition): Promise<void> {
    const text = yaml.dump(definition, { noRefs: true, lineWidth: 120, skipInvalid: true });
    await writeFileAtomic(this.fileFor(definition.name, RECIPE_SUFFIX), text);
  }

  async load(name: string): Promise<RecipeDefinition | null> {
    const file = this.fileFor(name, RECIPE_SUFFIX);
    const text = await readTextFile(file);
    if (text === null) return null;

    let raw: unknown;
    try {
      raw = yaml.load(text);
    } catch (error) {
      throw storeError(`Recipe file ${file} is not valid YAML`, ['invalid_yaml'], error);
    }
    const parsed = RecipeDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw storeError(
        `Recipe file ${file} is invalid${issue ? `: ${issue.path.join('.')} ${issue.message}` : ''}`,
        ['invalid_definition'],
        parsed.error
      );
    }
    if (parsed.data.name !== name) {
      throw storeError(`Recipe file ${file} declares name ${parsed.data.name}`, ['name_mismatch']);
    }
    return parsed.data;
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(RECIPE_SUFFIX))
      .map((entry) => entry.slice(0, -RECIPE_SUFFIX.length))
      .filter((name) => RECIPE_NAME_RE.test(name))
      .sort();
  }

  /**
   * Status transition; the verifier is the only caller. Promotion carries
   * the verification summary.
   */
  async updateStatus(
    name: string,
    status: RecipeStatus,
    verification?: VerificationSummary,
    now: Date = new Date()
  ): Promise<RecipeDefinition> {
    const current = await this.load(name);
    if (!current) throw storeError(`Recipe ${name} does not exist`, ['recipe_missing']);
    const next: RecipeDefinition = {
      ...current,
      status,
      ...(verification ? { verification } : {}),
      updatedAt: now.toISOString(),
    };
    await this.write(next);
    log.info('Recipe status changed', { recipe: name, from: current.status, to: status });
    return next;
  }

  async delete(name: string): Promise<void> {
    await fs.rm(this.fileFor(name, RECIPE_SUFFIX), { force: true });
    await fs.rm(this.fileFor(name, HEALTH_SUFFIX), { force: true });
  }

  async loadHealth(name: string): Promise<RecipeHealth | null> {
    const text = await readTextFile(this.fileFor(name, HEALTH_SUFFIX));
    if (text === null) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      log.warn('Unreadable health record ignored', { recipe: name, error: String(error) });
      return null;
    }
    const parsed = RecipeHealthSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Invalid health record ignored', { recipe: name });
      return null;
    }
    return parsed.data;
  }

  async saveHealth(health: RecipeHealth): Promise<void> {
    await writeFileAtomic(this.fileFor(health.recipe, HEALTH_SUFFIX), `${JSON.stringify(health, null, 2)}\n`);
  }

  async ensureDirectory(): Promise<void> {
    await ensurePrivateDir(this.dir);
  }
}
