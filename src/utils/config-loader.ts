/**
 * Configuration Loader
 *
 * Precedence: Environment Variables > Config File > Defaults
 *
 * The config file is `.recipereplayrc` or `.recipereplayrc.json`, searched in
 * the current working directory, then the home directory. It is JSON with
 * optional comments.
 *
 * @example
 * // .recipereplayrc
 * {
 *   // calibrate drift detection
 *   "fingerprint": { "threshold": 0.8 },
 *   "storage": { "recipesDir": "/var/lib/recipes" }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  egressConfigSchema,
  fingerprintConfigSchema,
  logConfigSchema,
  minimizerConfigSchema,
  ConfigValidationError,
  rateLimitConfigSchema,
  runnerConfigSchema,
  storageConfigSchema,
  transportConfigSchema,
  verifierConfigSchema,
  type EgressSettings,
  type FingerprintSettings,
  type LogConfig,
  type MinimizerSettings,
  type RateLimitSettings,
  type RunnerSettings,
  type StorageSettings,
  type TransportSettings,
  type VerifierSettings,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.create('ConfigLoader');

// ============================================
// CONFIG FILE SCHEMA
// ============================================

const count = z.number().int().min(0);

/**
 * Config file contents. Every field is optional; unknown keys are rejected.
 */
export const configFileSchema = z
  .object({
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
        prettyPrint: z.boolean().optional(),
      })
      .strict()
      .optional(),
    egress: z
      .object({
        allowedPorts: z.array(z.number().int().min(1).max(65535)).optional(),
        maxRedirects: count.optional(),
        allowSchemeChange: z.boolean().optional(),
        blockedHostnames: z.array(z.string()).optional(),
        dnsCacheTtlMs: count.optional(),
        dnsCacheSize: count.optional(),
      })
      .strict()
      .optional(),
    transport: z
      .object({
        maxResponseBytes: count.optional(),
        maxHeaderBytes: count.optional(),
        maxNestingDepth: count.optional(),
        timeoutMs: count.optional(),
      })
      .strict()
      .optional(),
    rateLimit: z
      .object({
        globalConcurrency: count.optional(),
        perHostConcurrency: count.optional(),
        bucketCapacity: count.optional(),
        refillPerSecond: z.number().positive().optional(),
        minSpacingMs: count.optional(),
        maxQueueWaitMs: count.optional(),
      })
      .strict()
      .optional(),
    fingerprint: z
      .object({
        threshold: z.number().min(0).max(1).optional(),
        maxDepth: count.optional(),
      })
      .strict()
      .optional(),
    minimizer: z
      .object({
        maxAttempts: count.optional(),
        budgetMs: count.optional(),
      })
      .strict()
      .optional(),
    verifier: z
      .object({
        requiredSuccesses: count.optional(),
        maxAttempts: count.optional(),
        budgetMs: count.optional(),
        demotionFailureRun: count.optional(),
      })
      .strict()
      .optional(),
    runner: z
      .object({
        maxRetryAttempts: count.optional(),
        initialBackoffMs: count.optional(),
        maxBackoffMs: count.optional(),
        idempotencyWindowMs: count.optional(),
        idempotencyCapacity: count.optional(),
        compiledCacheCapacity: count.optional(),
      })
      .strict()
      .optional(),
    storage: z
      .object({
        recipesDir: z.string().optional(),
        artifactsDir: z.string().optional(),
        retentionDays: count.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface EngineConfig {
  log: LogConfig;
  egress: EgressSettings;
  transport: TransportSettings;
  rateLimit: RateLimitSettings;
  fingerprint: FingerprintSettings;
  minimizer: MinimizerSettings;
  verifier: VerifierSettings;
  runner: RunnerSettings;
  storage: StorageSettings;
}

export type ConfigSection = keyof EngineConfig;

// ============================================
// ENVIRONMENT VARIABLES
// ============================================

/**
 * Environment variable for every config field
 */
export const ENV_VARIABLES: { [S in ConfigSection]: Record<keyof EngineConfig[S], string> } = {
  log: { level: 'LOG_LEVEL', prettyPrint: 'LOG_PRETTY' },
  egress: {
    allowedPorts: 'RECIPE_EGRESS_ALLOWED_PORTS',
    maxRedirects: 'RECIPE_EGRESS_MAX_REDIRECTS',
    allowSchemeChange: 'RECIPE_EGRESS_ALLOW_SCHEME_CHANGE',
    blockedHostnames: 'RECIPE_EGRESS_BLOCKED_HOSTNAMES',
    dnsCacheTtlMs: 'RECIPE_DNS_CACHE_TTL_MS',
    dnsCacheSize: 'RECIPE_DNS_CACHE_SIZE',
  },
  transport: {
    maxResponseBytes: 'RECIPE_MAX_RESPONSE_BYTES',
    maxHeaderBytes: 'RECIPE_MAX_HEADER_BYTES',
    maxNestingDepth: 'RECIPE_MAX_NESTING_DEPTH',
    timeoutMs: 'RECIPE_CALL_TIMEOUT_MS',
  },
  rateLimit: {
    globalConcurrency: 'RECIPE_GLOBAL_CONCURRENCY',
    perHostConcurrency: 'RECIPE_PER_HOST_CONCURRENCY',
    bucketCapacity: 'RECIPE_BUCKET_CAPACITY',
    refillPerSecond: 'RECIPE_REFILL_PER_SECOND',
    minSpacingMs: 'RECIPE_MIN_SPACING_MS',
    maxQueueWaitMs: 'RECIPE_MAX_QUEUE_WAIT_MS',
  },
  fingerprint: {
    threshold: 'RECIPE_FINGERPRINT_THRESHOLD',
    maxDepth: 'RECIPE_FINGERPRINT_MAX_DEPTH',
  },
  minimizer: {
    maxAttempts: 'RECIPE_MINIMIZER_MAX_ATTEMPTS',
    budgetMs: 'RECIPE_MINIMIZER_BUDGET_MS',
  },
  verifier: {
    requiredSuccesses: 'RECIPE_VERIFIER_REQUIRED_SUCCESSES',
    maxAttempts: 'RECIPE_VERIFIER_MAX_ATTEMPTS',
    budgetMs: 'RECIPE_VERIFIER_BUDGET_MS',
    demotionFailureRun: 'RECIPE_DEMOTION_FAILURE_RUN',
  },
  runner: {
    maxRetryAttempts: 'RECIPE_RETRY_MAX_ATTEMPTS',
    initialBackoffMs: 'RECIPE_RETRY_INITIAL_BACKOFF_MS',
    maxBackoffMs: 'RECIPE_RETRY_MAX_BACKOFF_MS',
    idempotencyWindowMs: 'RECIPE_IDEMPOTENCY_WINDOW_MS',
    idempotencyCapacity: 'RECIPE_IDEMPOTENCY_CAPACITY',
    compiledCacheCapacity: 'RECIPE_COMPILED_CACHE_CAPACITY',
  },
  storage: {
    recipesDir: 'RECIPE_RECIPES_DIR',
    artifactsDir: 'RECIPE_ARTIFACTS_DIR',
    retentionDays: 'RECIPE_RETENTION_DAYS',
  },
};

// ============================================
// FILE SEARCH
// ============================================

export const CONFIG_FILE_NAMES = ['.recipereplayrc', '.recipereplayrc.json'];

export function defaultSearchPaths(): string[] {
  const paths = [process.cwd()];
  const home = homedir();
  if (home && !paths.includes(home)) paths.push(home);
  return paths;
}

export function findConfigFile(searchPaths: readonly string[]): string | null {
  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }
  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

/**
 * Remove comments outside string literals
 */
export function stripJsonComments(content: string): string {
  return content.replace(/("(?:\\.|[^"\\])*")|\/\*[\s\S]*?\*\/|\/\/[^\n]*/g, (match, literal: string | undefined) => literal ?? '');
}

/**
 * Parse a config file. Invalid files are logged and ignored.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(readFileSync(filePath, 'utf-8')));
  } catch (error) {
    log.warn(error instanceof SyntaxError ? 'Config file has invalid JSON' : 'Failed to read config file', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    log.warn('Config file validation failed', {
      path: filePath,
      errors: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
    return {};
  }

  log.info('Loaded config file', { path: filePath, sections: Object.keys(result.data) });
  return result.data;
}

// ============================================
// MERGE
// ============================================

/**
 * Render a config file value the way an environment variable would carry it
 */
function toEnvString(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) return value.length === 0 ? undefined : value.map(String).join(',');
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function mergeSection<T>(
  section: ConfigSection,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  variables: Record<string, string>,
  file: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): T {
  const raw: Record<string, string | undefined> = {};
  for (const [field, variable] of Object.entries(variables)) {
    raw[field] = env[variable] ?? toEnvString(file[field]);
  }
  const result = schema.safeParse(raw);
  if (!result.success) throw new ConfigValidationError(section, result.error);
  return result.data;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Directories searched for a config file */
  searchPaths?: readonly string[];
  /** Explicit config file; skips the search */
  configFile?: string;
}

/**
 * Build the full configuration. Throws ConfigValidationError when an
 * environment variable holds an invalid value.
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  const path = options.configFile ?? findConfigFile(options.searchPaths ?? defaultSearchPaths());
  const file = path ? loadConfigFile(path) : {};

  const vars = ENV_VARIABLES;
  return {
    log: mergeSection('log', logConfigSchema, vars.log, file.log ?? {}, env),
    egress: mergeSection('egress', egressConfigSchema, vars.egress, file.egress ?? {}, env),
    transport: mergeSection('transport', transportConfigSchema, vars.transport, file.transport ?? {}, env),
    rateLimit: mergeSection('rateLimit', rateLimitConfigSchema, vars.rateLimit, file.rateLimit ?? {}, env),
    fingerprint: mergeSection('fingerprint', fingerprintConfigSchema, vars.fingerprint, file.fingerprint ?? {}, env),
    minimizer: mergeSection('minimizer', minimizerConfigSchema, vars.minimizer, file.minimizer ?? {}, env),
    verifier: mergeSection('verifier', verifierConfigSchema, vars.verifier, file.verifier ?? {}, env),
    runner: mergeSection('runner', runnerConfigSchema, vars.runner, file.runner ?? {}, env),
    storage: mergeSection('storage', storageConfigSchema, vars.storage, file.storage ?? {}, env),
  };
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfig: EngineConfig | null = null;

/**
 * Process-wide configuration, loaded once
 */
export function getConfig(): EngineConfig {
  if (!cachedConfig) cachedConfig = loadConfig();
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
