/**
 * Configuration Schemas
 *
 * Zod schemas for every configuration section. Values arrive as strings
 * (environment variables, or rc-file values rendered as strings by the
 * loader), so numbers are coerced and lists are comma separated.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * 'true', '1' and 'yes' are true; anything else set is false; unset takes the default
 */
export function booleanStringSchema(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return schema.default(options.default);
}

export function rateSchema(defaultValue: number) {
  return z.coerce.number().min(0).max(1).default(defaultValue);
}

/**
 * Comma-separated list
 */
export function listStringSchema<T extends z.ZodTypeAny>(item: T, defaultValue: z.infer<T>[]) {
  return z
    .string()
    .optional()
    .transform((val) =>
      val === undefined || val.trim() === ''
        ? undefined
        : val
            .split(',')
            .map((part) => part.trim())
            .filter((part) => part !== '')
    )
    .pipe(z.array(item).optional())
    .transform((list) => list ?? defaultValue);
}

// ============================================
// SECTION SCHEMAS
// ============================================

export const logConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

export const egressConfigSchema = z.object({
  allowedPorts: listStringSchema(z.coerce.number().int().min(1).max(65535), [80, 443, 8080, 8443]),
  maxRedirects: integerStringSchema({ min: 0, max: 20, default: 5 }),
  allowSchemeChange: booleanStringSchema(false),
  blockedHostnames: listStringSchema(z.string().toLowerCase(), []),
  dnsCacheTtlMs: integerStringSchema({ min: 0, max: 3_600_000, default: 30_000 }),
  dnsCacheSize: integerStringSchema({ min: 1, max: 100_000, default: 512 }),
});

export type EgressSettings = z.infer<typeof egressConfigSchema>;

export const transportConfigSchema = z.object({
  maxResponseBytes: integerStringSchema({ min: 1024, max: 64 * 1024 * 1024, default: 1024 * 1024 }),
  maxHeaderBytes: integerStringSchema({ min: 1024, max: 1024 * 1024, default: 16 * 1024 }),
  maxNestingDepth: integerStringSchema({ min: 1, max: 1000, default: 64 }),
  timeoutMs: integerStringSchema({ min: 100, max: 300_000, default: 15_000 }),
});

export type TransportSettings = z.infer<typeof transportConfigSchema>;

export const rateLimitConfigSchema = z.object({
  globalConcurrency: integerStringSchema({ min: 1, max: 1000, default: 16 }),
  perHostConcurrency: integerStringSchema({ min: 1, max: 100, default: 2 }),
  bucketCapacity: integerStringSchema({ min: 1, max: 1000, default: 4 }),
  refillPerSecond: z.coerce.number().positive().max(1000).default(2),
  minSpacingMs: integerStringSchema({ min: 0, max: 60_000, default: 250 }),
  maxQueueWaitMs: integerStringSchema({ min: 0, max: 600_000, default: 10_000 }),
});

export type RateLimitSettings = z.infer<typeof rateLimitConfigSchema>;

export const fingerprintConfigSchema = z.object({
  threshold: rateSchema(0.85),
  maxDepth: integerStringSchema({ min: 1, max: 32, default: 6 }),
});

export type FingerprintSettings = z.infer<typeof fingerprintConfigSchema>;

export const minimizerConfigSchema = z.object({
  maxAttempts: integerStringSchema({ min: 0, max: 500, default: 24 }),
  budgetMs: integerStringSchema({ min: 0, max: 600_000, default: 30_000 }),
});

export type MinimizerSettings = z.infer<typeof minimizerConfigSchema>;

export const verifierConfigSchema = z.object({
  requiredSuccesses: integerStringSchema({ min: 2, max: 20, default: 2 }),
  maxAttempts: integerStringSchema({ min: 2, max: 100, default: 6 }),
  budgetMs: integerStringSchema({ min: 0, max: 600_000, default: 30_000 }),
  demotionFailureRun: integerStringSchema({ min: 1, max: 100, default: 3 }),
});

export type VerifierSettings = z.infer<typeof verifierConfigSchema>;

export const runnerConfigSchema = z.object({
  maxRetryAttempts: integerStringSchema({ min: 1, max: 10, default: 3 }),
  initialBackoffMs: integerStringSchema({ min: 0, max: 60_000, default: 500 }),
  maxBackoffMs: integerStringSchema({ min: 0, max: 300_000, default: 5_000 }),
  idempotencyWindowMs: integerStringSchema({ min: 0, max: 86_400_000, default: 10 * 60 * 1000 }),
  idempotencyCapacity: integerStringSchema({ min: 1, max: 100_000, default: 1000 }),
  compiledCacheCapacity: integerStringSchema({ min: 1, max: 100_000, default: 256 }),
});

export type RunnerSettings = z.infer<typeof runnerConfigSchema>;

export const storageConfigSchema = z.object({
  recipesDir: z.string().min(1).default('./data/recipes'),
  artifactsDir: z.string().min(1).default('./data/artifacts'),
  retentionDays: integerStringSchema({ min: 1, max: 365, default: 7 }),
});

export type StorageSettings = z.infer<typeof storageConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
        `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

