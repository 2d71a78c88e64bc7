/**
 * Error Taxonomy
 *
 * Every failure the engine reports maps to one closed error kind. Callers
 * branch on `kind` and `reasons`; the human-readable message is redacted
 * before it leaves the process.
 */

/**
 * Closed set of error kinds
 */
export type RecipeErrorKind =
  | 'egress-denied'          // Scheme, host, port, redirect or DNS answer refused
  | 'timed-out'              // Wall-clock budget exhausted
  | 'rate-limited'           // Local budget or upstream 429
  | 'response-too-large'     // Size caps, measured after decompression
  | 'malformed-response'     // Undecodable or too deeply nested body
  | 'extraction-failed'      // Extraction expression or selectors produced nothing
  | 'schema-mismatch'        // Stored artifact written by an incompatible build
  | 'needs-second-example'   // Parameterized recipe seen with one parameter set
  | 'needs-manual-selection' // No candidate survived analysis and validation
  | 'validator-rejected'     // Draft or parameter failed a safety rule
  | 'upstream-error';        // Non-2xx upstream status or connection failure

export const RECIPE_ERROR_KINDS: readonly RecipeErrorKind[] = [
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
];

/**
 * Component that raised the error
 */
export type ErrorStage =
  | 'egress'
  | 'transport'
  | 'extraction'
  | 'compile'
  | 'runner'
  | 'recording'
  | 'ranking'
  | 'analysis'
  | 'validation'
  | 'fingerprint'
  | 'minimization'
  | 'verification'
  | 'artifact'
  | 'store'
  | 'session'
  | 'internal';

export interface RecipeErrorOptions {
  stage: ErrorStage;
  reasons?: string[];
  status?: number;
  suggestedDelayMs?: number;
  /** Redirects followed before the failure */
  redirectHops?: number;
  cause?: unknown;
}

/**
 * Error thrown by every engine component
 */
export class RecipeError extends Error {
  readonly kind: RecipeErrorKind;
  readonly stage: ErrorStage;
  readonly reasons: string[];
  readonly status?: number;
  readonly suggestedDelayMs?: number;
  redirectHops?: number;

  constructor(kind: RecipeErrorKind, message: string, options: RecipeErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RecipeError';
    this.kind = kind;
    this.stage = options.stage;
    this.reasons = options.reasons ?? [];
    this.status = options.status;
    this.suggestedDelayMs = options.suggestedDelayMs;
    this.redirectHops = options.redirectHops;
  }
}

export function isRecipeError(error: unknown): error is RecipeError {
  return error instanceof RecipeError;
}

/**
 * Structured error envelope returned to callers
 */
export interface StructuredRecipeError {
  kind: RecipeErrorKind;
  message: string;
  retryable: boolean;
  stage: ErrorStage;
  reasons: string[];
  status?: number;
  suggestedDelayMs?: number;
}

/**
 * Only transient conditions are worth repeating. Everything else repeats the
 * same decision.
 */
export function isRetryableKind(kind: RecipeErrorKind): boolean {
  return kind === 'timed-out' || kind === 'rate-limited';
}

/**
 * Map a Node.js system error code to a kind
 */
export function classifySystemError(code: string | undefined): { kind: RecipeErrorKind; reason: string } {
  switch (code) {
    case 'ETIMEDOUT':
    case 'ESOCKETTIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
      return { kind: 'timed-out', reason: 'connect_timeout' };
    case 'ECONNREFUSED':
      return { kind: 'upstream-error', reason: 'connection_refused' };
    case 'ECONNRESET':
    case 'EPIPE':
      return { kind: 'upstream-error', reason: 'connection_reset' };
    case 'HPE_HEADER_OVERFLOW':
      return { kind: 'response-too-large', reason: 'header_bytes' };
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return { kind: 'egress-denied', reason: 'dns_failure' };
    default:
      return { kind: 'upstream-error', reason: 'network' };
  }
}

/**
 * Classify an upstream HTTP status that is not a success
 */
export function classifyHttpStatus(status: number): { kind: RecipeErrorKind; reason: string } {
  if (status === 429) return { kind: 'rate-limited', reason: 'http_429' };
  if (status === 401 || status === 403) return { kind: 'upstream-error', reason: 'auth_failure' };
  return { kind: 'upstream-error', reason: `http_${status}` };
}
