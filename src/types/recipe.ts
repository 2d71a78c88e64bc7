/**
 * Recipe Types
 *
 * A recipe is a persisted, parameterized description of one HTTP call. The
 * definition is the source of truth; mutable counters live in a separate
 * health record (see RecipeHealth).
 */

export type RecipeStatus = 'draft' | 'verified' | 'deprecated';

export type ResponseKind = 'json' | 'html' | 'text';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/**
 * Transport tiers in ascending risk order
 */
export type TransportKind = 'session-free' | 'session-bound' | 'in-page';

export const TRANSPORT_ORDER: readonly TransportKind[] = ['session-free', 'session-bound', 'in-page'];

/**
 * Where a parameter value comes from. The source limits which transports may
 * execute the recipe.
 */
export type ParameterSource = 'caller' | 'session' | 'page' | 'constant';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface ParameterConstraints {
  pattern?: string;
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: string[];
}

export interface RecipeParameter {
  name: string;
  type: ParameterType;
  source: ParameterSource;
  description?: string;
  required: boolean;
  default?: string | number | boolean;
  constraints?: ParameterConstraints;
  /** Values seen in recordings; each one is a verification example */
  examples?: Array<string | number | boolean>;
}

export interface RecipeRequestTemplate {
  /** Absolute URL with `{name}` placeholders in path segments or query values */
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  /** JSON body template; string leaves may contain placeholders */
  body?: unknown;
  responseKind: ResponseKind;
  /** Extraction path for JSON responses */
  extract?: string;
  /** CSS selectors for HTML responses, keyed by output field */
  selectors?: Record<string, string>;
  /** Canonical hosts this recipe may contact */
  allowedDomains: string[];
}

/**
 * Verification record that travels with the definition
 */
export interface VerificationSummary {
  fingerprintDigest: string;
  algorithmVersion: string;
  verifiedAt: string;
  transportHint: TransportKind;
  requiresSession: boolean;
}

export interface RecipeDefinition {
  name: string;
  description: string;
  request: RecipeRequestTemplate;
  parameters: RecipeParameter[];
  status: RecipeStatus;
  verification?: VerificationSummary;
  /** Task text the recipe was learned from */
  sourceTask?: string;
  createdAt: string;
  updatedAt: string;
}

export type ParameterValue = string | number | boolean;

export type ParameterSet = Record<string, ParameterValue>;

/**
 * Evidence that a draft executed successfully at least once
 */
export interface ValidationProof {
  executedAt: string;
  status: number;
  fingerprintDigest: string;
  transport: TransportKind;
}
