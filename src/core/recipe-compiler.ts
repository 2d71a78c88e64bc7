/**
 * Recipe Compiler - immutable fast-path form of a stored recipe
 *
 * A compiled recipe is keyed by the content hash of the definition parts that
 * affect execution. Editing a recipe changes the hash, so a cached form can
 * never stand in for an edited definition.
 */

import { RecipeError } from '../types/errors.js';
import {
  TRANSPORT_ORDER,
  type HttpMethod,
  type ParameterSet,
  type ParameterValue,
  type RecipeDefinition,
  type RecipeParameter,
  type ResponseKind,
  type TransportKind,
} from '../types/recipe.js';
import { TtlCache } from '../utils/cache.js';
import { contentDigest } from '../utils/hashing.js';
import { logger } from '../utils/logger.js';
import type { EgressPolicy } from './egress-policy.js';
import { compileExtractionPath, type CompiledExtractionPath } from './extraction-path.js';
import { fillPlaceholders, listPlaceholders } from './request-template.js';
import {
  MUTATING_METHODS,
  SAFE_METHODS,
  canonicalizeUrlTemplate,
  isAllowedHeader,
} from './recipe-validator.js';

const log = logger.create('RecipeCompiler');

export const DEFAULT_COMPILED_CACHE_CAPACITY = 256;
const COMPILED_TTL_MS = 24 * 60 * 60 * 1000;
const LINE_BREAK_RE = /[\r\n]/;

// ============================================
// TYPES
// ============================================

export interface CompiledParameter {
  readonly name: string;
  readonly definition: RecipeParameter;
  readonly pattern: RegExp | null;
}

export interface CompiledRecipe {
  readonly hash: string;
  readonly name: string;
  readonly method: HttpMethod;
  readonly urlTemplate: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly bodyTemplate: unknown;
  readonly responseKind: ResponseKind;
  readonly extract: CompiledExtractionPath | null;
  readonly selectors: Readonly<Record<string, string>> | null;
  readonly allowedDomains: readonly string[];
  readonly parameters: readonly CompiledParameter[];
  /** Tiers the parameter sources and session needs permit, lowest risk first */
  readonly legalTransports: readonly TransportKind[];
}

export interface BoundRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  values: ParameterSet;
}

export interface CompilerOptions {
  policy: EgressPolicy;
  capacity?: number;
  allowMutatingMethods?: boolean;
}

function reject(message: string, reasons: string[]): RecipeError {
  return new RecipeError('validator-rejected', message, { stage: 'compile', reasons });
}

// ============================================
// COMPILATION
// ============================================

/**
 * Hash over everything that changes how a recipe executes
 */
export function recipeHash(definition: RecipeDefinition): string {
  return contentDigest({
    name: definition.name,
    request: definition.request,
    parameters: definition.parameters,
    requiresSession: definition.verification?.requiresSession ?? false,
  });
}

function legalTransports(definition: RecipeDefinition): TransportKind[] {
  const sources = new Set(definition.parameters.map((p) => p.source));
  let legal: TransportKind[] = [...TRANSPORT_ORDER];
  if (sources.has('session') || definition.verification?.requiresSession === true) {
    legal = legal.filter((kind) => kind !== 'session-free');
  }
  if (sources.has('page')) {
    legal = legal.filter((kind) => kind === 'in-page');
  }
  return legal;
}

function compilePattern(parameter: RecipeParameter): RegExp | null {
  const source = parameter.constraints?.pattern;
  if (source === undefined) return null;
  try {
    return new RegExp(`^(?:${source})$`, 'u');
  } catch (error) {
    throw new RecipeError('validator-rejected', `Invalid pattern for parameter ${parameter.name}`, {
      stage: 'compile',
      reasons: ['parameter_pattern'],
      cause: error,
    });
  }
}

function bodyPlaceholders(body: unknown, out: Set<string>): Set<string> {
  if (typeof body === 'string') {
    for (const name of listPlaceholders(body)) out.add(name);
  } else if (Array.isArray(body)) {
    for (const item of body) bodyPlaceholders(item, out);
  } else if (body !== null && typeof body === 'object') {
    for (const value of Object.values(body)) bodyPlaceholders(value, out);
  }
  return out;
}

export function compileRecipe(definition: RecipeDefinition, options: CompilerOptions): CompiledRecipe {
  const request = definition.request;
  const method = request.method;
  if (!SAFE_METHODS.includes(method)) {
    if (!MUTATING_METHODS.includes(method)) throw reject(`Method ${method} is not supported`, ['method']);
    if (options.allowMutatingMethods !== true) {
      throw reject(`Method ${method} needs explicit opt-in`, ['mutating_method']);
    }
  }

  let canonical: { url: string; host: string };
  try {
    canonical = canonicalizeUrlTemplate(request.url, options.policy);
  } catch (error) {
    if (error instanceof RecipeError) throw reject(error.message, error.reasons);
    throw error;
  }
  const allowedDomains = request.allowedDomains.map((domain) => domain.toLowerCase());
  if (!allowedDomains.includes(canonical.host)) {
    throw reject(`Host ${canonical.host} is not in the allowed domains`, ['domain_not_allowed']);
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (!isAllowedHeader(name)) throw reject(`Header ${name} is not allowed`, ['header_not_allowed']);
    if (LINE_BREAK_RE.test(value)) throw reject(`Header ${name} contains a line break`, ['line_break']);
    if (listPlaceholders(value).length > 0) {
      throw reject(`Header ${name} contains a placeholder`, ['placeholder_in_header']);
    }
    headers[name.toLowerCase()] = value;
  }

  const referenced = bodyPlaceholders(request.body, new Set(listPlaceholders(canonical.url)));
  const declared = new Set(definition.parameters.map((p) => p.name));
  for (const name of referenced) {
    if (!declared.has(name)) throw reject(`Placeholder {${name}} has no parameter`, ['placeholder_unbound']);
  }

  const legal = legalTransports(definition);
  if (legal.length === 0) throw reject('No transport can execute this recipe', ['no_legal_transport']);

  return Object.freeze({
    hash: recipeHash(definition),
    name: definition.name,
    method,
    urlTemplate: canonical.url,
    headers: Object.freeze(headers),
    bodyTemplate: request.body,
    responseKind: request.responseKind,
    extract: request.responseKind === 'json' && request.extract ? compileExtractionPath(request.extract) : null,
    selectors: request.responseKind === 'html' && request.selectors ? Object.freeze({ ...request.selectors }) : null,
    allowedDomains: Object.freeze(allowedDomains),
    parameters: Object.freeze(
      definition.parameters.map((p) => Object.freeze({ name: p.name, definition: p, pattern: compilePattern(p) }))
    ),
    legalTransports: Object.freeze(legal),
  });
}

// ============================================
// PARAMETER BINDING
// ============================================

function coerce(parameter: RecipeParameter, raw: ParameterValue): ParameterValue {
  const fail = (): RecipeError =>
    reject(`Parameter ${parameter.name} is not a valid ${parameter.type}`, ['parameter_type', parameter.name]);
  switch (parameter.type) {
    case 'string':
      if (typeof raw === 'boolean') throw fail();
      return String(raw);
    case 'integer': {
      const value = typeof raw === 'string' && /^-?\d{1,15}$/.test(raw) ? Number(raw) : raw;
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) throw fail();
      return value;
    }
    case 'number': {
      const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
      if (typeof value !== 'number' || !Number.isFinite(value)) throw fail();
      return value;
    }
    case 'boolean':
      if (typeof raw === 'boolean') return raw;
      if (raw === 'true' || raw === 'false') return raw === 'true';
      throw fail();
  }
}

function checkConstraints(parameter: CompiledParameter, value: ParameterValue): void {
  const c = parameter.definition.constraints ?? {};
  const name = parameter.name;
  const text = String(value);
  const fail = (what: string): RecipeError =>
    reject(`Parameter ${name} violates its ${what} constraint`, ['parameter_constraint', name, what]);

  if (LINE_BREAK_RE.test(text)) {
    throw reject(`Parameter ${name} contains a line break`, ['line_break', name]);
  }
  if (typeof value === 'string') {
    if (c.minLength !== undefined && value.length < c.minLength) throw fail('minLength');
    if (c.maxLength !== undefined && value.length > c.maxLength) throw fail('maxLength');
  }
  if (typeof value === 'number') {
    if (c.min !== undefined && value < c.min) throw fail('min');
    if (c.max !== undefined && value > c.max) throw fail('max');
  }
  if (c.enum !== undefined && !c.enum.includes(text)) throw fail('enum');
  if (parameter.pattern && !parameter.pattern.test(text)) throw fail('pattern');
}

/**
 * Check every parameter against its declaration and resolve defaults
 */
export function resolveParameters(compiled: CompiledRecipe, input: ParameterSet): ParameterSet {
  const known = new Set(compiled.parameters.map((p) => p.name));
  for (const name of Object.keys(input)) {
    if (!known.has(name)) throw reject(`Unknown parameter ${name}`, ['unknown_parameter', name]);
  }

  const values: ParameterSet = {};
  for (const parameter of compiled.parameters) {
    const def = parameter.definition;
    const supplied = def.source === 'constant' ? undefined : input[def.name];
    const raw = supplied ?? def.default;
    if (raw === undefined) {
      if (def.required) throw reject(`Missing parameter ${def.name}`, ['parameter_missing', def.name]);
      continue;
    }
    const value = coerce(def, raw);
    checkConstraints(parameter, value);
    values[def.name] = value;
  }
  return values;
}

function substituteBody(template: unknown, values: ParameterSet): unknown {
  if (typeof template === 'string') {
    const whole = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/.exec(template);
    if (whole && Object.hasOwn(values, whole[1])) return values[whole[1]];
    return fillPlaceholders(template, stringValues(values));
  }
  if (Array.isArray(template)) return template.map((item) => substituteBody(item, values));
  if (template !== null && typeof template === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(template)) out[key] = substituteBody(value, values);
    return out;
  }
  return template;
}

function stringValues(values: ParameterSet): Record<string, string> {
  return Object.fromEntries(Object.entries(values).map(([name, value]) => [name, String(value)]));
}

/**
 * Substitute checked parameter values into the request. URL values are
 * percent-encoded; body values keep their JSON type.
 */
export function bindParameters(compiled: CompiledRecipe, input: ParameterSet): BoundRequest {
  const values = resolveParameters(compiled, input);
  const url = fillPlaceholders(compiled.urlTemplate, stringValues(values), encodeURIComponent);
  const unresolved = listPlaceholders(url);
  if (unresolved.length > 0) {
    throw reject(`No value for placeholder {${unresolved[0]}}`, ['parameter_missing', unresolved[0]]);
  }

  const bound: BoundRequest = { url, method: compiled.method, headers: { ...compiled.headers }, values };
  if (compiled.bodyTemplate !== undefined && compiled.bodyTemplate !== null) {
    bound.body = JSON.stringify(substituteBody(compiled.bodyTemplate, values));
    if (!Object.keys(bound.headers).includes('content-type')) bound.headers['content-type'] = 'application/json';
  }
  return bound;
}

// ============================================
// CACHE
// ============================================

export interface CompileResult {
  compiled: CompiledRecipe;
  cacheHit: boolean;
}

/**
 * Shared, bounded cache of compiled recipes keyed by content hash
 */
export class RecipeCompiler {
  private readonly cache: TtlCache<CompiledRecipe>;

  constructor(private readonly options: CompilerOptions) {
    this.cache = new TtlCache<CompiledRecipe>({
      ttlMs: COMPILED_TTL_MS,
      maxEntries: options.capacity ?? DEFAULT_COMPILED_CACHE_CAPACITY,
    });
  }

  compile(definition: RecipeDefinition): CompileResult {
    const hash = recipeHash(definition);
    const cached = this.cache.get(hash);
    if (cached) return { compiled: cached, cacheHit: true };

    const compiled = compileRecipe(definition, this.options);
    this.cache.set(hash, compiled);
    log.debug('Recipe compiled', { recipe: definition.name, hash: hash.slice(0, 12) });
    return { compiled, cacheHit: false };
  }

  getStats(): ReturnType<TtlCache<CompiledRecipe>['getStats']> {
    return this.cache.getStats();
  }

  clear(): void {
    this.cache.clear();
  }
}
