/**
 * Recipe Validator - turns untrusted analyzer output into a safe draft
 *
 * Every safety-relevant field is re-derived here rather than taken from the
 * analyzer: the canonical origin, the allowed-domain set, the method, the
 * header set and the parameter list. Failures throw validator-rejected with
 * machine-readable reasons.
 */

import * as cheerio from 'cheerio';
import type { AnalyzerOutput, ProposedParameter } from '../types/analysis.js';
import { RecipeError } from '../types/errors.js';
import type {
  HttpMethod,
  ParameterType,
  ParameterValue,
  RecipeDefinition,
  RecipeParameter,
} from '../types/recipe.js';
import { logger } from '../utils/logger.js';
import { isSensitiveHeader, isSensitiveKey, redactUrl } from '../utils/redaction.js';
import type { EgressPolicy } from './egress-policy.js';
import { compileExtractionPath } from './extraction-path.js';
import { PLACEHOLDER_NAME_RE, fillPlaceholders, listPlaceholders } from './request-template.js';

const log = logger.validator;

export const SAFE_METHODS: readonly HttpMethod[] = ['GET', 'HEAD'];
export const MUTATING_METHODS: readonly HttpMethod[] = ['POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Request headers a recipe may carry. Transport-control headers (host,
 * connection, content-length, transfer-encoding, ...) are never on it.
 */
export const HEADER_ALLOWLIST: ReadonlySet<string> = new Set([
  'accept',
  'accept-language',
  'content-type',
  'user-agent',
  'referer',
  'origin',
  'x-requested-with',
  'cache-control',
  'pragma',
  'dnt',
]);

const FORWARDING_HEADER_RE = /^x-(forwarded|real-ip|original|rewrite|http-method)/;
const LINE_BREAK_RE = /[\r\n]/;
const MAX_URL_LENGTH = 2048;
const MAX_PARAMETERS = 8;

export interface ValidatorOptions {
  /** POST, PUT, PATCH and DELETE need explicit opt-in */
  allowMutatingMethods?: boolean;
  now?: () => Date;
}

function reject(message: string, reasons: string[]): RecipeError {
  return new RecipeError('validator-rejected', message, { stage: 'validation', reasons });
}

/**
 * Header names a recipe may keep: the allowlist plus custom `x-` headers that
 * neither carry credentials nor steer proxies
 */
export function isAllowedHeader(name: string): boolean {
  const lowered = name.toLowerCase();
  if (isSensitiveHeader(lowered) || isSensitiveKey(lowered)) return false;
  if (HEADER_ALLOWLIST.has(lowered)) return true;
  return lowered.startsWith('x-') && !FORWARDING_HEADER_RE.test(lowered);
}

export function normalizeRecipeName(raw: string): string {
  const slug = raw.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return (slug || 'recipe').slice(0, 64).replace(/-+$/, '');
}

function normalizeMethod(raw: string, allowMutating: boolean): HttpMethod {
  const method = raw.trim().toUpperCase();
  const safe = SAFE_METHODS.find((candidate) => candidate === method);
  if (safe) return safe;
  const mutating = MUTATING_METHODS.find((candidate) => candidate === method);
  if (mutating) {
    if (allowMutating) return mutating;
    throw reject(`Method ${method} needs explicit opt-in`, ['mutating_method']);
  }
  throw reject(`Method ${method} is not supported`, ['method']);
}

/**
 * Canonical URL template: scheme and host normalized by the URL parser,
 * default port and fragment removed, placeholders only after the authority
 */
export function canonicalizeUrlTemplate(template: string, policy: EgressPolicy): { url: string; host: string } {
  if (template.length > MAX_URL_LENGTH) throw reject('URL template is too long', ['url_length']);
  if (LINE_BREAK_RE.test(template)) throw reject('URL template contains a line break', ['line_break']);

  const scheme = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.exec(template);
  if (!scheme) throw reject('URL template must be an absolute http(s) URL', ['invalid_url']);
  const pathStart = template.slice(scheme[0].length).search(/[/?#]/);
  const authorityEnd = pathStart < 0 ? -1 : scheme[0].length + pathStart;
  const origin = authorityEnd < 0 ? template : template.slice(0, authorityEnd);
  if (origin.includes('{') || origin.includes('}')) {
    throw reject('Placeholders are not allowed in the scheme or host', ['placeholder_in_authority']);
  }

  const names = listPlaceholders(template);
  for (const name of names) {
    if (!PLACEHOLDER_NAME_RE.test(name)) throw reject(`Invalid placeholder {${name}}`, ['placeholder_name']);
  }

  const sample = fillPlaceholders(template, Object.fromEntries(names.map((name) => [name, 'sample'])));
  const verdict = policy.verdict(sample);
  if (!verdict.allowed) {
    throw reject(`URL refused by egress policy: ${verdict.detail}`, ['egress', verdict.reason]);
  }

  const rest = authorityEnd < 0 ? '/' : template.slice(authorityEnd);
  const withoutFragment = rest.includes('#') ? rest.slice(0, rest.indexOf('#')) : rest;
  const tail = withoutFragment.startsWith('/') ? withoutFragment : `/${withoutFragment}`;
  return { url: `${verdict.url.protocol}//${verdict.url.host}${tail}`, host: verdict.host };
}

function bodyPlaceholders(body: unknown, out: string[] = []): string[] {
  if (typeof body === 'string') {
    out.push(...listPlaceholders(body));
  } else if (Array.isArray(body)) {
    for (const item of body) bodyPlaceholders(item, out);
  } else if (body !== null && typeof body === 'object') {
    for (const value of Object.values(body)) bodyPlaceholders(value, out);
  }
  return out;
}

function coerceExample(raw: string, type: ParameterType): ParameterValue | undefined {
  switch (type) {
    case 'integer':
      return /^-?\d{1,15}$/.test(raw) ? Number(raw) : undefined;
    case 'number': {
      const value = Number(raw);
      return raw.trim() !== '' && Number.isFinite(value) ? value : undefined;
    }
    case 'boolean':
      return raw === 'true' ? true : raw === 'false' ? false : undefined;
    default:
      return raw;
  }
}

function validateParameters(proposed: readonly ProposedParameter[], referenced: ReadonlySet<string>): RecipeParameter[] {
  if (proposed.length > MAX_PARAMETERS) throw reject('Too many parameters', ['parameter_count']);
  const seen = new Set<string>();
  const parameters: RecipeParameter[] = [];

  for (const p of proposed) {
    if (!PLACEHOLDER_NAME_RE.test(p.name)) throw reject(`Invalid parameter name ${p.name}`, ['parameter_name']);
    if (seen.has(p.name)) throw reject(`Duplicate parameter ${p.name}`, ['parameter_duplicate']);
    seen.add(p.name);
    if (!referenced.has(p.name)) {
      throw reject(`Parameter ${p.name} is not used by the request`, ['parameter_unused']);
    }

    const parameter: RecipeParameter = {
      name: p.name,
      type: p.type,
      source: p.source,
      required: p.required,
      ...(p.description ? { description: p.description.slice(0, 200) } : {}),
      constraints: p.type === 'string' ? { maxLength: 256 } : {},
    };
    if (p.example !== undefined) {
      if (LINE_BREAK_RE.test(p.example)) throw reject(`Example for ${p.name} contains a line break`, ['line_break']);
      const example = coerceExample(p.example, p.type);
      if (example === undefined) throw reject(`Example for ${p.name} is not a ${p.type}`, ['parameter_type']);
      parameter.examples = [example];
    }
    parameters.push(parameter);
  }

  for (const name of referenced) {
    if (!seen.has(name)) throw reject(`Placeholder {${name}} has no parameter`, ['placeholder_unbound']);
  }
  return parameters;
}

function validateSelectors(selectors: Record<string, string> | undefined): Record<string, string> {
  const entries = Object.entries(selectors ?? {});
  if (entries.length === 0) throw reject('HTML recipes need at least one selector', ['selectors_missing']);

  const $ = cheerio.load('<html><body></body></html>');
  const out: Record<string, string> = {};
  for (const [field, selector] of entries) {
    if (!PLACEHOLDER_NAME_RE.test(field)) throw reject(`Invalid selector field ${field}`, ['selector_field']);
    try {
      $(selector);
    } catch (error) {
      throw new RecipeError('validator-rejected', `Invalid CSS selector for ${field}`, {
        stage: 'validation',
        reasons: ['selector_syntax'],
        cause: error,
      });
    }
    out[field] = selector;
  }
  return out;
}

/**
 * Validate analyzer output into a draft recipe definition
 */
export function validateDraft(
  output: AnalyzerOutput,
  policy: EgressPolicy,
  options: ValidatorOptions = {}
): RecipeDefinition {
  const now = (options.now ?? (() => new Date()))().toISOString();
  const { url, host } = canonicalizeUrlTemplate(output.request.url, policy);
  const method = normalizeMethod(output.request.method, options.allowMutatingMethods === true);

  const headers: Record<string, string> = {};
  const droppedHeaders: string[] = [];
  for (const [name, value] of Object.entries(output.request.headers)) {
    if (LINE_BREAK_RE.test(name) || LINE_BREAK_RE.test(value)) {
      throw reject(`Header ${name} contains a line break`, ['line_break']);
    }
    if (isAllowedHeader(name)) {
      headers[name.toLowerCase()] = value;
    } else {
      droppedHeaders.push(name.toLowerCase());
    }
  }

  let body: unknown;
  if (output.request.body !== undefined && output.request.body !== null) {
    if (method === 'GET' || method === 'HEAD') throw reject(`${method} requests carry no body`, ['body_not_allowed']);
    body = output.request.body;
  }

  const referenced = new Set([...listPlaceholders(url), ...bodyPlaceholders(body)]);
  const parameters = validateParameters(output.parameters, referenced);

  const responseKind = output.request.responseKind;
  let extract: string | undefined;
  let selectors: Record<string, string> | undefined;
  if (responseKind === 'json' && output.request.extract) {
    extract = compileExtractionPath(output.request.extract).expression;
  } else if (responseKind === 'html') {
    selectors = validateSelectors(output.request.selectors);
  }

  const draft: RecipeDefinition = {
    name: normalizeRecipeName(output.name),
    description: output.description.slice(0, 500),
    request: {
      url,
      method,
      headers,
      ...(body !== undefined ? { body } : {}),
      responseKind,
      ...(extract ? { extract } : {}),
      ...(selectors ? { selectors } : {}),
      allowedDomains: [host],
    },
    parameters,
    status: 'draft',
    createdAt: now,
    updatedAt: now,
  };

  log.info('Draft validated', {
    recipe: draft.name,
    url: redactUrl(url),
    strategy: output.strategy,
    droppedHeaders,
  });
  return draft;
}
