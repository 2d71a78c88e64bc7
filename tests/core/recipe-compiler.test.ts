import { describe, it, expect } from 'vitest';
import { EgressPolicy } from '../../src/core/egress-policy.js';
import {
  RecipeCompiler,
  bindParameters,
  compileRecipe,
  recipeHash,
  resolveParameters,
} from '../../src/core/recipe-compiler.js';
import type { RecipeDefinition } from '../../src/types/recipe.js';
import { FakeResolver, searchRecipe, thrown } from '../helpers/fakes.js';

const policy = new EgressPolicy({}, new FakeResolver());

function paged(): RecipeDefinition {
  const base = searchRecipe({}, { url: 'https://api.example.com/api/search?q={query}&page={page}' });
  return {
    ...base,
    parameters: [
      ...base.parameters,
      { name: 'page', type: 'integer', source: 'caller', required: false, default: 1, constraints: { min: 1, max: 50 } },
    ],
  };
}

describe('compileRecipe', () => {
  it('should produce a frozen fast-path form', () => {
    const compiled = compileRecipe(searchRecipe(), { policy });
    expect(compiled.method).toBe('GET');
    expect(compiled.urlTemplate).toBe('https://api.example.com/api/search?q={query}');
    expect(compiled.headers).toEqual({ accept: 'application/json' });
    expect(compiled.extract?.expression).toBe('results[*].title');
    expect(compiled.selectors).toBeNull();
    expect(compiled.legalTransports).toEqual(['session-free', 'session-bound', 'in-page']);
    expect(Object.isFrozen(compiled)).toBe(true);
    expect(compiled.hash).toBe(recipeHash(searchRecipe()));
  });

  it('should refuse hosts outside the allowed domains', () => {
    const error = thrown(() => compileRecipe(searchRecipe({}, { allowedDomains: ['other.example.com'] }), { policy }));
    expect(error.kind).toBe('validator-rejected');
    expect(error.reasons).toEqual(['domain_not_allowed']);
  });

  it('should refuse disallowed and templated headers', () => {
    expect(thrown(() => compileRecipe(searchRecipe({}, { headers: { cookie: 'sid=1' } }), { policy })).reasons).toEqual([
      'header_not_allowed',
    ]);
    expect(
      thrown(() => compileRecipe(searchRecipe({}, { headers: { 'x-client': '{query}' } }), { policy })).reasons
    ).toEqual(['placeholder_in_header']);
  });

  it('should refuse mutating methods without opt-in', () => {
    const post = searchRecipe({}, { method: 'POST' });
    expect(thrown(() => compileRecipe(post, { policy })).reasons).toEqual(['mutating_method']);
    expect(compileRecipe(post, { policy, allowMutatingMethods: true }).method).toBe('POST');
  });

  it('should refuse placeholders without a parameter', () => {
    expect(thrown(() => compileRecipe(searchRecipe({ parameters: [] }), { policy })).reasons).toEqual([
      'placeholder_unbound',
    ]);
  });

  it('should restrict transports by parameter source', () => {
    const withSession = searchRecipe();
    withSession.parameters.push({ name: 'csrf', type: 'string', source: 'session', required: false });
    expect(compileRecipe(withSession, { policy }).legalTransports).toEqual(['session-bound', 'in-page']);

    const withPage = searchRecipe();
    withPage.parameters.push({ name: 'nonce', type: 'string', source: 'page', required: false });
    expect(compileRecipe(withPage, { policy }).legalTransports).toEqual(['in-page']);
  });

  it('should reject invalid parameter patterns', () => {
    const recipe = searchRecipe();
    recipe.parameters[0].constraints = { pattern: '(' };
    expect(thrown(() => compileRecipe(recipe, { policy })).reasons).toEqual(['parameter_pattern']);
  });
});

describe('parameter binding', () => {
  const compiled = compileRecipe(paged(), { policy });

  it('should percent-encode URL values and apply defaults', () => {
    expect(bindParameters(compiled, { query: 'a b&c' })).toEqual({
      url: 'https://api.example.com/api/search?q=a%20b%26c&page=1',
      method: 'GET',
      headers: { accept: 'application/json' },
      values: { query: 'a b&c', page: 1 },
    });
  });

  it('should coerce typed values', () => {
    expect(resolveParameters(compiled, { query: 'x', page: '7' })).toEqual({ query: 'x', page: 7 });
    expect(thrown(() => resolveParameters(compiled, { query: 'x', page: 'two' })).reasons).toEqual([
      'parameter_type',
      'page',
    ]);
  });

  it('should enforce constraints', () => {
    expect(thrown(() => resolveParameters(compiled, { query: 'x'.repeat(257) })).reasons).toEqual([
      'parameter_constraint',
      'query',
      'maxLength',
    ]);
    expect(thrown(() => resolveParameters(compiled, { query: 'x', page: 51 })).reasons).toEqual([
      'parameter_constraint',
      'page',
      'max',
    ]);
    expect(thrown(() => resolveParameters(compiled, { query: 'a\nb' })).reasons).toEqual(['line_break', 'query']);
  });

  it('should reject unknown and missing parameters', () => {
    expect(thrown(() => resolveParameters(compiled, { query: 'x', other: 1 })).reasons).toEqual([
      'unknown_parameter',
      'other',
    ]);
    expect(thrown(() => resolveParameters(compiled, {})).reasons).toEqual(['parameter_missing', 'query']);
  });

  it('should check patterns against the whole value', () => {
    const recipe = searchRecipe();
    recipe.parameters[0].constraints = { pattern: '[a-z]+' };
    const strict = compileRecipe(recipe, { policy });
    expect(resolveParameters(strict, { query: 'abc' })).toEqual({ query: 'abc' });
    expect(thrown(() => resolveParameters(strict, { query: 'abc1' })).reasons).toEqual([
      'parameter_constraint',
      'query',
      'pattern',
    ]);
  });

  it('should ignore caller values for constants', () => {
    const recipe = searchRecipe();
    recipe.parameters.push({ name: 'locale', type: 'string', source: 'constant', required: true, default: 'en' });
    const withConstant = compileRecipe(recipe, { policy });
    expect(resolveParameters(withConstant, { query: 'x', locale: 'fr' })).toEqual({ query: 'x', locale: 'en' });
  });

  it('should keep JSON types in body templates', () => {
    const recipe = paged();
    recipe.request.method = 'POST';
    recipe.request.url = 'https://api.example.com/api/search';
    recipe.request.body = { q: '{query}', page: '{page}', label: 'p-{page}' };
    const bound = bindParameters(compileRecipe(recipe, { policy, allowMutatingMethods: true }), { query: 'x', page: 2 });
    expect(bound.body).toBe('{"q":"x","page":2,"label":"p-2"}');
    expect(bound.headers['content-type']).toBe('application/json');
  });
});

describe('RecipeCompiler', () => {
  it('should serve repeated compiles from the cache', () => {
    const compiler = new RecipeCompiler({ policy });
    const first = compiler.compile(searchRecipe());
    const second = compiler.compile(searchRecipe());
    expect(first.cacheHit).toBe(false);
    expect(second.cacheHit).toBe(true);
    expect(second.compiled).toBe(first.compiled);
  });

  it('should never serve a stale form for an edited recipe', () => {
    const compiler = new RecipeCompiler({ policy });
    compiler.compile(searchRecipe());
    const edited = compiler.compile(searchRecipe({}, { extract: 'results[*].id' }));
    expect(edited.cacheHit).toBe(false);
    expect(edited.compiled.extract?.expression).toBe('results[*].id');
  });

  it('should ignore edits that do not change execution', () => {
    const compiler = new RecipeCompiler({ policy });
    compiler.compile(searchRecipe());
    expect(compiler.compile(searchRecipe({ description: 'changed' })).cacheHit).toBe(true);
    expect(compiler.getStats().hits).toBe(1);
  });
});
