/**
 * Extraction Path - restricted JMESPath-compatible expressions
 *
 * Supported:
 * - identifiers and quoted identifiers: `data.items`, `"content-type"`
 * - index access, negative allowed: `items[0]`, `items[-1]`
 * - projections: `items[*].title`
 * - a trailing multi-select hash: `items[*].{title: title, url: link.href}`
 * - `@` for the current node
 *
 * No functions, filters or slices. Expressions compile once into a list of
 * steps; evaluation never throws and yields null for anything missing.
 *
 * @example
 * const path = compileExtractionPath('results[*].{name: name, stars: stats.stars}');
 * evaluateExtractionPath(path, body);
 */

import { RecipeError } from '../types/errors.js';

export const MAX_EXPRESSION_LENGTH = 512;
const MAX_SELECT_NESTING = 4;

// ============================================
// TYPES
// ============================================

export type PathStep =
  | { kind: 'field'; name: string }
  | { kind: 'index'; index: number }
  | { kind: 'project' }
  | { kind: 'select'; fields: Array<{ alias: string; path: PathStep[] }> };

export interface CompiledExtractionPath {
  readonly expression: string;
  readonly steps: readonly PathStep[];
  /** The result is a list (a projection occurs) */
  readonly projects: boolean;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Render a key as an identifier, quoting it when needed
 */
export function formatIdentifier(key: string): string {
  return IDENTIFIER_RE.test(key) ? key : JSON.stringify(key);
}

// ============================================
// PARSER
// ============================================

class PathParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parse(): PathStep[] {
    const steps = this.parseExpression(0);
    this.skipSpace();
    if (this.pos < this.source.length) {
      this.fail(`unexpected '${this.source[this.pos]}'`);
    }
    return steps;
  }

  private fail(detail: string): never {
    throw new RecipeError('validator-rejected', `Invalid extraction expression at ${this.pos}: ${detail}`, {
      stage: 'compile',
      reasons: ['invalid_expression'],
    });
  }

  private skipSpace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) this.pos++;
  }

  private peek(): string {
    this.skipSpace();
    return this.source[this.pos] ?? '';
  }

  private expect(char: string): void {
    if (this.peek() !== char) this.fail(`expected '${char}'`);
    this.pos++;
  }

  private parseExpression(nesting: number): PathStep[] {
    const steps: PathStep[] = [];
    let first = true;

    for (;;) {
      const char = this.peek();

      if (char === '[') {
        steps.push(this.parseBracket());
      } else if (first || char === '.') {
        if (!first) this.pos++;
        const next = this.peek();
        if (next === '{') {
          steps.push(this.parseSelect(nesting));
          return steps;
        }
        if (next === '@') {
          this.pos++;
        } else {
          steps.push({ kind: 'field', name: this.parseIdentifier() });
        }
      } else {
        return steps;
      }
      first = false;
    }
  }

  private parseIdentifier(): string {
    this.skipSpace();
    if (this.source[this.pos] === '"') return this.parseQuoted();

    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.source.slice(this.pos));
    if (!match) this.fail('expected identifier');
    this.pos += match[0].length;
    return match[0];
  }

  private parseQuoted(): string {
    const start = this.pos;
    this.pos++;
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      if (this.source[this.pos] === '\\') this.pos++;
      this.pos++;
    }
    if (this.pos >= this.source.length) this.fail('unterminated quoted identifier');
    this.pos++;

    let value: unknown;
    try {
      value = JSON.parse(this.source.slice(start, this.pos));
    } catch {
      this.fail('bad escape in quoted identifier');
    }
    if (typeof value !== 'string') this.fail('expected quoted identifier');
    return value;
  }

  private parseBracket(): PathStep {
    this.expect('[');
    if (this.peek() === '*') {
      this.pos++;
      this.expect(']');
      return { kind: 'project' };
    }

    const match = /^-?\d{1,9}/.exec(this.source.slice(this.pos));
    if (!match) this.fail('expected index or *');
    this.pos += match[0].length;
    this.expect(']');
    return { kind: 'index', index: Number(match[0]) };
  }

  private parseSelect(nesting: number): PathStep {
    if (nesting >= MAX_SELECT_NESTING) this.fail('multi-select nested too deeply');
    this.expect('{');
    const fields: Array<{ alias: string; path: PathStep[] }> = [];
    const aliases = new Set<string>();

    for (;;) {
      const alias = this.parseIdentifier();
      if (aliases.has(alias)) this.fail(`duplicate key '${alias}'`);
      aliases.add(alias);
      this.expect(':');
      fields.push({ alias, path: this.parseExpression(nesting + 1) });

      const next = this.peek();
      if (next === ',') {
        this.pos++;
        continue;
      }
      this.expect('}');
      return { kind: 'select', fields };
    }
  }
}

function hasProjection(steps: readonly PathStep[]): boolean {
  return steps.some((step) => step.kind === 'project');
}

/**
 * Compile an expression; throws validator-rejected on syntax errors
 */
export function compileExtractionPath(expression: string): CompiledExtractionPath {
  const trimmed = expression.trim();
  if (!trimmed) {
    throw new RecipeError('validator-rejected', 'Extraction expression is empty', {
      stage: 'compile',
      reasons: ['invalid_expression'],
    });
  }
  if (trimmed.length > MAX_EXPRESSION_LENGTH) {
    throw new RecipeError('validator-rejected', 'Extraction expression is too long', {
      stage: 'compile',
      reasons: ['invalid_expression', 'expression_length'],
    });
  }

  const steps = new PathParser(trimmed).parse();
  return Object.freeze({ expression: trimmed, steps: Object.freeze(steps), projects: hasProjection(steps) });
}

export function isValidExtractionPath(expression: string): boolean {
  try {
    compileExtractionPath(expression);
    return true;
  } catch {
    return false;
  }
}

// ============================================
// EVALUATION
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function walk(steps: readonly PathStep[], from: number, value: unknown): unknown {
  let current = value;

  for (let i = from; i < steps.length; i++) {
    if (current === null || current === undefined) return null;
    const step = steps[i];

    switch (step.kind) {
      case 'field':
        current = isRecord(current) && Object.hasOwn(current, step.name) ? current[step.name] : null;
        break;
      case 'index': {
        if (!Array.isArray(current)) return null;
        const index = step.index < 0 ? current.length + step.index : step.index;
        current = index >= 0 && index < current.length ? current[index] : null;
        break;
      }
      case 'project': {
        if (!Array.isArray(current)) return null;
        const out: unknown[] = [];
        for (const element of current) {
          const projected = walk(steps, i + 1, element);
          if (projected !== null && projected !== undefined) out.push(projected);
        }
        return out;
      }
      case 'select': {
        const selected: Record<string, unknown> = {};
        for (const field of step.fields) {
          selected[field.alias] = walk(field.path, 0, current);
        }
        current = selected;
        break;
      }
    }
  }

  return current === undefined ? null : current;
}

export function evaluateExtractionPath(path: CompiledExtractionPath, value: unknown): unknown {
  return walk(path.steps, 0, value);
}

/**
 * Compile and evaluate in one call
 */
export function searchPath(expression: string, value: unknown): unknown {
  return evaluateExtractionPath(compileExtractionPath(expression), value);
}
