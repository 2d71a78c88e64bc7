/**
 * Response Extractor - applies a recipe's declared extraction to a body
 *
 * JSON responses go through the compiled extraction path, HTML responses
 * through cheerio selectors. Without an extraction the raw body is returned,
 * truncated.
 */

import * as cheerio from 'cheerio';
import { RecipeError } from '../types/errors.js';
import { truncate } from '../utils/redaction.js';
import { evaluateExtractionPath } from './extraction-path.js';
import type { CompiledRecipe } from './recipe-compiler.js';

export const MAX_RAW_CHARS = 8 * 1024;
const MAX_MATCHES_PER_SELECTOR = 100;

export interface ExtractedResult {
  data: unknown;
  /** Raw body, truncated, when nothing was extracted */
  raw?: string;
  truncated: boolean;
}

type ExtractionSpec = Pick<CompiledRecipe, 'responseKind' | 'extract' | 'selectors'>;

function rawResult(body: string): { raw: string; truncated: boolean } {
  return { raw: truncate(body, MAX_RAW_CHARS), truncated: body.length > MAX_RAW_CHARS };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new RecipeError('malformed-response', 'Response body is not valid JSON', {
      stage: 'extraction',
      reasons: ['invalid_json'],
      cause: error,
    });
  }
}

/**
 * Text of every element each selector matches
 */
export function extractWithSelectors(html: string, selectors: Readonly<Record<string, string>>): Record<string, string[]> {
  const $ = cheerio.load(html);
  const out: Record<string, string[]> = {};
  for (const [field, selector] of Object.entries(selectors)) {
    out[field] = $(selector)
      .slice(0, MAX_MATCHES_PER_SELECTOR)
      .map((_, element) => $(element).text().replace(/\s+/g, ' ').trim())
      .get()
      .filter((text) => text !== '');
  }
  return out;
}

export function extractResponse(declared: ExtractionSpec, body: string): ExtractedResult {
  if (declared.responseKind === 'json') {
    const parsed = parseJson(body);
    if (!declared.extract) return { data: parsed, ...rawResult(body) };
    const data = evaluateExtractionPath(declared.extract, parsed);
    if (data === null) {
      throw new RecipeError('extraction-failed', `Extraction ${declared.extract.expression} matched nothing`, {
        stage: 'extraction',
        reasons: ['no_match'],
      });
    }
    return { data, truncated: false };
  }

  if (declared.responseKind === 'html' && declared.selectors) {
    const data = extractWithSelectors(body, declared.selectors);
    if (Object.values(data).every((matches) => matches.length === 0)) {
      throw new RecipeError('extraction-failed', 'No selector matched the page', {
        stage: 'extraction',
        reasons: ['selectors_empty'],
      });
    }
    return { data, truncated: false };
  }

  const raw = rawResult(body);
  return { data: raw.raw, ...raw };
}
