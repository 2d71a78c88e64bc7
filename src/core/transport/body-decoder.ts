/**
 * Response body decoding under size and nesting caps
 *
 * Size caps are checked on the decompressed output; zlib stops inflating as
 * soon as the output would exceed the cap.
 */

import * as zlib from 'node:zlib';
import { RecipeError } from '../../types/errors.js';

function tooLarge(limit: number): RecipeError {
  return new RecipeError('response-too-large', `Decoded body exceeds ${limit} bytes`, {
    stage: 'transport',
    reasons: ['decoded_bytes'],
  });
}

function isBufferTooLarge(error: unknown): boolean {
  return error instanceof RangeError ||
    (error instanceof Error && 'code' in error && error.code === 'ERR_BUFFER_TOO_LARGE');
}

function inflateEither(raw: Buffer, options: zlib.ZlibOptions): Buffer {
  try {
    return zlib.inflateSync(raw, options);
  } catch (error) {
    if (isBufferTooLarge(error)) throw error;
    // Some servers send raw deflate without the zlib wrapper
    return zlib.inflateRawSync(raw, options);
  }
}

/**
 * Undo Content-Encoding, refusing output larger than maxBytes
 */
export function decompress(raw: Buffer, contentEncoding: string | undefined, maxBytes: number): Buffer {
  const encodings = (contentEncoding ?? '')
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value !== '' && value !== 'identity');

  let data = raw;
  try {
    // Encodings are listed in the order they were applied
    for (const encoding of encodings.reverse()) {
      const options = { maxOutputLength: maxBytes + 1 };
      switch (encoding) {
        case 'gzip':
        case 'x-gzip':
          data = zlib.gunzipSync(data, options);
          break;
        case 'deflate':
          data = inflateEither(data, options);
          break;
        case 'br':
          data = zlib.brotliDecompressSync(data, options);
          break;
        default:
          throw new RecipeError('malformed-response', `Unsupported content encoding ${encoding}`, {
            stage: 'transport',
            reasons: ['unsupported_encoding'],
          });
      }
    }
  } catch (error) {
    if (error instanceof RecipeError) throw error;
    if (isBufferTooLarge(error)) throw tooLarge(maxBytes);
    throw new RecipeError('malformed-response', 'Response body could not be decompressed', {
      stage: 'transport',
      reasons: ['decompression'],
      cause: error,
    });
  }

  if (data.length > maxBytes) {
    throw tooLarge(maxBytes);
  }
  return data;
}

/**
 * Maximum array/object nesting of JSON-looking text, ignoring brackets
 * inside strings. Stops counting once `limit` is exceeded.
 */
export function jsonNestingDepth(text: string, limit = Infinity): number {
  let depth = 0;
  let max = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      depth++;
      if (depth > max) {
        max = depth;
        if (max > limit) return max;
      }
    } else if (ch === '}' || ch === ']') {
      depth = Math.max(0, depth - 1);
    }
  }
  return max;
}

export function looksLikeJson(contentType: string, text: string): boolean {
  if (contentType.includes('json')) return true;
  const start = text.trimStart()[0];
  return start === '{' || start === '[';
}

/**
 * Reject decoded JSON bodies nested deeper than maxDepth
 */
export function assertNestingDepth(text: string, contentType: string, maxDepth: number): void {
  if (!looksLikeJson(contentType, text)) return;
  const depth = jsonNestingDepth(text, maxDepth);
  if (depth > maxDepth) {
    throw new RecipeError('malformed-response', `Body nesting exceeds ${maxDepth} levels`, {
      stage: 'transport',
      reasons: ['nesting_depth'],
    });
  }
}
