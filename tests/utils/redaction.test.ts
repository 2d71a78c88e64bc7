import { describe, it, expect } from 'vitest';
import {
  REDACTED,
  looksLikeSecretPathSegment,
  looksLikeSecretValue,
  redactBody,
  redactHeaders,
  redactJsonValue,
  redactText,
  redactUrl,
  shouldRedactQueryValue,
  truncate,
} from '../../src/utils/redaction.js';

const FAKE_JWT = 'eyJtesttesttest.testtesttest.testtesttest';

describe('redaction', () => {
  describe('redactUrl', () => {
    it('should strip credentials, the fragment, secret segments and secret query values', () => {
      expect(
        redactUrl('https://user:pw@api.example.com/v1/items/550e8400-e29b-41d4-a716-446655440000?page=2&api_key=test-secret#frag')
      ).toBe('https://api.example.com/v1/items/[REDACTED]?page=2&api_key=%5BREDACTED%5D');
    });

    it('should leave ordinary URLs untouched', () => {
      expect(redactUrl('https://api.example.com/api/search?q=shoes')).toBe('https://api.example.com/api/search?q=shoes');
    });

    it('should redact unparseable input as text', () => {
      expect(redactUrl(`not a url ${FAKE_JWT}`)).toBe('not a url [REDACTED]');
    });
  });

  describe('shouldRedactQueryValue', () => {
    it('should redact sensitive keys whatever the value', () => {
      expect(shouldRedactQueryValue('access_token', 'x')).toBe(true);
      expect(shouldRedactQueryValue('sessionId', 'x')).toBe(true);
    });

    it('should redact code and key only when the value is opaque', () => {
      expect(shouldRedactQueryValue('code', 'fr')).toBe(false);
      expect(shouldRedactQueryValue('code', 'a1b2c3')).toBe(true);
    });

    it('should redact secret-shaped values under harmless keys', () => {
      expect(shouldRedactQueryValue('q', 'shoes')).toBe(false);
      expect(shouldRedactQueryValue('ref', 'd41d8cd98f00b204e9800998ecf8427e')).toBe(true);
    });
  });

  describe('looksLikeSecretPathSegment', () => {
    it('should keep human-readable slugs', () => {
      expect(looksLikeSecretPathSegment('release-20240115-production')).toBe(false);
      expect(looksLikeSecretPathSegment('items')).toBe(false);
    });

    it('should flag opaque tokens', () => {
      expect(looksLikeSecretPathSegment('a1b2c3d4e5f6g7h8i9j0k1l2')).toBe(true);
      expect(looksLikeSecretPathSegment(FAKE_JWT)).toBe(true);
    });
  });

  describe('redactHeaders', () => {
    it('should drop credential headers and mask sensitive names', () => {
      expect(
        redactHeaders({ Authorization: 'Bearer test-secret', 'X-Request-Id': 'abc', 'X-Session-Hint': 'foo' })
      ).toEqual({ 'x-request-id': 'abc', 'x-session-hint': REDACTED });
      expect(redactHeaders(undefined)).toEqual({});
    });
  });

  describe('redactText', () => {
    it('should replace embedded tokens', () => {
      expect(redactText(`token ${FAKE_JWT} ok`)).toBe('token [REDACTED] ok');
      expect(redactText('Used Bearer test-secret-value here')).toBe('Used [REDACTED] here');
    });
  });

  describe('redactJsonValue', () => {
    it('should replace values under sensitive keys at any depth', () => {
      expect(
        redactJsonValue({ user: { name: 'ann', password: 'test-secret' }, items: [{ apiKey: 'x' }], n: 1 })
      ).toEqual({ user: { name: 'ann', password: REDACTED }, items: [{ apiKey: REDACTED }], n: 1 });
    });
  });

  describe('redactBody', () => {
    it('should redact JSON structurally and anything else as text', () => {
      expect(redactBody('{"token":"abc","q":"shoes"}')).toBe('{"token":"[REDACTED]","q":"shoes"}');
      expect(redactBody('hello Bearer abcdefgh12345')).toBe('hello [REDACTED]');
    });
  });

  describe('truncate', () => {
    it('should append a marker within the limit', () => {
      expect(truncate('abcdefghijklmnop', 14)).toBe('abcd...[TRUNC]');
      expect(truncate('abc', 5)).toBe('abc');
      expect(truncate('abcdefghijkl', 4)).toBe('...[');
      expect(truncate('abc', 0)).toBe('');
    });
  });

  it('should treat long hex strings as secrets', () => {
    expect(looksLikeSecretValue('d41d8cd98f00b204e9800998ecf8427e')).toBe(true);
    expect(looksLikeSecretValue('hello')).toBe(false);
  });
});
