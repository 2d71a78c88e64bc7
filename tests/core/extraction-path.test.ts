import { describe, it, expect } from 'vitest';
import {
  compileExtractionPath,
  evaluateExtractionPath,
  formatIdentifier,
  isValidExtractionPath,
  searchPath,
} from '../../src/core/extraction-path.js';
import { thrown } from '../helpers/fakes.js';

describe('extraction paths', () => {
  describe('evaluation', () => {
    const body = {
      data: {
        items: [
          { title: 'First', link: { href: '/a' }, stats: { stars: 3 } },
          { other: true },
          { title: 'Third', link: { href: '/c' } },
        ],
      },
      'content-type': 'json',
    };

    it('should follow fields and indexes', () => {
      expect(searchPath('data.items[0].title', body)).toBe('First');
      expect(searchPath('data.items[-1].link.href', body)).toBe('/c');
    });

    it('should project lists and drop missing values', () => {
      expect(searchPath('data.items[*].title', body)).toEqual(['First', 'Third']);
    });

    it('should build records with a multi-select hash', () => {
      expect(searchPath('data.items[*].{title: title, stars: stats.stars}', body)).toEqual([
        { title: 'First', stars: 3 },
        { title: null, stars: null },
        { title: 'Third', stars: null },
      ]);
    });

    it('should accept quoted identifiers', () => {
      expect(searchPath('"content-type"', body)).toBe('json');
    });

    it('should treat @ as the current node', () => {
      expect(searchPath('@', [1, 2])).toEqual([1, 2]);
    });

    it('should yield null for anything missing', () => {
      expect(searchPath('data.missing.deeper', body)).toBeNull();
      expect(searchPath('data.items[9]', body)).toBeNull();
      expect(searchPath('data[*].title', body)).toBeNull();
      expect(searchPath('data.items.title', body)).toBeNull();
    });

    it('should not read inherited properties', () => {
      expect(searchPath('toString', {})).toBeNull();
    });
  });

  describe('compilation', () => {
    it('should mark projecting expressions', () => {
      expect(compileExtractionPath('items[*].id').projects).toBe(true);
      expect(compileExtractionPath('items[0].id').projects).toBe(false);
    });

    it('should trim the expression', () => {
      expect(compileExtractionPath('  items[*].id ').expression).toBe('items[*].id');
    });

    it('should reuse compiled steps across evaluations', () => {
      const path = compileExtractionPath('a.b');
      expect(evaluateExtractionPath(path, { a: { b: 1 } })).toBe(1);
      expect(evaluateExtractionPath(path, { a: { b: 2 } })).toBe(2);
    });

    it('should reject functions, filters and slices', () => {
      for (const expression of ['length(items)', 'items[?price > `10`]', 'items[0:2]', 'items || other']) {
        const error = thrown(() => compileExtractionPath(expression));
        expect(error.kind).toBe('validator-rejected');
        expect(error.reasons).toEqual(['invalid_expression']);
      }
    });

    it('should reject empty and oversized expressions', () => {
      expect(thrown(() => compileExtractionPath('   ')).reasons).toEqual(['invalid_expression']);
      expect(thrown(() => compileExtractionPath('a'.repeat(513))).reasons).toEqual([
        'invalid_expression',
        'expression_length',
      ]);
    });

    it('should reject duplicate keys in a hash', () => {
      expect(isValidExtractionPath('items[*].{a: x, a: y}')).toBe(false);
      expect(isValidExtractionPath('items[*].{a: x, b: y}')).toBe(true);
    });
  });

  describe('formatIdentifier', () => {
    it('should quote keys that are not identifiers', () => {
      expect(formatIdentifier('title')).toBe('title');
      expect(formatIdentifier('content-type')).toBe('"content-type"');
    });
  });
});
