import { describe, it, expect } from 'vitest';
import { fieldScore, generateExtractionOptions } from '../../src/core/extraction-candidates.js';

describe('generateExtractionOptions', () => {
  it('should rank the list under a collection key and its item fields', () => {
    const body = {
      results: [
        { id: 1, title: 'a', x: 1 },
        { id: 2, title: 'b', x: 2 },
      ],
    };
    const options = generateExtractionOptions(body);
    expect(options.map((o) => [o.expression, o.score])).toEqual([
      ['results', 173],
      ['results[*].id', 169],
      ['results[*].title', 164],
      ['results[*].{id: id, title: title, x: x}', 153],
      ['results[*].x', 124],
    ]);
    expect(options[0]).toEqual({
      expression: 'results',
      score: 173,
      description: 'the list itself',
      itemCount: 2,
      sampleKeys: ['id', 'title', 'x'],
    });
    expect(options[1].itemCount).toBe(2);
    expect(options[1].sampleKeys).toEqual([]);
  });

  it('should prefer the top-level list itself', () => {
    const options = generateExtractionOptions([{ id: 1 }, { id: 2 }]);
    expect(options.map((o) => o.expression)).toEqual(['[*]', '[*].id']);
    expect(options[0].itemCount).toBe(2);
    expect(options[0].sampleKeys).toEqual(['id']);
  });

  it('should offer wrapper objects', () => {
    const options = generateExtractionOptions({ data: { total: 3 } });
    expect(options).toEqual([
      { expression: 'data', score: 70, description: 'contents of data', itemCount: 1, sampleKeys: ['total'] },
    ]);
  });

  it('should limit the number of options', () => {
    const body = { items: [{ id: 1, name: 'n', url: 'u' }] };
    expect(generateExtractionOptions(body, { maxOptions: 2 })).toHaveLength(2);
  });

  it('should be deterministic regardless of key order', () => {
    const a = generateExtractionOptions({ b: [{ id: 1 }], a: [{ id: 2 }] });
    const b = generateExtractionOptions({ a: [{ id: 2 }], b: [{ id: 1 }] });
    expect(a.map((o) => o.expression)).toEqual(b.map((o) => o.expression));
  });

  it('should return nothing for scalars', () => {
    expect(generateExtractionOptions('plain')).toEqual([]);
  });
});

describe('fieldScore', () => {
  it('should prefer ids, then labels, then links', () => {
    expect(fieldScore('id')).toBe(50);
    expect(fieldScore('title')).toBe(45);
    expect(fieldScore('userId')).toBe(42);
    expect(fieldScore('href')).toBe(30);
    expect(fieldScore('createdAt')).toBe(12);
    expect(fieldScore('misc')).toBe(5);
  });
});
