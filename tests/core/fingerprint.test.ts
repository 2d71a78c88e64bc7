import { describe, it, expect } from 'vitest';
import { compareFingerprints, computeFingerprint, jaccard } from '../../src/core/fingerprint.js';

const baselineValue = {
  items: [{ id: 1, title: 'a' }, { id: 2 }],
};

describe('computeFingerprint', () => {
  it('should collect typed paths with array indices folded', () => {
    const fingerprint = computeFingerprint(baselineValue);
    expect(fingerprint.algorithmVersion).toBe('shape-v1');
    expect(fingerprint.paths).toEqual([
      '$.items:array',
      '$.items[].id:number',
      '$.items[].title:string',
      '$.items[]:object',
      '$:object',
    ]);
  });

  it('should mark paths present in every element as required', () => {
    expect(computeFingerprint(baselineValue).required).toEqual([
      '$.items:array',
      '$.items[].id:number',
      '$.items[]:object',
      '$:object',
    ]);
  });

  it('should keep nullable paths out of the required set', () => {
    const fingerprint = computeFingerprint([{ a: null }, { a: 'x' }]);
    expect(fingerprint.paths).toContain('$[].a:null');
    expect(fingerprint.paths).toContain('$[].a:string');
    expect(fingerprint.required).toEqual(['$:array', '$[]:object']);
  });

  it('should stop at the depth limit', () => {
    expect(computeFingerprint({ a: { b: { c: 1 } } }, { maxDepth: 1 }).paths).toEqual(['$.a:object', '$:object']);
  });

  it('should not depend on key order', () => {
    const a = computeFingerprint({ x: 1, y: 'z' });
    const b = computeFingerprint({ y: 'w', x: 2 });
    expect(a.digest).toBe(b.digest);
    expect(a.digest).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('compareFingerprints', () => {
  const baseline = computeFingerprint(baselineValue);

  it('should match identical shapes', () => {
    const result = compareFingerprints(baseline, computeFingerprint({ items: [{ id: 9, title: 'z' }, { id: 3 }] }));
    expect(result).toEqual({ matched: true, score: 1, missingRequired: [], added: [], removed: [] });
  });

  it('should accept additive fields', () => {
    const result = compareFingerprints(
      baseline,
      computeFingerprint({ items: [{ id: 1, title: 'a', extra: true }, { id: 2 }] })
    );
    expect(result.matched).toBe(true);
    expect(result.added).toEqual(['$.items[].extra:boolean']);
    expect(result.removed).toEqual([]);
  });

  it('should ignore paths below an array that came back empty', () => {
    const result = compareFingerprints(baseline, computeFingerprint({ items: [] }));
    expect(result).toEqual({ matched: true, score: 1, missingRequired: [], added: [], removed: [] });
  });

  it('should fail when a required path disappears', () => {
    const result = compareFingerprints(baseline, computeFingerprint({ items: [{ title: 'a' }] }));
    expect(result.matched).toBe(false);
    expect(result.missingRequired).toEqual(['$.items[].id:number']);
  });

  it('should fail when a required path changes type', () => {
    const result = compareFingerprints(baseline, computeFingerprint({ items: [{ id: '1' }, { id: '2' }] }));
    expect(result.matched).toBe(false);
    expect(result.missingRequired).toEqual(['$.items[].id:number']);
  });

  it('should apply the similarity threshold to optional removals', () => {
    const withOptional = computeFingerprint({ items: [{ id: 1, a: 1 }, { id: 2 }] });
    const without = computeFingerprint({ items: [{ id: 1 }, { id: 2 }] });
    const strict = compareFingerprints(withOptional, without);
    expect(strict.score).toBe(0.8);
    expect(strict.removed).toEqual(['$.items[].a:number']);
    expect(strict.matched).toBe(false);
    expect(compareFingerprints(withOptional, without, 0.75).matched).toBe(true);
  });

  it('should never match across algorithm versions', () => {
    const other = { ...baseline, algorithmVersion: 'shape-v0' };
    expect(compareFingerprints(other, baseline).matched).toBe(false);
  });
});

describe('jaccard', () => {
  it('should treat two empty sets as identical', () => {
    expect(jaccard(new Set(), new Set())).toBe(1);
    expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3, 10);
  });
});
