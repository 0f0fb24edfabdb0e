/**
 * Tests for Title Similarity
 */

import { describe, it, expect } from 'vitest';
import { matchingBlocks, sequenceRatio, titleSimilarity } from '../../src/aggregation/similarity';

describe('matchingBlocks', () => {
  it('finds the longest match first and recurses on both sides', () => {
    expect(matchingBlocks('abxcd', 'abcd')).toEqual([
      { a: 0, b: 0, size: 2 },
      { a: 3, b: 2, size: 2 },
    ]);
  });

  it('returns nothing for disjoint strings', () => {
    expect(matchingBlocks('abc', 'xyz')).toEqual([]);
  });

  it('returns one block for identical strings', () => {
    expect(matchingBlocks('earbuds', 'earbuds')).toEqual([{ a: 0, b: 0, size: 7 }]);
  });
});

describe('sequenceRatio', () => {
  it('computes 2M / (|a| + |b|)', () => {
    expect(sequenceRatio('abcd', 'bcde')).toBe(0.75);
    expect(sequenceRatio('abxcd', 'abcd')).toBeCloseTo(8 / 9, 10);
  });

  it('scores two empty strings as identical', () => {
    expect(sequenceRatio('', '')).toBe(1);
  });

  it('is 0 when one side is empty', () => {
    expect(sequenceRatio('abc', '')).toBe(0);
  });

  it('counts code points, not UTF-16 units', () => {
    expect(sequenceRatio('₹😀', '₹😀')).toBe(1);
    expect(sequenceRatio('a😀', 'a')).toBeCloseTo(2 / 3, 10);
  });
});

describe('titleSimilarity', () => {
  it('scores a title and its extension as near-identical', () => {
    expect(titleSimilarity('boat airdopes 141', 'boat airdopes 141 anc')).toBeCloseTo(34 / 38, 10);
  });

  it('scores an accessory well below the product it fits', () => {
    const score = titleSimilarity(
      'boat airdopes 141 bluetooth earbuds',
      'silicone case boat airdopes 141'
    );
    expect(score).toBeCloseTo(34 / 66, 10);
  });

  it('scores unrelated titles low', () => {
    expect(titleSimilarity('acme wireless earbuds', 'smartphone case cover')).toBeLessThan(0.5);
  });

  it('never matches an empty title', () => {
    expect(titleSimilarity('', '')).toBe(0);
    expect(titleSimilarity('earbuds', '')).toBe(0);
  });

  it('handles long titles with repeated characters', () => {
    const long = 'a'.repeat(150) + ' wireless earbuds ' + 'b'.repeat(150);
    expect(titleSimilarity(long, long)).toBe(1);
  });
});
