import { fragmentRecord } from '../../testing/fragments';
import { DepartmentTag, ScoredFragment } from '../../utils/types';
import { cosineSimilarity, rankFragments } from './document-index';

const older = new Date('2024-01-01T00:00:00.000Z');
const newer = new Date('2024-06-01T00:00:00.000Z');

function scored(id: string, score: number, updatedAt = older): ScoredFragment {
  return { fragment: fragmentRecord(id, DepartmentTag.GENERAL, id, updatedAt), score };
}

describe('rankFragments', () => {
  it('orders by score descending and keeps the top k', () => {
    const ranked = rankFragments([scored('a', 0.2), scored('b', 0.9), scored('c', 0.5)], 2, 0);
    expect(ranked.map(r => r.fragment.id)).toEqual(['b', 'c']);
  });

  it('breaks score ties by newer updatedAt, then by input order', () => {
    const ranked = rankFragments(
      [scored('first', 0.5), scored('second', 0.5), scored('fresh', 0.5, newer)],
      3,
      0,
    );
    expect(ranked.map(r => r.fragment.id)).toEqual(['fresh', 'first', 'second']);
  });

  it('drops fragments at or below the similarity floor', () => {
    const ranked = rankFragments([scored('zero', 0), scored('weak', 0.1), scored('neg', -0.3)], 5, 0);
    expect(ranked.map(r => r.fragment.id)).toEqual(['weak']);
  });

  it('returns nothing for k of zero', () => {
    expect(rankFragments([scored('a', 1)], 0, 0)).toEqual([]);
  });
});

describe('cosineSimilarity', () => {
  it('is zero against an empty vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different length', () => {
    expect(() => cosineSimilarity([1], [1, 0])).toThrow('Vector length mismatch: 1 vs 2');
  });
});
