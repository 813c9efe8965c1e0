import { embedFragments, fragmentRecord, TEST_VOCABULARY } from '../../testing/fragments';
import { KeywordEmbedder } from '../../testing/keyword-embedder';
import { DepartmentTag } from '../../utils/types';
import { InMemoryDocumentIndex } from './in-memory-document-index';

describe('InMemoryDocumentIndex', () => {
  let embedder: KeywordEmbedder;
  let index: InMemoryDocumentIndex;

  beforeEach(async () => {
    embedder = new KeywordEmbedder(TEST_VOCABULARY);
    index = new InMemoryDocumentIndex(embedder, 0);
    await index.replaceAll(
      embedFragments(embedder, [
        fragmentRecord('fin-1', DepartmentTag.FINANCE, 'revenue budget'),
        fragmentRecord('hr-1', DepartmentTag.HR, 'benefits leave'),
        fragmentRecord('gen-1', DepartmentTag.GENERAL, 'office hours'),
        fragmentRecord('eng-1', DepartmentTag.ENGINEERING, 'deploy pipeline'),
        fragmentRecord('mkt-1', DepartmentTag.MARKETING, 'revenue campaign'),
      ]),
    );
    embedder.calls.length = 0;
  });

  it('returns only allowed fragments above the similarity floor', async () => {
    const result = await index.query('revenue', 5, new Set([DepartmentTag.FINANCE, DepartmentTag.GENERAL]));
    expect(result.map(r => r.fragment.id)).toEqual(['fin-1']);
    expect(result[0].score).toBeCloseTo(Math.SQRT1_2);
  });

  it('filters by department before taking the top k', async () => {
    // mkt-1 scores as high as gen-1 but must not take its slot
    const result = await index.query('revenue office', 1, new Set([DepartmentTag.GENERAL]));
    expect(result.map(r => r.fragment.id)).toEqual(['gen-1']);
  });

  it('does not search when no department is allowed', async () => {
    await expect(index.query('revenue', 5, new Set())).resolves.toEqual([]);
    expect(embedder.calls).toEqual([]);
  });

  it('does not expose embeddings in results', async () => {
    const [hit] = await index.query('benefits', 1, new Set([DepartmentTag.HR]));
    expect(hit.fragment).toEqual(fragmentRecord('hr-1', DepartmentTag.HR, 'benefits leave'));
  });

  it('drops fragments from earlier writes', async () => {
    await index.replaceAll(embedFragments(embedder, [fragmentRecord('hr-1', DepartmentTag.HR, 'leave')]));

    await expect(index.count()).resolves.toBe(1);
    await expect(index.query('revenue', 5, new Set([DepartmentTag.FINANCE]))).resolves.toEqual([]);
  });
});
