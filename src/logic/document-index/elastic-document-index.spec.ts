import { KeywordEmbedder } from '../../testing/keyword-embedder';
import { fragmentRecord, TEST_VOCABULARY } from '../../testing/fragments';
import { testConfig } from '../../testing/test-config';
import { DepartmentTag } from '../../utils/types';
import { ElasticService } from '../elastic/elastic.service';
import { ElasticDocumentIndex } from './elastic-document-index';

function hit(id: string, score: number, source: Record<string, string>) {
  return { _id: id, _score: score, _source: source };
}

describe('ElasticDocumentIndex', () => {
  let elastic: ElasticService;
  let embedder: KeywordEmbedder;
  let index: ElasticDocumentIndex;

  beforeEach(() => {
    elastic = new ElasticService(testConfig({ ELASTIC_URL: 'http://es.test' }));
    embedder = new KeywordEmbedder(TEST_VOCABULARY);
    index = new ElasticDocumentIndex(elastic, embedder, { indexName: 'fragments', dims: 7, minSimilarity: 0 });
  });

  it('filters by department inside the kNN clause', async () => {
    const post = jest.spyOn(elastic, 'elasticPost').mockResolvedValue({ hits: { hits: [] } });

    await index.query('revenue', 3, new Set([DepartmentTag.GENERAL, DepartmentTag.FINANCE]));

    expect(post).toHaveBeenCalledWith('/fragments/_search', {
      size: 6,
      knn: {
        field: 'embedding',
        query_vector: [1, 0, 0, 0, 0, 0, 0],
        k: 6,
        num_candidates: 100,
        filter: { terms: { department: ['general', 'finance'] } },
      },
      _source: ['content', 'department', 'sourceFile', 'updatedAt'],
    });
  });

  it('maps hits back to fragments with cosine scores', async () => {
    jest.spyOn(elastic, 'elasticPost').mockResolvedValue({
      hits: {
        hits: [
          hit('fin-1', 0.9, { content: 'revenue budget', department: 'finance', sourceFile: 'fin-1.md', updatedAt: '2024-01-01T00:00:00.000Z' }),
          hit('gen-1', 0.5, { content: 'office hours', department: 'general', sourceFile: 'gen-1.md', updatedAt: '2024-01-01T00:00:00.000Z' }),
        ],
      },
    });

    const result = await index.query('revenue', 3, new Set([DepartmentTag.FINANCE, DepartmentTag.GENERAL]));

    expect(result).toHaveLength(1);
    expect(result[0].fragment).toEqual(fragmentRecord('fin-1', DepartmentTag.FINANCE, 'revenue budget'));
    expect(result[0].score).toBeCloseTo(0.8);
  });

  it('keeps the newer of two hits tied at the k-th place', async () => {
    jest.spyOn(elastic, 'elasticPost').mockResolvedValue({
      hits: {
        hits: [
          hit('fin-old', 0.9, { content: 'revenue', department: 'finance', sourceFile: 'fin-old.md', updatedAt: '2024-01-01T00:00:00.000Z' }),
          hit('fin-new', 0.9, { content: 'revenue', department: 'finance', sourceFile: 'fin-new.md', updatedAt: '2024-06-01T00:00:00.000Z' }),
        ],
      },
    });

    const result = await index.query('revenue', 1, new Set([DepartmentTag.FINANCE]));

    expect(result.map(r => r.fragment.id)).toEqual(['fin-new']);
  });

  it('treats an unknown department tag as an invariant violation', async () => {
    jest.spyOn(elastic, 'elasticPost').mockResolvedValue({
      hits: {
        hits: [hit('x-1', 0.9, { content: 'x', department: 'legal', sourceFile: 'x.md', updatedAt: '2024-01-01T00:00:00.000Z' })],
      },
    });

    await expect(index.query('revenue', 3, new Set([DepartmentTag.GENERAL]))).rejects.toThrow(
      'Invariant violation: fragment x-1 has malformed department tag "legal"',
    );
  });

  it('skips the search when no department is allowed', async () => {
    const post = jest.spyOn(elastic, 'elasticPost');
    await expect(index.query('revenue', 3, new Set())).resolves.toEqual([]);
    expect(post).not.toHaveBeenCalled();
  });

  it('creates the index before the first bulk write', async () => {
    jest.spyOn(elastic, 'elasticExists').mockResolvedValue(false);
    const drop = jest.spyOn(elastic, 'elasticDelete');
    const put = jest.spyOn(elastic, 'elasticPut').mockResolvedValue({ acknowledged: true });
    const bulk = jest.spyOn(elastic, 'elasticBulkSave').mockResolvedValue({ errors: false, items: [] });

    await index.replaceAll([{ ...fragmentRecord('gen-1', DepartmentTag.GENERAL, 'office'), embedding: [0, 0, 0, 0, 0, 1, 0] }]);

    expect(put).toHaveBeenCalledWith('/fragments', expect.objectContaining({ mappings: expect.any(Object) }));
    expect(bulk).toHaveBeenCalledWith([
      { index: { _index: 'fragments', _id: 'gen-1' } },
      {
        content: 'office',
        department: 'general',
        sourceFile: 'gen-1.md',
        updatedAt: '2024-01-01T00:00:00.000Z',
        embedding: [0, 0, 0, 0, 0, 1, 0],
      },
    ]);
    expect(drop).not.toHaveBeenCalled();
  });

  it('drops the previous index before writing a new corpus', async () => {
    jest.spyOn(elastic, 'elasticExists').mockResolvedValue(true);
    const calls: string[] = [];
    jest.spyOn(elastic, 'elasticDelete').mockImplementation(async path => {
      calls.push(`DELETE ${path}`);
      return { acknowledged: true };
    });
    jest.spyOn(elastic, 'elasticPut').mockImplementation(async path => {
      calls.push(`PUT ${path}`);
      return { acknowledged: true };
    });
    jest.spyOn(elastic, 'elasticBulkSave').mockImplementation(async () => {
      calls.push('BULK');
      return { errors: false, items: [] };
    });

    await index.replaceAll([{ ...fragmentRecord('fin-1', DepartmentTag.FINANCE, 'revenue'), embedding: [1, 0, 0, 0, 0, 0, 0] }]);

    expect(calls).toEqual(['DELETE /fragments', 'PUT /fragments', 'BULK']);
  });

  it('counts nothing when the index does not exist yet', async () => {
    jest.spyOn(elastic, 'elasticExists').mockResolvedValue(false);
    await expect(index.count()).resolves.toBe(0);
  });
});
