import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { InvariantViolationError } from '../../utils/errors';
import { DepartmentTag, Fragment, FragmentRecord, RetrievalResult, isDepartmentTag } from '../../utils/types';
import { ElasticSearchResponse, ElasticService } from '../elastic/elastic.service';
import { TextEmbedder } from '../gemini/generation';
import { DocumentIndex, rankFragments } from './document-index';

const fragmentSourceSchema = z.object({
    content: z.string(),
    department: z.string(),
    sourceFile: z.string(),
    updatedAt: z.string(),
});

type FragmentSource = z.infer<typeof fragmentSourceSchema>;

export interface ElasticDocumentIndexOptions {
    indexName: string;
    dims: number;
    minSimilarity: number;
}

const MAX_NUM_CANDIDATES = 10000;
// hits tied with the k-th must reach rankFragments for the updatedAt tie-break
const CANDIDATE_FACTOR = 2;

export class ElasticDocumentIndex extends DocumentIndex {
    private readonly logger = new Logger(ElasticDocumentIndex.name);

    constructor(
        private readonly elasticService: ElasticService,
        private readonly embedder: TextEmbedder,
        private readonly options: ElasticDocumentIndexOptions,
    ) {
        super();
    }

    async query(text: string, k: number, allowedDepartments: ReadonlySet<DepartmentTag>): Promise<RetrievalResult> {
        if (allowedDepartments.size === 0 || k <= 0) return [];

        const [queryVector] = await this.embedder.embed([text]);
        const candidateCount = k * CANDIDATE_FACTOR;
        // department filter runs inside the kNN search, before top-k selection
        const res = await this.elasticService.elasticPost<ElasticSearchResponse<unknown>>(
            `/${this.options.indexName}/_search`,
            {
                size: candidateCount,
                knn: {
                    field: 'embedding',
                    query_vector: queryVector,
                    k: candidateCount,
                    num_candidates: Math.min(MAX_NUM_CANDIDATES, Math.max(100, candidateCount * 10)),
                    filter: { terms: { department: [...allowedDepartments] } },
                },
                _source: ['content', 'department', 'sourceFile', 'updatedAt'],
            },
        );

        const candidates = res.hits.hits.map(hit => ({
            fragment: this.toRecord(hit._id, hit._source),
            // cosine kNN scores are (1 + cosine) / 2
            score: 2 * (hit._score ?? 0) - 1,
        }));
        return rankFragments(candidates, k, this.options.minSimilarity);
    }

    async replaceAll(fragments: Fragment[]): Promise<void> {
        if (await this.elasticService.elasticExists(`/${this.options.indexName}`)) {
            await this.elasticService.elasticDelete(`/${this.options.indexName}`);
            this.logger.log(`Dropped index ${this.options.indexName}`);
        }
        if (fragments.length === 0) return;
        await this.createIndex();

        const body: unknown[] = [];
        for (const fragment of fragments) {
            body.push({ index: { _index: this.options.indexName, _id: fragment.id } });
            body.push({
                content: fragment.content,
                department: fragment.department,
                sourceFile: fragment.sourceFile,
                updatedAt: fragment.updatedAt.toISOString(),
                embedding: fragment.embedding,
            } satisfies FragmentSource & { embedding: number[] });
        }
        await this.elasticService.elasticBulkSave(body);
        this.logger.log(`Indexed ${fragments.length} fragments into ${this.options.indexName}`);
    }

    async count(): Promise<number> {
        if (!(await this.elasticService.elasticExists(`/${this.options.indexName}`))) return 0;
        const res = await this.elasticService.elasticPost<{ count: number }>(`/${this.options.indexName}/_count`, {
            query: { match_all: {} },
        });
        return res.count;
    }

    private async createIndex(): Promise<void> {
        await this.elasticService.elasticPut(`/${this.options.indexName}`, {
            mappings: {
                properties: {
                    content: { type: 'text' },
                    department: { type: 'keyword' },
                    sourceFile: { type: 'keyword' },
                    updatedAt: { type: 'date' },
                    embedding: { type: 'dense_vector', dims: this.options.dims, index: true, similarity: 'cosine' },
                },
            },
        });
        this.logger.log(`Created index ${this.options.indexName}`);
    }

    private toRecord(id: string, source: unknown): FragmentRecord {
        const parsed = fragmentSourceSchema.safeParse(source);
        if (!parsed.success) {
            throw new InvariantViolationError(`fragment ${id} has a malformed source document`);
        }
        const { content, department, sourceFile, updatedAt } = parsed.data;
        if (!isDepartmentTag(department)) {
            throw new InvariantViolationError(`fragment ${id} has malformed department tag "${department}"`);
        }
        const updated = new Date(updatedAt);
        if (Number.isNaN(updated.getTime())) {
            throw new InvariantViolationError(`fragment ${id} has malformed updatedAt "${updatedAt}"`);
        }
        return { id, content, department, sourceFile, updatedAt: updated };
    }
}
