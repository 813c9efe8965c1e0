import { DepartmentTag, Fragment, RetrievalResult } from '../../utils/types';
import { TextEmbedder } from '../gemini/generation';
import { DocumentIndex, cosineSimilarity, rankFragments } from './document-index';

/** Process-local index for development and tests: filter by department, then score. */
export class InMemoryDocumentIndex extends DocumentIndex {
    private readonly fragments = new Map<string, Fragment>();

    constructor(private readonly embedder: TextEmbedder, private readonly minSimilarity: number) {
        super();
    }

    async query(text: string, k: number, allowedDepartments: ReadonlySet<DepartmentTag>): Promise<RetrievalResult> {
        if (allowedDepartments.size === 0 || k <= 0) return [];

        const [vector] = await this.embedder.embed([text]);
        const candidates = [...this.fragments.values()]
            .filter(fragment => allowedDepartments.has(fragment.department))
            .map(({ embedding, ...fragment }) => ({ fragment, score: cosineSimilarity(vector, embedding) }));

        return rankFragments(candidates, k, this.minSimilarity);
    }

    async replaceAll(fragments: Fragment[]): Promise<void> {
        this.fragments.clear();
        for (const fragment of fragments) {
            this.fragments.set(fragment.id, fragment);
        }
    }

    async count(): Promise<number> {
        return this.fragments.size;
    }
}
