import { DepartmentTag, Fragment, RetrievalResult, ScoredFragment } from '../../utils/types';

/**
 * Similarity search over embedded fragments.
 *
 * `allowedDepartments` constrains the candidate pool before ranking. It is
 * never applied to an unrestricted top-k, so a disallowed fragment can neither
 * crowd out allowed ones nor reach the caller.
 */
export abstract class DocumentIndex {
    abstract query(text: string, k: number, allowedDepartments: ReadonlySet<DepartmentTag>): Promise<RetrievalResult>;

    /**
     * Ingestion-only write path; assumes no queries are in flight. Fragments
     * from earlier runs are dropped, so a file that moved to another
     * department folder keeps no copy under its old tag.
     */
    abstract replaceAll(fragments: Fragment[]): Promise<void>;

    abstract count(): Promise<number>;
}

/**
 * Orders candidates by similarity, then newest `updatedAt`, then the order they
 * came in, and keeps the top `k` whose similarity is above `minSimilarity`.
 */
export function rankFragments(candidates: ScoredFragment[], k: number, minSimilarity: number): RetrievalResult {
    if (k <= 0) return [];
    return candidates
        .map((candidate, order) => ({ candidate, order }))
        .filter(({ candidate }) => candidate.score > minSimilarity)
        .sort((a, b) =>
            b.candidate.score - a.candidate.score ||
            b.candidate.fragment.updatedAt.getTime() - a.candidate.fragment.updatedAt.getTime() ||
            a.order - b.order)
        .slice(0, k)
        .map(({ candidate }) => candidate);
}

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
