import { Injectable } from '@nestjs/common';
import { ComposedResponse, RetrievalResult, SourceCitation } from '../../utils/types';

/**
 * Turns a raw completion into the user-facing answer. Citations come only from
 * the fragments that were handed to generation for this query.
 */
@Injectable()
export class ResponseComposerService {
    compose(rawCompletion: string, fragmentsUsed: RetrievalResult): ComposedResponse {
        const byFile = new Map<string, SourceCitation>();
        for (const { fragment, score } of fragmentsUsed) {
            const key = `${fragment.department}/${fragment.sourceFile}`;
            const updatedAt = fragment.updatedAt.toISOString();
            const existing = byFile.get(key);
            if (!existing) {
                byFile.set(key, { file: fragment.sourceFile, department: fragment.department, updatedAt, relevanceScore: score });
                continue;
            }
            existing.relevanceScore = Math.max(existing.relevanceScore, score);
            if (updatedAt > existing.updatedAt) existing.updatedAt = updatedAt;
        }
        return { answer: rawCompletion.trim(), sources: [...byFile.values()] };
    }
}
