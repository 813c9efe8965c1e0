import { TextEmbedder } from '../logic/gemini/generation';

/**
 * Bag-of-words embedder over a fixed vocabulary. Texts that share no
 * vocabulary word have cosine similarity 0.
 */
export class KeywordEmbedder extends TextEmbedder {
    readonly calls: string[][] = [];

    constructor(private readonly vocabulary: readonly string[]) {
        super();
    }

    async embed(texts: string[]): Promise<number[][]> {
        this.calls.push(texts);
        return texts.map(text => this.vector(text));
    }

    vector(text: string): number[] {
        const tokens = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
        return this.vocabulary.map(word => tokens.filter(token => token === word).length);
    }
}
