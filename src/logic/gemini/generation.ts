export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/** Everything the generation service gets to see for one query. */
export interface PromptContext {
    system: string;
    history: ChatMessage[];
    user: string;
}

/**
 * Opaque text-completion service. Implementations reject on service errors
 * and should stop work when `signal` aborts.
 */
export abstract class GenerationService {
    abstract complete(context: PromptContext, signal?: AbortSignal): Promise<string>;
}

export abstract class TextEmbedder {
    abstract embed(texts: string[]): Promise<number[][]>;
}
