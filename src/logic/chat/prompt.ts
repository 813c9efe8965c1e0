import { RetrievalResult, Role, Turn } from '../../utils/types';
import { ChatMessage, PromptContext } from '../gemini/generation';

export const NO_ACCESSIBLE_CONTENT_MESSAGE =
    "I couldn't find any relevant information to answer your query that you are authorized to access. " +
    'Please try rephrasing your question or contact your administrator if you believe you should have access to this information.';

export const GENERATION_UNAVAILABLE_MESSAGE =
    'The assistant is temporarily unable to generate an answer. Please try again in a moment.';

export const ASSISTANT_SYSTEM = `You are an internal knowledge assistant for company employees.
Rules:
- Answer ONLY from the "Context from company documents" section of the message.
- If the answer is not in that context, say so explicitly. Do not guess or use outside knowledge.
- Cite the source file names you used.
- Use the earlier conversation to resolve follow-up questions, but never treat it as a source of facts.
- Keep answers concise: at most 4 short lines.`;

export function truncate(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    return `${text.slice(0, maxChars).trimEnd()}...`;
}

export function formatContext(fragments: RetrievalResult, maxCharsPerFragment: number): string {
    return fragments
        .map(({ fragment }, i) =>
            `[${i + 1}] Source: ${fragment.sourceFile} (${fragment.department})\n${truncate(fragment.content, maxCharsPerFragment)}`)
        .join('\n\n');
}

export const buildUserPrompt = (role: Role, query: string, context: string) => `User role: ${role}
Question: ${query}

Context from company documents:
${context}`;

export function historyMessages(turns: Turn[]): ChatMessage[] {
    return turns.flatMap((turn): ChatMessage[] => [
        { role: 'user', content: turn.query },
        { role: 'assistant', content: turn.answer },
    ]);
}

export function buildPromptContext(
    role: Role,
    query: string,
    fragments: RetrievalResult,
    priorTurns: Turn[],
    maxCharsPerFragment: number,
): PromptContext {
    return {
        system: ASSISTANT_SYSTEM,
        history: historyMessages(priorTurns),
        user: buildUserPrompt(role, query, formatContext(fragments, maxCharsPerFragment)),
    };
}
