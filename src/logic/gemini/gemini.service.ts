import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { AppConfig } from '../../config/env.validation';
import { errorMessage } from '../../utils/errors';
import { GenerationService, PromptContext, TextEmbedder } from './generation';

@Injectable()
export class GeminiService implements GenerationService, TextEmbedder {
    private readonly logger = new Logger(GeminiService.name);
    private genAI: GoogleGenAI | null = null;
    private readonly EMBED_MODEL: string;
    private readonly CHAT_MODEL: string;

    constructor(private readonly configService: ConfigService<AppConfig, true>) {
        this.EMBED_MODEL = configService.get('GEMINI_EMBED_MODEL', { infer: true });
        this.CHAT_MODEL = configService.get('GEMINI_CHAT_MODEL', { infer: true });
    }

    private client(): GoogleGenAI {
        if (!this.genAI) {
            const apiKey = this.configService.get('GEMINI_API_KEY', { infer: true });
            if (!apiKey) throw new Error('GEMINI_API_KEY is not set');
            this.genAI = new GoogleGenAI({ apiKey });
        }
        return this.genAI;
    }

    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];
        try {
            // one batch call for all texts
            const result = await this.client().models.embedContent({ contents: texts, model: this.EMBED_MODEL });
            const embeddings = (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
            if (embeddings.length !== texts.length) {
                throw new Error(`expected ${texts.length} embeddings, got ${embeddings.length}`);
            }
            return embeddings;
        } catch (error) {
            this.logger.error(`Error generating embeddings: ${errorMessage(error)}`);
            throw new Error(`Failed to generate embeddings: ${errorMessage(error)}`);
        }
    }

    async complete(context: PromptContext, signal?: AbortSignal): Promise<string> {
        // Gemini doesn't have a true 'system' role. Put it in a preamble (first user turn).
        const preamble = context.system.trim() ? `${context.system.trim()}\n\n` : '';

        // assistant -> 'model'
        const hist = context.history.map(m => ({
            role: m.role === 'assistant' ? 'model' : 'user',
            parts: [{ text: m.content }],
        }));

        const result = await this.client().models.generateContent({
            model: this.CHAT_MODEL,
            config: {
                temperature: this.configService.get('GENERATION_TEMPERATURE', { infer: true }),
                maxOutputTokens: this.configService.get('GENERATION_MAX_TOKENS', { infer: true }),
                abortSignal: signal,
            },
            contents: [
                ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
                ...hist,
                { role: 'user', parts: [{ text: context.user }] },
            ],
        });

        const text = result.text?.trim();
        if (!text) {
            throw new Error('Gemini returned an empty completion');
        }
        return text;
    }
}
