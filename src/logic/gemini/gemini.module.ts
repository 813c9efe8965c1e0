import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { GenerationService, TextEmbedder } from './generation';

@Module({
    exports: [GeminiService, GenerationService, TextEmbedder],
    providers: [
        GeminiService,
        { provide: GenerationService, useExisting: GeminiService },
        { provide: TextEmbedder, useExisting: GeminiService },
    ],
})
export class GeminiModule {}
