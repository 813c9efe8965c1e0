import { Module } from '@nestjs/common';
import { DocumentIndexModule } from '../document-index/document-index.module';
import { GeminiModule } from '../gemini/gemini.module';
import { IngestionService } from './ingestion.service';

@Module({
    imports: [DocumentIndexModule, GeminiModule],
    exports: [IngestionService],
    providers: [IngestionService],
})
export class IngestionModule {}
