import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/env.validation';
import { ElasticModule } from '../elastic/elastic.module';
import { ElasticService } from '../elastic/elastic.service';
import { GeminiModule } from '../gemini/gemini.module';
import { TextEmbedder } from '../gemini/generation';
import { DocumentIndex } from './document-index';
import { ElasticDocumentIndex } from './elastic-document-index';
import { InMemoryDocumentIndex } from './in-memory-document-index';

@Module({
    imports: [ElasticModule, GeminiModule],
    exports: [DocumentIndex],
    providers: [
        {
            provide: DocumentIndex,
            inject: [ConfigService, ElasticService, TextEmbedder],
            useFactory: (
                config: ConfigService<AppConfig, true>,
                elasticService: ElasticService,
                embedder: TextEmbedder,
            ): DocumentIndex => {
                const backend = config.get('DOCUMENT_INDEX_BACKEND', { infer: true });
                const minSimilarity = config.get('RETRIEVAL_MIN_SIMILARITY', { infer: true });
                new Logger('DocumentIndex').log(`Using ${backend} document index`);
                if (backend === 'memory') {
                    return new InMemoryDocumentIndex(embedder, minSimilarity);
                }
                return new ElasticDocumentIndex(elasticService, embedder, {
                    indexName: config.get('ELASTIC_INDEX', { infer: true }),
                    dims: config.get('EMBEDDING_DIMS', { infer: true }),
                    minSimilarity,
                });
            },
        },
    ],
})
export class DocumentIndexModule {}
