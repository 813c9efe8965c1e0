import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fg from 'fast-glob';
import { stat } from 'node:fs/promises';
import path from 'path';
import { AppConfig } from '../../config/env.validation';
import { extractTextFromFile, splitIntoChunks } from '../../utils/textNormalizer';
import { DepartmentTag, Fragment, isDepartmentTag } from '../../utils/types';
import { DocumentIndex } from '../document-index/document-index';
import { TextEmbedder } from '../gemini/generation';

const EMBED_BATCH_SIZE = 100;

export interface IngestionReport {
    files: number;
    fragments: number;
    /** top-level folders that are not a department */
    skipped: string[];
}

/**
 * Loads `<DATA_DIR>/<department>/**.{md,txt}` into the document index. The
 * folder name is the department tag; a file's mtime becomes `updatedAt`.
 */
@Injectable()
export class IngestionService implements OnApplicationBootstrap {
    private readonly logger = new Logger(IngestionService.name);

    constructor(
        private readonly configService: ConfigService<AppConfig, true>,
        private readonly documentIndex: DocumentIndex,
        private readonly embedder: TextEmbedder,
    ) {}

    async onApplicationBootstrap() {
        if (!this.configService.get('INGEST_ON_STARTUP', { infer: true })) return;
        const existing = await this.documentIndex.count();
        if (existing > 0) {
            this.logger.log(`Index already holds ${existing} fragments, skipping startup ingestion`);
            return;
        }
        await this.ingestAll();
    }

    async ingestAll(dataDir: string = this.configService.get('DATA_DIR', { infer: true })): Promise<IngestionReport> {
        const root = path.resolve(dataDir);
        const files = (await fg(['*/**/*.{md,txt}'], { cwd: root, onlyFiles: true })).sort();
        this.logger.log(`Found ${files.length} files under ${root}`);

        const skipped = new Set<string>();
        const fragments: Fragment[] = [];
        let ingestedFiles = 0;
        for (const file of files) {
            const [folder] = file.split('/');
            if (!isDepartmentTag(folder)) {
                if (!skipped.has(folder)) {
                    this.logger.warn(`Skipping folder "${folder}": not a department`);
                    skipped.add(folder);
                }
                continue;
            }
            const fileFragments = await this.fragmentsFor(root, file, folder);
            fragments.push(...fileFragments);
            ingestedFiles++;
            this.logger.log(`Prepared ${fileFragments.length} chunks from ${file}`);
        }

        await this.documentIndex.replaceAll(fragments);
        this.logger.log(`Ingested ${fragments.length} fragments from ${ingestedFiles} files`);
        return { files: ingestedFiles, fragments: fragments.length, skipped: [...skipped] };
    }

    private async fragmentsFor(root: string, file: string, department: DepartmentTag): Promise<Fragment[]> {
        const absolute = path.join(root, file);
        const [{ text }, stats] = await Promise.all([extractTextFromFile(absolute), stat(absolute)]);
        const chunks = splitIntoChunks(text);
        if (chunks.length === 0) return [];

        const embeddings: number[][] = [];
        for (let i = 0; i < chunks.length; i += EMBED_BATCH_SIZE) {
            embeddings.push(...await this.embedder.embed(chunks.slice(i, i + EMBED_BATCH_SIZE).map(c => c.text)));
        }

        const sourceFile = file.slice(department.length + 1);
        return chunks.map((chunk, i) => ({
            id: `${department}/${sourceFile}__${chunk.index}`,
            content: chunk.text,
            department,
            sourceFile,
            updatedAt: stats.mtime,
            embedding: embeddings[i],
        }));
    }
}
