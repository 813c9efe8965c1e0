import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config/env.validation';

export interface ElasticHit<T> {
    _id: string;
    _score: number | null;
    _source?: T;
}

export interface ElasticSearchResponse<T> {
    hits: { hits: ElasticHit<T>[] };
}

const bulkResponseSchema = z.object({
    errors: z.boolean(),
    items: z.array(z.unknown()),
});

type BulkResponse = z.infer<typeof bulkResponseSchema>;

@Injectable()
export class ElasticService {
    private readonly logger = new Logger(ElasticService.name);
    private readonly headers: Record<string, string>;
    private readonly esUrl: string;

    constructor(private readonly configService: ConfigService<AppConfig, true>) {
        this.esUrl = this.configService.get('ELASTIC_URL', { infer: true });
        const esPass = this.configService.get('ELASTIC_API_KEY', { infer: true });
        this.headers = {
            'Content-Type': 'application/json',
            ...(esPass ? { 'Authorization': `APIKey ${esPass}` } : {}),
        };
    }

    async elasticPost<T>(path: string, body: unknown): Promise<T> {
        return this.send<T>('POST', path, body);
    }

    async elasticPut<T>(path: string, body: unknown): Promise<T> {
        return this.send<T>('PUT', path, body);
    }

    async elasticDelete<T>(path: string): Promise<T> {
        return this.send<T>('DELETE', path);
    }

    async elasticExists(path: string): Promise<boolean> {
        const resp = await fetch(`${this.esUrl}${path}`, { method: 'HEAD', headers: this.headers });
        if (resp.status === 404) return false;
        if (!resp.ok) {
            throw new Error(`Elasticsearch error ${resp.status} on HEAD ${path}`);
        }
        return true;
    }

    async elasticBulkSave(body: unknown[]): Promise<BulkResponse> {
        const ndjson = body.map(line => JSON.stringify(line)).join('\n') + '\n';
        const resp = await fetch(`${this.esUrl}/_bulk`, {
            method: 'POST',
            headers: { ...this.headers, 'Content-Type': 'application/x-ndjson' },
            body: ndjson,
        });
        if (!resp.ok) {
            throw new Error(`Elasticsearch bulk error ${resp.status}: ${await resp.text()}`);
        }
        const json = bulkResponseSchema.parse(await resp.json());
        if (json.errors) {
            this.logger.error(`Elasticsearch bulk errors: ${JSON.stringify(json.items)}`);
            throw new Error('Bulk insert failed');
        }
        return json;
    }

    private async send<T>(method: 'POST' | 'PUT' | 'DELETE', path: string, body?: unknown): Promise<T> {
        const resp = await fetch(`${this.esUrl}${path}`, {
            method,
            headers: this.headers,
            ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        });
        if (!resp.ok) {
            const text = await resp.text();
            throw new Error(`Elasticsearch error ${resp.status}: ${text}`);
        }
        return resp.json() as Promise<T>;
    }
}
