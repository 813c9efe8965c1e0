import { z } from 'zod';

const flag = z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true');

export const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8000),
    NODE_ENV: z.string().default('development'),
    CORS_ORIGIN: z.string().default('http://localhost:8501'),

    JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
    JWT_EXPIRES_IN: z.string().default('60m'),

    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(3306),
    DB_USERNAME: z.string().default('root'),
    DB_PASSWORD: z.string().default(''),
    DB_DATABASE: z.string().default('knowledge_assistant'),
    SEED_ADMIN_USERNAME: z.string().optional(),
    SEED_ADMIN_PASSWORD: z.string().optional(),

    GEMINI_API_KEY: z.string().optional(),
    GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash-lite'),
    GEMINI_EMBED_MODEL: z.string().default('text-embedding-004'),
    GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(500),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    DOCUMENT_INDEX_BACKEND: z.enum(['elastic', 'memory']).default('elastic'),
    ELASTIC_URL: z.string().default(''),
    ELASTIC_API_KEY: z.string().default(''),
    ELASTIC_INDEX: z.string().default('company_fragments'),
    EMBEDDING_DIMS: z.coerce.number().int().positive().default(768),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
    RETRIEVAL_MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(0),
    CONTEXT_CHARS_PER_FRAGMENT: z.coerce.number().int().positive().default(400),

    MEMORY_WINDOW: z.coerce.number().int().positive().default(5),
    MEMORY_MAX_SESSIONS: z.coerce.number().int().min(0).default(0),
    MEMORY_SESSION_IDLE_MINUTES: z.coerce.number().min(0).default(0),

    DATA_DIR: z.string().default('resources/data'),
    INGEST_ON_STARTUP: flag,
});

export type AppConfig = z.infer<typeof envSchema>;

export function validateEnv(raw: Record<string, unknown>): AppConfig {
    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }
    return parsed.data;
}
