import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export enum EmbedProvider {
    SIMPLE = 'SIMPLE',
    GEMINI = 'GEMINI',
}

const flag = z
    .union([z.boolean(), z.string()])
    .transform(v => (typeof v === 'boolean' ? v : ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase())));

const optionalString = z
    .string()
    .optional()
    .transform(v => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8787),
    CORS_ORIGIN: z.string().default('*'),
    EMBED_PROVIDER: z
        .string()
        .default(EmbedProvider.SIMPLE)
        .transform(v => v.trim().toUpperCase())
        .pipe(z.nativeEnum(EmbedProvider)),
    TOP_K: z.coerce.number().int().min(1).max(50).default(5),
    CORPUS_PATH: z.string().min(1).default('data/corpus/*.jsonl'),
    INDEX_PATH: z.string().min(1).default('data/knowledge-index.sqlite'),
    REBUILD_INDEX_ON_START: flag.default(false),
    MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(0.2),
    LIVE_FETCH_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.6),
    LIVE_FETCH_ENABLED: flag.default(true),
    LIVE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    GEMINI_API_KEY: optionalString,
    GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),
    GEMINI_EMBED_MODEL: z.string().min(1).default('text-embedding-004'),
    REASONING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    SESSION_HISTORY_CAP: z.coerce.number().int().min(1).default(5),
    EMERGENCY_NUMBER: z.string().min(1).default('911'),
});

export interface TriageConfig {
    port: number;
    corsOrigin: string;
    embedProvider: EmbedProvider;
    topK: number;
    corpusPath: string;
    indexPath: string;
    rebuildOnStart: boolean;
    minSimilarity: number;
    liveFetchThreshold: number;
    liveFetchEnabled: boolean;
    liveFetchTimeoutMs: number;
    gemini: {
        apiKey?: string;
        chatModel: string;
        embedModel: string;
    };
    reasoningTimeoutMs: number;
    sessionHistoryCap: number;
    emergencyNumber: string;
}

/**
 * Parses the process environment once. Unknown keys are ignored; a bad value
 * fails start-up with every offending key listed.
 */
export function parseTriageConfig(env: Record<string, string | undefined>): Readonly<TriageConfig> {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }
    const e = parsed.data;
    return Object.freeze({
        port: e.PORT,
        corsOrigin: e.CORS_ORIGIN,
        embedProvider: e.EMBED_PROVIDER,
        topK: e.TOP_K,
        corpusPath: e.CORPUS_PATH,
        indexPath: e.INDEX_PATH,
        rebuildOnStart: e.REBUILD_INDEX_ON_START,
        minSimilarity: e.MIN_SIMILARITY,
        liveFetchThreshold: e.LIVE_FETCH_THRESHOLD,
        liveFetchEnabled: e.LIVE_FETCH_ENABLED,
        liveFetchTimeoutMs: e.LIVE_FETCH_TIMEOUT_MS,
        gemini: Object.freeze({
            apiKey: e.GEMINI_API_KEY,
            chatModel: e.GEMINI_CHAT_MODEL,
            embedModel: e.GEMINI_EMBED_MODEL,
        }),
        reasoningTimeoutMs: e.REASONING_TIMEOUT_MS,
        sessionHistoryCap: e.SESSION_HISTORY_CAP,
        emergencyNumber: e.EMERGENCY_NUMBER,
    });
}

export const triageConfig = registerAs('triage', () => parseTriageConfig(process.env));
