import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from '../../config/triage.config';
import { KnowledgeChunk, Provenance, RetrievalResult, SymptomQuery } from '../../utils/types';
import { EMBEDDINGS_CLIENT, EmbeddingsClient } from '../embeddings/embeddings.types';
import { describeError } from '../gemini/gemini.service';
import { KNOWLEDGE_INDEX, KnowledgeIndex } from '../knowledge-index/knowledge-index.types';
import { LIVE_KNOWLEDGE_SOURCE, LiveKnowledgeSource } from '../live-knowledge/live-knowledge.types';
import { extractPrimarySymptom } from './symptom-keywords';

/**
 * Local first, live on low confidence:
 *  1. local hits below minSimilarity are dropped
 *  2. best local >= liveFetchThreshold -> local hits
 *  3. otherwise live chunks merged with surviving local hits (live | mixed)
 *  4. no live chunks -> surviving local hits, else the single best local hit
 *  5. nothing anywhere -> empty, success=false
 */
@Injectable()
export class RetrievalService {
    private readonly logger = new Logger(RetrievalService.name);

    constructor(
        @Inject(EMBEDDINGS_CLIENT) private readonly embeddings: EmbeddingsClient,
        @Inject(KNOWLEDGE_INDEX) private readonly index: KnowledgeIndex,
        @Inject(LIVE_KNOWLEDGE_SOURCE) private readonly live: LiveKnowledgeSource,
        @Inject(triageConfig.KEY) private readonly config: ConfigType<typeof triageConfig>,
    ) { }

    async retrieve(query: SymptomQuery, topK: number = this.config.topK): Promise<RetrievalResult> {
        const limit = Math.max(1, Math.floor(topK));
        const tag = `[${query.sessionId}]`;

        const localHits = await this.searchLocal(query, limit);
        const confident = localHits.filter(c => c.score >= this.config.minSimilarity);
        const bestScore = confident.length > 0 ? confident[0].score : Number.NEGATIVE_INFINITY;

        if (bestScore >= this.config.liveFetchThreshold) {
            this.logger.log(`${tag} ${confident.length} local chunks (best ${bestScore.toFixed(3)})`);
            return result(confident, 'local');
        }

        const liveChunks = await this.searchLive(query);
        if (liveChunks.length > 0) {
            const liveSet = new Set(liveChunks);
            const merged = sortByScore([...liveChunks, ...confident]).slice(0, limit);
            const provenance: Provenance = merged.every(c => liveSet.has(c)) ? 'live' : 'mixed';
            this.logger.log(`${tag} ${merged.length} chunks after live fetch (${provenance})`);
            return result(merged, provenance);
        }

        if (confident.length > 0) {
            this.logger.log(`${tag} ${confident.length} local chunks below live threshold`);
            return result(confident, 'local');
        }
        if (localHits.length > 0) {
            this.logger.log(`${tag} using best local chunk ${localHits[0].id} (score ${localHits[0].score.toFixed(3)})`);
            return result(localHits.slice(0, 1), 'local');
        }

        this.logger.warn(`${tag} no knowledge found locally or live`);
        return result([], 'local', false);
    }

    private async searchLocal(query: SymptomQuery, limit: number): Promise<KnowledgeChunk[]> {
        try {
            const vector = await this.embeddings.embed(query.text);
            return sortByScore(await this.index.search(vector, limit)).slice(0, limit);
        } catch (error) {
            this.logger.warn(`[${query.sessionId}] knowledge index search failed: ${describeError(error)}`);
            return [];
        }
    }

    private async searchLive(query: SymptomQuery): Promise<KnowledgeChunk[]> {
        if (!this.config.liveFetchEnabled) return [];
        const symptom = extractPrimarySymptom(query.text);
        try {
            return await this.live.fetch(symptom, query.sessionId);
        } catch (error) {
            this.logger.warn(`[${query.sessionId}] live fetch for "${symptom}" failed: ${describeError(error)}`);
            return [];
        }
    }
}

function sortByScore(chunks: readonly KnowledgeChunk[]): KnowledgeChunk[] {
    // Array.prototype.sort is stable, so equal scores keep their order
    return [...chunks].sort((a, b) => b.score - a.score);
}

function result(chunks: readonly KnowledgeChunk[], provenance: Provenance, success = true): RetrievalResult {
    return Object.freeze({ chunks: Object.freeze([...chunks]), provenance, success });
}
