import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { triageConfig } from '../../config/triage.config';
import { KnowledgeChunkEntity } from '../../entities';
import { KnowledgeChunk } from '../../utils/types';
import { rankBySimilarity } from '../../utils/vectorMath';
import { EMBEDDINGS_CLIENT, EmbeddingsClient } from '../embeddings/embeddings.types';
import { describeError } from '../gemini/gemini.service';
import { loadCorpus, toCategory } from './corpus';
import { KnowledgeIndex } from './knowledge-index.types';

interface IndexedEntry {
    chunk: Omit<KnowledgeChunk, 'score'>;
    vector: readonly number[];
}

@Injectable()
export class KnowledgeIndexService implements KnowledgeIndex, OnModuleInit {
    private readonly logger = new Logger(KnowledgeIndexService.name);
    private entries: readonly IndexedEntry[] = Object.freeze([]);

    constructor(
        @InjectRepository(KnowledgeChunkEntity)
        private readonly chunkRepository: Repository<KnowledgeChunkEntity>,
        @Inject(EMBEDDINGS_CLIENT)
        private readonly embeddings: EmbeddingsClient,
        @Inject(triageConfig.KEY)
        private readonly config: ConfigType<typeof triageConfig>,
    ) { }

    async onModuleInit() {
        try {
            await this.load();
        } catch (error) {
            // retrieval degrades to live fetch / no grounding; start-up continues
            this.logger.error(`Knowledge index unavailable: ${describeError(error)}`);
        }
    }

    size(): number {
        return this.entries.length;
    }

    async search(vector: readonly number[], topK: number): Promise<KnowledgeChunk[]> {
        return rankBySimilarity(this.entries, vector, topK).map(({ item, score }) => ({ ...item.chunk, score }));
    }

    async load(): Promise<number> {
        let rows = await this.chunkRepository.find({ order: { position: 'ASC' } });
        const staleProvider = rows.some(r => r.embedProvider !== this.embeddings.name || !this.fitsProvider(r));

        if (this.config.rebuildOnStart || rows.length === 0 || staleProvider) {
            const reason = this.config.rebuildOnStart ? 'rebuild requested' : rows.length === 0 ? 'index empty' : 'stored embeddings do not match the provider';
            this.logger.log(`Rebuilding knowledge index (${reason})`);
            rows = await this.rebuild(rows);
        }

        const usable = rows.filter(row => this.fitsProvider(row));
        if (usable.length < rows.length) {
            this.logger.warn(`Ignoring ${rows.length - usable.length} stored chunks without ${this.embeddings.dimensions}-dimensional embeddings`);
        }
        this.entries = Object.freeze(usable.map(row => Object.freeze(this.toIndexed(row))));
        this.logger.log(`Knowledge index ready: ${this.entries.length} chunks (${this.embeddings.name})`);
        return this.entries.length;
    }

    /** Re-embeds the corpus and replaces the stored chunks; `stored` is kept when nothing could be embedded. */
    async rebuild(stored: KnowledgeChunkEntity[] = []): Promise<KnowledgeChunkEntity[]> {
        const { entries, skipped, files } = await loadCorpus(this.config.corpusPath);
        if (files.length === 0) {
            this.logger.warn(`No corpus files match ${this.config.corpusPath}`);
        }
        for (const s of skipped) {
            this.logger.warn(`Skipped corpus line ${s.file}:${s.line} (${s.reason})`);
        }

        const rows: KnowledgeChunkEntity[] = [];
        for (const entry of entries) {
            try {
                const embedding = await this.embeddings.embed(entry.text);
                rows.push(this.chunkRepository.create({
                    id: entry.id,
                    position: rows.length,
                    text: entry.text,
                    sourceName: entry.sourceName,
                    sourceUrl: entry.sourceUrl,
                    category: entry.category,
                    tags: entry.tags,
                    embedding,
                    embedProvider: this.embeddings.name,
                }));
            } catch (error) {
                this.logger.warn(`Failed to embed corpus entry ${entry.id}: ${describeError(error)}`);
            }
        }

        if (rows.length === 0) {
            this.logger.warn(`No corpus entries were embedded; keeping ${stored.length} stored chunks`);
            return stored;
        }

        await this.chunkRepository.manager.transaction(async manager => {
            await manager.clear(KnowledgeChunkEntity);
            await manager.save(KnowledgeChunkEntity, rows, { chunk: 100 });
        });
        this.logger.log(`Indexed ${rows.length} medical knowledge chunks from ${files.length} file(s)`);
        return rows;
    }

    private fitsProvider(row: KnowledgeChunkEntity): boolean {
        return row.embedding.length === this.embeddings.dimensions;
    }

    private toIndexed(row: KnowledgeChunkEntity): IndexedEntry {
        return {
            chunk: {
                id: row.id,
                text: row.text,
                sourceName: row.sourceName,
                sourceUrl: row.sourceUrl,
                category: toCategory(row.category),
                tags: Object.freeze([...row.tags]),
            },
            vector: Object.freeze([...row.embedding]),
        };
    }
}
