import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { triageConfig } from '../../config/triage.config';
import { KnowledgeChunk } from '../../utils/types';
import { describeError } from '../gemini/gemini.service';
import { categorizeContent, extractContent } from './content-parser';
import { LiveKnowledgeSource } from './live-knowledge.types';
import { LIVE_SOURCES, LiveSource } from './sources';

const USER_AGENT = 'Mozilla/5.0 (Symptom-Triage-Assistant)';

@Injectable()
export class LiveKnowledgeService implements LiveKnowledgeSource {
    private readonly logger = new Logger(LiveKnowledgeService.name);

    constructor(@Inject(triageConfig.KEY) private readonly config: ConfigType<typeof triageConfig>) { }

    async fetch(symptom: string, sessionId: string): Promise<KnowledgeChunk[]> {
        this.logger.log(`Fetching live guidance for "${symptom}"`);
        const settled = await Promise.allSettled(LIVE_SOURCES.map(source => this.fetchFrom(source, symptom, sessionId)));

        const chunks: KnowledgeChunk[] = [];
        settled.forEach((result, i) => {
            if (result.status === 'fulfilled') {
                if (result.value) chunks.push(result.value);
            } else {
                this.logger.warn(`${LIVE_SOURCES[i].name} fetch failed for "${symptom}": ${describeError(result.reason)}`);
            }
        });

        this.logger.log(`Live guidance chunks retrieved: ${chunks.length}`);
        return chunks;
    }

    async fetchPage(url: string): Promise<string> {
        const r = await fetch(url, {
            headers: { 'User-Agent': USER_AGENT, 'Accept': 'text/html' },
            redirect: 'follow',
            signal: AbortSignal.timeout(this.config.liveFetchTimeoutMs),
        });
        if (!r.ok) throw new Error(`${r.status} ${r.statusText}`);
        return r.text();
    }

    private async fetchFrom(source: LiveSource, symptom: string, sessionId: string): Promise<KnowledgeChunk | null> {
        const url = source.buildUrl(symptom);
        const content = extractContent(await this.fetchPage(url), source.passes);
        if (!content) {
            this.logger.debug(`${source.name} page had too little content: ${url}`);
            return null;
        }
        return Object.freeze({
            id: `live_${source.key}_${sessionId}`,
            text: content,
            sourceName: source.name,
            sourceUrl: url,
            category: categorizeContent(content),
            tags: Object.freeze([symptom]),
            score: source.authority,
        });
    }
}
