import { Provider } from '@nestjs/common';
import { parseTriageConfig, triageConfig } from '../../config/triage.config';
import { KnowledgeCategory, KnowledgeChunk } from '../../utils/types';
import { rankBySimilarity } from '../../utils/vectorMath';
import { AppointmentCareService } from '../care/appointment-care.service';
import { CareService } from '../care/care.service';
import { EmergencyCareService } from '../care/emergency-care.service';
import { NonMedicalCareService } from '../care/non-medical-care.service';
import { SelfCareService } from '../care/self-care.service';
import { EMBEDDINGS_CLIENT } from '../embeddings/embeddings.types';
import { HashingEmbeddingsClient } from '../embeddings/hashing-embeddings.client';
import { GeminiService } from '../gemini/gemini.service';
import { KNOWLEDGE_INDEX, KnowledgeIndex } from '../knowledge-index/knowledge-index.types';
import { LIVE_KNOWLEDGE_SOURCE, LiveKnowledgeSource } from '../live-knowledge/live-knowledge.types';
import { ReasoningService } from '../reasoning/reasoning.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import { SessionStoreService } from '../session/session-store.service';
import { TriageService } from './triage.service';

// In-process stand-ins for the pipeline's external collaborators, shared by the test suites.

export const TEST_CORPUS: ReadonlyArray<Omit<KnowledgeChunk, 'score'>> = [
    {
        id: 'chest',
        text: 'Crushing chest pain radiating to the arm with sweating needs emergency care.',
        sourceName: 'Test Corpus',
        sourceUrl: 'https://example.org/chest',
        category: KnowledgeCategory.EMERGENCY,
        tags: [],
    },
    {
        id: 'cold',
        text: 'A runny nose and mild headache usually clear with rest and fluids.',
        sourceName: 'Test Corpus',
        sourceUrl: 'https://example.org/cold',
        category: KnowledgeCategory.SELF_CARE,
        tags: [],
    },
];

export class InMemoryKnowledgeIndex implements KnowledgeIndex {
    private readonly entries: Array<{ chunk: Omit<KnowledgeChunk, 'score'>; vector: number[] }>;

    constructor(embeddings = new HashingEmbeddingsClient(), corpus = TEST_CORPUS) {
        this.entries = corpus.map(chunk => ({ chunk, vector: embeddings.embedSync(chunk.text) }));
    }

    size() {
        return this.entries.length;
    }

    async search(vector: readonly number[], topK: number): Promise<KnowledgeChunk[]> {
        return rankBySimilarity(this.entries, vector, topK).map(({ item, score }) => ({ ...item.chunk, score }));
    }
}

export class OfflineLiveSource implements LiveKnowledgeSource {
    async fetch(): Promise<KnowledgeChunk[]> {
        return [];
    }
}

/** Reasoning client stand-in; unconfigured unless a test says otherwise. */
export class FakeGemini {
    configured = false;
    reply = '';

    isConfigured(): boolean {
        return this.configured;
    }

    async complete(): Promise<string> {
        return this.reply;
    }
}

export function triagePipelineProviders(gemini: FakeGemini, env: Record<string, string> = {}): Provider[] {
    const embeddings = new HashingEmbeddingsClient();
    return [
        TriageService,
        SessionStoreService,
        RetrievalService,
        ReasoningService,
        CareService,
        EmergencyCareService,
        SelfCareService,
        AppointmentCareService,
        NonMedicalCareService,
        { provide: GeminiService, useValue: gemini },
        { provide: EMBEDDINGS_CLIENT, useValue: embeddings },
        { provide: KNOWLEDGE_INDEX, useValue: new InMemoryKnowledgeIndex(embeddings) },
        { provide: LIVE_KNOWLEDGE_SOURCE, useValue: new OfflineLiveSource() },
        { provide: triageConfig.KEY, useValue: parseTriageConfig(env) },
    ];
}
