import { KnowledgeChunk } from '../../utils/types';

export const LIVE_KNOWLEDGE_SOURCE = Symbol('LIVE_KNOWLEDGE_SOURCE');

export interface LiveKnowledgeSource {
    /**
     * Fetches guidance for a single symptom phrase. Sources that fail or
     * return too little text are left out; never rejects for a single source.
     */
    fetch(symptom: string, sessionId: string): Promise<KnowledgeChunk[]>;
}
