import { KnowledgeChunk } from '../../utils/types';

export const KNOWLEDGE_INDEX = Symbol('KNOWLEDGE_INDEX');

export interface KnowledgeIndex {
    size(): number;
    /** Best-first by cosine similarity; equal scores keep corpus order. */
    search(vector: readonly number[], topK: number): Promise<KnowledgeChunk[]>;
}
