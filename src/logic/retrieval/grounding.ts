import { KnowledgeChunk } from '../../utils/types';

export const NO_GROUNDING_CONTEXT = 'General medical knowledge - no specific guidance found for these symptoms.';

export function buildGroundingContext(chunks: readonly KnowledgeChunk[]): string {
    if (chunks.length === 0) return NO_GROUNDING_CONTEXT;

    const blocks = chunks.map((chunk, i) =>
        `[${i + 1}] ${chunk.category.toUpperCase()} (Source: ${chunk.sourceName || 'unknown'}, Relevance: ${chunk.score.toFixed(3)})\n${chunk.text}`
    );
    return `MEDICAL KNOWLEDGE BASE CONTEXT:\n\n${blocks.join('\n\n')}`;
}
