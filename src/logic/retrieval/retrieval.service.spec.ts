import { Test } from '@nestjs/testing';
import { parseTriageConfig, triageConfig } from '../../config/triage.config';
import { createSymptomQuery, KnowledgeCategory, KnowledgeChunk } from '../../utils/types';
import { EMBEDDINGS_CLIENT } from '../embeddings/embeddings.types';
import { KNOWLEDGE_INDEX } from '../knowledge-index/knowledge-index.types';
import { LIVE_KNOWLEDGE_SOURCE } from '../live-knowledge/live-knowledge.types';
import { RetrievalService } from './retrieval.service';

function chunk(id: string, score: number): KnowledgeChunk {
  return {
    id,
    text: `guidance ${id}`,
    sourceName: id.startsWith('live') ? 'NHS' : 'Triage Knowledge Base',
    sourceUrl: '',
    category: KnowledgeCategory.APPOINTMENT,
    tags: [],
    score,
  };
}

describe('RetrievalService', () => {
  const search = jest.fn<Promise<KnowledgeChunk[]>, [readonly number[], number]>();
  const fetchLive = jest.fn<Promise<KnowledgeChunk[]>, [string, string]>();
  const query = createSymptomQuery('s1', 'I have chest pain when climbing stairs');

  async function createService(env: Record<string, string> = {}) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        RetrievalService,
        { provide: EMBEDDINGS_CLIENT, useValue: { name: 'TEST', dimensions: 1, embed: async () => [1] } },
        { provide: KNOWLEDGE_INDEX, useValue: { size: () => 0, search } },
        { provide: LIVE_KNOWLEDGE_SOURCE, useValue: { fetch: fetchLive } },
        { provide: triageConfig.KEY, useValue: parseTriageConfig(env) },
      ],
    }).compile();
    return moduleRef.get(RetrievalService);
  }

  beforeEach(() => {
    search.mockReset();
    fetchLive.mockReset();
  });

  it('returns confident local hits without going live', async () => {
    search.mockResolvedValue([chunk('a', 0.8), chunk('b', 0.5), chunk('c', 0.1)]);
    const service = await createService();

    const result = await service.retrieve(query);

    expect(result.provenance).toBe('local');
    expect(result.success).toBe(true);
    expect(result.chunks.map(c => c.id)).toEqual(['a', 'b']);
    expect(fetchLive).not.toHaveBeenCalled();
  });

  it('goes live with the primary symptom when local confidence is low', async () => {
    search.mockResolvedValue([chunk('a', 0.3)]);
    fetchLive.mockResolvedValue([chunk('live_nhs', 0.95), chunk('live_mayo', 0.92), chunk('live_medlineplus', 0.9)]);
    const service = await createService();

    const result = await service.retrieve(query, 3);

    expect(fetchLive).toHaveBeenCalledWith('chest pain', 's1');
    expect(result.provenance).toBe('live');
    expect(result.chunks.map(c => c.id)).toEqual(['live_nhs', 'live_mayo', 'live_medlineplus']);
  });

  it('merges live and local chunks when both survive the cut', async () => {
    search.mockResolvedValue([chunk('a', 0.45), chunk('b', 0.1)]);
    fetchLive.mockResolvedValue([chunk('live_nhs', 0.95)]);
    const service = await createService();

    const result = await service.retrieve(query);

    expect(result.provenance).toBe('mixed');
    expect(result.chunks.map(c => c.id)).toEqual(['live_nhs', 'a']);
  });

  it('falls back to the best local hit when live yields nothing', async () => {
    search.mockResolvedValue([chunk('a', 0.15), chunk('b', 0.05)]);
    fetchLive.mockResolvedValue([]);
    const service = await createService();

    const result = await service.retrieve(query);

    expect(result).toEqual({ chunks: [chunk('a', 0.15)], provenance: 'local', success: true });
  });

  it('keeps every filtered local hit when live yields nothing', async () => {
    search.mockResolvedValue([chunk('a', 0.4), chunk('b', 0.3)]);
    fetchLive.mockRejectedValue(new Error('network down'));
    const service = await createService();

    const result = await service.retrieve(query);

    expect(result.chunks.map(c => c.id)).toEqual(['a', 'b']);
    expect(result.provenance).toBe('local');
  });

  it('reports failure when the corpus and live fetch are both empty', async () => {
    search.mockResolvedValue([]);
    fetchLive.mockResolvedValue([]);
    const service = await createService();

    await expect(service.retrieve(query)).resolves.toEqual({ chunks: [], provenance: 'local', success: false });
  });

  it('treats an index failure as an empty corpus', async () => {
    search.mockRejectedValue(new Error('index offline'));
    fetchLive.mockResolvedValue([chunk('live_nhs', 0.95)]);
    const service = await createService();

    const result = await service.retrieve(query);

    expect(result.provenance).toBe('live');
    expect(result.chunks.map(c => c.id)).toEqual(['live_nhs']);
  });

  it('never calls the live source when it is disabled', async () => {
    search.mockResolvedValue([chunk('a', 0.1)]);
    const service = await createService({ LIVE_FETCH_ENABLED: 'false' });

    const result = await service.retrieve(query);

    expect(fetchLive).not.toHaveBeenCalled();
    expect(result.chunks.map(c => c.id)).toEqual(['a']);
  });

  it.each([1, 2, 3, 5])('returns at most %i chunks in non-increasing score order', async topK => {
    search.mockImplementation(async (_vector, k) =>
      [chunk('a', 0.55), chunk('b', 0.5), chunk('c', 0.35), chunk('d', 0.3), chunk('e', 0.25)].slice(0, k),
    );
    fetchLive.mockResolvedValue([chunk('live_medlineplus', 0.9), chunk('live_nhs', 0.95)]);
    const service = await createService();

    const { chunks } = await service.retrieve(query, topK);
    const scores = chunks.map(c => c.score);

    expect(chunks.length).toBeLessThanOrEqual(topK);
    expect(scores).toEqual([...scores].sort((x, y) => y - x));
  });
});
