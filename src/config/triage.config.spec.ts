import { EmbedProvider, parseTriageConfig } from './triage.config';

describe('parseTriageConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = parseTriageConfig({});

    expect(config.port).toBe(8787);
    expect(config.embedProvider).toBe(EmbedProvider.SIMPLE);
    expect(config.topK).toBe(5);
    expect(config.minSimilarity).toBe(0.2);
    expect(config.liveFetchThreshold).toBe(0.6);
    expect(config.liveFetchEnabled).toBe(true);
    expect(config.rebuildOnStart).toBe(false);
    expect(config.sessionHistoryCap).toBe(5);
    expect(config.reasoningTimeoutMs).toBe(30000);
    expect(config.gemini.apiKey).toBeUndefined();
  });

  it('coerces strings from the environment', () => {
    const config = parseTriageConfig({
      TOP_K: '3',
      EMBED_PROVIDER: 'gemini',
      REBUILD_INDEX_ON_START: 'TRUE',
      LIVE_FETCH_ENABLED: 'false',
      MIN_SIMILARITY: '0.35',
      GEMINI_API_KEY: '  test-secret  ',
    });

    expect(config.topK).toBe(3);
    expect(config.embedProvider).toBe(EmbedProvider.GEMINI);
    expect(config.rebuildOnStart).toBe(true);
    expect(config.liveFetchEnabled).toBe(false);
    expect(config.minSimilarity).toBe(0.35);
    expect(config.gemini.apiKey).toBe('test-secret');
  });

  it('treats a blank api key as absent', () => {
    expect(parseTriageConfig({ GEMINI_API_KEY: '   ' }).gemini.apiKey).toBeUndefined();
  });

  it('lists every invalid key', () => {
    expect(() => parseTriageConfig({ TOP_K: 'zero', EMBED_PROVIDER: 'OPENAI' })).toThrow(
      /Invalid configuration: .*TOP_K.*EMBED_PROVIDER|Invalid configuration: .*EMBED_PROVIDER.*TOP_K/,
    );
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(parseTriageConfig({}))).toBe(true);
  });
});
