import { Test } from '@nestjs/testing';
import { parseTriageConfig, triageConfig } from '../../config/triage.config';
import { SessionStoreService } from './session-store.service';

describe('SessionStoreService', () => {
  let store: SessionStoreService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [SessionStoreService, { provide: triageConfig.KEY, useValue: parseTriageConfig({ SESSION_HISTORY_CAP: '3' }) }],
    }).compile();
    store = moduleRef.get(SessionStoreService);
  });

  it('returns an empty history for an unknown session', () => {
    expect(store.history('nobody')).toEqual([]);
    expect(store.summarize('nobody')).toBe('');
  });

  it('keeps only the newest turns once the cap is reached', () => {
    for (let i = 1; i <= 4; i++) store.record('s1', `input ${i}`, `reply ${i}`, i);

    expect(store.history('s1').map(t => t.userInput)).toEqual(['input 2', 'input 3', 'input 4']);
  });

  it('keeps sessions apart', () => {
    store.record('s1', 'a', 'b');
    store.record('s2', 'c', 'd');

    expect(store.history('s1')).toHaveLength(1);
    expect(store.history('s2')[0].userInput).toBe('c');
    expect(store.sessionCount()).toBe(2);
  });

  it('hands out snapshots that later writes do not change', () => {
    store.record('s1', 'first', 'reply');
    const snapshot = store.history('s1');
    store.record('s1', 'second', 'reply');

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(store.history('s1')).toHaveLength(2);
  });

  it('summarizes turns with clipped responses', () => {
    const ts = new Date(2024, 0, 1, 9, 5, 7).getTime();
    store.record('s1', 'mild headache', 'x'.repeat(120), ts);

    expect(store.summarize('s1')).toBe(`[09:05:07] Input: mild headache | Response: ${'x'.repeat(100)}...`);
  });
});
