import { KnowledgeCategory } from '../../utils/types';
import { parseCorpusLines, toCategory } from './corpus';

describe('corpus', () => {
  it('maps corpus categories onto knowledge categories', () => {
    expect(toCategory('red_flag')).toBe(KnowledgeCategory.EMERGENCY);
    expect(toCategory('Self_Care')).toBe(KnowledgeCategory.SELF_CARE);
    expect(toCategory('appointment')).toBe(KnowledgeCategory.APPOINTMENT);
    expect(toCategory('something-else')).toBe(KnowledgeCategory.APPOINTMENT);
  });

  it('parses valid lines and reports the rest', () => {
    const content = [
      '{"id":"a","text":"Rest  and fluids","category":"self_care","tags":["cold"]}',
      '',
      'not json',
      '{"id":"b"}',
      '{"id":"a","text":"duplicate"}',
      '{"id":"c","text":"Call for help","source_name":"Notes","category":"red_flag"}',
    ].join('\n');

    const { entries, skipped } = parseCorpusLines(content, 'corpus.jsonl');

    expect(entries).toEqual([
      { id: 'a', text: 'Rest and fluids', sourceName: '', sourceUrl: '', category: KnowledgeCategory.SELF_CARE, tags: ['cold'] },
      { id: 'c', text: 'Call for help', sourceName: 'Notes', sourceUrl: '', category: KnowledgeCategory.EMERGENCY, tags: [] },
    ]);
    expect(skipped.map(s => s.line)).toEqual([3, 4, 5]);
    expect(skipped[0].reason).toBe('invalid JSON');
    expect(skipped[2].reason).toBe('duplicate id a');
  });
});
