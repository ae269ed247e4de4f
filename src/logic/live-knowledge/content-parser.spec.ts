import { KnowledgeCategory } from '../../utils/types';
import { categorizeContent, cleanContent, extractContent } from './content-parser';
import { LIVE_SOURCES } from './sources';

const MILD = 'Mild headaches usually settle with rest, fluids and a simple painkiller taken as directed.';
const REVIEW = 'See a doctor if headaches keep coming back or painkillers stop helping with the pain.';
const CHEST = 'Call 999 now if chest pain spreads to your arm, jaw or back and you feel sweaty or sick. ';

describe('content-parser', () => {
  describe('extractContent', () => {
    it('joins qualifying paragraphs and list items', () => {
      const html = `<body><p>short</p><p>${MILD}</p><ul><li>${REVIEW}</li></ul></body>`;

      expect(extractContent(html)).toBe(`${MILD} ${REVIEW}`);
    });

    it('collapses whitespace inside elements', () => {
      const html = `<p>${MILD.replace(/ /g, '\n   ')}</p><p>${REVIEW}</p>`;

      expect(extractContent(html)).toBe(`${MILD} ${REVIEW}`);
    });

    it('returns an empty string when the page has too little text', () => {
      expect(extractContent(`<p>${MILD}</p>`)).toBe('');
    });

    it('skips elements that are too long', () => {
      const html = `<p>${'x'.repeat(450)}</p><p>${MILD}</p><p>${REVIEW}</p>`;

      expect(extractContent(html)).toBe(`${MILD} ${REVIEW}`);
    });

    it('uses NHS body text only when the care cards are thin', () => {
      const nhs = LIVE_SOURCES[0];
      const html = `<div class="nhsuk-warning-callout">${CHEST.repeat(4)}</div><main><p>${MILD}</p></main>`;

      expect(extractContent(html, nhs.passes)).toBe(CHEST.repeat(4).trim());
      expect(extractContent(`<main><p>${MILD}</p><p>${REVIEW}</p></main>`, nhs.passes)).toBe(`${MILD} ${REVIEW}`);
    });
  });

  describe('categorizeContent', () => {
    it('spots emergency wording first', () => {
      expect(categorizeContent('Severe pain with mild nausea')).toBe(KnowledgeCategory.EMERGENCY);
    });

    it('falls back to self-care, then appointment', () => {
      expect(categorizeContent('Get plenty of rest and fluids')).toBe(KnowledgeCategory.SELF_CARE);
      expect(categorizeContent('An interesting pattern worth checking')).toBe(KnowledgeCategory.APPOINTMENT);
    });
  });

  it('drops cookie and privacy notices', () => {
    expect(cleanContent('Headaches are common.   Cookie policy: we use cookies')).toBe('Headaches are common.');
  });
});
