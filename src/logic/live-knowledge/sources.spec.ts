import { LIVE_SOURCES, slugifySymptom } from './sources';

describe('sources', () => {
  const [nhs, mayo, medlineplus] = LIVE_SOURCES;

  it('slugifies symptom phrases', () => {
    expect(slugifySymptom('I have back pain')).toBe('back-pain');
    expect(slugifySymptom('Experiencing sore throat!')).toBe('sore-throat');
  });

  it('maps known symptoms to condition pages', () => {
    expect(nhs.buildUrl('chest pain')).toBe('https://www.nhs.uk/conditions/chest-pain/');
    expect(mayo.buildUrl('headache')).toBe('https://www.mayoclinic.org/diseases-conditions/headaches/symptoms-causes/syc-20377913');
    expect(medlineplus.buildUrl('vomiting')).toBe('https://medlineplus.gov/nauseaandvomiting.html');
  });

  it('falls back to a slug or topic index for other symptoms', () => {
    expect(nhs.buildUrl('fever')).toBe('https://www.nhs.uk/conditions/fever/');
    expect(mayo.buildUrl('fever')).toBe('https://www.mayoclinic.org/diseases-conditions/fever');
    expect(medlineplus.buildUrl('fever')).toBe('https://medlineplus.gov/healthtopics.html');
  });

  it('orders sources by authority', () => {
    expect(LIVE_SOURCES.map(s => [s.name, s.authority])).toEqual([
      ['NHS', 0.95],
      ['Mayo Clinic', 0.92],
      ['MedlinePlus', 0.9],
    ]);
  });
});
