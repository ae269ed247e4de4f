export type LiveSourceKey = 'nhs' | 'mayo' | 'medlineplus';

export interface ExtractionPass {
    selector: string;
    /** Element text must be longer than 30 and shorter than this. */
    maxElementLength: number;
    /** Stop collecting once the gathered text passes this length. */
    stopAfter: number;
    /** Only run when earlier passes gathered less than this. */
    onlyIfShorterThan?: number;
}

export interface LiveSource {
    key: LiveSourceKey;
    name: string;
    /** Fixed relevance given to a page from this source. */
    authority: number;
    passes: ExtractionPass[];
    buildUrl(symptom: string): string;
}

interface UrlRule {
    keywords: string[];
    url: string;
}

const NHS_RULES: UrlRule[] = [
    { keywords: ['chest-pain'], url: 'https://www.nhs.uk/conditions/chest-pain/' },
    { keywords: ['vomiting', 'nausea'], url: 'https://www.nhs.uk/conditions/vomiting-adults/' },
    { keywords: ['back-pain'], url: 'https://www.nhs.uk/conditions/back-pain/' },
    { keywords: ['headache'], url: 'https://www.nhs.uk/conditions/headaches/' },
    { keywords: ['diarrhea', 'stomach'], url: 'https://www.nhs.uk/conditions/diarrhoea-and-vomiting/' },
    { keywords: ['breathing', 'shortness'], url: 'https://www.nhs.uk/conditions/shortness-of-breath/' },
];

const MAYO_RULES: UrlRule[] = [
    { keywords: ['chest-pain'], url: 'https://www.mayoclinic.org/diseases-conditions/chest-pain/symptoms-causes/syc-20370838' },
    { keywords: ['vomiting'], url: 'https://www.mayoclinic.org/symptoms/vomiting/basics/definition/sym-20050942' },
    { keywords: ['back-pain'], url: 'https://www.mayoclinic.org/diseases-conditions/back-pain/symptoms-causes/syc-20369906' },
    { keywords: ['headache'], url: 'https://www.mayoclinic.org/diseases-conditions/headaches/symptoms-causes/syc-20377913' },
];

const MEDLINEPLUS_RULES: UrlRule[] = [
    { keywords: ['chest', 'heart'], url: 'https://medlineplus.gov/chestpain.html' },
    { keywords: ['vomiting', 'nausea'], url: 'https://medlineplus.gov/nauseaandvomiting.html' },
    { keywords: ['back'], url: 'https://medlineplus.gov/backpain.html' },
    { keywords: ['headache'], url: 'https://medlineplus.gov/headache.html' },
];

const FILLER_PHRASES = ['i have ', 'i am ', 'facing ', 'experiencing ', 'feeling '];

/** "I have back pain" -> "back-pain" */
export function slugifySymptom(symptom: string): string {
    let slug = symptom.toLowerCase();
    for (const phrase of FILLER_PHRASES) {
        slug = slug.split(phrase).join('');
    }
    return slug
        .split(' pain').join('-pain')
        .split(' ').join('-')
        .replace(/[^a-z0-9-]/g, '');
}

function matchRule(rules: UrlRule[], slug: string): string | undefined {
    return rules.find(rule => rule.keywords.some(k => slug.includes(k)))?.url;
}

export const LIVE_SOURCES: readonly LiveSource[] = [
    {
        key: 'nhs',
        name: 'NHS',
        authority: 0.95,
        passes: [
            { selector: '.nhsuk-care-card, .nhsuk-warning-callout', maxElementLength: 500, stopAfter: 800 },
            { selector: 'main p, .nhsuk-body-l, .nhsuk-list li', maxElementLength: 400, stopAfter: 1000, onlyIfShorterThan: 300 },
        ],
        buildUrl: symptom => {
            const slug = slugifySymptom(symptom);
            return matchRule(NHS_RULES, slug) ?? `https://www.nhs.uk/conditions/${slug}/`;
        },
    },
    {
        key: 'mayo',
        name: 'Mayo Clinic',
        authority: 0.92,
        passes: [{ selector: '.symptoms, .causes, .when-to-see-doctor, .content', maxElementLength: 500, stopAfter: 1000 }],
        buildUrl: symptom => {
            const slug = slugifySymptom(symptom);
            return matchRule(MAYO_RULES, slug) ?? `https://www.mayoclinic.org/diseases-conditions/${slug}`;
        },
    },
    {
        key: 'medlineplus',
        name: 'MedlinePlus',
        authority: 0.9,
        passes: [{ selector: '.health-summary, .page-info, .section', maxElementLength: 500, stopAfter: 1000 }],
        buildUrl: symptom => matchRule(MEDLINEPLUS_RULES, slugifySymptom(symptom)) ?? 'https://medlineplus.gov/healthtopics.html',
    },
];

export const GENERIC_PASSES: ExtractionPass[] = [{ selector: 'p, li', maxElementLength: 400, stopAfter: 1000 }];
