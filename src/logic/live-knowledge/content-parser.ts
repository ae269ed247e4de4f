import * as cheerio from 'cheerio';
import { squashWhitespace } from '../../utils/textNormalizer';
import { KnowledgeCategory } from '../../utils/types';
import { ExtractionPass, GENERIC_PASSES } from './sources';

const MIN_ELEMENT_LENGTH = 30;

/** Pages yielding this many characters or fewer are discarded. */
export const MIN_PAGE_CONTENT = 100;

const BOILERPLATE = [/Cookie policy.*/gi, /Privacy policy.*/gi, /Advertisement.*/gi];

const EMERGENCY_PATTERNS = [
    /\bcall 911\b/, /\bemergency\b/, /\bimmediate\b/, /\burgent\b/, /\blife[- ]threatening\b/,
    /\bambulance\b/, /\bcritical\b/, /\bsevere\b/, /\bheart attack\b/, /\bstroke\b/,
    /\bbreathing difficulty\b/, /\bchest pain\b/,
];

const SELF_CARE_PATTERNS = [
    /\bhome treatment\b/, /\bself[- ]care\b/, /\brest\b/, /\bover-the-counter\b/, /\bhome remedies\b/,
    /\busually resolves\b/, /\bmild\b/, /\bminor\b/, /\bself-limiting\b/, /\bhome management\b/,
];

export function categorizeContent(content: string): KnowledgeCategory {
    const lower = content.toLowerCase();
    if (EMERGENCY_PATTERNS.some(p => p.test(lower))) return KnowledgeCategory.EMERGENCY;
    if (SELF_CARE_PATTERNS.some(p => p.test(lower))) return KnowledgeCategory.SELF_CARE;
    return KnowledgeCategory.APPOINTMENT;
}

export function cleanContent(raw: string): string {
    return BOILERPLATE.reduce((text, pattern) => text.replace(pattern, ''), squashWhitespace(raw)).trim();
}

/**
 * Collects element text pass by pass. Returns '' when the page yields
 * MIN_PAGE_CONTENT characters or fewer.
 */
export function extractContent(html: string, passes: ExtractionPass[] = GENERIC_PASSES): string {
    const $ = cheerio.load(html);
    let content = '';

    for (const pass of passes) {
        if (pass.onlyIfShorterThan !== undefined && content.length >= pass.onlyIfShorterThan) continue;

        for (const element of $(pass.selector).toArray()) {
            const text = squashWhitespace($(element).text());
            if (text.length <= MIN_ELEMENT_LENGTH || text.length >= pass.maxElementLength) continue;
            content += `${text} `;
            if (content.length > pass.stopAfter) break;
        }
    }

    const cleaned = cleanContent(content);
    return cleaned.length > MIN_PAGE_CONTENT ? cleaned : '';
}
