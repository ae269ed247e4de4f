export interface EmergencySignal {
    signal: string;
    pattern: RegExp;
}

/** Wording that always means HIGH severity, checked in order against lower-cased text. */
export const EMERGENCY_SIGNALS: readonly EmergencySignal[] = [
    {
        signal: 'chest_pain_radiating',
        pattern: /\bchest (pain|pressure|tightness)\b.*\b(radiat\w*|spread\w*|sweat\w*|crushing)\b|\b(crushing|radiating)\b.*\bchest\b/,
    },
    { signal: 'chest_pain', pattern: /\bchest pain\b/ },
    { signal: 'heart_attack', pattern: /\b(heart attack|cardiac arrest)\b/ },
    {
        signal: 'breathing_difficulty',
        pattern: /\b(shortness of breath|difficulty breathing|trouble breathing|struggling to breathe|can'?t breathe|cannot breathe|choking)\b/,
    },
    { signal: 'severe_bleeding', pattern: /\b(severe|heavy|uncontrolled) bleeding\b|\bbleeding (won'?t|will not|does not|doesn'?t) stop\b/ },
    { signal: 'unconscious', pattern: /\b(unconscious|unresponsive|passed out|collapsed|not breathing)\b/ },
    { signal: 'stroke_signs', pattern: /\b(droop\w*|slurred speech|arm weakness|stroke)\b/ },
    { signal: 'seizure', pattern: /\b(seizure\w*|convuls\w*)\b/ },
    { signal: 'severe_pain', pattern: /\bsevere pain\b/ },
];

export function findEmergencySignal(text: string): string | null {
    const lower = text.toLowerCase();
    return EMERGENCY_SIGNALS.find(s => s.pattern.test(lower))?.signal ?? null;
}

const OFF_TOPIC_PATTERNS: readonly RegExp[] = [
    /\bwho (is|was)\b/,
    /\bcapital of\b/,
    /\bpresident of\b/,
    /\bbiography of\b/,
    /\bhistory of (america|france|england)\b/,
    /\bweather\b/,
    /\b(movie|film|song|recipe|football)s?\b/,
    /\bcalculate\b/,
    /\b(gandhi|einstein|shakespeare|napoleon)\b/,
];

// Text that mentions any of these is never treated as off-topic.
const MEDICAL_TERMS =
    /\b(pain\w*|ache\w*|hurt\w*|sick|ill|fever\w*|cough\w*|headache\w*|migraine\w*|nause\w*|vomit\w*|dizz\w*|bleed\w*|blood|breath\w*|rash\w*|swell\w*|swollen|injur\w*|symptom\w*|chest|throat|stomach|diarrh\w*|infect\w*|medic\w*|doctor|hospital|allerg\w*|sore|fatigue\w*|tired|faint\w*|wound\w*|burn\w*|temperature|runny|patient|pregnan\w*)\b/;

/** Off-topic wording with no health vocabulary and no emergency signal at all. */
export function isObviouslyNonMedical(text: string): boolean {
    const lower = text.toLowerCase();
    if (findEmergencySignal(lower) !== null || MEDICAL_TERMS.test(lower)) return false;
    return OFF_TOPIC_PATTERNS.some(p => p.test(lower));
}
