interface SymptomRule {
    phrases: string[];
    symptom: string;
}

// first match wins
const SYMPTOM_RULES: readonly SymptomRule[] = [
    { phrases: ['chest pain', 'heart pain'], symptom: 'chest pain' },
    { phrases: ['vomiting', 'throwing up', 'nausea'], symptom: 'vomiting' },
    { phrases: ['back pain', 'spine'], symptom: 'back pain' },
    { phrases: ['headache', 'head pain'], symptom: 'headache' },
    { phrases: ['breathing', 'shortness of breath', 'dyspnea'], symptom: 'shortness of breath' },
    { phrases: ['diarrhea', 'loose stools'], symptom: 'diarrhea' },
    { phrases: ['fever', 'temperature'], symptom: 'fever' },
    { phrases: ['cough'], symptom: 'cough' },
    { phrases: ['dizziness', 'dizzy'], symptom: 'dizziness' },
    { phrases: ['stomach', 'abdominal'], symptom: 'abdominal pain' },
];

const COMPLAINT_FRAGMENTS = ['pain', 'ache', 'hurt', 'sick'];

/**
 * Reduces free text to a single symptom phrase for live lookups.
 */
export function extractPrimarySymptom(text: string): string {
    const input = text.toLowerCase();
    const rule = SYMPTOM_RULES.find(r => r.phrases.some(p => input.includes(p)));
    if (rule) return rule.symptom;

    const word = input
        .split(/\s+/)
        .find(w => w.length > 4 && COMPLAINT_FRAGMENTS.some(f => w.includes(f)));
    return word ?? text.trim();
}
