import { EMERGENCY_SIGNALS, isObviouslyNonMedical } from '../../utils/medicalScreening';
import { Severity } from '../../utils/types';

export const FALLBACK_SUFFIX = ' (Fallback analysis used)';

export interface FallbackOutcome {
    severity: Severity;
    signal: string;
    analysis: string;
    recommendation: string;
}

interface FallbackRule {
    signal: string;
    severity: Severity;
    matches: (text: string) => boolean;
}

const pattern = (re: RegExp) => (text: string) => re.test(text);

// Emergency wording outranks the off-topic check.
export const FALLBACK_RULES: readonly FallbackRule[] = [
    ...EMERGENCY_SIGNALS.map(({ signal, pattern: re }): FallbackRule => ({ signal, severity: Severity.HIGH, matches: pattern(re) })),
    { signal: 'non_medical', severity: Severity.NON_MEDICAL, matches: isObviouslyNonMedical },
    { signal: 'mild_symptoms', severity: Severity.LOW, matches: pattern(/\b(mild|minor|headache|runny nose|sore throat|cough)\b/) },
];

function describe(severity: Severity, signal: string, emergencyNumber: string): Omit<FallbackOutcome, 'severity' | 'signal'> {
    switch (severity) {
        case Severity.NON_MEDICAL:
            return {
                analysis: 'Non-medical input detected',
                recommendation: "I'm a medical triage assistant. Please describe your medical symptoms or health concerns so I can help assess your situation.",
            };
        case Severity.HIGH:
            return {
                analysis: `Symptoms indicate a potential medical emergency (${signal.replace(/_/g, ' ')}). ` +
                    'They need immediate evaluation to rule out cardiac, respiratory or neurological causes.',
                recommendation: `Seek immediate emergency medical care. Call ${emergencyNumber} or go to the nearest emergency department.`,
            };
        case Severity.LOW:
            return {
                analysis: 'Symptoms suggest a minor condition that is likely manageable with home care, such as a common cold or a mild headache.',
                recommendation: 'Try home remedies with rest and hydration. Monitor for worsening.',
            };
        case Severity.MODERATE:
            return {
                analysis: 'Symptoms need a medical evaluation to determine appropriate treatment. ' +
                    'They do not appear life-threatening but warrant professional assessment.',
                recommendation: 'Schedule an appointment with a healthcare provider within 1-2 weeks.',
            };
    }
}

/**
 * Deterministic analysis used whenever the reasoning service cannot answer.
 * Rules are checked in order; the first match decides.
 */
export function fallbackAnalysis(symptoms: string, emergencyNumber: string): FallbackOutcome {
    const text = symptoms.toLowerCase();
    const rule = FALLBACK_RULES.find(r => r.matches(text));
    const severity = rule?.severity ?? Severity.MODERATE;
    const signal = rule?.signal ?? 'unclassified';
    const { analysis, recommendation } = describe(severity, signal, emergencyNumber);
    return {
        severity,
        signal,
        analysis: `${analysis}${FALLBACK_SUFFIX}`,
        recommendation,
    };
}
