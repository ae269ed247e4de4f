import { AnalysisResult, CareKind, Severity } from '../../utils/types';

export const EMERGENCY_MARKERS: readonly RegExp[] = [
    /\bemergency\b/,
    /\burgent\b/,
    /\b911\b/,
    /\bcall emergency\b/,
    /\bchest pain\b/,
    /\bdifficulty breathing\b/,
    /\bsevere pain\b/,
];
export const SELF_CARE_MARKERS: readonly RegExp[] = [/\brest\b/, /\bhome care\b/, /\bself-treat\w*/, /\bover-the-counter\b/];

export interface ClassificationRule {
    kind: CareKind;
    reason: string;
    matches: (analysis: AnalysisResult) => boolean;
}

const mentions = (markers: readonly RegExp[], text: string) => {
    const lower = text.toLowerCase();
    return markers.some(m => m.test(lower));
};

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        kind: CareKind.NonMedical,
        reason: 'non-medical input',
        matches: a => a.severity === Severity.NON_MEDICAL,
    },
    {
        kind: CareKind.Emergency,
        reason: 'high severity or emergency wording',
        matches: a => a.severity === Severity.HIGH || mentions(EMERGENCY_MARKERS, a.analysis),
    },
    {
        kind: CareKind.SelfCare,
        reason: 'low severity or self-care wording',
        // a guessed risk level must not let wording alone downgrade to self-care
        matches: a => a.severity === Severity.LOW || (!a.severityDefaulted && mentions(SELF_CARE_MARKERS, a.analysis)),
    },
];

/** First matching rule wins; anything unmatched needs a human look. */
export function classify(analysis: AnalysisResult): { kind: CareKind; reason: string } {
    const rule = CLASSIFICATION_RULES.find(r => r.matches(analysis));
    return rule ? { kind: rule.kind, reason: rule.reason } : { kind: CareKind.Appointment, reason: 'default' };
}
