import { truncate } from '../../utils/textNormalizer';
import { AnalysisSections, Severity } from '../../utils/types';
import { NON_MEDICAL_SENTINEL } from './prompts';

export const DEFAULT_RECOMMENDATION = 'Consult with a healthcare professional for proper assessment';

export interface ParsedReply {
    analysis: string;
    severity: Severity;
    recommendation: string;
    severityDefaulted: boolean;
    sections: AnalysisSections;
}

type SectionKey = keyof AnalysisSections;

const LABELS: Record<string, SectionKey> = {
    'ASSESSMENT': 'assessment',
    'ANALYSIS': 'assessment',
    'DIFFERENTIAL': 'differential',
    'DIFFERENTIAL DIAGNOSIS': 'differential',
    'RISK LEVEL': 'riskLevel',
    'SEVERITY': 'riskLevel',
    'CORRELATION': 'correlation',
    'RECOMMENDATION': 'recommendation',
};

// "- **Risk level:** HIGH", "RISK LEVEL: HIGH", "**Assessment**: ..."
const LABEL_LINE =
    /^\s*(?:[-*•]\s+)?(?:\*\*|__)?\s*(ASSESSMENT|ANALYSIS|DIFFERENTIAL DIAGNOSIS|DIFFERENTIAL|RISK LEVEL|SEVERITY|CORRELATION|RECOMMENDATION)\s*(?:\*\*|__)?\s*:\s*(?:\*\*|__)?\s*(.*)$/i;

const RISK_RULES: Array<{ pattern: RegExp; severity: Severity }> = [
    { pattern: /\bNON[_ -]?MEDICAL\b/, severity: Severity.NON_MEDICAL },
    { pattern: /\b(CRITICAL|SEVERE|EMERGENCY|HIGH)\b/, severity: Severity.HIGH },
    { pattern: /\b(MEDIUM|MODERATE)\b/, severity: Severity.MODERATE },
    { pattern: /\b(MILD|MINOR|LOW)\b/, severity: Severity.LOW },
];

export function normalizeRisk(value: string): Severity | null {
    const upper = value.replace(/[*_`]/g, ' ').toUpperCase();
    return RISK_RULES.find(r => r.pattern.test(upper))?.severity ?? null;
}

export function isNonMedicalReply(reply: string): boolean {
    return reply.toUpperCase().includes(NON_MEDICAL_SENTINEL);
}

/**
 * Splits a labelled reply into its sections. Text before the first label is
 * ignored; a section runs until the next label. Returns null when no label
 * is found at all.
 */
export function extractSections(reply: string): AnalysisSections | null {
    const sections: AnalysisSections = { assessment: '', differential: '', riskLevel: '', correlation: '', recommendation: '' };
    let current: SectionKey | null = null;
    let found = false;

    for (const line of reply.split(/\r?\n/)) {
        const match = LABEL_LINE.exec(line);
        if (match) {
            current = LABELS[match[1].toUpperCase().replace(/\s+/g, ' ')];
            found = true;
            sections[current] = appendLine(sections[current], match[2]);
        } else if (current) {
            sections[current] = appendLine(sections[current], line);
        }
    }
    return found ? sections : null;
}

function appendLine(existing: string, line: string): string {
    const text = line.replace(/\*\*/g, '').trim();
    if (!text) return existing;
    return existing ? `${existing}\n${text}` : text;
}

export function parseReply(reply: string): ParsedReply | null {
    if (isNonMedicalReply(reply)) {
        return {
            analysis: 'Non-medical input detected',
            severity: Severity.NON_MEDICAL,
            recommendation: 'Please describe your medical symptoms or health concerns for triage assistance.',
            severityDefaulted: false,
            sections: { assessment: 'Non-medical input detected', differential: '', riskLevel: Severity.NON_MEDICAL, correlation: '', recommendation: '' },
        };
    }

    const sections = extractSections(reply);
    if (!sections) return null;

    const severity = normalizeRisk(sections.riskLevel);
    return {
        analysis: sections.assessment || truncate(reply.trim(), 200),
        severity: severity ?? Severity.MODERATE,
        recommendation: sections.recommendation || DEFAULT_RECOMMENDATION,
        severityDefaulted: severity === null,
        sections,
    };
}
