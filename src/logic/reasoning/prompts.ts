import { PatientContext } from '../../utils/types';

export const NON_MEDICAL_SENTINEL = 'NON_MEDICAL_INPUT';

export const triageSystemPrompt = () => `You are a medical triage assistant. You do not diagnose; you estimate how urgently a person needs care.

Rules:
- First decide whether the input describes medical symptoms or health concerns.
- If it does NOT (capitals, famous people, films, general knowledge), reply with exactly: ${NON_MEDICAL_SENTINEL}
- Ground your answer in the MEDICAL KNOWLEDGE provided. Do not invent sources.
- When in doubt between two risk levels, choose the higher one.
- RISK LEVEL must be exactly one of HIGH, MODERATE or LOW.

Reply in this exact format, one label per line:
ASSESSMENT: <brief clinical assessment>
DIFFERENTIAL: <most likely causes, comma separated>
RISK LEVEL: <HIGH|MODERATE|LOW>
CORRELATION: <how the provided knowledge supports the assessment>
RECOMMENDATION: <specific next step for the person>`;

function describePatient(patient: PatientContext): string {
    const lines: string[] = [];
    if (patient.age !== undefined) lines.push(`Age: ${patient.age}`);
    if (patient.sex) lines.push(`Sex: ${patient.sex}`);
    if (patient.painScale !== undefined) lines.push(`Pain scale (0-10): ${patient.painScale}`);
    if (patient.durationText) lines.push(`Duration: ${patient.durationText}`);
    if (patient.conditions?.length) lines.push(`Known conditions: ${patient.conditions.join(', ')}`);
    if (patient.medications?.length) lines.push(`Current medications: ${patient.medications.join(', ')}`);
    if (patient.allergies?.length) lines.push(`Allergies: ${patient.allergies.join(', ')}`);
    return lines.join('\n');
}

export interface TriagePromptInput {
    symptoms: string;
    groundingContext: string;
    conversationSummary?: string;
    patient?: PatientContext;
}

export const triageUserPrompt = ({ symptoms, groundingContext, conversationSummary, patient }: TriagePromptInput) => {
    const patientBlock = patient ? describePatient(patient) : '';
    return [
        `SYMPTOMS:\n${symptoms}`,
        patientBlock ? `PATIENT CONTEXT:\n${patientBlock}` : '',
        `MEDICAL KNOWLEDGE:\n${groundingContext}`,
        conversationSummary ? `EARLIER IN THIS CONVERSATION:\n${conversationSummary}` : '',
        'Focus on safety and the appropriate level of care.',
    ].filter(Boolean).join('\n\n');
};
